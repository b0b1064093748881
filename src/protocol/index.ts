/**
 * @module protocol
 * @description Wire protocol of the sensor's serial link
 *
 * ## Modules
 * - `crc`: CRC-16/CCITT-FALSE
 * - `framing`: Packet encode/decode and stream splitting
 * - `commands`: Command ids, payload builders, response parsers
 * - `channel`: Command/response pairing with timeouts
 */

export { crc16Ccitt, CRC16_POLYNOMIAL, CRC16_INITIAL } from './crc';

export {
    PACKET_HEAD,
    PACKET_FOOT,
    PACKET_ESC,
    PACKET_XOR,
    MAX_PACKET_LENGTH,
    toHex,
    encodePacket,
    decodePacket,
    PacketReader,
} from './framing';

export type { PacketReadResult } from './framing';

export {
    CommandId,
    Variant,
    SUBFRAME_LAST,
    POINT_RECORD_SIZE,
    OBJECT_RECORD_SIZE,
    APPLICATION_NAME_LENGTH,
    PayloadWriter,
    PayloadReader,
    buildRequest,
    buildSet,
    buildSetU8,
    buildSetI8Pair,
    buildSetU16Pair,
    buildSetI16Pair,
    buildApplicationVersionRequest,
    buildCaptureStart,
    buildCaptureStop,
    expectResponse,
    parseAck,
    parseU8,
    parseI8Pair,
    parseU16Pair,
    parseI16Pair,
    parseVersion,
    parseSerialNumber,
    parseApplicationVersion,
    messageLevel,
    isDeviceMessage,
    parseDeviceMessage,
    parsePointCloudSubframe,
    parseObjectSubframe,
    parseCoreStatistics,
    parsePointCloudStatistics,
} from './commands';

export type {
    CommandIdValue,
    VariantValue,
    VersionTriple,
    DeviceVersion,
    ApplicationVersion,
    ApplicationVersionResponse,
    DeviceMessage,
    RawPoint,
    RawObject,
    Subframe,
    CoreStatistics,
    PointCloudStatistics,
} from './commands';

export { CommandChannel, DEFAULT_COMMAND_TIMEOUT_MS } from './channel';
export type { PayloadSender } from './channel';
