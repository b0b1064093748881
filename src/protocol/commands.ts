/**
 * @module protocol/commands
 * @description Command ids, payload builders and response parsers
 *
 * Payloads are `command, variant, fields...` with little-endian fields.
 * Parsers check command, variant and exact length before reading.
 */

import { ProtocolError } from '../core/errors';
import type { LogLevel } from '../core/logging';
import { toHex } from './framing';

// ==================== Command Codes ====================

/**
 * Command ids (first payload byte)
 */
export const CommandId = {
    DEVICE_MESSAGE: 0x00,
    VERSION: 0x01,
    SERIAL_NUMBER: 0x02,
    RESET: 0x03,
    FRAME_RATE: 0x04,
    MODE: 0x05,
    DISTANCE_FILTER: 0x06,
    ANGLE_FILTER: 0x07,
    MOVING_FILTER: 0x08,
    SAVE: 0x09,
    POINT_DENSITY: 0x10,
    SENSITIVITY: 0x11,
    HEIGHT_FILTER: 0x12,
    RADAR_APPLICATION_VERSION: 0x14,
    SCENE_CALIBRATION: 0x15,
    OBJECT_TYPE_MODE: 0x16,
    AUTO_START: 0x17,
    CAPTURE_START: 0x64,
    CAPTURE_STOP: 0x65,
    POINT_CLOUD: 0x66,
    OBJECT_TRACKING: 0x67,
    CORE_STATISTICS: 0x68,
    POINT_CLOUD_STATISTICS: 0x70,
} as const;

export type CommandIdValue = (typeof CommandId)[keyof typeof CommandId];

/**
 * Command variants (second payload byte)
 */
export const Variant = {
    REQUEST: 0x00,
    RESPONSE: 0x01,
    SET: 0x02,
} as const;

export type VariantValue = (typeof Variant)[keyof typeof Variant];

/** Subframe type marking the last subframe of a frame */
export const SUBFRAME_LAST = 0x02;

export const POINT_RECORD_SIZE = 9;
export const OBJECT_RECORD_SIZE = 19;
export const APPLICATION_NAME_LENGTH = 20;

// ==================== Payload Writer / Reader ====================

/**
 * Little-endian payload builder
 */
export class PayloadWriter {
    private readonly bytes: number[] = [];

    u8(value: number): this {
        this.bytes.push(value & 0xff);
        return this;
    }

    i8(value: number): this {
        return this.u8(value < 0 ? value + 0x100 : value);
    }

    u16(value: number): this {
        this.bytes.push(value & 0xff, (value >> 8) & 0xff);
        return this;
    }

    i16(value: number): this {
        return this.u16(value < 0 ? value + 0x10000 : value);
    }

    u32(value: number): this {
        const buf = Buffer.alloc(4);
        buf.writeUInt32LE(value >>> 0);
        this.bytes.push(...buf);
        return this;
    }

    /** Write `text` as ASCII, NUL padded or truncated to `length` */
    text(text: string, length: number): this {
        const buf = Buffer.alloc(length);
        buf.write(text, 'ascii');
        this.bytes.push(...buf);
        return this;
    }

    raw(bytes: Iterable<number>): this {
        for (const byte of bytes) this.bytes.push(byte & 0xff);
        return this;
    }

    toBuffer(): Buffer {
        return Buffer.from(this.bytes);
    }
}

/**
 * Little-endian payload reader with bounds checks
 */
export class PayloadReader {
    private offset: number;

    constructor(private readonly buf: Buffer, offset = 0) {
        this.offset = offset;
    }

    get remaining(): number {
        return this.buf.length - this.offset;
    }

    private take(size: number): number {
        if (this.remaining < size) {
            throw new ProtocolError('Payload is shorter than expected', { payload: toHex(this.buf) });
        }
        const at = this.offset;
        this.offset += size;
        return at;
    }

    u8(): number {
        return this.buf.readUInt8(this.take(1));
    }

    i8(): number {
        return this.buf.readInt8(this.take(1));
    }

    u16(): number {
        return this.buf.readUInt16LE(this.take(2));
    }

    i16(): number {
        return this.buf.readInt16LE(this.take(2));
    }

    u32(): number {
        return this.buf.readUInt32LE(this.take(4));
    }

    /** Read a NUL padded ASCII field */
    text(length: number): string {
        const at = this.take(length);
        return this.buf.toString('ascii', at, at + length).replace(/\0+$/, '');
    }
}

// ==================== Builders ====================

/** `command, 0x00` */
export function buildRequest(command: number): Buffer {
    return Buffer.from([command, Variant.REQUEST]);
}

/** `command, 0x02` with no fields */
export function buildSet(command: number): Buffer {
    return Buffer.from([command, Variant.SET]);
}

export function buildSetU8(command: number, value: number): Buffer {
    return new PayloadWriter().u8(command).u8(Variant.SET).u8(value).toBuffer();
}

export function buildSetI8Pair(command: number, first: number, second: number): Buffer {
    return new PayloadWriter().u8(command).u8(Variant.SET).i8(first).i8(second).toBuffer();
}

export function buildSetU16Pair(command: number, first: number, second: number): Buffer {
    return new PayloadWriter().u8(command).u8(Variant.SET).u16(first).u16(second).toBuffer();
}

export function buildSetI16Pair(command: number, first: number, second: number): Buffer {
    return new PayloadWriter().u8(command).u8(Variant.SET).i16(first).i16(second).toBuffer();
}

export function buildApplicationVersionRequest(slot: number): Buffer {
    return Buffer.from([CommandId.RADAR_APPLICATION_VERSION, Variant.REQUEST, slot]);
}

/** Capture start; `samples` 0 means continuous */
export function buildCaptureStart(samples: number): Buffer {
    return Buffer.from([CommandId.CAPTURE_START, Variant.REQUEST, samples]);
}

export function buildCaptureStop(): Buffer {
    return Buffer.from([CommandId.CAPTURE_STOP, Variant.REQUEST]);
}

// ==================== Response Parsers ====================

/**
 * Check command, variant and length of a response
 *
 * @throws ProtocolError when any of them differs
 */
export function expectResponse(packet: Buffer, command: number, length: number): PayloadReader {
    if (packet.length !== length || packet[0] !== command || packet[1] !== Variant.RESPONSE) {
        throw new ProtocolError('Invalid response', {
            command,
            expectedLength: length,
            payload: toHex(packet),
        });
    }
    return new PayloadReader(packet, 2);
}

/** Response with no fields (reset, save) */
export function parseAck(packet: Buffer, command: number): void {
    expectResponse(packet, command, 2);
}

export function parseU8(packet: Buffer, command: number): number {
    return expectResponse(packet, command, 3).u8();
}

export function parseI8Pair(packet: Buffer, command: number): [number, number] {
    const reader = expectResponse(packet, command, 4);
    return [reader.i8(), reader.i8()];
}

export function parseU16Pair(packet: Buffer, command: number): [number, number] {
    const reader = expectResponse(packet, command, 6);
    return [reader.u16(), reader.u16()];
}

export function parseI16Pair(packet: Buffer, command: number): [number, number] {
    const reader = expectResponse(packet, command, 6);
    return [reader.i16(), reader.i16()];
}

/**
 * `major.minor.build` version triple
 */
export interface VersionTriple {
    major: number;
    minor: number;
    build: number;
}

export interface DeviceVersion {
    firmware: VersionTriple;
    hardware: VersionTriple;
}

export function parseVersion(packet: Buffer): DeviceVersion {
    const reader = expectResponse(packet, CommandId.VERSION, 10);
    return {
        firmware: { major: reader.u8(), minor: reader.u8(), build: reader.u16() },
        hardware: { major: reader.u8(), minor: reader.u8(), build: reader.u16() },
    };
}

/** Serial number as `"<first>-<second>"` */
export function parseSerialNumber(packet: Buffer): string {
    const reader = expectResponse(packet, CommandId.SERIAL_NUMBER, 10);
    return `${reader.u32()}-${reader.u32()}`;
}

export interface ApplicationVersion {
    name: string;
    major: number;
    minor: number;
    build: number;
}

export interface ApplicationVersionResponse extends ApplicationVersion {
    slot: number;
}

export function parseApplicationVersion(packet: Buffer): ApplicationVersionResponse {
    const reader = expectResponse(packet, CommandId.RADAR_APPLICATION_VERSION, 7 + APPLICATION_NAME_LENGTH);
    return {
        slot: reader.u8(),
        name: reader.text(APPLICATION_NAME_LENGTH),
        major: reader.u8(),
        minor: reader.u8(),
        build: reader.u16(),
    };
}

// ==================== Device Messages ====================

export interface DeviceMessage {
    type: number;
    code: number;
    text: string;
    level: LogLevel;
}

const MESSAGE_LEVELS: Record<number, LogLevel> = {
    0: 'debug',
    1: 'debug',
    2: 'info',
    3: 'warn',
    4: 'error',
    5: 'info',
};

/**
 * Log level for a device message type; unknown types log at info
 */
export function messageLevel(type: number): LogLevel {
    return MESSAGE_LEVELS[type] ?? 'info';
}

export function isDeviceMessage(packet: Buffer): boolean {
    return packet.length > 0 && packet[0] === CommandId.DEVICE_MESSAGE;
}

export function parseDeviceMessage(packet: Buffer): DeviceMessage {
    if (packet.length < 4 || packet[0] !== CommandId.DEVICE_MESSAGE || packet[1] !== Variant.RESPONSE) {
        throw new ProtocolError('Invalid device message', { payload: toHex(packet) });
    }
    const type = packet[2];
    return {
        type,
        code: packet[3],
        text: packet.toString('ascii', 4).replace(/\0+$/, ''),
        level: messageLevel(type),
    };
}

// ==================== Capture Data ====================

/** Point as sent by the device: millimetres and mm/s */
export interface RawPoint {
    x: number;
    y: number;
    z: number;
    intensity: number;
    velocity: number;
}

/** Tracked object as sent by the device: mm, mm/s and mm/s^2 */
export interface RawObject {
    trackingId: number;
    xPos: number;
    yPos: number;
    zPos: number;
    xVel: number;
    yVel: number;
    zVel: number;
    xAcc: number;
    yAcc: number;
    zAcc: number;
}

export interface Subframe<T> {
    last: boolean;
    records: T[];
}

function readSubframe<T>(
    packet: Buffer,
    command: number,
    recordSize: number,
    read: (reader: PayloadReader) => T
): Subframe<T> {
    if (packet.length < 4 || packet[0] !== command || packet[1] !== Variant.RESPONSE) {
        throw new ProtocolError('Invalid subframe', { command, payload: toHex(packet) });
    }
    const type = packet[2];
    const count = packet[3];
    if (packet.length - 4 !== count * recordSize) {
        throw new ProtocolError('Subframe length does not match its record count', {
            command,
            count,
            payload: toHex(packet),
        });
    }

    const reader = new PayloadReader(packet, 4);
    const records: T[] = [];
    for (let i = 0; i < count; i++) {
        records.push(read(reader));
    }
    return { last: type === SUBFRAME_LAST, records };
}

export function parsePointCloudSubframe(packet: Buffer): Subframe<RawPoint> {
    return readSubframe(packet, CommandId.POINT_CLOUD, POINT_RECORD_SIZE, (reader) => ({
        x: reader.i16(),
        y: reader.i16(),
        z: reader.i16(),
        intensity: reader.u8(),
        velocity: reader.i16(),
    }));
}

export function parseObjectSubframe(packet: Buffer): Subframe<RawObject> {
    return readSubframe(packet, CommandId.OBJECT_TRACKING, OBJECT_RECORD_SIZE, (reader) => ({
        trackingId: reader.i8(),
        xPos: reader.i16(),
        yPos: reader.i16(),
        zPos: reader.i16(),
        xVel: reader.i16(),
        yVel: reader.i16(),
        zVel: reader.i16(),
        xAcc: reader.i16(),
        yAcc: reader.i16(),
        zAcc: reader.i16(),
    }));
}

// ==================== Statistics ====================

/**
 * Processing statistics reported by the sensor core
 */
export interface CoreStatistics {
    activeFrameCpu: number;
    interFrameCpu: number;
    interFrameProcTime: number;
    transmitOutputTime: number;
    interFrameProcMargin: number;
    interChirpProcMargin: number;
    packetTransmitTime: number;
    temperatureSensor0: number;
    temperatureSensor1: number;
    temperaturePowerManagement: number;
    temperatureRx0: number;
    temperatureRx1: number;
    temperatureRx2: number;
    temperatureRx3: number;
    temperatureTx0: number;
    temperatureTx1: number;
    temperatureTx2: number;
}

/**
 * Timing statistics of the point cloud pipeline
 */
export interface PointCloudStatistics {
    pointsAggregationTime: number;
    intensitySortTime: number;
    nearestNeighboursTime: number;
    uartTransmissionTime: number;
    filterPointsRemoved: number;
    numTransmittedPoints: number;
    inputPointsTruncated: boolean;
    outputPointsTruncated: boolean;
}

export function parseCoreStatistics(packet: Buffer): CoreStatistics {
    const reader = expectResponse(packet, CommandId.CORE_STATISTICS, 2 + 7 * 4 + 10 * 2);
    return {
        activeFrameCpu: reader.u32(),
        interFrameCpu: reader.u32(),
        interFrameProcTime: reader.u32(),
        transmitOutputTime: reader.u32(),
        interFrameProcMargin: reader.u32(),
        interChirpProcMargin: reader.u32(),
        packetTransmitTime: reader.u32(),
        temperatureSensor0: reader.i16(),
        temperatureSensor1: reader.i16(),
        temperaturePowerManagement: reader.i16(),
        temperatureRx0: reader.i16(),
        temperatureRx1: reader.i16(),
        temperatureRx2: reader.i16(),
        temperatureRx3: reader.i16(),
        temperatureTx0: reader.i16(),
        temperatureTx1: reader.i16(),
        temperatureTx2: reader.i16(),
    };
}

export function parsePointCloudStatistics(packet: Buffer): PointCloudStatistics {
    const reader = expectResponse(packet, CommandId.POINT_CLOUD_STATISTICS, 2 + 6 * 4 + 2);
    return {
        pointsAggregationTime: reader.u32(),
        intensitySortTime: reader.u32(),
        nearestNeighboursTime: reader.u32(),
        uartTransmissionTime: reader.u32(),
        filterPointsRemoved: reader.u32(),
        numTransmittedPoints: reader.u32(),
        inputPointsTruncated: reader.u8() !== 0,
        outputPointsTruncated: reader.u8() !== 0,
    };
}
