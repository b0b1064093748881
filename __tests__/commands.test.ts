/**
 * Command Tests
 * Payload builders and response parsers
 */

import { describe, it, expect } from 'vitest';
import {
    CommandId,
    PayloadReader,
    PayloadWriter,
    buildApplicationVersionRequest,
    buildCaptureStart,
    buildCaptureStop,
    buildRequest,
    buildSet,
    buildSetI16Pair,
    buildSetI8Pair,
    buildSetU16Pair,
    buildSetU8,
    isDeviceMessage,
    messageLevel,
    parseAck,
    parseApplicationVersion,
    parseCoreStatistics,
    parseDeviceMessage,
    parseI16Pair,
    parseI8Pair,
    parseObjectSubframe,
    parsePointCloudStatistics,
    parsePointCloudSubframe,
    parseSerialNumber,
    parseU16Pair,
    parseU8,
    parseVersion,
} from '../src/protocol';
import { ErrorCodes, ProtocolError } from '../src/core';
import { catchError } from './test-utils';

function hex(bytes: string): Buffer {
    return Buffer.from(bytes.replace(/\s+/g, ''), 'hex');
}

// ==================== Builders ====================

describe('Builders', () => {
    it('should build a get request', () => {
        expect(buildRequest(CommandId.FRAME_RATE)).toEqual(hex('04 00'));
    });

    it('should build a set with no fields', () => {
        expect(buildSet(CommandId.SAVE)).toEqual(hex('09 02'));
    });

    it('should build a single byte set', () => {
        expect(buildSetU8(CommandId.FRAME_RATE, 10)).toEqual(hex('04 02 0a'));
    });

    it('should encode signed byte pairs in two\'s complement', () => {
        expect(buildSetI8Pair(CommandId.ANGLE_FILTER, -30, 40)).toEqual(hex('07 02 e2 28'));
    });

    it('should encode 16-bit pairs little-endian', () => {
        expect(buildSetU16Pair(CommandId.DISTANCE_FILTER, 500, 8000)).toEqual(hex('06 02 f4 01 40 1f'));
        expect(buildSetI16Pair(CommandId.HEIGHT_FILTER, -1000, 1500)).toEqual(hex('12 02 18 fc dc 05'));
    });

    it('should build the application version request for a slot', () => {
        expect(buildApplicationVersionRequest(2)).toEqual(hex('14 00 02'));
    });

    it('should build capture start and stop', () => {
        expect(buildCaptureStart(10)).toEqual(hex('64 00 0a'));
        expect(buildCaptureStart(0)).toEqual(hex('64 00 00'));
        expect(buildCaptureStop()).toEqual(hex('65 00'));
    });
});

// ==================== Payload Reader / Writer ====================

describe('PayloadWriter', () => {
    it('should write 32-bit values little-endian', () => {
        expect(new PayloadWriter().u32(0x01020304).toBuffer()).toEqual(hex('04 03 02 01'));
    });

    it('should pad and truncate text fields', () => {
        expect(new PayloadWriter().text('ab', 4).toBuffer()).toEqual(hex('61 62 00 00'));
        expect(new PayloadWriter().text('abcdef', 4).toBuffer()).toEqual(hex('61 62 63 64'));
    });
});

describe('PayloadReader', () => {
    it('should read fields in order', () => {
        const reader = new PayloadReader(hex('ff 18 fc 2e 16 00 00'));
        expect(reader.i8()).toBe(-1);
        expect(reader.i16()).toBe(-1000);
        expect(reader.u32()).toBe(5678);
        expect(reader.remaining).toBe(0);
    });

    it('should throw when reading past the end', () => {
        const error = catchError(() => new PayloadReader(hex('01')).u16());
        expect(error).toBeInstanceOf(ProtocolError);
        expect(error).toMatchObject({ message: 'Payload is shorter than expected' });
    });
});

// ==================== Responses ====================

describe('Response parsers', () => {
    it('should parse a single byte response', () => {
        expect(parseU8(hex('04 01 0a'), CommandId.FRAME_RATE)).toBe(10);
    });

    it('should reject a response with the wrong variant', () => {
        const error = catchError(() => parseU8(hex('04 00 0a'), CommandId.FRAME_RATE));
        expect(error).toMatchObject({ code: ErrorCodes.PROTOCOL_ERROR, message: 'Invalid response' });
    });

    it('should reject a response with the wrong command', () => {
        expect(() => parseU8(hex('05 01 0a'), CommandId.FRAME_RATE)).toThrow('Invalid response');
    });

    it('should reject a response with the wrong length', () => {
        expect(() => parseU8(hex('04 01 0a 00'), CommandId.FRAME_RATE)).toThrow('Invalid response');
        expect(() => parseAck(hex('03 01 00'), CommandId.RESET)).toThrow('Invalid response');
    });

    it('should accept an acknowledgement', () => {
        expect(() => parseAck(hex('09 01'), CommandId.SAVE)).not.toThrow();
    });

    it('should parse pairs', () => {
        expect(parseI8Pair(hex('07 01 e2 28'), CommandId.ANGLE_FILTER)).toEqual([-30, 40]);
        expect(parseU16Pair(hex('06 01 f4 01 40 1f'), CommandId.DISTANCE_FILTER)).toEqual([500, 8000]);
        expect(parseI16Pair(hex('12 01 18 fc dc 05'), CommandId.HEIGHT_FILTER)).toEqual([-1000, 1500]);
    });

    it('should parse firmware and hardware versions', () => {
        expect(parseVersion(hex('01 01 01 02 03 00 04 05 06 00'))).toEqual({
            firmware: { major: 1, minor: 2, build: 3 },
            hardware: { major: 4, minor: 5, build: 6 },
        });
    });

    it('should format the serial number as two numbers', () => {
        expect(parseSerialNumber(hex('02 01 d2 04 00 00 2e 16 00 00'))).toBe('1234-5678');
    });

    it('should parse an application version with a padded name', () => {
        const packet = new PayloadWriter()
            .u8(CommandId.RADAR_APPLICATION_VERSION).u8(0x01)
            .u8(2)
            .text('point-cloud', 20)
            .u8(1).u8(1).u16(20)
            .toBuffer();

        expect(parseApplicationVersion(packet)).toEqual({
            slot: 2,
            name: 'point-cloud',
            major: 1,
            minor: 1,
            build: 20,
        });
    });
});

// ==================== Device Messages ====================

describe('Device messages', () => {
    it('should map message types to log levels', () => {
        expect(messageLevel(0)).toBe('debug');
        expect(messageLevel(1)).toBe('debug');
        expect(messageLevel(2)).toBe('info');
        expect(messageLevel(3)).toBe('warn');
        expect(messageLevel(4)).toBe('error');
        expect(messageLevel(5)).toBe('info');
        expect(messageLevel(9)).toBe('info');
    });

    it('should recognise device messages by command id', () => {
        expect(isDeviceMessage(hex('00 01 03 07'))).toBe(true);
        expect(isDeviceMessage(hex('04 01 0a'))).toBe(false);
    });

    it('should parse type, code and text', () => {
        const packet = Buffer.concat([hex('00 01 03 07'), Buffer.from('Overheat', 'ascii')]);
        expect(parseDeviceMessage(packet)).toEqual({
            type: 3,
            code: 7,
            text: 'Overheat',
            level: 'warn',
        });
    });

    it('should reject a truncated message', () => {
        expect(() => parseDeviceMessage(hex('00 01 03'))).toThrow('Invalid device message');
    });
});

// ==================== Subframes ====================

describe('Subframes', () => {
    it('should parse point records', () => {
        const packet = new PayloadWriter()
            .u8(CommandId.POINT_CLOUD).u8(0x01).u8(0x02).u8(1)
            .i16(-100).i16(2000).i16(50).u8(30).i16(-250)
            .toBuffer();

        expect(parsePointCloudSubframe(packet)).toEqual({
            last: true,
            records: [{ x: -100, y: 2000, z: 50, intensity: 30, velocity: -250 }],
        });
    });

    it('should mark subframes that are not the last', () => {
        const packet = new PayloadWriter().u8(CommandId.POINT_CLOUD).u8(0x01).u8(0x01).u8(0).toBuffer();
        expect(parsePointCloudSubframe(packet)).toEqual({ last: false, records: [] });
    });

    it('should reject a record count that does not match the length', () => {
        const packet = new PayloadWriter()
            .u8(CommandId.POINT_CLOUD).u8(0x01).u8(0x02).u8(2)
            .i16(1).i16(2).i16(3).u8(4).i16(5)
            .toBuffer();
        expect(() => parsePointCloudSubframe(packet)).toThrow('Subframe length does not match its record count');
    });

    it('should parse object records', () => {
        const packet = new PayloadWriter()
            .u8(CommandId.OBJECT_TRACKING).u8(0x01).u8(0x02).u8(1)
            .i8(7)
            .i16(1500).i16(3000).i16(-200)
            .i16(100).i16(-50).i16(0)
            .i16(10).i16(20).i16(-30)
            .toBuffer();

        expect(parseObjectSubframe(packet)).toEqual({
            last: true,
            records: [{
                trackingId: 7,
                xPos: 1500, yPos: 3000, zPos: -200,
                xVel: 100, yVel: -50, zVel: 0,
                xAcc: 10, yAcc: 20, zAcc: -30,
            }],
        });
    });
});

// ==================== Statistics ====================

describe('Statistics', () => {
    it('should parse core statistics', () => {
        const writer = new PayloadWriter().u8(CommandId.CORE_STATISTICS).u8(0x01);
        [11, 12, 13, 14, 15, 16, 17].forEach((v) => writer.u32(v));
        [40, 41, 42, 43, 44, 45, -5, 46, 47, 48].forEach((v) => writer.i16(v));

        expect(parseCoreStatistics(writer.toBuffer())).toEqual({
            activeFrameCpu: 11,
            interFrameCpu: 12,
            interFrameProcTime: 13,
            transmitOutputTime: 14,
            interFrameProcMargin: 15,
            interChirpProcMargin: 16,
            packetTransmitTime: 17,
            temperatureSensor0: 40,
            temperatureSensor1: 41,
            temperaturePowerManagement: 42,
            temperatureRx0: 43,
            temperatureRx1: 44,
            temperatureRx2: 45,
            temperatureRx3: -5,
            temperatureTx0: 46,
            temperatureTx1: 47,
            temperatureTx2: 48,
        });
    });

    it('should parse point cloud statistics with truncation flags', () => {
        const packet = new PayloadWriter()
            .u8(CommandId.POINT_CLOUD_STATISTICS).u8(0x01)
            .u32(1).u32(2).u32(3).u32(4).u32(5).u32(6)
            .u8(1).u8(0)
            .toBuffer();

        expect(parsePointCloudStatistics(packet)).toEqual({
            pointsAggregationTime: 1,
            intensitySortTime: 2,
            nearestNeighboursTime: 3,
            uartTransmissionTime: 4,
            filterPointsRemoved: 5,
            numTransmittedPoints: 6,
            inputPointsTruncated: true,
            outputPointsTruncated: false,
        });
    });
});
