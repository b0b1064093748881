/**
 * Framing Tests
 * CRC, packet encode/decode and stream splitting
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    crc16Ccitt,
    encodePacket,
    decodePacket,
    PacketReader,
    MAX_PACKET_LENGTH,
} from '../src/protocol';
import { FramingError, ErrorCodes } from '../src/core';
import { catchError } from './test-utils';

function hex(bytes: string): Buffer {
    return Buffer.from(bytes.replace(/\s+/g, ''), 'hex');
}

// ==================== CRC ====================

describe('crc16Ccitt', () => {
    it('should match the CCITT-FALSE check value', () => {
        expect(crc16Ccitt(Buffer.from('123456789', 'ascii'))).toBe(0x29b1);
    });

    it('should return the initial value for no data', () => {
        expect(crc16Ccitt(new Uint8Array(0))).toBe(0xffff);
    });

    it('should compute the CRC of a command payload', () => {
        expect(crc16Ccitt(Uint8Array.from([0x05, 0x00]))).toBe(0xe2fa);
    });
});

// ==================== Encode ====================

describe('encodePacket', () => {
    it('should wrap payload and big-endian CRC in header and footer', () => {
        expect(encodePacket(Uint8Array.from([0x05, 0x00]))).toEqual(hex('b0 05 00 e2 fa b1'));
    });

    it('should escape header, footer and escape bytes in the payload', () => {
        expect(encodePacket(Uint8Array.from([0xb0, 0xb1, 0xb2]))).toEqual(
            hex('b0 b2b4 b2b5 b2b6 98 c6 b1')
        );
    });

    it('should escape special bytes in the CRC', () => {
        expect(encodePacket(Uint8Array.from([0x11, 0x01, 0x56]))).toEqual(hex('b0 11 01 56 b2b5 cd b1'));
    });

    it('should accept a packet of exactly the maximum length', () => {
        // 251 payload bytes + 2 CRC bytes (0xdbeb) + header + footer
        expect(encodePacket(new Uint8Array(251)).length).toBe(MAX_PACKET_LENGTH);
    });

    it('should reject packets longer than the maximum', () => {
        expect(() => encodePacket(new Uint8Array(252))).toThrow(
            'Encoded packet is greater than the maximum of 255 bytes'
        );
    });

    it('should count escape bytes towards the maximum', () => {
        const payload = new Uint8Array(200).fill(0xb0);
        expect(() => encodePacket(payload)).toThrow(FramingError);
    });
});

// ==================== Decode ====================

describe('decodePacket', () => {
    it('should return the payload of a valid packet', () => {
        expect(decodePacket(hex('b0 05 01 01 04 7c b1'))).toEqual(hex('05 01 01'));
    });

    it('should unescape payload and CRC', () => {
        expect(decodePacket(hex('b0 b2b4 b2b5 b2b6 98 c6 b1'))).toEqual(hex('b0 b1 b2'));
        expect(decodePacket(hex('b0 11 01 56 b2b5 cd b1'))).toEqual(hex('11 01 56'));
    });

    it('should skip stray header bytes inside the packet', () => {
        expect(decodePacket(hex('b0 05 b0 00 e2 fa b1'))).toEqual(hex('05 00'));
    });

    it('should reject a packet without a header', () => {
        expect(() => decodePacket(hex('05 00 e2 fa b1'))).toThrow('First byte of the packet is not a header byte');
    });

    it('should reject a packet without a footer', () => {
        expect(() => decodePacket(hex('b0 05 00 e2 fa'))).toThrow('Last byte of the packet is not a footer byte');
    });

    it('should reject a packet too short to hold a CRC', () => {
        expect(() => decodePacket(hex('b0 05 b1'))).toThrow('Failed to extract CRC: b005b1');
    });

    it('should reject a CRC mismatch with the framing error code', () => {
        const error = catchError(() => decodePacket(hex('b0 05 00 e2 fb b1')));
        expect(error).toBeInstanceOf(FramingError);
        expect(error).toMatchObject({
            code: ErrorCodes.FRAMING_ERROR,
            message: 'CRC Fail: b00500e2fbb1',
        });
    });

    it('should round-trip a payload containing every special byte', () => {
        const payload = Uint8Array.from([0x66, 0x01, 0xb0, 0x00, 0xb1, 0xb2, 0x04]);
        expect(decodePacket(encodePacket(payload))).toEqual(Buffer.from(payload));
    });
});

// ==================== Stream Reader ====================

describe('PacketReader', () => {
    let reader: PacketReader;

    beforeEach(() => {
        reader = new PacketReader();
    });

    it('should extract a packet delivered in one chunk', () => {
        const { packets, errors } = reader.push(hex('b0 05 00 e2 fa b1'));
        expect(packets).toEqual([hex('05 00')]);
        expect(errors).toEqual([]);
        expect(reader.bufferedLength).toBe(0);
    });

    it('should discard bytes that never reach a footer', () => {
        const { packets, errors } = reader.push(Buffer.concat([hex('b0'), Buffer.alloc(300)]));
        expect(packets).toEqual([]);
        expect(errors.map((e) => e.message)).toEqual(['Discarded 301 bytes without a footer']);
        expect(reader.bufferedLength).toBe(0);
    });

    it('should keep the packet in progress when discarding', () => {
        const first = reader.push(Buffer.concat([Buffer.alloc(300), hex('b0 05')]));
        expect(first.errors.map((e) => e.message)).toEqual(['Discarded 300 bytes without a footer']);
        expect(reader.bufferedLength).toBe(2);

        expect(reader.push(hex('00 e2 fa b1'))).toEqual({ packets: [hex('05 00')], errors: [] });
    });

    it('should reassemble a packet split across chunks', () => {
        expect(reader.push(hex('b0 05 01')).packets).toEqual([]);
        expect(reader.bufferedLength).toBe(3);
        expect(reader.push(hex('01 04 7c b1')).packets).toEqual([hex('05 01 01')]);
        expect(reader.bufferedLength).toBe(0);
    });

    it('should extract several packets from one chunk and keep the tail', () => {
        const { packets } = reader.push(hex('b0 05 00 e2 fa b1 b0 65 00 e9 d0 b1 b0 64'));
        expect(packets).toEqual([hex('05 00'), hex('65 00')]);
        expect(reader.bufferedLength).toBe(2);
    });

    it('should start the packet at the last header before the footer', () => {
        const { packets } = reader.push(hex('b0 99 98 b0 05 00 e2 fa b1'));
        expect(packets).toEqual([hex('05 00')]);
    });

    it('should report a corrupt packet and keep decoding the stream', () => {
        const { packets, errors } = reader.push(hex('b0 05 00 00 00 b1 b0 65 00 e9 d0 b1'));
        expect(packets).toEqual([hex('65 00')]);
        expect(errors).toHaveLength(1);
        expect(errors[0].message).toBe('CRC Fail: b005000000b1');
    });

    it('should drop buffered bytes on clear', () => {
        reader.push(hex('b0 05'));
        reader.clear();
        expect(reader.bufferedLength).toBe(0);
        expect(reader.push(hex('00 e2 fa b1')).errors).toHaveLength(1);
    });
});
