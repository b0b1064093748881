/**
 * @module protocol/framing
 * @description Packet framing for the sensor's serial link
 *
 * ```
 * 0xB0 | escaped(payload + crc16 (big-endian)) | 0xB1
 * ```
 *
 * Header, footer and escape bytes inside the body are sent as
 * `0xB2, byte ^ 0x04`. An encoded packet never exceeds 255 bytes.
 */

import { FramingError } from '../core/errors';
import { crc16Ccitt } from './crc';

// ==================== Constants ====================

export const PACKET_HEAD = 0xb0;
export const PACKET_FOOT = 0xb1;
export const PACKET_ESC = 0xb2;
export const PACKET_XOR = 0x04;
export const MAX_PACKET_LENGTH = 255;

const CRC_LENGTH = 2;

function needsEscape(byte: number): boolean {
    return byte === PACKET_HEAD || byte === PACKET_FOOT || byte === PACKET_ESC;
}

/**
 * Format bytes as a lowercase hex string
 */
export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

// ==================== Encode / Decode ====================

/**
 * Wrap a payload into a packet ready to be written to the link
 *
 * @throws FramingError if the encoded packet is longer than 255 bytes
 */
export function encodePacket(payload: Uint8Array): Buffer {
    const crc = crc16Ccitt(payload);
    const body = [...payload, (crc >> 8) & 0xff, crc & 0xff];

    const out: number[] = [PACKET_HEAD];
    for (const byte of body) {
        if (needsEscape(byte)) {
            out.push(PACKET_ESC, byte ^ PACKET_XOR);
        } else {
            out.push(byte);
        }
    }
    out.push(PACKET_FOOT);

    if (out.length > MAX_PACKET_LENGTH) {
        throw new FramingError(
            `Encoded packet is greater than the maximum of ${MAX_PACKET_LENGTH} bytes`,
            { length: out.length }
        );
    }

    return Buffer.from(out);
}

/**
 * Unwrap a packet: strip header and footer, unescape and verify the CRC
 *
 * @returns The payload without its CRC
 * @throws FramingError on a malformed packet or CRC mismatch
 */
export function decodePacket(raw: Uint8Array): Buffer {
    if (raw.length === 0 || raw[0] !== PACKET_HEAD) {
        throw new FramingError('First byte of the packet is not a header byte', { packet: toHex(raw) });
    }
    if (raw[raw.length - 1] !== PACKET_FOOT) {
        throw new FramingError('Last byte of the packet is not a footer byte', { packet: toHex(raw) });
    }

    const body: number[] = [];
    const end = raw.length - 1;
    for (let i = 0; i < end; i++) {
        const byte = raw[i];
        if (byte === PACKET_HEAD) continue;
        if (byte === PACKET_ESC) {
            i++;
            if (i >= end) {
                throw new FramingError('Escape byte at the end of the packet', { packet: toHex(raw) });
            }
            body.push(raw[i] ^ PACKET_XOR);
        } else {
            body.push(byte);
        }
    }

    if (body.length < CRC_LENGTH) {
        throw new FramingError(`Failed to extract CRC: ${toHex(raw)}`, { packet: toHex(raw) });
    }

    const data = Buffer.from(body.slice(0, body.length - CRC_LENGTH));
    const received = (body[body.length - 2] << 8) | body[body.length - 1];
    const expected = crc16Ccitt(data);
    if (received !== expected) {
        throw new FramingError(`CRC Fail: ${toHex(raw)}`, {
            packet: toHex(raw),
            expected,
            received,
        });
    }

    return data;
}

// ==================== Stream Reader ====================

/**
 * Result of feeding bytes to a PacketReader
 */
export interface PacketReadResult {
    /** Decoded payloads, in arrival order */
    packets: Buffer[];
    /** Packets that were found but failed to decode */
    errors: FramingError[];
}

/**
 * Splits a byte stream into packets.
 *
 * A packet ends at each footer byte and starts at the last header seen before
 * it. Bytes after the last footer are kept until more data arrives.
 *
 * @example
 * ```typescript
 * const reader = new PacketReader();
 * port.on('data', (chunk) => {
 *   const { packets } = reader.push(chunk);
 *   packets.forEach(handlePayload);
 * });
 * ```
 */
export class PacketReader {
    private buffer: Buffer = Buffer.alloc(0);

    push(chunk: Uint8Array): PacketReadResult {
        this.buffer = this.buffer.length === 0
            ? Buffer.from(chunk)
            : Buffer.concat([this.buffer, chunk]);

        const result: PacketReadResult = { packets: [], errors: [] };
        let start = 0;
        let consumed = 0;

        for (let idx = 0; idx < this.buffer.length; idx++) {
            const byte = this.buffer[idx];
            if (byte === PACKET_HEAD) {
                start = idx;
            } else if (byte === PACKET_FOOT) {
                const raw = this.buffer.subarray(start, idx + 1);
                try {
                    result.packets.push(decodePacket(raw));
                } catch (e) {
                    if (!(e instanceof FramingError)) throw e;
                    result.errors.push(e);
                }
                consumed = idx + 1;
                start = consumed;
            }
        }

        if (consumed > 0) {
            this.buffer = Buffer.from(this.buffer.subarray(consumed));
        }

        // no packet can be longer than MAX_PACKET_LENGTH; keep only a packet still in progress
        if (this.buffer.length > MAX_PACKET_LENGTH) {
            const head = this.buffer.lastIndexOf(PACKET_HEAD);
            const kept = head < 0 || this.buffer.length - head > MAX_PACKET_LENGTH ? 0 : this.buffer.length - head;
            const discarded = this.buffer.length - kept;
            this.buffer = Buffer.from(this.buffer.subarray(discarded));
            result.errors.push(new FramingError(`Discarded ${discarded} bytes without a footer`));
        }

        return result;
    }

    /** Number of bytes waiting for a footer */
    get bufferedLength(): number {
        return this.buffer.length;
    }

    clear(): void {
        this.buffer = Buffer.alloc(0);
    }
}
