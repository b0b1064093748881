/**
 * @module protocol/crc
 * @description CRC-16/CCITT-FALSE used to protect every packet body
 *
 * poly 0x1021, init 0xFFFF, no reflection, no final XOR.
 * Check value for ASCII "123456789" is 0x29B1.
 */

export const CRC16_POLYNOMIAL = 0x1021;
export const CRC16_INITIAL = 0xffff;

/**
 * Compute the CRC of a byte sequence
 */
export function crc16Ccitt(data: Uint8Array, initial: number = CRC16_INITIAL): number {
    let crc = initial & 0xffff;
    for (const byte of data) {
        crc ^= byte << 8;
        for (let bit = 0; bit < 8; bit++) {
            const msb = crc & 0x8000;
            crc = (crc << 1) & 0xffff;
            if (msb) crc ^= CRC16_POLYNOMIAL;
        }
    }
    return crc;
}
