/**
 * @packageDocumentation
 * @module radar-serial-sdk
 *
 * SDK for mmWave radar sensors attached over a USB serial link.
 *
 * ## Modules
 * - `core` - Error types and logging
 * - `protocol` - Packet framing, CRC, command payloads, command channel
 * - `transport` - Serial port transport, port discovery, in-memory test transport
 * - `units` - Distance, speed and acceleration conversion
 * - `sensor` - RadarSensor client, setting codes and frame types
 *
 * ## Usage Example
 * ```typescript
 * import { RadarSensor, MODE_POINT_CLOUD } from 'radar-serial-sdk';
 *
 * const sensor = new RadarSensor();
 * await sensor.connect();
 * await sensor.setMode(MODE_POINT_CLOUD);
 * await sensor.setDistanceFilter(0, 10);
 * await sensor.start(10);
 *
 * for await (const frame of sensor.getData()) {
 *   if (frame) console.log(frame);
 * }
 * await sensor.close();
 * ```
 *
 * @license MIT
 */

// ==================== Sensor (Primary) ====================
export * from './src/sensor';

// ==================== Namespaces ====================
export * as core from './src/core';
export * as protocol from './src/protocol';
export * as transport from './src/transport';
export * as units from './src/units';

// ==================== Common Re-exports ====================
export {
    RadarError,
    ErrorCodes,
    ValidationError,
    CommandError,
    TimeoutError,
    ConnectionError,
    DeviceNotFoundError,
} from './src/core/errors';
export { ConsoleLogger, MemoryLogger, createLogger } from './src/core/logging';
export type { Logger, LogLevel } from './src/core/logging';
export { findPorts, findPort } from './src/transport/ports';

// ==================== Version ====================
export const VERSION = '1.0.0';
