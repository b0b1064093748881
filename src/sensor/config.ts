/**
 * @module sensor/config
 * @description RadarSensor options and their defaults
 */

import { ErrorCodes, RadarError } from '../core/errors';
import type { Logger } from '../core/logging';
import type { Transport } from '../transport/transport';
import { OutputFormat, isCodeOf, type OutputFormatValue } from './constants';

// ==================== Types ====================

/**
 * Tunable options; every field has a default
 */
export interface SensorConfig {
    /** OUTPUT_LIST or OUTPUT_MATRIX */
    outputFormat: OutputFormatValue;
    /** Maximum frames kept in the queue, 0 for unbounded */
    queueLength: number;
    /** Time allowed for each command's response */
    commandTimeoutMs: number;
    /** Wait after stopping a capture, on connect and close */
    settleMs: number;
    /** How long `getData` waits for a frame before yielding null */
    pollMs: number;
    baudRate: number;
    autoReconnect: boolean;
    reconnectDelayMs: number;
    maxReconnectAttempts: number;
}

/**
 * Options accepted by the RadarSensor constructor
 */
export interface SensorOptions extends Partial<SensorConfig> {
    /** Serial port path; discovered when neither this nor `transport` is given */
    port?: string;
    /** Use this transport instead of opening a serial port */
    transport?: Transport;
    logger?: Logger;
}

/**
 * Default configuration
 */
export const DEFAULT_SENSOR_OPTIONS: SensorConfig = {
    outputFormat: OutputFormat.LIST,
    queueLength: 2,
    commandTimeoutMs: 5000,
    settleMs: 500,
    pollMs: 1000,
    baudRate: 115200,
    autoReconnect: true,
    reconnectDelayMs: 2000,
    maxReconnectAttempts: 9,
};

// ==================== Resolution ====================

function invalid(message: string, details?: unknown): RadarError {
    return new RadarError(ErrorCodes.INVALID_CONFIG, message, details);
}

function checkNonNegativeInteger(name: keyof SensorConfig, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw invalid(`${name} must be a non-negative integer`, { [name]: value });
    }
}

/**
 * Merge options with the defaults and validate them
 *
 * @throws RadarError with code INVALID_CONFIG
 */
export function resolveSensorOptions(options: Partial<SensorConfig> = {}): SensorConfig {
    const defaults = DEFAULT_SENSOR_OPTIONS;
    const config: SensorConfig = {
        outputFormat: options.outputFormat ?? defaults.outputFormat,
        queueLength: options.queueLength ?? defaults.queueLength,
        commandTimeoutMs: options.commandTimeoutMs ?? defaults.commandTimeoutMs,
        settleMs: options.settleMs ?? defaults.settleMs,
        pollMs: options.pollMs ?? defaults.pollMs,
        baudRate: options.baudRate ?? defaults.baudRate,
        autoReconnect: options.autoReconnect ?? defaults.autoReconnect,
        reconnectDelayMs: options.reconnectDelayMs ?? defaults.reconnectDelayMs,
        maxReconnectAttempts: options.maxReconnectAttempts ?? defaults.maxReconnectAttempts,
    };

    if (!isCodeOf(OutputFormat, config.outputFormat)) {
        throw invalid('Invalid output format', { outputFormat: config.outputFormat });
    }
    checkNonNegativeInteger('queueLength', config.queueLength);
    checkNonNegativeInteger('commandTimeoutMs', config.commandTimeoutMs);
    checkNonNegativeInteger('settleMs', config.settleMs);
    checkNonNegativeInteger('pollMs', config.pollMs);
    checkNonNegativeInteger('reconnectDelayMs', config.reconnectDelayMs);
    checkNonNegativeInteger('maxReconnectAttempts', config.maxReconnectAttempts);
    if (!Number.isInteger(config.baudRate) || config.baudRate <= 0) {
        throw invalid('baudRate must be a positive integer', { baudRate: config.baudRate });
    }

    return config;
}
