/**
 * @module core/errors
 * @description Error types and error codes shared by every layer of the SDK
 *
 * Transport, protocol and sensor code all throw `RadarError` subclasses so that
 * callers can branch on `code` instead of parsing messages.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Link & Protocol Errors
    /** No response within the command timeout */
    TIMEOUT: 'TIMEOUT',
    /** Response had the wrong command, variant or length */
    PROTOCOL_ERROR: 'PROTOCOL_ERROR',
    /** Packet framing, escaping or CRC failure */
    FRAMING_ERROR: 'FRAMING_ERROR',
    /** Serial link closed, lost or never opened */
    CONNECTION_ERROR: 'CONNECTION_ERROR',
    /** No matching sensor found on any serial port */
    DEVICE_NOT_FOUND: 'DEVICE_NOT_FOUND',

    // Validation Errors
    /** Argument out of range or of the wrong type */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Options passed to the sensor are inconsistent */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Command Errors
    /** A device command failed (see details.cause) */
    COMMAND_FAILED: 'COMMAND_FAILED',

    /** Anything else */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the SDK
 */
export class RadarError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'RadarError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, RadarError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Timeout error
 */
export class TimeoutError extends RadarError {
    constructor(message = 'Timeout while reading from the sensor', details?: unknown) {
        super(ErrorCodes.TIMEOUT, message, details);
        this.name = 'TimeoutError';
    }
}

/**
 * Protocol error (unexpected response)
 */
export class ProtocolError extends RadarError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.PROTOCOL_ERROR, message, details);
        this.name = 'ProtocolError';
    }
}

/**
 * Framing error (bad header/footer, escape or CRC)
 */
export class FramingError extends RadarError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.FRAMING_ERROR, message, details);
        this.name = 'FramingError';
    }
}

/**
 * Validation error (invalid argument)
 */
export class ValidationError extends RadarError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Connection error
 */
export class ConnectionError extends RadarError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.CONNECTION_ERROR, message, details);
        this.name = 'ConnectionError';
    }
}

/**
 * No sensor found on the serial ports
 */
export class DeviceNotFoundError extends RadarError {
    constructor(message = 'No radar modules detected', details?: unknown) {
        super(ErrorCodes.DEVICE_NOT_FOUND, message, details);
        this.name = 'DeviceNotFoundError';
    }
}

/**
 * A device command failed. The underlying error is kept in `underlying`
 * and serialized under `details.cause`.
 */
export class CommandError extends RadarError {
    readonly underlying: RadarError;

    constructor(message: string, underlying: RadarError) {
        super(ErrorCodes.COMMAND_FAILED, message, { cause: underlying.toJSON() });
        this.name = 'CommandError';
        this.underlying = underlying;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a RadarError
 */
export function isRadarError(error: unknown): error is RadarError {
    return error instanceof RadarError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isRadarError(error) && error.code === code;
}

/**
 * Wrap any error into a RadarError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): RadarError {
    if (isRadarError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new RadarError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new RadarError(defaultCode, String(error));
}

/**
 * Race a promise against a timeout. The timer is cleared once the race settles.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    message?: string
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new TimeoutError(message ?? `Timeout after ${ms}ms`));
        }, ms);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
