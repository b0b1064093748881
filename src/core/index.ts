/**
 * @module core
 * @description Shared foundations: error types and logging
 *
 * ## Modules
 * - `errors`: Error codes and RadarError subclasses
 * - `logging`: Console/Memory/Multi loggers
 */

// ==================== Errors ====================

export {
    ErrorCodes,
    RadarError,
    TimeoutError,
    ProtocolError,
    FramingError,
    ValidationError,
    ConnectionError,
    DeviceNotFoundError,
    CommandError,
    isRadarError,
    hasErrorCode,
    wrapError,
    withTimeout,
} from './errors';

export type { ErrorCode } from './errors';

// ==================== Logging ====================

export type {
    LogLevel,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    LOG_LEVELS,
    isLogLevel,
    ConsoleLogger,
    MemoryLogger,
    SilentLogger,
    MultiLogger,
    createLogger,
} from './logging';
