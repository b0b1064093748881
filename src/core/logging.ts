/**
 * @module core/logging
 * @description Logging for the sensor SDK
 *
 * Device log messages, dropped packets and link events all go through a
 * `Logger`. ConsoleLogger prints, MemoryLogger keeps entries for inspection
 * (tests use it), MultiLogger fans out.
 */

// ==================== Types ====================

/**
 * Log level
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A single log entry
 */
export interface LogEntry {
    level: LogLevel;
    /** Component that produced the entry, e.g. `sensor` or `serial` */
    scope: string;
    message: string;
    /** Timestamp in milliseconds */
    timestamp: number;
    details?: unknown;
}

/**
 * Logger interface
 */
export interface Logger {
    debug(scope: string, message: string, details?: unknown): void;
    info(scope: string, message: string, details?: unknown): void;
    warn(scope: string, message: string, details?: unknown): void;
    error(scope: string, message: string, details?: unknown): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Minimum level that is recorded */
    level?: LogLevel;
}

// ==================== Constants ====================

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Type guard for log level strings
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

// ==================== Base Logger ====================

abstract class LevelLogger implements Logger {
    protected level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'warn') {
        this.level = typeof levelOrConfig === 'string'
            ? levelOrConfig
            : levelOrConfig.level ?? 'warn';
    }

    protected abstract write(entry: LogEntry): void;

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    debug(scope: string, message: string, details?: unknown): void {
        this.record('debug', scope, message, details);
    }

    info(scope: string, message: string, details?: unknown): void {
        this.record('info', scope, message, details);
    }

    warn(scope: string, message: string, details?: unknown): void {
        this.record('warn', scope, message, details);
    }

    error(scope: string, message: string, details?: unknown): void {
        this.record('error', scope, message, details);
    }

    private record(level: LogLevel, scope: string, message: string, details?: unknown): void {
        if (!this.isEnabled(level)) return;
        this.write({ level, scope, message, timestamp: Date.now(), details });
    }
}

// ==================== Console Logger ====================

/**
 * Console Logger: print entries at or above the configured level
 */
export class ConsoleLogger extends LevelLogger {
    protected write(entry: LogEntry): void {
        const line = `[${entry.level.toUpperCase()}] [${entry.scope}] ${entry.message}`;
        const args = entry.details === undefined ? [line] : [line, entry.details];
        switch (entry.level) {
            case 'debug':
                console.debug(...args);
                break;
            case 'info':
                console.info(...args);
                break;
            case 'warn':
                console.warn(...args);
                break;
            case 'error':
                console.error(...args);
                break;
        }
    }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: store entries in memory
 */
export class MemoryLogger extends LevelLogger {
    public entries: LogEntry[] = [];

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'debug') {
        super(levelOrConfig);
    }

    protected write(entry: LogEntry): void {
        this.entries.push(entry);
    }

    /** Entries of one level */
    byLevel(level: LogLevel): LogEntry[] {
        return this.entries.filter((entry) => entry.level === level);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.entries.map((entry) => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.entries = [];
    }
}

// ==================== Silent Logger ====================

export class SilentLogger implements Logger {
    debug(): void { /* no-op */ }
    info(): void { /* no-op */ }
    warn(): void { /* no-op */ }
    error(): void { /* no-op */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    debug(scope: string, message: string, details?: unknown): void {
        for (const logger of this.loggers) {
            logger.debug(scope, message, details);
        }
    }

    info(scope: string, message: string, details?: unknown): void {
        for (const logger of this.loggers) {
            logger.info(scope, message, details);
        }
    }

    warn(scope: string, message: string, details?: unknown): void {
        for (const logger of this.loggers) {
            logger.warn(scope, message, details);
        }
    }

    error(scope: string, message: string, details?: unknown): void {
        for (const logger of this.loggers) {
            logger.error(scope, message, details);
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger by kind
 */
export function createLogger(
    kind: 'console' | 'memory' | 'silent',
    config: LoggerConfig = {}
): Logger {
    switch (kind) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
        case 'silent':
            return new SilentLogger();
    }
}
