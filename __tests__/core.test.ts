/**
 * Core Tests
 * Error types and loggers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    CommandError,
    ConsoleLogger,
    ErrorCodes,
    MemoryLogger,
    MultiLogger,
    ProtocolError,
    RadarError,
    SilentLogger,
    TimeoutError,
    createLogger,
    hasErrorCode,
    isLogLevel,
    isRadarError,
    withTimeout,
    wrapError,
} from '../src/core';
import { catchRejection } from './test-utils';

// ==================== Errors ====================

describe('Errors', () => {
    it('should carry a code and details', () => {
        const error = new ProtocolError('Invalid response', { command: 4 });
        expect(error).toBeInstanceOf(RadarError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ProtocolError');
        expect(error.code).toBe(ErrorCodes.PROTOCOL_ERROR);
        expect(error.details).toEqual({ command: 4 });
    });

    it('should serialize to JSON', () => {
        const error = new TimeoutError();
        expect(error.toJSON()).toEqual({
            name: 'TimeoutError',
            code: 'TIMEOUT',
            message: 'Timeout while reading from the sensor',
            details: undefined,
            timestamp: error.timestamp,
        });
    });

    it('should keep the underlying error of a failed command', () => {
        const underlying = new TimeoutError();
        const error = new CommandError('Failed to get mode', underlying);
        expect(error.code).toBe(ErrorCodes.COMMAND_FAILED);
        expect(error.underlying).toBe(underlying);
        expect(error.details).toEqual({ cause: underlying.toJSON() });
    });

    it('should check error codes', () => {
        expect(isRadarError(new TimeoutError())).toBe(true);
        expect(isRadarError(new Error('plain'))).toBe(false);
        expect(hasErrorCode(new TimeoutError(), ErrorCodes.TIMEOUT)).toBe(true);
        expect(hasErrorCode(new TimeoutError(), ErrorCodes.PROTOCOL_ERROR)).toBe(false);
        expect(hasErrorCode('TIMEOUT', ErrorCodes.TIMEOUT)).toBe(false);
    });

    it('should wrap foreign errors', () => {
        const radar = new ProtocolError('bad');
        expect(wrapError(radar)).toBe(radar);

        const wrapped = wrapError(new TypeError('boom'), ErrorCodes.CONNECTION_ERROR);
        expect(wrapped.code).toBe(ErrorCodes.CONNECTION_ERROR);
        expect(wrapped.message).toBe('boom');
        expect(wrapped.details).toMatchObject({ originalName: 'TypeError' });

        expect(wrapError('text')).toMatchObject({ code: ErrorCodes.INTERNAL_ERROR, message: 'text' });
    });

    it('should race a promise against a timeout', async () => {
        await expect(withTimeout(Promise.resolve(3), 50)).resolves.toBe(3);

        const error = await catchRejection(withTimeout(new Promise<never>(() => undefined), 5));
        expect(error).toBeInstanceOf(TimeoutError);
        expect(error).toMatchObject({ message: 'Timeout after 5ms' });
    });
});

// ==================== Logging ====================

describe('MemoryLogger', () => {
    it('should record entries at or above its level', () => {
        const logger = new MemoryLogger('info');
        logger.debug('sensor', 'hidden');
        logger.info('sensor', 'shown');
        logger.error('device', '12 Sensor fault', { code: 12 });

        expect(logger.entries.map((e) => [e.level, e.scope, e.message])).toEqual([
            ['info', 'sensor', 'shown'],
            ['error', 'device', '12 Sensor fault'],
        ]);
        expect(logger.byLevel('error')[0].details).toEqual({ code: 12 });
    });

    it('should export JSON lines and clear', () => {
        const logger = new MemoryLogger();
        logger.warn('sensor', 'one');
        logger.warn('sensor', 'two');

        const lines = logger.toJSONL().split('\n').map((line): unknown => JSON.parse(line));
        expect(lines).toMatchObject([
            { level: 'warn', scope: 'sensor', message: 'one' },
            { level: 'warn', scope: 'sensor', message: 'two' },
        ]);

        logger.clear();
        expect(logger.entries).toEqual([]);
    });

    it('should change level at run time', () => {
        const logger = new MemoryLogger('error');
        expect(logger.isEnabled('warn')).toBe(false);
        logger.setLevel('debug');
        expect(logger.getLevel()).toBe('debug');
        expect(logger.isEnabled('warn')).toBe(true);
    });
});

describe('ConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should print level and scope before the message', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = new ConsoleLogger();
        logger.info('sensor', 'below the default level');
        logger.warn('sensor', 'Dropped packet: CRC Fail: b005000000b1');

        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith('[WARN] [sensor] Dropped packet: CRC Fail: b005000000b1');
    });

    it('should pass details as a second argument', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        new ConsoleLogger('debug').error('serial', 'lost', { attempt: 3 });
        expect(error).toHaveBeenCalledWith('[ERROR] [serial] lost', { attempt: 3 });
    });
});

describe('Logger helpers', () => {
    it('should fan out to every logger', () => {
        const first = new MemoryLogger();
        const second = new MemoryLogger();
        const multi = new MultiLogger([first, second, new SilentLogger()]);
        multi.info('sensor', 'hello');
        expect(first.entries).toHaveLength(1);
        expect(second.entries).toHaveLength(1);
    });

    it('should create loggers by kind', () => {
        expect(createLogger('memory')).toBeInstanceOf(MemoryLogger);
        expect(createLogger('console', { level: 'error' })).toBeInstanceOf(ConsoleLogger);
        expect(createLogger('silent')).toBeInstanceOf(SilentLogger);
    });

    it('should recognise log levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});
