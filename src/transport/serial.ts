/**
 * @module transport/serial
 * @description Serial port transport (Node.js, `serialport` package)
 *
 * Opens the sensor's USB serial port at 115200 baud. When the port closes
 * without `disconnect()` being called, the transport tries to reopen it a
 * fixed number of times before emitting `fatal`.
 */

import { SerialPort } from 'serialport';
import { ConnectionError, wrapError, ErrorCodes } from '../core/errors';
import type { Logger } from '../core/logging';
import { BaseTransport, type TransportOptions } from './transport';

// ==================== Types ====================

export const DEFAULT_BAUD_RATE = 115200;

/**
 * Serial transport options
 */
export interface SerialTransportOptions extends TransportOptions {
    /** Port path, e.g. `/dev/ttyACM0` or `COM3` */
    path: string;
    /** Baud rate (default 115200) */
    baudRate?: number;
}

// ==================== Helpers ====================

export function openPort(port: SerialPort): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
    });
}

export function closePort(port: SerialPort): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (!port.isOpen) {
            resolve();
            return;
        }
        port.close((err) => (err ? reject(err) : resolve()));
    });
}

// ==================== Serial Port Transport ====================

/**
 * Transport over a serial port
 *
 * @example
 * ```typescript
 * const transport = new SerialPortTransport({ path: '/dev/ttyACM0' });
 * transport.onEvent((e) => {
 *   if (e.type === 'data' && e.data) reader.push(e.data);
 * });
 * await transport.connect();
 * ```
 */
export class SerialPortTransport extends BaseTransport {
    private port: SerialPort | null = null;
    private readonly path: string;
    private readonly baudRate: number;
    private closing = false;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    private wakeReconnect: (() => void) | null = null;

    constructor(options: SerialTransportOptions, logger?: Logger) {
        const { path, baudRate, ...transportOptions } = options;
        super(transportOptions, logger);
        this.path = path;
        this.baudRate = baudRate ?? DEFAULT_BAUD_RATE;
    }

    getPath(): string {
        return this.path;
    }

    /**
     * Open the port
     */
    async connect(): Promise<void> {
        if (this.state === 'connected') return;

        this.closing = false;
        this.setState('connecting');

        try {
            await this.open();
        } catch (e) {
            this.setState('disconnected');
            throw new ConnectionError(`Failed to open serial port ${this.path}`, {
                cause: wrapError(e, ErrorCodes.CONNECTION_ERROR).toJSON(),
            });
        }

        this.setState('connected');
        this.emit({ type: 'connected' });
    }

    /**
     * Close the port and cancel any reconnect in progress
     */
    async disconnect(): Promise<void> {
        this.closing = true;
        this.cancelReconnectDelay();

        const port = this.port;
        this.port = null;
        if (port) {
            port.removeAllListeners('close');
            await closePort(port);
        }

        if (this.state !== 'disconnected') {
            this.setState('disconnected');
            this.emit({ type: 'disconnected' });
        }
    }

    /**
     * Write bytes to the port
     */
    send(data: Uint8Array): void {
        const port = this.port;
        if (this.state !== 'connected' || !port) {
            throw new ConnectionError('Not connected');
        }

        port.write(Buffer.from(data), (err) => {
            if (err) {
                this.emit({ type: 'error', error: wrapError(err, ErrorCodes.CONNECTION_ERROR) });
            }
        });
    }

    private async open(): Promise<SerialPort> {
        const port = new SerialPort({
            path: this.path,
            baudRate: this.baudRate,
            autoOpen: false,
        });

        await openPort(port);

        port.on('data', (chunk: Buffer) => {
            this.emit({ type: 'data', data: chunk });
        });
        port.on('error', (err: Error) => {
            this.emit({ type: 'error', error: wrapError(err, ErrorCodes.CONNECTION_ERROR) });
        });
        port.on('close', () => {
            this.handleClose(port);
        });

        this.port = port;
        return port;
    }

    // ==================== Reconnection ====================

    private handleClose(port: SerialPort): void {
        if (this.closing || this.port !== port) return;

        this.port = null;
        this.setState('disconnected');
        this.emit({ type: 'disconnected' });

        if (!this.options.autoReconnect) return;

        this.reconnect().catch((e: unknown) => {
            this.emit({ type: 'error', error: wrapError(e, ErrorCodes.CONNECTION_ERROR) });
        });
    }

    private async reconnect(): Promise<void> {
        for (let attempt = 1; attempt <= this.options.maxReconnectAttempts; attempt++) {
            this.setState('reconnecting');
            this.emit({ type: 'reconnecting', attempt });
            this.logger.error(
                'serial',
                `The serial connection has been disconnected... attempting to reconnect. Attempt ${attempt}.`
            );

            await this.waitBeforeReconnect();
            if (this.closing) return;

            let port: SerialPort;
            try {
                port = await this.open();
            } catch (e) {
                this.logger.debug('serial', `Reconnect attempt ${attempt} failed`, wrapError(e).message);
                continue;
            }

            // disconnect() ran while the port was opening
            if (this.closing) {
                if (this.port === port) this.port = null;
                port.removeAllListeners('close');
                await closePort(port);
                return;
            }

            this.setState('connected');
            this.logger.error('serial', 'The serial connection has been restored.');
            this.emit({ type: 'reconnected' });
            return;
        }

        this.setState('error');
        this.logger.error('serial', 'The serial connection has been lost. Please manually reconnect.');
        this.emit({ type: 'fatal', error: new ConnectionError('The serial connection has been lost') });
    }

    private waitBeforeReconnect(): Promise<void> {
        return new Promise<void>((resolve) => {
            this.wakeReconnect = resolve;
            this.reconnectTimer = setTimeout(() => {
                this.reconnectTimer = null;
                this.wakeReconnect = null;
                resolve();
            }, this.options.reconnectDelayMs);
        });
    }

    private cancelReconnectDelay(): void {
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
        const wake = this.wakeReconnect;
        this.wakeReconnect = null;
        wake?.();
    }
}
