/**
 * @module transport/transport
 * @description Byte transport between the SDK and the sensor
 *
 * The protocol layer only sees this interface, so the serial port and the
 * in-memory stand-in used by tests are interchangeable.
 */

import type { Logger } from '../core/logging';
import { SilentLogger } from '../core/logging';

// ==================== Transport Interface ====================

/**
 * Transport connection options
 */
export interface TransportOptions {
    /** Reopen the link after an unexpected close */
    autoReconnect?: boolean;
    /** Delay between reconnect attempts in ms */
    reconnectDelayMs?: number;
    /** Reconnect attempts before giving up */
    maxReconnectAttempts?: number;
}

export const DEFAULT_TRANSPORT_OPTIONS: Required<TransportOptions> = {
    autoReconnect: true,
    reconnectDelayMs: 2000,
    maxReconnectAttempts: 9,
};

/**
 * Transport state
 */
export type TransportState =
    | 'disconnected'
    | 'connecting'
    | 'connected'
    | 'reconnecting'
    | 'error';

/**
 * Transport event types
 */
export type TransportEventType =
    | 'connected'
    | 'disconnected'
    | 'reconnecting'
    | 'reconnected'
    | 'fatal'
    | 'data'
    | 'error';

/**
 * Transport event
 */
export interface TransportEvent {
    type: TransportEventType;
    /** Received bytes (`data` events) */
    data?: Buffer;
    /** Reconnect attempt number (`reconnecting` events) */
    attempt?: number;
    error?: Error;
}

/**
 * Transport event handler
 */
export type TransportEventHandler = (event: TransportEvent) => void;

/**
 * Abstract transport interface
 */
export interface Transport {
    /**
     * Open the link
     * @returns Promise that resolves when connected
     */
    connect(): Promise<void>;

    /**
     * Close the link. No reconnect follows.
     */
    disconnect(): Promise<void>;

    /**
     * Write bytes to the link
     */
    send(data: Uint8Array): void;

    onEvent(handler: TransportEventHandler): void;

    offEvent(handler: TransportEventHandler): void;

    isConnected(): boolean;

    getState(): TransportState;
}

// ==================== Base Transport Class ====================

/**
 * Base transport class with common functionality
 */
export abstract class BaseTransport implements Transport {
    protected state: TransportState = 'disconnected';
    protected eventHandlers: TransportEventHandler[] = [];
    protected options: Required<TransportOptions>;
    protected logger: Logger;

    constructor(options: TransportOptions = {}, logger: Logger = new SilentLogger()) {
        this.options = {
            ...DEFAULT_TRANSPORT_OPTIONS,
            ...options,
        };
        this.logger = logger;
    }

    abstract connect(): Promise<void>;
    abstract disconnect(): Promise<void>;
    abstract send(data: Uint8Array): void;

    onEvent(handler: TransportEventHandler): void {
        this.eventHandlers.push(handler);
    }

    offEvent(handler: TransportEventHandler): void {
        const index = this.eventHandlers.indexOf(handler);
        if (index >= 0) {
            this.eventHandlers.splice(index, 1);
        }
    }

    isConnected(): boolean {
        return this.state === 'connected';
    }

    getState(): TransportState {
        return this.state;
    }

    protected emit(event: TransportEvent): void {
        for (const handler of [...this.eventHandlers]) {
            try {
                handler(event);
            } catch (e) {
                this.logger.error('transport', 'Event handler error', e);
            }
        }
    }

    protected setState(state: TransportState): void {
        this.state = state;
    }
}
