/**
 * @module protocol/channel
 * @description Request/response pairing for device commands
 *
 * The device answers one command at a time and responses carry no request id,
 * so commands are queued and a response is matched on its command id with the
 * response variant.
 */

import { ConnectionError, TimeoutError, wrapError, ErrorCodes } from '../core/errors';
import { Variant } from './commands';

// ==================== Types ====================

/**
 * Command waiting for its response
 */
interface PendingCommand {
    command: number;
    resolve: (packet: Buffer) => void;
    reject: (error: Error) => void;
    timer: ReturnType<typeof setTimeout>;
}

/**
 * Writes a payload to the link (framing included)
 */
export type PayloadSender = (payload: Buffer) => void;

export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

// ==================== Command Channel ====================

/**
 * Serializes commands and pairs them with their responses.
 *
 * @example
 * ```typescript
 * const channel = new CommandChannel((payload) => transport.send(encodePacket(payload)));
 *
 * // for every decoded packet
 * channel.handlePacket(packet);
 *
 * const response = await channel.request(buildRequest(CommandId.MODE));
 * ```
 */
export class CommandChannel {
    private pending: PendingCommand | null = null;
    private tail: Promise<void> = Promise.resolve();

    constructor(
        private readonly send: PayloadSender,
        private readonly defaultTimeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
    ) { }

    /**
     * Send a command and wait for its response
     *
     * @param payload - Command payload (`command, variant, fields...`)
     * @param expect - Command id of the response, defaults to the payload's
     * @param timeoutMs - Time allowed once the command has been written
     * @returns The response payload
     */
    request(
        payload: Buffer,
        expect: number = payload[0],
        timeoutMs: number = this.defaultTimeoutMs
    ): Promise<Buffer> {
        const run = (): Promise<Buffer> => this.dispatch(payload, expect, timeoutMs);
        const result = this.tail.then(run, run);
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }

    /**
     * Send a command that gets no response, in order with queued requests
     */
    post(payload: Buffer): Promise<void> {
        const run = (): void => {
            try {
                this.send(payload);
            } catch (e) {
                throw wrapError(e, ErrorCodes.CONNECTION_ERROR);
            }
        };
        const result = this.tail.then(run, run);
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }

    private dispatch(payload: Buffer, expect: number, timeoutMs: number): Promise<Buffer> {
        return new Promise<Buffer>((resolve, reject) => {
            const timer = setTimeout(() => {
                if (this.pending?.timer === timer) this.pending = null;
                reject(new TimeoutError('Timeout while reading from the sensor', {
                    command: expect,
                    timeoutMs,
                }));
            }, timeoutMs);

            this.pending = {
                command: expect,
                resolve,
                reject,
                timer,
            };

            try {
                this.send(payload);
            } catch (e) {
                clearTimeout(timer);
                this.pending = null;
                reject(wrapError(e, ErrorCodes.CONNECTION_ERROR));
            }
        });
    }

    // ==================== Incoming Packets ====================

    /**
     * Offer a decoded packet to the command in flight
     *
     * @returns True if the packet was the awaited response
     */
    handlePacket(packet: Buffer): boolean {
        const pending = this.pending;
        if (!pending || packet.length < 2) return false;
        if (packet[0] !== pending.command || packet[1] !== Variant.RESPONSE) return false;

        clearTimeout(pending.timer);
        this.pending = null;
        pending.resolve(packet);
        return true;
    }

    /**
     * Reject the command in flight
     *
     * Queued commands are not touched; they run afterwards and fail on send
     * if the link is still down.
     */
    rejectPending(error: Error = new ConnectionError('The serial connection has been lost')): void {
        const pending = this.pending;
        if (!pending) return;
        clearTimeout(pending.timer);
        this.pending = null;
        pending.reject(error);
    }

    /**
     * Check if a command is waiting for its response
     */
    hasPending(): boolean {
        return this.pending !== null;
    }
}
