/**
 * @module sensor/sensor
 * @description High-level client for the radar sensor
 *
 * Owns the transport, pairs commands with responses, assembles capture
 * frames into a bounded queue and turns device log messages into log entries.
 */

import {
    CommandError,
    ConnectionError,
    ProtocolError,
    ValidationError,
    wrapError,
    isRadarError,
} from '../core/errors';
import { ConsoleLogger, type Logger } from '../core/logging';
import { CommandChannel } from '../protocol/channel';
import {
    CommandId,
    Variant,
    buildApplicationVersionRequest,
    buildCaptureStart,
    buildCaptureStop,
    buildRequest,
    buildSet,
    buildSetI16Pair,
    buildSetI8Pair,
    buildSetU16Pair,
    buildSetU8,
    isDeviceMessage,
    parseAck,
    parseApplicationVersion,
    parseCoreStatistics,
    parseDeviceMessage,
    parseI16Pair,
    parseI8Pair,
    parseObjectSubframe,
    parsePointCloudStatistics,
    parsePointCloudSubframe,
    parseSerialNumber,
    parseU16Pair,
    parseU8,
    parseVersion,
    type ApplicationVersion,
} from '../protocol/commands';
import { encodePacket, PacketReader } from '../protocol/framing';
import { findPort } from '../transport/ports';
import { SerialPortTransport } from '../transport/serial';
import type { Transport, TransportEvent } from '../transport/transport';
import {
    convertDistanceFromSi,
    convertDistanceToSi,
    isAccelerationUnit,
    isDistanceUnit,
    isSpeedUnit,
} from '../units/converter';
import { resolveSensorOptions, type SensorConfig, type SensorOptions } from './config';
import {
    ANGLE_FILTER_MAX,
    ANGLE_FILTER_MIN,
    CaptureMode,
    ConnectionStatus,
    DISTANCE_FILTER_MAX_MM,
    DISTANCE_FILTER_MIN_MM,
    FRAME_RATE_MAX,
    FRAME_RATE_MIN,
    HEIGHT_FILTER_MAX_MM,
    HEIGHT_FILTER_MIN_MM,
    MovingFilter,
    ObjectType,
    PointDensity,
    ResetCode,
    SAMPLES_MAX,
    SENSITIVITY_MAX,
    SENSITIVITY_MIN,
    isCodeOf,
    type ConnectionStatusValue,
} from './constants';
import { FrameAssembler } from './decoder';
import { FrameQueue } from './queue';
import type {
    Frame,
    RadarApplicationVersions,
    Range,
    SensorEvent,
    SensorEventHandler,
    SensorStatistics,
    Units,
    VersionInfo,
} from './types';

const EMPTY_APPLICATION: ApplicationVersion = { name: '', major: 0, minor: 0, build: 0 };

const APPLICATION_SLOTS = ['controller', 'application1', 'application2', 'application3'] as const;

export interface GetDataOptions {
    /** Time to wait for each frame before yielding null */
    pollMs?: number;
}

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Radar sensor client
 *
 * @example
 * ```typescript
 * const sensor = new RadarSensor();
 * await sensor.connect();
 * await sensor.setMode(MODE_POINT_CLOUD);
 * await sensor.setUnits('m', 'm/s');
 * await sensor.start(10);
 *
 * for await (const frame of sensor.getData()) {
 *   if (frame) console.log(frame);
 * }
 * await sensor.close();
 * ```
 */
export class RadarSensor {
    private readonly config: SensorConfig;
    private readonly logger: Logger;
    private readonly portPath?: string;
    private transport: Transport | null;
    private attached = false;

    private readonly reader = new PacketReader();
    private readonly channel: CommandChannel;
    private readonly queue: FrameQueue<Frame>;
    private readonly assembler: FrameAssembler;
    private readonly handlers: SensorEventHandler[] = [];

    private units: Units = { distance: 'm', speed: 'm/s', acceleration: 'm/s^2' };
    private mirror = false;
    private capturing = false;
    private captureMax = 0;
    /** Bumped on every start; a stop only ends the capture it was issued for */
    private captureId = 0;
    private statistics: SensorStatistics = {
        core: null,
        pointCloud: null,
        rxBufferLength: null,
        rxPacketQueue: null,
    };

    private readonly transportHandler = (event: TransportEvent): void => {
        this.handleTransportEvent(event);
    };

    constructor(options: SensorOptions = {}) {
        const { port, transport, logger, ...config } = options;
        this.config = resolveSensorOptions(config);
        this.logger = logger ?? new ConsoleLogger();
        this.portPath = port;
        this.transport = transport ?? null;

        this.channel = new CommandChannel(
            (payload) => this.requireTransport().send(encodePacket(payload)),
            this.config.commandTimeoutMs
        );
        this.queue = new FrameQueue<Frame>(this.config.queueLength);
        this.assembler = new FrameAssembler(() => ({
            units: this.units,
            mirror: this.mirror,
            outputFormat: this.config.outputFormat,
        }));
    }

    // ==================== Lifecycle ====================

    /**
     * Open the link, stop any running capture and clear buffered data
     *
     * Without a port or transport, the first available sensor is used.
     */
    async connect(): Promise<void> {
        if (!this.transport) {
            const path = this.portPath ?? (await findPort()).path;
            this.transport = new SerialPortTransport(
                {
                    path,
                    baudRate: this.config.baudRate,
                    autoReconnect: this.config.autoReconnect,
                    reconnectDelayMs: this.config.reconnectDelayMs,
                    maxReconnectAttempts: this.config.maxReconnectAttempts,
                },
                this.logger
            );
        }

        if (!this.attached) {
            this.transport.onEvent(this.transportHandler);
            this.attached = true;
        }

        await this.transport.connect();

        await this.stop();
        await delay(this.config.settleMs);
        this.reader.clear();
        this.queue.clear();
    }

    /**
     * Stop capturing and close the link
     */
    async close(): Promise<void> {
        const transport = this.transport;
        if (!transport) return;

        if (transport.isConnected()) {
            try {
                await this.stop();
                await delay(this.config.settleMs);
            } catch (e) {
                this.logger.warn('sensor', 'Failed to stop the sensor before closing', wrapError(e).toJSON());
            }
        }

        this.endCapture();
        this.channel.rejectPending(new ConnectionError('The sensor connection was closed'));
        await transport.disconnect();

        transport.offEvent(this.transportHandler);
        this.attached = false;
    }

    isConnected(): boolean {
        return this.transport?.isConnected() ?? false;
    }

    isCapturing(): boolean {
        return this.capturing;
    }

    // ==================== Events ====================

    onEvent(handler: SensorEventHandler): void {
        this.handlers.push(handler);
    }

    offEvent(handler: SensorEventHandler): void {
        const index = this.handlers.indexOf(handler);
        if (index >= 0) {
            this.handlers.splice(index, 1);
        }
    }

    private emit(event: SensorEvent): void {
        for (const handler of [...this.handlers]) {
            try {
                handler(event);
            } catch (e) {
                this.logger.error('sensor', 'Event handler error', wrapError(e).toJSON());
            }
        }
    }

    // ==================== Local Settings ====================

    /**
     * Set the units used by settings and frames
     *
     * Units left undefined are kept. Nothing changes if any name is invalid.
     */
    setUnits(distance?: string, speed?: string, acceleration?: string): void {
        if (distance !== undefined && !isDistanceUnit(distance)) {
            throw new ValidationError('Invalid units for distance conversion', { units: distance });
        }
        if (speed !== undefined && !isSpeedUnit(speed)) {
            throw new ValidationError('Invalid units for speed conversion', { units: speed });
        }
        if (acceleration !== undefined && !isAccelerationUnit(acceleration)) {
            throw new ValidationError('Invalid units for acceleration conversion', { units: acceleration });
        }

        this.units = {
            distance: distance ?? this.units.distance,
            speed: speed ?? this.units.speed,
            acceleration: acceleration ?? this.units.acceleration,
        };
    }

    getUnits(): Units {
        return { ...this.units };
    }

    /**
     * Mirror frames in the X dimension
     */
    setMirror(mirror: boolean): void {
        this.mirror = mirror;
    }

    getMirror(): boolean {
        return this.mirror;
    }

    // ==================== Device Information ====================

    async getVersion(): Promise<VersionInfo> {
        return this.command('Failed to get version', async () => {
            const { firmware, hardware } = parseVersion(await this.request(buildRequest(CommandId.VERSION)));
            return {
                firmware: [firmware.major, firmware.minor, firmware.build],
                hardware: [hardware.major, hardware.minor, hardware.build],
            };
        });
    }

    async getSerialNumber(): Promise<string> {
        return this.command('Failed to get serial number', async () =>
            parseSerialNumber(await this.request(buildRequest(CommandId.SERIAL_NUMBER)))
        );
    }

    /**
     * Versions of the controller and the three radar application slots
     */
    async getRadarApplicationVersions(): Promise<RadarApplicationVersions> {
        return this.command('Failed to get radar versions', async () => {
            const versions: RadarApplicationVersions = {
                controller: { ...EMPTY_APPLICATION },
                application1: { ...EMPTY_APPLICATION },
                application2: { ...EMPTY_APPLICATION },
                application3: { ...EMPTY_APPLICATION },
            };

            for (const [i, key] of APPLICATION_SLOTS.entries()) {
                const slot = i + 1;
                const response = parseApplicationVersion(
                    await this.request(buildApplicationVersionRequest(slot))
                );
                if (response.slot === slot) {
                    const { name, major, minor, build } = response;
                    versions[key] = { name, major, minor, build };
                }
            }

            return versions;
        });
    }

    /**
     * Reboot or restore factory settings
     */
    async reset(code: number): Promise<boolean> {
        if (!isCodeOf(ResetCode, code)) {
            throw new ValidationError('Invalid reset code', { code });
        }
        return this.command('Failed to reset sensor', async () => {
            parseAck(await this.request(buildSetU8(CommandId.RESET, code)), CommandId.RESET);
            return true;
        });
    }

    // ==================== Frame Rate ====================

    async getFrameRate(): Promise<number> {
        return this.getU8(CommandId.FRAME_RATE, 'Failed to get frame rate');
    }

    async setFrameRate(frameRate: number): Promise<boolean> {
        if (!Number.isInteger(frameRate)) {
            throw new ValidationError('Frame rate must be an integer', { frameRate });
        }
        if (frameRate < FRAME_RATE_MIN || frameRate > FRAME_RATE_MAX) {
            throw new ValidationError(
                `Frame rate must be between ${FRAME_RATE_MIN} and ${FRAME_RATE_MAX} fps`,
                { frameRate }
            );
        }
        return this.setU8(CommandId.FRAME_RATE, frameRate, 'Frame rate', 'Failed to set frame rate');
    }

    // ==================== Mode ====================

    async getMode(): Promise<number> {
        return this.getU8(CommandId.MODE, 'Failed to get mode');
    }

    async setMode(mode: number): Promise<boolean> {
        if (!isCodeOf(CaptureMode, mode)) {
            throw new ValidationError('Invalid mode', { mode });
        }
        return this.setU8(CommandId.MODE, mode, 'Mode', 'Failed to set mode');
    }

    // ==================== Distance Filter ====================

    /**
     * Distance filter in the configured distance units
     */
    async getDistanceFilter(): Promise<Range> {
        return this.command('Failed to get distance filter', async () => {
            const [minimum, maximum] = parseU16Pair(
                await this.request(buildRequest(CommandId.DISTANCE_FILTER)),
                CommandId.DISTANCE_FILTER
            );
            return this.rangeFromMillimetres(minimum, maximum);
        });
    }

    async setDistanceFilter(minimum: number, maximum: number): Promise<boolean> {
        const minMm = this.toMillimetres(minimum);
        const maxMm = this.toMillimetres(maximum);
        const bounds = `between ${DISTANCE_FILTER_MIN_MM} and ${DISTANCE_FILTER_MAX_MM}mm`;

        if (minMm < DISTANCE_FILTER_MIN_MM || minMm > DISTANCE_FILTER_MAX_MM) {
            throw new ValidationError(`Distance filter minimum must be a number ${bounds}`, { minimum });
        }
        if (maxMm < DISTANCE_FILTER_MIN_MM || maxMm > DISTANCE_FILTER_MAX_MM) {
            throw new ValidationError(`Distance filter maximum must be a number ${bounds}`, { maximum });
        }
        if (maxMm < minMm) {
            throw new ValidationError('Distance filter maximum must be greater than the minimum', {
                minimum,
                maximum,
            });
        }

        return this.command('Failed to set distance filter', async () => {
            const echoed = parseU16Pair(
                await this.request(buildSetU16Pair(CommandId.DISTANCE_FILTER, minMm, maxMm)),
                CommandId.DISTANCE_FILTER
            );
            this.checkEcho('Distance filter', [minMm, maxMm], echoed);
            return true;
        });
    }

    // ==================== Angle Filter ====================

    /**
     * Angle filter in degrees; negative is left of the sensor
     */
    async getAngleFilter(): Promise<Range> {
        return this.command('Failed to get angle filter', async () => {
            const [minimum, maximum] = parseI8Pair(
                await this.request(buildRequest(CommandId.ANGLE_FILTER)),
                CommandId.ANGLE_FILTER
            );
            return { minimum, maximum };
        });
    }

    async setAngleFilter(minimum: number, maximum: number): Promise<boolean> {
        const inRange = (value: number): boolean =>
            Number.isInteger(value) && value >= ANGLE_FILTER_MIN && value <= ANGLE_FILTER_MAX;

        if (!inRange(minimum)) {
            throw new ValidationError('Angle filter minimum must be an integer between -55 and +55', { minimum });
        }
        if (!inRange(maximum)) {
            throw new ValidationError('Angle filter maximum must be an integer between -55 and +55', { maximum });
        }
        if (maximum < minimum) {
            throw new ValidationError('Angle filter maximum must be greater than the minimum', {
                minimum,
                maximum,
            });
        }

        return this.command('Failed to set angle filter', async () => {
            const echoed = parseI8Pair(
                await this.request(buildSetI8Pair(CommandId.ANGLE_FILTER, minimum, maximum)),
                CommandId.ANGLE_FILTER
            );
            this.checkEcho('Angle filter', [minimum, maximum], echoed);
            return true;
        });
    }

    // ==================== Moving Filter ====================

    async getMovingFilter(): Promise<number> {
        return this.getU8(CommandId.MOVING_FILTER, 'Failed to get moving filter');
    }

    async setMovingFilter(moving: number): Promise<boolean> {
        if (!isCodeOf(MovingFilter, moving)) {
            throw new ValidationError('Moving filter value is invalid', { moving });
        }
        return this.setU8(CommandId.MOVING_FILTER, moving, 'Moving filter', 'Failed to set moving filter');
    }

    // ==================== Save ====================

    /**
     * Persist the current settings on the sensor
     */
    async save(): Promise<boolean> {
        return this.command('Failed to save settings', async () => {
            parseAck(await this.request(buildSet(CommandId.SAVE)), CommandId.SAVE);
            return true;
        });
    }

    // ==================== Point Density ====================

    async getPointDensity(): Promise<number> {
        return this.getU8(CommandId.POINT_DENSITY, 'Failed to get point density setting');
    }

    async setPointDensity(density: number): Promise<boolean> {
        if (!isCodeOf(PointDensity, density)) {
            throw new ValidationError('Invalid point density setting', { density });
        }
        return this.setU8(CommandId.POINT_DENSITY, density, 'Point density', 'Failed to set the point density');
    }

    // ==================== Sensitivity ====================

    async getSensitivity(): Promise<number> {
        return this.getU8(CommandId.SENSITIVITY, 'Failed to get sensitivity setting');
    }

    async setSensitivity(sensitivity: number): Promise<boolean> {
        if (!Number.isInteger(sensitivity) || sensitivity < SENSITIVITY_MIN || sensitivity > SENSITIVITY_MAX) {
            throw new ValidationError(
                `Sensitivity must be an integer between ${SENSITIVITY_MIN} and ${SENSITIVITY_MAX}`,
                { sensitivity }
            );
        }
        return this.setU8(
            CommandId.SENSITIVITY,
            sensitivity,
            'Sensitivity setting',
            'Failed to set the sensitivity setting'
        );
    }

    // ==================== Height Filter ====================

    /**
     * Height filter in the configured distance units
     */
    async getHeightFilter(): Promise<Range> {
        return this.command('Failed to get height filter', async () => {
            const [minimum, maximum] = parseI16Pair(
                await this.request(buildRequest(CommandId.HEIGHT_FILTER)),
                CommandId.HEIGHT_FILTER
            );
            return this.rangeFromMillimetres(minimum, maximum);
        });
    }

    async setHeightFilter(minimum: number, maximum: number): Promise<boolean> {
        const minMm = this.toMillimetres(minimum);
        const maxMm = this.toMillimetres(maximum);
        const bounds = `between ${HEIGHT_FILTER_MIN_MM} and ${HEIGHT_FILTER_MAX_MM}mm`;

        if (minMm < HEIGHT_FILTER_MIN_MM || minMm > HEIGHT_FILTER_MAX_MM) {
            throw new ValidationError(`Height filter minimum must be a number ${bounds}`, { minimum });
        }
        if (maxMm < HEIGHT_FILTER_MIN_MM || maxMm > HEIGHT_FILTER_MAX_MM) {
            throw new ValidationError(`Height filter maximum must be a number ${bounds}`, { maximum });
        }
        if (maxMm < minMm) {
            throw new ValidationError('Height filter maximum must be greater than the minimum', {
                minimum,
                maximum,
            });
        }

        return this.command('Failed to set height filter', async () => {
            const echoed = parseI16Pair(
                await this.request(buildSetI16Pair(CommandId.HEIGHT_FILTER, minMm, maxMm)),
                CommandId.HEIGHT_FILTER
            );
            this.checkEcho('Height filter', [minMm, maxMm], echoed);
            return true;
        });
    }

    // ==================== Object Type Mode ====================

    async getObjectTypeMode(): Promise<number> {
        return this.getU8(CommandId.OBJECT_TYPE_MODE, 'Failed to get object type mode');
    }

    async setObjectTypeMode(mode: number): Promise<boolean> {
        if (!isCodeOf(ObjectType, mode)) {
            throw new ValidationError('Invalid object type mode', { mode });
        }
        return this.setU8(
            CommandId.OBJECT_TYPE_MODE,
            mode,
            'Object type mode',
            'Failed to set object type mode'
        );
    }

    // ==================== Scene Calibration ====================

    /**
     * Calibrate out near-field objects. Keep the first metre in front of the
     * sensor clear while this runs.
     */
    async sceneCalibration(): Promise<boolean> {
        return this.command('Failed to perform scene calibration', async () => {
            await this.request(buildSet(CommandId.SCENE_CALIBRATION));
            return true;
        });
    }

    // ==================== Auto Start ====================

    async getAutoStart(): Promise<boolean> {
        return this.command('Failed to get auto start', async () =>
            parseU8(await this.request(buildRequest(CommandId.AUTO_START)), CommandId.AUTO_START) !== 0
        );
    }

    async setAutoStart(autoStart: boolean): Promise<boolean> {
        if (typeof autoStart !== 'boolean') {
            throw new ValidationError('Auto start must be a boolean', { autoStart });
        }
        return this.setU8(CommandId.AUTO_START, autoStart ? 1 : 0, 'Auto start', 'Failed to set auto start');
    }

    // ==================== Capture ====================

    /**
     * Start capturing frames
     *
     * @param samples - Frames to capture before stopping, 0 for continuous
     * @param clearBuffer - Drop queued frames and buffered bytes first
     */
    async start(samples = 0, clearBuffer = true): Promise<void> {
        if (!Number.isInteger(samples) || samples < 0 || samples > SAMPLES_MAX) {
            throw new ValidationError(`Samples must be an integer between 0 and ${SAMPLES_MAX}`, { samples });
        }

        if (clearBuffer) {
            this.reader.clear();
            this.queue.clear();
        }
        this.assembler.reset();
        this.captureMax = samples;
        this.captureId++;
        this.capturing = true;

        try {
            await this.channel.post(buildCaptureStart(samples));
        } catch (e) {
            this.endCapture();
            throw new CommandError('Failed to start data capture', wrapError(e));
        }
    }

    /**
     * Stop capturing frames
     */
    async stop(): Promise<void> {
        const capture = this.captureId;
        try {
            await this.channel.post(buildCaptureStop());
        } catch (e) {
            throw new CommandError('Failed to stop data capture', wrapError(e));
        }
        if (capture === this.captureId) this.endCapture();
    }

    /**
     * Frames as they arrive
     *
     * Yields null whenever no frame arrives within `pollMs`. Once the capture
     * ends, the frames still queued are yielded and the generator returns.
     */
    async *getData(options: GetDataOptions = {}): AsyncGenerator<Frame | null, void, undefined> {
        const pollMs = options.pollMs ?? this.config.pollMs;

        while (this.capturing) {
            const frame = await this.queue.take(pollMs);
            if (frame === null && !this.capturing) break;
            yield frame;
        }

        for (let frame = this.queue.poll(); frame !== null; frame = this.queue.poll()) {
            yield frame;
        }
    }

    /**
     * Next queued frame, or null; never waits
     */
    getFrame(): Frame | null {
        return this.queue.poll();
    }

    getQueueSize(): number {
        return this.queue.size;
    }

    /**
     * Copy of the latest statistics
     */
    getStatistics(): SensorStatistics {
        return { ...this.statistics };
    }

    private endCapture(): void {
        this.capturing = false;
        this.queue.interrupt();
    }

    private completeCapture(): void {
        const frames = this.assembler.frameCount;
        this.endCapture();
        // queued ahead of any start() issued by a capture_complete handler
        this.stop().catch((e: unknown) => {
            this.logger.warn('sensor', 'Failed to stop capture after the last sample', wrapError(e).toJSON());
        });
        this.emit({ type: 'capture_complete', frames });
    }

    // ==================== Command Helpers ====================

    private requireTransport(): Transport {
        if (!this.transport) {
            throw new ConnectionError('Not connected');
        }
        return this.transport;
    }

    private request(payload: Buffer): Promise<Buffer> {
        return this.channel.request(payload);
    }

    private async command<T>(failure: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (e) {
            throw new CommandError(failure, wrapError(e));
        }
    }

    private async getU8(command: number, failure: string): Promise<number> {
        return this.command(failure, async () => parseU8(await this.request(buildRequest(command)), command));
    }

    private async setU8(command: number, value: number, label: string, failure: string): Promise<boolean> {
        return this.command(failure, async () => {
            const echoed = parseU8(await this.request(buildSetU8(command, value)), command);
            this.checkEcho(label, [value], [echoed]);
            return true;
        });
    }

    private checkEcho(label: string, expected: number[], received: number[]): void {
        if (expected.some((value, i) => value !== received[i])) {
            throw new ProtocolError(`${label} did not set correctly`, { expected, received });
        }
    }

    private toMillimetres(value: number): number {
        return Math.round(convertDistanceToSi(this.units.distance, value) * 1000);
    }

    private rangeFromMillimetres(minimum: number, maximum: number): Range {
        return {
            minimum: convertDistanceFromSi(this.units.distance, minimum / 1000),
            maximum: convertDistanceFromSi(this.units.distance, maximum / 1000),
        };
    }

    // ==================== Incoming Data ====================

    private handleTransportEvent(event: TransportEvent): void {
        switch (event.type) {
            case 'connected':
                this.emitConnection(ConnectionStatus.CONNECTED);
                break;
            case 'disconnected':
                this.endCapture();
                this.channel.rejectPending(new ConnectionError('The serial connection has been disconnected'));
                this.emitConnection(ConnectionStatus.DISCONNECTED);
                break;
            case 'reconnected':
                this.emitConnection(ConnectionStatus.RECONNECTED);
                break;
            case 'fatal':
                this.endCapture();
                this.channel.rejectPending(event.error ?? new ConnectionError('The serial connection has been lost'));
                this.emitConnection(ConnectionStatus.FATAL);
                break;
            case 'data':
                if (event.data) this.handleData(event.data);
                break;
            case 'error':
                this.logger.warn('sensor', event.error?.message ?? 'Transport error');
                break;
            case 'reconnecting':
                break;
        }
    }

    private emitConnection(status: ConnectionStatusValue): void {
        this.emit({ type: 'connection', status });
    }

    private handleData(chunk: Buffer): void {
        const { packets, errors } = this.reader.push(chunk);
        for (const error of errors) {
            this.logger.warn('sensor', `Dropped packet: ${error.message}`);
        }
        for (const packet of packets) {
            try {
                this.handlePacket(packet);
            } catch (e) {
                if (!isRadarError(e)) throw e;
                this.logger.warn('sensor', `Dropped packet: ${e.message}`, e.details);
            }
        }
    }

    private handlePacket(packet: Buffer): void {
        if (isDeviceMessage(packet)) {
            this.handleDeviceMessage(packet);
            return;
        }
        if (this.channel.handlePacket(packet)) return;
        if (packet.length < 2 || packet[1] !== Variant.RESPONSE) return;

        switch (packet[0]) {
            case CommandId.CORE_STATISTICS:
                this.statistics.core = parseCoreStatistics(packet);
                this.updateStatistics();
                break;
            case CommandId.POINT_CLOUD_STATISTICS:
                this.statistics.pointCloud = parsePointCloudStatistics(packet);
                this.updateStatistics();
                break;
            case CommandId.POINT_CLOUD:
                if (this.capturing) {
                    this.deliver(this.assembler.pushPointCloud(parsePointCloudSubframe(packet)));
                }
                break;
            case CommandId.OBJECT_TRACKING:
                if (this.capturing) {
                    this.deliver(this.assembler.pushObjects(parseObjectSubframe(packet)));
                }
                break;
            default:
                this.logger.debug('sensor', `Unhandled packet 0x${packet[0].toString(16).padStart(2, '0')}`);
        }
    }

    private handleDeviceMessage(packet: Buffer): void {
        const message = parseDeviceMessage(packet);
        this.logger[message.level]('device', `${message.code} ${message.text}`);
        this.emit({ type: 'message', message });
    }

    private updateStatistics(): void {
        this.statistics.rxBufferLength = this.reader.bufferedLength;
        this.statistics.rxPacketQueue = this.queue.size;
        this.emit({ type: 'statistics', statistics: this.getStatistics() });
    }

    private deliver(frame: Frame | null): void {
        if (!frame) return;

        if (!this.queue.offer(frame)) {
            this.logger.debug('sensor', `Frame queue full, dropped frame ${frame.index}`);
        }
        this.emit({ type: 'frame', frame });

        if (this.captureMax > 0 && this.assembler.frameCount >= this.captureMax) {
            this.completeCapture();
        }
    }
}
