/**
 * @module transport/memory
 * @description In-memory transport and a fake sensor for tests and demos
 *
 * No serial port is involved: bytes written on one side of a pair arrive on
 * the other in a microtask.
 */

import { ConnectionError } from '../core/errors';
import {
    CommandId,
    Variant,
    SUBFRAME_LAST,
    PayloadWriter,
    type ApplicationVersion,
    type CoreStatistics,
    type PointCloudStatistics,
    type RawObject,
    type RawPoint,
    type VersionTriple,
} from '../protocol/commands';
import { encodePacket, PacketReader } from '../protocol/framing';
import {
    BaseTransport,
    type Transport,
    type TransportEvent,
    type TransportOptions,
} from './transport';

/**
 * In-memory transport for testing
 *
 * @example
 * ```typescript
 * const [hostTransport, deviceTransport] = InMemoryTransport.createPair();
 * const device = new FakeRadarDevice(deviceTransport);
 * await device.start();
 *
 * const sensor = new RadarSensor({ transport: hostTransport });
 * await sensor.connect();
 * ```
 */
export class InMemoryTransport extends BaseTransport {
    private peer: InMemoryTransport | null = null;
    private pendingData: Buffer[] = [];

    constructor(options?: TransportOptions) {
        super(options);
    }

    /**
     * Create a connected pair of transports
     *
     * @returns Tuple of [host, device] transports
     */
    static createPair(): [InMemoryTransport, InMemoryTransport] {
        const host = new InMemoryTransport();
        const device = new InMemoryTransport();
        host.peer = device;
        device.peer = host;
        return [host, device];
    }

    async connect(): Promise<void> {
        if (this.state === 'connected') return;

        this.setState('connected');
        this.emit({ type: 'connected' });

        // Deliver bytes that arrived before connect
        const pending = this.pendingData;
        this.pendingData = [];
        for (const data of pending) {
            this.emit({ type: 'data', data });
        }
    }

    async disconnect(): Promise<void> {
        if (this.state === 'disconnected') return;
        this.setState('disconnected');
        this.emit({ type: 'disconnected' });
    }

    send(data: Uint8Array): void {
        if (this.state !== 'connected') {
            throw new ConnectionError('Not connected');
        }
        if (!this.peer) {
            throw new ConnectionError('No peer connected');
        }
        this.peer.receive(Buffer.from(data));
    }

    private receive(data: Buffer): void {
        if (this.state !== 'connected') {
            this.pendingData.push(data);
            return;
        }
        queueMicrotask(() => {
            this.emit({ type: 'data', data });
        });
    }

    /**
     * Deliver bytes as if the peer had sent them
     */
    simulateReceive(data: Uint8Array): void {
        this.receive(Buffer.from(data));
    }

    /**
     * Simulate a link error
     */
    simulateError(error: Error): void {
        this.emit({ type: 'error', error });
    }

    /**
     * Simulate the link dropping (no reconnect)
     */
    simulateDisconnect(): void {
        this.setState('disconnected');
        this.emit({ type: 'disconnected' });
    }

    /**
     * Simulate the transport giving up after failed reconnects
     */
    simulateFatal(): void {
        this.setState('error');
        this.emit({ type: 'fatal', error: new ConnectionError('The serial connection has been lost') });
    }

    /**
     * Simulate a successful reconnect
     */
    simulateReconnect(): void {
        this.setState('connected');
        this.emit({ type: 'reconnected' });
    }
}

// ==================== Fake Radar Device ====================

/**
 * Settings held by the fake device, in device units (mm, degrees)
 */
export interface FakeDeviceSettings {
    frameRate: number;
    mode: number;
    distanceFilter: [number, number];
    angleFilter: [number, number];
    movingFilter: number;
    pointDensity: number;
    sensitivity: number;
    heightFilter: [number, number];
    objectTypeMode: number;
    autoStart: number;
    firmware: VersionTriple;
    hardware: VersionTriple;
    serialNumber: [number, number];
    /** Slots 1..4 */
    applications: ApplicationVersion[];
}

export const DEFAULT_FAKE_DEVICE_SETTINGS: FakeDeviceSettings = {
    frameRate: 5,
    mode: 0,
    distanceFilter: [0, 10000],
    angleFilter: [-55, 55],
    movingFilter: 0,
    pointDensity: 0,
    sensitivity: 5,
    heightFilter: [-2000, 2000],
    objectTypeMode: 0,
    autoStart: 0,
    firmware: { major: 1, minor: 2, build: 3 },
    hardware: { major: 4, minor: 5, build: 6 },
    serialNumber: [1234, 5678],
    applications: [
        { name: 'controller', major: 1, minor: 0, build: 10 },
        { name: 'point-cloud', major: 1, minor: 1, build: 20 },
        { name: 'object-tracking', major: 1, minor: 2, build: 30 },
        { name: '', major: 0, minor: 0, build: 0 },
    ],
};

/**
 * Fake sensor for testing
 *
 * Decodes the commands it receives, answers them from its settings and lets
 * the test push capture frames, statistics and device messages.
 *
 * @example
 * ```typescript
 * const [hostTransport, deviceTransport] = InMemoryTransport.createPair();
 * const device = new FakeRadarDevice(deviceTransport, { frameRate: 10 });
 * await device.start();
 *
 * device.sendPointCloudFrame([{ x: 100, y: 2000, z: 0, intensity: 30, velocity: 0 }]);
 * ```
 */
export class FakeRadarDevice {
    readonly settings: FakeDeviceSettings;
    /** Every command payload received, in order */
    readonly received: Buffer[] = [];
    capturing = false;
    captureSamples = 0;

    private readonly transport: Transport;
    private readonly reader = new PacketReader();
    private noResponse = false;
    private readonly overrides = new Map<number, Buffer>();

    constructor(transport: Transport, settings: Partial<FakeDeviceSettings> = {}) {
        this.transport = transport;
        this.settings = { ...DEFAULT_FAKE_DEVICE_SETTINGS, ...settings };
        this.transport.onEvent((event: TransportEvent) => {
            if (event.type === 'data' && event.data) {
                this.handleData(event.data);
            }
        });
    }

    /**
     * Stop answering commands (for timeout testing)
     */
    setNoResponse(enabled: boolean): this {
        this.noResponse = enabled;
        return this;
    }

    /**
     * Answer every command with id `command` with `payload` instead
     */
    overrideResponse(command: number, payload: Uint8Array): this {
        this.overrides.set(command, Buffer.from(payload));
        return this;
    }

    clearOverrides(): this {
        this.overrides.clear();
        return this;
    }

    async start(): Promise<void> {
        await this.transport.connect();
    }

    async stop(): Promise<void> {
        await this.transport.disconnect();
    }

    /** Command payloads received with the given id */
    receivedCommands(command: number): Buffer[] {
        return this.received.filter((payload) => payload[0] === command);
    }

    // ==================== Outgoing ====================

    /**
     * Frame and send a payload
     */
    sendPayload(payload: Uint8Array): void {
        this.transport.send(encodePacket(payload));
    }

    /**
     * Send raw bytes without framing
     */
    sendRaw(bytes: Uint8Array): void {
        this.transport.send(bytes);
    }

    /**
     * Send a point cloud frame split into subframes of `perSubframe` points
     */
    sendPointCloudFrame(points: RawPoint[], perSubframe = 16): void {
        this.sendSubframes(CommandId.POINT_CLOUD, points, perSubframe, (writer, point) => {
            writer.i16(point.x).i16(point.y).i16(point.z).u8(point.intensity).i16(point.velocity);
        });
    }

    /**
     * Send an object tracking frame split into subframes of `perSubframe` objects
     */
    sendObjectFrame(objects: RawObject[], perSubframe = 8): void {
        this.sendSubframes(CommandId.OBJECT_TRACKING, objects, perSubframe, (writer, obj) => {
            writer
                .i8(obj.trackingId)
                .i16(obj.xPos).i16(obj.yPos).i16(obj.zPos)
                .i16(obj.xVel).i16(obj.yVel).i16(obj.zVel)
                .i16(obj.xAcc).i16(obj.yAcc).i16(obj.zAcc);
        });
    }

    sendCoreStatistics(stats: CoreStatistics): void {
        const writer = new PayloadWriter().u8(CommandId.CORE_STATISTICS).u8(Variant.RESPONSE);
        writer
            .u32(stats.activeFrameCpu)
            .u32(stats.interFrameCpu)
            .u32(stats.interFrameProcTime)
            .u32(stats.transmitOutputTime)
            .u32(stats.interFrameProcMargin)
            .u32(stats.interChirpProcMargin)
            .u32(stats.packetTransmitTime)
            .i16(stats.temperatureSensor0)
            .i16(stats.temperatureSensor1)
            .i16(stats.temperaturePowerManagement)
            .i16(stats.temperatureRx0)
            .i16(stats.temperatureRx1)
            .i16(stats.temperatureRx2)
            .i16(stats.temperatureRx3)
            .i16(stats.temperatureTx0)
            .i16(stats.temperatureTx1)
            .i16(stats.temperatureTx2);
        this.sendPayload(writer.toBuffer());
    }

    sendPointCloudStatistics(stats: PointCloudStatistics): void {
        const writer = new PayloadWriter().u8(CommandId.POINT_CLOUD_STATISTICS).u8(Variant.RESPONSE);
        writer
            .u32(stats.pointsAggregationTime)
            .u32(stats.intensitySortTime)
            .u32(stats.nearestNeighboursTime)
            .u32(stats.uartTransmissionTime)
            .u32(stats.filterPointsRemoved)
            .u32(stats.numTransmittedPoints)
            .u8(stats.inputPointsTruncated ? 1 : 0)
            .u8(stats.outputPointsTruncated ? 1 : 0);
        this.sendPayload(writer.toBuffer());
    }

    /**
     * Send a device log message
     */
    sendMessage(type: number, code: number, text: string): void {
        const payload = new PayloadWriter()
            .u8(CommandId.DEVICE_MESSAGE)
            .u8(Variant.RESPONSE)
            .u8(type)
            .u8(code)
            .raw(Buffer.from(text, 'ascii'))
            .toBuffer();
        this.sendPayload(payload);
    }

    private sendSubframes<T>(
        command: number,
        records: T[],
        perSubframe: number,
        write: (writer: PayloadWriter, record: T) => void
    ): void {
        const size = Math.max(1, perSubframe);
        let offset = 0;
        do {
            const chunk = records.slice(offset, offset + size);
            offset += size;
            const last = offset >= records.length;
            const writer = new PayloadWriter()
                .u8(command)
                .u8(Variant.RESPONSE)
                .u8(last ? SUBFRAME_LAST : 0x01)
                .u8(chunk.length);
            for (const record of chunk) write(writer, record);
            this.sendPayload(writer.toBuffer());
        } while (offset < records.length);
    }

    // ==================== Incoming ====================

    private handleData(data: Buffer): void {
        const { packets } = this.reader.push(data);
        for (const payload of packets) {
            this.received.push(payload);
            this.handleCommand(payload);
        }
    }

    private handleCommand(payload: Buffer): void {
        const command = payload[0];
        const variant = payload[1];

        if (command === CommandId.CAPTURE_START) {
            this.capturing = true;
            this.captureSamples = payload.length > 2 ? payload[2] : 0;
            return;
        }
        if (command === CommandId.CAPTURE_STOP) {
            this.capturing = false;
            return;
        }

        if (variant === Variant.SET) {
            this.applySet(command, payload);
        }

        if (this.noResponse) return;

        const override = this.overrides.get(command);
        if (override) {
            this.sendPayload(override);
            return;
        }

        const response = this.buildResponse(command, payload);
        if (response) {
            this.sendPayload(response);
        }
    }

    private applySet(command: number, payload: Buffer): void {
        const s = this.settings;
        switch (command) {
            case CommandId.FRAME_RATE: s.frameRate = payload.readUInt8(2); break;
            case CommandId.MODE: s.mode = payload.readUInt8(2); break;
            case CommandId.DISTANCE_FILTER:
                s.distanceFilter = [payload.readUInt16LE(2), payload.readUInt16LE(4)];
                break;
            case CommandId.ANGLE_FILTER:
                s.angleFilter = [payload.readInt8(2), payload.readInt8(3)];
                break;
            case CommandId.MOVING_FILTER: s.movingFilter = payload.readUInt8(2); break;
            case CommandId.POINT_DENSITY: s.pointDensity = payload.readUInt8(2); break;
            case CommandId.SENSITIVITY: s.sensitivity = payload.readUInt8(2); break;
            case CommandId.HEIGHT_FILTER:
                s.heightFilter = [payload.readInt16LE(2), payload.readInt16LE(4)];
                break;
            case CommandId.OBJECT_TYPE_MODE: s.objectTypeMode = payload.readUInt8(2); break;
            case CommandId.AUTO_START: s.autoStart = payload.readUInt8(2); break;
        }
    }

    private buildResponse(command: number, payload: Buffer): Buffer | null {
        const s = this.settings;
        const writer = new PayloadWriter().u8(command).u8(Variant.RESPONSE);

        switch (command) {
            case CommandId.VERSION:
                return writer
                    .u8(s.firmware.major).u8(s.firmware.minor).u16(s.firmware.build)
                    .u8(s.hardware.major).u8(s.hardware.minor).u16(s.hardware.build)
                    .toBuffer();
            case CommandId.SERIAL_NUMBER:
                return writer.u32(s.serialNumber[0]).u32(s.serialNumber[1]).toBuffer();
            case CommandId.RESET:
            case CommandId.SAVE:
            case CommandId.SCENE_CALIBRATION:
                return writer.toBuffer();
            case CommandId.FRAME_RATE: return writer.u8(s.frameRate).toBuffer();
            case CommandId.MODE: return writer.u8(s.mode).toBuffer();
            case CommandId.DISTANCE_FILTER:
                return writer.u16(s.distanceFilter[0]).u16(s.distanceFilter[1]).toBuffer();
            case CommandId.ANGLE_FILTER:
                return writer.i8(s.angleFilter[0]).i8(s.angleFilter[1]).toBuffer();
            case CommandId.MOVING_FILTER: return writer.u8(s.movingFilter).toBuffer();
            case CommandId.POINT_DENSITY: return writer.u8(s.pointDensity).toBuffer();
            case CommandId.SENSITIVITY: return writer.u8(s.sensitivity).toBuffer();
            case CommandId.HEIGHT_FILTER:
                return writer.i16(s.heightFilter[0]).i16(s.heightFilter[1]).toBuffer();
            case CommandId.OBJECT_TYPE_MODE: return writer.u8(s.objectTypeMode).toBuffer();
            case CommandId.AUTO_START: return writer.u8(s.autoStart).toBuffer();
            case CommandId.RADAR_APPLICATION_VERSION: {
                const slot = payload.length > 2 ? payload[2] : 1;
                const app = s.applications[slot - 1];
                if (!app) return null;
                return writer
                    .u8(slot)
                    .text(app.name, 20)
                    .u8(app.major).u8(app.minor).u16(app.build)
                    .toBuffer();
            }
            default:
                return null;
        }
    }
}
