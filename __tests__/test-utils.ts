/**
 * Test Utilities
 * Sensor/device pairs and small async helpers
 */

import { MemoryLogger } from '../src/core';
import { RadarSensor, type SensorOptions } from '../src/sensor';
import {
    FakeRadarDevice,
    InMemoryTransport,
    type FakeDeviceSettings,
} from '../src/transport';

/**
 * Run `fn` and return what it threw, or undefined
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    return undefined;
}

/**
 * Await `promise` and return its rejection reason, or undefined
 */
export async function catchRejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (e) {
        return e;
    }
    return undefined;
}

/**
 * Let queued microtasks and zero-delay timers run
 */
export function tick(ms = 0): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface SensorPair {
    sensor: RadarSensor;
    device: FakeRadarDevice;
    host: InMemoryTransport;
    logger: MemoryLogger;
}

/**
 * A RadarSensor wired to a FakeRadarDevice, not yet connected
 */
export async function createSensorPair(
    options: SensorOptions = {},
    settings: Partial<FakeDeviceSettings> = {}
): Promise<SensorPair> {
    const [host, deviceTransport] = InMemoryTransport.createPair();
    const device = new FakeRadarDevice(deviceTransport, settings);
    await device.start();

    const logger = new MemoryLogger();
    const sensor = new RadarSensor({
        settleMs: 0,
        commandTimeoutMs: 200,
        ...options,
        transport: host,
        logger,
    });
    return { sensor, device, host, logger };
}

/**
 * Same as createSensorPair, connected
 */
export async function connectedSensorPair(
    options: SensorOptions = {},
    settings: Partial<FakeDeviceSettings> = {}
): Promise<SensorPair> {
    const pair = await createSensorPair(options, settings);
    await pair.sensor.connect();
    return pair;
}
