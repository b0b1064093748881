#!/usr/bin/env npx tsx
/**
 * @module examples/simulated
 * @description Run a capture against the in-memory fake sensor (no hardware)
 *
 * Usage:
 *   npx tsx examples/simulated.ts
 */

import { RadarSensor, MODE_POINT_CLOUD, createLogger } from '../index';
import { InMemoryTransport, FakeRadarDevice } from '../src/transport/memory';

async function main(): Promise<void> {
    const [hostTransport, deviceTransport] = InMemoryTransport.createPair();
    const device = new FakeRadarDevice(deviceTransport);
    await device.start();

    const sensor = new RadarSensor({
        transport: hostTransport,
        settleMs: 0,
        queueLength: 0,
        logger: createLogger('console', { level: 'info' }),
    });
    await sensor.connect();

    console.log('version', await sensor.getVersion());
    console.log('serial', await sensor.getSerialNumber());

    await sensor.setMode(MODE_POINT_CLOUD);
    sensor.setUnits('cm', 'cm/s');
    await sensor.start(3);

    device.sendMessage(2, 7, 'capture started');
    for (let i = 1; i <= 3; i++) {
        device.sendPointCloudFrame([
            { x: 100 * i, y: 1500, z: -20, intensity: 40 + i, velocity: 250 },
            { x: -300, y: 2000 + i, z: 0, intensity: 12, velocity: 0 },
        ]);
    }

    for await (const frame of sensor.getData({ pollMs: 200 })) {
        if (frame) console.log(JSON.stringify(frame));
    }

    await sensor.close();
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
