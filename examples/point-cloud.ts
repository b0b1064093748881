#!/usr/bin/env npx tsx
/**
 * @module examples/point-cloud
 * @description Capture 10 point cloud frames and print them
 *
 * Usage:
 *   npx tsx examples/point-cloud.ts
 */

import { RadarSensor, MODE_POINT_CLOUD } from '../index';

const FRAME_COUNT = 10;

async function main(): Promise<void> {
    const sensor = new RadarSensor();
    await sensor.connect();

    try {
        await sensor.setMode(MODE_POINT_CLOUD);
        sensor.setUnits('m', 'm/s');
        await sensor.setFrameRate(5);
        await sensor.setDistanceFilter(0, 10);
        await sensor.setAngleFilter(-45, 45);
        await sensor.start(FRAME_COUNT);

        for await (const frame of sensor.getData()) {
            if (frame) console.log(frame);
        }
    } finally {
        await sensor.close();
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
