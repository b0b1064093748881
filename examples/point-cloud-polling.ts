#!/usr/bin/env npx tsx
/**
 * @module examples/point-cloud-polling
 * @description Poll for frames with getFrame() instead of the async generator
 *
 * Usage:
 *   npx tsx examples/point-cloud-polling.ts
 */

import { RadarSensor, MODE_POINT_CLOUD, OUTPUT_MATRIX } from '../index';

const POLL_INTERVAL_MS = 50;
const RUN_TIME_MS = 10000;

async function main(): Promise<void> {
    const sensor = new RadarSensor({ outputFormat: OUTPUT_MATRIX });
    await sensor.connect();

    try {
        await sensor.setMode(MODE_POINT_CLOUD);
        await sensor.setFrameRate(5);
        await sensor.start();

        const deadline = Date.now() + RUN_TIME_MS;
        while (Date.now() < deadline) {
            const frame = sensor.getFrame();
            if (frame && frame.format === 'matrix') {
                console.log(`frame ${frame.index}: ${frame.rows} points`);
            }
            await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS));
        }

        await sensor.stop();
    } finally {
        await sensor.close();
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
