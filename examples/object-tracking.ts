#!/usr/bin/env npx tsx
/**
 * @module examples/object-tracking
 * @description Print tracked objects until Ctrl+C
 *
 * Usage:
 *   npx tsx examples/object-tracking.ts
 */

import { RadarSensor, MODE_OBJECT_TRACKING } from '../index';

async function main(): Promise<void> {
    const sensor = new RadarSensor();
    await sensor.connect();

    process.once('SIGINT', () => {
        sensor.stop().catch((error: unknown) => console.error(error));
    });

    try {
        await sensor.setMode(MODE_OBJECT_TRACKING);
        sensor.setUnits('m', 'm/s');
        await sensor.setFrameRate(5);
        await sensor.setDistanceFilter(0, 10);
        await sensor.setAngleFilter(-45, 45);
        await sensor.start();

        for await (const frame of sensor.getData()) {
            if (frame && frame.format === 'list' && frame.kind === 'object-tracking') {
                for (const obj of frame.objects) {
                    console.log(`#${obj.trackingId} at (${obj.xPos}, ${obj.yPos}, ${obj.zPos}) m`);
                }
            }
        }
    } finally {
        await sensor.close();
    }
}

main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
