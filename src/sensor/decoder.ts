/**
 * @module sensor/decoder
 * @description Assembles capture subframes into frames
 *
 * The device sends each frame as one or more subframes; the last one is
 * flagged. Records are converted from mm, mm/s and mm/s^2 to the configured
 * units as they arrive.
 */

import type { RawObject, RawPoint, Subframe } from '../protocol/commands';
import {
    convertAccelerationFromSi,
    convertDistanceFromSi,
    convertSpeedFromSi,
} from '../units/converter';
import { OUTPUT_MATRIX, type OutputFormatValue } from './constants';
import {
    OBJECT_COLUMNS,
    POINT_COLUMNS,
    type Frame,
    type FrameKind,
    type MatrixFrame,
    type Point,
    type TrackedObject,
    type Units,
} from './types';

/**
 * Settings read at the time each record is converted
 */
export interface DecoderSettings {
    units: Units;
    mirror: boolean;
    outputFormat: OutputFormatValue;
}

// ==================== Record Conversion ====================

function flip(value: number, mirror: boolean): number {
    return mirror && value !== 0 ? -value : value;
}

export function convertPoint(raw: RawPoint, units: Units, mirror: boolean): Point {
    return {
        x: flip(convertDistanceFromSi(units.distance, raw.x / 1000), mirror),
        y: convertDistanceFromSi(units.distance, raw.y / 1000),
        z: convertDistanceFromSi(units.distance, raw.z / 1000),
        intensity: raw.intensity,
        velocity: convertSpeedFromSi(units.speed, raw.velocity / 1000),
    };
}

export function convertObject(raw: RawObject, units: Units, mirror: boolean): TrackedObject {
    const distance = (mm: number): number => convertDistanceFromSi(units.distance, mm / 1000);
    const speed = (mms: number): number => convertSpeedFromSi(units.speed, mms / 1000);
    const acceleration = (mms2: number): number =>
        convertAccelerationFromSi(units.acceleration, mms2 / 1000);

    return {
        trackingId: raw.trackingId,
        xPos: flip(distance(raw.xPos), mirror),
        yPos: distance(raw.yPos),
        zPos: distance(raw.zPos),
        xVel: flip(speed(raw.xVel), mirror),
        yVel: speed(raw.yVel),
        zVel: speed(raw.zVel),
        xAcc: flip(acceleration(raw.xAcc), mirror),
        yAcc: acceleration(raw.yAcc),
        zAcc: acceleration(raw.zAcc),
    };
}

// ==================== Matrix Output ====================

/**
 * Pack records into a row-major matrix with the given column order
 */
export function toMatrix<T extends object, K extends keyof T & string>(
    kind: FrameKind,
    index: number,
    records: readonly T[],
    columns: readonly K[]
): MatrixFrame {
    const data = new Float64Array(records.length * columns.length);
    records.forEach((record, row) => {
        columns.forEach((column, col) => {
            data[row * columns.length + col] = Number(record[column]);
        });
    });
    return { format: 'matrix', kind, index, rows: records.length, columns, data };
}

/**
 * Value at `row`, `column` of a matrix frame
 */
export function matrixValue(frame: MatrixFrame, row: number, column: string): number {
    const col = frame.columns.indexOf(column);
    if (col < 0 || row < 0 || row >= frame.rows) return Number.NaN;
    return frame.data[row * frame.columns.length + col];
}

// ==================== Frame Assembler ====================

/**
 * Collects subframes and emits a frame when the last one arrives
 */
export class FrameAssembler {
    private points: Point[] = [];
    private objects: TrackedObject[] = [];
    private count = 0;

    constructor(private readonly settings: () => DecoderSettings) { }

    /** Frames completed since the last reset */
    get frameCount(): number {
        return this.count;
    }

    reset(): void {
        this.points = [];
        this.objects = [];
        this.count = 0;
    }

    pushPointCloud(subframe: Subframe<RawPoint>): Frame | null {
        const { units, mirror, outputFormat } = this.settings();
        for (const raw of subframe.records) {
            this.points.push(convertPoint(raw, units, mirror));
        }
        if (!subframe.last) return null;

        const points = this.points;
        this.points = [];
        this.count++;

        if (outputFormat === OUTPUT_MATRIX) {
            return toMatrix('point-cloud', this.count, points, POINT_COLUMNS);
        }
        return { format: 'list', kind: 'point-cloud', index: this.count, points };
    }

    pushObjects(subframe: Subframe<RawObject>): Frame | null {
        const { units, mirror, outputFormat } = this.settings();
        for (const raw of subframe.records) {
            this.objects.push(convertObject(raw, units, mirror));
        }
        if (!subframe.last) return null;

        const objects = this.objects;
        this.objects = [];
        this.count++;

        if (outputFormat === OUTPUT_MATRIX) {
            return toMatrix('object-tracking', this.count, objects, OBJECT_COLUMNS);
        }
        return { format: 'list', kind: 'object-tracking', index: this.count, objects };
    }
}
