/**
 * @module sensor/types
 * @description Frames, statistics and events produced by RadarSensor
 */

import type {
    ApplicationVersion,
    CoreStatistics,
    DeviceMessage,
    PointCloudStatistics,
} from '../protocol/commands';
import type { ConnectionStatusValue } from './constants';

// ==================== Frames ====================

/**
 * Point cloud point in the configured distance and speed units
 */
export interface Point {
    x: number;
    y: number;
    z: number;
    intensity: number;
    velocity: number;
}

/**
 * Tracked object in the configured distance, speed and acceleration units
 */
export interface TrackedObject {
    trackingId: number;
    xPos: number;
    yPos: number;
    zPos: number;
    xVel: number;
    yVel: number;
    zVel: number;
    xAcc: number;
    yAcc: number;
    zAcc: number;
}

export type FrameKind = 'point-cloud' | 'object-tracking';

export interface PointCloudListFrame {
    format: 'list';
    kind: 'point-cloud';
    /** 1-based frame count within the capture */
    index: number;
    points: Point[];
}

export interface ObjectListFrame {
    format: 'list';
    kind: 'object-tracking';
    index: number;
    objects: TrackedObject[];
}

/**
 * Dense frame: `rows x columns` values, row-major
 */
export interface MatrixFrame {
    format: 'matrix';
    kind: FrameKind;
    index: number;
    rows: number;
    columns: readonly string[];
    data: Float64Array;
}

export type ListFrame = PointCloudListFrame | ObjectListFrame;
export type Frame = ListFrame | MatrixFrame;

export const POINT_COLUMNS = ['x', 'y', 'z', 'intensity', 'velocity'] as const;

export const OBJECT_COLUMNS = [
    'trackingId',
    'xPos',
    'yPos',
    'zPos',
    'xVel',
    'yVel',
    'zVel',
    'xAcc',
    'yAcc',
    'zAcc',
] as const;

// ==================== Settings ====================

export interface Units {
    distance: string;
    speed: string;
    acceleration: string;
}

export interface Range {
    minimum: number;
    maximum: number;
}

export interface VersionInfo {
    firmware: [number, number, number];
    hardware: [number, number, number];
}

export interface RadarApplicationVersions {
    controller: ApplicationVersion;
    application1: ApplicationVersion;
    application2: ApplicationVersion;
    application3: ApplicationVersion;
}

// ==================== Statistics ====================

export interface SensorStatistics {
    core: CoreStatistics | null;
    pointCloud: PointCloudStatistics | null;
    /** Bytes received but not yet framed */
    rxBufferLength: number | null;
    /** Frames queued and not yet consumed */
    rxPacketQueue: number | null;
}

// ==================== Events ====================

export type SensorEventType =
    | 'connection'
    | 'frame'
    | 'statistics'
    | 'message'
    | 'capture_complete';

export type SensorEvent =
    | { type: 'connection'; status: ConnectionStatusValue }
    | { type: 'frame'; frame: Frame }
    | { type: 'statistics'; statistics: SensorStatistics }
    | { type: 'message'; message: DeviceMessage }
    | { type: 'capture_complete'; frames: number };

export type SensorEventHandler = (event: SensorEvent) => void;
