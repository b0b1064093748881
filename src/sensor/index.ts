/**
 * @module sensor
 * @description RadarSensor client, setting codes, frame types and decoding
 */

export * from './constants';

export type {
    Point,
    TrackedObject,
    FrameKind,
    PointCloudListFrame,
    ObjectListFrame,
    MatrixFrame,
    ListFrame,
    Frame,
    Units,
    Range,
    VersionInfo,
    RadarApplicationVersions,
    SensorStatistics,
    SensorEventType,
    SensorEvent,
    SensorEventHandler,
} from './types';

export { POINT_COLUMNS, OBJECT_COLUMNS } from './types';

export { DEFAULT_SENSOR_OPTIONS, resolveSensorOptions } from './config';
export type { SensorConfig, SensorOptions } from './config';

export { FrameQueue } from './queue';

export {
    FrameAssembler,
    convertPoint,
    convertObject,
    toMatrix,
    matrixValue,
} from './decoder';
export type { DecoderSettings } from './decoder';

export { RadarSensor } from './sensor';
export type { GetDataOptions } from './sensor';
