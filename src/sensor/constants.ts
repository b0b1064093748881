/**
 * @module sensor/constants
 * @description Setting codes accepted by the sensor
 */

// ==================== Capture Modes ====================

export const MODE_POINT_CLOUD = 0;
export const MODE_OBJECT_TRACKING = 1;

export const CaptureMode = {
    POINT_CLOUD: MODE_POINT_CLOUD,
    OBJECT_TRACKING: MODE_OBJECT_TRACKING,
} as const;

export type CaptureModeValue = (typeof CaptureMode)[keyof typeof CaptureMode];

// ==================== Moving Filter ====================

export const MOVING_BOTH = 0;
export const MOVING_OBJECTS_ONLY = 1;

export const MovingFilter = {
    BOTH: MOVING_BOTH,
    OBJECTS_ONLY: MOVING_OBJECTS_ONLY,
} as const;

export type MovingFilterValue = (typeof MovingFilter)[keyof typeof MovingFilter];

// ==================== Reset Codes ====================

export const RESET_REBOOT = 0;
export const RESET_FACTORY_SETTINGS = 1;

export const ResetCode = {
    REBOOT: RESET_REBOOT,
    FACTORY_SETTINGS: RESET_FACTORY_SETTINGS,
} as const;

export type ResetCodeValue = (typeof ResetCode)[keyof typeof ResetCode];

// ==================== Point Density ====================

export const DENSITY_NORMAL = 0;
export const DENSITY_DENSE = 1;
export const DENSITY_VERY_DENSE = 2;

export const PointDensity = {
    NORMAL: DENSITY_NORMAL,
    DENSE: DENSITY_DENSE,
    VERY_DENSE: DENSITY_VERY_DENSE,
} as const;

export type PointDensityValue = (typeof PointDensity)[keyof typeof PointDensity];

// ==================== Output Formats ====================

/** Frames as arrays of records */
export const OUTPUT_LIST = 0;
/** Frames as dense row-major `Float64Array` matrices */
export const OUTPUT_MATRIX = 1;
/** Alias of `OUTPUT_MATRIX` under its older name */
export const OUTPUT_NUMPY = OUTPUT_MATRIX;

export const OutputFormat = {
    LIST: OUTPUT_LIST,
    MATRIX: OUTPUT_MATRIX,
} as const;

export type OutputFormatValue = (typeof OutputFormat)[keyof typeof OutputFormat];

// ==================== Object Types ====================

export const OBJECT_TYPE_DOG = 0;
export const OBJECT_TYPE_PERSON = 1;
export const OBJECT_TYPE_CYCLIST = 2;
export const OBJECT_TYPE_SLOW_VEHICLE = 3;
export const OBJECT_TYPE_FAST_VEHICLE = 4;

export const ObjectType = {
    DOG: OBJECT_TYPE_DOG,
    PERSON: OBJECT_TYPE_PERSON,
    CYCLIST: OBJECT_TYPE_CYCLIST,
    SLOW_VEHICLE: OBJECT_TYPE_SLOW_VEHICLE,
    FAST_VEHICLE: OBJECT_TYPE_FAST_VEHICLE,
} as const;

export type ObjectTypeValue = (typeof ObjectType)[keyof typeof ObjectType];

// ==================== Connection Status ====================

export const ConnectionStatus = {
    CONNECTED: 0,
    DISCONNECTED: 1,
    RECONNECTED: 2,
    FATAL: 3,
} as const;

export type ConnectionStatusValue = (typeof ConnectionStatus)[keyof typeof ConnectionStatus];

// ==================== Limits ====================

export const FRAME_RATE_MIN = 0;
export const FRAME_RATE_MAX = 20;
export const SENSITIVITY_MIN = 0;
export const SENSITIVITY_MAX = 9;
export const DISTANCE_FILTER_MIN_MM = 0;
export const DISTANCE_FILTER_MAX_MM = 10000;
export const ANGLE_FILTER_MIN = -55;
export const ANGLE_FILTER_MAX = 55;
export const HEIGHT_FILTER_MIN_MM = -32768;
export const HEIGHT_FILTER_MAX_MM = 32767;
export const SAMPLES_MAX = 255;

/**
 * Check that `value` is one of the values of a code group
 */
export function isCodeOf<T extends Record<string, number>>(
    group: T,
    value: unknown
): value is T[keyof T] {
    return typeof value === 'number' && Object.values(group).includes(value);
}
