/**
 * @module units
 * @description Distance, speed and acceleration unit conversion
 */

export {
    DISTANCE_FACTORS,
    SPEED_FACTORS,
    ACCELERATION_FACTORS,
    DISTANCE_UNITS,
    SPEED_UNITS,
    ACCELERATION_UNITS,
    isDistanceUnit,
    isSpeedUnit,
    isAccelerationUnit,
    roundSig,
    convertDistanceToSi,
    convertDistanceFromSi,
    convertSpeedToSi,
    convertSpeedFromSi,
    convertAccelerationToSi,
    convertAccelerationFromSi,
} from './converter';

export type { DistanceUnit, SpeedUnit, AccelerationUnit } from './converter';
