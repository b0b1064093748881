/**
 * @module units/converter
 * @description Conversion between SI units and the units frames are reported in
 *
 * Factors convert from SI: `value_in_unit = value_in_si * factor`.
 * Every result is rounded to 4 significant figures.
 */

import { ValidationError } from '../core/errors';

// ==================== Factors ====================

/** Distance factors from metres */
export const DISTANCE_FACTORS = {
    'mm': 1000,
    'cm': 100,
    'm': 1,
    'km': 1 / 1000,
    'in': 39.3701,
    'ft': 3.28084,
    'mi': 1 / 1609.344,
} as const;

/** Speed factors from metres per second */
export const SPEED_FACTORS = {
    'mm/s': 1000,
    'cm/s': 100,
    'm/s': 1,
    'km/h': 3.6,
    'in/s': 39.3701,
    'ft/s': 3.28084,
    'mi/h': 2.237,
} as const;

/** Acceleration factors from metres per second squared */
export const ACCELERATION_FACTORS = {
    'mm/s^2': 1000,
    'cm/s^2': 100,
    'm/s^2': 1,
    'in/s^2': 39.3701,
    'ft/s^2': 3.28084,
} as const;

export type DistanceUnit = keyof typeof DISTANCE_FACTORS;
export type SpeedUnit = keyof typeof SPEED_FACTORS;
export type AccelerationUnit = keyof typeof ACCELERATION_FACTORS;

export const DISTANCE_UNITS = Object.keys(DISTANCE_FACTORS);
export const SPEED_UNITS = Object.keys(SPEED_FACTORS);
export const ACCELERATION_UNITS = Object.keys(ACCELERATION_FACTORS);

export function isDistanceUnit(units: string): units is DistanceUnit {
    return Object.prototype.hasOwnProperty.call(DISTANCE_FACTORS, units);
}

export function isSpeedUnit(units: string): units is SpeedUnit {
    return Object.prototype.hasOwnProperty.call(SPEED_FACTORS, units);
}

export function isAccelerationUnit(units: string): units is AccelerationUnit {
    return Object.prototype.hasOwnProperty.call(ACCELERATION_FACTORS, units);
}

// ==================== Rounding ====================

/**
 * Round to `sig` significant figures
 *
 * @example
 * ```typescript
 * roundSig(1.235845);   // 1.236
 * roundSig(1.235845, 2); // 1.2
 * roundSig(0);          // 0
 * ```
 */
export function roundSig(x: number, sig = 4): number {
    if (x === 0) return 0;
    const digits = sig - Math.floor(Math.log10(Math.abs(x))) - 1;
    const factor = 10 ** digits;
    return Math.sign(x) * Math.round(Math.abs(x) * factor) / factor;
}

// ==================== Conversion ====================

function checkValue(quantity: string, value: number): void {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError(`${quantity} must be a number`, { value });
    }
}

function factorFor<T extends Record<string, number>>(
    table: T,
    quantity: string,
    units: string
): number {
    if (!Object.prototype.hasOwnProperty.call(table, units)) {
        throw new ValidationError(`Invalid units for ${quantity} conversion`, { units });
    }
    return table[units];
}

/** Convert a distance in `units` to metres */
export function convertDistanceToSi(units: string, distance: number): number {
    checkValue('Distance', distance);
    return roundSig(distance / factorFor(DISTANCE_FACTORS, 'distance', units));
}

/** Convert a distance in metres to `units` */
export function convertDistanceFromSi(units: string, distance: number): number {
    checkValue('Distance', distance);
    return roundSig(distance * factorFor(DISTANCE_FACTORS, 'distance', units));
}

/** Convert a speed in `units` to metres per second */
export function convertSpeedToSi(units: string, speed: number): number {
    checkValue('Speed', speed);
    return roundSig(speed / factorFor(SPEED_FACTORS, 'speed', units));
}

/** Convert a speed in metres per second to `units` */
export function convertSpeedFromSi(units: string, speed: number): number {
    checkValue('Speed', speed);
    return roundSig(speed * factorFor(SPEED_FACTORS, 'speed', units));
}

/** Convert an acceleration in `units` to metres per second squared */
export function convertAccelerationToSi(units: string, acceleration: number): number {
    checkValue('Acceleration', acceleration);
    return roundSig(acceleration / factorFor(ACCELERATION_FACTORS, 'acceleration', units));
}

/** Convert an acceleration in metres per second squared to `units` */
export function convertAccelerationFromSi(units: string, acceleration: number): number {
    checkValue('Acceleration', acceleration);
    return roundSig(acceleration * factorFor(ACCELERATION_FACTORS, 'acceleration', units));
}
