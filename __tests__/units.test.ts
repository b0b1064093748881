/**
 * Unit Conversion Tests
 */

import { describe, it, expect } from 'vitest';
import {
    ACCELERATION_UNITS,
    DISTANCE_UNITS,
    SPEED_UNITS,
    convertAccelerationFromSi,
    convertAccelerationToSi,
    convertDistanceFromSi,
    convertDistanceToSi,
    convertSpeedFromSi,
    convertSpeedToSi,
    isDistanceUnit,
    isSpeedUnit,
    roundSig,
} from '../src/units';
import { ErrorCodes, ValidationError } from '../src/core';
import { catchError } from './test-utils';

describe('roundSig', () => {
    it('should round to 4 significant figures by default', () => {
        expect(roundSig(1.235845)).toBe(1.236);
        expect(roundSig(123456)).toBe(123500);
        expect(roundSig(-0.000123456)).toBe(-0.0001235);
    });

    it('should accept another number of figures', () => {
        expect(roundSig(1.235845, 2)).toBe(1.2);
    });

    it('should return 0 for 0', () => {
        expect(roundSig(0)).toBe(0);
    });

    it('should round halves away from zero on both signs', () => {
        expect(roundSig(2.5, 1)).toBe(3);
        expect(roundSig(-2.5, 1)).toBe(-3);
    });
});

describe('Unit lists', () => {
    it('should list the supported units', () => {
        expect(DISTANCE_UNITS).toEqual(['mm', 'cm', 'm', 'km', 'in', 'ft', 'mi']);
        expect(SPEED_UNITS).toEqual(['mm/s', 'cm/s', 'm/s', 'km/h', 'in/s', 'ft/s', 'mi/h']);
        expect(ACCELERATION_UNITS).toEqual(['mm/s^2', 'cm/s^2', 'm/s^2', 'in/s^2', 'ft/s^2']);
    });

    it('should only accept own unit names', () => {
        expect(isDistanceUnit('ft')).toBe(true);
        expect(isDistanceUnit('toString')).toBe(false);
        expect(isSpeedUnit('m')).toBe(false);
    });
});

describe('Distance', () => {
    it('should convert to metres', () => {
        expect(convertDistanceToSi('mm', 1010)).toBe(1.01);
        expect(convertDistanceToSi('km', 0.123)).toBe(123);
        expect(convertDistanceToSi('ft', 23)).toBe(7.01);
        expect(convertDistanceToSi('mi', 0.135)).toBe(217.3);
    });

    it('should convert from metres', () => {
        expect(convertDistanceFromSi('mm', 1.001)).toBe(1001);
        expect(convertDistanceFromSi('km', 123)).toBe(0.123);
        expect(convertDistanceFromSi('ft', 7.01)).toBe(23);
        expect(convertDistanceFromSi('in', 2)).toBe(78.74);
        expect(convertDistanceFromSi('ft', -1.5)).toBe(-4.921);
    });

    it('should reject unknown units', () => {
        const error = catchError(() => convertDistanceToSi('yd', 1));
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
            code: ErrorCodes.VALIDATION_ERROR,
            message: 'Invalid units for distance conversion',
        });
    });

    it('should reject values that are not numbers', () => {
        expect(() => convertDistanceFromSi('m', Number.NaN)).toThrow('Distance must be a number');
    });
});

describe('Speed', () => {
    it('should convert to metres per second', () => {
        expect(convertSpeedToSi('km/h', 13)).toBe(3.611);
        expect(convertSpeedToSi('mi/h', 14)).toBe(6.258);
    });

    it('should convert from metres per second', () => {
        expect(convertSpeedFromSi('km/h', 45)).toBe(162);
        expect(convertSpeedFromSi('ft/s', 7)).toBe(22.97);
        expect(convertSpeedFromSi('mi/h', 21)).toBe(46.98);
    });

    it('should reject unknown units', () => {
        expect(() => convertSpeedFromSi('knots', 1)).toThrow('Invalid units for speed conversion');
        expect(() => convertSpeedToSi('m/s', Number.POSITIVE_INFINITY)).toThrow('Speed must be a number');
    });
});

describe('Acceleration', () => {
    it('should convert both ways', () => {
        expect(convertAccelerationFromSi('ft/s^2', 9.81)).toBe(32.19);
        expect(convertAccelerationToSi('cm/s^2', 500)).toBe(5);
    });

    it('should reject unknown units', () => {
        expect(() => convertAccelerationToSi('g', 1)).toThrow('Invalid units for acceleration conversion');
    });
});
