/**
 * Engineering Notation, Preferred Values and Statistics Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/core/errors';
import {
    formatComponentValue,
    formatEngineeringNotation,
    maxValue,
    mean,
    parseEngineeringNotation,
    seriesMantissas,
    snapToStandard,
    standardValues,
} from '../src/models/utils';

describe('parseEngineeringNotation', () => {
    it('should apply SI prefixes', () => {
        expect(parseEngineeringNotation('10pF')).toBeCloseTo(1e-11, 20);
        expect(parseEngineeringNotation('2.2nH', 'H')).toBeCloseTo(2.2e-9, 18);
        expect(parseEngineeringNotation('100uH')).toBeCloseTo(1e-4, 15);
        expect(parseEngineeringNotation('100µH')).toBeCloseTo(1e-4, 15);
        expect(parseEngineeringNotation('1.5GHz')).toBe(1.5e9);
        expect(parseEngineeringNotation('5fF')).toBeCloseTo(5e-15, 24);
    });

    it('should accept plain numbers and surrounding whitespace', () => {
        expect(parseEngineeringNotation('47')).toBe(47);
        expect(parseEngineeringNotation('5F')).toBe(5);
        expect(parseEngineeringNotation(' 10 pF ')).toBeCloseTo(1e-11, 20);
    });

    it('should compare units case-insensitively', () => {
        expect(parseEngineeringNotation('10pF', 'f')).toBeCloseTo(1e-11, 20);
    });

    it('should reject a wrong or missing unit', () => {
        expect(() => parseEngineeringNotation('10pF', 'H')).toThrow(/Unit mismatch/);
        expect(() => parseEngineeringNotation('10p', 'F')).toThrow(/Missing unit/);
    });

    it('should reject malformed text', () => {
        expect(() => parseEngineeringNotation('abc')).toThrow(ValidationError);
        expect(() => parseEngineeringNotation('-5pF')).toThrow(ValidationError);
        expect(() => parseEngineeringNotation('')).toThrow(ValidationError);
    });
});

describe('formatEngineeringNotation', () => {
    it('should pick the largest prefix not above the value', () => {
        expect(formatEngineeringNotation(1e-11, 'F')).toBe('10.00pF');
        expect(formatEngineeringNotation(2.4e9, 'Hz')).toBe('2.40GHz');
        expect(formatEngineeringNotation(2.2e-9, 'H', 1)).toBe('2.2nH');
        expect(formatEngineeringNotation(47, 'Ω')).toBe('47.00Ω');
        expect(formatEngineeringNotation(-2e-9, 'H')).toBe('-2.00nH');
    });

    it('should move up a prefix when rounding reaches it', () => {
        expect(formatEngineeringNotation(999.999, 'Hz')).toBe('1.00kHz');
        expect(formatComponentValue(9.999999999999998e-13, 'F')).toBe('1pF');
    });

    it('should print zero without a prefix', () => {
        expect(formatEngineeringNotation(0, 'F')).toBe('0F');
        expect(formatEngineeringNotation(1e-16, 'F')).toBe('0F');
    });
});

describe('formatComponentValue', () => {
    it('should drop trailing zeros', () => {
        expect(formatComponentValue(1e-11, 'F')).toBe('10pF');
        expect(formatComponentValue(2.2e-9, 'H')).toBe('2.2nH');
        expect(formatComponentValue(1e-9, 'H')).toBe('1nH');
        expect(formatComponentValue(100e-12, 'F')).toBe('100pF');
        expect(formatComponentValue(1.25e-10, 'F')).toBe('125pF');
    });

    it('should keep zero intact', () => {
        expect(formatComponentValue(0, 'F')).toBe('0F');
    });
});

describe('Preferred values', () => {
    it('should carry every series', () => {
        expect(seriesMantissas('E12')).toHaveLength(12);
        expect(seriesMantissas('E24')).toHaveLength(24);
        expect(seriesMantissas('E96')).toHaveLength(96);
        expect(seriesMantissas('E96')[95]).toBe(9.76);
    });

    it('should list values across decades within the range', () => {
        const values = standardValues('E12', 1e-12, 1e-10);
        expect(values).toHaveLength(25);
        expect(values[0]).toBe(1e-12);
        expect(values[24]).toBe(1e-10);
        expect(values[1] / 1.2e-12).toBeCloseTo(1, 12);
    });

    it('should reject an empty or inverted range', () => {
        expect(() => standardValues('E24', 0, 1)).toThrow(ValidationError);
        expect(() => standardValues('E24', 1e-9, 1e-12)).toThrow(/Invalid value range/);
    });

    it('should snap to the nearest value', () => {
        // 12.7 pF lies between 12 and 15 in E12, between 12 and 13 in E24
        expect(snapToStandard(12.7e-12, standardValues('E12', 1e-12, 1e-10)) / 12e-12).toBeCloseTo(1, 12);
        expect(snapToStandard(12.7e-12, standardValues('E24', 1e-12, 1e-10)) / 13e-12).toBeCloseTo(1, 12);
    });

    it('should prefer the smaller value on a tie', () => {
        expect(snapToStandard(1.5, [1, 2])).toBe(1);
        expect(() => snapToStandard(1, [])).toThrow(ValidationError);
    });
});

describe('Statistics', () => {
    it('should average values', () => {
        expect(mean([1, 2, 3, 4])).toBe(2.5);
        expect(() => mean([])).toThrow(ValidationError);
    });

    it('should take the maximum ignoring NaN', () => {
        expect(maxValue([1, Number.NaN, 3, 2])).toBe(3);
        expect(Number.isNaN(maxValue([]))).toBe(true);
    });
});
