/**
 * Matching Metrics Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/core/errors';
import {
    MAX_RETURN_LOSS_DB,
    bandIndices,
    bandMetrics,
    calculateBandwidth,
    impedanceFromReflection,
    isMatched,
    mismatchLossDb,
    nearestFrequencyIndex,
    pointMetrics,
    reflectionFromImpedance,
    returnLossDb,
    vswr,
} from '../src/models/metrics';
import { Complex, complex } from '../src/models/numeric/complex';
import { arraysClose, complexClose } from './test-utils';

describe('Scalar metrics', () => {
    it('should compute VSWR from |Γ|', () => {
        expect(vswr(0)).toBe(1);
        expect(vswr(0.5)).toBeCloseTo(3, 12);
        expect(vswr(1 / 3)).toBeCloseTo(2, 12);
    });

    it('should increase VSWR strictly with |Γ| below 1', () => {
        const magnitudes = Array.from({ length: 1000 }, (_, i) => i / 1000);
        const values = magnitudes.map(vswr);
        for (let i = 1; i < values.length; i++) {
            expect(values[i]).toBeGreaterThan(values[i - 1]);
        }
        expect(vswr(0.999999)).toBeGreaterThan(vswr(0.999));
    });

    it('should keep VSWR finite for total reflection', () => {
        expect(Number.isFinite(vswr(1))).toBe(true);
        expect(vswr(1)).toBeCloseTo(2e10, -1);
        expect(Number.isFinite(vswr(1.2))).toBe(true);
    });

    it('should cap return loss for a perfect match', () => {
        expect(returnLossDb(0)).toBe(MAX_RETURN_LOSS_DB);
        expect(returnLossDb(1e-7)).toBe(MAX_RETURN_LOSS_DB);
        expect(returnLossDb(0.1)).toBeCloseTo(20, 10);
        expect(returnLossDb(1)).toBeCloseTo(0, 12);
    });

    it('should compute mismatch loss', () => {
        expect(mismatchLossDb(0)).toBeCloseTo(0, 12);
        // 1 − 0.5² = 0.75
        expect(mismatchLossDb(0.5)).toBeCloseTo(-10 * Math.log10(0.75), 12);
        expect(Number.isFinite(mismatchLossDb(1))).toBe(true);
    });
});

describe('Impedance conversion', () => {
    it('should map Γ = 0 to the reference impedance', () => {
        expect(complexClose(impedanceFromReflection(Complex.ZERO, 50), complex(50, 0))).toBe(true);
        expect(complexClose(impedanceFromReflection(Complex.ZERO, 75), complex(75, 0))).toBe(true);
    });

    it('should map Γ = 1/3 to twice the reference', () => {
        expect(complexClose(impedanceFromReflection(complex(1 / 3, 0), 50), complex(100, 0), 1e-9)).toBe(true);
    });

    it('should keep an open circuit finite', () => {
        expect(impedanceFromReflection(Complex.ONE, 50).isFinite()).toBe(true);
    });

    it('should invert impedanceFromReflection', () => {
        const gamma = reflectionFromImpedance(complex(30, 40), 50);
        // (−20 + 40j)/(80 + 40j) = 4000j/8000
        expect(complexClose(gamma, complex(0, 0.5), 1e-12)).toBe(true);
        expect(complexClose(impedanceFromReflection(gamma, 50), complex(30, 40), 1e-9)).toBe(true);
    });
});

describe('isMatched', () => {
    it('should accept an impedance within tolerance', () => {
        expect(isMatched(complex(55, 0), 50, 10, 1.1)).toBe(true);
    });

    it('should accept an impedance under the VSWR threshold', () => {
        // Z = 90 Ω ⇒ Γ = 40/140, VSWR = 1.8
        expect(isMatched(complex(90, 0), 50, 10, 2)).toBe(true);
        expect(isMatched(complex(90, 0), 50, 10, 1.5)).toBe(false);
    });

    it('should reject an impedance failing both criteria', () => {
        // Z = 150 Ω ⇒ VSWR = 3
        expect(isMatched(complex(150, 0), 50, 10, 2)).toBe(false);
    });
});

describe('Metric sets', () => {
    it('should build point metrics', () => {
        const m = pointMetrics(complex(0.5, 0), 50);
        expect(m.magnitude).toBe(0.5);
        expect(m.vswr).toBeCloseTo(3, 12);
        expect(m.returnLossDb).toBeCloseTo(6.0206, 4);
        expect(complexClose(m.impedance, complex(150, 0), 1e-9)).toBe(true);
        expect(Object.isFrozen(m)).toBe(true);
    });

    it('should build band metrics of matching length', () => {
        const m = bandMetrics([Complex.ZERO, complex(0, 0.5), complex(-1 / 3, 0)], 50);
        expect(arraysClose(m.magnitude, [0, 0.5, 1 / 3])).toBe(true);
        expect(m.vswr[0]).toBe(1);
        expect(m.vswr[2]).toBeCloseTo(2, 12);
        expect(m.returnLossDb[0]).toBe(MAX_RETURN_LOSS_DB);
        expect(complexClose(m.impedance[2], complex(25, 0), 1e-9)).toBe(true);
        expect(m.reflection).toHaveLength(3);
    });
});

describe('Frequency selection', () => {
    it('should pick the nearest sample', () => {
        expect(nearestFrequencyIndex([1, 2, 3], 2.2)).toBe(1);
        expect(nearestFrequencyIndex([1, 2, 3], 100)).toBe(2);
        expect(nearestFrequencyIndex([1, 2, 3], -5)).toBe(0);
    });

    it('should prefer the lower index on a tie', () => {
        expect(nearestFrequencyIndex([1, 2, 3], 2.5)).toBe(1);
    });

    it('should reject an empty axis', () => {
        expect(() => nearestFrequencyIndex([], 1)).toThrow(ValidationError);
    });

    it('should select an inclusive band', () => {
        expect(bandIndices([1, 2, 3, 4, 5], [2, 4])).toEqual([1, 2, 3]);
        expect(bandIndices([1, 2, 3], [1.5, 1.7])).toEqual([]);
        expect(() => bandIndices([1, 2, 3], [3, 1])).toThrow(ValidationError);
        expect(() => bandIndices([1, 2, 3], [1, Number.NaN])).toThrow(ValidationError);
    });
});

describe('calculateBandwidth', () => {
    it('should sum contiguous runs under the threshold', () => {
        expect(calculateBandwidth([1.5, 1.5, 3, 1.5, 1.5], [1, 2, 3, 4, 5])).toBe(2);
    });

    it('should give zero for an isolated sample', () => {
        expect(calculateBandwidth([3, 1.5, 3], [1, 2, 3])).toBe(0);
    });

    it('should treat the threshold as exclusive', () => {
        expect(calculateBandwidth([2, 2, 2], [1, 2, 3])).toBe(0);
        expect(calculateBandwidth([2, 2, 2], [1, 2, 3], 2.5)).toBe(2);
    });

    it('should reject mismatched lengths', () => {
        expect(() => calculateBandwidth([1, 1], [1, 2, 3])).toThrow(ValidationError);
    });
});
