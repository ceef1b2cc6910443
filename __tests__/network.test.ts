/**
 * Network Construction, Resampling and Lumped Element Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/core/errors';
import {
    ComponentKind,
    ConnectionRole,
    createConstantNetwork,
    createFrequencySeries,
    createLumpedElementNetwork,
    createOnePortNetwork,
    createTwoPortNetwork,
    elementImpedance,
    frequencyRange,
    interpolateComplex,
    resampleNetwork,
    sameFrequencyAxis,
    scatteringAt,
    validateFrequencies,
    validateLumpedElement,
} from '../src/models/network';
import { Complex, complex } from '../src/models/numeric/complex';
import { THRU, complexClose } from './test-utils';

// ==================== Frequency Series ====================

describe('validateFrequencies', () => {
    it('should accept a strictly increasing axis', () => {
        expect(() => validateFrequencies([0, 1e9, 2e9])).not.toThrow();
    });

    it('should reject empty, negative, non-finite and non-increasing axes', () => {
        expect(() => validateFrequencies([])).toThrow(ValidationError);
        expect(() => validateFrequencies([-1, 1])).toThrow(ValidationError);
        expect(() => validateFrequencies([1, NaN])).toThrow(ValidationError);
        expect(() => validateFrequencies([1, 1])).toThrow(/strictly increasing/);
        expect(() => validateFrequencies([2, 1])).toThrow(ValidationError);
    });
});

describe('createFrequencySeries', () => {
    it('should freeze the axis and the arrays', () => {
        const series = createFrequencySeries([1, 2], { s11: [Complex.ZERO, Complex.ONE] });
        expect(Object.isFrozen(series)).toBe(true);
        expect(Object.isFrozen(series.frequencies)).toBe(true);
        expect(Object.isFrozen(series.data.s11)).toBe(true);
    });

    it('should copy its inputs', () => {
        const frequencies = [1, 2];
        const series = createFrequencySeries(frequencies, { s11: [Complex.ZERO, Complex.ONE] });
        frequencies[0] = 100;
        expect(series.frequencies[0]).toBe(1);
    });

    it('should reject length mismatches and non-finite values', () => {
        expect(() => createFrequencySeries([1, 2], { s11: [Complex.ZERO] })).toThrow(/expected 2/);
        expect(() => createFrequencySeries([1], { s11: [complex(NaN, 0)] })).toThrow(/non-finite/);
        expect(() => createFrequencySeries([1], {})).toThrow(ValidationError);
    });
});

describe('createTwoPortNetwork', () => {
    it('should default the reference impedance to 50 Ω and tag two ports', () => {
        const network = createConstantNetwork([1e9], THRU);
        expect(network.z0).toBe(50);
        expect(network.portCount).toBe(2);
    });

    it('should reject a non-positive reference impedance', () => {
        expect(() => createConstantNetwork([1e9], THRU, 0)).toThrow(ValidationError);
        expect(() => createConstantNetwork([1e9], THRU, -50)).toThrow(ValidationError);
    });

    it('should reject an S-parameter of the wrong length', () => {
        expect(() => createTwoPortNetwork({
            frequencies: [1, 2],
            s11: [Complex.ZERO, Complex.ZERO],
            s12: [Complex.ONE],
            s21: [Complex.ONE, Complex.ONE],
            s22: [Complex.ZERO, Complex.ZERO],
        })).toThrow(/'s12' has 1 points/);
    });

    it('should keep the name when given', () => {
        expect(createConstantNetwork([1], THRU, 50, 'dut').name).toBe('dut');
        expect(createConstantNetwork([1], THRU).name).toBeUndefined();
    });
});

describe('createOnePortNetwork', () => {
    it('should fill S12, S21 and S22 with S11 and tag one port', () => {
        const gamma = complex(0.3, -0.2);
        const network = createOnePortNetwork({ frequencies: [1e9], s11: [gamma], z0: 75 });
        expect(network.portCount).toBe(1);
        expect(network.z0).toBe(75);
        expect(network.s12[0]).toBe(gamma);
        expect(network.s21[0]).toBe(gamma);
        expect(network.s22[0]).toBe(gamma);
    });
});

describe('scatteringAt / frequencyRange', () => {
    it('should return the four parameters at an index', () => {
        const network = createConstantNetwork([1, 2, 3], THRU);
        expect(scatteringAt(network, 2)).toEqual(THRU);
        expect(() => scatteringAt(network, 3)).toThrow(ValidationError);
        expect(() => scatteringAt(network, 0.5)).toThrow(ValidationError);
    });

    it('should return the first and last frequency', () => {
        expect(frequencyRange(createConstantNetwork([1, 2, 3], THRU))).toEqual([1, 3]);
    });
});

// ==================== Resampling ====================

describe('interpolateComplex', () => {
    const values = [Complex.ZERO, complex(2, 4)];
    const source = [1, 3];

    it('should interpolate real and imaginary parts linearly', () => {
        const [v] = interpolateComplex(values, source, [2]);
        expect(v).toEqual(complex(1, 2));
    });

    it('should return source samples on the source axis', () => {
        const result = interpolateComplex(values, source, [1, 3]);
        expect(result[0]).toEqual(Complex.ZERO);
        expect(result[1]).toEqual(complex(2, 4));
    });

    it('should extend the outermost segments linearly by default', () => {
        const [below, above] = interpolateComplex(values, source, [0, 4]);
        expect(below).toEqual(complex(-1, -2));
        expect(above).toEqual(complex(3, 6));
    });

    it('should refuse to extrapolate in error mode', () => {
        expect(() => interpolateComplex(values, source, [4], 'error')).toThrow(/outside the source range/);
        expect(interpolateComplex(values, source, [2], 'error')[0]).toEqual(complex(1, 2));
    });

    it('should hold a single sample constant', () => {
        const one = [complex(0.5, 0.5)];
        expect(interpolateComplex(one, [5], [1, 5, 9])).toEqual([one[0], one[0], one[0]]);
    });

    it('should pick the right segment on a longer axis', () => {
        const ramp = [0, 1, 2, 3, 4].map(i => complex(i * 10, 0));
        const [v] = interpolateComplex(ramp, [0, 1, 2, 3, 4], [2.5]);
        expect(v.real).toBeCloseTo(25, 12);
    });

    it('should reject mismatched or empty inputs', () => {
        expect(() => interpolateComplex(values, [1], [1])).toThrow(ValidationError);
        expect(() => interpolateComplex([], [], [1])).toThrow(ValidationError);
    });
});

describe('resampleNetwork', () => {
    it('should return the same network when axes agree', () => {
        const network = createConstantNetwork([1, 2], THRU);
        expect(resampleNetwork(network, [1, 2])).toBe(network);
        expect(sameFrequencyAxis([1, 2], [1, 2])).toBe(true);
        expect(sameFrequencyAxis([1, 2], [1, 2.5])).toBe(false);
        expect(sameFrequencyAxis([1, 2], [1])).toBe(false);
    });

    it('should move every parameter onto the target axis', () => {
        const network = createTwoPortNetwork({
            frequencies: [1, 3],
            s11: [Complex.ZERO, complex(0.2, 0)],
            s12: [Complex.ONE, Complex.ONE],
            s21: [Complex.ONE, Complex.ONE],
            s22: [Complex.ZERO, complex(0, 0.4)],
            z0: 75,
        });
        const resampled = resampleNetwork(network, [2]);
        expect(resampled.frequencies).toEqual([2]);
        expect(resampled.z0).toBe(75);
        expect(complexClose(resampled.s11[0], complex(0.1, 0))).toBe(true);
        expect(complexClose(resampled.s22[0], complex(0, 0.2))).toBe(true);
    });

    it('should keep the one-port tag', () => {
        const onePort = createOnePortNetwork({ frequencies: [1, 3], s11: [Complex.ZERO, complex(0.4, 0)] });
        const resampled = resampleNetwork(onePort, [2]);
        expect(resampled.portCount).toBe(1);
        expect(Object.isFrozen(resampled)).toBe(true);
    });
});

// ==================== Lumped Elements ====================

describe('lumped elements', () => {
    it('should compute ideal reactances', () => {
        const f = 1e9;
        const omega = 2 * Math.PI * f;
        expect(elementImpedance(ComponentKind.Capacitor, 1e-12, f).imag).toBeCloseTo(-1 / (omega * 1e-12), 9);
        expect(elementImpedance(ComponentKind.Inductor, 1e-9, f).imag).toBeCloseTo(omega * 1e-9, 9);
        expect(elementImpedance(ComponentKind.Capacitor, 1e-12, 0)).toEqual(new Complex(0, -1e12));
    });

    it('should validate value ranges and order', () => {
        const base = { kind: ComponentKind.Capacitor, role: ConnectionRole.InLine, order: 0 } as const;
        expect(() => validateLumpedElement({ ...base, value: 1e-12 })).not.toThrow();
        expect(() => validateLumpedElement({ ...base, value: 0 })).toThrow(/positive/);
        expect(() => validateLumpedElement({ ...base, value: 1e-3 })).toThrow(/outside valid range/);
        expect(() => validateLumpedElement({ ...base, value: 1e-12, order: 5 })).toThrow(/order/);
        expect(() => validateLumpedElement({
            kind: ComponentKind.Inductor, value: 1e-13, role: ConnectionRole.ToGround, order: 1,
        })).toThrow(ValidationError);
    });

    it('should build a symmetric reciprocal two-port', () => {
        // Series 100 Ω reactance: S11 = j100/(j100 + 100)
        const f = 1e9;
        const value = 100 / (2 * Math.PI * f);
        const network = createLumpedElementNetwork(
            { kind: ComponentKind.Inductor, value, role: ConnectionRole.InLine, order: 1 },
            [f]
        );
        expect(network.name).toBe('L1');
        expect(complexClose(network.s11[0], complex(0.5, 0.5), 1e-12)).toBe(true);
        expect(complexClose(network.s21[0], complex(0.5, -0.5), 1e-12)).toBe(true);
        expect(network.s22[0]).toBe(network.s11[0]);
        expect(network.s12[0]).toBe(network.s21[0]);
    });

    it('should build a one-port for an element to ground', () => {
        // Shunt 50 Ω reactance: S11 = (j50 − 50)/(j50 + 50) = j
        const f = 1e9;
        const value = 50 / (2 * Math.PI * f);
        const network = createLumpedElementNetwork(
            { kind: ComponentKind.Inductor, value, role: ConnectionRole.ToGround, order: 0 },
            [f]
        );
        expect(network.portCount).toBe(1);
        expect(network.name).toBe('L0');
        expect(complexClose(network.s11[0], complex(0, 1), 1e-12)).toBe(true);
    });
});
