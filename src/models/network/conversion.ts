/**
 * @module network/conversion
 * @description S-parameter ⇄ ABCD (transmission matrix) conversion for two-ports
 *
 * Closed-form conversions for a common real reference impedance Z0
 * (Pozar, Microwave Engineering, table 4.2). Near-zero denominators are
 * floored to {@link MATRIX_EPSILON} rather than reported.
 */

import { Complex, floorMagnitude } from '../numeric/complex';
import type { AbcdMatrix, AbcdSeries, ScatteringPoint, TwoPortNetwork } from './types';

/** Floor applied to conversion denominators */
export const MATRIX_EPSILON = 1e-12;

export const IDENTITY_MATRIX: AbcdMatrix = Object.freeze({
    a: Complex.ONE,
    b: Complex.ZERO,
    c: Complex.ZERO,
    d: Complex.ONE,
});

// ==================== Single Point ====================

/**
 * Convert one S-parameter quadruple to an ABCD matrix.
 *
 * A = ((1+S11)(1−S22) + S12·S21) / 2S21
 * B = Z0·((1+S11)(1+S22) − S12·S21) / 2S21
 * C = ((1−S11)(1−S22) − S12·S21) / (Z0·2S21)
 * D = ((1−S11)(1+S22) + S12·S21) / 2S21
 */
export function toMatrix(s11: Complex, s12: Complex, s21: Complex, s22: Complex, z0: number): AbcdMatrix {
    // Near-infinite isolation
    const denom = floorMagnitude(s21.scale(2), MATRIX_EPSILON);

    const onePlus11 = s11.offset(1);
    const oneMinus11 = Complex.ONE.subtract(s11);
    const onePlus22 = s22.offset(1);
    const oneMinus22 = Complex.ONE.subtract(s22);
    const s12s21 = s12.multiply(s21);

    return {
        a: onePlus11.multiply(oneMinus22).add(s12s21).divide(denom),
        b: onePlus11.multiply(onePlus22).subtract(s12s21).divide(denom).scale(z0),
        c: oneMinus11.multiply(oneMinus22).subtract(s12s21).divide(denom).scale(1 / z0),
        d: oneMinus11.multiply(onePlus22).add(s12s21).divide(denom),
    };
}

/**
 * Convert an ABCD matrix back to S-parameters.
 *
 * With Δ = A + B/Z0 + C·Z0 + D:
 * S11 = (A + B/Z0 − C·Z0 − D) / Δ
 * S12 = 2(AD − BC) / Δ
 * S21 = 2 / Δ
 * S22 = (−A + B/Z0 − C·Z0 + D) / Δ
 */
export function toScattering(matrix: AbcdMatrix, z0: number): ScatteringPoint {
    const { a, b, c, d } = matrix;
    const bOverZ0 = b.scale(1 / z0);
    const cTimesZ0 = c.scale(z0);

    const denom = floorMagnitude(a.add(bOverZ0).add(cTimesZ0).add(d), MATRIX_EPSILON);

    return {
        s11: a.add(bOverZ0).subtract(cTimesZ0).subtract(d).divide(denom),
        s12: a.multiply(d).subtract(b.multiply(c)).scale(2).divide(denom),
        s21: new Complex(2, 0).divide(denom),
        s22: a.negate().add(bOverZ0).subtract(cTimesZ0).add(d).divide(denom),
    };
}

/**
 * 2×2 complex matrix product x·y
 */
export function multiplyMatrices(x: AbcdMatrix, y: AbcdMatrix): AbcdMatrix {
    return {
        a: x.a.multiply(y.a).add(x.b.multiply(y.c)),
        b: x.a.multiply(y.b).add(x.b.multiply(y.d)),
        c: x.c.multiply(y.a).add(x.d.multiply(y.c)),
        d: x.c.multiply(y.b).add(x.d.multiply(y.d)),
    };
}

/**
 * Determinant AD − BC (1 for reciprocal networks)
 */
export function determinant(matrix: AbcdMatrix): Complex {
    return matrix.a.multiply(matrix.d).subtract(matrix.b.multiply(matrix.c));
}

// ==================== Batched ====================

/**
 * ABCD matrix of a network at every frequency point
 */
export function networkToMatrices(network: TwoPortNetwork): AbcdMatrix[] {
    const result: AbcdMatrix[] = new Array(network.frequencies.length);
    for (let i = 0; i < network.frequencies.length; i++) {
        result[i] = toMatrix(network.s11[i], network.s12[i], network.s21[i], network.s22[i], network.z0);
    }
    return result;
}

/**
 * Per-frequency product of two matrix series of equal length
 */
export function multiplySeries(x: AbcdSeries, y: AbcdSeries): AbcdMatrix[] {
    const result: AbcdMatrix[] = new Array(x.length);
    for (let i = 0; i < x.length; i++) {
        result[i] = multiplyMatrices(x[i], y[i]);
    }
    return result;
}

/**
 * Convert a matrix series back to S-parameter arrays
 */
export function matricesToScattering(
    series: AbcdSeries,
    z0: number
): { s11: Complex[]; s12: Complex[]; s21: Complex[]; s22: Complex[] } {
    const s11: Complex[] = [];
    const s12: Complex[] = [];
    const s21: Complex[] = [];
    const s22: Complex[] = [];
    for (const matrix of series) {
        const point = toScattering(matrix, z0);
        s11.push(point.s11);
        s12.push(point.s12);
        s21.push(point.s21);
        s22.push(point.s22);
    }
    return { s11, s12, s21, s22 };
}
