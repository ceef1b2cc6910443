/**
 * @module metrics/reflection
 * @description Reflection-derived matching metrics: VSWR, return loss, impedance
 *
 * All functions are pure. Near-zero denominators are floored to
 * {@link METRIC_EPSILON}, so a short or an open gives a large finite VSWR and
 * never Infinity or NaN. Ranking code relies on that total order.
 */

import { Complex, floorMagnitude } from '../numeric/complex';
import { ValidationError } from '../../core/errors';

// ==================== Constants ====================

/** Floor for metric denominators and for |Γ| in logarithms */
export const METRIC_EPSILON = 1e-10;

/** Return loss cap in dB (reached for |Γ| ≤ 1e-5) */
export const MAX_RETURN_LOSS_DB = 100;

// ==================== Types ====================

/**
 * Metrics at one frequency
 */
export interface PointMetrics {
    readonly reflection: Complex;
    /** |Γ| */
    readonly magnitude: number;
    readonly vswr: number;
    readonly returnLossDb: number;
    /** Input impedance in Ohms */
    readonly impedance: Complex;
}

/**
 * Metrics across a band, one entry per frequency point
 */
export interface BandMetrics {
    readonly reflection: readonly Complex[];
    readonly magnitude: readonly number[];
    readonly vswr: readonly number[];
    readonly returnLossDb: readonly number[];
    readonly impedance: readonly Complex[];
}

export type MetricSet = PointMetrics | BandMetrics;

// ==================== Scalar Metrics ====================

/**
 * VSWR = (1+|Γ|)/(1−|Γ|), with the denominator floored at 1e-10
 */
export function vswr(magnitude: number): number {
    return (1 + magnitude) / Math.max(1 - magnitude, METRIC_EPSILON);
}

/**
 * Return loss in dB: −20·log10(|Γ|), capped at 100 dB
 */
export function returnLossDb(magnitude: number): number {
    const rl = -20 * Math.log10(Math.max(magnitude, METRIC_EPSILON));
    return Math.min(rl, MAX_RETURN_LOSS_DB);
}

/**
 * Mismatch loss in dB: −10·log10(1−|Γ|²)
 */
export function mismatchLossDb(magnitude: number): number {
    return -10 * Math.log10(Math.max(1 - magnitude * magnitude, METRIC_EPSILON));
}

/**
 * Input impedance Z = Z0·(1+Γ)/(1−Γ)
 */
export function impedanceFromReflection(gamma: Complex, z0: number): Complex {
    const denom = floorMagnitude(Complex.ONE.subtract(gamma), METRIC_EPSILON);
    return gamma.offset(1).scale(z0).divide(denom);
}

/**
 * Reflection coefficient of Z against a reference: Γ = (Z−Zref)/(Z+Zref)
 */
export function reflectionFromImpedance(impedance: Complex, reference: number): Complex {
    const denom = floorMagnitude(impedance.offset(reference), METRIC_EPSILON);
    return impedance.offset(-reference).divide(denom);
}

/**
 * Whether an impedance counts as matched to `target`.
 *
 * Either criterion is enough: |Z − target| ≤ tolerance, or the VSWR of Z
 * against the target is at most `vswrThreshold`.
 */
export function isMatched(
    impedance: Complex,
    target: number,
    tolerance: number,
    vswrThreshold: number
): boolean {
    if (impedance.offset(-target).magnitude() <= tolerance) {
        return true;
    }
    return vswr(reflectionFromImpedance(impedance, target).magnitude()) <= vswrThreshold;
}

// ==================== Metric Sets ====================

export function pointMetrics(reflection: Complex, z0: number): PointMetrics {
    const magnitude = reflection.magnitude();
    return Object.freeze({
        reflection,
        magnitude,
        vswr: vswr(magnitude),
        returnLossDb: returnLossDb(magnitude),
        impedance: impedanceFromReflection(reflection, z0),
    });
}

export function bandMetrics(reflection: readonly Complex[], z0: number): BandMetrics {
    const magnitude = reflection.map(g => g.magnitude());
    return Object.freeze({
        reflection: Object.freeze([...reflection]),
        magnitude: Object.freeze(magnitude),
        vswr: Object.freeze(magnitude.map(vswr)),
        returnLossDb: Object.freeze(magnitude.map(returnLossDb)),
        impedance: Object.freeze(reflection.map(g => impedanceFromReflection(g, z0))),
    });
}

// ==================== Frequency Selection ====================

/**
 * Index of the sample closest to `frequency` (the lower index wins a tie)
 */
export function nearestFrequencyIndex(frequencies: readonly number[], frequency: number): number {
    if (frequencies.length === 0) {
        throw new ValidationError('Cannot select a frequency from an empty axis');
    }
    let best = 0;
    let bestDistance = Math.abs(frequencies[0] - frequency);
    for (let i = 1; i < frequencies.length; i++) {
        const distance = Math.abs(frequencies[i] - frequency);
        if (distance < bestDistance) {
            best = i;
            bestDistance = distance;
        }
    }
    return best;
}

/**
 * Indices of the samples inside [min, max], inclusive
 */
export function bandIndices(frequencies: readonly number[], range: readonly [number, number]): number[] {
    const [min, max] = range;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
        throw new ValidationError(`Invalid frequency range [${min}, ${max}]`, { min, max });
    }
    const indices: number[] = [];
    frequencies.forEach((f, i) => {
        if (f >= min && f <= max) {
            indices.push(i);
        }
    });
    return indices;
}

/**
 * Total width in Hz of the contiguous runs where VSWR is strictly below
 * `threshold`. A run spans from its first to its last sample, so an isolated
 * sample adds nothing.
 */
export function calculateBandwidth(
    vswrValues: readonly number[],
    frequencies: readonly number[],
    threshold = 2.0
): number {
    if (vswrValues.length !== frequencies.length) {
        throw new ValidationError(
            `Cannot compute bandwidth from ${vswrValues.length} VSWR values on ${frequencies.length} frequencies`
        );
    }
    let bandwidth = 0;
    let start = -1;
    for (let i = 0; i < vswrValues.length; i++) {
        const inBand = vswrValues[i] < threshold;
        if (inBand && start < 0) {
            start = i;
        } else if (!inBand && start >= 0) {
            bandwidth += frequencies[i - 1] - frequencies[start];
            start = -1;
        }
    }
    if (start >= 0) {
        bandwidth += frequencies[frequencies.length - 1] - frequencies[start];
    }
    return bandwidth;
}
