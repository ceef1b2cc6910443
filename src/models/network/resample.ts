/**
 * @module network/resample
 * @description Linear resampling of complex responses onto another frequency axis
 *
 * Real and imaginary parts are interpolated independently. Outside the source
 * range the outermost segment is extended linearly (`'linear'`), or the request is
 * refused with a ValidationError (`'error'`).
 */

import { Complex } from '../numeric/complex';
import { ValidationError } from '../../core/errors';
import { createTwoPortNetwork } from './frequency-series';
import type { ExtrapolationMode, TwoPortNetwork } from './types';

/**
 * Index of the segment [i, i+1] used for `f` (clamped to the first/last segment)
 */
function segmentIndex(frequencies: readonly number[], f: number): number {
    let lo = 0;
    let hi = frequencies.length - 1;
    if (f <= frequencies[0]) return 0;
    if (f >= frequencies[hi]) return hi - 1;
    while (hi - lo > 1) {
        const mid = (lo + hi) >> 1;
        if (frequencies[mid] <= f) {
            lo = mid;
        } else {
            hi = mid;
        }
    }
    return lo;
}

/**
 * Interpolate a complex array onto `targetFreq`
 */
export function interpolateComplex(
    values: readonly Complex[],
    sourceFreq: readonly number[],
    targetFreq: readonly number[],
    mode: ExtrapolationMode = 'linear'
): Complex[] {
    if (values.length !== sourceFreq.length || values.length === 0) {
        throw new ValidationError(
            `Cannot interpolate ${values.length} values on ${sourceFreq.length} frequencies`,
            { values: values.length, frequencies: sourceFreq.length }
        );
    }

    const first = sourceFreq[0];
    const last = sourceFreq[sourceFreq.length - 1];

    return targetFreq.map(f => {
        if (mode === 'error' && (f < first || f > last)) {
            throw new ValidationError(
                `Frequency ${f} Hz is outside the source range [${first}, ${last}] Hz`,
                { frequency: f, min: first, max: last }
            );
        }
        if (values.length === 1) {
            return values[0];
        }
        const i = segmentIndex(sourceFreq, f);
        const f0 = sourceFreq[i];
        const f1 = sourceFreq[i + 1];
        const t = (f - f0) / (f1 - f0);
        const v0 = values[i];
        const v1 = values[i + 1];
        return new Complex(
            v0.real + t * (v1.real - v0.real),
            v0.imag + t * (v1.imag - v0.imag)
        );
    });
}

/**
 * Whether two frequency axes are identical point for point
 */
export function sameFrequencyAxis(a: readonly number[], b: readonly number[]): boolean {
    if (a === b) return true;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Resample all four S-parameters of a network onto `targetFreq`.
 *
 * Returns the network unchanged when the axes already agree. The port count
 * tag is carried over.
 */
export function resampleNetwork(
    network: TwoPortNetwork,
    targetFreq: readonly number[],
    mode: ExtrapolationMode = 'linear'
): TwoPortNetwork {
    if (sameFrequencyAxis(network.frequencies, targetFreq)) {
        return network;
    }
    const resampled = createTwoPortNetwork({
        name: network.name,
        frequencies: targetFreq,
        s11: interpolateComplex(network.s11, network.frequencies, targetFreq, mode),
        s12: interpolateComplex(network.s12, network.frequencies, targetFreq, mode),
        s21: interpolateComplex(network.s21, network.frequencies, targetFreq, mode),
        s22: interpolateComplex(network.s22, network.frequencies, targetFreq, mode),
        z0: network.z0,
    });
    if (network.portCount === 1) {
        const onePort: TwoPortNetwork = { ...resampled, portCount: 1 };
        return Object.freeze(onePort);
    }
    return resampled;
}
