/**
 * @module network/frequency-series
 * @description Construction and validation of frequency series and two-port networks
 *
 * Everything that reaches the cascade engine passes through these constructors,
 * so malformed inputs are rejected here and nowhere else.
 */

import { Complex } from '../numeric/complex';
import { ValidationError } from '../../core/errors';
import type { FrequencySeries, PortCount, ScatteringPoint, TwoPortNetwork } from './types';

// ==================== Validation ====================

/**
 * Validate a frequency axis: non-empty, finite, non-negative, strictly increasing
 */
export function validateFrequencies(frequencies: readonly number[], label = 'frequency axis'): void {
    if (frequencies.length === 0) {
        throw new ValidationError(`${label} must not be empty`);
    }
    for (let i = 0; i < frequencies.length; i++) {
        const f = frequencies[i];
        if (!Number.isFinite(f) || f < 0) {
            throw new ValidationError(`${label}: frequency at index ${i} is not a finite non-negative number`, {
                index: i,
                value: f,
            });
        }
        if (i > 0 && f <= frequencies[i - 1]) {
            throw new ValidationError(`${label} must be strictly increasing (index ${i})`, {
                index: i,
                previous: frequencies[i - 1],
                value: f,
            });
        }
    }
}

function validateArray(name: string, values: readonly Complex[], expectedLength: number): void {
    if (values.length !== expectedLength) {
        throw new ValidationError(
            `'${name}' has ${values.length} points, expected ${expectedLength}`,
            { name, length: values.length, expectedLength }
        );
    }
    for (let i = 0; i < values.length; i++) {
        if (!values[i].isFinite()) {
            throw new ValidationError(`'${name}' has a non-finite value at index ${i}`, { name, index: i });
        }
    }
}

/**
 * Validate a reference impedance
 */
export function validateReferenceImpedance(z0: number): void {
    if (!Number.isFinite(z0) || z0 <= 0) {
        throw new ValidationError(`Reference impedance must be a positive number, got ${z0}`, { z0 });
    }
}

// ==================== Frequency Series ====================

/**
 * Create a frozen frequency series
 */
export function createFrequencySeries(
    frequencies: readonly number[],
    data: Record<string, readonly Complex[]>
): FrequencySeries {
    validateFrequencies(frequencies);
    const names = Object.keys(data);
    if (names.length === 0) {
        throw new ValidationError('A frequency series needs at least one named array');
    }

    const frozen: Record<string, readonly Complex[]> = {};
    for (const name of names) {
        validateArray(name, data[name], frequencies.length);
        frozen[name] = Object.freeze([...data[name]]);
    }

    return Object.freeze({
        frequencies: Object.freeze([...frequencies]),
        data: Object.freeze(frozen),
    });
}

// ==================== Two-Port Networks ====================

/**
 * Input for a measured two-port
 */
export interface TwoPortInput {
    name?: string;
    frequencies: readonly number[];
    s11: readonly Complex[];
    s12: readonly Complex[];
    s21: readonly Complex[];
    s22: readonly Complex[];
    /** Reference impedance in Ohms (default 50) */
    z0?: number;
}

/**
 * Input for one-port data (reflection only)
 */
export interface OnePortInput {
    name?: string;
    frequencies: readonly number[];
    s11: readonly Complex[];
    /** Reference impedance in Ohms (default 50) */
    z0?: number;
}

function freezeNetwork(
    series: FrequencySeries,
    s: Record<'s11' | 's12' | 's21' | 's22', readonly Complex[]>,
    z0: number,
    portCount: PortCount,
    name?: string
): TwoPortNetwork {
    return Object.freeze({
        ...(name !== undefined ? { name } : {}),
        frequencies: series.frequencies,
        s11: s.s11,
        s12: s.s12,
        s21: s.s21,
        s22: s.s22,
        z0,
        portCount,
    });
}

/**
 * Create a two-port network from four measured S-parameter arrays
 */
export function createTwoPortNetwork(input: TwoPortInput): TwoPortNetwork {
    const z0 = input.z0 ?? 50;
    validateReferenceImpedance(z0);
    const series = createFrequencySeries(input.frequencies, {
        s11: input.s11,
        s12: input.s12,
        s21: input.s21,
        s22: input.s22,
    });
    return freezeNetwork(series, {
        s11: series.data.s11,
        s12: series.data.s12,
        s21: series.data.s21,
        s22: series.data.s22,
    }, z0, 2, input.name);
}

/**
 * Create a network from one-port reflection data.
 *
 * The element is treated as reciprocal and symmetric: S12, S21 and S22 all take
 * the value of S11. The result is tagged `portCount: 1`.
 */
export function createOnePortNetwork(input: OnePortInput): TwoPortNetwork {
    const z0 = input.z0 ?? 50;
    validateReferenceImpedance(z0);
    const series = createFrequencySeries(input.frequencies, { s11: input.s11 });
    const s11 = series.data.s11;
    return freezeNetwork(series, { s11, s12: s11, s21: s11, s22: s11 }, z0, 1, input.name);
}

/**
 * Network with constant S-parameters on a frequency axis
 */
export function createConstantNetwork(
    frequencies: readonly number[],
    point: ScatteringPoint,
    z0 = 50,
    name?: string
): TwoPortNetwork {
    const fill = (value: Complex): Complex[] => frequencies.map(() => value);
    return createTwoPortNetwork({
        name,
        frequencies,
        s11: fill(point.s11),
        s12: fill(point.s12),
        s21: fill(point.s21),
        s22: fill(point.s22),
        z0,
    });
}

/**
 * S-parameters at one frequency index
 */
export function scatteringAt(network: TwoPortNetwork, index: number): ScatteringPoint {
    if (!Number.isInteger(index) || index < 0 || index >= network.frequencies.length) {
        throw new ValidationError(`Frequency index ${index} out of range`, {
            index,
            length: network.frequencies.length,
        });
    }
    return {
        s11: network.s11[index],
        s12: network.s12[index],
        s21: network.s21[index],
        s22: network.s22[index],
    };
}

/**
 * (min, max) frequency of a network in Hz
 */
export function frequencyRange(network: TwoPortNetwork): [number, number] {
    return [network.frequencies[0], network.frequencies[network.frequencies.length - 1]];
}
