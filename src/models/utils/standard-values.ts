/**
 * @module utils/standard-values
 * @description E12, E24 and E96 preferred-value series
 */

import { ValidationError } from '../../core/errors';
import E_SERIES from './e-series.json';

export type StandardSeries = 'E12' | 'E24' | 'E96';

export const STANDARD_SERIES: readonly StandardSeries[] = ['E12', 'E24', 'E96'];

/**
 * Mantissas of one decade, from 1.0 up
 */
export function seriesMantissas(series: StandardSeries): readonly number[] {
    return E_SERIES[series];
}

/**
 * Every value of a series within [min, max], ascending
 *
 * @example
 * ```typescript
 * standardValues('E12', 1e-12, 1e-11); // [1e-12, 1.2e-12, ..., 8.2e-12, 1e-11]
 * ```
 */
export function standardValues(series: StandardSeries, min: number, max: number): number[] {
    if (!(min > 0) || !(max >= min) || !Number.isFinite(max)) {
        throw new ValidationError(`Invalid value range [${min}, ${max}]`, { min, max });
    }
    const values: number[] = [];
    const first = Math.floor(Math.log10(min));
    const last = Math.ceil(Math.log10(max));
    for (let exponent = first; exponent <= last; exponent++) {
        for (const mantissa of seriesMantissas(series)) {
            // Divide for negative exponents: 1 / 1e12 is exactly 1e-12
            const value = exponent < 0 ? mantissa / 10 ** -exponent : mantissa * 10 ** exponent;
            if (value >= min && value <= max) {
                values.push(value);
            }
        }
    }
    return values;
}

/**
 * Nearest value of an ascending list; the smaller one on a tie
 */
export function snapToStandard(value: number, values: readonly number[]): number {
    if (values.length === 0) {
        throw new ValidationError('No standard values to snap to');
    }
    let best = values[0];
    for (const candidate of values) {
        if (Math.abs(candidate - value) < Math.abs(best - value)) {
            best = candidate;
        }
    }
    return best;
}
