/**
 * @module utils/statistics
 * @description Reductions over numeric arrays
 */

import { ValidationError } from '../../core/errors';

/**
 * Compute the mean of an array
 *
 * @param arr - Numeric array
 * @returns Mean value
 */
export function mean(arr: readonly number[]): number {
    if (arr.length === 0) {
        throw new ValidationError('Array cannot be empty');
    }
    return arr.reduce((sum, val) => sum + val, 0) / arr.length;
}

/**
 * Largest element, ignoring NaN. Returns NaN when nothing compares.
 */
export function maxValue(arr: readonly number[]): number {
    let best = Number.NaN;
    for (const value of arr) {
        if (!Number.isNaN(value) && (Number.isNaN(best) || value > best)) {
            best = value;
        }
    }
    return best;
}
