/**
 * @module utils/engineering
 * @description Engineering notation parsing and formatting (10pF, 2.2nH, 1.5GHz)
 */

import { ValidationError } from '../../core/errors';

/**
 * SI prefixes from largest to smallest. The empty prefix stands for 1.
 */
export const ENGINEERING_PREFIXES: ReadonlyArray<readonly [string, number]> = [
    ['G', 1e9],
    ['M', 1e6],
    ['k', 1e3],
    ['', 1],
    ['m', 1e-3],
    ['u', 1e-6],
    ['n', 1e-9],
    ['p', 1e-12],
    ['f', 1e-15],
];

const MULTIPLIERS: Readonly<Record<string, number>> = {
    ...Object.fromEntries(ENGINEERING_PREFIXES.filter(([prefix]) => prefix !== '')),
    'µ': 1e-6,
};

const NOTATION_PATTERN = /^(\d+\.?\d*)\s*([fpnuµmkMG]?)([A-Za-z]+)?$/;

/**
 * Parse a value written in engineering notation to base units
 *
 * @param text - Value such as `"10pF"`, `"2.2nH"`, `"100uH"` or `"1.5GHz"`
 * @param expectedUnit - Unit the value must carry (compared case-insensitively)
 * @returns Value in Farads, Henries, Hz, ...
 * @throws {ValidationError} if the text does not parse or the unit differs
 *
 * @example
 * ```typescript
 * parseEngineeringNotation('10pF');       // 1e-11
 * parseEngineeringNotation('2.2nH', 'H'); // 2.2e-9
 * parseEngineeringNotation('10pF', 'H');  // throws
 * ```
 */
export function parseEngineeringNotation(text: string, expectedUnit?: string): number {
    const match = NOTATION_PATTERN.exec(text.trim());
    if (!match) {
        throw new ValidationError(`Invalid engineering notation: '${text}'`, { text });
    }
    const [, numberText, prefix, unit] = match;

    let value = parseFloat(numberText);
    if (prefix) {
        value *= MULTIPLIERS[prefix];
    }

    if (expectedUnit) {
        if (!unit) {
            throw new ValidationError(`Missing unit in '${text}' (expected ${expectedUnit})`, { text, expectedUnit });
        }
        if (unit.toUpperCase() !== expectedUnit.toUpperCase()) {
            throw new ValidationError(`Unit mismatch: expected ${expectedUnit}, got ${unit}`, { text, expectedUnit, unit });
        }
    }
    return value;
}

/**
 * Format a value in base units with an SI prefix
 *
 * @param value - Value in base units
 * @param unit - Unit suffix (`'F'`, `'H'`, `'Hz'`)
 * @param precision - Decimal places
 *
 * @example
 * ```typescript
 * formatEngineeringNotation(1e-11, 'F');     // '10.00pF'
 * formatEngineeringNotation(2.2e-9, 'H', 1); // '2.2nH'
 * formatEngineeringNotation(2.4e9, 'Hz');    // '2.40GHz'
 * ```
 */
export function formatEngineeringNotation(value: number, unit = '', precision = 2): string {
    if (Math.abs(value) < 1e-15) {
        return `0${unit}`;
    }
    for (const [prefix, multiplier] of ENGINEERING_PREFIXES) {
        // Compare after rounding: 0.9999999e-12 prints as 1pF, not 1000fF
        const scaled = (value / multiplier).toFixed(precision);
        if (Math.abs(Number(scaled)) >= 1) {
            return `${scaled}${prefix}${unit}`;
        }
    }
    return `${value.toFixed(precision)}${unit}`;
}

/**
 * Short label with trailing zeros removed: `'10pF'`, `'2.2nH'`
 */
export function formatComponentValue(value: number, unit: string): string {
    const text = formatEngineeringNotation(value, unit, 3);
    return text.includes('.') ? text.replace(/\.?0+(?=\D*$)/, '') : text;
}
