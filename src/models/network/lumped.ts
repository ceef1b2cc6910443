/**
 * @module network/lumped
 * @description Ideal lumped capacitors and inductors
 *
 * Used to synthesize element networks from continuous values (F or H) when no
 * measured data exists for them.
 */

import { Complex } from '../numeric/complex';
import { ValidationError } from '../../core/errors';
import { createOnePortNetwork, createTwoPortNetwork } from './frequency-series';
import { ComponentKind, ConnectionRole } from './types';
import type { TwoPortNetwork } from './types';

// ==================== Types ====================

/**
 * A lumped element with a value and a placement in the section
 */
export interface LumpedElement {
    kind: ComponentKind.Capacitor | ComponentKind.Inductor;
    /** Value in Farads (capacitor) or Henries (inductor) */
    value: number;
    role: ConnectionRole;
    /** Position from the device side, 0-4 */
    order: number;
}

/** Valid value ranges per kind, in base units */
export const LUMPED_VALUE_RANGES = {
    [ComponentKind.Capacitor]: { min: 1e-15, max: 1e-4 },
    [ComponentKind.Inductor]: { min: 1e-12, max: 1e-1 },
} as const;

/** Elements per section, one port */
export const MAX_ELEMENTS = 5;

// ==================== Validation ====================

export function validateLumpedElement(element: LumpedElement): void {
    if (!(element.value > 0)) {
        throw new ValidationError(`Component value must be positive, got ${element.value}`);
    }
    const range = LUMPED_VALUE_RANGES[element.kind];
    if (element.value < range.min || element.value > range.max) {
        throw new ValidationError(
            `${element.kind} value ${element.value} outside valid range [${range.min}, ${range.max}]`,
            { kind: element.kind, value: element.value, ...range }
        );
    }
    if (!Number.isInteger(element.order) || element.order < 0 || element.order >= MAX_ELEMENTS) {
        throw new ValidationError(
            `Component order ${element.order} invalid, must be 0-${MAX_ELEMENTS - 1}`,
            { order: element.order }
        );
    }
}

// ==================== Impedance ====================

/**
 * Impedance of an ideal element: 1/(jωC) or jωL
 */
export function elementImpedance(kind: LumpedElement['kind'], value: number, frequency: number): Complex {
    const omega = 2 * Math.PI * frequency;
    switch (kind) {
        case ComponentKind.Capacitor:
            // Open at DC
            return omega === 0 ? new Complex(0, -1e12) : new Complex(0, -1 / (omega * value));
        case ComponentKind.Inductor:
            return new Complex(0, omega * value);
    }
}

/**
 * Network of an ideal element for its connection role.
 *
 * In line: two-port of a series impedance Z in a Z0 system,
 * S11 = S22 = Z/(Z+2Z0), S21 = S12 = 2Z0/(Z+2Z0).
 * To ground: one-port with S11 = (Z−Z0)/(Z+Z0), so the shunt matrix reads Z back.
 */
export function createLumpedElementNetwork(
    element: LumpedElement,
    frequencies: readonly number[],
    z0 = 50
): TwoPortNetwork {
    validateLumpedElement(element);
    const name = `${element.kind === ComponentKind.Capacitor ? 'C' : 'L'}${element.order}`;
    const impedances = frequencies.map(f => elementImpedance(element.kind, element.value, f));

    switch (element.role) {
        case ConnectionRole.InLine: {
            const s11 = impedances.map(z => z.divide(z.offset(2 * z0)));
            const s21 = impedances.map(z => new Complex(2 * z0, 0).divide(z.offset(2 * z0)));
            return createTwoPortNetwork({ name, frequencies, s11, s12: s21, s21, s22: s11, z0 });
        }
        case ConnectionRole.ToGround:
            return createOnePortNetwork({
                name,
                frequencies,
                s11: impedances.map(z => z.offset(-z0).divide(z.offset(z0))),
                z0,
            });
        default: {
            const unreachable: never = element.role;
            throw new ValidationError(`Unknown connection role: ${String(unreachable)}`);
        }
    }
}
