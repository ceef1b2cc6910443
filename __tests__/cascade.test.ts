/**
 * Cascade Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/core/errors';
import { L_SECTION } from '../src/matching/topology';
import {
    cascade,
    cascadeNetworks,
    createConstantNetwork,
    createLumpedElementNetwork,
    createOnePortNetwork,
    createTwoPortNetwork,
    shuntMatrix,
} from '../src/models/network';
import type { CascadeElement } from '../src/models/network';
import { ComponentKind, ConnectionRole } from '../src/models/network/types';
import { Complex, complex } from '../src/models/numeric/complex';
import { THRU, complexClose, maxComplexError } from './test-utils';

const F = 1e9;

function lumped(
    kind: ComponentKind.Capacitor | ComponentKind.Inductor,
    value: number,
    role: ConnectionRole,
    position: number,
    frequencies: readonly number[] = [F]
): CascadeElement {
    return {
        network: createLumpedElementNetwork({ kind, value, role, order: position }, frequencies),
        role,
        position,
    };
}

const device = createTwoPortNetwork({
    name: 'dut',
    frequencies: [0.9e9, 1e9, 1.1e9],
    s11: [complex(0.5, 0.1), complex(0.45, 0.15), complex(0.4, 0.2)],
    s12: [complex(0.7, 0.1), complex(0.7, 0.15), complex(0.7, 0.2)],
    s21: [complex(0.7, 0.1), complex(0.7, 0.15), complex(0.7, 0.2)],
    s22: [complex(0.1, 0), complex(0.1, 0.05), complex(0.1, 0.1)],
});

describe('shuntMatrix', () => {
    it('should place the admittance of the element impedance in C', () => {
        // S11 = 1/3 ⇒ Z = 50·(4/3)/(2/3) = 100 Ω
        const m = shuntMatrix(complex(1 / 3, 0), 50);
        expect(m.a).toBe(Complex.ONE);
        expect(m.b).toBe(Complex.ZERO);
        expect(m.d).toBe(Complex.ONE);
        expect(complexClose(m.c, complex(0.01, 0), 1e-12)).toBe(true);
    });

    it('should stay finite for a perfect open and a perfect short', () => {
        expect(shuntMatrix(Complex.ONE, 50).c.isFinite()).toBe(true);
        expect(shuntMatrix(complex(-1, 0), 50).c.isFinite()).toBe(true);
    });
});

describe('cascade', () => {
    it('should return the device parameters when there are no elements', () => {
        const result = cascade(device, []);
        expect(maxComplexError(result.network.s11, device.s11)).toBeLessThan(1e-6);
        expect(maxComplexError(result.network.s12, device.s12)).toBeLessThan(1e-6);
        expect(maxComplexError(result.network.s21, device.s21)).toBeLessThan(1e-6);
        expect(maxComplexError(result.network.s22, device.s22)).toBeLessThan(1e-6);
        expect(result.network.name).toBe('dut');
        expect(result.layout).toBeUndefined();
    });

    it('should keep the device frequency axis and reference impedance', () => {
        const element = lumped(ComponentKind.Capacitor, 1e-12, ConnectionRole.InLine, 0, [0.5e9, 1.5e9]);
        const result = cascade(device, [element]);
        expect(result.frequencies).toBe(device.frequencies);
        expect(result.network.frequencies).toEqual(device.frequencies);
        expect(result.network.z0).toBe(device.z0);
        expect(result.network.portCount).toBe(2);
        expect(result.elements).toEqual([element]);
        expect(Object.isFrozen(result)).toBe(true);
    });

    it('should add a series element to a thru', () => {
        // Thru + series 100 Ω: S11 = 100/(100 + 100) = 0.5
        const resistor = createConstantNetwork([F], {
            s11: complex(0.5, 0),
            s12: complex(0.5, 0),
            s21: complex(0.5, 0),
            s22: complex(0.5, 0),
        });
        const thru = createConstantNetwork([F], THRU);
        const result = cascade(thru, [{ network: resistor, role: ConnectionRole.InLine, position: 0 }]);
        expect(complexClose(result.network.s11[0], complex(0.5, 0), 1e-12)).toBe(true);
        expect(complexClose(result.network.s21[0], complex(0.5, 0), 1e-12)).toBe(true);
    });

    it('should shunt the element input impedance to ground', () => {
        // One-port S11 = 1/3 ⇒ 100 Ω to ground; with the 50 Ω load: 100 ∥ 50 = 33.3 Ω ⇒ S11 = −0.2
        const shunt = createOnePortNetwork({ frequencies: [F], s11: [complex(1 / 3, 0)] });
        const thru = createConstantNetwork([F], THRU);
        const result = cascade(thru, [{ network: shunt, role: ConnectionRole.ToGround, position: 0 }]);
        expect(complexClose(result.network.s11[0], complex(-0.2, 0), 1e-12)).toBe(true);
    });

    it('should short the port through a large ideal capacitor to ground', () => {
        // 100 µF at 1 GHz is about −j1.6 µΩ across the 50 Ω load
        const thru = createConstantNetwork([F], THRU);
        const shunt = lumped(ComponentKind.Capacitor, 1e-4, ConnectionRole.ToGround, 0);
        const s11 = cascade(thru, [shunt]).network.s11[0];
        expect(s11.magnitude()).toBeGreaterThan(0.99);
        expect(s11.real).toBeCloseTo(-1, 6);
    });

    it('should see the ideal reactance of an element to ground', () => {
        // Shunt −j50 Ω with the 50 Ω load: Zin = 25 − 25j ⇒ S11 = (−25 − 25j)/(75 − 25j) = −0.2 − 0.4j
        const value = 1 / (2 * Math.PI * F * 50);
        const thru = createConstantNetwork([F], THRU);
        const shunt = lumped(ComponentKind.Capacitor, value, ConnectionRole.ToGround, 0);
        const s11 = cascade(thru, [shunt]).network.s11[0];
        expect(complexClose(s11, complex(-0.2, -0.4), 1e-9)).toBe(true);
    });

    it('should not commute', () => {
        const thru = createConstantNetwork([F], THRU);
        const series = lumped(ComponentKind.Capacitor, 1e-12, ConnectionRole.InLine, 0);
        const shunt = lumped(ComponentKind.Inductor, 10e-9, ConnectionRole.ToGround, 1);
        const forward = cascade(thru, [series, { ...shunt, position: 1 }]).network.s11[0];
        const reverse = cascade(thru, [{ ...shunt, position: 0 }, { ...series, position: 1 }]).network.s11[0];
        expect(forward.subtract(reverse).magnitude()).toBeGreaterThan(0.1);
    });

    it('should check elements against a layout', () => {
        const series = lumped(ComponentKind.Capacitor, 1e-12, ConnectionRole.InLine, 0, device.frequencies);
        const shunt = lumped(ComponentKind.Inductor, 1e-9, ConnectionRole.ToGround, 1, device.frequencies);

        const result = cascade(device, [series, shunt], L_SECTION);
        expect(result.layout).toBe('L');

        expect(() => cascade(device, [series], L_SECTION)).toThrow(/takes 2 elements/);
        expect(() => cascade(device, [shunt, series], L_SECTION)).toThrow(ValidationError);
        expect(() => cascade(device, [series, { ...shunt, position: 3 }], L_SECTION)).toThrow(/position/);
    });

    it('should refuse extrapolation when asked to', () => {
        const narrow = lumped(ComponentKind.Capacitor, 1e-12, ConnectionRole.InLine, 0, [0.95e9, 1e9]);
        expect(() => cascade(device, [narrow], undefined, { extrapolation: 'error' })).toThrow(ValidationError);
        expect(() => cascade(device, [narrow])).not.toThrow();
    });
});

describe('cascadeNetworks', () => {
    it('should chain networks in line', () => {
        const half = complex(0.5, 0);
        const r100 = createConstantNetwork([F], { s11: half, s12: half, s21: half, s22: half });
        // Two series 100 Ω ⇒ 200 Ω: S11 = 200/300
        const chained = cascadeNetworks([r100, r100]);
        expect(complexClose(chained.s11[0], complex(2 / 3, 0), 1e-12)).toBe(true);
        expect(complexClose(chained.s21[0], complex(1 / 3, 0), 1e-12)).toBe(true);
    });

    it('should return a single network unchanged', () => {
        const thru = createConstantNetwork([F], THRU);
        expect(cascadeNetworks([thru])).toBe(thru);
    });

    it('should reject an empty list', () => {
        expect(() => cascadeNetworks([])).toThrow(ValidationError);
    });
});
