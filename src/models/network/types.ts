/**
 * @module network/types
 * @description Type definitions for networks, matrices and connection roles
 */

import type { Complex } from '../numeric/complex';

// ==================== Enumerations ====================

/**
 * How an element is connected between the device and the load
 */
export enum ConnectionRole {
    /** Series element, placed in the signal path */
    InLine = 'in-line',
    /** Shunt element, placed from the signal path to ground */
    ToGround = 'to-ground',
}

/**
 * Electrical behaviour of a catalog element
 */
export enum ComponentKind {
    Capacitor = 'capacitor',
    Inductor = 'inductor',
    Unknown = 'unknown',
}

/**
 * Number of ports measured in the source data.
 *
 * One-port data carry only a reflection parameter; the remaining three
 * S-parameters are filled with S11 when the network is built.
 */
export type PortCount = 1 | 2;

/**
 * Behaviour of the resampler outside a network's native frequency range
 */
export type ExtrapolationMode = 'linear' | 'error';

// ==================== Series ====================

/**
 * Strictly increasing frequency axis with named complex arrays of equal length
 */
export interface FrequencySeries {
    /** Frequency points in Hz */
    readonly frequencies: readonly number[];
    /** Named complex arrays, each the length of `frequencies` */
    readonly data: Readonly<Record<string, readonly Complex[]>>;
}

export type SParameterName = 's11' | 's12' | 's21' | 's22';

export const S_PARAMETER_NAMES: readonly SParameterName[] = ['s11', 's12', 's21', 's22'];

/**
 * The four scattering parameters at one frequency
 */
export interface ScatteringPoint {
    s11: Complex;
    s12: Complex;
    s21: Complex;
    s22: Complex;
}

/**
 * A two-port network: device under test or catalog element
 */
export interface TwoPortNetwork {
    /** Optional label (file name, part number) */
    readonly name?: string;
    /** Frequency points in Hz, strictly increasing */
    readonly frequencies: readonly number[];
    readonly s11: readonly Complex[];
    readonly s12: readonly Complex[];
    readonly s21: readonly Complex[];
    readonly s22: readonly Complex[];
    /** Reference impedance in Ohms */
    readonly z0: number;
    /** Ports present in the source data */
    readonly portCount: PortCount;
}

/**
 * Transmission (ABCD) matrix at one frequency
 *
 *   [V1]   [A  B] [ V2]
 *   [I1] = [C  D] [-I2]
 */
export interface AbcdMatrix {
    readonly a: Complex;
    readonly b: Complex;
    readonly c: Complex;
    readonly d: Complex;
}

/**
 * ABCD matrices on a network's frequency axis
 */
export type AbcdSeries = readonly AbcdMatrix[];
