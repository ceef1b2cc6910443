/**
 * @module network/cascade
 * @description Cascade a device with in-line and to-ground elements
 *
 * The device's ABCD matrix is right-multiplied by the matrix of each element in
 * order (source side first), then the product is converted back to S-parameters
 * on the device's frequency axis. Cascading is not commutative.
 */

import { Complex, floorMagnitude } from '../numeric/complex';
import { ValidationError } from '../../core/errors';
import {
    IDENTITY_MATRIX,
    MATRIX_EPSILON,
    matricesToScattering,
    multiplySeries,
    networkToMatrices,
} from './conversion';
import { createTwoPortNetwork } from './frequency-series';
import { resampleNetwork } from './resample';
import { ConnectionRole } from './types';
import type { AbcdMatrix, ExtrapolationMode, TwoPortNetwork } from './types';

// ==================== Types ====================

/**
 * A network placed at a position of a layout with a connection role
 */
export interface CascadeElement {
    readonly network: TwoPortNetwork;
    readonly role: ConnectionRole;
    /** Index within the layout */
    readonly position: number;
}

/**
 * Ordered connection roles of a matching section
 */
export interface CascadeLayout {
    readonly name: string;
    readonly roles: readonly ConnectionRole[];
}

export interface CascadeOptions {
    /** Behaviour when an element's data does not cover the device axis */
    extrapolation?: ExtrapolationMode;
}

/**
 * Equivalent network of a device followed by its elements
 */
export interface CascadeResult<E extends CascadeElement = CascadeElement> {
    /** Equivalent two-port on the device's frequency axis */
    readonly network: TwoPortNetwork;
    /** Frequency axis used (the device's) */
    readonly frequencies: readonly number[];
    /** Layout name, when one was given */
    readonly layout?: string;
    readonly elements: readonly E[];
}

// ==================== Element Matrices ====================

/**
 * ABCD matrix of an element shunted to ground: [[1, 0], [Y, 1]].
 *
 * Y = 1/Z with Z = Z0·(1+S11)/(1−S11), the element's own input impedance.
 */
export function shuntMatrix(s11: Complex, z0: number): AbcdMatrix {
    const denom = floorMagnitude(Complex.ONE.subtract(s11), MATRIX_EPSILON);
    const z = s11.offset(1).scale(z0).divide(denom);
    const y = floorMagnitude(z, MATRIX_EPSILON).reciprocal();
    return { a: Complex.ONE, b: Complex.ZERO, c: y, d: Complex.ONE };
}

function elementMatrices(network: TwoPortNetwork, role: ConnectionRole): AbcdMatrix[] {
    switch (role) {
        case ConnectionRole.InLine:
            return networkToMatrices(network);
        case ConnectionRole.ToGround:
            return network.s11.map(s11 => shuntMatrix(s11, network.z0));
        default: {
            const unreachable: never = role;
            throw new ValidationError(`Unknown connection role: ${String(unreachable)}`);
        }
    }
}

function checkLayout(elements: readonly CascadeElement[], layout: CascadeLayout): void {
    if (elements.length !== layout.roles.length) {
        throw new ValidationError(
            `${layout.name} takes ${layout.roles.length} elements, got ${elements.length}`,
            { layout: layout.name, expected: layout.roles.length, actual: elements.length }
        );
    }
    elements.forEach((element, i) => {
        if (element.position !== i || element.role !== layout.roles[i]) {
            throw new ValidationError(
                `Element ${i} of ${layout.name} must be ${layout.roles[i]} at position ${i}, ` +
                `got ${element.role} at position ${element.position}`,
                { layout: layout.name, index: i }
            );
        }
    });
}

// ==================== Cascade ====================

/**
 * Cascade a device with an ordered list of elements.
 *
 * With no elements the device's own S-parameters come back (through one
 * ABCD round trip). When a layout is given, the elements must match its roles
 * and positions.
 */
export function cascade<E extends CascadeElement>(
    device: TwoPortNetwork,
    elements: readonly E[],
    layout?: CascadeLayout,
    options: CascadeOptions = {}
): CascadeResult<E> {
    if (layout) {
        checkLayout(elements, layout);
    }
    const extrapolation = options.extrapolation ?? 'linear';

    let running: AbcdMatrix[] = networkToMatrices(device);
    for (const element of elements) {
        const aligned = resampleNetwork(element.network, device.frequencies, extrapolation);
        running = multiplySeries(running, elementMatrices(aligned, element.role));
    }

    const s = matricesToScattering(running, device.z0);
    const network = createTwoPortNetwork({
        name: device.name,
        frequencies: device.frequencies,
        ...s,
        z0: device.z0,
    });

    return Object.freeze({
        network,
        frequencies: device.frequencies,
        ...(layout ? { layout: layout.name } : {}),
        elements: Object.freeze([...elements]),
    });
}

/**
 * Chain several networks in line, starting from an identity matrix.
 *
 * All networks are resampled onto the first network's axis. A single network is
 * returned unchanged.
 */
export function cascadeNetworks(
    networks: readonly TwoPortNetwork[],
    options: CascadeOptions = {}
): TwoPortNetwork {
    if (networks.length === 0) {
        throw new ValidationError('No networks to cascade');
    }
    const [first] = networks;
    if (networks.length === 1) {
        return first;
    }
    const extrapolation = options.extrapolation ?? 'linear';

    let running: AbcdMatrix[] = first.frequencies.map(() => IDENTITY_MATRIX);
    for (const network of networks) {
        const aligned = resampleNetwork(network, first.frequencies, extrapolation);
        running = multiplySeries(running, networkToMatrices(aligned));
    }

    return createTwoPortNetwork({
        frequencies: first.frequencies,
        ...matricesToScattering(running, first.z0),
        z0: first.z0,
    });
}
