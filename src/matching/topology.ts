/**
 * @module matching/topology
 * @description Matching section topologies and enumeration of component combinations
 *
 * A topology is an ordered list of connection roles (device side first) plus the
 * ordered list of kind pairings tried for it. Enumeration visits pairings in that
 * order and, for each pairing, the Cartesian product of catalog entries with the
 * first position outermost. The order is fixed so that "first encountered wins"
 * tie-breaking is reproducible.
 */

import { ValidationError } from '../core/errors';
import type { CascadeElement, CascadeLayout } from '../models/network/cascade';
import { MAX_ELEMENTS } from '../models/network/lumped';
import { ComponentKind, ConnectionRole } from '../models/network/types';
import type { CatalogEntry, ComponentCatalog } from './catalog';

// ==================== Types ====================

export type PartKind = ComponentKind.Capacitor | ComponentKind.Inductor;

export interface Topology extends CascadeLayout {
    readonly name: string;
    readonly roles: readonly ConnectionRole[];
    /** Kind assignments tried, in order, one kind per role */
    readonly pairings: ReadonlyArray<readonly PartKind[]>;
}

/**
 * A catalog entry placed at a topology position
 */
export interface ComponentCandidate extends CascadeElement {
    readonly entry: CatalogEntry;
}

// ==================== Topologies ====================

const C = ComponentKind.Capacitor;
const L = ComponentKind.Inductor;
const { InLine, ToGround } = ConnectionRole;

/**
 * Every kind assignment of `length` positions, starting from all-capacitor
 */
function allPairings(length: number): PartKind[][] {
    let result: PartKind[][] = [[]];
    for (let i = 0; i < length; i++) {
        result = result.flatMap(prefix => [[...prefix, C], [...prefix, L]]);
    }
    return result;
}

/**
 * Validate and freeze a topology. Without `pairings`, every kind assignment is
 * tried.
 */
export function defineTopology(
    name: string,
    roles: readonly ConnectionRole[],
    pairings?: ReadonlyArray<readonly PartKind[]>
): Topology {
    if (name.trim().length === 0) {
        throw new ValidationError('Topology name must not be empty');
    }
    if (roles.length === 0 || roles.length > MAX_ELEMENTS) {
        throw new ValidationError(
            `Topology ${name} must have 1-${MAX_ELEMENTS} elements, got ${roles.length}`,
            { name, length: roles.length }
        );
    }
    const kinds = pairings ?? allPairings(roles.length);
    if (kinds.length === 0) {
        throw new ValidationError(`Topology ${name} has no pairings`, { name });
    }
    kinds.forEach((pairing, i) => {
        if (pairing.length !== roles.length) {
            throw new ValidationError(
                `Pairing ${i} of ${name} has ${pairing.length} kinds, expected ${roles.length}`,
                { name, pairing: i }
            );
        }
    });

    return Object.freeze({
        name,
        roles: Object.freeze([...roles]),
        pairings: Object.freeze(kinds.map(p => Object.freeze([...p]))),
    });
}

/** In-line then to-ground */
export const L_SECTION: Topology = defineTopology('L', [InLine, ToGround], [
    [C, L],
    [L, C],
    [C, C],
    [L, L],
]);

/** To-ground, in-line, to-ground */
export const PI_SECTION: Topology = defineTopology('Pi', [ToGround, InLine, ToGround], [
    [C, L, C],
    [L, C, L],
    [C, C, L],
    [L, C, C],
    [C, L, L],
    [L, L, C],
    [C, C, C],
    [L, L, L],
]);

/** In-line, to-ground, in-line */
export const T_SECTION: Topology = defineTopology('T', [InLine, ToGround, InLine], [
    [L, C, L],
    [C, L, C],
    [L, L, C],
    [C, L, L],
    [L, C, C],
    [C, C, L],
    [L, L, L],
    [C, C, C],
]);

export const TOPOLOGIES: Readonly<Record<string, Topology>> = Object.freeze({
    L: L_SECTION,
    Pi: PI_SECTION,
    T: T_SECTION,
});

/**
 * Look up a built-in topology by name (case-insensitive)
 */
export function getTopology(name: string): Topology {
    const found = Object.values(TOPOLOGIES).find(t => t.name.toLowerCase() === name.toLowerCase());
    if (!found) {
        throw new ValidationError(`Unknown topology '${name}'`, { name, known: Object.keys(TOPOLOGIES) });
    }
    return found;
}

// ==================== Enumeration ====================

/**
 * Place catalog entries at the positions of a topology
 */
export function toCandidates(topology: Topology, entries: readonly CatalogEntry[]): ComponentCandidate[] {
    if (entries.length !== topology.roles.length) {
        throw new ValidationError(
            `${topology.name} takes ${topology.roles.length} elements, got ${entries.length}`
        );
    }
    return entries.map((entry, position) => Object.freeze({
        entry,
        network: entry.network,
        role: topology.roles[position],
        position,
    }));
}

/**
 * Number of combinations {@link enumerateCombinations} yields
 */
export function countCombinations(catalog: ComponentCatalog, topology: Topology): number {
    const counts = new Map<PartKind, number>([
        [C, catalog.capacitors().length],
        [L, catalog.inductors().length],
    ]);
    return topology.pairings.reduce(
        (total, pairing) => total + pairing.reduce((product, kind) => product * (counts.get(kind) ?? 0), 1),
        0
    );
}

/**
 * Yield every combination in enumeration order
 */
export function* enumerateCombinations(
    catalog: ComponentCatalog,
    topology: Topology
): Generator<ComponentCandidate[], void, undefined> {
    const pools = new Map<PartKind, CatalogEntry[]>([
        [C, catalog.capacitors()],
        [L, catalog.inductors()],
    ]);

    for (const pairing of topology.pairings) {
        const lists = pairing.map(kind => pools.get(kind) ?? []);
        if (lists.some(list => list.length === 0)) {
            continue;
        }
        // Odometer over the positions, last position fastest
        const indices: number[] = lists.map(() => 0);
        while (true) {
            yield toCandidates(topology, indices.map((index, position) => lists[position][index]));

            let position = lists.length - 1;
            while (position >= 0) {
                indices[position]++;
                if (indices[position] < lists[position].length) {
                    break;
                }
                indices[position] = 0;
                position--;
            }
            if (position < 0) {
                break;
            }
        }
    }
}
