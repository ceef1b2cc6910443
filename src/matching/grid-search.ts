/**
 * @module matching/grid-search
 * @description Single-frequency grid search
 *
 * Scores each combination by |S11| of the cascaded network at the device sample
 * nearest to the target frequency.
 */

import { ValidationError } from '../core/errors';
import { nearestFrequencyIndex } from '../models/metrics/reflection';
import type { CascadeResult } from '../models/network/cascade';
import type { TwoPortNetwork } from '../models/network/types';
import type { ComponentCatalog } from './catalog';
import type { SearchConfig } from './config';
import type { SearchResult } from './result';
import { CombinationSearch } from './search';
import type { ComponentCandidate, Topology } from './topology';

export class GridSearchOptimizer extends CombinationSearch {
    readonly targetFrequency: number;
    private readonly targetIndex: number;

    constructor(
        device: TwoPortNetwork,
        catalog: ComponentCatalog,
        topology: Topology,
        targetFrequency: number,
        config: Partial<SearchConfig> = {}
    ) {
        super('single-frequency', device, catalog, topology, config);
        if (!Number.isFinite(targetFrequency) || targetFrequency < 0) {
            throw new ValidationError(`Target frequency must be a finite non-negative number, got ${targetFrequency}`);
        }
        this.targetFrequency = targetFrequency;
        this.targetIndex = nearestFrequencyIndex(device.frequencies, targetFrequency);
    }

    protected score(cascaded: CascadeResult<ComponentCandidate>): number {
        return cascaded.network.s11[this.targetIndex].magnitude();
    }

    protected referenceIndex(): number {
        return this.targetIndex;
    }

    protected reportedRange(): readonly [number, number] {
        const f = this.device.frequencies[this.targetIndex];
        return [f, f];
    }
}

/**
 * Find the combination with the lowest reflection at `targetFrequency`
 *
 * @throws {NoFeasibleSolutionError} when no combination cascades
 */
export function runSingleFrequencySearch(
    device: TwoPortNetwork,
    catalog: ComponentCatalog,
    topology: Topology,
    targetFrequency: number,
    config: Partial<SearchConfig> = {}
): SearchResult {
    return new GridSearchOptimizer(device, catalog, topology, targetFrequency, config).optimize();
}
