/**
 * @module matching/bandwidth-search
 * @description Band-aware search minimizing the worst in-band VSWR
 */

import { ValidationError } from '../core/errors';
import { bandIndices, nearestFrequencyIndex, vswr } from '../models/metrics/reflection';
import type { CascadeResult } from '../models/network/cascade';
import type { TwoPortNetwork } from '../models/network/types';
import { maxValue } from '../models/utils/statistics';
import type { ComponentCatalog } from './catalog';
import type { SearchConfig } from './config';
import type { SearchResult } from './result';
import { CombinationSearch } from './search';
import type { ComponentCandidate, Topology } from './topology';

/**
 * Scores each combination by the maximum VSWR over the device samples inside
 * the band. When no score compares but something cascaded, the first cascaded
 * combination is returned.
 */
export class BandwidthOptimizer extends CombinationSearch {
    readonly frequencyRange: readonly [number, number];
    private readonly indices: readonly number[];
    private readonly centerIndex: number;

    constructor(
        device: TwoPortNetwork,
        catalog: ComponentCatalog,
        topology: Topology,
        frequencyRange: readonly [number, number],
        config: Partial<SearchConfig> = {}
    ) {
        super('bandwidth', device, catalog, topology, config);
        const [min, max] = frequencyRange;
        this.indices = bandIndices(device.frequencies, frequencyRange);
        if (this.indices.length === 0) {
            throw new ValidationError(
                `No device frequency inside [${min}, ${max}] Hz`,
                { min, max }
            );
        }
        this.frequencyRange = [min, max];
        this.centerIndex = nearestFrequencyIndex(device.frequencies, (min + max) / 2);
    }

    protected score(cascaded: CascadeResult<ComponentCandidate>): number {
        const s11 = cascaded.network.s11;
        return maxValue(this.indices.map(i => vswr(s11[i].magnitude())));
    }

    protected referenceIndex(): number {
        return this.centerIndex;
    }

    protected reportedRange(): readonly [number, number] {
        return this.frequencyRange;
    }
}

/**
 * Find the combination with the lowest worst-case VSWR over `frequencyRange`
 *
 * @throws {ValidationError} when no device sample lies inside the band
 * @throws {NoFeasibleSolutionError} when no combination cascades
 */
export function runBandwidthSearch(
    device: TwoPortNetwork,
    catalog: ComponentCatalog,
    topology: Topology,
    frequencyRange: readonly [number, number],
    config: Partial<SearchConfig> = {}
): SearchResult {
    return new BandwidthOptimizer(device, catalog, topology, frequencyRange, config).optimize();
}
