/**
 * @module matching/result
 * @description Search results
 */

import {
    bandIndices,
    bandMetrics,
    calculateBandwidth,
    isMatched,
    pointMetrics,
} from '../models/metrics/reflection';
import type { BandMetrics, PointMetrics } from '../models/metrics/reflection';
import type { CascadeResult } from '../models/network/cascade';
import type { TwoPortNetwork } from '../models/network/types';
import { maxValue } from '../models/utils/statistics';
import type { SearchConfig } from './config';
import type { ComponentCandidate, Topology } from './topology';

// ==================== Types ====================

export type SearchMode = 'single-frequency' | 'bandwidth';

export interface SearchResult {
    readonly mode: SearchMode;
    readonly topology: Topology;
    /** Chosen candidates in topology order */
    readonly candidates: readonly ComponentCandidate[];
    readonly cascade: CascadeResult<ComponentCandidate>;
    /** Frequency the success flag and `metrics` refer to */
    readonly referenceFrequency: number;
    readonly metrics: PointMetrics;
    /** Metrics on the whole device axis */
    readonly band: BandMetrics;
    /** Evaluated band in Hz; [f, f] for a single-frequency search */
    readonly frequencyRange: readonly [number, number];
    readonly targetImpedance: number;
    /** Largest VSWR over the samples inside `frequencyRange` */
    readonly maxVswr: number;
    /** Width (Hz) of the runs inside `frequencyRange` with VSWR under the bandwidth threshold */
    readonly bandwidthHz: number;
    /** Matched at the reference frequency (impedance tolerance OR VSWR threshold) */
    readonly success: boolean;
    /** Search score of the winner: |S11| or max in-band VSWR */
    readonly score: number;
    readonly iterations: number;
    readonly failures: number;
    readonly durationMs: number;
    /** Stopped early by maxIterations, timeoutMs or signal */
    readonly interrupted: boolean;
}

export interface SearchOutcome {
    mode: SearchMode;
    topology: Topology;
    device: TwoPortNetwork;
    cascade: CascadeResult<ComponentCandidate>;
    referenceIndex: number;
    frequencyRange: readonly [number, number];
    score: number;
    iterations: number;
    failures: number;
    durationMs: number;
    interrupted: boolean;
}

// ==================== Construction ====================

/**
 * Derive metrics and the success flag for a chosen combination
 */
export function createSearchResult(outcome: SearchOutcome, config: SearchConfig): SearchResult {
    const { device, cascade, referenceIndex } = outcome;
    const network = cascade.network;
    const targetImpedance = config.targetImpedance ?? device.z0;

    const metrics = pointMetrics(network.s11[referenceIndex], device.z0);
    const band = bandMetrics(network.s11, device.z0);

    const indices = bandIndices(network.frequencies, outcome.frequencyRange);
    const inBandVswr = indices.map(i => band.vswr[i]);
    const inBandFrequencies = indices.map(i => network.frequencies[i]);

    return Object.freeze({
        mode: outcome.mode,
        topology: outcome.topology,
        candidates: cascade.elements,
        cascade,
        referenceFrequency: network.frequencies[referenceIndex],
        metrics,
        band,
        frequencyRange: Object.freeze<[number, number]>([outcome.frequencyRange[0], outcome.frequencyRange[1]]),
        targetImpedance,
        maxVswr: indices.length > 0 ? maxValue(inBandVswr) : metrics.vswr,
        bandwidthHz: calculateBandwidth(inBandVswr, inBandFrequencies, config.bandwidthVswrThreshold),
        success: isMatched(metrics.impedance, targetImpedance, config.impedanceTolerance, config.vswrThreshold),
        score: outcome.score,
        iterations: outcome.iterations,
        failures: outcome.failures,
        durationMs: outcome.durationMs,
        interrupted: outcome.interrupted,
    });
}
