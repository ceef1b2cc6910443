/**
 * @module matching/objective
 * @description Weighted multi-metric cost of a matching candidate
 *
 * Four sub-scores, each normalized to [0, 1] with lower being better:
 *
 * | Metric          | Raw value                          | Mapping                 |
 * |-----------------|------------------------------------|-------------------------|
 * | returnLoss      | mean return loss (dB)              | 40 dB → 0, 0 dB → 1     |
 * | vswr            | mean VSWR                          | 1 → 0, 10 → 1           |
 * | bandwidth       | share of the span with VSWR < 2    | full span → 0, none → 1 |
 * | componentCount  | number of elements                 | 0 → 0, 5 → 1            |
 *
 * Return loss and VSWR are taken against the target impedance. The cost is the
 * weighted sum, so it lies in [0, sum of weights].
 */

import { asMetricSpec, combineMetricsWithTracking } from '../core/objective';
import type { MetricEvaluationResult, MetricSpec } from '../core/objective';
import { ValidationError } from '../core/errors';
import {
    calculateBandwidth,
    impedanceFromReflection,
    reflectionFromImpedance,
    returnLossDb,
    vswr,
} from '../models/metrics/reflection';
import { cascade } from '../models/network/cascade';
import type { CascadeElement } from '../models/network/cascade';
import { LUMPED_VALUE_RANGES, createLumpedElementNetwork, validateLumpedElement } from '../models/network/lumped';
import type { LumpedElement } from '../models/network/lumped';
import type { Complex } from '../models/numeric/complex';
import type { TwoPortNetwork } from '../models/network/types';
import { mean } from '../models/utils/statistics';
import { snapToStandard, standardValues } from '../models/utils/standard-values';
import type { StandardSeries } from '../models/utils/standard-values';
import type { PartKind, Topology } from './topology';

// ==================== Types ====================

export interface ObjectiveWeights {
    returnLoss: number;
    vswr: number;
    bandwidth: number;
    componentCount: number;
}

export const DEFAULT_WEIGHTS: Readonly<ObjectiveWeights> = Object.freeze({
    returnLoss: 0.7,
    vswr: 0.0,
    bandwidth: 0.2,
    componentCount: 0.1,
});

/** VSWR under which a sample counts towards bandwidth */
export const OBJECTIVE_VSWR_THRESHOLD = 2.0;

/**
 * Raw figures the sub-scores are computed from
 */
export interface ObjectiveState {
    meanReturnLossDb: number;
    meanVswr: number;
    bandwidthHz: number;
    spanHz: number;
    componentCount: number;
}

export interface ObjectiveBreakdown extends MetricEvaluationResult {
    state: ObjectiveState;
}

// ==================== Metrics ====================

function objectiveMetrics(weights: ObjectiveWeights): MetricSpec<ObjectiveState>[] {
    return [
        asMetricSpec<ObjectiveState>(s => s.meanReturnLossDb, {
            id: 'returnLoss',
            description: 'Mean return loss',
            direction: 'maximize',
            unit: 'dB',
            weight: weights.returnLoss,
            bounds: { min: 0, max: 40 },
        }),
        asMetricSpec<ObjectiveState>(s => s.meanVswr, {
            id: 'vswr',
            description: 'Mean VSWR',
            direction: 'minimize',
            weight: weights.vswr,
            bounds: { min: 1, max: 10 },
        }),
        // A zero-width span counts as fully covered
        asMetricSpec<ObjectiveState>(s => (s.spanHz > 0 ? s.bandwidthHz / s.spanHz : 1), {
            id: 'bandwidth',
            description: 'Fraction of the span with VSWR < 2',
            direction: 'maximize',
            weight: weights.bandwidth,
            bounds: { min: 0, max: 1 },
        }),
        asMetricSpec<ObjectiveState>(s => s.componentCount, {
            id: 'componentCount',
            description: 'Number of matching elements',
            direction: 'minimize',
            weight: weights.componentCount,
            bounds: { min: 0, max: 5 },
        }),
    ];
}

/**
 * Merge caller weights over the defaults. Keys left undefined count as 0.
 */
export function resolveWeights(weights: Partial<ObjectiveWeights> = {}): ObjectiveWeights {
    const merged = { ...DEFAULT_WEIGHTS, ...weights };
    const resolved: ObjectiveWeights = {
        returnLoss: merged.returnLoss ?? 0,
        vswr: merged.vswr ?? 0,
        bandwidth: merged.bandwidth ?? 0,
        componentCount: merged.componentCount ?? 0,
    };
    for (const [key, value] of Object.entries(resolved)) {
        if (!Number.isFinite(value) || value < 0) {
            throw new ValidationError(`Weight '${key}' must be a non-negative number, got ${value}`, { key, value });
        }
    }
    return resolved;
}

// ==================== Scoring ====================

/**
 * Raw figures of a candidate against `targetImpedance`
 */
export function objectiveState(
    impedances: readonly Complex[],
    frequencies: readonly number[],
    componentCount: number,
    targetImpedance = 50
): ObjectiveState {
    if (impedances.length !== frequencies.length) {
        throw new ValidationError(
            `${impedances.length} impedances given for ${frequencies.length} frequencies`
        );
    }
    if (!(targetImpedance > 0)) {
        throw new ValidationError(`Target impedance must be positive, got ${targetImpedance}`);
    }
    const magnitudes = impedances.map(z => reflectionFromImpedance(z, targetImpedance).magnitude());
    const vswrValues = magnitudes.map(vswr);
    return {
        meanReturnLossDb: mean(magnitudes.map(returnLossDb)),
        meanVswr: mean(vswrValues),
        bandwidthHz: calculateBandwidth(vswrValues, frequencies, OBJECTIVE_VSWR_THRESHOLD),
        spanHz: frequencies.length > 0 ? frequencies[frequencies.length - 1] - frequencies[0] : 0,
        componentCount,
    };
}

/**
 * Weighted cost with the per-metric breakdown
 */
export function scoreCandidateWithBreakdown(
    impedances: readonly Complex[],
    frequencies: readonly number[],
    components: readonly unknown[],
    weights: Partial<ObjectiveWeights> = {},
    targetImpedance = 50
): ObjectiveBreakdown {
    const state = objectiveState(impedances, frequencies, components.length, targetImpedance);
    const combined = combineMetricsWithTracking(objectiveMetrics(resolveWeights(weights)));
    return { ...combined.evaluate(state), state };
}

/**
 * Weighted cost of a candidate (lower is better)
 *
 * @param impedances - Input impedance at each frequency (Ω)
 * @param frequencies - Frequencies in Hz, increasing
 * @param components - Elements of the candidate; only their number is used
 * @param weights - Merged over {@link DEFAULT_WEIGHTS}
 * @param targetImpedance - Impedance to match (Ω)
 */
export function scoreCandidate(
    impedances: readonly Complex[],
    frequencies: readonly number[],
    components: readonly unknown[],
    weights: Partial<ObjectiveWeights> = {},
    targetImpedance = 50
): number {
    return scoreCandidateWithBreakdown(impedances, frequencies, components, weights, targetImpedance).total;
}

// ==================== Continuous Values ====================

export interface ContinuousObjectiveOptions {
    /** Snap each value to the nearest value of this series before cascading */
    series?: StandardSeries;
}

/**
 * Nearest preferred values for element values, within each kind's valid range
 */
export function snapElementValues(
    kinds: readonly PartKind[],
    values: readonly number[],
    series: StandardSeries
): number[] {
    if (values.length !== kinds.length) {
        throw new ValidationError(`Expected ${kinds.length} values, got ${values.length}`);
    }
    return values.map((value, i) => {
        const range = LUMPED_VALUE_RANGES[kinds[i]];
        return snapToStandard(value, standardValues(series, range.min, range.max));
    });
}

/**
 * Cost as a function of element values (F or H) for one kind assignment of a
 * topology. Each call builds ideal elements, cascades them with the device and
 * scores the input impedance on the device axis. With `options.series` the
 * values are checked, then snapped to that series.
 *
 * @throws {ValidationError} from the returned function when a value is outside
 * its kind's range
 */
export function createContinuousObjective(
    device: TwoPortNetwork,
    topology: Topology,
    kinds: readonly PartKind[],
    weights: Partial<ObjectiveWeights> = {},
    targetImpedance: number = device.z0,
    options: ContinuousObjectiveOptions = {}
): (values: readonly number[]) => number {
    if (kinds.length !== topology.roles.length) {
        throw new ValidationError(
            `${topology.name} takes ${topology.roles.length} kinds, got ${kinds.length}`
        );
    }
    const resolved = resolveWeights(weights);
    const { series } = options;
    const standard = series === undefined
        ? undefined
        : kinds.map(kind => standardValues(series, LUMPED_VALUE_RANGES[kind].min, LUMPED_VALUE_RANGES[kind].max));

    return (values: readonly number[]): number => {
        if (values.length !== kinds.length) {
            throw new ValidationError(`Expected ${kinds.length} values, got ${values.length}`);
        }
        const elements: CascadeElement[] = values.map((raw, order) => {
            const role = topology.roles[order];
            let value = raw;
            if (standard !== undefined) {
                validateLumpedElement({ kind: kinds[order], value: raw, role, order });
                value = snapToStandard(raw, standard[order]);
            }
            const element: LumpedElement = { kind: kinds[order], value, role, order };
            return {
                network: createLumpedElementNetwork(element, device.frequencies, device.z0),
                role,
                position: order,
            };
        });
        const network = cascade(device, elements, topology).network;
        const impedances = network.s11.map(g => impedanceFromReflection(g, device.z0));
        return scoreCandidate(impedances, device.frequencies, elements, resolved, targetImpedance);
    };
}
