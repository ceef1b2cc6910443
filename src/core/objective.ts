/**
 * @module core/objective
 * @description Weighted cost composition with per-metric tracking
 *
 * Every metric is turned into a cost before weighting, so lower totals are always
 * better. A metric with `bounds` is mapped onto [0, 1] (0 at its best bound, 1 at
 * its worst, clamped); a metric without bounds keeps its raw value, negated when
 * it should be maximized.
 */

// ==================== Types ====================

/**
 * Optimization direction for a metric
 */
export type OptimizationDirection = 'maximize' | 'minimize';

/**
 * Raw value range mapped onto a [0, 1] cost
 */
export interface MetricBounds {
    min: number;
    max: number;
}

/**
 * Metadata for a metric specification
 */
export interface MetricMetadata {
    /** Unique identifier for the metric */
    id: string;
    /** Human-readable description */
    description: string;
    direction: OptimizationDirection;
    /** Unit of the raw value (e.g., 'dB', 'Hz') */
    unit?: string;
    /** Weight in the combined cost (default: 1.0) */
    weight?: number;
    /** Normalize the raw value over this range */
    bounds?: MetricBounds;
}

export type MetricEvaluator<S = unknown> = (state: S) => number;

/**
 * MetricSpec: Metric with metadata for tracking and composition
 */
export interface MetricSpec<S = unknown> {
    metadata: MetricMetadata;
    evaluate: MetricEvaluator<S>;
}

/**
 * One metric's share of a combined cost
 */
export interface MetricContribution {
    /** Value returned by the evaluator */
    raw: number;
    /** Cost before weighting */
    cost: number;
    weight: number;
    weighted: number;
    direction: OptimizationDirection;
}

/**
 * Result of evaluating a combined cost
 */
export interface MetricEvaluationResult {
    /** Combined cost (lower is better) */
    total: number;
    /** Per-metric breakdown keyed by metric id */
    breakdown: Record<string, MetricContribution>;
}

export type CombinationMethod = 'weighted_sum' | 'max';

// ==================== Factory Functions ====================

/**
 * Create a MetricSpec from an evaluation function and metadata
 */
export function asMetricSpec<S = unknown>(
    evaluate: MetricEvaluator<S>,
    metadata: MetricMetadata
): MetricSpec<S> {
    return {
        metadata: {
            weight: 1.0,
            ...metadata,
        },
        evaluate,
    };
}

// ==================== Normalization ====================

/**
 * Map a value linearly from [min, max] onto [0, 1] and clamp.
 *
 * Returns 0 for a degenerate range (max <= min).
 */
export function normalizeValue(value: number, min: number, max: number): number {
    if (max <= min) return 0;
    const normalized = (value - min) / (max - min);
    return Math.max(0, Math.min(1, normalized));
}

/**
 * Cost of a raw metric value under its metadata
 */
export function metricCost(raw: number, metadata: MetricMetadata): number {
    const { bounds, direction } = metadata;
    if (bounds) {
        const normalized = normalizeValue(raw, bounds.min, bounds.max);
        return direction === 'maximize' ? 1 - normalized : normalized;
    }
    return direction === 'maximize' ? -raw : raw;
}

// ==================== Cost Composition ====================

/**
 * Combine metrics into one cost, keeping each metric's contribution
 */
export function combineMetricsWithTracking<S>(
    metrics: readonly MetricSpec<S>[],
    method: CombinationMethod = 'weighted_sum'
): {
    evaluate: (state: S) => MetricEvaluationResult;
    getMetricIds: () => string[];
} {
    const metricIds = metrics.map(m => m.metadata.id);

    const evaluate = (state: S): MetricEvaluationResult => {
        const breakdown: Record<string, MetricContribution> = {};
        const values: number[] = [];

        for (const metric of metrics) {
            const raw = metric.evaluate(state);
            const cost = metricCost(raw, metric.metadata);
            const weight = metric.metadata.weight ?? 1.0;
            const weighted = cost * weight;

            breakdown[metric.metadata.id] = {
                raw,
                cost,
                weight,
                weighted,
                direction: metric.metadata.direction,
            };
            values.push(weighted);
        }

        let total: number;
        switch (method) {
            case 'weighted_sum':
                total = values.reduce((sum, v) => sum + v, 0);
                break;
            case 'max':
                total = values.length > 0 ? Math.max(...values) : 0;
                break;
        }

        return { total, breakdown };
    };

    return {
        evaluate,
        getMetricIds: () => metricIds,
    };
}

/**
 * Combined cost without the breakdown
 */
export function combineMetrics<S>(
    metrics: readonly MetricSpec<S>[],
    method: CombinationMethod = 'weighted_sum'
): MetricEvaluator<S> {
    const combined = combineMetricsWithTracking(metrics, method);
    return (state: S) => combined.evaluate(state).total;
}
