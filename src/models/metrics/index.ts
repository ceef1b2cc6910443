/**
 * @module metrics
 * @description Matching metrics derived from reflection coefficients
 */

export type { PointMetrics, BandMetrics, MetricSet } from './reflection';

export {
    METRIC_EPSILON,
    MAX_RETURN_LOSS_DB,
    vswr,
    returnLossDb,
    mismatchLossDb,
    impedanceFromReflection,
    reflectionFromImpedance,
    isMatched,
    pointMetrics,
    bandMetrics,
    nearestFrequencyIndex,
    bandIndices,
    calculateBandwidth,
} from './reflection';
