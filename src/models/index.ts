/**
 * @module src/models
 * @description Network models for impedance matching
 *
 * - numeric/: Complex arithmetic
 * - network/: Two-ports, ABCD conversion, resampling, cascading, lumped elements
 * - metrics/: Reflection-derived metrics
 * - utils/: Engineering notation and reductions
 */

export * as numeric from './numeric';
export * as network from './network';
export * as metrics from './metrics';
export * as utils from './utils';
