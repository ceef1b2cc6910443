/**
 * @packageDocumentation
 * @module matchkit
 *
 * matchkit: Lumped-Element Impedance Matching from Measured S-Parameters
 *
 * Finds the L, Pi or T section of catalog capacitors and inductors that brings
 * a measured device closest to a target impedance, at one frequency or across
 * a band.
 *
 * ## Modules
 * - `core` - Errors, structured logging, cost composition
 * - `numeric` - Complex arithmetic
 * - `network` - Two-port networks, S ⇄ ABCD conversion, resampling, cascading
 * - `metrics` - Reflection, VSWR, return loss, impedance
 * - `utils` - Engineering notation
 * - `matching` - Catalog, topologies, searches, weighted objective, reports
 *
 * ## Usage Example
 * ```typescript
 * import { matching } from 'matchkit';
 *
 * const catalog = new matching.ComponentCatalog(entries);
 * const { valid } = catalog.validateFrequencyCoverage(device.frequencies);
 *
 * const result = matching.runSingleFrequencySearch(
 *     device,
 *     new matching.ComponentCatalog(valid),
 *     matching.L_SECTION,
 *     2.4e9
 * );
 * console.log(matching.describeSolution(result));
 * ```
 *
 * @license MIT
 */

// ==================== Core ====================
export * as core from './src/core';

// ==================== Models ====================
export * as numeric from './src/models/numeric';
export * as network from './src/models/network';
export * as metrics from './src/models/metrics';
export * as utils from './src/models/utils';

// ==================== Matching ====================
export * as matching from './src/matching';

// ==================== Version ====================
export const VERSION = '1.0.0';
