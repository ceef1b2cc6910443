/**
 * @module src
 * @description matchkit Source Module Entry Point
 *
 * - core/: Errors, logging, cost composition
 * - models/: Complex numbers, networks, metrics, engineering notation
 * - matching/: Catalog, topologies, searches, objective, reports
 */

// ==================== Core Framework ====================
export * as core from './core';

// ==================== Models ====================
export * as models from './models';

// ==================== Matching ====================
export * as matching from './matching';
