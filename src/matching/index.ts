/**
 * @module matching
 * @description Catalog, topologies, exhaustive searches and the weighted objective
 *
 * ## Modules
 * - `catalog`: Measured components, kind inference, coverage checks
 * - `topology`: L, Pi and T sections and combination enumeration
 * - `grid-search`: Single-frequency search
 * - `bandwidth-search`: Worst-case in-band VSWR search
 * - `objective`: Weighted cost for continuous refinement
 * - `report`: Text rendering of results
 */

// ==================== Catalog ====================

export type { CatalogEntry, CatalogEntryInput, CoverageReport, CatalogSummary } from './catalog';

export {
    ComponentCatalog,
    createCatalogEntry,
    inferComponentKind,
    estimateNominalValue,
    unitOf,
} from './catalog';

// ==================== Topology ====================

export type { PartKind, Topology, ComponentCandidate } from './topology';

export {
    L_SECTION,
    PI_SECTION,
    T_SECTION,
    TOPOLOGIES,
    defineTopology,
    getTopology,
    toCandidates,
    countCombinations,
    enumerateCombinations,
} from './topology';

// ==================== Configuration ====================

export type { SearchConfig, ConfigValidationResult } from './config';

export {
    DEFAULT_SEARCH_CONFIG,
    resolveSearchConfig,
    validateSearchConfig,
    prepareSearchConfig,
} from './config';

// ==================== Search ====================

export type { SearchMode, SearchResult, SearchOutcome } from './result';

export { createSearchResult } from './result';

export { SearchState, CombinationSearch } from './search';

export { GridSearchOptimizer, runSingleFrequencySearch } from './grid-search';

export { BandwidthOptimizer, runBandwidthSearch } from './bandwidth-search';

// ==================== Objective ====================

export type { ObjectiveWeights, ObjectiveState, ObjectiveBreakdown, ContinuousObjectiveOptions } from './objective';

export {
    DEFAULT_WEIGHTS,
    OBJECTIVE_VSWR_THRESHOLD,
    resolveWeights,
    objectiveState,
    scoreCandidate,
    scoreCandidateWithBreakdown,
    createContinuousObjective,
    snapElementValues,
} from './objective';

// ==================== Report ====================

export { describeSolution, formatSearchReport } from './report';
