/**
 * @module core
 * @description Core framework shared by every matchkit module
 *
 * ## Modules
 * - `objective`: Weighted cost composition with per-metric tracking
 * - `logging`: Structured search logs (console, memory, fan-out)
 * - `errors`: Unified error types and codes
 */

// ==================== Objective ====================

export type {
    OptimizationDirection,
    MetricBounds,
    MetricMetadata,
    MetricEvaluator,
    MetricSpec,
    MetricContribution,
    MetricEvaluationResult,
    CombinationMethod,
} from './objective';

export {
    asMetricSpec,
    normalizeValue,
    metricCost,
    combineMetricsWithTracking,
    combineMetrics,
} from './objective';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    EvaluationLogEntry,
    SearchLogEntry,
    WarningLogEntry,
    LogEntry,
    EvaluationLogInput,
    SearchLogInput,
    WarningLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    NullLogger,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    MatchkitError,
    ValidationError,
    InvalidConfigError,
    NoFeasibleSolutionError,
    NotInitializedError,
    isMatchkitError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
    NoFeasibleSolutionDetail,
} from './errors';
