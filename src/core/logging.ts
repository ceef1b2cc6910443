/**
 * @module core/logging
 * @description Structured logging for search runs
 *
 * The library never owns a logger: searches write to whatever `Logger` the caller
 * passes in their configuration, and to a `NullLogger` otherwise. Entries have a
 * fixed, versioned field schema so they can be exported as JSON or JSONL.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Search label (e.g. 'single-frequency', 'bandwidth') */
    search: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * One evaluated combination
 */
export interface EvaluationLogEntry extends BaseLogEntry {
    logType: 'evaluation';
    /** 1-based iteration number */
    iteration: number;
    topology: string;
    /** Part labels in topology order */
    parts: string[];
    /** Score of the combination, null when it failed to cascade */
    score: number | null;
    /** Whether it became the new best */
    improved: boolean;
    /** Failure message */
    error?: string;
}

/**
 * Summary of a finished search
 */
export interface SearchLogEntry extends BaseLogEntry {
    logType: 'search';
    topology: string;
    iterations: number;
    failures: number;
    durationMs: number;
    bestScore: number | null;
    success: boolean;
    interrupted: boolean;
}

/**
 * Non-fatal problem found before a search runs
 */
export interface WarningLogEntry extends BaseLogEntry {
    logType: 'warning';
    message: string;
}

/**
 * Union of all log entry types
 */
export type LogEntry = EvaluationLogEntry | SearchLogEntry | WarningLogEntry;

export type EvaluationLogInput = Omit<EvaluationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;
export type SearchLogInput = Omit<SearchLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;
export type WarningLogInput = Omit<WarningLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log one evaluated combination */
    logEvaluation(entry: EvaluationLogInput): void;
    /** Log a search summary */
    logSearch(entry: SearchLogInput): void;
    logWarning(entry: WarningLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Schema version */
    schemaVersion?: string;
    /** Whether to keep per-combination entries (can be verbose) */
    logEvaluations?: boolean;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

function formatScore(score: number | null): string {
    return score === null ? 'n/a' : score.toFixed(4);
}

// ==================== Null Logger ====================

/**
 * Discards everything. Default when no logger is configured.
 */
export class NullLogger implements Logger {
    logEvaluation(_entry: EvaluationLogInput): void { /* no-op */ }
    logSearch(_entry: SearchLogInput): void { /* no-op */ }
    logWarning(_entry: WarningLogInput): void { /* no-op */ }
    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console (for debugging)
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(level: LogLevel = 'info') {
        this.level = level;
    }

    logEvaluation(entry: EvaluationLogInput): void {
        if (this.level !== 'debug') {
            return;
        }
        if (entry.error !== undefined) {
            console.log(`[EVAL] #${entry.iteration} ${entry.topology} [${entry.parts.join(', ')}] failed: ${entry.error}`);
        } else {
            console.log(
                `[EVAL] #${entry.iteration} ${entry.topology} [${entry.parts.join(', ')}]: ` +
                `score=${formatScore(entry.score)}${entry.improved ? ' *' : ''}`
            );
        }
    }

    logSearch(entry: SearchLogInput): void {
        if (this.level === 'error') {
            return;
        }
        const summary =
            `${entry.search} ${entry.topology}: iterations=${entry.iterations}, ` +
            `failures=${entry.failures}, best=${formatScore(entry.bestScore)}, ` +
            `duration=${entry.durationMs.toFixed(1)}ms` +
            (entry.interrupted ? ' (interrupted)' : '');
        if (!entry.success) {
            console.warn(`[SEARCH] ${summary}, no usable match`);
        } else if (this.level === 'debug' || this.level === 'info') {
            console.log(`[SEARCH] ${summary}`);
        }
    }

    logWarning(entry: WarningLogInput): void {
        if (this.level === 'error') {
            return;
        }
        console.warn(`[WARN] ${entry.search}: ${entry.message}`);
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for callers that render their own reports.
 */
export class MemoryLogger implements Logger {
    private config: { schemaVersion: string; logEvaluations: boolean };
    public evaluations: EvaluationLogEntry[] = [];
    public searches: SearchLogEntry[] = [];
    public warnings: WarningLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.config = {
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
            logEvaluations: config.logEvaluations ?? true,
        };
    }

    logEvaluation(entry: EvaluationLogInput): void {
        if (!this.config.logEvaluations) {
            return;
        }
        this.evaluations.push({
            schemaVersion: this.config.schemaVersion,
            timestamp: Date.now(),
            logType: 'evaluation',
            ...entry,
        });
    }

    logSearch(entry: SearchLogInput): void {
        this.searches.push({
            schemaVersion: this.config.schemaVersion,
            timestamp: Date.now(),
            logType: 'search',
            ...entry,
        });
    }

    logWarning(entry: WarningLogInput): void {
        this.warnings.push({
            schemaVersion: this.config.schemaVersion,
            timestamp: Date.now(),
            logType: 'warning',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.warnings, ...this.evaluations, ...this.searches];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            warnings: this.warnings,
            evaluations: this.evaluations,
            searches: this.searches,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.warnings = [];
        this.evaluations = [];
        this.searches = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logEvaluation(entry: EvaluationLogInput): void {
        for (const logger of this.loggers) {
            logger.logEvaluation(entry);
        }
    }

    logSearch(entry: SearchLogInput): void {
        for (const logger of this.loggers) {
            logger.logSearch(entry);
        }
    }

    logWarning(entry: WarningLogInput): void {
        for (const logger of this.loggers) {
            logger.logWarning(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger by format
 */
export function createLogger(
    format: 'console' | 'memory' | 'null',
    config: LoggerConfig & { level?: LogLevel } = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config.level ?? 'info');
        case 'memory':
            return new MemoryLogger(config);
        case 'null':
            return new NullLogger();
    }
}
