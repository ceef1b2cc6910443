/**
 * @module core/errors
 * @description Unified error types and error codes
 *
 * Numerical instability is never reported through these types: it is absorbed by
 * fixed epsilon floors where it occurs. Errors are reserved for rejected inputs and
 * for searches where nothing could be evaluated.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for matchkit
 */
export const ErrorCodes = {
    // Validation Errors
    /** Generic precondition violation */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Search configuration rejected */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Search Errors
    /** No combination could be cascaded */
    NO_FEASIBLE_SOLUTION: 'NO_FEASIBLE_SOLUTION',
    /** Result requested before the search ran */
    NOT_INITIALIZED: 'NOT_INITIALIZED',

    // Runtime Errors
    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for matchkit
 */
export class MatchkitError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'MatchkitError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, MatchkitError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Precondition violation (malformed network, bad frequency axis, invalid config)
 */
export class ValidationError extends MatchkitError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Search configuration rejected by validation
 */
export class InvalidConfigError extends MatchkitError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(ErrorCodes.INVALID_CONFIG, `Invalid search configuration: ${errors.join('; ')}`, { errors });
        this.name = 'InvalidConfigError';
        this.errors = errors;
    }
}

/**
 * Detail attached to a no-feasible-solution failure
 */
export interface NoFeasibleSolutionDetail {
    topology: string;
    iterations: number;
    failures: number;
    interrupted: boolean;
    lastError?: string;
}

/**
 * No combination cascaded (empty catalog, empty topology or universal failure)
 */
export class NoFeasibleSolutionError extends MatchkitError {
    readonly detail: NoFeasibleSolutionDetail;

    constructor(message: string, detail: NoFeasibleSolutionDetail) {
        super(ErrorCodes.NO_FEASIBLE_SOLUTION, message, detail);
        this.name = 'NoFeasibleSolutionError';
        this.detail = detail;
    }
}

/**
 * Not initialized error (result read before the search ran)
 */
export class NotInitializedError extends MatchkitError {
    constructor(message = 'Search has not run. Call optimize() first.') {
        super(ErrorCodes.NOT_INITIALIZED, message);
        this.name = 'NotInitializedError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a MatchkitError
 */
export function isMatchkitError(error: unknown): error is MatchkitError {
    return error instanceof MatchkitError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isMatchkitError(error) && error.code === code;
}

/**
 * Wrap any error into a MatchkitError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): MatchkitError {
    if (isMatchkitError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new MatchkitError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new MatchkitError(defaultCode, String(error));
}
