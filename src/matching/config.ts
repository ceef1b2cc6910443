/**
 * @module matching/config
 * @description Search configuration, defaults and validation
 */

import { InvalidConfigError } from '../core/errors';
import { NullLogger } from '../core/logging';
import type { Logger } from '../core/logging';
import type { ExtrapolationMode } from '../models/network/types';

// ==================== Types ====================

export interface SearchConfig {
    /** |Z − target| (Ω) under which the result counts as matched */
    impedanceTolerance: number;
    /** VSWR at or under which the result counts as matched */
    vswrThreshold: number;
    /** VSWR under which a sample counts towards achieved bandwidth */
    bandwidthVswrThreshold: number;
    /** Target impedance in Ohms; the device reference impedance when omitted */
    targetImpedance?: number;
    /** Resampling outside a catalog entry's frequency range */
    extrapolation: ExtrapolationMode;
    /** Stop after this many combinations */
    maxIterations?: number;
    /** Stop after this much wall-clock time */
    timeoutMs?: number;
    /** Stop when aborted */
    signal?: AbortSignal;
    logger: Logger;
}

export interface ConfigValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Defaults ====================

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze({
    impedanceTolerance: 10,
    vswrThreshold: 2.0,
    bandwidthVswrThreshold: 2.0,
    extrapolation: 'linear',
    logger: new NullLogger(),
});

/**
 * Merge a partial configuration over the defaults
 */
export function resolveSearchConfig(config: Partial<SearchConfig> = {}): SearchConfig {
    const defaults = DEFAULT_SEARCH_CONFIG;
    return {
        impedanceTolerance: config.impedanceTolerance ?? defaults.impedanceTolerance,
        vswrThreshold: config.vswrThreshold ?? defaults.vswrThreshold,
        bandwidthVswrThreshold: config.bandwidthVswrThreshold ?? defaults.bandwidthVswrThreshold,
        targetImpedance: config.targetImpedance,
        extrapolation: config.extrapolation ?? defaults.extrapolation,
        maxIterations: config.maxIterations,
        timeoutMs: config.timeoutMs,
        signal: config.signal,
        logger: config.logger ?? defaults.logger,
    };
}

// ==================== Validation ====================

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

export function validateSearchConfig(config: SearchConfig): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!(Number.isFinite(config.impedanceTolerance) && config.impedanceTolerance >= 0)) {
        errors.push(`impedanceTolerance must be a non-negative number, got ${config.impedanceTolerance}`);
    }
    if (!(Number.isFinite(config.vswrThreshold) && config.vswrThreshold >= 1)) {
        errors.push(`vswrThreshold must be at least 1, got ${config.vswrThreshold}`);
    }
    if (!(Number.isFinite(config.bandwidthVswrThreshold) && config.bandwidthVswrThreshold > 1)) {
        errors.push(`bandwidthVswrThreshold must be greater than 1, got ${config.bandwidthVswrThreshold}`);
    }
    if (config.targetImpedance !== undefined && !isPositive(config.targetImpedance)) {
        errors.push(`targetImpedance must be a positive number, got ${config.targetImpedance}`);
    }
    if (config.extrapolation !== 'linear' && config.extrapolation !== 'error') {
        errors.push(`extrapolation must be 'linear' or 'error', got ${String(config.extrapolation)}`);
    }
    if (config.maxIterations !== undefined) {
        if (!Number.isInteger(config.maxIterations) || config.maxIterations < 0) {
            errors.push(`maxIterations must be a non-negative integer, got ${config.maxIterations}`);
        } else if (config.maxIterations === 0) {
            warnings.push('maxIterations is 0: no combination will be evaluated');
        }
    }
    if (config.timeoutMs !== undefined && !(config.timeoutMs >= 0)) {
        errors.push(`timeoutMs must be non-negative, got ${config.timeoutMs}`);
    }
    if (config.vswrThreshold > 10) {
        warnings.push(`vswrThreshold ${config.vswrThreshold} accepts very poor matches`);
    }
    if (config.signal?.aborted) {
        warnings.push('signal is already aborted: no combination will be evaluated');
    }

    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Resolve and validate, throwing InvalidConfigError on failure.
 * Warnings go to the configured logger under the given search label.
 */
export function prepareSearchConfig(config: Partial<SearchConfig> = {}, search = 'search'): SearchConfig {
    const resolved = resolveSearchConfig(config);
    const { valid, errors, warnings } = validateSearchConfig(resolved);
    if (!valid) {
        throw new InvalidConfigError(errors);
    }
    for (const message of warnings) {
        resolved.logger.logWarning({ search, message });
    }
    return resolved;
}
