/**
 * @module matching/search
 * @description Exhaustive search over topology combinations
 *
 * Every combination yielded by the enumerator is cascaded with the device and
 * scored; the lowest score wins and the first one encountered wins ties.
 * Combinations that fail to cascade (for example when extrapolation is refused)
 * are counted and skipped. The search fails only when none cascades.
 *
 * State machine: idle → evaluating → done | failed. A search can be run again
 * from done or failed.
 */

import { NoFeasibleSolutionError, NotInitializedError, ValidationError, isMatchkitError } from '../core/errors';
import { cascade } from '../models/network/cascade';
import type { CascadeResult } from '../models/network/cascade';
import type { TwoPortNetwork } from '../models/network/types';
import type { ComponentCatalog } from './catalog';
import { prepareSearchConfig } from './config';
import type { SearchConfig } from './config';
import { createSearchResult } from './result';
import type { SearchMode, SearchResult } from './result';
import { enumerateCombinations } from './topology';
import type { ComponentCandidate, Topology } from './topology';

// ==================== Types ====================

export enum SearchState {
    Idle = 'idle',
    Evaluating = 'evaluating',
    Done = 'done',
    Failed = 'failed',
}

interface Scored {
    cascade: CascadeResult<ComponentCandidate>;
    score: number;
}

function partLabel(candidate: ComponentCandidate): string {
    return candidate.entry.label ?? candidate.entry.partNumber;
}

// ==================== Search ====================

export abstract class CombinationSearch {
    protected readonly config: SearchConfig;
    private _state: SearchState = SearchState.Idle;
    private result: SearchResult | null = null;

    constructor(
        readonly mode: SearchMode,
        protected readonly device: TwoPortNetwork,
        protected readonly catalog: ComponentCatalog,
        protected readonly topology: Topology,
        config: Partial<SearchConfig> = {}
    ) {
        this.config = prepareSearchConfig(config, mode);
    }

    /** Cost of a cascaded combination, lower is better. NaN does not compare. */
    protected abstract score(cascaded: CascadeResult<ComponentCandidate>): number;

    /** Device sample the success flag refers to */
    protected abstract referenceIndex(): number;

    /** Band the result reports on */
    protected abstract reportedRange(): readonly [number, number];

    get state(): SearchState {
        return this._state;
    }

    /**
     * Result of the last successful run
     * @throws {NotInitializedError} before a run finished successfully
     */
    getResult(): SearchResult {
        if (this._state !== SearchState.Done || this.result === null) {
            throw new NotInitializedError();
        }
        return this.result;
    }

    /**
     * Evaluate every combination and return the best
     *
     * @throws {NoFeasibleSolutionError} when no combination cascades
     */
    optimize(): SearchResult {
        if (this._state === SearchState.Evaluating) {
            throw new ValidationError('Search is already evaluating');
        }
        this._state = SearchState.Evaluating;
        this.result = null;

        const { logger, extrapolation, maxIterations, timeoutMs, signal } = this.config;
        const start = performance.now();
        const deadline = timeoutMs !== undefined ? start + timeoutMs : Infinity;

        let iterations = 0;
        let failures = 0;
        let interrupted = false;
        let lastError: string | undefined;
        let best: Scored | null = null;
        let firstCascaded: Scored | null = null;

        try {
            for (const candidates of enumerateCombinations(this.catalog, this.topology)) {
                if (
                    (maxIterations !== undefined && iterations >= maxIterations)
                    || signal?.aborted
                    || performance.now() > deadline
                ) {
                    interrupted = true;
                    break;
                }
                iterations++;
                const parts = candidates.map(partLabel);

                let cascaded: CascadeResult<ComponentCandidate>;
                try {
                    cascaded = cascade(this.device, candidates, this.topology, { extrapolation });
                } catch (error) {
                    if (!isMatchkitError(error)) {
                        throw error;
                    }
                    failures++;
                    lastError = error.message;
                    logger.logEvaluation({
                        search: this.mode,
                        iteration: iterations,
                        topology: this.topology.name,
                        parts,
                        score: null,
                        improved: false,
                        error: error.message,
                    });
                    continue;
                }

                const score = this.score(cascaded);
                const improved = !Number.isNaN(score) && (best === null || score < best.score);
                if (improved) {
                    best = { cascade: cascaded, score };
                }
                if (firstCascaded === null) {
                    firstCascaded = { cascade: cascaded, score };
                }

                logger.logEvaluation({
                    search: this.mode,
                    iteration: iterations,
                    topology: this.topology.name,
                    parts,
                    score: Number.isNaN(score) ? null : score,
                    improved,
                });
            }
        } catch (error) {
            this._state = SearchState.Failed;
            throw error;
        }

        const durationMs = performance.now() - start;
        const chosen = best ?? firstCascaded;

        if (chosen === null) {
            this._state = SearchState.Failed;
            logger.logSearch({
                search: this.mode,
                topology: this.topology.name,
                iterations,
                failures,
                durationMs,
                bestScore: null,
                success: false,
                interrupted,
            });
            throw new NoFeasibleSolutionError(
                `No ${this.topology.name} combination could be evaluated ` +
                `(${iterations} tried, ${failures} failed${interrupted ? ', interrupted' : ''})`,
                {
                    topology: this.topology.name,
                    iterations,
                    failures,
                    interrupted,
                    ...(lastError !== undefined ? { lastError } : {}),
                }
            );
        }

        const result = createSearchResult({
            mode: this.mode,
            topology: this.topology,
            device: this.device,
            cascade: chosen.cascade,
            referenceIndex: this.referenceIndex(),
            frequencyRange: this.reportedRange(),
            score: chosen.score,
            iterations,
            failures,
            durationMs,
            interrupted,
        }, this.config);

        logger.logSearch({
            search: this.mode,
            topology: this.topology.name,
            iterations,
            failures,
            durationMs,
            bestScore: Number.isNaN(chosen.score) ? null : chosen.score,
            success: result.success,
            interrupted,
        });

        this.result = result;
        this._state = SearchState.Done;
        return result;
    }
}
