/**
 * @module matching/catalog
 * @description Searchable catalog of measured capacitors and inductors
 *
 * Entries wrap a measured network with its kind and part metadata. Each entry
 * keeps its own frequency axis; the cascade engine resamples on demand, so
 * callers should drop entries that do not cover the device band
 * ({@link ComponentCatalog.validateFrequencyCoverage}) before searching.
 */

import { ValidationError } from '../core/errors';
import { impedanceFromReflection } from '../models/metrics/reflection';
import { frequencyRange } from '../models/network/frequency-series';
import { ComponentKind } from '../models/network/types';
import type { TwoPortNetwork } from '../models/network/types';
import { formatComponentValue, parseEngineeringNotation } from '../models/utils/engineering';

// ==================== Types ====================

/**
 * A catalog element
 */
export interface CatalogEntry {
    readonly network: TwoPortNetwork;
    readonly kind: ComponentKind;
    readonly partNumber: string;
    readonly manufacturer: string;
    /** Value as labelled by the vendor, e.g. '10pF' */
    readonly label?: string;
    /** Nominal value in Farads or Henries */
    readonly nominalValue?: number;
}

export interface CatalogEntryInput {
    network: TwoPortNetwork;
    /** Inferred from the network when omitted */
    kind?: ComponentKind;
    partNumber: string;
    manufacturer?: string;
    /** Engineering-notation value such as '10pF' or '2.2nH' */
    value?: string;
}

/**
 * Entries split by coverage of a device frequency grid
 */
export interface CoverageReport {
    valid: CatalogEntry[];
    rejected: Array<{ entry: CatalogEntry; missingFrequencies: number[] }>;
}

export interface CatalogSummary {
    total: number;
    capacitors: number;
    inductors: number;
    manufacturers: string[];
    uniqueValues: number;
    /** [min, max] over all entries in Hz */
    frequencyRange?: [number, number];
}

// ==================== Kind Inference ====================

/** Reactance (Ω) below which the trend test is not trusted */
const TREND_REACTANCE_FLOOR = 1;
/** Reactance (Ω) below which the center sample is not trusted */
const CENTER_REACTANCE_FLOOR = 5;

/**
 * Infer whether measured data behaves like a capacitor or an inductor.
 *
 * A capacitor has negative reactance shrinking in magnitude with frequency, an
 * inductor positive reactance growing with it. When the end samples disagree,
 * the sign of the reactance at the center sample decides.
 */
export function inferComponentKind(network: TwoPortNetwork): ComponentKind {
    const n = network.frequencies.length;
    if (n < 2) {
        return ComponentKind.Unknown;
    }
    const reactance = (i: number): number => impedanceFromReflection(network.s11[i], network.z0).imag;

    const low = reactance(0);
    const high = reactance(n - 1);
    if (low < -TREND_REACTANCE_FLOOR && high < -TREND_REACTANCE_FLOOR && Math.abs(low) > Math.abs(high)) {
        return ComponentKind.Capacitor;
    }
    if (low > TREND_REACTANCE_FLOOR && high > TREND_REACTANCE_FLOOR && high > low) {
        return ComponentKind.Inductor;
    }

    const center = reactance(Math.floor(n / 2));
    if (center < -CENTER_REACTANCE_FLOOR) return ComponentKind.Capacitor;
    if (center > CENTER_REACTANCE_FLOOR) return ComponentKind.Inductor;
    return ComponentKind.Unknown;
}

/**
 * Estimate the nominal value from the reactance at the center sample:
 * C = 1/(2πf·|X|), L = |X|/(2πf). Undefined when it cannot be estimated.
 */
export function estimateNominalValue(network: TwoPortNetwork, kind: ComponentKind): number | undefined {
    if (kind === ComponentKind.Unknown) {
        return undefined;
    }
    const center = Math.floor(network.frequencies.length / 2);
    const f = network.frequencies[center];
    const x = Math.abs(impedanceFromReflection(network.s11[center], network.z0).imag);
    if (x < 1e-6 || f <= 0) {
        return undefined;
    }
    const omega = 2 * Math.PI * f;
    return kind === ComponentKind.Capacitor ? 1 / (omega * x) : x / omega;
}

export function unitOf(kind: ComponentKind): string {
    switch (kind) {
        case ComponentKind.Capacitor:
            return 'F';
        case ComponentKind.Inductor:
            return 'H';
        case ComponentKind.Unknown:
            return '';
    }
}

/**
 * Build a catalog entry, parsing the value label and inferring what is missing
 */
export function createCatalogEntry(input: CatalogEntryInput): CatalogEntry {
    const kind = input.kind ?? inferComponentKind(input.network);
    let nominalValue: number | undefined;
    let label = input.value;

    if (input.value !== undefined) {
        nominalValue = parseEngineeringNotation(input.value, kind === ComponentKind.Unknown ? undefined : unitOf(kind));
    } else {
        nominalValue = estimateNominalValue(input.network, kind);
        if (nominalValue !== undefined) {
            label = formatComponentValue(nominalValue, unitOf(kind));
        }
    }

    return Object.freeze({
        network: input.network,
        kind,
        partNumber: input.partNumber,
        manufacturer: input.manufacturer ?? '',
        ...(label !== undefined ? { label } : {}),
        ...(nominalValue !== undefined ? { nominalValue } : {}),
    });
}

// ==================== Catalog ====================

const CAPACITOR_TOKENS = new Set(['capacitor', 'cap', 'c']);
const INDUCTOR_TOKENS = new Set(['inductor', 'ind', 'l']);

export class ComponentCatalog implements Iterable<CatalogEntry> {
    readonly entries: readonly CatalogEntry[];

    constructor(entries: readonly CatalogEntry[] = []) {
        this.entries = Object.freeze([...entries]);
    }

    get size(): number {
        return this.entries.length;
    }

    [Symbol.iterator](): Iterator<CatalogEntry> {
        return this.entries[Symbol.iterator]();
    }

    /** New catalog with one more entry */
    with(entry: CatalogEntry): ComponentCatalog {
        return new ComponentCatalog([...this.entries, entry]);
    }

    byKind(kind: ComponentKind): CatalogEntry[] {
        return this.entries.filter(e => e.kind === kind);
    }

    capacitors(): CatalogEntry[] {
        return this.byKind(ComponentKind.Capacitor);
    }

    inductors(): CatalogEntry[] {
        return this.byKind(ComponentKind.Inductor);
    }

    byManufacturer(manufacturer: string): CatalogEntry[] {
        const wanted = manufacturer.toLowerCase();
        return this.entries.filter(e => e.manufacturer.toLowerCase() === wanted);
    }

    /**
     * Whitespace-separated query; every token must match.
     *
     * 'capacitor', 'cap', 'c' (and 'inductor', 'ind', 'l') select by kind. Other
     * tokens match a substring of the manufacturer, part number or value label.
     */
    search(query: string): CatalogEntry[] {
        const tokens = query.toLowerCase().trim().split(/\s+/).filter(t => t.length > 0);
        return this.entries.filter(entry => tokens.every(token => {
            if (CAPACITOR_TOKENS.has(token)) return entry.kind === ComponentKind.Capacitor;
            if (INDUCTOR_TOKENS.has(token)) return entry.kind === ComponentKind.Inductor;
            return entry.manufacturer.toLowerCase().includes(token)
                || entry.partNumber.toLowerCase().includes(token)
                || (entry.label?.toLowerCase().includes(token) ?? false);
        }));
    }

    /**
     * Entries whose data spans [min, max]
     */
    filterByFrequencyRange(min: number, max: number): CatalogEntry[] {
        return this.entries.filter(e => {
            const [lo, hi] = frequencyRange(e.network);
            return lo <= min && hi >= max;
        });
    }

    /**
     * Split entries by whether they have a sample within a relative `tolerance`
     * of every frequency in `grid`
     */
    validateFrequencyCoverage(grid: readonly number[], tolerance = 0.01): CoverageReport {
        if (!(tolerance >= 0)) {
            throw new ValidationError(`Coverage tolerance must be non-negative, got ${tolerance}`);
        }
        const report: CoverageReport = { valid: [], rejected: [] };
        for (const entry of this.entries) {
            const missingFrequencies = grid.filter(f => !entry.network.frequencies.some(
                g => f === 0 ? g === 0 : Math.abs(g - f) / f < tolerance
            ));
            if (missingFrequencies.length === 0) {
                report.valid.push(entry);
            } else {
                report.rejected.push({ entry, missingFrequencies });
            }
        }
        return report;
    }

    summary(): CatalogSummary {
        const manufacturers = [...new Set(
            this.entries.map(e => e.manufacturer.toLowerCase()).filter(m => m.length > 0)
        )];
        const values = new Set(
            this.entries.flatMap(e => (e.label !== undefined ? [e.label.toLowerCase()] : []))
        );
        const summary: CatalogSummary = {
            total: this.size,
            capacitors: this.capacitors().length,
            inductors: this.inductors().length,
            manufacturers,
            uniqueValues: values.size,
        };
        if (this.size > 0) {
            const ranges = this.entries.map(e => frequencyRange(e.network));
            summary.frequencyRange = [
                Math.min(...ranges.map(r => r[0])),
                Math.max(...ranges.map(r => r[1])),
            ];
        }
        return summary;
    }
}
