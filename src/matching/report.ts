/**
 * @module matching/report
 * @description Text rendering of search results
 */

import { ComponentKind, ConnectionRole } from '../models/network/types';
import { formatEngineeringNotation } from '../models/utils/engineering';
import type { SearchResult } from './result';
import type { ComponentCandidate } from './topology';

function kindLetter(kind: ComponentKind): string {
    switch (kind) {
        case ComponentKind.Capacitor:
            return 'C';
        case ComponentKind.Inductor:
            return 'L';
        case ComponentKind.Unknown:
            return '?';
    }
}

function formatOhms(value: number): string {
    return `${Number(value.toFixed(2))}Ω`;
}

function schematicPart(candidate: ComponentCandidate): string {
    const part = `[${kindLetter(candidate.entry.kind)}: ${candidate.entry.label ?? '?'}]`;
    switch (candidate.role) {
        case ConnectionRole.InLine:
            return `──${part}──`;
        case ConnectionRole.ToGround:
            return `┬─${part}─┴`;
    }
}

/**
 * One-line schematic, source on the left:
 * `Source──[C: 10pF]──┬─[L: 2.2nH]─┴── 50Ω Load`
 */
export function describeSolution(result: SearchResult): string {
    return ['Source', ...result.candidates.map(schematicPart), `── ${formatOhms(result.targetImpedance)} Load`].join('');
}

/**
 * Multi-line summary of a search result
 */
export function formatSearchReport(result: SearchResult): string {
    const { metrics } = result;
    const lines = [
        `Topology: ${result.topology.name} (${result.mode})`,
        `Schematic: ${describeSolution(result)}`,
        `Parts: ${result.candidates.map(c => c.entry.partNumber).join(', ')}`,
        `Reference: ${formatEngineeringNotation(result.referenceFrequency, 'Hz')}`,
        `|S11|: ${metrics.magnitude.toFixed(4)}  VSWR: ${metrics.vswr.toFixed(2)}  ` +
        `Return loss: ${metrics.returnLossDb.toFixed(2)} dB`,
        `Impedance: ${metrics.impedance.toString()} Ω (target ${formatOhms(result.targetImpedance)})`,
        `Matched: ${result.success ? 'yes' : 'no'}`,
    ];
    if (result.mode === 'bandwidth') {
        const [min, max] = result.frequencyRange;
        lines.push(
            `Band: ${formatEngineeringNotation(min, 'Hz')} - ${formatEngineeringNotation(max, 'Hz')}`,
            `Max VSWR in band: ${result.maxVswr.toFixed(2)}`,
            `Bandwidth: ${formatEngineeringNotation(result.bandwidthHz, 'Hz')}`
        );
    }
    lines.push(
        `Iterations: ${result.iterations} (${result.failures} failed), ${result.durationMs.toFixed(1)} ms`
            + (result.interrupted ? ', interrupted' : '')
    );
    return lines.join('\n');
}
