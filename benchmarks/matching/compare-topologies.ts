#!/usr/bin/env npx tsx
/**
 * @module benchmarks/matching/compare-topologies
 * @description Compare L, Pi and T sections on a synthetic mismatched device
 *
 * This example shows how to:
 * 1. Build a catalog of ideal capacitors and inductors
 * 2. Run single-frequency and bandwidth searches for each topology
 * 3. Print the text report and a comparison table
 *
 * Usage:
 *   npx tsx benchmarks/matching/compare-topologies.ts
 */

import { MemoryLogger } from '../../src/core/logging';
import {
    ComponentCatalog,
    TOPOLOGIES,
    countCombinations,
    createCatalogEntry,
    formatSearchReport,
    runBandwidthSearch,
    runSingleFrequencySearch,
    type SearchResult,
} from '../../src/matching';
import { ComponentKind, ConnectionRole, createLumpedElementNetwork } from '../../src/models/network';
import { formatEngineeringNotation } from '../../src/models/utils';

// ==========================================
// Scenario
// ==========================================

const BAND: [number, number] = [2.3e9, 2.5e9];
const CENTER = 2.4e9;
const AXIS = Array.from({ length: 21 }, (_, i) => BAND[0] + i * 10e6);

const CAPACITORS = [0.5e-12, 1e-12, 2.2e-12, 4.7e-12, 10e-12];
const INDUCTORS = [1e-9, 2.2e-9, 4.7e-9, 10e-9];

// Device: a 6.8 nH series inductance in front of the 50 Ω load
const device = createLumpedElementNetwork(
    { kind: ComponentKind.Inductor, value: 6.8e-9, role: ConnectionRole.InLine, order: 0 },
    AXIS
);

function buildCatalog(): ComponentCatalog {
    const entry = (kind: ComponentKind.Capacitor | ComponentKind.Inductor, value: number, i: number) =>
        createCatalogEntry({
            network: createLumpedElementNetwork({ kind, value, role: ConnectionRole.InLine, order: 0 }, AXIS),
            kind,
            partNumber: `${kind === ComponentKind.Capacitor ? 'C' : 'L'}-${i + 1}`,
            manufacturer: 'Ideal',
        });
    return new ComponentCatalog([
        ...CAPACITORS.map((value, i) => entry(ComponentKind.Capacitor, value, i)),
        ...INDUCTORS.map((value, i) => entry(ComponentKind.Inductor, value, i)),
    ]);
}

// ==========================================
// Main
// ==========================================

interface Row {
    topology: string;
    mode: string;
    result: SearchResult;
}

function main(): void {
    const catalog = buildCatalog();

    console.log('');
    console.log('============================================================');
    console.log('     Matching Network Topology Comparison                   ');
    console.log('============================================================');
    console.log('');
    console.log(`Band: ${formatEngineeringNotation(BAND[0], 'Hz')} - ${formatEngineeringNotation(BAND[1], 'Hz')}`);
    console.log(`Catalog: ${catalog.capacitors().length} capacitors, ${catalog.inductors().length} inductors`);

    const rows: Row[] = [];
    for (const topology of Object.values(TOPOLOGIES)) {
        console.log(`\n${topology.name}: ${countCombinations(catalog, topology)} combinations`);
        console.log('-'.repeat(40));

        const logger = new MemoryLogger({ logEvaluations: false });
        const single = runSingleFrequencySearch(device, catalog, topology, CENTER, { logger });
        const band = runBandwidthSearch(device, catalog, topology, BAND, { logger });
        console.log(formatSearchReport(band));

        rows.push({ topology: topology.name, mode: 'single', result: single });
        rows.push({ topology: topology.name, mode: 'band', result: band });
    }

    console.log('\n');
    console.log('Comparison Table:');
    console.log('='.repeat(72));
    console.log('| Topology | Mode   | VSWR @ ref | Max VSWR | Bandwidth   | Matched |');
    console.log('|----------|--------|------------|----------|-------------|---------|');
    for (const { topology, mode, result } of rows) {
        const name = topology.padEnd(8);
        const kind = mode.padEnd(6);
        const ref = result.metrics.vswr.toFixed(3).padStart(10);
        const worst = result.maxVswr.toFixed(3).padStart(8);
        const width = formatEngineeringNotation(result.bandwidthHz, 'Hz').padStart(11);
        const matched = (result.success ? 'yes' : 'no').padStart(7);
        console.log(`| ${name} | ${kind} | ${ref} | ${worst} | ${width} | ${matched} |`);
    }
    console.log('='.repeat(72));
}

main();
