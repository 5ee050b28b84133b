import type { CitationEdge, Entity, SourceBatch, SourceName } from '../types/index.js';
import { createStub } from '../builder/graph-builder.js';

/**
 * A non-stub entity seen in metadata; override whatever the test needs.
 */
export function makeEntity(key: string, overrides: Partial<Entity> = {}): Entity {
    return {
        ...createStub(key),
        isStub: false,
        provenance: [{ source: 'metadata', rank: 2, rowCount: 1, loadedAt: null }],
        ...overrides,
    };
}

export function makeEdge(
    citing: string,
    cited: string,
    ordinal = 1,
    sources: SourceName[] = ['direct_mapping']
): CitationEdge {
    return { citing, cited, ordinal, source: sources[0] ?? 'direct_mapping', sources };
}

/**
 * Three sources describing a small lineage:
 *
 *   K210005 → K200001 → K190002
 *                    ↘ K190001
 *   K210005 → K180009 (never described: becomes a stub)
 */
export function sampleBatches(): SourceBatch[] {
    return [
        {
            source: 'metadata',
            rows: [
                {
                    KNUMBER: 'K200001',
                    APPLICANT: 'Acme Medical',
                    DEVICENAME: 'Cardio Widget',
                    DATERECEIVED: '2020-05-01',
                    DECISIONDATE: '2020-06-01',
                    PRODUCTCODE: 'DQY',
                },
                { KNUMBER: 'K190001', APPLICANT: 'Beta Devices', DECISIONDATE: '2019-06-01', PRODUCTCODE: 'DQY' },
                { KNUMBER: 'K190002', APPLICANT: 'Gamma Corp', DECISIONDATE: '2019-01-15' },
            ],
        },
        {
            source: 'extraction',
            rows: [
                { 'K Number': 'K200001', Predicates: 'K190001' },
                { 'K Number': 'K210005', Predicates: 'K200001; K180009' },
            ],
        },
        {
            source: 'direct_mapping',
            rows: [{ ID: 'K200001', PREDICATE1: 'K190002', PREDICATE2: 'K190001' }],
        },
    ];
}
