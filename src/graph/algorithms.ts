import {
    COMPARABLE_FIELDS,
    insufficient,
    measured,
    type AgeSummary,
    type AnalyticsOptions,
    type ChainResult,
    type ChainStep,
    type ChainSummary,
    type ComparableField,
    type CorrelationResult,
    type CrossSourceMismatch,
    type CycleRecord,
    type DerivedStats,
    type GapRow,
    type HubRow,
    type Metric,
    type PredicateAge,
} from '../types/index.js';
import { toCanonicalKey } from '../ingest/identifiers.js';
import { daysBetween } from '../utils/dates.js';
import { componentLogger } from '../utils/logger.js';
import { compareKeys, type CitationGraph } from './citation-graph.js';

/**
 * Rank entities by how often they are cited as a predicate.
 * Ties are broken by key ascending. Entities nobody cites are not ranked.
 *
 * @param topK - Maximum number of rows returned
 */
export function rankHubs(graph: CitationGraph, topK: number): HubRow[] {
    const counted = graph
        .entityKeys()
        .map((key) => ({ key, inDegree: graph.inDegree(key) }))
        .filter((row) => row.inDegree > 0)
        .sort((a, b) => b.inDegree - a.inDegree || compareKeys(a.key, b.key))
        .slice(0, Math.max(0, topK));

    return counted.map((row, i) => {
        const entity = graph.getEntity(row.key);
        return {
            rank: i + 1,
            key: row.key,
            inDegree: row.inDegree,
            applicant: entity?.applicant ?? null,
            productCode: entity?.productCode ?? null,
        };
    });
}

/**
 * Follow predicates depth-first from `root`, in ordinal order, at most `maxDepth` hops.
 *
 * Each entity appears once among the steps, at the shallowest depth it can be reached; an entity
 * met again on a shorter path is expanded again from there. An edge back to an entity on the
 * current path is reported as a cycle and not followed.
 */
export function traceChain(graph: CitationGraph, root: string, maxDepth: number): ChainResult {
    const rootKey = toCanonicalKey(root) ?? root;
    const result: ChainResult = {
        root: rootKey,
        rootFound: graph.hasEntity(rootKey),
        maxDepth,
        steps: [],
        cycles: [],
        truncated: false,
    };
    if (!result.rootFound) return result;

    const reached = new Map<string, ChainStep>([[rootKey, { depth: 0, key: rootKey, parent: null, ordinal: null }]]);
    const cycles = new Map<string, CycleRecord>();
    const path: string[] = [rootKey];
    const onPath = new Set<string>([rootKey]);

    const visit = (key: string, depth: number): void => {
        for (const edge of graph.outgoing(key)) {
            const next = edge.cited;
            if (onPath.has(next)) {
                const cycle = [...path.slice(path.indexOf(next)), next];
                cycles.set(cycle.join('>'), { kind: 'cycle', path: cycle });
                continue;
            }
            if (depth >= maxDepth) continue;
            const seen = reached.get(next);
            if (seen && seen.depth <= depth + 1) continue;

            reached.set(next, { depth: depth + 1, key: next, parent: key, ordinal: edge.ordinal });
            path.push(next);
            onPath.add(next);
            visit(next, depth + 1);
            path.pop();
            onPath.delete(next);
        }
    };
    visit(rootKey, 0);

    const steps = [...reached.values()];
    result.cycles = [...cycles.values()];
    result.truncated = steps.some(
        (step) => step.depth >= maxDepth && graph.outgoing(step.key).some((edge) => !reached.has(edge.cited))
    );

    if (result.cycles.length > 0) {
        componentLogger('analytics').debug({ root: rootKey, cycles: result.cycles.length }, 'Cycles met during chain traversal');
    }

    return { ...result, steps };
}

/**
 * For every lineage root (cites something, cited by nobody), the longest predicate path
 * within `maxDepth` hops. Among equally long paths the first in ordinal order wins.
 */
export function listChains(graph: CitationGraph, maxDepth: number): ChainSummary[] {
    const roots = graph
        .entityKeys()
        .filter((key) => graph.outDegree(key) > 0 && graph.inDegree(key) === 0);

    return roots.map((root) => {
        let best: string[] = [root];
        const path: string[] = [root];
        const onPath = new Set<string>([root]);

        const walk = (key: string): void => {
            if (path.length > best.length) best = [...path];
            if (path.length - 1 >= maxDepth) return;
            for (const edge of graph.outgoing(key)) {
                if (onPath.has(edge.cited)) continue;
                path.push(edge.cited);
                onPath.add(edge.cited);
                walk(edge.cited);
                path.pop();
                onPath.delete(edge.cited);
            }
        };
        walk(root);

        return { root, depth: best.length - 1, path: best };
    });
}

/**
 * Every elementary cycle in the graph, each reported once, rotated to start at its smallest key.
 * Self-citations are cycles of one.
 *
 * Enumeration follows Johnson's algorithm: cycles through each start key are searched among keys
 * not smaller than it, with blocked sets so no dead end is explored twice for the same start.
 */
export function detectCycles(graph: CitationGraph): CycleRecord[] {
    const successors = new Map<string, string[]>();
    for (const key of graph.entityKeys()) {
        successors.set(key, [...new Set(graph.outgoing(key).map((edge) => edge.cited))]);
    }

    const cycles: string[][] = [];
    for (const start of graph.entityKeys()) {
        const blocked = new Set<string>();
        const blockedBy = new Map<string, Set<string>>();
        const stack: string[] = [];
        const next = (key: string): string[] =>
            (successors.get(key) ?? []).filter((target) => compareKeys(target, start) >= 0);

        const unblock = (key: string): void => {
            blocked.delete(key);
            const waiting = blockedBy.get(key);
            if (!waiting) return;
            blockedBy.delete(key);
            for (const other of waiting) {
                if (blocked.has(other)) unblock(other);
            }
        };

        const circuit = (key: string): boolean => {
            let closed = false;
            stack.push(key);
            blocked.add(key);
            for (const target of next(key)) {
                if (target === start) {
                    cycles.push([...stack, start]);
                    closed = true;
                } else if (!blocked.has(target) && circuit(target)) {
                    closed = true;
                }
            }
            if (closed) {
                unblock(key);
            } else {
                for (const target of next(key)) {
                    const waiting = blockedBy.get(target) ?? new Set<string>();
                    waiting.add(key);
                    blockedBy.set(target, waiting);
                }
            }
            stack.pop();
            return closed;
        };
        circuit(start);
    }

    const sorted = cycles
        .sort((a, b) => compareKeys(a.join('>'), b.join('>')))
        .map((path): CycleRecord => ({ kind: 'cycle', path }));
    componentLogger('analytics').debug({ cycles: sorted.length }, 'Cycle detection complete');
    return sorted;
}

/**
 * Age of a predicate at the time it was cited: calendar days between the two decision dates.
 */
export function predicateAge(graph: CitationGraph, citing: string, cited: string): PredicateAge {
    const citingEntity = graph.getEntity(citing);
    const citedEntity = graph.getEntity(cited);
    const edge = graph.outgoing(citing).find((e) => e.cited === cited);
    const base = { citing, cited, ordinal: edge?.ordinal ?? null };

    if (!citingEntity || !citedEntity) {
        return { ...base, ageDays: insufficient(`unknown entity ${citingEntity ? cited : citing}`) };
    }
    if (citingEntity.decisionDate === null) {
        return { ...base, ageDays: insufficient(`${citing} has no decision date`) };
    }
    if (citedEntity.decisionDate === null) {
        return { ...base, ageDays: insufficient(`${cited} has no decision date`) };
    }
    return { ...base, ageDays: measured(daysBetween(citedEntity.decisionDate, citingEntity.decisionDate)) };
}

/**
 * Predicate age for each predicate `key` cites, in ordinal order.
 */
export function predicateAges(graph: CitationGraph, key: string): PredicateAge[] {
    return graph.outgoing(key).map((edge) => predicateAge(graph, edge.citing, edge.cited));
}

/**
 * Distribution of predicate ages over every edge (self-citations excluded).
 */
export function summarizePredicateAges(graph: CitationGraph): AgeSummary {
    const ages: number[] = [];
    let excluded = 0;

    for (const edge of graph.edges()) {
        if (edge.citing === edge.cited) continue;
        const { ageDays } = predicateAge(graph, edge.citing, edge.cited);
        if (ageDays.status === 'ok') {
            ages.push(ageDays.value);
        } else {
            excluded++;
        }
    }

    if (ages.length === 0) {
        const none = 'no citation with both decision dates';
        return {
            sampleSize: 0,
            excluded,
            meanDays: insufficient(none),
            medianDays: insufficient(none),
            minDays: insufficient(none),
            maxDays: insufficient(none),
        };
    }

    ages.sort((a, b) => a - b);
    const mid = Math.floor(ages.length / 2);
    const median = ages.length % 2 === 1 ? ages[mid] : ((ages[mid - 1] ?? 0) + (ages[mid] ?? 0)) / 2;

    return {
        sampleSize: ages.length,
        excluded,
        meanDays: measured(ages.reduce((sum, a) => sum + a, 0) / ages.length),
        medianDays: measured(median ?? 0),
        minDays: measured(ages[0] ?? 0),
        maxDays: measured(ages[ages.length - 1] ?? 0),
    };
}

/**
 * One mismatch per pair of sources that disagree on a comparable field of the same entity.
 */
export function crossSourceValidation(graph: CitationGraph): CrossSourceMismatch[] {
    const mismatches: CrossSourceMismatch[] = [];

    for (const entity of graph.entities()) {
        for (const field of COMPARABLE_FIELDS) {
            const values = entity.sourceValues[field];
            for (let i = 0; i < values.length; i++) {
                for (let j = i + 1; j < values.length; j++) {
                    const a = values[i];
                    const b = values[j];
                    if (!a || !b) continue;
                    if (comparable(field, a.value) === comparable(field, b.value)) continue;
                    mismatches.push({
                        kind: 'cross_source_mismatch',
                        key: entity.key,
                        field,
                        sourceA: a.source,
                        valueA: a.value,
                        sourceB: b.source,
                        valueB: b.value,
                    });
                }
            }
        }
    }

    return mismatches;
}

/**
 * Pearson correlation between predicate count and review duration.
 * Entities whose predicates were never declared, or without a review duration, are excluded.
 */
export function reviewTimeCorrelation(graph: CitationGraph): CorrelationResult {
    const xs: number[] = [];
    const ys: number[] = [];
    let excluded = 0;

    for (const entity of graph.entities()) {
        if (!entity.declaresPredicates || entity.reviewDays === null) {
            excluded++;
            continue;
        }
        xs.push(graph.outDegree(entity.key));
        ys.push(entity.reviewDays);
    }

    return { coefficient: pearson(xs, ys), sampleSize: xs.length, excluded };
}

/**
 * Entities the sources know too little about: cited stubs and entities absent from metadata.
 * Most-cited first.
 */
export function findGaps(graph: CitationGraph): GapRow[] {
    const gaps: GapRow[] = [];
    for (const entity of graph.entities()) {
        if (entity.isStub) {
            gaps.push({ key: entity.key, kind: 'dangling', citedBy: graph.inDegree(entity.key) });
        } else if (!entity.provenance.some((p) => p.source === 'metadata')) {
            gaps.push({ key: entity.key, kind: 'no_metadata', citedBy: graph.inDegree(entity.key) });
        }
    }
    return gaps.sort((a, b) => b.citedBy - a.citedBy || compareKeys(a.key, b.key));
}

/**
 * All derived statistics for one graph.
 */
export function computeDerivedStats(graph: CitationGraph, options: AnalyticsOptions): DerivedStats {
    return {
        hubs: rankHubs(graph, options.hubTopK),
        chains: listChains(graph, options.maxChainDepth),
        cycles: detectCycles(graph),
        mismatches: crossSourceValidation(graph),
        gaps: findGaps(graph),
        ages: summarizePredicateAges(graph),
        correlation: reviewTimeCorrelation(graph),
    };
}

// ─── Internal helpers ─────────────────────────────────

function comparable(field: ComparableField, value: string): string {
    const upper = value.toUpperCase();
    return field === 'applicant' ? upper.replace(/[^A-Z0-9]/g, '') : upper.trim();
}

function pearson(xs: number[], ys: number[]): Metric<number> {
    const n = xs.length;
    if (n < 3) {
        return insufficient(`need at least 3 entities with predicates and review time, have ${n}`);
    }

    const meanX = xs.reduce((s, x) => s + x, 0) / n;
    const meanY = ys.reduce((s, y) => s + y, 0) / n;

    let cov = 0;
    let varX = 0;
    let varY = 0;
    for (let i = 0; i < n; i++) {
        const dx = (xs[i] ?? meanX) - meanX;
        const dy = (ys[i] ?? meanY) - meanY;
        cov += dx * dy;
        varX += dx * dx;
        varY += dy * dy;
    }

    if (varX === 0 || varY === 0) {
        return insufficient('predicate count or review time does not vary');
    }
    return measured(cov / Math.sqrt(varX * varY));
}
