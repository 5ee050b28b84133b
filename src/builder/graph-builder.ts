import {
    ALL_SOURCES,
    DEFAULT_CONFIG,
    edgeKey,
    type CitationDeclaration,
    type CitationEdge,
    type Entity,
    type MalformedRowInfo,
    type NormalizationReport,
    type ReconcileOptions,
    type SourceBatch,
    type SourceName,
} from '../types/index.js';
import { CitationGraph, compareKeys } from '../graph/citation-graph.js';
import { parseIdentifier } from '../ingest/identifiers.js';
import { emptyFields, normalizeBatch } from '../ingest/normalizer.js';
import { IdentityResolver, completePrecedence, type ResolutionResult } from '../resolve/identity-resolver.js';
import { componentLogger } from '../utils/logger.js';

/**
 * Outcome of a full reconciliation run.
 */
export interface Reconciliation {
    graph: CitationGraph;
    reports: NormalizationReport[];
    /** Sources that produced at least one record, in precedence order */
    contributingSources: SourceName[];
    /** Sources that produced nothing (absent or all rows rejected) */
    missingSources: SourceName[];
    errors: MalformedRowInfo[];
    precedence: SourceName[];
}

/**
 * Full pipeline:
 *
 * 1. Normalize every batch (concurrently, one task per batch)
 * 2. Resolve identities in precedence order
 * 3. Build the citation graph
 *
 * Any subset of sources may be absent; the graph is built from whatever is present.
 */
export async function reconcile(
    batches: SourceBatch[],
    options: ReconcileOptions = { sourcePrecedence: DEFAULT_CONFIG.sourcePrecedence }
): Promise<Reconciliation> {
    const logger = componentLogger('builder');
    const precedence = completePrecedence(options.sourcePrecedence);

    logger.info({ batches: batches.map((b) => b.source), precedence }, 'Starting reconciliation');

    // ──────────────────────────────────────────────────
    // Step 1: Normalize batches independently
    // ──────────────────────────────────────────────────
    const reports = await Promise.all(batches.map(async (batch) => normalizeBatch(batch)));

    // ──────────────────────────────────────────────────
    // Step 2: Consolidate identities
    // ──────────────────────────────────────────────────
    const resolver = new IdentityResolver({ sourcePrecedence: precedence });
    const ordered = [...reports].sort((a, b) => resolver.rankOf(a.source) - resolver.rankOf(b.source));
    for (const report of ordered) {
        resolver.apply(report.records);
    }
    const resolution = resolver.resolve();

    // ──────────────────────────────────────────────────
    // Step 3: Build the graph
    // ──────────────────────────────────────────────────
    const graph = buildCitationGraph(resolution);

    const contributing = new Set(reports.filter((r) => r.records.length > 0).map((r) => r.source));
    const contributingSources = precedence.filter((s) => contributing.has(s));
    const missingSources = ALL_SOURCES.filter((s) => !contributing.has(s));
    const errors = reports.flatMap((r) => r.errors);

    logger.info(
        {
            entities: graph.order,
            edges: graph.size,
            contributingSources,
            missingSources,
            malformedRows: errors.length,
        },
        'Reconciliation complete'
    );

    return { graph, reports, contributingSources, missingSources, errors, precedence };
}

/**
 * Build the citation graph from resolved identities.
 *
 * One edge per (citing, cited) pair: its source and ordinal come from the most authoritative
 * declaring source. Targets never observed become stub entities.
 */
export function buildCitationGraph(resolution: ResolutionResult): CitationGraph {
    const logger = componentLogger('builder');
    const rank = new Map(resolution.precedence.map((source, i) => [source, i]));
    const rankOf = (source: SourceName): number => rank.get(source) ?? rank.size;

    const entities = new Map<string, Entity>();
    for (const entity of resolution.entities) {
        entities.set(entity.key, entity);
    }

    const grouped = new Map<string, CitationDeclaration[]>();
    for (const declaration of resolution.declarations) {
        const key = edgeKey(declaration.citing, declaration.cited);
        const group = grouped.get(key);
        if (group) {
            group.push(declaration);
        } else {
            grouped.set(key, [declaration]);
        }
    }

    const edges: CitationEdge[] = [];
    for (const group of grouped.values()) {
        group.sort((a, b) => rankOf(a.source) - rankOf(b.source) || a.ordinal - b.ordinal);
        const [primary] = group;
        if (!primary) continue;

        const sources: SourceName[] = [];
        for (const declaration of group) {
            if (!sources.includes(declaration.source)) sources.push(declaration.source);
        }

        edges.push({
            citing: primary.citing,
            cited: primary.cited,
            ordinal: primary.ordinal,
            source: primary.source,
            sources,
        });

        if (!entities.has(primary.cited)) {
            logger.debug({ citing: primary.citing, cited: primary.cited }, 'Dangling reference resolved to stub');
            entities.set(primary.cited, createStub(primary.cited));
        }
    }

    return assembleGraph(entities.values(), edges);
}

/**
 * Assemble a graph from finished tables (e.g. reloaded from storage), adding stubs for any
 * edge endpoint that is missing. Input order does not matter.
 */
export function assembleGraph(entities: Iterable<Entity>, edges: Iterable<CitationEdge>): CitationGraph {
    const byKey = new Map<string, Entity>();
    for (const entity of entities) {
        byKey.set(entity.key, entity);
    }

    const edgeList = [...edges].sort(
        (a, b) => compareKeys(a.citing, b.citing) || compareKeys(a.cited, b.cited)
    );
    for (const edge of edgeList) {
        for (const key of [edge.citing, edge.cited]) {
            if (!byKey.has(key)) byKey.set(key, createStub(key));
        }
    }

    const entityList = [...byKey.values()].sort((a, b) => compareKeys(a.key, b.key));
    return new CitationGraph(entityList, edgeList);
}

/**
 * Entity with nothing but its key, standing in for a target no source described.
 */
export function createStub(key: string): Entity {
    const parsed = parseIdentifier(key);
    if (!parsed) {
        throw new Error(`Cannot create stub for invalid key ${key}`);
    }
    return {
        key,
        baseKey: parsed.baseKey,
        supplementSeq: parsed.supplementSeq,
        deviceType: parsed.deviceType,
        ...emptyFields(),
        isStub: true,
        declaresPredicates: false,
        referenceDevices: [],
        provenance: [],
        sourceValues: { productCode: [], applicant: [] },
    };
}
