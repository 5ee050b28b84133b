import type {
    CitationEdge,
    CrossSourceMismatch,
    Entity,
    HubRow,
    Metric,
    ProvenanceEntry,
    SourceName,
} from '../types/index.js';
import type { CitationGraph } from '../graph/citation-graph.js';
import { crossSourceValidation, predicateAge, rankHubs } from '../graph/algorithms.js';
import { toCanonicalKey } from '../ingest/identifiers.js';

export type ProfileQuery =
    | { kind: 'key'; key: string }
    | { kind: 'productCode'; productCode: string }
    | { kind: 'name'; fragment: string };

/** The other end of a citation, with enough metadata to read it without a second lookup. */
export interface CitationRef {
    key: string;
    ordinal: number;
    source: SourceName;
    sources: SourceName[];
    applicant: string | null;
    decisionDate: string | null;
    isStub: boolean;
}

export interface OutboundCitation extends CitationRef {
    ageDays: Metric<number>;
}

export interface EntityProfile {
    entity: Entity;
    provenance: ProvenanceEntry[];
    /** Who cites this entity as a predicate */
    inbound: CitationRef[];
    /** What this entity cites, in ordinal order */
    outbound: OutboundCitation[];
    /** Null when nobody cites the entity */
    hub: HubRow | null;
    mismatches: CrossSourceMismatch[];
    /** Supplements filed against this entity's base submission */
    supplements: string[];
    /** For a supplement: its base submission, when present in the graph */
    baseSubmission: string | null;
}

/**
 * Consolidated per-entity views over one graph. Lookup indexes are built on first use.
 */
export class ProfileAggregator {
    private hubIndex: Map<string, HubRow> | null = null;
    private mismatchIndex: Map<string, CrossSourceMismatch[]> | null = null;
    private supplementIndex: Map<string, string[]> | null = null;

    constructor(private readonly graph: CitationGraph) {}

    lookup(query: ProfileQuery): EntityProfile[] {
        switch (query.kind) {
            case 'key': {
                const profile = this.byKey(query.key);
                return profile ? [profile] : [];
            }
            case 'productCode':
                return this.byProductCode(query.productCode);
            case 'name':
                return this.byName(query.fragment);
        }
    }

    /**
     * Profile for one submission number, in any accepted spelling ("k203456", "P170019 S001").
     */
    byKey(raw: string): EntityProfile | null {
        const key = toCanonicalKey(raw);
        if (key === null || !this.graph.hasEntity(key)) return null;
        return this.build(key);
    }

    byProductCode(productCode: string): EntityProfile[] {
        const code = productCode.trim().toUpperCase();
        if (code === '') return [];
        return this.graph
            .entities()
            .filter((entity) => entity.productCode === code)
            .map((entity) => this.build(entity.key));
    }

    /**
     * Case-insensitive substring match over applicant and device name. Returns every match.
     */
    byName(fragment: string): EntityProfile[] {
        const needle = fragment.trim().toLowerCase();
        if (needle === '') return [];
        return this.graph
            .entities()
            .filter((entity) =>
                [entity.applicant, entity.deviceName].some((value) => value?.toLowerCase().includes(needle))
            )
            .map((entity) => this.build(entity.key));
    }

    private build(key: string): EntityProfile {
        const entity = this.graph.getEntity(key);
        if (!entity) {
            throw new Error(`Entity ${key} not in graph`);
        }

        const inbound = this.graph.incoming(key).map((edge) => this.ref(edge, edge.citing));
        const outbound = this.graph.outgoing(key).map((edge) => ({
            ...this.ref(edge, edge.cited),
            ageDays: predicateAge(this.graph, edge.citing, edge.cited).ageDays,
        }));

        const siblings = this.supplements().get(entity.baseKey) ?? [];
        const baseSubmission =
            entity.supplementSeq > 0 && this.graph.hasEntity(entity.baseKey) ? entity.baseKey : null;

        return {
            entity,
            provenance: entity.provenance,
            inbound,
            outbound,
            hub: this.hubs().get(key) ?? null,
            mismatches: this.mismatches().get(key) ?? [],
            supplements: siblings.filter((k) => k !== key),
            baseSubmission,
        };
    }

    private ref(edge: CitationEdge, otherKey: string): CitationRef {
        const other = this.graph.getEntity(otherKey);
        return {
            key: otherKey,
            ordinal: edge.ordinal,
            source: edge.source,
            sources: edge.sources,
            applicant: other?.applicant ?? null,
            decisionDate: other?.decisionDate ?? null,
            isStub: other?.isStub ?? true,
        };
    }

    private hubs(): Map<string, HubRow> {
        if (!this.hubIndex) {
            this.hubIndex = new Map(rankHubs(this.graph, this.graph.order).map((row) => [row.key, row]));
        }
        return this.hubIndex;
    }

    private mismatches(): Map<string, CrossSourceMismatch[]> {
        if (!this.mismatchIndex) {
            const index = new Map<string, CrossSourceMismatch[]>();
            for (const mismatch of crossSourceValidation(this.graph)) {
                index.set(mismatch.key, [...(index.get(mismatch.key) ?? []), mismatch]);
            }
            this.mismatchIndex = index;
        }
        return this.mismatchIndex;
    }

    private supplements(): Map<string, string[]> {
        if (!this.supplementIndex) {
            const index = new Map<string, string[]>();
            for (const entity of this.graph.entities()) {
                if (entity.supplementSeq === 0) continue;
                index.set(entity.baseKey, [...(index.get(entity.baseKey) ?? []), entity.key]);
            }
            this.supplementIndex = index;
        }
        return this.supplementIndex;
    }
}
