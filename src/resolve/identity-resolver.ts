import {
    ALL_SOURCES,
    COMPARABLE_FIELDS,
    DEFAULT_CONFIG,
    ENTITY_FIELD_NAMES,
    type CitationDeclaration,
    type ComparableField,
    type Entity,
    type EntityFields,
    type NormalizedRecord,
    type ProvenanceEntry,
    type ReconcileOptions,
    type SourceName,
    type SourceValue,
} from '../types/index.js';
import { emptyFields, reviewDuration } from '../ingest/normalizer.js';
import { componentLogger } from '../utils/logger.js';

/**
 * Entities plus the citation declarations found while merging them.
 */
export interface ResolutionResult {
    /** Sorted by key */
    entities: Entity[];
    /** Sorted by citing key, then source rank, then ordinal */
    declarations: CitationDeclaration[];
    /** The complete precedence order used */
    precedence: SourceName[];
}

/**
 * Complete a precedence list: sources left out rank after the listed ones, in default order.
 */
export function completePrecedence(listed: readonly SourceName[]): SourceName[] {
    const unique = listed.filter((source, i) => listed.indexOf(source) === i);
    return [...unique, ...ALL_SOURCES.filter((s) => !unique.includes(s))];
}

/**
 * Merges normalized records that share a canonical key into one Entity.
 *
 * Records are only collected by `apply`; all merging happens in `resolve`, where each key's
 * observations are put in a total order (source rank, then later row first) before fields are
 * picked. Resolution is therefore independent of the order in which batches were applied.
 */
export class IdentityResolver {
    private readonly byKey = new Map<string, NormalizedRecord[]>();
    private readonly precedence: SourceName[];
    private readonly rank: Map<SourceName, number>;

    constructor(options: ReconcileOptions = { sourcePrecedence: DEFAULT_CONFIG.sourcePrecedence }) {
        this.precedence = completePrecedence(options.sourcePrecedence);
        this.rank = new Map(this.precedence.map((source, i) => [source, i]));
    }

    apply(records: Iterable<NormalizedRecord>): this {
        for (const record of records) {
            const list = this.byKey.get(record.key);
            if (list) {
                list.push(record);
            } else {
                this.byKey.set(record.key, [record]);
            }
        }
        return this;
    }

    resolve(): ResolutionResult {
        const entities: Entity[] = [];
        const declarations: CitationDeclaration[] = [];

        const keys = Array.from(this.byKey.keys()).sort();
        for (const key of keys) {
            const observations = [...(this.byKey.get(key) ?? [])].sort((a, b) => this.compare(a, b));
            entities.push(this.mergeEntity(key, observations));
            declarations.push(...this.collectDeclarations(observations));
        }

        componentLogger('resolver').debug(
            { entities: entities.length, declarations: declarations.length },
            'Identities resolved'
        );

        return { entities, declarations, precedence: [...this.precedence] };
    }

    rankOf(source: SourceName): number {
        return this.rank.get(source) ?? this.precedence.length;
    }

    // ─── Internal helpers ─────────────────────────────────

    /**
     * Total order over observations of one key: most authoritative source first; inside a
     * source, the later row first; remaining ties broken on content.
     */
    private compare(a: NormalizedRecord, b: NormalizedRecord): number {
        return (
            this.rankOf(a.source) - this.rankOf(b.source) ||
            b.rowIndex - a.rowIndex ||
            compareStrings(fingerprint(a), fingerprint(b))
        );
    }

    private mergeEntity(key: string, observations: NormalizedRecord[]): Entity {
        const [first] = observations;
        if (!first) {
            throw new Error(`No observations for ${key}`);
        }

        const fields = emptyFields();
        for (const name of ENTITY_FIELD_NAMES) {
            const winner = observations.find((o) => o.fields[name] !== null);
            if (winner) {
                assignField(fields, winner.fields, name);
            }
        }
        fields.reviewDays = reviewDuration(fields.dateReceived, fields.decisionDate);

        const referenceDevices: string[] = [];
        for (const observation of observations) {
            for (const ref of observation.referenceDevices) {
                if (!referenceDevices.includes(ref)) referenceDevices.push(ref);
            }
        }

        return {
            key,
            baseKey: first.baseKey,
            supplementSeq: first.supplementSeq,
            deviceType: first.deviceType,
            ...fields,
            isStub: false,
            declaresPredicates: observations.some((o) => o.declaresPredicates),
            referenceDevices,
            provenance: this.buildProvenance(observations),
            sourceValues: this.buildSourceValues(observations),
        };
    }

    private buildProvenance(observations: NormalizedRecord[]): ProvenanceEntry[] {
        const entries = new Map<SourceName, ProvenanceEntry>();
        for (const observation of observations) {
            const entry = entries.get(observation.source);
            if (entry) {
                entry.rowCount++;
                entry.loadedAt = latest(entry.loadedAt, observation.loadedAt);
            } else {
                entries.set(observation.source, {
                    source: observation.source,
                    rank: this.rankOf(observation.source),
                    rowCount: 1,
                    loadedAt: observation.loadedAt,
                });
            }
        }
        return Array.from(entries.values()).sort((a, b) => a.rank - b.rank);
    }

    /**
     * The value each source settled on for the comparable fields (its own winning row).
     */
    private buildSourceValues(observations: NormalizedRecord[]): Record<ComparableField, SourceValue[]> {
        const result: Record<ComparableField, SourceValue[]> = { productCode: [], applicant: [] };
        for (const field of COMPARABLE_FIELDS) {
            const seen = new Set<SourceName>();
            for (const observation of observations) {
                const value = observation.fields[field];
                if (value === null || seen.has(observation.source)) continue;
                seen.add(observation.source);
                result[field].push({ source: observation.source, value });
            }
        }
        return result;
    }

    /**
     * Every row of a declaring source adds its predicates. A predicate listed by several rows
     * keeps its lowest slot; on equal slots the later row wins.
     */
    private collectDeclarations(observations: NormalizedRecord[]): CitationDeclaration[] {
        const bySource = new Map<SourceName, Map<string, CitationDeclaration>>();
        for (const observation of observations) {
            if (!observation.declaresPredicates) continue;
            const declared = bySource.get(observation.source) ?? new Map<string, CitationDeclaration>();
            bySource.set(observation.source, declared);
            observation.predicates.forEach((cited, i) => {
                const existing = declared.get(cited);
                if (existing && existing.ordinal <= i + 1) return;
                declared.set(cited, { citing: observation.key, cited, ordinal: i + 1, source: observation.source });
            });
        }

        return Array.from(bySource.values()).flatMap((declared) =>
            Array.from(declared.values()).sort((a, b) => a.ordinal - b.ordinal || compareStrings(a.cited, b.cited))
        );
    }
}

/**
 * One-shot resolution of a record set.
 */
export function resolveRecords(
    records: Iterable<NormalizedRecord>,
    options?: ReconcileOptions
): ResolutionResult {
    return new IdentityResolver(options).apply(records).resolve();
}

function assignField<K extends keyof EntityFields>(target: EntityFields, source: EntityFields, name: K): void {
    target[name] = source[name];
}

function latest(a: string | null, b: string | null): string | null {
    if (a === null) return b;
    if (b === null) return a;
    return a >= b ? a : b;
}

function fingerprint(record: NormalizedRecord): string {
    return JSON.stringify([record.fields, record.predicates, record.referenceDevices, record.loadedAt]);
}

function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
