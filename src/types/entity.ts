import type { DeviceType, EntityFields, SourceName } from './record.js';

/**
 * One source's contribution to an entity.
 */
export interface ProvenanceEntry {
    source: SourceName;

    /** Position in the precedence order (0 = most authoritative) */
    rank: number;

    /** Number of rows from this source that mapped to the entity */
    rowCount: number;

    /** Latest loader timestamp among those rows, if known */
    loadedAt: string | null;
}

/** Fields compared across sources by cross-source validation. */
export type ComparableField = 'productCode' | 'applicant';

export const COMPARABLE_FIELDS: readonly ComparableField[] = ['productCode', 'applicant'];

/** The value one source reported for a comparable field. */
export interface SourceValue {
    source: SourceName;
    value: string;
}

/**
 * Entity: a regulatory submission, one per canonical key.
 * Scalars are already resolved by source precedence.
 */
export interface Entity extends EntityFields {
    key: string;
    baseKey: string;
    supplementSeq: number;
    deviceType: DeviceType;

    /** True when the entity exists only because something cites it */
    isStub: boolean;

    /** Whether any contributing source declares predicates for this entity */
    declaresPredicates: boolean;

    referenceDevices: string[];

    /** Sorted by rank */
    provenance: ProvenanceEntry[];

    /** Per-source values of the comparable fields, sorted by source rank */
    sourceValues: Record<ComparableField, SourceValue[]>;
}

/**
 * A "citing cites cited" declaration as reported by one source, before graph building.
 */
export interface CitationDeclaration {
    citing: string;
    cited: string;
    /** 1-based predicate slot */
    ordinal: number;
    source: SourceName;
}
