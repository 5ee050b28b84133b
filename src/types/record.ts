/**
 * Sources that report submission records.
 *
 *   direct_mapping: curated submission → predicate table
 *   extraction:     predicates pulled out of summary documents
 *   metadata:       the agency's submission database dump
 *   supplement:     supplement numbers found in documents
 */
export type SourceName = 'direct_mapping' | 'extraction' | 'metadata' | 'supplement';

export const ALL_SOURCES: readonly SourceName[] = [
    'direct_mapping',
    'extraction',
    'metadata',
    'supplement',
];

/** A raw row as read by a loader: column name → cell value. */
export type RawRow = Record<string, unknown>;

/**
 * A batch of rows from one source, already in memory.
 */
export interface SourceBatch {
    source: SourceName;
    rows: RawRow[];

    /** Where the rows came from (file path, URL); informational only */
    origin?: string;

    /** ISO timestamp of when the loader read the rows */
    loadedAt?: string;
}

/** Regulatory pathway implied by a key's prefix. */
export type DeviceType = '510k' | 'pma' | 'de_novo' | 'pre_amendment';

/**
 * Scalar fields an observation may carry. All optional: sources report different subsets.
 */
export interface EntityFields {
    applicant: string | null;
    deviceName: string | null;
    /** YYYY-MM-DD */
    decisionDate: string | null;
    /** YYYY-MM-DD */
    dateReceived: string | null;
    productCode: string | null;
    documentType: string | null;
    reviewAdvisoryCommittee: string | null;
    thirdParty: boolean | null;
    expedited: boolean | null;
    statementOrSummary: string | null;
    reviewDays: number | null;
}

export type EntityFieldName = keyof EntityFields;

export const ENTITY_FIELD_NAMES: readonly EntityFieldName[] = [
    'applicant',
    'deviceName',
    'decisionDate',
    'dateReceived',
    'productCode',
    'documentType',
    'reviewAdvisoryCommittee',
    'thirdParty',
    'expedited',
    'statementOrSummary',
    'reviewDays',
];

/** Version of the normalized record shape produced by the normalizer. */
export const NORMALIZED_SCHEMA_VERSION = 1;

/**
 * One validated row, in the shape shared by every source.
 */
export interface NormalizedRecord {
    schemaVersion: typeof NORMALIZED_SCHEMA_VERSION;
    source: SourceName;

    /** Position of the row in its batch (0-indexed) */
    rowIndex: number;

    /** Canonical key, e.g. "K203456" or "P170019/S001" */
    key: string;
    baseKey: string;
    supplementSeq: number;
    deviceType: DeviceType;

    fields: EntityFields;

    /** Predicate keys in slot order, duplicates removed */
    predicates: string[];

    /** Whether this source declares predicates at all (an empty list then means "none cited") */
    declaresPredicates: boolean;

    referenceDevices: string[];

    /** Predicate/reference cells that did not parse as a key */
    invalidReferences: string[];

    loadedAt: string | null;
}

/**
 * Outcome of normalizing one batch. Never partial: every row ends up in exactly one bucket.
 */
export interface NormalizationReport {
    source: SourceName;
    origin: string | null;
    totalRows: number;
    records: NormalizedRecord[];
    errors: MalformedRowInfo[];
    blankRows: number;
}

/** Plain-data view of a MalformedRowError, for reports and storage. */
export interface MalformedRowInfo {
    source: SourceName;
    rowIndex: number;
    reason: string;
    row: RawRow;
}
