import type { ComparableField } from './entity.js';
import type { SourceName } from './record.js';

/**
 * A statistic that either has a value or explicitly could not be computed.
 * `insufficient_data` is the InsufficientDataMarker: it is never folded into 0 or null.
 */
export type Metric<T> =
    | { status: 'ok'; value: T }
    | InsufficientDataMarker;

export interface InsufficientDataMarker {
    status: 'insufficient_data';
    reason: string;
}

export function measured<T>(value: T): Metric<T> {
    return { status: 'ok', value };
}

export function insufficient<T>(reason: string): Metric<T> {
    return { status: 'insufficient_data', reason };
}

export interface HubRow {
    rank: number;
    key: string;
    inDegree: number;
    applicant: string | null;
    productCode: string | null;
}

export interface ChainStep {
    depth: number;
    key: string;
    /** Entity this step was reached from; null for the root */
    parent: string | null;
    /** Predicate slot of the edge followed; null for the root */
    ordinal: number | null;
}

/** CycleDetectedNotice: a revisit of a node already on the traversal path. */
export interface CycleRecord {
    kind: 'cycle';
    /** First and last elements are the same key */
    path: string[];
}

export interface ChainResult {
    root: string;
    rootFound: boolean;
    maxDepth: number;
    steps: ChainStep[];
    cycles: CycleRecord[];
    /** True when at least one branch was cut at the depth bound */
    truncated: boolean;
}

export interface ChainSummary {
    root: string;
    depth: number;
    path: string[];
}

export interface PredicateAge {
    citing: string;
    cited: string;
    ordinal: number | null;
    ageDays: Metric<number>;
}

export interface AgeSummary {
    sampleSize: number;
    excluded: number;
    meanDays: Metric<number>;
    medianDays: Metric<number>;
    minDays: Metric<number>;
    maxDays: Metric<number>;
}

export interface CrossSourceMismatch {
    kind: 'cross_source_mismatch';
    key: string;
    field: ComparableField;
    sourceA: SourceName;
    valueA: string;
    sourceB: SourceName;
    valueB: string;
}

export interface CorrelationResult {
    coefficient: Metric<number>;
    sampleSize: number;
    excluded: number;
}

export type GapKind = 'dangling' | 'no_metadata';

export interface GapRow {
    key: string;
    kind: GapKind;
    citedBy: number;
}

export interface DerivedStats {
    hubs: HubRow[];
    chains: ChainSummary[];
    cycles: CycleRecord[];
    mismatches: CrossSourceMismatch[];
    gaps: GapRow[];
    ages: AgeSummary;
    correlation: CorrelationResult;
}
