import type { SourceName } from './record.js';

/**
 * CitationEdge: the citing submission names the cited one as a predicate.
 * One edge per (citing, cited) pair, whatever the number of sources that declared it.
 */
export interface CitationEdge {
    citing: string;
    cited: string;

    /** Lowest predicate slot (1-based) in the most authoritative declaring source */
    ordinal: number;

    /** Most authoritative declaring source */
    source: SourceName;

    /** Every declaring source, in precedence order */
    sources: SourceName[];
}

/** A predicate reference whose target was never observed; resolved to a stub. */
export interface DanglingReferenceNotice {
    kind: 'dangling_reference';
    citing: string;
    cited: string;
    source: SourceName;
}

/** A submission that lists itself as a predicate. */
export interface SelfCitationAnomaly {
    kind: 'self_citation';
    key: string;
    source: SourceName;
}

export type GraphNotice = DanglingReferenceNotice | SelfCitationAnomaly;

/** Stable key for an edge in the underlying graph. */
export function edgeKey(citing: string, cited: string): string {
    return `${citing}->${cited}`;
}
