import type { ZodError } from 'zod';
import {
    NORMALIZED_SCHEMA_VERSION,
    type EntityFields,
    type MalformedRowInfo,
    type NormalizationReport,
    type NormalizedRecord,
    type RawRow,
    type SourceBatch,
    type SourceName,
} from '../types/index.js';
import { daysBetween } from '../utils/dates.js';
import { componentLogger } from '../utils/logger.js';
import { formatCanonicalKey, toCanonicalKey, type ParsedIdentifier } from './identifiers.js';
import {
    DirectMappingRowSchema,
    ExtractionRowSchema,
    MAX_DIRECT_PREDICATES,
    MetadataRowSchema,
    SupplementRowSchema,
    mapColumns,
} from './schemas.js';

/**
 * A row that cannot be normalized: unparsable identifier or missing required field.
 * Carries the original row so it can be reported as-is.
 */
export class MalformedRowError extends Error {
    constructor(
        readonly source: SourceName,
        readonly rowIndex: number,
        readonly reason: string,
        readonly row: RawRow
    ) {
        super(`Malformed ${source} row ${rowIndex}: ${reason}`);
        this.name = 'MalformedRowError';
    }

    toInfo(): MalformedRowInfo {
        return { source: this.source, rowIndex: this.rowIndex, reason: this.reason, row: this.row };
    }
}

export function emptyFields(): EntityFields {
    return {
        applicant: null,
        deviceName: null,
        decisionDate: null,
        dateReceived: null,
        productCode: null,
        documentType: null,
        reviewAdvisoryCommittee: null,
        thirdParty: null,
        expedited: null,
        statementOrSummary: null,
        reviewDays: null,
    };
}

/**
 * Normalize one row from a named source.
 *
 * @returns the record, or null for a row whose cells are all blank
 * @throws MalformedRowError when the identifier (or, for supplements, the sequence) is unusable
 */
export function normalizeRow(
    source: SourceName,
    row: RawRow,
    rowIndex: number,
    loadedAt: string | null = null
): NormalizedRecord | null {
    if (isBlankRow(row)) return null;

    const fail = (error: ZodError): MalformedRowError =>
        new MalformedRowError(source, rowIndex, describeIssues(error), row);

    const base = { source, rowIndex, loadedAt };

    switch (source) {
        case 'metadata': {
            const parsed = MetadataRowSchema.safeParse(mapColumns(row));
            if (!parsed.success) throw fail(parsed.error);
            const { id, ...fields } = parsed.data;
            return buildRecord(base, id, {
                ...fields,
                reviewDays: reviewDuration(fields.dateReceived, fields.decisionDate),
            });
        }
        case 'extraction': {
            const parsed = ExtractionRowSchema.safeParse(mapColumns(row));
            if (!parsed.success) throw fail(parsed.error);
            const { id, productCode, predicates, referenceDevices } = parsed.data;
            return buildRecord(base, id, { productCode }, predicates, referenceDevices);
        }
        case 'direct_mapping': {
            const parsed = DirectMappingRowSchema.safeParse(mapColumns(row, MAX_DIRECT_PREDICATES));
            if (!parsed.success) throw fail(parsed.error);
            return buildRecord(base, parsed.data.id, {}, parsed.data.predicates);
        }
        case 'supplement': {
            const parsed = SupplementRowSchema.safeParse(mapColumns(row));
            if (!parsed.success) throw fail(parsed.error);
            return buildRecord(base, parsed.data.id, {});
        }
    }
}

/**
 * Normalize a whole batch. Never throws: every row is accounted for in the report.
 */
export function normalizeBatch(batch: SourceBatch): NormalizationReport {
    const logger = componentLogger('normalizer');
    const records: NormalizedRecord[] = [];
    const errors: MalformedRowInfo[] = [];
    let blankRows = 0;

    batch.rows.forEach((row, rowIndex) => {
        try {
            const record = normalizeRow(batch.source, row, rowIndex, batch.loadedAt ?? null);
            if (record) {
                records.push(record);
            } else {
                blankRows++;
            }
        } catch (error) {
            if (!(error instanceof MalformedRowError)) throw error;
            logger.debug({ source: error.source, rowIndex, reason: error.reason, row }, 'Malformed row skipped');
            errors.push(error.toInfo());
        }
    });

    if (errors.length > 0) {
        logger.warn({ source: batch.source, errors: errors.length }, 'Rows rejected during normalization');
    }
    logger.info(
        { source: batch.source, rows: batch.rows.length, records: records.length, blankRows },
        'Batch normalized'
    );

    return {
        source: batch.source,
        origin: batch.origin ?? null,
        totalRows: batch.rows.length,
        records,
        errors,
        blankRows,
    };
}

// ─── Internal helpers ─────────────────────────────────

function buildRecord(
    base: { source: SourceName; rowIndex: number; loadedAt: string | null },
    id: ParsedIdentifier,
    fields: Partial<EntityFields>,
    predicateCells: string[] | null = null,
    referenceCells: string[] = []
): NormalizedRecord {
    const predicates = parseReferences(predicateCells ?? []);
    const references = parseReferences(referenceCells);

    return {
        schemaVersion: NORMALIZED_SCHEMA_VERSION,
        ...base,
        key: formatCanonicalKey(id.baseKey, id.supplementSeq),
        baseKey: id.baseKey,
        supplementSeq: id.supplementSeq,
        deviceType: id.deviceType,
        fields: { ...emptyFields(), ...fields },
        predicates: predicates.keys,
        declaresPredicates: predicateCells !== null,
        referenceDevices: references.keys,
        invalidReferences: [...predicates.invalid, ...references.invalid],
    };
}

function parseReferences(cells: string[]): { keys: string[]; invalid: string[] } {
    const keys: string[] = [];
    const invalid: string[] = [];
    for (const cell of cells) {
        const key = toCanonicalKey(cell);
        if (key === null) {
            invalid.push(cell);
        } else if (!keys.includes(key)) {
            keys.push(key);
        }
    }
    return { keys, invalid };
}

/**
 * Whole days from receipt to decision; null when either date is missing or they are out of order.
 */
export function reviewDuration(received: string | null, decided: string | null): number | null {
    if (received === null || decided === null) return null;
    const days = daysBetween(received, decided);
    return days >= 0 ? days : null;
}

function isBlankRow(row: RawRow): boolean {
    return Object.values(row).every(
        (value) => value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
    );
}

function describeIssues(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
