import { z } from 'zod';
import type { RawRow } from '../types/index.js';
import { parseCalendarDate } from '../utils/dates.js';
import { parseIdentifier } from './identifiers.js';

/**
 * Per-source row schemas, version 1 (NORMALIZED_SCHEMA_VERSION).
 *
 * A raw row goes through two steps: `mapColumns` renames whatever headers the source used onto
 * field names, then the source's zod schema validates and converts the values. Columns that map
 * to nothing are dropped.
 */
/** Predicate columns a direct-mapping table may carry */
export const MAX_DIRECT_PREDICATES = 5;

/** Header aliases, keyed by the header lower-cased with non-alphanumerics removed */
const COLUMN_ALIASES: Record<string, string> = {
    knumber: 'id',
    '510k': 'id',
    pmanumber: 'id',
    dennumber: 'id',
    submissionnumber: 'id',
    devicenumber: 'id',
    numberwithsuffix: 'id',
    id: 'id',
    applicant: 'applicant',
    applicantname: 'applicant',
    manufacturer: 'applicant',
    devicename: 'deviceName',
    tradename: 'deviceName',
    decisiondate: 'decisionDate',
    clearancedate: 'decisionDate',
    datereceived: 'dateReceived',
    productcode: 'productCode',
    type: 'documentType',
    documenttype: 'documentType',
    submissiontype: 'documentType',
    reviewadvisecomm: 'reviewAdvisoryCommittee',
    reviewadvisorycommittee: 'reviewAdvisoryCommittee',
    reviewpanel: 'reviewAdvisoryCommittee',
    thirdparty: 'thirdParty',
    expeditedreview: 'expedited',
    expedited: 'expedited',
    stateorsumm: 'statementOrSummary',
    statementorsummary: 'statementOrSummary',
    supplementnumber: 'supplementNumber',
    supplementseq: 'supplementNumber',
    supplement: 'supplementNumber',
    predicates: 'predicateList',
    predicatelist: 'predicateList',
};

const PREDICATE_SLOT = /^predicate(?:device)?(\d+)$/;
const REFERENCE_SLOT = /^referencedevice(\d+)$/;

export function normalizeHeader(header: string): string {
    return header.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Rename a raw row's columns onto field names. Predicate and reference-device slots are
 * gathered into arrays ordered by slot number; an explicit predicate list, when present,
 * takes the place of the slots. Slots above `maxPredicateSlots` are ignored.
 */
export function mapColumns(row: RawRow, maxPredicateSlots = Infinity): Record<string, unknown> {
    const mapped: Record<string, unknown> = {};
    const predicateSlots: Array<[number, unknown]> = [];
    const referenceSlots: Array<[number, unknown]> = [];

    for (const [header, value] of Object.entries(row)) {
        const name = normalizeHeader(header);

        const predicate = PREDICATE_SLOT.exec(name);
        if (predicate) {
            const slot = Number(predicate[1]);
            if (slot <= maxPredicateSlots) predicateSlots.push([slot, value]);
            continue;
        }
        const reference = REFERENCE_SLOT.exec(name);
        if (reference) {
            referenceSlots.push([Number(reference[1]), value]);
            continue;
        }

        const field = COLUMN_ALIASES[name];
        if (field !== undefined && mapped[field] === undefined) {
            mapped[field] = value;
        }
    }

    predicateSlots.sort((a, b) => a[0] - b[0]);
    referenceSlots.sort((a, b) => a[0] - b[0]);

    if (mapped['predicateList'] === undefined) {
        mapped['predicates'] = predicateSlots.map(([, value]) => value);
    } else {
        mapped['predicates'] = mapped['predicateList'];
        delete mapped['predicateList'];
    }
    mapped['referenceDevices'] = referenceSlots.map(([, value]) => value);
    return mapped;
}

// ─── Cell converters ─────────────────────────────────────

function toCellText(value: unknown): unknown {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (typeof value === 'string') {
        const trimmed = value.replace(/\s+/g, ' ').trim();
        return trimmed === '' ? null : trimmed;
    }
    return value;
}

/**
 * Lists are separated by `;`, `,` or `|`. A piece that is not one identifier on its own
 * ("P170019 S001" is) is split again on whitespace.
 */
function toCellList(value: unknown): unknown {
    if (value === null || value === undefined) return [];
    if (Array.isArray(value)) return value;
    if (typeof value === 'string') {
        return value
            .split(/[;,|]+/)
            .flatMap((piece) => (parseIdentifier(piece) ? [piece] : piece.split(/\s+/)));
    }
    return value;
}

const textCell = z.preprocess(toCellText, z.string().nullable());

const dateCell = textCell.transform((v) => (v === null ? null : parseCalendarDate(v)));

const productCodeCell = textCell.transform((v) => (v === null ? null : v.toUpperCase()));

const FLAG_VALUES: Record<string, boolean> = {
    y: true,
    yes: true,
    true: true,
    '1': true,
    n: false,
    no: false,
    false: false,
    '0': false,
};

const flagCell = textCell.transform((v) => (v === null ? null : FLAG_VALUES[v.toLowerCase()] ?? null));

const requiredText = z.preprocess(
    toCellText,
    z.string({ invalid_type_error: 'missing identifier', required_error: 'missing identifier' })
);

const identifierCell = requiredText.transform((raw, ctx) => {
    const parsed = parseIdentifier(raw);
    if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparsable identifier "${raw}"` });
        return z.NEVER;
    }
    return parsed;
});

const referenceList = z.preprocess(
    toCellList,
    z.array(textCell).transform((cells) => cells.filter((c): c is string => c !== null))
);

// ─── Source schemas ──────────────────────────────────────

export const MetadataRowSchema = z.object({
    id: identifierCell,
    applicant: textCell,
    deviceName: textCell,
    decisionDate: dateCell,
    dateReceived: dateCell,
    productCode: productCodeCell,
    documentType: textCell,
    reviewAdvisoryCommittee: textCell,
    thirdParty: flagCell,
    expedited: flagCell,
    statementOrSummary: textCell,
});

export const ExtractionRowSchema = z.object({
    id: identifierCell,
    productCode: productCodeCell,
    predicates: referenceList,
    referenceDevices: referenceList,
});

export const DirectMappingRowSchema = z.object({
    id: identifierCell,
    predicates: referenceList,
});

export const SupplementRowSchema = z
    .object({
        id: identifierCell,
        supplementNumber: textCell,
    })
    .transform((row, ctx) => {
        let seq = row.id.supplementSeq;
        if (seq === 0 && row.supplementNumber !== null) {
            const digits = /^S?(\d{1,4})$/i.exec(row.supplementNumber);
            seq = digits?.[1] !== undefined ? parseInt(digits[1], 10) : 0;
        }
        if (seq === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing supplement number' });
            return z.NEVER;
        }
        return { id: { ...row.id, supplementSeq: seq } };
    });

export type MetadataRow = z.infer<typeof MetadataRowSchema>;
export type ExtractionRow = z.infer<typeof ExtractionRowSchema>;
export type DirectMappingRow = z.infer<typeof DirectMappingRowSchema>;
export type SupplementRow = z.infer<typeof SupplementRowSchema>;
