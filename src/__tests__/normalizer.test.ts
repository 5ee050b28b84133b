import { describe, it, expect } from 'vitest';
import { MalformedRowError, normalizeBatch, normalizeRow } from '../ingest/normalizer.js';
import type { RawRow } from '../types/index.js';

describe('normalizeRow', () => {
    describe('metadata', () => {
        it('should map agency column names and convert values', () => {
            const record = normalizeRow(
                'metadata',
                {
                    KNUMBER: 'k203456',
                    APPLICANT: '  Acme   Medical ',
                    DEVICENAME: 'Widget',
                    DATERECEIVED: '01/15/2020',
                    DECISIONDATE: '2020-03-16',
                    PRODUCTCODE: 'abc',
                    TYPE: 'Traditional',
                    REVIEWADVISECOMM: 'CV',
                    THIRDPARTY: 'N',
                    EXPEDITEDREVIEW: 'Y',
                    STATEORSUMM: 'Summary',
                },
                7,
                '2024-01-01T00:00:00.000Z'
            );

            expect(record).toEqual({
                schemaVersion: 1,
                source: 'metadata',
                rowIndex: 7,
                key: 'K203456',
                baseKey: 'K203456',
                supplementSeq: 0,
                deviceType: '510k',
                fields: {
                    applicant: 'Acme Medical',
                    deviceName: 'Widget',
                    decisionDate: '2020-03-16',
                    dateReceived: '2020-01-15',
                    productCode: 'ABC',
                    documentType: 'Traditional',
                    reviewAdvisoryCommittee: 'CV',
                    thirdParty: false,
                    expedited: true,
                    statementOrSummary: 'Summary',
                    reviewDays: 61,
                },
                predicates: [],
                declaresPredicates: false,
                referenceDevices: [],
                invalidReferences: [],
                loadedAt: '2024-01-01T00:00:00.000Z',
            });
        });

        it('should drop impossible dates instead of rejecting the row', () => {
            const record = normalizeRow('metadata', { KNUMBER: 'K203456', DECISIONDATE: '2023-02-30' }, 0);
            expect(record?.fields.decisionDate).toBeNull();
            expect(record?.fields.reviewDays).toBeNull();
        });

        it('should throw MalformedRowError for an unparsable identifier', () => {
            const row = { KNUMBER: 'nope', APPLICANT: 'Acme' };
            let caught: unknown;
            try {
                normalizeRow('metadata', row, 4);
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(MalformedRowError);
            if (caught instanceof MalformedRowError) {
                expect(caught.rowIndex).toBe(4);
                expect(caught.reason).toBe('id: unparsable identifier "nope"');
                expect(caught.row).toEqual(row);
            }
        });

        it('should report a missing identifier', () => {
            expect(() => normalizeRow('metadata', { APPLICANT: 'Acme' }, 0)).toThrow('id: missing identifier');
        });

        it('should return null for a blank row', () => {
            expect(normalizeRow('metadata', { KNUMBER: '  ', APPLICANT: '' }, 0)).toBeNull();
        });
    });

    describe('extraction', () => {
        it('should gather predicate slots in slot order and keep bad cells aside', () => {
            const record = normalizeRow(
                'extraction',
                {
                    'K Number': 'K210001',
                    'Product Code': 'xyz',
                    'Predicate 2': 'k200003',
                    'Predicate 1': 'K200002',
                    'Predicate 3': 'not-a-key',
                    'Predicate 4': 'K200002',
                    'Reference Device 1': 'P170019',
                },
                0
            );

            expect(record?.key).toBe('K210001');
            expect(record?.fields.productCode).toBe('XYZ');
            expect(record?.predicates).toEqual(['K200002', 'K200003']);
            expect(record?.invalidReferences).toEqual(['not-a-key']);
            expect(record?.referenceDevices).toEqual(['P170019']);
            expect(record?.declaresPredicates).toBe(true);
        });

        it('should split a delimited predicate list', () => {
            const record = normalizeRow('extraction', { ID: 'K210001', Predicates: 'K200002; K200003,K200004' }, 0);
            expect(record?.predicates).toEqual(['K200002', 'K200003', 'K200004']);
        });

        it('should keep a spaced supplement number whole inside a list', () => {
            const record = normalizeRow(
                'extraction',
                { ID: 'K210001', Predicates: 'P170019 S001; K200002 K200003' },
                0
            );
            expect(record?.predicates).toEqual(['P170019/S001', 'K200002', 'K200003']);
            expect(record?.invalidReferences).toEqual([]);
        });

        it('should declare an empty predicate list when none are given', () => {
            const record = normalizeRow('extraction', { ID: 'K210001' }, 0);
            expect(record?.predicates).toEqual([]);
            expect(record?.declaresPredicates).toBe(true);
        });
    });

    describe('direct_mapping', () => {
        it('should read at most five predicate columns', () => {
            const row: RawRow = { ID: 'K210001' };
            for (let slot = 1; slot <= 6; slot++) {
                row[`PREDICATE${slot}`] = `K20000${slot}`;
            }

            const record = normalizeRow('direct_mapping', row, 0);
            expect(record?.predicates).toEqual(['K200001', 'K200002', 'K200003', 'K200004', 'K200005']);
        });
    });

    describe('supplement', () => {
        it('should take the sequence from the supplement column', () => {
            const record = normalizeRow('supplement', { 'PMA Number': 'P170019', 'Supplement Number': 'S002' }, 0);
            expect(record?.key).toBe('P170019/S002');
            expect(record?.supplementSeq).toBe(2);
            expect(record?.baseKey).toBe('P170019');
        });

        it('should take the sequence from the identifier suffix', () => {
            expect(normalizeRow('supplement', { ID: 'P170019/S005' }, 0)?.key).toBe('P170019/S005');
        });

        it('should reject a supplement row without a sequence', () => {
            expect(() => normalizeRow('supplement', { ID: 'P170019' }, 0)).toThrow('missing supplement number');
        });
    });
});

describe('normalizeBatch', () => {
    it('should isolate malformed rows', () => {
        const rows: RawRow[] = [];
        for (let i = 0; i < 100; i++) {
            rows.push({ KNUMBER: `K${100000 + i}`, APPLICANT: `Company ${i}` });
        }
        rows[10] = { KNUMBER: 'BAD-10', APPLICANT: 'Company 10' };
        rows[50] = { KNUMBER: '', APPLICANT: 'Company 50' };
        rows[90] = { KNUMBER: 'K12', APPLICANT: 'Company 90' };

        const report = normalizeBatch({ source: 'metadata', rows });

        expect(report.totalRows).toBe(100);
        expect(report.records).toHaveLength(97);
        expect(report.errors.map((e) => e.rowIndex)).toEqual([10, 50, 90]);
        expect(report.errors.map((e) => e.reason)).toEqual([
            'id: unparsable identifier "BAD-10"',
            'id: missing identifier',
            'id: unparsable identifier "K12"',
        ]);
        expect(report.errors[0]?.row).toEqual({ KNUMBER: 'BAD-10', APPLICANT: 'Company 10' });
        expect(report.blankRows).toBe(0);
    });

    it('should count blank rows separately', () => {
        const report = normalizeBatch({
            source: 'metadata',
            rows: [{ KNUMBER: 'K200001' }, { KNUMBER: '', APPLICANT: '   ' }, {}],
            origin: 'metadata.csv',
        });

        expect(report.records).toHaveLength(1);
        expect(report.errors).toHaveLength(0);
        expect(report.blankRows).toBe(2);
        expect(report.origin).toBe('metadata.csv');
    });

    it('should stamp records with the batch timestamp', () => {
        const report = normalizeBatch({
            source: 'metadata',
            rows: [{ KNUMBER: 'K200001' }],
            loadedAt: '2024-05-01T12:00:00.000Z',
        });
        expect(report.records[0]?.loadedAt).toBe('2024-05-01T12:00:00.000Z');
    });

    it('should produce an empty report for an empty batch', () => {
        const report = normalizeBatch({ source: 'extraction', rows: [] });
        expect(report).toEqual({
            source: 'extraction',
            origin: null,
            totalRows: 0,
            records: [],
            errors: [],
            blankRows: 0,
        });
    });
});
