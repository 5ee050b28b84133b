import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadSourceFile, loadSourceFiles } from '../sources/file-loader.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

describe('file loader', () => {
    let tmpDir: string;

    const write = (name: string, content: string): string => {
        const filePath = path.join(tmpDir, name);
        fs.writeFileSync(filePath, content, 'utf-8');
        return filePath;
    };

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'predigraph-loader-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should read CSV rows keyed by header', () => {
        const filePath = write(
            'metadata.csv',
            'K Number,Applicant,Decision Date\nK200001,"Acme, Inc.",2020-06-01\n\nK200002,Beta,2020-07-01\n'
        );

        const batch = loadSourceFile('metadata', filePath, NOW);

        expect(batch).toEqual({
            source: 'metadata',
            rows: [
                { 'K Number': 'K200001', Applicant: 'Acme, Inc.', 'Decision Date': '2020-06-01' },
                { 'K Number': 'K200002', Applicant: 'Beta', 'Decision Date': '2020-07-01' },
            ],
            origin: filePath,
            loadedAt: '2024-05-01T12:00:00.000Z',
        });
    });

    it('should read pipe-delimited text and strip a byte-order mark', () => {
        const filePath = write('pmn.txt', '\uFEFFKNUMBER|APPLICANT\nK200001| Acme Medical \n');

        expect(loadSourceFile('metadata', filePath, NOW).rows).toEqual([{ KNUMBER: 'K200001', APPLICANT: 'Acme Medical' }]);
    });

    it('should read JSON arrays and row envelopes', () => {
        const arrayPath = write('direct.json', JSON.stringify([{ ID: 'K200001', PREDICATE1: 'K190001' }]));
        const envelopePath = write('extraction.json', JSON.stringify({ rows: [{ ID: 'K200001', PREDICATES: ['K190001'] }] }));

        expect(loadSourceFile('direct_mapping', arrayPath, NOW).rows).toEqual([{ ID: 'K200001', PREDICATE1: 'K190001' }]);
        expect(loadSourceFile('extraction', envelopePath, NOW).rows).toEqual([{ ID: 'K200001', PREDICATES: ['K190001'] }]);
    });

    it('should name the file when it cannot be parsed', () => {
        const filePath = write('broken.json', '{"foo": 1}');
        expect(() => loadSourceFile('metadata', filePath, NOW)).toThrow(`Failed to parse metadata file ${filePath}`);
    });

    it('should throw for a missing file', () => {
        expect(() => loadSourceFile('metadata', path.join(tmpDir, 'absent.csv'), NOW)).toThrow();
    });

    it('should load configured sources in a fixed order', () => {
        const extraction = write('extraction.csv', 'ID,Predicates\nK200001,K190001\n');
        const metadata = write('metadata.csv', 'KNUMBER\nK200001\n');

        const batches = loadSourceFiles({ extraction, metadata }, NOW);

        expect(batches.map((b) => b.source)).toEqual(['metadata', 'extraction']);
        expect(batches.map((b) => b.rows.length)).toEqual([1, 1]);
    });
});
