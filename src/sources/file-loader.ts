import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { SourceBatch, SourceName } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';

const RowsSchema = z.array(z.record(z.string(), z.unknown()));

const JsonFileSchema = z.union([RowsSchema, z.object({ rows: RowsSchema })]);

/** Where each source's file lives; sources left out are simply absent. */
export type SourcePaths = Partial<Record<SourceName, string>>;

/**
 * Read one source file into a batch.
 *
 * `.csv` is comma separated, `.txt` is pipe delimited (the agency's PMN dumps), `.json` is
 * either an array of row objects or `{ "rows": [...] }`. Blank lines are skipped.
 *
 * @throws Error when the file cannot be read or parsed
 */
export function loadSourceFile(source: SourceName, filePath: string, now: Date = new Date()): SourceBatch {
    const content = readFileSync(filePath, 'utf-8');
    const extension = extname(filePath).toLowerCase();

    let rows: Array<Record<string, unknown>>;
    try {
        rows = extension === '.json' ? parseJsonRows(content) : parseDelimited(content, extension === '.txt' ? '|' : ',');
    } catch (error) {
        throw new Error(`Failed to parse ${source} file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    componentLogger('loader').info({ source, filePath, rows: rows.length }, 'Source file loaded');
    return { source, rows, origin: filePath, loadedAt: now.toISOString() };
}

/**
 * Load every configured source file.
 */
export function loadSourceFiles(paths: SourcePaths, now: Date = new Date()): SourceBatch[] {
    const batches: SourceBatch[] = [];
    for (const [source, filePath] of sourceEntries(paths)) {
        batches.push(loadSourceFile(source, filePath, now));
    }
    return batches;
}

// ─── Internal helpers ─────────────────────────────────

function parseDelimited(content: string, delimiter: string): Array<Record<string, unknown>> {
    const parsed: unknown = parse(content, {
        columns: true,
        delimiter,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
        trim: true,
    });
    return RowsSchema.parse(parsed);
}

function parseJsonRows(content: string): Array<Record<string, unknown>> {
    const parsed = JsonFileSchema.parse(JSON.parse(content));
    return Array.isArray(parsed) ? parsed : parsed.rows;
}

function sourceEntries(paths: SourcePaths): Array<[SourceName, string]> {
    const entries: Array<[SourceName, string]> = [];
    const order: SourceName[] = ['metadata', 'extraction', 'direct_mapping', 'supplement'];
    for (const source of order) {
        const filePath = paths[source];
        if (filePath) entries.push([source, filePath]);
    }
    return entries;
}
