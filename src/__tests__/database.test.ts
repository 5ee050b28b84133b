import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { LineageDatabase } from '../storage/database.js';
import { reconcile, type Reconciliation } from '../builder/graph-builder.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { VERSION } from '../version.js';
import { sampleBatches } from './fixtures.js';

describe('LineageDatabase', () => {
    let db: LineageDatabase;
    let tmpDir: string;
    let dbPath: string;
    let reconciliation: Reconciliation;

    beforeEach(async () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'predigraph-test-'));
        dbPath = path.join(tmpDir, 'test.db');
        db = new LineageDatabase(dbPath);
        reconciliation = await reconcile([
            ...sampleBatches(),
            { source: 'supplement', rows: [{ ID: 'P170019' }] },
        ]);
    });

    afterEach(() => {
        db.close();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('saveReconciliation', () => {
        it('should round-trip the graph', () => {
            db.saveReconciliation(reconciliation, DEFAULT_CONFIG);
            const loaded = db.loadGraph();

            expect(loaded.entities()).toEqual(reconciliation.graph.entities());
            expect(loaded.edges()).toEqual(reconciliation.graph.edges());
            expect(loaded.getNotices()).toEqual(reconciliation.graph.getNotices());
        });

        it('should store rejected rows', () => {
            db.saveReconciliation(reconciliation, DEFAULT_CONFIG);

            expect(db.getNormalizationErrors()).toEqual([
                { source: 'supplement', rowIndex: 0, reason: 'missing supplement number', row: { ID: 'P170019' } },
            ]);
        });

        it('should replace the previous graph and keep the run history', () => {
            const firstRun = db.saveReconciliation(reconciliation, DEFAULT_CONFIG);
            const secondRun = db.saveReconciliation(reconciliation, DEFAULT_CONFIG);

            expect(secondRun).toBe(firstRun + 1);
            expect(db.getEntityCount()).toBe(5);
            expect(db.getEdgeCount()).toBe(4);
            expect(db.getStats().runs).toBe(2);
        });

        it('should record run metadata', () => {
            db.saveReconciliation(reconciliation, DEFAULT_CONFIG);
            const run = db.getLatestRun();

            expect(run?.predigraph_version).toBe(VERSION);
            expect(JSON.parse(run?.config_json ?? '{}')).toEqual(DEFAULT_CONFIG);
            expect(JSON.parse(run?.sources_json ?? '{}')).toEqual({
                contributing: ['direct_mapping', 'extraction', 'metadata'],
                missing: ['supplement'],
                precedence: ['direct_mapping', 'extraction', 'metadata', 'supplement'],
            });
            expect(JSON.parse(run?.stats_json ?? '{}')).toEqual({ entities: 5, edges: 4, malformedRows: 1 });
        });
    });

    describe('getStats', () => {
        it('should count entities, stubs, edges and errors', () => {
            db.saveReconciliation(reconciliation, DEFAULT_CONFIG);

            expect(db.getStats()).toEqual({
                entities: 5,
                stubs: 1,
                edges: 4,
                normalizationErrors: 1,
                runs: 1,
                edgesBySource: { direct_mapping: 2, extraction: 2 },
            });
        });

        it('should report an empty database', () => {
            expect(db.getStats()).toEqual({
                entities: 0,
                stubs: 0,
                edges: 0,
                normalizationErrors: 0,
                runs: 0,
                edgesBySource: {},
            });
            expect(db.getLatestRun()).toBeUndefined();
        });
    });

    describe('entities', () => {
        it('should look up one entity', () => {
            db.saveReconciliation(reconciliation, DEFAULT_CONFIG);

            expect(db.getEntity('K200001')).toEqual(reconciliation.graph.getEntity('K200001'));
            expect(db.getEntity('K999999')).toBeUndefined();
        });
    });

    it('should reopen an existing database without migrating again', () => {
        db.saveReconciliation(reconciliation, DEFAULT_CONFIG);
        db.close();

        db = new LineageDatabase(dbPath);
        expect(db.getStats().entities).toBe(5);
    });

    it('should insert a run on its own', () => {
        const runId = db.insertRun({
            created_at: '2024-01-01T00:00:00.000Z',
            predigraph_version: VERSION,
            config_json: '{}',
            sources_json: '{}',
            stats_json: '{}',
        });

        expect(runId).toBe(1);
        expect(db.getLatestRun()?.created_at).toBe('2024-01-01T00:00:00.000Z');
    });
});
