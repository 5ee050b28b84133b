import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
    CitationEdge,
    Entity,
    MalformedRowInfo,
    PredigraphConfig,
    RunRecord,
    SourceName,
} from '../types/index.js';
import { assembleGraph, type Reconciliation } from '../builder/graph-builder.js';
import type { CitationGraph } from '../graph/citation-graph.js';
import { componentLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per reconciliation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  predigraph_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  sources_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Entities: one row per canonical key, stubs included
CREATE TABLE IF NOT EXISTS entities (
  key TEXT PRIMARY KEY,
  base_key TEXT NOT NULL,
  supplement_seq INTEGER NOT NULL DEFAULT 0,
  device_type TEXT NOT NULL,
  applicant TEXT,
  device_name TEXT,
  decision_date TEXT,
  product_code TEXT,
  is_stub INTEGER NOT NULL DEFAULT 0,
  entity_json TEXT NOT NULL
);

-- Edges: citing names cited as a predicate
CREATE TABLE IF NOT EXISTS edges (
  citing TEXT NOT NULL REFERENCES entities(key),
  cited TEXT NOT NULL REFERENCES entities(key),
  ordinal INTEGER NOT NULL,
  source TEXT NOT NULL,
  sources_json TEXT NOT NULL,
  PRIMARY KEY (citing, cited)
);

-- Rows rejected during normalization
CREATE TABLE IF NOT EXISTS normalization_errors (
  error_id INTEGER PRIMARY KEY,
  source TEXT NOT NULL,
  row_index INTEGER NOT NULL,
  reason TEXT NOT NULL,
  row_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_edges_cited ON edges(cited);
CREATE INDEX IF NOT EXISTS idx_entities_base ON entities(base_key);
CREATE INDEX IF NOT EXISTS idx_entities_product_code ON entities(product_code);
`;

const SourceNameSchema = z.enum(['direct_mapping', 'extraction', 'metadata', 'supplement']);

const SourceValueSchema = z.object({ source: SourceNameSchema, value: z.string() });

const StoredEntitySchema = z.object({
    key: z.string(),
    baseKey: z.string(),
    supplementSeq: z.number().int(),
    deviceType: z.enum(['510k', 'pma', 'de_novo', 'pre_amendment']),
    applicant: z.string().nullable(),
    deviceName: z.string().nullable(),
    decisionDate: z.string().nullable(),
    dateReceived: z.string().nullable(),
    productCode: z.string().nullable(),
    documentType: z.string().nullable(),
    reviewAdvisoryCommittee: z.string().nullable(),
    thirdParty: z.boolean().nullable(),
    expedited: z.boolean().nullable(),
    statementOrSummary: z.string().nullable(),
    reviewDays: z.number().nullable(),
    isStub: z.boolean(),
    declaresPredicates: z.boolean(),
    referenceDevices: z.array(z.string()),
    provenance: z.array(
        z.object({
            source: SourceNameSchema,
            rank: z.number().int(),
            rowCount: z.number().int(),
            loadedAt: z.string().nullable(),
        })
    ),
    sourceValues: z.object({
        productCode: z.array(SourceValueSchema),
        applicant: z.array(SourceValueSchema),
    }),
});

const SourcesSchema = z.array(SourceNameSchema);

const StoredRowSchema = z.record(z.string(), z.unknown());

interface EntityRow {
    key: string;
    entity_json: string;
}

interface EdgeRow {
    citing: string;
    cited: string;
    ordinal: number;
    source: string;
    sources_json: string;
}

interface ErrorRow {
    source: string;
    row_index: number;
    reason: string;
    row_json: string;
}

interface CountRow {
    count: number;
}

export interface DatabaseStats {
    entities: number;
    stubs: number;
    edges: number;
    normalizationErrors: number;
    runs: number;
    edgesBySource: Partial<Record<SourceName, number>>;
}

/**
 * Lineage database wrapper around better-sqlite3.
 * Holds the latest reconciled graph plus the history of runs.
 */
export class LineageDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        componentLogger('storage').debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            componentLogger('storage').info('Database migrated to v1');
        }
    }

    // ─── Reconciliation ───────────────────────────────────────

    /**
     * Replace the stored graph with a reconciliation's result and record the run.
     * Returns the new run id.
     */
    saveReconciliation(reconciliation: Reconciliation, config: PredigraphConfig): number {
        const { graph, errors } = reconciliation;

        const insertEntity = this.db.prepare(`
      INSERT INTO entities (key, base_key, supplement_seq, device_type, applicant, device_name, decision_date, product_code, is_stub, entity_json)
      VALUES (@key, @base_key, @supplement_seq, @device_type, @applicant, @device_name, @decision_date, @product_code, @is_stub, @entity_json)
    `);
        const insertEdge = this.db.prepare(`
      INSERT INTO edges (citing, cited, ordinal, source, sources_json)
      VALUES (@citing, @cited, @ordinal, @source, @sources_json)
    `);
        const insertError = this.db.prepare(`
      INSERT INTO normalization_errors (source, row_index, reason, row_json)
      VALUES (@source, @row_index, @reason, @row_json)
    `);

        const replaceAll = this.db.transaction(() => {
            this.db.exec('DELETE FROM edges; DELETE FROM entities; DELETE FROM normalization_errors;');

            for (const entity of graph.entities()) {
                insertEntity.run({
                    key: entity.key,
                    base_key: entity.baseKey,
                    supplement_seq: entity.supplementSeq,
                    device_type: entity.deviceType,
                    applicant: entity.applicant,
                    device_name: entity.deviceName,
                    decision_date: entity.decisionDate,
                    product_code: entity.productCode,
                    is_stub: entity.isStub ? 1 : 0,
                    entity_json: JSON.stringify(entity),
                });
            }

            for (const edge of graph.edges()) {
                insertEdge.run({
                    citing: edge.citing,
                    cited: edge.cited,
                    ordinal: edge.ordinal,
                    source: edge.source,
                    sources_json: JSON.stringify(edge.sources),
                });
            }

            for (const error of errors) {
                insertError.run({
                    source: error.source,
                    row_index: error.rowIndex,
                    reason: error.reason,
                    row_json: JSON.stringify(error.row),
                });
            }

            return this.insertRun({
                created_at: new Date().toISOString(),
                predigraph_version: VERSION,
                config_json: JSON.stringify(config),
                sources_json: JSON.stringify({
                    contributing: reconciliation.contributingSources,
                    missing: reconciliation.missingSources,
                    precedence: reconciliation.precedence,
                }),
                stats_json: JSON.stringify({
                    entities: graph.order,
                    edges: graph.size,
                    malformedRows: errors.length,
                }),
            });
        });

        const runId = replaceAll();
        componentLogger('storage').info({ runId, entities: graph.order, edges: graph.size }, 'Reconciliation saved');
        return runId;
    }

    /**
     * Rebuild the stored graph. Equal to the graph that was saved.
     */
    loadGraph(): CitationGraph {
        return assembleGraph(this.getAllEntities(), this.getAllEdges());
    }

    // ─── Entities ─────────────────────────────────────────────

    getAllEntities(): Entity[] {
        return this.db
            .prepare<[], EntityRow>('SELECT key, entity_json FROM entities ORDER BY key')
            .all()
            .map((row) => parseEntity(row));
    }

    getEntity(key: string): Entity | undefined {
        const row = this.db
            .prepare<[string], EntityRow>('SELECT key, entity_json FROM entities WHERE key = ?')
            .get(key);
        return row ? parseEntity(row) : undefined;
    }

    getEntityCount(): number {
        return this.count('SELECT COUNT(*) as count FROM entities');
    }

    // ─── Edges ────────────────────────────────────────────────

    getAllEdges(): CitationEdge[] {
        return this.db
            .prepare<[], EdgeRow>('SELECT citing, cited, ordinal, source, sources_json FROM edges ORDER BY citing, ordinal, cited')
            .all()
            .map((row) => ({
                citing: row.citing,
                cited: row.cited,
                ordinal: row.ordinal,
                source: SourceNameSchema.parse(row.source),
                sources: SourcesSchema.parse(JSON.parse(row.sources_json)),
            }));
    }

    getEdgeCount(): number {
        return this.count('SELECT COUNT(*) as count FROM edges');
    }

    // ─── Normalization errors ─────────────────────────────────

    getNormalizationErrors(): MalformedRowInfo[] {
        return this.db
            .prepare<[], ErrorRow>('SELECT source, row_index, reason, row_json FROM normalization_errors ORDER BY error_id')
            .all()
            .map((row) => ({
                source: SourceNameSchema.parse(row.source),
                rowIndex: row.row_index,
                reason: row.reason,
                row: StoredRowSchema.parse(JSON.parse(row.row_json)),
            }));
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, predigraph_version, config_json, sources_json, stats_json)
      VALUES (@created_at, @predigraph_version, @config_json, @sources_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getLatestRun(): RunRecord | undefined {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT 1').get();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const edgeSourceRows = this.db
            .prepare<[], { source: string; count: number }>('SELECT source, COUNT(*) as count FROM edges GROUP BY source ORDER BY source')
            .all();
        const edgesBySource: Partial<Record<SourceName, number>> = {};
        for (const row of edgeSourceRows) {
            edgesBySource[SourceNameSchema.parse(row.source)] = row.count;
        }

        return {
            entities: this.getEntityCount(),
            stubs: this.count('SELECT COUNT(*) as count FROM entities WHERE is_stub = 1'),
            edges: this.getEdgeCount(),
            normalizationErrors: this.count('SELECT COUNT(*) as count FROM normalization_errors'),
            runs: this.count('SELECT COUNT(*) as count FROM runs'),
            edgesBySource,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    close(): void {
        this.db.close();
        componentLogger('storage').debug('Database closed');
    }

    private count(sql: string): number {
        return this.db.prepare<[], CountRow>(sql).get()?.count ?? 0;
    }
}

function parseEntity(row: EntityRow): Entity {
    const entity = StoredEntitySchema.parse(JSON.parse(row.entity_json));
    if (entity.key !== row.key) {
        throw new Error(`Stored entity ${row.key} carries mismatched key ${entity.key}`);
    }
    return entity;
}
