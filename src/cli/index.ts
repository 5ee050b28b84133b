#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { ConfigFileSchema, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { reconcile } from '../builder/graph-builder.js';
import { loadSourceFiles } from '../sources/file-loader.js';
import { EXPORT_EXTENSIONS, EXPORT_FORMATS, exportGraph, isExportFormat } from '../exporters/export.js';
import { LineageDatabase } from '../storage/database.js';
import type { CitationGraph } from '../graph/citation-graph.js';
import {
    crossSourceValidation,
    detectCycles,
    findGaps,
    listChains,
    rankHubs,
    reviewTimeCorrelation,
    summarizePredicateAges,
    traceChain,
} from '../graph/algorithms.js';
import { ProfileAggregator, type ProfileQuery } from '../profile/profile-aggregator.js';
import { toCanonicalKey } from '../ingest/identifiers.js';
import type { PredigraphConfig } from '../types/index.js';
import { VERSION } from '../version.js';

interface LoggingOptions {
    logLevel?: string;
    jsonLogs?: boolean;
}

interface ReconcileCliOptions extends LoggingOptions {
    metadata?: string;
    extraction?: string;
    direct?: string;
    supplement?: string;
    out?: string;
    precedence?: string;
}

interface InputCliOptions extends LoggingOptions {
    input: string;
}

interface ExportCliOptions extends InputCliOptions {
    format: string;
    out?: string;
}

interface HubsCliOptions extends InputCliOptions {
    top?: number;
}

interface ChainCliOptions extends InputCliOptions {
    depth?: number;
}

interface ProfileCliOptions extends InputCliOptions {
    key?: string;
    productCode?: string;
    name?: string;
}

const program = new Command();

program
    .name('predigraph')
    .description('Reconcile medical-device submission records and analyse their predicate lineage.')
    .version(VERSION);

// ─── RECONCILE command ────────────────────────────────────

program
    .command('reconcile')
    .description('Normalize source files, resolve identities and store the citation graph')
    .option('--metadata <file>', 'Submission metadata dump (.csv, .txt pipe-delimited, .json)')
    .option('--extraction <file>', 'Predicates extracted from summary documents')
    .option('--direct <file>', 'Curated submission-to-predicate mapping')
    .option('--supplement <file>', 'Supplement numbers found in documents')
    .option('-o, --out <path>', 'Output database path')
    .option('--precedence <sources>', 'Comma-separated source precedence, most authoritative first')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: ReconcileCliOptions) => {
        const config = await setup(opts, {
            out: opts.out,
            sourcePrecedence: opts.precedence?.split(',').map((s) => s.trim()),
        });
        const logger = getLogger();

        try {
            const batches = loadSourceFiles({
                metadata: opts.metadata,
                extraction: opts.extraction,
                direct_mapping: opts.direct,
                supplement: opts.supplement,
            });
            if (batches.length === 0) {
                throw new Error('No source files given; pass at least one of --metadata, --extraction, --direct, --supplement');
            }

            const reconciliation = await reconcile(batches, config);
            for (const notice of reconciliation.graph.getNotices()) {
                if (notice.kind === 'self_citation') {
                    logger.warn(notice, 'Submission cites itself');
                }
            }

            const db = new LineageDatabase(config.out);
            try {
                const runId = db.saveReconciliation(reconciliation, config);
                logger.info(
                    {
                        dbPath: config.out,
                        runId,
                        entities: reconciliation.graph.order,
                        edges: reconciliation.graph.size,
                        missingSources: reconciliation.missingSources,
                    },
                    'Reconcile complete!'
                );
            } finally {
                db.close();
            }
        } catch (error) {
            logger.error({ error }, 'Reconcile failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

withInput(program.command('inspect').description('Show database statistics')).action(
    async (opts: InputCliOptions) => {
        await setup(opts, {});
        try {
            const db = new LineageDatabase(opts.input);
            const stats = db.getStats();
            const run = db.getLatestRun();
            db.close();

            console.log('\n📊 Predigraph Database Statistics\n');
            console.log(`  Entities:    ${stats.entities}`);
            console.log(`  Stubs:       ${stats.stubs}`);
            console.log(`  Edges:       ${stats.edges}`);
            console.log(`  Bad rows:    ${stats.normalizationErrors}`);
            console.log(`  Runs:        ${stats.runs}`);
            if (run) {
                console.log(`  Last run:    ${run.created_at} (v${run.predigraph_version})`);
            }

            if (Object.keys(stats.edgesBySource).length > 0) {
                console.log('\n  Edges by source:');
                for (const [source, count] of Object.entries(stats.edgesBySource)) {
                    console.log(`    ${source}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            getLogger().error({ error }, 'Inspect failed');
            process.exit(1);
        }
    }
);

// ─── EXPORT command ───────────────────────────────────────

withInput(program.command('export').description('Export the graph to JSON, GraphML, CSV, or Mermaid'))
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path')
    .action(async (opts: ExportCliOptions) => {
        const config = await setup(opts, {});
        const format = opts.format.toLowerCase();

        if (!isExportFormat(format)) {
            getLogger().error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exit(1);
        }

        const outputPath = opts.out ?? opts.input.replace(/\.db$/, '') + EXPORT_EXTENSIONS[format];

        try {
            exportGraph(opts.input, outputPath, format, config);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            getLogger().error({ error }, 'Export failed');
            process.exit(1);
        }
    });

// ─── Analytics commands ───────────────────────────────────

withInput(program.command('hubs').description('Most-cited predicates'))
    .option('--top <n>', 'Number of rows', parsePositiveInt)
    .action(async (opts: HubsCliOptions) => {
        const config = await setup(opts, { hubTopK: opts.top });
        printFromGraph(opts.input, (graph) => rankHubs(graph, config.hubTopK));
    });

withInput(program.command('chain').description('Predicate lineage of one submission, or the longest chains'))
    .argument('[key]', 'Submission number; omit to list the longest chain from every root')
    .option('-d, --depth <n>', 'Maximum traversal depth', parsePositiveInt)
    .action(async (key: string | undefined, opts: ChainCliOptions) => {
        const config = await setup(opts, { maxChainDepth: opts.depth });
        printFromGraph(opts.input, (graph) => {
            if (key === undefined) return listChains(graph, config.maxChainDepth);
            return traceChain(graph, toCanonicalKey(key) ?? key, config.maxChainDepth);
        });
    });

withInput(program.command('cycles').description('Citation cycles')).action(async (opts: InputCliOptions) => {
    await setup(opts, {});
    printFromGraph(opts.input, (graph) => detectCycles(graph));
});

withInput(program.command('mismatches').description('Fields on which sources disagree')).action(
    async (opts: InputCliOptions) => {
        await setup(opts, {});
        printFromGraph(opts.input, (graph) => crossSourceValidation(graph));
    }
);

withInput(program.command('gaps').description('Dangling predicates and entities missing from metadata')).action(
    async (opts: InputCliOptions) => {
        await setup(opts, {});
        printFromGraph(opts.input, (graph) => findGaps(graph));
    }
);

withInput(program.command('correlation').description('Predicate count against review time, and predicate age')).action(
    async (opts: InputCliOptions) => {
        await setup(opts, {});
        printFromGraph(opts.input, (graph) => ({
            reviewTime: reviewTimeCorrelation(graph),
            predicateAge: summarizePredicateAges(graph),
        }));
    }
);

// ─── PROFILE command ──────────────────────────────────────

withInput(program.command('profile').description('Consolidated view of one submission, product code or company'))
    .option('-k, --key <key>', 'Submission number')
    .option('-p, --product-code <code>', 'Product code')
    .option('-n, --name <fragment>', 'Applicant or device name fragment')
    .action(async (opts: ProfileCliOptions) => {
        await setup(opts, {});
        const query = profileQuery(opts);
        if (!query) {
            getLogger().error('Pass exactly one of --key, --product-code, --name');
            process.exit(1);
        }
        printFromGraph(opts.input, (graph) => new ProfileAggregator(graph).lookup(query));
    });

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});

// ─── Helpers ──────────────────────────────────────────────

function withInput(command: Command): Command {
    return command
        .requiredOption('-i, --input <dbPath>', 'Input database path')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Validate CLI flags, merge them over the config file and start the logger.
 */
async function setup(opts: LoggingOptions, flags: Record<string, unknown>): Promise<PredigraphConfig> {
    const parsed = ConfigFileSchema.safeParse({ ...flags, logLevel: opts.logLevel, jsonLogs: opts.jsonLogs });
    if (!parsed.success) {
        console.error(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
        process.exit(1);
    }

    const config = await resolveConfig(parsed.data);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function printFromGraph(dbPath: string, query: (graph: CitationGraph) => unknown): void {
    try {
        const db = new LineageDatabase(dbPath);
        try {
            console.log(JSON.stringify(query(db.loadGraph()), null, 2));
        } finally {
            db.close();
        }
    } catch (error) {
        getLogger().error({ error }, 'Query failed');
        process.exit(1);
    }
}

function profileQuery(opts: ProfileCliOptions): ProfileQuery | null {
    const queries: ProfileQuery[] = [];
    if (opts.key !== undefined) queries.push({ kind: 'key', key: opts.key });
    if (opts.productCode !== undefined) queries.push({ kind: 'productCode', productCode: opts.productCode });
    if (opts.name !== undefined) queries.push({ kind: 'name', fragment: opts.name });
    const [query] = queries;
    return queries.length === 1 && query ? query : null;
}

function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError('Not a positive integer.');
    }
    return parsed;
}
