/**
 * Library entry: the reconciliation core, analytics and storage.
 */
export * from './types/index.js';
export { parseIdentifier, toCanonicalKey, formatCanonicalKey, detectDeviceType } from './ingest/identifiers.js';
export type { ParsedIdentifier } from './ingest/identifiers.js';
export { MalformedRowError, normalizeRow, normalizeBatch } from './ingest/normalizer.js';
export { IdentityResolver, resolveRecords, completePrecedence } from './resolve/identity-resolver.js';
export type { ResolutionResult } from './resolve/identity-resolver.js';
export { reconcile, buildCitationGraph, assembleGraph, createStub } from './builder/graph-builder.js';
export type { Reconciliation } from './builder/graph-builder.js';
export { CitationGraph } from './graph/citation-graph.js';
export {
    rankHubs,
    traceChain,
    listChains,
    detectCycles,
    predicateAge,
    predicateAges,
    summarizePredicateAges,
    crossSourceValidation,
    reviewTimeCorrelation,
    findGaps,
    computeDerivedStats,
} from './graph/algorithms.js';
export { ProfileAggregator } from './profile/profile-aggregator.js';
export type { ProfileQuery, EntityProfile, CitationRef, OutboundCitation } from './profile/profile-aggregator.js';
export { loadSourceFile, loadSourceFiles } from './sources/file-loader.js';
export type { SourcePaths } from './sources/file-loader.js';
export { LineageDatabase } from './storage/database.js';
export type { DatabaseStats } from './storage/database.js';
export { exportGraph, renderGraph, EXPORT_FORMATS } from './exporters/export.js';
export type { ExportFormat } from './exporters/export.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger, componentLogger } from './utils/logger.js';
export { VERSION } from './version.js';
