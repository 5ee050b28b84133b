/**
 * Barrel export for all shared types.
 */
export { ALL_SOURCES, ENTITY_FIELD_NAMES, NORMALIZED_SCHEMA_VERSION } from './record.js';
export type {
    SourceName,
    RawRow,
    SourceBatch,
    DeviceType,
    EntityFields,
    EntityFieldName,
    NormalizedRecord,
    NormalizationReport,
    MalformedRowInfo,
} from './record.js';
export { COMPARABLE_FIELDS } from './entity.js';
export type {
    Entity,
    ProvenanceEntry,
    ComparableField,
    SourceValue,
    CitationDeclaration,
} from './entity.js';
export { edgeKey } from './edge.js';
export type {
    CitationEdge,
    DanglingReferenceNotice,
    SelfCitationAnomaly,
    GraphNotice,
} from './edge.js';
export { measured, insufficient } from './analytics.js';
export type {
    Metric,
    InsufficientDataMarker,
    HubRow,
    ChainStep,
    CycleRecord,
    ChainResult,
    ChainSummary,
    PredicateAge,
    AgeSummary,
    CrossSourceMismatch,
    CorrelationResult,
    GapKind,
    GapRow,
    DerivedStats,
} from './analytics.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PredigraphConfig,
    ReconcileOptions,
    AnalyticsOptions,
    LogLevel,
    RunRecord,
} from './config.js';
