import type { SourceName } from './record.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Options the reconciliation core takes. Passed explicitly; the core never reads config itself.
 */
export interface ReconcileOptions {
    /** Most authoritative first; sources left out rank after the listed ones */
    sourcePrecedence: SourceName[];
}

export interface AnalyticsOptions {
    maxChainDepth: number;
    hubTopK: number;
}

/**
 * Full configuration merged from CLI flags and config file.
 */
export interface PredigraphConfig extends ReconcileOptions, AnalyticsOptions {
    out: string;
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PredigraphConfig = {
    sourcePrecedence: ['direct_mapping', 'extraction', 'metadata', 'supplement'],
    maxChainDepth: 6,
    hubTopK: 20,
    out: './predigraph.db',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    predigraph_version: string;
    config_json: string;
    sources_json: string;
    stats_json: string;
}
