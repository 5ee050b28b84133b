import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type PredigraphConfig } from '../types/index.js';
import { completePrecedence } from '../resolve/identity-resolver.js';
import { componentLogger } from './logger.js';

const sourceNameSchema = z.enum(['direct_mapping', 'extraction', 'metadata', 'supplement']);

/**
 * Shape of predigraph.config.json. Every key is optional; unknown keys are rejected.
 */
export const ConfigFileSchema = z
    .object({
        sourcePrecedence: z
            .array(sourceNameSchema)
            .min(1)
            .refine((list) => new Set(list).size === list.length, 'sources must not repeat'),
        maxChainDepth: z.number().int().min(1).max(64),
        hubTopK: z.number().int().min(1),
        out: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Load configuration from predigraph.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('predigraph', {
        searchPlaces: ['predigraph.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new Error(`Invalid config file ${result.filepath}: ${parsed.error.message}`);
    }

    componentLogger('config').debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PredigraphConfig>,
    searchFrom?: string
): Promise<PredigraphConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    const merged: PredigraphConfig = {
        ...DEFAULT_CONFIG,
        ...stripUndefined(fileConfig ?? {}),
        ...stripUndefined(cliFlags),
    };

    return {
        ...merged,
        sourcePrecedence: completePrecedence(merged.sourcePrecedence),
    };
}

function stripUndefined(values: Partial<PredigraphConfig>): Partial<PredigraphConfig> {
    const out: Partial<PredigraphConfig> = {};
    for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) {
            Object.assign(out, { [key]: value });
        }
    }
    return out;
}
