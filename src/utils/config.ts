import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, LOG_LEVELS, type MinerConfig, type MinerConfigOverrides } from '../types/index.js';
import { getLogger } from './logger.js';

const positiveInt = z.number().int().positive();

/**
 * Shape accepted in cooccur.config.json. Every key is optional.
 */
const FileConfigSchema = z.object({
    folder: z.string(),
    goCatalogue: z.string(),
    metaboliteCatalogue: z.string(),
    rootGoId: z.string(),
    out: z.string(),
    counts: z.boolean(),
    expandAncestors: z.boolean(),
    resume: z.boolean(),
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
    jsonLogs: z.boolean(),
    search: z.object({
        concurrency: positiveInt,
        pageSize: positiveInt,
        synonyms: z.boolean(),
        publicationType: z.string(),
        source: z.string(),
        organism: z.string(),
        termTimeoutMs: positiveInt,
    }).partial(),
    retry: z.object({
        maxAttempts: positiveInt,
        initialBackoffMs: z.number().nonnegative(),
        maxBackoffMs: z.number().nonnegative(),
    }).partial(),
    ontology: z.object({
        batchSize: positiveInt,
    }).partial(),
    http: z.object({
        timeoutMs: positiveInt,
        email: z.string(),
    }).partial(),
}).partial();

/**
 * Raised when cooccur.config.json exists but does not match the schema.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly filepath: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Validate a raw config object.
 */
export function parseConfigFile(raw: unknown, filepath: string): MinerConfigOverrides {
    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid config file ${filepath}: ${issues}`, filepath);
    }
    return parsed.data;
}

/**
 * Load configuration from cooccur.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<MinerConfigOverrides | null> {
    const explorer = cosmiconfig('cooccur', {
        searchPlaces: ['cooccur.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (result && !result.isEmpty) {
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parseConfigFile(result.config, result.filepath);
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): MinerConfigOverrides {
    const env: MinerConfigOverrides = {};

    const email = process.env['COOCCUR_EMAIL'];
    if (email) {
        env.http = { email };
    }

    const level = LOG_LEVELS.find((l) => l === process.env['COOCCUR_LOG_LEVEL']);
    if (level) {
        env.logLevel = level;
    }

    return env;
}

/**
 * Drop keys whose value is undefined so they do not shadow lower layers.
 */
function compact<T extends object>(value: T | undefined): Partial<T> {
    const out: Partial<T> = { ...value };
    for (const key in out) {
        if (out[key] === undefined) delete out[key];
    }
    return out;
}

/**
 * Merge configuration layers over the defaults.
 * Layers later in the list win.
 */
export function mergeConfig(...layers: Array<MinerConfigOverrides | null>): MinerConfig {
    let merged: MinerConfig = { ...DEFAULT_CONFIG };

    for (const layer of layers) {
        if (!layer) continue;
        const { search, retry, ontology, http, ...flat } = layer;
        merged = {
            ...merged,
            ...compact(flat),
            // Deep merge nested objects
            search: { ...merged.search, ...compact(search) },
            retry: { ...merged.retry, ...compact(retry) },
            ontology: { ...merged.ontology, ...compact(ontology) },
            http: { ...merged.http, ...compact(http) },
        };
    }

    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: MinerConfigOverrides,
    searchFrom?: string
): Promise<MinerConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    return mergeConfig(fileConfig, envConfig, cliFlags);
}
