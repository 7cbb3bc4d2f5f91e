/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Europe PMC search configuration.
 */
export interface SearchConfig {
    /** Maximum number of terms searched at once */
    concurrency: number;
    pageSize: number;
    synonyms: boolean;
    publicationType: string;
    source: string;
    organism: string;

    /** Per-term time budget; unset means no budget */
    termTimeoutMs?: number;
}

/**
 * Page-fetch retry policy (exponential backoff with jitter).
 */
export interface RetryConfig {
    /** Total attempts per page, first one included */
    maxAttempts: number;
    initialBackoffMs: number;
    maxBackoffMs: number;
}

/**
 * QuickGO configuration.
 */
export interface OntologyConfig {
    batchSize: number;
}

/**
 * HTTP client configuration.
 */
export interface HttpConfig {
    timeoutMs: number;

    /** Contact address sent in the User-Agent */
    email?: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface MinerConfig {
    // Input
    folder: string;
    goCatalogue: string;
    metaboliteCatalogue: string;
    rootGoId?: string;

    // Output
    out: string;
    counts: boolean;

    // Pipeline
    expandAncestors: boolean;
    resume: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    search: SearchConfig;
    retry: RetryConfig;
    ontology: OntologyConfig;
    http: HttpConfig;
}

/**
 * Partial configuration as supplied by a config file, env vars or CLI flags.
 * Nested sections are merged one level deep.
 */
export type MinerConfigOverrides = Partial<Omit<MinerConfig, 'search' | 'retry' | 'ontology' | 'http'>> & {
    search?: Partial<SearchConfig>;
    retry?: Partial<RetryConfig>;
    ontology?: Partial<OntologyConfig>;
    http?: Partial<HttpConfig>;
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MinerConfig = {
    folder: './data',
    goCatalogue: 'Go_names.csv',
    metaboliteCatalogue: 'Metabolite_name.csv',
    out: './cooccur.db',
    counts: false,
    expandAncestors: true,
    resume: false,
    logLevel: 'info',
    jsonLogs: false,
    search: {
        concurrency: 10,
        pageSize: 1000,
        synonyms: true,
        publicationType: 'Journal Article',
        source: 'MED',
        organism: 'HUMAN',
    },
    retry: {
        maxAttempts: 5,
        initialBackoffMs: 1000,
        maxBackoffMs: 30000,
    },
    ontology: {
        batchSize: 50,
    },
    http: {
        timeoutMs: 30000,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    cooccur_version: string;
    config_json: string;
    go_terms: number;
    metabolite_terms: number;
    stats_json: string;
}
