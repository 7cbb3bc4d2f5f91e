#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import {
    COOCCUR_VERSION,
    cataloguePath,
    createOntologyClient,
    createSearcher,
    runMining,
} from '../builder/mining-pipeline.js';
import { countFindable, dispatchSearches } from '../mining/dispatcher.js';
import { buildGoCatalogue } from '../ontology/go-catalogue.js';
import { loadTermColumn, NAME_COLUMNS, writeGoCatalogue } from '../storage/catalogue.js';
import { MinerDatabase } from '../storage/database.js';
import { exportAssociations } from '../exporters/export.js';
import {
    LOG_LEVELS,
    parseTermCategory,
    type AssociationKind,
    type LogLevel,
    type MinerConfig,
    type MinerConfigOverrides,
    type TermCategory,
} from '../types/index.js';

const program = new Command();

program
    .name('cooccur')
    .description('Mine literature co-occurrence between metabolites and Gene Ontology terms.')
    .version(COOCCUR_VERSION);

// ─── Option parsers ───────────────────────────────────────

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
    }
    return level;
}

function parseCategory(value: string): TermCategory {
    const category = parseTermCategory(value);
    if (!category) {
        throw new InvalidArgumentError('Expected metabolite, go or free-text.');
    }
    return category;
}

function parseKind(value: string): AssociationKind {
    if (value !== 'direct' && value !== 'expanded') {
        throw new InvalidArgumentError('Expected direct or expanded.');
    }
    return value;
}

// ─── Shared setup ─────────────────────────────────────────

type LoggingOptions = {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
};

function withLoggingOptions(command: Command): Command {
    return command
        .option('--log-level <level>', 'Log level: silent | error | warn | info | debug', parseLogLevel)
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Resolve config, then initialize the logger and the shared HTTP client from it.
 */
async function setup(overrides: MinerConfigOverrides): Promise<MinerConfig> {
    const config = await resolveConfig(overrides).catch((error: unknown) => fail('Invalid configuration', error));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.http.timeoutMs, email: config.http.email, version: COOCCUR_VERSION });
    return config;
}

function fail(message: string, error: unknown): never {
    getLogger().error({ error }, message);
    process.exit(1);
}

// ─── MINE command ─────────────────────────────────────────

type MineOptions = LoggingOptions & {
    folder?: string;
    out?: string;
    goCatalogue?: string;
    metaboliteCatalogue?: string;
    concurrency?: number;
    organism?: string;
    termTimeout?: number;
    maxAttempts?: number;
    counts?: boolean;
    resume?: boolean;
};

withLoggingOptions(
    program
        .command('mine')
        .description('Search all terms, compute co-occurrences and expand them over GO ancestors')
        .option('-f, --folder <dir>', 'Data folder holding the catalogues and receiving the output')
        .option('-o, --out <path>', 'Database path')
        .option('--go-catalogue <file>', 'GO catalogue file (GOID,Name)')
        .option('--metabolite-catalogue <file>', 'Metabolite name file (ID,name)')
        .option('-c, --concurrency <n>', 'Terms searched in parallel', parsePositiveInt)
        .option('--organism <name>', 'Organism filter')
        .option('--term-timeout <ms>', 'Time budget per term', parsePositiveInt)
        .option('--max-attempts <n>', 'Attempts per result page', parsePositiveInt)
        .option('--no-expand', 'Skip ancestor expansion')
        .option('--counts', 'Write count tables')
        .option('--resume', 'Reuse finished term searches from the database')
).action(async (_opts: unknown, command: Command) => {
    const opts = command.opts<MineOptions>();
    const config = await setup({
        folder: opts.folder,
        out: opts.out,
        goCatalogue: opts.goCatalogue,
        metaboliteCatalogue: opts.metaboliteCatalogue,
        counts: opts.counts,
        resume: opts.resume,
        expandAncestors: command.getOptionValueSource('expand') === 'cli' ? false : undefined,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        search: {
            concurrency: opts.concurrency,
            organism: opts.organism,
            termTimeoutMs: opts.termTimeout,
        },
        retry: { maxAttempts: opts.maxAttempts },
    });

    try {
        const summary = await runMining(config);
        getLogger().info({ output: summary.outputPath, db: summary.dbPath }, 'Mining complete!');
    } catch (error) {
        fail('Mining failed', error);
    }
});

// ─── SEARCH command ───────────────────────────────────────

type SearchOptions = LoggingOptions & {
    out?: string;
    column?: string;
    concurrency?: number;
    resume?: boolean;
};

withLoggingOptions(
    program
        .command('search')
        .description('Search one term catalogue and store the hits')
        .argument('<category>', 'Term category: metabolite | go | free-text', parseCategory)
        .argument('<file>', 'Delimited file with a name column')
        .option('-o, --out <path>', 'Database path')
        .option('--column <name>', 'Column holding the terms')
        .option('-c, --concurrency <n>', 'Terms searched in parallel', parsePositiveInt)
        .option('--resume', 'Skip terms already in the database')
).action(async (category: TermCategory, file: string, _opts: unknown, command: Command) => {
    const opts = command.opts<SearchOptions>();
    const config = await setup({
        out: opts.out,
        resume: opts.resume,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        search: { concurrency: opts.concurrency },
    });

    try {
        const terms = loadTermColumn(file, opts.column ? [opts.column] : NAME_COLUMNS);
        const db = new MinerDatabase(config.out);
        try {
            if (!config.resume) db.clearSearches(category);
            const report = await dispatchSearches(terms, category, createSearcher(config), {
                concurrency: config.search.concurrency,
                termTimeoutMs: config.search.termTimeoutMs,
                checkpoint: db,
            });

            console.log(`\n🔎 ${category} search\n`);
            console.log(`  Terms:     ${terms.length}`);
            console.log(`  With hits: ${report.hits.size}`);
            console.log(`  Failed:    ${report.failures.length}`);
            console.log(`  Hits:      ${report.totalHits}`);
            console.log('');
        } finally {
            db.close();
        }
    } catch (error) {
        fail('Search failed', error);
    }
});

// ─── CHECK command ────────────────────────────────────────

type CheckOptions = LoggingOptions & {
    column?: string;
    concurrency?: number;
};

withLoggingOptions(
    program
        .command('check')
        .description('Count how many terms of a catalogue have at least one hit')
        .argument('<category>', 'Term category: metabolite | go | free-text', parseCategory)
        .argument('<file>', 'Delimited file with a name column')
        .option('--column <name>', 'Column holding the terms')
        .option('-c, --concurrency <n>', 'Terms checked in parallel', parsePositiveInt)
).action(async (category: TermCategory, file: string, _opts: unknown, command: Command) => {
    const opts = command.opts<CheckOptions>();
    const config = await setup({
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        search: { concurrency: opts.concurrency },
    });

    try {
        const terms = loadTermColumn(file, opts.column ? [opts.column] : NAME_COLUMNS);
        const report = await countFindable(terms, category, createSearcher(config), config.search.concurrency);
        console.log(`${report.findable}/${report.total} terms found (${report.failures.length} failed)`);
    } catch (error) {
        fail('Check failed', error);
    }
});

// ─── CATALOGUE command ────────────────────────────────────

type CatalogueOptions = LoggingOptions & {
    folder?: string;
    out?: string;
};

withLoggingOptions(
    program
        .command('catalogue')
        .description('Build the GO catalogue (GOID,Name) from a root term and its descendants')
        .argument('[rootId]', 'Root GO id, e.g. GO:0008150 (defaults to rootGoId from config)')
        .option('-f, --folder <dir>', 'Data folder')
        .option('-o, --out <path>', 'Output file (defaults to the configured GO catalogue)')
).action(async (rootId: string | undefined, _opts: unknown, command: Command) => {
    const opts = command.opts<CatalogueOptions>();
    const config = await setup({
        folder: opts.folder,
        rootGoId: rootId,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    });

    if (!config.rootGoId) {
        fail('No root GO id given', new Error('Pass <rootId> or set rootGoId in cooccur.config.json'));
    }

    try {
        const terms = await buildGoCatalogue(config.rootGoId, createOntologyClient(config));
        const outputPath = opts.out ?? cataloguePath(config, config.goCatalogue);
        writeGoCatalogue(outputPath, terms);
        console.log(`Catalogue written: ${outputPath} (${terms.length} terms)`);
    } catch (error) {
        fail('Catalogue build failed', error);
    }
});

// ─── EXPORT command ───────────────────────────────────────

type ExportOptions = LoggingOptions & {
    input?: string;
    out: string;
    kind: AssociationKind;
};

withLoggingOptions(
    program
        .command('export')
        .description('Export stored associations to TSV')
        .option('-i, --input <dbPath>', 'Input database path')
        .requiredOption('-o, --out <path>', 'Output TSV path')
        .option('-k, --kind <kind>', 'Association kind: direct | expanded', parseKind, 'expanded')
).action(async (_opts: unknown, command: Command) => {
    const opts = command.opts<ExportOptions>();
    const config = await setup({ out: opts.input, logLevel: opts.logLevel, jsonLogs: opts.jsonLogs });

    try {
        const rows = exportAssociations(config.out, opts.out, opts.kind);
        console.log(`Exported ${rows} ${opts.kind} associations to ${opts.out}`);
    } catch (error) {
        fail('Export failed', error);
    }
});

// ─── INSPECT command ──────────────────────────────────────

type InspectOptions = LoggingOptions & {
    input?: string;
};

withLoggingOptions(
    program
        .command('inspect')
        .description('Show database statistics')
        .option('-i, --input <dbPath>', 'Input database path')
).action(async (_opts: unknown, command: Command) => {
    const opts = command.opts<InspectOptions>();
    const config = await setup({ out: opts.input, logLevel: opts.logLevel, jsonLogs: opts.jsonLogs });

    try {
        const db = new MinerDatabase(config.out);
        const stats = db.getStats();
        db.close();

        console.log('\n📊 cooccur Database Statistics\n');
        console.log(`  Term hits: ${stats.termHits}`);
        console.log(`  Runs:      ${stats.runs}`);

        for (const [category, count] of Object.entries(stats.searchedTerms)) {
            const withHits = stats.termsWithHits[category] ?? 0;
            console.log(`  ${category}: ${count} searched, ${withHits} with hits`);
        }

        if (Object.keys(stats.associationsByKind).length > 0) {
            console.log('\n  Associations:');
            for (const [kind, count] of Object.entries(stats.associationsByKind)) {
                console.log(`    ${kind}: ${count}`);
            }
        }

        console.log('');
    } catch (error) {
        fail('Inspect failed', error);
    }
});

await program.parseAsync();
