import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
    TermCategory,
    type AssociationRow,
    type MinerConfig,
    type OntologyHierarchyClient,
    type TermSearcher,
} from '../types/index.js';
import { OntologyCatalogue } from '../ontology/catalogue.js';
import { EuropePmcSearcher } from '../sources/europepmc.js';
import { QuickGoClient } from '../sources/quickgo.js';
import { uniqueInOrder } from '../sources/utils.js';
import { MinerDatabase } from '../storage/database.js';
import { loadGoCatalogue, loadMetaboliteNames } from '../storage/catalogue.js';
import { dispatchSearches, type DispatchOptions } from '../mining/dispatcher.js';
import { findOverlap } from '../mining/overlap.js';
import { expandAssociations } from '../mining/expansion.js';
import { writeAssociationTable, writeCountTables } from '../exporters/export.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export const COOCCUR_VERSION = '1.0.0';

/** File name of the association table written into the data folder */
export const ASSOCIATION_TABLE_FILE = 'textmining_all.tsv';

/**
 * Services the pipeline talks to. Defaults are built from the config.
 */
export interface MiningDependencies {
    searcher?: TermSearcher;
    ontologyClient?: OntologyHierarchyClient;

    /** Client behind the default searcher and ontology client; its request counts go into the summary */
    httpClient?: HttpClient;
}

export interface MiningSummary {
    dbPath: string;
    outputPath: string;
    countTables: string[];
    goTerms: number;
    metaboliteTerms: number;
    goTermsWithHits: number;
    metabolitesWithHits: number;
    failedTerms: number;
    directRows: number;

    /** Null when ancestor expansion is disabled */
    expandedRows: number | null;

    /** HTTP requests sent during the run, per source */
    requests: Record<string, number>;
    elapsedMs: number;
}

/**
 * Europe PMC searcher configured from `config.search` and `config.retry`.
 */
export function createSearcher(config: MinerConfig): EuropePmcSearcher {
    return new EuropePmcSearcher({
        pageSize: config.search.pageSize,
        synonyms: config.search.synonyms,
        publicationType: config.search.publicationType,
        source: config.search.source,
        organism: config.search.organism,
        retry: config.retry,
    });
}

export function createOntologyClient(config: MinerConfig): QuickGoClient {
    return new QuickGoClient({ batchSize: config.ontology.batchSize });
}

/**
 * Path of a catalogue file; relative names are taken from the data folder.
 */
export function cataloguePath(config: MinerConfig, file: string): string {
    return resolve(config.folder, file);
}

/**
 * Main mining pipeline:
 *
 * 1. Load the GO catalogue and metabolite names
 * 2. Search GO terms, then metabolites (checkpointed)
 * 3. Overlap → direct associations
 * 4. Ancestor expansion (optional)
 * 5. Write the association table (and count tables)
 * 6. Record run metadata
 */
export async function runMining(config: MinerConfig, deps: MiningDependencies = {}): Promise<MiningSummary> {
    const logger = getLogger();
    const startTime = Date.now();
    const httpClient = deps.httpClient ?? getHttpClient();
    const requestsBefore = httpClient.getAllRequestCounts();

    mkdirSync(config.folder, { recursive: true });

    const catalogueTerms = loadGoCatalogue(cataloguePath(config, config.goCatalogue));
    const catalogue = new OntologyCatalogue(catalogueTerms);
    const goTerms = uniqueInOrder(catalogueTerms.map((term) => term.name));
    const metaboliteTerms = loadMetaboliteNames(cataloguePath(config, config.metaboliteCatalogue));

    logger.info(
        { goTerms: goTerms.length, metaboliteTerms: metaboliteTerms.length, resume: config.resume },
        'Starting mining run'
    );

    const db = new MinerDatabase(config.out);

    try {
        if (!config.resume) {
            db.clearSearches();
        }

        // ──────────────────────────────────────────────────
        // Step 1: Literature searches
        // ──────────────────────────────────────────────────
        const searcher = deps.searcher ?? withHttpClient(createSearcher(config), httpClient);
        const dispatchOptions: DispatchOptions = {
            concurrency: config.search.concurrency,
            termTimeoutMs: config.search.termTimeoutMs,
            checkpoint: db,
        };

        logger.info('Start mining GO terms');
        const goReport = await dispatchSearches(goTerms, TermCategory.GENE_ONTOLOGY, searcher, dispatchOptions);

        logger.info('Start mining metabolites');
        const metaboliteReport = await dispatchSearches(metaboliteTerms, TermCategory.METABOLITE, searcher, dispatchOptions);

        const failedTerms = goReport.failures.length + metaboliteReport.failures.length;
        if (failedTerms > 0) {
            logger.warn(
                { go: goReport.failures.length, metabolites: metaboliteReport.failures.length },
                'Some terms could not be searched; rerun with --resume to retry them'
            );
        }

        // ──────────────────────────────────────────────────
        // Step 2: Co-occurrence
        // ──────────────────────────────────────────────────
        logger.info('Start finding co-occurrences');
        const direct = findOverlap(goReport.hits, metaboliteReport.hits, (evaluated, total) => {
            logger.debug({ evaluated, total }, 'Overlap progress');
        });
        db.replaceAssociations('direct', direct);

        // ──────────────────────────────────────────────────
        // Step 3: Ancestor expansion
        // ──────────────────────────────────────────────────
        let output: AssociationRow[] = direct;
        let expandedRows: number | null = null;

        if (config.expandAncestors) {
            const client = deps.ontologyClient ?? withHttpClient(createOntologyClient(config), httpClient);
            output = await expandAssociations(direct, catalogue, client);
            expandedRows = output.length;
        }
        db.replaceAssociations('expanded', config.expandAncestors ? output : []);

        // ──────────────────────────────────────────────────
        // Step 4: Output tables
        // ──────────────────────────────────────────────────
        const outputPath = join(config.folder, ASSOCIATION_TABLE_FILE);
        writeAssociationTable(outputPath, output);

        const countTables = config.counts
            ? writeCountTables(config.folder, config.expandAncestors ? 'expanded' : 'direct', output)
            : [];

        // ──────────────────────────────────────────────────
        // Step 5: Record run metadata
        // ──────────────────────────────────────────────────
        const summary: MiningSummary = {
            dbPath: config.out,
            outputPath,
            countTables,
            goTerms: goTerms.length,
            metaboliteTerms: metaboliteTerms.length,
            goTermsWithHits: goReport.hits.size,
            metabolitesWithHits: metaboliteReport.hits.size,
            failedTerms,
            directRows: direct.length,
            expandedRows,
            requests: requestsSince(requestsBefore, httpClient.getAllRequestCounts()),
            elapsedMs: Date.now() - startTime,
        };

        db.insertRun({
            created_at: new Date().toISOString(),
            cooccur_version: COOCCUR_VERSION,
            config_json: JSON.stringify(config),
            go_terms: goTerms.length,
            metabolite_terms: metaboliteTerms.length,
            stats_json: JSON.stringify(summary),
        });

        logger.info(
            {
                direct: summary.directRows,
                expanded: summary.expandedRows,
                requests: summary.requests,
                elapsed: `${(summary.elapsedMs / 1000).toFixed(1)}s`,
            },
            'Mining run complete'
        );

        return summary;
    } finally {
        db.close();
    }
}

function withHttpClient<T extends { setHttpClient(client: HttpClient): void }>(service: T, client: HttpClient): T {
    service.setHttpClient(client);
    return service;
}

function requestsSince(before: Record<string, number>, after: Record<string, number>): Record<string, number> {
    const sent: Record<string, number> = {};
    for (const [source, count] of Object.entries(after)) {
        const delta = count - (before[source] ?? 0);
        if (delta > 0) sent[source] = delta;
    }
    return sent;
}
