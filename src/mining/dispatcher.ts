import pLimit from 'p-limit';
import type {
    PaperId,
    SearchCheckpoint,
    SearchResult,
    Term,
    TermCategory,
    TermFailure,
    TermSearcher,
    TermSearchOutcome,
} from '../types/index.js';
import { uniqueInOrder } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

export interface DispatchOptions {
    /** Maximum number of terms in flight */
    concurrency?: number;

    /** Abort a term's search after this many milliseconds */
    termTimeoutMs?: number;

    /** Restore finished terms from, and record new ones to, a checkpoint */
    checkpoint?: SearchCheckpoint;

    onProgress?: (done: number, total: number) => void;
}

export interface DispatchReport {
    category: TermCategory;

    /** Term → paper ids; zero-hit and failed terms are absent */
    hits: SearchResult;

    failures: TermFailure[];

    /** Sum of server hit counts over the terms searched in this dispatch */
    totalHits: number;

    /** Terms searched in this dispatch */
    searched: number;

    /** Terms taken from the checkpoint instead of being searched */
    restored: number;
}

type TaskResult =
    | { status: 'ok'; outcome: TermSearchOutcome }
    | { status: 'failed'; failure: TermFailure };

export const DEFAULT_CONCURRENCY = 10;

/**
 * Search every term under a bounded worker pool and collect term → paper ids.
 *
 * Each task owns its result; the mapping is assembled from the completed
 * tasks, so completion order never matters. A failing term is reported in
 * `failures` and does not abort its siblings.
 */
export async function dispatchSearches(
    terms: readonly Term[],
    category: TermCategory,
    searcher: TermSearcher,
    options: DispatchOptions = {}
): Promise<DispatchReport> {
    const logger = getLogger();
    const { concurrency = DEFAULT_CONCURRENCY, termTimeoutMs, checkpoint, onProgress } = options;

    const unique = uniqueInOrder(terms);
    const completed = checkpoint?.loadCompleted(category) ?? new Map<Term, Set<PaperId>>();
    const pending = unique.filter((term) => !completed.has(term));
    const restored = unique.length - pending.length;

    if (restored > 0) {
        logger.info({ category, restored, pending: pending.length }, 'Resuming from checkpoint');
    }

    const limit = pLimit(Math.max(1, Math.floor(concurrency)));
    let done = 0;

    const searchOne = async (term: Term): Promise<TaskResult> => {
        const controller = termTimeoutMs ? new AbortController() : undefined;
        const timer = controller ? setTimeout(() => controller.abort(), termTimeoutMs) : undefined;

        try {
            const outcome = await searcher.searchTerm(term, category, controller?.signal);
            checkpoint?.recordCompleted(category, outcome);
            return { status: 'ok', outcome };
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            logger.warn({ term, category, error: failure.message }, 'Term search failed');
            return { status: 'failed', failure: { term, error: failure } };
        } finally {
            clearTimeout(timer);
            done++;
            onProgress?.(done, pending.length);
            logger.debug({ category, done, total: pending.length }, 'Search progress');
        }
    };

    const results = await Promise.all(pending.map((term) => limit(() => searchOne(term))));

    // Fan-in
    const hits: SearchResult = new Map();
    for (const term of unique) {
        const ids = completed.get(term);
        if (ids && ids.size > 0) hits.set(term, ids);
    }

    const failures: TermFailure[] = [];
    let totalHits = 0;
    for (const result of results) {
        if (result.status === 'failed') {
            failures.push(result.failure);
            continue;
        }
        const { term, paperIds, hitCount } = result.outcome;
        totalHits += hitCount;
        if (paperIds.size > 0) hits.set(term, paperIds);
    }

    logger.info(
        { category, terms: unique.length, withHits: hits.size, failed: failures.length, totalHits },
        'Term searches complete'
    );

    return { category, hits, failures, totalHits, searched: pending.length, restored };
}

export interface FindabilityReport {
    total: number;
    findable: number;
    failures: TermFailure[];
}

/**
 * Count how many terms have at least one hit (first page only).
 */
export async function countFindable(
    terms: readonly Term[],
    category: TermCategory,
    searcher: TermSearcher,
    concurrency = DEFAULT_CONCURRENCY
): Promise<FindabilityReport> {
    const unique = uniqueInOrder(terms);
    const limit = pLimit(Math.max(1, Math.floor(concurrency)));

    const results = await Promise.all(
        unique.map((term) =>
            limit(async (): Promise<number | TermFailure> => {
                try {
                    return await searcher.countHits(term, category);
                } catch (error) {
                    return { term, error: error instanceof Error ? error : new Error(String(error)) };
                }
            })
        )
    );

    let findable = 0;
    const failures: TermFailure[] = [];
    for (const result of results) {
        if (typeof result === 'number') {
            if (result > 0) findable++;
        } else {
            failures.push(result);
        }
    }

    return { total: unique.length, findable, failures };
}
