import { z } from 'zod';
import type { RetryConfig, TermCategory, Term, PaperId, TermSearchOutcome, TermSearcher } from '../types/index.js';
import { calculateBackoff, getHttpClient, sleep, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { buildSearchUrl, DEFAULT_SEARCH_FILTERS, INITIAL_CURSOR, type SearchUrlOptions } from './query-builder.js';

/**
 * Europe PMC id-list response (subset of relevant fields).
 */
const IdListResponseSchema = z.object({
    hitCount: z.union([z.number(), z.string().regex(/^\d+$/)]).pipe(z.coerce.number().int().nonnegative()),
    nextCursorMark: z.string().optional(),
    resultList: z
        .object({
            result: z.array(z.object({ id: z.string() })).default([]),
        })
        .default({ result: [] }),
});

export type IdListResponse = z.infer<typeof IdListResponseSchema>;

/**
 * Every attempt at fetching one page failed.
 */
export class SearchExhaustedError extends Error {
    constructor(
        public readonly term: Term,
        public readonly attempts: number,
        cause: unknown
    ) {
        super(`Search for "${term}" failed after ${attempts} attempts: ${errorMessage(cause)}`, { cause });
        this.name = 'SearchExhaustedError';
    }
}

/**
 * The term's time budget ran out (or the caller cancelled).
 */
export class SearchAbortedError extends Error {
    constructor(public readonly term: Term) {
        super(`Search for "${term}" was aborted`);
        this.name = 'SearchAbortedError';
    }
}

export interface EuropePmcSearcherOptions extends Partial<Omit<SearchUrlOptions, 'baseUrl'>> {
    baseUrl?: string;
    retry?: Partial<RetryConfig>;
}

const DEFAULT_RETRY: RetryConfig = {
    maxAttempts: 5,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
};

/**
 * Paginated literature search against Europe PMC.
 *
 * Follows `nextCursorMark` until the server reports zero hits or hands
 * back the cursor that was just used.
 *
 * @see https://europepmc.org/RestfulWebService
 */
export class EuropePmcSearcher implements TermSearcher {
    readonly name = 'Europe PMC';
    private httpClient: HttpClient;
    private readonly urlOptions: SearchUrlOptions;
    private readonly retry: RetryConfig;
    private totalHitCount = 0;
    private processedCount = 0;

    constructor(options: EuropePmcSearcherOptions = {}) {
        this.urlOptions = {
            ...DEFAULT_SEARCH_FILTERS,
            pageSize: 1000,
            synonyms: true,
            ...withoutUndefined(options),
        };
        this.retry = { ...DEFAULT_RETRY, ...options.retry };
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    /** Sum of the final hit counts of every term searched so far */
    get totalHits(): number {
        return this.totalHitCount;
    }

    /** Number of terms whose search has finished */
    get processed(): number {
        return this.processedCount;
    }

    resetCounters(): void {
        this.totalHitCount = 0;
        this.processedCount = 0;
    }

    /**
     * Collect every paper id matching `term`.
     * @throws SearchExhaustedError when a page keeps failing
     * @throws SearchAbortedError when `signal` fires
     */
    async searchTerm(term: Term, category: TermCategory, signal?: AbortSignal): Promise<TermSearchOutcome> {
        const paperIds = new Set<PaperId>();
        let cursor = INITIAL_CURSOR;
        let pages = 0;

        while (true) {
            const page = await this.fetchPage(term, category, cursor, signal);
            pages++;

            for (const result of page.resultList.result) {
                paperIds.add(result.id);
            }

            const next = page.nextCursorMark;
            if (page.hitCount === 0 || next === undefined || next === cursor) {
                this.totalHitCount += page.hitCount;
                this.processedCount++;
                getLogger().debug({ term, category, hitCount: page.hitCount, pages }, 'Term search complete');
                return { term, paperIds, hitCount: page.hitCount, pages };
            }

            cursor = next;
        }
    }

    /**
     * Hit count of the first page only.
     */
    async countHits(term: Term, category: TermCategory, signal?: AbortSignal): Promise<number> {
        const page = await this.fetchPage(term, category, INITIAL_CURSOR, signal);
        return page.hitCount;
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Fetch one page, retrying transport, HTTP and parse failures with backoff.
     */
    private async fetchPage(
        term: Term,
        category: TermCategory,
        cursor: string,
        signal?: AbortSignal
    ): Promise<IdListResponse> {
        const url = buildSearchUrl(term, category, cursor, this.urlOptions);
        let lastError: unknown;

        for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
            if (signal?.aborted) throw new SearchAbortedError(term);

            try {
                return await this.httpClient.getJson(url, IdListResponseSchema, {
                    source: 'europepmc',
                    maxRetries: 0,
                    signal,
                });
            } catch (error) {
                if (signal?.aborted) throw new SearchAbortedError(term);
                lastError = error;

                if (attempt + 1 < this.retry.maxAttempts) {
                    const backoff = calculateBackoff(attempt, this.retry.initialBackoffMs, this.retry.maxBackoffMs);
                    getLogger().warn(
                        { term, cursor, attempt: attempt + 1, backoffMs: backoff, error: errorMessage(error) },
                        'Page fetch failed, retrying'
                    );
                    await sleep(backoff, signal);
                }
            }
        }

        throw new SearchExhaustedError(term, this.retry.maxAttempts, lastError);
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * URL options from searcher options, skipping unset keys.
 */
function withoutUndefined(options: EuropePmcSearcherOptions): Partial<SearchUrlOptions> {
    const out: Partial<SearchUrlOptions> = {};
    if (options.publicationType !== undefined) out.publicationType = options.publicationType;
    if (options.source !== undefined) out.source = options.source;
    if (options.organism !== undefined) out.organism = options.organism;
    if (options.pageSize !== undefined) out.pageSize = options.pageSize;
    if (options.synonyms !== undefined) out.synonyms = options.synonyms;
    if (options.baseUrl !== undefined) out.baseUrl = options.baseUrl;
    return out;
}
