import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type {
    OntologyHierarchyClient,
    PaperId,
    SearchCheckpoint,
    Term,
    TermCategory,
    TermSearcher,
    TermSearchOutcome,
} from '../types/index.js';
import type { OntologyCatalogue } from '../ontology/catalogue.js';
import { createHttpClient, sleep, type HttpClient } from '../utils/http-client.js';

/**
 * JSON response as Europe PMC and QuickGO send it.
 */
export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json;charset=UTF-8' },
    });
}

/**
 * HTTP client without backoff delays or meaningful rate limits.
 */
export function testHttpClient(): HttpClient {
    const unlimited = { tokensPerSecond: 10_000, maxBurst: 10_000 };
    return createHttpClient({
        timeout: 5000,
        maxRetries: 0,
        initialBackoffMs: 0,
        maxBackoffMs: 0,
        rateLimits: { europepmc: unlimited, quickgo: unlimited, default: unlimited },
    });
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'cooccur-test-'));
}

/**
 * In-memory searcher over a fixed term → paper ids corpus.
 */
export class FakeSearcher implements TermSearcher {
    readonly name = 'fake';
    readonly calls: Term[] = [];
    inFlight = 0;
    maxInFlight = 0;

    constructor(
        private readonly corpus: Record<Term, PaperId[]>,
        private readonly failing: ReadonlySet<Term> = new Set(),
        private readonly delayMs = 0
    ) {}

    async searchTerm(term: Term, _category: TermCategory): Promise<TermSearchOutcome> {
        this.calls.push(term);
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

        try {
            await sleep(this.delayMs);
            if (this.failing.has(term)) throw new Error(`search failed for ${term}`);
            const ids = this.corpus[term] ?? [];
            return { term, paperIds: new Set(ids), hitCount: ids.length, pages: 1 };
        } finally {
            this.inFlight--;
        }
    }

    async countHits(term: Term, _category: TermCategory): Promise<number> {
        if (this.failing.has(term)) throw new Error(`count failed for ${term}`);
        return this.corpus[term]?.length ?? 0;
    }
}

export class MemoryCheckpoint implements SearchCheckpoint {
    readonly store = new Map<TermCategory, Map<Term, Set<PaperId>>>();

    loadCompleted(category: TermCategory): Map<Term, Set<PaperId>> {
        return new Map(this.store.get(category));
    }

    recordCompleted(category: TermCategory, outcome: TermSearchOutcome): void {
        const completed = this.store.get(category) ?? new Map<Term, Set<PaperId>>();
        completed.set(outcome.term, new Set(outcome.paperIds));
        this.store.set(category, completed);
    }
}

/**
 * Ontology client answering from fixed ancestor chains (name → chain).
 */
export class FakeOntologyClient implements OntologyHierarchyClient {
    readonly name = 'fake ontology';
    readonly ancestorCalls: string[][] = [];

    constructor(
        private readonly chains: Record<string, string[]>,
        private readonly hierarchy: Record<string, string[]> = {},
        private readonly labels: Record<string, string> = {}
    ) {}

    async descendants(termId: string): Promise<Set<string>> {
        return new Set([...(this.hierarchy[termId] ?? []), termId]);
    }

    async names(termIds: string[]): Promise<Map<string, string>> {
        const names = new Map<string, string>();
        for (const id of termIds) {
            const label = this.labels[id];
            if (label !== undefined) names.set(label, id);
        }
        return names;
    }

    async ancestors(termNames: Iterable<string>, _catalogue: OntologyCatalogue): Promise<Map<string, string[]>> {
        const requested = [...termNames];
        this.ancestorCalls.push(requested);

        const chains = new Map<string, string[]>();
        for (const name of requested) {
            const chain = this.chains[name];
            if (chain) chains.set(name, chain);
        }
        return chains;
    }
}
