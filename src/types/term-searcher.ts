import type { PaperId, Term, TermCategory, TermSearchOutcome } from './term.js';

/**
 * Interface for literature search services (Europe PMC).
 */
export interface TermSearcher {
    /** Human-readable service name */
    readonly name: string;

    /**
     * Collect every paper id matching `term`, following pagination to the end.
     * Rejects when the term cannot be searched (retries exhausted, aborted).
     */
    searchTerm(term: Term, category: TermCategory, signal?: AbortSignal): Promise<TermSearchOutcome>;

    /**
     * Hit count reported by the first result page.
     */
    countHits(term: Term, category: TermCategory, signal?: AbortSignal): Promise<number>;
}

/**
 * Persisted per-term search outcomes, so an interrupted run can resume.
 */
export interface SearchCheckpoint {
    /**
     * Terms already searched for `category`, zero-hit terms included (as empty sets).
     */
    loadCompleted(category: TermCategory): Map<Term, Set<PaperId>>;

    /**
     * Record a finished term. Called once per term, after its search completes.
     */
    recordCompleted(category: TermCategory, outcome: TermSearchOutcome): void;
}
