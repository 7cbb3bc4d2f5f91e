/**
 * Term categories supported by the literature search.
 *
 * The category decides which cross-reference predicate scopes the query:
 *   METABOLITE     → CHEBITERM:"<term>"
 *   GENE_ONTOLOGY  → GOTERM:"<term>"
 *   FREE_TEXT      → the term itself, unscoped (organisms, pathogens, ...)
 */
export enum TermCategory {
    METABOLITE = 'Metabolite',
    GENE_ONTOLOGY = 'GO',
    FREE_TEXT = 'FreeText',
}

/** A literal search term. Matching is exact; case handling is up to the caller. */
export type Term = string;

/** Opaque literature identifier returned by Europe PMC (usually a PMID). */
export type PaperId = string;

/**
 * Term → paper identifiers for one mining run and one category.
 * Terms with zero hits are never stored.
 */
export type SearchResult = Map<Term, Set<PaperId>>;

/**
 * Outcome of paginating through every result page for a single term.
 */
export interface TermSearchOutcome {
    term: Term;
    paperIds: Set<PaperId>;

    /** Total hit count reported by the server on the last page */
    hitCount: number;

    /** Number of pages requested */
    pages: number;
}

/**
 * A term whose search ended in a terminal error.
 */
export interface TermFailure {
    term: Term;
    error: Error;
}

const CATEGORY_ALIASES: Record<string, TermCategory> = {
    metabolite: TermCategory.METABOLITE,
    metabolites: TermCategory.METABOLITE,
    go: TermCategory.GENE_ONTOLOGY,
    'gene-ontology': TermCategory.GENE_ONTOLOGY,
    freetext: TermCategory.FREE_TEXT,
    'free-text': TermCategory.FREE_TEXT,
};

/**
 * Parse a user-supplied category name (CLI argument, config value).
 * Returns null for unknown names.
 */
export function parseTermCategory(input: string): TermCategory | null {
    return CATEGORY_ALIASES[input.trim().toLowerCase()] ?? null;
}
