import { TermCategory, type Term } from '../types/index.js';

export const EUROPEPMC_SEARCH_URL = 'https://www.ebi.ac.uk/europepmc/webservices/rest/search';

/** Initial cursor for a fresh result stream */
export const INITIAL_CURSOR = '*';

/**
 * Full-text sections a term must appear in (any of them).
 */
const TEXT_FIELDS = ['ABSTRACT', 'RESULTS', 'METHODS', 'TABLE', 'SUPPL', 'FIG'] as const;

/**
 * Bibliographic restrictions applied to every query.
 */
export interface SearchFilters {
    publicationType: string;
    source: string;
    organism: string;
}

export interface SearchUrlOptions extends SearchFilters {
    pageSize: number;
    synonyms: boolean;
    baseUrl?: string;
}

export const DEFAULT_SEARCH_FILTERS: SearchFilters = {
    publicationType: 'Journal Article',
    source: 'MED',
    organism: 'HUMAN',
};

/**
 * Category-specific cross-reference predicate.
 * Unscoped categories pass the term through unmodified.
 */
export function scopeTerm(term: Term, category: TermCategory): string {
    switch (category) {
        case TermCategory.METABOLITE:
            return `CHEBITERM:"${term}"`;
        case TermCategory.GENE_ONTOLOGY:
            return `GOTERM:"${term}"`;
        case TermCategory.FREE_TEXT:
            return term;
    }
}

/**
 * Build the Europe PMC query expression for a term.
 *
 * (ABSTRACT:"t" OR ... OR FIG:"t") AND <scope> AND PUB_TYPE:"..." AND SRC:"..." AND ORGANISM:"..."
 *
 * Terms are embedded verbatim; sanitizing them is the caller's job.
 */
export function buildSearchQuery(
    term: Term,
    category: TermCategory,
    filters: SearchFilters = DEFAULT_SEARCH_FILTERS
): string {
    const fields = TEXT_FIELDS.map((field) => `${field}:"${term}"`).join(' OR ');
    return [
        `(${fields})`,
        scopeTerm(term, category),
        `PUB_TYPE:"${filters.publicationType}"`,
        `SRC:"${filters.source}"`,
        `ORGANISM:"${filters.organism}"`,
    ].join(' AND ');
}

/**
 * Build the id-list request URL for one page of results.
 */
export function buildSearchUrl(
    term: Term,
    category: TermCategory,
    cursor: string,
    options: SearchUrlOptions
): string {
    const params = new URLSearchParams({
        query: buildSearchQuery(term, category, options),
        synonym: String(options.synonyms),
        resultType: 'idlist',
        pageSize: String(options.pageSize),
        cursorMark: cursor,
        format: 'json',
    });

    return `${options.baseUrl ?? EUROPEPMC_SEARCH_URL}?${params.toString()}`;
}
