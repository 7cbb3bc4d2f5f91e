import type { OntologyCatalogue } from '../ontology/catalogue.js';

/**
 * Interface for ontology hierarchy services (QuickGO).
 * Every operation fails loudly on a non-2xx or malformed response.
 */
export interface OntologyHierarchyClient {
    /** Human-readable service name */
    readonly name: string;

    /**
     * All descendant concept ids of `termId`, plus `termId` itself.
     */
    descendants(termId: string): Promise<Set<string>>;

    /**
     * Resolve concept ids to their canonical names.
     * @returns name → id
     */
    names(termIds: string[]): Promise<Map<string, string>>;

    /**
     * Allowed ancestor chain for each named concept.
     * Each chain holds the in-catalogue ancestors followed by the concept itself.
     * @param termNames - Concept names; every one must be in `catalogue`
     * @param catalogue - The allowed subtree
     * @returns name → ordered, duplicate-free chain of names
     */
    ancestors(termNames: Iterable<string>, catalogue: OntologyCatalogue): Promise<Map<string, string[]>>;
}

/**
 * Options for ontology client initialization.
 */
export interface OntologyClientOptions {
    /** Ids per request (URL length limit) */
    batchSize?: number;

    /** Override the service base URL */
    baseUrl?: string;
}
