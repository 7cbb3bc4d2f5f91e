/**
 * A concept from the Gene Ontology.
 */
export interface OntologyTerm {
    /** Identifier, e.g. "GO:0006954" */
    id: string;

    /** Canonical display name, e.g. "inflammatory response" */
    name: string;
}
