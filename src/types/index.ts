/**
 * Barrel export for all shared types.
 */
export { TermCategory, parseTermCategory } from './term.js';
export type { Term, PaperId, SearchResult, TermSearchOutcome, TermFailure } from './term.js';
export { ASSOCIATION_COLUMNS } from './association.js';
export type { AssociationRow, ExpandedAssociationRow, AssociationKind } from './association.js';
export type { OntologyTerm } from './ontology.js';
export type { OntologyHierarchyClient, OntologyClientOptions } from './ontology-client.js';
export type { TermSearcher, SearchCheckpoint } from './term-searcher.js';
export { DEFAULT_CONFIG, LOG_LEVELS } from './config.js';
export type {
    MinerConfig,
    MinerConfigOverrides,
    LogLevel,
    SearchConfig,
    RetryConfig,
    OntologyConfig,
    HttpConfig,
    RunRecord,
} from './config.js';
