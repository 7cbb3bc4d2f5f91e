/**
 * Library entry point.
 */
export * from './types/index.js';
export { OntologyCatalogue, CatalogueConflictError, CatalogueCoverageError } from './ontology/catalogue.js';
export { buildGoCatalogue } from './ontology/go-catalogue.js';
export { buildSearchQuery, buildSearchUrl, scopeTerm } from './sources/query-builder.js';
export { EuropePmcSearcher, SearchAbortedError, SearchExhaustedError } from './sources/europepmc.js';
export { QuickGoClient, OntologyServiceError } from './sources/quickgo.js';
export { dispatchSearches, countFindable } from './mining/dispatcher.js';
export type { DispatchOptions, DispatchReport, FindabilityReport } from './mining/dispatcher.js';
export { findOverlap, intersect } from './mining/overlap.js';
export { expandAssociations } from './mining/expansion.js';
export { runMining, COOCCUR_VERSION } from './builder/mining-pipeline.js';
export type { MiningDependencies, MiningSummary } from './builder/mining-pipeline.js';
export { MinerDatabase } from './storage/database.js';
export { loadGoCatalogue, loadMetaboliteNames, CatalogueFormatError } from './storage/catalogue.js';
export { countBy, exportAssociations, writeAssociationTable, writeCountTables } from './exporters/export.js';
export { HttpClient, HttpError, ResponseValidationError } from './utils/http-client.js';
export { resolveConfig, mergeConfig, ConfigError } from './utils/config.js';
