import type { OntologyTerm, Term } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { readTable, writeTable, type Table } from './delimited.js';

/**
 * Catalogue file that cannot be read as expected.
 */
export class CatalogueFormatError extends Error {
    constructor(message: string, public readonly path: string) {
        super(message);
        this.name = 'CatalogueFormatError';
    }
}

export const GO_ID_COLUMNS = ['GOID', 'id', 'ID'] as const;
export const NAME_COLUMNS = ['Name', 'name'] as const;

/**
 * First column of `candidates` present in the table header.
 */
function findColumn(table: Table, candidates: readonly string[], path: string): string {
    const column = candidates.find((candidate) => table.header.includes(candidate));
    if (!column) {
        throw new CatalogueFormatError(
            `${path} has no ${candidates.join(' / ')} column (found: ${table.header.join(', ') || 'nothing'})`,
            path
        );
    }
    return column;
}

/**
 * Load the allowed GO catalogue (columns GOID, Name).
 */
export function loadGoCatalogue(path: string): OntologyTerm[] {
    const table = readTable(path);
    const idColumn = findColumn(table, GO_ID_COLUMNS, path);
    const nameColumn = findColumn(table, NAME_COLUMNS, path);

    const terms: OntologyTerm[] = [];
    for (const row of table.rows) {
        const id = row[idColumn]?.trim() ?? '';
        const name = row[nameColumn] ?? '';
        if (id && name) terms.push({ id, name });
    }

    getLogger().debug({ path, terms: terms.length }, 'GO catalogue loaded');
    return terms;
}

/**
 * Distinct, non-empty values of a name column, in file order.
 */
export function loadTermColumn(path: string, candidates: readonly string[] = NAME_COLUMNS): Term[] {
    const table = readTable(path);
    const column = findColumn(table, candidates, path);

    const terms = new Set<Term>();
    for (const row of table.rows) {
        const value = row[column];
        if (value) terms.add(value);
    }

    getLogger().debug({ path, column, terms: terms.size }, 'Terms loaded');
    return [...terms];
}

/**
 * Metabolite names (columns ID, name) as produced by the upstream extraction.
 */
export function loadMetaboliteNames(path: string): Term[] {
    return loadTermColumn(path, NAME_COLUMNS);
}

/**
 * Write a GO catalogue as GOID,Name.
 */
export function writeGoCatalogue(path: string, terms: readonly OntologyTerm[]): void {
    writeTable(path, ['GOID', 'Name'], terms.map((term) => [term.id, term.name]));
    getLogger().info({ path, terms: terms.length }, 'GO catalogue written');
}
