import { join } from 'node:path';
import { MinerDatabase } from '../storage/database.js';
import { formatTable, writeTable, type Cell } from '../storage/delimited.js';
import { ASSOCIATION_COLUMNS, type AssociationKind, type AssociationRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

/** Association table column, by its header name */
export type AssociationColumn = (typeof ASSOCIATION_COLUMNS)[number];

export interface CountRow {
    values: string[];
    count: number;
}

const COLUMN_ACCESSORS: Record<AssociationColumn, (row: AssociationRow) => string> = {
    'Gene Ontology': (row) => row.goTerm,
    Metabolite: (row) => row.metabolite,
    'Paper ID': (row) => row.paperId,
};

/**
 * Count tables written next to the association table, by file suffix.
 */
const COUNT_TABLES: ReadonlyArray<{ suffix: string; columns: AssociationColumn[] }> = [
    { suffix: 'pairs', columns: ['Gene Ontology', 'Metabolite'] },
    { suffix: 'go', columns: ['Gene Ontology'] },
    { suffix: 'metabolites', columns: ['Metabolite'] },
];

// ─── Association table ───────────────────────────────────

function associationCells(rows: readonly AssociationRow[]): Cell[][] {
    return rows.map((row) => [row.goTerm, row.metabolite, row.paperId]);
}

/**
 * Render associations as TSV with the Gene Ontology / Metabolite / Paper ID header.
 */
export function formatAssociationTable(rows: readonly AssociationRow[]): string {
    return formatTable(ASSOCIATION_COLUMNS, associationCells(rows), '\t');
}

export function writeAssociationTable(path: string, rows: readonly AssociationRow[]): void {
    writeTable(path, ASSOCIATION_COLUMNS, associationCells(rows), '\t');
    getLogger().info({ path, rows: rows.length }, 'Association table written');
}

// ─── Counts ──────────────────────────────────────────────

/**
 * Occurrences of each distinct combination of `columns`.
 * Sorted by descending count, ties broken by the values in column order.
 */
export function countBy(rows: readonly AssociationRow[], columns: readonly AssociationColumn[]): CountRow[] {
    const accessors = columns.map((column) => COLUMN_ACCESSORS[column]);
    const counts = new Map<string, CountRow>();

    for (const row of rows) {
        const values = accessors.map((accessor) => accessor(row));
        const key = JSON.stringify(values);
        const entry = counts.get(key);
        if (entry) {
            entry.count++;
        } else {
            counts.set(key, { values, count: 1 });
        }
    }

    return [...counts.values()].sort((a, b) => b.count - a.count || compareValues(a.values, b.values));
}

function compareValues(a: readonly string[], b: readonly string[]): number {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
        const left = a[i] ?? '';
        const right = b[i] ?? '';
        if (left !== right) return left < right ? -1 : 1;
    }
    return a.length - b.length;
}

/**
 * Write `<prefix>_textmining_{pairs,go,metabolites}.tsv` into `folder`.
 * @returns the paths written
 */
export function writeCountTables(folder: string, prefix: string, rows: readonly AssociationRow[]): string[] {
    const written: string[] = [];

    for (const { suffix, columns } of COUNT_TABLES) {
        const path = join(folder, `${prefix}_textmining_${suffix}.tsv`);
        const counts = countBy(rows, columns);
        writeTable(path, [...columns, 'Count'], counts.map((entry) => [...entry.values, entry.count]), '\t');
        written.push(path);
    }

    getLogger().info({ folder, prefix, tables: written.length }, 'Count tables written');
    return written;
}

// ─── Database export ─────────────────────────────────────

/**
 * Dump stored associations of one kind to a TSV file.
 * @returns number of rows written
 */
export function exportAssociations(dbPath: string, outputPath: string, kind: AssociationKind): number {
    const db = new MinerDatabase(dbPath);

    try {
        const rows = db.getAssociations(kind);
        writeAssociationTable(outputPath, rows);
        return rows.length;
    } finally {
        db.close();
    }
}
