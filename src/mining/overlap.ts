import type { AssociationRow, PaperId, Term } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/** Progress is reported every this many pairs */
const PROGRESS_INTERVAL = 1_000_000;

/**
 * Members of both sets. Walks the smaller set and probes the larger one,
 * so the cost is linear in min(|a|, |b|).
 */
export function intersect<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): T[] {
    const [small, large] = a.size <= b.size ? [a, b] : [b, a];
    const shared: T[] = [];
    for (const value of small) {
        if (large.has(value)) shared.push(value);
    }
    return shared;
}

/**
 * Cross-join the GO and metabolite search results.
 *
 * Emits one row per (GO term, metabolite, paper) where the paper is in both
 * terms' id sets. Pairs without shared papers emit nothing.
 */
export function findOverlap(
    goHits: ReadonlyMap<Term, ReadonlySet<PaperId>>,
    metaboliteHits: ReadonlyMap<Term, ReadonlySet<PaperId>>,
    onProgress?: (evaluated: number, total: number) => void
): AssociationRow[] {
    const rows: AssociationRow[] = [];
    const total = goHits.size * metaboliteHits.size;
    let evaluated = 0;

    for (const [goTerm, goIds] of goHits) {
        for (const [metabolite, metaboliteIds] of metaboliteHits) {
            for (const paperId of intersect(goIds, metaboliteIds)) {
                rows.push({ goTerm, metabolite, paperId });
            }

            evaluated++;
            if (onProgress && evaluated % PROGRESS_INTERVAL === 0) {
                onProgress(evaluated, total);
            }
        }
    }

    onProgress?.(evaluated, total);
    getLogger().info({ pairs: total, rows: rows.length }, 'Overlap computed');
    return rows;
}
