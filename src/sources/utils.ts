/**
 * Shared utilities for source clients.
 */

/**
 * Split `items` into consecutive batches of at most `size` elements.
 * [1, 2, 3, 4, 5] with size 2 → [[1, 2], [3, 4], [5]]
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size < 1) {
        throw new RangeError(`Batch size must be a positive integer, got ${size}`);
    }

    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}

/**
 * Distinct values in first-seen order.
 */
export function uniqueInOrder<T>(items: Iterable<T>): T[] {
    return [...new Set(items)];
}

/**
 * Join ontology ids into a path segment: each id URL-encoded, comma-separated.
 */
export function joinIds(ids: readonly string[]): string {
    return ids.map((id) => encodeURIComponent(id)).join(',');
}
