import type { OntologyHierarchyClient, OntologyTerm } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Build the allowed catalogue for a root concept: the root and all its
 * descendants, with their canonical names. Sorted by id.
 */
export async function buildGoCatalogue(rootId: string, client: OntologyHierarchyClient): Promise<OntologyTerm[]> {
    const ids = await client.descendants(rootId);
    const names = await client.names([...ids].sort());

    const terms = [...names.entries()]
        .map(([name, id]) => ({ id, name }))
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    getLogger().info({ rootId, descendants: ids.size, named: terms.length }, 'GO catalogue built');
    return terms;
}
