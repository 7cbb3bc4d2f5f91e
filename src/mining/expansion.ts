import type { AssociationRow, ExpandedAssociationRow, OntologyHierarchyClient } from '../types/index.js';
import { CatalogueCoverageError, type OntologyCatalogue } from '../ontology/catalogue.js';
import { OntologyServiceError } from '../sources/quickgo.js';
import { uniqueInOrder } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';

/**
 * Credit each association to every allowed ancestor of its GO term.
 *
 * Every input row fans out into one row per entry of the term's chain,
 * the term itself included, so the result is a superset of the input.
 *
 * @throws CatalogueCoverageError when a GO term is not in the catalogue
 * @throws OntologyServiceError when the service returned no chain for a term
 */
export async function expandAssociations(
    rows: readonly AssociationRow[],
    catalogue: OntologyCatalogue,
    client: OntologyHierarchyClient
): Promise<ExpandedAssociationRow[]> {
    const goTerms = uniqueInOrder(rows.map((row) => row.goTerm));
    if (goTerms.length === 0) return [];

    const missing = catalogue.missingNames(goTerms);
    if (missing.length > 0) {
        throw new CatalogueCoverageError(missing);
    }

    const chains = await client.ancestors(goTerms, catalogue);

    const expanded: ExpandedAssociationRow[] = [];
    for (const row of rows) {
        const chain = chains.get(row.goTerm);
        if (!chain) {
            throw new OntologyServiceError(
                `${client.name} returned no ancestors for "${row.goTerm}"`,
                catalogue.idOf(row.goTerm)
            );
        }

        for (const goTerm of chain) {
            // Chains never leave the catalogue, whatever the client returned
            if (!catalogue.hasName(goTerm)) continue;
            expanded.push({ goTerm, metabolite: row.metabolite, paperId: row.paperId });
        }
    }

    getLogger().info({ direct: rows.length, expanded: expanded.length, goTerms: goTerms.length }, 'Associations expanded');
    return expanded;
}
