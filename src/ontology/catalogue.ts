import type { OntologyTerm } from '../types/index.js';

/**
 * Raised when a catalogue cannot be indexed 1:1 (same name on two ids,
 * or same id under two names).
 */
export class CatalogueConflictError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CatalogueConflictError';
    }
}

/**
 * GO terms that appear in associations but not in the allowed catalogue.
 */
export class CatalogueCoverageError extends Error {
    constructor(public readonly missing: string[]) {
        const preview = missing.slice(0, 10).map((name) => `"${name}"`).join(', ');
        const more = missing.length > 10 ? ` and ${missing.length - 10} more` : '';
        super(`${missing.length} GO term(s) missing from the allowed catalogue: ${preview}${more}`);
        this.name = 'CatalogueCoverageError';
    }
}

/**
 * The allowed ontology subtree for a mining run.
 * Expansion never leaves this set.
 */
export class OntologyCatalogue {
    private readonly idToName = new Map<string, string>();
    private readonly nameToId = new Map<string, string>();

    constructor(terms: Iterable<OntologyTerm>) {
        for (const { id, name } of terms) {
            const knownName = this.idToName.get(id);
            const knownId = this.nameToId.get(name);

            if (knownName === name && knownId === id) continue;
            if (knownName !== undefined) {
                throw new CatalogueConflictError(`Ontology id ${id} listed under two names: "${knownName}" and "${name}"`);
            }
            if (knownId !== undefined) {
                throw new CatalogueConflictError(`Ontology name "${name}" listed under two ids: ${knownId} and ${id}`);
            }

            this.idToName.set(id, name);
            this.nameToId.set(name, id);
        }
    }

    get size(): number {
        return this.idToName.size;
    }

    hasId(id: string): boolean {
        return this.idToName.has(id);
    }

    hasName(name: string): boolean {
        return this.nameToId.has(name);
    }

    idOf(name: string): string | undefined {
        return this.nameToId.get(name);
    }

    nameOf(id: string): string | undefined {
        return this.idToName.get(id);
    }

    /** Names from `names` that the catalogue does not contain, in input order. */
    missingNames(names: Iterable<string>): string[] {
        const missing: string[] = [];
        for (const name of names) {
            if (!this.nameToId.has(name)) missing.push(name);
        }
        return missing;
    }

    terms(): OntologyTerm[] {
        return [...this.idToName.entries()].map(([id, name]) => ({ id, name }));
    }
}
