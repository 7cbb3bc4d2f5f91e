import { z } from 'zod';
import type { OntologyClientOptions, OntologyHierarchyClient } from '../types/index.js';
import type { OntologyCatalogue } from '../ontology/catalogue.js';
import { CatalogueCoverageError } from '../ontology/catalogue.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { chunk, joinIds, uniqueInOrder } from './utils.js';

const QUICKGO_TERMS_BASE = 'https://www.ebi.ac.uk/QuickGO/services/ontology/go/terms';

/**
 * QuickGO term responses (subset of relevant fields).
 */
const TermsResponseSchema = z.object({
    results: z.array(
        z.object({
            id: z.string(),
            name: z.string(),
        })
    ),
});

const DescendantsResponseSchema = z.object({
    results: z.array(
        z.object({
            id: z.string(),
            descendants: z.array(z.string()).default([]),
        })
    ),
});

const AncestorsResponseSchema = z.object({
    results: z.array(
        z.object({
            id: z.string(),
            ancestors: z.array(z.string()).default([]),
        })
    ),
});

/**
 * QuickGO answered, but without the record that was asked for.
 */
export class OntologyServiceError extends Error {
    constructor(message: string, public readonly termId?: string) {
        super(message);
        this.name = 'OntologyServiceError';
    }
}

/**
 * QuickGO ontology client.
 * Batches ids (50 per request by default) and never retries: a failing
 * response ends the mining run.
 *
 * @see https://www.ebi.ac.uk/QuickGO/api/index.html
 */
export class QuickGoClient implements OntologyHierarchyClient {
    readonly name = 'QuickGO';
    private httpClient: HttpClient;
    private readonly batchSize: number;
    private readonly baseUrl: string;

    constructor(options?: OntologyClientOptions) {
        this.batchSize = options?.batchSize ?? 50;
        this.baseUrl = options?.baseUrl ?? QUICKGO_TERMS_BASE;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async descendants(termId: string): Promise<Set<string>> {
        const url = `${this.baseUrl}/${joinIds([termId])}/descendants`;
        getLogger().debug({ url }, 'QuickGO descendants');

        const response = await this.fetch(url, DescendantsResponseSchema);
        const record = response.results.find((r) => r.id === termId) ?? response.results[0];
        if (!record) {
            throw new OntologyServiceError(`QuickGO returned no record for ${termId}`, termId);
        }

        return new Set([...record.descendants, termId]);
    }

    async names(termIds: string[]): Promise<Map<string, string>> {
        const total = new Map<string, string>();

        for (const batch of chunk(uniqueInOrder(termIds), this.batchSize)) {
            const url = `${this.baseUrl}/${joinIds(batch)}`;
            const response = await this.fetch(url, TermsResponseSchema);

            for (const result of response.results) {
                total.set(result.name, result.id);
            }
        }

        getLogger().debug({ requested: termIds.length, resolved: total.size }, 'QuickGO names resolved');
        return total;
    }

    async ancestors(termNames: Iterable<string>, catalogue: OntologyCatalogue): Promise<Map<string, string[]>> {
        const names = uniqueInOrder(termNames);
        const missing = catalogue.missingNames(names);
        if (missing.length > 0) {
            throw new CatalogueCoverageError(missing);
        }

        const ids = names.flatMap((name) => {
            const id = catalogue.idOf(name);
            return id === undefined ? [] : [id];
        });

        const total = new Map<string, string[]>();

        for (const batch of chunk(ids, this.batchSize)) {
            const url = `${this.baseUrl}/${joinIds(batch)}/ancestors`;
            const response = await this.fetch(url, AncestorsResponseSchema);

            for (const result of response.results) {
                const self = catalogue.nameOf(result.id);
                // Only ids we asked for can come back; anything else is ignored
                if (self === undefined || !batch.includes(result.id)) continue;

                const chain = result.ancestors
                    .filter((ancestor) => ancestor !== result.id)
                    .flatMap((ancestor) => {
                        const ancestorName = catalogue.nameOf(ancestor);
                        return ancestorName === undefined ? [] : [ancestorName];
                    });

                total.set(self, uniqueInOrder([...chain, self]));
            }
        }

        return total;
    }

    // ─── Private helpers ──────────────────────────────────────

    private fetch<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        return this.httpClient.getJson(url, schema, { source: 'quickgo', maxRetries: 0 });
    }
}
