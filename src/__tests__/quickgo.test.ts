import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OntologyServiceError, QuickGoClient } from '../sources/quickgo.js';
import { CatalogueCoverageError, OntologyCatalogue } from '../ontology/catalogue.js';
import { HttpError } from '../utils/http-client.js';
import { jsonResponse, testHttpClient } from './helpers.js';

/**
 * Ids in the path segment after /terms/, decoded.
 */
function idsOf(url: string): string[] {
    const segment = new URL(url).pathname.split('/terms/')[1] ?? '';
    return (segment.split('/')[0] ?? '').split(',').map((id) => decodeURIComponent(id));
}

function goId(n: number): string {
    return `GO:${String(n).padStart(7, '0')}`;
}

describe('QuickGoClient', () => {
    let client: QuickGoClient;

    beforeEach(() => {
        client = new QuickGoClient();
        client.setHttpClient(testHttpClient());
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('names', () => {
        it('should batch 120 ids into requests of 50, 50 and 20', async () => {
            const mockFetch = vi.fn(async (url: string) =>
                jsonResponse({ results: idsOf(url).map((id) => ({ id, name: `term ${id}`, isObsolete: false })) })
            );
            vi.stubGlobal('fetch', mockFetch);
            const ids = Array.from({ length: 120 }, (_, i) => goId(i));

            const names = await client.names(ids);

            expect(mockFetch).toHaveBeenCalledTimes(3);
            expect(mockFetch.mock.calls.map(([url]) => idsOf(url).length)).toEqual([50, 50, 20]);
            expect(names.size).toBe(120);
            expect(names.get('term GO:0000119')).toBe('GO:0000119');
        });

        it('should honor a custom batch size', async () => {
            const mockFetch = vi.fn(async (url: string) =>
                jsonResponse({ results: idsOf(url).map((id) => ({ id, name: id })) })
            );
            vi.stubGlobal('fetch', mockFetch);
            const small = new QuickGoClient({ batchSize: 2 });
            small.setHttpClient(testHttpClient());

            await small.names([goId(1), goId(2), goId(3)]);

            expect(mockFetch).toHaveBeenCalledTimes(2);
        });
    });

    describe('descendants', () => {
        it('should return the descendants and the term itself', async () => {
            const mockFetch = vi.fn(async (_url: string) =>
                jsonResponse({ results: [{ id: 'GO:0000001', descendants: ['GO:0000002', 'GO:0000003'] }] })
            );
            vi.stubGlobal('fetch', mockFetch);

            const ids = await client.descendants('GO:0000001');

            expect(ids).toEqual(new Set(['GO:0000001', 'GO:0000002', 'GO:0000003']));
            expect(mockFetch.mock.calls[0]?.[0].endsWith('/terms/GO%3A0000001/descendants')).toBe(true);
        });

        it('should fail when no record comes back', async () => {
            vi.stubGlobal('fetch', vi.fn(async (_url: string) => jsonResponse({ results: [] })));

            await expect(client.descendants('GO:0000001')).rejects.toBeInstanceOf(OntologyServiceError);
        });
    });

    describe('ancestors', () => {
        const catalogue = new OntologyCatalogue([
            { id: 'GO:0000000', name: 'Root' },
            { id: 'GO:0000001', name: 'A' },
        ]);

        it('should keep only ancestors inside the catalogue, self last', async () => {
            const mockFetch = vi.fn(async (_url: string) =>
                jsonResponse({
                    results: [
                        { id: 'GO:0000001', ancestors: ['GO:0000001', 'GO:0000000', 'GO:0008150'] },
                        { id: 'GO:0000000', ancestors: ['GO:0000000'] },
                    ],
                })
            );
            vi.stubGlobal('fetch', mockFetch);

            const chains = await client.ancestors(['A'], catalogue);

            expect(chains).toEqual(new Map([['A', ['Root', 'A']]]));
            expect(mockFetch.mock.calls[0]?.[0].endsWith('/terms/GO%3A0000001/ancestors')).toBe(true);
        });

        it('should reject names outside the catalogue before any request', async () => {
            const mockFetch = vi.fn(async (_url: string) => jsonResponse({ results: [] }));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.ancestors(['A', 'Unknown'], catalogue)).rejects.toBeInstanceOf(CatalogueCoverageError);
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('should batch 120 names into requests of 50, 50 and 20 and merge the chains', async () => {
            const mockFetch = vi.fn(async (url: string) =>
                jsonResponse({ results: idsOf(url).map((id) => ({ id, ancestors: [id, goId(0)] })) })
            );
            vi.stubGlobal('fetch', mockFetch);
            const large = new OntologyCatalogue(Array.from({ length: 120 }, (_, i) => ({ id: goId(i), name: `term ${i}` })));
            const names = Array.from({ length: 120 }, (_, i) => `term ${i}`);

            const chains = await client.ancestors(names, large);

            expect(mockFetch).toHaveBeenCalledTimes(3);
            expect(mockFetch.mock.calls.map(([url]) => idsOf(url).length)).toEqual([50, 50, 20]);
            expect(mockFetch.mock.calls.every(([url]) => url.endsWith('/ancestors'))).toBe(true);
            expect(chains.size).toBe(120);
            expect(chains.get('term 0')).toEqual(['term 0']);
            expect(chains.get('term 5')).toEqual(['term 0', 'term 5']);
            expect(chains.get('term 119')).toEqual(['term 0', 'term 119']);
        });

        it('should not retry a failed request', async () => {
            const mockFetch = vi.fn(async (_url: string) => jsonResponse({ message: 'error' }, 500));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.ancestors(['A'], catalogue)).rejects.toBeInstanceOf(HttpError);
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });
});
