import { describe, it, expect } from 'vitest';
import {
    buildSearchQuery,
    buildSearchUrl,
    DEFAULT_SEARCH_FILTERS,
    EUROPEPMC_SEARCH_URL,
    INITIAL_CURSOR,
    scopeTerm,
} from '../sources/query-builder.js';
import { chunk, joinIds, uniqueInOrder } from '../sources/utils.js';
import { TermCategory } from '../types/index.js';

const TEXT_CLAUSE =
    '(ABSTRACT:"glucose" OR RESULTS:"glucose" OR METHODS:"glucose" OR TABLE:"glucose" OR SUPPL:"glucose" OR FIG:"glucose")';
const FILTER_CLAUSE = 'PUB_TYPE:"Journal Article" AND SRC:"MED" AND ORGANISM:"HUMAN"';

describe('Query builder', () => {
    describe('scopeTerm', () => {
        it('should scope metabolites to ChEBI cross-references', () => {
            expect(scopeTerm('glucose', TermCategory.METABOLITE)).toBe('CHEBITERM:"glucose"');
        });

        it('should scope GO terms to GO cross-references', () => {
            expect(scopeTerm('glycolytic process', TermCategory.GENE_ONTOLOGY)).toBe('GOTERM:"glycolytic process"');
        });

        it('should leave free-text terms unscoped', () => {
            expect(scopeTerm('Candida albicans', TermCategory.FREE_TEXT)).toBe('Candida albicans');
        });
    });

    describe('buildSearchQuery', () => {
        it('should build the full metabolite query', () => {
            expect(buildSearchQuery('glucose', TermCategory.METABOLITE)).toBe(
                `${TEXT_CLAUSE} AND CHEBITERM:"glucose" AND ${FILTER_CLAUSE}`
            );
        });

        it('should build the full free-text query', () => {
            expect(buildSearchQuery('glucose', TermCategory.FREE_TEXT)).toBe(
                `${TEXT_CLAUSE} AND glucose AND ${FILTER_CLAUSE}`
            );
        });

        it('should apply custom filters', () => {
            const query = buildSearchQuery('glucose', TermCategory.GENE_ONTOLOGY, {
                ...DEFAULT_SEARCH_FILTERS,
                organism: 'MOUSE',
            });
            expect(query.endsWith('AND ORGANISM:"MOUSE"')).toBe(true);
            expect(query).toContain('AND GOTERM:"glucose" AND');
        });
    });

    describe('buildSearchUrl', () => {
        it('should encode every request parameter', () => {
            const url = new URL(
                buildSearchUrl('glucose', TermCategory.METABOLITE, INITIAL_CURSOR, {
                    ...DEFAULT_SEARCH_FILTERS,
                    pageSize: 1000,
                    synonyms: true,
                })
            );

            expect(`${url.origin}${url.pathname}`).toBe(EUROPEPMC_SEARCH_URL);
            expect(url.searchParams.get('query')).toBe(buildSearchQuery('glucose', TermCategory.METABOLITE));
            expect(url.searchParams.get('synonym')).toBe('true');
            expect(url.searchParams.get('resultType')).toBe('idlist');
            expect(url.searchParams.get('pageSize')).toBe('1000');
            expect(url.searchParams.get('cursorMark')).toBe('*');
            expect(url.searchParams.get('format')).toBe('json');
        });

        it('should honor a base URL override', () => {
            const url = buildSearchUrl('x', TermCategory.FREE_TEXT, 'AoE=', {
                ...DEFAULT_SEARCH_FILTERS,
                pageSize: 10,
                synonyms: false,
                baseUrl: 'http://localhost/search',
            });
            const parsed = new URL(url);
            expect(url.startsWith('http://localhost/search?')).toBe(true);
            expect(parsed.searchParams.get('cursorMark')).toBe('AoE=');
            expect(parsed.searchParams.get('synonym')).toBe('false');
        });
    });
});

describe('Source utils', () => {
    it('should split items into batches', () => {
        expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(chunk([], 3)).toEqual([]);
    });

    it('should reject invalid batch sizes', () => {
        expect(() => chunk([1], 0)).toThrow(RangeError);
        expect(() => chunk([1], 1.5)).toThrow(RangeError);
    });

    it('should keep first occurrences in order', () => {
        expect(uniqueInOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
    });

    it('should URL-encode joined ids', () => {
        expect(joinIds(['GO:0008150', 'GO:0003674'])).toBe('GO%3A0008150,GO%3A0003674');
    });
});
