import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { ASSOCIATION_TABLE_FILE, runMining } from '../builder/mining-pipeline.js';
import { MinerDatabase } from '../storage/database.js';
import { mergeConfig } from '../utils/config.js';
import type { MinerConfig } from '../types/index.js';
import { FakeOntologyClient, FakeSearcher, jsonResponse, makeTempDir, testHttpClient } from './helpers.js';

const CORPUS: Record<string, string[]> = {
    Root: [],
    A: ['p1', 'p2'],
    B: ['p3'],
    X: ['p1'],
    Y: ['p2', 'p3'],
};

const CHAINS = { A: ['Root', 'A'], B: ['Root', 'B'] };

describe('runMining', () => {
    let folder: string;
    let config: MinerConfig;

    beforeEach(() => {
        folder = makeTempDir();
        fs.writeFileSync(path.join(folder, 'Go_names.csv'), 'GOID,Name\nGO:0000000,Root\nGO:0000001,A\nGO:0000002,B\n');
        fs.writeFileSync(path.join(folder, 'Metabolite_name.csv'), 'ID,name\nHMDB01,X\nHMDB02,Y\n');
        config = mergeConfig({ folder, out: path.join(folder, 'test.db'), counts: true });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        fs.rmSync(folder, { recursive: true, force: true });
    });

    it('should write direct associations expanded over ancestors', async () => {
        const summary = await runMining(config, {
            searcher: new FakeSearcher(CORPUS),
            ontologyClient: new FakeOntologyClient(CHAINS),
        });

        expect(summary).toMatchObject({
            goTerms: 3,
            metaboliteTerms: 2,
            goTermsWithHits: 2,
            metabolitesWithHits: 2,
            failedTerms: 0,
            directRows: 3,
            expandedRows: 6,
        });
        expect(summary.outputPath).toBe(path.join(folder, ASSOCIATION_TABLE_FILE));
        expect(fs.readFileSync(summary.outputPath, 'utf-8')).toBe(
            [
                'Gene Ontology\tMetabolite\tPaper ID',
                'Root\tX\tp1',
                'A\tX\tp1',
                'Root\tY\tp2',
                'A\tY\tp2',
                'Root\tY\tp3',
                'B\tY\tp3',
                '',
            ].join('\n')
        );
        expect(summary.countTables).toHaveLength(3);
        expect(fs.readFileSync(path.join(folder, 'expanded_textmining_go.tsv'), 'utf-8')).toBe(
            'Gene Ontology\tCount\nRoot\t3\nA\t2\nB\t1\n'
        );
    });

    it('should store both association kinds and the run', async () => {
        await runMining(config, {
            searcher: new FakeSearcher(CORPUS),
            ontologyClient: new FakeOntologyClient(CHAINS),
        });

        const db = new MinerDatabase(config.out);
        try {
            expect(db.getAssociations('direct')).toEqual([
                { goTerm: 'A', metabolite: 'X', paperId: 'p1' },
                { goTerm: 'A', metabolite: 'Y', paperId: 'p2' },
                { goTerm: 'B', metabolite: 'Y', paperId: 'p3' },
            ]);
            expect(db.getAssociationCount('expanded')).toBe(6);
            expect(db.getRuns()).toHaveLength(1);
        } finally {
            db.close();
        }
    });

    it('should write direct associations when expansion is disabled', async () => {
        const client = new FakeOntologyClient(CHAINS);

        const summary = await runMining(
            { ...config, expandAncestors: false },
            { searcher: new FakeSearcher(CORPUS), ontologyClient: client }
        );

        expect(summary.expandedRows).toBeNull();
        expect(client.ancestorCalls).toEqual([]);
        expect(fs.readFileSync(summary.outputPath, 'utf-8')).toBe(
            'Gene Ontology\tMetabolite\tPaper ID\nA\tX\tp1\nA\tY\tp2\nB\tY\tp3\n'
        );
        expect(fs.existsSync(path.join(folder, 'direct_textmining_pairs.tsv'))).toBe(true);
    });

    it('should report failed terms and keep the others', async () => {
        const summary = await runMining(config, {
            searcher: new FakeSearcher(CORPUS, new Set(['B'])),
            ontologyClient: new FakeOntologyClient(CHAINS),
        });

        expect(summary.failedTerms).toBe(1);
        expect(summary.directRows).toBe(2);
    });

    it('should resume from stored searches', async () => {
        await runMining(config, {
            searcher: new FakeSearcher(CORPUS),
            ontologyClient: new FakeOntologyClient(CHAINS),
        });

        const everythingFails = new FakeSearcher({}, new Set(['Root', 'A', 'B', 'X', 'Y']));
        const summary = await runMining(
            { ...config, resume: true },
            { searcher: everythingFails, ontologyClient: new FakeOntologyClient(CHAINS) }
        );

        expect(everythingFails.calls).toEqual([]);
        expect(summary.failedTerms).toBe(0);
        expect(summary.directRows).toBe(3);
    });

    it('should record the requests sent per source', async () => {
        const mockFetch = vi.fn(async (url: string) => {
            const query = new URL(url).searchParams.get('query') ?? '';
            const term = /^\(\w+:"([^"]+)"/.exec(query)?.[1] ?? '';
            const ids = CORPUS[term] ?? [];
            return jsonResponse({ hitCount: ids.length, resultList: { result: ids.map((id) => ({ id })) } });
        });
        vi.stubGlobal('fetch', mockFetch);

        const summary = await runMining(config, {
            httpClient: testHttpClient(),
            ontologyClient: new FakeOntologyClient(CHAINS),
        });

        expect(mockFetch).toHaveBeenCalledTimes(5);
        expect(summary.directRows).toBe(3);
        expect(summary.requests).toEqual({ europepmc: 5 });

        const db = new MinerDatabase(config.out);
        try {
            const [run] = db.getRuns();
            expect(JSON.parse(run?.stats_json ?? '{}')).toMatchObject({ requests: { europepmc: 5 } });
        } finally {
            db.close();
        }
    });

    it('should search again without resume', async () => {
        await runMining(config, {
            searcher: new FakeSearcher(CORPUS),
            ontologyClient: new FakeOntologyClient(CHAINS),
        });

        const searcher = new FakeSearcher(CORPUS);
        await runMining(config, { searcher, ontologyClient: new FakeOntologyClient(CHAINS) });

        expect(searcher.calls).toEqual(['Root', 'A', 'B', 'X', 'Y']);
    });
});
