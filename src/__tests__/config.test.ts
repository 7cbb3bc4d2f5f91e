import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, mergeConfig, parseConfigFile, resolveConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { makeTempDir } from './helpers.js';

describe('Config', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    describe('mergeConfig', () => {
        it('should return the defaults without layers', () => {
            expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        });

        it('should merge nested sections key by key', () => {
            const config = mergeConfig({ search: { concurrency: 4 } }, { search: { organism: 'MOUSE' } });

            expect(config.search).toEqual({ ...DEFAULT_CONFIG.search, concurrency: 4, organism: 'MOUSE' });
        });

        it('should let later layers win', () => {
            expect(mergeConfig({ out: 'a.db' }, { out: 'b.db' }).out).toBe('b.db');
        });

        it('should not let undefined values shadow earlier layers', () => {
            const config = mergeConfig(
                { out: 'a.db', retry: { maxAttempts: 2 } },
                { out: undefined, retry: { maxAttempts: undefined } }
            );

            expect(config.out).toBe('a.db');
            expect(config.retry.maxAttempts).toBe(2);
        });

        it('should skip null layers', () => {
            expect(mergeConfig(null, { counts: true }).counts).toBe(true);
        });
    });

    describe('parseConfigFile', () => {
        it('should accept a partial config', () => {
            expect(parseConfigFile({ folder: 'data', ontology: { batchSize: 25 } }, 'cooccur.config.json')).toEqual({
                folder: 'data',
                ontology: { batchSize: 25 },
            });
        });

        it('should reject invalid values with their path', () => {
            expect(() => parseConfigFile({ search: { concurrency: 0 } }, 'cooccur.config.json')).toThrow(ConfigError);
            expect(() => parseConfigFile({ search: { concurrency: 0 } }, 'cooccur.config.json')).toThrow(
                /search\.concurrency/
            );
        });

        it('should reject unknown log levels', () => {
            expect(() => parseConfigFile({ logLevel: 'verbose' }, 'cooccur.config.json')).toThrow(ConfigError);
        });
    });

    describe('resolveConfig', () => {
        it('should layer file, environment and CLI flags', async () => {
            const dir = makeTempDir();
            fs.writeFileSync(
                path.join(dir, 'cooccur.config.json'),
                JSON.stringify({ folder: 'from-file', counts: true, search: { organism: 'MOUSE', concurrency: 8 } })
            );
            vi.stubEnv('COOCCUR_EMAIL', 'test@example.org');

            const config = await resolveConfig({ folder: 'from-cli', search: { concurrency: 2 } }, dir);

            expect(config.folder).toBe('from-cli');
            expect(config.counts).toBe(true);
            expect(config.search.organism).toBe('MOUSE');
            expect(config.search.concurrency).toBe(2);
            expect(config.http.email).toBe('test@example.org');
        });

        it('should fall back to defaults without a config file', async () => {
            const config = await resolveConfig({}, makeTempDir());

            expect(config.folder).toBe(DEFAULT_CONFIG.folder);
            expect(config.search).toEqual(DEFAULT_CONFIG.search);
        });
    });
});
