import Database from 'better-sqlite3';
import type {
    AssociationKind,
    AssociationRow,
    PaperId,
    RunRecord,
    SearchCheckpoint,
    SearchResult,
    Term,
    TermCategory,
    TermSearchOutcome,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: mining session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  cooccur_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  go_terms INTEGER NOT NULL,
  metabolite_terms INTEGER NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Searched terms: one row per finished term search (checkpoint)
CREATE TABLE IF NOT EXISTS searched_terms (
  category TEXT NOT NULL,
  term TEXT NOT NULL,
  hit_count INTEGER NOT NULL,
  pages INTEGER NOT NULL,
  searched_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (category, term)
);

-- Term hits: paper ids found for a searched term
CREATE TABLE IF NOT EXISTS term_hits (
  category TEXT NOT NULL,
  term TEXT NOT NULL,
  paper_id TEXT NOT NULL,
  PRIMARY KEY (category, term, paper_id)
);

-- Associations: GO term / metabolite / paper evidence
CREATE TABLE IF NOT EXISTS associations (
  association_id INTEGER PRIMARY KEY,
  kind TEXT NOT NULL,
  go_term TEXT NOT NULL,
  metabolite TEXT NOT NULL,
  paper_id TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_associations_kind ON associations(kind);
CREATE INDEX IF NOT EXISTS idx_associations_go ON associations(go_term);
`;

export interface DatabaseStats {
    searchedTerms: Record<string, number>;
    termsWithHits: Record<string, number>;
    termHits: number;
    associationsByKind: Record<string, number>;
    runs: number;
}

/**
 * Mining database wrapper around better-sqlite3.
 * Stores search checkpoints, associations and run metadata.
 */
export class MinerDatabase implements SearchCheckpoint {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Search checkpoint ────────────────────────────────────

    loadCompleted(category: TermCategory): Map<Term, Set<PaperId>> {
        const completed = new Map<Term, Set<PaperId>>();

        const terms = this.db
            .prepare<[string], { term: string }>('SELECT term FROM searched_terms WHERE category = ?')
            .all(category);
        for (const { term } of terms) {
            completed.set(term, new Set());
        }

        const hits = this.db
            .prepare<[string], { term: string; paper_id: string }>('SELECT term, paper_id FROM term_hits WHERE category = ?')
            .all(category);
        for (const { term, paper_id } of hits) {
            completed.get(term)?.add(paper_id);
        }

        return completed;
    }

    recordCompleted(category: TermCategory, outcome: TermSearchOutcome): void {
        const upsertTerm = this.db.prepare(`
      INSERT INTO searched_terms (category, term, hit_count, pages)
      VALUES (@category, @term, @hit_count, @pages)
      ON CONFLICT(category, term) DO UPDATE SET
        hit_count = excluded.hit_count,
        pages = excluded.pages,
        searched_at = datetime('now')
    `);
        const clearHits = this.db.prepare('DELETE FROM term_hits WHERE category = ? AND term = ?');
        const insertHit = this.db.prepare('INSERT OR IGNORE INTO term_hits (category, term, paper_id) VALUES (?, ?, ?)');

        this.db.transaction(() => {
            upsertTerm.run({ category, term: outcome.term, hit_count: outcome.hitCount, pages: outcome.pages });
            clearHits.run(category, outcome.term);
            for (const paperId of outcome.paperIds) {
                insertHit.run(category, outcome.term, paperId);
            }
        })();
    }

    /**
     * Forget stored searches, for one category or all of them.
     */
    clearSearches(category?: TermCategory): void {
        this.db.transaction(() => {
            if (category === undefined) {
                this.db.prepare('DELETE FROM term_hits').run();
                this.db.prepare('DELETE FROM searched_terms').run();
            } else {
                this.db.prepare('DELETE FROM term_hits WHERE category = ?').run(category);
                this.db.prepare('DELETE FROM searched_terms WHERE category = ?').run(category);
            }
        })();
    }

    /**
     * Stored term → paper ids for a category, zero-hit terms left out.
     */
    getSearchResult(category: TermCategory): SearchResult {
        const result: SearchResult = new Map();
        for (const [term, ids] of this.loadCompleted(category)) {
            if (ids.size > 0) result.set(term, ids);
        }
        return result;
    }

    // ─── Associations ─────────────────────────────────────────

    /**
     * Replace every stored association of `kind` in a single transaction.
     */
    replaceAssociations(kind: AssociationKind, rows: readonly AssociationRow[]): void {
        const clear = this.db.prepare('DELETE FROM associations WHERE kind = ?');
        const insert = this.db.prepare(`
      INSERT INTO associations (kind, go_term, metabolite, paper_id)
      VALUES (?, ?, ?, ?)
    `);

        this.db.transaction(() => {
            clear.run(kind);
            for (const row of rows) {
                insert.run(kind, row.goTerm, row.metabolite, row.paperId);
            }
        })();
    }

    getAssociations(kind: AssociationKind): AssociationRow[] {
        return this.db
            .prepare<[string], AssociationRow>(`
      SELECT go_term AS goTerm, metabolite, paper_id AS paperId
      FROM associations WHERE kind = ? ORDER BY association_id
    `)
            .all(kind);
    }

    getAssociationCount(kind: AssociationKind): number {
        const row = this.db
            .prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM associations WHERE kind = ?')
            .get(kind);
        return row?.count ?? 0;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, cooccur_version, config_json, go_terms, metabolite_terms, stats_json)
      VALUES (@created_at, @cooccur_version, @config_json, @go_terms, @metabolite_terms, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const countBy = (sql: string): Record<string, number> => {
            const rows = this.db.prepare<[], { key: string; count: number }>(sql).all();
            return Object.fromEntries(rows.map((row) => [row.key, row.count]));
        };

        const single = (sql: string): number =>
            this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

        return {
            searchedTerms: countBy('SELECT category AS key, COUNT(*) AS count FROM searched_terms GROUP BY category'),
            termsWithHits: countBy('SELECT category AS key, COUNT(DISTINCT term) AS count FROM term_hits GROUP BY category'),
            termHits: single('SELECT COUNT(*) AS count FROM term_hits'),
            associationsByKind: countBy('SELECT kind AS key, COUNT(*) AS count FROM associations GROUP BY kind'),
            runs: single('SELECT COUNT(*) AS count FROM runs'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
