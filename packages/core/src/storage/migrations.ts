/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/**
 * Runs SQL statements using the better-sqlite3 Database.exec() method.
 * Not child_process.exec; this is SQLite's own exec for DDL.
 */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema, cases and category assignments',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS cases (
          id TEXT PRIMARY KEY,
          subject TEXT NOT NULL DEFAULT '',
          issue TEXT NOT NULL DEFAULT '',
          resolution TEXT NOT NULL DEFAULT '',
          status TEXT NOT NULL,
          product_hierarchy_id TEXT,
          product_name TEXT,
          content_hash TEXT NOT NULL,
          created_at TEXT NOT NULL,
          resolved_at TEXT,
          updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_cases_updated ON cases(updated_at, id);

        CREATE TABLE IF NOT EXISTS case_assignments (
          case_id TEXT PRIMARY KEY,
          category TEXT,
          matched_keywords TEXT NOT NULL DEFAULT '[]',
          match_score INTEGER NOT NULL DEFAULT 0,
          categories_fingerprint TEXT NOT NULL,
          case_content_hash TEXT NOT NULL,
          article_id TEXT,
          assigned_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_assignments_category ON case_assignments(category, article_id);
      `,
      )
    },
  },
  {
    version: 2,
    description: 'Knowledge articles and their contributing cases',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS knowledge_articles (
          id TEXT PRIMARY KEY,
          title TEXT NOT NULL,
          summary TEXT NOT NULL,
          category TEXT NOT NULL,
          knowledge_category TEXT NOT NULL,
          sections TEXT NOT NULL,
          content TEXT NOT NULL,
          resolution_type TEXT NOT NULL,
          resolution_rate REAL NOT NULL,
          vector_status TEXT NOT NULL DEFAULT 'pending'
            CHECK (vector_status IN ('pending', 'vectorized', 'stale')),
          generated_at TEXT NOT NULL,
          vectorized_at TEXT,
          updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_articles_category ON knowledge_articles(category);
        CREATE INDEX IF NOT EXISTS idx_articles_vector_status ON knowledge_articles(vector_status);

        CREATE TABLE IF NOT EXISTS knowledge_article_cases (
          article_id TEXT NOT NULL,
          category TEXT NOT NULL,
          case_id TEXT NOT NULL,
          position INTEGER NOT NULL,
          PRIMARY KEY (article_id, case_id),
          UNIQUE (category, case_id),
          FOREIGN KEY (article_id) REFERENCES knowledge_articles(id) ON DELETE CASCADE
        );
      `,
      )
    },
  },
  {
    version: 3,
    description: 'Vector records, Float32 embeddings with JSON metadata',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS vector_records (
          id TEXT PRIMARY KEY,
          record_type TEXT NOT NULL CHECK (record_type IN ('case', 'article')),
          dimensions INTEGER NOT NULL,
          embedding BLOB NOT NULL,
          metadata TEXT NOT NULL DEFAULT '{}',
          updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_vector_records_type ON vector_records(record_type);
      `,
      )
    },
  },
  {
    version: 4,
    description: 'Sync cursor, run history and single-flight lease',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS sync_cursor (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          cursor_timestamp TEXT,
          cursor_case_id TEXT,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS sync_runs (
          id TEXT PRIMARY KEY,
          trigger_type TEXT NOT NULL,
          status TEXT NOT NULL,
          stage TEXT NOT NULL,
          failed_stage TEXT,
          cases_fetched INTEGER NOT NULL DEFAULT 0,
          cases_categorized INTEGER NOT NULL DEFAULT 0,
          cases_skipped INTEGER NOT NULL DEFAULT 0,
          cases_uncategorized INTEGER NOT NULL DEFAULT 0,
          articles_generated INTEGER NOT NULL DEFAULT 0,
          articles_stale INTEGER NOT NULL DEFAULT 0,
          vectors_written INTEGER NOT NULL DEFAULT 0,
          retries INTEGER NOT NULL DEFAULT 0,
          cursor_advanced INTEGER NOT NULL DEFAULT 0,
          error TEXT,
          started_at TEXT NOT NULL,
          completed_at TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_sync_runs_started ON sync_runs(started_at DESC);

        CREATE TABLE IF NOT EXISTS sync_lock (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          owner TEXT,
          acquired_at TEXT,
          expires_at TEXT
        );
      `,
      )
    },
  },
]

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}

export function latestSchemaVersion(): number {
  return migrations[migrations.length - 1].version
}
