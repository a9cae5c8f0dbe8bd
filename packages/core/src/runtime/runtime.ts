/**
 * Wires repositories, detector, generator, search engine and orchestrator
 * over one SQLite database.
 */

import type Database from 'better-sqlite3'
import { CaseRepository } from '../cases/index.js'
import type { PipelineConfig } from '../config/index.js'
import { ArticleRepository, KnowledgeGenerator } from '../knowledge/index.js'
import { AssignmentRepository, PatternDetector, defaultCategoryTable } from '../patterns/index.js'
import type { CategoryTable } from '../patterns/index.js'
import { SearchEngine } from '../search/index.js'
import { openDatabase } from '../storage/index.js'
import { CursorRepository, LockRepository, RunRepository, SyncOrchestrator } from '../sync/index.js'
import { SqliteVectorStore } from '../vector/index.js'
import type { EmbeddingClient, VectorStore } from '../vector/index.js'

export interface RuntimeOptions {
  config: PipelineConfig
  embedder: EmbeddingClient | null
  /** Existing database; otherwise `config.databasePath` is opened. */
  db?: Database.Database
  categories?: CategoryTable
  store?: VectorStore
  now?: () => Date
}

export interface CaseKBRuntime {
  db: Database.Database
  config: PipelineConfig
  categories: CategoryTable
  cases: CaseRepository
  assignments: AssignmentRepository
  articles: ArticleRepository
  cursor: CursorRepository
  runs: RunRepository
  lock: LockRepository
  store: VectorStore
  embedder: EmbeddingClient | null
  detector: PatternDetector
  generator: KnowledgeGenerator
  search: SearchEngine
  orchestrator: SyncOrchestrator
  close(): void
}

export function createRuntime(options: RuntimeOptions): CaseKBRuntime {
  const { config, embedder } = options
  const db = options.db ?? openDatabase(config.databasePath)
  const categories = options.categories ?? defaultCategoryTable()
  const now = options.now ?? (() => new Date())

  const cases = new CaseRepository(db)
  const assignments = new AssignmentRepository(db)
  const articles = new ArticleRepository(db)
  const cursor = new CursorRepository(db)
  const runs = new RunRepository(db)
  const lock = new LockRepository(db)
  const store = options.store ?? new SqliteVectorStore(db, config.vector.metric)
  const detector = new PatternDetector(categories)

  const generator = new KnowledgeGenerator({
    db,
    cases,
    assignments,
    articles,
    categories,
    knowledge: config.knowledge,
    resolutionQuality: config.ranking.resolutionQuality,
    now: () => now().toISOString(),
  })

  const search = new SearchEngine({
    embedder,
    store,
    cases,
    assignments,
    articles,
    categories,
    config,
    now,
  })

  const orchestrator = new SyncOrchestrator({
    db,
    cases,
    assignments,
    articles,
    cursor,
    runs,
    lock,
    detector,
    generator,
    store,
    embedder,
    config,
    now,
  })

  return {
    db,
    config,
    categories,
    cases,
    assignments,
    articles,
    cursor,
    runs,
    lock,
    store,
    embedder,
    detector,
    generator,
    search,
    orchestrator,
    close: () => db.close(),
  }
}
