import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { CaseRepository } from '../../src/cases/index.js'
import { ArticleRepository } from '../../src/knowledge/index.js'
import { AssignmentRepository, defaultCategoryTable } from '../../src/patterns/index.js'
import { SearchEngine, queryTerms } from '../../src/search/index.js'
import type { VectorMatch, VectorMetadata, VectorStore, VectorWhere } from '../../src/vector/index.js'
import { CaseKBError } from '../../src/common/index.js'
import { FakeEmbedder, NOW, caseInput, memoryCase, testConfig } from '../helpers.js'

class StubStore implements VectorStore {
  matches: VectorMatch[] = []
  lastQuery: { k: number; where: VectorWhere | undefined } | null = null
  failure: Error | null = null

  async upsert(): Promise<void> {}

  async query(_vector: readonly number[], k: number, where?: VectorWhere): Promise<VectorMatch[]> {
    if (this.failure) throw this.failure
    this.lastQuery = { k, where }
    return this.matches
  }

  async delete(): Promise<boolean> {
    return false
  }

  async count(): Promise<number> {
    return this.matches.length
  }
}

function metadata(overrides: Partial<VectorMetadata> = {}): VectorMetadata {
  return {
    type: 'case',
    category: 'memory_issues',
    timestamp: NOW.toISOString(),
    status: 'resolved',
    title: 'DIMM errors',
    preview: 'Correctable ECC errors',
    resolutionQuality: 1,
    caseIds: [],
    productHierarchyId: null,
    ...overrides,
  }
}

let db: Database.Database
let cases: CaseRepository
let assignments: AssignmentRepository
let articles: ArticleRepository
let store: StubStore

function engine(embedder: FakeEmbedder | null = new FakeEmbedder()): SearchEngine {
  return new SearchEngine({
    embedder,
    store,
    cases,
    assignments,
    articles,
    categories: defaultCategoryTable(),
    config: testConfig(),
    now: () => NOW,
  })
}

beforeEach(() => {
  db = openDatabase(':memory:')
  cases = new CaseRepository(db)
  assignments = new AssignmentRepository(db)
  articles = new ArticleRepository(db)
  store = new StubStore()
})

describe('queryTerms', () => {
  it('splits on non-word characters and drops one-letter terms', () => {
    expect(queryTerms('DIMM-B2 ecc, a DIMM')).toEqual(['dimm', 'b2', 'ecc'])
  })
})

describe('SearchEngine.search', () => {
  it('rejects an empty query', async () => {
    const result = await engine().search('   ')
    expect(!result.ok && result.error.code).toBe('VALIDATION_ERROR')
  })

  it('rejects invalid options', async () => {
    const result = await engine().search('dimm', { maxResults: 0 })
    expect(!result.ok && result.error.code).toBe('VALIDATION_ERROR')
  })

  it('needs an embedder for vector search', async () => {
    const result = await engine(null).search('dimm')
    expect(!result.ok && result.error.code).toBe('EMBEDDING_ERROR')
  })

  it('maps distances to similarity and filters below the threshold', async () => {
    store.matches = [
      { id: 'c-1', distance: 0, metadata: metadata({ caseIds: ['c-1'] }) },
      { id: 'c-2', distance: 1, metadata: metadata({ caseIds: ['c-2'] }) },
    ]
    const result = await engine().search('  dimm errors ', { resultType: 'case', status: 'resolved' })
    if (!result.ok) throw result.error

    expect(result.value.query).toBe('dimm errors')
    expect(result.value.candidates).toBe(2)
    expect(result.value.results.map((r) => [r.id, r.similarity, r.confidence])).toEqual([['c-1', 1, 'high']])
    expect(store.lastQuery).toEqual({
      k: 30,
      where: { type: 'case', status: 'resolved', category: undefined, productHierarchyId: undefined },
    })
  })

  it('uses the article citations as its source cases', async () => {
    store.matches = [
      { id: 'a-1', distance: 0, metadata: metadata({ type: 'article', status: 'vectorized', caseIds: ['c-1', 'c-2'] }) },
      { id: 'c-1', distance: 0.1, metadata: metadata({ caseIds: ['c-1'] }) },
    ]
    const result = await engine().search('dimm')
    if (!result.ok) throw result.error
    expect(result.value.results.map((r) => r.id)).toEqual(['a-1'])
    expect(result.value.results[0]?.sourceCaseIds).toEqual(['c-1', 'c-2'])
  })

  it('reports store failures', async () => {
    store.failure = CaseKBError.storeUnavailable('store offline')
    const result = await engine().search('dimm')
    expect(!result.ok && result.error.code).toBe('STORE_UNAVAILABLE')
  })

  it('scores text matches by the fraction of query terms present', async () => {
    cases.upsert(memoryCase('c-1', '2026-02-01T00:00:00.000Z'))
    cases.upsert(caseInput({ id: 'c-2', subject: 'Cooling', issue: 'Fan failure reported' }))
    cases.upsert(caseInput({ id: 'c-3', subject: 'Unrelated', issue: 'Password reset' }))

    const result = await engine(null).search('ecc dimm fan', { type: 'text', similarityThreshold: 0.3 })
    if (!result.ok) throw result.error
    expect(result.value.results.map((r) => r.id)).toEqual(['c-1', 'c-2'])
    expect(result.value.results[0]?.similarity).toBeCloseTo(2 / 3, 10)
    expect(result.value.results[1]?.similarity).toBeCloseTo(1 / 3, 10)
    expect(result.value.results[0]?.distance).toBeNull()
  })

  it('finds an older full text match behind many newer partial matches', async () => {
    cases.upsert(caseInput({
      id: 'best',
      subject: 'RAID controller degraded',
      createdAt: '2025-01-01T00:00:00.000Z',
      updatedAt: '2025-01-01T00:00:00.000Z',
    }))
    for (let i = 0; i < 40; i++) {
      const minute = String(i).padStart(2, '0')
      cases.upsert(caseInput({ id: `raid-${minute}`, subject: 'RAID alert', updatedAt: `2026-02-01T00:${minute}:00.000Z` }))
    }

    const result = await engine(null).search('raid controller degraded', { type: 'text' })
    if (!result.ok) throw result.error
    expect(result.value.results.map((r) => r.id)).toEqual(['best'])
    expect(result.value.results[0]?.similarity).toBe(1)
  })

  it('filters text matches by category and result type', async () => {
    cases.upsert(memoryCase('c-1', '2026-02-01T00:00:00.000Z'))
    cases.upsert(memoryCase('c-2', '2026-02-02T00:00:00.000Z'))
    assignments.saveMany([{
      caseId: 'c-1',
      category: 'memory_issues',
      matchedKeywords: ['dimm'],
      matchScore: 1,
      categoriesFingerprint: 'fp',
      caseContentHash: 'hash',
      articleId: null,
      assignedAt: '2026-02-01T00:00:00.000Z',
    }])

    const byCategory = await engine(null).search('dimm', { type: 'text', category: 'memory_issues' })
    expect(byCategory.ok && byCategory.value.results.map((r) => [r.id, r.category])).toEqual([['c-1', 'memory_issues']])

    const articlesOnly = await engine(null).search('dimm', { type: 'text', resultType: 'article' })
    expect(articlesOnly.ok && articlesOnly.value.results).toEqual([])
  })

  it('merges hybrid candidates keeping the best similarity per id', async () => {
    cases.upsert(memoryCase('c-1', '2026-02-01T00:00:00.000Z'))
    store.matches = [{ id: 'c-1', distance: 0, metadata: metadata({ caseIds: ['c-1'] }) }]

    const result = await engine().search('ecc dimm fan', { type: 'hybrid' })
    if (!result.ok) throw result.error
    expect(result.value.candidates).toBe(1)
    expect(result.value.results.map((r) => [r.id, r.similarity])).toEqual([['c-1', 1]])
  })
})

describe('SearchEngine.suggest', () => {
  it('completes from keywords, labels and article titles', () => {
    articles.insert({
      id: 'a-1',
      category: 'boot_failures',
      knowledgeCategory: 'Hardware',
      title: 'Boot Failure Recovery Guide',
      summary: 'Summary',
      sections: { symptoms: [], diagnosticSteps: [], resolutionSteps: [], affectedProducts: [], caseExamples: [] },
      content: '# Boot',
      resolutionType: 'System Restart',
      resolutionRate: 1,
      caseIds: ['c-1'],
      vectorStatus: 'pending',
      generatedAt: NOW.toISOString(),
      vectorizedAt: null,
      updatedAt: NOW.toISOString(),
    })

    expect(engine().suggest('Boot')).toEqual({
      ok: true,
      value: ['boot', 'Boot Failure Recovery Guide', 'Boot Failures', 'bootloader'],
    })
    expect(engine().suggest('boot', 2)).toEqual({ ok: true, value: ['boot', 'Boot Failure Recovery Guide'] })
    expect(engine().suggest('  ')).toEqual({ ok: true, value: [] })
  })

  it('matches a word inside a multi-word entry', () => {
    expect(engine().suggest('check')).toEqual({ ok: true, value: ['machine check'] })
  })
})
