import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { CaseRepository } from '../../src/cases/index.js'
import {
  AssignmentRepository,
  PatternDetector,
  defaultCategoryTable,
  reclassifyUncategorized,
} from '../../src/patterns/index.js'
import type { CaseAssignment } from '../../src/patterns/index.js'
import { caseInput } from '../helpers.js'

let db: Database.Database
let cases: CaseRepository
let repo: AssignmentRepository

function assignment(caseId: string, overrides: Partial<CaseAssignment> = {}): CaseAssignment {
  return {
    caseId,
    category: 'memory_issues',
    matchedKeywords: ['dimm'],
    matchScore: 1,
    categoriesFingerprint: 'fp',
    caseContentHash: 'hash',
    articleId: null,
    assignedAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  }
}

beforeEach(() => {
  db = openDatabase(':memory:')
  cases = new CaseRepository(db)
  repo = new AssignmentRepository(db)
})

describe('AssignmentRepository', () => {
  it('round-trips an assignment', () => {
    repo.saveMany([assignment('c-1', { matchedKeywords: ['dimm', 'ecc'], matchScore: 2 })])
    const loaded = repo.get('c-1')
    expect(loaded.ok && loaded.value).toEqual(assignment('c-1', { matchedKeywords: ['dimm', 'ecc'], matchScore: 2 }))
  })

  it('returns null for a case with no assignment', () => {
    expect(repo.get('nope')).toEqual({ ok: true, value: null })
  })

  it('counts unprocessed cases per category, excluding uncategorized', () => {
    repo.saveMany([
      assignment('c-1'),
      assignment('c-2'),
      assignment('c-3', { articleId: 'art-1' }),
      assignment('c-4', { category: 'thermal_issues' }),
      assignment('c-5', { category: null }),
    ])

    const counts = repo.countUnprocessedByCategory()
    if (!counts.ok) throw counts.error
    expect([...counts.value].sort((a, b) => a.category.localeCompare(b.category))).toEqual([
      { category: 'memory_issues', count: 2 },
      { category: 'thermal_issues', count: 1 },
    ])
    expect(repo.countUncategorized()).toEqual({ ok: true, value: 1 })
  })

  it('lists unprocessed ids most recently updated first', () => {
    cases.upsert(caseInput({ id: 'old', updatedAt: '2026-01-01T00:00:00.000Z' }))
    cases.upsert(caseInput({ id: 'new', updatedAt: '2026-02-01T00:00:00.000Z' }))
    cases.upsert(caseInput({ id: 'mid', updatedAt: '2026-01-15T00:00:00.000Z' }))
    repo.saveMany([assignment('old'), assignment('new'), assignment('mid')])

    expect(repo.listUnprocessedIds('memory_issues', 2)).toEqual({ ok: true, value: ['new', 'mid'] })
  })

  it('marks cases processed for one article', () => {
    repo.saveMany([assignment('c-1'), assignment('c-2')])

    expect(repo.markProcessed(['c-1', 'c-2'], 'memory_issues', 'art-1')).toEqual({ ok: true, value: 2 })
    const loaded = repo.get('c-2')
    expect(loaded.ok && loaded.value?.articleId).toBe('art-1')
  })

  it('changes nothing when any case is already processed', () => {
    repo.saveMany([assignment('c-1'), assignment('c-2', { articleId: 'art-0' })])

    const result = repo.markProcessed(['c-1', 'c-2'], 'memory_issues', 'art-1')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('GENERATION_CONFLICT')
      expect(result.error.message).toBe('1 of 2 cases are no longer unprocessed in memory_issues')
    }
    const first = repo.get('c-1')
    expect(first.ok && first.value?.articleId).toBeNull()
  })

  it('lists uncategorized cases detected with another table', () => {
    repo.saveMany([
      assignment('c-1', { category: null, categoriesFingerprint: 'old' }),
      assignment('c-2', { category: null, categoriesFingerprint: 'current' }),
      assignment('c-3', { categoriesFingerprint: 'old' }),
    ])

    expect(repo.listUncategorizedOutdated('current')).toEqual({ ok: true, value: ['c-1'] })
  })
})

describe('reclassifyUncategorized', () => {
  it('re-detects uncategorized cases after the table changes', () => {
    const detector = new PatternDetector(defaultCategoryTable())
    cases.upsert(caseInput({ id: 'c-1', subject: 'DIMM failure', issue: 'Uncorrectable ECC error' }))
    cases.upsert(caseInput({ id: 'c-2', subject: 'Invoice question', issue: 'Customer asked about billing' }))
    repo.saveMany([
      assignment('c-1', { category: null, matchedKeywords: [], matchScore: 0, categoriesFingerprint: 'old' }),
      assignment('c-2', { category: null, matchedKeywords: [], matchScore: 0, categoriesFingerprint: 'old' }),
    ])

    const result = reclassifyUncategorized(cases, repo, detector, '2026-03-01T00:00:00.000Z')

    if (!result.ok) throw result.error
    expect(result.value).toMatchObject({ examined: 2, categorized: 1 })
    expect(result.value.recategorized.map((r) => [r.case.id, r.category])).toEqual([['c-1', 'memory_issues']])
    const first = repo.get('c-1')
    expect(first.ok && first.value?.category).toBe('memory_issues')
    expect(repo.listUncategorizedOutdated(detector.fingerprint)).toEqual({ ok: true, value: [] })
  })

  it('does nothing when every uncategorized case is current', () => {
    const detector = new PatternDetector(defaultCategoryTable())
    repo.saveMany([assignment('c-1', { category: null, categoriesFingerprint: detector.fingerprint })])

    expect(reclassifyUncategorized(cases, repo, detector)).toEqual({ ok: true, value: { examined: 0, categorized: 0, recategorized: [] } })
  })
})
