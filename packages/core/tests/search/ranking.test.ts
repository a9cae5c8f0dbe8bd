import { describe, it, expect } from 'vitest'
import { confidenceFor, entityIds, rankCandidates, recencyScore } from '../../src/search/index.js'
import type { Candidate } from '../../src/search/index.js'
import { NOW, testConfig } from '../helpers.js'

const ranking = testConfig().ranking

function candidate(id: string, overrides: Partial<Candidate> = {}): Candidate {
  return {
    id,
    type: 'case',
    title: `Case ${id}`,
    preview: 'preview',
    distance: 0.1,
    similarity: 0.9,
    timestamp: NOW.toISOString(),
    resolutionQuality: 1,
    category: 'memory_issues',
    sourceCaseIds: [id],
    status: 'resolved',
    ...overrides,
  }
}

describe('recencyScore', () => {
  it('halves every half-life', () => {
    expect(recencyScore('2025-09-02T12:00:00.000Z', 180, NOW)).toBeCloseTo(0.5, 6)
    expect(recencyScore(NOW.toISOString(), 180, NOW)).toBe(1)
  })

  it('scores future timestamps 1 and unparsable ones 0', () => {
    expect(recencyScore('2027-01-01T00:00:00.000Z', 180, NOW)).toBe(1)
    expect(recencyScore('not a date', 180, NOW)).toBe(0)
  })
})

describe('confidenceFor', () => {
  it('buckets similarity', () => {
    expect(confidenceFor(0.85)).toBe('high')
    expect(confidenceFor(0.849)).toBe('medium')
    expect(confidenceFor(0.7)).toBe('medium')
    expect(confidenceFor(0.69)).toBe('low')
  })
})

describe('entityIds', () => {
  it('covers an article and its source cases', () => {
    expect(entityIds({ id: 'c-1', type: 'case', sourceCaseIds: ['c-1'] })).toEqual(['c-1'])
    expect(entityIds({ id: 'a-1', type: 'article', sourceCaseIds: ['c-1', 'c-2'] })).toEqual(['a-1', 'c-1', 'c-2'])
  })
})

describe('rankCandidates', () => {
  const options = { similarityThreshold: 0.6, maxResults: 10, now: NOW }

  it('combines weighted factors into relevance', () => {
    const [result] = rankCandidates([candidate('c-1', { similarity: 0.8, resolutionQuality: 0.6 })], ranking, options)
    // 0.7 * 0.8 + 0.15 * 1 + 0.15 * 0.6
    expect(result?.relevance).toBeCloseTo(0.8, 10)
    expect(result?.factors).toEqual({ similarity: 0.8, recency: 1, resolutionQuality: 0.6 })
    expect(result?.rank).toBe(1)
    expect(result?.confidence).toBe('medium')
  })

  it('drops candidates below the threshold', () => {
    const results = rankCandidates([candidate('c-1', { similarity: 0.59 }), candidate('c-2', { similarity: 0.6 })], ranking, options)
    expect(results.map((r) => r.id)).toEqual(['c-2'])
  })

  it('orders by relevance, then newer, then id', () => {
    const results = rankCandidates([
      candidate('c-b', { timestamp: '2026-02-01T12:00:00.000Z', similarity: 0.9, resolutionQuality: 1 }),
      candidate('c-a', { timestamp: '2026-02-01T12:00:00.000Z', similarity: 0.9, resolutionQuality: 1 }),
      candidate('c-top', { similarity: 0.99 }),
    ], ranking, options)
    expect(results.map((r) => [r.id, r.rank])).toEqual([['c-top', 1], ['c-a', 2], ['c-b', 3]])
  })

  it('breaks equal relevance by timestamp', () => {
    const future = '2026-06-01T00:00:00.000Z'
    const results = rankCandidates([
      candidate('c-1', { timestamp: NOW.toISOString() }),
      candidate('c-2', { timestamp: future }),
    ], ranking, options)
    expect(results.map((r) => r.id)).toEqual(['c-2', 'c-1'])
  })

  it('never returns the same case twice across articles and cases', () => {
    const results = rankCandidates([
      candidate('a-1', { type: 'article', similarity: 0.95, sourceCaseIds: ['c-1', 'c-2'] }),
      candidate('c-1', { similarity: 0.9 }),
      candidate('c-3', { similarity: 0.85 }),
      candidate('a-2', { type: 'article', similarity: 0.8, sourceCaseIds: ['c-3'] }),
    ], ranking, options)
    expect(results.map((r) => r.id)).toEqual(['a-1', 'c-3'])
  })

  it('caps at maxResults', () => {
    const results = rankCandidates(
      ['c-1', 'c-2', 'c-3'].map((id) => candidate(id)),
      ranking,
      { ...options, maxResults: 2 },
    )
    expect(results.map((r) => r.id)).toEqual(['c-1', 'c-2'])
  })
})
