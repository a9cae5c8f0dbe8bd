/**
 * Composite ranking: similarity, recency and resolution quality, with
 * threshold filtering before and source-entity deduplication after.
 */

import type { RankingConfig } from '../config/index.js'
import type { Candidate, Confidence, RankingFactors, SearchResult } from './schemas.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface RankOptions {
  similarityThreshold: number
  maxResults: number
  now?: Date
}

/** 0.5^(age / halfLife); future or unparsable timestamps score 1 and 0 respectively. */
export function recencyScore(timestamp: string, halfLifeDays: number, now: Date): number {
  const time = Date.parse(timestamp)
  if (Number.isNaN(time)) return 0
  const ageDays = (now.getTime() - time) / DAY_MS
  if (ageDays <= 0) return 1
  return Math.min(1, 0.5 ** (ageDays / halfLifeDays))
}

export function confidenceFor(similarity: number): Confidence {
  if (similarity >= 0.85) return 'high'
  if (similarity >= 0.7) return 'medium'
  return 'low'
}

/** Entity ids a result stands for. */
export function entityIds(candidate: Pick<Candidate, 'id' | 'type' | 'sourceCaseIds'>): string[] {
  if (candidate.type === 'case') return [candidate.id]
  return [candidate.id, ...candidate.sourceCaseIds]
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function rankCandidates(
  candidates: readonly Candidate[],
  config: RankingConfig,
  options: RankOptions,
): SearchResult[] {
  const now = options.now ?? new Date()
  const { weights } = config

  const scored = candidates
    .filter((c) => c.similarity >= options.similarityThreshold)
    .map((c) => {
      const factors: RankingFactors = {
        similarity: c.similarity,
        recency: recencyScore(c.timestamp, config.recencyHalfLifeDays, now),
        resolutionQuality: Math.min(1, Math.max(0, c.resolutionQuality)),
      }
      const relevance =
        weights.similarity * factors.similarity +
        weights.recency * factors.recency +
        weights.resolutionQuality * factors.resolutionQuality
      return { candidate: c, factors, relevance, time: Date.parse(c.timestamp) || 0 }
    })

  scored.sort((a, b) =>
    b.relevance - a.relevance ||
    b.time - a.time ||
    compareIds(a.candidate.id, b.candidate.id),
  )

  const claimed = new Set<string>()
  const results: SearchResult[] = []
  for (const entry of scored) {
    if (results.length >= options.maxResults) break
    const entities = entityIds(entry.candidate)
    if (entities.some((id) => claimed.has(id))) continue
    for (const id of entities) claimed.add(id)

    const c = entry.candidate
    results.push({
      id: c.id,
      type: c.type,
      title: c.title,
      preview: c.preview,
      distance: c.distance,
      similarity: c.similarity,
      relevance: entry.relevance,
      rank: results.length + 1,
      confidence: confidenceFor(c.similarity),
      factors: entry.factors,
      category: c.category,
      timestamp: c.timestamp,
      status: c.status,
      sourceCaseIds: [...c.sourceCaseIds],
    })
  }
  return results
}
