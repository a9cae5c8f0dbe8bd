/**
 * Search engine: vector, text and hybrid retrieval feeding the ranking engine.
 * Reads only; never takes the sync lock.
 */

import { Ok, Err, toCaseKBError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import type { CaseRepository, CaseStatus } from '../cases/index.js'
import { CaseStatusSchema } from '../cases/index.js'
import type { PipelineConfig } from '../config/index.js'
import type { ArticleRepository } from '../knowledge/index.js'
import type { AssignmentRepository, CategoryTable } from '../patterns/index.js'
import type { EmbeddingClient, VectorStore, VectorWhere } from '../vector/index.js'
import { preview } from '../vector/index.js'
import { distanceToSimilarity } from './normalizer.js'
import { rankCandidates } from './ranking.js'
import { SearchOptionsSchema } from './schemas.js'
import type { Candidate, ResolvedSearchOptions, SearchOptions, SearchResponse } from './schemas.js'

export interface SearchEngineDeps {
  embedder: EmbeddingClient | null
  store: VectorStore
  cases: CaseRepository
  assignments: AssignmentRepository
  articles: ArticleRepository
  categories: CategoryTable
  config: Pick<PipelineConfig, 'search' | 'ranking'>
  now?: () => Date
}

/** Lower-cased distinct query terms of two or more characters. */
export function queryTerms(query: string): string[] {
  return [...new Set(query.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter((t) => t.length >= 2))]
}

function caseStatusFilter(status: ResolvedSearchOptions['status']): CaseStatus | undefined | null {
  if (status === undefined) return undefined
  const parsed = CaseStatusSchema.safeParse(status)
  return parsed.success ? parsed.data : null
}

export class SearchEngine {
  constructor(private deps: SearchEngineDeps) {}

  async search(query: string, options: SearchOptions = {}): Promise<Result<SearchResponse, CaseKBError>> {
    const started = Date.now()
    const trimmed = query.trim()
    if (!trimmed) return Err(CaseKBError.validation('Search query cannot be empty'))

    const parsed = SearchOptionsSchema.safeParse(options)
    if (!parsed.success) {
      return Err(CaseKBError.validation(parsed.error.issues.map((i) => i.message).join('; ')))
    }
    const opts = parsed.data
    const { search, ranking } = this.deps.config
    const maxResults = opts.maxResults ?? search.maxResults
    const similarityThreshold = opts.similarityThreshold ?? search.similarityThreshold

    const merged = new Map<string, Candidate>()
    const add = (candidate: Candidate) => {
      const existing = merged.get(candidate.id)
      if (!existing || candidate.similarity > existing.similarity) merged.set(candidate.id, candidate)
    }

    if (opts.type === 'vector' || opts.type === 'hybrid') {
      const vector = await this.vectorCandidates(trimmed, opts, maxResults * search.candidateMultiplier)
      if (!vector.ok) return vector
      vector.value.forEach(add)
    }

    if (opts.type === 'text' || opts.type === 'hybrid') {
      const text = this.textCandidates(trimmed, opts, maxResults * search.candidateMultiplier)
      if (!text.ok) return text
      text.value.forEach(add)
    }

    const results = rankCandidates([...merged.values()], ranking, {
      similarityThreshold,
      maxResults,
      now: this.deps.now?.(),
    })

    return Ok({
      query: trimmed,
      type: opts.type,
      results,
      candidates: merged.size,
      tookMs: Date.now() - started,
    })
  }

  private async vectorCandidates(query: string, opts: ResolvedSearchOptions, k: number): Promise<Result<Candidate[], CaseKBError>> {
    const { embedder, store } = this.deps
    if (!embedder) return Err(CaseKBError.embedding('No embedding provider configured; use text search'))

    let vector: number[] | undefined
    try {
      const embedded = await embedder.embed([query])
      vector = embedded.embeddings[0]
    } catch (err) {
      return Err(toCaseKBError(err, CaseKBError.embedding))
    }
    if (!vector || vector.length === 0) return Err(CaseKBError.embedding('Embedder returned no vector for the query'))

    const where: VectorWhere = {
      type: opts.resultType === 'all' ? undefined : opts.resultType,
      status: opts.status,
      category: opts.category,
      productHierarchyId: opts.productHierarchyId,
    }

    try {
      const matches = await store.query(vector, k, where)
      return Ok(matches.map((m) => ({
        id: m.id,
        type: m.metadata.type,
        title: m.metadata.title,
        preview: m.metadata.preview,
        distance: m.distance,
        similarity: distanceToSimilarity(m.distance),
        timestamp: m.metadata.timestamp,
        resolutionQuality: m.metadata.resolutionQuality,
        category: m.metadata.category,
        sourceCaseIds: m.metadata.type === 'article' ? m.metadata.caseIds : [m.id],
        status: m.metadata.status,
      })))
    } catch (err) {
      return Err(toCaseKBError(err, CaseKBError.storeUnavailable))
    }
  }

  /** Keyword matches over case text; similarity is the fraction of query terms present. */
  private textCandidates(query: string, opts: ResolvedSearchOptions, limit: number): Result<Candidate[], CaseKBError> {
    if (opts.resultType === 'article') return Ok([])
    const status = caseStatusFilter(opts.status)
    if (status === null) return Ok([])

    const terms = queryTerms(query)
    if (terms.length === 0) return Ok([])

    const matches = this.deps.cases.searchText(terms, { status, productHierarchyId: opts.productHierarchyId }, limit)
    if (!matches.ok) return matches

    const { ranking, search } = this.deps.config
    const candidates: Candidate[] = []
    for (const match of matches.value) {
      const assignment = this.deps.assignments.get(match.case.id)
      if (!assignment.ok) return assignment
      const category = assignment.value?.category ?? null
      if (opts.category && category !== opts.category) continue

      const c = match.case
      candidates.push({
        id: c.id,
        type: 'case',
        title: c.subject.trim() || preview(c.issue, 80),
        preview: preview(c.issue || c.subject, search.previewChars),
        distance: null,
        similarity: match.matchedTerms.length / terms.length,
        timestamp: c.updatedAt,
        resolutionQuality: ranking.resolutionQuality[c.status],
        category,
        sourceCaseIds: [c.id],
        status: c.status,
      })
    }
    return Ok(candidates)
  }

  /**
   * Completions for a partial query: category keywords, labels and article
   * titles with a word starting with the prefix.
   */
  suggest(prefix: string, limit = 10): Result<string[], CaseKBError> {
    const needle = prefix.trim().toLowerCase()
    if (!needle) return Ok([])

    const titles = this.deps.articles.listTitles()
    if (!titles.ok) return titles

    const pool: string[] = []
    for (const category of this.deps.categories.categories) {
      pool.push(...category.keywords, category.label)
    }
    pool.push(...titles.value)

    const seen = new Map<string, string>()
    for (const candidate of pool) {
      const lower = candidate.toLowerCase()
      if (seen.has(lower)) continue
      const matches = lower.startsWith(needle) || lower.split(/[^\p{L}\p{N}]+/u).some((w) => w.startsWith(needle))
      if (matches) seen.set(lower, candidate)
    }

    return Ok(
      [...seen.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .slice(0, limit)
        .map(([, original]) => original),
    )
  }
}
