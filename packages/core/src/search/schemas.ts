import { z } from 'zod'
import { CaseStatusSchema } from '../cases/index.js'
import { CategoryIdSchema } from '../patterns/index.js'
import type { CategoryId } from '../patterns/index.js'
import type { VectorRecordType } from '../vector/index.js'

export const SearchTypeSchema = z.enum(['vector', 'text', 'hybrid'])
export type SearchType = z.infer<typeof SearchTypeSchema>

export const ResultTypeFilterSchema = z.enum(['case', 'article', 'all'])

export const SearchOptionsSchema = z.object({
  type: SearchTypeSchema.default('vector'),
  resultType: ResultTypeFilterSchema.default('all'),
  status: z.union([CaseStatusSchema, z.enum(['vectorized', 'stale'])]).optional(),
  category: CategoryIdSchema.optional(),
  productHierarchyId: z.string().min(1).optional(),
  maxResults: z.number().int().min(1).max(100).optional(),
  similarityThreshold: z.number().min(0).max(1).optional(),
})

export type SearchOptions = z.input<typeof SearchOptionsSchema>
export type ResolvedSearchOptions = z.infer<typeof SearchOptionsSchema>

export type Confidence = 'high' | 'medium' | 'low'

/** A search hit before ranking. */
export interface Candidate {
  id: string
  type: VectorRecordType
  title: string
  preview: string
  /** null for text matches. */
  distance: number | null
  similarity: number
  timestamp: string
  resolutionQuality: number
  category: CategoryId | null
  /** Cases this hit stands for: itself for a case, the cited cases for an article. */
  sourceCaseIds: string[]
  status: string
}

export interface RankingFactors {
  similarity: number
  recency: number
  resolutionQuality: number
}

export interface SearchResult {
  id: string
  type: VectorRecordType
  title: string
  preview: string
  distance: number | null
  similarity: number
  relevance: number
  /** 1-based. */
  rank: number
  confidence: Confidence
  factors: RankingFactors
  category: CategoryId | null
  timestamp: string
  status: string
  sourceCaseIds: string[]
}

export interface SearchResponse {
  query: string
  type: SearchType
  results: SearchResult[]
  /** Candidates considered before threshold filtering. */
  candidates: number
  tookMs: number
}
