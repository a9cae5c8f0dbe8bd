/**
 * Search: distance normalization, composite ranking and the search engine.
 */

export { distanceToSimilarity } from './normalizer.js'
export { rankCandidates, recencyScore, confidenceFor, entityIds } from './ranking.js'
export type { RankOptions } from './ranking.js'
export { SearchTypeSchema, ResultTypeFilterSchema, SearchOptionsSchema } from './schemas.js'
export type {
  SearchType,
  SearchOptions,
  ResolvedSearchOptions,
  Confidence,
  Candidate,
  RankingFactors,
  SearchResult,
  SearchResponse,
} from './schemas.js'
export { SearchEngine, queryTerms } from './engine.js'
export type { SearchEngineDeps } from './engine.js'
