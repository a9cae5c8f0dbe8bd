/**
 * Knowledge: article drafting, rendering, persistence and generation.
 */

export {
  VectorStatusSchema,
  ResolutionTypeSchema,
  ArticleSectionsSchema,
  CaseExampleSchema,
} from './schemas.js'
export type {
  VectorStatus,
  ResolutionType,
  ArticleSections,
  CaseExample,
  ArticleDraft,
  KnowledgeArticle,
  ArticleListFilter,
  GenerationOutcome,
  GenerateEligibleResult,
} from './schemas.js'
export { normalizeText, topByFrequency, classifyResolutionType, productLabel } from './text-stats.js'
export { buildArticleDraft, articleTitle, articleSummary, INITIAL_DIAGNOSIS_STEPS } from './draft.js'
export type { DraftLimits } from './draft.js'
export { renderArticleMarkdown } from './renderer.js'
export { ArticleRepository } from './repository.js'
export { KnowledgeGenerator } from './generator.js'
export type { KnowledgeGeneratorDeps } from './generator.js'
