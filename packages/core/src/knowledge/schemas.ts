import { z } from 'zod'
import type { CategoryId, KnowledgeCategory } from '../patterns/index.js'

export const VectorStatusSchema = z.enum(['pending', 'vectorized', 'stale'])
export type VectorStatus = z.infer<typeof VectorStatusSchema>

export const ResolutionTypeSchema = z.enum([
  'Hardware Replacement',
  'Firmware Update',
  'System Restart',
  'Configuration Change',
  'General Troubleshooting',
])
export type ResolutionType = z.infer<typeof ResolutionTypeSchema>

export const CaseExampleSchema = z.object({
  caseId: z.string(),
  issue: z.string(),
  resolution: z.string(),
  status: z.string(),
})

export const ArticleSectionsSchema = z.object({
  symptoms: z.array(z.string()),
  diagnosticSteps: z.array(z.string()),
  resolutionSteps: z.array(z.string()),
  affectedProducts: z.array(z.string()),
  caseExamples: z.array(CaseExampleSchema),
})

export type CaseExample = z.infer<typeof CaseExampleSchema>
export type ArticleSections = z.infer<typeof ArticleSectionsSchema>

/** Everything derived from the contributing cases, before an id is assigned. */
export interface ArticleDraft {
  category: CategoryId
  knowledgeCategory: KnowledgeCategory
  title: string
  summary: string
  sections: ArticleSections
  resolutionType: ResolutionType
  /** Mean resolution quality of the contributing cases, in [0, 1]. */
  resolutionRate: number
  caseIds: string[]
}

export interface KnowledgeArticle extends ArticleDraft {
  id: string
  content: string
  vectorStatus: VectorStatus
  generatedAt: string
  vectorizedAt: string | null
  updatedAt: string
}

export interface ArticleListFilter {
  category?: CategoryId
  vectorStatus?: VectorStatus
  limit?: number
}

export type GenerationOutcome =
  | { generated: true; article: KnowledgeArticle }
  | { generated: false; reason: 'below_threshold'; pending: number }

export interface GenerateEligibleResult {
  articles: KnowledgeArticle[]
  conflicts: number
  /** Categories at or above threshold when the pass started. */
  eligible: CategoryId[]
}
