/**
 * Pure article drafting from a category's contributing cases.
 */

import type { Case } from '../cases/index.js'
import type { KnowledgeConfig, RankingConfig } from '../config/index.js'
import type { Category } from '../patterns/index.js'
import type { ArticleDraft } from './schemas.js'
import { classifyResolutionType, normalizeText, productLabel, topByFrequency } from './text-stats.js'

export const INITIAL_DIAGNOSIS_STEPS: readonly string[] = [
  'Verify system power and LED status indicators',
  'Check for any error messages or codes',
  'Review system logs for relevant entries',
]

export type DraftLimits = Pick<KnowledgeConfig, 'maxSymptoms' | 'maxResolutionSteps' | 'maxProducts' | 'maxExamples'>

export function articleTitle(category: Category, caseCount: number): string {
  return `${category.title} (Based on ${caseCount} Cases)`
}

export function articleSummary(category: Category, caseCount: number, products: readonly string[]): string {
  const productText = products.length > 0 ? products.slice(0, 3).join(', ') : 'affected servers'
  return category.summary
    .replaceAll('{products}', productText)
    .replaceAll('{count}', String(caseCount))
}

/**
 * Build the article content for `cases`, which are expected most recent
 * first. Example cases and tie-breaks follow that order.
 */
export function buildArticleDraft(
  category: Category,
  cases: readonly Case[],
  limits: DraftLimits,
  quality: RankingConfig['resolutionQuality'],
): ArticleDraft {
  const products = topByFrequency(
    cases.map((c) => productLabel(c)).filter((p): p is string => p !== null),
    limits.maxProducts,
  )
  const resolutions = cases.map((c) => c.resolution).filter((r) => normalizeText(r).length > 0)

  const resolutionRate = cases.length === 0
    ? 0
    : cases.reduce((sum, c) => sum + quality[c.status], 0) / cases.length

  return {
    category: category.id,
    knowledgeCategory: category.knowledgeCategory,
    title: articleTitle(category, cases.length),
    summary: articleSummary(category, cases.length, products),
    sections: {
      symptoms: topByFrequency(cases.map((c) => c.issue), limits.maxSymptoms),
      diagnosticSteps: [...INITIAL_DIAGNOSIS_STEPS],
      resolutionSteps: topByFrequency(resolutions, limits.maxResolutionSteps),
      affectedProducts: products,
      caseExamples: cases.slice(0, limits.maxExamples).map((c) => ({
        caseId: c.id,
        issue: normalizeText(c.issue),
        resolution: normalizeText(c.resolution),
        status: c.status,
      })),
    },
    resolutionType: classifyResolutionType(resolutions),
    resolutionRate,
    caseIds: cases.map((c) => c.id),
  }
}
