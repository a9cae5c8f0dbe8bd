/**
 * What gets embedded for cases and articles, and the metadata stored with it.
 */

import type { Case } from '../cases/index.js'
import type { RankingConfig } from '../config/index.js'
import type { KnowledgeArticle } from '../knowledge/index.js'
import type { CategoryId } from '../patterns/index.js'
import type { VectorMetadata } from './vector-store.js'

export interface VectorDocument {
  id: string
  text: string
  metadata: VectorMetadata
}

export function preview(text: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  if (flat.length <= maxChars) return flat
  return flat.slice(0, Math.max(0, maxChars - 3)).trimEnd() + '...'
}

export function caseDocument(
  c: Case,
  category: CategoryId | null,
  quality: RankingConfig['resolutionQuality'],
  previewChars: number,
): VectorDocument {
  const text = [c.subject, c.issue, c.resolution].filter((part) => part.trim().length > 0).join('\n')
  return {
    id: c.id,
    text,
    metadata: {
      type: 'case',
      category,
      timestamp: c.updatedAt,
      status: c.status,
      title: c.subject.trim() || preview(c.issue, 80),
      preview: preview(c.issue || c.subject, previewChars),
      resolutionQuality: quality[c.status],
      caseIds: [c.id],
      productHierarchyId: c.productHierarchyId,
    },
  }
}

export function articleDocument(article: KnowledgeArticle, previewChars: number): VectorDocument {
  return {
    id: article.id,
    text: `${article.title}\n${article.summary}\n${article.content}`,
    metadata: {
      type: 'article',
      category: article.category,
      timestamp: article.generatedAt,
      status: article.vectorStatus === 'stale' ? 'stale' : 'vectorized',
      title: article.title,
      preview: preview(article.summary, previewChars),
      resolutionQuality: Math.min(1, Math.max(0, article.resolutionRate)),
      caseIds: [...article.caseIds],
      productHierarchyId: null,
    },
  }
}
