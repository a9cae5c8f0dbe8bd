/**
 * Derives the next assignment for a case from its prior one.
 */

import type { Case } from '../cases/index.js'
import type { CategoryMatch } from './detector.js'
import type { AssignmentPlan, CaseAssignment } from './schemas.js'

export function planAssignment(
  c: Pick<Case, 'id' | 'contentHash'>,
  match: CategoryMatch,
  prior: CaseAssignment | null,
  fingerprint: string,
  now: string,
): AssignmentPlan {
  const fresh: CaseAssignment = {
    caseId: c.id,
    category: match.category,
    matchedKeywords: match.matchedKeywords,
    matchScore: match.score,
    categoriesFingerprint: fingerprint,
    caseContentHash: c.contentHash,
    articleId: null,
    assignedAt: now,
  }

  if (!prior) {
    return { assignment: fresh, staleArticleId: null, detachFromArticle: false, changed: true }
  }

  const categoryChanged = prior.category !== match.category
  const contentChanged = prior.caseContentHash !== c.contentHash

  if (!categoryChanged && !contentChanged && prior.categoriesFingerprint === fingerprint) {
    return { assignment: prior, staleArticleId: null, detachFromArticle: false, changed: false }
  }

  if (categoryChanged) {
    return {
      assignment: fresh,
      staleArticleId: prior.articleId,
      detachFromArticle: prior.articleId !== null,
      changed: true,
    }
  }

  return {
    assignment: { ...fresh, articleId: prior.articleId, assignedAt: prior.assignedAt },
    staleArticleId: contentChanged ? prior.articleId : null,
    detachFromArticle: false,
    changed: true,
  }
}
