import type { CategoryId } from './categories.js'

export interface CaseAssignment {
  caseId: string
  /** null = uncategorized */
  category: CategoryId | null
  matchedKeywords: string[]
  matchScore: number
  categoriesFingerprint: string
  caseContentHash: string
  /** null = not yet attributed to an article */
  articleId: string | null
  assignedAt: string
}

export interface CategoryCount {
  category: CategoryId
  count: number
}

/** The outcome of re-detecting a case against its prior assignment. */
export interface AssignmentPlan {
  assignment: CaseAssignment
  /** Article to mark stale because a cited case changed. */
  staleArticleId: string | null
  /** The case left its article's category and must be unlinked from it. */
  detachFromArticle: boolean
  changed: boolean
}
