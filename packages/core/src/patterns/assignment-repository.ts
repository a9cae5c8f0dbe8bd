/**
 * Case category assignments: one row per case, the source of truth for
 * per-category unprocessed counts.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import { CategoryIdSchema } from './categories.js'
import type { CategoryId } from './categories.js'
import type { CaseAssignment, CategoryCount } from './schemas.js'

interface AssignmentRow {
  case_id: string
  category: string | null
  matched_keywords: string
  match_score: number
  categories_fingerprint: string
  case_content_hash: string
  article_id: string | null
  assigned_at: string
}

function parseKeywords(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw)
    return Array.isArray(parsed) ? parsed.filter((k): k is string => typeof k === 'string') : []
  } catch {
    return []
  }
}

function rowToAssignment(row: AssignmentRow): CaseAssignment {
  const category = row.category === null ? null : CategoryIdSchema.safeParse(row.category)
  return {
    caseId: row.case_id,
    category: category?.success ? category.data : null,
    matchedKeywords: parseKeywords(row.matched_keywords),
    matchScore: row.match_score,
    categoriesFingerprint: row.categories_fingerprint,
    caseContentHash: row.case_content_hash,
    articleId: row.article_id,
    assignedAt: row.assigned_at,
  }
}

export class AssignmentRepository {
  constructor(private db: Database.Database) {}

  get(caseId: string): Result<CaseAssignment | null, CaseKBError> {
    try {
      const row = this.db
        .prepare('SELECT * FROM case_assignments WHERE case_id = ?')
        .get(caseId) as AssignmentRow | undefined
      return Ok(row ? rowToAssignment(row) : null)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to load assignment for ${caseId}: ${errorMessage(err)}`))
    }
  }

  /** Upsert all assignments in one transaction. */
  saveMany(assignments: readonly CaseAssignment[]): Result<number, CaseKBError> {
    try {
      const stmt = this.db.prepare(`
        INSERT INTO case_assignments (case_id, category, matched_keywords, match_score, categories_fingerprint, case_content_hash, article_id, assigned_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(case_id) DO UPDATE SET
          category = excluded.category,
          matched_keywords = excluded.matched_keywords,
          match_score = excluded.match_score,
          categories_fingerprint = excluded.categories_fingerprint,
          case_content_hash = excluded.case_content_hash,
          article_id = excluded.article_id,
          assigned_at = excluded.assigned_at
      `)
      this.db.transaction(() => {
        for (const a of assignments) {
          stmt.run(
            a.caseId,
            a.category,
            JSON.stringify(a.matchedKeywords),
            a.matchScore,
            a.categoriesFingerprint,
            a.caseContentHash,
            a.articleId,
            a.assignedAt,
          )
        }
      })()
      return Ok(assignments.length)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to save assignments: ${errorMessage(err)}`))
    }
  }

  /** Unattributed cases per category, in no particular order. Uncategorized cases are excluded. */
  countUnprocessedByCategory(): Result<CategoryCount[], CaseKBError> {
    try {
      const rows = this.db.prepare(`
        SELECT category, COUNT(*) as count FROM case_assignments
        WHERE category IS NOT NULL AND article_id IS NULL
        GROUP BY category
      `).all() as Array<{ category: string; count: number }>

      const counts: CategoryCount[] = []
      for (const row of rows) {
        const category = CategoryIdSchema.safeParse(row.category)
        if (category.success) counts.push({ category: category.data, count: row.count })
      }
      return Ok(counts)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to count unprocessed cases: ${errorMessage(err)}`))
    }
  }

  /** Unattributed case ids of a category, most recently updated first. */
  listUnprocessedIds(category: CategoryId, limit: number): Result<string[], CaseKBError> {
    try {
      const rows = this.db.prepare(`
        SELECT a.case_id FROM case_assignments a
        JOIN cases c ON c.id = a.case_id
        WHERE a.category = ? AND a.article_id IS NULL
        ORDER BY c.updated_at DESC, a.case_id ASC
        LIMIT ?
      `).all(category, limit) as Array<{ case_id: string }>
      return Ok(rows.map((r) => r.case_id))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to list unprocessed cases for ${category}: ${errorMessage(err)}`))
    }
  }

  /**
   * Attribute cases to an article. Every case must be assigned to the
   * category and still unattributed, otherwise nothing changes.
   */
  markProcessed(caseIds: readonly string[], category: CategoryId, articleId: string): Result<number, CaseKBError> {
    try {
      const stmt = this.db.prepare(`
        UPDATE case_assignments SET article_id = ?
        WHERE case_id = ? AND category = ? AND article_id IS NULL
      `)
      const updated = this.db.transaction(() => {
        let changes = 0
        for (const id of caseIds) {
          changes += stmt.run(articleId, id, category).changes
        }
        if (changes !== caseIds.length) {
          throw CaseKBError.generationConflict(
            `${caseIds.length - changes} of ${caseIds.length} cases are no longer unprocessed in ${category}`,
          )
        }
        return changes
      })()
      return Ok(updated)
    } catch (err) {
      if (err instanceof CaseKBError) return Err(err)
      return Err(CaseKBError.db(`Failed to mark cases processed: ${errorMessage(err)}`))
    }
  }

  /** Uncategorized cases detected against a different category table. */
  listUncategorizedOutdated(fingerprint: string): Result<string[], CaseKBError> {
    try {
      const rows = this.db.prepare(`
        SELECT case_id FROM case_assignments
        WHERE category IS NULL AND categories_fingerprint != ?
        ORDER BY case_id ASC
      `).all(fingerprint) as Array<{ case_id: string }>
      return Ok(rows.map((r) => r.case_id))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to list uncategorized cases: ${errorMessage(err)}`))
    }
  }

  countUncategorized(): Result<number, CaseKBError> {
    try {
      const row = this.db
        .prepare('SELECT COUNT(*) as count FROM case_assignments WHERE category IS NULL')
        .get() as { count: number }
      return Ok(row.count)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to count uncategorized cases: ${errorMessage(err)}`))
    }
  }
}
