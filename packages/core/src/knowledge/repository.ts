/**
 * Knowledge article repository. Articles and their case links are written
 * together; UNIQUE(category, case_id) on the link table rejects a second
 * article citing an already attributed case.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import { CategoryIdSchema, KnowledgeCategorySchema } from '../patterns/index.js'
import { ArticleSectionsSchema, ResolutionTypeSchema, VectorStatusSchema } from './schemas.js'
import type { ArticleListFilter, ArticleSections, KnowledgeArticle, VectorStatus } from './schemas.js'

interface ArticleRow {
  id: string
  title: string
  summary: string
  category: string
  knowledge_category: string
  sections: string
  content: string
  resolution_type: string
  resolution_rate: number
  vector_status: string
  generated_at: string
  vectorized_at: string | null
  updated_at: string
}

function isConstraintError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('SQLITE_CONSTRAINT')
}

/** Stored sections JSON, or null when it is not valid JSON or not section-shaped. */
function parseSections(raw: string): ArticleSections | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return null
  }
  const sections = ArticleSectionsSchema.safeParse(parsed)
  return sections.success ? sections.data : null
}

export class ArticleRepository {
  constructor(private db: Database.Database) {}

  private caseIdsFor(articleId: string): string[] {
    const rows = this.db
      .prepare('SELECT case_id FROM knowledge_article_cases WHERE article_id = ? ORDER BY position ASC')
      .all(articleId) as Array<{ case_id: string }>
    return rows.map((r) => r.case_id)
  }

  private rowToArticle(row: ArticleRow): Result<KnowledgeArticle, CaseKBError> {
    const category = CategoryIdSchema.safeParse(row.category)
    const knowledgeCategory = KnowledgeCategorySchema.safeParse(row.knowledge_category)
    const resolutionType = ResolutionTypeSchema.safeParse(row.resolution_type)
    const vectorStatus = VectorStatusSchema.safeParse(row.vector_status)
    const sections = parseSections(row.sections)

    if (!category.success || !knowledgeCategory.success || !resolutionType.success || !vectorStatus.success || sections === null) {
      return Err(CaseKBError.parse(`Article ${row.id} has malformed stored fields`))
    }

    return Ok({
      id: row.id,
      title: row.title,
      summary: row.summary,
      category: category.data,
      knowledgeCategory: knowledgeCategory.data,
      sections,
      content: row.content,
      resolutionType: resolutionType.data,
      resolutionRate: row.resolution_rate,
      caseIds: this.caseIdsFor(row.id),
      vectorStatus: vectorStatus.data,
      generatedAt: row.generated_at,
      vectorizedAt: row.vectorized_at,
      updatedAt: row.updated_at,
    })
  }

  private mapRows(rows: ArticleRow[]): KnowledgeArticle[] {
    const articles: KnowledgeArticle[] = []
    for (const row of rows) {
      const mapped = this.rowToArticle(row)
      if (mapped.ok) {
        articles.push(mapped.value)
      } else {
        console.warn(`[knowledge] Skipping article: ${mapped.error.message}`)
      }
    }
    return articles
  }

  /**
   * Insert an article and its case links in one transaction.
   * A case already cited by another article of the category is a GENERATION_CONFLICT.
   */
  insert(article: KnowledgeArticle): Result<KnowledgeArticle, CaseKBError> {
    try {
      const linkStmt = this.db.prepare(
        'INSERT INTO knowledge_article_cases (article_id, category, case_id, position) VALUES (?, ?, ?, ?)',
      )
      this.db.transaction(() => {
        this.db.prepare(`
          INSERT INTO knowledge_articles (id, title, summary, category, knowledge_category, sections, content, resolution_type, resolution_rate, vector_status, generated_at, vectorized_at, updated_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
          article.id,
          article.title,
          article.summary,
          article.category,
          article.knowledgeCategory,
          JSON.stringify(article.sections),
          article.content,
          article.resolutionType,
          article.resolutionRate,
          article.vectorStatus,
          article.generatedAt,
          article.vectorizedAt,
          article.updatedAt,
        )
        article.caseIds.forEach((caseId, position) => {
          linkStmt.run(article.id, article.category, caseId, position)
        })
      })()
      return Ok(article)
    } catch (err) {
      if (isConstraintError(err)) {
        return Err(CaseKBError.generationConflict(
          `Article for ${article.category} cites cases already attributed: ${errorMessage(err)}`,
        ))
      }
      return Err(CaseKBError.db(`Failed to insert article: ${errorMessage(err)}`))
    }
  }

  get(id: string): Result<KnowledgeArticle, CaseKBError> {
    try {
      const row = this.db.prepare('SELECT * FROM knowledge_articles WHERE id = ?').get(id) as ArticleRow | undefined
      if (!row) return Err(CaseKBError.notFound('Article', id))
      return this.rowToArticle(row)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to get article ${id}: ${errorMessage(err)}`))
    }
  }

  list(filter: ArticleListFilter = {}): Result<KnowledgeArticle[], CaseKBError> {
    try {
      const where: string[] = []
      const params: Array<string | number> = []
      if (filter.category) {
        where.push('category = ?')
        params.push(filter.category)
      }
      if (filter.vectorStatus) {
        where.push('vector_status = ?')
        params.push(filter.vectorStatus)
      }
      params.push(filter.limit ?? -1)

      const rows = this.db.prepare(`
        SELECT * FROM knowledge_articles
        ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
        ORDER BY generated_at DESC, id ASC
        LIMIT ?
      `).all(...params) as ArticleRow[]
      return Ok(this.mapRows(rows))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to list articles: ${errorMessage(err)}`))
    }
  }

  /** Articles awaiting their first vector upsert. */
  listPending(): Result<KnowledgeArticle[], CaseKBError> {
    return this.list({ vectorStatus: 'pending' })
  }

  markVectorized(ids: readonly string[], at: string = new Date().toISOString()): Result<number, CaseKBError> {
    return this.updateStatus(ids, 'vectorized', at, "vector_status = 'pending'")
  }

  /** Flag articles whose contributing cases changed. Idempotent. */
  markStale(ids: readonly string[], at: string = new Date().toISOString()): Result<number, CaseKBError> {
    return this.updateStatus(ids, 'stale', at, "vector_status != 'stale'")
  }

  private updateStatus(ids: readonly string[], status: VectorStatus, at: string, guard: string): Result<number, CaseKBError> {
    if (ids.length === 0) return Ok(0)
    try {
      const stmt = this.db.prepare(`
        UPDATE knowledge_articles
        SET vector_status = ?, updated_at = ?, vectorized_at = CASE WHEN ? = 'vectorized' THEN ? ELSE vectorized_at END
        WHERE id = ? AND ${guard}
      `)
      const changes = this.db.transaction(() => {
        let total = 0
        for (const id of new Set(ids)) {
          total += stmt.run(status, at, status, at, id).changes
        }
        return total
      })()
      return Ok(changes)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to mark articles ${status}: ${errorMessage(err)}`))
    }
  }

  /** Remove a case from an article's citations after it moved to another category. */
  detachCase(articleId: string, caseId: string): Result<boolean, CaseKBError> {
    try {
      const result = this.db
        .prepare('DELETE FROM knowledge_article_cases WHERE article_id = ? AND case_id = ?')
        .run(articleId, caseId)
      return Ok(result.changes > 0)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to detach case ${caseId}: ${errorMessage(err)}`))
    }
  }

  countByStatus(): Result<Record<VectorStatus, number>, CaseKBError> {
    try {
      const rows = this.db
        .prepare('SELECT vector_status, COUNT(*) as count FROM knowledge_articles GROUP BY vector_status')
        .all() as Array<{ vector_status: string; count: number }>
      const counts: Record<VectorStatus, number> = { pending: 0, vectorized: 0, stale: 0 }
      for (const row of rows) {
        const status = VectorStatusSchema.safeParse(row.vector_status)
        if (status.success) counts[status.data] = row.count
      }
      return Ok(counts)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to count articles: ${errorMessage(err)}`))
    }
  }

  listTitles(): Result<string[], CaseKBError> {
    try {
      const rows = this.db
        .prepare('SELECT title FROM knowledge_articles ORDER BY title ASC')
        .all() as Array<{ title: string }>
      return Ok(rows.map((r) => r.title))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to list article titles: ${errorMessage(err)}`))
    }
  }
}
