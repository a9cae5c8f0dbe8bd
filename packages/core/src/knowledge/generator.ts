/**
 * Knowledge generator: turns a category's unattributed cases into an
 * article once the category reaches the threshold.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import type { CaseRepository } from '../cases/index.js'
import type { KnowledgeConfig, RankingConfig } from '../config/index.js'
import type { AssignmentRepository, CategoryId, CategoryTable } from '../patterns/index.js'
import { buildArticleDraft } from './draft.js'
import { renderArticleMarkdown } from './renderer.js'
import type { ArticleRepository } from './repository.js'
import type { GenerateEligibleResult, GenerationOutcome, KnowledgeArticle } from './schemas.js'

export interface KnowledgeGeneratorDeps {
  db: Database.Database
  cases: CaseRepository
  assignments: AssignmentRepository
  articles: ArticleRepository
  categories: CategoryTable
  knowledge: KnowledgeConfig
  resolutionQuality: RankingConfig['resolutionQuality']
  /** Clock, overridable in tests. */
  now?: () => string
}

export class KnowledgeGenerator {
  private readonly now: () => string

  constructor(private deps: KnowledgeGeneratorDeps) {
    this.now = deps.now ?? (() => new Date().toISOString())
  }

  get threshold(): number {
    return this.deps.knowledge.threshold
  }

  /**
   * Generate one article from the category's most recent unattributed cases.
   * The article, its case links and the assignment updates commit together.
   */
  generateForCategory(categoryId: CategoryId): Result<GenerationOutcome, CaseKBError> {
    const { cases, assignments, articles, categories, knowledge } = this.deps
    const category = categories.get(categoryId)
    if (!category) return Err(CaseKBError.validation(`Unknown category: ${categoryId}`))

    const ids = assignments.listUnprocessedIds(categoryId, knowledge.maxCasesPerArticle)
    if (!ids.ok) return ids
    if (ids.value.length < knowledge.threshold) {
      return Ok({ generated: false, reason: 'below_threshold', pending: ids.value.length })
    }

    const loaded = cases.listByIds(ids.value)
    if (!loaded.ok) return loaded
    if (loaded.value.length < knowledge.threshold) {
      return Ok({ generated: false, reason: 'below_threshold', pending: loaded.value.length })
    }

    const draft = buildArticleDraft(category, loaded.value, knowledge, this.deps.resolutionQuality)
    const generatedAt = this.now()
    const article: KnowledgeArticle = {
      ...draft,
      id: uuidv4(),
      content: renderArticleMarkdown(draft, generatedAt),
      vectorStatus: 'pending',
      generatedAt,
      vectorizedAt: null,
      updatedAt: generatedAt,
    }

    try {
      this.deps.db.transaction(() => {
        const inserted = articles.insert(article)
        if (!inserted.ok) throw inserted.error
        const marked = assignments.markProcessed(article.caseIds, categoryId, article.id)
        if (!marked.ok) throw marked.error
      })()
    } catch (err) {
      if (err instanceof CaseKBError) return Err(err)
      return Err(CaseKBError.db(`Article generation for ${categoryId} failed: ${errorMessage(err)}`))
    }

    console.log(`[knowledge] Generated "${article.title}" from ${article.caseIds.length} cases`)
    return Ok({ generated: true, article })
  }

  /** Categories whose unattributed count reaches the threshold, in table order. */
  eligibleCategories(): Result<CategoryId[], CaseKBError> {
    const counts = this.deps.assignments.countUnprocessedByCategory()
    if (!counts.ok) return counts
    const byCategory = new Map(counts.value.map((c) => [c.category, c.count]))
    return Ok(this.deps.categories.ids.filter((id) => (byCategory.get(id) ?? 0) >= this.deps.knowledge.threshold))
  }

  /**
   * One article per eligible category, checking `signal` between categories.
   * Conflicts are counted and logged; any other failure stops the pass.
   */
  generateEligible(signal?: AbortSignal): Result<GenerateEligibleResult, CaseKBError> {
    const eligible = this.eligibleCategories()
    if (!eligible.ok) return eligible

    const result: GenerateEligibleResult = { articles: [], conflicts: 0, eligible: eligible.value }
    for (const categoryId of eligible.value) {
      if (signal?.aborted) return Err(CaseKBError.cancelled('Generation cancelled'))

      const outcome = this.generateForCategory(categoryId)
      if (!outcome.ok) {
        if (outcome.error.code !== 'GENERATION_CONFLICT') return outcome
        result.conflicts++
        console.warn(`[knowledge] Generation conflict for ${categoryId}: ${outcome.error.message}`)
        continue
      }
      if (outcome.value.generated) result.articles.push(outcome.value.article)
    }
    return Ok(result)
  }
}
