/**
 * Keyword-based issue category detection.
 * Pure: the same case text and category table always yield the same match.
 */

import type { Case } from '../cases/index.js'
import type { Category, CategoryId, CategoryTable } from './categories.js'

export interface CategoryMatch {
  category: CategoryId | null
  /** Distinct keywords of the winning category found in the text, in table order. */
  matchedKeywords: string[]
  /** Number of distinct matched keywords. */
  score: number
}

interface CompiledCategory {
  category: Category
  matchers: Array<{ keyword: string; pattern: RegExp }>
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Inflections a keyword may carry and still count as a hit: "fans", "disks", "posted". */
const KEYWORD_SUFFIX = '(?:s|es|ed|ing)?'

/**
 * Word matcher anchored at the start of a word. The keyword may take an
 * inflectional suffix but not run on into a longer word ("power" misses "poweredge").
 * Inner whitespace of multi-word keywords matches any run of whitespace.
 */
export function keywordPattern(keyword: string): RegExp {
  const body = keyword
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+')
  return new RegExp(`(?<![a-z0-9])${body}${KEYWORD_SUFFIX}(?![a-z0-9])`)
}

export function caseDetectionText(c: Pick<Case, 'subject' | 'issue'>): string {
  return `${c.subject} ${c.issue}`.toLowerCase()
}

export class PatternDetector {
  private readonly compiled: CompiledCategory[]

  constructor(readonly table: CategoryTable) {
    this.compiled = table.categories.map((category) => ({
      category,
      matchers: category.keywords.map((keyword) => ({ keyword, pattern: keywordPattern(keyword) })),
    }))
  }

  get fingerprint(): string {
    return this.table.fingerprint
  }

  /**
   * Most distinct keyword hits wins; ties go to the earlier category.
   * No hit at all leaves the case uncategorized.
   */
  detect(c: Pick<Case, 'subject' | 'issue'>): CategoryMatch {
    const text = caseDetectionText(c)
    let best: CategoryMatch = { category: null, matchedKeywords: [], score: 0 }

    for (const entry of this.compiled) {
      const matched = entry.matchers.filter((m) => m.pattern.test(text)).map((m) => m.keyword)
      if (matched.length > best.score) {
        best = { category: entry.category.id, matchedKeywords: matched, score: matched.length }
      }
    }

    return best
  }
}
