/**
 * Frequency helpers for article drafting.
 */

import type { Case } from '../cases/index.js'
import type { ResolutionType } from './schemas.js'

/** Trim and collapse internal whitespace. */
export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

/**
 * Most frequent non-empty values after normalization.
 * Equal counts keep first-occurrence order; comparison ignores case, the
 * first spelling seen is returned.
 */
export function topByFrequency(values: readonly string[], limit: number): string[] {
  const counts = new Map<string, { text: string; count: number; first: number }>()
  values.forEach((raw, index) => {
    const text = normalizeText(raw)
    if (!text) return
    const key = text.toLowerCase()
    const entry = counts.get(key)
    if (entry) {
      entry.count++
    } else {
      counts.set(key, { text, count: 1, first: index })
    }
  })

  return [...counts.values()]
    .sort((a, b) => b.count - a.count || a.first - b.first)
    .slice(0, limit)
    .map((e) => e.text)
}

const RESOLUTION_RULES: Array<{ type: ResolutionType; pattern: RegExp }> = [
  { type: 'Hardware Replacement', pattern: /replac/ },
  { type: 'Firmware Update', pattern: /firmware|update/ },
  { type: 'System Restart', pattern: /restart|reboot/ },
  { type: 'Configuration Change', pattern: /configur|setting/ },
]

/** First rule whose pattern appears anywhere in the combined resolution text. */
export function classifyResolutionType(resolutions: readonly string[]): ResolutionType {
  const text = resolutions.join(' ').toLowerCase()
  for (const rule of RESOLUTION_RULES) {
    if (rule.pattern.test(text)) return rule.type
  }
  return 'General Troubleshooting'
}

/**
 * Product label of a case: the product name, else the subject prefix before
 * " - ", else the product hierarchy id.
 */
export function productLabel(c: Pick<Case, 'productName' | 'subject' | 'productHierarchyId'>): string | null {
  const name = c.productName ? normalizeText(c.productName) : ''
  if (name) return name

  const separator = c.subject.indexOf(' - ')
  if (separator > 0) {
    const prefix = normalizeText(c.subject.slice(0, separator))
    if (prefix) return prefix
  }

  return c.productHierarchyId ? normalizeText(c.productHierarchyId) || null : null
}
