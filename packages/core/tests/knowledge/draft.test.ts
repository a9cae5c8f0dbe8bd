import { describe, it, expect } from 'vitest'
import type { Case } from '../../src/cases/index.js'
import {
  INITIAL_DIAGNOSIS_STEPS,
  articleSummary,
  articleTitle,
  buildArticleDraft,
  renderArticleMarkdown,
} from '../../src/knowledge/index.js'
import { defaultCategoryTable } from '../../src/patterns/index.js'
import { testConfig } from '../helpers.js'

const config = testConfig()
const memory = defaultCategoryTable().get('memory_issues')

function makeCase(id: string, overrides: Partial<Case> = {}): Case {
  return {
    id,
    subject: 'PowerEdge R740 - DIMM errors',
    issue: 'Correctable ECC errors on DIMM B2',
    resolution: 'Replaced DIMM B2',
    status: 'resolved',
    productHierarchyId: 'poweredge-r740',
    productName: 'PowerEdge R740',
    contentHash: 'hash',
    createdAt: '2026-01-01T00:00:00.000Z',
    resolvedAt: null,
    updatedAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  }
}

describe('article drafting', () => {
  if (!memory) throw new Error('memory_issues missing from the default table')

  const cases = [
    makeCase('c-1'),
    makeCase('c-2', { productName: 'PowerEdge R650', status: 'closed' }),
    makeCase('c-3', { issue: 'Uncorrectable memory error', resolution: 'Reseated DIMM A1', status: 'open' }),
    makeCase('c-4'),
  ]

  it('titles and summarizes from the category template', () => {
    expect(articleTitle(memory, 4)).toBe('Memory (DIMM) Troubleshooting and Replacement Guide (Based on 4 Cases)')
    expect(articleSummary(memory, 4, ['A', 'B', 'C', 'D'])).toBe(
      'Memory module troubleshooting and replacement guide for A, B, C. Derived from 4 customer cases.',
    )
    expect(articleSummary(memory, 2, [])).toBe(
      'Memory module troubleshooting and replacement guide for affected servers. Derived from 2 customer cases.',
    )
  })

  it('aggregates the contributing cases', () => {
    const draft = buildArticleDraft(memory, cases, { ...config.knowledge, maxExamples: 2 }, config.ranking.resolutionQuality)

    expect(draft.category).toBe('memory_issues')
    expect(draft.knowledgeCategory).toBe('Hardware')
    expect(draft.caseIds).toEqual(['c-1', 'c-2', 'c-3', 'c-4'])
    expect(draft.sections.affectedProducts).toEqual(['PowerEdge R740', 'PowerEdge R650'])
    expect(draft.sections.symptoms).toEqual(['Correctable ECC errors on DIMM B2', 'Uncorrectable memory error'])
    expect(draft.sections.resolutionSteps).toEqual(['Replaced DIMM B2', 'Reseated DIMM A1'])
    expect(draft.sections.diagnosticSteps).toEqual([...INITIAL_DIAGNOSIS_STEPS])
    expect(draft.sections.caseExamples.map((e) => e.caseId)).toEqual(['c-1', 'c-2'])
    expect(draft.resolutionType).toBe('Hardware Replacement')
    // (1 + 0.6 + 0 + 1) / 4
    expect(draft.resolutionRate).toBeCloseTo(0.65)
  })

  it('renders markdown with examples and a footer', () => {
    const draft = buildArticleDraft(memory, cases.slice(0, 1), config.knowledge, config.ranking.resolutionQuality)
    const lines = renderArticleMarkdown(draft, '2026-03-01T12:00:00.000Z').split('\n')

    expect(lines[0]).toBe('# Memory (DIMM) Troubleshooting and Replacement Guide (Based on 1 Cases)')
    expect(lines).toContain('## Overview')
    expect(lines).toContain('Troubleshooting steps for memory issues compiled from 1 support cases.')
    expect(lines).toContain('Category: Hardware. Primary resolution: Hardware Replacement.')
    expect(lines).toContain('- PowerEdge R740')
    expect(lines).toContain('1. Verify system power and LED status indicators')
    expect(lines).toContain('### Case Example 1: c-1')
    expect(lines).toContain('**Status**: resolved')
    expect(lines.slice(-3)).toEqual(['---', '*Generated from 1 cases on 2026-03-01.*', ''])
  })

  it('renders placeholders for empty sections', () => {
    const draft = buildArticleDraft(memory, [makeCase('c-9', { resolution: '', productName: null, subject: 'DIMM', productHierarchyId: null })], { ...config.knowledge, maxExamples: 0 }, config.ranking.resolutionQuality)
    const lines = renderArticleMarkdown(draft, '2026-03-01T12:00:00.000Z').split('\n')

    expect(lines).toContain('- Not recorded')
    expect(lines).toContain('1. No resolutions recorded')
    expect(lines).not.toContain('## Case Examples')
    expect(draft.resolutionType).toBe('General Troubleshooting')
  })
})
