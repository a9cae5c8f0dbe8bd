/**
 * Markdown rendering of a drafted article.
 */

import type { ArticleDraft } from './schemas.js'

function humanize(id: string): string {
  return id
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

function bulletList(items: readonly string[], empty: string): string {
  if (items.length === 0) return `- ${empty}`
  return items.map((item) => `- ${item}`).join('\n')
}

function numberedList(items: readonly string[], empty: string): string {
  if (items.length === 0) return `1. ${empty}`
  return items.map((item, i) => `${i + 1}. ${item}`).join('\n')
}

export function renderArticleMarkdown(draft: ArticleDraft, generatedAt: string): string {
  const { sections } = draft
  const lines: string[] = [
    `# ${draft.title}`,
    '',
    draft.summary,
    '',
    '## Overview',
    `Troubleshooting steps for ${humanize(draft.category).toLowerCase()} compiled from ${draft.caseIds.length} support cases.`,
    `Category: ${draft.knowledgeCategory}. Primary resolution: ${draft.resolutionType}.`,
    '',
    '## Affected Products',
    bulletList(sections.affectedProducts, 'Not recorded'),
    '',
    '## Common Symptoms',
    bulletList(sections.symptoms, 'No symptoms recorded'),
    '',
    '## Troubleshooting Steps',
    '',
    '### Step 1: Initial Diagnosis',
    numberedList(sections.diagnosticSteps, 'No diagnostic steps'),
    '',
    '### Step 2: Common Resolution Methods',
    numberedList(sections.resolutionSteps, 'No resolutions recorded'),
  ]

  if (sections.caseExamples.length > 0) {
    lines.push('', '## Case Examples')
    sections.caseExamples.forEach((example, i) => {
      lines.push(
        '',
        `### Case Example ${i + 1}: ${example.caseId}`,
        `**Issue**: ${example.issue || 'n/a'}`,
        `**Resolution**: ${example.resolution || 'n/a'}`,
        `**Status**: ${example.status}`,
      )
    })
  }

  lines.push('', '---', `*Generated from ${draft.caseIds.length} cases on ${generatedAt.slice(0, 10)}.*`, '')
  return lines.join('\n')
}
