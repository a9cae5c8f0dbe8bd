/**
 * Human-readable renderings of core results.
 */

import type { HealthReport, KnowledgeArticle, SearchResponse, SyncRun, SyncStatusReport, SyncSummary } from '@casekb/core'

export function formatSimilarity(value: number): string {
  return value.toFixed(3)
}

export function formatSyncSummary(summary: SyncSummary): string[] {
  const lines = [`Sync ${summary.status} (${summary.trigger}, ${summary.durationMs}ms)`]
  if (summary.status === 'busy' || summary.status === 'skipped') {
    if (summary.error) lines.push(`  ${summary.error}`)
    return lines
  }
  lines.push(
    `  cases: ${summary.casesFetched} fetched, ${summary.casesCategorized} categorized, ` +
      `${summary.casesUncategorized} uncategorized, ${summary.casesSkipped} skipped`,
    `  articles: ${summary.articlesGenerated} generated, ${summary.articlesStale} stale`,
    `  vectors: ${summary.vectorsWritten} written`,
    `  cursor: ${summary.cursorAdvanced ? 'advanced' : 'unchanged'}, retries: ${summary.retries}`,
  )
  if (summary.failedStage) lines.push(`  failed during ${summary.failedStage}`)
  if (summary.error) lines.push(`  error: ${summary.error}`)
  return lines
}

export function formatSearchResponse(response: SearchResponse): string[] {
  const header = `${response.results.length} result${response.results.length === 1 ? '' : 's'} for "${response.query}" (${response.type}, ${response.tookMs}ms)`
  const lines = [header]
  for (const result of response.results) {
    lines.push(
      `${result.rank}. [${result.type}] ${result.title}`,
      `   similarity ${formatSimilarity(result.similarity)}, relevance ${formatSimilarity(result.relevance)}, ${result.confidence} confidence` +
        (result.category ? `, ${result.category}` : ''),
      `   ${result.preview}`,
    )
  }
  return lines
}

export function formatHealth(report: HealthReport): string[] {
  const mark = (ok: boolean) => (ok ? 'ok  ' : 'FAIL')
  const { database, vectorStore, embedder, lastRun } = report.checks
  return [
    `Status: ${report.status}`,
    `  ${mark(database.ok)} database      ${database.detail}`,
    `  ${mark(vectorStore.ok)} vector store  ${vectorStore.detail}`,
    `  ${mark(embedder.ok)} embedder      ${embedder.detail}`,
    `  ${mark(lastRun.ok)} last run      ${lastRun.detail}`,
  ]
}

export function formatStatus(report: SyncStatusReport): string[] {
  const lines = [
    `Stage: ${report.stage}${report.active ? ' (running)' : ''}`,
    `Cursor: ${report.cursor.timestamp ? `${report.cursor.timestamp} / ${report.cursor.caseId ?? ''}` : 'not started'}`,
    `Consecutive failures: ${report.consecutiveFailures}`,
  ]
  if (report.cooldownUntil) lines.push(`Cooling down until ${report.cooldownUntil}`)
  if (report.lease) lines.push(`Lease held by ${report.lease.owner} until ${report.lease.expiresAt}`)
  if (report.pendingByCategory.length > 0) {
    lines.push('Unprocessed cases:')
    for (const entry of report.pendingByCategory) lines.push(`  ${entry.category}: ${entry.count}`)
  }
  return lines
}

export function runRows(runs: SyncRun[]): Array<Record<string, unknown>> {
  return runs.map((run) => ({
    started: run.startedAt,
    trigger: run.trigger,
    status: run.status,
    stage: run.failedStage ?? run.stage,
    fetched: run.casesFetched,
    generated: run.articlesGenerated,
    vectors: run.vectorsWritten,
  }))
}

export function articleRows(articles: KnowledgeArticle[]): Array<Record<string, unknown>> {
  return articles.map((article) => ({
    id: article.id,
    category: article.category,
    cases: article.caseIds.length,
    status: article.vectorStatus,
    generated: article.generatedAt,
    title: article.title,
  }))
}
