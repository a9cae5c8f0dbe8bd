/**
 * Sync orchestrator: single-flight FETCHING → CATEGORIZING → GENERATING →
 * VECTORIZING pipeline over one batch of cases. The cursor advances only
 * after the whole batch succeeds.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import {
  CaseKBError,
  errorMessage,
  mapWithConcurrency,
  toCaseKBError,
  unwrap,
  withRetry,
} from '../common/index.js'
import type { Case, CaseRepository, FetchedCase } from '../cases/index.js'
import type { PipelineConfig } from '../config/index.js'
import type { ArticleRepository, KnowledgeGenerator } from '../knowledge/index.js'
import { planAssignment, reclassifyUncategorized } from '../patterns/index.js'
import type { AssignmentPlan, AssignmentRepository, PatternDetector, ReclassifiedCase } from '../patterns/index.js'
import { articleDocument, caseDocument } from '../vector/index.js'
import type { EmbeddingClient, VectorDocument, VectorStore } from '../vector/index.js'
import type { CursorRepository } from './cursor-repository.js'
import type { LockRepository } from './lock-repository.js'
import type { RunRepository } from './run-repository.js'
import { EMPTY_COUNTS } from './schemas.js'
import type {
  HealthCheckItem,
  HealthLevel,
  HealthReport,
  RunSyncOptions,
  SyncCounts,
  SyncStage,
  SyncStatus,
  SyncStatusReport,
  SyncSummary,
  SyncTrigger,
} from './schemas.js'
import { SyncStateMachine } from './state-machine.js'

export interface SyncOrchestratorDeps {
  db: Database.Database
  cases: CaseRepository
  assignments: AssignmentRepository
  articles: ArticleRepository
  cursor: CursorRepository
  runs: RunRepository
  lock: LockRepository
  detector: PatternDetector
  generator: KnowledgeGenerator
  store: VectorStore
  /** null disables vectorization; articles stay pending. */
  embedder: EmbeddingClient | null
  config: Pick<PipelineConfig, 'sync' | 'search' | 'ranking'>
  /** Lease owner id. Defaults to a random id per orchestrator. */
  owner?: string
  now?: () => Date
}

interface RunContext {
  runId: string | null
  trigger: SyncTrigger
  startedAt: Date
  counts: SyncCounts
  retries: number
  furthestStage: SyncStage
  signal: AbortSignal | undefined
}

interface StagedCase {
  case: Case
  plan: AssignmentPlan
}

interface CategorizedBatch {
  staged: StagedCase[]
  /** Earlier cases that left the uncategorized pool this run. */
  reclassified: ReclassifiedCase[]
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw CaseKBError.cancelled('Sync cancelled')
}

export class SyncOrchestrator {
  readonly machine = new SyncStateMachine()
  private readonly owner: string
  private readonly now: () => Date
  private active = false

  constructor(private deps: SyncOrchestratorDeps) {
    this.owner = deps.owner ?? `sync-${uuidv4()}`
    this.now = deps.now ?? (() => new Date())
  }

  get isActive(): boolean {
    return this.active
  }

  // ── Public API ──

  async runSync(options: RunSyncOptions = {}): Promise<SyncSummary> {
    const trigger = options.trigger ?? 'manual'
    const startedAt = this.now()

    // Checked and set before the first await so concurrent callers see it.
    if (this.active) {
      return this.rejectAttempt(trigger, startedAt, 'busy', 'A sync run is already in progress')
    }
    this.active = true

    try {
      if (!options.force) {
        const cooldown = this.cooldownUntil()
        if (cooldown && cooldown.getTime() > startedAt.getTime()) {
          return this.rejectAttempt(trigger, startedAt, 'skipped', `Cooling down after failures until ${cooldown.toISOString()}`)
        }
      }

      const acquired = this.deps.lock.tryAcquire(this.owner, this.deps.config.sync.lockTtlMs, startedAt)
      if (!acquired.ok) {
        return this.rejectAttempt(trigger, startedAt, 'failed', acquired.error.message)
      }
      if (!acquired.value) {
        return this.rejectAttempt(trigger, startedAt, 'busy', 'Another process holds the sync lease')
      }

      try {
        return await this.execute(trigger, startedAt, options.signal)
      } finally {
        const released = this.deps.lock.release(this.owner)
        if (!released.ok) console.error(`[sync] ${released.error.message}`)
      }
    } finally {
      this.active = false
    }
  }

  getStatus(): SyncStatusReport {
    const { runs, cursor, assignments, lock } = this.deps
    const lastRun = runs.lastExecuted()
    const streak = runs.failureStreak()
    const position = cursor.get()
    const pending = assignments.countUnprocessedByCategory()
    const lease = lock.current(this.now())
    const cooldown = this.cooldownUntil()

    return {
      stage: this.machine.current,
      active: this.active,
      lastRun: lastRun.ok ? lastRun.value : null,
      consecutiveFailures: streak.ok ? streak.value.count : 0,
      cooldownUntil: cooldown && cooldown.getTime() > this.now().getTime() ? cooldown.toISOString() : null,
      cursor: position.ok ? position.value : { timestamp: null, caseId: null },
      pendingByCategory: pending.ok ? pending.value : [],
      lease: lease.ok ? lease.value : null,
    }
  }

  async healthCheck(): Promise<HealthReport> {
    const { db, store, embedder, runs } = this.deps

    let database: HealthCheckItem
    try {
      db.prepare('SELECT 1').get()
      database = { ok: true, detail: 'reachable' }
    } catch (err) {
      database = { ok: false, detail: errorMessage(err) }
    }

    let vectorStore: HealthReport['checks']['vectorStore']
    try {
      const vectors = await store.count()
      vectorStore = { ok: true, detail: `${vectors} vectors`, vectors }
    } catch (err) {
      vectorStore = { ok: false, detail: errorMessage(err), vectors: null }
    }

    let embedderCheck: HealthCheckItem
    if (!embedder) {
      embedderCheck = { ok: false, detail: 'no embedding provider configured' }
    } else {
      try {
        const result = await embedder.embed(['health check'])
        const dims = result.embeddings[0]?.length ?? 0
        embedderCheck = dims > 0
          ? { ok: true, detail: `${embedder.modelName} (${dims} dimensions)` }
          : { ok: false, detail: `${embedder.modelName} returned an empty embedding` }
      } catch (err) {
        embedderCheck = { ok: false, detail: errorMessage(err) }
      }
    }

    const last = runs.lastExecuted()
    const lastStatus = last.ok && last.value ? last.value.status : null
    const lastRun = {
      ok: lastStatus === null || lastStatus === 'success' || lastStatus === 'running' || lastStatus === 'cancelled',
      detail: last.ok ? (last.value ? `${last.value.status} at ${last.value.startedAt}` : 'no runs yet') : last.error.message,
      status: lastStatus,
    }

    let status: HealthLevel = 'healthy'
    if (!database.ok || !vectorStore.ok) {
      status = 'unhealthy'
    } else if (!embedderCheck.ok || !lastRun.ok) {
      status = 'degraded'
    }

    return {
      status,
      checkedAt: this.now().toISOString(),
      checks: { database, vectorStore, embedder: embedderCheck, lastRun },
    }
  }

  /** End of the failure cooldown, or null when not cooling down. */
  cooldownUntil(): Date | null {
    const streak = this.deps.runs.failureStreak()
    if (!streak.ok || streak.value.count === 0 || !streak.value.lastFailureAt) return null
    const schedule = this.deps.config.sync.cooldownMs
    const delay = schedule[Math.min(streak.value.count - 1, schedule.length - 1)]
    return new Date(new Date(streak.value.lastFailureAt).getTime() + delay)
  }

  // ── Pipeline ──

  private async execute(trigger: SyncTrigger, startedAt: Date, signal: AbortSignal | undefined): Promise<SyncSummary> {
    const started = this.deps.runs.start(trigger, startedAt.toISOString())
    const ctx: RunContext = {
      runId: started.ok ? started.value.id : null,
      trigger,
      startedAt,
      counts: { ...EMPTY_COUNTS },
      retries: 0,
      furthestStage: 'IDLE',
      signal,
    }
    if (!started.ok) console.error(`[sync] ${started.error.message}`)
    if (ctx.runId) {
      const recovered = this.deps.runs.recoverInterrupted(ctx.runId, startedAt.toISOString())
      if (recovered.ok && recovered.value > 0) {
        console.log(`[sync] Marked ${recovered.value} interrupted runs as failed`)
      }
    }

    console.log(`[sync] Run ${ctx.runId ?? '(unrecorded)'} started (${trigger})`)

    try {
      this.enter('FETCHING', ctx)
      const fetched = await this.fetchStage(ctx)

      this.enter('CATEGORIZING', ctx)
      const batch = await this.categorizeStage(fetched, ctx)

      this.enter('GENERATING', ctx)
      this.generateStage(ctx)

      this.enter('VECTORIZING', ctx)
      await this.vectorizeStage(batch, ctx)

      const last = fetched[fetched.length - 1]
      let cursorAdvanced = false
      if (last) {
        unwrap(this.deps.cursor.advance({ timestamp: last.updatedAt, caseId: last.id }))
        cursorAdvanced = true
      }
      this.machine.transition('IDLE')

      return this.complete(ctx, 'success', null, null, cursorAdvanced)
    } catch (err) {
      const error = toCaseKBError(err, CaseKBError.io)
      const failedStage = this.machine.current

      if (error.code === 'CANCELLED') {
        this.machine.settle(false)
        console.log(`[sync] Run cancelled during ${failedStage}`)
        return this.complete(ctx, 'cancelled', null, error.message, false)
      }

      this.machine.settle(true)
      const { casesCategorized, articlesGenerated, vectorsWritten } = ctx.counts
      const status: SyncStatus = casesCategorized + articlesGenerated + vectorsWritten > 0 ? 'partial' : 'failed'
      console.error(`[sync] Run ${status} during ${failedStage}: ${error.message}`)
      return this.complete(ctx, status, failedStage, error.message, false)
    }
  }

  private enter(stage: SyncStage, ctx: RunContext): void {
    throwIfCancelled(ctx.signal)
    this.machine.transition(stage)
    ctx.furthestStage = stage
    if (ctx.runId) this.deps.runs.updateStage(ctx.runId, stage)
    const renewed = this.deps.lock.renew(this.owner, this.deps.config.sync.lockTtlMs, this.now())
    if (renewed.ok && !renewed.value) {
      throw CaseKBError.concurrency('Sync lease was taken over by another process')
    }
  }

  private retry<T>(label: string, fn: () => Promise<T>, ctx: RunContext): Promise<T> {
    return withRetry(fn, this.deps.config.sync.retry, {
      signal: ctx.signal,
      label,
      onRetry: () => {
        ctx.retries++
      },
    })
  }

  private async fetchStage(ctx: RunContext): Promise<FetchedCase[]> {
    const cursor = await this.retry('read cursor', async () => unwrap(this.deps.cursor.get()), ctx)
    const fetched = await this.retry(
      'fetch cases',
      async () => unwrap(this.deps.cases.fetchSince(cursor, this.deps.config.sync.batchSize)),
      ctx,
    )
    ctx.counts.casesFetched = fetched.length
    console.log(`[sync] Fetched ${fetched.length} cases since ${cursor.timestamp ?? 'the beginning'}`)
    return fetched
  }

  /**
   * Detect every valid case, staging assignments in memory. The whole batch
   * commits in one transaction after the last case.
   */
  private async categorizeStage(fetched: FetchedCase[], ctx: RunContext): Promise<CategorizedBatch> {
    const { cases, assignments, articles, detector, db } = this.deps

    const reclassified = unwrap(reclassifyUncategorized(cases, assignments, detector, this.now().toISOString()))
    if (reclassified.categorized > 0) {
      console.log(`[sync] ${reclassified.categorized} previously uncategorized cases now categorized`)
    }

    const staged: StagedCase[] = []
    const nowIso = this.now().toISOString()
    for (const entry of fetched) {
      throwIfCancelled(ctx.signal)
      if (!entry.result.ok) {
        ctx.counts.casesSkipped++
        console.warn(`[sync] Skipping invalid case ${entry.id}: ${entry.result.error.message}`)
        continue
      }

      const c = entry.result.value
      const prior = await this.retry(`load assignment ${c.id}`, async () => unwrap(assignments.get(c.id)), ctx)
      const plan = planAssignment(c, detector.detect(c), prior, detector.fingerprint, nowIso)
      staged.push({ case: c, plan })
      ctx.counts.casesCategorized++
      if (plan.assignment.category === null) ctx.counts.casesUncategorized++
    }

    throwIfCancelled(ctx.signal)
    const staleIds = [...new Set(staged.map((s) => s.plan.staleArticleId).filter((id): id is string => id !== null))]

    await this.retry('commit assignments', async () => {
      db.transaction(() => {
        unwrap(assignments.saveMany(staged.filter((s) => s.plan.changed).map((s) => s.plan.assignment)))
        for (const s of staged) {
          if (s.plan.detachFromArticle && s.plan.staleArticleId) {
            unwrap(articles.detachCase(s.plan.staleArticleId, s.case.id))
          }
        }
        ctx.counts.articlesStale = unwrap(articles.markStale(staleIds, nowIso))
      })()
    }, ctx)

    if (ctx.counts.articlesStale > 0) {
      console.log(`[sync] Marked ${ctx.counts.articlesStale} articles stale`)
    }
    return { staged, reclassified: reclassified.recategorized }
  }

  private generateStage(ctx: RunContext): void {
    const result = unwrap(this.deps.generator.generateEligible(ctx.signal))
    ctx.counts.articlesGenerated = result.articles.length
    if (result.conflicts > 0) {
      console.warn(`[sync] ${result.conflicts} generation conflicts rejected`)
    }
  }

  /**
   * Embed and upsert the batch's cases, reclassified cases, every pending
   * article and any article that went stale this run, through a bounded pool.
   */
  private async vectorizeStage({ staged, reclassified }: CategorizedBatch, ctx: RunContext): Promise<void> {
    const { embedder, store, articles, config } = this.deps
    if (!embedder) {
      console.warn('[sync] No embedding provider configured; skipping vectorization')
      return
    }

    const pending = unwrap(articles.listPending())
    const stale = unwrap(articles.list({ vectorStatus: 'stale' }))
      .filter((a) => staged.some((s) => s.plan.staleArticleId === a.id))

    const stagedIds = new Set(staged.map((s) => s.case.id))
    const documents: VectorDocument[] = [
      ...staged.map((s) => caseDocument(s.case, s.plan.assignment.category, config.ranking.resolutionQuality, config.search.previewChars)),
      ...reclassified
        .filter((r) => !stagedIds.has(r.case.id))
        .map((r) => caseDocument(r.case, r.category, config.ranking.resolutionQuality, config.search.previewChars)),
      ...[...pending, ...stale].map((a) => articleDocument(a, config.search.previewChars)),
    ]

    await mapWithConcurrency(documents, config.sync.concurrency, async (doc) => {
      throwIfCancelled(ctx.signal)
      const vector = await this.retry(`embed ${doc.metadata.type} ${doc.id}`, async () => {
        try {
          const result = await embedder.embed([doc.text], ctx.signal)
          const embedding = result.embeddings[0]
          if (!embedding || embedding.length === 0) throw CaseKBError.embedding(`Empty embedding for ${doc.id}`)
          return embedding
        } catch (err) {
          throw toCaseKBError(err, CaseKBError.embedding)
        }
      }, ctx)
      await this.retry(`upsert vector ${doc.id}`, () => store.upsert(doc.id, vector, doc.metadata), ctx)
      ctx.counts.vectorsWritten++
    })

    unwrap(articles.markVectorized(pending.map((a) => a.id), this.now().toISOString()))
    console.log(`[sync] Wrote ${ctx.counts.vectorsWritten} vectors`)
  }

  // ── Outcomes ──

  private complete(
    ctx: RunContext,
    status: SyncStatus,
    failedStage: SyncStage | null,
    error: string | null,
    cursorAdvanced: boolean,
  ): SyncSummary {
    const completedAt = this.now()
    const summary: SyncSummary = {
      runId: ctx.runId,
      trigger: ctx.trigger,
      status,
      stage: ctx.furthestStage,
      failedStage,
      error,
      retries: ctx.retries,
      cursorAdvanced,
      ...ctx.counts,
      startedAt: ctx.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - ctx.startedAt.getTime(),
    }

    if (ctx.runId) {
      const finished = this.deps.runs.finish(ctx.runId, summary)
      if (!finished.ok) console.error(`[sync] ${finished.error.message}`)
    }
    if (status === 'success') {
      console.log(
        `[sync] Run complete: ${summary.casesFetched} fetched, ${summary.casesCategorized} categorized, ` +
        `${summary.articlesGenerated} articles, ${summary.vectorsWritten} vectors in ${summary.durationMs}ms`,
      )
    }
    return summary
  }

  private rejectAttempt(trigger: SyncTrigger, at: Date, status: 'busy' | 'skipped' | 'failed', reason: string): SyncSummary {
    let runId: string | null = null
    if (status !== 'failed') {
      const recorded = this.deps.runs.recordAttempt(trigger, status, reason, at.toISOString())
      if (recorded.ok) runId = recorded.value
    }
    console.log(`[sync] ${status}: ${reason}`)
    return {
      runId,
      trigger,
      status,
      stage: 'IDLE',
      failedStage: null,
      error: reason,
      retries: 0,
      cursorAdvanced: false,
      ...EMPTY_COUNTS,
      startedAt: at.toISOString(),
      completedAt: at.toISOString(),
      durationMs: 0,
    }
  }
}
