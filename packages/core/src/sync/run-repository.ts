/**
 * Sync run history.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import { EMPTY_COUNTS } from './schemas.js'
import type { FailureStreak, SyncRun, SyncRunStatus, SyncStage, SyncSummary, SyncTrigger } from './schemas.js'

interface SyncRunRow {
  id: string
  trigger_type: string
  status: string
  stage: string
  failed_stage: string | null
  cases_fetched: number
  cases_categorized: number
  cases_skipped: number
  cases_uncategorized: number
  articles_generated: number
  articles_stale: number
  vectors_written: number
  retries: number
  cursor_advanced: number
  error: string | null
  started_at: string
  completed_at: string | null
}

const STAGES: readonly SyncStage[] = ['IDLE', 'FETCHING', 'CATEGORIZING', 'GENERATING', 'VECTORIZING', 'ERROR']
const RUN_STATUSES: readonly SyncRunStatus[] = ['running', 'success', 'partial', 'failed', 'busy', 'cancelled', 'skipped']

function toStage(value: string | null): SyncStage | null {
  return STAGES.find((s) => s === value) ?? null
}

function rowToRun(row: SyncRunRow): SyncRun {
  return {
    id: row.id,
    trigger: row.trigger_type === 'schedule' ? 'schedule' : 'manual',
    status: RUN_STATUSES.find((s) => s === row.status) ?? 'failed',
    stage: toStage(row.stage) ?? 'IDLE',
    failedStage: toStage(row.failed_stage),
    casesFetched: row.cases_fetched,
    casesCategorized: row.cases_categorized,
    casesSkipped: row.cases_skipped,
    casesUncategorized: row.cases_uncategorized,
    articlesGenerated: row.articles_generated,
    articlesStale: row.articles_stale,
    vectorsWritten: row.vectors_written,
    retries: row.retries,
    cursorAdvanced: row.cursor_advanced === 1,
    error: row.error,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  }
}

/** Statuses that neither extend nor break a failure streak. */
const STREAK_NEUTRAL = new Set<string>(['busy', 'skipped', 'cancelled', 'running'])

export class RunRepository {
  constructor(private db: Database.Database) {}

  start(trigger: SyncTrigger, startedAt: string): Result<SyncRun, CaseKBError> {
    const run: SyncRun = {
      id: uuidv4(),
      trigger,
      status: 'running',
      stage: 'IDLE',
      failedStage: null,
      ...EMPTY_COUNTS,
      retries: 0,
      cursorAdvanced: false,
      error: null,
      startedAt,
      completedAt: null,
    }
    try {
      this.db.prepare(`
        INSERT INTO sync_runs (id, trigger_type, status, stage, started_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(run.id, run.trigger, run.status, run.stage, run.startedAt)
      return Ok(run)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to record sync run: ${errorMessage(err)}`))
    }
  }

  updateStage(id: string, stage: SyncStage): Result<void, CaseKBError> {
    try {
      this.db.prepare("UPDATE sync_runs SET stage = ? WHERE id = ? AND status = 'running'").run(stage, id)
      return Ok(undefined)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to update sync run stage: ${errorMessage(err)}`))
    }
  }

  finish(id: string, summary: SyncSummary): Result<void, CaseKBError> {
    try {
      this.db.prepare(`
        UPDATE sync_runs SET
          status = ?, stage = ?, failed_stage = ?,
          cases_fetched = ?, cases_categorized = ?, cases_skipped = ?, cases_uncategorized = ?,
          articles_generated = ?, articles_stale = ?, vectors_written = ?,
          retries = ?, cursor_advanced = ?, error = ?, completed_at = ?
        WHERE id = ?
      `).run(
        summary.status,
        summary.stage,
        summary.failedStage,
        summary.casesFetched,
        summary.casesCategorized,
        summary.casesSkipped,
        summary.casesUncategorized,
        summary.articlesGenerated,
        summary.articlesStale,
        summary.vectorsWritten,
        summary.retries,
        summary.cursorAdvanced ? 1 : 0,
        summary.error,
        summary.completedAt,
        id,
      )
      return Ok(undefined)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to finish sync run: ${errorMessage(err)}`))
    }
  }

  /** Record an attempt that never started (busy or skipped) as a completed row. */
  recordAttempt(trigger: SyncTrigger, status: 'busy' | 'skipped', error: string, at: string): Result<string, CaseKBError> {
    try {
      const id = uuidv4()
      this.db.prepare(`
        INSERT INTO sync_runs (id, trigger_type, status, stage, error, started_at, completed_at)
        VALUES (?, ?, ?, 'IDLE', ?, ?, ?)
      `).run(id, trigger, status, error, at, at)
      return Ok(id)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to record sync attempt: ${errorMessage(err)}`))
    }
  }

  list(limit = 20): Result<SyncRun[], CaseKBError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM sync_runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
        .all(limit) as SyncRunRow[]
      return Ok(rows.map(rowToRun))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to list sync runs: ${errorMessage(err)}`))
    }
  }

  get(id: string): Result<SyncRun, CaseKBError> {
    try {
      const row = this.db.prepare('SELECT * FROM sync_runs WHERE id = ?').get(id) as SyncRunRow | undefined
      if (!row) return Err(CaseKBError.notFound('Sync run', id))
      return Ok(rowToRun(row))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to get sync run ${id}: ${errorMessage(err)}`))
    }
  }

  /** Most recent run that actually executed the pipeline. */
  lastExecuted(): Result<SyncRun | null, CaseKBError> {
    try {
      const row = this.db.prepare(`
        SELECT * FROM sync_runs WHERE status NOT IN ('busy', 'skipped')
        ORDER BY started_at DESC, rowid DESC LIMIT 1
      `).get() as SyncRunRow | undefined
      return Ok(row ? rowToRun(row) : null)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to read last sync run: ${errorMessage(err)}`))
    }
  }

  /** Failed or partial runs since the last success. */
  failureStreak(): Result<FailureStreak, CaseKBError> {
    try {
      const rows = this.db.prepare(`
        SELECT status, completed_at FROM sync_runs
        ORDER BY started_at DESC, rowid DESC
        LIMIT 200
      `).all() as Array<{ status: string; completed_at: string | null }>

      let count = 0
      let lastFailureAt: string | null = null
      for (const row of rows) {
        if (STREAK_NEUTRAL.has(row.status)) continue
        if (row.status === 'success') break
        count++
        if (lastFailureAt === null) lastFailureAt = row.completed_at
      }
      return Ok({ count, lastFailureAt })
    } catch (err) {
      return Err(CaseKBError.db(`Failed to compute failure streak: ${errorMessage(err)}`))
    }
  }

  /** Mark runs left 'running' by a dead process as failed. Call while holding the lock. */
  recoverInterrupted(exceptId: string, at: string): Result<number, CaseKBError> {
    try {
      const result = this.db.prepare(`
        UPDATE sync_runs SET status = 'failed', error = 'Interrupted before completion', completed_at = ?
        WHERE status = 'running' AND id != ?
      `).run(at, exceptId)
      return Ok(result.changes)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to recover interrupted runs: ${errorMessage(err)}`))
    }
  }
}
