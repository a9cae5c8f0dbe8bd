import type { CaseCursor } from '../cases/index.js'
import type { CategoryCount } from '../patterns/index.js'

export type SyncStage = 'IDLE' | 'FETCHING' | 'CATEGORIZING' | 'GENERATING' | 'VECTORIZING' | 'ERROR'

export type SyncTrigger = 'manual' | 'schedule'

export type SyncStatus = 'success' | 'partial' | 'failed' | 'busy' | 'cancelled' | 'skipped'

export type SyncRunStatus = SyncStatus | 'running'

export interface SyncCounts {
  casesFetched: number
  casesCategorized: number
  casesSkipped: number
  casesUncategorized: number
  articlesGenerated: number
  articlesStale: number
  vectorsWritten: number
}

export interface SyncSummary extends SyncCounts {
  /** null when the attempt could not be recorded. */
  runId: string | null
  trigger: SyncTrigger
  status: SyncStatus
  /** Furthest stage the run entered. */
  stage: SyncStage
  failedStage: SyncStage | null
  error: string | null
  retries: number
  cursorAdvanced: boolean
  startedAt: string
  completedAt: string
  durationMs: number
}

export interface SyncRun extends SyncCounts {
  id: string
  trigger: SyncTrigger
  status: SyncRunStatus
  stage: SyncStage
  failedStage: SyncStage | null
  retries: number
  cursorAdvanced: boolean
  error: string | null
  startedAt: string
  completedAt: string | null
}

export interface FailureStreak {
  count: number
  lastFailureAt: string | null
}

export interface SyncLease {
  owner: string
  acquiredAt: string
  expiresAt: string
}

export interface RunSyncOptions {
  /** Bypass the failure cooldown. Never bypasses the lock. */
  force?: boolean
  signal?: AbortSignal
  trigger?: SyncTrigger
}

export interface SyncStatusReport {
  stage: SyncStage
  active: boolean
  lastRun: SyncRun | null
  consecutiveFailures: number
  cooldownUntil: string | null
  cursor: CaseCursor
  pendingByCategory: CategoryCount[]
  lease: SyncLease | null
}

export type HealthLevel = 'healthy' | 'degraded' | 'unhealthy'

export interface HealthCheckItem {
  ok: boolean
  detail: string
}

export interface HealthReport {
  status: HealthLevel
  checkedAt: string
  checks: {
    database: HealthCheckItem
    vectorStore: HealthCheckItem & { vectors: number | null }
    embedder: HealthCheckItem
    lastRun: HealthCheckItem & { status: SyncRunStatus | null }
  }
}

export const EMPTY_COUNTS: Readonly<SyncCounts> = Object.freeze({
  casesFetched: 0,
  casesCategorized: 0,
  casesSkipped: 0,
  casesUncategorized: 0,
  articlesGenerated: 0,
  articlesStale: 0,
  vectorsWritten: 0,
})
