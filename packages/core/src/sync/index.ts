/**
 * Sync: cursor, run history, lease, state machine, orchestrator and scheduler.
 */

export type {
  SyncStage,
  SyncTrigger,
  SyncStatus,
  SyncRunStatus,
  SyncCounts,
  SyncSummary,
  SyncRun,
  FailureStreak,
  SyncLease,
  RunSyncOptions,
  SyncStatusReport,
  HealthLevel,
  HealthCheckItem,
  HealthReport,
} from './schemas.js'
export { EMPTY_COUNTS } from './schemas.js'
export { parseCron, validateCron, matchesCron, nextCronMatch, describeCron, minuteKey } from './cron.js'
export type { CronSchedule } from './cron.js'
export { SyncStateMachine, IllegalTransitionError, canTransition, isActiveStage } from './state-machine.js'
export { CursorRepository, isBefore } from './cursor-repository.js'
export { RunRepository } from './run-repository.js'
export { LockRepository } from './lock-repository.js'
export { SyncOrchestrator } from './orchestrator.js'
export type { SyncOrchestratorDeps } from './orchestrator.js'
export { SyncScheduler } from './scheduler.js'
export type { SyncSchedulerOptions } from './scheduler.js'
