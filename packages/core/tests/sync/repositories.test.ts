import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { CursorRepository, EMPTY_COUNTS, LockRepository, RunRepository, isBefore } from '../../src/sync/index.js'
import type { SyncSummary } from '../../src/sync/index.js'

let db: Database.Database

beforeEach(() => {
  db = openDatabase(':memory:')
})

describe('CursorRepository', () => {
  it('starts empty and only moves forward', () => {
    const cursor = new CursorRepository(db)
    expect(cursor.get()).toEqual({ ok: true, value: { timestamp: null, caseId: null } })

    expect(cursor.advance({ timestamp: '2026-02-01T00:00:00.000Z', caseId: 'c-2' }).ok).toBe(true)
    const backwards = cursor.advance({ timestamp: '2026-02-01T00:00:00.000Z', caseId: 'c-1' })
    expect(!backwards.ok && backwards.error.code).toBe('VALIDATION_ERROR')
    expect(cursor.get()).toEqual({ ok: true, value: { timestamp: '2026-02-01T00:00:00.000Z', caseId: 'c-2' } })

    expect(cursor.reset()).toEqual({ ok: true, value: { timestamp: null, caseId: null } })
  })

  it('orders cursors by timestamp then case id', () => {
    const empty = { timestamp: null, caseId: null }
    const a = { timestamp: '2026-02-01T00:00:00.000Z', caseId: 'c-1' }
    const b = { timestamp: '2026-02-01T00:00:00.000Z', caseId: 'c-2' }
    const c = { timestamp: '2026-02-02T00:00:00.000Z', caseId: 'c-0' }
    expect(isBefore(empty, a)).toBe(true)
    expect(isBefore(a, empty)).toBe(false)
    expect(isBefore(a, b)).toBe(true)
    expect(isBefore(b, c)).toBe(true)
    expect(isBefore(b, b)).toBe(false)
  })
})

describe('LockRepository', () => {
  const t0 = new Date('2026-03-01T12:00:00.000Z')
  const later = (ms: number) => new Date(t0.getTime() + ms)

  it('grants the lease to one owner at a time', () => {
    const lock = new LockRepository(db)
    expect(lock.tryAcquire('a', 1_000, t0)).toEqual({ ok: true, value: true })
    expect(lock.tryAcquire('b', 1_000, t0)).toEqual({ ok: true, value: false })
    expect(lock.tryAcquire('a', 1_000, t0)).toEqual({ ok: true, value: true })
    expect(lock.current(t0)).toEqual({
      ok: true,
      value: { owner: 'a', acquiredAt: '2026-03-01T12:00:00.000Z', expiresAt: '2026-03-01T12:00:01.000Z' },
    })
  })

  it('lets another owner take over an expired lease', () => {
    const lock = new LockRepository(db)
    lock.tryAcquire('a', 1_000, t0)
    expect(lock.current(later(1_000))).toEqual({ ok: true, value: null })
    expect(lock.tryAcquire('b', 1_000, later(1_000))).toEqual({ ok: true, value: true })
    expect(lock.renew('a', 1_000, later(1_000))).toEqual({ ok: true, value: false })
  })

  it('renews and releases only for the owner', () => {
    const lock = new LockRepository(db)
    lock.tryAcquire('a', 1_000, t0)
    expect(lock.renew('a', 5_000, later(500))).toEqual({ ok: true, value: true })
    expect(lock.current(later(2_000))).toMatchObject({ ok: true, value: { owner: 'a' } })
    expect(lock.release('b')).toEqual({ ok: true, value: false })
    expect(lock.release('a')).toEqual({ ok: true, value: true })
    expect(lock.tryAcquire('b', 1_000, later(600))).toEqual({ ok: true, value: true })
  })
})

describe('RunRepository', () => {
  function summary(status: SyncSummary['status'], overrides: Partial<SyncSummary> = {}): SyncSummary {
    return {
      runId: null,
      trigger: 'manual',
      status,
      stage: 'VECTORIZING',
      failedStage: null,
      error: null,
      retries: 0,
      cursorAdvanced: status === 'success',
      ...EMPTY_COUNTS,
      startedAt: '2026-03-01T12:00:00.000Z',
      completedAt: '2026-03-01T12:00:05.000Z',
      durationMs: 5_000,
      ...overrides,
    }
  }

  function recordRun(runs: RunRepository, status: SyncSummary['status'], startedAt: string): string {
    const started = runs.start('manual', startedAt)
    if (!started.ok) throw started.error
    runs.finish(started.value.id, summary(status, { startedAt, completedAt: startedAt }))
    return started.value.id
  }

  it('records a run from start to finish', () => {
    const runs = new RunRepository(db)
    const started = runs.start('schedule', '2026-03-01T12:00:00.000Z')
    if (!started.ok) throw started.error
    expect(started.value.status).toBe('running')

    runs.updateStage(started.value.id, 'CATEGORIZING')
    expect(runs.get(started.value.id)).toMatchObject({ ok: true, value: { stage: 'CATEGORIZING' } })

    runs.finish(started.value.id, summary('success', { casesFetched: 5, articlesGenerated: 1 }))
    const finished = runs.get(started.value.id)
    if (!finished.ok) throw finished.error
    expect(finished.value).toMatchObject({
      trigger: 'schedule',
      status: 'success',
      stage: 'VECTORIZING',
      casesFetched: 5,
      articlesGenerated: 1,
      cursorAdvanced: true,
      completedAt: '2026-03-01T12:00:05.000Z',
    })
  })

  it('excludes rejected attempts from the last executed run', () => {
    const runs = new RunRepository(db)
    const executed = recordRun(runs, 'success', '2026-03-01T10:00:00.000Z')
    runs.recordAttempt('schedule', 'busy', 'already running', '2026-03-01T11:00:00.000Z')

    const last = runs.lastExecuted()
    expect(last.ok && last.value?.id).toBe(executed)
    const all = runs.list()
    expect(all.ok && all.value.map((r) => r.status)).toEqual(['busy', 'success'])
  })

  it('counts failures since the last success, ignoring neutral outcomes', () => {
    const runs = new RunRepository(db)
    recordRun(runs, 'failed', '2026-03-01T08:00:00.000Z')
    recordRun(runs, 'success', '2026-03-01T09:00:00.000Z')
    recordRun(runs, 'failed', '2026-03-01T10:00:00.000Z')
    recordRun(runs, 'cancelled', '2026-03-01T10:30:00.000Z')
    recordRun(runs, 'partial', '2026-03-01T11:00:00.000Z')
    runs.recordAttempt('manual', 'skipped', 'cooling down', '2026-03-01T11:30:00.000Z')

    expect(runs.failureStreak()).toEqual({ ok: true, value: { count: 2, lastFailureAt: '2026-03-01T11:00:00.000Z' } })
  })

  it('marks runs left running as failed', () => {
    const runs = new RunRepository(db)
    const stale = runs.start('manual', '2026-03-01T10:00:00.000Z')
    const current = runs.start('manual', '2026-03-01T11:00:00.000Z')
    if (!stale.ok || !current.ok) throw new Error('start failed')

    expect(runs.recoverInterrupted(current.value.id, '2026-03-01T11:00:00.000Z')).toEqual({ ok: true, value: 1 })
    const recovered = runs.get(stale.value.id)
    expect(recovered.ok && recovered.value.status).toBe('failed')
    expect(recovered.ok && recovered.value.error).toBe('Interrupted before completion')
  })
})
