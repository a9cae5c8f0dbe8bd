/**
 * Cron-driven sync trigger. Ticks once a minute and fires at most once per
 * matching minute; overlapping runs come back as `busy` from the orchestrator.
 */

import { CaseKBError } from '../common/index.js'
import { describeCron, matchesCron, minuteKey, nextCronMatch, validateCron } from './cron.js'
import type { SyncSummary } from './schemas.js'
import type { SyncOrchestrator } from './orchestrator.js'

const TICK_INTERVAL_MS = 60_000

export interface SyncSchedulerOptions {
  cron: string
  tickIntervalMs?: number
  now?: () => Date
  onRun?: (summary: SyncSummary) => void
}

export class SyncScheduler {
  private timer: ReturnType<typeof setInterval> | null = null
  private lastFiredMinute: string | null = null
  private inFlight: Promise<SyncSummary> | null = null
  private abort: AbortController | null = null
  private readonly now: () => Date

  constructor(
    private orchestrator: Pick<SyncOrchestrator, 'runSync'>,
    private options: SyncSchedulerOptions,
  ) {
    const invalid = validateCron(options.cron)
    if (invalid) throw CaseKBError.config(`Invalid sync schedule "${options.cron}": ${invalid}`)
    this.now = options.now ?? (() => new Date())
  }

  get running(): boolean {
    return this.timer !== null
  }

  get nextRunAt(): Date | null {
    return nextCronMatch(this.options.cron, this.now())
  }

  start(): void {
    if (this.timer) return
    this.abort = new AbortController()
    this.timer = setInterval(() => {
      this.tick()
    }, this.options.tickIntervalMs ?? TICK_INTERVAL_MS)
    console.log(`[scheduler] Started: ${describeCron(this.options.cron)}`)
  }

  /**
   * Fire a run if the current minute matches and has not fired yet.
   * Returns the run promise when one was started.
   */
  tick(): Promise<SyncSummary> | null {
    const now = this.now()
    const key = minuteKey(now)
    if (this.lastFiredMinute === key || !matchesCron(this.options.cron, now)) return null
    this.lastFiredMinute = key

    const run = this.orchestrator
      .runSync({ trigger: 'schedule', signal: this.abort?.signal })
      .then((summary) => {
        if (summary.status === 'busy' || summary.status === 'skipped') {
          console.log(`[scheduler] Scheduled run ${summary.status}: ${summary.error ?? ''}`)
        } else if (summary.status !== 'success') {
          console.warn(`[scheduler] Scheduled run ${summary.status}: ${summary.error ?? ''}`)
        }
        this.options.onRun?.(summary)
        return summary
      })
      .finally(() => {
        if (this.inFlight === run) this.inFlight = null
      })

    this.inFlight = run
    run.catch((err: unknown) => {
      console.error('[scheduler] Scheduled run error:', err)
    })
    return run
  }

  /** Clear the timer; with `cancel`, abort the in-flight run. Waits for it either way. */
  async stop(options: { cancel?: boolean } = {}): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (options.cancel) this.abort?.abort()

    const pending = this.inFlight
    if (pending) {
      await pending.catch(() => undefined)
    }
    this.abort = null
    this.lastFiredMinute = null
    console.log('[scheduler] Stopped')
  }
}
