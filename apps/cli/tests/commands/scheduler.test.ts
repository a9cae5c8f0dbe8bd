import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createHarness } from '../harness.js'
import type { CliHarness } from '../harness.js'

describe('scheduler command', () => {
  let h: CliHarness

  beforeEach(() => {
    h = createHarness({ shutdownImmediately: true })
  })

  afterEach(() => {
    h.close()
  })

  it('starts on the given schedule and stops on shutdown', async () => {
    await h.run(['scheduler', '--cron', '0 9 * * *'])

    expect(h.stdout[0]).toMatch(/^Scheduler running: Every day at 09:00\. Next run \d{4}-\d{2}-\d{2}T[\d:.]+Z\.$/)
    expect(h.stdout[1]).toBe('Scheduler stopped.')
    expect(h.exitCodes).toEqual([])
  })

  it('falls back to the configured schedule', async () => {
    await h.run(['scheduler'])

    expect(h.stdout[0]?.startsWith('Scheduler running: Every 30 minutes.')).toBe(true)
  })

  it('rejects an invalid cron expression', async () => {
    await h.run(['scheduler', '--cron', '61 * * * *'])

    expect(h.exitCodes).toEqual([3])
    expect(h.stderr[0]?.startsWith('error: Invalid sync schedule "61 * * * *":')).toBe(true)
  })
})
