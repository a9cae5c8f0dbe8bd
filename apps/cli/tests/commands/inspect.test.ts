import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createHarness, memoryCase } from '../harness.js'
import type { CliHarness } from '../harness.js'

describe('inspection commands', () => {
  let h: CliHarness

  beforeEach(async () => {
    h = createHarness()
    const file = h.writeFixture('cases.json', [1, 2, 3, 4, 5].map(memoryCase))
    await h.run(['ingest', file])
    await h.run(['sync'])
    h.stdout.length = 0
  })

  afterEach(() => {
    h.close()
  })

  describe('articles', () => {
    it('lists generated articles as JSON', async () => {
      await h.run(['articles', '--json'])

      const { articles } = JSON.parse(h.stdout.join('\n'))
      expect(articles).toHaveLength(1)
      expect(articles[0].category).toBe('memory_issues')
      expect(articles[0].vectorStatus).toBe('pending')
      expect([...articles[0].caseIds].sort()).toEqual(['mem-1', 'mem-2', 'mem-3', 'mem-4', 'mem-5'])
    })

    it('prints one article as markdown', async () => {
      const listed = h.runtime.articles.list()
      if (!listed.ok) throw listed.error
      const [article] = listed.value

      await h.run(['articles', article?.id ?? 'missing'])

      expect(h.stdout[0]).toBe('# Memory (DIMM) Troubleshooting and Replacement Guide (Based on 5 Cases)')
    })

    it('finds no stale articles', async () => {
      await h.run(['articles', '--stale'])

      expect(h.stdout).toEqual(['No articles found.'])
    })

    it('reports an unknown article id', async () => {
      await h.run(['articles', 'no-such-article'])

      expect(h.exitCodes).toEqual([1])
      expect(h.stderr[0]?.endsWith('(NOT_FOUND)')).toBe(true)
    })
  })

  describe('status', () => {
    it('shows the cursor and the recorded run', async () => {
      await h.run(['status'])

      expect(h.stdout.slice(0, 4)).toEqual([
        'Stage: IDLE',
        'Cursor: 2026-02-05T09:00:00.000Z / mem-5',
        'Consecutive failures: 0',
        '',
      ])
      expect(h.stdout[4]).toMatch(/^started\s+trigger\s+status\s+stage\s+fetched\s+generated\s+vectors$/)
      expect(h.stdout[5]).toMatch(/^2026-03-01T12:00:00\.000Z\s+manual\s+success\s+VECTORIZING\s+5\s+1\s+0$/)
    })

    it('prints status and runs as JSON', async () => {
      await h.run(['status', '--json'])

      const { status, runs } = JSON.parse(h.stdout.join('\n'))
      expect(status.active).toBe(false)
      expect(status.consecutiveFailures).toBe(0)
      expect(runs).toHaveLength(1)
      expect(runs[0].status).toBe('success')
    })
  })

  describe('health', () => {
    it('reports degraded without an embedding provider', async () => {
      await h.run(['health'])

      expect(h.stdout).toEqual([
        'Status: degraded',
        '  ok   database      reachable',
        '  ok   vector store  0 vectors',
        '  FAIL embedder      no embedding provider configured',
        '  ok   last run      success at 2026-03-01T12:00:00.000Z',
      ])
      expect(h.exitCodes).toEqual([])
    })
  })
})
