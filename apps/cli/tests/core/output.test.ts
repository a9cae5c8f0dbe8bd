import { describe, expect, it } from 'vitest'
import { CaseKBError } from '@casekb/core'
import { EXIT_CODES, exitCodeFor } from '../../src/core/errors.js'
import { parsePositiveInt, parseRatio } from '../../src/core/options.js'
import { createOutputFormatter, renderTable } from '../../src/core/output.js'

describe('renderTable', () => {
  it('pads columns to the widest cell', () => {
    expect(renderTable([
      { id: 'a', count: 12 },
      { id: 'long-id', count: 3 },
    ])).toEqual([
      'id       count',
      'a        12',
      'long-id  3',
    ])
  })

  it('uses explicit column labels', () => {
    expect(renderTable([{ id: 'x', note: null }], [{ key: 'id', label: 'ID' }, 'note'])).toEqual([
      'ID  note',
      'x',
    ])
  })

  it('renders nothing for no rows and no columns', () => {
    expect(renderTable([])).toEqual([])
  })
})

describe('createOutputFormatter', () => {
  it('writes data as JSON and errors to stderr', () => {
    const out: string[] = []
    const err: string[] = []
    const output = createOutputFormatter({
      stdout: { write: (chunk: string) => out.push(chunk) },
      stderr: { write: (chunk: string) => err.push(chunk) },
    })

    output.data({ ok: true })
    output.data('plain')
    output.error('boom')

    expect(out).toEqual(['{\n  "ok": true\n}\n', 'plain\n'])
    expect(err).toEqual(['error: boom\n'])
  })
})

describe('exitCodeFor', () => {
  it('maps error codes to exit codes', () => {
    expect(exitCodeFor(CaseKBError.validation('bad'))).toBe(EXIT_CODES.usage)
    expect(exitCodeFor(CaseKBError.config('bad'))).toBe(EXIT_CODES.config)
    expect(exitCodeFor(CaseKBError.db('bad'))).toBe(EXIT_CODES.error)
  })
})

describe('option parsers', () => {
  it('parses positive integers only', () => {
    expect(parsePositiveInt('25')).toBe(25)
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.')
    expect(() => parsePositiveInt('abc')).toThrow('Expected a positive integer.')
  })

  it('parses ratios between 0 and 1', () => {
    expect(parseRatio('0.75')).toBe(0.75)
    expect(() => parseRatio('1.5')).toThrow('Expected a number between 0 and 1.')
    expect(() => parseRatio('')).toThrow('Expected a number between 0 and 1.')
  })
})
