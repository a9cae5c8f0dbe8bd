import { Command } from 'commander'
import { describe, expect, it } from 'vitest'
import { registerSearchCommand } from '../src/commands/search.js'
import { createOutputFormatter } from '../src/core/output.js'
import type { CliDeps } from '../src/core/context.js'
import { createProgram } from '../src/program.js'
import { throwOnExit } from './harness.js'

const noopDeps: CliDeps = {
  openRuntime: async () => {
    throw new Error('not used')
  },
  output: createOutputFormatter({ stdout: { write: () => true }, stderr: { write: () => true } }),
  onShutdown: () => () => undefined,
  setExitCode: () => undefined,
}

describe('casekb program', () => {
  it('registers every command', () => {
    const program = createProgram(noopDeps)
    expect(program.commands.map((cmd) => cmd.name())).toEqual([
      'ingest',
      'sync',
      'scheduler',
      'search',
      'suggest',
      'articles',
      'status',
      'health',
    ])
  })

  it('declares global config and database options', () => {
    const program = createProgram(noopDeps)
    const longs = program.options.map((opt) => opt.long)
    expect(longs).toContain('--config')
    expect(longs).toContain('--db')
  })

  it('registers search with its filters', () => {
    const program = new Command()
    program.exitOverride()
    registerSearchCommand(program, noopDeps)

    const command = program.commands.find((cmd) => cmd.name() === 'search')
    expect(command).toBeDefined()
    const longs = command?.options.map((opt) => opt.long)
    expect(longs).toEqual([
      '--type',
      '--result-type',
      '--limit',
      '--status',
      '--category',
      '--product',
      '--threshold',
      '--json',
    ])
  })

  it('rejects an unknown search type before opening the runtime', async () => {
    const program = throwOnExit(createProgram(noopDeps))

    await expect(program.parseAsync(['node', 'casekb', 'search', 'disk', '--type', 'fuzzy'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    })
  })

  it('rejects a non-integer limit', async () => {
    const program = throwOnExit(createProgram(noopDeps))

    await expect(program.parseAsync(['node', 'casekb', 'status', '--limit', '2.5'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    })
  })
})
