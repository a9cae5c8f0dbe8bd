import type { Command } from 'commander'
import { unwrap } from '@casekb/core'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { formatStatus, runRows } from '../core/format.js'
import { parsePositiveInt } from '../core/options.js'

interface StatusCommandOptions {
  limit: number
  json?: boolean
}

export function registerStatusCommand(program: Command, deps: CliDeps): void {
  program
    .command('status')
    .description('Show the sync cursor, cooldown and recent runs')
    .option('-n, --limit <n>', 'Number of recent runs to list', parsePositiveInt, 10)
    .option('--json', 'Output as JSON')
    .action(async (options: StatusCommandOptions, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: false }, (runtime) => {
        const status = runtime.orchestrator.getStatus()
        const runs = unwrap(runtime.runs.list(options.limit))
        if (options.json) {
          deps.output.data({ status, runs })
          return
        }
        for (const line of formatStatus(status)) deps.output.message(line)
        if (runs.length === 0) {
          deps.output.message('No sync runs recorded.')
          return
        }
        deps.output.message('')
        deps.output.table(runRows(runs))
      })
    })
}
