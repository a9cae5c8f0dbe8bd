import type { Command } from 'commander'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { EXIT_CODES } from '../core/errors.js'
import { formatSyncSummary } from '../core/format.js'

interface SyncCommandOptions {
  force?: boolean
  json?: boolean
}

export function registerSyncCommand(program: Command, deps: CliDeps): void {
  program
    .command('sync')
    .description('Run one sync pass: fetch, categorize, generate articles and vectorize')
    .option('-f, --force', 'Run even while cooling down after failed runs')
    .option('--json', 'Output the run summary as JSON')
    .action(async (options: SyncCommandOptions, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: true }, async (runtime) => {
        const controller = new AbortController()
        const unsubscribe = deps.onShutdown(() => controller.abort())
        try {
          const summary = await runtime.orchestrator.runSync({
            force: options.force,
            trigger: 'manual',
            signal: controller.signal,
          })
          if (options.json) {
            deps.output.data(summary)
          } else {
            for (const line of formatSyncSummary(summary)) deps.output.message(line)
          }
          return summary.status === 'success' ? EXIT_CODES.success : EXIT_CODES.error
        } finally {
          unsubscribe()
        }
      })
    })
}
