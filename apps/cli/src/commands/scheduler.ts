import type { Command } from 'commander'
import { SyncScheduler, describeCron } from '@casekb/core'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { formatSyncSummary } from '../core/format.js'

interface SchedulerCommandOptions {
  cron?: string
}

export function registerSchedulerCommand(program: Command, deps: CliDeps): void {
  program
    .command('scheduler')
    .description('Run sync on a cron schedule until interrupted')
    .option('--cron <expr>', 'Five-field cron expression (defaults to sync.cron)')
    .action(async (options: SchedulerCommandOptions, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: true }, async (runtime) => {
        const cron = options.cron ?? runtime.config.sync.cron
        const scheduler = new SyncScheduler(runtime.orchestrator, {
          cron,
          onRun: (summary) => {
            for (const line of formatSyncSummary(summary)) deps.output.message(line)
          },
        })

        let unsubscribe = () => {}
        await new Promise<void>((resolve) => {
          unsubscribe = deps.onShutdown(resolve)
          scheduler.start()
          const next = scheduler.nextRunAt
          deps.output.message(`Scheduler running: ${describeCron(cron)}. Next run ${next ? next.toISOString() : 'never'}.`)
        })
        unsubscribe()

        await scheduler.stop({ cancel: true })
        deps.output.message('Scheduler stopped.')
      })
    })
}
