import type { Command } from 'commander'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { EXIT_CODES } from '../core/errors.js'
import { formatHealth } from '../core/format.js'

export function registerHealthCommand(program: Command, deps: CliDeps): void {
  program
    .command('health')
    .description('Check the database, vector store, embedder and last sync run')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: true }, async (runtime) => {
        const report = await runtime.orchestrator.healthCheck()
        if (options.json) {
          deps.output.data(report)
        } else {
          for (const line of formatHealth(report)) deps.output.message(line)
        }
        return report.status === 'unhealthy' ? EXIT_CODES.unhealthy : EXIT_CODES.success
      })
    })
}
