import { Command } from 'commander'
import { registerArticlesCommand } from './commands/articles.js'
import { registerHealthCommand } from './commands/health.js'
import { registerIngestCommand } from './commands/ingest.js'
import { registerSchedulerCommand } from './commands/scheduler.js'
import { registerSearchCommand } from './commands/search.js'
import { registerStatusCommand } from './commands/status.js'
import { registerSuggestCommand } from './commands/suggest.js'
import { registerSyncCommand } from './commands/sync.js'
import { createDefaultDeps } from './core/context.js'
import type { CliDeps } from './core/context.js'

export const CLI_VERSION = '0.1.0'

export function createProgram(deps: CliDeps = createDefaultDeps()): Command {
  const program = new Command()

  program
    .name('casekb')
    .description('Case-similarity search and knowledge generation for support cases')
    .version(CLI_VERSION)
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--db <path>', 'SQLite database path (overrides configuration)')

  registerIngestCommand(program, deps)
  registerSyncCommand(program, deps)
  registerSchedulerCommand(program, deps)
  registerSearchCommand(program, deps)
  registerSuggestCommand(program, deps)
  registerArticlesCommand(program, deps)
  registerStatusCommand(program, deps)
  registerHealthCommand(program, deps)

  return program
}
