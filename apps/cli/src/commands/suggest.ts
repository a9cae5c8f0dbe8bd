import type { Command } from 'commander'
import { unwrap } from '@casekb/core'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { parsePositiveInt } from '../core/options.js'

interface SuggestCommandOptions {
  limit: number
  json?: boolean
}

export function registerSuggestCommand(program: Command, deps: CliDeps): void {
  program
    .command('suggest')
    .description('Suggest search terms from category keywords and article titles')
    .argument('<prefix>', 'Start of a word')
    .option('-n, --limit <n>', 'Maximum number of suggestions', parsePositiveInt, 10)
    .option('--json', 'Output as JSON')
    .action(async (prefix: string, options: SuggestCommandOptions, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: false }, (runtime) => {
        const suggestions = unwrap(runtime.search.suggest(prefix, options.limit))
        if (options.json) {
          deps.output.data({ prefix, suggestions })
          return
        }
        if (suggestions.length === 0) {
          deps.output.message(`No suggestions for "${prefix}"`)
          return
        }
        for (const suggestion of suggestions) deps.output.message(suggestion)
      })
    })
}
