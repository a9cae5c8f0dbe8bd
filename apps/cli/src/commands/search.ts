import { Option } from 'commander'
import type { Command } from 'commander'
import { CategoryIdSchema, ResultTypeFilterSchema, SearchTypeSchema, unwrap } from '@casekb/core'
import type { CategoryId, SearchType } from '@casekb/core'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { formatSearchResponse } from '../core/format.js'
import { enumParser, parsePositiveInt, parseRatio } from '../core/options.js'

interface SearchCommandOptions {
  type: SearchType
  resultType: 'case' | 'article' | 'all'
  limit?: number
  status?: string
  category?: CategoryId
  product?: string
  threshold?: number
  json?: boolean
}

export function registerSearchCommand(program: Command, deps: CliDeps): void {
  program
    .command('search')
    .description('Find similar cases and knowledge articles for a problem description')
    .argument('<query>', 'Free-text problem description')
    .addOption(
      new Option('-t, --type <type>', 'Search strategy: vector, text or hybrid')
        .argParser(enumParser(SearchTypeSchema, 'search type'))
        .default('vector'),
    )
    .addOption(
      new Option('-r, --result-type <kind>', 'Restrict results to case, article or all')
        .argParser(enumParser(ResultTypeFilterSchema, 'result type'))
        .default('all'),
    )
    .option('-n, --limit <n>', 'Maximum number of results', parsePositiveInt)
    .option('-s, --status <status>', 'Case status (open, closed, resolved) or article status (vectorized, stale)')
    .option('--category <id>', 'Restrict to one issue category', enumParser(CategoryIdSchema, 'category'))
    .option('--product <id>', 'Restrict to one product hierarchy id')
    .option('--threshold <value>', 'Minimum similarity between 0 and 1', parseRatio)
    .option('--json', 'Output the full response as JSON')
    .action(async (query: string, options: SearchCommandOptions, command: Command) => {
      const needsEmbedder = options.type !== 'text'
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: needsEmbedder }, async (runtime) => {
        const response = unwrap(
          await runtime.search.search(query, {
            type: options.type,
            resultType: options.resultType,
            status: options.status,
            category: options.category,
            productHierarchyId: options.product,
            maxResults: options.limit,
            similarityThreshold: options.threshold,
          }),
        )
        if (options.json) {
          deps.output.data(response)
          return
        }
        for (const line of formatSearchResponse(response)) deps.output.message(line)
      })
    })
}
