import type { Command } from 'commander'
import { CategoryIdSchema, unwrap } from '@casekb/core'
import type { ArticleListFilter, CategoryId } from '@casekb/core'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'
import { articleRows } from '../core/format.js'
import { enumParser, parsePositiveInt } from '../core/options.js'

interface ArticlesCommandOptions {
  stale?: boolean
  pending?: boolean
  category?: CategoryId
  limit?: number
  json?: boolean
}

function listFilter(options: ArticlesCommandOptions): ArticleListFilter {
  const filter: ArticleListFilter = { category: options.category, limit: options.limit }
  if (options.stale) filter.vectorStatus = 'stale'
  else if (options.pending) filter.vectorStatus = 'pending'
  return filter
}

export function registerArticlesCommand(program: Command, deps: CliDeps): void {
  program
    .command('articles')
    .description('List generated knowledge articles, or print one as markdown')
    .argument('[id]', 'Article id to print')
    .option('--stale', 'Only articles whose cases have changed since generation')
    .option('--pending', 'Only articles waiting to be vectorized')
    .option('--category <id>', 'Restrict to one issue category', enumParser(CategoryIdSchema, 'category'))
    .option('-n, --limit <n>', 'Maximum number of articles', parsePositiveInt)
    .option('--json', 'Output as JSON')
    .action(async (id: string | undefined, options: ArticlesCommandOptions, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: false }, (runtime) => {
        if (id) {
          const article = unwrap(runtime.articles.get(id))
          deps.output.data(options.json ? article : article.content)
          return
        }

        const articles = unwrap(runtime.articles.list(listFilter(options)))
        if (options.json) {
          deps.output.data({ articles })
          return
        }
        if (articles.length === 0) {
          deps.output.message('No articles found.')
          return
        }
        deps.output.table(articleRows(articles))
      })
    })
}
