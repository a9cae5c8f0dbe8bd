import { readFile } from 'node:fs/promises'
import type { Command } from 'commander'
import { z } from 'zod'
import { CaseKBError, errorMessage, unwrap } from '@casekb/core'
import { withRuntime } from '../core/context.js'
import type { CliDeps, GlobalOptions } from '../core/context.js'

const CaseExportSchema = z.array(z.unknown())

export async function readCaseExport(path: string): Promise<unknown[]> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    throw CaseKBError.io(`Cannot read ${path}: ${errorMessage(err)}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw CaseKBError.parse(`${path} is not valid JSON: ${errorMessage(err)}`)
  }

  const parsed = CaseExportSchema.safeParse(raw)
  if (!parsed.success) throw CaseKBError.validation(`${path} must contain a JSON array of cases`)
  return parsed.data
}

export function registerIngestCommand(program: Command, deps: CliDeps): void {
  program
    .command('ingest')
    .description('Insert or update cases from a JSON export')
    .argument('<file>', 'JSON file holding an array of cases')
    .option('--json', 'Output the import summary as JSON')
    .action(async (file: string, options: { json?: boolean }, command: Command) => {
      await withRuntime(deps, command.optsWithGlobals<GlobalOptions>(), { embedder: false }, async (runtime) => {
        const records = await readCaseExport(file)
        const result = unwrap(runtime.cases.upsertMany(records))
        if (options.json) {
          deps.output.data(result)
          return
        }
        deps.output.message(
          `Imported ${records.length} records: ${result.inserted} inserted, ${result.updated} updated, ` +
            `${result.unchanged} unchanged, ${result.invalid.length} invalid`,
        )
        for (const invalid of result.invalid) {
          deps.output.warn(`${invalid.id ?? '(no id)'}: ${invalid.error}`)
        }
      })
    })
}
