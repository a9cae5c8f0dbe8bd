/**
 * Everything a command needs from its host: a runtime over the configured
 * database, an output sink, a shutdown signal and the exit code setter.
 * Tests swap these for in-memory versions.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { createRuntime, loadCategoryTable, loadConfig, unwrap } from '@casekb/core'
import type { CaseKBRuntime, CategoryTable, PipelineConfig } from '@casekb/core'
import { resolveEmbeddingClient } from '@casekb/integrations'
import { reportError } from './errors.js'
import { createOutputFormatter } from './output.js'
import type { OutputFormatter } from './output.js'

export interface GlobalOptions {
  config?: string
  db?: string
}

export interface RuntimeNeeds {
  /** Resolve an embedding provider. Commands that never embed skip the probe. */
  embedder: boolean
}

export interface CliDeps {
  openRuntime(options: GlobalOptions, needs: RuntimeNeeds): Promise<CaseKBRuntime>
  output: OutputFormatter
  /** Call `handler` on SIGINT or SIGTERM. Returns the unsubscribe function. */
  onShutdown(handler: () => void): () => void
  setExitCode(code: number): void
}

export function resolveConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const config = unwrap(loadConfig({ env, file: options.config }))
  return options.db ? { ...config, databasePath: options.db } : config
}

function categoryTable(config: PipelineConfig): CategoryTable | undefined {
  const path = config.patterns.categoriesPath
  return path ? unwrap(loadCategoryTable(path)) : undefined
}

export async function openRuntime(options: GlobalOptions, needs: RuntimeNeeds): Promise<CaseKBRuntime> {
  const config = resolveConfig(options)
  if (config.databasePath !== ':memory:') {
    mkdirSync(dirname(config.databasePath), { recursive: true })
  }
  const categories = categoryTable(config)
  const embedder = needs.embedder ? await resolveEmbeddingClient(config.embedding) : null
  return createRuntime({ config, embedder, categories })
}

function onProcessShutdown(handler: () => void): () => void {
  const listener = () => {
    console.log('[cli] Shutdown requested')
    handler()
  }
  process.once('SIGINT', listener)
  process.once('SIGTERM', listener)
  return () => {
    process.off('SIGINT', listener)
    process.off('SIGTERM', listener)
  }
}

export function createDefaultDeps(): CliDeps {
  return {
    openRuntime,
    output: createOutputFormatter({ stdout: process.stdout, stderr: process.stderr }),
    onShutdown: onProcessShutdown,
    setExitCode: (code) => {
      process.exitCode = code
    },
  }
}

/** Open a runtime for one command and close it afterwards, mapping failures to an exit code. */
export async function withRuntime(
  deps: CliDeps,
  options: GlobalOptions,
  needs: RuntimeNeeds,
  fn: (runtime: CaseKBRuntime) => Promise<number | void> | number | void,
): Promise<void> {
  let runtime: CaseKBRuntime | null = null
  try {
    runtime = await deps.openRuntime(options, needs)
    const code = await fn(runtime)
    if (typeof code === 'number' && code !== 0) deps.setExitCode(code)
  } catch (err) {
    deps.setExitCode(reportError(deps.output, err))
  } finally {
    runtime?.close()
  }
}
