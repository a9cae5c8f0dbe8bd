/**
 * Configuration loading: optional JSON file, then environment overrides,
 * then schema validation.
 */

import { existsSync, readFileSync } from 'node:fs'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import { PipelineConfigSchema } from './schemas.js'
import type { PipelineConfig } from './schemas.js'

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>
  /** Path to a JSON config file. A missing file is an error only when given explicitly. */
  file?: string
}

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(root: JsonObject, key: string): JsonObject {
  const existing = root[key]
  if (isObject(existing)) return existing
  const created: JsonObject = {}
  root[key] = created
  return created
}

function parseNumber(name: string, raw: string): Result<number, CaseKBError> {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    return Err(CaseKBError.config(`${name} must be a number, got "${raw}"`))
  }
  return Ok(value)
}

function applyEnv(raw: JsonObject, env: Record<string, string | undefined>): Result<JsonObject, CaseKBError> {
  if (env.CASEKB_DB_PATH) raw.databasePath = env.CASEKB_DB_PATH

  if (env.CASEKB_EMBEDDING_PROVIDER) section(raw, 'embedding').provider = env.CASEKB_EMBEDDING_PROVIDER
  if (env.CASEKB_EMBEDDING_MODEL) section(raw, 'embedding').model = env.CASEKB_EMBEDDING_MODEL
  if (env.OLLAMA_BASE_URL) section(raw, 'embedding').ollamaBaseUrl = env.OLLAMA_BASE_URL
  if (env.OPENAI_API_KEY) section(raw, 'embedding').openaiApiKey = env.OPENAI_API_KEY

  if (env.CASEKB_SIMILARITY_THRESHOLD) {
    const threshold = parseNumber('CASEKB_SIMILARITY_THRESHOLD', env.CASEKB_SIMILARITY_THRESHOLD)
    if (!threshold.ok) return threshold
    section(raw, 'search').similarityThreshold = threshold.value
  }
  if (env.CASEKB_SYNC_CRON) section(raw, 'sync').cron = env.CASEKB_SYNC_CRON
  if (env.CASEKB_SYNC_BATCH_SIZE) {
    const batchSize = parseNumber('CASEKB_SYNC_BATCH_SIZE', env.CASEKB_SYNC_BATCH_SIZE)
    if (!batchSize.ok) return batchSize
    section(raw, 'sync').batchSize = batchSize.value
  }

  return Ok(raw)
}

function readConfigFile(path: string): Result<JsonObject, CaseKBError> {
  if (!existsSync(path)) return Err(CaseKBError.config(`Config file not found: ${path}`))
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'))
    if (!isObject(parsed)) return Err(CaseKBError.config(`Config file must contain a JSON object: ${path}`))
    return Ok(parsed)
  } catch (err) {
    return Err(CaseKBError.config(`Failed to read config file ${path}: ${errorMessage(err)}`))
  }
}

/** Validate a partial configuration object, filling defaults. */
export function parseConfig(raw: unknown): Result<PipelineConfig, CaseKBError> {
  const parsed = PipelineConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')
    return Err(CaseKBError.config(`Invalid configuration: ${details}`))
  }
  return Ok(parsed.data)
}

export function loadConfig(options: LoadConfigOptions = {}): Result<PipelineConfig, CaseKBError> {
  let raw: JsonObject = {}
  if (options.file) {
    const file = readConfigFile(options.file)
    if (!file.ok) return file
    raw = file.value
  }

  const merged = applyEnv(raw, options.env ?? {})
  if (!merged.ok) return merged
  return parseConfig(merged.value)
}
