/**
 * Ollama embedding client: calls /api/embed for local vector embeddings.
 * L2-normalizes each vector before returning.
 */

import { z } from 'zod'
import { CaseKBError, errorMessage, l2Normalize } from '@casekb/core'
import type { EmbeddingClient, EmbedResult } from '@casekb/core'

const MAX_BATCH_SIZE = 50
const MAX_BATCH_CHARS = 100_000
const TIMEOUT_MS = 30_000
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434'
export const DEFAULT_OLLAMA_MODEL = 'nomic-embed-text'

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
})

const ShowResponseSchema = z.object({
  digest: z.string().optional(),
})

export interface OllamaClientOptions {
  model: string
  baseUrl?: string
  dimensions: number
  providerFingerprint?: string
  timeoutMs?: number
}

function trimBaseUrl(url: string | undefined): string {
  return (url ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '')
}

async function postJson(url: string, body: unknown, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  const onAbort = () => controller.abort()
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    })

    if (!response.ok) {
      const text = await response.text().catch(() => '')
      throw CaseKBError.embedding(`Ollama request failed (${response.status}): ${text.slice(0, 200)}`)
    }
    const data: unknown = await response.json()
    return data
  } catch (err) {
    if (err instanceof CaseKBError) throw err
    if (signal?.aborted) throw CaseKBError.cancelled('Embedding request cancelled')
    if (controller.signal.aborted) throw CaseKBError.embedding(`Ollama request timed out after ${timeoutMs}ms`)
    throw CaseKBError.embedding(`Ollama unreachable: ${errorMessage(err)}`)
  } finally {
    clearTimeout(timeout)
    signal?.removeEventListener('abort', onAbort)
  }
}

export class OllamaEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  private _dimensions: number
  private readonly baseUrl: string
  private readonly timeoutMs: number
  readonly providerFingerprint: string

  get dimensions(): number {
    return this._dimensions
  }

  constructor(options: OllamaClientOptions) {
    this.modelName = options.model
    this.baseUrl = trimBaseUrl(options.baseUrl)
    this._dimensions = options.dimensions
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_MS
    this.providerFingerprint = options.providerFingerprint ?? `ollama:${options.model}:unknown`
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    // Batches bounded by count and total characters
    let batchStart = 0
    while (batchStart < texts.length) {
      let batchEnd = batchStart
      let batchChars = 0

      while (batchEnd < texts.length && batchEnd - batchStart < MAX_BATCH_SIZE) {
        const textChars = texts[batchEnd].length
        if (batchChars + textChars > MAX_BATCH_CHARS && batchEnd > batchStart) break
        batchChars += textChars
        batchEnd++
      }

      allEmbeddings.push(...await this.embedBatch(texts.slice(batchStart, batchEnd), signal))
      batchStart = batchEnd
    }

    return { embeddings: allEmbeddings }
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const raw = await postJson(`${this.baseUrl}/api/embed`, { model: this.modelName, input: texts }, this.timeoutMs, signal)
    const parsed = EmbedResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw CaseKBError.embedding('Ollama embed response missing embeddings array')
    }
    if (parsed.data.embeddings.length !== texts.length) {
      throw CaseKBError.embedding(`Ollama returned ${parsed.data.embeddings.length} embeddings for ${texts.length} inputs`)
    }

    const first = parsed.data.embeddings[0]
    if (first && first.length !== this._dimensions) {
      this._dimensions = first.length
    }

    return parsed.data.embeddings.map(l2Normalize)
  }

  /**
   * Smoke-test the model and detect its dimensions before returning a client.
   */
  static async create(options: { model: string; baseUrl?: string; timeoutMs?: number }): Promise<OllamaEmbeddingClient> {
    const baseUrl = trimBaseUrl(options.baseUrl)
    const timeoutMs = options.timeoutMs ?? TIMEOUT_MS

    const raw = await postJson(`${baseUrl}/api/embed`, { model: options.model, input: ['test'] }, timeoutMs)
    const parsed = EmbedResponseSchema.safeParse(raw)
    const first = parsed.success ? parsed.data.embeddings[0] : undefined
    if (!first || first.length === 0) {
      throw CaseKBError.embedding(
        `Ollama returned no embedding for model "${options.model}". Try: ollama pull ${options.model}`,
      )
    }

    let fingerprint = `ollama:${options.model}:${first.length}`
    try {
      const show = ShowResponseSchema.safeParse(await postJson(`${baseUrl}/api/show`, { name: options.model }, timeoutMs))
      if (show.success && show.data.digest) {
        fingerprint = `ollama:${options.model}:${show.data.digest.slice(0, 12)}`
      }
    } catch (err) {
      console.warn(`[embedding] Could not read Ollama model digest: ${errorMessage(err)}`)
    }

    return new OllamaEmbeddingClient({
      model: options.model,
      baseUrl,
      dimensions: first.length,
      providerFingerprint: fingerprint,
      timeoutMs,
    })
  }
}
