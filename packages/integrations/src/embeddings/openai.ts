/**
 * OpenAI embedding client: calls the OpenAI embeddings API with L2 normalization.
 * Requires explicit opt-in; never auto-detected.
 */

import OpenAI from 'openai'
import { CaseKBError, errorMessage, l2Normalize } from '@casekb/core'
import type { EmbeddingClient, EmbedResult } from '@casekb/core'

const MAX_BATCH_SIZE = 2048
export const DEFAULT_OPENAI_MODEL = 'text-embedding-3-small'

/** The slice of the SDK this client calls. */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[] },
    options?: { signal?: AbortSignal },
  ): PromiseLike<{ data: Array<{ index: number; embedding: number[] }> }>
}

export interface OpenAIClientOptions {
  apiKey: string
  model?: string
  dimensions?: number
  /** Alternate transport, used by tests. */
  embeddings?: EmbeddingsApi
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly providerFingerprint: string
  private readonly embeddings: EmbeddingsApi

  constructor(options: OpenAIClientOptions) {
    this.modelName = options.model ?? DEFAULT_OPENAI_MODEL
    this.dimensions = options.dimensions ?? 1536
    this.providerFingerprint = `openai:${this.modelName}:${this.dimensions}`
    this.embeddings = options.embeddings ?? new OpenAI({ apiKey: options.apiKey }).embeddings
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE)
      let response: { data: Array<{ index: number; embedding: number[] }> }
      try {
        response = await this.embeddings.create({ model: this.modelName, input: batch }, { signal })
      } catch (err) {
        if (signal?.aborted) throw CaseKBError.cancelled('Embedding request cancelled')
        throw CaseKBError.embedding(`OpenAI embedding failed: ${errorMessage(err)}`)
      }

      // The API may return items out of order
      const sorted = [...response.data].sort((a, b) => a.index - b.index)
      for (const item of sorted) {
        allEmbeddings.push(l2Normalize(item.embedding))
      }
    }

    return { embeddings: allEmbeddings }
  }
}
