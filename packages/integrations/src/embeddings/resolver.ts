/**
 * Embedding provider resolution.
 * 'auto' only tries Ollama (local). OpenAI requires explicit selection.
 */

import { CaseKBError, errorMessage } from '@casekb/core'
import type { EmbeddingClient, PipelineConfig } from '@casekb/core'
import { DEFAULT_OLLAMA_MODEL, OllamaEmbeddingClient } from './ollama.js'
import { DEFAULT_OPENAI_MODEL, OpenAIEmbeddingClient } from './openai.js'

export type EmbeddingSettings = PipelineConfig['embedding']

/**
 * Returns null when embeddings are disabled or, under 'auto', Ollama is unreachable.
 * Explicitly selected providers fail loudly.
 */
export async function resolveEmbeddingClient(settings: EmbeddingSettings): Promise<EmbeddingClient | null> {
  switch (settings.provider) {
    case 'off':
      return null

    case 'ollama':
      try {
        return await OllamaEmbeddingClient.create({
          model: settings.model ?? DEFAULT_OLLAMA_MODEL,
          baseUrl: settings.ollamaBaseUrl,
        })
      } catch (err) {
        console.error(`[embedding] Ollama embedding failed: ${errorMessage(err)}`)
        throw err
      }

    case 'openai':
      if (!settings.openaiApiKey) {
        throw CaseKBError.config('OpenAI embedding requires an API key (OPENAI_API_KEY)')
      }
      return new OpenAIEmbeddingClient({
        apiKey: settings.openaiApiKey,
        model: settings.model ?? DEFAULT_OPENAI_MODEL,
      })

    case 'auto':
      try {
        return await OllamaEmbeddingClient.create({
          model: settings.model ?? DEFAULT_OLLAMA_MODEL,
          baseUrl: settings.ollamaBaseUrl,
        })
      } catch (err) {
        console.log(`[embedding] Ollama not available, vector search disabled: ${errorMessage(err)}`)
        return null
      }
  }
}
