/**
 * Embedding client interface: framework-agnostic contract for vector embedding providers.
 * Concrete implementations live in @casekb/integrations (Ollama, OpenAI).
 */

export interface EmbeddingClient {
  /** Embed one or more texts into vectors. Each vector is L2-normalized. */
  embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult>
  readonly modelName: string
  readonly dimensions: number
  /** Detects silent model changes. Format: "${provider}:${model}:${dimensions}" */
  readonly providerFingerprint: string
}

export interface EmbedResult {
  /** Each vector already L2-normalized by the client. */
  embeddings: number[][]
}
