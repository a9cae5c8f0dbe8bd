export { OllamaEmbeddingClient, DEFAULT_OLLAMA_URL, DEFAULT_OLLAMA_MODEL } from './ollama.js'
export type { OllamaClientOptions } from './ollama.js'
export { OpenAIEmbeddingClient, DEFAULT_OPENAI_MODEL } from './openai.js'
export type { OpenAIClientOptions, EmbeddingsApi } from './openai.js'
export { resolveEmbeddingClient } from './resolver.js'
export type { EmbeddingSettings } from './resolver.js'
