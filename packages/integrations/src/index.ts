/**
 * @casekb/integrations: embedding providers for casekb.
 *
 * Ollama over HTTP for local embeddings, OpenAI through its SDK, and the
 * resolver that picks one from configuration.
 */

export * from './embeddings/index.js'
