import { describe, it, expect, afterEach, vi } from 'vitest'
import { OllamaEmbeddingClient, OpenAIEmbeddingClient, resolveEmbeddingClient } from '../src/embeddings/index.js'
import type { EmbeddingSettings } from '../src/embeddings/index.js'

function settings(overrides: Partial<EmbeddingSettings>): EmbeddingSettings {
  return { provider: 'auto', ollamaBaseUrl: 'http://ollama.test', ...overrides }
}

afterEach(() => {
  vi.unstubAllGlobals()
  vi.restoreAllMocks()
})

describe('resolveEmbeddingClient', () => {
  it('returns null when embeddings are off', async () => {
    expect(await resolveEmbeddingClient(settings({ provider: 'off' }))).toBeNull()
  })

  it('requires an API key for openai', async () => {
    await expect(resolveEmbeddingClient(settings({ provider: 'openai' }))).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: 'OpenAI embedding requires an API key (OPENAI_API_KEY)',
    })
  })

  it('builds an openai client with the configured model', async () => {
    const client = await resolveEmbeddingClient(settings({ provider: 'openai', openaiApiKey: 'test-secret', model: 'text-embedding-3-large' }))
    expect(client).toBeInstanceOf(OpenAIEmbeddingClient)
    expect(client?.modelName).toBe('text-embedding-3-large')
  })

  it('falls back to null under auto when ollama is unreachable', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed')
    }))
    expect(await resolveEmbeddingClient(settings({ provider: 'auto' }))).toBeNull()
  })

  it('fails loudly when ollama was selected explicitly', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed')
    }))
    await expect(resolveEmbeddingClient(settings({ provider: 'ollama' }))).rejects.toMatchObject({ code: 'EMBEDDING_ERROR' })
  })

  it('returns an ollama client when the server answers', async () => {
    vi.stubGlobal('fetch', vi.fn(async (url: string) => new Response(
      JSON.stringify(url.endsWith('/api/show') ? { digest: 'abc' } : { embeddings: [[1, 0]] }),
      { status: 200 },
    )))
    const client = await resolveEmbeddingClient(settings({ provider: 'ollama', model: 'all-minilm' }))
    expect(client).toBeInstanceOf(OllamaEmbeddingClient)
    expect(client?.providerFingerprint).toBe('ollama:all-minilm:abc')
  })
})
