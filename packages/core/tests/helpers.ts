/**
 * Shared fixtures for core tests: configuration with instant retries,
 * case records and a deterministic embedder.
 */

import { CaseKBError, unwrap } from '../src/common/index.js'
import type { CaseInput } from '../src/cases/index.js'
import { parseConfig } from '../src/config/index.js'
import type { PipelineConfig, PipelineConfigInput } from '../src/config/index.js'
import { l2Normalize } from '../src/vector/index.js'
import type { EmbedResult, EmbeddingClient } from '../src/vector/index.js'

export const NOW = new Date('2026-03-01T12:00:00.000Z')

export function testConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return unwrap(parseConfig({
    ...overrides,
    databasePath: ':memory:',
    embedding: { provider: 'off' },
    sync: { retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }, ...overrides.sync },
  }))
}

export function caseInput(overrides: Partial<CaseInput> & { id: string }): CaseInput {
  return {
    subject: 'Server issue',
    issue: 'Customer reports a problem',
    resolution: 'Resolved with customer',
    status: 'resolved',
    productHierarchyId: 'poweredge-r740',
    productName: 'PowerEdge R740',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  }
}

export function memoryCase(id: string, updatedAt: string, overrides: Partial<CaseInput> = {}): CaseInput {
  return caseInput({
    id,
    subject: 'PowerEdge R740 - DIMM errors',
    issue: 'Correctable ECC errors on DIMM B2',
    resolution: 'Replaced DIMM B2 and cleared the SEL',
    updatedAt,
    ...overrides,
  })
}

const DIMENSIONS = 16

function tokenBucket(token: string): number {
  let hash = 0
  for (const ch of token) hash = (hash * 31 + ch.charCodeAt(0)) >>> 0
  return hash % DIMENSIONS
}

/** Bag-of-words vector over hashed tokens; identical texts embed identically. */
export function fakeVector(text: string): number[] {
  const vector = new Array<number>(DIMENSIONS).fill(0)
  for (const token of text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean)) {
    vector[tokenBucket(token)] += 1
  }
  if (vector.every((v): boolean => v === 0)) vector[0] = 1
  return l2Normalize(vector)
}

export class FakeEmbedder implements EmbeddingClient {
  readonly modelName = 'fake-embed'
  readonly dimensions = DIMENSIONS
  readonly providerFingerprint = `fake:fake-embed:${DIMENSIONS}`
  calls = 0
  /** Texts for which embed rejects with EMBEDDING_ERROR. */
  failWhen: (text: string) => boolean = () => false

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    this.calls++
    if (signal?.aborted) throw CaseKBError.cancelled()
    const failing = texts.find((t) => this.failWhen(t))
    if (failing !== undefined) throw CaseKBError.embedding('fake embedder unavailable')
    return { embeddings: texts.map(fakeVector) }
  }
}
