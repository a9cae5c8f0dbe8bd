/**
 * Pipeline configuration. Every field has a default so an empty object is a
 * complete configuration.
 */

import { z } from 'zod'

export const EmbeddingProviderSchema = z.enum(['auto', 'ollama', 'openai', 'off'])
export type EmbeddingProvider = z.infer<typeof EmbeddingProviderSchema>

export const DistanceMetricSchema = z.enum(['cosine', 'l2'])
export type DistanceMetric = z.infer<typeof DistanceMetricSchema>

const unitInterval = z.number().min(0).max(1)

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().min(0).default(30_000),
})

export const RankingConfigSchema = z.object({
  weights: z
    .object({
      similarity: unitInterval.default(0.7),
      recency: unitInterval.default(0.15),
      resolutionQuality: unitInterval.default(0.15),
    })
    .default({}),
  recencyHalfLifeDays: z.number().positive().default(180),
  resolutionQuality: z
    .object({
      resolved: unitInterval.default(1.0),
      closed: unitInterval.default(0.6),
      open: unitInterval.default(0.0),
    })
    .default({}),
})

export const SearchConfigSchema = z.object({
  similarityThreshold: unitInterval.default(0.6),
  maxResults: z.number().int().min(1).max(100).default(10),
  candidateMultiplier: z.number().int().min(1).default(3),
  previewChars: z.number().int().min(20).default(200),
})

export const KnowledgeConfigSchema = z
  .object({
    threshold: z.number().int().min(1).default(5),
    maxCasesPerArticle: z.number().int().min(1).default(50),
    maxSymptoms: z.number().int().min(1).default(5),
    maxResolutionSteps: z.number().int().min(1).default(8),
    maxProducts: z.number().int().min(1).default(10),
    maxExamples: z.number().int().min(0).default(3),
  })
  .refine((k) => k.maxCasesPerArticle >= k.threshold, {
    message: 'maxCasesPerArticle must be at least threshold',
    path: ['maxCasesPerArticle'],
  })

export const SyncConfigSchema = z.object({
  batchSize: z.number().int().min(1).max(10_000).default(500),
  cron: z.string().min(1).default('*/30 * * * *'),
  concurrency: z.number().int().min(1).max(64).default(4),
  lockTtlMs: z.number().int().min(1_000).default(20 * 60_000),
  retry: RetryPolicySchema.default({}),
  cooldownMs: z
    .array(z.number().int().min(0))
    .min(1)
    .default([60_000, 5 * 60_000, 15 * 60_000, 60 * 60_000]),
})

export const PipelineConfigSchema = z.object({
  databasePath: z.string().min(1).default('./data/casekb.db'),
  embedding: z
    .object({
      provider: EmbeddingProviderSchema.default('auto'),
      model: z.string().min(1).optional(),
      ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
      openaiApiKey: z.string().min(1).optional(),
    })
    .default({}),
  vector: z
    .object({
      metric: DistanceMetricSchema.default('cosine'),
    })
    .default({}),
  ranking: RankingConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  knowledge: KnowledgeConfigSchema.default({}),
  sync: SyncConfigSchema.default({}),
  patterns: z
    .object({
      categoriesPath: z.string().min(1).optional(),
    })
    .default({}),
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>
export type RankingConfig = z.infer<typeof RankingConfigSchema>
export type SearchConfig = z.infer<typeof SearchConfigSchema>
export type KnowledgeConfig = z.infer<typeof KnowledgeConfigSchema>
export type SyncConfig = z.infer<typeof SyncConfigSchema>
