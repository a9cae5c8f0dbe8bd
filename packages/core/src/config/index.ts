export {
  PipelineConfigSchema,
  EmbeddingProviderSchema,
  DistanceMetricSchema,
  RetryPolicySchema,
  RankingConfigSchema,
  SearchConfigSchema,
  KnowledgeConfigSchema,
  SyncConfigSchema,
} from './schemas.js'
export type {
  PipelineConfig,
  PipelineConfigInput,
  EmbeddingProvider,
  DistanceMetric,
  RankingConfig,
  SearchConfig,
  KnowledgeConfig,
  SyncConfig,
} from './schemas.js'
export { loadConfig, parseConfig } from './loader.js'
export type { LoadConfigOptions } from './loader.js'
