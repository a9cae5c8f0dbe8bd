/**
 * @casekb/core
 *
 * Framework-agnostic core for case-similarity search and knowledge generation.
 * Provides storage, cases, issue patterns, knowledge articles, vectors, search and sync.
 */

export * from './common/index.js'
export * from './storage/index.js'
export * from './config/index.js'
export * from './cases/index.js'
export * from './patterns/index.js'
export * from './knowledge/index.js'
export * from './vector/index.js'
export * from './search/index.js'
export * from './sync/index.js'
export * from './runtime/index.js'
