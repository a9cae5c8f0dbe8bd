/**
 * Common utilities: Result pattern, errors, hashing, retry, concurrency.
 */

export { Ok, Err, unwrap, unwrapOr, isOk, isErr, errorMessage } from './result.js'
export type { Result } from './result.js'

export { CaseKBError, isTransientError, toCaseKBError } from './errors.js'
export type { ErrorCode } from './errors.js'

export { UUIDSchema, TimestampSchema, FilePathSchema, ExternalIdSchema } from './schemas.js'

export { stableStringify, stableHash } from './hash.js'
export { withRetry, backoffDelay, sleep } from './retry.js'
export type { RetryPolicy, RetryOptions } from './retry.js'
export { Semaphore, mapWithConcurrency } from './concurrency.js'
