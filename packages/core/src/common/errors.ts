/**
 * Typed error class for casekb operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'PARSE_ERROR'
  | 'CONFIG_ERROR'
  | 'TRANSIENT_IO'
  | 'EMBEDDING_ERROR'
  | 'STORE_UNAVAILABLE'
  | 'CONCURRENCY_CONFLICT'
  | 'GENERATION_CONFLICT'
  | 'CANCELLED'

/** Codes the sync pipeline retries with backoff. */
const TRANSIENT_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'TRANSIENT_IO',
  'EMBEDDING_ERROR',
  'STORE_UNAVAILABLE',
  'DB_ERROR',
])

export class CaseKBError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'CaseKBError'
    this.code = code
  }

  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code)
  }

  static notFound(entity: string, id: string): CaseKBError {
    return new CaseKBError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): CaseKBError {
    return new CaseKBError('VALIDATION_ERROR', message)
  }

  static db(message: string): CaseKBError {
    return new CaseKBError('DB_ERROR', message)
  }

  static io(message: string): CaseKBError {
    return new CaseKBError('IO_ERROR', message)
  }

  static parse(message: string): CaseKBError {
    return new CaseKBError('PARSE_ERROR', message)
  }

  static config(message: string): CaseKBError {
    return new CaseKBError('CONFIG_ERROR', message)
  }

  static transientIO(message: string): CaseKBError {
    return new CaseKBError('TRANSIENT_IO', message)
  }

  static embedding(message: string): CaseKBError {
    return new CaseKBError('EMBEDDING_ERROR', message)
  }

  static storeUnavailable(message: string): CaseKBError {
    return new CaseKBError('STORE_UNAVAILABLE', message)
  }

  static concurrency(message: string): CaseKBError {
    return new CaseKBError('CONCURRENCY_CONFLICT', message)
  }

  static generationConflict(message: string): CaseKBError {
    return new CaseKBError('GENERATION_CONFLICT', message)
  }

  static cancelled(message = 'Operation cancelled'): CaseKBError {
    return new CaseKBError('CANCELLED', message)
  }
}

/** True for errors worth retrying: CaseKBError transient codes only. */
export function isTransientError(err: unknown): boolean {
  return err instanceof CaseKBError && err.transient
}

/** Coerce any thrown value into a CaseKBError, keeping an existing code. */
export function toCaseKBError(err: unknown, fallback: (message: string) => CaseKBError): CaseKBError {
  if (err instanceof CaseKBError) return err
  return fallback(err instanceof Error ? err.message : String(err))
}
