import { CaseKBError, toCaseKBError } from '@casekb/core'
import type { OutputFormatter } from './output.js'

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  config: 3,
  unhealthy: 4,
} as const

export function exitCodeFor(err: CaseKBError): number {
  switch (err.code) {
    case 'VALIDATION_ERROR':
    case 'PARSE_ERROR':
      return EXIT_CODES.usage
    case 'CONFIG_ERROR':
      return EXIT_CODES.config
    default:
      return EXIT_CODES.error
  }
}

/** Print a failure and return the exit code it maps to. */
export function reportError(output: OutputFormatter, err: unknown): number {
  const error = toCaseKBError(err, (message) => CaseKBError.io(message))
  output.error(`${error.message} (${error.code})`)
  return exitCodeFor(error)
}
