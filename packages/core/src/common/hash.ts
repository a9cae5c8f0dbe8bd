import { createHash } from 'node:crypto'

/**
 * Recursive sorted-key JSON serialization for deterministic output.
 * Handles primitives, arrays, and plain objects. Other types become null.
 */
export function stableStringify(obj: unknown): string {
  if (obj === null || obj === undefined) return 'null'
  if (typeof obj === 'string') return JSON.stringify(obj)
  if (typeof obj === 'number' || typeof obj === 'boolean') return String(obj)

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']'
  }

  if (typeof obj === 'object') {
    const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}'
  }

  return 'null'
}

/** SHA-256 hex digest of the stable-stringified value. */
export function stableHash(obj: unknown): string {
  return createHash('sha256').update(stableStringify(obj)).digest('hex')
}
