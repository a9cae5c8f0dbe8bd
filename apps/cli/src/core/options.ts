import { InvalidArgumentError } from 'commander'
import type { z } from 'zod'

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

export function parseRatio(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.')
  }
  return parsed
}

/** Build an option parser that validates against a zod enum. */
export function enumParser<T extends string>(schema: z.ZodType<T>, label: string): (value: string) => T {
  return (value) => {
    const parsed = schema.safeParse(value)
    if (!parsed.success) throw new InvalidArgumentError(`Unknown ${label} "${value}".`)
    return parsed.data
  }
}
