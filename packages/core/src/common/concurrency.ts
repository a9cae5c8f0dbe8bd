/**
 * Counting semaphore and a bounded-parallel map built on it.
 */

export class Semaphore {
  private available: number
  private readonly waiters: Array<() => void> = []

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`)
    }
    this.available = permits
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--
      return Promise.resolve()
    }
    return new Promise(resolve => this.waiters.push(resolve))
  }

  release(): void {
    const next = this.waiters.shift()
    if (next) {
      next()
    } else {
      this.available++
    }
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }
}

/**
 * Map items through `fn` with at most `limit` calls in flight.
 * Output order follows input order. The first rejection is rethrown after
 * in-flight calls settle; no new calls start once one has failed.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(limit)
  const results = new Array<R>(items.length)
  const failures: unknown[] = []

  await Promise.all(items.map((item, index) =>
    semaphore.use(async () => {
      if (failures.length > 0) return
      try {
        results[index] = await fn(item, index)
      } catch (error) {
        failures.push(error)
      }
    }),
  ))

  if (failures.length > 0) throw failures[0]
  return results
}
