/**
 * Distance to similarity: exp(-d), bounded to (0, 1].
 */

export function distanceToSimilarity(distance: number): number {
  if (Number.isNaN(distance) || distance === Infinity) {
    console.warn(`[search] non-finite distance ${distance}, using minimum similarity`)
    return Number.MIN_VALUE
  }

  let d = distance
  if (d < 0) {
    console.warn(`[search] negative distance ${distance} clamped to 0`)
    d = 0
  }

  const similarity = Math.exp(-d)
  return similarity > 0 ? similarity : Number.MIN_VALUE
}
