/**
 * Vector math and Float32 blob helpers.
 */

/** Pack a number array into a little-endian Float32 Buffer. */
export function packFloat32(vec: readonly number[]): Buffer {
  const buf = Buffer.alloc(vec.length * 4)
  for (let i = 0; i < vec.length; i++) {
    buf.writeFloatLE(vec[i], i * 4)
  }
  return buf
}

/** Unpack a little-endian Float32 Buffer into a Float32Array. Returns null on corrupt data. */
export function unpackFloat32(blob: Buffer, dims: number): Float32Array | null {
  if (blob.byteLength !== dims * 4) {
    console.warn(`[vector] corrupt embedding blob: expected ${dims * 4} bytes, got ${blob.byteLength}`)
    return null
  }
  const arr = new Float32Array(dims)
  for (let i = 0; i < dims; i++) {
    arr[i] = blob.readFloatLE(i * 4)
  }
  return arr
}

type Vector = ArrayLike<number>

/** Cosine similarity in [-1, 1]. Zero vectors have similarity 0 with everything. */
export function cosineSimilarity(a: Vector, b: Vector): number {
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export function euclideanDistance(a: Vector, b: Vector): number {
  let sum = 0
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i]
    sum += diff * diff
  }
  return Math.sqrt(sum)
}

/** Scale to unit length. The zero vector is returned unchanged. */
export function l2Normalize(vec: readonly number[]): number[] {
  let norm = 0
  for (const v of vec) norm += v * v
  norm = Math.sqrt(norm)
  if (norm === 0) return [...vec]
  return vec.map((v) => v / norm)
}

/** Cosine distance `1 - cos`, clamped at 0 against float error. */
export function cosineDistance(a: Vector, b: Vector): number {
  return Math.max(0, 1 - cosineSimilarity(a, b))
}
