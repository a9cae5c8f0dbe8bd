/**
 * Brute-force vector store over the vector_records table.
 */

import type Database from 'better-sqlite3'
import { CaseKBError, errorMessage } from '../common/index.js'
import type { DistanceMetric } from '../config/index.js'
import { cosineDistance, euclideanDistance, packFloat32, unpackFloat32 } from './math.js'
import { VectorMetadataSchema } from './vector-store.js'
import type { VectorMatch, VectorMetadata, VectorStore, VectorWhere } from './vector-store.js'

interface VectorRow {
  id: string
  record_type: string
  dimensions: number
  embedding: Buffer
  metadata: string
}

function whereClause(where: VectorWhere | undefined): { sql: string; params: string[] } {
  const clauses: string[] = []
  const params: string[] = []
  if (where?.type) {
    clauses.push('record_type = ?')
    params.push(where.type)
  }
  if (where?.status) {
    clauses.push("json_extract(metadata, '$.status') = ?")
    params.push(where.status)
  }
  if (where?.category) {
    clauses.push("json_extract(metadata, '$.category') = ?")
    params.push(where.category)
  }
  if (where?.productHierarchyId) {
    clauses.push("json_extract(metadata, '$.productHierarchyId') = ?")
    params.push(where.productHierarchyId)
  }
  return { sql: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params }
}

function parseMetadata(row: VectorRow): VectorMetadata | null {
  try {
    const parsed = VectorMetadataSchema.safeParse(JSON.parse(row.metadata))
    if (parsed.success) return parsed.data
    console.warn(`[vector] invalid metadata on ${row.id}: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
    return null
  } catch (err) {
    console.warn(`[vector] unreadable metadata on ${row.id}: ${errorMessage(err)}`)
    return null
  }
}

export class SqliteVectorStore implements VectorStore {
  constructor(
    private db: Database.Database,
    private metric: DistanceMetric = 'cosine',
  ) {}

  private distance(a: ArrayLike<number>, b: ArrayLike<number>): number {
    return this.metric === 'l2' ? euclideanDistance(a, b) : cosineDistance(a, b)
  }

  private storedDimensions(excludingId: string): number | null {
    const row = this.db
      .prepare('SELECT dimensions FROM vector_records WHERE id != ? LIMIT 1')
      .get(excludingId) as { dimensions: number } | undefined
    return row?.dimensions ?? null
  }

  async upsert(id: string, vector: readonly number[], metadata: VectorMetadata): Promise<void> {
    if (vector.length === 0 || vector.some((v) => !Number.isFinite(v))) {
      throw CaseKBError.validation(`Vector for ${id} must be a non-empty array of finite numbers`)
    }

    let existing: number | null
    try {
      existing = this.storedDimensions(id)
    } catch (err) {
      throw CaseKBError.storeUnavailable(`Vector store read failed: ${errorMessage(err)}`)
    }
    if (existing !== null && existing !== vector.length) {
      throw CaseKBError.validation(
        `Vector for ${id} has ${vector.length} dimensions, store holds ${existing}-dimensional vectors`,
      )
    }

    try {
      this.db.prepare(`
        INSERT INTO vector_records (id, record_type, dimensions, embedding, metadata, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          record_type = excluded.record_type,
          dimensions = excluded.dimensions,
          embedding = excluded.embedding,
          metadata = excluded.metadata,
          updated_at = excluded.updated_at
      `).run(id, metadata.type, vector.length, packFloat32(vector), JSON.stringify(metadata), new Date().toISOString())
    } catch (err) {
      throw CaseKBError.storeUnavailable(`Vector upsert failed for ${id}: ${errorMessage(err)}`)
    }
  }

  async query(vector: readonly number[], k: number, where?: VectorWhere): Promise<VectorMatch[]> {
    if (k <= 0) return []

    let rows: VectorRow[]
    try {
      const { sql, params } = whereClause(where)
      rows = this.db
        .prepare(`SELECT id, record_type, dimensions, embedding, metadata FROM vector_records ${sql}`)
        .all(...params) as VectorRow[]
    } catch (err) {
      throw CaseKBError.storeUnavailable(`Vector query failed: ${errorMessage(err)}`)
    }

    const matches: VectorMatch[] = []
    for (const row of rows) {
      if (row.dimensions !== vector.length) {
        console.warn(`[vector] skipping ${row.id}: ${row.dimensions} dimensions, query has ${vector.length}`)
        continue
      }
      const stored = unpackFloat32(row.embedding, row.dimensions)
      if (!stored) continue
      const metadata = parseMetadata(row)
      if (!metadata) continue
      matches.push({ id: row.id, distance: this.distance(vector, stored), metadata })
    }

    matches.sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    return matches.slice(0, k)
  }

  async delete(id: string): Promise<boolean> {
    try {
      return this.db.prepare('DELETE FROM vector_records WHERE id = ?').run(id).changes > 0
    } catch (err) {
      throw CaseKBError.storeUnavailable(`Vector delete failed for ${id}: ${errorMessage(err)}`)
    }
  }

  async count(where?: VectorWhere): Promise<number> {
    try {
      const { sql, params } = whereClause(where)
      const row = this.db
        .prepare(`SELECT COUNT(*) as count FROM vector_records ${sql}`)
        .get(...params) as { count: number }
      return row.count
    } catch (err) {
      throw CaseKBError.storeUnavailable(`Vector count failed: ${errorMessage(err)}`)
    }
  }
}
