/**
 * Case repository: the relational store the core reads from.
 * Read and write methods return Result<T, CaseKBError>.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError, stableHash } from '../common/index.js'
import { CaseInputSchema, CaseStatusSchema } from './schemas.js'
import type {
  Case,
  CaseCursor,
  CaseInput,
  CaseTextFilter,
  FetchedCase,
  TextMatch,
  UpsertCasesResult,
} from './schemas.js'

interface CaseRow {
  id: string
  subject: string
  issue: string
  resolution: string
  status: string
  product_hierarchy_id: string | null
  product_name: string | null
  content_hash: string
  created_at: string
  resolved_at: string | null
  updated_at: string
}

function toIso(value: string): string {
  return new Date(value).toISOString()
}

/** Hash of the fields that make up a case's searchable content and outcome. */
export function caseContentHash(c: Pick<Case, 'subject' | 'issue' | 'resolution' | 'status' | 'productHierarchyId' | 'productName'>): string {
  return stableHash({
    subject: c.subject,
    issue: c.issue,
    resolution: c.resolution,
    status: c.status,
    productHierarchyId: c.productHierarchyId,
    productName: c.productName,
  })
}

function rowToCase(row: CaseRow): Result<Case, CaseKBError> {
  const status = CaseStatusSchema.safeParse(row.status)
  if (!status.success) {
    return Err(CaseKBError.validation(`Case ${row.id}: unknown status "${row.status}"`))
  }
  if (!row.subject.trim() && !row.issue.trim()) {
    return Err(CaseKBError.validation(`Case ${row.id}: missing subject and issue text`))
  }
  return Ok({
    id: row.id,
    subject: row.subject,
    issue: row.issue,
    resolution: row.resolution,
    status: status.data,
    productHierarchyId: row.product_hierarchy_id,
    productName: row.product_name,
    contentHash: row.content_hash,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
    updatedAt: row.updated_at,
  })
}

function recordId(input: unknown): string | null {
  if (typeof input === 'object' && input !== null && 'id' in input && typeof input.id === 'string') {
    return input.id
  }
  return null
}

export interface UpsertedCase {
  case: Case
  change: 'inserted' | 'updated' | 'unchanged'
}

export class CaseRepository {
  constructor(private db: Database.Database) {}

  /**
   * Insert or update a case. Unchanged content keeps its updated_at so
   * re-ingesting the same export does not re-trigger a sync.
   */
  upsert(input: CaseInput): Result<UpsertedCase, CaseKBError> {
    return this.write(input)
  }

  /** Import a batch of raw records in one transaction; malformed records are reported, not thrown. */
  upsertMany(inputs: readonly unknown[]): Result<UpsertCasesResult, CaseKBError> {
    const summary: UpsertCasesResult = { inserted: 0, updated: 0, unchanged: 0, invalid: [] }

    try {
      this.db.transaction(() => {
        for (const input of inputs) {
          const result = this.write(input)
          if (result.ok) {
            summary[result.value.change]++
          } else if (result.error.code === 'VALIDATION_ERROR') {
            summary.invalid.push({ id: recordId(input), error: result.error.message })
          } else {
            throw result.error
          }
        }
      })()
      return Ok(summary)
    } catch (err) {
      return Err(CaseKBError.db(`Case import failed: ${errorMessage(err)}`))
    }
  }

  private write(input: unknown): Result<UpsertedCase, CaseKBError> {
    const parsed = CaseInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(CaseKBError.validation(parsed.error.issues.map((i) => i.message).join('; ')))
    }

    const data = parsed.data
    const contentHash = caseContentHash(data)
    const updatedAt = toIso(data.updatedAt ?? new Date().toISOString())

    try {
      const existing = this.db
        .prepare('SELECT * FROM cases WHERE id = ?')
        .get(data.id) as CaseRow | undefined

      if (existing && existing.content_hash === contentHash) {
        const current = rowToCase(existing)
        if (current.ok) return Ok({ case: current.value, change: 'unchanged' })
      }

      this.db.prepare(`
        INSERT INTO cases (id, subject, issue, resolution, status, product_hierarchy_id, product_name, content_hash, created_at, resolved_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          subject = excluded.subject,
          issue = excluded.issue,
          resolution = excluded.resolution,
          status = excluded.status,
          product_hierarchy_id = excluded.product_hierarchy_id,
          product_name = excluded.product_name,
          content_hash = excluded.content_hash,
          resolved_at = excluded.resolved_at,
          updated_at = excluded.updated_at
      `).run(
        data.id,
        data.subject,
        data.issue,
        data.resolution,
        data.status,
        data.productHierarchyId,
        data.productName,
        contentHash,
        toIso(data.createdAt),
        data.resolvedAt ? toIso(data.resolvedAt) : null,
        updatedAt,
      )

      const stored = this.get(data.id)
      if (!stored.ok) return stored
      return Ok({ case: stored.value, change: existing ? 'updated' : 'inserted' })
    } catch (err) {
      return Err(CaseKBError.db(`Failed to upsert case ${data.id}: ${errorMessage(err)}`))
    }
  }

  get(id: string): Result<Case, CaseKBError> {
    try {
      const row = this.db.prepare('SELECT * FROM cases WHERE id = ?').get(id) as CaseRow | undefined
      if (!row) return Err(CaseKBError.notFound('Case', id))
      return rowToCase(row)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to get case ${id}: ${errorMessage(err)}`))
    }
  }

  /** Valid cases for the given ids; unknown or malformed ids are omitted. */
  listByIds(ids: readonly string[]): Result<Case[], CaseKBError> {
    if (ids.length === 0) return Ok([])
    try {
      const placeholders = ids.map(() => '?').join(', ')
      const rows = this.db
        .prepare(`SELECT * FROM cases WHERE id IN (${placeholders})`)
        .all(...ids) as CaseRow[]
      const byId = new Map<string, Case>()
      for (const row of rows) {
        const mapped = rowToCase(row)
        if (mapped.ok) byId.set(row.id, mapped.value)
      }
      const cases: Case[] = []
      for (const id of ids) {
        const found = byId.get(id)
        if (found) cases.push(found)
      }
      return Ok(cases)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to list cases: ${errorMessage(err)}`))
    }
  }

  /**
   * Cases strictly after the cursor in (updated_at, id) order.
   * Malformed rows are returned with an error result rather than dropped.
   */
  fetchSince(cursor: CaseCursor, limit: number): Result<FetchedCase[], CaseKBError> {
    try {
      const rows = cursor.timestamp === null
        ? this.db.prepare(`
            SELECT * FROM cases ORDER BY updated_at ASC, id ASC LIMIT ?
          `).all(limit) as CaseRow[]
        : this.db.prepare(`
            SELECT * FROM cases
            WHERE updated_at > ? OR (updated_at = ? AND id > ?)
            ORDER BY updated_at ASC, id ASC
            LIMIT ?
          `).all(cursor.timestamp, cursor.timestamp, cursor.caseId ?? '', limit) as CaseRow[]

      return Ok(rows.map((row) => ({ id: row.id, updatedAt: row.updated_at, result: rowToCase(row) })))
    } catch (err) {
      return Err(CaseKBError.db(`Failed to fetch cases: ${errorMessage(err)}`))
    }
  }

  /**
   * Keyword search over case text. Matches any term; rows with more matched
   * terms come first, then the most recent. Callers score by the fraction of
   * terms present.
   */
  searchText(terms: readonly string[], filter: CaseTextFilter, limit: number): Result<TextMatch[], CaseKBError> {
    const normalized = [...new Set(terms.map((t) => t.trim().toLowerCase()).filter((t) => t.length > 0))]
    if (normalized.length === 0) return Ok([])

    try {
      const hits = normalized
        .map(() => "(lower(subject || ' ' || issue || ' ' || resolution) LIKE ? ESCAPE '\\')")
        .join(' + ')
      const params: Array<string | number> = normalized.map((t) => `%${t.replace(/[\\%_]/g, (ch) => '\\' + ch)}%`)
      let where = 'term_hits > 0'
      if (filter.status) {
        where += ' AND status = ?'
        params.push(filter.status)
      }
      if (filter.productHierarchyId) {
        where += ' AND product_hierarchy_id = ?'
        params.push(filter.productHierarchyId)
      }
      params.push(limit)

      const rows = this.db
        .prepare(`
          SELECT * FROM (SELECT *, ${hits} AS term_hits FROM cases)
          WHERE ${where}
          ORDER BY term_hits DESC, updated_at DESC, id ASC
          LIMIT ?
        `)
        .all(...params) as CaseRow[]

      const matches: TextMatch[] = []
      for (const row of rows) {
        const mapped = rowToCase(row)
        if (!mapped.ok) continue
        const text = `${row.subject} ${row.issue} ${row.resolution}`.toLowerCase()
        matches.push({ case: mapped.value, matchedTerms: normalized.filter((t) => text.includes(t)) })
      }
      return Ok(matches)
    } catch (err) {
      return Err(CaseKBError.db(`Case text search failed: ${errorMessage(err)}`))
    }
  }

  count(): Result<number, CaseKBError> {
    try {
      const row = this.db.prepare('SELECT COUNT(*) as count FROM cases').get() as { count: number }
      return Ok(row.count)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to count cases: ${errorMessage(err)}`))
    }
  }
}
