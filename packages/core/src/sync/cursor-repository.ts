import type Database from 'better-sqlite3'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import { EMPTY_CURSOR } from '../cases/index.js'
import type { CaseCursor } from '../cases/index.js'

interface CursorRow {
  cursor_timestamp: string | null
  cursor_case_id: string | null
}

/** The single-row sync watermark. */
export class CursorRepository {
  constructor(private db: Database.Database) {}

  get(): Result<CaseCursor, CaseKBError> {
    try {
      const row = this.db
        .prepare('SELECT cursor_timestamp, cursor_case_id FROM sync_cursor WHERE id = 1')
        .get() as CursorRow | undefined
      if (!row) return Ok({ ...EMPTY_CURSOR })
      return Ok({ timestamp: row.cursor_timestamp, caseId: row.cursor_case_id })
    } catch (err) {
      return Err(CaseKBError.db(`Failed to read sync cursor: ${errorMessage(err)}`))
    }
  }

  /** Move the watermark forward. Moving it backwards is rejected. */
  advance(cursor: CaseCursor): Result<CaseCursor, CaseKBError> {
    const current = this.get()
    if (!current.ok) return current
    if (isBefore(cursor, current.value)) {
      return Err(CaseKBError.validation(
        `Cursor cannot move backwards (${cursor.timestamp}/${cursor.caseId} < ${current.value.timestamp}/${current.value.caseId})`,
      ))
    }
    return this.write(cursor)
  }

  reset(): Result<CaseCursor, CaseKBError> {
    return this.write({ ...EMPTY_CURSOR })
  }

  private write(cursor: CaseCursor): Result<CaseCursor, CaseKBError> {
    try {
      this.db.prepare(`
        INSERT INTO sync_cursor (id, cursor_timestamp, cursor_case_id, updated_at)
        VALUES (1, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          cursor_timestamp = excluded.cursor_timestamp,
          cursor_case_id = excluded.cursor_case_id,
          updated_at = excluded.updated_at
      `).run(cursor.timestamp, cursor.caseId, new Date().toISOString())
      return Ok(cursor)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to write sync cursor: ${errorMessage(err)}`))
    }
  }
}

/** Strict (timestamp, caseId) ordering; the empty cursor precedes everything. */
export function isBefore(a: CaseCursor, b: CaseCursor): boolean {
  if (a.timestamp === null) return b.timestamp !== null
  if (b.timestamp === null) return false
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp
  return (a.caseId ?? '') < (b.caseId ?? '')
}
