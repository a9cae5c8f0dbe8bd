/**
 * Single-row lease giving cross-process single-flight for sync runs.
 * An expired lease may be taken over by any owner.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CaseKBError } from '../common/index.js'
import type { SyncLease } from './schemas.js'

interface LockRow {
  owner: string | null
  acquired_at: string | null
  expires_at: string | null
}

export class LockRepository {
  constructor(private db: Database.Database) {}

  current(now: Date = new Date()): Result<SyncLease | null, CaseKBError> {
    try {
      const row = this.db.prepare('SELECT owner, acquired_at, expires_at FROM sync_lock WHERE id = 1').get() as LockRow | undefined
      if (!row?.owner || !row.acquired_at || !row.expires_at) return Ok(null)
      if (row.expires_at <= now.toISOString()) return Ok(null)
      return Ok({ owner: row.owner, acquiredAt: row.acquired_at, expiresAt: row.expires_at })
    } catch (err) {
      return Err(CaseKBError.db(`Failed to read sync lock: ${errorMessage(err)}`))
    }
  }

  /** Take the lease if it is free, expired or already ours. */
  tryAcquire(owner: string, ttlMs: number, now: Date = new Date()): Result<boolean, CaseKBError> {
    const nowIso = now.toISOString()
    const expiresAt = new Date(now.getTime() + ttlMs).toISOString()
    try {
      const acquired = this.db.transaction(() => {
        this.db.prepare('INSERT OR IGNORE INTO sync_lock (id, owner, acquired_at, expires_at) VALUES (1, NULL, NULL, NULL)').run()
        const result = this.db.prepare(`
          UPDATE sync_lock SET owner = ?, acquired_at = ?, expires_at = ?
          WHERE id = 1 AND (owner IS NULL OR owner = ? OR expires_at IS NULL OR expires_at <= ?)
        `).run(owner, nowIso, expiresAt, owner, nowIso)
        return result.changes === 1
      })()
      return Ok(acquired)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to acquire sync lock: ${errorMessage(err)}`))
    }
  }

  /** Extend our lease. False if it was lost to another owner. */
  renew(owner: string, ttlMs: number, now: Date = new Date()): Result<boolean, CaseKBError> {
    try {
      const result = this.db
        .prepare('UPDATE sync_lock SET expires_at = ? WHERE id = 1 AND owner = ?')
        .run(new Date(now.getTime() + ttlMs).toISOString(), owner)
      return Ok(result.changes === 1)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to renew sync lock: ${errorMessage(err)}`))
    }
  }

  release(owner: string): Result<boolean, CaseKBError> {
    try {
      const result = this.db
        .prepare('UPDATE sync_lock SET owner = NULL, acquired_at = NULL, expires_at = NULL WHERE id = 1 AND owner = ?')
        .run(owner)
      return Ok(result.changes === 1)
    } catch (err) {
      return Err(CaseKBError.db(`Failed to release sync lock: ${errorMessage(err)}`))
    }
  }
}
