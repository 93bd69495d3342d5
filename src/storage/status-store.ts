/**
 * SQLite storage for polled service statuses.
 *
 * better-sqlite3 is synchronous; each write batch runs in one transaction,
 * so a failing batch leaves no partial rows behind.
 */

import fs from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'
import type { StatusRecord } from '@/types/health.js'
import { PersistenceError } from '@/errors/monitor-errors.js'
import { err, ok, type Result } from '@/types/result.js'

const SCHEMA = `
CREATE TABLE IF NOT EXISTS service_status (
  tenant TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  service TEXT NOT NULL,
  status TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_service_status_timestamp ON service_status(timestamp);
CREATE INDEX IF NOT EXISTS idx_service_status_tenant ON service_status(tenant, timestamp);
`

export interface TimeRange {
    /** inclusive, `YYYY-MM-DD HH:MM:SS` */
    from: string
    /** inclusive, `YYYY-MM-DD HH:MM:SS` */
    to: string
}

export class StatusStore {
    private db: Database.Database

    constructor(dbPath: string = ':memory:') {
        if (dbPath !== ':memory:') {
            fs.mkdirSync(path.dirname(dbPath), { recursive: true })
        }
        this.db = new Database(dbPath)
        this.db.pragma('journal_mode = WAL')
        this.db.exec(SCHEMA)
    }

    insertMany(records: readonly StatusRecord[]): Result<number, PersistenceError> {
        try {
            const insert = this.db.prepare(
                'INSERT INTO service_status (tenant, timestamp, service, status) VALUES (@tenant, @timestamp, @service, @status)'
            )
            const insertAll = this.db.transaction((rows: readonly StatusRecord[]) => {
                for (const row of rows) insert.run(row)
                return rows.length
            })
            return ok(insertAll(records))
        } catch (e) {
            return err(PersistenceError.operationFailed('insert', e))
        }
    }

    selectRange(range: TimeRange, tenant?: string): Result<StatusRecord[], PersistenceError> {
        const where = tenant === undefined ? '' : ' AND tenant = @tenant'
        try {
            const rows = this.db
                .prepare<{ from: string; to: string; tenant?: string }, StatusRecord>(
                    `SELECT tenant, timestamp, service, status FROM service_status
                     WHERE timestamp BETWEEN @from AND @to${where}
                     ORDER BY timestamp ASC, rowid ASC`
                )
                .all(tenant === undefined ? { from: range.from, to: range.to } : { ...range, tenant })
            return ok(rows)
        } catch (e) {
            return err(PersistenceError.operationFailed('select', e))
        }
    }

    /** Deletes rows with timestamp strictly before `cutoff`. */
    deleteBefore(cutoff: string): Result<number, PersistenceError> {
        try {
            const info = this.db.prepare('DELETE FROM service_status WHERE timestamp < ?').run(cutoff)
            return ok(info.changes)
        } catch (e) {
            return err(PersistenceError.operationFailed('delete', e))
        }
    }

    count(): number {
        const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM service_status').get()
        return row?.n ?? 0
    }

    close(): void {
        this.db.close()
    }
}
