// ============================================================================
// TsuryPhone Bridge - Call Log Store
// Persists the derived call log in a local SQLite database so it survives
// restarts. Every mutation is written through immediately; the list is
// capped per device, dropping the oldest entries first.
// ============================================================================

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { CallLogEntry, CallType } from '../../shared/types.js';

/** Entries kept per device before the oldest are dropped */
export const DEFAULT_MAX_ENTRIES = 100;

/** Row shape of the call_log table */
interface CallLogRow {
  id: number;
  timestamp: string;
  type: CallType;
  number: string;
  duration: number;
  state: string;
}

export class CallLogStore {
  private db: Database.Database;

  /**
   * Open (or create) the call log database for one device.
   * @param dbPath - SQLite file path, or ':memory:' for a throwaway store
   * @param deviceId - Rows are scoped to this device; one file can serve many
   * @param maxEntries - Cap on stored entries for this device
   */
  constructor(
    dbPath: string,
    private readonly deviceId: string,
    readonly maxEntries: number = DEFAULT_MAX_ENTRIES,
  ) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);

    // One file is shared by every device session
    this.db.pragma('journal_mode = WAL');

    this.initDb();
  }

  // --------------------------------------------------------------------------
  // Schema initialization
  // --------------------------------------------------------------------------

  private initDb(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS call_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        device_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        type TEXT NOT NULL,
        number TEXT NOT NULL,
        duration INTEGER NOT NULL DEFAULT 0,
        state TEXT NOT NULL DEFAULT ''
      );

      CREATE INDEX IF NOT EXISTS idx_call_log_device
        ON call_log(device_id, id);
    `);
  }

  // --------------------------------------------------------------------------
  // Mutations
  // --------------------------------------------------------------------------

  /**
   * Insert an entry as the newest one and trim the log to `maxEntries`.
   * Both steps run in one transaction.
   */
  add(entry: CallLogEntry): void {
    const insert = this.db.prepare<[string, string, CallType, string, number, string]>(
      'INSERT INTO call_log (device_id, timestamp, type, number, duration, state) VALUES (?, ?, ?, ?, ?, ?)',
    );
    const prune = this.db.prepare<[string, string, number]>(`
      DELETE FROM call_log
      WHERE device_id = ?
        AND id NOT IN (
          SELECT id FROM call_log WHERE device_id = ? ORDER BY id DESC LIMIT ?
        )
    `);

    const txn = this.db.transaction(() => {
      insert.run(this.deviceId, entry.timestamp, entry.type, entry.number, entry.duration, entry.state);
      prune.run(this.deviceId, this.deviceId, this.maxEntries);
    });
    txn();
  }

  /**
   * Set the duration of the newest entry, but only while it is still the
   * placeholder 0. A genuinely 0-second answered call is indistinguishable
   * from a pending one, so it can be overwritten here.
   *
   * @returns true if a row was updated
   */
  updateLatestDuration(duration: number): boolean {
    const latest = this.latestRow();
    if (!latest || latest.duration !== 0) return false;

    this.db
      .prepare<[number, number]>('UPDATE call_log SET duration = ? WHERE id = ?')
      .run(duration, latest.id);
    return true;
  }

  /** Remove every entry for this device */
  clear(): void {
    this.db.prepare<[string]>('DELETE FROM call_log WHERE device_id = ?').run(this.deviceId);
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /** All entries, newest first */
  list(): CallLogEntry[] {
    const rows = this.db
      .prepare<[string], CallLogRow>(
        'SELECT id, timestamp, type, number, duration, state FROM call_log WHERE device_id = ? ORDER BY id DESC',
      )
      .all(this.deviceId);
    return rows.map(toEntry);
  }

  /** The newest entry, or null when the log is empty */
  latest(): CallLogEntry | null {
    const row = this.latestRow();
    return row ? toEntry(row) : null;
  }

  /** Number of stored entries for this device */
  count(): number {
    const row = this.db
      .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM call_log WHERE device_id = ?')
      .get(this.deviceId);
    return row?.n ?? 0;
  }

  /** Flush and close the database. The store is unusable afterwards. */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private latestRow(): CallLogRow | undefined {
    return this.db
      .prepare<[string], CallLogRow>(
        'SELECT id, timestamp, type, number, duration, state FROM call_log WHERE device_id = ? ORDER BY id DESC LIMIT 1',
      )
      .get(this.deviceId);
  }
}

function toEntry(row: CallLogRow): CallLogEntry {
  return {
    timestamp: row.timestamp,
    type: row.type,
    number: row.number,
    duration: row.duration,
    state: row.state,
  };
}
