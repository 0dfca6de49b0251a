/**
 * SQLite-backed pairing store (sql.js).
 *
 * The database lives in memory and is written back to its file after every
 * change. Statements run synchronously, so a transaction completes without
 * yielding to the event loop; two commits for the same product can never
 * interleave between the read-mark and the insert.
 *
 * "Latest" always means highest id: ids follow commit order, scan
 * timestamps follow the device clock.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import sqlJs from 'sql.js';
import type { Database as SqlDatabase, SqlJsStatic, SqlValue } from 'sql.js';
import { z } from 'zod';
import { SyncStatus, isTerminalStatus, type PairingRecord } from '@scanlink/shared';
import type {
  CommitResult,
  PairingDraft,
  PairingStore,
  PreviousHolder,
  TerminalSyncStatus,
} from './types.js';

export const IN_MEMORY = ':memory:';

/** Status codes as stored in `legacy_synced`. */
const STATUS_CODE: Record<SyncStatus, number> = {
  pending: 0,
  success: 1,
  failure: -1,
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS pairings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    login TEXT NOT NULL CHECK (login <> ''),
    platform INTEGER NOT NULL,
    product INTEGER NOT NULL,
    scanned_at TEXT NOT NULL,
    is_overwrite INTEGER NOT NULL DEFAULT 0,
    legacy_synced INTEGER NOT NULL DEFAULT 0,
    legacy_error TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_pairings_platform_product ON pairings (platform, product);
  CREATE INDEX IF NOT EXISTS idx_pairings_product ON pairings (product);
  CREATE INDEX IF NOT EXISTS idx_pairings_login ON pairings (login);
`;

const pairingRowSchema = z.object({
  id: z.number(),
  login: z.string(),
  platform: z.number(),
  product: z.number(),
  scanned_at: z.string(),
  is_overwrite: z.number(),
  legacy_synced: z.number(),
  legacy_error: z.string().nullable(),
});

const holderRowSchema = z.object({ id: z.number(), platform: z.number() });
const platformRowSchema = z.object({ platform: z.number() });
const idRowSchema = z.object({ id: z.number() });

type PairingRow = z.infer<typeof pairingRowSchema>;

function statusFromCode(code: number): SyncStatus {
  if (code === STATUS_CODE.success) return SyncStatus.SUCCESS;
  if (code === STATUS_CODE.failure) return SyncStatus.FAILURE;
  return SyncStatus.PENDING;
}

function toRecord(row: PairingRow): PairingRecord {
  return {
    id: row.id,
    login: row.login,
    platform: row.platform,
    product: row.product,
    scannedAt: row.scanned_at,
    overwritten: row.is_overwrite === 1,
    syncStatus: statusFromCode(row.legacy_synced),
    syncError: row.legacy_error,
  };
}

// sql.js is CommonJS and exposes its loader as both module.exports and .default.
let engine: Promise<SqlJsStatic> | null = null;

function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) engine = sqlJs.default();
  return engine;
}

export class SqlitePairingStore implements PairingStore {
  private closed = false;

  private constructor(
    private readonly db: SqlDatabase,
    private readonly path: string,
  ) {
    this.db.exec(SCHEMA);
  }

  /**
   * Open (or create) the store at `path`. `:memory:` keeps nothing on disk.
   */
  static async open(path: string): Promise<SqlitePairingStore> {
    const SQL = await loadEngine();
    let data: Buffer | null = null;
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
      if (existsSync(path)) data = readFileSync(path);
    }
    const store = new SqlitePairingStore(new SQL.Database(data), path);
    console.log(`[PairingStore] Opened ${path}`);
    return store;
  }

  async findAndMarkOverwritten(product: number): Promise<PreviousHolder | null> {
    const previous = this.transaction(() => this.markLatest(product));
    this.persist();
    return previous;
  }

  async insert(draft: PairingDraft): Promise<number> {
    const id = this.transaction(() => this.insertRow(draft));
    this.persist();
    return id;
  }

  async commitPairing(draft: PairingDraft): Promise<CommitResult> {
    const result = this.transaction((): CommitResult => {
      const previous = this.markLatest(draft.product);
      const recordId = this.insertRow(draft);
      return { recordId, previous };
    });
    this.persist();
    return result;
  }

  async updateStatus(id: number, status: TerminalSyncStatus, error: string | null = null): Promise<boolean> {
    if (!isTerminalStatus(status)) return false;
    this.db.run(
      `UPDATE pairings SET legacy_synced = ?, legacy_error = ? WHERE id = ? AND legacy_synced = ?`,
      [STATUS_CODE[status], error, id, STATUS_CODE.pending],
    );
    if (this.db.getRowsModified() === 1) {
      this.persist();
      console.log(`[PairingStore] Sync status for #${id} set to ${status}`);
      return true;
    }
    console.warn(`[PairingStore] Sync status for #${id} not updated (missing or already settled)`);
    return false;
  }

  async findLatestPlatformForLogin(login: string): Promise<number | null> {
    const row = this.queryOne(
      `SELECT platform FROM pairings WHERE login = ? ORDER BY id DESC LIMIT 1`,
      [login],
      platformRowSchema,
    );
    return row?.platform ?? null;
  }

  async getRecord(id: number): Promise<PairingRecord | null> {
    const row = this.queryOne(
      `SELECT id, login, platform, product, scanned_at, is_overwrite, legacy_synced, legacy_error
       FROM pairings WHERE id = ?`,
      [id],
      pairingRowSchema,
    );
    return row ? toRecord(row) : null;
  }

  async ping(): Promise<boolean> {
    try {
      this.db.exec('SELECT 1');
      return true;
    } catch (err) {
      console.error('[PairingStore] Ping failed:', err);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.persist();
    this.db.close();
    this.closed = true;
    console.log('[PairingStore] Database closed');
  }

  private markLatest(product: number): PreviousHolder | null {
    const row = this.queryOne(
      `SELECT id, platform FROM pairings WHERE product = ? ORDER BY id DESC LIMIT 1`,
      [product],
      holderRowSchema,
    );
    if (!row) return null;
    this.db.run(`UPDATE pairings SET is_overwrite = 1 WHERE id = ?`, [row.id]);
    return { id: row.id, platform: row.platform };
  }

  private insertRow(draft: PairingDraft): number {
    const scannedAt = (draft.scannedAt ?? new Date()).toISOString();
    this.db.run(
      `INSERT INTO pairings (login, platform, product, scanned_at, is_overwrite, legacy_synced)
       VALUES (?, ?, ?, ?, 0, ?)`,
      [draft.login, draft.platform, draft.product, scannedAt, STATUS_CODE.pending],
    );
    const row = this.queryOne('SELECT last_insert_rowid() AS id', [], idRowSchema);
    if (!row) throw new Error('Insert did not produce a row id');
    return row.id;
  }

  private queryOne<T>(sql: string, params: SqlValue[], schema: z.ZodType<T>): T | null {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      return stmt.step() ? schema.parse(stmt.getAsObject()) : null;
    } finally {
      stmt.free();
    }
  }

  private transaction<T>(work: () => T): T {
    this.db.run('BEGIN');
    try {
      const result = work();
      this.db.run('COMMIT');
      return result;
    } catch (err) {
      this.db.run('ROLLBACK');
      throw err;
    }
  }

  /** Write the database image back to its file. Statements are not cached across this. */
  private persist(): void {
    if (this.path === IN_MEMORY) return;
    writeFileSync(this.path, this.db.export());
  }
}
