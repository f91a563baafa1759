import BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import { StoreUnavailableError, describeError } from '../errors.js';
import { createSample } from '../utils/sample.js';
import type { CheckOutcome, MonitorState, PriceSample, SampleSource } from '../types.js';

export interface StateStore {
  load(itemId: string): MonitorState | null;
  save(state: MonitorState): void;
  loadAll(): MonitorState[];
}

const sampleSourceSchema = z.object({
  provider: z.string(),
  retailer: z.string().optional(),
  link: z.string().optional(),
  title: z.string().optional(),
  resultCount: z.number().optional(),
});

export class Database implements StateStore {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  load(itemId: string): MonitorState | null {
    return this.guard(`load state for ${itemId}`, () => {
      const stmt = this.db.prepare(`
        SELECT item_id, last_price, currency, sampled_at, source,
               last_check_at, last_outcome, consecutive_failures, last_error_kind, in_target_range
        FROM monitor_state WHERE item_id = ?
      `);
      const row = stmt.get(itemId) as MonitorStateRow | undefined;
      return row ? toMonitorState(row) : null;
    });
  }

  loadAll(): MonitorState[] {
    return this.guard('load all states', () => {
      const stmt = this.db.prepare(`
        SELECT item_id, last_price, currency, sampled_at, source,
               last_check_at, last_outcome, consecutive_failures, last_error_kind, in_target_range
        FROM monitor_state ORDER BY item_id
      `);
      const rows = stmt.all() as MonitorStateRow[];
      return rows.map(toMonitorState);
    });
  }

  /**
   * Replaces the item's row and records the sample in history inside one
   * transaction, so a reader never sees a price from one cycle next to the
   * check time of another.
   */
  save(state: MonitorState): void {
    this.guard(`save state for ${state.itemId}`, () => {
      const upsert = this.db.prepare(`
        INSERT INTO monitor_state (item_id, last_price, currency, sampled_at, source,
                                   last_check_at, last_outcome, consecutive_failures, last_error_kind,
                                   in_target_range)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(item_id) DO UPDATE SET
          last_price = excluded.last_price,
          currency = excluded.currency,
          sampled_at = excluded.sampled_at,
          source = excluded.source,
          last_check_at = excluded.last_check_at,
          last_outcome = excluded.last_outcome,
          consecutive_failures = excluded.consecutive_failures,
          last_error_kind = excluded.last_error_kind,
          in_target_range = excluded.in_target_range
      `);
      const recordSample = this.db.prepare(`
        INSERT OR IGNORE INTO price_history (item_id, price, currency, sampled_at, source)
        VALUES (?, ?, ?, ?, ?)
      `);

      const write = this.db.transaction((next: MonitorState) => {
        const sample = next.lastKnown;
        upsert.run(
          next.itemId,
          sample?.price ?? null,
          sample?.currency ?? null,
          sample?.timestamp ?? null,
          sample ? JSON.stringify(sample.source) : null,
          next.lastCheckAt,
          next.lastOutcome,
          next.consecutiveFailures,
          next.lastErrorKind,
          next.inTargetRange ? 1 : 0
        );
        if (sample) {
          recordSample.run(
            sample.itemId,
            sample.price,
            sample.currency,
            sample.timestamp,
            JSON.stringify(sample.source)
          );
        }
      });

      write(state);
    });
  }

  getHistory(itemId: string, limit = 50): PriceSample[] {
    return this.guard(`read history for ${itemId}`, () => {
      const stmt = this.db.prepare(`
        SELECT item_id, price, currency, sampled_at, source
        FROM price_history WHERE item_id = ?
        ORDER BY sampled_at DESC LIMIT ?
      `);
      const rows = stmt.all(itemId, limit) as PriceHistoryRow[];
      return rows.map(row =>
        createSample(row.item_id, row.price, row.currency, row.sampled_at, parseSource(row.source))
      );
    });
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(action: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw new StoreUnavailableError(`Failed to ${action}: ${describeError(error)}`, { cause: error });
    }
  }
}

function openDatabase(dbPath: string): BetterSqlite3.Database {
  try {
    const db = new BetterSqlite3(dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS monitor_state (
        item_id TEXT PRIMARY KEY,
        last_price REAL,
        currency TEXT,
        sampled_at TEXT,
        source TEXT,
        last_check_at TEXT NOT NULL,
        last_outcome TEXT NOT NULL,
        consecutive_failures INTEGER NOT NULL DEFAULT 0,
        last_error_kind TEXT,
        in_target_range INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS price_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        item_id TEXT NOT NULL,
        price REAL NOT NULL,
        currency TEXT NOT NULL,
        sampled_at TEXT NOT NULL,
        source TEXT NOT NULL,
        UNIQUE(item_id, sampled_at)
      );

      CREATE INDEX IF NOT EXISTS idx_history_item ON price_history(item_id, sampled_at);
    `);
    addMissingColumns(db);
    return db;
  } catch (error) {
    throw new StoreUnavailableError(`Cannot open state database at ${dbPath}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

// Databases created before target ranges existed lack the column.
function addMissingColumns(db: BetterSqlite3.Database): void {
  const columns = db.prepare('PRAGMA table_info(monitor_state)').all() as Array<{ name: string }>;
  if (!columns.some(column => column.name === 'in_target_range')) {
    db.exec('ALTER TABLE monitor_state ADD COLUMN in_target_range INTEGER NOT NULL DEFAULT 0');
  }
}

interface MonitorStateRow {
  item_id: string;
  last_price: number | null;
  currency: string | null;
  sampled_at: string | null;
  source: string | null;
  last_check_at: string;
  last_outcome: string;
  consecutive_failures: number;
  last_error_kind: string | null;
  in_target_range: number;
}

interface PriceHistoryRow {
  item_id: string;
  price: number;
  currency: string;
  sampled_at: string;
  source: string;
}

function toMonitorState(row: MonitorStateRow): MonitorState {
  const lastKnown =
    row.last_price !== null && row.sampled_at !== null
      ? createSample(row.item_id, row.last_price, row.currency ?? '', row.sampled_at, parseSource(row.source))
      : null;

  return {
    itemId: row.item_id,
    lastKnown,
    lastCheckAt: row.last_check_at,
    lastOutcome: toOutcome(row.last_outcome),
    consecutiveFailures: row.consecutive_failures,
    lastErrorKind: row.last_error_kind,
    inTargetRange: row.in_target_range === 1,
  };
}

function toOutcome(value: string): CheckOutcome {
  return value === 'success' ? 'success' : 'failure';
}

function parseSource(raw: string | null): SampleSource {
  if (!raw) return { provider: 'unknown' };
  const result = sampleSourceSchema.safeParse(JSON.parse(raw));
  return result.success ? result.data : { provider: 'unknown' };
}
