/**
 * AdFeed — Change Store
 *
 * Durable ledger of every ad that passed its target's filters.
 * Backed by SQLite through better-sqlite3.
 *
 * Durability: WAL journal with synchronous=FULL, so a write is fsync'd
 * before the call that made it returns. Readers only ever see committed rows.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Database as DatabaseInstance, Statement } from 'better-sqlite3';
import Database from 'better-sqlite3';
import type { AdLedger, AdRecord, AdSighting, UpsertOutcome } from '../types';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'store' });

// ============================================================
// CONSTANTS
// ============================================================

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETENTION_MS = 14 * DAY_MS;
export const DEFAULT_RECENT_LIMIT = 100;

// ============================================================
// TYPES
// ============================================================

export interface ChangeStoreConfig {
  /** File path, or ":memory:" */
  databasePath?: string;
  database?: DatabaseInstance;
  now?: () => Date;
}

interface AdRow {
  ad_id: string;
  url: string;
  title: string;
  price: string;
  first_seen: string;
  last_checked: string;
}

export class StoreError extends Error {
  constructor(
    message: string,
    readonly operation: 'upsert' | 'recent' | 'prune' | 'open',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

// ============================================================
// STORE
// ============================================================

export class ChangeStore implements AdLedger {
  private readonly db: DatabaseInstance;
  private readonly now: () => Date;

  private readonly selectExists: Statement<[string]>;
  private readonly upsertRow: Statement<[AdRow]>;
  private readonly selectRecent: Statement<[string, number], AdRow>;
  private readonly deleteBefore: Statement<[string]>;
  private readonly countRows: Statement<[], { total: number }>;
  private readonly upsertTx: (sighting: AdSighting) => UpsertOutcome;

  constructor(config: ChangeStoreConfig = {}) {
    this.now = config.now ?? (() => new Date());

    this.db = config.database ?? ChangeStore.open(config.databasePath ?? ':memory:');
    this.initSchema();

    this.selectExists = this.db.prepare<[string]>('SELECT 1 FROM ad_changes WHERE ad_id = ?');

    // The conflict clause is the uniqueness guard: a row inserted between the
    // lookup and the insert turns this into an update instead of an error.
    this.upsertRow = this.db.prepare<AdRow>(`
      INSERT INTO ad_changes (ad_id, url, title, price, first_seen, last_checked)
      VALUES (@ad_id, @url, @title, @price, @first_seen, @last_checked)
      ON CONFLICT(ad_id) DO UPDATE SET
        url = excluded.url,
        title = excluded.title,
        price = excluded.price,
        last_checked = excluded.last_checked
    `);

    this.selectRecent = this.db.prepare<[string, number], AdRow>(`
      SELECT ad_id, url, title, price, first_seen, last_checked
      FROM ad_changes
      WHERE last_checked >= ?
      ORDER BY last_checked DESC
      LIMIT ?
    `);

    this.deleteBefore = this.db.prepare<[string]>('DELETE FROM ad_changes WHERE last_checked < ?');
    this.countRows = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM ad_changes');

    const tx = this.db.transaction((sighting: AdSighting): UpsertOutcome => {
      const existed = this.selectExists.get(sighting.id) !== undefined;
      const seenAt = sighting.seenAt.toISOString();

      this.upsertRow.run({
        ad_id: sighting.id,
        url: sighting.url,
        title: sighting.title,
        price: sighting.price,
        first_seen: seenAt,
        last_checked: seenAt,
      });

      return existed ? 'updated' : 'inserted';
    });
    this.upsertTx = (sighting) => tx.immediate(sighting);
  }

  private static open(path: string): DatabaseInstance {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }

    try {
      const db = new Database(path);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      db.pragma('busy_timeout = 5000');
      return db;
    } catch (error) {
      throw new StoreError(`Failed to open change store at ${path}: ${errorMessage(error)}`, 'open', {
        cause: error,
      });
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ad_changes (
        ad_id TEXT PRIMARY KEY,
        url TEXT NOT NULL,
        title TEXT NOT NULL,
        price TEXT NOT NULL,
        first_seen TEXT NOT NULL,
        last_checked TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_ad_changes_last_checked ON ad_changes (last_checked)
    `);
  }

  isKnown(id: string): boolean {
    return this.selectExists.get(id) !== undefined;
  }

  /**
   * Insert a newly seen ad, or refresh lastChecked, title and price of a known one.
   * firstSeen is never overwritten.
   */
  upsert(sighting: AdSighting): UpsertOutcome {
    try {
      return this.upsertTx(sighting);
    } catch (error) {
      throw new StoreError(`Failed to save ad ${sighting.id}: ${errorMessage(error)}`, 'upsert', {
        cause: error,
      });
    }
  }

  /**
   * Ads checked at or after `since`, newest first.
   */
  recent(since: Date, limit: number = DEFAULT_RECENT_LIMIT): AdRecord[] {
    try {
      return this.selectRecent.all(since.toISOString(), limit).map(toRecord);
    } catch (error) {
      throw new StoreError(`Failed to read recent ads: ${errorMessage(error)}`, 'recent', {
        cause: error,
      });
    }
  }

  /**
   * Delete ads whose lastChecked is strictly older than now - retentionMs.
   * Returns the number of rows removed.
   */
  prune(retentionMs: number = DEFAULT_RETENTION_MS): number {
    const cutoff = new Date(this.now().getTime() - retentionMs);

    try {
      const { changes } = this.deleteBefore.run(cutoff.toISOString());
      log.info('Pruned stale ads', { deleted: changes, cutoff: cutoff.toISOString() });
      return changes;
    } catch (error) {
      throw new StoreError(`Failed to prune ads: ${errorMessage(error)}`, 'prune', {
        cause: error,
      });
    }
  }

  count(): number {
    return this.countRows.get()?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      log.debug('Change store closed');
    }
  }
}

function toRecord(row: AdRow): AdRecord {
  return {
    id: row.ad_id,
    url: row.url,
    title: row.title,
    price: row.price,
    firstSeen: new Date(row.first_seen),
    lastChecked: new Date(row.last_checked),
  };
}
