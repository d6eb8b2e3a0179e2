/**
 * SQLite observation store.
 *
 * Persists every stopped observation as one row, with its key values kept
 * as JSON, and answers simple queries over what was recorded.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { StoreError } from '@vigil/core';
import type { IObservationHandler, ObservationContext } from '@vigil/core';
import { markStarted, toObservationRecord } from './records.js';
import type { ObservationRecord } from './records.js';

export interface SqliteHandlerOptions {
  /** Path to the SQLite database file, or ':memory:'. */
  dbPath: string;
  /** Epoch millisecond clock; defaults to Date.now. */
  clock?: () => number;
}

export interface ListOptions {
  name?: string;
  /** Only observations that ended with an error. */
  failedOnly?: boolean;
  /** Non-negative integer. Default: 100. */
  limit?: number;
}

interface ObservationRow {
  id: string;
  parent_id: string | null;
  name: string;
  contextual_name: string | null;
  start_time: number;
  end_time: number;
  duration_ms: number;
  error_name: string | null;
  error_message: string | null;
  low_cardinality: string;
  high_cardinality: string;
}

export class SqliteObservationHandler implements IObservationHandler {
  readonly id = 'sqlite';

  private readonly db: Database.Database;
  private readonly clock: () => number;
  private readonly insert: Database.Statement;
  private closed = false;

  constructor(options: SqliteHandlerOptions) {
    if (options.dbPath !== ':memory:') {
      mkdirSync(dirname(options.dbPath), { recursive: true });
    }

    this.db = new Database(options.dbPath);
    this.clock = options.clock ?? Date.now;

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.initSchema();

    this.insert = this.db.prepare(`
      INSERT INTO observations (
        id, parent_id, name, contextual_name, start_time, end_time, duration_ms,
        error_name, error_message, low_cardinality, high_cardinality
      ) VALUES (
        @id, @parent_id, @name, @contextual_name, @start_time, @end_time, @duration_ms,
        @error_name, @error_message, @low_cardinality, @high_cardinality
      )
    `);
  }

  // ---- IObservationHandler ------------------------------------------------

  supportsContext(_context: ObservationContext): boolean {
    return !this.closed;
  }

  onStart(context: ObservationContext): void {
    markStarted(context, this.clock());
  }

  onStop(context: ObservationContext): void {
    const record = toObservationRecord(context, this.clock());
    if (!record) return;
    this.save(record);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  // ---- queries ------------------------------------------------------------

  save(record: ObservationRecord): void {
    this.assertOpen();
    const row: ObservationRow = {
      id: record.id,
      parent_id: record.parentId,
      name: record.name,
      contextual_name: record.contextualName,
      start_time: record.startTime,
      end_time: record.endTime,
      duration_ms: record.durationMs,
      error_name: record.error?.name ?? null,
      error_message: record.error?.message ?? null,
      low_cardinality: JSON.stringify(record.lowCardinality),
      high_cardinality: JSON.stringify(record.highCardinality),
    };
    this.insert.run(row);
  }

  /** Most recent observations first. */
  list(opts: ListOptions = {}): ObservationRecord[] {
    this.assertOpen();
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (opts.name !== undefined) {
      clauses.push('name = ?');
      params.push(opts.name);
    }
    if (opts.failedOnly) {
      clauses.push('error_name IS NOT NULL');
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = opts.limit ?? 100;
    if (!Number.isInteger(limit) || limit < 0) {
      throw new StoreError(`limit must be a non-negative integer, got ${limit}`, { limit });
    }
    params.push(limit);

    const rows = this.db
      .prepare<Array<string | number>, ObservationRow>(
        `SELECT * FROM observations ${where} ORDER BY end_time DESC, rowid DESC LIMIT ?`,
      )
      .all(...params);
    return rows.map(rowToRecord);
  }

  get(id: string): ObservationRecord | undefined {
    this.assertOpen();
    const row = this.db
      .prepare<[string], ObservationRow>('SELECT * FROM observations WHERE id = ?')
      .get(id);
    return row ? rowToRecord(row) : undefined;
  }

  count(name?: string): number {
    this.assertOpen();
    const row =
      name === undefined
        ? this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM observations').get()
        : this.db
            .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM observations WHERE name = ?')
            .get(name);
    return row?.n ?? 0;
  }

  // ---- helpers ------------------------------------------------------------

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS observations (
        id TEXT PRIMARY KEY,
        parent_id TEXT,
        name TEXT NOT NULL,
        contextual_name TEXT,
        start_time INTEGER NOT NULL,
        end_time INTEGER NOT NULL,
        duration_ms REAL NOT NULL,
        error_name TEXT,
        error_message TEXT,
        low_cardinality TEXT NOT NULL DEFAULT '{}',
        high_cardinality TEXT NOT NULL DEFAULT '{}'
      );
      CREATE INDEX IF NOT EXISTS idx_observations_name ON observations(name);
      CREATE INDEX IF NOT EXISTS idx_observations_end ON observations(end_time);
    `);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError('Observation store is closed');
    }
  }
}

function rowToRecord(row: ObservationRow): ObservationRecord {
  return {
    id: row.id,
    parentId: row.parent_id,
    name: row.name,
    contextualName: row.contextual_name,
    startTime: row.start_time,
    endTime: row.end_time,
    durationMs: row.duration_ms,
    error:
      row.error_name !== null
        ? { name: row.error_name, message: row.error_message ?? '' }
        : null,
    lowCardinality: parseKeyValues(row.low_cardinality),
    highCardinality: parseKeyValues(row.high_cardinality),
  };
}

function parseKeyValues(json: string): Record<string, string> {
  const parsed: unknown = JSON.parse(json);
  const out: Record<string, string> = {};
  if (parsed !== null && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') out[key] = value;
    }
  }
  return out;
}
