/**
 * CountmeRawRepository
 *
 * Repository for the countme_raw event table. Only ever reasons over the
 * timestamp column: its bounds, the size of a half-open range, and deleting
 * that range.
 */

import type { SqliteDatabase } from '../database/client';
import { RAW_TABLE } from '../config/constants';

/**
 * Queries the trim workflow needs from the event store. Implemented by
 * CountmeRawRepository; tests substitute in-memory fakes.
 */
export interface RawEventStore {
  getMinTime(): number | null;
  getMaxTime(): number | null;
  /** Rows with begin <= timestamp < end */
  countInRange(begin: number, end: number): number;
  /** Deletes rows with begin <= timestamp < end in one transaction, returning the row count */
  deleteInRange(begin: number, end: number): number;
  vacuum(): void;
}

export class CountmeRawRepository implements RawEventStore {
  constructor(private db: SqliteDatabase) {}

  getMinTime(): number | null {
    return this.selectTimestamp(`SELECT MIN(timestamp) FROM ${RAW_TABLE}`);
  }

  getMaxTime(): number | null {
    return this.selectTimestamp(`SELECT MAX(timestamp) FROM ${RAW_TABLE}`);
  }

  countInRange(begin: number, end: number): number {
    const count: unknown = this.db
      .prepare(`SELECT COUNT(*) FROM ${RAW_TABLE} WHERE timestamp >= ? AND timestamp < ?`)
      .pluck()
      .get(begin, end);
    return typeof count === 'number' ? count : 0;
  }

  deleteInRange(begin: number, end: number): number {
    const statement = this.db.prepare(
      `DELETE FROM ${RAW_TABLE} WHERE timestamp >= ? AND timestamp < ?`
    );
    const deleteRange = this.db.transaction((from: number, to: number) => statement.run(from, to).changes);
    return deleteRange(begin, end);
  }

  vacuum(): void {
    this.db.exec('VACUUM');
  }

  private selectTimestamp(sql: string): number | null {
    const value: unknown = this.db.prepare(sql).pluck().get();
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    if (typeof value !== 'number') {
      throw new Error(`Unexpected ${typeof value} timestamp in ${RAW_TABLE}`);
    }
    return value;
  }
}
