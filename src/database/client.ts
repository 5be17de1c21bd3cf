/**
 * SQLite Database Client
 *
 * Opens the countme raw database with better-sqlite3. The file is created if
 * absent and always opened read-write; whether a run may delete is decided by
 * the executor, not by the connection mode.
 */

import Database from 'better-sqlite3';
import { logger } from '../config/logger';

export type SqliteDatabase = Database.Database;

export interface DatabaseOpener {
  (filename: string): SqliteDatabase;
}

/**
 * Open (or create) the database at `filename`
 */
export const openDatabase: DatabaseOpener = (filename) => {
  const db = new Database(filename, {
    readonly: false,
    fileMustExist: false,
    verbose: (message?: unknown) => {
      logger.debug('Database: Executing statement', { sql: message });
    },
  });

  logger.debug('Database: Opened', { filename, memory: db.memory });

  return db;
};
