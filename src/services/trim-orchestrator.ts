/**
 * TrimOrchestrator
 *
 * Wires one trim run together: open the database, read the bounds of the
 * stored data, plan the trim window and hand it to the executor.
 *
 * Errors from the store and TrimInterruptedError propagate unchanged; the
 * connection is closed either way.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { openDatabase, type DatabaseOpener, type SqliteDatabase } from '../database/client';
import { CountmeRawRepository, type RawEventStore } from '../repositories/countme-raw.repository';
import { TrimExecutor, type TrimExecutorDeps, type TrimOutcome } from './trim-executor';
import { planTrimWindow, type RetentionPolicy } from './trim-window-planner';

export interface TrimRequest {
  sqlitePath: string;
  policy: RetentionPolicy;
  readWrite: boolean;
  vacuum?: boolean;
  signal?: AbortSignal;
}

export interface TrimOrchestratorDeps extends TrimExecutorDeps {
  open?: DatabaseOpener;
  createStore?: (db: SqliteDatabase) => RawEventStore;
}

export class TrimOrchestrator {
  private readonly open: DatabaseOpener;
  private readonly createStore: (db: SqliteDatabase) => RawEventStore;

  constructor(private deps: TrimOrchestratorDeps = {}) {
    this.open = deps.open ?? openDatabase;
    this.createStore = deps.createStore ?? ((db) => new CountmeRawRepository(db));
  }

  /**
   * Returns null when the table holds no data and nothing was planned.
   */
  async run(request: TrimRequest): Promise<TrimOutcome | null> {
    const runId = uuidv4();
    const { sqlitePath, policy, readWrite } = request;

    logger.info('TrimOrchestrator: Starting trim', {
      runId,
      sqlitePath,
      keepWeeks: policy.keepWeeks,
      includeOldestWeek: policy.includeOldestWeek,
      readWrite,
    });

    const db = this.open(sqlitePath);
    try {
      const store = this.createStore(db);
      const minTime = store.getMinTime();
      const maxTime = store.getMaxTime();

      if (minTime === null || maxTime === null) {
        logger.warn('TrimOrchestrator: No data in table, nothing to trim', { runId, sqlitePath });
        this.report('No data to trim.');
        return null;
      }

      const window = planTrimWindow(minTime, maxTime, policy);
      logger.debug('TrimOrchestrator: Planned trim window', { runId, minTime, maxTime, ...window });

      const executor = new TrimExecutor(store, this.deps);
      const outcome = await executor.execute(window, {
        readWrite,
        vacuum: request.vacuum,
        signal: request.signal,
      });

      logger.info('TrimOrchestrator: Trim complete', {
        runId,
        affected: outcome.affected,
        deleted: outcome.deleted,
        dryRun: outcome.dryRun,
        vacuumed: outcome.vacuumed,
      });

      return outcome;
    } finally {
      db.close();
    }
  }

  private report(line: string): void {
    if (this.deps.write) {
      this.deps.write(line);
    } else {
      console.log(line);
    }
  }
}
