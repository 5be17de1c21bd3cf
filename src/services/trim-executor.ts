/**
 * TrimExecutor
 *
 * Reports the planned deletion and, in read-write mode only, deletes it after
 * an interruptible warning countdown.
 *
 *   dry-run:    count -> report "would affect" -> stop
 *   read-write: count -> report -> countdown -> delete -> (vacuum) -> done
 *
 * An interrupted countdown rejects with TrimInterruptedError, which is passed
 * to the caller untouched. The delete is only ever issued after the countdown
 * has completed.
 */

import type { RawEventStore } from '../repositories/countme-raw.repository';
import type { TrimWindow } from './trim-window-planner';
import { WARN_SECONDS } from '../config/constants';
import { logger } from '../config/logger';
import { TrimInterruptedError } from '../errors';
import { formatDate } from '../utils/time';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep';

export type ReportWriter = (line: string) => void;

export interface TrimOptions {
  readWrite: boolean;
  /** Run VACUUM after a successful read-write delete */
  vacuum?: boolean;
  signal?: AbortSignal;
}

export interface TrimOutcome {
  window: TrimWindow;
  affected: number;
  deleted: number;
  dryRun: boolean;
  vacuumed: boolean;
}

export interface TrimExecutorDeps {
  sleep?: Sleeper;
  write?: ReportWriter;
  warnSeconds?: number;
}

export class TrimExecutor {
  private readonly sleep: Sleeper;
  private readonly write: ReportWriter;
  private readonly warnSeconds: number;

  constructor(private store: RawEventStore, deps: TrimExecutorDeps = {}) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.write = deps.write ?? ((line) => console.log(line));
    this.warnSeconds = deps.warnSeconds ?? WARN_SECONDS;
  }

  async execute(window: TrimWindow, options: TrimOptions): Promise<TrimOutcome> {
    const { trimBegin, trimEnd } = window;
    const affected = this.store.countInRange(trimBegin, trimEnd);
    const range = `from ${formatDate(trimBegin)} to ${formatDate(trimEnd)}`;

    logger.info('TrimExecutor: Planned deletion', {
      trimBegin,
      trimEnd,
      affected,
      readWrite: options.readWrite,
    });

    if (!options.readWrite) {
      this.write(`Not deleting data ${range}.`);
      this.write(`This would affect ${affected} entries.`);
      return { window, affected, deleted: 0, dryRun: true, vacuumed: false };
    }

    this.write(`About to DELETE data ${range}.`);
    this.write(`This will affect ${affected} entries.`);
    this.write(`Interrupt within ${this.warnSeconds} seconds to prevent that.`);

    await this.sleep(this.warnSeconds, options.signal);

    // An abort racing the end of the countdown still wins.
    if (options.signal?.aborted) {
      throw new TrimInterruptedError();
    }

    this.write('DELETING data');
    const deleted = this.store.deleteInRange(trimBegin, trimEnd);
    logger.info('TrimExecutor: Deleted entries', { trimBegin, trimEnd, deleted });

    let vacuumed = false;
    if (options.vacuum) {
      this.write('Vacuuming database');
      this.store.vacuum();
      vacuumed = true;
      logger.info('TrimExecutor: Vacuum complete');
      this.write('Vacuum done.');
    }

    this.write('Done.');

    return { window, affected, deleted, dryRun: false, vacuumed };
  }
}
