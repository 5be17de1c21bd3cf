/**
 * TrimExecutor Unit Tests
 *
 * The store, the countdown and the report output are all fakes; no real time
 * passes and no database is touched.
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { COUNTME_START_TIME, SECONDS_PER_WEEK, WARN_SECONDS } from '../../../src/config/constants';
import { TrimInterruptedError } from '../../../src/errors';
import { TrimExecutor } from '../../../src/services/trim-executor';
import type { TrimWindow } from '../../../src/services/trim-window-planner';

describe('TrimExecutor', () => {
  const window: TrimWindow = {
    trimBegin: COUNTME_START_TIME,
    trimEnd: COUNTME_START_TIME + 3 * SECONDS_PER_WEEK,
  };

  let store: {
    getMinTime: Mock<[], number | null>;
    getMaxTime: Mock<[], number | null>;
    countInRange: Mock<[number, number], number>;
    deleteInRange: Mock<[number, number], number>;
    vacuum: Mock<[], void>;
  };
  let sleep: Mock<[number, AbortSignal | undefined], Promise<void>>;
  let lines: string[];
  let executor: TrimExecutor;

  beforeEach(() => {
    store = {
      getMinTime: vi.fn<[], number | null>(),
      getMaxTime: vi.fn<[], number | null>(),
      countInRange: vi.fn<[number, number], number>().mockReturnValue(10),
      deleteInRange: vi.fn<[number, number], number>().mockReturnValue(10),
      vacuum: vi.fn<[], void>(),
    };
    sleep = vi.fn<[number, AbortSignal | undefined], Promise<void>>().mockResolvedValue(undefined);
    lines = [];
    executor = new TrimExecutor(store, {
      sleep,
      write: (line) => lines.push(line),
    });
  });

  describe('dry run', () => {
    it('should report what would be deleted', async () => {
      await executor.execute(window, { readWrite: false });

      expect(lines).toEqual([
        'Not deleting data from 2020-04-20 to 2020-05-11.',
        'This would affect 10 entries.',
      ]);
    });

    it('should count the window but never delete or wait', async () => {
      const outcome = await executor.execute(window, { readWrite: false, vacuum: true });

      expect(store.countInRange).toHaveBeenCalledOnce();
      expect(store.countInRange).toHaveBeenCalledWith(window.trimBegin, window.trimEnd);
      expect(store.deleteInRange).not.toHaveBeenCalled();
      expect(store.vacuum).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
      expect(outcome).toEqual({ window, affected: 10, deleted: 0, dryRun: true, vacuumed: false });
    });

    it('should not delete even when nothing is affected', async () => {
      store.countInRange.mockReturnValue(0);

      await executor.execute(window, { readWrite: false });

      expect(lines[1]).toBe('This would affect 0 entries.');
      expect(store.deleteInRange).not.toHaveBeenCalled();
    });
  });

  describe('read-write', () => {
    it('should warn, wait, then delete the window', async () => {
      const outcome = await executor.execute(window, { readWrite: true });

      expect(lines).toEqual([
        'About to DELETE data from 2020-04-20 to 2020-05-11.',
        'This will affect 10 entries.',
        `Interrupt within ${WARN_SECONDS} seconds to prevent that.`,
        'DELETING data',
        'Done.',
      ]);
      expect(sleep).toHaveBeenCalledOnce();
      expect(sleep).toHaveBeenCalledWith(WARN_SECONDS, undefined);
      expect(store.deleteInRange).toHaveBeenCalledWith(window.trimBegin, window.trimEnd);
      expect(outcome).toEqual({ window, affected: 10, deleted: 10, dryRun: false, vacuumed: false });
    });

    it('should wait before deleting', async () => {
      await executor.execute(window, { readWrite: true });

      expect(sleep.mock.invocationCallOrder[0]).toBeLessThan(store.deleteInRange.mock.invocationCallOrder[0]);
    });

    it('should pass the abort signal to the countdown', async () => {
      const controller = new AbortController();

      await executor.execute(window, { readWrite: true, signal: controller.signal });

      expect(sleep).toHaveBeenCalledWith(WARN_SECONDS, controller.signal);
    });

    it('should honour a custom warning interval', async () => {
      executor = new TrimExecutor(store, { sleep, write: (line) => lines.push(line), warnSeconds: 30 });

      await executor.execute(window, { readWrite: true });

      expect(sleep).toHaveBeenCalledWith(30, undefined);
      expect(lines[2]).toBe('Interrupt within 30 seconds to prevent that.');
    });

    it('should report the rows actually deleted', async () => {
      store.deleteInRange.mockReturnValue(7);

      const outcome = await executor.execute(window, { readWrite: true });

      expect(outcome.affected).toBe(10);
      expect(outcome.deleted).toBe(7);
    });

    it('should vacuum after deleting when asked to', async () => {
      const outcome = await executor.execute(window, { readWrite: true, vacuum: true });

      expect(store.vacuum).toHaveBeenCalledOnce();
      expect(store.deleteInRange.mock.invocationCallOrder[0]).toBeLessThan(store.vacuum.mock.invocationCallOrder[0]);
      expect(lines.slice(3)).toEqual(['DELETING data', 'Vacuuming database', 'Vacuum done.', 'Done.']);
      expect(outcome.vacuumed).toBe(true);
    });

    it('should propagate store failures without reporting success', async () => {
      store.deleteInRange.mockImplementation(() => {
        throw new Error('database is locked');
      });

      await expect(executor.execute(window, { readWrite: true, vacuum: true })).rejects.toThrow(
        'database is locked'
      );
      expect(store.deleteInRange).toHaveBeenCalledOnce();
      expect(store.vacuum).not.toHaveBeenCalled();
      expect(lines).not.toContain('Done.');
    });
  });

  describe('interrupted countdown', () => {
    it('should propagate the interruption and never delete', async () => {
      sleep.mockRejectedValue(new TrimInterruptedError());

      await expect(executor.execute(window, { readWrite: true })).rejects.toBeInstanceOf(TrimInterruptedError);

      expect(store.countInRange).toHaveBeenCalledOnce();
      expect(store.deleteInRange).not.toHaveBeenCalled();
      expect(lines).toEqual([
        'About to DELETE data from 2020-04-20 to 2020-05-11.',
        'This will affect 10 entries.',
        `Interrupt within ${WARN_SECONDS} seconds to prevent that.`,
      ]);
    });

    it('should not delete when the abort arrives as the countdown completes', async () => {
      const controller = new AbortController();
      sleep.mockImplementation(async () => {
        controller.abort();
      });

      await expect(
        executor.execute(window, { readWrite: true, signal: controller.signal })
      ).rejects.toBeInstanceOf(TrimInterruptedError);
      expect(store.deleteInRange).not.toHaveBeenCalled();
      expect(lines).not.toContain('DELETING data');
    });

    it('should pass other countdown failures through unchanged', async () => {
      const failure = new Error('timer failed');
      sleep.mockRejectedValue(failure);

      await expect(executor.execute(window, { readWrite: true })).rejects.toBe(failure);
      expect(store.deleteInRange).not.toHaveBeenCalled();
    });
  });
});
