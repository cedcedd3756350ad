/**
 * Tests for the job scheduler: exclusion, timers, rescheduling, shutdown
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JobScheduler, type CycleReport, type CycleSkip } from '../../src/scheduler';
import { ChangeStore } from '../../src/store';
import { MarketplaceExtractor, type FetchOptions, type PageFetcher } from '../../src/sources';
import type { Arrival, ConfigSnapshot, Target } from '../../src/types';
import { makeSnapshot, searchPage } from '../helpers';

const MINUTE_MS = 60_000;

const page = searchPage([
  { id: '1', title: 'Leather Sofa', price: '$100' },
  { id: '2', title: 'Desk Lamp', price: '$15' },
]);

/**
 * Answers immediately unless `hold()` was called, in which case requests
 * wait for `releaseAll()` or for their abort signal.
 */
class ControlledFetcher implements PageFetcher {
  calls = 0;
  private holding = false;
  private pending: Array<() => void> = [];

  hold(): void {
    this.holding = true;
  }

  releaseAll(): void {
    this.holding = false;
    for (const resolve of this.pending.splice(0)) resolve();
  }

  async fetch(_target: Target, options: FetchOptions = {}): Promise<string> {
    this.calls++;
    if (!this.holding) return page;

    await new Promise<void>((resolve, reject) => {
      this.pending.push(() => resolve());
      options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
    return page;
  }
}

describe('JobScheduler', () => {
  let store: ChangeStore;
  let fetcher: ControlledFetcher;
  let snapshot: ConfigSnapshot;
  let scheduler: JobScheduler;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    store = new ChangeStore();
    fetcher = new ControlledFetcher();
    snapshot = makeSnapshot();
    scheduler = new JobScheduler({
      snapshot: () => snapshot,
      store,
      fetcher,
      extractor: new MarketplaceExtractor(),
      sleep: async () => {},
    });
  });

  afterEach(async () => {
    fetcher.releaseAll();
    await scheduler.stop();
    store.close();
    vi.useRealTimers();
  });

  function completedCycles(): CycleReport[] {
    const reports: CycleReport[] = [];
    scheduler.on('cycle:complete', (report: CycleReport) => reports.push(report));
    return reports;
  }

  describe('runNow', () => {
    it('should run a cycle and return to idle', async () => {
      const pending = scheduler.runNow();
      expect(scheduler.state).toBe('running');

      const report = await pending;

      expect(report?.targets).toHaveLength(2);
      expect(scheduler.state).toBe('idle');
      expect(scheduler.lastCycle).toBe(report);
    });

    it('should skip a cycle while another is running', async () => {
      fetcher.hold();
      const skips: CycleSkip[] = [];
      scheduler.on('cycle:skipped', (skip: CycleSkip) => skips.push(skip));

      const first = scheduler.runNow();
      const second = await scheduler.runNow();

      expect(second).toBeNull();
      expect(fetcher.calls).toBe(1);
      expect(skips).toHaveLength(1);
      expect(skips[0].trigger).toBe('manual');
      expect(console.warn).toHaveBeenCalledTimes(1);

      fetcher.releaseAll();
      const report = await first;
      expect(report?.aborted).toBe(false);
      expect(fetcher.calls).toBe(2);
    });

    it('should accept a new cycle once the previous one finished', async () => {
      await scheduler.runNow();
      const report = await scheduler.runNow();

      expect(report).not.toBeNull();
      expect(fetcher.calls).toBe(4);
    });

    it('should emit arrivals for new ads', async () => {
      const arrivals: Arrival[] = [];
      scheduler.on('arrival', (arrival: Arrival) => arrivals.push(arrival));

      await scheduler.runNow();

      expect(arrivals.map((a) => a.title)).toEqual(['Leather Sofa', 'Desk Lamp']);
    });

    it('should release the lock after a cycle ends on an error', async () => {
      scheduler.once('arrival', () => {
        throw new Error('listener exploded');
      });

      const failed = await scheduler.runNow();
      const next = await scheduler.runNow();

      expect(failed?.error).toBe('listener exploded');
      expect(next).not.toBeNull();
      expect(scheduler.state).toBe('idle');
    });

    it('should read the live snapshot at the start of each cycle', async () => {
      await scheduler.runNow();
      snapshot = makeSnapshot({ url_filters: {} });

      const report = await scheduler.runNow();

      expect(report?.targets).toEqual([]);
    });
  });

  describe('timers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('should run the first cycle after the start-up delay', async () => {
      const reports = completedCycles();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(9_999);
      expect(reports).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(reports).toHaveLength(1);
    });

    it('should repeat every poll interval', async () => {
      const reports = completedCycles();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(10_000);
      await vi.advanceTimersByTimeAsync(15 * MINUTE_MS);
      await vi.advanceTimersByTimeAsync(15 * MINUTE_MS);

      expect(reports).toHaveLength(3);
    });

    it('should skip timer ticks while a cycle is still running', async () => {
      const reports = completedCycles();
      const skips: CycleSkip[] = [];
      scheduler.on('cycle:skipped', (skip: CycleSkip) => skips.push(skip));
      fetcher.hold();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(10_000);
      await vi.advanceTimersByTimeAsync(15 * MINUTE_MS);

      expect(skips.map((s) => s.trigger)).toEqual(['timer']);
      expect(reports).toHaveLength(0);

      fetcher.releaseAll();
      await vi.advanceTimersByTimeAsync(0);
      expect(reports).toHaveLength(1);
    });

    it('should replace the interval on reschedule', async () => {
      const reports = completedCycles();
      scheduler.start();
      await vi.advanceTimersByTimeAsync(10_000);

      scheduler.reschedule(1);
      await vi.advanceTimersByTimeAsync(15 * MINUTE_MS);

      expect(scheduler.interval).toBe(1);
      expect(reports).toHaveLength(16);
    });

    it('should use the new interval when rescheduled before the first cycle', async () => {
      const reports = completedCycles();
      scheduler.start();
      scheduler.reschedule(2);

      await vi.advanceTimersByTimeAsync(10_000 + 2 * MINUTE_MS);

      expect(reports).toHaveLength(2);
    });

    it('should not start twice', async () => {
      const reports = completedCycles();
      scheduler.start();
      scheduler.start();

      await vi.advanceTimersByTimeAsync(10_000);

      expect(reports).toHaveLength(1);
    });
  });

  describe('reschedule', () => {
    it('should refuse a non-positive interval', () => {
      expect(() => scheduler.reschedule(0)).toThrow('Invalid poll interval: 0');
      expect(scheduler.interval).toBe(15);
    });

    it('should refuse an interval longer than a timer can hold', () => {
      expect(() => scheduler.reschedule(35_792)).toThrow('Invalid poll interval: 35792');

      scheduler.reschedule(35_791);
      expect(scheduler.interval).toBe(35_791);
    });

    it('should refuse a snapshot whose interval a timer cannot hold', () => {
      const oversized = makeSnapshot({ poll_interval_minutes: 40_000 });

      expect(
        () =>
          new JobScheduler({
            snapshot: () => oversized,
            store,
            fetcher,
            extractor: new MarketplaceExtractor(),
          })
      ).toThrow('Invalid poll interval: 40000');
    });

    it('should run once per interval at the longest allowed interval', async () => {
      vi.useFakeTimers();
      const reports = completedCycles();
      scheduler.reschedule(35_791);
      scheduler.start();

      await vi.advanceTimersByTimeAsync(10_000);
      await vi.advanceTimersByTimeAsync(MINUTE_MS);

      expect(reports).toHaveLength(1);
    });

    it('should follow interval changes from config', () => {
      const reschedule = vi.spyOn(scheduler, 'reschedule');

      scheduler.handleConfigChange(makeSnapshot({ currency: '€' }), snapshot);
      expect(reschedule).not.toHaveBeenCalled();

      scheduler.handleConfigChange(makeSnapshot({ poll_interval_minutes: 5 }), snapshot);
      expect(reschedule).toHaveBeenCalledWith(5);
      expect(scheduler.interval).toBe(5);
    });
  });

  describe('stop', () => {
    it('should abort the running cycle and wait for it', async () => {
      fetcher.hold();
      const pending = scheduler.runNow();

      await scheduler.stop();
      const report = await pending;

      expect(report?.aborted).toBe(true);
      expect(scheduler.state).toBe('stopped');
    });

    it('should refuse work after stopping', async () => {
      await scheduler.stop();

      expect(await scheduler.runNow()).toBeNull();
      expect(() => scheduler.start()).toThrow('Scheduler has been stopped');
      expect(fetcher.calls).toBe(0);
    });

    it('should cancel pending timers', async () => {
      vi.useFakeTimers();
      const reports = completedCycles();
      scheduler.start();

      await scheduler.stop();
      await vi.advanceTimersByTimeAsync(20 * MINUTE_MS);

      expect(reports).toHaveLength(0);
    });
  });
});
