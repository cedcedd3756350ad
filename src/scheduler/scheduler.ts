/**
 * AdFeed — Job Scheduler
 *
 * Runs the poll cycle on a fixed interval, one cycle at a time.
 *
 * State machine:
 *   idle ──tick──▶ running ──cycle done──▶ idle
 *   idle|running ──stop()──▶ stopped
 *
 * A tick that arrives while a cycle is running is skipped, not queued.
 *
 * Events:
 *   'cycle:complete' (report: CycleReport)
 *   'cycle:skipped'  (skip: CycleSkip)
 *   'arrival'        (arrival: Arrival)
 */

import { EventEmitter } from 'events';
import { MAX_POLL_INTERVAL_MINUTES, type ConfigSnapshot } from '../types';
import { logger, errorMessage } from '../lib/logger';
import { Mutex } from '../lib/mutex';
import { runCycle, type CycleDependencies, type CycleReport, type JitterRange } from './cycle';

const log = logger.child({ component: 'scheduler' });

// ============================================================
// TYPES
// ============================================================

export type SchedulerState = 'idle' | 'running' | 'stopped';

export type CycleTrigger = 'timer' | 'manual';

export interface CycleSkip {
  trigger: CycleTrigger;
  at: string;
}

export interface JobSchedulerConfig extends CycleDependencies {
  /** Source of the live configuration, read at the start of every cycle */
  snapshot: () => ConfigSnapshot;
  /** Delay before the first cycle after start() (default: 10000) */
  firstRunDelayMs?: number;
  jitter?: JitterRange;
  retentionMs?: number;
}

export const DEFAULT_FIRST_RUN_DELAY_MS = 10_000;

const MINUTE_MS = 60_000;

function assertPollInterval(minutes: number): void {
  if (!Number.isInteger(minutes) || minutes <= 0 || minutes > MAX_POLL_INTERVAL_MINUTES) {
    throw new Error(`Invalid poll interval: ${minutes}`);
  }
}

// ============================================================
// SCHEDULER
// ============================================================

export class JobScheduler extends EventEmitter {
  private readonly config: JobSchedulerConfig;
  private readonly lock = new Mutex();
  private schedulerState: SchedulerState = 'idle';
  private intervalMinutes: number;
  private firstRunTimer: NodeJS.Timeout | null = null;
  private intervalTimer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private lastReport: CycleReport | null = null;

  constructor(config: JobSchedulerConfig) {
    super();
    this.config = config;
    this.intervalMinutes = config.snapshot().pollIntervalMinutes;
    assertPollInterval(this.intervalMinutes);
  }

  get state(): SchedulerState {
    return this.schedulerState;
  }

  get interval(): number {
    return this.intervalMinutes;
  }

  get lastCycle(): CycleReport | null {
    return this.lastReport;
  }

  /**
   * Schedule the first cycle after a short delay, then one every interval.
   */
  start(): void {
    if (this.schedulerState === 'stopped') {
      throw new Error('Scheduler has been stopped');
    }
    if (this.firstRunTimer || this.intervalTimer) {
      log.warn('Scheduler already started');
      return;
    }

    const firstRunDelayMs = this.config.firstRunDelayMs ?? DEFAULT_FIRST_RUN_DELAY_MS;

    this.firstRunTimer = setTimeout(() => {
      this.firstRunTimer = null;
      this.startInterval();
      this.tick();
    }, firstRunDelayMs);

    log.info('Scheduler started', { firstRunDelayMs, intervalMinutes: this.intervalMinutes });
  }

  /**
   * Replace the interval timer. Takes effect from now on; never stacks timers.
   */
  reschedule(minutes: number): void {
    assertPollInterval(minutes);
    if (this.schedulerState === 'stopped') {
      throw new Error('Scheduler has been stopped');
    }

    const previous = this.intervalMinutes;
    this.intervalMinutes = minutes;

    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.startInterval();
    }

    log.info('Scheduler rescheduled', { from: previous, to: minutes });
  }

  /**
   * Config apply listener: follow poll interval changes.
   */
  readonly handleConfigChange = (next: ConfigSnapshot, previous: ConfigSnapshot): void => {
    if (next.pollIntervalMinutes !== previous.pollIntervalMinutes) {
      this.reschedule(next.pollIntervalMinutes);
    }
  };

  /**
   * Run a cycle now. Resolves to null when it was skipped.
   */
  async runNow(trigger: CycleTrigger = 'manual'): Promise<CycleReport | null> {
    if (this.schedulerState === 'stopped') {
      return null;
    }

    const release = this.lock.tryAcquire();
    if (!release) {
      const skip: CycleSkip = { trigger, at: new Date().toISOString() };
      log.warn('Cycle skipped: previous cycle still running', { trigger });
      this.emit('cycle:skipped', skip);
      return null;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.schedulerState = 'running';

    const run = (async () => {
      try {
        return await runCycle(this.config.snapshot(), this.config, {
          jitter: this.config.jitter,
          retentionMs: this.config.retentionMs,
          signal: controller.signal,
          onArrival: (arrival) => this.emit('arrival', arrival),
        });
      } finally {
        this.controller = null;
        if (this.schedulerState === 'running') {
          this.schedulerState = 'idle';
        }
        release();
      }
    })();

    this.inFlight = run;
    let report: CycleReport;
    try {
      report = await run;
    } finally {
      this.inFlight = null;
    }

    this.lastReport = report;
    this.emit('cycle:complete', report);
    return report;
  }

  /**
   * Clear timers, abort the running cycle and wait for it to finish.
   */
  async stop(): Promise<void> {
    if (this.schedulerState === 'stopped') return;

    this.schedulerState = 'stopped';
    this.clearTimers();

    const running = this.inFlight;
    if (running) {
      log.info('Stopping scheduler, aborting running cycle');
      this.controller?.abort();
      try {
        await running;
      } catch (error) {
        log.error('Cycle failed during shutdown', { error: errorMessage(error) });
      }
    }

    log.info('Scheduler stopped');
  }

  private startInterval(): void {
    this.intervalTimer = setInterval(() => this.tick(), this.intervalMinutes * MINUTE_MS);
  }

  private tick(): void {
    this.runNow('timer').catch((error: unknown) => {
      log.error('Scheduled cycle failed', { error: errorMessage(error) });
    });
  }

  private clearTimers(): void {
    if (this.firstRunTimer) {
      clearTimeout(this.firstRunTimer);
      this.firstRunTimer = null;
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
  }
}
