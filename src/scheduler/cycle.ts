/**
 * AdFeed — Poll Cycle
 *
 * One pass over every configured target:
 * 1. Fetch the target's search page
 * 2. Extract candidate listings
 * 3. Filter candidates against the target's levels
 * 4. Upsert accepted candidates into the change store
 * 5. Report first sightings as arrivals
 *
 * Targets are visited in order with a jittered pause between them.
 * After the last target old records are pruned.
 *
 * A failing target is logged and skipped; a failing record is logged and
 * skipped. Anything else ends the cycle early and is reported in `error`.
 */

import { nanoid } from 'nanoid';
import type {
  AdLedger,
  Arrival,
  CandidateRecord,
  ConfigSnapshot,
  Target,
  UpsertOutcome,
} from '../types';
import { CandidateRecordSchema } from '../types';
import { accepts } from '../filter';
import { adHash, type AdExtractor, type PageFetcher } from '../sources';
import { DEFAULT_RETENTION_MS } from '../store';
import { logger, errorMessage, timeOperation } from '../lib/logger';

const log = logger.child({ component: 'cycle' });

// ============================================================
// TYPES
// ============================================================

export interface JitterRange {
  minMs: number;
  maxMs: number;
}

export interface CycleDependencies {
  store: AdLedger;
  fetcher: PageFetcher;
  extractor: AdExtractor;
  now?: () => Date;
  /** Returns a value in [0, 1) */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface CycleOptions {
  /** Pause between consecutive targets (default: 2-10 s) */
  jitter?: JitterRange;
  retentionMs?: number;
  signal?: AbortSignal;
  onArrival?: (arrival: Arrival) => void;
}

export interface TargetReport {
  url: string;
  candidates: number;
  /** Dropped because the candidate record was malformed */
  invalid: number;
  filtered: number;
  inserted: number;
  updated: number;
  storeErrors: number;
  error?: string;
}

export interface CycleReport {
  cycleId: string;
  startedAt: string;
  durationMs: number;
  targets: TargetReport[];
  inserted: number;
  /** Null when pruning did not run or failed */
  pruned: number | null;
  aborted: boolean;
  error?: string;
}

export const DEFAULT_JITTER: JitterRange = { minMs: 2_000, maxMs: 10_000 };

// ============================================================
// HELPERS
// ============================================================

export class CycleAbortedError extends Error {
  constructor() {
    super('Cycle aborted');
    this.name = 'CycleAbortedError';
  }
}

/**
 * setTimeout as a promise that rejects with CycleAbortedError on abort.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CycleAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CycleAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function jitterMs(range: JitterRange, random: () => number = Math.random): number {
  return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

function emptyReport(url: string): TargetReport {
  return { url, candidates: 0, invalid: 0, filtered: 0, inserted: 0, updated: 0, storeErrors: 0 };
}

// ============================================================
// TARGET PROCESSING
// ============================================================

async function processTarget(
  target: Target,
  currency: string,
  deps: Required<CycleDependencies>,
  options: CycleOptions
): Promise<TargetReport> {
  const report = emptyReport(target.url);

  let candidates: CandidateRecord[];
  try {
    const page = await deps.fetcher.fetch(target, { signal: options.signal });
    candidates = deps.extractor.extract(page, target, currency);
  } catch (error) {
    if (options.signal?.aborted) throw new CycleAbortedError();
    report.error = errorMessage(error);
    log.warn('Target skipped', { target: target.url, error: report.error });
    return report;
  }

  report.candidates = candidates.length;

  for (const raw of candidates) {
    const parsed = CandidateRecordSchema.safeParse(raw);
    if (!parsed.success) {
      report.invalid++;
      log.debug('Malformed candidate dropped', {
        target: target.url,
        issues: parsed.error.issues.map((i) => i.message),
      });
      continue;
    }

    const candidate = parsed.data;
    if (!accepts(target.filterSpec, candidate.title)) {
      report.filtered++;
      continue;
    }

    const id = adHash(candidate.sourceUrl);
    const seenAt = deps.now();

    let outcome: UpsertOutcome;
    try {
      outcome = deps.store.upsert({
        id,
        title: candidate.title,
        price: candidate.price,
        url: candidate.sourceUrl,
        seenAt,
      });
    } catch (error) {
      report.storeErrors++;
      log.error('Failed to store ad', { id, url: candidate.sourceUrl, error: errorMessage(error) });
      continue;
    }

    if (outcome === 'updated') {
      report.updated++;
      continue;
    }

    report.inserted++;
    log.info('New ad', { id, title: candidate.title, price: candidate.price });
    options.onArrival?.({
      id,
      title: candidate.title,
      price: candidate.price,
      url: candidate.sourceUrl,
      target: target.url,
      seenAt,
    });
  }

  return report;
}

// ============================================================
// CYCLE
// ============================================================

/**
 * Run one cycle over the snapshot's targets. Never rejects.
 */
export async function runCycle(
  snapshot: ConfigSnapshot,
  dependencies: CycleDependencies,
  options: CycleOptions = {}
): Promise<CycleReport> {
  const deps: Required<CycleDependencies> = {
    now: () => new Date(),
    random: Math.random,
    sleep: delay,
    ...dependencies,
  };
  const jitter = options.jitter ?? DEFAULT_JITTER;
  const started = Date.now();

  const report: CycleReport = {
    cycleId: nanoid(10),
    startedAt: deps.now().toISOString(),
    durationMs: 0,
    targets: [],
    inserted: 0,
    pruned: null,
    aborted: false,
  };

  const cycleLog = log.child({ cycleId: report.cycleId });
  cycleLog.info('Cycle started', { targets: snapshot.targets.length });

  try {
    for (const [index, target] of snapshot.targets.entries()) {
      if (options.signal?.aborted) throw new CycleAbortedError();

      const targetReport = await processTarget(target, snapshot.currency, deps, options);
      report.targets.push(targetReport);
      report.inserted += targetReport.inserted;

      if (index < snapshot.targets.length - 1) {
        await deps.sleep(jitterMs(jitter, deps.random), options.signal);
      }
    }

    if (options.signal?.aborted) throw new CycleAbortedError();

    try {
      report.pruned = await timeOperation('prune', async () =>
        deps.store.prune(options.retentionMs ?? DEFAULT_RETENTION_MS)
      );
    } catch (error) {
      cycleLog.error('Prune failed', { error: errorMessage(error) });
    }
  } catch (error) {
    if (error instanceof CycleAbortedError) {
      report.aborted = true;
      cycleLog.info('Cycle aborted', { completedTargets: report.targets.length });
    } else {
      report.error = errorMessage(error);
      cycleLog.error('Cycle ended early', { error: report.error });
    }
  }

  report.durationMs = Date.now() - started;

  cycleLog.info('Cycle completed', {
    targets: report.targets.length,
    inserted: report.inserted,
    pruned: report.pruned,
    aborted: report.aborted,
    durationMs: report.durationMs,
  });

  return report;
}
