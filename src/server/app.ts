/**
 * AdFeed — HTTP Server
 *
 * Endpoints:
 * - GET  /health         — Liveness, database, scheduler state
 * - GET  /rss            — The feed
 * - GET  /api/config     — Persisted configuration document
 * - POST /api/config     — Validate, persist and apply a new document
 * - GET  /api/arrivals   — Ads first seen by this process
 *
 * Every route is rate limited per client IP.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { ConfigManager } from '../config';
import type { FeedSynthesizer } from '../delivery';
import type { CycleReport, SchedulerState } from '../scheduler';
import { logger, errorMessage } from '../lib/logger';
import { RateLimiter, rateLimit } from './rate-limit';

const log = logger.child({ component: 'http' });

// ============================================================
// TYPES
// ============================================================

export interface SchedulerStatus {
  readonly state: SchedulerState;
  readonly interval: number;
  readonly lastCycle: CycleReport | null;
}

export interface AppDependencies {
  config: ConfigManager;
  store: { count(): number };
  feed: FeedSynthesizer;
  scheduler?: SchedulerStatus;
  rateLimiter?: RateLimiter;
  startedAt?: Date;
  now?: () => Date;
}

// ============================================================
// HELPERS
// ============================================================

function httpStatusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 600) return status;
  }
  return 500;
}

function schedulerSummary(scheduler: SchedulerStatus | undefined) {
  if (!scheduler) return null;
  const last = scheduler.lastCycle;
  return {
    state: scheduler.state,
    interval_minutes: scheduler.interval,
    last_cycle: last && {
      id: last.cycleId,
      started_at: last.startedAt,
      duration_ms: last.durationMs,
      inserted: last.inserted,
      aborted: last.aborted,
      error: last.error ?? null,
    },
  };
}

// ============================================================
// APP
// ============================================================

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const now = deps.now ?? (() => new Date());
  const startedAt = deps.startedAt ?? now();
  const limiter = deps.rateLimiter ?? new RateLimiter();

  app.use(rateLimit(limiter));
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    const timestamp = now();
    const snapshot = deps.config.getSnapshot();

    let ads: number | null = null;
    try {
      ads = deps.store.count();
    } catch (error) {
      log.error('Health check could not read the store', { error: errorMessage(error) });
    }

    res.status(ads === null ? 503 : 200).json({
      status: ads === null ? 'degraded' : 'up',
      timestamp: timestamp.toISOString(),
      database: snapshot.databaseName,
      uptime_secs: Math.floor((timestamp.getTime() - startedAt.getTime()) / 1000),
      ads,
      scheduler: schedulerSummary(deps.scheduler),
    });
  });

  app.get('/rss', (_req: Request, res: Response) => {
    let xml: string;
    try {
      xml = deps.feed.render();
    } catch (error) {
      log.error('Feed render failed', { error: errorMessage(error) });
      res.status(500).type('text/plain').send('Database error');
      return;
    }

    res.type('application/rss+xml').send(xml);
  });

  app.get('/api/config', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await deps.config.readDocument());
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/config', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await deps.config.applyUpdate(req.body);

      switch (result.status) {
        case 'rejected':
          res.status(400).json({ detail: result.message, issues: result.issues ?? [] });
          return;
        case 'rolled_back':
        case 'rollback_failed':
          res.status(500).json({ detail: result.message, status: result.status });
          return;
        default:
          res.status(200).json({
            message: result.message,
            status: result.status,
            changes: result.changes,
          });
      }
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/arrivals', (_req: Request, res: Response) => {
    res.json({ arrivals: deps.feed.recentArrivals() });
  });

  // Express recognises error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(error);
    const detail = errorMessage(error);

    if (status >= 500) {
      log.error('Request failed', { method: req.method, path: req.path, error: detail });
    } else {
      log.warn('Bad request', { method: req.method, path: req.path, error: detail });
    }

    res.status(status).json({ detail });
  });

  return app;
}
