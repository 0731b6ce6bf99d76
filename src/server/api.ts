/**
 * Drama Collector — HTTP API
 *
 * Thin pass-through to the orchestrator, the store and the configuration.
 *
 * Endpoints:
 * - GET  /health             — Health check for monitoring
 * - GET  /status             — Orchestrator and scheduler status
 * - POST /jobs/start         — Start a manual collection job
 * - POST /jobs/stop          — Cancel the running job(s)
 * - GET  /jobs/current       — The running job, if any
 * - GET  /jobs/history       — Recent jobs, newest first
 * - GET  /jobs/:id           — One job
 * - GET  /records            — Stored records, most recently updated first
 * - GET  /config             — Active configuration, secrets redacted
 * - POST /config/reload      — Re-read configuration file and environment
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ConfigManager } from '../config';
import type { RecordStore } from '../db/store';
import type { JobOrchestrator } from '../orchestrator/orchestrator';
import type { CollectionScheduler } from '../orchestrator/scheduler';
import { AlreadyRunningError, ConfigError, StoreUnavailableError } from '../lib/errors';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';

export interface ApiDeps {
  orchestrator: JobOrchestrator;
  store: RecordStore;
  config: ConfigManager;
  scheduler?: CollectionScheduler;
  clock?: Clock;
}

const MAX_REQUESTED_COUNT = 1000;

export const StartJobBodySchema = z.object({
  count: z.number().int().positive().max(MAX_REQUESTED_COUNT).optional(),
  export: z.boolean().optional(),
  qualityThreshold: z.number().min(0).max(10).optional(),
  sources: z.array(z.string().min(1)).optional(),
});

const StopJobBodySchema = z.object({
  jobId: z.string().min(1).optional(),
});

const LimitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

const log = logger.child({ component: 'api' });

export function createApp(deps: ApiDeps): Express {
  const app = express();
  const clock = deps.clock ?? systemClock;

  app.use(express.json({ limit: '100kb' }));

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const store = await deps.store.ping();
      res.json({
        status: store.healthy ? 'ok' : 'degraded',
        timestamp: new Date(clock.now()).toISOString(),
        store: { driver: deps.store.driver, ...store },
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/status', (_req: Request, res: Response) => {
    res.json({
      orchestrator: deps.orchestrator.status(),
      scheduler: deps.scheduler?.state() ?? null,
    });
  });

  // ============================================================
  // JOBS
  // ============================================================

  app.post('/jobs/start', (req: Request, res: Response) => {
    const parsed = StartJobBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
      return;
    }

    const config = deps.config.get();
    const body = parsed.data;

    try {
      const jobId = deps.orchestrator.start({
        trigger: 'manual',
        requestedCount: body.count ?? config.scheduler.defaultCount,
        exportEnabled: body.export ?? config.export.enabled,
        qualityThreshold: body.qualityThreshold,
        sources: body.sources,
      });
      res.status(201).json({ jobId, job: deps.orchestrator.get(jobId) });
    } catch (error) {
      if (error instanceof AlreadyRunningError) {
        res.status(409).json({ error: error.message, activeJobIds: error.activeJobIds });
        return;
      }
      throw error;
    }
  });

  app.post('/jobs/stop', (req: Request, res: Response) => {
    const parsed = StopJobBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request body', issues: parsed.error.issues });
      return;
    }

    const stopped = deps.orchestrator.stop(parsed.data.jobId);
    if (stopped.length === 0) {
      res.status(404).json({ error: 'No running job to stop' });
      return;
    }
    res.status(202).json({ stopped });
  });

  app.get('/jobs/current', (_req: Request, res: Response) => {
    res.json({ job: deps.orchestrator.current() });
  });

  app.get('/jobs/history', (req: Request, res: Response) => {
    const parsed = LimitQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid limit', issues: parsed.error.issues });
      return;
    }
    res.json({ jobs: deps.orchestrator.history(parsed.data.limit) });
  });

  app.get('/jobs/:id', (req: Request, res: Response) => {
    const job = deps.orchestrator.get(req.params.id);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json({ job });
  });

  // ============================================================
  // RECORDS
  // ============================================================

  app.get('/records', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = LimitQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid limit', issues: parsed.error.issues });
      return;
    }

    try {
      const records = await deps.store.list(parsed.data.limit);
      res.json({ records, count: records.length });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // CONFIG
  // ============================================================

  app.get('/config', (_req: Request, res: Response) => {
    res.json({ config: deps.config.summary() });
  });

  app.post('/config/reload', (_req: Request, res: Response) => {
    try {
      deps.config.reload();
      res.json({ reloaded: true, config: deps.config.summary() });
    } catch (error) {
      if (error instanceof ConfigError) {
        res.status(400).json({ error: 'Invalid configuration', issues: error.issues });
        return;
      }
      throw error;
    }
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (err instanceof StoreUnavailableError) {
      log.warn('Store unavailable', { error: err.message });
      res.status(503).json({ error: 'Store unavailable' });
      return;
    }
    log.error('Unhandled error in API server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
