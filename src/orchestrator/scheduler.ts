/**
 * Drama Collector — Collection Scheduler
 *
 * Fires a scheduled job every `collectionIntervalHours`, the first one on the
 * first tick. Ticks run every `checkIntervalSeconds`. A scheduled job that
 * ends in error (and was not cancelled) is retried up to `scheduledRetries`
 * times. During the UTC maintenance hour no scheduled job starts and history
 * is pruned once per day.
 */

import type { SchedulerConfig } from '../config/schema';
import { AlreadyRunningError, errorMessage } from '../lib/errors';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';
import type { JobOrchestrator } from './orchestrator';

export type TickOutcome = 'disabled' | 'maintenance' | 'not-due' | 'busy' | 'started' | 'retry-started';

export interface SchedulerOptions {
  clock?: Clock;
  /** Export scheduled jobs' records */
  exportEnabled?: boolean;
}

export interface SchedulerState {
  running: boolean;
  nextRunAt: string | null;
  lastRunAt: string | null;
  lastJobId: string | null;
  pendingRetryAttempt: number | null;
  lastMaintenanceDay: string | null;
}

type SchedulerOrchestrator = Pick<JobOrchestrator, 'start' | 'whenSettled' | 'pruneHistory'>;

const HOUR_MS = 60 * 60 * 1000;

export class CollectionScheduler {
  private readonly clock: Clock;
  private readonly exportEnabled: boolean;
  private readonly log = logger.child({ component: 'scheduler' });

  private timer?: ReturnType<typeof setInterval>;
  private nextRunAt: number | null = null;
  private lastRunAt: number | null = null;
  private lastJobId: string | null = null;
  private pendingRetryAttempt: number | null = null;
  private lastMaintenanceDay: string | null = null;
  private readonly watchers = new Set<Promise<void>>();

  constructor(
    private readonly orchestrator: SchedulerOrchestrator,
    private readonly settings: SchedulerConfig,
    options: SchedulerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.exportEnabled = options.exportEnabled ?? false;
  }

  /**
   * Start the periodic check; the first tick runs immediately.
   */
  start(): void {
    if (this.timer) return;

    this.log.info('Scheduler started', {
      intervalHours: this.settings.collectionIntervalHours,
      maintenanceHour: this.settings.maintenanceHour,
      checkIntervalSeconds: this.settings.checkIntervalSeconds,
    });

    const check = () => {
      this.tick().catch((error: unknown) => {
        this.log.error('Scheduler tick failed', { error: errorMessage(error) });
      });
    };
    this.timer = setInterval(check, this.settings.checkIntervalSeconds * 1000);
    check();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.log.info('Scheduler stopped');
  }

  /**
   * Wait until every job started by the scheduler, including retries, has settled.
   */
  async drain(): Promise<void> {
    while (this.watchers.size > 0) {
      await Promise.all(this.watchers);
    }
  }

  /**
   * One scheduling decision at `now`.
   */
  async tick(now: number = this.clock.now()): Promise<TickOutcome> {
    if (!this.settings.enabled) return 'disabled';

    const date = new Date(now);
    if (date.getUTCHours() === this.settings.maintenanceHour) {
      const day = date.toISOString().slice(0, 10);
      if (this.lastMaintenanceDay !== day) {
        this.lastMaintenanceDay = day;
        const removed = this.orchestrator.pruneHistory(now);
        this.log.info('Maintenance window', { day, pruned: removed });
      }
      return 'maintenance';
    }

    if (this.pendingRetryAttempt !== null) {
      return this.launch(now, this.pendingRetryAttempt) ? 'retry-started' : 'busy';
    }

    if (this.nextRunAt !== null && now < this.nextRunAt) return 'not-due';

    return this.launch(now, 1) ? 'started' : 'busy';
  }

  state(): SchedulerState {
    const iso = (value: number | null) => (value === null ? null : new Date(value).toISOString());
    return {
      running: this.timer !== undefined,
      nextRunAt: iso(this.nextRunAt),
      lastRunAt: iso(this.lastRunAt),
      lastJobId: this.lastJobId,
      pendingRetryAttempt: this.pendingRetryAttempt,
      lastMaintenanceDay: this.lastMaintenanceDay,
    };
  }

  private get maxAttempts(): number {
    return 1 + (this.settings.autoRetryFailedJobs ? this.settings.scheduledRetries : 0);
  }

  /**
   * Start a scheduled job. A saturated gate leaves the schedule untouched.
   */
  private launch(now: number, attempt: number): boolean {
    let jobId: string;
    try {
      jobId = this.orchestrator.start({
        trigger: 'scheduled',
        requestedCount: this.settings.defaultCount,
        exportEnabled: this.exportEnabled,
        attempt,
      });
    } catch (error) {
      if (error instanceof AlreadyRunningError) {
        this.log.info('Scheduled run skipped, jobs still active', { activeJobIds: error.activeJobIds });
        return false;
      }
      throw error;
    }

    this.pendingRetryAttempt = null;
    this.lastJobId = jobId;
    if (attempt === 1) {
      this.lastRunAt = now;
      this.nextRunAt = now + this.settings.collectionIntervalHours * HOUR_MS;
    }
    this.log.info('Scheduled job started', { jobId, attempt });
    this.watch(jobId, attempt);
    return true;
  }

  private watch(jobId: string, attempt: number): void {
    const watcher = this.orchestrator
      .whenSettled(jobId)
      .then(async job => {
        if (!job || job.state !== 'error' || job.cancelled) return;
        if (attempt >= this.maxAttempts) {
          this.log.warn('Scheduled job failed, no retries left', { jobId, attempt });
          return;
        }
        this.pendingRetryAttempt = attempt + 1;
        this.log.info('Retrying failed scheduled job', { jobId, nextAttempt: attempt + 1 });
        await this.tick();
      })
      .catch((error: unknown) => {
        this.log.error('Scheduled job watcher failed', { jobId, error: errorMessage(error) });
      })
      .finally(() => {
        this.watchers.delete(watcher);
      });
    this.watchers.add(watcher);
  }
}
