/**
 * Drama Collector — Job Orchestrator
 *
 * Drives a collection job through its lifecycle:
 *   idle → collecting → processing → storing → (exporting) → completed
 * Any stage can end the job in `error`. The orchestrator is the only writer
 * of job state; everything it hands out is a deep copy.
 *
 * Cancellation is cooperative. stop() aborts the job's signal; the aggregator
 * checks it between retries and the orchestrator between stages.
 */

import { nanoid } from 'nanoid';
import {
  isTerminal,
  type CanonicalRecord,
  type Job,
  type JobSnapshot,
  type JobState,
  type JobStatusListener,
  type StartJobOptions,
} from '../types';
import type { ExportFormat } from '../config/schema';
import type { MultiSourceAggregator } from '../aggregator/aggregator';
import { filterByQuality, type DataValidator } from '../processing/validator';
import type { RecordStore } from '../db/store';
import type { DataExporter } from '../export/exporter';
import {
  AggregatorTotalFailureError,
  AlreadyRunningError,
  ExportFailureError,
  JobCancelledError,
  StoreUnavailableError,
  errorMessage,
} from '../lib/errors';
import { systemClock, type Clock } from '../lib/clock';
import { logger, timeOperation } from '../lib/logger';
import { JobHistory } from './history';

// ============================================================
// TYPES
// ============================================================

export interface OrchestratorDeps {
  aggregator: Pick<MultiSourceAggregator, 'collect'>;
  validator: Pick<DataValidator, 'validateBatch'>;
  store: RecordStore;
  exporter: Pick<DataExporter, 'export'>;
  clock?: Clock;
}

export interface OrchestratorSettings {
  maxConcurrentJobs: number;
  qualityThreshold: number;
  exportFormats: ExportFormat[];
  historyMaxEntries: number;
  historyRetentionHours: number;
}

export interface OrchestratorStatus {
  activeJobs: number;
  maxConcurrentJobs: number;
  currentJob: JobSnapshot | null;
  lastCompletedJob: JobSnapshot | null;
  historySize: number;
}

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  idle: ['collecting', 'error'],
  collecting: ['processing', 'error'],
  processing: ['storing', 'error'],
  storing: ['exporting', 'completed', 'error'],
  exporting: ['completed', 'error'],
  completed: [],
  error: [],
};

const ORCHESTRATOR_SOURCE = 'orchestrator';

function stageSource(error: unknown, stage: JobState): string {
  if (error instanceof AggregatorTotalFailureError) return 'aggregator';
  if (error instanceof StoreUnavailableError) return 'store';
  if (error instanceof ExportFailureError) return 'exporter';
  return stage;
}

// ============================================================
// ORCHESTRATOR
// ============================================================

export class JobOrchestrator {
  private readonly clock: Clock;
  private readonly jobs: JobHistory;
  private readonly controllers = new Map<string, AbortController>();
  private readonly running = new Map<string, Promise<void>>();
  private readonly listeners = new Set<JobStatusListener>();
  private readonly log = logger.child({ component: 'orchestrator' });

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings
  ) {
    this.clock = deps.clock ?? systemClock;
    this.jobs = new JobHistory(settings.historyMaxEntries);
  }

  /**
   * Create a job and start running it. Throws AlreadyRunningError when
   * `maxConcurrentJobs` jobs are already non-terminal.
   */
  start(options: StartJobOptions): string {
    const active = this.jobs.active();
    if (active.length >= this.settings.maxConcurrentJobs) {
      throw new AlreadyRunningError(
        active.map(job => job.id),
        this.settings.maxConcurrentJobs
      );
    }

    const job: Job = {
      id: `job_${nanoid(12)}`,
      state: 'idle',
      trigger: options.trigger ?? 'manual',
      requestedCount: options.requestedCount,
      exportEnabled: options.exportEnabled ?? false,
      qualityThreshold: options.qualityThreshold ?? this.settings.qualityThreshold,
      sources: options.sources && options.sources.length > 0 ? [...options.sources] : undefined,
      attempt: options.attempt ?? 1,
      startTime: this.timestamp(),
      counters: { totalCollected: 0, totalProcessed: 0, totalStored: 0 },
      droppedRecords: 0,
      errors: [],
      exports: [],
      cancelled: false,
    };

    this.jobs.add(job);
    const controller = new AbortController();
    this.controllers.set(job.id, controller);

    this.log.info('Job created', {
      jobId: job.id,
      trigger: job.trigger,
      requestedCount: job.requestedCount,
      exportEnabled: job.exportEnabled,
      attempt: job.attempt,
    });
    this.notify(job);

    const done = this.run(job, controller.signal)
      .catch((error: unknown) => {
        this.log.error('Job runner failed', { jobId: job.id, error: errorMessage(error) });
      })
      .finally(() => {
        this.controllers.delete(job.id);
        this.running.delete(job.id);
      });
    this.running.set(job.id, done);

    return job.id;
  }

  /**
   * Request cancellation of `id`, or of every running job when omitted.
   * Returns the ids that were signalled.
   */
  stop(id?: string): string[] {
    const targets = id ? this.jobs.active().filter(job => job.id === id) : this.jobs.active();
    const stopped: string[] = [];

    for (const job of targets) {
      const controller = this.controllers.get(job.id);
      if (!controller || controller.signal.aborted) continue;
      controller.abort();
      stopped.push(job.id);
      this.log.info('Cancellation requested', { jobId: job.id, state: job.state });
    }

    return stopped;
  }

  /**
   * The most recently started non-terminal job.
   */
  current(): JobSnapshot | null {
    const active = this.jobs.active();
    const job = active[active.length - 1];
    return job ? this.snapshot(job) : null;
  }

  active(): JobSnapshot[] {
    return this.jobs.active().map(job => this.snapshot(job));
  }

  get(id: string): JobSnapshot | null {
    const job = this.jobs.get(id);
    return job ? this.snapshot(job) : null;
  }

  /**
   * Jobs, most recent first.
   */
  history(limit?: number): JobSnapshot[] {
    return this.jobs.list(limit).map(job => this.snapshot(job));
  }

  /**
   * Resolves once the job has reached a terminal state.
   */
  async whenSettled(id: string): Promise<JobSnapshot | null> {
    await this.running.get(id);
    return this.get(id);
  }

  onStatusChange(listener: JobStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  status(): OrchestratorStatus {
    const finished = this.jobs.list().find(job => isTerminal(job.state));
    return {
      activeJobs: this.jobs.active().length,
      maxConcurrentJobs: this.settings.maxConcurrentJobs,
      currentJob: this.current(),
      lastCompletedJob: finished ? this.snapshot(finished) : null,
      historySize: this.jobs.size,
    };
  }

  /**
   * Drop terminal jobs older than the retention horizon.
   */
  pruneHistory(now: number = this.clock.now()): number {
    const removed = this.jobs.prune(now, this.settings.historyRetentionHours * 60 * 60 * 1000);
    if (removed > 0) {
      this.log.info('History pruned', { removed, remaining: this.jobs.size });
    }
    return removed;
  }

  // ============================================================
  // PIPELINE
  // ============================================================

  private async run(job: Job, signal: AbortSignal): Promise<void> {
    try {
      this.transition(job, 'collecting');
      const collected = await timeOperation(
        `job ${job.id} collecting`,
        () =>
          this.deps.aggregator.collect(job.requestedCount, job.sources, {
            signal,
            onSourceError: entry => this.appendError(job, entry.source, entry.message, entry.timestamp),
          }),
        this.log
      );
      this.checkCancelled(job, signal);
      job.counters.totalCollected = collected.records.length;
      this.notify(job);

      this.transition(job, 'processing');
      const accepted = this.process(job, collected.records);
      this.checkCancelled(job, signal);

      this.transition(job, 'storing');
      const stored = await timeOperation(
        `job ${job.id} storing`,
        () => this.deps.store.upsert(accepted),
        this.log
      );
      job.counters.totalStored = stored;
      this.notify(job);
      this.checkCancelled(job, signal);

      if (job.exportEnabled) {
        this.transition(job, 'exporting');
        job.exports = await timeOperation(
          `job ${job.id} exporting`,
          () => this.deps.exporter.export(accepted, this.settings.exportFormats, { jobId: job.id }),
          this.log
        );
      }

      this.transition(job, 'completed');
      this.log.info('Job completed', {
        jobId: job.id,
        counters: job.counters,
        dropped: job.droppedRecords,
        errors: job.errors.length,
        exports: job.exports.length,
      });
    } catch (error) {
      if (error instanceof JobCancelledError || signal.aborted) {
        job.cancelled = true;
        this.appendError(job, ORCHESTRATOR_SOURCE, `Job cancelled during ${job.state}`);
        this.log.warn('Job cancelled', { jobId: job.id, stage: job.state });
      } else {
        this.appendError(job, stageSource(error, job.state), errorMessage(error));
        this.log.error('Job failed', { jobId: job.id, stage: job.state, error: errorMessage(error) });
      }
      this.transition(job, 'error');
    }
  }

  private process(job: Job, records: readonly CanonicalRecord[]): CanonicalRecord[] {
    const results = this.deps.validator.validateBatch(records);
    const accepted = filterByQuality(results, job.qualityThreshold).map(result => result.record);

    job.counters.totalProcessed = accepted.length;
    job.droppedRecords = results.length - accepted.length;
    this.notify(job);

    if (job.droppedRecords > 0) {
      this.log.info('Records below quality threshold dropped', {
        jobId: job.id,
        dropped: job.droppedRecords,
        threshold: job.qualityThreshold,
      });
    }
    return accepted;
  }

  private checkCancelled(job: Job, signal: AbortSignal): void {
    if (signal.aborted) {
      throw new JobCancelledError(job.state);
    }
  }

  private transition(job: Job, next: JobState): void {
    if (!TRANSITIONS[job.state].includes(next)) {
      throw new Error(`Invalid job transition ${job.state} -> ${next}`);
    }
    job.state = next;
    if (isTerminal(next)) {
      job.endTime = this.timestamp();
    }
    this.log.debug('Job state changed', { jobId: job.id, state: next });
    this.notify(job);
  }

  private appendError(job: Job, source: string, message: string, timestamp: string = this.timestamp()): void {
    job.errors.push({ source, message, timestamp });
    this.notify(job);
  }

  private notify(job: Job): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot(job);
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.log.warn('Status listener threw', { jobId: job.id, error: errorMessage(error) });
      }
    }
  }

  private snapshot(job: Job): JobSnapshot {
    return structuredClone(job);
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
