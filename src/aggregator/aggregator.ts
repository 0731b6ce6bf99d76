/**
 * Drama Collector — Multi-Source Aggregator
 *
 * Fans a collection request out to every selected source at once:
 * 1. Select enabled sources, highest priority first
 * 2. fetchList on each concurrently, with a per-call timeout
 * 3. Retry unavailable sources with backoff; record rejections immediately
 * 4. Merge and deduplicate the raw records, score completeness
 * 5. Optionally enrich the best records from their top source's detail view
 * 6. Sort by completeness and truncate to the requested count
 *
 * Per-source failures are returned as data. Only a run in which every source
 * failed raises AggregatorTotalFailureError.
 */

import {
  RECORD_FIELD_NAMES,
  type CanonicalRecord,
  type RawRecord,
  type RecordFieldName,
  type RecordFields,
  type SourceErrorEntry,
} from '../types';
import type { AggregatorSettings } from '../config/schema';
import type { SourceAdapter, SourceRegistry } from '../sources/base';
import {
  AggregatorTotalFailureError,
  SourceError,
  SourceExhaustedError,
  SourceUnavailableError,
  errorMessage,
} from '../lib/errors';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';
import {
  advanceRetryState,
  canRetry,
  initialRetryState,
  type RetryPolicy,
} from '../lib/retry';
import {
  DEFAULT_CORROBORATION_BONUS,
  computeCompleteness,
  isPopulated,
  mergeRawRecords,
  selectTop,
} from './dedup';

// ============================================================
// TYPES
// ============================================================

export interface CollectOptions {
  /** Checked between retries and between detail fetches */
  signal?: AbortSignal;
  /** Called as each per-source error is recorded */
  onSourceError?: (entry: SourceErrorEntry) => void;
}

export type SourceRunStatus = 'ok' | 'exhausted' | 'failed' | 'cancelled';

export interface SourceRunResult {
  source: string;
  status: SourceRunStatus;
  recordCount: number;
  attempts: number;
  durationMs: number;
}

export interface CollectResult {
  records: CanonicalRecord[];
  errors: SourceErrorEntry[];
  sourceResults: SourceRunResult[];
  /** Raw records received before dedup */
  totalRaw: number;
  /** Distinct canonical records before truncation */
  totalMerged: number;
}

export interface AggregatorOptions {
  clock?: Clock;
  settings?: Partial<AggregatorSettings>;
}

interface SourceOutcome {
  result: SourceRunResult;
  records: RawRecord[];
}

const DEFAULT_SETTINGS: AggregatorSettings = {
  corroborationBonus: DEFAULT_CORROBORATION_BONUS,
  enrichDetails: true,
  detailLimit: 20,
};

// ============================================================
// AGGREGATOR
// ============================================================

export class MultiSourceAggregator {
  private readonly clock: Clock;
  private readonly settings: AggregatorSettings;
  private readonly log = logger.child({ component: 'aggregator' });

  constructor(private readonly registry: SourceRegistry, options: AggregatorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
  }

  /**
   * Collect up to `requestedCount` canonical records from the enabled
   * sources, optionally restricted to `enabledSources`.
   */
  async collect(
    requestedCount: number,
    enabledSources?: readonly string[],
    options: CollectOptions = {}
  ): Promise<CollectResult> {
    const adapters = this.registry.select(enabledSources);
    const errors: SourceErrorEntry[] = [];
    const record = (entry: SourceErrorEntry) => {
      errors.push(entry);
      options.onSourceError?.(entry);
    };

    if (adapters.length === 0) {
      throw new AggregatorTotalFailureError([], 'No enabled sources selected');
    }

    this.log.info('Starting collection', {
      requestedCount,
      sources: adapters.map(adapter => adapter.descriptor.name),
    });

    const outcomes = await Promise.all(
      adapters.map(adapter => this.runSource(adapter, requestedCount, options.signal, record))
    );

    const sourceResults = outcomes.map(outcome => outcome.result);
    const rawRecords = outcomes.flatMap(outcome => outcome.records);

    if (options.signal?.aborted) {
      this.log.warn('Collection cancelled', { rawRecords: rawRecords.length });
      return { records: [], errors, sourceResults, totalRaw: rawRecords.length, totalMerged: 0 };
    }

    if (sourceResults.every(result => result.status === 'failed')) {
      throw new AggregatorTotalFailureError(errors);
    }

    const priorities = new Map(adapters.map(adapter => [adapter.descriptor.name, adapter.descriptor.priority]));
    const priorityOf = (source: string) => priorities.get(source) ?? Number.MAX_SAFE_INTEGER;

    const merged = mergeRawRecords(rawRecords, priorityOf, this.settings.corroborationBonus);
    let records = selectTop(merged, requestedCount);

    if (this.settings.enrichDetails && this.settings.detailLimit > 0 && !options.signal?.aborted) {
      records = selectTop(await this.enrich(records, record, options.signal), requestedCount);
    }

    this.log.info('Collection complete', {
      rawRecords: rawRecords.length,
      merged: merged.length,
      returned: records.length,
      errors: errors.length,
    });

    return {
      records,
      errors,
      sourceResults,
      totalRaw: rawRecords.length,
      totalMerged: merged.length,
    };
  }

  /**
   * Run one source's fetchList through the retry loop.
   */
  private async runSource(
    adapter: SourceAdapter,
    count: number,
    signal: AbortSignal | undefined,
    record: (entry: SourceErrorEntry) => void
  ): Promise<SourceOutcome> {
    const { descriptor } = adapter;
    const policy: RetryPolicy = {
      maxRetries: descriptor.maxRetries,
      baseDelayMs: descriptor.retryDelayMs,
    };
    const log = this.log.child({ source: descriptor.name });
    const started = this.clock.now();
    let state = initialRetryState(policy);

    const finish = (status: SourceRunStatus, records: RawRecord[]): SourceOutcome => ({
      records,
      result: {
        source: descriptor.name,
        status,
        recordCount: records.length,
        attempts: state.attempt,
        durationMs: this.clock.now() - started,
      },
    });

    while (canRetry(state, policy)) {
      if (signal?.aborted) {
        log.info('Skipping source after cancellation', { attempts: state.attempt });
        return finish('cancelled', []);
      }

      try {
        const records = await this.withTimeout(adapter.fetchList(count), descriptor.timeoutMs, descriptor.name);
        state = advanceRetryState(state, policy);
        log.debug('Source returned', { records: records.length, attempts: state.attempt });
        return finish('ok', records);
      } catch (error) {
        state = advanceRetryState(state, policy);

        if (error instanceof SourceExhaustedError) {
          log.info('Source exhausted', { records: error.records.length, requested: count });
          return finish('exhausted', error.records);
        }

        const sourceError =
          error instanceof SourceError
            ? error
            : new SourceUnavailableError(descriptor.name, errorMessage(error));

        if (sourceError.retryable && canRetry(state, policy)) {
          log.warn('Source unavailable, retrying', {
            attempt: state.attempt,
            delayMs: state.nextDelayMs,
            error: sourceError.message,
          });
          await this.clock.sleep(state.nextDelayMs);
          continue;
        }

        log.error('Source failed', {
          kind: sourceError.kind,
          attempts: state.attempt,
          error: sourceError.message,
        });
        record({
          source: descriptor.name,
          message: sourceError.message,
          timestamp: new Date(this.clock.now()).toISOString(),
          kind: sourceError.kind === 'rejected' ? 'rejected' : 'unavailable',
          attempts: state.attempt,
        });
        return finish('failed', []);
      }
    }

    return finish('failed', []);
  }

  /**
   * Fill fields still missing on the top records from the detail view of
   * their highest-priority source. Detail failures never fail the run.
   */
  private async enrich(
    records: CanonicalRecord[],
    record: (entry: SourceErrorEntry) => void,
    signal?: AbortSignal
  ): Promise<CanonicalRecord[]> {
    const limit = Math.min(this.settings.detailLimit, records.length);
    const enriched = [...records];

    for (let i = 0; i < limit; i++) {
      if (signal?.aborted) {
        this.log.warn('Enrichment cancelled', { enriched: i, limit });
        break;
      }
      const current = enriched[i];
      const missing = RECORD_FIELD_NAMES.filter(name => !isPopulated(name, current.fields[name]));
      if (missing.length === 0) continue;

      const source = current.sources[0];
      const adapter = this.registry.get(source);
      const sourceId = current.sourceIds[source];
      if (!adapter || sourceId === undefined) continue;

      try {
        const detail = await this.withTimeout(
          adapter.fetchDetail(sourceId),
          adapter.descriptor.timeoutMs,
          source
        );
        const fields: RecordFields = structuredClone(current.fields);
        for (const name of missing) {
          fillField(fields, detail.fields, name);
        }
        enriched[i] = {
          ...current,
          fields,
          completenessScore: computeCompleteness(
            fields,
            current.sources.length,
            this.settings.corroborationBonus
          ),
        };
      } catch (error) {
        this.log.warn('Detail fetch failed', { source, sourceId, error: errorMessage(error) });
        record({
          source,
          message: `Detail for ${sourceId}: ${errorMessage(error)}`,
          timestamp: new Date(this.clock.now()).toISOString(),
          kind: 'detail',
          attempts: 1,
        });
      }
    }

    return enriched;
  }

  private async withTimeout<T>(operation: Promise<T>, timeoutMs: number, source: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new SourceUnavailableError(source, `Timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });

    try {
      return await Promise.race([operation, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function fillField<K extends RecordFieldName>(target: RecordFields, detail: RecordFields, name: K): void {
  const value = detail[name];
  if (isPopulated(name, value)) {
    target[name] = structuredClone(value);
  }
}
