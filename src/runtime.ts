/**
 * Drama Collector — Runtime
 *
 * Composes the collector from a configuration: sources, aggregator,
 * validator, store, exporter, orchestrator and scheduler.
 */

import type { SystemConfig } from './config/schema';
import { MultiSourceAggregator } from './aggregator/aggregator';
import { DataValidator } from './processing/validator';
import { createRecordStore, type RecordStore } from './db/store';
import { DataExporter } from './export/exporter';
import { JobOrchestrator } from './orchestrator/orchestrator';
import { CollectionScheduler } from './orchestrator/scheduler';
import { createSourceRegistry, type FetchFn, type SourceRegistry } from './sources';
import { systemClock, type Clock } from './lib/clock';

export interface RuntimeOverrides {
  clock?: Clock;
  fetchFn?: FetchFn;
  registry?: SourceRegistry;
  store?: RecordStore;
}

export interface Runtime {
  config: SystemConfig;
  clock: Clock;
  registry: SourceRegistry;
  aggregator: MultiSourceAggregator;
  validator: DataValidator;
  store: RecordStore;
  exporter: DataExporter;
  orchestrator: JobOrchestrator;
  scheduler: CollectionScheduler;
}

export function createRuntime(config: SystemConfig, overrides: RuntimeOverrides = {}): Runtime {
  const clock = overrides.clock ?? systemClock;

  const registry =
    overrides.registry ?? createSourceRegistry(config.sources, { clock, fetchFn: overrides.fetchFn });
  const aggregator = new MultiSourceAggregator(registry, { clock, settings: config.aggregator });
  const validator = new DataValidator({ level: config.processing.validationLevel, clock });
  const store = overrides.store ?? createRecordStore(config.store, clock);
  const exporter = new DataExporter(config.export, clock);

  const orchestrator = new JobOrchestrator(
    { aggregator, validator, store, exporter, clock },
    {
      maxConcurrentJobs: config.processing.maxConcurrentJobs,
      qualityThreshold: config.processing.qualityThreshold,
      exportFormats: config.export.formats,
      historyMaxEntries: config.scheduler.historyMaxEntries,
      historyRetentionHours: config.scheduler.historyRetentionHours,
    }
  );

  const scheduler = new CollectionScheduler(orchestrator, config.scheduler, {
    clock,
    exportEnabled: config.export.enabled,
  });

  return { config, clock, registry, aggregator, validator, store, exporter, orchestrator, scheduler };
}
