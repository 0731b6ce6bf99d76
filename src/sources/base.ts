/**
 * Drama Collector — Source Adapter Base
 *
 * A source adapter is a value, not a subclass: each variant's factory returns
 * an object with the fetchList / fetchDetail capability set and the
 * descriptor it was built from. The registry is the only thing the
 * aggregator knows about.
 */

import type { RawRecord, SourceDescriptor, SourceKind } from '../types';
import type { SourceConfig } from '../config/schema';
import type { Clock } from '../lib/clock';
import type { RateLimiter } from '../lib/rate-limiter';
import { logger } from '../lib/logger';

export interface SourceAdapter {
  readonly kind: SourceKind;
  readonly descriptor: SourceDescriptor;
  readonly limiter: RateLimiter;

  /**
   * Fetch up to `count` records. Throws SourceExhaustedError (carrying the
   * partial list) when fewer are available.
   */
  fetchList(count: number): Promise<RawRecord[]>;

  fetchDetail(sourceId: string): Promise<RawRecord>;
}

export type FetchFn = typeof fetch;

export interface SourceFactoryOptions {
  clock?: Clock;
  fetchFn?: FetchFn;
}

/**
 * Build a descriptor from a source's configuration entry.
 */
export function descriptorFromConfig(name: string, config: SourceConfig): SourceDescriptor {
  return {
    name,
    kind: config.kind,
    priority: config.priority,
    rateLimit: config.rateLimit ?? Number.POSITIVE_INFINITY,
    burst: config.burst,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    timeoutMs: config.timeoutMs,
    enabled: config.enabled,
  };
}

/**
 * Order by priority rank, then name, so selection is deterministic.
 */
export function compareByPriority(a: SourceDescriptor, b: SourceDescriptor): number {
  return a.priority - b.priority || a.name.localeCompare(b.name);
}

/**
 * Registry of available source adapters.
 */
export class SourceRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();
  private readonly log = logger.child({ component: 'source-registry' });

  register(adapter: SourceAdapter): this {
    this.adapters.set(adapter.descriptor.name, adapter);
    this.log.debug('Source registered', {
      name: adapter.descriptor.name,
      kind: adapter.kind,
      priority: adapter.descriptor.priority,
    });
    return this;
  }

  get(name: string): SourceAdapter | undefined {
    return this.adapters.get(name);
  }

  /**
   * All adapters, highest priority first.
   */
  list(): SourceAdapter[] {
    return Array.from(this.adapters.values()).sort((a, b) =>
      compareByPriority(a.descriptor, b.descriptor)
    );
  }

  /**
   * Enabled adapters, optionally restricted to `names`, highest priority first.
   */
  select(names?: readonly string[]): SourceAdapter[] {
    const wanted = names && names.length > 0 ? new Set(names) : undefined;
    return this.list().filter(
      adapter => adapter.descriptor.enabled && (!wanted || wanted.has(adapter.descriptor.name))
    );
  }

  get size(): number {
    return this.adapters.size;
  }
}
