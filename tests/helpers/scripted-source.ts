import type { SourceAdapter } from '../../src/sources';
import { RateLimiter } from '../../src/lib/rate-limiter';
import type { RawRecord, RecordFields, SourceDescriptor } from '../../src/types';

export type ListStep = RawRecord[] | Error | ((count: number) => Promise<RawRecord[]>);

export interface ScriptedSourceOptions {
  priority?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  enabled?: boolean;
  /** One entry per fetchList call; the last entry repeats */
  list?: ListStep[];
  details?: Record<string, RecordFields | Error>;
  /** Runs at the start of each fetchDetail call */
  onDetail?: (sourceId: string) => void;
}

export interface ScriptedSource extends SourceAdapter {
  listCalls: number[];
  detailCalls: string[];
}

export function rawRecord(source: string, sourceId: string, fields: RecordFields): RawRecord {
  return { source, sourceId, fields, fetchedAt: '2024-06-01T10:00:00.000Z' };
}

/**
 * In-process source adapter that replays a fixed script of results.
 */
export function scriptedSource(name: string, options: ScriptedSourceOptions = {}): ScriptedSource {
  const descriptor: SourceDescriptor = {
    name,
    kind: 'mock',
    priority: options.priority ?? 1,
    rateLimit: Number.POSITIVE_INFINITY,
    maxRetries: options.maxRetries ?? 0,
    retryDelayMs: options.retryDelayMs ?? 100,
    timeoutMs: options.timeoutMs ?? 1000,
    enabled: options.enabled ?? true,
  };
  const steps = options.list ?? [[]];
  const listCalls: number[] = [];
  const detailCalls: string[] = [];

  return {
    kind: 'mock',
    descriptor,
    limiter: new RateLimiter({ ratePerSecond: Number.POSITIVE_INFINITY }),
    listCalls,
    detailCalls,

    async fetchList(count: number): Promise<RawRecord[]> {
      const step = steps[Math.min(listCalls.length, steps.length - 1)];
      listCalls.push(count);
      if (step instanceof Error) throw step;
      if (typeof step === 'function') return step(count);
      return step.slice(0, count);
    },

    async fetchDetail(sourceId: string): Promise<RawRecord> {
      detailCalls.push(sourceId);
      options.onDetail?.(sourceId);
      const detail = options.details?.[sourceId];
      if (detail === undefined) throw new Error(`No detail for ${sourceId}`);
      if (detail instanceof Error) throw detail;
      return rawRecord(name, sourceId, detail);
    },
  };
}
