import { describe, it, expect, vi } from 'vitest';
import { createRuntime } from '../src/runtime';
import { parseConfig } from '../src/config';
import { MemoryRecordStore } from '../src/db/store';
import type { FetchFn } from '../src/sources';
import { FakeClock } from './helpers/fake-clock';

const CONFIG = parseConfig({
  sources: {
    douban: { kind: 'api', priority: 1, baseUrl: 'https://api.example.com', apiKey: 'test-secret' },
    mock: { kind: 'mock', priority: 3 },
  },
  processing: { qualityThreshold: 0 },
  aggregator: { enrichDetails: false },
  export: { enabled: false },
});

describe('createRuntime', () => {
  it('should wire the configured sources and overrides', () => {
    const clock = new FakeClock();
    const store = new MemoryRecordStore(clock);
    const runtime = createRuntime(CONFIG, { clock, store });

    expect(runtime.store).toBe(store);
    expect(runtime.clock).toBe(clock);
    expect(runtime.registry.list().map(adapter => adapter.descriptor.name)).toEqual(['douban', 'mock']);
    expect(runtime.scheduler.state().running).toBe(false);
    expect(runtime.orchestrator.status().activeJobs).toBe(0);
  });

  it('should run a job end to end against the mock source', async () => {
    const clock = new FakeClock();
    const store = new MemoryRecordStore(clock);
    const fetchFn = vi.fn<FetchFn>();
    const runtime = createRuntime(CONFIG, { clock, store, fetchFn });

    const id = runtime.orchestrator.start({ requestedCount: 3, sources: ['mock'] });
    const job = await runtime.orchestrator.whenSettled(id);

    expect(job?.state).toBe('completed');
    expect(job?.errors).toEqual([]);
    expect(job?.counters.totalCollected).toBe(3);
    expect(job?.counters.totalStored).toBe(job?.counters.totalProcessed);
    expect(await store.count()).toBe(job?.counters.totalStored);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
