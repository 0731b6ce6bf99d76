/**
 * Synthetic source backed by a fixed fixture. Unlimited rate, deterministic
 * output; the fallback of last resort when every network source is down.
 */

import { z } from 'zod';
import type { RawRecord } from '../types';
import { RecordFieldsSchema } from '../types/record';
import type { SourceConfig } from '../config/schema';
import { SourceExhaustedError, SourceRejectedError } from '../lib/errors';
import { systemClock } from '../lib/clock';
import { RateLimiter } from '../lib/rate-limiter';
import { descriptorFromConfig, type SourceAdapter, type SourceFactoryOptions } from './base';
import mockDramas from './data/mock-dramas.json';

export const MockDramaSchema = z.object({
  id: z.string().min(1),
  fields: RecordFieldsSchema,
});
export type MockDrama = z.infer<typeof MockDramaSchema>;

export const MOCK_DRAMAS: readonly MockDrama[] = z.array(MockDramaSchema).parse(mockDramas);

export interface MockSourceOptions extends SourceFactoryOptions {
  /** Replaces the bundled fixture */
  dramas?: readonly MockDrama[];
}

export function createMockSource(
  name: string,
  config: SourceConfig,
  options: MockSourceOptions = {}
): SourceAdapter {
  const clock = options.clock ?? systemClock;
  const dramas = options.dramas ?? MOCK_DRAMAS;
  const descriptor = {
    ...descriptorFromConfig(name, config),
    rateLimit: Number.POSITIVE_INFINITY,
  };
  const limiter = new RateLimiter({ ratePerSecond: descriptor.rateLimit, clock });

  const toRecord = (drama: MockDrama, detailed: boolean): RawRecord => ({
    source: name,
    sourceId: drama.id,
    fields: detailed
      ? { ...structuredClone(drama.fields), posterUrl: `https://img.example.com/posters/${drama.id}.jpg` }
      : structuredClone(drama.fields),
    fetchedAt: new Date(clock.now()).toISOString(),
  });

  return {
    kind: 'mock',
    descriptor,
    limiter,

    async fetchList(count) {
      await limiter.acquire();
      const records = dramas.slice(0, count).map(drama => toRecord(drama, false));
      if (records.length < count) {
        throw new SourceExhaustedError(name, records, count);
      }
      return records;
    },

    async fetchDetail(sourceId) {
      await limiter.acquire();
      const drama = dramas.find(item => item.id === sourceId);
      if (!drama) {
        throw new SourceRejectedError(name, `Unknown mock id ${sourceId}`, 404);
      }
      return toRecord(drama, true);
    },
  };
}
