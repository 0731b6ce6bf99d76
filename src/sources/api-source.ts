/**
 * Primary JSON API source.
 *
 * Lists short dramas through the search endpoint, paginated by 20, and reads
 * details from the subject endpoint.
 */

import { z } from 'zod';
import type { RawRecord, RecordFields, SourceDescriptor } from '../types';
import type { SourceConfig } from '../config/schema';
import { SourceExhaustedError, SourceRejectedError } from '../lib/errors';
import { systemClock } from '../lib/clock';
import { logger } from '../lib/logger';
import { RateLimiter } from '../lib/rate-limiter';
import { descriptorFromConfig, type SourceAdapter, type SourceFactoryOptions } from './base';
import { buildUrl, requestJson, type HttpContext } from './http';

export const API_PAGE_SIZE = 20;
const SEARCH_QUERY = '短剧';

// ============================================================
// WIRE SCHEMAS
// ============================================================

const NamedSchema = z.object({ name: z.string() });

const SubjectSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  original_title: z.string().optional(),
  year: z.union([z.string(), z.number()]).optional(),
  rating: z.object({ average: z.number().optional() }).optional(),
  ratings_count: z.number().optional(),
  genres: z.array(z.string()).optional(),
  tags: z.array(NamedSchema).optional(),
  summary: z.string().optional(),
  directors: z.array(NamedSchema).optional(),
  writers: z.array(NamedSchema).optional(),
  casts: z.array(NamedSchema).optional(),
  countries: z.array(z.string()).optional(),
  languages: z.array(z.string()).optional(),
  episodes_count: z.number().nullable().optional(),
  images: z.object({ large: z.string().optional() }).optional(),
});
type Subject = z.infer<typeof SubjectSchema>;

const SearchResponseSchema = z.object({
  start: z.number().optional(),
  count: z.number().optional(),
  total: z.number().optional(),
  subjects: z.array(SubjectSchema).default([]),
});

// ============================================================
// MAPPING
// ============================================================

function parseYear(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const year = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isInteger(year) && year > 0 ? year : undefined;
}

function names(list: Array<{ name: string }> | undefined): string[] | undefined {
  const values = list?.map(item => item.name.trim()).filter(Boolean);
  return values && values.length > 0 ? values : undefined;
}

function strings(list: string[] | undefined): string[] | undefined {
  const values = list?.map(item => item.trim()).filter(Boolean);
  return values && values.length > 0 ? values : undefined;
}

export function subjectToFields(subject: Subject): RecordFields {
  const rating = subject.rating?.average;
  return {
    title: subject.title.trim(),
    originalTitle: subject.original_title?.trim() || undefined,
    year: parseYear(subject.year),
    // 0 means "not rated yet" on this API
    rating: rating !== undefined && rating > 0 ? rating : undefined,
    ratingsCount: subject.ratings_count,
    genres: strings(subject.genres),
    tags: names(subject.tags),
    summary: subject.summary?.trim() || undefined,
    directors: names(subject.directors),
    writers: names(subject.writers),
    casts: names(subject.casts),
    countries: strings(subject.countries),
    languages: strings(subject.languages),
    episodesCount: subject.episodes_count ?? undefined,
    posterUrl: subject.images?.large,
  };
}

// ============================================================
// FACTORY
// ============================================================

export function createApiSource(
  name: string,
  config: SourceConfig,
  options: SourceFactoryOptions = {}
): SourceAdapter {
  if (!config.baseUrl) {
    throw new SourceRejectedError(name, 'API source requires a baseUrl');
  }
  const baseUrl = config.baseUrl;
  const clock = options.clock ?? systemClock;
  const descriptor: SourceDescriptor = descriptorFromConfig(name, config);
  const limiter = new RateLimiter({
    ratePerSecond: descriptor.rateLimit,
    burst: descriptor.burst,
    clock,
  });
  const log = logger.child({ source: name });

  const http: HttpContext = {
    source: name,
    limiter,
    fetchFn: options.fetchFn ?? fetch,
    timeoutMs: descriptor.timeoutMs,
  };

  const toRecord = (subject: Subject): RawRecord => ({
    source: name,
    sourceId: subject.id,
    fields: subjectToFields(subject),
    fetchedAt: new Date(clock.now()).toISOString(),
  });

  async function fetchPage(start: number, count: number): Promise<Subject[]> {
    const url = buildUrl(baseUrl, '/movie/search', {
      q: SEARCH_QUERY,
      start,
      count,
      apikey: config.apiKey,
    });
    const parsed = SearchResponseSchema.safeParse(await requestJson(http, url));
    if (!parsed.success) {
      throw new SourceRejectedError(name, `Unexpected search payload: ${parsed.error.message}`);
    }
    return parsed.data.subjects;
  }

  return {
    kind: 'api',
    descriptor,
    limiter,

    async fetchList(count) {
      const records: RawRecord[] = [];
      let start = 0;
      let exhausted = false;

      while (records.length < count) {
        const pageSize = Math.min(API_PAGE_SIZE, count - records.length);
        const subjects = await fetchPage(start, pageSize);
        records.push(...subjects.map(toRecord));
        start += subjects.length;

        if (subjects.length < pageSize) {
          exhausted = true;
          break;
        }
      }

      log.debug('Fetched list', { requested: count, received: records.length });

      if (exhausted && records.length < count) {
        throw new SourceExhaustedError(name, records, count);
      }
      return records.slice(0, count);
    },

    async fetchDetail(sourceId) {
      const url = buildUrl(baseUrl, `/movie/subject/${encodeURIComponent(sourceId)}`, {
        apikey: config.apiKey,
      });
      const parsed = SubjectSchema.safeParse(await requestJson(http, url));
      if (!parsed.success) {
        throw new SourceRejectedError(name, `Unexpected subject payload: ${parsed.error.message}`);
      }
      return toRecord(parsed.data);
    },
  };
}
