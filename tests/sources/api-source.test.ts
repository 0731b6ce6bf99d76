import { describe, it, expect, vi } from 'vitest';
import { createApiSource, subjectToFields } from '../../src/sources/api-source';
import { SourceConfigSchema } from '../../src/config/schema';
import {
  SourceExhaustedError,
  SourceRejectedError,
  SourceUnavailableError,
} from '../../src/lib/errors';
import { FakeClock } from '../helpers/fake-clock';

const config = SourceConfigSchema.parse({
  kind: 'api',
  priority: 1,
  rateLimit: null,
  baseUrl: 'https://api.example.com/v2',
  apiKey: 'test-secret',
});

function subject(id: number) {
  return {
    id,
    title: `短剧 ${id}`,
    year: '2024',
    rating: { average: 7.5 },
    genres: ['都市'],
    casts: [{ name: '演员甲' }],
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function params(url: unknown): URLSearchParams {
  return new URL(String(url)).searchParams;
}

describe('subjectToFields', () => {
  it('should map and clean a subject', () => {
    const fields = subjectToFields({
      id: '42',
      title: ' 测试短剧 ',
      original_title: '',
      year: '2024',
      rating: { average: 0 },
      tags: [{ name: '甜宠' }, { name: ' ' }],
      casts: [],
      episodes_count: null,
      images: { large: 'https://img.example.com/42.jpg' },
    });

    expect(fields).toEqual({
      title: '测试短剧',
      year: 2024,
      tags: ['甜宠'],
      posterUrl: 'https://img.example.com/42.jpg',
    });
  });
});

describe('createApiSource', () => {
  it('should require a baseUrl', () => {
    expect(() => createApiSource('primary', { ...config, baseUrl: undefined })).toThrow(SourceRejectedError);
  });

  it('should page through the search endpoint', async () => {
    const fetchFn = vi.fn<typeof fetch>(async input => {
      const search = params(input);
      const start = Number(search.get('start'));
      const count = Number(search.get('count'));
      return jsonResponse({
        subjects: Array.from({ length: count }, (_, i) => subject(start + i + 1)),
      });
    });
    const source = createApiSource('primary', config, { fetchFn, clock: new FakeClock() });

    const records = await source.fetchList(25);

    expect(records).toHaveLength(25);
    expect(fetchFn).toHaveBeenCalledTimes(2);

    const first = params(fetchFn.mock.calls[0][0]);
    expect(first.get('q')).toBe('短剧');
    expect(first.get('start')).toBe('0');
    expect(first.get('count')).toBe('20');
    expect(first.get('apikey')).toBe('test-secret');

    const second = params(fetchFn.mock.calls[1][0]);
    expect(second.get('start')).toBe('20');
    expect(second.get('count')).toBe('5');

    expect(records[0]).toEqual({
      source: 'primary',
      sourceId: '1',
      fields: { title: '短剧 1', year: 2024, rating: 7.5, genres: ['都市'], casts: ['演员甲'] },
      fetchedAt: '2024-06-01T10:00:00.000Z',
    });
  });

  it('should report exhaustion with the partial list', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => jsonResponse({ subjects: [subject(1), subject(2), subject(3)] }));
    const source = createApiSource('primary', config, { fetchFn });

    const error = await source.fetchList(10).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceExhaustedError);
    if (error instanceof SourceExhaustedError) {
      expect(error.records.map(r => r.sourceId)).toEqual(['1', '2', '3']);
    }
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should classify server errors as unavailable', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response('busy', { status: 503 }));
    const source = createApiSource('primary', config, { fetchFn });

    await expect(source.fetchList(5)).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('should classify client errors as rejected', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response('denied', { status: 403 }));
    const source = createApiSource('primary', config, { fetchFn });

    await expect(source.fetchList(5)).rejects.toMatchObject({ kind: 'rejected', status: 403 });
  });

  it('should treat network failures as unavailable', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const source = createApiSource('primary', config, { fetchFn });

    await expect(source.fetchList(5)).rejects.toThrow(/failed: fetch failed$/);
    await expect(source.fetchList(5)).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('should reject malformed payloads', async () => {
    const notJson = vi.fn<typeof fetch>(async () => new Response('<html></html>', { status: 200 }));
    await expect(createApiSource('primary', config, { fetchFn: notJson }).fetchList(5)).rejects.toBeInstanceOf(
      SourceRejectedError
    );

    const wrongShape = vi.fn<typeof fetch>(async () => jsonResponse({ subjects: [{ id: 1 }] }));
    await expect(createApiSource('primary', config, { fetchFn: wrongShape }).fetchList(5)).rejects.toThrow(
      /Unexpected search payload/
    );
  });

  it('should fetch details from the subject endpoint', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({ ...subject(7), summary: '完整简介', directors: [{ name: '导演乙' }] })
    );
    const source = createApiSource('primary', config, { fetchFn });

    const detail = await source.fetchDetail('7');

    expect(new URL(String(fetchFn.mock.calls[0][0])).pathname).toBe('/v2/movie/subject/7');
    expect(detail.sourceId).toBe('7');
    expect(detail.fields.summary).toBe('完整简介');
    expect(detail.fields.directors).toEqual(['导演乙']);
  });

  it('should take a limiter token per request', async () => {
    const clock = new FakeClock();
    const limited = SourceConfigSchema.parse({ ...config, rateLimit: 1, burst: 1 });
    const fetchFn = vi.fn<typeof fetch>(async input =>
      jsonResponse({ subjects: Array.from({ length: Number(params(input).get('count')) }, (_, i) => subject(i)) })
    );
    const source = createApiSource('primary', limited, { fetchFn, clock });

    await source.fetchList(60);

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });
});
