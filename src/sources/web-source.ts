/**
 * HTML fallback source. Parses listing and detail pages with cheerio.
 */

import { load, type CheerioAPI } from 'cheerio';
import type { RawRecord, RecordFields } from '../types';
import type { SourceConfig } from '../config/schema';
import { SourceExhaustedError, SourceRejectedError } from '../lib/errors';
import { systemClock } from '../lib/clock';
import { logger } from '../lib/logger';
import { RateLimiter } from '../lib/rate-limiter';
import { descriptorFromConfig, type SourceAdapter, type SourceFactoryOptions } from './base';
import { buildUrl, requestText, type HttpContext } from './http';

export const WEB_MAX_PAGES = 5;

/**
 * Selector-based access to one drama block.
 */
export interface FieldReader {
  text(selector: string): string;
  list(selector: string): string[];
  attr(selector: string, name: string): string | undefined;
}

function readerFor($: CheerioAPI, root: string): FieldReader {
  const scope = $(root).first();
  return {
    text: selector => scope.find(selector).first().text().trim(),
    list: selector =>
      scope
        .find(selector)
        .toArray()
        .map(node => $(node).text().trim())
        .filter(Boolean),
    attr: (selector, name) => scope.find(selector).first().attr(name) || undefined,
  };
}

function parseNumber(text: string): number | undefined {
  const match = text.match(/\d+(\.\d+)?/);
  if (!match) return undefined;
  const value = Number(match[0]);
  return Number.isFinite(value) ? value : undefined;
}

function nonEmpty(values: string[]): string[] | undefined {
  return values.length > 0 ? values : undefined;
}

export function readDramaFields(reader: FieldReader): RecordFields {
  const year = parseNumber(reader.text('.year'));
  const rating = parseNumber(reader.text('.rating'));
  const episodes = parseNumber(reader.text('.episodes'));

  return {
    title: reader.text('.title') || undefined,
    originalTitle: reader.text('.original-title') || undefined,
    year: year !== undefined && Number.isInteger(year) ? year : undefined,
    rating: rating !== undefined && rating > 0 ? rating : undefined,
    episodesCount: episodes !== undefined && Number.isInteger(episodes) ? episodes : undefined,
    genres: nonEmpty(reader.list('.genre')),
    tags: nonEmpty(reader.list('.tag')),
    summary: reader.text('.description') || reader.text('.summary') || undefined,
    directors: nonEmpty(reader.list('.director')),
    casts: nonEmpty(reader.list('.cast li')),
    countries: nonEmpty(reader.list('.country')),
    posterUrl: reader.attr('img.poster', 'src'),
  };
}

export function createWebSource(
  name: string,
  config: SourceConfig,
  options: SourceFactoryOptions = {}
): SourceAdapter {
  if (!config.baseUrl) {
    throw new SourceRejectedError(name, 'Web source requires a baseUrl');
  }
  const baseUrl = config.baseUrl;
  const clock = options.clock ?? systemClock;
  const descriptor = descriptorFromConfig(name, config);
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
    headers: { Accept: 'text/html' },
  };

  const stamp = () => new Date(clock.now()).toISOString();

  async function fetchPage(page: number): Promise<RawRecord[]> {
    const html = await requestText(http, buildUrl(baseUrl, '/search', { adv: 'titles', ty: 'sh', page }));
    const $ = load(html);
    const records: RawRecord[] = [];

    $('div.drama-item').each((_, element) => {
      const sourceId = $(element).attr('data-id');
      const fields = readDramaFields(readerFor(load($.html(element)), 'div.drama-item'));
      if (!sourceId || !fields.title) return;
      records.push({ source: name, sourceId, fields, fetchedAt: stamp() });
    });

    return records;
  }

  return {
    kind: 'web',
    descriptor,
    limiter,

    async fetchList(count) {
      const records: RawRecord[] = [];

      for (let page = 1; page <= WEB_MAX_PAGES && records.length < count; page++) {
        const items = await fetchPage(page);
        if (items.length === 0) break;
        records.push(...items);
      }

      log.debug('Scraped list', { requested: count, received: records.length });

      if (records.length < count) {
        throw new SourceExhaustedError(name, records, count);
      }
      return records.slice(0, count);
    },

    async fetchDetail(sourceId) {
      const html = await requestText(http, buildUrl(baseUrl, `/drama/${encodeURIComponent(sourceId)}`));
      const $ = load(html);
      if ($('.drama-detail').length === 0) {
        throw new SourceRejectedError(name, `No detail block on page for ${sourceId}`);
      }
      return {
        source: name,
        sourceId,
        fields: readDramaFields(readerFor($, '.drama-detail')),
        fetchedAt: stamp(),
      };
    },
  };
}
