/**
 * HTTP plumbing shared by the network-backed sources.
 * Every request takes a limiter token first.
 */

import {
  SourceRejectedError,
  SourceUnavailableError,
  classifyHttpStatus,
  errorMessage,
} from '../lib/errors';
import type { RateLimiter } from '../lib/rate-limiter';
import type { FetchFn } from './base';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (compatible; DramaCollector/1.0)',
  Accept: 'application/json, text/html;q=0.9, */*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
};

export interface HttpContext {
  source: string;
  limiter: RateLimiter;
  fetchFn: FetchFn;
  timeoutMs: number;
  headers?: Record<string, string>;
}

export function buildUrl(
  base: string,
  path: string,
  params: Record<string, string | number | undefined> = {}
): string {
  const url = new URL(path.replace(/^\//, ''), base.endsWith('/') ? base : `${base}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function send(ctx: HttpContext, url: string): Promise<Response> {
  await ctx.limiter.acquire();

  let res: Response;
  try {
    res = await ctx.fetchFn(url, {
      headers: { ...DEFAULT_HEADERS, ...ctx.headers },
      signal: AbortSignal.timeout(ctx.timeoutMs),
    });
  } catch (error) {
    throw new SourceUnavailableError(ctx.source, `Request to ${url} failed: ${errorMessage(error)}`);
  }

  if (!res.ok) {
    throw classifyHttpStatus(ctx.source, res.status, url);
  }
  return res;
}

export async function requestJson(ctx: HttpContext, url: string): Promise<unknown> {
  const res = await send(ctx, url);
  try {
    return await res.json();
  } catch (error) {
    throw new SourceRejectedError(ctx.source, `Invalid JSON from ${url}: ${errorMessage(error)}`);
  }
}

export async function requestText(ctx: HttpContext, url: string): Promise<string> {
  const res = await send(ctx, url);
  try {
    return await res.text();
  } catch (error) {
    throw new SourceUnavailableError(ctx.source, `Failed reading body from ${url}: ${errorMessage(error)}`);
  }
}
