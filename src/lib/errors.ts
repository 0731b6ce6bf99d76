/**
 * Drama Collector — Error Taxonomy
 *
 * Source errors are classified by whether a retry can help. Stage errors
 * (total collection failure, store, export) terminate a job.
 */

import type { RawRecord, SourceErrorEntry } from '../types';

export type SourceErrorKind = 'unavailable' | 'rejected' | 'exhausted';

/**
 * Base class for failures raised by a source adapter.
 */
export abstract class SourceError extends Error {
  abstract readonly kind: SourceErrorKind;
  readonly source: string;
  readonly status?: number;

  constructor(source: string, message: string, status?: number) {
    super(message);
    this.source = source;
    this.status = status;
  }

  get retryable(): boolean {
    return this.kind === 'unavailable';
  }
}

/** Timeout, 5xx, connection reset. Retried with backoff. */
export class SourceUnavailableError extends SourceError {
  readonly kind = 'unavailable' as const;

  constructor(source: string, message: string, status?: number) {
    super(source, message, status);
    this.name = 'SourceUnavailableError';
  }
}

/** 4xx auth or format errors. Never retried. */
export class SourceRejectedError extends SourceError {
  readonly kind = 'rejected' as const;

  constructor(source: string, message: string, status?: number) {
    super(source, message, status);
    this.name = 'SourceRejectedError';
  }
}

/**
 * The source returned fewer records than requested and has no more.
 * The partial result travels with the error.
 */
export class SourceExhaustedError extends SourceError {
  readonly kind = 'exhausted' as const;
  readonly records: RawRecord[];

  constructor(source: string, records: RawRecord[], requested: number) {
    super(source, `Source exhausted after ${records.length} of ${requested} records`);
    this.name = 'SourceExhaustedError';
    this.records = records;
  }
}

export class AggregatorTotalFailureError extends Error {
  readonly errors: SourceErrorEntry[];

  constructor(errors: SourceErrorEntry[], message?: string) {
    super(message ?? `All sources failed (${errors.length} errors)`);
    this.name = 'AggregatorTotalFailureError';
    this.errors = errors;
  }
}

export class AlreadyRunningError extends Error {
  readonly activeJobIds: string[];

  constructor(activeJobIds: string[], maxConcurrentJobs: number) {
    super(`Concurrency limit reached (${activeJobIds.length}/${maxConcurrentJobs} jobs running)`);
    this.name = 'AlreadyRunningError';
    this.activeJobIds = activeJobIds;
  }
}

/** Raised inside a job when stop() has been observed between stages. */
export class JobCancelledError extends Error {
  readonly stage: string;

  constructor(stage: string) {
    super(`Job cancelled during ${stage}`);
    this.name = 'JobCancelledError';
    this.stage = stage;
  }
}

export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class ExportFailureError extends Error {
  readonly format?: string;

  constructor(message: string, format?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExportFailureError';
    this.format = format;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map(i => `- ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a non-OK HTTP status to the matching source error.
 * 408, 429 and 5xx are transient; every other status is a rejection.
 */
export function classifyHttpStatus(source: string, status: number, url: string): SourceError {
  const message = `HTTP ${status} from ${url}`;
  if (status === 408 || status === 429 || status >= 500) {
    return new SourceUnavailableError(source, message, status);
  }
  return new SourceRejectedError(source, message, status);
}
