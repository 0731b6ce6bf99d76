/**
 * Drama Collector — Record Types
 *
 * Raw records come from a single source. Canonical records are the merged,
 * deduplicated view across sources.
 */

import { z } from 'zod';

// ============================================================
// RECORD FIELDS
// ============================================================

export const RecordFieldsSchema = z.object({
  title: z.string().optional(),
  originalTitle: z.string().optional(),
  year: z.number().int().optional(),
  rating: z.number().optional(),
  ratingsCount: z.number().int().optional(),
  genres: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  summary: z.string().optional(),
  directors: z.array(z.string()).optional(),
  writers: z.array(z.string()).optional(),
  casts: z.array(z.string()).optional(),
  countries: z.array(z.string()).optional(),
  languages: z.array(z.string()).optional(),
  episodesCount: z.number().int().optional(),
  posterUrl: z.string().optional(),
});
export type RecordFields = z.infer<typeof RecordFieldsSchema>;

export type RecordFieldName = keyof RecordFields;

export const RECORD_FIELD_NAMES: readonly RecordFieldName[] = RecordFieldsSchema.keyof().options;

/**
 * Fields counted by the completeness score.
 */
export const EXPECTED_FIELDS: readonly RecordFieldName[] = [
  'title',
  'year',
  'rating',
  'genres',
  'summary',
  'directors',
  'casts',
  'tags',
  'episodesCount',
  'countries',
];

// ============================================================
// RAW RECORD
// ============================================================

/**
 * One item as returned by a single source adapter.
 */
export interface RawRecord {
  source: string;
  sourceId: string;
  fields: RecordFields;
  fetchedAt: string;
}

// ============================================================
// CANONICAL RECORD
// ============================================================

export interface CanonicalRecord {
  /** Normalized title + year */
  key: string;
  /** Contributing sources, highest priority first */
  sources: string[];
  /** Source name -> source-local id */
  sourceIds: Record<string, string>;
  fields: RecordFields;
  /** 0-1 */
  completenessScore: number;
  /** 0-10, set once the record has been validated */
  qualityScore?: number;
}

// ============================================================
// SOURCE DESCRIPTORS
// ============================================================

export const SourceKindSchema = z.enum(['api', 'web', 'mock']);
export type SourceKind = z.infer<typeof SourceKindSchema>;

export interface SourceDescriptor {
  name: string;
  kind: SourceKind;
  /** Lower is tried first */
  priority: number;
  /** Requests per second; Infinity for unlimited */
  rateLimit: number;
  burst?: number;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
  enabled: boolean;
}

/**
 * A per-source failure kept as data by the aggregator.
 */
export interface SourceErrorEntry {
  source: string;
  message: string;
  timestamp: string;
  kind: 'unavailable' | 'rejected' | 'detail';
  attempts: number;
}
