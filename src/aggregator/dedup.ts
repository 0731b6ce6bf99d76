/**
 * Drama Collector — Deduplication & Merge
 *
 * Raw records from every source are grouped by normalized title + year and
 * merged field by field into canonical records:
 * 1. Normalize titles (NFKC, case-fold, strip punctuation and symbols)
 * 2. Group by title, then by year
 * 3. Merge fields by source priority
 * 4. Score completeness
 *
 * Everything here is pure; the same input always yields the same output.
 */

import {
  EXPECTED_FIELDS,
  RECORD_FIELD_NAMES,
  type CanonicalRecord,
  type RawRecord,
  type RecordFieldName,
  type RecordFields,
} from '../types';

export const DEFAULT_CORROBORATION_BONUS = 0.05;

// ============================================================
// NORMALIZATION
// ============================================================

/**
 * Normalize a title for dedup.
 *
 * NFKC folds full-width forms to their half-width equivalents, so
 * "古装甜宠：王爷" and "古装甜宠:王爷" normalize the same. Punctuation and
 * symbols are then removed entirely and whitespace is collapsed.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\p{P}\p{S}]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function dedupKey(normalizedTitle: string, year?: number): string {
  return year === undefined ? normalizedTitle : `${normalizedTitle}|${year}`;
}

// ============================================================
// GROUPING
// ============================================================

export interface RecordGroup {
  key: string;
  normalizedTitle: string;
  year?: number;
  /** In first-seen order */
  records: RawRecord[];
}

interface TitleBucket {
  byYear: Map<number, RecordGroup>;
  /** Holds year-less records until a dated record for the title shows up */
  undated?: RecordGroup;
}

/**
 * Group records believed to denote the same drama.
 *
 * A record without a year joins the first-seen dated group of its title.
 * If no record of the title has a year, they share one title-only group.
 * Records whose title normalizes to nothing are dropped.
 */
export function groupRawRecords(records: readonly RawRecord[]): RecordGroup[] {
  const groups: RecordGroup[] = [];
  const buckets = new Map<string, TitleBucket>();

  for (const record of records) {
    const normalizedTitle = normalizeTitle(record.fields.title ?? '');
    if (!normalizedTitle) continue;

    let bucket = buckets.get(normalizedTitle);
    if (!bucket) {
      bucket = { byYear: new Map() };
      buckets.set(normalizedTitle, bucket);
    }

    const year = record.fields.year;

    if (year === undefined) {
      const firstDated = bucket.byYear.values().next();
      if (!firstDated.done) {
        firstDated.value.records.push(record);
      } else if (bucket.undated) {
        bucket.undated.records.push(record);
      } else {
        bucket.undated = { key: dedupKey(normalizedTitle), normalizedTitle, records: [record] };
        groups.push(bucket.undated);
      }
      continue;
    }

    const existing = bucket.byYear.get(year);
    if (existing) {
      existing.records.push(record);
    } else if (bucket.undated && bucket.byYear.size === 0) {
      // First dated record adopts the records seen without a year
      const adopted = bucket.undated;
      adopted.year = year;
      adopted.key = dedupKey(normalizedTitle, year);
      adopted.records.push(record);
      bucket.byYear.set(year, adopted);
      bucket.undated = undefined;
    } else {
      const group: RecordGroup = {
        key: dedupKey(normalizedTitle, year),
        normalizedTitle,
        year,
        records: [record],
      };
      bucket.byYear.set(year, group);
      groups.push(group);
    }
  }

  return groups;
}

// ============================================================
// MERGE
// ============================================================

export function isPopulated(name: RecordFieldName, value: RecordFields[RecordFieldName]): boolean {
  if (value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (!Number.isFinite(value)) return false;
  return name === 'rating' ? value > 0 : true;
}

function valueSize(value: RecordFields[RecordFieldName]): number {
  if (typeof value === 'string') return value.trim().length;
  if (Array.isArray(value)) return value.length;
  return value ?? 0;
}

function setField<K extends RecordFieldName>(target: RecordFields, name: K, value: RecordFields[K]): void {
  target[name] = value;
}

/**
 * Order contributors by source priority; equal priorities keep first-seen order.
 */
function byPriority(records: readonly RawRecord[], priorityOf: (source: string) => number): RawRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => priorityOf(a.record.source) - priorityOf(b.record.source) || a.index - b.index)
    .map(entry => entry.record);
}

/**
 * Pick the value for one field: highest-priority source with the field
 * populated; on equal priority the longer string or list, or the higher
 * number; then first seen.
 */
function pickField<K extends RecordFieldName>(
  name: K,
  contributors: readonly RawRecord[],
  priorityOf: (source: string) => number
): RecordFields[K] | undefined {
  let best: { value: RecordFields[K]; priority: number; size: number } | undefined;

  for (const record of contributors) {
    const value = record.fields[name];
    if (!isPopulated(name, value)) continue;

    const priority = priorityOf(record.source);
    const size = valueSize(value);
    if (!best || priority < best.priority || (priority === best.priority && size > best.size)) {
      best = { value, priority, size };
    }
  }

  return best === undefined ? undefined : structuredClone(best.value);
}

/**
 * Fraction of expected fields populated, plus a bonus per corroborating
 * source beyond the first. Capped at 1, rounded to 4 decimals.
 */
export function computeCompleteness(
  fields: RecordFields,
  sourceCount: number,
  bonus: number = DEFAULT_CORROBORATION_BONUS
): number {
  const populated = EXPECTED_FIELDS.filter(name => isPopulated(name, fields[name])).length;
  const base = populated / EXPECTED_FIELDS.length;
  const score = Math.min(1, base + bonus * Math.max(0, sourceCount - 1));
  return Math.round(score * 1e4) / 1e4;
}

export function mergeGroup(
  group: RecordGroup,
  priorityOf: (source: string) => number,
  bonus: number = DEFAULT_CORROBORATION_BONUS
): CanonicalRecord {
  const contributors = byPriority(group.records, priorityOf);

  const sources: string[] = [];
  const sourceIds: Record<string, string> = {};
  for (const record of contributors) {
    if (!(record.source in sourceIds)) {
      sources.push(record.source);
      sourceIds[record.source] = record.sourceId;
    }
  }

  const fields: RecordFields = {};
  for (const name of RECORD_FIELD_NAMES) {
    const value = pickField(name, contributors, priorityOf);
    if (value !== undefined) setField(fields, name, value);
  }

  return {
    key: group.key,
    sources,
    sourceIds,
    fields,
    completenessScore: computeCompleteness(fields, sources.length, bonus),
  };
}

/**
 * Group, merge and score. Output keeps first-seen group order.
 */
export function mergeRawRecords(
  records: readonly RawRecord[],
  priorityOf: (source: string) => number,
  bonus: number = DEFAULT_CORROBORATION_BONUS
): CanonicalRecord[] {
  return groupRawRecords(records).map(group => mergeGroup(group, priorityOf, bonus));
}

/**
 * Highest completeness first, ties in input order, truncated to `limit`.
 */
export function selectTop(records: readonly CanonicalRecord[], limit: number): CanonicalRecord[] {
  return records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => b.record.completenessScore - a.record.completenessScore || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map(entry => entry.record);
}
