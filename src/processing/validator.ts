/**
 * Drama Collector — Record Validator
 *
 * Checks and cleans canonical records before they are stored, and gives each
 * a 0-10 quality score. Field problems are errors under the strict level and
 * warnings otherwise; the lenient level also ignores field warnings.
 */

import type { CanonicalRecord, RecordFieldName, RecordFields } from '../types';
import type { ValidationLevel } from '../config/schema';
import { isPopulated } from '../aggregator/dedup';
import { systemClock, type Clock } from '../lib/clock';
import { logger } from '../lib/logger';

export interface ValidationResult {
  valid: boolean;
  /** 0-10 */
  qualityScore: number;
  errors: string[];
  warnings: string[];
  /** errors followed by warnings */
  issues: string[];
  record: CanonicalRecord;
}

interface FieldCheck<T> {
  value?: T;
  errors: string[];
  warnings: string[];
}

const REQUIRED_FIELDS: Record<ValidationLevel, RecordFieldName[]> = {
  strict: ['title', 'year', 'summary'],
  moderate: ['title'],
  lenient: [],
};

/**
 * Fields weighed by the quality score's completeness factor.
 */
const QUALITY_FIELDS: RecordFieldName[] = [
  'title',
  'year',
  'summary',
  'genres',
  'rating',
  'casts',
  'directors',
  'episodesCount',
];

const MAX_LIST_ITEM_LENGTH = 50;

// ============================================================
// CLEANING
// ============================================================

export function cleanTitle(title: string): string {
  return title
    .replace(/【.*?】/g, '')
    .replace(/\[.*?\]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function cleanText(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// ============================================================
// FIELD CHECKS
// ============================================================

function checkTitle(title: string): FieldCheck<string> {
  const value = cleanTitle(title);
  if (!value) return { errors: ['Title is empty'], warnings: [] };

  const errors: string[] = [];
  const warnings: string[] = [];
  if ([...value].length < 2) errors.push('Title is too short');
  else if ([...value].length > 100) warnings.push('Title is too long');
  if (/[<>"'&]/.test(value)) warnings.push('Title contains markup characters');

  return { value, errors, warnings };
}

function checkYear(year: number, currentYear: number): FieldCheck<number> {
  if (year < 1900) return { value: year, errors: ['Year is too early'], warnings: [] };
  if (year > currentYear + 2) return { value: year, errors: ['Year is too far in the future'], warnings: [] };
  if (year > currentYear) return { value: year, errors: [], warnings: ['Year is in the future'] };
  return { value: year, errors: [], warnings: [] };
}

function checkRating(rating: number): FieldCheck<number> {
  if (rating < 0) return { value: rating, errors: ['Rating is negative'], warnings: [] };
  if (rating > 10) return { value: rating, errors: ['Rating is above 10'], warnings: [] };
  if (rating === 0) return { value: rating, errors: [], warnings: ['Rating is 0, probably a default'] };
  return { value: rating, errors: [], warnings: [] };
}

function checkSummary(summary: string): FieldCheck<string> {
  const value = cleanText(summary);
  if (!value) return { value, errors: [], warnings: ['Summary is empty'] };
  if ([...value].length < 10) return { value, errors: [], warnings: ['Summary is too short'] };
  if ([...value].length > 2000) return { value, errors: [], warnings: ['Summary is too long'] };
  return { value, errors: [], warnings: [] };
}

function checkList(items: string[], label: string, maxCount: number): FieldCheck<string[]> {
  const warnings: string[] = [];
  const value: string[] = [];

  for (const item of items) {
    const trimmed = item.trim();
    if (!trimmed) continue;
    if ([...trimmed].length > MAX_LIST_ITEM_LENGTH) {
      warnings.push(`${label} entry is too long: ${[...trimmed].slice(0, 20).join('')}...`);
      continue;
    }
    value.push(trimmed);
  }

  if (value.length === 0) warnings.push(`${label} list is empty`);
  else if (value.length > maxCount) warnings.push(`Too many ${label.toLowerCase()} entries`);

  return { value, errors: [], warnings };
}

function checkEpisodes(episodes: number): FieldCheck<number> {
  if (episodes < 1) return { value: episodes, errors: ['Episode count must be positive'], warnings: [] };
  if (episodes > 200) return { value: episodes, errors: [], warnings: ['Episode count is unusually high'] };
  return { value: episodes, errors: [], warnings: [] };
}

function checkConsistency(fields: RecordFields): string[] {
  const warnings: string[] = [];

  if (fields.year !== undefined && fields.rating !== undefined && fields.year < 2000 && fields.rating > 9) {
    warnings.push('Unusually high rating for an early title');
  }

  const title = (fields.title ?? '').toLowerCase();
  const romanticTitle = /爱情|恋爱|love|romance/.test(title);
  const romanticGenre = (fields.genres ?? []).some(genre => /爱情|romance/i.test(genre));
  if (romanticTitle && !romanticGenre) {
    warnings.push('Title suggests romance but no romance genre is listed');
  }

  return warnings;
}

// ============================================================
// VALIDATOR
// ============================================================

export interface DataValidatorOptions {
  level?: ValidationLevel;
  clock?: Clock;
}

export class DataValidator {
  readonly level: ValidationLevel;
  private readonly clock: Clock;
  private readonly log = logger.child({ component: 'validator' });

  constructor(options: DataValidatorOptions = {}) {
    this.level = options.level ?? 'moderate';
    this.clock = options.clock ?? systemClock;
  }

  validate(record: CanonicalRecord): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const fields: RecordFields = structuredClone(record.fields);
    const currentYear = new Date(this.clock.now()).getUTCFullYear();

    for (const name of REQUIRED_FIELDS[this.level]) {
      if (!isPopulated(name, fields[name])) errors.push(`Missing required field: ${name}`);
    }

    const apply = <T>(check: FieldCheck<T>, assign: (value: T) => void) => {
      if (this.level === 'strict') errors.push(...check.errors);
      else warnings.push(...check.errors);
      if (this.level !== 'lenient') warnings.push(...check.warnings);
      if (check.value !== undefined) assign(check.value);
    };

    if (fields.title !== undefined) apply(checkTitle(fields.title), v => (fields.title = v));
    if (fields.year !== undefined) apply(checkYear(fields.year, currentYear), v => (fields.year = v));
    if (fields.rating !== undefined) apply(checkRating(fields.rating), v => (fields.rating = v));
    if (fields.summary !== undefined) apply(checkSummary(fields.summary), v => (fields.summary = v));
    if (fields.genres !== undefined) apply(checkList(fields.genres, 'Genre', 10), v => (fields.genres = v));
    if (fields.casts !== undefined) apply(checkList(fields.casts, 'Cast', 20), v => (fields.casts = v));
    if (fields.directors !== undefined) {
      apply(checkList(fields.directors, 'Director', 5), v => (fields.directors = v));
    }
    if (fields.episodesCount !== undefined) {
      apply(checkEpisodes(fields.episodesCount), v => (fields.episodesCount = v));
    }

    if (this.level !== 'lenient') warnings.push(...checkConsistency(fields));

    const qualityScore = this.score(fields, errors.length, warnings.length);

    return {
      valid: errors.length === 0,
      qualityScore,
      errors,
      warnings,
      issues: [...errors, ...warnings],
      record: { ...structuredClone(record), fields, qualityScore },
    };
  }

  validateBatch(records: readonly CanonicalRecord[]): ValidationResult[] {
    const results = records.map(record => this.validate(record));
    this.log.debug('Batch validated', {
      total: results.length,
      valid: results.filter(result => result.valid).length,
    });
    return results;
  }

  /**
   * (10 - 2 per error - 0.5 per warning) scaled by 0.5 + 0.5 * completeness,
   * clamped to 0-10 and rounded to 2 decimals.
   */
  private score(fields: RecordFields, errorCount: number, warningCount: number): number {
    const filled = QUALITY_FIELDS.filter(name => isPopulated(name, fields[name])).length;
    const completeness = filled / QUALITY_FIELDS.length;
    const raw = (10 - 2 * errorCount - 0.5 * warningCount) * (0.5 + 0.5 * completeness);
    return Math.round(Math.max(0, Math.min(10, raw)) * 100) / 100;
  }
}

/**
 * Records that pass validation and reach the threshold.
 */
export function filterByQuality(results: readonly ValidationResult[], threshold: number): ValidationResult[] {
  return results.filter(result => result.valid && result.qualityScore >= threshold);
}
