import { describe, it, expect } from 'vitest';
import { DataValidator, cleanText, cleanTitle, filterByQuality } from '../../src/processing/validator';
import type { CanonicalRecord, RecordFields } from '../../src/types';
import { FakeClock } from '../helpers/fake-clock';

function canonical(fields: RecordFields): CanonicalRecord {
  return {
    key: 'test|2024',
    sources: ['mock'],
    sourceIds: { mock: 'mock-1' },
    fields,
    completenessScore: 0.5,
  };
}

const COMPLETE: RecordFields = {
  title: '重回十八岁',
  year: 2023,
  rating: 8.4,
  summary: 'A mother gets a second chance at her youth.',
  genres: ['都市', '励志'],
  casts: ['演员甲', '演员乙'],
  directors: ['导演丙'],
  episodesCount: 36,
};

const clock = new FakeClock(Date.parse('2024-06-01T10:00:00.000Z'));
const validator = new DataValidator({ level: 'moderate', clock });

describe('cleaning', () => {
  it('should strip bracketed labels from titles', () => {
    expect(cleanTitle('【独播】重回十八岁 [HD]')).toBe('重回十八岁');
  });

  it('should strip tags and collapse whitespace', () => {
    expect(cleanText('<p>Hello <b>world</b>,\n again</p>')).toBe('Hello world, again');
  });
});

describe('DataValidator', () => {
  it('should give a complete clean record full marks', () => {
    const result = validator.validate(canonical(COMPLETE));

    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.qualityScore).toBe(10);
    expect(result.record.qualityScore).toBe(10);
  });

  it('should clean the title in the returned record only', () => {
    const record = canonical({ title: '【独播】重回十八岁 [HD]' });
    const result = validator.validate(record);

    expect(result.record.fields.title).toBe('重回十八岁');
    expect(record.fields.title).toBe('【独播】重回十八岁 [HD]');
    expect(result.qualityScore).toBe(5.63);
  });

  it('should require a title under the moderate level', () => {
    const result = validator.validate(canonical({ year: 2024 }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Missing required field: title']);
  });

  it('should treat field problems as errors under the strict level', () => {
    const strict = new DataValidator({ level: 'strict', clock });
    const result = strict.validate(canonical({ title: 'A', year: 2024 }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Missing required field: summary', 'Title is too short']);
    expect(result.qualityScore).toBe(3.75);
  });

  it('should downgrade field errors to warnings under the moderate level', () => {
    const result = validator.validate(canonical({ title: 'A', year: 2024 }));

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Title is too short']);
    expect(result.qualityScore).toBe(5.94);
  });

  it('should skip warnings and consistency checks under the lenient level', () => {
    const lenient = new DataValidator({ level: 'lenient', clock });
    const result = lenient.validate(canonical({ title: 'Love Song', year: 2025, genres: [] }));

    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('should check the year against the current year', () => {
    expect(validator.validate(canonical({ title: '老剧', year: 1850 })).warnings).toEqual(['Year is too early']);
    expect(validator.validate(canonical({ title: '新剧', year: 2025 })).warnings).toEqual(['Year is in the future']);
    expect(validator.validate(canonical({ title: '新剧', year: 2027 })).warnings).toEqual([
      'Year is too far in the future',
    ]);
  });

  it('should check the rating range', () => {
    const strict = new DataValidator({ level: 'strict', clock });
    const base = { title: '短剧', year: 2024, summary: 'Long enough summary.' };

    expect(strict.validate(canonical({ ...base, rating: 11 })).errors).toEqual(['Rating is above 10']);
    expect(strict.validate(canonical({ ...base, rating: -1 })).errors).toEqual(['Rating is negative']);
    expect(strict.validate(canonical({ ...base, rating: 0 })).warnings).toEqual(['Rating is 0, probably a default']);
  });

  it('should strip markup from the summary and flag short ones', () => {
    const result = validator.validate(canonical({ title: '短剧', summary: '<p>Too <b>short</b></p>' }));

    expect(result.record.fields.summary).toBe('Too short');
    expect(result.warnings).toEqual(['Summary is too short']);
  });

  it('should drop overlong list entries', () => {
    const longName = 'x'.repeat(60);
    const result = validator.validate(canonical({ title: '短剧', casts: ['演员甲', longName, ' '], genres: [] }));

    expect(result.record.fields.casts).toEqual(['演员甲']);
    expect(result.warnings).toEqual([
      'Genre list is empty',
      `Cast entry is too long: ${'x'.repeat(20)}...`,
    ]);
  });

  it('should flag impossible episode counts', () => {
    expect(validator.validate(canonical({ title: '短剧', episodesCount: 0 })).warnings).toEqual([
      'Episode count must be positive',
    ]);
    expect(validator.validate(canonical({ title: '短剧', episodesCount: 500 })).warnings).toEqual([
      'Episode count is unusually high',
    ]);
  });

  it('should flag inconsistent fields', () => {
    const romance = validator.validate(canonical({ title: 'Love Song', genres: ['Music'] }));
    expect(romance.warnings).toEqual(['Title suggests romance but no romance genre is listed']);
    expect(romance.qualityScore).toBe(5.94);

    const early = validator.validate(canonical({ title: '老剧', year: 1995, rating: 9.5 }));
    expect(early.warnings).toEqual(['Unusually high rating for an early title']);
  });
});

describe('filterByQuality', () => {
  it('should keep valid records at or above the threshold', () => {
    const results = validator.validateBatch([
      canonical(COMPLETE),
      canonical({ title: '重回十八岁' }),
      canonical({ year: 2024 }),
    ]);

    expect(results.map(r => r.qualityScore)).toEqual([10, 5.63, 4.5]);
    expect(filterByQuality(results, 5.63).map(r => r.record.fields.title)).toEqual(['重回十八岁', '重回十八岁']);
    expect(filterByQuality(results, 7)).toHaveLength(1);
    expect(filterByQuality(results, 0)).toHaveLength(2);
  });
});
