import { describe, it, expect } from 'vitest';
import {
  computeCompleteness,
  dedupKey,
  groupRawRecords,
  mergeGroup,
  mergeRawRecords,
  normalizeTitle,
  selectTop,
} from '../../src/aggregator/dedup';
import type { CanonicalRecord } from '../../src/types';
import { rawRecord } from '../helpers/scripted-source';

const PRIORITIES: Record<string, number> = { primary: 1, fallback: 2, mock: 3 };
const priorityOf = (source: string) => PRIORITIES[source] ?? 99;

describe('normalizeTitle', () => {
  it('should fold full-width punctuation', () => {
    expect(normalizeTitle('古装甜宠：王爷的小娇妻')).toBe('古装甜宠王爷的小娇妻');
    expect(normalizeTitle('古装甜宠:王爷的小娇妻')).toBe('古装甜宠王爷的小娇妻');
  });

  it('should case-fold and collapse whitespace', () => {
    expect(normalizeTitle('  Hello,   World! ')).toBe('hello world');
    expect(normalizeTitle('ＬＯＶＥ　Story')).toBe('love story');
  });

  it('should strip symbols and brackets', () => {
    expect(normalizeTitle('《重生》之路★')).toBe('重生之路');
  });
});

describe('dedupKey', () => {
  it('should append the year when known', () => {
    expect(dedupKey('重生之路', 2024)).toBe('重生之路|2024');
    expect(dedupKey('重生之路')).toBe('重生之路');
  });
});

describe('groupRawRecords', () => {
  it('should group the same title and year across sources', () => {
    const groups = groupRawRecords([
      rawRecord('primary', 'p-1', { title: '古装甜宠：王爷的小娇妻', year: 2024 }),
      rawRecord('fallback', 'f-1', { title: '古装甜宠:王爷的小娇妻', year: 2024 }),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].key).toBe('古装甜宠王爷的小娇妻|2024');
    expect(groups[0].records.map(r => r.sourceId)).toEqual(['p-1', 'f-1']);
  });

  it('should keep remakes with different years apart', () => {
    const groups = groupRawRecords([
      rawRecord('primary', 'p-1', { title: 'Reunion', year: 2019 }),
      rawRecord('primary', 'p-2', { title: 'Reunion', year: 2024 }),
    ]);

    expect(groups.map(g => g.key)).toEqual(['reunion|2019', 'reunion|2024']);
  });

  it('should attach an undated record to the first dated group', () => {
    const groups = groupRawRecords([
      rawRecord('primary', 'p-1', { title: 'Reunion', year: 2019 }),
      rawRecord('primary', 'p-2', { title: 'Reunion', year: 2024 }),
      rawRecord('mock', 'm-1', { title: 'reunion' }),
    ]);

    expect(groups).toHaveLength(2);
    expect(groups[0].records.map(r => r.sourceId)).toEqual(['p-1', 'm-1']);
  });

  it('should let the first dated record adopt earlier undated ones', () => {
    const groups = groupRawRecords([
      rawRecord('mock', 'm-1', { title: 'Reunion' }),
      rawRecord('fallback', 'f-1', { title: 'Reunion' }),
      rawRecord('primary', 'p-1', { title: 'Reunion', year: 2024 }),
    ]);

    expect(groups).toHaveLength(1);
    expect(groups[0].key).toBe('reunion|2024');
    expect(groups[0].year).toBe(2024);
    expect(groups[0].records).toHaveLength(3);
  });

  it('should share a title-only group when no record has a year', () => {
    const groups = groupRawRecords([
      rawRecord('mock', 'm-1', { title: 'Reunion' }),
      rawRecord('fallback', 'f-1', { title: 'REUNION!' }),
    ]);

    expect(groups.map(g => g.key)).toEqual(['reunion']);
  });

  it('should drop records without a usable title', () => {
    const groups = groupRawRecords([
      rawRecord('mock', 'm-1', {}),
      rawRecord('mock', 'm-2', { title: '!!!' }),
    ]);

    expect(groups).toEqual([]);
  });
});

describe('mergeGroup', () => {
  it('should take each field from the highest-priority source that has it', () => {
    const [group] = groupRawRecords([
      rawRecord('fallback', 'f-1', { title: 'Reunion', year: 2024, rating: 9.1, genres: ['drama', 'family'], summary: 'From the fallback.' }),
      rawRecord('primary', 'p-1', { title: 'Reunion', year: 2024, rating: 8.2, genres: ['drama'] }),
    ]);

    const merged = mergeGroup(group, priorityOf);

    expect(merged.sources).toEqual(['primary', 'fallback']);
    expect(merged.sourceIds).toEqual({ primary: 'p-1', fallback: 'f-1' });
    expect(merged.fields).toEqual({
      title: 'Reunion',
      year: 2024,
      rating: 8.2,
      genres: ['drama'],
      summary: 'From the fallback.',
    });
  });

  it('should skip unrated values', () => {
    const [group] = groupRawRecords([
      rawRecord('primary', 'p-1', { title: 'Reunion', year: 2024, rating: 0 }),
      rawRecord('fallback', 'f-1', { title: 'Reunion', year: 2024, rating: 7.4 }),
    ]);

    expect(mergeGroup(group, priorityOf).fields.rating).toBe(7.4);
  });

  it('should prefer the larger value on equal priority', () => {
    const [group] = groupRawRecords([
      rawRecord('primary', 'p-1', { title: 'Reunion', year: 2024, casts: ['A'] }),
      rawRecord('primary', 'p-2', { title: 'Reunion', year: 2024, casts: ['A', 'B'] }),
    ]);

    const merged = mergeGroup(group, priorityOf);
    expect(merged.fields.casts).toEqual(['A', 'B']);
    expect(merged.sourceIds).toEqual({ primary: 'p-1' });
  });

  it('should prefer the higher number on equal priority', () => {
    const [group] = groupRawRecords([
      rawRecord('fallback', 'f-1', { title: 'Reunion', year: 2024, rating: 7.2, episodesCount: 60 }),
      rawRecord('fallback', 'f-2', { title: 'Reunion', year: 2024, rating: 8.4, episodesCount: 80 }),
      rawRecord('fallback', 'f-3', { title: 'Reunion', year: 2024, rating: 8.4, ratingsCount: 1200 }),
    ]);

    const merged = mergeGroup(group, priorityOf);
    expect(merged.fields).toEqual({
      title: 'Reunion',
      year: 2024,
      rating: 8.4,
      ratingsCount: 1200,
      episodesCount: 80,
    });
  });

  it('should not share arrays with its inputs', () => {
    const genres = ['drama'];
    const [group] = groupRawRecords([rawRecord('primary', 'p-1', { title: 'Reunion', genres })]);

    const merged = mergeGroup(group, priorityOf);
    merged.fields.genres?.push('changed');

    expect(genres).toEqual(['drama']);
  });
});

describe('computeCompleteness', () => {
  it('should count populated expected fields', () => {
    expect(computeCompleteness({ title: 'X', year: 2024, rating: 0, genres: [] }, 1)).toBe(0.2);
  });

  it('should add the corroboration bonus per extra source', () => {
    expect(computeCompleteness({ title: 'X', year: 2024 }, 3)).toBe(0.3);
    expect(computeCompleteness({ title: 'X', year: 2024 }, 3, 0)).toBe(0.2);
  });

  it('should cap at one', () => {
    const full = {
      title: 'X',
      year: 2024,
      rating: 8,
      genres: ['a'],
      summary: 'Summary text',
      directors: ['d'],
      casts: ['c'],
      tags: ['t'],
      episodesCount: 20,
      countries: ['CN'],
    };
    expect(computeCompleteness(full, 1)).toBe(1);
    expect(computeCompleteness(full, 4)).toBe(1);
  });
});

describe('mergeRawRecords', () => {
  const records = [
    rawRecord('primary', 'p-1', { title: '重生之路', year: 2024, rating: 8 }),
    rawRecord('fallback', 'f-1', { title: '重生之路', year: 2024, summary: 'Second chance.' }),
    rawRecord('mock', 'm-1', { title: 'Other', year: 2023 }),
  ];

  it('should merge duplicates and keep first-seen order', () => {
    const merged = mergeRawRecords(records, priorityOf);

    expect(merged.map(r => r.key)).toEqual(['重生之路|2024', 'other|2023']);
    expect(merged[0].completenessScore).toBe(0.45);
    expect(merged[1].completenessScore).toBe(0.2);
  });

  it('should rebuild each canonical record from its own contributors', () => {
    const merged = mergeRawRecords(records, priorityOf);

    for (const canonical of merged) {
      const contributors = records.filter(raw => canonical.sourceIds[raw.source] === raw.sourceId);
      expect(mergeRawRecords(contributors, priorityOf)).toEqual([canonical]);
    }
    expect(merged[0].sourceIds).toEqual({ primary: 'p-1', fallback: 'f-1' });
  });
});

describe('selectTop', () => {
  const record = (key: string, completenessScore: number): CanonicalRecord => ({
    key,
    sources: ['mock'],
    sourceIds: { mock: key },
    fields: { title: key },
    completenessScore,
  });

  it('should sort by completeness and keep input order on ties', () => {
    const top = selectTop([record('a', 0.2), record('b', 0.8), record('c', 0.2), record('d', 0.5)], 3);
    expect(top.map(r => r.key)).toEqual(['b', 'd', 'a']);
  });

  it('should handle a zero limit', () => {
    expect(selectTop([record('a', 0.2)], 0)).toEqual([]);
  });
});
