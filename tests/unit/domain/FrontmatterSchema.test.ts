import { describe, it, expect } from 'vitest';
import {
  parseTimestamp,
  PostFrontmatterSchema,
  LayoutSchema,
} from '../../../src/domain/schemas/FrontmatterSchema.js';

describe('parseTimestamp', () => {
  it('should treat a date-only string as UTC midnight', () => {
    expect(parseTimestamp('2024-04-04')?.toISOString()).toBe('2024-04-04T00:00:00.000Z');
  });

  it('should apply a compact UTC offset', () => {
    expect(parseTimestamp('2024-04-21 10:30:00 +0800')?.toISOString()).toBe('2024-04-21T02:30:00.000Z');
  });

  it('should apply a colon offset and a negative sign', () => {
    expect(parseTimestamp('2024-05-16T09:00:00-05:00')?.toISOString()).toBe('2024-05-16T14:00:00.000Z');
  });

  it('should accept an hour-only offset and Z', () => {
    expect(parseTimestamp('2024-04-08 12:00 +02')?.toISOString()).toBe('2024-04-08T10:00:00.000Z');
    expect(parseTimestamp('2024-04-08T12:00:00.25Z')?.toISOString()).toBe('2024-04-08T12:00:00.250Z');
  });

  it('should take a time without offset as UTC', () => {
    expect(parseTimestamp('2024-04-05 08:15')?.toISOString()).toBe('2024-04-05T08:15:00.000Z');
  });

  it('should keep years below 100 as written', () => {
    expect(parseTimestamp('0099-03-01')?.toISOString()).toBe('0099-03-01T00:00:00.000Z');
    expect(parseTimestamp('0004-02-29 12:00 Z')?.toISOString()).toBe('0004-02-29T12:00:00.000Z');
  });

  it('should reject calendar-invalid dates and garbage', () => {
    expect(parseTimestamp('2024-02-30')).toBeNull();
    expect(parseTimestamp('2024-04-04 25:00')).toBeNull();
    expect(parseTimestamp('April 4th')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });
});

describe('PostFrontmatterSchema', () => {
  it('should accept a Date produced by the YAML loader', () => {
    const date = new Date('2024-04-04T00:00:00Z');
    const result = PostFrontmatterSchema.parse({ title: 'Swap', date });
    expect(result.date).toBe(date);
    expect(result.tags).toEqual([]);
  });

  it('should normalize tags into a sorted set', () => {
    const result = PostFrontmatterSchema.parse({
      title: 'Cloud',
      date: '2024-04-21',
      tags: ['terraform', ' aws ', 'cloud', 'aws', ''],
    });
    expect(result.tags).toEqual(['aws', 'cloud', 'terraform']);
  });

  it('should split a space-separated tag string', () => {
    const result = PostFrontmatterSchema.parse({ title: 'Meta', date: '2024-04-05', tags: 'meta  minimalism' });
    expect(result.tags).toEqual(['meta', 'minimalism']);
  });

  it('should report every failing field', () => {
    const result = PostFrontmatterSchema.safeParse({ title: '  ', tags: { a: 1 } });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.message)).toEqual([
      'title must not be empty',
      'missing date',
      'tags must be a list of strings',
    ]);
  });

  it('should reject an unparsable date string', () => {
    const result = PostFrontmatterSchema.safeParse({ title: 'x', date: 'yesterday' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('unparsable date "yesterday"');
  });
});

describe('LayoutSchema', () => {
  it('should accept post and page only', () => {
    expect(LayoutSchema.parse('post')).toBe('post');
    expect(LayoutSchema.parse('page')).toBe('page');
    const result = LayoutSchema.safeParse('draft');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].message).toBe('unknown layout "draft" (expected post or page)');
  });
});
