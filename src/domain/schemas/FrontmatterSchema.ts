import { z } from 'zod';
import { LAYOUTS } from '../entities/Document.js';

/** front matter 中由本專案解讀的 key，其餘 key 原樣保留於 extra */
export const RECOGNIZED_KEYS = ['layout', 'title', 'date', 'tags'] as const;

// YYYY-MM-DD[( |T)HH:MM[:SS[.fff]][ ](Z|±HH[:MM]|±HHMM)]
const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(?:\s*(Z|[+-]\d{2}(?::?\d{2})?))?)?$/;

/**
 * 解析 front matter 常見的時間字串。
 * 僅有日期時視為 UTC 午夜；有時間但無 offset 時視為 UTC。
 * 日曆上不存在的日期（如 2024-02-30）回傳 null。
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_RE.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(frac.slice(0, 3).padEnd(3, '0'));

  if (hour > 23 || minute > 59 || second > 59) return null;

  // 0–99 年維持原年份，不對應到 1900 年代
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  const local = check.setUTCHours(hour, minute, second, millis);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return null;
  }

  let offsetMinutes = 0;
  if (offset && offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    const offHours = Number(digits.slice(0, 2));
    const offMins = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
    if (offHours > 23 || offMins > 59) return null;
    offsetMinutes = sign * (offHours * 60 + offMins);
  }

  return new Date(local - offsetMinutes * 60_000);
}

export const LayoutSchema = z.enum(['post', 'page'], {
  errorMap: (_issue, ctx) => ({
    message: `unknown layout ${JSON.stringify(ctx.data)} (expected ${LAYOUTS.join(' or ')})`,
  }),
});

const TitleSchema = z
  .string({ required_error: 'missing title', invalid_type_error: 'title must be a string' })
  .trim()
  .min(1, 'title must not be empty');

/** YAML timestamp（已由 loader 轉成 Date）或時間字串 */
const TimestampSchema = z.unknown().transform((value, ctx): Date => {
  if (value === undefined || value === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing date' });
    return z.NEVER;
  }
  const date =
    value instanceof Date
      ? (Number.isNaN(value.getTime()) ? null : value)
      : typeof value === 'string'
        ? parseTimestamp(value)
        : null;
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unparsable date ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return date;
});

/** YAML 序列或以空白分隔的單一字串；正規化為去重、排序後的集合 */
const TagsSchema = z.unknown().transform((value, ctx): string[] => {
  if (value === undefined || value === null) return [];

  let raw: string[];
  if (typeof value === 'string') {
    raw = value.split(/\s+/);
  } else if (
    Array.isArray(value) &&
    value.every((t) => typeof t === 'string' || typeof t === 'number')
  ) {
    raw = value.map(String);
  } else {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'tags must be a list of strings' });
    return z.NEVER;
  }

  const tags = new Set(raw.map((t) => t.trim()).filter(Boolean));
  return [...tags].sort();
});

export const PostFrontmatterSchema = z.object({
  title: TitleSchema,
  date: TimestampSchema,
  tags: TagsSchema,
});

export const PageFrontmatterSchema = z.object({
  title: TitleSchema,
});

export type PostFrontmatter = z.infer<typeof PostFrontmatterSchema>;
export type PageFrontmatter = z.infer<typeof PageFrontmatterSchema>;
