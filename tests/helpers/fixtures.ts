import type { RawDocument } from '../../src/domain/entities/Document.js';
import { Logger } from '../../src/shared/Logger.js';

/** 建立 _posts 底下的 RawDocument；path 由檔名推得 */
export function rawPost(
  slug: string,
  frontmatter: Record<string, unknown>,
  body = 'Body.',
): RawDocument {
  return {
    path: `_posts/${slug}`,
    sourceFile: `_posts/${slug}.md`,
    frontmatter: { layout: 'post', ...frontmatter },
    body,
  };
}

export function rawPage(slug: string, frontmatter: Record<string, unknown>, body = 'Page.'): RawDocument {
  return {
    path: slug,
    sourceFile: `${slug}.md`,
    frontmatter: { layout: 'page', ...frontmatter },
    body,
  };
}

/** 收集 log 行而不寫到 stderr */
export function captureLogger(context = 'test'): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = new Logger(context, 'debug', (line) => {
    const parsed: unknown = JSON.parse(line);
    const entry: Record<string, unknown> = {};
    if (typeof parsed === 'object' && parsed !== null) {
      Object.assign(entry, parsed);
    }
    lines.push(entry);
  });
  return { logger, lines };
}
