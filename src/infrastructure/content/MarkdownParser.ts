import matter from 'gray-matter';
import { FrontmatterSyntaxError } from '../../domain/errors/DomainErrors.js';

export interface ParsedMarkdown {
  /** 檔案開頭是否有 front matter 區塊；沒有的 Markdown 檔視為靜態資源 */
  hasFrontmatter: boolean;
  frontmatter: Record<string, unknown>;
  body: string;
}

const BOM = '\uFEFF';

export class MarkdownParser {
  parse(input: string): ParsedMarkdown {
    // 去除 UTF-8 BOM 並統一為 LF，front matter 偵測與後續解析都依賴行首的 ---
    const rawMarkdown = (input.startsWith(BOM) ? input.slice(1) : input).replace(/\r\n?/g, '\n');
    if (!rawMarkdown.trim()) {
      return { hasFrontmatter: false, frontmatter: {}, body: '' };
    }
    if (!matter.test(rawMarkdown)) {
      return { hasFrontmatter: false, frontmatter: {}, body: rawMarkdown };
    }

    let parsed: matter.GrayMatterFile<string>;
    try {
      // options 非空時 gray-matter 不使用內部快取
      parsed = matter(rawMarkdown, {});
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new FrontmatterSyntaxError(`Invalid front matter: ${reason}`, { cause: err });
    }

    const data: unknown = parsed.data;
    const frontmatter: Record<string, unknown> = {};
    if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
      Object.assign(frontmatter, data);
    }
    return { hasFrontmatter: true, frontmatter, body: parsed.content };
  }
}
