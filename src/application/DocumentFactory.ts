import type { z } from 'zod';
import type { Document, Layout, RawDocument } from '../domain/entities/Document.js';
import { MalformedDocumentError } from '../domain/errors/DomainErrors.js';
import {
  LayoutSchema,
  PageFrontmatterSchema,
  PostFrontmatterSchema,
  RECOGNIZED_KEYS,
} from '../domain/schemas/FrontmatterSchema.js';
import { FootnoteParser } from '../infrastructure/content/FootnoteParser.js';

export interface DocumentFactoryOptions {
  /** 未宣告 layout 時，位於此目錄下的檔案視為 post，其餘為 page */
  postsDir: string;
}

export interface CreatedDocument {
  document: Document;
  warnings: string[];
}

function messagesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => issue.message);
}

/**
 * 將 RawDocument 驗證為 Post 或 Page。
 * 任何欄位不合法都會丟出 MalformedDocumentError，訊息列出全部問題。
 */
export class DocumentFactory {
  constructor(
    private readonly options: DocumentFactoryOptions,
    private readonly footnoteParser: FootnoteParser = new FootnoteParser(),
  ) {}

  create(raw: RawDocument): CreatedDocument {
    const layout = LayoutSchema.safeParse(raw.frontmatter.layout ?? this.defaultLayout(raw.sourceFile));
    // layout 不合法時仍以 post schema 檢查其餘欄位，一次列出所有問題
    const problems: string[] = layout.success ? [] : messagesOf(layout.error);
    const kind: Layout = layout.success ? layout.data : 'post';

    const scan = this.footnoteParser.parse(raw.body);
    const footnoteProblems = scan.duplicateMarkers.map((m) => `duplicate footnote marker [^${m}]`);
    const warnings = scan.undefinedReferences.map(
      (m) => `${raw.path}: footnote [^${m}] is referenced but never defined`,
    );

    const base = {
      path: raw.path,
      sourceFile: raw.sourceFile,
      body: raw.body,
      footnotes: scan.footnotes,
      extra: this.extraKeys(raw.frontmatter),
    };

    if (kind === 'post') {
      const parsed = PostFrontmatterSchema.safeParse(raw.frontmatter);
      if (!parsed.success) problems.push(...messagesOf(parsed.error));
      problems.push(...footnoteProblems);
      if (!parsed.success || problems.length > 0) {
        throw new MalformedDocumentError(raw.path, problems);
      }
      const { title, date, tags } = parsed.data;
      return { document: { ...base, layout: 'post', title, date, tags }, warnings };
    }

    // page 不進任何列表，date 與 tags 即使存在也不解讀
    const parsed = PageFrontmatterSchema.safeParse(raw.frontmatter);
    if (!parsed.success) problems.push(...messagesOf(parsed.error));
    problems.push(...footnoteProblems);
    if (!parsed.success || problems.length > 0) {
      throw new MalformedDocumentError(raw.path, problems);
    }
    return { document: { ...base, layout: 'page', title: parsed.data.title }, warnings };
  }

  private defaultLayout(sourceFile: string): Layout {
    const dirs = sourceFile.split('/').slice(0, -1);
    return dirs.includes(this.options.postsDir) ? 'post' : 'page';
  }

  private extraKeys(frontmatter: Record<string, unknown>): Record<string, unknown> {
    const recognized: readonly string[] = RECOGNIZED_KEYS;
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(frontmatter)) {
      if (!recognized.includes(key)) extra[key] = value;
    }
    return extra;
  }
}
