import path from 'node:path';
import type { RawDocument } from '../domain/entities/Document.js';
import type { ContentStorePort } from '../domain/ports/ContentStorePort.js';
import {
  ContentRootNotFoundError,
  DocumentUnreadableError,
  FrontmatterSyntaxError,
  MalformedDocumentError,
} from '../domain/errors/DomainErrors.js';
import type { MarkdownParser } from '../infrastructure/content/MarkdownParser.js';
import { Logger } from '../shared/Logger.js';
import { toBuildIssue, type BuildIssue } from './dto/BuildReport.js';

/** 載入設定 */
export interface LoadOptions {
  /** 相對於 site root 的內容目錄 */
  contentRoot: string;
  extensions: string[];
  exclude: string[];
}

export interface LoadResult {
  raws: RawDocument[];
  issues: BuildIssue[];
  /** 沒有 front matter 的 Markdown 檔（README 等），視為靜態資源 */
  skipped: string[];
  filesScanned: number;
}

/** 文件識別碼：相對路徑、POSIX 分隔、去除副檔名 */
export function documentPathOf(sourceFile: string): string {
  const ext = path.posix.extname(sourceFile);
  return ext ? sourceFile.slice(0, -ext.length) : sourceFile;
}

/**
 * 掃描內容目錄並讀出每個 Markdown 檔的 front matter 與內文。
 * YAML 語法錯誤與單一檔案讀取失敗都轉為 issue，不中斷載入。
 */
export class LoadContentUseCase {
  constructor(
    private readonly store: ContentStorePort,
    private readonly parser: MarkdownParser,
    private readonly logger: Logger = new Logger('LoadContentUseCase'),
  ) {}

  async load(siteRoot: string, options: LoadOptions): Promise<LoadResult> {
    const rootAbs = path.resolve(siteRoot, options.contentRoot);
    if (!(await this.store.directoryExists(rootAbs))) {
      throw new ContentRootNotFoundError(rootAbs);
    }

    const files = await this.store.listMarkdownFiles(rootAbs, {
      extensions: options.extensions,
      exclude: options.exclude,
    });

    const raws: RawDocument[] = [];
    const issues: BuildIssue[] = [];
    const skipped: string[] = [];

    for (const filePath of files) {
      const sourceFile = path.relative(rootAbs, filePath).split(path.sep).join('/');
      const docPath = documentPathOf(sourceFile);
      let content: string;
      try {
        content = await this.store.readFile(filePath);
      } catch (err) {
        const unreadable = new DocumentUnreadableError(docPath, sourceFile, { cause: err });
        this.logger.warn(unreadable.message, { code: unreadable.code, path: docPath });
        issues.push(toBuildIssue(unreadable));
        continue;
      }

      try {
        const parsed = this.parser.parse(content);
        if (!parsed.hasFrontmatter) {
          this.logger.debug('Skipping file without front matter', { sourceFile });
          skipped.push(sourceFile);
          continue;
        }
        raws.push({ path: docPath, sourceFile, frontmatter: parsed.frontmatter, body: parsed.body });
      } catch (err) {
        if (!(err instanceof FrontmatterSyntaxError)) throw err;
        const malformed = new MalformedDocumentError(docPath, [err.message], { cause: err });
        this.logger.warn(malformed.message, { code: malformed.code, path: docPath });
        issues.push(toBuildIssue(malformed));
      }
    }

    this.logger.debug('Content loaded', {
      contentRoot: rootAbs,
      files: files.length,
      documents: raws.length,
      skipped: skipped.length,
    });

    return { raws, issues, skipped, filesScanned: files.length };
  }
}
