import type { Document, RawDocument } from '../domain/entities/Document.js';
import { NavigationIndex } from '../domain/entities/NavigationIndex.js';
import { DuplicatePathError, MalformedDocumentError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';
import type { CreatedDocument, DocumentFactory } from './DocumentFactory.js';
import { toBuildIssue, type BuildIssue } from './dto/BuildReport.js';

export interface BuildResult {
  documents: Document[];
  index: NavigationIndex;
  issues: BuildIssue[];
  warnings: string[];
}

/**
 * 由 RawDocument 集合建立 Navigation Index。
 *
 * 內容錯誤一律 fail-soft：
 * 1. front matter 不合法 → MalformedDocument，該文件被排除
 * 2. path 重複 → 依 sourceFile 順序，第一個合法的文件保留，其餘為 DuplicatePath 並被排除
 *    （不合法的文件不佔用 path）
 * 其餘文件照常建索引。
 */
export class BuildIndexUseCase {
  constructor(
    private readonly factory: DocumentFactory,
    private readonly logger: Logger = new Logger('BuildIndexUseCase'),
  ) {}

  build(raws: readonly RawDocument[]): BuildResult {
    const issues: BuildIssue[] = [];
    const warnings: string[] = [];
    const documents: Document[] = [];
    const claimed = new Map<string, string>();

    const ordered = [...raws].sort((a, b) =>
      a.sourceFile < b.sourceFile ? -1 : a.sourceFile > b.sourceFile ? 1 : 0,
    );

    for (const raw of ordered) {
      let created: CreatedDocument;
      try {
        created = this.factory.create(raw);
      } catch (err) {
        if (!(err instanceof MalformedDocumentError)) throw err;
        // 不合法的文件不佔用 path
        this.reject(err, issues);
        continue;
      }

      const owner = claimed.get(raw.path);
      if (owner !== undefined) {
        this.reject(new DuplicatePathError(raw.path, raw.sourceFile, owner), issues);
        continue;
      }

      claimed.set(raw.path, raw.sourceFile);
      documents.push(created.document);
      for (const w of created.warnings) {
        this.logger.warn(w, { path: raw.path });
        warnings.push(w);
      }
    }

    const index = new NavigationIndex(documents);
    this.logger.info('Navigation index built', {
      posts: index.postCount,
      pages: index.pageCount,
      tags: index.tags().size,
      excluded: issues.length,
    });

    return { documents, index, issues, warnings };
  }

  private reject(err: MalformedDocumentError | DuplicatePathError, issues: BuildIssue[]): void {
    this.logger.warn(err.message, { code: err.code, path: err.documentPath });
    issues.push(toBuildIssue(err));
  }
}
