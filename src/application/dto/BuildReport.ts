import type {
  DocumentUnreadableError,
  DuplicatePathError,
  MalformedDocumentError,
} from '../../domain/errors/DomainErrors.js';

/** 單一文件被排除的原因，寫入 build log 與 manifest */
export interface BuildIssue {
  code: string;
  path: string;
  message: string;
}

export function toBuildIssue(
  err: MalformedDocumentError | DuplicatePathError | DocumentUnreadableError,
): BuildIssue {
  return { code: err.code, path: err.documentPath, message: err.message };
}

/** 一次建置的統計 */
export interface BuildReport {
  contentRoot: string;
  outputPath: string | null;
  filesScanned: number;
  filesSkipped: number;
  postsIndexed: number;
  pagesIndexed: number;
  tagsIndexed: number;
  fingerprint: string;
  issues: BuildIssue[];
  warnings: string[];
  durationMs: number;
}
