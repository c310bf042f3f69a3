export type { Document, Post, Page, Footnote, Layout, RawDocument } from './domain/entities/Document.js';
export { isPost } from './domain/entities/Document.js';
export {
  NavigationIndex,
  type NavigationSnapshot,
  type PostSummary,
  type PageSummary,
} from './domain/entities/NavigationIndex.js';
export * from './domain/errors/DomainErrors.js';
export { comparePosts, sortPosts } from './domain/value-objects/PostOrder.js';
export { IndexFingerprint } from './domain/value-objects/IndexFingerprint.js';
export { parseTimestamp } from './domain/schemas/FrontmatterSchema.js';
export type { ContentStorePort, ListOptions } from './domain/ports/ContentStorePort.js';

export { DocumentFactory, type DocumentFactoryOptions } from './application/DocumentFactory.js';
export { BuildIndexUseCase, type BuildResult } from './application/BuildIndexUseCase.js';
export { LoadContentUseCase, documentPathOf, type LoadOptions, type LoadResult } from './application/LoadContentUseCase.js';
export {
  BuildSiteManifestUseCase,
  type ManifestOptions,
  type ManifestResult,
  type SiteManifest,
} from './application/BuildSiteManifestUseCase.js';
export type { BuildIssue, BuildReport } from './application/dto/BuildReport.js';

export { FileSystemContentStore } from './infrastructure/content/FileSystemContentStore.js';
export { MarkdownParser, type ParsedMarkdown } from './infrastructure/content/MarkdownParser.js';
export { FootnoteParser, type FootnoteScan } from './infrastructure/content/FootnoteParser.js';

export { loadConfig, type PostIndexConfig, type PartialConfig } from './config/ConfigLoader.js';
export { Logger, type LogLevel, type LogSink } from './shared/Logger.js';
