import path from 'node:path';
import type { ContentStorePort } from '../domain/ports/ContentStorePort.js';
import type { NavigationIndex, NavigationSnapshot } from '../domain/entities/NavigationIndex.js';
import type { PostIndexConfig } from '../config/types.js';
import { Logger } from '../shared/Logger.js';
import type { BuildIndexUseCase } from './BuildIndexUseCase.js';
import type { LoadContentUseCase } from './LoadContentUseCase.js';
import type { BuildIssue, BuildReport } from './dto/BuildReport.js';

export interface ManifestOptions {
  /** false 時只建索引不寫檔（check、list 指令） */
  write?: boolean;
}

/** 寫給 site builder 的 data 檔內容；不含時間戳，相同輸入產生相同檔案 */
export interface SiteManifest extends NavigationSnapshot {
  version: 1;
  generatedFrom: string;
  fingerprint: string;
  issues: BuildIssue[];
}

export interface ManifestResult {
  report: BuildReport;
  index: NavigationIndex;
  manifest: SiteManifest;
}

/**
 * 一次性批次建置：
 * 1. 掃描並載入內容目錄
 * 2. 建立 Navigation Index（內容錯誤只排除該文件）
 * 3. 將 snapshot 寫到 output.indexPath
 */
export class BuildSiteManifestUseCase {
  constructor(
    private readonly store: ContentStorePort,
    private readonly loader: LoadContentUseCase,
    private readonly indexer: BuildIndexUseCase,
    private readonly logger: Logger = new Logger('BuildSiteManifestUseCase'),
  ) {}

  async run(
    siteRoot: string,
    config: PostIndexConfig,
    options: ManifestOptions = {},
  ): Promise<ManifestResult> {
    const started = Date.now();
    const write = options.write ?? true;

    const loaded = await this.loader.load(siteRoot, {
      contentRoot: config.content.root,
      extensions: config.content.extensions,
      exclude: config.content.exclude,
    });
    const built = this.indexer.build(loaded.raws);

    const issues = [...loaded.issues, ...built.issues].sort((a, b) =>
      a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
    );
    const fingerprint = built.index.fingerprint().value;
    const manifest: SiteManifest = {
      version: 1,
      generatedFrom: config.content.root,
      fingerprint,
      ...built.index.toSnapshot(),
      issues,
    };

    let outputPath: string | null = null;
    if (write) {
      outputPath = path.join(siteRoot, config.output.indexPath);
      await this.store.writeFile(outputPath, JSON.stringify(manifest, null, 2) + '\n');
      this.logger.info('Manifest written', { outputPath, fingerprint });
    }

    const report: BuildReport = {
      contentRoot: config.content.root,
      outputPath,
      filesScanned: loaded.filesScanned,
      filesSkipped: loaded.skipped.length,
      postsIndexed: built.index.postCount,
      pagesIndexed: built.index.pageCount,
      tagsIndexed: built.index.tags().size,
      fingerprint,
      issues,
      warnings: built.warnings,
      durationMs: Date.now() - started,
    };

    return { report, index: built.index, manifest };
  }
}
