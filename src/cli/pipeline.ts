import { BuildIndexUseCase } from '../application/BuildIndexUseCase.js';
import { BuildSiteManifestUseCase } from '../application/BuildSiteManifestUseCase.js';
import { DocumentFactory } from '../application/DocumentFactory.js';
import { LoadContentUseCase } from '../application/LoadContentUseCase.js';
import { loadConfig, type PostIndexConfig } from '../config/ConfigLoader.js';
import { FileSystemContentStore } from '../infrastructure/content/FileSystemContentStore.js';
import { MarkdownParser } from '../infrastructure/content/MarkdownParser.js';
import { Logger } from '../shared/Logger.js';

export interface Pipeline {
  config: PostIndexConfig;
  useCase: BuildSiteManifestUseCase;
}

/** 依 site root 的設定組裝 load → index → manifest 流程 */
export function createPipeline(siteRoot: string): Pipeline {
  const config = loadConfig(siteRoot);
  const logger = new Logger('postindex', config.log.level);
  const store = new FileSystemContentStore();

  const loader = new LoadContentUseCase(store, new MarkdownParser(), logger.child('load'));
  const indexer = new BuildIndexUseCase(
    new DocumentFactory({ postsDir: config.content.postsDir }),
    logger.child('index'),
  );
  const useCase = new BuildSiteManifestUseCase(store, loader, indexer, logger.child('manifest'));

  return { config, useCase };
}
