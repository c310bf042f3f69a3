import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import { PartialConfigSchema } from './schema.js';
import type { PostIndexConfig, PartialConfig } from './types.js';
import { isLogLevel } from '../shared/Logger.js';

export type { PostIndexConfig, PartialConfig } from './types.js';

/** 逐區塊合併：partial 中有定義的欄位覆蓋 base */
function merge(base: PostIndexConfig, partial: PartialConfig): PostIndexConfig {
  const content: NonNullable<PartialConfig['content']> = partial.content ?? {};
  return {
    version: partial.version ?? base.version,
    content: {
      root: content.root ?? base.content.root,
      postsDir: content.postsDir ?? base.content.postsDir,
      extensions: content.extensions ?? base.content.extensions,
      exclude: content.exclude ?? base.content.exclude,
    },
    output: {
      indexPath: partial.output?.indexPath ?? base.output.indexPath,
    },
    log: {
      level: partial.log?.level ?? base.log.level,
    },
  };
}

/** 環境變數覆蓋 config：POSTINDEX_CONTENT_ROOT、POSTINDEX_LOG_LEVEL */
function applyEnvOverrides(config: PostIndexConfig): void {
  const root = process.env.POSTINDEX_CONTENT_ROOT;
  if (root) {
    config.content.root = root;
  }
  const level = process.env.POSTINDEX_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`POSTINDEX_LOG_LEVEL must be one of debug, info, warn, error (got "${level}")`);
    }
    config.log.level = level;
  }
}

/** 驗證設定值的合法性 */
function validate(config: PostIndexConfig): void {
  if (config.version !== 1) {
    throw new Error(`unsupported config version ${config.version}`);
  }
  if (config.content.extensions.length === 0) {
    throw new Error('content.extensions must not be empty');
  }
  const bad = config.content.extensions.find((e) => !/^\.[^./\\]+$/.test(e));
  if (bad !== undefined) {
    throw new Error(`content.extensions entries must look like ".md" (got "${bad}")`);
  }
  if (!config.content.postsDir.trim()) {
    throw new Error('content.postsDir must not be empty');
  }
  if (!config.output.indexPath.trim()) {
    throw new Error('output.indexPath must not be empty');
  }
}

function readConfigFile(configPath: string): PartialConfig {
  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${CONFIG_FILE_NAME} is not valid JSON`, { cause: err });
  }
  const parsed = PartialConfigSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${details}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .postindex.json（若存在）並合併到預設值上
 * @param siteRoot - 部落格原始碼根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  siteRoot: string,
  overrides?: PartialConfig,
): PostIndexConfig {
  let fileConfig: PartialConfig = {};

  const configPath = path.join(siteRoot, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    fileConfig = readConfigFile(configPath);
  }

  // 合併順序：defaults < file config < overrides < 環境變數
  let merged = merge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = merge(merged, overrides);
  }

  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
