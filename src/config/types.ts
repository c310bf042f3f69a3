import type { LogLevel } from '../shared/Logger.js';

/** 內容目錄設定 */
export interface ContentConfig {
  /** 相對於 site root */
  root: string;
  /** 未宣告 layout 時視為 post 的目錄名稱 */
  postsDir: string;
  /** 含點號的 Markdown 副檔名 */
  extensions: string[];
  /** 掃描時略過的目錄名稱 */
  exclude: string[];
}

/** manifest 輸出設定 */
export interface OutputConfig {
  /** 相對於 site root；site builder 的 data 目錄 */
  indexPath: string;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface PostIndexConfig {
  version: number;
  content: ContentConfig;
  output: OutputConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge），結構同設定檔 schema */
export type { PartialConfig } from './schema.js';
