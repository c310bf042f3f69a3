export type Layout = 'post' | 'page';

export const LAYOUTS: readonly Layout[] = ['post', 'page'];

/** 文件內的註腳；marker 在單一文件內唯一 */
export interface Footnote {
  marker: string;
  text: string;
}

interface DocumentBase {
  /** 相對於 content root 的識別碼（POSIX 分隔、去除副檔名） */
  path: string;
  sourceFile: string;
  title: string;
  body: string;
  footnotes: Footnote[];
  /** 僅供外部 renderer 使用的 key（icon、order 等），不解讀 */
  extra: Record<string, unknown>;
}

export interface Post extends DocumentBase {
  layout: 'post';
  date: Date;
  tags: readonly string[];
}

export interface Page extends DocumentBase {
  layout: 'page';
}

export type Document = Post | Page;

/** 尚未驗證的文件：front matter 仍是原始 YAML 物件 */
export interface RawDocument {
  path: string;
  sourceFile: string;
  frontmatter: Record<string, unknown>;
  body: string;
}

export function isPost(doc: Document): doc is Post {
  return doc.layout === 'post';
}
