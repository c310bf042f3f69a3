import type { Document, Page, Post } from './Document.js';
import { isPost } from './Document.js';
import { sortPosts } from '../value-objects/PostOrder.js';
import { IndexFingerprint } from '../value-objects/IndexFingerprint.js';

export interface PostSummary {
  path: string;
  sourceFile: string;
  title: string;
  /** ISO-8601 UTC */
  date: string;
  tags: string[];
  footnoteCount: number;
  extra: Record<string, unknown>;
}

export interface PageSummary {
  path: string;
  sourceFile: string;
  title: string;
  extra: Record<string, unknown>;
}

/** 交給外部 site builder 模板的 JSON 結構 */
export interface NavigationSnapshot {
  posts: PostSummary[];
  /** tag → 依 chronological 順序排列的 post path */
  tags: Record<string, string[]>;
  pages: PageSummary[];
}

const EMPTY: readonly Post[] = [];

/**
 * 由已驗證、path 不重複的 Document 集合衍生的唯讀檢視：
 * - chronological：date 由新到舊、同日期以 path 升冪
 * - tags：每個 tag 對應帶有該 tag 的 posts，順序同上
 * Page 不出現在任何列表中。
 */
export class NavigationIndex {
  private readonly orderedPosts: readonly Post[];
  private readonly orderedPages: readonly Page[];
  private readonly tagBuckets: ReadonlyMap<string, readonly Post[]>;

  constructor(documents: readonly Document[]) {
    const posts: Post[] = [];
    const pages: Page[] = [];
    for (const doc of documents) {
      if (isPost(doc)) posts.push(doc);
      else pages.push(doc);
    }

    this.orderedPosts = sortPosts(posts);
    this.orderedPages = [...pages].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    // 單次走訪：依排序後的順序放入各 tag bucket，bucket 內自然有序
    const buckets = new Map<string, Post[]>();
    for (const post of this.orderedPosts) {
      for (const tag of new Set(post.tags)) {
        const bucket = buckets.get(tag);
        if (bucket) bucket.push(post);
        else buckets.set(tag, [post]);
      }
    }
    const keys = [...buckets.keys()].sort();
    this.tagBuckets = new Map(keys.map((k): [string, readonly Post[]] => [k, buckets.get(k) ?? EMPTY]));
  }

  get postCount(): number {
    return this.orderedPosts.length;
  }

  get pageCount(): number {
    return this.orderedPages.length;
  }

  /** 惰性、有限、可重新開始的序列；每次迭代都從最新的一篇開始 */
  chronological(): Iterable<Post> {
    const posts = this.orderedPosts;
    return {
      *[Symbol.iterator]() {
        for (const post of posts) yield post;
      },
    };
  }

  tags(): ReadonlyMap<string, readonly Post[]> {
    return this.tagBuckets;
  }

  postsTagged(tag: string): readonly Post[] {
    return this.tagBuckets.get(tag) ?? EMPTY;
  }

  pages(): readonly Page[] {
    return this.orderedPages;
  }

  toSnapshot(): NavigationSnapshot {
    const tags: Record<string, string[]> = {};
    for (const [tag, posts] of this.tagBuckets) {
      tags[tag] = posts.map((p) => p.path);
    }
    return {
      posts: this.orderedPosts.map((p) => ({
        path: p.path,
        sourceFile: p.sourceFile,
        title: p.title,
        date: p.date.toISOString(),
        tags: [...p.tags],
        footnoteCount: p.footnotes.length,
        extra: p.extra,
      })),
      tags,
      pages: this.orderedPages.map((p) => ({
        path: p.path,
        sourceFile: p.sourceFile,
        title: p.title,
        extra: p.extra,
      })),
    };
  }

  fingerprint(): IndexFingerprint {
    return IndexFingerprint.fromSnapshot(this.toSnapshot());
  }
}
