import type { Post } from '../entities/Document.js';

/**
 * 文章排序：date 由新到舊，同日期以 path 升冪（code unit 順序）決勝。
 * 不使用 localeCompare，結果與執行環境的 locale 無關。
 */
export function comparePosts(a: Post, b: Post): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) return byDate;
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

export function sortPosts(posts: readonly Post[]): Post[] {
  return [...posts].sort(comparePosts);
}
