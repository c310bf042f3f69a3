import { InvalidArgumentError } from 'commander';
import type { Post } from '../../domain/entities/Document.js';
import type { BuildReport } from '../../application/dto/BuildReport.js';

export type OutputFormat = 'json' | 'text';

/** commander 的 argParser：只接受 json 或 text */
export function parseFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'text') return value;
  throw new InvalidArgumentError('Output format must be "json" or "text".');
}

/** YYYY-MM-DD（UTC） */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class OutputFormatter {
  formatPosts(posts: Iterable<Post>, format: OutputFormat): string {
    const list = [...posts];
    if (format === 'json') {
      return JSON.stringify(
        list.map((p) => ({ path: p.path, title: p.title, date: p.date.toISOString(), tags: p.tags })),
        null,
        2,
      );
    }
    if (list.length === 0) return 'No posts found.';
    return list.map((p) => `${formatDay(p.date)}  ${p.path}  ${p.title}`).join('\n');
  }

  formatTagCounts(tags: ReadonlyMap<string, readonly Post[]>, format: OutputFormat): string {
    if (format === 'json') {
      const counts: Record<string, number> = {};
      for (const [tag, posts] of tags) counts[tag] = posts.length;
      return JSON.stringify(counts, null, 2);
    }
    if (tags.size === 0) return 'No tags found.';
    return [...tags].map(([tag, posts]) => `${tag} (${posts.length})`).join('\n');
  }

  formatReport(report: BuildReport, format: OutputFormat): string {
    if (format === 'json') return JSON.stringify(report, null, 2);

    const lines = [
      `Content root: ${report.contentRoot}`,
      `Posts: ${report.postsIndexed}  Pages: ${report.pagesIndexed}  Tags: ${report.tagsIndexed}`,
      `Files scanned: ${report.filesScanned} (${report.filesSkipped} without front matter)`,
      `Fingerprint: ${report.fingerprint}`,
    ];
    if (report.outputPath) lines.push(`Written: ${report.outputPath}`);

    if (report.issues.length > 0) {
      lines.push('', `Excluded documents (${report.issues.length}):`);
      for (const issue of report.issues) {
        lines.push(`  [${issue.code}] ${issue.message}`);
      }
    }
    if (report.warnings.length > 0) {
      lines.push('', `Warnings (${report.warnings.length}):`);
      for (const w of report.warnings) lines.push(`  ${w}`);
    }
    return lines.join('\n');
  }
}
