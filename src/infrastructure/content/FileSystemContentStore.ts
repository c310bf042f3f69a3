import fs from 'node:fs/promises';
import path from 'node:path';
import type { ContentStorePort, ListOptions } from '../../domain/ports/ContentStorePort.js';

export class FileSystemContentStore implements ContentStorePort {
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async directoryExists(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async listMarkdownFiles(rootDir: string, options: ListOptions): Promise<string[]> {
    const results: string[] = [];
    const extensions = new Set(options.extensions.map((e) => e.toLowerCase()));
    const exclude = new Set(options.exclude);
    await this.walkDir(rootDir, extensions, exclude, results);
    // 依路徑排序，與 readdir 回傳順序無關
    return results.sort();
  }

  /** 遞迴走訪目錄，收集 Markdown 檔案（跳過隱藏目錄與 exclude 名單） */
  private async walkDir(
    dir: string,
    extensions: Set<string>,
    exclude: Set<string>,
    results: string[],
  ): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.') && !exclude.has(entry.name)) {
          await this.walkDir(fullPath, extensions, exclude, results);
        }
      } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
        results.push(fullPath);
      }
    }
  }
}
