export interface ListOptions {
  /** 含點號的副檔名，例如 '.md' */
  extensions: string[];
  /** 略過的目錄名稱（隱藏目錄一律略過） */
  exclude: string[];
}

export interface ContentStorePort {
  fileExists(filePath: string): Promise<boolean>;
  directoryExists(dirPath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  listMarkdownFiles(rootDir: string, options: ListOptions): Promise<string[]>;
}
