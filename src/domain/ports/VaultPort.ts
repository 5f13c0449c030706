export interface VaultPort {
  fileExists(filePath: string): Promise<boolean>;
  directoryExists(dirPath: string): Promise<boolean>;
  readFile(filePath: string): Promise<string>;
  /** 先寫暫存檔再 rename；讀者只會看到完整檔案或先前的版本 */
  writeFileAtomic(filePath: string, content: string): Promise<void>;
  listMarkdownFiles(dirPath: string): Promise<string[]>;
  ensureDirectory(dirPath: string): Promise<void>;
}
