import fs from 'node:fs/promises';
import path from 'node:path';
import crypto from 'node:crypto';
import type { VaultPort } from '../../domain/ports/VaultPort.js';
import { WriteIOError } from '../../domain/errors/DomainErrors.js';

export class FileSystemVaultAdapter implements VaultPort {
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

  /**
   * 原子寫入：在同一目錄寫暫存檔，完成後 rename 覆蓋目標。
   * 任何一步失敗都會刪掉暫存檔，目標檔維持先前狀態。
   */
  async writeFileAtomic(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`,
    );

    let renamed = false;
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, content, 'utf-8');
      await fs.rename(tmpPath, filePath);
      renamed = true;
    } catch (err) {
      throw new WriteIOError(
        `Failed to write ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        filePath,
        { cause: err },
      );
    } finally {
      if (!renamed) {
        await fs.rm(tmpPath, { force: true });
      }
    }
  }

  async listMarkdownFiles(dirPath: string): Promise<string[]> {
    const results: string[] = [];
    if (!(await this.directoryExists(dirPath))) return results;
    await this.walkDir(dirPath, results);
    return results.sort();
  }

  /** 遞迴走訪目錄，收集 .md 檔案（跳過隱藏目錄） */
  private async walkDir(dir: string, results: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.')) {
          await this.walkDir(fullPath, results);
        }
      } else if (entry.isFile() && entry.name.endsWith('.md')) {
        results.push(fullPath);
      }
    }
  }

  async ensureDirectory(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}
