import Database from 'better-sqlite3';
import { PRAGMA_SQL, SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';
import { Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：開啟 DB、設定 PRAGMA、建立同步狀態 schema。
 * dbPath 可以是 ':memory:'（測試用）。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string) {
    this.logger = new Logger('DatabaseManager');

    this.db = new Database(dbPath);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', ?)"
    ).run(SCHEMA_VERSION);

    this.logger.debug('Database initialized', { dbPath });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
