import type { SyncRunRecord } from '../entities/SyncRun.js';
import type { Checkpoint } from '../value-objects/Checkpoint.js';

/** 跨執行共享的同步狀態：checkpoint 與執行紀錄 */
export interface SyncStatePort {
  loadCheckpoint(): Checkpoint | undefined;
  /** 必須是原子性的整筆覆寫 */
  saveCheckpoint(checkpoint: Checkpoint): void;
  recordRun(record: SyncRunRecord): void;
  lastRun(): SyncRunRecord | undefined;
}
