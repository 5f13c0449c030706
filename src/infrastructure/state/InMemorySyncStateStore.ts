import type { SyncStatePort } from '../../domain/ports/SyncStatePort.js';
import type { SyncRunRecord } from '../../domain/entities/SyncRun.js';
import type { Checkpoint } from '../../domain/value-objects/Checkpoint.js';

/** 程序內的同步狀態（測試與 dry-run 用） */
export class InMemorySyncStateStore implements SyncStatePort {
  private checkpoint?: Checkpoint;
  readonly runs: SyncRunRecord[] = [];
  /** 每次 saveCheckpoint 的呼叫紀錄 */
  readonly saved: Checkpoint[] = [];

  constructor(initial?: Checkpoint) {
    this.checkpoint = initial;
  }

  loadCheckpoint(): Checkpoint | undefined {
    return this.checkpoint;
  }

  saveCheckpoint(checkpoint: Checkpoint): void {
    this.saved.push(checkpoint);
    if (!this.checkpoint || checkpoint.compareTo(this.checkpoint) > 0) {
      this.checkpoint = checkpoint;
    }
  }

  recordRun(record: SyncRunRecord): void {
    this.runs.push({ ...record, runId: this.runs.length + 1 });
  }

  lastRun(): SyncRunRecord | undefined {
    return this.runs[this.runs.length - 1];
  }
}
