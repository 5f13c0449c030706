export type SyncMode = 'incremental' | 'backfill' | 'document';

export type SyncRunStatus = 'completed' | 'cancelled' | 'aborted' | 'locked';

export interface SyncCounts {
  fetched: number;
  succeeded: number;
  enriched: number;
  enrichmentFailed: number;
  consolidated: number;
  skipped: number;
  failed: number;
}

/** 一次同步執行的紀錄，供 status 指令與監控使用 */
export interface SyncRunRecord {
  runId?: number;
  mode: SyncMode;
  startedAt: string;
  finishedAt: string;
  status: SyncRunStatus;
  counts: SyncCounts;
  errors: string[];
}

export function emptyCounts(): SyncCounts {
  return {
    fetched: 0,
    succeeded: 0,
    enriched: 0,
    enrichmentFailed: 0,
    consolidated: 0,
    skipped: 0,
    failed: 0,
  };
}
