/** 要同步哪些文件 */
export type SyncTarget =
  | { mode: 'incremental' }
  | { mode: 'backfill'; days: number }
  | { mode: 'document'; documentId: string };

/** 同步請求 */
export interface SyncRequest {
  target: SyncTarget;
  /** 單次執行最多處理幾份文件；未處理的留給下次 */
  maxIterations?: number;
  /** 關閉時只寫 basic note（預設依 LLM 是否可用） */
  enrich?: boolean;
  /** 中止後會完成目前文件，再停止處理下一份 */
  signal?: AbortSignal;
}
