import type { SyncCounts, SyncMode, SyncRunStatus } from '../../domain/entities/SyncRun.js';
import type { PipelineStage } from '../../domain/errors/DomainErrors.js';

export type DocumentOutcomeStatus = 'written' | 'enriched' | 'skipped' | 'failed';

/** 單份文件的處理結果 */
export interface DocumentOutcome {
  documentId: string;
  title: string;
  status: DocumentOutcomeStatus;
  path?: string;
  /** skipped 的原因 */
  reason?: string;
  /** failed 或 enrichment 失敗時所在的階段 */
  stage?: PipelineStage;
  error?: string;
  /** 轉換時降級為純文字的節點型別 */
  unsupportedNodes?: string[];
}

/** 批次摘要 */
export interface SyncReport {
  mode: SyncMode;
  status: SyncRunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  counts: SyncCounts;
  /** 因 maxIterations 或中止而未處理的文件數 */
  remaining: number;
  errors: string[];
  documents: DocumentOutcome[];
  checkpoint?: { createdAt: string; documentId?: string };
}
