import type { SourceDocument } from '../entities/SourceDocument.js';

/**
 * 會議筆記來源
 *
 * 失敗時拋出 TransientFetchError（可重試）、AuthorizationError（不可重試）
 * 或 FetchRejectedError。
 */
export interface DocumentSourcePort {
  /** since 之後（含）建立的文件，依建立時間由舊到新排序 */
  listSince(since: Date): Promise<SourceDocument[]>;
  getById(documentId: string): Promise<SourceDocument | undefined>;
}
