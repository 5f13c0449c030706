import type { ExtractionResult } from '../entities/Extraction.js';

/** 提供給 LLM 的會議上下文 */
export interface MeetingContext {
  documentId: string;
  title: string;
  date: string;
  attendees: string[];
}

/**
 * LLM 抽象介面
 *
 * 兩個階段各自只包一次外部呼叫，讓 EnrichmentUseCase 可以換成測試用的確定性 stub：
 * - extract：stage 1，高召回率地抽出 action items / decisions / entities
 * - consolidate：stage 2，合併重複或重疊的 action items
 */
export interface LLMPort {
  readonly providerId: string;
  /** 寫入 frontmatter 的模型名稱 */
  readonly model: string;

  /**
   * @throws ExtractionTimeoutError | MalformedReplyError | LLMAuthorizationError
   */
  extract(text: string, context: MeetingContext): Promise<ExtractionResult>;

  /**
   * @param targetMax - 合併後希望的最大項目數
   * @throws ExtractionTimeoutError | MalformedReplyError | LLMAuthorizationError
   */
  consolidate(
    result: ExtractionResult,
    context: MeetingContext,
    targetMax: number,
  ): Promise<ExtractionResult>;
}
