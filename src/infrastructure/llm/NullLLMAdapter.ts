import type { LLMPort, MeetingContext } from '../../domain/ports/LLMPort.js';
import { emptyExtraction, type ExtractionResult } from '../../domain/entities/Extraction.js';

/**
 * 空 LLM 實作
 *
 * llm.provider 為 'none' 或沒有 API key 時使用；SyncUseCase 看到 providerId 'none'
 * 就只寫 basic note。遵循 Null Object Pattern，避免在呼叫端進行 null 檢查。
 */
export class NullLLMAdapter implements LLMPort {
  readonly providerId = 'none';
  readonly model = 'none';

  async extract(_text: string, _context: MeetingContext): Promise<ExtractionResult> {
    return emptyExtraction();
  }

  async consolidate(
    result: ExtractionResult,
    _context: MeetingContext,
    _targetMax: number,
  ): Promise<ExtractionResult> {
    return result;
  }
}
