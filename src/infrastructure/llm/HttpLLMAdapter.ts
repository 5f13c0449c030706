import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import type { LLMPort, MeetingContext } from '../../domain/ports/LLMPort.js';
import type { ExtractionResult } from '../../domain/entities/Extraction.js';
import {
  ExtractionTimeoutError,
  LLMAuthorizationError,
  isRetryableError,
  type PipelineStage,
} from '../../domain/errors/DomainErrors.js';
import { withRetry, type RetryOptions } from '../../shared/RetryPolicy.js';
import { Logger, errorFields } from '../../shared/Logger.js';
import { ReplyParser } from './ReplyParser.js';
import { EXTRACTION_SCHEMA, buildConsolidationPrompt, buildExtractionPrompt } from './prompts.js';

/**
 * HTTP LLM Adapter
 *
 * 透過 OpenAI-compatible chat completions API（預設 Perplexity sonar-pro）
 * 執行兩階段 enrichment：
 * - extract：以 json_schema response_format 要求結構化回覆
 * - consolidate：要求回傳合併後的 action item 陣列
 *
 * SDK 內建重試關閉，改用 withRetry 統一退避策略；
 * 逾時、網路錯誤、429/5xx 會重試，401/403 立即失敗。
 */

export interface HttpLLMConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  structuredOutput: boolean;
  retry: Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>;
}

function isTransientApiError(err: unknown): boolean {
  if (err instanceof APIConnectionError) return true;
  if (err instanceof APIError) {
    const status = err.status ?? 0;
    return status === 408 || status === 429 || status >= 500;
  }
  return false;
}

export class HttpLLMAdapter implements LLMPort {
  readonly providerId = 'openai-compatible';
  readonly model: string;
  private readonly client: OpenAI;
  private readonly parser = new ReplyParser();
  private readonly logger = new Logger('HttpLLMAdapter');

  constructor(private readonly config: HttpLLMConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
  }

  async extract(text: string, context: MeetingContext): Promise<ExtractionResult> {
    const prompt = buildExtractionPrompt(text, context);
    this.logger.debug('Requesting extraction', {
      documentId: context.documentId, promptLength: prompt.length,
    });

    const reply = await this.complete(prompt, context, 'extract', true);
    const result = this.parser.parseExtraction(reply);

    this.logger.info('Extraction parsed', {
      documentId: context.documentId,
      actionItems: result.actionItems.length,
      decisions: result.decisions.length,
      entities: result.entities.length,
    });
    return result;
  }

  async consolidate(
    result: ExtractionResult,
    context: MeetingContext,
    targetMax: number,
  ): Promise<ExtractionResult> {
    const prompt = buildConsolidationPrompt(result, context, targetMax);
    const reply = await this.complete(prompt, context, 'consolidate', false);
    const actionItems = this.parser.parseActionItems(reply);
    return { ...result, actionItems, consolidated: true };
  }

  /** 單次 chat completion（含重試），回傳訊息內容 */
  private complete(
    prompt: string,
    context: MeetingContext,
    stage: PipelineStage,
    structured: boolean,
  ): Promise<string> {
    return withRetry(async () => {
      try {
        const response = await this.client.chat.completions.create({
          model: this.config.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          ...(structured && this.config.structuredOutput
            ? {
              response_format: {
                type: 'json_schema' as const,
                json_schema: { name: 'meeting_extraction', schema: EXTRACTION_SCHEMA },
              },
            }
            : {}),
        });
        return response.choices[0]?.message?.content?.trim() ?? '';
      } catch (err) {
        throw this.mapError(err, context, stage);
      }
    }, {
      ...this.config.retry,
      isRetryable: (err) => isRetryableError(err) || isTransientApiError(err),
      onRetry: (attempt, err, delayMs) => {
        this.logger.warn('Retrying LLM request', {
          documentId: context.documentId, stage, attempt, delayMs: Math.round(delayMs), ...errorFields(err),
        });
      },
    });
  }

  private mapError(err: unknown, context: MeetingContext, stage: PipelineStage): unknown {
    const options = { cause: err, documentId: context.documentId, stage };
    if (err instanceof APIConnectionTimeoutError) {
      return new ExtractionTimeoutError(`LLM request timed out after ${this.config.timeoutMs}ms`, options);
    }
    if (err instanceof APIError && (err.status === 401 || err.status === 403)) {
      return new LLMAuthorizationError(`LLM endpoint rejected credentials (HTTP ${err.status})`, options);
    }
    return err;
  }
}
