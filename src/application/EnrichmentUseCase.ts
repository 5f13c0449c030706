import type { LLMPort, MeetingContext } from '../domain/ports/LLMPort.js';
import type { ExtractionResult } from '../domain/entities/Extraction.js';
import type { MeetingMetadata } from '../domain/entities/MeetingNote.js';
import { ConsolidationError } from '../domain/errors/DomainErrors.js';
import { resolveAssignees, type AssigneeContext } from '../domain/value-objects/AssigneeResolver.js';
import {
  dedupeActionItems,
  dedupeDecisions,
  dedupeEntities,
  restoreMissingAssignees,
  selectWithinBudget,
} from '../domain/value-objects/ActionItemBudget.js';
import { Logger, errorFields } from '../shared/Logger.js';

export interface EnrichmentOptions {
  /** action item 超過此數才呼叫 stage 2 */
  consolidationThreshold: number;
  defaultAssignee?: string;
}

export interface EnrichmentContext {
  meeting: MeetingContext;
  assignees: AssigneeContext;
}

export const LAST_RESORT_ASSIGNEE = 'Me';

/**
 * Enrichment 用例：stage 1 抽取 + stage 2 合併
 *
 * 每個階段之後都會做負責人正規化與精確去重。
 * consolidate() 是 fixpoint：數量不超過門檻時不呼叫 LLM，只做冪等的去重，
 * 因此對已合併的結果再合併一次，結果不變。
 */
export class EnrichmentUseCase {
  private readonly logger = new Logger('EnrichmentUseCase');

  constructor(
    private readonly llm: LLMPort,
    private readonly options: EnrichmentOptions,
  ) {}

  /** LLM 是否可用（NullLLMAdapter 時為 false） */
  get enabled(): boolean {
    return this.llm.providerId !== 'none';
  }

  get model(): string {
    return this.llm.model;
  }

  contextFor(meta: MeetingMetadata): EnrichmentContext {
    return {
      meeting: {
        documentId: meta.documentId,
        title: meta.title,
        date: meta.date,
        attendees: meta.attendees,
      },
      assignees: {
        fallbackAssignee: this.options.defaultAssignee
          ?? meta.owner
          ?? meta.attendees[0]
          ?? LAST_RESORT_ASSIGNEE,
      },
    };
  }

  /**
   * 對筆記內容執行完整的 enrichment
   * @throws stage 1 的錯誤（ExtractionTimeoutError、MalformedReplyError、LLMAuthorizationError）
   */
  async enrich(markdown: string, meta: MeetingMetadata): Promise<ExtractionResult> {
    const ctx = this.contextFor(meta);
    const extracted = await this.llm.extract(markdown, ctx.meeting);
    return this.consolidate(extracted, ctx);
  }

  /** stage 2；失敗時退回截斷後的未合併清單（consolidated 為 false），不會拋出 */
  async consolidate(result: ExtractionResult, ctx: EnrichmentContext): Promise<ExtractionResult> {
    const limit = this.options.consolidationThreshold;
    const items = dedupeActionItems(resolveAssignees(result.actionItems, ctx.assignees));
    const base: ExtractionResult = {
      ...result,
      actionItems: items,
      decisions: dedupeDecisions(result.decisions),
      entities: dedupeEntities(result.entities),
    };

    if (items.length <= limit) return base;

    const log = this.logger.child({ documentId: ctx.meeting.documentId, stage: 'consolidate' });
    log.info('Consolidating action items', { count: items.length, limit });

    try {
      const reply = await this.llm.consolidate(base, ctx.meeting, limit);
      const merged = dedupeActionItems(resolveAssignees(reply.actionItems, ctx.assignees));
      if (merged.length === 0) {
        throw new ConsolidationError('Consolidation returned no action items', {
          documentId: ctx.meeting.documentId,
        });
      }
      const bounded = selectWithinBudget(
        dedupeActionItems(restoreMissingAssignees(items, merged)),
        limit,
      );
      log.info('Consolidated action items', { before: items.length, after: bounded.length });
      return { ...base, actionItems: bounded, consolidated: true };
    } catch (err) {
      const failure = err instanceof ConsolidationError
        ? err
        : new ConsolidationError(
          `Consolidation failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err, documentId: ctx.meeting.documentId },
        );
      log.warn('Consolidation failed; truncating unconsolidated list', {
        ...errorFields(failure), before: items.length, after: Math.min(items.length, limit),
      });
      return { ...base, actionItems: selectWithinBudget(items, limit), consolidated: false };
    }
  }
}
