import type { ActionItem } from '../entities/Extraction.js';
import { toPersonDisplayName } from './PersonName.js';

/** LLM 常用來表示「沒有指派」的佔位字 */
const GENERIC_ASSIGNEES = new Set([
  '',
  'unassigned',
  'unknown',
  'tbd',
  'n/a',
  'na',
  'none',
  'null',
  'someone',
  'anyone',
  'somebody',
]);

const FIRST_PERSON_COMMITMENT = /^\s*(?:i'll|i will|i'm going to|i am going to|i can|i shall|let me)\b/i;

export function isGenericAssignee(assignee: string | undefined | null): boolean {
  if (assignee === undefined || assignee === null) return true;
  return GENERIC_ASSIGNEES.has(assignee.trim().replace(/^@/, '').toLowerCase());
}

export function isFirstPersonCommitment(text: string): boolean {
  return FIRST_PERSON_COMMITMENT.test(text);
}

export interface AssigneeContext {
  /** 無法判斷時的最終歸屬（設定值 > 筆記建立者 > 第一位與會者） */
  fallbackAssignee: string;
}

/**
 * 解析單一 action item 的負責人
 *
 * 1. 第一人稱承諾（"I'll handle X"）且知道說話者 → 說話者
 * 2. 具體人名 → 標準化後保留
 * 3. 佔位字 → 說話者，否則 fallbackAssignee
 */
export function resolveAssignee(item: ActionItem, ctx: AssigneeContext): string {
  const speaker = item.mentionedBy && !isGenericAssignee(item.mentionedBy)
    ? toPersonDisplayName(item.mentionedBy.replace(/^@/, ''))
    : undefined;

  const assigneeIsSelf = /^(?:i|me|myself)$/i.test(item.assignee.trim());
  if (speaker && (assigneeIsSelf || isFirstPersonCommitment(item.description))) {
    return speaker;
  }

  if (!isGenericAssignee(item.assignee) && !assigneeIsSelf) {
    return toPersonDisplayName(item.assignee.replace(/^@/, ''));
  }

  return speaker ?? ctx.fallbackAssignee;
}

export function resolveAssignees(items: ActionItem[], ctx: AssigneeContext): ActionItem[] {
  return items.map((item) => ({ ...item, assignee: resolveAssignee(item, ctx) }));
}
