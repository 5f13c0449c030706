export type Priority = 'high' | 'medium' | 'low';

export const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low'];

export interface ActionItem {
  description: string;
  /** 經過 AssigneeResolver 後一定是具體的人名 */
  assignee: string;
  priority: Priority;
  /** YYYY-MM-DD */
  dueDate?: string;
  context?: string;
  /** 提出或指派這項工作的人（第一人稱承諾時即為說話者） */
  mentionedBy?: string;
  relatedEntities: string[];
}

export interface Decision {
  statement: string;
  rationale?: string;
  owner?: string;
  alternatives: string[];
  impact?: string;
}

export type EntityCategory = 'person' | 'project' | 'company' | 'system';

export const ENTITY_CATEGORIES: readonly EntityCategory[] = ['person', 'project', 'company', 'system'];

export interface Entity {
  name: string;
  category: EntityCategory;
  /** wikilink 用的標準顯示名稱 */
  displayName: string;
}

export interface ExtractionResult {
  actionItems: ActionItem[];
  decisions: Decision[];
  entities: Entity[];
  openQuestions: string[];
  /** stage 2 是否已套用（含 fallback 截斷） */
  consolidated: boolean;
}

export function emptyExtraction(): ExtractionResult {
  return { actionItems: [], decisions: [], entities: [], openQuestions: [], consolidated: false };
}
