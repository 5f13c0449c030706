import { z } from 'zod';
import type {
  ActionItem,
  Decision,
  Entity,
  EntityCategory,
  ExtractionResult,
} from '../../domain/entities/Extraction.js';
import { MalformedReplyError } from '../../domain/errors/DomainErrors.js';
import { toPersonDisplayName } from '../../domain/value-objects/PersonName.js';

/**
 * LLM 回覆解析
 *
 * 模型回覆常見的問題：包在 ```json fence 裡、前後夾雜說明文字、
 * 多個 JSON 區塊、或因 max_tokens 被截斷。這裡依序產生候選字串，
 * 逐一以 zod 驗證，第一個符合結構的候選勝出；個別不合法的項目直接丟棄。
 */

const PREVIEW_LENGTH = 200;

export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)```/gi, (_m, inner: string) => inner.trim());
}

function scanBalancedJsonBlocks(text: string): string[] {
  const out: string[] = [];
  const closes: Record<string, string> = { '{': '}', '[': ']' };

  for (let i = 0; i < text.length; i++) {
    const start = text[i];
    const expectedClose = closes[start];
    if (!expectedClose) continue;

    let depth = 0;
    let inString = false;
    let escape = false;

    for (let j = i; j < text.length; j++) {
      const ch = text[j];

      if (inString) {
        if (escape) escape = false;
        else if (ch === '\\') escape = true;
        else if (ch === '"') inString = false;
        continue;
      }

      if (ch === '"') {
        inString = true;
        continue;
      }

      if (ch === start) depth++;
      if (ch === expectedClose) depth--;

      if (depth === 0) {
        out.push(text.slice(i, j + 1).trim());
        i = j;
        break;
      }
    }
  }

  return out;
}

/**
 * 修復被截斷的 JSON：退回到最後一個完整閉合的元素，再補上尚未關閉的括號。
 * 文字本身已平衡或無法修復時回傳 undefined。
 */
export function repairTruncatedJson(text: string): string | undefined {
  const start = text.search(/[{[]/);
  if (start === -1) return undefined;

  const stack: string[] = [];
  let inString = false;
  let escape = false;
  let lastSafe: { end: number; open: string[] } | undefined;

  for (let j = start; j < text.length; j++) {
    const ch = text[j];

    if (inString) {
      if (escape) escape = false;
      else if (ch === '\\') escape = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(ch);
    } else if (ch === '}' || ch === ']') {
      stack.pop();
      if (stack.length === 0) return undefined;
      lastSafe = { end: j + 1, open: [...stack] };
    }
  }

  if (stack.length === 0 || !lastSafe) return undefined;

  const closers = lastSafe.open
    .reverse()
    .map((open) => (open === '{' ? '}' : ']'))
    .join('');
  return text.slice(start, lastSafe.end) + closers;
}

/** 依嘗試順序列出可能的 JSON 字串（已去重） */
export function extractJsonCandidates(text: string): string[] {
  const cleaned = stripCodeFences(text.trim());
  const candidates: string[] = [];

  if (cleaned.length > 0) candidates.push(cleaned);
  candidates.push(...scanBalancedJsonBlocks(cleaned));

  const repaired = repairTruncatedJson(cleaned);
  if (repaired) candidates.push(repaired);

  const seen = new Set<string>();
  return candidates
    .map((c) => c.trim())
    .filter((c) => {
      if (c.length === 0 || seen.has(c)) return false;
      seen.add(c);
      return true;
    });
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

// ── 寬鬆的項目 schema ──

const optionalText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() ? v.trim() : undefined),
  z.string().optional(),
);

const stringList = z.preprocess(
  (v) => (Array.isArray(v)
    ? v.filter((s): s is string => typeof s === 'string' && s.trim() !== '').map((s) => s.trim())
    : []),
  z.array(z.string()),
);

const prioritySchema = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(['high', 'medium', 'low']),
).catch('medium');

const ActionItemReplySchema = z.object({
  task: optionalText,
  description: optionalText,
  assignee: optionalText,
  priority: prioritySchema,
  due_date: optionalText,
  context: optionalText,
  mentioned_by: optionalText,
  related_entities: stringList,
}).refine((r) => r.task !== undefined || r.description !== undefined, 'action item has no task');

const DecisionReplySchema = z.object({
  decision: optionalText,
  statement: optionalText,
  rationale: optionalText,
  alternatives_considered: stringList,
  alternatives: stringList,
  impact: optionalText,
  owner: optionalText,
}).refine((r) => r.decision !== undefined || r.statement !== undefined, 'decision has no statement');

const EntityReplySchema = z.object({
  name: z.string().trim().min(1),
  category: optionalText,
  type: optionalText,
});

const EntityGroupsSchema = z.object({
  people: stringList,
  projects: stringList,
  issues: stringList,
  companies: stringList,
  technologies: stringList,
  systems: stringList,
});

const ENTITY_KEYS = ['action_items', 'decisions', 'entities', 'open_questions'] as const;

const CATEGORY_ALIASES: Record<string, EntityCategory> = {
  person: 'person',
  people: 'person',
  project: 'project',
  projects: 'project',
  product: 'project',
  issue: 'project',
  issues: 'project',
  company: 'company',
  companies: 'company',
  organization: 'company',
  system: 'system',
  systems: 'system',
  technology: 'system',
  technologies: 'system',
  tool: 'system',
};

const DUE_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function makeEntity(name: string, category: EntityCategory): Entity {
  const displayName = category === 'person' ? toPersonDisplayName(name) : name.trim();
  return { name: name.trim(), category, displayName };
}

export class ReplyParser {
  /**
   * 解析 stage 1 回覆
   * @throws MalformedReplyError 找不到含 action_items / decisions / entities / open_questions 的物件
   */
  parseExtraction(reply: string): ExtractionResult {
    for (const candidate of extractJsonCandidates(reply)) {
      const parsed = tryParse(candidate);
      if (!parsed.ok || !isRecord(parsed.value)) continue;
      const value = parsed.value;
      if (!ENTITY_KEYS.some((k) => k in value)) continue;

      return {
        actionItems: this.toActionItems(value.action_items),
        decisions: this.toDecisions(value.decisions),
        entities: this.toEntities(value.entities),
        openQuestions: stringList.parse(value.open_questions),
        consolidated: false,
      };
    }
    throw new MalformedReplyError('LLM reply contains no usable extraction object', reply.slice(0, PREVIEW_LENGTH));
  }

  /**
   * 解析 stage 2 回覆：JSON 陣列，或含 action_items 的物件
   * @throws MalformedReplyError
   */
  parseActionItems(reply: string): ActionItem[] {
    for (const candidate of extractJsonCandidates(reply)) {
      const parsed = tryParse(candidate);
      if (!parsed.ok) continue;
      const value = parsed.value;
      if (Array.isArray(value)) return this.toActionItems(value);
      if (isRecord(value) && Array.isArray(value.action_items)) return this.toActionItems(value.action_items);
    }
    throw new MalformedReplyError('LLM reply contains no action item list', reply.slice(0, PREVIEW_LENGTH));
  }

  private toActionItems(raw: unknown): ActionItem[] {
    if (!Array.isArray(raw)) return [];
    const items: ActionItem[] = [];
    for (const entry of raw) {
      const parsed = ActionItemReplySchema.safeParse(entry);
      if (!parsed.success) continue;
      const r = parsed.data;
      items.push({
        description: r.task ?? r.description ?? '',
        assignee: r.assignee ?? '',
        priority: r.priority,
        dueDate: r.due_date && DUE_DATE.test(r.due_date) ? r.due_date : undefined,
        context: r.context,
        mentionedBy: r.mentioned_by,
        relatedEntities: r.related_entities,
      });
    }
    return items;
  }

  private toDecisions(raw: unknown): Decision[] {
    if (!Array.isArray(raw)) return [];
    const decisions: Decision[] = [];
    for (const entry of raw) {
      const parsed = DecisionReplySchema.safeParse(entry);
      if (!parsed.success) continue;
      const r = parsed.data;
      decisions.push({
        statement: r.decision ?? r.statement ?? '',
        rationale: r.rationale,
        owner: r.owner,
        alternatives: r.alternatives_considered.length > 0 ? r.alternatives_considered : r.alternatives,
        impact: r.impact,
      });
    }
    return decisions;
  }

  /** 接受 {people: [...], projects: [...]} 分組格式或 [{name, category}] 陣列格式 */
  private toEntities(raw: unknown): Entity[] {
    if (Array.isArray(raw)) {
      const entities: Entity[] = [];
      for (const entry of raw) {
        const parsed = EntityReplySchema.safeParse(entry);
        if (!parsed.success) continue;
        const label = (parsed.data.category ?? parsed.data.type ?? '').toLowerCase();
        entities.push(makeEntity(parsed.data.name, CATEGORY_ALIASES[label] ?? 'project'));
      }
      return entities;
    }

    if (!isRecord(raw)) return [];
    const groups = EntityGroupsSchema.parse(raw);
    return [
      ...groups.people.map((n) => makeEntity(n, 'person')),
      ...groups.projects.map((n) => makeEntity(n, 'project')),
      ...groups.issues.map((n) => makeEntity(n, 'project')),
      ...groups.companies.map((n) => makeEntity(n, 'company')),
      ...groups.technologies.map((n) => makeEntity(n, 'system')),
      ...groups.systems.map((n) => makeEntity(n, 'system')),
    ];
  }
}
