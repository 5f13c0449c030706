import type { ActionItem, Decision, Entity, Priority } from '../entities/Extraction.js';

const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

export function priorityRank(p: Priority): number {
  return PRIORITY_RANK[p];
}

export function higherPriority(a: Priority, b: Priority): Priority {
  return PRIORITY_RANK[a] <= PRIORITY_RANK[b] ? a : b;
}

function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

function actionKey(item: ActionItem): string {
  return `${item.assignee.trim().toLowerCase()}::${normalizeText(item.description)}`;
}

/**
 * 移除完全重複的 action item（同負責人 + 正規化後相同描述）
 *
 * 保留第一次出現的位置，priority 取兩者較高，related entities 聯集，
 * due date 取較早者。結果再跑一次不會有任何變化。
 */
export function dedupeActionItems(items: ActionItem[]): ActionItem[] {
  const byKey = new Map<string, ActionItem>();
  for (const item of items) {
    const key = actionKey(item);
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, { ...item, relatedEntities: [...item.relatedEntities] });
      continue;
    }
    existing.priority = higherPriority(existing.priority, item.priority);
    for (const e of item.relatedEntities) {
      if (!existing.relatedEntities.includes(e)) existing.relatedEntities.push(e);
    }
    if (item.dueDate && (!existing.dueDate || item.dueDate < existing.dueDate)) {
      existing.dueDate = item.dueDate;
    }
    existing.context ??= item.context;
    existing.mentionedBy ??= item.mentionedBy;
  }
  return [...byKey.values()];
}

export function dedupeDecisions(decisions: Decision[]): Decision[] {
  const seen = new Set<string>();
  return decisions.filter((d) => {
    const key = normalizeText(d.statement);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function dedupeEntities(entities: Entity[]): Entity[] {
  const seen = new Set<string>();
  return entities.filter((e) => {
    const key = `${e.category}::${e.displayName.toLowerCase()}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * 在 limit 內挑選 action items，並盡量保留每位負責人至少一項
 *
 * 1. 依負責人首次出現順序，各取其最高優先的一項
 * 2. 剩餘名額依 priority（同級依原順序）補滿
 * 3. 輸出維持原始順序
 *
 * 負責人數量超過 limit 時，以首次出現順序較前者優先。
 */
export function selectWithinBudget(items: ActionItem[], limit: number): ActionItem[] {
  if (items.length <= limit) return items;

  const indexed = items.map((item, index) => ({ item, index }));
  const byPriority = [...indexed].sort(
    (a, b) => priorityRank(a.item.priority) - priorityRank(b.item.priority) || a.index - b.index,
  );

  const chosen = new Set<number>();
  const coveredAssignees = new Set<string>();

  for (const { item } of indexed) {
    if (chosen.size >= limit) break;
    const assignee = item.assignee.toLowerCase();
    if (coveredAssignees.has(assignee)) continue;
    coveredAssignees.add(assignee);
    const best = byPriority.find((c) => c.item.assignee.toLowerCase() === assignee);
    if (best) chosen.add(best.index);
  }

  for (const { index } of byPriority) {
    if (chosen.size >= limit) break;
    chosen.add(index);
  }

  return indexed.filter(({ index }) => chosen.has(index)).map(({ item }) => item);
}

/**
 * 合併後若某位負責人的項目全部消失，從合併前清單補回其最高優先的一項。
 * 補回後可能超過上限，呼叫端需再經過 selectWithinBudget。
 */
export function restoreMissingAssignees(before: ActionItem[], after: ActionItem[]): ActionItem[] {
  const present = new Set(after.map((i) => i.assignee.toLowerCase()));
  const restored = [...after];
  const sorted = [...before].sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));

  for (const item of before) {
    const assignee = item.assignee.toLowerCase();
    if (present.has(assignee)) continue;
    present.add(assignee);
    const best = sorted.find((c) => c.assignee.toLowerCase() === assignee);
    if (best) restored.push(best);
  }
  return restored;
}
