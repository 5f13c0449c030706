import type { ExtractionResult } from '../../domain/entities/Extraction.js';
import type { MeetingContext } from '../../domain/ports/LLMPort.js';

const ACTION_ITEM_SCHEMA = {
  type: 'object',
  properties: {
    task: { type: 'string' },
    assignee: { type: 'string' },
    context: { type: 'string' },
    mentioned_by: { type: ['string', 'null'] },
    due_date: { type: ['string', 'null'] },
    priority: { type: 'string', enum: ['high', 'medium', 'low'] },
    related_entities: { type: 'array', items: { type: 'string' } },
  },
  required: ['task', 'assignee', 'context', 'priority'],
} as const;

/** stage 1 的 response_format json_schema */
export const EXTRACTION_SCHEMA = {
  type: 'object',
  properties: {
    action_items: { type: 'array', items: ACTION_ITEM_SCHEMA },
    decisions: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          decision: { type: 'string' },
          rationale: { type: 'string' },
          alternatives_considered: { type: 'array', items: { type: 'string' } },
          impact: { type: ['string', 'null'] },
          owner: { type: ['string', 'null'] },
        },
        required: ['decision', 'rationale'],
      },
    },
    entities: {
      type: 'object',
      properties: {
        people: { type: 'array', items: { type: 'string' } },
        projects: { type: 'array', items: { type: 'string' } },
        issues: { type: 'array', items: { type: 'string' } },
        companies: { type: 'array', items: { type: 'string' } },
        technologies: { type: 'array', items: { type: 'string' } },
      },
    },
    open_questions: { type: 'array', items: { type: 'string' } },
  },
  required: ['action_items', 'decisions', 'entities', 'open_questions'],
} as const;

export function buildExtractionPrompt(notes: string, ctx: MeetingContext): string {
  const attendees = ctx.attendees.length > 0 ? ctx.attendees.join(', ') : 'Unknown';

  return `You are an expert at analyzing meeting notes and extracting actionable information.

# Meeting Context
- **Title**: ${ctx.title}
- **Date**: ${ctx.date}
- **Attendees**: ${attendees}

# Meeting Notes
${notes}

---

# Task
Extract the actionable information from these notes.

## 1. Action Items
An action item is work someone has to do: implementation, investigation, review, documentation, bug fixes, releases.
A design or wording choice ("use label X", "make field Y mandatory") is a DECISION, not an action item.
Many related decisions usually map to one action item that implements them.

**Assignee detection**:
- "I'll ..." / "I will ..." / "I'm going to ..." → the speaker; put the speaker's name in "mentioned_by" as well
- "Sam will review" → Sam
- "[Name] needs to ..." → that person
- Never use placeholders such as "unassigned", "someone" or "TBD"; pick the attendee who owns the topic

**Priority**:
- high: has a deadline, blocks other work, "must-have", tied to an imminent release
- medium: standard tasks and process improvements with no urgency stated
- low: "consider", "nice to have", exploratory or long-term

**due_date**: YYYY-MM-DD when a date is stated, otherwise null.
**context**: why the task matters, dependencies, blockers.

## 2. Decisions
Capture every conclusive statement about how to proceed, including small UI and wording decisions.
Give the rationale, the alternatives that were rejected, the impact and the owner when known.

## 3. Entities
List people (anyone mentioned), projects and products (including abbreviations), issues (ABC-123 keys),
companies, and technologies or systems.

## 4. Open Questions
Questions raised in the meeting that were not answered.

Return ONLY a JSON object with the keys "action_items", "decisions", "entities" and "open_questions".`;
}

export function buildConsolidationPrompt(
  result: ExtractionResult,
  ctx: MeetingContext,
  targetMax: number,
): string {
  const actions = result.actionItems.map((item) => ({
    task: item.description,
    assignee: item.assignee,
    context: item.context ?? '',
    mentioned_by: item.mentionedBy ?? null,
    due_date: item.dueDate ?? null,
    priority: item.priority,
    related_entities: item.relatedEntities,
  }));
  const decisions = result.decisions.map((d) => ({ decision: d.statement, rationale: d.rationale ?? '' }));
  const targetMin = Math.min(8, targetMax);

  return `You are reviewing action items extracted from a meeting to consolidate and refine them.

# Meeting: ${ctx.title}

# Extracted Action Items (Initial Pass)
${JSON.stringify(actions, null, 2)}

# Extracted Decisions (for context)
${JSON.stringify(decisions, null, 2)}

# Task
Return a refined list that:
1. Merges items that describe the same work
2. Drops items that only restate a decision, unless they are standalone work
3. Groups small related tasks into one logical work item
4. Keeps work items that are truly separate

**Guidelines**:
- Target: ${targetMin}-${targetMax} action items
- When merging, keep the highest priority and a concrete assignee
- Every person who owned an item before must still own at least one item
- Preserve context, due dates and related entities

Return ONLY a JSON array of action items with the same fields as the input.`;
}
