import type { MeetingNote, MeetingMetadata } from '../../domain/entities/MeetingNote.js';
import type {
  ActionItem,
  Decision,
  Entity,
  EntityCategory,
  ExtractionResult,
  Priority,
} from '../../domain/entities/Extraction.js';
import { toWikilink } from '../../domain/value-objects/PersonName.js';

export const NOTE_SOURCE = 'granola-api';
export const NOTE_TYPE = 'meeting-note';

const PRIORITY_EMOJI: Record<Priority, string> = {
  high: '⏫',
  medium: '🔼',
  low: '🔽',
};

const DUE_EMOJI = '📅';

const ENTITY_HEADINGS: Array<[EntityCategory, string]> = [
  ['person', 'People'],
  ['project', 'Projects'],
  ['company', 'Companies'],
  ['system', 'Systems'],
];

/** 壓成單行：換行會破壞標題、checkbox 與清單項目 */
export function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

type FrontmatterValue = string | number | boolean | string[];

/** YAML scalar：字串一律用雙引號（JSON 字串也是合法的 YAML 雙引號字串） */
function yamlScalar(value: string | number | boolean): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

function renderFrontmatter(fields: Array<[string, FrontmatterValue | undefined]>): string {
  const lines = ['---'];
  for (const [key, value] of fields) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      if (value.length === 0) {
        lines.push(`${key}: []`);
      } else {
        lines.push(`${key}:`);
        for (const v of value) lines.push(`  - ${yamlScalar(v)}`);
      }
    } else {
      lines.push(`${key}: ${yamlScalar(value)}`);
    }
  }
  lines.push('---');
  return lines.join('\n');
}

function renderHeader(meta: MeetingMetadata): string {
  const lines: string[] = [];
  const duration = meta.durationMinutes !== undefined ? ` · ${meta.durationMinutes} minutes` : '';
  lines.push(`**${meta.displayDate}**${duration}`);
  if (meta.attendees.length > 0) {
    lines.push(`**Attendees**: ${meta.attendees.map(toWikilink).join(', ')}`);
  }
  if (meta.recordingUrl) lines.push(`**Recording**: [Listen](${meta.recordingUrl})`);
  if (meta.meetingLink) lines.push(`**Meeting Link**: [Join](${meta.meetingLink})`);
  return lines.join('\n');
}

function renderActionItem(item: ActionItem): string {
  let line = `- [ ] ${oneLine(item.description)} ${PRIORITY_EMOJI[item.priority]}`;
  if (item.dueDate) line += ` ${DUE_EMOJI} ${item.dueDate}`;

  const lines = [line];
  if (item.context) lines.push(`  - Context: ${oneLine(item.context)}`);
  if (item.mentionedBy) lines.push(`  - Mentioned by: ${toWikilink(item.mentionedBy)}`);
  if (item.relatedEntities.length > 0) {
    lines.push(`  - Related: ${item.relatedEntities.map(toWikilink).join(', ')}`);
  }
  return lines.join('\n');
}

/** 依負責人分組，組別順序為負責人首次出現的順序 */
function renderActionItems(items: ActionItem[]): string {
  if (items.length === 0) {
    return '## Action Items\n\n_No action items identified._';
  }

  const groups = new Map<string, ActionItem[]>();
  for (const item of items) {
    const group = groups.get(item.assignee);
    if (group) group.push(item);
    else groups.set(item.assignee, [item]);
  }

  const blocks = ['## Action Items'];
  for (const [assignee, group] of groups) {
    blocks.push(`### @${assignee}`, group.map(renderActionItem).join('\n'));
  }
  return blocks.join('\n\n');
}

function renderDecision(d: Decision): string {
  const lines = [`### ${oneLine(d.statement)}`];
  const details: string[] = [];
  if (d.rationale) details.push(`- **Rationale**: ${oneLine(d.rationale)}`);
  if (d.alternatives.length > 0) details.push(`- **Alternatives**: ${d.alternatives.join(', ')}`);
  if (d.impact) details.push(`- **Impact**: ${oneLine(d.impact)}`);
  if (d.owner) details.push(`- **Owner**: ${toWikilink(d.owner)}`);
  if (details.length > 0) lines.push('', ...details);
  return lines.join('\n');
}

function renderEntities(entities: Entity[]): string {
  const lines: string[] = [];
  for (const [category, heading] of ENTITY_HEADINGS) {
    const names = entities.filter((e) => e.category === category).map((e) => toWikilink(e.displayName));
    if (names.length > 0) lines.push(`**${heading}**: ${names.join(', ')}`);
  }
  return `## Entities Referenced\n\n${lines.join('\n')}`;
}

function renderEnrichment(extraction: ExtractionResult): string[] {
  const sections = [renderActionItems(extraction.actionItems)];
  if (extraction.decisions.length > 0) {
    sections.push(['## Decisions', ...extraction.decisions.map(renderDecision)].join('\n\n'));
  }
  if (extraction.entities.length > 0) {
    sections.push(renderEntities(extraction.entities));
  }
  if (extraction.openQuestions.length > 0) {
    sections.push(`## Open Questions\n\n${extraction.openQuestions.map((q) => `- ${oneLine(q)}`).join('\n')}`);
  }
  return sections;
}

/**
 * 會議筆記渲染器
 *
 * 輸出固定格式的 Markdown：frontmatter（含 granola_id 去重 key）、標題與 header、
 * enriched 筆記的 Action Items / Decisions / Entities / Open Questions、
 * Notes 區塊與 footer。相同輸入一定產生相同輸出。
 */
export class MeetingNoteRenderer {
  render(note: MeetingNote): string {
    const meta = note.metadata;
    const enrichment = note.enrichment;

    const frontmatter = renderFrontmatter([
      ['date', meta.date],
      ['time', meta.time],
      ['meeting', meta.title],
      ['source', NOTE_SOURCE],
      ['granola_id', meta.documentId],
      ['type', NOTE_TYPE],
      ['status', enrichment ? 'enriched' : 'auto-generated'],
      ['attendees', meta.attendees.map(toWikilink)],
      ['duration', meta.durationMinutes !== undefined ? `${meta.durationMinutes} min` : undefined],
      ['calendar_event_id', meta.calendarEventId],
      ['summary', meta.summary],
      ['llm_enriched', enrichment ? true : undefined],
      ['llm_model', enrichment?.model],
      ['consolidated', enrichment?.extraction.consolidated],
    ]);

    const sections = [
      frontmatter,
      `# ${oneLine(meta.title)}`,
      renderHeader(meta),
      ...(enrichment ? renderEnrichment(enrichment.extraction) : []),
      `## Notes\n\n${note.markdown.trim() || '_No notes captured._'}`,
      `---\n\n**Source**: Granola API\n**Granola ID**: \`${meta.documentId}\``,
    ];

    return sections.join('\n\n') + '\n';
  }
}
