import { describe, it, expect } from 'vitest';
import { MeetingNoteRenderer } from '../../../src/infrastructure/vault/MeetingNoteRenderer.js';
import { MarkdownParser } from '../../../src/infrastructure/vault/MarkdownParser.js';
import type { MeetingMetadata, MeetingNote } from '../../../src/domain/entities/MeetingNote.js';
import type { ExtractionResult } from '../../../src/domain/entities/Extraction.js';

const meta: MeetingMetadata = {
  documentId: 'doc-12345678abc',
  title: 'Weekly Sync',
  date: '2025-03-04',
  time: '14:30',
  displayDate: 'Tuesday, March 04, 2025 at 02:30 PM',
  createdAt: '2025-03-04T14:30:00Z',
  attendees: ['Alice Smith', 'Bob'],
  owner: 'Alice Smith',
  durationMinutes: 30,
};

const extraction: ExtractionResult = {
  actionItems: [
    {
      description: 'Send deck',
      assignee: 'Bob',
      priority: 'high',
      dueDate: '2025-03-10',
      context: 'for the board',
      mentionedBy: 'Alice Smith',
      relatedEntities: ['Atlas'],
    },
    { description: 'Review budget', assignee: 'Alice Smith', priority: 'low', relatedEntities: [] },
    { description: 'Book room', assignee: 'Bob', priority: 'medium', relatedEntities: [] },
  ],
  decisions: [{ statement: 'Use Vitest', rationale: 'fast', alternatives: ['Jest', 'Mocha'], owner: 'Bob' }],
  entities: [
    { name: 'Atlas', category: 'project', displayName: 'Atlas' },
    { name: 'Bob', category: 'person', displayName: 'Bob' },
  ],
  openQuestions: ['Budget?'],
  consolidated: false,
};

describe('MeetingNoteRenderer', () => {
  const renderer = new MeetingNoteRenderer();

  it('should render a basic note', () => {
    const note: MeetingNote = { metadata: meta, markdown: 'Discussed the roadmap.' };

    expect(renderer.render(note)).toBe([
      '---',
      'date: "2025-03-04"',
      'time: "14:30"',
      'meeting: "Weekly Sync"',
      'source: "granola-api"',
      'granola_id: "doc-12345678abc"',
      'type: "meeting-note"',
      'status: "auto-generated"',
      'attendees:',
      '  - "[[Alice Smith]]"',
      '  - "[[Bob]]"',
      'duration: "30 min"',
      '---',
      '',
      '# Weekly Sync',
      '',
      '**Tuesday, March 04, 2025 at 02:30 PM** · 30 minutes',
      '**Attendees**: [[Alice Smith]], [[Bob]]',
      '',
      '## Notes',
      '',
      'Discussed the roadmap.',
      '',
      '---',
      '',
      '**Source**: Granola API',
      '**Granola ID**: `doc-12345678abc`',
      '',
    ].join('\n'));
  });

  /**
   * Scenario: enriched 筆記
   * Given 含 action items / decisions / entities / open questions 的抽取結果
   * When render
   * Then action items 依負責人分組，各區塊依固定順序輸出
   */
  it('should render enrichment sections', () => {
    const output = renderer.render({
      metadata: meta,
      markdown: '',
      enrichment: { extraction, model: 'test-model' },
    });

    expect(output).toContain('status: "enriched"');
    expect(output).toContain('llm_enriched: true\nllm_model: "test-model"\nconsolidated: false\n---');
    expect(output).toContain([
      '## Action Items',
      '',
      '### @Bob',
      '',
      '- [ ] Send deck ⏫ 📅 2025-03-10',
      '  - Context: for the board',
      '  - Mentioned by: [[Alice Smith]]',
      '  - Related: [[Atlas]]',
      '- [ ] Book room 🔼',
      '',
      '### @Alice Smith',
      '',
      '- [ ] Review budget 🔽',
      '',
      '## Decisions',
      '',
      '### Use Vitest',
      '',
      '- **Rationale**: fast',
      '- **Alternatives**: Jest, Mocha',
      '- **Owner**: [[Bob]]',
      '',
      '## Entities Referenced',
      '',
      '**People**: [[Bob]]',
      '**Projects**: [[Atlas]]',
      '',
      '## Open Questions',
      '',
      '- Budget?',
      '',
      '## Notes',
      '',
      '_No notes captured._',
    ].join('\n'));
  });

  it('should say so when no action items were found', () => {
    const output = renderer.render({
      metadata: { ...meta, attendees: [], durationMinutes: undefined },
      markdown: 'x',
      enrichment: {
        extraction: { actionItems: [], decisions: [], entities: [], openQuestions: [], consolidated: false },
        model: 'test-model',
      },
    });

    expect(output).toContain('attendees: []');
    expect(output).toContain('# Weekly Sync\n\n**Tuesday, March 04, 2025 at 02:30 PM**\n\n## Action Items\n\n_No action items identified._\n\n## Notes');
  });

  /**
   * Scenario: 含換行的標題與 LLM 文字
   * Given 標題、action item 與 open question 內含換行
   * When 渲染
   * Then 每一項仍是單獨一行，不會破壞標題或 checkbox
   */
  it('should keep headings and list items on one line', () => {
    const lines = renderer.render({
      metadata: { ...meta, title: 'Weekly\nSync' },
      markdown: 'x',
      enrichment: {
        extraction: {
          actionItems: [{ description: 'Send\n  the deck', assignee: 'Bob', priority: 'low', relatedEntities: [] }],
          decisions: [],
          entities: [],
          openQuestions: ['Budget\nfor Q2?'],
          consolidated: false,
        },
        model: 'test-model',
      },
    }).split('\n');

    expect(lines).toContain('# Weekly Sync');
    expect(lines).toContain('- [ ] Send the deck 🔽');
    expect(lines).toContain('- Budget for Q2?');
  });

  it('should produce frontmatter that parses back', () => {
    const output = renderer.render({
      metadata: { ...meta, title: 'Q1: "Plan" review', summary: 'Line one' },
      markdown: 'x',
    });

    const { frontmatter } = new MarkdownParser().parse(output);

    expect(frontmatter.granola_id).toBe('doc-12345678abc');
    expect(frontmatter.meeting).toBe('Q1: "Plan" review');
    expect(frontmatter.attendees).toEqual(['[[Alice Smith]]', '[[Bob]]']);
    expect(frontmatter.summary).toBe('Line one');
  });
});
