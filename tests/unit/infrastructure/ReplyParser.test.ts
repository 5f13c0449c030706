import { describe, it, expect } from 'vitest';
import {
  ReplyParser,
  extractJsonCandidates,
  repairTruncatedJson,
  stripCodeFences,
} from '../../../src/infrastructure/llm/ReplyParser.js';
import { MalformedReplyError } from '../../../src/domain/errors/DomainErrors.js';

/**
 * Feature: LLM 回覆解析
 *
 * 模型的回覆不一定是乾淨的 JSON，解析器要能從 fence、說明文字、
 * 被截斷的輸出中找出可用的結構，並丟棄個別不合法的項目。
 */
describe('ReplyParser', () => {
  const parser = new ReplyParser();

  describe('candidates', () => {
    it('should strip code fences', () => {
      expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
      expect(stripCodeFences('```\n[1]\n```')).toBe('[1]');
    });

    it('should list balanced blocks after the full text', () => {
      expect(extractJsonCandidates('Result: {"a":1} and [2]')).toEqual([
        'Result: {"a":1} and [2]',
        '{"a":1}',
        '[2]',
      ]);
    });

    it('should repair truncated JSON at the last complete element', () => {
      const truncated = '{"action_items":[{"task":"A","assignee":"X"},{"task":"B","assig';
      expect(repairTruncatedJson(truncated)).toBe('{"action_items":[{"task":"A","assignee":"X"}]}');
    });

    it('should not repair balanced JSON', () => {
      expect(repairTruncatedJson('{"a":1}')).toBeUndefined();
      expect(repairTruncatedJson('no json here')).toBeUndefined();
    });
  });

  describe('parseExtraction', () => {
    /**
     * Scenario: fence 包裹並夾雜說明文字
     * Given 回覆 = 說明文字 + ```json fence
     * When parseExtraction
     * Then 取出物件，priority 正規化為小寫，人名 entity 轉成顯示名稱
     */
    it('should parse a fenced reply with surrounding prose', () => {
      const reply = [
        'Here is the extraction:',
        '```json',
        JSON.stringify({
          action_items: [{ task: 'Send deck', assignee: 'Bob', priority: 'HIGH', due_date: '2025-03-10' }],
          decisions: [],
          entities: { people: ['bob.jones@example.com'], projects: ['Atlas'] },
          open_questions: ['When do we launch?'],
        }),
        '```',
      ].join('\n');

      const result = parser.parseExtraction(reply);

      expect(result.actionItems).toEqual([{
        description: 'Send deck',
        assignee: 'Bob',
        priority: 'high',
        dueDate: '2025-03-10',
        relatedEntities: [],
      }]);
      expect(result.entities).toEqual([
        { name: 'bob.jones@example.com', category: 'person', displayName: 'Bob Jones' },
        { name: 'Atlas', category: 'project', displayName: 'Atlas' },
      ]);
      expect(result.openQuestions).toEqual(['When do we launch?']);
      expect(result.consolidated).toBe(false);
    });

    it('should recover items from a truncated reply', () => {
      const reply = '{"action_items":[{"task":"A","assignee":"X"},{"task":"B","assig';

      const result = parser.parseExtraction(reply);

      expect(result.actionItems.map((i) => i.description)).toEqual(['A']);
      expect(result.decisions).toEqual([]);
    });

    it('should drop invalid items and default bad fields', () => {
      const reply = JSON.stringify({
        action_items: [
          { assignee: 'X' },
          'not an object',
          { description: 'Valid', priority: 'urgent', due_date: 'next week', related_entities: ['Atlas', 3, ''] },
        ],
      });

      const result = parser.parseExtraction(reply);

      expect(result.actionItems).toEqual([{
        description: 'Valid',
        assignee: '',
        priority: 'medium',
        relatedEntities: ['Atlas'],
      }]);
    });

    it('should accept both decision field spellings', () => {
      const reply = JSON.stringify({
        decisions: [
          { decision: 'Use Vitest', rationale: 'fast', alternatives_considered: ['Jest'] },
          { statement: 'Ship Friday', alternatives: ['Monday'], owner: 'Alice' },
          { rationale: 'no statement' },
        ],
      });

      const result = parser.parseExtraction(reply);

      expect(result.decisions).toEqual([
        { statement: 'Use Vitest', rationale: 'fast', alternatives: ['Jest'] },
        { statement: 'Ship Friday', alternatives: ['Monday'], owner: 'Alice' },
      ]);
    });

    it('should accept entities as a list with categories', () => {
      const reply = JSON.stringify({
        entities: [
          { name: 'Atlas', category: 'Project' },
          { name: 'Postgres', type: 'technology' },
          { name: 'Acme', category: 'organization' },
          { name: 'Mystery' },
          { name: '' },
        ],
      });

      const result = parser.parseExtraction(reply);

      expect(result.entities.map((e) => [e.name, e.category])).toEqual([
        ['Atlas', 'project'],
        ['Postgres', 'system'],
        ['Acme', 'company'],
        ['Mystery', 'project'],
      ]);
    });

    it('should throw MalformedReplyError when no object is usable', () => {
      expect(() => parser.parseExtraction('I could not find anything.')).toThrow(MalformedReplyError);
      expect(() => parser.parseExtraction('{"foo": 1}')).toThrow('LLM reply contains no usable extraction object');
    });
  });

  describe('parseActionItems', () => {
    it('should accept a bare array or an action_items object', () => {
      expect(parser.parseActionItems('[{"task":"A","assignee":"X"}]')).toHaveLength(1);
      expect(parser.parseActionItems('Merged:\n{"action_items":[{"task":"A"},{"task":"B"}]}')).toHaveLength(2);
    });

    it('should throw MalformedReplyError without a list', () => {
      expect(() => parser.parseActionItems('nothing to merge')).toThrow('LLM reply contains no action item list');
    });
  });
});
