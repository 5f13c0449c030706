import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HttpLLMAdapter, type HttpLLMConfig } from '../../../src/infrastructure/llm/HttpLLMAdapter.js';
import type { ExtractionResult } from '../../../src/domain/entities/Extraction.js';
import {
  ExtractionTimeoutError,
  LLMAuthorizationError,
  MalformedReplyError,
} from '../../../src/domain/errors/DomainErrors.js';

/**
 * Feature: HTTP LLM Adapter（OpenAI-compatible）
 *
 * 作為 enrichment 管線，我需要透過 chat completions API
 * 執行 stage 1 抽取與 stage 2 合併。
 */

const mocks = vi.hoisted(() => {
  class APIError extends Error {
    constructor(readonly status: number | undefined, message: string) {
      super(message);
    }
  }
  class APIConnectionError extends APIError {
    constructor(message = 'Connection error.') {
      super(undefined, message);
    }
  }
  class APIConnectionTimeoutError extends APIConnectionError {
    constructor() {
      super('Request timed out.');
    }
  }
  return { create: vi.fn(), APIError, APIConnectionError, APIConnectionTimeoutError };
});

// Mock OpenAI SDK
vi.mock('openai', () => ({
  default: class MockOpenAI {
    chat = { completions: { create: mocks.create } };
  },
  APIError: mocks.APIError,
  APIConnectionError: mocks.APIConnectionError,
  APIConnectionTimeoutError: mocks.APIConnectionTimeoutError,
}));

const context = { documentId: 'doc-1', title: 'Weekly Sync', date: '2025-03-04', attendees: ['Alice'] };

function reply(content: string) {
  return { choices: [{ message: { content } }] };
}

function makeConfig(overrides: Partial<HttpLLMConfig> = {}): HttpLLMConfig {
  return {
    baseUrl: 'http://localhost:8080/v1',
    apiKey: 'test-secret',
    model: 'test-model',
    timeoutMs: 1000,
    temperature: 0,
    maxTokens: 2000,
    structuredOutput: true,
    retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 },
    ...overrides,
  };
}

describe('HttpLLMAdapter', () => {
  let adapter: HttpLLMAdapter;

  beforeEach(() => {
    mocks.create.mockReset();
    adapter = new HttpLLMAdapter(makeConfig());
  });

  /**
   * Scenario: 成功的 stage 1 抽取
   * Given LLM 回傳符合格式的 JSON
   * When 呼叫 extract
   * Then 回傳解析後的結果，並以 json_schema 要求結構化輸出
   */
  it('should extract with a structured output request', async () => {
    mocks.create.mockResolvedValue(reply(JSON.stringify({
      action_items: [{ task: 'Send deck', assignee: 'Bob', priority: 'high' }],
      decisions: [{ decision: 'Use Vitest' }],
      entities: { people: ['Bob'] },
      open_questions: [],
    })));

    const result = await adapter.extract('## Notes', context);

    expect(result.actionItems).toHaveLength(1);
    expect(result.decisions[0].statement).toBe('Use Vitest');
    expect(mocks.create).toHaveBeenCalledTimes(1);
    expect(mocks.create).toHaveBeenCalledWith(expect.objectContaining({
      model: 'test-model',
      temperature: 0,
      max_tokens: 2000,
      response_format: expect.objectContaining({
        type: 'json_schema',
        json_schema: expect.objectContaining({ name: 'meeting_extraction' }),
      }),
    }));
    expect(adapter.model).toBe('test-model');
  });

  it('should omit response_format when structured output is off', async () => {
    adapter = new HttpLLMAdapter(makeConfig({ structuredOutput: false }));
    mocks.create.mockResolvedValue(reply('{"action_items": []}'));

    await adapter.extract('## Notes', context);

    expect(mocks.create.mock.calls[0][0]).not.toHaveProperty('response_format');
  });

  it('should consolidate into the returned action items', async () => {
    const input: ExtractionResult = {
      actionItems: [
        { description: 'Send deck', assignee: 'Bob', priority: 'high', relatedEntities: [] },
        { description: 'Send the deck', assignee: 'Bob', priority: 'low', relatedEntities: [] },
      ],
      decisions: [],
      entities: [],
      openQuestions: ['Budget?'],
      consolidated: false,
    };
    mocks.create.mockResolvedValue(reply('[{"task":"Send deck","assignee":"Bob","priority":"high"}]'));

    const result = await adapter.consolidate(input, context, 15);

    expect(result.actionItems.map((i) => i.description)).toEqual(['Send deck']);
    expect(result.openQuestions).toEqual(['Budget?']);
    expect(result.consolidated).toBe(true);
    expect(mocks.create.mock.calls[0][0]).not.toHaveProperty('response_format');
  });

  it('should retry transient API errors', async () => {
    mocks.create
      .mockRejectedValueOnce(new mocks.APIError(503, 'unavailable'))
      .mockRejectedValueOnce(new mocks.APIConnectionError())
      .mockResolvedValueOnce(reply('{"action_items": []}'));

    const result = await adapter.extract('## Notes', context);

    expect(result.actionItems).toEqual([]);
    expect(mocks.create).toHaveBeenCalledTimes(3);
  });

  /**
   * Scenario: 逾時
   * Given 每次請求都逾時
   * When 呼叫 extract
   * Then 重試用盡後拋出 ExtractionTimeoutError
   */
  it('should map timeouts to ExtractionTimeoutError after retries', async () => {
    mocks.create.mockRejectedValue(new mocks.APIConnectionTimeoutError());

    await expect(adapter.extract('## Notes', context)).rejects.toBeInstanceOf(ExtractionTimeoutError);
    expect(mocks.create).toHaveBeenCalledTimes(3);
  });

  it('should not retry rejected credentials', async () => {
    mocks.create.mockRejectedValue(new mocks.APIError(401, 'unauthorized'));

    await expect(adapter.extract('## Notes', context)).rejects.toThrow(
      new LLMAuthorizationError('LLM endpoint rejected credentials (HTTP 401)'),
    );
    expect(mocks.create).toHaveBeenCalledTimes(1);
  });

  it('should raise MalformedReplyError for unusable replies without retrying', async () => {
    mocks.create.mockResolvedValue(reply('Sorry, I cannot help with that.'));

    await expect(adapter.extract('## Notes', context)).rejects.toBeInstanceOf(MalformedReplyError);
    expect(mocks.create).toHaveBeenCalledTimes(1);
  });
});
