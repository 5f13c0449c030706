import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SyncUseCase } from '../../src/application/SyncUseCase.js';
import { NoteWriter } from '../../src/application/NoteWriter.js';
import { EnrichmentUseCase } from '../../src/application/EnrichmentUseCase.js';
import { ProseMirrorConverter } from '../../src/infrastructure/granola/ProseMirrorConverter.js';
import { MetadataExtractor } from '../../src/infrastructure/granola/MetadataExtractor.js';
import { FileSystemVaultAdapter } from '../../src/infrastructure/vault/FileSystemVaultAdapter.js';
import { MeetingNoteRenderer } from '../../src/infrastructure/vault/MeetingNoteRenderer.js';
import { MarkdownParser } from '../../src/infrastructure/vault/MarkdownParser.js';
import { NullLLMAdapter } from '../../src/infrastructure/llm/NullLLMAdapter.js';
import { InMemorySyncStateStore } from '../../src/infrastructure/state/InMemorySyncStateStore.js';
import { FileRunLock } from '../../src/infrastructure/state/FileRunLock.js';
import type { DocumentSourcePort } from '../../src/domain/ports/DocumentSourcePort.js';
import type { LLMPort, MeetingContext } from '../../src/domain/ports/LLMPort.js';
import type { SourceDocument } from '../../src/domain/entities/SourceDocument.js';
import type { ExtractionResult } from '../../src/domain/entities/Extraction.js';
import {
  ExtractionTimeoutError,
  FetchRejectedError,
  WriteIOError,
} from '../../src/domain/errors/DomainErrors.js';
import { Checkpoint } from '../../src/domain/value-objects/Checkpoint.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

/**
 * Feature: 同步流程
 *
 * 抓取 → 轉換 → 寫入 basic note → enrichment；
 * 單份文件失敗不影響其他文件，checkpoint 不越過失敗的文件。
 */

class FakeSource implements DocumentSourcePort {
  readonly listCalls: Date[] = [];

  constructor(private readonly docs: SourceDocument[]) {}

  async listSince(since: Date): Promise<SourceDocument[]> {
    this.listCalls.push(since);
    return this.docs.filter((d) => Date.parse(d.createdAt) >= since.getTime());
  }

  async getById(documentId: string): Promise<SourceDocument | undefined> {
    return this.docs.find((d) => d.id === documentId);
  }
}

/** 對標題含 failOn 的筆記寫入失敗 */
class FlakyVault extends FileSystemVaultAdapter {
  constructor(private readonly failOn: string) {
    super();
  }

  override async writeFileAtomic(filePath: string, content: string): Promise<void> {
    if (path.basename(filePath).includes(this.failOn)) {
      throw new WriteIOError('disk full', filePath);
    }
    return super.writeFileAtomic(filePath, content);
  }
}

class StubLLM implements LLMPort {
  readonly providerId = 'stub';
  readonly model = 'stub-model';
  readonly extract = vi.fn<(text: string, context: MeetingContext) => Promise<ExtractionResult>>();
  readonly consolidate = vi.fn<
    (result: ExtractionResult, context: MeetingContext, targetMax: number) => Promise<ExtractionResult>
  >();
}

function makeDoc(id: string, title: string, createdAt: string, extra: Partial<SourceDocument> = {}): SourceDocument {
  return {
    id,
    title,
    createdAt,
    validMeeting: true,
    attendees: [{ name: 'Alice' }],
    calendarAttendees: [],
    content: {
      type: 'doc',
      content: [{ type: 'paragraph', content: [{ type: 'text', text: `${title} notes` }] }],
    },
    ...extra,
  };
}

const DOCS = [
  makeDoc('doc-1', 'Standup', '2025-03-04T10:00:00Z'),
  makeDoc('doc-2', 'Planning', '2025-03-05T10:00:00Z'),
  makeDoc('doc-3', 'Retro', '2025-03-06T10:00:00Z'),
];

const NOW = new Date('2025-03-10T00:00:00Z');

describe('SyncUseCase', () => {
  const tmpDir = path.join(os.tmpdir(), 'mvsync-sync-' + Date.now());
  const notesDir = path.join(tmpDir, 'vault', 'Meetings');
  const lockPath = path.join(tmpDir, 'state', 'sync.lock');
  let state: InMemorySyncStateStore;

  function build(opts: { source: DocumentSourcePort; llm?: LLMPort; vault?: FileSystemVaultAdapter }): SyncUseCase {
    const writer = new NoteWriter(
      opts.vault ?? new FileSystemVaultAdapter(),
      new MeetingNoteRenderer(),
      new MarkdownParser(),
      path.join(tmpDir, 'vault'),
      notesDir,
    );
    return new SyncUseCase(
      opts.source,
      new ProseMirrorConverter(),
      new MetadataExtractor(),
      writer,
      new EnrichmentUseCase(opts.llm ?? new NullLLMAdapter(), { consolidationThreshold: 15 }),
      state,
      new FileRunLock(lockPath, 60 * 60 * 1000),
      { timezone: 'UTC', initialLookbackDays: 7 },
      () => NOW,
    );
  }

  function noteFiles(): string[] {
    return fs.existsSync(notesDir) ? fs.readdirSync(notesDir).sort() : [];
  }

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
    state = new InMemorySyncStateStore();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write basic notes and advance the checkpoint', async () => {
    const source = new FakeSource(DOCS);

    const report = await build({ source }).run({ target: { mode: 'incremental' } });

    expect(report.status).toBe('completed');
    expect(report.counts).toMatchObject({ fetched: 3, succeeded: 3, enriched: 0, skipped: 0, failed: 0 });
    expect(report.remaining).toBe(0);
    expect(report.checkpoint).toEqual({ createdAt: '2025-03-06T10:00:00Z', documentId: 'doc-3' });
    expect(source.listCalls[0].toISOString()).toBe('2025-03-03T00:00:00.000Z');
    expect(noteFiles()).toEqual([
      '2025-03-04 - Standup.md',
      '2025-03-05 - Planning.md',
      '2025-03-06 - Retro.md',
    ]);
    expect(state.runs).toHaveLength(1);
    expect(state.runs[0].status).toBe('completed');
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  /**
   * Scenario: 重複執行不產生副作用
   * Given 已同步過的三份文件
   * When 以 backfill 再同步一次
   * Then 三份都 skipped，vault 內容不變
   */
  it('should be idempotent', async () => {
    const source = new FakeSource(DOCS);
    await build({ source }).run({ target: { mode: 'incremental' } });
    const before = noteFiles().map((f) => fs.readFileSync(path.join(notesDir, f), 'utf-8'));

    const report = await build({ source }).run({ target: { mode: 'backfill', days: 30 } });

    expect(report.counts).toMatchObject({ fetched: 3, succeeded: 0, skipped: 3 });
    expect(report.documents.map((d) => d.reason)).toEqual(['already in vault', 'already in vault', 'already in vault']);
    expect(noteFiles().map((f) => fs.readFileSync(path.join(notesDir, f), 'utf-8'))).toEqual(before);
  });

  it('should only fetch documents after the checkpoint', async () => {
    state = new InMemorySyncStateStore(Checkpoint.at('2025-03-05T10:00:00Z', 'doc-2'));
    const source = new FakeSource(DOCS);

    const report = await build({ source }).run({ target: { mode: 'incremental' } });

    expect(source.listCalls[0].toISOString()).toBe('2025-03-05T10:00:00.000Z');
    expect(report.counts.fetched).toBe(1);
    expect(report.documents.map((d) => d.documentId)).toEqual(['doc-3']);
  });

  /**
   * Scenario: 單份文件失敗
   * Given 第二份文件寫入失敗
   * When 同步
   * Then 其他文件照常寫入，checkpoint 停在失敗之前，下一次執行補上失敗的文件
   */
  it('should isolate failures and hold the checkpoint before them', async () => {
    const source = new FakeSource(DOCS);

    const report = await build({ source, vault: new FlakyVault('Planning') }).run({ target: { mode: 'incremental' } });

    expect(report.counts).toMatchObject({ fetched: 3, succeeded: 2, failed: 1 });
    expect(report.errors).toEqual(['doc-2 [write]: disk full']);
    expect(report.documents[1]).toEqual({
      documentId: 'doc-2', title: 'Planning', status: 'failed', stage: 'write', error: 'disk full',
    });
    expect(state.loadCheckpoint()?.documentId).toBe('doc-1');
    expect(noteFiles()).toEqual(['2025-03-04 - Standup.md', '2025-03-06 - Retro.md']);

    const retry = await build({ source }).run({ target: { mode: 'incremental' } });

    expect(retry.documents.map((d) => [d.documentId, d.status])).toEqual([
      ['doc-2', 'written'],
      ['doc-3', 'skipped'],
    ]);
    expect(state.loadCheckpoint()?.documentId).toBe('doc-3');
  });

  it('should skip documents that are not meetings', async () => {
    const source = new FakeSource([makeDoc('doc-x', 'Scratch', '2025-03-04T10:00:00Z', { validMeeting: false })]);

    const report = await build({ source }).run({ target: { mode: 'incremental' } });

    expect(report.documents).toEqual([
      { documentId: 'doc-x', title: 'Scratch', status: 'skipped', reason: 'not a valid meeting' },
    ]);
    expect(noteFiles()).toEqual([]);
    expect(report.checkpoint?.documentId).toBe('doc-x');
  });

  it('should stop after maxIterations and report the remainder', async () => {
    const report = await build({ source: new FakeSource(DOCS) }).run({
      target: { mode: 'incremental' },
      maxIterations: 1,
    });

    expect(report.counts.succeeded).toBe(1);
    expect(report.remaining).toBe(2);
    expect(report.checkpoint?.documentId).toBe('doc-1');
  });

  it('should stop when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await build({ source: new FakeSource(DOCS) }).run({
      target: { mode: 'incremental' },
      signal: controller.signal,
    });

    expect(report.status).toBe('cancelled');
    expect(report.remaining).toBe(3);
    expect(noteFiles()).toEqual([]);
    expect(state.runs[0].status).toBe('cancelled');
  });

  it('should not run while another run holds the lock', async () => {
    const held = await new FileRunLock(lockPath, 60 * 60 * 1000).acquire();
    const source = new FakeSource(DOCS);

    const report = await build({ source }).run({ target: { mode: 'incremental' } });

    expect(report.status).toBe('locked');
    expect(source.listCalls).toEqual([]);
    expect(state.runs).toEqual([]);
    await held?.release();
  });

  it('should sync a single document by id', async () => {
    const report = await build({ source: new FakeSource(DOCS) }).run({
      target: { mode: 'document', documentId: 'doc-2' },
    });

    expect(report.mode).toBe('document');
    expect(noteFiles()).toEqual(['2025-03-05 - Planning.md']);
  });

  /**
   * Scenario: 單一文件同步不推進 checkpoint
   * Given incremental 只處理了 doc-1
   * When 以 --doc-id 同步較新的 doc-3，再執行 incremental
   * Then checkpoint 在單一文件同步後仍停在 doc-1，下一次 incremental 補上 doc-2
   */
  it('should not move the checkpoint when syncing a single document', async () => {
    const source = new FakeSource(DOCS);
    await build({ source }).run({ target: { mode: 'incremental' }, maxIterations: 1 });

    const single = await build({ source }).run({ target: { mode: 'document', documentId: 'doc-3' } });

    expect(single.checkpoint?.documentId).toBe('doc-1');
    expect(state.loadCheckpoint()?.documentId).toBe('doc-1');

    const next = await build({ source }).run({ target: { mode: 'incremental' } });

    expect(next.documents.map((d) => [d.documentId, d.status])).toEqual([
      ['doc-2', 'written'],
      ['doc-3', 'skipped'],
    ]);
    expect(noteFiles()).toEqual([
      '2025-03-04 - Standup.md',
      '2025-03-05 - Planning.md',
      '2025-03-06 - Retro.md',
    ]);
    expect(state.loadCheckpoint()?.documentId).toBe('doc-3');
  });

  it('should not move the checkpoint when the backfill window starts after it', async () => {
    state = new InMemorySyncStateStore(Checkpoint.at('2025-02-01T00:00:00Z', 'doc-0'));

    const source = new FakeSource(DOCS);

    const report = await build({ source }).run({ target: { mode: 'backfill', days: 6 } });

    expect(source.listCalls[0].toISOString()).toBe('2025-03-04T00:00:00.000Z');
    expect(report.counts.succeeded).toBe(3);
    expect(state.loadCheckpoint()?.documentId).toBe('doc-0');
  });

  it('should move the checkpoint when the backfill window covers it', async () => {
    state = new InMemorySyncStateStore(Checkpoint.at('2025-03-05T10:00:00Z', 'doc-2'));

    await build({ source: new FakeSource(DOCS) }).run({ target: { mode: 'backfill', days: 30 } });

    expect(state.loadCheckpoint()?.documentId).toBe('doc-3');
  });

  it('should abort the batch when the requested document does not exist', async () => {
    await expect(
      build({ source: new FakeSource(DOCS) }).run({ target: { mode: 'document', documentId: 'doc-9' } }),
    ).rejects.toBeInstanceOf(FetchRejectedError);

    expect(state.runs[0]).toMatchObject({ mode: 'document', status: 'aborted', errors: ['fetch: Document doc-9 not found'] });
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  describe('with enrichment', () => {
    let llm: StubLLM;

    beforeEach(() => {
      llm = new StubLLM();
    });

    it('should write enriched notes', async () => {
      llm.extract.mockResolvedValue({
        actionItems: [{ description: 'Send deck', assignee: 'Bob', priority: 'high', relatedEntities: [] }],
        decisions: [],
        entities: [],
        openQuestions: [],
        consolidated: false,
      });

      const report = await build({ source: new FakeSource(DOCS.slice(0, 1)), llm }).run({
        target: { mode: 'incremental' },
      });

      expect(report.counts).toMatchObject({ succeeded: 1, enriched: 1, enrichmentFailed: 0, consolidated: 0 });
      expect(report.documents[0].status).toBe('enriched');
      expect(llm.extract).toHaveBeenCalledWith('Standup notes', expect.objectContaining({ documentId: 'doc-1' }));
      const content = fs.readFileSync(path.join(notesDir, '2025-03-04 - Standup.md'), 'utf-8');
      expect(content).toContain('llm_model: "stub-model"');
      expect(content).toContain('### @Bob\n\n- [ ] Send deck ⏫');
    });

    /**
     * Scenario: enrichment 失敗
     * Given LLM 逾時
     * When 同步
     * Then basic note 保留，計入 enrichmentFailed，checkpoint 照常前進
     */
    it('should keep the basic note when enrichment fails', async () => {
      llm.extract.mockRejectedValue(new ExtractionTimeoutError('LLM request timed out after 1000ms'));

      const report = await build({ source: new FakeSource(DOCS.slice(0, 1)), llm }).run({
        target: { mode: 'incremental' },
      });

      expect(report.counts).toMatchObject({ succeeded: 1, enriched: 0, enrichmentFailed: 1, failed: 0 });
      expect(report.errors).toEqual(['doc-1 [extract]: LLM request timed out after 1000ms']);
      expect(report.documents[0]).toMatchObject({ status: 'written', stage: 'extract' });
      expect(report.checkpoint?.documentId).toBe('doc-1');
      const content = fs.readFileSync(path.join(notesDir, '2025-03-04 - Standup.md'), 'utf-8');
      expect(content).toContain('status: "auto-generated"');
    });

    it('should not call the LLM when enrichment is turned off for the run', async () => {
      const report = await build({ source: new FakeSource(DOCS), llm }).run({
        target: { mode: 'incremental' },
        enrich: false,
      });

      expect(report.counts.succeeded).toBe(3);
      expect(llm.extract).not.toHaveBeenCalled();
    });
  });
});
