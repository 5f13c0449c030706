import type { DocumentSourcePort } from '../domain/ports/DocumentSourcePort.js';
import type { SyncStatePort } from '../domain/ports/SyncStatePort.js';
import type { RunLockPort } from '../domain/ports/RunLockPort.js';
import type { SourceDocument } from '../domain/entities/SourceDocument.js';
import type { MeetingNote } from '../domain/entities/MeetingNote.js';
import {
  emptyCounts,
  type SyncCounts,
  type SyncMode,
  type SyncRunStatus,
} from '../domain/entities/SyncRun.js';
import {
  FetchRejectedError,
  UnsupportedNodeError,
  type PipelineStage,
} from '../domain/errors/DomainErrors.js';
import { Checkpoint } from '../domain/value-objects/Checkpoint.js';
import type { ProseMirrorConverter } from '../infrastructure/granola/ProseMirrorConverter.js';
import type { MetadataExtractor } from '../infrastructure/granola/MetadataExtractor.js';
import type { NoteWriter } from './NoteWriter.js';
import type { EnrichmentUseCase } from './EnrichmentUseCase.js';
import type { SyncRequest, SyncTarget } from './dto/SyncRequest.js';
import type { DocumentOutcome, SyncReport } from './dto/SyncReport.js';
import { Logger, errorFields } from '../shared/Logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SyncSettings {
  timezone: string;
  /** 沒有 checkpoint 時往回抓的天數 */
  initialLookbackDays: number;
}

interface BatchState {
  counts: SyncCounts;
  errors: string[];
  documents: DocumentOutcome[];
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * 同步用例（Orchestrator）
 *
 * 每份文件：Fetched → Converted → BasicWritten → 抽取 → EnrichedWritten（或保留 basic）→ Done；
 * 去重命中或非會議文件 → Skipped；任何階段拋錯 → Failed，不影響批次中其他文件。
 *
 * checkpoint 只在文件 Done 之後前進；批次中第一份 Failed 之後就不再前進，
 * 讓失敗的文件下次重新抓取（去重讓重抓無副作用）。
 * 單一文件與未涵蓋 checkpoint 的 backfill 不推進 checkpoint，避免跳過從未同步的文件。
 */
export class SyncUseCase {
  private readonly logger = new Logger('SyncUseCase');

  constructor(
    private readonly source: DocumentSourcePort,
    private readonly converter: ProseMirrorConverter,
    private readonly metadataExtractor: MetadataExtractor,
    private readonly writer: NoteWriter,
    private readonly enrichment: EnrichmentUseCase,
    private readonly state: SyncStatePort,
    private readonly lock: RunLockPort,
    private readonly settings: SyncSettings,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async run(request: SyncRequest): Promise<SyncReport> {
    const startedAt = this.now();
    const mode = request.target.mode;

    const handle = await this.lock.acquire();
    if (!handle) {
      this.logger.warn('Another sync is running; skipping this run', { mode });
      return this.buildReport(mode, 'locked', startedAt, { counts: emptyCounts(), errors: [], documents: [] }, 0);
    }

    try {
      return await this.runLocked(request, startedAt);
    } finally {
      await handle.release();
    }
  }

  private async runLocked(request: SyncRequest, startedAt: Date): Promise<SyncReport> {
    const mode = request.target.mode;
    const batch: BatchState = { counts: emptyCounts(), errors: [], documents: [] };
    const enrich = (request.enrich ?? true) && this.enrichment.enabled;

    let checkpoint = this.state.loadCheckpoint();

    let docs: SourceDocument[];
    try {
      docs = await this.fetchBatch(request.target, checkpoint);
    } catch (err) {
      batch.errors.push(`fetch: ${messageOf(err)}`);
      this.logger.error('Cannot fetch document list', { mode, stage: 'fetch', ...errorFields(err) });
      this.state.recordRun({
        mode,
        startedAt: startedAt.toISOString(),
        finishedAt: this.now().toISOString(),
        status: 'aborted',
        counts: batch.counts,
        errors: batch.errors,
      });
      throw err;
    }

    batch.counts.fetched = docs.length;
    const limit = request.maxIterations ?? docs.length;
    this.logger.info('Sync started', { mode, fetched: docs.length, limit, enrich, checkpoint: checkpoint?.toJSON() });

    let status: SyncRunStatus = 'completed';
    let advancing = this.coversCheckpoint(request.target, checkpoint);
    if (!advancing) {
      this.logger.debug('Batch does not cover the checkpoint; leaving it unchanged', { mode });
    }
    let processed = 0;

    for (const doc of docs) {
      if (processed >= limit) break;
      if (request.signal?.aborted) {
        status = 'cancelled';
        this.logger.warn('Sync cancelled; stopping before next document', { documentId: doc.id });
        break;
      }

      const outcome = await this.processDocument(doc, enrich, batch);
      processed++;

      if (outcome.status === 'failed') {
        advancing = false;
      } else if (advancing) {
        const next = checkpoint
          ? checkpoint.advance(doc.createdAt, doc.id)
          : Checkpoint.at(doc.createdAt, doc.id);
        if (!checkpoint || !next.equals(checkpoint)) {
          this.state.saveCheckpoint(next);
          checkpoint = next;
        }
      }
    }

    const report = this.buildReport(mode, status, startedAt, batch, docs.length - processed, checkpoint);
    this.state.recordRun({
      mode,
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
      status,
      counts: batch.counts,
      errors: batch.errors,
    });

    this.logger.info('Sync finished', { mode, status, ...batch.counts, remaining: report.remaining });
    return report;
  }

  /**
   * 只有涵蓋 checkpoint 之後全部文件的批次才能推進 checkpoint：
   * incremental 一律可以；backfill 只在視窗起點不晚於 checkpoint 時；單一文件模式永不推進。
   */
  private coversCheckpoint(target: SyncTarget, checkpoint: Checkpoint | undefined): boolean {
    switch (target.mode) {
      case 'incremental':
        return true;
      case 'backfill':
        return checkpoint !== undefined && this.backfillStart(target.days).getTime() <= checkpoint.timeMs;
      case 'document':
        return false;
    }
  }

  private backfillStart(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS);
  }

  private async fetchBatch(target: SyncTarget, checkpoint: Checkpoint | undefined): Promise<SourceDocument[]> {
    switch (target.mode) {
      case 'document': {
        const doc = await this.source.getById(target.documentId);
        if (!doc) {
          throw new FetchRejectedError(`Document ${target.documentId} not found`, undefined, {
            documentId: target.documentId,
          });
        }
        return [doc];
      }
      case 'backfill':
        return this.source.listSince(this.backfillStart(target.days));
      case 'incremental': {
        if (!checkpoint) {
          return this.source.listSince(
            new Date(this.now().getTime() - this.settings.initialLookbackDays * DAY_MS),
          );
        }
        const since = checkpoint;
        const docs = await this.source.listSince(new Date(since.timeMs));
        // 已在 checkpoint 之前（含）完成的文件不再處理
        return docs.filter((d) => Checkpoint.at(d.createdAt, d.id).compareTo(since) > 0);
      }
    }
  }

  /** 處理單份文件；所有錯誤都在這裡攔下並計數 */
  private async processDocument(
    doc: SourceDocument,
    enrich: boolean,
    batch: BatchState,
  ): Promise<DocumentOutcome> {
    const log = this.logger.child({ documentId: doc.id });
    const title = doc.title ?? '';
    const record = (outcome: DocumentOutcome): DocumentOutcome => {
      batch.documents.push(outcome);
      return outcome;
    };

    if (!doc.validMeeting) {
      batch.counts.skipped++;
      log.info('Skipping document not marked as a meeting');
      return record({ documentId: doc.id, title, status: 'skipped', reason: 'not a valid meeting' });
    }

    let stage: PipelineStage = 'convert';
    try {
      const conversion = this.converter.convert(doc.content);
      for (const nodeType of conversion.unsupported) {
        log.warn('Degraded content node', errorFields(new UnsupportedNodeError(nodeType, { documentId: doc.id })));
      }
      const metadata = this.metadataExtractor.extract(doc, this.settings.timezone);
      const note: MeetingNote = { metadata, markdown: conversion.markdown };
      const unsupportedNodes = conversion.unsupported.length > 0 ? conversion.unsupported : undefined;

      stage = 'write';
      const written = await this.writer.writeBasic(note);
      if (written.status === 'skipped') {
        batch.counts.skipped++;
        return record({
          documentId: doc.id, title: metadata.title, status: 'skipped', path: written.path, reason: 'already in vault',
        });
      }
      batch.counts.succeeded++;

      if (!enrich || !conversion.markdown) {
        return record({
          documentId: doc.id, title: metadata.title, status: 'written', path: written.path, unsupportedNodes,
        });
      }

      stage = 'extract';
      try {
        const extraction = await this.enrichment.enrich(conversion.markdown, metadata);
        stage = 'write';
        await this.writer.writeEnriched(written.path, {
          ...note,
          enrichment: { extraction, model: this.enrichment.model },
        });
        batch.counts.enriched++;
        if (extraction.consolidated) batch.counts.consolidated++;
        return record({
          documentId: doc.id, title: metadata.title, status: 'enriched', path: written.path, unsupportedNodes,
        });
      } catch (err) {
        batch.counts.enrichmentFailed++;
        batch.errors.push(`${doc.id} [${stage}]: ${messageOf(err)}`);
        log.warn('Enrichment failed; basic note retained', { stage, ...errorFields(err) });
        return record({
          documentId: doc.id,
          title: metadata.title,
          status: 'written',
          path: written.path,
          stage,
          error: messageOf(err),
          unsupportedNodes,
        });
      }
    } catch (err) {
      batch.counts.failed++;
      batch.errors.push(`${doc.id} [${stage}]: ${messageOf(err)}`);
      log.error('Document failed', { stage, ...errorFields(err) });
      return record({ documentId: doc.id, title, status: 'failed', stage, error: messageOf(err) });
    }
  }

  private buildReport(
    mode: SyncMode,
    status: SyncRunStatus,
    startedAt: Date,
    batch: BatchState,
    remaining: number,
    checkpoint?: Checkpoint,
  ): SyncReport {
    const finishedAt = this.now();
    return {
      mode,
      status,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      counts: batch.counts,
      remaining,
      errors: batch.errors,
      documents: batch.documents,
      checkpoint: checkpoint?.toJSON(),
    };
  }
}
