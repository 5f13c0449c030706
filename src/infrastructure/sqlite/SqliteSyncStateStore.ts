import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { SyncStatePort } from '../../domain/ports/SyncStatePort.js';
import type { SyncRunRecord } from '../../domain/entities/SyncRun.js';
import { Checkpoint } from '../../domain/value-objects/Checkpoint.js';
import { Logger } from '../../shared/Logger.js';

interface CheckpointRow {
  created_at: string;
  document_id: string | null;
}

const RunRowSchema = z.object({
  run_id: z.number(),
  mode: z.enum(['incremental', 'backfill', 'document']),
  status: z.enum(['completed', 'cancelled', 'aborted', 'locked']),
  started_at: z.string(),
  finished_at: z.string(),
  counts_json: z.string(),
  errors_json: z.string(),
});

const CountsSchema = z.object({
  fetched: z.number(),
  succeeded: z.number(),
  enriched: z.number(),
  enrichmentFailed: z.number(),
  consolidated: z.number(),
  skipped: z.number(),
  failed: z.number(),
});

const ErrorsSchema = z.array(z.string());

/**
 * SQLite 同步狀態
 *
 * checkpoint 存在單列表中，讀-比-寫包在同一個 transaction：
 * 較舊的位置不會覆蓋較新的位置。
 */
export class SqliteSyncStateStore implements SyncStatePort {
  private readonly logger = new Logger('SqliteSyncStateStore');

  constructor(private readonly db: Database.Database) {}

  loadCheckpoint(): Checkpoint | undefined {
    const row = this.db.prepare<[], CheckpointRow>(
      'SELECT created_at, document_id FROM checkpoint WHERE id = 1',
    ).get();
    if (!row) return undefined;
    return Checkpoint.at(row.created_at, row.document_id ?? undefined);
  }

  saveCheckpoint(checkpoint: Checkpoint): void {
    const save = this.db.transaction((cp: Checkpoint) => {
      const current = this.loadCheckpoint();
      if (current && cp.compareTo(current) <= 0) return;
      this.db.prepare(
        `INSERT INTO checkpoint (id, created_at, document_id, updated_at) VALUES (1, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           created_at = excluded.created_at,
           document_id = excluded.document_id,
           updated_at = excluded.updated_at`,
      ).run(cp.createdAt, cp.documentId ?? null, Date.now());
    });
    save(checkpoint);
  }

  recordRun(record: SyncRunRecord): void {
    this.db.prepare(
      `INSERT INTO sync_runs (mode, status, started_at, finished_at, counts_json, errors_json)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ).run(
      record.mode,
      record.status,
      record.startedAt,
      record.finishedAt,
      JSON.stringify(record.counts),
      JSON.stringify(record.errors),
    );
  }

  lastRun(): SyncRunRecord | undefined {
    const raw = this.db.prepare<[], unknown>(
      'SELECT * FROM sync_runs ORDER BY run_id DESC LIMIT 1',
    ).get();
    if (raw === undefined) return undefined;

    const parsed = RunRowSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Ignoring unreadable sync run row', { issue: parsed.error.issues[0]?.message });
      return undefined;
    }
    const row = parsed.data;
    return {
      runId: row.run_id,
      mode: row.mode,
      status: row.status,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      counts: CountsSchema.parse(JSON.parse(row.counts_json)),
      errors: ErrorsSchema.parse(JSON.parse(row.errors_json)),
    };
  }
}
