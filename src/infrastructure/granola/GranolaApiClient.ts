import { z } from 'zod';
import type { DocumentSourcePort } from '../../domain/ports/DocumentSourcePort.js';
import type { SourceDocument, PersonRef } from '../../domain/entities/SourceDocument.js';
import type { ContentNode } from '../../domain/entities/ContentNode.js';
import {
  AuthorizationError,
  FetchRejectedError,
  TransientFetchError,
  isRetryableError,
} from '../../domain/errors/DomainErrors.js';
import { withRetry, type RetryOptions } from '../../shared/RetryPolicy.js';
import { Logger, errorFields } from '../../shared/Logger.js';

/**
 * Granola API client
 *
 * 以分頁方式呼叫 POST /v2/get-documents，把回應驗證並轉成 SourceDocument。
 * HTTP 401/403 → AuthorizationError（不重試）；網路錯誤、逾時、408/429/5xx
 * → TransientFetchError（以 withRetry 指數退避重試）。
 */

export interface GranolaApiConfig {
  baseUrl: string;
  accessToken: string;
  clientVersion: string;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
  retry: Pick<RetryOptions, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'>;
}

const PersonSchema = z.object({
  name: z.string().nullish(),
  email: z.string().nullish(),
}).passthrough();

const CalendarAttendeeSchema = z.object({
  displayName: z.string().nullish(),
  email: z.string().nullish(),
}).passthrough();

const ContentNodeSchema: z.ZodType<ContentNode> = z.lazy(() =>
  z.object({
    type: z.string(),
    text: z.string().optional(),
    attrs: z.record(z.unknown()).optional(),
    marks: z.array(z.object({
      type: z.string(),
      attrs: z.record(z.unknown()).optional(),
    })).optional(),
    content: z.array(ContentNodeSchema).optional(),
  }),
);

const RawDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  created_at: z.string().refine((v) => !Number.isNaN(Date.parse(v)), 'created_at must be a timestamp'),
  updated_at: z.string().nullish(),
  valid_meeting: z.boolean().nullish(),
  summary: z.string().nullish(),
  overview: z.string().nullish(),
  people: z.object({
    creator: PersonSchema.nullish(),
    attendees: z.array(z.union([PersonSchema, z.string()])).nullish(),
  }).passthrough().nullish(),
  google_calendar_event: z.object({
    id: z.string().nullish(),
    hangoutLink: z.string().nullish(),
    attendees: z.array(CalendarAttendeeSchema).nullish(),
  }).passthrough().nullish(),
  metadata: z.object({
    duration_minutes: z.number().nullish(),
    recording_url: z.string().nullish(),
  }).passthrough().nullish(),
  last_viewed_panel: z.object({
    content: z.unknown(),
  }).passthrough().nullish(),
}).passthrough();

type RawDocument = z.infer<typeof RawDocumentSchema>;

const ResponseSchema = z.object({
  docs: z.array(z.unknown()),
}).passthrough();

function toPersonRef(p: { name?: string | null; email?: string | null } | string): PersonRef {
  if (typeof p === 'string') return { name: p };
  return { name: p.name ?? undefined, email: p.email ?? undefined };
}

function parseContent(raw: unknown): ContentNode | undefined {
  if (raw === undefined || raw === null) return undefined;
  // 部分版本把 panel content 存成 JSON 字串
  const value = typeof raw === 'string' ? safeJson(raw) : raw;
  const parsed = ContentNodeSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** API 原始欄位 → SourceDocument */
export function toSourceDocument(raw: RawDocument): SourceDocument {
  const calendar = raw.google_calendar_event ?? undefined;
  return {
    id: raw.id,
    title: raw.title ?? null,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at ?? undefined,
    validMeeting: raw.valid_meeting ?? true,
    creator: raw.people?.creator ? toPersonRef(raw.people.creator) : undefined,
    attendees: (raw.people?.attendees ?? []).map(toPersonRef),
    calendarAttendees: (calendar?.attendees ?? []).map((a) => ({
      name: a.displayName ?? undefined,
      email: a.email ?? undefined,
    })),
    calendarEventId: calendar?.id ?? undefined,
    meetingLink: calendar?.hangoutLink ?? undefined,
    recordingUrl: raw.metadata?.recording_url ?? undefined,
    durationMinutes: raw.metadata?.duration_minutes ?? undefined,
    summary: raw.summary ?? raw.overview ?? undefined,
    content: parseContent(raw.last_viewed_panel?.content),
  };
}

function byCreatedAt(a: SourceDocument, b: SourceDocument): number {
  return Date.parse(a.createdAt) - Date.parse(b.createdAt) || a.id.localeCompare(b.id);
}

export class GranolaApiClient implements DocumentSourcePort {
  private readonly logger = new Logger('GranolaApiClient');

  constructor(private readonly config: GranolaApiConfig) {}

  async listSince(since: Date): Promise<SourceDocument[]> {
    const docs = await this.collectPages(since);
    const sinceMs = since.getTime();
    // API 的 created_after 可能包含邊界；只濾掉明確早於 since 的文件
    return docs.filter((d) => Date.parse(d.createdAt) >= sinceMs).sort(byCreatedAt);
  }

  async getById(documentId: string): Promise<SourceDocument | undefined> {
    for (let page = 0; page < this.config.maxPages; page++) {
      const docs = await this.fetchPage(page * this.config.pageSize);
      const match = docs.find((d) => d.id === documentId);
      if (match) return match;
      if (docs.length < this.config.pageSize) break;
    }
    this.logger.warn('Document not found', { documentId });
    return undefined;
  }

  private async collectPages(since: Date): Promise<SourceDocument[]> {
    const all: SourceDocument[] = [];
    for (let page = 0; page < this.config.maxPages; page++) {
      const docs = await this.fetchPage(page * this.config.pageSize, since);
      all.push(...docs);
      if (docs.length < this.config.pageSize) return all;
    }
    this.logger.warn('Stopped paging at maxPages', { maxPages: this.config.maxPages, fetched: all.length });
    return all;
  }

  /** 單頁請求，包在重試策略中 */
  private fetchPage(offset: number, createdAfter?: Date): Promise<SourceDocument[]> {
    return withRetry(() => this.requestPage(offset, createdAfter), {
      ...this.config.retry,
      isRetryable: isRetryableError,
      onRetry: (attempt, err, delayMs) => {
        this.logger.warn('Retrying document fetch', {
          attempt, offset, delayMs: Math.round(delayMs), ...errorFields(err),
        });
      },
    });
  }

  private async requestPage(offset: number, createdAfter?: Date): Promise<SourceDocument[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/v2/get-documents`;
    const body: Record<string, unknown> = {
      limit: this.config.pageSize,
      offset,
      include_last_viewed_panel: true,
    };
    if (createdAfter) body.created_after = createdAfter.toISOString();

    this.logger.debug('Fetching documents', { offset, createdAfter: body.created_after });

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          'Content-Type': 'application/json',
          Accept: '*/*',
          'User-Agent': `Granola/${this.config.clientVersion}`,
          'X-Client-Version': this.config.clientVersion,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
      throw new TransientFetchError(
        timedOut ? `Request timed out after ${this.config.timeoutMs}ms` : `Network error: ${String(err)}`,
        undefined,
        { cause: err },
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthorizationError(`Document API rejected credentials (HTTP ${response.status})`, response.status);
    }
    if (response.status === 408 || response.status === 429 || response.status >= 500) {
      throw new TransientFetchError(`Document API returned HTTP ${response.status}`, response.status);
    }
    if (!response.ok) {
      throw new FetchRejectedError(`Document API returned HTTP ${response.status}`, response.status);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new FetchRejectedError('Document API returned a non-JSON body', response.status, { cause: err });
    }

    const parsed = ResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FetchRejectedError('Document API response has no "docs" array', response.status);
    }

    const docs: SourceDocument[] = [];
    for (const raw of parsed.data.docs) {
      const doc = RawDocumentSchema.safeParse(raw);
      if (doc.success) {
        docs.push(toSourceDocument(doc.data));
      } else {
        this.logger.warn('Skipping malformed document', {
          issue: doc.error.issues[0]?.message,
          path: doc.error.issues[0]?.path.join('.'),
        });
      }
    }
    return docs;
  }
}
