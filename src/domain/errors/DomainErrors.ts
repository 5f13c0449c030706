export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 管線階段，用於錯誤與 log 的上下文 */
export type PipelineStage =
  | 'fetch'
  | 'convert'
  | 'write'
  | 'extract'
  | 'consolidate'
  | 'checkpoint'
  | 'startup';

export interface SyncErrorOptions extends ErrorOptions {
  documentId?: string;
  stage?: PipelineStage;
}

/** 所有同步管線 domain 錯誤的基底類別 */
export abstract class SyncError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;
  readonly documentId?: string;
  readonly stage?: PipelineStage;

  constructor(message: string, options?: SyncErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.documentId = options?.documentId;
    this.stage = options?.stage;
  }
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof SyncError && err.classification === 'retryable';
}

// --- Fetch ---

export class TransientFetchError extends SyncError {
  readonly classification = 'retryable' as const;
  readonly code = 'FETCH_TRANSIENT';

  constructor(
    message: string,
    public readonly status?: number,
    options?: SyncErrorOptions,
  ) {
    super(message, { stage: 'fetch', ...options });
  }
}

export class AuthorizationError extends SyncError {
  readonly classification = 'manual' as const;
  readonly code = 'FETCH_UNAUTHORIZED';

  constructor(
    message: string,
    public readonly status: number,
    options?: SyncErrorOptions,
  ) {
    super(message, { stage: 'fetch', ...options });
  }
}

export class FetchRejectedError extends SyncError {
  readonly classification = 'manual' as const;
  readonly code = 'FETCH_REJECTED';

  constructor(
    message: string,
    public readonly status?: number,
    options?: SyncErrorOptions,
  ) {
    super(message, { stage: 'fetch', ...options });
  }
}

// --- Conversion ---

/** 不支援的節點型別：降級為純文字，不會中斷轉換 */
export class UnsupportedNodeError extends SyncError {
  readonly classification = 'degradable' as const;
  readonly code = 'UNSUPPORTED_NODE';

  constructor(
    public readonly nodeType: string,
    options?: SyncErrorOptions,
  ) {
    super(`Unsupported content node "${nodeType}" rendered as plain text`, { stage: 'convert', ...options });
  }
}

// --- Write ---

export class WriteIOError extends SyncError {
  readonly classification = 'manual' as const;
  readonly code = 'WRITE_IO';

  constructor(
    message: string,
    public readonly filePath: string,
    options?: SyncErrorOptions,
  ) {
    super(message, { stage: 'write', ...options });
  }
}

// --- LLM ---

export class ExtractionTimeoutError extends SyncError {
  readonly classification = 'retryable' as const;
  readonly code = 'EXTRACTION_TIMEOUT';
}

export class MalformedReplyError extends SyncError {
  readonly classification = 'degradable' as const;
  readonly code = 'MALFORMED_REPLY';

  constructor(
    message: string,
    public readonly replyPreview: string,
    options?: SyncErrorOptions,
  ) {
    super(message, options);
  }
}

export class LLMAuthorizationError extends SyncError {
  readonly classification = 'manual' as const;
  readonly code = 'LLM_UNAUTHORIZED';
}

/** stage 2 失敗：呼叫端改用截斷後的未合併清單 */
export class ConsolidationError extends SyncError {
  readonly classification = 'degradable' as const;
  readonly code = 'CONSOLIDATION_FAILED';

  constructor(message: string, options?: SyncErrorOptions) {
    super(message, { stage: 'consolidate', ...options });
  }
}

// --- Startup ---

export class CredentialsNotFoundError extends SyncError {
  readonly classification = 'manual' as const;
  readonly code = 'CREDENTIALS_NOT_FOUND';

  constructor(
    public readonly missing: string[],
    public readonly searchedPath: string,
    options?: SyncErrorOptions,
  ) {
    super(
      `Missing credentials: ${missing.join(', ')} (looked in ${searchedPath} and environment)`,
      { stage: 'startup', ...options },
    );
  }
}

export class ConfigValidationError extends SyncError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';

  constructor(message: string, options?: SyncErrorOptions) {
    super(message, { stage: 'startup', ...options });
  }
}
