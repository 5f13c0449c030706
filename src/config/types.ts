import type { LogLevel } from '../shared/Logger.js';

/** Vault 設定 */
export interface VaultConfig {
  /** 會議筆記資料夾（相對於 vault 根目錄） */
  notesFolder: string;
  /** 筆記日期/時間使用的 IANA 時區 */
  timezone: string;
}

/** 筆記來源 API 設定 */
export interface SourceConfig {
  baseUrl: string;
  /** 送到 API 的 client 版本標頭 */
  clientVersion: string;
  pageSize: number;
  /** 單次查詢最多翻幾頁 */
  maxPages: number;
  timeoutMs: number;
  /** 第一次執行（沒有 checkpoint）往回抓幾天 */
  initialLookbackDays: number;
}

/** LLM 設定 */
export interface LLMConfig {
  /** LLM 提供者：'openai-compatible' 或 'none'（停用） */
  provider: 'openai-compatible' | 'none';
  /** API base URL（OpenAI-compatible endpoint） */
  baseUrl: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  /** 是否送出 response_format: json_schema */
  structuredOutput: boolean;
}

/** Enrichment 設定 */
export interface EnrichmentConfig {
  enabled: boolean;
  /** action item 超過此數量才觸發 stage 2 合併 */
  consolidationThreshold: number;
  /** 無法判斷負責人時的歸屬；未設定時用筆記建立者 */
  defaultAssignee?: string;
}

/** 重試設定（抓取與 LLM 共用） */
export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** 同步狀態路徑（相對於 home 目錄） */
export interface StateConfig {
  dbPath: string;
  lockPath: string;
  /** 超過此時間的 lock 視為殘留，可接管 */
  lockStaleMs: number;
}

export interface CredentialsConfig {
  path: string;
  /** 找不到 access token 時讀取的桌面 app 登入狀態檔 */
  appStoragePath: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface SyncConfig {
  version: number;
  vault: VaultConfig;
  source: SourceConfig;
  llm: LLMConfig;
  enrichment: EnrichmentConfig;
  retry: RetryConfig;
  state: StateConfig;
  credentials: CredentialsConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof SyncConfig]?: SyncConfig[K] extends object ? Partial<SyncConfig[K]> : SyncConfig[K];
};
