import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { SyncConfig, PartialConfig } from './types.js';
import { isLogLevel } from '../shared/Logger.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';

export type { SyncConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.mvsync.json';

/** 設定檔允許的欄位；未知欄位直接拒絕，避免拼錯的 key 被默默忽略 */
const ConfigFileSchema = z.object({
  version: z.number().int(),
  vault: z.object({
    notesFolder: z.string(),
    timezone: z.string(),
  }).strict(),
  source: z.object({
    baseUrl: z.string().url(),
    clientVersion: z.string(),
    pageSize: z.number(),
    maxPages: z.number(),
    timeoutMs: z.number(),
    initialLookbackDays: z.number(),
  }).strict(),
  llm: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string().url(),
    model: z.string(),
    timeoutMs: z.number(),
    temperature: z.number(),
    maxTokens: z.number(),
    structuredOutput: z.boolean(),
  }).strict(),
  enrichment: z.object({
    enabled: z.boolean(),
    consolidationThreshold: z.number(),
    defaultAssignee: z.string(),
  }).strict(),
  retry: z.object({
    maxRetries: z.number(),
    baseDelayMs: z.number(),
    maxDelayMs: z.number(),
  }).strict(),
  state: z.object({
    dbPath: z.string(),
    lockPath: z.string(),
    lockStaleMs: z.number(),
  }).strict(),
  credentials: z.object({
    path: z.string(),
    appStoragePath: z.string(),
  }).strict(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).strict(),
}).strict().deepPartial();

/** 逐區塊合併：partial 覆蓋 base */
function merge(base: SyncConfig, partial: PartialConfig): SyncConfig {
  return {
    version: partial.version ?? base.version,
    vault: { ...base.vault, ...partial.vault },
    source: { ...base.source, ...partial.source },
    llm: { ...base.llm, ...partial.llm },
    enrichment: { ...base.enrichment, ...partial.enrichment },
    retry: { ...base.retry, ...partial.retry },
    state: { ...base.state, ...partial.state },
    credentials: { ...base.credentials, ...partial.credentials },
    logging: { ...base.logging, ...partial.logging },
  };
}

/** 環境變數覆蓋：LLM_BASE_URL、LLM_MODEL、LOG_LEVEL */
function applyEnvOverrides(config: SyncConfig): void {
  const baseUrl = process.env.LLM_BASE_URL;
  if (baseUrl) config.llm.baseUrl = baseUrl;

  const model = process.env.LLM_MODEL;
  if (model) config.llm.model = model;

  const level = process.env.LOG_LEVEL;
  if (isLogLevel(level)) config.logging.level = level;
}

function requirePositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`${name} must be a positive integer`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: SyncConfig): void {
  requirePositiveInt(config.enrichment.consolidationThreshold, 'enrichment.consolidationThreshold');
  requirePositiveInt(config.source.pageSize, 'source.pageSize');
  requirePositiveInt(config.source.maxPages, 'source.maxPages');
  requirePositiveInt(config.source.timeoutMs, 'source.timeoutMs');
  requirePositiveInt(config.source.initialLookbackDays, 'source.initialLookbackDays');
  requirePositiveInt(config.llm.timeoutMs, 'llm.timeoutMs');

  if (!Number.isInteger(config.retry.maxRetries) || config.retry.maxRetries < 0) {
    throw new ConfigValidationError('retry.maxRetries must be a non-negative integer');
  }
  if (config.retry.baseDelayMs < 0 || config.retry.maxDelayMs < config.retry.baseDelayMs) {
    throw new ConfigValidationError('retry delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
  }

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: config.vault.timezone });
  } catch (err) {
    throw new ConfigValidationError(`vault.timezone is not a valid IANA time zone: ${config.vault.timezone}`, { cause: err });
  }
}

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError(`Cannot parse ${configPath}`, { cause: err });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigValidationError(
      `Invalid ${path.basename(configPath)}: ${issue.path.join('.') || '(root)'} ${issue.message}`,
    );
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 home 目錄下的 .mvsync.json（若存在）並合併到預設值上
 * @param homeDir - 狀態與設定檔所在目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param configPath - 明確指定的設定檔路徑
 */
export function loadConfig(
  homeDir: string,
  overrides?: PartialConfig,
  configPath?: string,
): SyncConfig {
  const fileConfig = readConfigFile(configPath ?? path.join(homeDir, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides < env
  let merged = merge(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = merge(merged, overrides);
  }

  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
