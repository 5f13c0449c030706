import path from 'node:path';
import type Database from 'better-sqlite3';
import type { SyncConfig } from '../config/ConfigLoader.js';
import type { Credentials } from '../domain/ports/CredentialPort.js';
import type { LLMPort } from '../domain/ports/LLMPort.js';
import { SyncUseCase } from '../application/SyncUseCase.js';
import { NoteWriter } from '../application/NoteWriter.js';
import { EnrichmentUseCase } from '../application/EnrichmentUseCase.js';
import { GranolaApiClient } from '../infrastructure/granola/GranolaApiClient.js';
import { ProseMirrorConverter } from '../infrastructure/granola/ProseMirrorConverter.js';
import { MetadataExtractor } from '../infrastructure/granola/MetadataExtractor.js';
import { HttpLLMAdapter } from '../infrastructure/llm/HttpLLMAdapter.js';
import { NullLLMAdapter } from '../infrastructure/llm/NullLLMAdapter.js';
import { FileSystemVaultAdapter } from '../infrastructure/vault/FileSystemVaultAdapter.js';
import { MarkdownParser } from '../infrastructure/vault/MarkdownParser.js';
import { MeetingNoteRenderer } from '../infrastructure/vault/MeetingNoteRenderer.js';
import { SqliteSyncStateStore } from '../infrastructure/sqlite/SqliteSyncStateStore.js';
import { FileRunLock } from '../infrastructure/state/FileRunLock.js';
import { Logger } from '../shared/Logger.js';

/** 依設定選擇 LLM 實作；停用或缺少 API key 時回傳 NullLLMAdapter */
export function createLLM(config: SyncConfig, apiKey: string | undefined): LLMPort {
  const logger = new Logger('runtime');
  if (!config.enrichment.enabled || config.llm.provider === 'none') {
    return new NullLLMAdapter();
  }
  if (!apiKey) {
    logger.warn('No LLM API key configured; writing basic notes only');
    return new NullLLMAdapter();
  }
  return new HttpLLMAdapter({
    baseUrl: config.llm.baseUrl,
    apiKey,
    model: config.llm.model,
    timeoutMs: config.llm.timeoutMs,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    structuredOutput: config.llm.structuredOutput,
    retry: config.retry,
  });
}

/** 組裝 SyncUseCase 與其所有 adapter */
export function createSyncUseCase(
  homeDir: string,
  config: SyncConfig,
  credentials: Credentials,
  db: Database.Database,
): SyncUseCase {
  const source = new GranolaApiClient({
    baseUrl: config.source.baseUrl,
    accessToken: credentials.accessToken,
    clientVersion: config.source.clientVersion,
    pageSize: config.source.pageSize,
    maxPages: config.source.maxPages,
    timeoutMs: config.source.timeoutMs,
    retry: config.retry,
  });

  const writer = new NoteWriter(
    new FileSystemVaultAdapter(),
    new MeetingNoteRenderer(),
    new MarkdownParser(),
    credentials.vaultRootPath,
    path.join(credentials.vaultRootPath, config.vault.notesFolder),
  );

  const enrichment = new EnrichmentUseCase(createLLM(config, credentials.llmApiKey), {
    consolidationThreshold: config.enrichment.consolidationThreshold,
    defaultAssignee: config.enrichment.defaultAssignee,
  });

  return new SyncUseCase(
    source,
    new ProseMirrorConverter(),
    new MetadataExtractor(),
    writer,
    enrichment,
    new SqliteSyncStateStore(db),
    new FileRunLock(path.resolve(homeDir, config.state.lockPath), config.state.lockStaleMs),
    {
      timezone: config.vault.timezone,
      initialLookbackDays: config.source.initialLookbackDays,
    },
  );
}
