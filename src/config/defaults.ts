import type { SyncConfig } from './types.js';

export const DEFAULT_CONFIG: SyncConfig = {
  version: 1,
  vault: {
    notesFolder: '00_Inbox/Meetings',
    timezone: 'UTC',
  },
  source: {
    baseUrl: 'https://api.granola.ai',
    clientVersion: '5.354.0',
    pageSize: 100,
    maxPages: 10,
    timeoutMs: 30000,
    initialLookbackDays: 7,
  },
  llm: {
    provider: 'openai-compatible',
    baseUrl: 'https://api.perplexity.ai',
    model: 'sonar-pro',
    timeoutMs: 120000,
    temperature: 0,
    maxTokens: 4000,
    structuredOutput: true,
  },
  enrichment: {
    enabled: true,
    consolidationThreshold: 15,
  },
  retry: {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 16000,
  },
  state: {
    dbPath: '.mvsync/state.db',
    lockPath: '.mvsync/sync.lock',
    lockStaleMs: 3600000, // 1 小時
  },
  credentials: {
    path: '~/.config/mvsync/credentials.json',
    appStoragePath: '~/Library/Application Support/Granola/supabase.json',
  },
  logging: {
    level: 'info',
  },
};
