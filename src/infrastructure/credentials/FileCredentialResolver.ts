import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { CredentialPort, Credentials } from '../../domain/ports/CredentialPort.js';
import { ConfigValidationError, CredentialsNotFoundError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

const CredentialsFileSchema = z.object({
  granola: z.object({ access_token: z.string().min(1).optional() }).passthrough().optional(),
  llm: z.object({ api_key: z.string().min(1).optional() }).passthrough().optional(),
  vault: z.object({ path: z.string().min(1).optional() }).passthrough().optional(),
}).passthrough();

type CredentialsFile = z.infer<typeof CredentialsFileSchema>;

/** 桌面 app 的登入狀態檔：workos_tokens 是再包一層的 JSON 字串 */
const AppStorageSchema = z.object({ workos_tokens: z.string() }).passthrough();
const WorkosTokensSchema = z.object({ access_token: z.string().min(1) }).passthrough();

export interface FileCredentialResolverOptions {
  /** credentials.json 路徑，可用 ~ 開頭 */
  path: string;
  /** 找不到 access token 時嘗試讀取的 app 登入狀態檔 */
  appStoragePath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === '~') return homeDir;
  if (p.startsWith('~/')) return path.join(homeDir, p.slice(2));
  return p;
}

async function readJsonIfExists(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigValidationError(`Cannot parse ${filePath}`, { cause: err });
  }
}

/**
 * 憑證解析：環境變數 > credentials.json > app 登入狀態檔（僅 access token）
 *
 * 環境變數：GRANOLA_ACCESS_TOKEN、LLM_API_KEY、VAULT_PATH。
 */
export class FileCredentialResolver implements CredentialPort {
  private readonly logger = new Logger('FileCredentialResolver');
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;

  constructor(private readonly options: FileCredentialResolverOptions) {
    this.env = options.env ?? process.env;
    this.homeDir = options.homeDir ?? os.homedir();
  }

  async resolve(): Promise<Credentials> {
    const filePath = expandHome(this.options.path, this.homeDir);
    const file = await this.readCredentialsFile(filePath);

    const accessToken = this.env.GRANOLA_ACCESS_TOKEN
      || file.granola?.access_token
      || await this.readAppStorageToken();
    const llmApiKey = this.env.LLM_API_KEY || file.llm?.api_key;
    const vaultPath = this.env.VAULT_PATH || file.vault?.path;

    const missing: string[] = [];
    if (!accessToken) missing.push('granola.access_token');
    if (!vaultPath) missing.push('vault.path');
    if (!accessToken || !vaultPath) {
      throw new CredentialsNotFoundError(missing, filePath);
    }

    return {
      accessToken,
      llmApiKey: llmApiKey || undefined,
      vaultRootPath: path.resolve(expandHome(vaultPath, this.homeDir)),
    };
  }

  private async readCredentialsFile(filePath: string): Promise<CredentialsFile> {
    const raw = await readJsonIfExists(filePath);
    if (raw === undefined) {
      this.logger.debug('Credentials file not found', { filePath });
      return {};
    }
    const parsed = CredentialsFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigValidationError(
        `Invalid credentials file ${filePath}: ${issue?.path.join('.') || '(root)'} ${issue?.message ?? ''}`.trim(),
      );
    }
    return parsed.data;
  }

  private async readAppStorageToken(): Promise<string | undefined> {
    if (!this.options.appStoragePath) return undefined;
    const storagePath = expandHome(this.options.appStoragePath, this.homeDir);

    let raw: unknown;
    try {
      raw = await readJsonIfExists(storagePath);
    } catch (err) {
      this.logger.warn('Cannot read app storage', { storagePath, error: String(err) });
      return undefined;
    }
    if (raw === undefined) return undefined;

    const storage = AppStorageSchema.safeParse(raw);
    if (!storage.success) {
      this.logger.warn('App storage has no workos_tokens', { storagePath });
      return undefined;
    }

    let tokens: unknown;
    try {
      tokens = JSON.parse(storage.data.workos_tokens);
    } catch (err) {
      this.logger.warn('App storage workos_tokens is not JSON', { storagePath, error: String(err) });
      return undefined;
    }
    const parsed = WorkosTokensSchema.safeParse(tokens);
    if (!parsed.success) return undefined;

    this.logger.info('Using access token from app storage', { storagePath });
    return parsed.data.access_token;
  }
}
