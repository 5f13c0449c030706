import type { Command } from 'commander';
import { InvalidArgumentError, Option } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { loadConfig } from '../../config/ConfigLoader.js';
import { DatabaseManager } from '../../infrastructure/sqlite/DatabaseManager.js';
import { FileCredentialResolver } from '../../infrastructure/credentials/FileCredentialResolver.js';
import type { SyncTarget } from '../../application/dto/SyncRequest.js';
import { Logger } from '../../shared/Logger.js';
import { ReportFormatter } from '../formatters/ReportFormatter.js';
import { createSyncUseCase } from '../runtime.js';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

const SyncOptionsSchema = z.object({
  backfill: z.number().int().positive().optional(),
  docId: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().optional(),
  llm: z.boolean(),
  format: z.enum(['json', 'text']),
  home: z.string(),
  config: z.string().optional(),
});

export type SyncOptions = z.infer<typeof SyncOptionsSchema>;

export function targetFromOptions(opts: SyncOptions): SyncTarget {
  if (opts.docId) return { mode: 'document', documentId: opts.docId };
  if (opts.backfill !== undefined) return { mode: 'backfill', days: opts.backfill };
  return { mode: 'incremental' };
}

/** 註冊 sync 指令 */
export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Fetch new meeting notes and write them into the vault')
    .addOption(new Option('--backfill <days>', 'Re-sync meetings from the last N days').argParser(parsePositiveInt))
    .addOption(new Option('--doc-id <id>', 'Sync a single document by id').conflicts('backfill'))
    .option('--max-iterations <n>', 'Process at most N documents in this run', parsePositiveInt)
    .option('--no-llm', 'Write basic notes only, skip LLM enrichment')
    .option('--format <format>', 'Output format: json or text', 'text')
    .option('--home <dir>', 'Directory holding .mvsync.json and sync state', '.')
    .option('--config <file>', 'Config file path (default: <home>/.mvsync.json)')
    .action(async (rawOpts: unknown) => {
      const opts = SyncOptionsSchema.parse(rawOpts);
      const home = path.resolve(opts.home);
      const config = loadConfig(home, undefined, opts.config);
      Logger.configure({ level: config.logging.level });
      const logger = new Logger('sync');

      const credentials = await new FileCredentialResolver({
        path: config.credentials.path,
        appStoragePath: config.credentials.appStoragePath,
      }).resolve();

      const dbPath = path.resolve(home, config.state.dbPath);
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      const dbMgr = new DatabaseManager(dbPath);

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals): void => {
        logger.warn('Received signal; finishing current document', { signal });
        controller.abort();
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      try {
        const useCase = createSyncUseCase(home, config, credentials, dbMgr.getDb());
        const report = await useCase.run({
          target: targetFromOptions(opts),
          maxIterations: opts.maxIterations,
          enrich: opts.llm,
          signal: controller.signal,
        });

        process.stdout.write(new ReportFormatter().formatReport(report, opts.format) + '\n');
        process.exitCode = report.status === 'cancelled' ? 130 : 0;
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        dbMgr.close();
      }
    });
}
