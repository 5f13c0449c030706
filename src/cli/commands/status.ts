import type { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { loadConfig } from '../../config/ConfigLoader.js';
import { DatabaseManager } from '../../infrastructure/sqlite/DatabaseManager.js';
import { SqliteSyncStateStore } from '../../infrastructure/sqlite/SqliteSyncStateStore.js';
import { ReportFormatter } from '../formatters/ReportFormatter.js';

const StatusOptionsSchema = z.object({
  format: z.enum(['json', 'text']),
  home: z.string(),
  config: z.string().optional(),
});

/** 註冊 status 指令：顯示 checkpoint 與最近一次執行 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the sync checkpoint and the last run')
    .option('--format <format>', 'Output format: json or text', 'text')
    .option('--home <dir>', 'Directory holding .mvsync.json and sync state', '.')
    .option('--config <file>', 'Config file path (default: <home>/.mvsync.json)')
    .action((rawOpts: unknown) => {
      const opts = StatusOptionsSchema.parse(rawOpts);
      const home = path.resolve(opts.home);
      const config = loadConfig(home, undefined, opts.config);
      const formatter = new ReportFormatter();

      const dbPath = path.resolve(home, config.state.dbPath);
      if (!fs.existsSync(dbPath)) {
        process.stdout.write(formatter.formatObject({ checkpoint: null, lastRun: null }, opts.format) + '\n');
        return;
      }

      const dbMgr = new DatabaseManager(dbPath);
      try {
        const store = new SqliteSyncStateStore(dbMgr.getDb());
        const status = {
          checkpoint: store.loadCheckpoint()?.toJSON() ?? null,
          lastRun: store.lastRun() ?? null,
        };
        process.stdout.write(formatter.formatObject(status, opts.format) + '\n');
      } finally {
        dbMgr.close();
      }
    });
}
