import type { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME } from '../../config/ConfigLoader.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { ReportFormatter } from '../formatters/ReportFormatter.js';

/** init 指令的結果型別 */
export interface InitResult {
  home: string;
  configCreated: boolean;
  stateDirCreated: boolean;
}

const InitOptionsSchema = z.object({
  home: z.string(),
  force: z.boolean(),
  format: z.enum(['json', 'text']),
});

/**
 * 在 home 目錄建立 .mvsync.json（預設值）與狀態目錄
 * @param force - 覆寫既有的設定檔
 */
export function initHome(home: string, force: boolean): InitResult {
  const configPath = path.join(home, CONFIG_FILE_NAME);
  let configCreated = false;
  if (force || !fs.existsSync(configPath)) {
    fs.mkdirSync(home, { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', 'utf-8');
    configCreated = true;
  }

  const stateDir = path.dirname(path.resolve(home, DEFAULT_CONFIG.state.dbPath));
  const stateDirCreated = !fs.existsSync(stateDir);
  fs.mkdirSync(stateDir, { recursive: true });

  return { home, configCreated, stateDirCreated };
}

/** 註冊 init 指令 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Create ${CONFIG_FILE_NAME} and the state directory`)
    .option('--home <dir>', 'Directory to initialize', '.')
    .option('--force', 'Overwrite an existing config file', false)
    .option('--format <format>', 'Output format: json or text', 'text')
    .action((rawOpts: unknown) => {
      const opts = InitOptionsSchema.parse(rawOpts);
      const result = initHome(path.resolve(opts.home), opts.force);
      process.stdout.write(new ReportFormatter().formatObject(result, opts.format) + '\n');
    });
}
