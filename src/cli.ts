import { Command, Option, type OutputConfiguration } from 'commander';
import { createCreateCommand } from './commands/create.js';
import { createStatusCommand } from './commands/status.js';
import { createDownloadCommand } from './commands/download.js';
import { createListFieldsCommand } from './commands/list-fields.js';
import { createDeleteBatchCommand } from './commands/delete-batch.js';
import { createAuthCommand } from './commands/auth.js';
import { createConfigCommand } from './commands/config.js';
import { applyLogLevel } from './lib/command-context.js';

export const VERSION = '0.1.0';

export interface CliOptions {
  /** 以拋出 CommanderError 取代 process.exit（測試用） */
  exitOverride?: boolean;
  /** 自訂 help / 錯誤訊息的輸出位置（測試用） */
  output?: OutputConfiguration;
}

/**
 * 遞迴套用到所有子指令
 */
function forEachCommand(command: Command, fn: (cmd: Command) => void): void {
  fn(command);
  for (const sub of command.commands) {
    forEachCommand(sub, fn);
  }
}

export function createCli(options: CliOptions = {}): Command {
  const program = new Command();

  program
    .name('zcrm-bulk')
    .description('Zoho CRM bulk read / bulk delete CLI')
    .version(VERSION);

  // 全域選項
  program
    .addOption(new Option('-f, --format <format>', '輸出格式: table (default) | json').choices(['table', 'json']))
    .option('-q, --quiet', '安靜模式（只輸出錯誤日誌）')
    .option('-v, --verbose', '詳細模式（輸出 debug 日誌）');

  program.hook('preAction', (_thisCommand, actionCommand) => {
    applyLogLevel(actionCommand);
  });

  // 註冊指令
  program.addCommand(createCreateCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createDownloadCommand());
  program.addCommand(createListFieldsCommand());
  program.addCommand(createDeleteBatchCommand());
  program.addCommand(createAuthCommand());
  program.addCommand(createConfigCommand());

  forEachCommand(program, (cmd) => {
    if (options.exitOverride) {
      cmd.exitOverride();
    }
    if (options.output) {
      cmd.configureOutput(options.output);
    }
  });

  return program;
}

export const cli = createCli();
