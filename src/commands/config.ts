/**
 * Config Command
 * 設定檔管理
 */

import { Command } from 'commander';
import { getConfigService, isConfigKey, SECRET_KEYS, CONFIG_KEYS } from '../services/config.js';
import { getFormat } from '../lib/command-context.js';
import { InputError } from '../lib/errors.js';
import { formatJSON, formatKeyValueTable, isOutputFormat, reportError } from '../utils/output.js';
import type { AppConfig, ConfigKey } from '../types/config.js';

/**
 * 遮蔽機密值，只保留末四碼
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) {
    return '****';
  }
  return `****${value.slice(-4)}`;
}

function displayValue(key: ConfigKey, value: AppConfig[ConfigKey]): string | number | undefined {
  if (typeof value === 'string' && SECRET_KEYS.includes(key)) {
    return maskSecret(value);
  }
  return value;
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new InputError(`未知的設定鍵：${key}（可用：${CONFIG_KEYS.join(', ')}）`);
  }
  return key;
}

/**
 * 將字串寫入對應型別的設定值
 */
export function applyConfigValue(key: ConfigKey, raw: string): void {
  const config = getConfigService();

  switch (key) {
    case 'pollInterval': {
      const seconds = Number(raw);
      if (!Number.isFinite(seconds) || seconds < 0) {
        throw new InputError(`pollInterval 必須是非負數字：${raw}`);
      }
      config.set('pollInterval', seconds);
      return;
    }
    case 'format':
      if (!isOutputFormat(raw)) {
        throw new InputError(`format 只能是 json 或 table：${raw}`);
      }
      config.set('format', raw);
      return;
    default:
      config.set(key, raw);
  }
}

export function createConfigCommand(): Command {
  const configCommand = new Command('config').description('設定管理');

  configCommand
    .command('list')
    .description('列出所有設定（機密值遮蔽）')
    .action((_options: unknown, cmd: Command) => {
      const format = getFormat(cmd);
      const all = getConfigService().getAll();
      const entries = CONFIG_KEYS.filter((key) => all[key] !== undefined).map(
        (key): [string, string | number | undefined] => [key, displayValue(key, all[key])]
      );

      if (format === 'json') {
        console.log(formatJSON(Object.fromEntries(entries)));
      } else if (entries.length === 0) {
        console.log('尚無任何設定');
      } else {
        console.log(formatKeyValueTable(entries));
      }
    });

  configCommand
    .command('get')
    .description('取得設定值')
    .argument('<key>', '設定鍵')
    .action((key: string, _options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const configKey = requireKey(key);
        const value = displayValue(configKey, getConfigService().get(configKey));

        if (format === 'json') {
          console.log(formatJSON({ [configKey]: value ?? null }));
        } else {
          console.log(value === undefined ? '(未設定)' : String(value));
        }
      } catch (error) {
        reportError(error, format);
      }
    });

  configCommand
    .command('set')
    .description('設定值')
    .argument('<key>', '設定鍵')
    .argument('<value>', '設定值')
    .action((key: string, value: string, _options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const configKey = requireKey(key);
        applyConfigValue(configKey, value);
        if (format === 'json') {
          console.log(formatJSON({ success: true, key: configKey }));
        } else {
          console.log(`已設定 ${configKey}`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });

  configCommand
    .command('unset')
    .description('刪除設定值')
    .argument('<key>', '設定鍵')
    .action((key: string, _options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const configKey = requireKey(key);
        getConfigService().delete(configKey);
        if (format === 'json') {
          console.log(formatJSON({ success: true, key: configKey }));
        } else {
          console.log(`已刪除 ${configKey}`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });

  configCommand
    .command('path')
    .description('顯示設定檔路徑')
    .action(() => {
      console.log(getConfigService().getConfigPath());
    });

  return configCommand;
}
