/**
 * List Fields Command
 * 列出模組的欄位 metadata
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { getFormat } from '../lib/command-context.js';
import { formatJSON, padString, reportError } from '../utils/output.js';
import type { FieldMeta, FieldsResponse } from '../types/api.js';

const API_NAME_WIDTH = 30;

/**
 * 每個欄位一行：api_name（補齊 30 字寬） - data_type
 */
export function formatFieldLines(fields: FieldMeta[]): string[] {
  return fields.map((field) => `${padString(field.api_name, API_NAME_WIDTH)} - ${field.data_type ?? '-'}`);
}

export function createListFieldsCommand(): Command {
  return new Command('list_fields')
    .alias('list-fields')
    .description('列出模組的欄位（api_name 與 data_type）')
    .argument('<module>', '模組 API 名稱')
    .action(async (module: string, _options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const response = await getApiClient().get<FieldsResponse | undefined>('/crm/v8/settings/fields', {
          module,
        });
        const fields = response?.fields ?? [];

        if (format === 'json') {
          console.log(formatJSON(fields.map((f) => ({ api_name: f.api_name, data_type: f.data_type ?? null }))));
          return;
        }

        for (const line of formatFieldLines(fields)) {
          console.log(line);
        }
        console.log(`\n共 ${fields.length} 個欄位`);
      } catch (error) {
        reportError(error, format);
      }
    });
}
