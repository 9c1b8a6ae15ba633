/**
 * Create Command
 * 建立 bulk read job
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { getConfigService } from '../services/config.js';
import { BulkReadService } from '../services/bulk-read.js';
import { JobHistory } from '../services/job-history.js';
import { getFormat } from '../lib/command-context.js';
import { InputError } from '../lib/errors.js';
import { formatJSON, reportError } from '../utils/output.js';
import { BULK_COMPARATORS, type BulkComparator, type BulkCriteria, type BulkFileType } from '../types/api.js';

interface CreateOptions {
  fields?: string;
  criteriaField?: string;
  comparator: string;
  value?: string;
  pageToken?: string;
  fileType?: string;
}

/** 值為清單的比較子 */
const LIST_COMPARATORS: readonly BulkComparator[] = ['in', 'not_in', 'between', 'not_between'];

function isComparator(value: string): value is BulkComparator {
  return (BULK_COMPARATORS as readonly string[]).includes(value);
}

/**
 * 將逗號分隔字串轉為清單
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * 由指令選項組出篩選條件；未指定 --criteria-field 時返回 undefined
 */
export function buildCriteria(
  field: string | undefined,
  comparator: string,
  value: string | undefined
): BulkCriteria | undefined {
  if (!field) {
    return undefined;
  }
  if (!isComparator(comparator)) {
    throw new InputError(`不支援的比較子：${comparator}（可用：${BULK_COMPARATORS.join(', ')}）`);
  }
  if (value === undefined) {
    throw new InputError('使用 --criteria-field 時必須同時指定 --value');
  }

  return {
    field: { api_name: field },
    comparator,
    value: LIST_COMPARATORS.includes(comparator) ? splitList(value) : value,
  };
}

export function parseFileType(value: string | undefined): BulkFileType | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value !== 'csv' && value !== 'ics') {
    throw new InputError(`不支援的檔案類型：${value}（可用：csv, ics）`);
  }
  return value;
}

export function createCreateCommand(): Command {
  return new Command('create')
    .description('建立 bulk read job')
    .argument('<module>', '模組 API 名稱（如 Tasks、Leads）')
    .argument('<name>', 'job 名稱（寫入紀錄檔）')
    .option('--fields <fields>', '匯出欄位，逗號分隔', 'id')
    .option('--criteria-field <field>', '篩選欄位 API 名稱（如 Due_Date）')
    .option('--comparator <comparator>', '篩選比較子', 'equal')
    .option('--value <value>', '篩選值（in / between 類比較子以逗號分隔）')
    .option('--page-token <token>', '接續前一個 job 的 next_page_token')
    .option('--file-type <type>', '結果檔案類型: csv | ics')
    .action(async (module: string, name: string, options: CreateOptions, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const criteria = buildCriteria(options.criteriaField, options.comparator, options.value);
        const fileType = parseFileType(options.fileType);
        const config = getConfigService();
        const service = new BulkReadService(getApiClient(config), new JobHistory(config.getJobHistoryPath()));

        const jobId = await service.createJob({
          module,
          name,
          fields: splitList(options.fields ?? 'id'),
          criteria,
          pageToken: options.pageToken,
          fileType,
        });

        if (format === 'json') {
          console.log(formatJSON({ success: true, jobId, module, name }));
        } else {
          console.log(`已建立 bulk read job：${jobId}`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });
}
