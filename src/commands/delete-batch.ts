/**
 * Delete Batch Command
 * 依 CSV 中的 id 分批刪除記錄
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { getFormat } from '../lib/command-context.js';
import { BulkDeleteService, DEFAULT_ID_COLUMN, readIdsFromCsv } from '../services/bulk-delete.js';
import { formatJSON, reportError } from '../utils/output.js';

interface DeleteBatchOptions {
  column: string;
  workflow: boolean;
}

export function createDeleteBatchCommand(): Command {
  return new Command('delete_batch')
    .alias('delete-batch')
    .description('從 CSV 讀取記錄 ID，每 100 筆一批刪除')
    .argument('<module>', '模組 API 名稱')
    .argument('<file>', '含 ID 欄位的 CSV 檔')
    .option('--column <name>', 'ID 欄位名稱', DEFAULT_ID_COLUMN)
    .option('--no-workflow', '不觸發 workflow rules（wf_trigger=false）')
    .action(async (module: string, file: string, options: DeleteBatchOptions, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const ids = readIdsFromCsv(file, options.column);
        if (format === 'table') {
          console.log(`已從 ${file} 讀取 ${ids.length} 個 ID`);
        }

        const service = new BulkDeleteService(getApiClient());
        const summary = await service.deleteIds(module, ids, {
          triggerWorkflow: options.workflow,
          onBatch: (progress) => {
            if (format === 'table') {
              console.log(
                `DELETE [${progress.batchIndex + 1}/${progress.batchCount}] ${progress.size} 筆 → 成功 ${progress.deleted} 筆`
              );
            }
          },
        });

        if (format === 'json') {
          console.log(formatJSON({ success: true, module, ...summary }));
          return;
        }

        console.log(`刪除完成：共刪除 ${summary.deleted} 筆記錄`);
        if (summary.failedIds.length > 0) {
          console.log(`未刪除的 ID（${summary.failedIds.length}）：${summary.failedIds.join(', ')}`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });
}
