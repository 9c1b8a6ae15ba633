/**
 * Download Command
 * 下載已完成 bulk read job 的結果壓縮檔
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { getConfigService } from '../services/config.js';
import { BulkReadService } from '../services/bulk-read.js';
import { JobHistory } from '../services/job-history.js';
import { getFormat } from '../lib/command-context.js';
import { formatBytes } from '../lib/logger.js';
import { formatJSON, reportError } from '../utils/output.js';

export function createDownloadCommand(): Command {
  return new Command('download')
    .description('下載 bulk read job 結果（檔名：<outPrefix>_page_<page>.zip）')
    .argument('<jobId>', 'bulk read job ID')
    .argument('<outPrefix>', '輸出檔名前綴')
    .action(async (jobId: string, outPrefix: string, _options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const config = getConfigService();
        const service = new BulkReadService(getApiClient(config), new JobHistory(config.getJobHistoryPath()));

        if (format === 'table') {
          console.log(`正在下載 job ${jobId} 的結果...`);
        }

        const download = await service.downloadResult(jobId, outPrefix);

        if (format === 'json') {
          console.log(formatJSON({ success: true, ...download }));
          return;
        }

        console.log(`已下載第 ${download.page} 頁 → ${download.file}（${formatBytes(download.bytes)}，${download.count} 筆）`);
        if (download.moreRecords && download.nextPageToken) {
          console.log(`尚有更多資料，可執行 create --page-token ${download.nextPageToken} 取得下一頁`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });
}
