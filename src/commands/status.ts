/**
 * Status Command
 * 輪詢 bulk read job 狀態直到完成或失敗
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { getConfigService } from '../services/config.js';
import { BulkReadService } from '../services/bulk-read.js';
import { JobHistory } from '../services/job-history.js';
import { getFormat } from '../lib/command-context.js';
import { InputError } from '../lib/errors.js';
import { formatJSON, formatKeyValueTable, reportError } from '../utils/output.js';
import type { BulkReadJob, BulkReadResult } from '../types/api.js';

interface StatusOptions {
  interval?: string;
  wait: boolean;
}

/**
 * 解析 --interval（秒）為毫秒
 */
export function parseIntervalMs(value: string | undefined, fallbackMs: number): number {
  if (value === undefined) {
    return fallbackMs;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InputError(`無效的輪詢間隔：${value}`);
  }
  return seconds * 1000;
}

function printResultTable(jobId: string, result: BulkReadResult): void {
  console.log(`\nJob ${jobId} 已完成\n`);
  console.log(
    formatKeyValueTable([
      ['page', result.page],
      ['count', result.count],
      ['per_page', result.per_page],
      ['more_records', result.more_records],
      ['next_page_token', result.next_page_token],
      ['download_url', result.download_url],
    ])
  );
}

function printJobTable(job: BulkReadJob): void {
  console.log(
    formatKeyValueTable([
      ['id', job.id],
      ['state', job.state],
      ['module', job.query?.module.api_name],
      ['created_time', job.created_time],
      ['count', job.result?.count],
      ['more_records', job.result?.more_records],
    ])
  );
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('查詢 bulk read job 狀態（預設持續輪詢直到完成）')
    .argument('<jobId>', 'bulk read job ID')
    .option('--interval <seconds>', '輪詢間隔（秒）')
    .option('--no-wait', '只查詢一次目前狀態')
    .action(async (jobId: string, options: StatusOptions, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const config = getConfigService();
        const service = new BulkReadService(getApiClient(config), new JobHistory(config.getJobHistoryPath()));

        if (!options.wait) {
          const job = await service.getJob(jobId);
          if (format === 'json') {
            console.log(formatJSON({ success: true, job }));
          } else {
            printJobTable(job);
          }
          return;
        }

        const intervalMs = parseIntervalMs(options.interval, config.getPollIntervalMs());
        const result = await service.waitForCompletion(jobId, {
          intervalMs,
          onPoll: (job, attempt) => {
            if (format === 'table') {
              console.log(`輪詢 #${attempt}：${job.state}`);
            }
          },
        });

        if (format === 'json') {
          console.log(formatJSON({ success: true, jobId, state: 'COMPLETED', result }));
        } else {
          printResultTable(jobId, result);
        }
      } catch (error) {
        reportError(error, format);
      }
    });
}
