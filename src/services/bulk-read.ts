/**
 * Bulk Read Service
 * Bulk read job 生命週期：建立、輪詢狀態、下載結果
 */

import { ZohoApiClient } from './api.js';
import { JobHistory } from './job-history.js';
import { ApiError, BulkJobFailedError, JobNotReadyError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type {
  BulkCriteria,
  BulkFileType,
  BulkReadCreateResponse,
  BulkReadJob,
  BulkReadJobResponse,
  BulkReadRequest,
  BulkReadResult,
} from '../types/api.js';

const BULK_READ_ENDPOINT = '/crm/bulk/v8/read';

export const DEFAULT_POLL_INTERVAL_MS = 5 * 1000;

const FAILURE_STATES = new Set(['FAILURE', 'FAILED']);

export interface CreateJobOptions {
  module: string;
  /** 紀錄用名稱 */
  name: string;
  /** 匯出欄位，預設 ['id'] */
  fields?: string[];
  criteria?: BulkCriteria;
  /** 接續前一個 job 的下一頁 */
  pageToken?: string;
  fileType?: BulkFileType;
}

export interface WaitOptions {
  intervalMs?: number;
  /** 每次取得狀態後呼叫 */
  onPoll?: (job: BulkReadJob, attempt: number) => void;
}

export interface DownloadResult {
  jobId: string;
  file: string;
  bytes: number;
  page: number;
  count: number;
  moreRecords: boolean;
  nextPageToken?: string;
}

export function isCompleted(job: BulkReadJob): boolean {
  return job.state === 'COMPLETED';
}

export function isFailed(job: BulkReadJob): boolean {
  return FAILURE_STATES.has(job.state);
}

/**
 * 組出建立 job 的請求內容
 */
export function buildBulkReadRequest(options: CreateJobOptions): BulkReadRequest {
  const fields = options.fields && options.fields.length > 0 ? options.fields : ['id'];

  const request: BulkReadRequest = {
    query: {
      module: { api_name: options.module },
      fields,
    },
  };

  if (options.criteria) {
    request.query.criteria = options.criteria;
  }
  if (options.pageToken) {
    request.query.page_token = options.pageToken;
  }
  if (options.fileType) {
    request.file_type = options.fileType;
  }

  return request;
}

/**
 * 下載檔名：{prefix}_page_{page}.zip
 */
export function resultFileName(outPrefix: string, page: number): string {
  return `${outPrefix}_page_${page}.zip`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class BulkReadService {
  private api: ZohoApiClient;
  private history: JobHistory;

  constructor(api: ZohoApiClient, history: JobHistory) {
    this.api = api;
    this.history = history;
  }

  /**
   * 建立 bulk read job，並將 { name, id, module } 追加到紀錄檔
   * @returns job id
   */
  async createJob(options: CreateJobOptions): Promise<string> {
    const request = buildBulkReadRequest(options);
    const response = await this.api.post<BulkReadCreateResponse>(BULK_READ_ENDPOINT, { ...request });

    const id = response.data?.[0]?.details?.id;
    if (!id) {
      throw new ApiError('建立 bulk read job 的回應缺少 job id', {
        url: BULK_READ_ENDPOINT,
        body: response,
      });
    }

    this.history.append({
      name: options.name,
      id,
      module: options.module,
      createdAt: new Date().toISOString(),
    });

    loggers.bulk.info('Bulk read job created', { jobId: id, module: options.module });
    return id;
  }

  /**
   * 取得 job 目前狀態
   */
  async getJob(jobId: string): Promise<BulkReadJob> {
    const response = await this.api.get<BulkReadJobResponse>(`${BULK_READ_ENDPOINT}/${encodeURIComponent(jobId)}`);
    const job = response.data?.[0];
    if (!job) {
      throw new ApiError(`找不到 bulk read job：${jobId}`, {
        url: `${BULK_READ_ENDPOINT}/${jobId}`,
        body: response,
      });
    }
    return job;
  }

  /**
   * 以固定間隔輪詢，直到 job 進入終止狀態
   * COMPLETED 返回 result；FAILURE / FAILED 拋出 BulkJobFailedError
   */
  async waitForCompletion(jobId: string, options: WaitOptions = {}): Promise<BulkReadResult> {
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    let attempt = 0;

    for (;;) {
      attempt++;
      const job = await this.getJob(jobId);
      options.onPoll?.(job, attempt);
      loggers.bulk.debug('Bulk read job polled', { jobId, state: job.state, attempt });

      if (isCompleted(job)) {
        return this.requireResult(job);
      }
      if (isFailed(job)) {
        throw new BulkJobFailedError(jobId, job.state);
      }

      await sleep(intervalMs);
    }
  }

  /**
   * 下載已完成 job 的結果壓縮檔
   */
  async downloadResult(jobId: string, outPrefix: string): Promise<DownloadResult> {
    const job = await this.getJob(jobId);
    if (!isCompleted(job)) {
      throw new JobNotReadyError(jobId, job.state);
    }

    const result = this.requireResult(job);
    const file = resultFileName(outPrefix, result.page);
    const bytes = await this.api.download(result.download_url, file);

    loggers.bulk.info('Bulk read result downloaded', { jobId, file, bytes });

    return {
      jobId,
      file,
      bytes,
      page: result.page,
      count: result.count,
      moreRecords: result.more_records === true,
      nextPageToken: result.next_page_token ?? undefined,
    };
  }

  private requireResult(job: BulkReadJob): BulkReadResult {
    if (!job.result) {
      throw new ApiError(`Job ${job.id} 已完成但回應缺少 result`, {
        url: `${BULK_READ_ENDPOINT}/${job.id}`,
        body: job,
      });
    }
    return job.result;
  }
}
