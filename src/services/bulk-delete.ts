/**
 * Bulk Delete Service
 * 從 CSV 讀取 record id，每 100 筆一批依序呼叫 DELETE /crm/v8/{module}
 * 任一批失敗即中止，不續刪後面的批次
 */

import fs from 'node:fs';
import { ZohoApiClient } from './api.js';
import { chunk } from '../lib/chunk.js';
import { parseCsv } from '../lib/csv.js';
import { BatchDeleteError, InputError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { DeleteRecordsResponse } from '../types/api.js';

/** Zoho 單次刪除上限 */
export const DELETE_BATCH_SIZE = 100;

export const DEFAULT_ID_COLUMN = 'Id';

export interface DeleteOptions {
  /** 是否觸發 workflow rules（wf_trigger），預設 true */
  triggerWorkflow?: boolean;
  /** 每批完成後呼叫 */
  onBatch?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  batchIndex: number;
  batchCount: number;
  size: number;
  deleted: number;
  failedIds: string[];
}

export interface DeleteSummary {
  total: number;
  deleted: number;
  batches: number;
  failedIds: string[];
}

/**
 * 從 CSV 讀取指定欄位的 id
 */
export function readIdsFromCsv(filePath: string, column: string = DEFAULT_ID_COLUMN): string[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new InputError(`無法讀取檔案：${filePath}`, { cause: error });
  }

  const { headers, rows } = parseCsv(content);
  if (!headers.includes(column)) {
    throw new InputError(`檔案必須包含名為 '${column}' 的欄位（實際欄位：${headers.join(', ') || '無'}）`);
  }

  return rows.map((row) => row[column].trim()).filter((id) => id.length > 0);
}

/**
 * 統計單批回應中成功刪除的筆數
 * 回應未帶逐筆結果時以整批視為成功
 */
export function summarizeBatch(batch: string[], response: DeleteRecordsResponse | undefined): {
  deleted: number;
  failedIds: string[];
} {
  const results = response?.data;
  if (!results || results.length === 0) {
    return { deleted: batch.length, failedIds: [] };
  }

  const failedIds: string[] = [];
  let deleted = 0;
  results.forEach((result, index) => {
    if (result.status === 'success') {
      deleted++;
    } else {
      // 回應筆數多於本批 id 時，多出的結果沒有對應 id，略過
      const id = result.details?.id ?? batch[index];
      if (id) {
        failedIds.push(id);
      }
    }
  });

  return { deleted, failedIds };
}

export class BulkDeleteService {
  private api: ZohoApiClient;

  constructor(api: ZohoApiClient) {
    this.api = api;
  }

  /**
   * 依序分批刪除
   * @throws BatchDeleteError 某批失敗時（帶有先前已刪除筆數）
   */
  async deleteIds(module: string, ids: string[], options: DeleteOptions = {}): Promise<DeleteSummary> {
    const batches = chunk(ids, DELETE_BATCH_SIZE);
    const triggerWorkflow = options.triggerWorkflow !== false;
    const endpoint = `/crm/v8/${encodeURIComponent(module)}`;

    let deleted = 0;
    const failedIds: string[] = [];

    for (const [batchIndex, batch] of batches.entries()) {
      let response: DeleteRecordsResponse | undefined;
      try {
        response = await this.api.delete<DeleteRecordsResponse | undefined>(endpoint, {
          ids: batch.join(','),
          wf_trigger: triggerWorkflow,
        });
      } catch (error) {
        loggers.bulk.error('Delete batch failed', error instanceof Error ? error : null, {
          module,
          batchIndex,
          size: batch.length,
          deletedBefore: deleted,
        });
        throw new BatchDeleteError(batchIndex, deleted, error);
      }

      const summary = summarizeBatch(batch, response);
      deleted += summary.deleted;
      failedIds.push(...summary.failedIds);

      if (summary.failedIds.length > 0) {
        loggers.bulk.warn('Some records were not deleted', {
          module,
          batchIndex,
          failed: summary.failedIds.length,
        });
      }

      options.onBatch?.({
        batchIndex,
        batchCount: batches.length,
        size: batch.length,
        deleted: summary.deleted,
        failedIds: summary.failedIds,
      });
    }

    return { total: ids.length, deleted, batches: batches.length, failedIds };
  }
}
