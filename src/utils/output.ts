/**
 * Output Formatter Module
 * 輸出格式化模組 - 支援 JSON、Table 格式與統一的錯誤輸出
 */

import Table from 'cli-table3';
import { isAppError } from '../lib/errors.js';

/**
 * 輸出格式類型
 */
export type OutputFormat = 'json' | 'table';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

/**
 * 計算字串顯示寬度（處理中文全形字元）
 */
export function getDisplayWidth(str: string): number {
  let width = 0;
  for (const char of str) {
    // CJK 字元佔 2 個寬度
    if (char.charCodeAt(0) > 0x7f) {
      width += 2;
    } else {
      width += 1;
    }
  }
  return width;
}

/**
 * 填充字串到指定寬度
 */
export function padString(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  const padding = Math.max(0, width - getDisplayWidth(str));
  if (padding === 0) return str;
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

/**
 * 格式化 JSON
 */
export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 兩欄的鍵值表格
 */
export function formatKeyValueTable(rows: Array<[string, string | number | boolean | null | undefined]>): string {
  const table = new Table({
    style: { head: ['cyan'] },
  });

  for (const [key, value] of rows) {
    table.push({ [key]: value === undefined || value === null ? '-' : String(value) });
  }

  return table.toString();
}

/**
 * 錯誤的 JSON 輸出結構
 */
export interface ErrorPayload {
  success: false;
  error: {
    code: string;
    message: string;
    status?: number;
  };
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (isAppError(error)) {
    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    return {
      success: false,
      error: { code: error.code, message: error.message, ...(status !== undefined ? { status } : {}) },
    };
  }
  return {
    success: false,
    error: {
      code: 'UNEXPECTED_ERROR',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * 輸出錯誤並將 exit code 設為 1
 */
export function reportError(error: unknown, format: OutputFormat): void {
  const payload = toErrorPayload(error);

  if (format === 'json') {
    console.log(formatJSON(payload, false));
  } else {
    console.error(`錯誤：${payload.error.message}`);
  }

  process.exitCode = 1;
}
