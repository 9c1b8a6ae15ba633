/**
 * Command Context
 * 取得全域選項（輸出格式、日誌級別）
 */

import type { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { isOutputFormat, type OutputFormat } from '../utils/output.js';
import { setLogLevel } from './logger.js';

export interface GlobalOptions {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * 輸出格式：--format > 設定檔 format > table
 */
export function getFormat(cmd: Command): OutputFormat {
  const { format } = cmd.optsWithGlobals<GlobalOptions>();
  if (isOutputFormat(format)) {
    return format;
  }
  const configured = getConfigService().get('format');
  return isOutputFormat(configured) ? configured : 'table';
}

/**
 * 依 --verbose / --quiet 調整日誌級別
 */
export function applyLogLevel(cmd: Command): void {
  const { quiet, verbose } = cmd.optsWithGlobals<GlobalOptions>();
  if (verbose) {
    setLogLevel('debug');
  } else if (quiet) {
    setLogLevel('error');
  }
}
