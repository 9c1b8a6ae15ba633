/**
 * Errors
 * 所有錯誤皆帶有 code，指令層據此輸出 { success: false, error: { code, message } }
 */

export type ErrorCode =
  | 'API_ERROR'
  | 'AUTH_ERROR'
  | 'INPUT_ERROR'
  | 'JOB_FAILED'
  | 'JOB_NOT_READY'
  | 'DELETE_FAILED'
  | 'CONFIG_MISSING';

export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
  }
}

/**
 * HTTP 呼叫失敗（非 2xx、網路錯誤、逾時）
 */
export class ApiError extends AppError {
  public readonly status?: number;
  public readonly url: string;
  public readonly body?: unknown;

  constructor(
    message: string,
    details: { url: string; status?: number; body?: unknown; cause?: unknown }
  ) {
    super('API_ERROR', message, { cause: details.cause });
    this.name = 'ApiError';
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
  }
}

/**
 * Refresh token 換發 access token 失敗
 */
export class AuthError extends AppError {
  public readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('AUTH_ERROR', message, { cause: options?.cause });
    this.name = 'AuthError';
    this.status = options?.status;
  }
}

/**
 * 使用者輸入問題（CSV 欄位、檔案、參數值）
 */
export class InputError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT_ERROR', message, options);
    this.name = 'InputError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_MISSING', message);
    this.name = 'ConfigError';
  }
}

/**
 * Bulk read job 進入失敗狀態
 */
export class BulkJobFailedError extends AppError {
  public readonly jobId: string;
  public readonly state: string;

  constructor(jobId: string, state: string) {
    super('JOB_FAILED', `Bulk read job ${jobId} 失敗（狀態：${state}）`);
    this.name = 'BulkJobFailedError';
    this.jobId = jobId;
    this.state = state;
  }
}

/**
 * Job 尚未完成，無法下載結果
 */
export class JobNotReadyError extends AppError {
  public readonly jobId: string;
  public readonly state: string;

  constructor(jobId: string, state: string) {
    super('JOB_NOT_READY', `Job ${jobId} 尚未完成，目前狀態：${state}`);
    this.name = 'JobNotReadyError';
    this.jobId = jobId;
    this.state = state;
  }
}

/**
 * 批次刪除中途失敗；之後的批次不再執行
 */
export class BatchDeleteError extends AppError {
  public readonly batchIndex: number;
  public readonly deletedBefore: number;

  constructor(batchIndex: number, deletedBefore: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'DELETE_FAILED',
      `第 ${batchIndex + 1} 批刪除失敗（先前已刪除 ${deletedBefore} 筆）：${reason}`,
      { cause }
    );
    this.name = 'BatchDeleteError';
    this.batchIndex = batchIndex;
    this.deletedBefore = deletedBefore;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
