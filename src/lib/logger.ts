/**
 * Structured Logger - 結構化日誌系統
 * 特性：
 *   - JSON 格式輸出（一行一筆，易於機器解析）
 *   - 日誌級別控制（可由 --verbose / --quiet / ZCRM_LOG_LEVEL 調整）
 *   - 一律寫入 stderr，stdout 保留給指令輸出
 *   - 性能監控 (duration)
 *   - 錯誤堆棧記錄
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 操作類型 (GET, POST, DELETE...) */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 自定義輸出函數 (default: process.stderr) */
  write?: (line: string) => void;
  /** 是否包含堆棧追蹤 (default: false) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_PRIORITY;
}

const defaultWrite = (line: string): void => {
  process.stderr.write(line + '\n');
};

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'warn',
      write: config.write || defaultWrite,
      includeStack: config.includeStack === true,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    this.config.write(JSON.stringify(entry));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * 記錄 ERROR 級別日誌
   */
  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context,
    };

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: error.message,
        code,
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context,
    });
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.info(`${operation} completed`, { ...context, duration: Date.now() - startTime });
      return result;
    } catch (error) {
      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    }
  }
}

function initialLevel(): LogLevel {
  const env = process.env.ZCRM_LOG_LEVEL;
  return isLogLevel(env) ? env : 'warn';
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  api: new StructuredLogger('API', { minLevel: initialLevel() }),
  auth: new StructuredLogger('Auth', { minLevel: initialLevel() }),
  bulk: new StructuredLogger('Bulk', { minLevel: initialLevel() }),
  cli: new StructuredLogger('CLI', { minLevel: initialLevel() }),
};

/**
 * 一次調整所有預設記錄器的級別
 */
export function setLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

/**
 * 大小格式化輔助函數
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + sizes[i];
}
