/**
 * Zoho CRM API Client
 * 帶認證的請求包裝 - 401 時強制換發 token 並重試一次，其餘錯誤直接拋出
 * ofetch 內建的重試一律關閉（retry: 0）
 */

import fs from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ofetch, FetchError } from 'ofetch';
import { AuthService } from './auth.js';
import { ApiError, AppError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

const REQUEST_TIMEOUT_MS = 60 * 1000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestOptions {
  query?: QueryParams;
  body?: Record<string, unknown>;
}

/**
 * 判斷是否為 401 Unauthorized
 */
export function isUnauthorized(error: unknown): boolean {
  return error instanceof FetchError && (error.status ?? error.statusCode) === 401;
}

/**
 * 將 ofetch 錯誤轉為 ApiError；已是 AppError（如 AuthError）者原樣返回
 */
export function toApiError(error: unknown, method: HttpMethod, url: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof FetchError) {
    const status = error.status ?? error.statusCode;
    return new ApiError(`${method} ${url} 失敗：HTTP ${status ?? 'n/a'}`, {
      url,
      status,
      body: error.data,
      cause: error,
    });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ApiError(`${method} ${url} 失敗：${reason}`, { url, cause: error });
}

export class ZohoApiClient {
  private auth: AuthService;
  private apiDomain: string;

  constructor(auth: AuthService, apiDomain: string) {
    this.auth = auth;
    this.apiDomain = apiDomain;
  }

  get<T>(endpoint: string, query?: QueryParams): Promise<T> {
    return this.request<T>('GET', endpoint, { query });
  }

  post<T>(endpoint: string, body: Record<string, unknown>): Promise<T> {
    return this.request<T>('POST', endpoint, { body });
  }

  delete<T>(endpoint: string, query?: QueryParams): Promise<T> {
    return this.request<T>('DELETE', endpoint, { query });
  }

  /**
   * 發送帶認證的 API 請求
   */
  async request<T>(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<T> {
    const url = this.resolveUrl(endpoint);
    const startTime = Date.now();

    loggers.api.debug('API request started', { method, url, query: options.query });

    try {
      const result = await this.withAuthRetry(method, url, (token) =>
        ofetch<T>(url, {
          method,
          headers: this.authHeaders(token),
          query: options.query,
          body: options.body,
          timeout: REQUEST_TIMEOUT_MS,
          retry: 0,
        })
      );

      loggers.api.info('API request completed', {
        method,
        url,
        duration: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      const apiError = toApiError(error, method, url);
      loggers.api.error('API request failed', apiError, {
        method,
        url,
        duration: Date.now() - startTime,
        statusCode: apiError instanceof ApiError ? apiError.status : undefined,
      });
      throw apiError;
    }
  }

  /**
   * 下載檔案（串流寫入 destination），返回寫入的位元組數
   */
  async download(endpoint: string, destination: string): Promise<number> {
    const url = this.resolveUrl(endpoint);

    const stream = await this.withAuthRetry('GET', url, (token) =>
      ofetch(url, {
        headers: this.authHeaders(token),
        responseType: 'stream',
        timeout: REQUEST_TIMEOUT_MS,
        retry: 0,
      })
    ).catch((error: unknown) => {
      throw toApiError(error, 'GET', url);
    });

    try {
      await pipeline(Readable.fromWeb(stream), fs.createWriteStream(destination));
    } catch (error) {
      // 不留下截斷的檔案
      fs.rmSync(destination, { force: true });
      const apiError = toApiError(error, 'GET', url);
      loggers.api.error('Download failed', apiError, { url, destination });
      throw apiError;
    }

    const bytes = fs.statSync(destination).size;
    loggers.api.info('Download completed', { url, destination, bytes });
    return bytes;
  }

  /**
   * 執行請求；若回應 401 則強制換發 token 後再試一次
   * 第二次失敗（包含再次 401）直接拋出
   */
  private async withAuthRetry<T>(
    method: HttpMethod,
    url: string,
    send: (token: string) => Promise<T>
  ): Promise<T> {
    const token = await this.auth.getToken();

    try {
      return await send(token);
    } catch (error) {
      if (!isUnauthorized(error)) {
        throw error;
      }
    }

    loggers.api.warn('Access token rejected, refreshing', { method, url });
    const refreshed = await this.auth.getToken(true);
    return send(refreshed);
  }

  private authHeaders(token: string): Record<string, string> {
    return { Authorization: `Zoho-oauthtoken ${token}` };
  }

  /**
   * 端點可為路徑（/crm/v8/...）或完整 URL（部分 download_url）
   */
  private resolveUrl(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }
    const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    return `${this.apiDomain}${path}`;
  }
}
