/**
 * Auth Service
 * OAuth2 認證服務 - 以 refresh token 換發 Zoho access token 並快取於磁碟
 */

import { ofetch, FetchError } from 'ofetch';
import { FileTokenStore } from './token-store.js';
import { AuthError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { TokenResponse, CachedToken } from '../types/auth.js';
import type { ZohoCredentials } from '../types/config.js';

// Token 到期前 30 秒即視為失效，提早換發
export const TOKEN_EXPIRY_SKEW_MS = 30 * 1000;

// 回應未帶 expires_in 時的預設有效期（秒）
const DEFAULT_EXPIRES_IN_SEC = 3600;

const TOKEN_REQUEST_TIMEOUT_MS = 30 * 1000;

export interface AuthServiceOptions {
  /** OAuth 帳號伺服器，如 https://accounts.zoho.com */
  accountsUrl: string;
  store: FileTokenStore;
  /** 取得目前時間（測試用） */
  now?: () => number;
}

/**
 * 判斷快取的 token 是否仍可使用：(expires_at - now) > skew
 */
export function isTokenFresh(token: CachedToken, now: number, skewMs: number = TOKEN_EXPIRY_SKEW_MS): boolean {
  return token.expires_at - now > skewMs;
}

export class AuthService {
  private credentials: ZohoCredentials;
  private accountsUrl: string;
  private store: FileTokenStore;
  private now: () => number;

  constructor(credentials: ZohoCredentials, options: AuthServiceOptions) {
    this.credentials = credentials;
    this.accountsUrl = options.accountsUrl;
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  /**
   * 取得有效的 Access Token
   * - 未強制更新且快取有效：直接返回
   * - 否則以 refresh token 換發新 token，寫入快取後返回
   */
  async getToken(forceRefresh = false): Promise<string> {
    if (!forceRefresh) {
      const cached = this.store.load();
      if (cached && isTokenFresh(cached, this.now())) {
        loggers.auth.debug('Using cached access token', { expiresAt: cached.expires_at });
        return cached.access_token;
      }
    }

    return this.refresh();
  }

  /**
   * 換發並保存新的 token
   */
  async refresh(): Promise<string> {
    const response = await loggers.auth.trackAsync('Token refresh', () => this.requestToken());

    if (!response.access_token) {
      throw new AuthError(`Token 換發失敗：${response.error ?? '回應缺少 access_token'}`);
    }

    const expiresIn =
      typeof response.expires_in === 'number' && response.expires_in > 0
        ? response.expires_in
        : DEFAULT_EXPIRES_IN_SEC;

    this.store.save({
      access_token: response.access_token,
      expires_at: this.now() + expiresIn * 1000,
    });

    return response.access_token;
  }

  /**
   * 取得快取中的 token（不論是否過期）
   */
  getCachedToken(): CachedToken | null {
    return this.store.load();
  }

  /**
   * 清除快取的 token
   */
  clearCache(): void {
    this.store.clear();
  }

  /**
   * 請求新的 token
   */
  private async requestToken(): Promise<TokenResponse> {
    const body = new URLSearchParams({
      refresh_token: this.credentials.refreshToken,
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      grant_type: 'refresh_token',
    }).toString();

    try {
      return await ofetch<TokenResponse>(`${this.accountsUrl}/oauth/v2/token`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body,
        timeout: TOKEN_REQUEST_TIMEOUT_MS,
      });
    } catch (error) {
      if (error instanceof FetchError) {
        throw new AuthError(`Token 換發失敗：HTTP ${error.status ?? 'n/a'}`, {
          status: error.status,
          cause: error,
        });
      }
      throw new AuthError(`Token 換發失敗：${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
}
