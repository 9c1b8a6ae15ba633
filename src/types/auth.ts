/**
 * OAuth2 Token Response
 * Zoho 在 refresh token 失效時仍可能回傳 200，並以 error 欄位表示失敗
 */
export interface TokenResponse {
  access_token?: string;
  expires_in?: number;
  api_domain?: string;
  token_type?: string;
  error?: string;
}

/**
 * Cached Token with expiry（寫入 token 快取檔的格式）
 */
export interface CachedToken {
  access_token: string;
  expires_at: number; // Unix timestamp (ms)
}
