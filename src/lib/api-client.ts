/**
 * API Client Helper
 * 依設定建立共用的 AuthService / ZohoApiClient
 */

import { AuthService } from '../services/auth.js';
import { ZohoApiClient } from '../services/api.js';
import { FileTokenStore } from '../services/token-store.js';
import { getConfigService, ConfigService } from '../services/config.js';
import { ConfigError } from './errors.js';

export const MISSING_CREDENTIALS_MESSAGE = [
  '尚未設定 Zoho API 憑證',
  '請設定環境變數 ZOHO_CLIENT_ID、ZOHO_CLIENT_SECRET 和 ZOHO_REFRESH_TOKEN（可寫在 .env）',
  '或執行 zcrm-bulk config set <key> <value> 進行設定',
].join('\n');

let cachedAuth: AuthService | null = null;
let cachedClient: ZohoApiClient | null = null;

/**
 * 取得 AuthService 實例
 * @throws ConfigError 如果未設定 API 憑證
 */
export function getAuthService(config: ConfigService = getConfigService()): AuthService {
  if (cachedAuth) {
    return cachedAuth;
  }

  const credentials = config.getCredentials();
  if (!credentials) {
    throw new ConfigError(MISSING_CREDENTIALS_MESSAGE);
  }

  cachedAuth = new AuthService(credentials, {
    accountsUrl: config.getAccountsUrl(),
    store: new FileTokenStore(config.getTokenCachePath()),
  });
  return cachedAuth;
}

/**
 * 取得 ZohoApiClient 實例
 * @throws ConfigError 如果未設定 API 憑證
 */
export function getApiClient(config: ConfigService = getConfigService()): ZohoApiClient {
  if (!cachedClient) {
    cachedClient = new ZohoApiClient(getAuthService(config), config.getApiDomain());
  }
  return cachedClient;
}

/**
 * 清除快取的 Client（用於測試）
 */
export function clearApiClientCache(): void {
  cachedAuth = null;
  cachedClient = null;
}
