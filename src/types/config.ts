/**
 * 設定檔結構
 */
export interface AppConfig {
  /** Zoho OAuth Client ID */
  clientId?: string;
  /** Zoho OAuth Client Secret */
  clientSecret?: string;
  /** Zoho OAuth Refresh Token */
  refreshToken?: string;
  /** CRM API 網域（如 https://www.zohoapis.eu） */
  apiDomain?: string;
  /** OAuth 帳號伺服器（如 https://accounts.zoho.eu） */
  accountsUrl?: string;
  /** Token 快取檔路徑 */
  tokenCachePath?: string;
  /** Bulk read job 紀錄檔路徑 */
  jobHistoryPath?: string;
  /** 預設輸出格式 */
  format?: 'json' | 'table';
  /** 輪詢 job 狀態的間隔（秒） */
  pollInterval?: number;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;

/**
 * 呼叫 Zoho 所需的完整憑證
 */
export interface ZohoCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}
