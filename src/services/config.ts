/**
 * Config Service
 * 設定管理服務 - 處理設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey, ZohoCredentials } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'zcrm-bulk');
const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'zcrm-bulk');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_API_DOMAIN = 'https://www.zohoapis.com';
export const DEFAULT_ACCOUNTS_URL = 'https://accounts.zoho.com';
export const DEFAULT_POLL_INTERVAL_SEC = 5;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'refreshToken',
  'apiDomain',
  'accountsUrl',
  'tokenCachePath',
  'jobHistoryPath',
  'format',
  'pollInterval',
];

/** 不應直接顯示的設定 */
export const SECRET_KEYS: readonly ConfigKey[] = ['clientSecret', 'refreshToken'];

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

/**
 * 取得非空的環境變數
 */
function env(name: string): string | undefined {
  const value = process.env[name];
  return value && value.length > 0 ? value : undefined;
}

const STRING_KEYS = [
  'clientId',
  'clientSecret',
  'refreshToken',
  'apiDomain',
  'accountsUrl',
  'tokenCachePath',
  'jobHistoryPath',
] as const satisfies readonly ConfigKey[];

/**
 * 只保留型別正確的設定值，其餘忽略
 */
export function toAppConfig(value: unknown): AppConfig {
  const config: AppConfig = {};
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return config;
  }

  const entries = new Map<string, unknown>(Object.entries(value));
  for (const key of STRING_KEYS) {
    const item = entries.get(key);
    if (typeof item === 'string') {
      config[key] = item;
    }
  }

  const format = entries.get('format');
  if (format === 'json' || format === 'table') {
    config.format = format;
  }
  const pollInterval = entries.get('pollInterval');
  if (typeof pollInterval === 'number' && Number.isFinite(pollInterval) && pollInterval >= 0) {
    config.pollInterval = pollInterval;
  }

  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || env('ZCRM_CONFIG') || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔
   */
  private load(): AppConfig {
    try {
      if (fs.existsSync(this.configPath)) {
        const content = fs.readFileSync(this.configPath, 'utf-8');
        return toAppConfig(JSON.parse(content));
      }
    } catch {
      // 設定檔損毀時視為空設定，下次 set 會覆寫
    }
    return {};
  }

  /**
   * 儲存設定檔
   */
  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得 Client ID（優先環境變數）
   */
  getClientId(): string | undefined {
    return env('ZOHO_CLIENT_ID') ?? this.config.clientId;
  }

  /**
   * 取得 Client Secret（優先環境變數）
   */
  getClientSecret(): string | undefined {
    return env('ZOHO_CLIENT_SECRET') ?? this.config.clientSecret;
  }

  /**
   * 取得 Refresh Token（優先環境變數）
   */
  getRefreshToken(): string | undefined {
    return env('ZOHO_REFRESH_TOKEN') ?? this.config.refreshToken;
  }

  /**
   * 取得 CRM API 網域
   * ZOHO_API_DOMAIN > ZOHO_BASE_URL > 設定檔 > 預設值
   */
  getApiDomain(): string {
    const domain = env('ZOHO_API_DOMAIN') ?? env('ZOHO_BASE_URL') ?? this.config.apiDomain ?? DEFAULT_API_DOMAIN;
    return domain.replace(/\/+$/, '');
  }

  /**
   * 取得 OAuth 帳號伺服器
   */
  getAccountsUrl(): string {
    const url = env('ZOHO_ACCOUNTS_URL') ?? this.config.accountsUrl ?? DEFAULT_ACCOUNTS_URL;
    return url.replace(/\/+$/, '');
  }

  getTokenCachePath(): string {
    return env('ZOHO_TOKEN_CACHE') ?? this.config.tokenCachePath ?? path.join(DEFAULT_CACHE_DIR, 'token.json');
  }

  getJobHistoryPath(): string {
    return env('ZOHO_JOB_HISTORY') ?? this.config.jobHistoryPath ?? path.join(DEFAULT_CONFIG_DIR, 'jobs-history.json');
  }

  getPollIntervalMs(): number {
    const seconds = this.config.pollInterval ?? DEFAULT_POLL_INTERVAL_SEC;
    return seconds * 1000;
  }

  /**
   * 取得完整憑證；任一項缺少即返回 null
   */
  getCredentials(): ZohoCredentials | null {
    const clientId = this.getClientId();
    const clientSecret = this.getClientSecret();
    const refreshToken = this.getRefreshToken();

    if (!clientId || !clientSecret || !refreshToken) {
      return null;
    }
    return { clientId, clientSecret, refreshToken };
  }
}

// 預設實例
let defaultInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService();
  }
  return defaultInstance;
}

/**
 * 清除預設實例（用於測試）
 */
export function clearConfigServiceCache(): void {
  defaultInstance = null;
}
