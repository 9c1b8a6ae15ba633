/**
 * Token Store
 * Token 快取檔 - 以 JSON 形式保存 access token 與絕對過期時間
 */

import fs from 'node:fs';
import path from 'node:path';
import type { CachedToken } from '../types/auth.js';

function isCachedToken(value: unknown): value is CachedToken {
  if (!value || typeof value !== 'object' || !('access_token' in value) || !('expires_at' in value)) {
    return false;
  }
  return (
    typeof value.access_token === 'string' &&
    value.access_token.length > 0 &&
    typeof value.expires_at === 'number' &&
    Number.isFinite(value.expires_at)
  );
}

export class FileTokenStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * 讀取快取的 token
   * 檔案不存在、無法讀取或格式錯誤時返回 null
   */
  load(): CachedToken | null {
    try {
      if (!fs.existsSync(this.filePath)) {
        return null;
      }
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      return isCachedToken(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  /**
   * 覆寫快取的 token
   */
  save(token: CachedToken): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(token), { encoding: 'utf-8', mode: 0o600 });
  }

  /**
   * 刪除快取檔
   */
  clear(): void {
    if (fs.existsSync(this.filePath)) {
      fs.unlinkSync(this.filePath);
    }
  }

  getPath(): string {
    return this.filePath;
  }
}
