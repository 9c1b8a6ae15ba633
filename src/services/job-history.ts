/**
 * Job History
 * Bulk read job 建立紀錄 - 只追加，程式本身不讀回使用
 */

import fs from 'node:fs';
import path from 'node:path';
import type { JobRecord } from '../types/api.js';

export class JobHistory {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * 追加一筆紀錄；既有檔案不是 JSON 陣列時以新陣列取代
   */
  append(record: JobRecord): void {
    const history = this.readExisting();
    history.push(record);

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.filePath, JSON.stringify(history, null, 2), 'utf-8');
  }

  getPath(): string {
    return this.filePath;
  }

  private readExisting(): unknown[] {
    try {
      if (!fs.existsSync(this.filePath)) {
        return [];
      }
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      return Array.isArray(parsed) ? parsed : [];
    } catch {
      return [];
    }
  }
}
