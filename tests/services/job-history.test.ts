import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JobHistory } from '../../src/services/job-history.js';
import type { JobRecord } from '../../src/types/api.js';

const first: JobRecord = { name: 'tasks-export', id: '111', module: 'Tasks', createdAt: '2024-01-01T00:00:00.000Z' };
const second: JobRecord = { name: 'leads-export', id: '222', module: 'Leads', createdAt: '2024-01-02T00:00:00.000Z' };

describe('JobHistory', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'zcrm-history-test-'));
    filePath = path.join(testDir, 'sub', 'jobs-history.json');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function readHistory(): unknown {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  }

  it('should create the file with a single record', () => {
    new JobHistory(filePath).append(first);

    expect(readHistory()).toEqual([first]);
  });

  it('should keep earlier records when appending', () => {
    const history = new JobHistory(filePath);
    history.append(first);
    history.append(second);

    expect(readHistory()).toEqual([first, second]);
  });

  it('should write pretty-printed JSON with 2-space indent', () => {
    new JobHistory(filePath).append(first);

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(JSON.stringify([first], null, 2));
  });

  it('should replace a file that is not a JSON array', () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{"name":"old"}');

    new JobHistory(filePath).append(second);

    expect(readHistory()).toEqual([second]);
  });

  it('should replace a corrupt file', () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '[{"name":');

    new JobHistory(filePath).append(first);

    expect(readHistory()).toEqual([first]);
  });
});
