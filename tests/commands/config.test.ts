import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { applyConfigValue, maskSecret } from '../../src/commands/config.js';
import { clearConfigServiceCache, getConfigService } from '../../src/services/config.js';
import { InputError } from '../../src/lib/errors.js';

describe('Config Command', () => {
  describe('maskSecret', () => {
    it('should keep only the last four characters', () => {
      expect(maskSecret('test-secret')).toBe('****cret');
    });

    it('should fully mask short values', () => {
      expect(maskSecret('abcd')).toBe('****');
    });
  });

  describe('applyConfigValue', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'zcrm-config-cmd-'));
      vi.stubEnv('ZCRM_CONFIG', path.join(testDir, 'config.json'));
      clearConfigServiceCache();
    });

    afterEach(() => {
      vi.unstubAllEnvs();
      clearConfigServiceCache();
      fs.rmSync(testDir, { recursive: true, force: true });
    });

    it('should store pollInterval as a number', () => {
      applyConfigValue('pollInterval', '10');
      expect(getConfigService().get('pollInterval')).toBe(10);
    });

    it('should reject a negative pollInterval', () => {
      expect(() => applyConfigValue('pollInterval', '-3')).toThrow(InputError);
    });

    it('should validate format', () => {
      applyConfigValue('format', 'json');
      expect(getConfigService().get('format')).toBe('json');
      expect(() => applyConfigValue('format', 'yaml')).toThrow('format 只能是 json 或 table：yaml');
    });

    it('should store string settings as-is', () => {
      applyConfigValue('apiDomain', 'https://www.zohoapis.eu');
      expect(getConfigService().get('apiDomain')).toBe('https://www.zohoapis.eu');
    });
  });
});
