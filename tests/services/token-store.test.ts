import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileTokenStore } from '../../src/services/token-store.js';

describe('FileTokenStore', () => {
  let testDir: string;
  let filePath: string;
  let store: FileTokenStore;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'zcrm-token-test-'));
    filePath = path.join(testDir, 'nested', 'token.json');
    store = new FileTokenStore(filePath);
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should return null when no cache file exists', () => {
    expect(store.load()).toBeNull();
  });

  it('should save and load a token, creating the directory', () => {
    store.save({ access_token: 'test-access', expires_at: 1700000000000 });

    expect(fs.existsSync(filePath)).toBe(true);
    expect(store.load()).toEqual({ access_token: 'test-access', expires_at: 1700000000000 });
  });

  it('should overwrite the previous token', () => {
    store.save({ access_token: 'first', expires_at: 1 });
    store.save({ access_token: 'second', expires_at: 2 });

    expect(store.load()).toEqual({ access_token: 'second', expires_at: 2 });
  });

  it('should treat malformed JSON as no token', () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{not json');

    expect(store.load()).toBeNull();
  });

  it.each([
    ['missing expires_at', { access_token: 'abc' }],
    ['empty access_token', { access_token: '', expires_at: 1 }],
    ['string expires_at', { access_token: 'abc', expires_at: '1' }],
    ['array', [1, 2]],
  ])('should reject a cache file with %s', (_label, content) => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(content));

    expect(store.load()).toBeNull();
  });

  it('should delete the cache file on clear', () => {
    store.save({ access_token: 'test-access', expires_at: 1 });
    store.clear();

    expect(fs.existsSync(filePath)).toBe(false);
    expect(() => store.clear()).not.toThrow();
  });

  it('should expose its path', () => {
    expect(store.getPath()).toBe(filePath);
  });
});
