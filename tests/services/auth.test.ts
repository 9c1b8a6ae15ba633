import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Mock ofetch with FetchError
vi.mock('ofetch', () => {
  class FetchError extends Error {
    status?: number;
    statusCode?: number;
    data?: unknown;

    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }

  return {
    ofetch: vi.fn(),
    FetchError,
  };
});

import { ofetch, FetchError } from 'ofetch';
import { AuthService, isTokenFresh, TOKEN_EXPIRY_SKEW_MS } from '../../src/services/auth.js';
import { FileTokenStore } from '../../src/services/token-store.js';
import { AuthError } from '../../src/lib/errors.js';

describe('AuthService', () => {
  const NOW = 1_700_000_000_000;
  const credentials = {
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    refreshToken: 'test-refresh-token',
  };

  let testDir: string;
  let store: FileTokenStore;
  let authService: AuthService;

  beforeEach(() => {
    vi.clearAllMocks();
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'zcrm-auth-test-'));
    store = new FileTokenStore(path.join(testDir, 'token.json'));
    authService = new AuthService(credentials, {
      accountsUrl: 'https://accounts.zoho.com',
      store,
      now: () => NOW,
    });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('getToken', () => {
    it('should request new token when no cached token', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'new-token-123', expires_in: 3600 });

      const token = await authService.getToken();

      expect(token).toBe('new-token-123');
      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(ofetch).toHaveBeenCalledWith(
        'https://accounts.zoho.com/oauth/v2/token',
        expect.objectContaining({ method: 'POST' })
      );
    });

    it('should persist the new token with absolute expiry', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'new-token-123', expires_in: 3600 });

      await authService.getToken();

      expect(store.load()).toEqual({ access_token: 'new-token-123', expires_at: NOW + 3600 * 1000 });
    });

    it('should return cached token while expiry minus now exceeds the skew', async () => {
      store.save({ access_token: 'cached-token', expires_at: NOW + TOKEN_EXPIRY_SKEW_MS + 1 });

      const token = await authService.getToken();

      expect(token).toBe('cached-token');
      expect(ofetch).not.toHaveBeenCalled();
    });

    it('should refresh when remaining lifetime equals the skew', async () => {
      store.save({ access_token: 'almost-expired', expires_at: NOW + TOKEN_EXPIRY_SKEW_MS });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'renewed', expires_in: 3600 });

      const token = await authService.getToken();

      expect(token).toBe('renewed');
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should refresh when cached token is expired', async () => {
      store.save({ access_token: 'expired', expires_at: NOW - 1000 });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'renewed', expires_in: 3600 });

      expect(await authService.getToken()).toBe('renewed');
    });

    it('should bypass the cache when forceRefresh is set', async () => {
      store.save({ access_token: 'still-valid', expires_at: NOW + 60 * 60 * 1000 });
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'forced', expires_in: 3600 });

      const token = await authService.getToken(true);

      expect(token).toBe('forced');
      expect(store.load()?.access_token).toBe('forced');
    });

    it('should default expires_in to one hour', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'no-expiry' });

      await authService.getToken();

      expect(store.load()?.expires_at).toBe(NOW + 3600 * 1000);
    });

    it('should treat a corrupt cache file as missing', async () => {
      fs.writeFileSync(store.getPath(), '{not json', 'utf-8');
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'after-corrupt', expires_in: 3600 });

      expect(await authService.getToken()).toBe('after-corrupt');
    });

    it('should send refresh_token grant as form data', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'token', expires_in: 3600 });

      await authService.getToken();

      expect(ofetch).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: expect.stringContaining('grant_type=refresh_token'),
        })
      );

      const call = vi.mocked(ofetch).mock.calls[0];
      const body = call[1]?.body as string;
      expect(body).toContain('refresh_token=test-refresh-token');
      expect(body).toContain('client_id=test-client-id');
      expect(body).toContain('client_secret=test-client-secret');
    });

    it('should throw AuthError when response carries an error field', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ error: 'invalid_code' });

      await expect(authService.getToken()).rejects.toThrow(AuthError);
      expect(store.load()).toBeNull();
    });

    it('should include the vendor error in the message', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ error: 'invalid_code' });

      await expect(authService.getToken()).rejects.toThrow('Token 換發失敗：invalid_code');
    });

    it('should wrap HTTP failures in AuthError with status', async () => {
      const httpError = Object.assign(new FetchError('Bad Request'), { status: 400 });
      vi.mocked(ofetch).mockRejectedValueOnce(httpError);

      await expect(authService.getToken()).rejects.toMatchObject({
        code: 'AUTH_ERROR',
        status: 400,
        message: 'Token 換發失敗：HTTP 400',
      });
    });
  });

  describe('clearCache', () => {
    it('should delete the cache file', async () => {
      vi.mocked(ofetch).mockResolvedValue({ access_token: 'cached-token', expires_in: 3600 });

      await authService.getToken();
      expect(fs.existsSync(store.getPath())).toBe(true);

      authService.clearCache();
      expect(fs.existsSync(store.getPath())).toBe(false);

      await authService.getToken();
      expect(ofetch).toHaveBeenCalledTimes(2);
    });
  });
});

describe('isTokenFresh', () => {
  it('should compare remaining lifetime against the skew', () => {
    const token = { access_token: 't', expires_at: 100_000 };
    expect(isTokenFresh(token, 100_000 - 30_001)).toBe(true);
    expect(isTokenFresh(token, 100_000 - 30_000)).toBe(false);
    expect(isTokenFresh(token, 100_000)).toBe(false);
  });

  it('should accept a custom skew', () => {
    expect(isTokenFresh({ access_token: 't', expires_at: 10_000 }, 0, 5_000)).toBe(true);
  });
});
