/**
 * Auth Command
 * Token 快取查詢與維護
 */

import { Command } from 'commander';
import { getAuthService } from '../lib/api-client.js';
import { getConfigService } from '../services/config.js';
import { FileTokenStore } from '../services/token-store.js';
import { isTokenFresh } from '../services/auth.js';
import { getFormat } from '../lib/command-context.js';
import { formatJSON, formatKeyValueTable, reportError } from '../utils/output.js';

export function createAuthCommand(): Command {
  const authCommand = new Command('auth').description('Access token 快取管理');

  /**
   * zcrm-bulk auth status
   */
  authCommand
    .command('status')
    .description('顯示快取的 access token 狀態')
    .action((_options: unknown, cmd: Command) => {
      const format = getFormat(cmd);
      const store = new FileTokenStore(getConfigService().getTokenCachePath());
      const cached = store.load();
      const valid = cached !== null && isTokenFresh(cached, Date.now());
      const expiresAt = cached ? new Date(cached.expires_at).toISOString() : null;

      if (format === 'json') {
        console.log(formatJSON({ success: true, cachePath: store.getPath(), cached: cached !== null, valid, expiresAt }));
        return;
      }

      console.log(
        formatKeyValueTable([
          ['cache', store.getPath()],
          ['cached', cached !== null],
          ['valid', valid],
          ['expires_at', expiresAt],
        ])
      );
    });

  /**
   * zcrm-bulk auth refresh
   */
  authCommand
    .command('refresh')
    .description('強制以 refresh token 換發新的 access token')
    .action(async (_options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const auth = getAuthService();
        await auth.getToken(true);
        const cached = auth.getCachedToken();
        const expiresAt = cached ? new Date(cached.expires_at).toISOString() : null;

        if (format === 'json') {
          console.log(formatJSON({ success: true, expiresAt }));
        } else {
          console.log(`已換發新的 access token，有效至 ${expiresAt ?? '-'}`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });

  /**
   * zcrm-bulk auth clear
   */
  authCommand
    .command('clear')
    .description('刪除 token 快取檔')
    .action((_options: unknown, cmd: Command) => {
      const format = getFormat(cmd);

      try {
        const store = new FileTokenStore(getConfigService().getTokenCachePath());
        store.clear();

        if (format === 'json') {
          console.log(formatJSON({ success: true, cachePath: store.getPath() }));
        } else {
          console.log(`已清除 token 快取：${store.getPath()}`);
        }
      } catch (error) {
        reportError(error, format);
      }
    });

  return authCommand;
}
