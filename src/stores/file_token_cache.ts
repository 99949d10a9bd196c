/**
 * FileTokenCache: durable TokenCache in the per-user data directory.
 *
 * Path: <data_dir>/token_cache.json
 * Format: {"token":"<bearer>","expires_at":<unix seconds>}
 *
 * Writes go to a sibling temp file which is then renamed over the target, so
 * the cache file is always either the previous entry or the new one, never a
 * partial write. Every write replaces the whole file.
 *
 * Read failures are logged and reported as "no entry"; the session then
 * re-authenticates instead of trusting a damaged file.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';
import type { CachedToken, TokenCache } from '../interfaces/token_cache.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logging.js';

export const TOKEN_CACHE_FILE = 'token_cache.json';

const cacheFileSchema = z.object({
  token: z.string().min(1),
  expires_at: z.number().int()
});

export class FileTokenCache implements TokenCache {
  public readonly path: string;
  private readonly logger: Logger;

  constructor(dataDir: string, logger: Logger = silentLogger) {
    this.path = join(dataDir, TOKEN_CACHE_FILE);
    this.logger = logger;
  }

  read(): CachedToken | null {
    if (!existsSync(this.path)) return null;

    try {
      const raw: unknown = JSON.parse(readFileSync(this.path, 'utf8'));
      const parsed = cacheFileSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn('token_cache_unreadable', { path: this.path, reason: parsed.error.issues[0]?.message });
        return null;
      }
      return { token: parsed.data.token, expiresAtUnixSeconds: parsed.data.expires_at };
    } catch (err) {
      this.logger.warn('token_cache_unreadable', { path: this.path, reason: errorMessage(err) });
      return null;
    }
  }

  write(entry: CachedToken): void {
    const body = JSON.stringify({ token: entry.token, expires_at: Math.floor(entry.expiresAtUnixSeconds) });
    const tmpPath = `${this.path}.tmp`;

    try {
      mkdirSync(dirname(this.path), { recursive: true, mode: 0o700 });
      writeFileSync(tmpPath, body, { encoding: 'utf8', mode: 0o600 });
      renameSync(tmpPath, this.path);
      this.logger.debug('token_cache_written', { path: this.path, expires_at: entry.expiresAtUnixSeconds });
    } catch (err) {
      // The in-memory copy stays authoritative for this process.
      this.logger.error('token_cache_write_failed', { path: this.path, reason: errorMessage(err) });
    }
  }

  clear(): void {
    try {
      if (existsSync(this.path)) {
        unlinkSync(this.path);
        this.logger.debug('token_cache_cleared', { path: this.path });
      }
    } catch (err) {
      this.logger.error('token_cache_clear_failed', { path: this.path, reason: errorMessage(err) });
    }
  }
}
