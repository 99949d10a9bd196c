/**
 * MemoryTokenCache: in-process TokenCache.
 *
 * Survives only the current process. Entries are copied in and out so a
 * caller mutating its own object cannot change what is stored.
 */

import type { CachedToken, TokenCache } from '../interfaces/token_cache.js';

export class MemoryTokenCache implements TokenCache {
  private _entry: CachedToken | null;
  public writes = 0;

  constructor(initial: CachedToken | null = null) {
    this._entry = initial ? { ...initial } : null;
  }

  read(): CachedToken | null {
    return this._entry ? { ...this._entry } : null;
  }

  write(entry: CachedToken): void {
    this._entry = { ...entry };
    this.writes += 1;
  }

  clear(): void {
    this._entry = null;
  }
}
