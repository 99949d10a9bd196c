/**
 * TokenCache: durable mirror of the last-known bearer token.
 *
 * Implementations:
 *   - FileTokenCache (src/stores/file_token_cache.ts): per-user data dir
 *   - MemoryTokenCache (src/stores/memory_token_cache.ts): tests, ephemeral hosts
 *
 * The cache does not judge validity. SessionManager compares expiresAtUnixSeconds
 * against its clock; the cache only stores what it is given.
 */

export interface CachedToken {
  token: string;
  expiresAtUnixSeconds: number;
}

export interface TokenCache {
  /** Returns null if nothing is stored or the stored entry is unreadable. */
  read(): CachedToken | null;

  /** Replace the stored entry wholesale. */
  write(entry: CachedToken): void;

  /** Remove the stored entry. No-op when nothing is stored. */
  clear(): void;
}
