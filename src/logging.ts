/**
 * Structured log lines: one JSON object per event.
 *
 *   { "time": ISO8601, "level": "info", "scope": "session", "event": "...", ...fields }
 *
 * info/debug go to stdout, warn/error to stderr. Debug lines are dropped
 * unless debug logging is enabled in the client config.
 *
 * Never pass a full bearer token or ticket as a field; use redact().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  time: string;
  level: LogLevel;
  scope: string;
  event: string;
  [field: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(event: string, fields?: Record<string, unknown>): void;
  info(event: string, fields?: Record<string, unknown>): void;
  warn(event: string, fields?: Record<string, unknown>): void;
  error(event: string, fields?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  debug?: boolean;
  sink?: LogSink;
}

export const stdioSink: LogSink = (entry) => {
  const line = JSON.stringify(entry) + '\n';
  if (entry.level === 'warn' || entry.level === 'error') {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? 'trade-link';
  const debugEnabled = options.debug ?? false;
  const sink = options.sink ?? stdioSink;

  const write = (level: LogLevel, event: string, fields?: Record<string, unknown>): void => {
    if (level === 'debug' && !debugEnabled) return;
    sink({ ...fields, time: new Date().toISOString(), level, scope, event });
  };

  return {
    debug: (event, fields) => write('debug', event, fields),
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
    error: (event, fields) => write('error', event, fields),
    child: (childScope) => createLogger({ scope: `${scope}.${childScope}`, debug: debugEnabled, sink })
  };
}

/** Discards everything. Default for components constructed without a logger. */
export const silentLogger: Logger = createLogger({ sink: () => undefined });

/** First 6 chars + length, enough to correlate without leaking the credential. */
export function redact(secret: string | null | undefined): string {
  if (!secret) return '<none>';
  return `${secret.slice(0, 6)}…(${secret.length})`;
}
