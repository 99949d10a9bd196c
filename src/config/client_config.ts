/**
 * Client configuration: YAML file + environment overrides, validated with zod.
 *
 * Resolution order (first wins):
 *   1. TRADE_LINK_* environment variables
 *   2. the YAML file (TRADE_LINK_CONFIG, or ./trade-link.yaml)
 *   3. defaults, which depend on the environment (dev → local server)
 *
 * A missing file is fine. A file that does not parse, or any value out of
 * range, throws CONFIG_INVALID: a misconfigured client should not start
 * talking to the wrong server.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { TradeClientError, errorMessage } from '../errors.js';

export type ClientEnvironment = 'dev' | 'prod';

export interface ClientConfig {
  serverUrl: string;
  requestTimeoutSeconds: number;
  debugLogging: boolean;
  dataDir: string;
  environment: ClientEnvironment;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_CONFIG_PATH = './trade-link.yaml';

const DEFAULT_SERVER_URL: Record<ClientEnvironment, string> = {
  dev: 'http://localhost:5000',
  prod: 'https://trade.example.net'
};

const configSchema = z.object({
  server_url: z.string().url(),
  request_timeout_seconds: z.number().int().min(5).max(60),
  debug_logging: z.boolean(),
  data_dir: z.string().min(1),
  environment: z.enum(['dev', 'prod'])
});

/** Unknown or missing values resolve to prod. */
export function parseEnvironment(raw: unknown): ClientEnvironment {
  return typeof raw === 'string' && raw.trim().toLowerCase() === 'dev' ? 'dev' : 'prod';
}

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ['1', 'true', 'yes', 'y', 'on'].includes(value.trim().toLowerCase());
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new TradeClientError('CONFIG_INVALID', `Invalid client config ${path}: ${errorMessage(err)}`, { cause: err });
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new TradeClientError('CONFIG_INVALID', `Invalid client config ${path}: expected a mapping at the top level`);
  }
  return { ...parsed };
}

export function loadClientConfig(options: LoadConfigOptions = {}): ClientConfig {
  const env = options.env ?? process.env;
  const path = options.configPath ?? env['TRADE_LINK_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const file = readConfigFile(path);

  const environment = parseEnvironment(env['TRADE_LINK_ENV'] ?? file['environment']);

  const candidate = {
    server_url: env['TRADE_LINK_SERVER_URL'] ?? file['server_url'] ?? DEFAULT_SERVER_URL[environment],
    request_timeout_seconds: parseNumber(env['TRADE_LINK_TIMEOUT_SECONDS']) ?? file['request_timeout_seconds'] ?? 30,
    debug_logging: parseBool(env['TRADE_LINK_DEBUG']) ?? file['debug_logging'] ?? false,
    data_dir: env['TRADE_LINK_DATA_DIR'] ?? file['data_dir'] ?? join(homedir(), '.trade-link'),
    environment
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : 'config';
    throw new TradeClientError('CONFIG_INVALID', `Invalid client config ${path}: ${where}: ${issue?.message ?? 'invalid'}`);
  }

  return {
    serverUrl: result.data.server_url,
    requestTimeoutSeconds: result.data.request_timeout_seconds,
    debugLogging: result.data.debug_logging,
    dataDir: result.data.data_dir,
    environment: result.data.environment
  };
}
