/**
 * createTradeClient: assembles one client from a config and the host's collaborators.
 *
 *   config ─▶ AxiosTransport ─┬─▶ HttpLoginExchange ─▶ SessionManager ─┐
 *                             └────────────────────▶ RequestClient ◀────┘
 *                                                         │
 *                                                   TradeProtocol ─▶ WorldInventory
 *
 * Everything is owned by the returned object; shutdown() cancels the identity
 * ticket and drops in-memory credentials. The durable token cache is kept so
 * the next start can skip the login exchange.
 */

import type { ClientConfig } from './config/client_config.js';
import { AxiosTransport, type HttpTransport } from './http/transport.js';
import { HttpLoginExchange, RequestClient } from './http/request_client.js';
import type { IdentityProvider } from './interfaces/identity_provider.js';
import type { TokenCache } from './interfaces/token_cache.js';
import type { WorldInventory } from './interfaces/world_inventory.js';
import { createLogger, type Logger } from './logging.js';
import { TimerScheduler, type Clock, type Scheduler } from './runtime/scheduler.js';
import { SessionManager } from './session/session_manager.js';
import { FileTokenCache } from './stores/file_token_cache.js';
import { TradeProtocol } from './trade/trade_protocol.js';

export interface TradeClientDependencies {
  identity: IdentityProvider;
  inventory: WorldInventory;
  transport?: HttpTransport;
  cache?: TokenCache;
  scheduler?: Scheduler;
  clock?: Clock;
  logger?: Logger;
  currencyKind?: string;
}

export interface TradeClient {
  readonly config: ClientConfig;
  readonly session: SessionManager;
  readonly requests: RequestClient;
  readonly protocol: TradeProtocol;
  shutdown(options?: { purgeDurable?: boolean }): Promise<void>;
}

export function createTradeClient(config: ClientConfig, deps: TradeClientDependencies): TradeClient {
  const logger = deps.logger ?? createLogger({ debug: config.debugLogging });
  const scheduler = deps.scheduler ?? new TimerScheduler();
  const transport = deps.transport ?? new AxiosTransport({
    baseUrl: config.serverUrl,
    timeoutMs: config.requestTimeoutSeconds * 1000
  });
  const cache = deps.cache ?? new FileTokenCache(config.dataDir, logger.child('token_cache'));

  const session = new SessionManager({
    provider: deps.identity,
    cache,
    exchange: new HttpLoginExchange(transport),
    scheduler,
    clock: deps.clock,
    logger: logger.child('session')
  });

  const requests = new RequestClient({
    transport,
    session,
    scheduler,
    logger: logger.child('request')
  });

  const protocol = new TradeProtocol({
    requests,
    inventory: deps.inventory,
    logger: logger.child('trade'),
    currencyKind: deps.currencyKind,
    playerName: () => session.currentIdentity()?.displayName ?? ''
  });

  logger.info('trade_client_created', { server_url: config.serverUrl, environment: config.environment });

  return {
    config,
    session,
    requests,
    protocol,
    async shutdown(options = {}) {
      await session.settled();
      session.cleanup(options);
    }
  };
}
