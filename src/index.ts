/**
 * trade-link: authenticated trade requests for a game client.
 *
 *   const config = loadClientConfig();
 *   const client = createTradeClient(config, { identity, inventory });
 *   const stock = await client.protocol.fetchStock();
 *   ...
 *   await client.shutdown();
 */

export { createTradeClient } from './trade_client.js';
export type { TradeClient, TradeClientDependencies } from './trade_client.js';

export { loadClientConfig, parseEnvironment, DEFAULT_CONFIG_PATH } from './config/client_config.js';
export type { ClientConfig, ClientEnvironment, LoadConfigOptions } from './config/client_config.js';

export { TradeClientError, RESTART_SESSION_MESSAGE, isTradeClientError } from './errors.js';
export type { TradeClientErrorType } from './errors.js';

export { createLogger, silentLogger, stdioSink } from './logging.js';
export type { Logger, LogEntry, LogLevel, LogSink } from './logging.js';

export { SessionManager, TOKEN_TTL_MS } from './session/session_manager.js';
export type { LoginExchange, SessionIdentity, TokenSource } from './session/session_manager.js';

export { RequestClient, HttpLoginExchange, ENDPOINTS } from './http/request_client.js';
export type { ApiRequest } from './http/request_client.js';
export { AxiosTransport } from './http/transport.js';
export type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from './http/transport.js';

export { TradeProtocol, DEFAULT_CURRENCY_KIND } from './trade/trade_protocol.js';
export { PendingTradeSet } from './trade/pending_trade_set.js';
export type { BuyLine, BuyReceipt, ClaimResult, ClaimStatus, PendingSale, TradeRecord } from './trade/trade_types.js';

export {
  decodeBuyReceipt,
  decodeClaimResult,
  decodeLoginToken,
  decodePendingSales,
  decodeServerError,
  decodeTradeRecords,
  encodeBuyRequest,
  encodeLoginRequest,
  encodeSellRequest
} from './codec/trade_codec.js';

export { FileTokenCache } from './stores/file_token_cache.js';
export { MemoryTokenCache } from './stores/memory_token_cache.js';
export { TimerScheduler, systemClock } from './runtime/scheduler.js';
export type { Clock, Scheduler } from './runtime/scheduler.js';
export type { CachedToken, TokenCache } from './interfaces/token_cache.js';
export type { IdentityProvider, IdentityTicket } from './interfaces/identity_provider.js';
export type { InventoryStack, WorldInventory } from './interfaces/world_inventory.js';
