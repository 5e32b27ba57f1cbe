/**
 * Polymarket MCP server
 *
 * Market data, order book, trading and account tools for the Polymarket
 * venue, served over the Model Context Protocol.
 *
 * @packageDocumentation
 */

// Client context and resources
export {
  PolymarketClient,
  Markets,
  OrderBook,
  Trading,
  Account,
  filterForTrading,
  searchMarkets,
  searchEvents,
  resolveFulfillmentPolicy,
  PolymarketError,
} from "./client/index.js";
export type {
  PolymarketClientOptions,
  OrderSide,
  FulfillmentPolicy,
  MarketScan,
  MarketBatch,
  EventBatch,
  EventQuery,
  DataQuery,
  LimitOrderResult,
  MarketOrderResult,
  PolymarketErrorCode,
} from "./client/index.js";

// Models
export * from "./models/index.js";

// Upstream gateways
export * from "./upstream/index.js";

// Server surface
export { createMcpServer, createHttpApp, SERVER_NAME, SERVER_VERSION } from "./server/app.js";
export type { HttpAppOptions } from "./server/app.js";
export { createToolHandler, successResult, errorResult } from "./server/handlers.js";
export type { ToolHandler } from "./server/handlers.js";
export { TOOLS } from "./server/tools.js";

// Configuration, logging and auth
export { loadConfig } from "./config/index.js";
export type { ServerConfig } from "./config/index.js";
export { createLogger } from "./logger/index.js";
export {
  createAuthMiddleware,
  createRequestVerifier,
  isProtectedMcpMethod,
  requiresAuth,
} from "./auth/index.js";
export type { AuthOptions, AuthenticatedRequest, VerifyRequestOptions } from "./auth/index.js";
