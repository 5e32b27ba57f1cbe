/**
 * Client context and resources over the venue, Gamma, Data API and chain.
 *
 * @packageDocumentation
 */

export { PolymarketClient } from "./client.js";

export { Markets, filterForTrading, searchMarkets, searchEvents } from "./resources/markets.js";
export { OrderBook } from "./resources/orderbook.js";
export { Trading, resolveFulfillmentPolicy } from "./resources/trading.js";
export { Account } from "./resources/account.js";

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
} from "./types.js";

export { PolymarketError } from "./types.js";
