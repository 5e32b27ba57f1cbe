/**
 * Normalized market, event and order book models.
 *
 * @packageDocumentation
 */

export {
  normalizeMarket,
  normalizeMarkets,
  outcomes,
  outcomePrices,
  clobTokenIds,
  toMarketJson,
  rawMarketSchema,
} from "./market.js";
export type { MarketRecord, TokenQuote, Rewards, RewardRate, RawMarket, NormalizeResult } from "./market.js";

export {
  gammaToRawMarket,
  normalizeGammaMarket,
  normalizeGammaMarkets,
  normalizeEvent,
  normalizeEvents,
  toEventJson,
} from "./gamma.js";
export type { EventRecord } from "./gamma.js";

export { isLive, parseEndDate } from "./liveness.js";

export { quoteMid, midOrNull } from "./orderbook.js";
export type { OrderBookLevel, OrderBookSnapshot, MidQuote, BookSide } from "./orderbook.js";
