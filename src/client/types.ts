import type { Logger } from "pino";
import type { MarketRecord } from "../models/market.js";
import type { EventRecord } from "../models/gamma.js";
import type { VenueGateway } from "../upstream/clob.js";
import type { GammaApi } from "../upstream/gamma.js";
import type { DataApi } from "../upstream/data.js";
import type { ChainGateway } from "../upstream/chain.js";

/**
 * Options for constructing a PolymarketClient from already-built gateways.
 * Use `PolymarketClient.connect()` to build them from configuration.
 */
export interface PolymarketClientOptions {
  /** Wallet address of the server's signing key */
  address: string;

  /** Trading venue (CLOB) gateway */
  venue: VenueGateway;

  /** Market metadata (Gamma) API */
  gamma: GammaApi;

  /** Settlement data API */
  data: DataApi;

  /** Chain reads and writes */
  chain: ChainGateway;

  /** Root logger; each resource takes a child of it */
  logger: Logger;
}

/**
 * Order side accepted by the venue
 */
export type OrderSide = "BUY" | "SELL";

/**
 * Order lifetime policies the venue understands.
 * FAK (fill-and-kill) is the venue's name for immediate-or-cancel.
 */
export type FulfillmentPolicy = "FOK" | "FAK" | "GTC";

/**
 * Result of a full cursor scan over the venue's market listing
 */
export interface MarketScan {
  /** Valid, normalized markets in page order */
  markets: MarketRecord[];

  /** Rows that failed validation and were dropped */
  skipped: number;

  /** Number of upstream pages fetched */
  pages: number;
}

/**
 * A batch of normalized markets along with the count of dropped rows
 */
export interface MarketBatch {
  markets: MarketRecord[];
  skipped: number;
}

/**
 * A batch of normalized events along with the count of dropped rows
 */
export interface EventBatch {
  events: EventRecord[];
  skipped: number;
}

/**
 * Query parameters for the Gamma events listing
 */
export interface EventQuery {
  active?: boolean;
  closed?: boolean;
  archived?: boolean;
  limit?: number;
  offset?: number;
  slug?: string;
}

/**
 * Extra query parameters for Data API reads (pagination and filtering)
 */
export type DataQuery = Record<string, string | number | boolean | undefined>;

/**
 * Result of a limit order submission
 */
export interface LimitOrderResult {
  /** Venue-assigned order id, when the venue returned one */
  orderId: string | null;

  /** Raw venue response */
  response: unknown;
}

/**
 * Result of a market order submission
 */
export interface MarketOrderResult {
  /** The policy actually sent to the venue */
  orderType: FulfillmentPolicy;

  /** Raw venue response */
  response: unknown;
}

/**
 * Specific error codes raised by this server
 */
export type PolymarketErrorCode =
  | "configuration_error"
  | "upstream_error"
  | "timeout"
  | "chain_error"
  | "invalid_arguments"
  | "unauthorized";

/**
 * Error thrown by the upstream gateways and the client resources
 */
export class PolymarketError extends Error {
  constructor(
    message: string,
    public readonly code?: PolymarketErrorCode,
    public readonly statusCode?: number,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PolymarketError";
  }
}
