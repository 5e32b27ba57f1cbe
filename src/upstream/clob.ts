import { ClobClient, Chain, OrderType, Side, type ApiKeyCreds } from "@polymarket/clob-client";
import { Wallet } from "@ethersproject/wallet";
import type { Logger } from "pino";
import { PolymarketError, type FulfillmentPolicy, type OrderSide } from "../client/types.js";
import type { OrderBookSnapshot } from "../models/orderbook.js";
import { isRecord } from "../models/json.js";

export const DEFAULT_CLOB_URL = "https://clob.polymarket.com";

/** Cursor value the venue returns on the last page of a listing */
export const END_CURSOR = "LTE=";

/**
 * One page of the venue's cursor-paginated market listing
 */
export interface MarketPage {
  data: unknown[];
  nextCursor?: string;
}

export interface LimitOrderRequest {
  tokenId: string;
  price: number;
  size: number;
  side: OrderSide;
}

export interface MarketOrderRequest {
  tokenId: string;
  /** Notional amount in quote units */
  amount: number;
  side: OrderSide;
}

/**
 * The trading-venue operations this server needs. Implemented by
 * `ClobVenue` on top of the official client; tests provide fakes.
 */
export interface VenueGateway {
  getOrderBook(tokenId: string): Promise<OrderBookSnapshot>;
  getPrice(tokenId: string, side: OrderSide): Promise<unknown>;
  getSamplingMarkets(cursor: string): Promise<MarketPage>;
  postLimitOrder(order: LimitOrderRequest): Promise<unknown>;
  postMarketOrder(order: MarketOrderRequest, orderType: FulfillmentPolicy): Promise<unknown>;
  cancelOrder(orderId: string): Promise<unknown>;
}

export interface ClobVenueOptions {
  host?: string;
  chainId: number;
  privateKey: string;

  /** Pre-provisioned L2 API credentials; derived from the key when absent */
  creds?: ApiKeyCreds;

  logger: Logger;
}

function toSide(side: OrderSide): Side {
  return side === "SELL" ? Side.SELL : Side.BUY;
}

function toOrderType(policy: FulfillmentPolicy): OrderType {
  switch (policy) {
    case "GTC":
      return OrderType.GTC;
    case "FAK":
      return OrderType.FAK;
    case "FOK":
      return OrderType.FOK;
  }
}

function toChain(chainId: number): Chain {
  return chainId === Chain.AMOY ? Chain.AMOY : Chain.POLYGON;
}

/**
 * The client sometimes resolves with `{ error }` instead of rejecting.
 */
function rejectErrorBody(label: string, body: unknown): unknown {
  if (isRecord(body) && typeof body.error === "string") {
    throw new PolymarketError(`CLOB ${label} rejected: ${body.error}`, "upstream_error", undefined, body);
  }
  return body;
}

/**
 * Venue gateway backed by `@polymarket/clob-client`.
 */
export class ClobVenue implements VenueGateway {
  private constructor(
    private readonly client: ClobClient,
    private readonly logger: Logger
  ) {}

  /**
   * Build an authenticated client. Without pre-provisioned credentials the
   * L2 API key is created or derived from the signing key.
   */
  static async connect(options: ClobVenueOptions): Promise<ClobVenue> {
    const host = options.host ?? DEFAULT_CLOB_URL;
    const chain = toChain(options.chainId);
    const wallet = new Wallet(options.privateKey);
    const logger = options.logger.child({ component: "clob" });

    let creds = options.creds;
    if (!creds) {
      logger.info({ address: wallet.address }, "No CLOB API credentials configured, deriving from signing key");
      try {
        creds = await new ClobClient(host, chain, wallet).createOrDeriveApiKey();
      } catch (error) {
        throw new PolymarketError(
          `Failed to derive CLOB API credentials: ${error instanceof Error ? error.message : String(error)}`,
          "upstream_error"
        );
      }
    }

    return new ClobVenue(new ClobClient(host, chain, wallet, creds), logger);
  }

  async getOrderBook(tokenId: string): Promise<OrderBookSnapshot> {
    const book = await this.call("getOrderBook", () => this.client.getOrderBook(tokenId));
    return {
      tokenId: book.asset_id || tokenId,
      market: book.market || undefined,
      timestamp: book.timestamp || undefined,
      bids: (book.bids ?? []).map((l) => ({ price: l.price, size: l.size })),
      asks: (book.asks ?? []).map((l) => ({ price: l.price, size: l.size })),
    };
  }

  async getPrice(tokenId: string, side: OrderSide): Promise<unknown> {
    const body: unknown = await this.call("getPrice", () => this.client.getPrice(tokenId, side));
    return rejectErrorBody("getPrice", body);
  }

  async getSamplingMarkets(cursor: string): Promise<MarketPage> {
    const page = await this.call("getSamplingMarkets", () =>
      // An empty cursor lets the client start from its initial cursor
      this.client.getSamplingMarkets(cursor || undefined)
    );
    return { data: page.data ?? [], nextCursor: page.next_cursor };
  }

  async postLimitOrder(order: LimitOrderRequest): Promise<unknown> {
    this.logger.debug(order, "Posting limit order");
    const body: unknown = await this.call("createAndPostOrder", () =>
      this.client.createAndPostOrder({
        tokenID: order.tokenId,
        price: order.price,
        size: order.size,
        side: toSide(order.side),
      })
    );
    return rejectErrorBody("limit order", body);
  }

  async postMarketOrder(order: MarketOrderRequest, orderType: FulfillmentPolicy): Promise<unknown> {
    this.logger.debug({ ...order, orderType }, "Posting market order");
    const signed = await this.call("createMarketOrder", () =>
      this.client.createMarketOrder({
        tokenID: order.tokenId,
        amount: order.amount,
        side: toSide(order.side),
      })
    );
    const body: unknown = await this.call("postOrder", () => this.client.postOrder(signed, toOrderType(orderType)));
    return rejectErrorBody("market order", body);
  }

  async cancelOrder(orderId: string): Promise<unknown> {
    this.logger.debug({ orderId }, "Cancelling order");
    const body: unknown = await this.call("cancelOrder", () => this.client.cancelOrder({ orderID: orderId }));
    return rejectErrorBody("cancel", body);
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PolymarketError) throw error;
      throw new PolymarketError(
        `CLOB ${label} failed: ${error instanceof Error ? error.message : String(error)}`,
        "upstream_error"
      );
    }
  }
}
