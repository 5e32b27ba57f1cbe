import type { PolymarketClient } from "../client.js";
import { PolymarketError, type OrderSide } from "../types.js";
import { midOrNull, quoteMid, type MidQuote, type OrderBookSnapshot } from "../../models/orderbook.js";
import { coerceNumeric, isRecord } from "../../models/json.js";

function toPrice(body: unknown): number | undefined {
  const value = coerceNumeric(isRecord(body) ? body.price : body);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Order book resource: book snapshots, mid price and spot price
 */
export class OrderBook {
  constructor(private client: PolymarketClient) {}

  /**
   * One fetch of the book for a token. Not cached, not retried.
   */
  async getOrderBook(tokenId: string): Promise<OrderBookSnapshot> {
    return this.client.venue.getOrderBook(tokenId);
  }

  /**
   * Mid price with the reason when there is none
   */
  async getMidQuote(tokenId: string): Promise<MidQuote> {
    return quoteMid(await this.getOrderBook(tokenId));
  }

  /**
   * Mid price rounded to 4 places, or null when either side is empty or a
   * price does not parse
   */
  async getMid(tokenId: string): Promise<number | null> {
    return midOrNull(await this.getMidQuote(tokenId));
  }

  /**
   * Venue spot price for buying or selling a token
   *
   * @throws {PolymarketError} With code `upstream_error` if the venue returns no numeric price
   */
  async getPrice(tokenId: string, side: OrderSide): Promise<number> {
    const body = await this.client.venue.getPrice(tokenId, side);
    const price = toPrice(body);
    if (price === undefined) {
      throw new PolymarketError(`CLOB returned no price for token ${tokenId}`, "upstream_error");
    }
    return price;
  }
}
