import type { Logger } from "pino";
import type { PolymarketClient } from "../client.js";
import type { FulfillmentPolicy, LimitOrderResult, MarketOrderResult, OrderSide } from "../types.js";
import { isRecord } from "../../models/json.js";

/**
 * Map a caller-supplied policy name onto one the venue understands.
 *
 * Accepts the short codes and their spelled-out forms in any case.
 * Immediate-or-cancel becomes FAK, the venue's name for it. Anything
 * unrecognized falls back to FOK.
 */
export function resolveFulfillmentPolicy(policy: string | undefined): FulfillmentPolicy {
  const key = (policy ?? "").trim().toLowerCase().replace(/[\s_]+/g, "-");
  switch (key) {
    case "gtc":
    case "good-till-cancelled":
    case "good-til-cancelled":
    case "good-till-canceled":
      return "GTC";
    case "ioc":
    case "fak":
    case "immediate-or-cancel":
    case "fill-and-kill":
      return "FAK";
    case "fok":
    case "fill-or-kill":
      return "FOK";
    default:
      return "FOK";
  }
}

function orderIdOf(response: unknown): string | null {
  if (isRecord(response) && typeof response.orderID === "string" && response.orderID !== "") {
    return response.orderID;
  }
  return null;
}

/**
 * Trading resource: order submission and cancellation. Prices and sizes are
 * passed to the venue unchecked.
 */
export class Trading {
  private readonly logger: Logger;

  constructor(private client: PolymarketClient) {
    this.logger = client.logger.child({ component: "trading" });
  }

  async placeLimitOrder(tokenId: string, price: number, size: number, side: OrderSide): Promise<LimitOrderResult> {
    const response = await this.client.venue.postLimitOrder({ tokenId, price, size, side });
    const orderId = orderIdOf(response);
    this.logger.info({ tokenId, price, size, side, orderId }, "Limit order placed");
    return { orderId, response };
  }

  /**
   * Submit a market order for `amount` in quote units
   *
   * @param policy - Fulfillment policy name; see `resolveFulfillmentPolicy`
   */
  async placeMarketOrder(
    tokenId: string,
    amount: number,
    policy?: string,
    side: OrderSide = "BUY"
  ): Promise<MarketOrderResult> {
    const orderType = resolveFulfillmentPolicy(policy);
    const response = await this.client.venue.postMarketOrder({ tokenId, amount, side }, orderType);
    this.logger.info({ tokenId, amount, side, orderType }, "Market order placed");
    return { orderType, response };
  }

  async cancelOrder(orderId: string): Promise<unknown> {
    const response = await this.client.venue.cancelOrder(orderId);
    this.logger.info({ orderId }, "Order cancelled");
    return response;
  }
}
