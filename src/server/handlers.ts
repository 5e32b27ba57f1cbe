import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";
import type { PolymarketClient } from "../client/client.js";
import { PolymarketError } from "../client/types.js";
import { toMarketJson, type MarketRecord } from "../models/market.js";
import { toEventJson } from "../models/gamma.js";
import type { MidQuote } from "../models/orderbook.js";

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

export function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

export function successResult(data: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
    structuredContent: data,
  };
}

// ============================================================================
// ARGUMENT SCHEMAS
// ============================================================================

const side = z.enum(["BUY", "SELL"]);
const limit = z.number().int().positive().optional();
const tokenArgs = z.object({ token_id: z.string().min(1) });
const userArgs = z.object({ user: z.string().min(1).optional() });
const userListArgs = userArgs.extend({ limit });

const eventFilterArgs = z.object({
  active: z.boolean().optional(),
  closed: z.boolean().optional(),
  archived: z.boolean().optional(),
  limit,
  offset: z.number().int().nonnegative().optional(),
});

const argSchemas = {
  get_market: z.object({ slug: z.string().min(1) }),
  get_markets: z.object({ limit, active_only: z.boolean().optional() }),
  list_all_markets: z.object({ live_only: z.boolean().optional(), limit }),
  search_markets: z.object({ query: z.string(), limit, live_only: z.boolean().optional() }),
  get_events: eventFilterArgs.extend({ slug: z.string().optional() }),
  search_events: eventFilterArgs.omit({ limit: true }).extend({
    query: z.string(),
    limit,
    page_size: z.number().int().positive().optional(),
  }),
  get_order_book: tokenArgs,
  get_mid_price: tokenArgs,
  get_price: tokenArgs.extend({ side }),
  place_limit_order: tokenArgs.extend({ price: z.number(), size: z.number(), side }),
  place_market_order: tokenArgs.extend({
    amount: z.number(),
    order_type: z.string().optional(),
    side: side.optional(),
  }),
  cancel_order: z.object({ order_id: z.string().min(1) }),
  get_usdc_balance: userArgs,
  get_portfolio_value: userArgs,
  get_positions: userListArgs,
  get_closed_positions: userListArgs,
  get_trades: userListArgs,
  redeem_position: z.object({
    condition_id: z.string().min(1),
    index_sets: z.array(z.number().int().positive()).min(1),
  }),
};

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`);
    throw new PolymarketError(`Invalid arguments: ${issues.join("; ")}`, "invalid_arguments");
  }
  return parsed.data;
}

function marketList(markets: MarketRecord[], extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { markets: markets.map(toMarketJson), count: markets.length, ...extra };
}

function midStatus(quote: MidQuote): string {
  switch (quote.kind) {
    case "mid":
      return "ok";
    case "empty":
      return quote.side === "bid" ? "empty_bids" : "empty_asks";
    case "malformed":
      return quote.side === "bid" ? "malformed_bids" : "malformed_asks";
  }
}

// ============================================================================
// DISPATCH
// ============================================================================

export type ToolHandler = (name: string, args: unknown) => Promise<CallToolResult>;

/**
 * Build the tool-call dispatcher for one client. Every failure, including
 * bad arguments and unknown tool names, comes back as an error envelope.
 */
export function createToolHandler(client: PolymarketClient, logger: Logger = client.logger): ToolHandler {
  const log = logger.child({ component: "tools" });

  async function dispatch(name: string, args: unknown): Promise<CallToolResult> {
    switch (name) {
      // Markets
      case "get_market": {
        const { slug } = parseArgs(argSchemas.get_market, args);
        return successResult(marketList(await client.markets.getMarketBySlug(slug)));
      }
      case "get_markets": {
        const a = parseArgs(argSchemas.get_markets, args);
        const batch = await client.markets.listCurrentMarkets(a.limit);
        const markets = a.active_only ? client.markets.filterForTrading(batch.markets) : batch.markets;
        return successResult(marketList(markets, { skipped: batch.skipped }));
      }
      case "list_all_markets": {
        const a = parseArgs(argSchemas.list_all_markets, args);
        const scan = await client.markets.scanAllMarkets();
        const markets = a.live_only ? client.markets.filterForTrading(scan.markets) : scan.markets;
        const limited = a.limit === undefined ? markets : markets.slice(0, a.limit);
        return successResult(marketList(limited, { skipped: scan.skipped, pages: scan.pages }));
      }
      case "search_markets": {
        const a = parseArgs(argSchemas.search_markets, args);
        const scan = await client.markets.scanAllMarkets();
        const pool = a.live_only ? client.markets.filterForTrading(scan.markets) : scan.markets;
        return successResult(marketList(client.markets.search(pool, a.query, a.limit), { skipped: scan.skipped }));
      }

      // Events
      case "get_events": {
        const a = parseArgs(argSchemas.get_events, args);
        const batch = await client.markets.listEvents(a);
        return successResult({
          events: batch.events.map(toEventJson),
          count: batch.events.length,
          skipped: batch.skipped,
        });
      }
      case "search_events": {
        const { query, limit, page_size, ...filters } = parseArgs(argSchemas.search_events, args);
        const batch = await client.markets.listEvents({ ...filters, limit: page_size });
        const events = client.markets.searchEvents(batch.events, query, limit);
        return successResult({ events: events.map(toEventJson), count: events.length, skipped: batch.skipped });
      }

      // Order book
      case "get_order_book": {
        const { token_id } = parseArgs(argSchemas.get_order_book, args);
        const { tokenId, ...book } = await client.orderbook.getOrderBook(token_id);
        return successResult({ token_id: tokenId, ...book });
      }
      case "get_mid_price": {
        const { token_id } = parseArgs(argSchemas.get_mid_price, args);
        const quote = await client.orderbook.getMidQuote(token_id);
        return successResult({
          token_id,
          mid_price: quote.kind === "mid" ? quote.mid : null,
          status: midStatus(quote),
          ...(quote.kind === "mid" ? { best_bid: quote.bestBid, best_ask: quote.bestAsk } : {}),
        });
      }
      case "get_price": {
        const a = parseArgs(argSchemas.get_price, args);
        const price = await client.orderbook.getPrice(a.token_id, a.side);
        return successResult({ token_id: a.token_id, side: a.side, price });
      }

      // Trading
      case "place_limit_order": {
        const a = parseArgs(argSchemas.place_limit_order, args);
        const result = await client.trading.placeLimitOrder(a.token_id, a.price, a.size, a.side);
        return successResult({ order_id: result.orderId, response: result.response });
      }
      case "place_market_order": {
        const a = parseArgs(argSchemas.place_market_order, args);
        const result = await client.trading.placeMarketOrder(a.token_id, a.amount, a.order_type, a.side);
        return successResult({ order_type: result.orderType, response: result.response });
      }
      case "cancel_order": {
        const { order_id } = parseArgs(argSchemas.cancel_order, args);
        return successResult({ order_id, response: await client.trading.cancelOrder(order_id) });
      }

      // Account
      case "get_usdc_balance": {
        const { user = client.address } = parseArgs(argSchemas.get_usdc_balance, args);
        return successResult({ user, balance: await client.account.getUsdcBalance(user) });
      }
      case "get_portfolio_value": {
        const { user = client.address } = parseArgs(argSchemas.get_portfolio_value, args);
        return successResult({ user, value: await client.account.getPortfolioValue(user) });
      }
      case "get_positions": {
        const { user = client.address, limit } = parseArgs(argSchemas.get_positions, args);
        return successResult({ user, positions: await client.account.getPositions(user, { limit }) });
      }
      case "get_closed_positions": {
        const { user = client.address, limit } = parseArgs(argSchemas.get_closed_positions, args);
        return successResult({ user, positions: await client.account.getClosedPositions(user, { limit }) });
      }
      case "get_trades": {
        const { user = client.address, limit } = parseArgs(argSchemas.get_trades, args);
        return successResult({ user, trades: await client.account.getTrades(user, { limit }) });
      }
      case "redeem_position": {
        const a = parseArgs(argSchemas.redeem_position, args);
        const txHash = await client.account.redeemPosition(a.condition_id, a.index_sets);
        return successResult({ condition_id: a.condition_id, tx_hash: txHash });
      }

      default:
        return errorResult(`Unknown tool: ${name}`);
    }
  }

  return async function callTool(name: string, args: unknown): Promise<CallToolResult> {
    try {
      return await dispatch(name, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.warn({ tool: name, code: error instanceof PolymarketError ? error.code : undefined, err: message }, "Tool call failed");
      return errorResult(message);
    }
  };
}
