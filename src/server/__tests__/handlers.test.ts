import { describe, it, expect, vi, afterEach } from "vitest";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { createToolHandler, successResult, errorResult } from "../handlers.js";
import { TOOLS } from "../tools.js";
import { createTestClient, venueRow, gammaRow, mockFetchJson, WALLET } from "../../client/__tests__/helpers.js";
import { PolymarketError } from "../../client/types.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

function setup() {
  const ctx = createTestClient();
  return { ...ctx, callTool: createToolHandler(ctx.client) };
}

function errorOf(result: CallToolResult): unknown {
  const [first] = result.content;
  return first.type === "text" ? JSON.parse(first.text).error : undefined;
}

describe("envelopes", () => {
  it("successResult carries the data as text and structured content", () => {
    expect(successResult({ a: 1 })).toEqual({
      content: [{ type: "text", text: '{\n  "a": 1\n}' }],
      structuredContent: { a: 1 },
    });
  });

  it("errorResult marks the result as an error", () => {
    expect(errorResult("boom")).toEqual({
      content: [{ type: "text", text: '{"error":"boom"}' }],
      isError: true,
    });
  });
});

describe("tool definitions", () => {
  it("have a handler for every tool", async () => {
    globalThis.fetch = mockFetchJson([]);
    const { callTool } = setup();

    for (const tool of TOOLS) {
      const result = await callTool(tool.name, { __unused: true });
      expect(errorOf(result) === `Unknown tool: ${tool.name}`).toBe(false);
    }
  });

  it("declare integer limits", () => {
    for (const tool of TOOLS) {
      const limit: unknown = Object.entries(tool.inputSchema.properties).find(([key]) => key === "limit")?.[1];
      if (limit !== undefined) {
        expect(limit).toMatchObject({ type: "integer" });
      }
    }
  });

  it("have unique names", () => {
    const names = TOOLS.map((t) => t.name);
    expect(new Set(names).size).toBe(names.length);
  });
});

describe("createToolHandler", () => {
  it("reports an unknown tool as an error result", async () => {
    const { callTool } = setup();

    const result = await callTool("does_not_exist", {});

    expect(result.isError).toBe(true);
    expect(errorOf(result)).toBe("Unknown tool: does_not_exist");
  });

  it("reports invalid arguments as an error result", async () => {
    const { callTool } = setup();

    const result = await callTool("get_order_book", {});

    expect(result.isError).toBe(true);
    expect(errorOf(result)).toBe("Invalid arguments: token_id: Required");
  });

  it("reports upstream failures as an error result", async () => {
    const { callTool, venue } = setup();
    venue.getOrderBook.mockRejectedValueOnce(new PolymarketError("CLOB getOrderBook failed: 404", "upstream_error"));

    const result = await callTool("get_order_book", { token_id: "111" });

    expect(result.isError).toBe(true);
    expect(errorOf(result)).toBe("CLOB getOrderBook failed: 404");
  });

  it("get_order_book returns the book under snake_case keys", async () => {
    const { callTool, venue } = setup();
    venue.getOrderBook.mockResolvedValueOnce({
      tokenId: "111",
      market: "0xabc",
      bids: [{ price: "0.4", size: "10" }],
      asks: [],
    });

    const result = await callTool("get_order_book", { token_id: "111" });

    expect(result.structuredContent).toEqual({
      token_id: "111",
      market: "0xabc",
      bids: [{ price: "0.4", size: "10" }],
      asks: [],
    });
  });

  it("get_events normalizes events and counts dropped rows", async () => {
    const fetchMock = mockFetchJson([
      { id: 7, title: "Weather this week", tags: [{ label: "Weather" }], markets: [gammaRow("0x1")] },
      { title: "Event without an id" },
    ]);
    globalThis.fetch = fetchMock;
    const { callTool } = setup();

    const result = await callTool("get_events", { active: true, limit: 5 });

    expect(result.structuredContent).toMatchObject({ count: 1, skipped: 1 });
    expect(result.structuredContent?.events).toEqual([
      expect.objectContaining({
        id: "7",
        title: "Weather this week",
        tags: ["Weather"],
        markets: [expect.objectContaining({ id: "0x1" })],
      }),
    ]);
    expect(fetchMock).toHaveBeenCalledWith("https://gamma.test/events?active=true&limit=5", expect.anything());
  });

  it("search_events caps matches with limit and sends page_size upstream", async () => {
    const fetchMock = mockFetchJson([
      { id: "1", title: "Rain in Lisbon" },
      { id: "2", title: "Snow in Oslo" },
      { id: "3", title: "Rain in Porto" },
    ]);
    globalThis.fetch = fetchMock;
    const { callTool } = setup();

    const result = await callTool("search_events", { query: "rain", limit: 1, page_size: 50 });

    expect(result.structuredContent).toMatchObject({ count: 1, skipped: 0 });
    expect(result.structuredContent?.events).toEqual([expect.objectContaining({ id: "1" })]);
    expect(fetchMock).toHaveBeenCalledWith("https://gamma.test/events?limit=50", expect.anything());
  });

  it("get_mid_price returns the mid with its status", async () => {
    const { callTool, venue } = setup();
    venue.getOrderBook.mockResolvedValueOnce({
      tokenId: "111",
      bids: [{ price: 0.45, size: 1 }, { price: 0.4, size: 1 }],
      asks: [{ price: 0.55, size: 1 }, { price: 0.6, size: 1 }],
    });

    const result = await callTool("get_mid_price", { token_id: "111" });

    expect(result.structuredContent).toEqual({
      token_id: "111",
      mid_price: 0.5,
      status: "ok",
      best_bid: 0.45,
      best_ask: 0.55,
    });
  });

  it("get_mid_price returns null for an empty side without failing", async () => {
    const { callTool, venue } = setup();
    venue.getOrderBook.mockResolvedValueOnce({ tokenId: "111", bids: [], asks: [{ price: "0.55", size: "1" }] });

    const result = await callTool("get_mid_price", { token_id: "111" });

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent).toEqual({ token_id: "111", mid_price: null, status: "empty_bids" });
  });

  it("list_all_markets applies the live filter and the limit", async () => {
    const { callTool, venue } = setup();
    venue.getSamplingMarkets.mockResolvedValueOnce({
      data: [venueRow("0x1"), venueRow("0x2", { closed: true }), venueRow("0x3"), venueRow("0x4")],
      nextCursor: "LTE=",
    });

    const result = await callTool("list_all_markets", { live_only: true, limit: 2 });

    expect(result.structuredContent).toMatchObject({ count: 2, skipped: 0, pages: 1 });
    expect(result.structuredContent?.markets).toEqual([
      expect.objectContaining({ id: "0x1", clobTokenIds: ["0x1-yes", "0x1-no"] }),
      expect.objectContaining({ id: "0x3" }),
    ]);
  });

  it("search_markets searches the scanned markets", async () => {
    const { callTool, venue } = setup();
    venue.getSamplingMarkets.mockResolvedValueOnce({
      data: [
        venueRow("0x1", { question: "Will it rain tomorrow?" }),
        venueRow("0x2", { question: "Snow?" }),
        venueRow("0x3", { question: null }),
      ],
    });

    const result = await callTool("search_markets", { query: "RAIN" });

    expect(result.structuredContent).toMatchObject({ count: 1 });
    expect(result.structuredContent?.markets).toEqual([expect.objectContaining({ id: "0x1" })]);
  });

  it("place_market_order falls back to FOK", async () => {
    const { callTool, venue } = setup();
    venue.postMarketOrder.mockResolvedValueOnce({ orderID: "0xorder" });

    const result = await callTool("place_market_order", { token_id: "111", amount: 10, order_type: "someday" });

    expect(result.structuredContent).toEqual({ order_type: "FOK", response: { orderID: "0xorder" } });
    expect(venue.postMarketOrder).toHaveBeenCalledWith({ tokenId: "111", amount: 10, side: "BUY" }, "FOK");
  });

  it("place_limit_order rejects an unknown side before reaching the venue", async () => {
    const { callTool, venue } = setup();

    const result = await callTool("place_limit_order", { token_id: "111", price: 0.5, size: 1, side: "HOLD" });

    expect(result.isError).toBe(true);
    expect(venue.postLimitOrder).not.toHaveBeenCalled();
  });

  it("get_positions defaults to the server wallet", async () => {
    const fetchMock = mockFetchJson([{ asset: "111" }]);
    globalThis.fetch = fetchMock;
    const { callTool } = setup();

    const result = await callTool("get_positions", { limit: 5 });

    expect(result.structuredContent).toEqual({ user: WALLET, positions: [{ asset: "111" }] });
    expect(fetchMock).toHaveBeenCalledWith(`https://data.test/positions?limit=5&user=${WALLET}`, expect.anything());
  });

  it("get_usdc_balance reads the given wallet", async () => {
    const { callTool, chain } = setup();
    chain.getUsdcBalance.mockResolvedValueOnce(42.5);

    const result = await callTool("get_usdc_balance", { user: "0xother" });

    expect(result.structuredContent).toEqual({ user: "0xother", balance: 42.5 });
  });

  it("redeem_position returns the transaction hash", async () => {
    const { callTool, chain } = setup();
    chain.redeemPositions.mockResolvedValueOnce("0xhash");

    const result = await callTool("redeem_position", { condition_id: "0xcond", index_sets: [1, 2] });

    expect(result.structuredContent).toEqual({ condition_id: "0xcond", tx_hash: "0xhash" });
  });

  it("redeem_position reports chain failures as an error result", async () => {
    const { callTool, chain } = setup();
    chain.redeemPositions.mockRejectedValueOnce(new PolymarketError("Failed to submit redemption: reverted", "chain_error"));

    const result = await callTool("redeem_position", { condition_id: "0xcond", index_sets: [1] });

    expect(result.isError).toBe(true);
    expect(errorOf(result)).toBe("Failed to submit redemption: reverted");
  });
});
