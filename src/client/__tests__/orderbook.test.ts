import { describe, it, expect } from "vitest";
import { createTestClient } from "./helpers.js";
import { PolymarketError } from "../types.js";

const SNAPSHOT = {
  tokenId: "111",
  market: "0xabc",
  bids: [
    { price: "0.45", size: "100" },
    { price: "0.40", size: "50" },
  ],
  asks: [
    { price: "0.55", size: "100" },
    { price: "0.60", size: "50" },
  ],
};

describe("OrderBook", () => {
  it("returns the snapshot as received", async () => {
    const { client, venue } = createTestClient();
    venue.getOrderBook.mockResolvedValueOnce(SNAPSHOT);

    expect(await client.orderbook.getOrderBook("111")).toEqual(SNAPSHOT);
    expect(venue.getOrderBook).toHaveBeenCalledWith("111");
  });

  it("computes the mid from the book", async () => {
    const { client, venue } = createTestClient();
    venue.getOrderBook.mockResolvedValueOnce(SNAPSHOT);

    expect(await client.orderbook.getMid("111")).toBe(0.5);
  });

  it("returns null, not zero, for a one-sided book", async () => {
    const { client, venue } = createTestClient();
    venue.getOrderBook.mockResolvedValueOnce({ ...SNAPSHOT, bids: [] });

    expect(await client.orderbook.getMid("111")).toBeNull();
  });

  it("tags why no mid is available", async () => {
    const { client, venue } = createTestClient();
    venue.getOrderBook.mockResolvedValueOnce({ ...SNAPSHOT, asks: [{ price: "n/a", size: "1" }] });

    expect(await client.orderbook.getMidQuote("111")).toEqual({ kind: "malformed", side: "ask", raw: "n/a" });
  });

  it.each([
    [{ price: "0.52" }, 0.52],
    [{ price: 0.48 }, 0.48],
    ["0.3", 0.3],
  ])("parses the spot price from %j", async (body, expected) => {
    const { client, venue } = createTestClient();
    venue.getPrice.mockResolvedValueOnce(body);

    expect(await client.orderbook.getPrice("111", "BUY")).toBe(expected);
    expect(venue.getPrice).toHaveBeenCalledWith("111", "BUY");
  });

  it("rejects a price body without a number", async () => {
    const { client, venue } = createTestClient();
    venue.getPrice.mockResolvedValueOnce({ price: "" });

    const error = await client.orderbook.getPrice("111", "SELL").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PolymarketError);
    expect(error).toMatchObject({ code: "upstream_error", message: "CLOB returned no price for token 111" });
  });
});
