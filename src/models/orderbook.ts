/**
 * Order book snapshot and mid-price derivation.
 *
 * @packageDocumentation
 */

/**
 * One price level as the venue reports it. The venue sends decimal strings;
 * they are kept as received.
 */
export interface OrderBookLevel {
  price: string | number;
  size: string | number;
}

/**
 * Point-in-time two-sided book for one token. No ordering is assumed on
 * either side.
 */
export interface OrderBookSnapshot {
  tokenId: string;

  /** Condition id of the market, when the venue reports it */
  market?: string;

  /** Venue timestamp, when reported */
  timestamp?: string;

  bids: OrderBookLevel[];
  asks: OrderBookLevel[];
}

export type BookSide = "bid" | "ask";

/**
 * Outcome of a mid-price computation. Callers outside this layer only see
 * `mid` or "unavailable"; the other kinds say why.
 */
export type MidQuote =
  | { kind: "mid"; mid: number; bestBid: number; bestAsk: number }
  | { kind: "empty"; side: BookSide }
  | { kind: "malformed"; side: BookSide; raw: string };

function parsePrice(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return NaN;
}

type Best = { ok: true; price: number } | { ok: false; quote: MidQuote };

function bestPrice(levels: OrderBookLevel[], side: BookSide): Best {
  if (levels.length === 0) {
    return { ok: false, quote: { kind: "empty", side } };
  }

  let best = side === "bid" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  for (const level of levels) {
    const price = parsePrice(level.price);
    if (!Number.isFinite(price)) {
      return { ok: false, quote: { kind: "malformed", side, raw: String(level.price) } };
    }
    best = side === "bid" ? Math.max(best, price) : Math.min(best, price);
  }
  return { ok: true, price: best };
}

/**
 * Best bid is the highest bid price, best ask the lowest ask price; the mid
 * is their average rounded to 4 decimal places.
 */
export function quoteMid(snapshot: Pick<OrderBookSnapshot, "bids" | "asks">): MidQuote {
  const bid = bestPrice(snapshot.bids, "bid");
  if (!bid.ok) return bid.quote;

  const ask = bestPrice(snapshot.asks, "ask");
  if (!ask.ok) return ask.quote;

  return {
    kind: "mid",
    mid: Number(((bid.price + ask.price) / 2).toFixed(4)),
    bestBid: bid.price,
    bestAsk: ask.price,
  };
}

/** Collapse a quote to the external contract: a number or null */
export function midOrNull(quote: MidQuote): number | null {
  return quote.kind === "mid" ? quote.mid : null;
}
