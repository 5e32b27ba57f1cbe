import type { MarketRecord } from "./market.js";

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse a market end timestamp to epoch milliseconds.
 *
 * An empty or absent string means the market has no stated end and yields
 * `Infinity`. A trailing `Z` is UTC; a date-time with no zone designator is
 * read as UTC too. Unparseable input yields `NaN`.
 */
export function parseEndDate(value: string | null | undefined): number {
  if (!value || value.trim() === "") {
    return Number.POSITIVE_INFINITY;
  }
  const trimmed = value.trim();
  const normalized = trimmed.includes("T") && !ZONE_SUFFIX.test(trimmed) ? `${trimmed}Z` : trimmed;
  return Date.parse(normalized);
}

/**
 * Whether a market is eligible for trading at `now`.
 *
 * All four gating flags must be favorable and the end timestamp strictly
 * after `now`.
 */
export function isLive(market: MarketRecord, now: Date = new Date()): boolean {
  return (
    market.active === true &&
    market.closed === false &&
    market.archived === false &&
    market.acceptingOrders === true &&
    parseEndDate(market.endDate) > now.getTime()
  );
}
