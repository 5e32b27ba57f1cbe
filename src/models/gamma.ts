/**
 * Gamma (market metadata API) rows use camelCase keys and encode token
 * arrays as JSON strings. They are mapped onto the venue's row shape and
 * validated with the same schema, so both sources yield one MarketRecord.
 */

import { z } from "zod";
import { coerceNumeric, isRecord, parseJsonArray } from "./json.js";
import { normalizeMarket, toMarketJson, type MarketRecord, type NormalizeResult } from "./market.js";

function stringOrUndefined(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function buildTokens(row: Record<string, unknown>): unknown[] | undefined {
  const tokenIds = parseJsonArray(row.clobTokenIds);
  if (!tokenIds) return undefined;

  const labels = parseJsonArray(row.outcomes) ?? [];
  const prices = parseJsonArray(row.outcomePrices) ?? [];

  return tokenIds.map((tokenId, i) => ({
    token_id: stringOrUndefined(tokenId),
    outcome: labels[i],
    price: prices[i] ?? null,
  }));
}

function buildRewards(row: Record<string, unknown>): unknown {
  const clobRewards = Array.isArray(row.clobRewards) ? row.clobRewards : undefined;
  if (clobRewards === undefined && row.rewardsMinSize == null && row.rewardsMaxSpread == null) {
    return undefined;
  }

  return {
    rates: clobRewards?.map((r) =>
      isRecord(r) ? { asset_address: r.assetAddress, rewards_daily_rate: r.rewardsDailyRate } : r
    ),
    min_size: row.rewardsMinSize,
    max_spread: row.rewardsMaxSpread,
  };
}

/**
 * Map one Gamma market row onto the venue row shape. Fields the mapping
 * cannot find are left undefined so validation reports them.
 */
export function gammaToRawMarket(row: unknown): unknown {
  if (!isRecord(row)) return row;

  return {
    condition_id: row.conditionId,
    active: row.active,
    closed: row.closed,
    archived: row.archived,
    accepting_orders: row.acceptingOrders,
    tokens: buildTokens(row),
    question: row.question,
    description: row.description,
    market_slug: row.slug,
    end_date_iso: row.endDateIso ?? row.endDate,
    rewards: buildRewards(row),
    liquidity: row.liquidityNum ?? row.liquidity,
    question_id: row.questionID,
    enable_order_book: row.enableOrderBook,
    neg_risk: row.negRisk,
    neg_risk_market_id: row.negRiskMarketID,
    neg_risk_request_id: row.negRiskRequestID,
    icon: row.icon,
    image: row.image,
    minimum_order_size: row.orderMinSize,
    minimum_tick_size: row.orderPriceMinTickSize,
  };
}

export function normalizeGammaMarket(row: unknown): NormalizeResult<MarketRecord> {
  return normalizeMarket(gammaToRawMarket(row));
}

export function normalizeGammaMarkets(rows: readonly unknown[]): { markets: MarketRecord[]; skipped: number } {
  const markets: MarketRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const result = normalizeGammaMarket(row);
    if (result.ok) markets.push(result.value);
    else skipped++;
  }

  return { markets, skipped };
}

// ============================================================================
// Events
// ============================================================================

const looseNumber = z.preprocess(coerceNumeric, z.number());

const gammaEventSchema = z.object({
  id: z.preprocess((v) => (typeof v === "number" ? String(v) : v), z.string()),
  ticker: z.string().nullish(),
  slug: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
  active: z.boolean().nullish(),
  closed: z.boolean().nullish(),
  archived: z.boolean().nullish(),
  liquidity: looseNumber.nullish(),
  volume: looseNumber.nullish(),
  tags: z.array(z.object({ label: z.string().nullish() }).passthrough()).nullish(),
  markets: z.array(z.unknown()).nullish(),
});

/**
 * Normalized Gamma event with its nested markets
 */
export interface EventRecord {
  id: string;
  ticker?: string;
  slug?: string;
  title?: string;
  description?: string;
  startDate?: string;
  endDate?: string;
  active?: boolean;
  closed?: boolean;
  archived?: boolean;
  liquidity?: number;
  volume?: number;

  /** Tag labels */
  tags: string[];

  /** Nested markets that passed validation */
  markets: MarketRecord[];

  /** Nested markets that failed validation */
  skippedMarkets: number;
}

export function normalizeEvent(row: unknown): NormalizeResult<EventRecord> {
  const parsed = gammaEventSchema.safeParse(row);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
    };
  }

  const e = parsed.data;
  const nested = normalizeGammaMarkets(e.markets ?? []);

  return {
    ok: true,
    value: {
      id: e.id,
      ticker: e.ticker ?? undefined,
      slug: e.slug ?? undefined,
      title: e.title ?? undefined,
      description: e.description ?? undefined,
      startDate: e.startDate ?? undefined,
      endDate: e.endDate ?? undefined,
      active: e.active ?? undefined,
      closed: e.closed ?? undefined,
      archived: e.archived ?? undefined,
      liquidity: e.liquidity ?? undefined,
      volume: e.volume ?? undefined,
      tags: (e.tags ?? []).flatMap((t) => (t.label ? [t.label] : [])),
      markets: nested.markets,
      skippedMarkets: nested.skipped,
    },
  };
}

export function normalizeEvents(rows: readonly unknown[]): { events: EventRecord[]; skipped: number } {
  const events: EventRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const result = normalizeEvent(row);
    if (result.ok) events.push(result.value);
    else skipped++;
  }

  return { events, skipped };
}

export function toEventJson(event: EventRecord): Record<string, unknown> {
  return { ...event, markets: event.markets.map(toMarketJson) };
}
