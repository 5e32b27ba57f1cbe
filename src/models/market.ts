/**
 * Normalized market model.
 *
 * Upstream market rows carry dozens of optional fields and drift over time.
 * Every row is validated against a fixed schema here; only the identifier,
 * the four tradability flags and the token legs are required. Unknown keys
 * are dropped.
 *
 * @packageDocumentation
 */

import { z } from "zod";
import { coerceNumeric } from "./json.js";

const DEFAULT_LIQUIDITY = 10000.0;

const looseNumber = z.preprocess(coerceNumeric, z.number());

function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const rewardRateSchema = z.object({
  asset_address: z.string(),
  rewards_daily_rate: looseNumber,
});

const rewardsSchema = z.object({
  rates: optional(z.union([rewardRateSchema, z.array(rewardRateSchema)])),
  min_size: optional(looseNumber).transform((v) => v ?? 0),
  max_spread: optional(looseNumber).transform((v) => v ?? 0),
});

const tokenQuoteSchema = z.object({
  token_id: z.string(),
  outcome: z.string(),
  price: optional(looseNumber),
  winner: z.boolean().nullish(),
});

/**
 * Raw market row as the venue's market listing returns it
 */
export const rawMarketSchema = z.object({
  condition_id: z.string(),
  active: z.boolean(),
  closed: z.boolean(),
  archived: z.boolean(),
  accepting_orders: z.boolean(),
  tokens: z.array(tokenQuoteSchema),

  question: optional(z.string()),
  description: optional(z.string()),
  market_slug: optional(z.string()),
  end_date_iso: optional(z.string()),
  rewards: optional(rewardsSchema),
  liquidity: optional(looseNumber),

  question_id: optional(z.string()),
  enable_order_book: optional(z.boolean()),
  accepting_order_timestamp: optional(z.string()),
  game_start_time: optional(z.string()),
  seconds_delay: optional(looseNumber),
  fpmm: optional(z.string()),
  maker_base_fee: optional(looseNumber),
  taker_base_fee: optional(looseNumber),
  notifications_enabled: optional(z.boolean()),
  neg_risk: optional(z.boolean()),
  neg_risk_market_id: optional(z.string()),
  neg_risk_request_id: optional(z.string()),
  icon: optional(z.string()),
  image: optional(z.string()),
  is_50_50_outcome: optional(z.boolean()),
  tags: optional(z.array(z.string())),
  minimum_order_size: optional(looseNumber),
  minimum_tick_size: optional(looseNumber),
});

export type RawMarket = z.input<typeof rawMarketSchema>;

/**
 * Liquidity-incentive rate for one reward asset
 */
export interface RewardRate {
  assetAddress: string;
  rewardsDailyRate: number;
}

/**
 * Liquidity-incentive terms of a market
 */
export interface Rewards {
  /** Absent, a single rate, or several */
  rates?: RewardRate | RewardRate[];
  minSize: number;
  maxSpread: number;
}

/**
 * One outcome leg of a market
 */
export interface TokenQuote {
  /** CLOB token id, unique within the market */
  tokenId: string;

  /** Outcome label (e.g. "Yes") */
  outcome: string;

  /** Last price; null for an untraded outcome */
  price: number | null;

  /** Resolution flag; null while pending */
  winner: boolean | null;
}

/**
 * Normalized view of one tradeable market
 */
export interface MarketRecord {
  conditionId: string;
  active: boolean;
  closed: boolean;
  archived: boolean;
  acceptingOrders: boolean;

  question?: string;
  description?: string;
  marketSlug?: string;

  /** ISO-8601 end timestamp; absent means no stated end */
  endDate?: string;

  tokens: TokenQuote[];
  rewards?: Rewards;
  liquidity: number;

  questionId?: string;
  enableOrderBook?: boolean;
  acceptingOrderTimestamp?: string;
  gameStartTime?: string;
  secondsDelay?: number;
  fpmm?: string;
  makerBaseFee?: number;
  takerBaseFee?: number;
  notificationsEnabled?: boolean;
  negRisk?: boolean;
  negRiskMarketId?: string;
  negRiskRequestId?: string;
  icon?: string;
  image?: string;
  is5050Outcome?: boolean;
  tags?: string[];
  minimumOrderSize?: number;
  minimumTickSize?: number;
}

export type NormalizeResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string[] };

function toRewardRate(rate: z.output<typeof rewardRateSchema>): RewardRate {
  return { assetAddress: rate.asset_address, rewardsDailyRate: rate.rewards_daily_rate };
}

function toRecord(raw: z.output<typeof rawMarketSchema>): MarketRecord {
  const rates = raw.rewards?.rates;

  return {
    conditionId: raw.condition_id,
    active: raw.active,
    closed: raw.closed,
    archived: raw.archived,
    acceptingOrders: raw.accepting_orders,
    question: raw.question,
    description: raw.description,
    marketSlug: raw.market_slug,
    endDate: raw.end_date_iso,
    tokens: raw.tokens.map((t) => ({
      tokenId: t.token_id,
      outcome: t.outcome,
      price: t.price ?? null,
      winner: t.winner ?? null,
    })),
    rewards: raw.rewards
      ? {
          rates: Array.isArray(rates) ? rates.map(toRewardRate) : rates ? toRewardRate(rates) : undefined,
          minSize: raw.rewards.min_size,
          maxSpread: raw.rewards.max_spread,
        }
      : undefined,
    liquidity: raw.liquidity ?? DEFAULT_LIQUIDITY,
    questionId: raw.question_id,
    enableOrderBook: raw.enable_order_book,
    acceptingOrderTimestamp: raw.accepting_order_timestamp,
    gameStartTime: raw.game_start_time,
    secondsDelay: raw.seconds_delay,
    fpmm: raw.fpmm,
    makerBaseFee: raw.maker_base_fee,
    takerBaseFee: raw.taker_base_fee,
    notificationsEnabled: raw.notifications_enabled,
    negRisk: raw.neg_risk,
    negRiskMarketId: raw.neg_risk_market_id,
    negRiskRequestId: raw.neg_risk_request_id,
    icon: raw.icon,
    image: raw.image,
    is5050Outcome: raw.is_50_50_outcome,
    tags: raw.tags,
    minimumOrderSize: raw.minimum_order_size,
    minimumTickSize: raw.minimum_tick_size,
  };
}

/**
 * Validate one upstream market row.
 *
 * @returns The normalized record, or the list of schema issues
 */
export function normalizeMarket(payload: unknown): NormalizeResult<MarketRecord> {
  const parsed = rawMarketSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
    };
  }
  return { ok: true, value: toRecord(parsed.data) };
}

/**
 * Normalize a batch of rows, dropping the ones that fail validation.
 * Input order is preserved.
 */
export function normalizeMarkets(rows: readonly unknown[]): { markets: MarketRecord[]; skipped: number } {
  const markets: MarketRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const result = normalizeMarket(row);
    if (result.ok) {
      markets.push(result.value);
    } else {
      skipped++;
    }
  }

  return { markets, skipped };
}

// ============================================================================
// Derived views
// ============================================================================

export function outcomes(market: MarketRecord): string[] {
  return market.tokens.map((t) => t.outcome);
}

/** Token prices in token order; an untraded outcome counts as 0 */
export function outcomePrices(market: MarketRecord): number[] {
  return market.tokens.map((t) => t.price ?? 0.0);
}

export function clobTokenIds(market: MarketRecord): string[] {
  return market.tokens.map((t) => t.tokenId);
}

/**
 * JSON shape returned to tool callers: the stored fields plus every derived
 * view, computed at serialization time.
 */
export function toMarketJson(market: MarketRecord): Record<string, unknown> {
  return {
    id: market.conditionId,
    ...market,
    outcomes: outcomes(market),
    outcomePrices: outcomePrices(market),
    clobTokenIds: clobTokenIds(market),
    rewardsMinSize: market.rewards?.minSize ?? 0,
    rewardsMaxSpread: market.rewards?.maxSpread ?? 0,
  };
}
