import type { Logger } from "pino";
import type { PolymarketClient } from "../client.js";
import type { EventBatch, EventQuery, MarketBatch, MarketScan } from "../types.js";
import { normalizeMarkets, type MarketRecord } from "../../models/market.js";
import { normalizeEvents, normalizeGammaMarkets, type EventRecord } from "../../models/gamma.js";
import { isLive } from "../../models/liveness.js";
import { END_CURSOR } from "../../upstream/clob.js";

/** Page size for offset pagination over the Gamma markets listing */
const GAMMA_PAGE_SIZE = 100;

function matchesQuery(text: string | undefined, query: string): boolean {
  if (text === undefined) return false;
  return text.toLowerCase().includes(query.toLowerCase());
}

function truncate<T>(items: T[], limit?: number): T[] {
  return limit === undefined ? items : items.slice(0, Math.max(0, limit));
}

/**
 * Keep only records that can be traded at `now`. Order is preserved.
 */
export function filterForTrading(records: readonly MarketRecord[], now: Date = new Date()): MarketRecord[] {
  return records.filter((m) => isLive(m, now));
}

/**
 * Case-insensitive substring match against each record's question. A record
 * without a question never matches. `limit` truncates from the front.
 */
export function searchMarkets(records: readonly MarketRecord[], query: string, limit?: number): MarketRecord[] {
  return truncate(
    records.filter((m) => matchesQuery(m.question, query)),
    limit
  );
}

/**
 * Same matching rule as `searchMarkets`, against each event's title.
 */
export function searchEvents(records: readonly EventRecord[], query: string, limit?: number): EventRecord[] {
  return truncate(
    records.filter((e) => matchesQuery(e.title, query)),
    limit
  );
}

/**
 * Markets resource: listing, lookup and search over the venue and Gamma
 */
export class Markets {
  private readonly logger: Logger;

  constructor(private client: PolymarketClient) {
    this.logger = client.logger.child({ component: "markets" });
  }

  /**
   * Walk the venue's cursor-paginated listing from the first page until the
   * venue stops returning a cursor (absent, empty or the end sentinel).
   *
   * No page cap is applied: an upstream that never ends pagination makes this
   * call never return.
   */
  async scanAllMarkets(): Promise<MarketScan> {
    const markets: MarketRecord[] = [];
    let skipped = 0;
    let pages = 0;
    let cursor = "";

    for (;;) {
      const page = await this.client.venue.getSamplingMarkets(cursor);
      pages++;

      const batch = normalizeMarkets(page.data);
      markets.push(...batch.markets);
      skipped += batch.skipped;

      this.logger.debug({ page: pages, rows: page.data.length, cursor }, "Fetched market page");

      const next = page.nextCursor;
      if (!next || next === END_CURSOR) break;
      cursor = next;
    }

    if (skipped > 0) {
      this.logger.warn({ skipped, pages }, "Dropped invalid market rows during scan");
    }

    return { markets, skipped, pages };
  }

  /**
   * Every valid market the venue lists, in page order
   */
  async listAllMarkets(): Promise<MarketRecord[]> {
    return (await this.scanAllMarkets()).markets;
  }

  /**
   * Markets whose slug matches exactly, from Gamma
   */
  async getMarketBySlug(slug: string): Promise<MarketRecord[]> {
    const rows = await this.client.gamma.getMarkets({ slug });
    return this.normalizeGamma(rows, "slug lookup").markets;
  }

  /**
   * Active, open, unarchived markets from Gamma. With a limit a single page of
   * that size is fetched; without one, pages of 100 are read until a short
   * page comes back.
   */
  async listCurrentMarkets(limit?: number): Promise<MarketBatch> {
    const filters = { active: true, closed: false, archived: false };

    if (limit !== undefined) {
      const rows = await this.client.gamma.getMarkets({ ...filters, limit, offset: 0 });
      return this.normalizeGamma(rows, "current markets");
    }

    const rows: unknown[] = [];
    let offset = 0;
    for (;;) {
      const page = await this.client.gamma.getMarkets({ ...filters, limit: GAMMA_PAGE_SIZE, offset });
      rows.push(...page);
      this.logger.debug({ offset, rows: page.length }, "Fetched Gamma market page");
      if (page.length < GAMMA_PAGE_SIZE) break;
      offset += GAMMA_PAGE_SIZE;
    }
    return this.normalizeGamma(rows, "current markets");
  }

  /**
   * Events from Gamma with their nested markets
   */
  async listEvents(query: EventQuery = {}): Promise<EventBatch> {
    const rows = await this.client.gamma.getEvents({ ...query });
    const batch = normalizeEvents(rows);
    if (batch.skipped > 0) {
      this.logger.warn({ skipped: batch.skipped }, "Dropped invalid event rows");
    }
    return batch;
  }

  filterForTrading(records: readonly MarketRecord[], now?: Date): MarketRecord[] {
    return filterForTrading(records, now);
  }

  search(records: readonly MarketRecord[], query: string, limit?: number): MarketRecord[] {
    return searchMarkets(records, query, limit);
  }

  searchEvents(records: readonly EventRecord[], query: string, limit?: number): EventRecord[] {
    return searchEvents(records, query, limit);
  }

  private normalizeGamma(rows: readonly unknown[], label: string): MarketBatch {
    const batch = normalizeGammaMarkets(rows);
    if (batch.skipped > 0) {
      this.logger.warn({ skipped: batch.skipped, source: label }, "Dropped invalid market rows");
    }
    return batch;
  }
}
