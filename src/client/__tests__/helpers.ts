import { vi } from "vitest";
import pino, { type Logger } from "pino";
import { PolymarketClient } from "../client.js";
import { GammaApi } from "../../upstream/gamma.js";
import { DataApi } from "../../upstream/data.js";
import type { VenueGateway } from "../../upstream/clob.js";
import type { ChainGateway } from "../../upstream/chain.js";
import { isRecord } from "../../models/json.js";

export const WALLET = "0x00000000000000000000000000000000000000aa";

/**
 * Venue fake with every method stubbed
 */
export function fakeVenue() {
  return {
    getOrderBook: vi.fn<VenueGateway["getOrderBook"]>(),
    getPrice: vi.fn<VenueGateway["getPrice"]>(),
    getSamplingMarkets: vi.fn<VenueGateway["getSamplingMarkets"]>(),
    postLimitOrder: vi.fn<VenueGateway["postLimitOrder"]>(),
    postMarketOrder: vi.fn<VenueGateway["postMarketOrder"]>(),
    cancelOrder: vi.fn<VenueGateway["cancelOrder"]>(),
  } satisfies VenueGateway;
}

export function fakeChain() {
  return {
    getUsdcBalance: vi.fn<ChainGateway["getUsdcBalance"]>(),
    redeemPositions: vi.fn<ChainGateway["redeemPositions"]>(),
  } satisfies ChainGateway;
}

/**
 * A client over fake venue and chain gateways. Gamma and Data API calls go
 * through `globalThis.fetch`, which tests replace.
 */
export function createTestClient(logger: Logger = pino({ level: "silent" })) {
  const venue = fakeVenue();
  const chain = fakeChain();
  const client = new PolymarketClient({
    address: WALLET,
    venue,
    gamma: new GammaApi({ baseUrl: "https://gamma.test" }),
    data: new DataApi({ baseUrl: "https://data.test" }),
    chain,
    logger,
  });
  return { client, venue, chain, logger };
}

/**
 * Logger that keeps every record it writes, parsed
 */
export function captureLogger() {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isRecord(parsed)) records.push(parsed);
      },
    }
  );
  return { logger, records };
}

/**
 * Venue row for a market with two outcome tokens
 */
export function venueRow(conditionId: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    condition_id: conditionId,
    question: `Question ${conditionId}`,
    active: true,
    closed: false,
    archived: false,
    accepting_orders: true,
    end_date_iso: "2999-01-01T00:00:00Z",
    tokens: [
      { token_id: `${conditionId}-yes`, outcome: "Yes", price: 0.5 },
      { token_id: `${conditionId}-no`, outcome: "No", price: 0.5 },
    ],
    ...overrides,
  };
}

/**
 * Metadata API row for a market with two outcome tokens
 */
export function gammaRow(conditionId: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    conditionId,
    question: `Question ${conditionId}`,
    slug: `slug-${conditionId}`,
    active: true,
    closed: false,
    archived: false,
    acceptingOrders: true,
    endDate: "2999-01-01T00:00:00Z",
    outcomes: '["Yes","No"]',
    outcomePrices: '["0.5","0.5"]',
    clobTokenIds: `["${conditionId}-yes","${conditionId}-no"]`,
    ...overrides,
  };
}

/**
 * Mock a JSON response from fetch
 */
export function mockFetchJson(data: unknown, status = 200) {
  return vi.fn().mockResolvedValue(jsonResponse(data, status));
}

export function jsonResponse(data: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    json: () => Promise.resolve(data),
    text: () => Promise.resolve(JSON.stringify(data)),
    headers: new Headers(),
  };
}
