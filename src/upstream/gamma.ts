import { PolymarketError } from "../client/types.js";
import { HttpJsonClient, type QueryParams } from "./http.js";

export const DEFAULT_GAMMA_URL = "https://gamma-api.polymarket.com";

/**
 * Market metadata ("Gamma") API. Returns raw rows; normalization is the
 * caller's job.
 */
export class GammaApi {
  private readonly http: HttpJsonClient;

  constructor(options: { baseUrl?: string; timeoutMs?: number } = {}) {
    this.http = new HttpJsonClient({
      baseUrl: options.baseUrl ?? DEFAULT_GAMMA_URL,
      name: "Gamma API",
      timeoutMs: options.timeoutMs,
    });
  }

  /**
   * List markets, e.g. `{ active: true, closed: false, limit: 100, offset: 0 }`
   * or `{ slug: "..." }`.
   */
  async getMarkets(params?: QueryParams): Promise<unknown[]> {
    return expectArray(await this.http.get("/markets", params), "/markets");
  }

  async getEvents(params?: QueryParams): Promise<unknown[]> {
    return expectArray(await this.http.get("/events", params), "/events");
  }
}

function expectArray(body: unknown, endpoint: string): unknown[] {
  if (!Array.isArray(body)) {
    throw new PolymarketError(`Gamma API returned a non-list body for ${endpoint}`, "upstream_error");
  }
  return body;
}
