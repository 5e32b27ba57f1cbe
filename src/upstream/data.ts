import { HttpJsonClient, type QueryParams } from "./http.js";

export const DEFAULT_DATA_URL = "https://data-api.polymarket.com";

/**
 * Settlement data API: wallet-scoped positions, trades and value.
 * Responses are passed through as decoded JSON.
 */
export class DataApi {
  private readonly http: HttpJsonClient;

  constructor(options: { baseUrl?: string; timeoutMs?: number } = {}) {
    this.http = new HttpJsonClient({
      baseUrl: options.baseUrl ?? DEFAULT_DATA_URL,
      name: "Data API",
      timeoutMs: options.timeoutMs,
    });
  }

  /**
   * Current (open) positions. If trading through a proxy wallet, pass the
   * funder address.
   */
  async getPositions(user: string, params: QueryParams = {}): Promise<unknown> {
    return this.http.get("/positions", { ...params, user });
  }

  /** Resolved positions with realized PnL */
  async getClosedPositions(user: string, params: QueryParams = {}): Promise<unknown> {
    return this.http.get("/closed-positions", { ...params, user });
  }

  /**
   * User trades. Filters include `limit`, `offset`, `market`, `side`.
   */
  async getTrades(user: string, params: QueryParams = {}): Promise<unknown> {
    return this.http.get("/trades", { ...params, user });
  }

  /** Aggregated wallet value */
  async getPortfolioValue(user: string): Promise<unknown> {
    return this.http.get("/value", { user });
  }
}
