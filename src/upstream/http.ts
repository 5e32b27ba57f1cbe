import { PolymarketError } from "../client/types.js";

export type QueryParams = Record<string, string | number | boolean | undefined | null>;

export interface HttpJsonClientOptions {
  /** Base URL of the upstream API, without trailing slash */
  baseUrl: string;

  /** Label used in error messages (e.g. "Gamma API") */
  name: string;

  /**
   * Abort each request after this many milliseconds
   * @default 15000
   */
  timeoutMs?: number;
}

/**
 * Build a query string, skipping undefined and null values.
 */
export function buildQuery(params: QueryParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    search.set(key, String(value));
  }
  const qs = search.toString();
  return qs ? `?${qs}` : "";
}

/**
 * Minimal JSON-over-HTTP client shared by the upstream APIs.
 * Every request is bounded by a timeout; any non-2xx status is raised as a
 * PolymarketError carrying the status and the start of the response body.
 */
export class HttpJsonClient {
  private readonly baseUrl: string;
  private readonly name: string;
  private readonly timeoutMs: number;

  constructor(options: HttpJsonClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.name = options.name;
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  async get(endpoint: string, params?: QueryParams): Promise<unknown> {
    return this.request(`${endpoint}${buildQuery(params)}`);
  }

  /**
   * @internal
   */
  async request(endpoint: string, options: RequestInit = {}): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          ...options.headers,
        },
      });

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new PolymarketError(
          `${this.name} error (${response.status}): ${text.slice(0, 200)}`,
          "upstream_error",
          response.status
        );
      }

      const body: unknown = await response.json();
      return body;
    } catch (error) {
      if (error instanceof PolymarketError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw new PolymarketError(`${this.name} timeout after ${this.timeoutMs}ms for ${endpoint}`, "timeout");
      }
      throw new PolymarketError(
        `${this.name} request failed: ${error instanceof Error ? error.message : String(error)}`,
        "upstream_error"
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
