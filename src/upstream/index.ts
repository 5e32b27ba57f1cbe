/**
 * Upstream gateways: the venue (CLOB), the metadata (Gamma) and settlement
 * (Data) HTTP APIs, and the chain.
 *
 * @packageDocumentation
 */

export { HttpJsonClient, buildQuery } from "./http.js";
export type { HttpJsonClientOptions, QueryParams } from "./http.js";

export { GammaApi, DEFAULT_GAMMA_URL } from "./gamma.js";
export { DataApi, DEFAULT_DATA_URL } from "./data.js";

export { ClobVenue, DEFAULT_CLOB_URL, END_CURSOR } from "./clob.js";
export type {
  VenueGateway,
  ClobVenueOptions,
  MarketPage,
  LimitOrderRequest,
  MarketOrderRequest,
} from "./clob.js";

export {
  ViemChain,
  accountFromPrivateKey,
  USDC_ADDRESS,
  CONDITIONAL_TOKENS_ADDRESS,
} from "./chain.js";
export type { ChainGateway, ViemChainOptions } from "./chain.js";
