import type { Logger } from "pino";
import type { PolymarketClientOptions } from "./types.js";
import type { ServerConfig } from "../config/index.js";
import type { VenueGateway } from "../upstream/clob.js";
import type { ChainGateway } from "../upstream/chain.js";
import { ClobVenue } from "../upstream/clob.js";
import { GammaApi } from "../upstream/gamma.js";
import { DataApi } from "../upstream/data.js";
import { ViemChain, accountFromPrivateKey } from "../upstream/chain.js";
import { Markets } from "./resources/markets.js";
import { OrderBook } from "./resources/orderbook.js";
import { Trading } from "./resources/trading.js";
import { Account } from "./resources/account.js";

/**
 * Client context for one venue account. Owns every upstream handle and the
 * signing key; build it once at startup and share it.
 *
 * @example
 * ```typescript
 * const client = await PolymarketClient.connect(loadConfig(), createLogger());
 *
 * const { markets } = await client.markets.scanAllMarkets();
 * const live = client.markets.filterForTrading(markets);
 * const mid = await client.orderbook.getMid(live[0].tokens[0].tokenId);
 * ```
 */
export class PolymarketClient {
  /** Wallet address of the signing key; the default `user` for account reads */
  public readonly address: string;

  /** @internal */
  readonly venue: VenueGateway;
  /** @internal */
  readonly gamma: GammaApi;
  /** @internal */
  readonly data: DataApi;
  /** @internal */
  readonly chain: ChainGateway;
  /** @internal */
  readonly logger: Logger;

  /**
   * Market listing, lookup and search
   */
  public readonly markets: Markets;

  /**
   * Order books, mid and spot prices
   */
  public readonly orderbook: OrderBook;

  /**
   * Order submission and cancellation
   */
  public readonly trading: Trading;

  /**
   * Positions, trades, balance and redemption
   */
  public readonly account: Account;

  constructor(options: PolymarketClientOptions) {
    this.address = options.address;
    this.venue = options.venue;
    this.gamma = options.gamma;
    this.data = options.data;
    this.chain = options.chain;
    this.logger = options.logger;

    // Initialize resources
    this.markets = new Markets(this);
    this.orderbook = new OrderBook(this);
    this.trading = new Trading(this);
    this.account = new Account(this);
  }

  /**
   * Build every gateway from configuration. Derives CLOB API credentials
   * from the signing key when none are configured.
   */
  static async connect(config: ServerConfig, logger: Logger): Promise<PolymarketClient> {
    const account = accountFromPrivateKey(config.privateKey);

    const venue = await ClobVenue.connect({
      host: config.clobHost,
      chainId: config.chainId,
      privateKey: config.privateKey,
      creds: config.clobCreds,
      logger,
    });

    return new PolymarketClient({
      address: account.address,
      venue,
      gamma: new GammaApi({ baseUrl: config.gammaHost, timeoutMs: config.requestTimeoutMs }),
      data: new DataApi({ baseUrl: config.dataHost, timeoutMs: config.requestTimeoutMs }),
      chain: new ViemChain({ rpcUrl: config.rpcUrl, chainId: config.chainId, account, logger }),
      logger,
    });
  }
}
