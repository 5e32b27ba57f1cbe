import type { Logger } from "pino";
import type { PolymarketClient } from "../client.js";
import type { DataQuery } from "../types.js";

/**
 * Account resource: positions, trades and value for a wallet (the server's
 * own wallet unless another address is given), plus the on-chain balance and
 * redemption.
 */
export class Account {
  private readonly logger: Logger;

  constructor(private client: PolymarketClient) {
    this.logger = client.logger.child({ component: "account" });
  }

  async getPositions(user?: string, params: DataQuery = {}): Promise<unknown> {
    return this.client.data.getPositions(user ?? this.client.address, params);
  }

  async getClosedPositions(user?: string, params: DataQuery = {}): Promise<unknown> {
    return this.client.data.getClosedPositions(user ?? this.client.address, params);
  }

  async getTrades(user?: string, params: DataQuery = {}): Promise<unknown> {
    return this.client.data.getTrades(user ?? this.client.address, params);
  }

  async getPortfolioValue(user?: string): Promise<unknown> {
    return this.client.data.getPortfolioValue(user ?? this.client.address);
  }

  /** Stablecoin balance in whole units */
  async getUsdcBalance(user?: string): Promise<number> {
    return this.client.chain.getUsdcBalance(user ?? this.client.address);
  }

  /**
   * Redeem resolved outcome tokens for collateral.
   *
   * @returns The transaction hash; the receipt is not awaited
   */
  async redeemPosition(conditionId: string, indexSets: number[]): Promise<string> {
    const hash = await this.client.chain.redeemPositions(conditionId, indexSets);
    this.logger.info({ conditionId, indexSets, hash }, "Redemption submitted");
    return hash;
  }
}
