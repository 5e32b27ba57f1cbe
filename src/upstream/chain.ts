import {
  createPublicClient,
  createWalletClient,
  formatUnits,
  http,
  isAddress,
  isHex,
  parseAbi,
  type Chain,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { polygon, polygonAmoy } from "viem/chains";
import type { Logger } from "pino";
import { PolymarketError } from "../client/types.js";

/** USDC.e on Polygon, the venue's collateral */
export const USDC_ADDRESS = "0x2791Bca1f2de4661ED88A30C99A7a9449Aa84174";

/** Conditional Tokens Framework contract holding outcome positions */
export const CONDITIONAL_TOKENS_ADDRESS = "0x4D97DCd97eC945f40cF65F87097ACe5EA0476045";

const USDC_DECIMALS = 6;

const ZERO_COLLECTION_ID: Hex = `0x${"0".repeat(64)}`;

const ERC20_ABI = parseAbi(["function balanceOf(address owner) view returns (uint256)"]);

const CTF_ABI = parseAbi([
  "function redeemPositions(address collateralToken, bytes32 parentCollectionId, bytes32 conditionId, uint256[] indexSets)",
]);

/**
 * Chain reads and writes this server needs. Implemented by `ViemChain`;
 * tests provide fakes.
 */
export interface ChainGateway {
  /** USDC balance in whole units */
  getUsdcBalance(address: string): Promise<number>;

  /**
   * Sign and submit a redemption; resolves with the transaction hash as soon
   * as the node accepts it.
   */
  redeemPositions(conditionId: string, indexSets: number[]): Promise<string>;
}

export interface ViemChainOptions {
  rpcUrl: string;
  chainId: number;
  account: PrivateKeyAccount;
  logger: Logger;

  /** Overrides the HTTP transport built from `rpcUrl` */
  transport?: Transport;
}

function toAddress(value: string): Hex {
  if (!isAddress(value)) {
    throw new PolymarketError(`Invalid address: ${value}`, "invalid_arguments");
  }
  return value;
}

function toBytes32(value: string): Hex {
  if (!isHex(value) || value.length !== 66) {
    throw new PolymarketError(`Invalid condition id: ${value}`, "invalid_arguments");
  }
  return value;
}

/**
 * Build the signing account from a hex private key, with or without 0x.
 */
export function accountFromPrivateKey(privateKey: string): PrivateKeyAccount {
  const hex = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
  if (!isHex(hex) || hex.length !== 66) {
    throw new PolymarketError("PRIVATE_KEY must be a 32-byte hex string", "configuration_error");
  }
  return privateKeyToAccount(hex);
}

export class ViemChain implements ChainGateway {
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient: WalletClient<Transport, Chain, PrivateKeyAccount>;
  private readonly account: PrivateKeyAccount;
  private readonly logger: Logger;

  constructor(options: ViemChainOptions) {
    const chain: Chain = options.chainId === polygonAmoy.id ? polygonAmoy : polygon;
    const transport = options.transport ?? http(options.rpcUrl);

    this.account = options.account;
    this.logger = options.logger.child({ component: "chain" });
    this.publicClient = createPublicClient({ chain, transport });
    this.walletClient = createWalletClient({ account: options.account, chain, transport });
  }

  async getUsdcBalance(address: string): Promise<number> {
    const owner = toAddress(address);
    try {
      const raw = await this.publicClient.readContract({
        address: USDC_ADDRESS,
        abi: ERC20_ABI,
        functionName: "balanceOf",
        args: [owner],
      });
      return Number(formatUnits(raw, USDC_DECIMALS));
    } catch (error) {
      this.logger.error({ error, address }, "Failed to read USDC balance");
      throw new PolymarketError(
        `Failed to read USDC balance: ${error instanceof Error ? error.message : String(error)}`,
        "chain_error"
      );
    }
  }

  async redeemPositions(conditionId: string, indexSets: number[]): Promise<string> {
    const condition = toBytes32(conditionId);
    try {
      const hash = await this.walletClient.writeContract({
        account: this.account,
        chain: this.walletClient.chain,
        address: CONDITIONAL_TOKENS_ADDRESS,
        abi: CTF_ABI,
        functionName: "redeemPositions",
        args: [USDC_ADDRESS, ZERO_COLLECTION_ID, condition, indexSets.map((i) => BigInt(i))],
      });
      this.logger.debug({ hash }, "redeemPositions transaction sent");
      return hash;
    } catch (error) {
      this.logger.error({ error, conditionId, indexSets }, "Redemption failed");
      throw new PolymarketError(
        `Failed to submit redemption: ${error instanceof Error ? error.message : String(error)}`,
        "chain_error"
      );
    }
  }
}
