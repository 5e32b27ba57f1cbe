import { describe, it, expect, vi } from "vitest";
import { custom, encodeAbiParameters } from "viem";
import pino from "pino";
import { ViemChain, accountFromPrivateKey, USDC_ADDRESS } from "../chain.js";
import { PolymarketError } from "../../client/types.js";

// Placeholder key, never funded
const TEST_KEY = `0x${"11".repeat(32)}`;
const OWNER = "0x00000000000000000000000000000000000000aa";

function chainWith(request: (args: { method: string; params?: unknown }) => Promise<unknown>) {
  return new ViemChain({
    rpcUrl: "http://rpc.test",
    chainId: 137,
    account: accountFromPrivateKey(TEST_KEY),
    logger: pino({ level: "silent" }),
    transport: custom({ request }, { retryCount: 0 }),
  });
}

describe("accountFromPrivateKey", () => {
  it("accepts a key with or without the 0x prefix", () => {
    expect(accountFromPrivateKey("11".repeat(32)).address).toBe(accountFromPrivateKey(TEST_KEY).address);
  });

  it("rejects a key of the wrong length", () => {
    expect(() => accountFromPrivateKey("0x1234")).toThrow(PolymarketError);
  });
});

describe("ViemChain", () => {
  it("reads the USDC balance scaled by 6 decimals", async () => {
    const request = vi.fn(async ({ method }: { method: string; params?: unknown }) => {
      if (method === "eth_call") return encodeAbiParameters([{ type: "uint256" }], [12_345_678n]);
      throw new Error(`unexpected ${method}`);
    });
    const chain = chainWith(request);

    expect(await chain.getUsdcBalance(OWNER)).toBe(12.345678);
    expect(request).toHaveBeenCalledTimes(1);
    expect(JSON.stringify(request.mock.calls[0][0]).toLowerCase()).toContain(USDC_ADDRESS.toLowerCase());
  });

  it("wraps RPC failures as chain errors", async () => {
    const chain = chainWith(async () => {
      throw new Error("rpc down");
    });

    await expect(chain.getUsdcBalance(OWNER)).rejects.toMatchObject({ code: "chain_error" });
  });

  it("rejects an invalid owner address before calling the RPC", async () => {
    const request = vi.fn();
    const chain = chainWith(request);

    await expect(chain.getUsdcBalance("not-an-address")).rejects.toMatchObject({ code: "invalid_arguments" });
    expect(request).not.toHaveBeenCalled();
  });

  it("rejects a condition id that is not 32 bytes", async () => {
    const request = vi.fn();
    const chain = chainWith(request);

    await expect(chain.redeemPositions("0x1234", [1, 2])).rejects.toMatchObject({ code: "invalid_arguments" });
    expect(request).not.toHaveBeenCalled();
  });

  it("wraps a failed submission as a chain error", async () => {
    const chain = chainWith(async () => {
      throw new Error("insufficient funds");
    });

    await expect(chain.redeemPositions(`0x${"ab".repeat(32)}`, [1, 2])).rejects.toMatchObject({
      code: "chain_error",
    });
  });
});
