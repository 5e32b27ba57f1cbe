import { describe, it, expect, vi, afterEach } from "vitest";
import { createTestClient, mockFetchJson, WALLET } from "./helpers.js";
import { PolymarketError } from "../types.js";

const OTHER = "0x00000000000000000000000000000000000000bb";
const CONDITION = `0x${"ab".repeat(32)}`;

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

describe("Account", () => {
  it("reads positions for the server wallet by default", async () => {
    const fetchMock = mockFetchJson([{ asset: "111", size: 10 }]);
    globalThis.fetch = fetchMock;
    const { client } = createTestClient();

    expect(await client.account.getPositions()).toEqual([{ asset: "111", size: 10 }]);
    expect(fetchMock).toHaveBeenCalledWith(`https://data.test/positions?user=${WALLET}`, expect.anything());
  });

  it("reads closed positions for another wallet with a limit", async () => {
    const fetchMock = mockFetchJson([]);
    globalThis.fetch = fetchMock;
    const { client } = createTestClient();

    await client.account.getClosedPositions(OTHER, { limit: 5 });

    expect(fetchMock).toHaveBeenCalledWith(
      `https://data.test/closed-positions?limit=5&user=${OTHER}`,
      expect.anything()
    );
  });

  it("reads trades and portfolio value", async () => {
    const fetchMock = mockFetchJson([]);
    globalThis.fetch = fetchMock;
    const { client } = createTestClient();

    await client.account.getTrades();
    await client.account.getPortfolioValue(OTHER);

    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([
      `https://data.test/trades?user=${WALLET}`,
      `https://data.test/value?user=${OTHER}`,
    ]);
  });

  it("surfaces Data API failures", async () => {
    globalThis.fetch = mockFetchJson({ error: "bad user" }, 400);
    const { client } = createTestClient();

    const error = await client.account.getPositions().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PolymarketError);
    expect(error).toMatchObject({ code: "upstream_error", statusCode: 400 });
  });

  it("reads the USDC balance on chain", async () => {
    const { client, chain } = createTestClient();
    chain.getUsdcBalance.mockResolvedValueOnce(123.45);

    expect(await client.account.getUsdcBalance()).toBe(123.45);
    expect(chain.getUsdcBalance).toHaveBeenCalledWith(WALLET);
  });

  it("submits a redemption and returns the transaction hash", async () => {
    const { client, chain } = createTestClient();
    chain.redeemPositions.mockResolvedValueOnce("0xhash");

    expect(await client.account.redeemPosition(CONDITION, [1, 2])).toBe("0xhash");
    expect(chain.redeemPositions).toHaveBeenCalledWith(CONDITION, [1, 2]);
  });

  it("propagates chain failures", async () => {
    const { client, chain } = createTestClient();
    chain.redeemPositions.mockRejectedValueOnce(new PolymarketError("Failed to submit redemption: reverted", "chain_error"));

    await expect(client.account.redeemPosition(CONDITION, [1])).rejects.toMatchObject({ code: "chain_error" });
  });
});
