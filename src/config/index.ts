import { z } from "zod";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import { PolymarketError } from "../client/types.js";
import { DEFAULT_CLOB_URL } from "../upstream/clob.js";
import { DEFAULT_GAMMA_URL } from "../upstream/gamma.js";
import { DEFAULT_DATA_URL } from "../upstream/data.js";

const optionalString = z.preprocess((value) => (value === "" ? undefined : value), z.string().optional());

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const envSchema = z.object({
  PRIVATE_KEY: z
    .string({ required_error: "PRIVATE_KEY is required" })
    .trim()
    .regex(/^(0x)?[0-9a-fA-F]{64}$/, "PRIVATE_KEY must be a 32-byte hex string")
    .transform((key) => (key.startsWith("0x") ? key : `0x${key}`)),

  // Upstreams
  RPC_URL: z.string().url().default("https://polygon-rpc.com"),
  CLOB_HOST: z.string().url().default(DEFAULT_CLOB_URL),
  GAMMA_HOST: z.string().url().default(DEFAULT_GAMMA_URL),
  DATA_HOST: z.string().url().default(DEFAULT_DATA_URL),
  CHAIN_ID: positiveInt("137"),
  REQUEST_TIMEOUT_MS: positiveInt("15000"),

  // Pre-provisioned CLOB API credentials
  CLOB_API_KEY: optionalString,
  CLOB_SECRET: optionalString,
  CLOB_PASS_PHRASE: optionalString,

  // Server
  MCP_TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  PORT: positiveInt("4003"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  // Request authentication
  MCP_AUTH_PUBLIC_KEY: optionalString,
  MCP_AUTH_ISSUER: optionalString,
  MCP_AUTH_AUDIENCE: optionalString,
});

export interface ServerConfig {
  privateKey: `0x${string}`;
  rpcUrl: string;
  clobHost: string;
  gammaHost: string;
  dataHost: string;
  chainId: number;
  requestTimeoutMs: number;

  /** Set only when all three CLOB credential variables are present */
  clobCreds?: ApiKeyCreds;

  transport: "http" | "stdio";
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];

  auth?: {
    publicKey: string;
    issuer?: string;
    audience?: string;
  };
}

function isHexKey(key: string): key is `0x${string}` {
  return key.startsWith("0x");
}

/**
 * Read and validate configuration from environment variables.
 *
 * @throws {PolymarketError} With code `configuration_error` if a variable is missing or invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new PolymarketError(`Invalid configuration: ${issues.join("; ")}`, "configuration_error", undefined, {
      issues,
    });
  }

  const e = parsed.data;
  if (!isHexKey(e.PRIVATE_KEY)) {
    throw new PolymarketError("PRIVATE_KEY must be a 32-byte hex string", "configuration_error");
  }

  const clobCreds =
    e.CLOB_API_KEY && e.CLOB_SECRET && e.CLOB_PASS_PHRASE
      ? { key: e.CLOB_API_KEY, secret: e.CLOB_SECRET, passphrase: e.CLOB_PASS_PHRASE }
      : undefined;

  return {
    privateKey: e.PRIVATE_KEY,
    rpcUrl: e.RPC_URL,
    clobHost: e.CLOB_HOST,
    gammaHost: e.GAMMA_HOST,
    dataHost: e.DATA_HOST,
    chainId: e.CHAIN_ID,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    clobCreds,
    transport: e.MCP_TRANSPORT,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    auth: e.MCP_AUTH_PUBLIC_KEY
      ? { publicKey: e.MCP_AUTH_PUBLIC_KEY, issuer: e.MCP_AUTH_ISSUER, audience: e.MCP_AUTH_AUDIENCE }
      : undefined,
  };
}
