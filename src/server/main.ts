#!/usr/bin/env node
/**
 * Polymarket MCP server entry point.
 *
 * Reads configuration from the environment (and .env), connects to the
 * venue, then serves MCP over Streamable HTTP (default) or stdio.
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { PolymarketClient } from "../client/client.js";
import { PolymarketError } from "../client/types.js";
import { loadConfig, type ServerConfig } from "../config/index.js";
import { createLogger } from "../logger/index.js";
import type { Logger } from "pino";
import { TOOLS } from "./tools.js";
import { SERVER_NAME, SERVER_VERSION, createHttpApp, createMcpServer } from "./app.js";

function loadConfigOrExit(bootLogger: Logger): ServerConfig {
  try {
    return loadConfig();
  } catch (error) {
    bootLogger.fatal({ err: error instanceof Error ? error.message : String(error) }, "Invalid configuration");
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit(createLogger("info"));
  const logger = createLogger(config.logLevel);
  const client = await PolymarketClient.connect(config, logger);

  logger.info(
    { name: SERVER_NAME, version: SERVER_VERSION, wallet: client.address, tools: TOOLS.length },
    "Starting MCP server"
  );

  if (config.transport === "stdio") {
    await createMcpServer(client).connect(new StdioServerTransport());
    logger.info("Serving MCP over stdio");
    return;
  }

  const app = createHttpApp(client, { auth: config.auth });
  app.listen(config.port, () => {
    logger.info(
      { port: config.port, auth: config.auth ? "enabled" : "disabled" },
      `MCP endpoint: http://localhost:${config.port}/mcp`
    );
  });
}

main().catch((error: unknown) => {
  const code = error instanceof PolymarketError ? error.code : undefined;
  createLogger("error").fatal({ err: error instanceof Error ? error.message : String(error), code }, "Server failed to start");
  process.exit(1);
});
