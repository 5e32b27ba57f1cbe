import { randomUUID } from "node:crypto";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  type CallToolResult,
  ListToolsRequestSchema,
  isInitializeRequest,
} from "@modelcontextprotocol/sdk/types.js";
import express, { type Express, type Request, type Response } from "express";
import type { PolymarketClient } from "../client/client.js";
import { createAuthMiddleware, type AuthOptions } from "../auth/index.js";
import { createToolHandler } from "./handlers.js";
import { TOOLS } from "./tools.js";

export const SERVER_NAME = "polymarket-mcp";
export const SERVER_VERSION = "1.0.0";

// ============================================================================
// MCP SERVER SETUP
// ============================================================================

/**
 * One MCP server bound to the shared client. The HTTP transport builds one
 * per session.
 */
export function createMcpServer(client: PolymarketClient): Server {
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });
  const callTool = createToolHandler(client);

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS,
  }));

  server.setRequestHandler(
    CallToolRequestSchema,
    async (request: CallToolRequest): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      return callTool(name, args);
    }
  );

  return server;
}

// ============================================================================
// EXPRESS SERVER
// ============================================================================

export interface HttpAppOptions {
  /** Bearer-token verification for tools/call; open when absent */
  auth?: AuthOptions;
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

/**
 * Express app serving MCP over Streamable HTTP at /mcp, plus /health
 */
export function createHttpApp(client: PolymarketClient, options: HttpAppOptions = {}): Express {
  const logger = client.logger.child({ component: "http" });
  const app = express();
  app.use(express.json());

  // Store transports for Streamable HTTP
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  const verifyAuth = createAuthMiddleware(options.auth);

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      server: SERVER_NAME,
      version: SERVER_VERSION,
      tools: TOOLS.map((t) => t.name),
      wallet: client.address,
    });
  });

  const failRequest = (res: Response, error: unknown) => {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, "MCP request failed");
    if (!res.headersSent) {
      res.status(500).json({ jsonrpc: "2.0", error: { code: -32603, message: "Internal server error" }, id: null });
    }
  };

  const handlePost = async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);
    let transport: StreamableHTTPServerTransport;

    if (sessionId && transports[sessionId]) {
      transport = transports[sessionId];
    } else if (!sessionId && isInitializeRequest(req.body)) {
      transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => {
          transports[id] = transport;
          logger.info({ sessionId: id }, "Session initialized");
        },
      });

      transport.onclose = () => {
        if (transport.sessionId) {
          delete transports[transport.sessionId];
          logger.info({ sessionId: transport.sessionId }, "Session closed");
        }
      };

      await createMcpServer(client).connect(transport);
    } else {
      res.status(400).json({
        jsonrpc: "2.0",
        error: { code: -32000, message: "Invalid session. Send initialize request first." },
        id: null,
      });
      return;
    }

    await transport.handleRequest(req, res, req.body);
  };

  const handleSessionRequest = async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (transport) {
      await transport.handleRequest(req, res);
    } else {
      res.status(400).json({ error: "Invalid session" });
    }
  };

  app.post("/mcp", verifyAuth, (req: Request, res: Response) => {
    handlePost(req, res).catch((error: unknown) => failRequest(res, error));
  });

  app.get("/mcp", verifyAuth, (req: Request, res: Response) => {
    handleSessionRequest(req, res).catch((error: unknown) => failRequest(res, error));
  });
  app.delete("/mcp", verifyAuth, (req: Request, res: Response) => {
    handleSessionRequest(req, res).catch((error: unknown) => failRequest(res, error));
  });

  return app;
}
