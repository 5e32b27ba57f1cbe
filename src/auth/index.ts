import { jwtVerify, importSPKI, type JWTPayload, type KeyLike } from "jose";
import { PolymarketError } from "../client/types.js";
import { isRecord } from "../models/json.js";

// ============================================================================
// Express-compatible types
// ============================================================================

interface AuthRequest {
  headers: {
    authorization?: string;
    [key: string]: string | string[] | undefined;
  };
  body?: unknown;
  auth?: JWTPayload;
}

interface AuthResponse {
  status(code: number): AuthResponse;
  json(data: unknown): void;
}

type NextFunction = (error?: unknown) => void;

/**
 * Request carrying the verified JWT claims after `createAuthMiddleware()`
 * has run on a protected method
 */
export interface AuthenticatedRequest extends AuthRequest {
  auth?: JWTPayload;
}

// ============================================================================
// Method Classification
// ============================================================================

/**
 * MCP methods that require authentication.
 * - tools/call: executes tool logic, may place orders or move funds
 */
const PROTECTED_MCP_METHODS = new Set(["tools/call"]);

export function isProtectedMcpMethod(method: string): boolean {
  return PROTECTED_MCP_METHODS.has(method);
}

/**
 * Whether a JSON-RPC body (single message or batch) calls a protected method
 */
export function requiresAuth(body: unknown): boolean {
  const messages = Array.isArray(body) ? body : [body];
  return messages.some((m) => isRecord(m) && typeof m.method === "string" && isProtectedMcpMethod(m.method));
}

// ============================================================================
// Request Verification
// ============================================================================

export interface AuthOptions {
  /** SPKI PEM of the RS256 key that signs caller tokens */
  publicKey: string;

  /** Expected `iss` claim */
  issuer?: string;

  /** Expected `aud` claim */
  audience?: string;
}

export interface VerifyRequestOptions {
  /** The full Authorization header string (e.g. "Bearer eyJ...") */
  authorizationHeader?: string;
}

/**
 * Build a verifier for bearer tokens. The key is imported once.
 *
 * @throws {PolymarketError} With code `unauthorized` from the returned function
 */
export function createRequestVerifier(options: AuthOptions) {
  let key: Promise<KeyLike> | undefined;

  return async function verifyRequest({ authorizationHeader }: VerifyRequestOptions): Promise<JWTPayload> {
    if (!authorizationHeader || !authorizationHeader.startsWith("Bearer ")) {
      throw new PolymarketError("Missing or invalid Authorization header", "unauthorized", 401);
    }

    const token = authorizationHeader.slice("Bearer ".length).trim();
    key ??= importSPKI(options.publicKey, "RS256");

    try {
      const { payload } = await jwtVerify(token, await key, {
        issuer: options.issuer,
        audience: options.audience,
      });
      return payload;
    } catch (error) {
      throw new PolymarketError("Invalid request signature", "unauthorized", 401, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  };
}

// ============================================================================
// Middleware
// ============================================================================

/**
 * Express/Connect-compatible middleware securing the MCP endpoint.
 *
 * Discovery methods pass through; `tools/call` needs a valid bearer token,
 * whose claims are attached to `req.auth`. Without options every request
 * passes.
 *
 * @example
 * ```typescript
 * app.post("/mcp", createAuthMiddleware(config.auth), handler);
 * ```
 */
export function createAuthMiddleware(options?: AuthOptions) {
  const verify = options ? createRequestVerifier(options) : undefined;

  return async function authMiddleware(req: AuthRequest, res: AuthResponse, next: NextFunction): Promise<void> {
    if (!verify || !requiresAuth(req.body)) {
      return next();
    }

    try {
      req.auth = await verify({ authorizationHeader: req.headers.authorization });
      next();
    } catch (error) {
      const statusCode = error instanceof PolymarketError ? error.statusCode || 401 : 401;
      res.status(statusCode).json({ error: "Unauthorized" });
    }
  };
}
