import pino, { type Logger, type LevelWithSilent } from "pino";

/**
 * Root logger. Always writes to stderr so the stdio transport keeps stdout
 * for protocol frames.
 */
export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({ level, base: { service: "polymarket-mcp" } }, pino.destination(2));
}
