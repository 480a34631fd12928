import { readFileSync } from "node:fs";
import {
  DEFAULT_HTTP_PORT,
  DEFAULT_TCP_PORT,
  DEFAULT_WS_PORT,
  GameConfig,
  MAX_MESSAGE_BYTES,
  ValidationError,
  parseGameConfig,
} from "shared";

/** Environment-driven server configuration with sensible defaults */

function envInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined) return fallback;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function envStr(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export const config = {
  /** Host to bind to (0.0.0.0 for production, localhost for dev) */
  host: envStr("HOST", "0.0.0.0"),

  /** Raw TCP game port */
  tcpPort: envInt("TCP_PORT", DEFAULT_TCP_PORT),

  /** WebSocket game port (0 disables the WebSocket listener) */
  wsPort: envInt("WS_PORT", DEFAULT_WS_PORT),

  /** Health/metrics HTTP port (0 disables it) */
  httpPort: envInt("HTTP_PORT", DEFAULT_HTTP_PORT),

  /** Node environment */
  nodeEnv: envStr("NODE_ENV", "development"),

  /** Minimum log level; empty means info, or debug in development */
  logLevel: envStr("LOG_LEVEL", ""),

  /** Largest frame payload accepted from a client */
  maxMessageBytes: envInt("MAX_MESSAGE_BYTES", MAX_MESSAGE_BYTES),

  /** Max packets per connection per second */
  messageRateLimitPerSec: envInt("MESSAGE_RATE_LIMIT", 120),

  /** Max new connections per source address per minute (sliding window) */
  connectRateLimitPerMin: envInt("CONNECT_RATE_LIMIT", 5),

  /** Close a session after this long without inbound traffic */
  keepaliveMs: envInt("KEEPALIVE_MS", 30_000),

  /** Close a session that has not completed the handshake in time */
  handshakeTimeoutMs: envInt("HANDSHAKE_TIMEOUT_MS", 5_000),

  /** Skip snapshots for a session with more than this many bytes queued */
  sendBufferLimit: envInt("SEND_BUFFER_LIMIT", 1024 * 1024),

  /** Optional path to a JSON game config document */
  gameConfigPath: envStr("GAME_CONFIG", ""),

  get isDev(): boolean {
    return this.nodeEnv === "development";
  },
};

/** Read and validate the game config; a missing path yields the defaults */
export function loadGameConfig(path: string = config.gameConfigPath): GameConfig {
  if (!path) return parseGameConfig();

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Cannot read game config ${path}: ${reason}`, "invalid_config");
  }
  return parseGameConfig(raw);
}
