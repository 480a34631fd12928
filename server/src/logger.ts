/** Structured logger with session/player correlation IDs */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  sessionId?: string;
  playerId?: string;
  remote?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function formatLog(level: LogLevel, msg: string, ctx?: LogContext): string {
  const ts = new Date().toISOString();
  const parts = [ts, level.toUpperCase().padEnd(5), msg];

  if (ctx) {
    const entries = Object.entries(ctx).filter(([, v]) => v !== undefined);
    if (entries.length > 0) {
      parts.push(
        entries.map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`).join(" ")
      );
    }
  }

  return parts.join(" | ");
}

export const log: Logger = {
  debug(msg, ctx) {
    if (shouldLog("debug")) console.log(formatLog("debug", msg, ctx));
  },
  info(msg, ctx) {
    if (shouldLog("info")) console.log(formatLog("info", msg, ctx));
  },
  warn(msg, ctx) {
    if (shouldLog("warn")) console.warn(formatLog("warn", msg, ctx));
  },
  error(msg, ctx) {
    if (shouldLog("error")) console.error(formatLog("error", msg, ctx));
  },
};

/** Logger that stamps every line with a fixed context (call-site keys win) */
export function withContext(base: LogContext): Logger {
  return {
    debug: (msg, ctx) => log.debug(msg, { ...base, ...ctx }),
    info: (msg, ctx) => log.info(msg, { ...base, ...ctx }),
    warn: (msg, ctx) => log.warn(msg, { ...base, ...ctx }),
    error: (msg, ctx) => log.error(msg, { ...base, ...ctx }),
  };
}
