export const ERROR_CODES = {
  CONNECTION_ERROR: "CONNECTION_ERROR",
  TIMEOUT_ERROR: "TIMEOUT_ERROR",
  PROTOCOL_ERROR: "PROTOCOL_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Base class for every error the server and client raise on purpose */
export class GameServerError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = "GameServerError";
  }
}

/** Socket-level failure to establish or keep a connection */
export class ConnectionError extends GameServerError {
  constructor(message: string) {
    super(message, ERROR_CODES.CONNECTION_ERROR);
    this.name = "ConnectionError";
  }
}

/** No traffic inside the keepalive or handshake window */
export class TimeoutError extends GameServerError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, ERROR_CODES.TIMEOUT_ERROR);
    this.name = "TimeoutError";
  }
}

/** Malformed framing or payload, unknown packet type, oversized message */
export class ProtocolError extends GameServerError {
  constructor(message: string) {
    super(message, ERROR_CODES.PROTOCOL_ERROR);
    this.name = "ProtocolError";
  }
}

export type ValidationReason =
  | "invalid_name"
  | "username_taken"
  | "server_full"
  | "invalid_config";

export class ValidationError extends GameServerError {
  constructor(
    message: string,
    public readonly reason: ValidationReason,
  ) {
    super(message, ERROR_CODES.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

export function isGameServerError(err: unknown): err is GameServerError {
  return err instanceof GameServerError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
