import type { Socket } from "node:net";
import { WebSocket, type RawData } from "ws";
import { ConnectionError } from "shared";
import { log } from "./logger.js";

export interface TransportHandlers {
  data: (chunk: Buffer) => void;
  close: () => void;
  error: (err: Error) => void;
}

/**
 * Ordered byte stream to one client. Both the raw TCP socket and the
 * WebSocket variant carry the same length-prefixed frames.
 */
export interface Transport {
  readonly kind: "tcp" | "ws";
  /** Peer address without the port, used as the connect-throttle key */
  readonly remoteHost: string;
  readonly remoteAddress: string;
  /** Bytes accepted by send() but not yet flushed to the OS */
  readonly bufferedAmount: number;
  readonly isOpen: boolean;
  /** Throws ConnectionError when the transport can no longer write */
  send(bytes: Buffer): void;
  close(): void;
  bind(handlers: TransportHandlers): void;
}

const FORCE_CLOSE_MS = 2_000;

export class TcpTransport implements Transport {
  readonly kind = "tcp";
  readonly remoteHost: string;
  readonly remoteAddress: string;

  constructor(private readonly socket: Socket) {
    this.remoteHost = socket.remoteAddress ?? "unknown";
    this.remoteAddress = `${this.remoteHost}:${socket.remotePort ?? 0}`;
    socket.setNoDelay(true);
    // Covers refused sockets, which are never bound to a session
    socket.on("error", (err) => log.debug("Socket error", { remote: this.remoteAddress, error: err.message }));
  }

  get bufferedAmount(): number {
    return this.socket.writableLength;
  }

  get isOpen(): boolean {
    return !this.socket.destroyed && this.socket.writable;
  }

  send(bytes: Buffer): void {
    if (!this.isOpen) {
      throw new ConnectionError(`Socket to ${this.remoteAddress} is closed`);
    }
    this.socket.write(bytes);
  }

  close(): void {
    if (this.socket.destroyed) return;
    // Flush queued replies such as server_full, then hard-close if the peer stalls
    this.socket.end();
    setTimeout(() => this.socket.destroy(), FORCE_CLOSE_MS).unref();
  }

  bind(handlers: TransportHandlers): void {
    this.socket.on("data", handlers.data);
    this.socket.on("close", handlers.close);
    this.socket.on("error", handlers.error);
  }
}

export class WebSocketTransport implements Transport {
  readonly kind = "ws";
  readonly remoteAddress: string;

  constructor(
    private readonly ws: WebSocket,
    readonly remoteHost: string,
    remotePort = 0,
  ) {
    this.remoteAddress = `${remoteHost}:${remotePort}`;
    ws.on("error", (err) => log.debug("WebSocket error", { remote: this.remoteAddress, error: err.message }));
  }

  get bufferedAmount(): number {
    return this.ws.bufferedAmount;
  }

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(bytes: Buffer): void {
    if (!this.isOpen) {
      throw new ConnectionError(`WebSocket to ${this.remoteAddress} is closed`);
    }
    this.ws.send(bytes, { binary: true });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) return;
    this.ws.close();
    setTimeout(() => this.ws.terminate(), FORCE_CLOSE_MS).unref();
  }

  bind(handlers: TransportHandlers): void {
    this.ws.on("message", (data: RawData) => handlers.data(toBuffer(data)));
    this.ws.on("close", () => handlers.close());
    this.ws.on("error", handlers.error);
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(new Uint8Array(data));
}
