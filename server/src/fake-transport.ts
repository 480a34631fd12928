import {
  ClientPacket,
  ConnectionError,
  FrameDecoder,
  MAX_SNAPSHOT_BYTES,
  ServerPacket,
  decodeServerPacket,
  encodePacket,
} from "shared";
import type { Transport, TransportHandlers } from "./transport.js";

/** In-memory transport that records what the session writes */
export class FakeTransport implements Transport {
  readonly kind = "tcp";
  readonly remoteAddress: string;
  bufferedAmount = 0;
  isOpen = true;
  closed = false;
  readonly sent: Buffer[] = [];
  private handlers: TransportHandlers | null = null;

  constructor(readonly remoteHost = "127.0.0.1") {
    this.remoteAddress = `${remoteHost}:40000`;
  }

  send(bytes: Buffer): void {
    if (!this.isOpen) throw new ConnectionError("closed");
    this.sent.push(bytes);
  }

  close(): void {
    this.closed = true;
    this.isOpen = false;
  }

  bind(handlers: TransportHandlers): void {
    this.handlers = handlers;
  }

  receive(packet: ClientPacket): void {
    this.receiveBytes(encodePacket(packet));
  }

  receiveBytes(bytes: Buffer): void {
    this.handlers?.data(bytes);
  }

  emitClose(): void {
    this.handlers?.close();
  }

  packets(): ServerPacket[] {
    const decoder = new FrameDecoder(MAX_SNAPSHOT_BYTES);
    return this.sent.flatMap((bytes) => decoder.push(bytes)).map((frame) => decodeServerPacket(frame));
  }
}
