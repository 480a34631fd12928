import { z } from "zod";
import { FRAME_HEADER_BYTES, MAX_MESSAGE_BYTES } from "./constants.js";
import { ProtocolError } from "./errors.js";
import {
  ClientPacketSchema,
  Packet,
  PacketSchema,
  ServerPacketSchema,
} from "./protocol.js";

/** Prefix a payload with its 4-byte big-endian length */
export function encodeFrame(payload: Uint8Array | string): Buffer {
  const body = typeof payload === "string" ? Buffer.from(payload, "utf8") : Buffer.from(payload);
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + body.length);
  frame.writeUInt32BE(body.length, 0);
  body.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

export function encodePacket(packet: Packet): Buffer {
  return encodeFrame(JSON.stringify(packet));
}

/**
 * Reassembles length-prefixed frames from an arbitrary chunked byte stream.
 * The length prefix is checked against the limit before any payload bytes
 * are buffered for it.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxMessageBytes: number = MAX_MESSAGE_BYTES) {}

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): Buffer[] {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    const frames: Buffer[] = [];
    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const length = this.buffer.readUInt32BE(0);
      if (length === 0) {
        throw new ProtocolError("Empty frame");
      }
      if (length > this.maxMessageBytes) {
        throw new ProtocolError(`Frame of ${length} bytes exceeds limit of ${this.maxMessageBytes}`);
      }
      const end = FRAME_HEADER_BYTES + length;
      if (this.buffer.length < end) break;

      frames.push(Buffer.from(this.buffer.subarray(FRAME_HEADER_BYTES, end)));
      this.buffer = this.buffer.subarray(end);
    }
    return frames;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

/** Parse one frame payload as JSON and validate it against a packet union */
export function decodePayload<S extends z.ZodTypeAny>(payload: Uint8Array, schema: S): z.output<S> {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(payload).toString("utf8"));
  } catch {
    throw new ProtocolError("Payload is not valid JSON");
  }

  if (typeof data !== "object" || data === null || !("type" in data) || typeof data.type !== "string") {
    throw new ProtocolError("Payload is missing the type discriminator");
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue?.code === "invalid_union_discriminator") {
      throw new ProtocolError(`Unknown packet type "${data.type}"`);
    }
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "packet";
    throw new ProtocolError(`Invalid ${data.type} packet: ${where}: ${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

export function decodeClientPacket(payload: Uint8Array) {
  return decodePayload(payload, ClientPacketSchema);
}

export function decodeServerPacket(payload: Uint8Array) {
  return decodePayload(payload, ServerPacketSchema);
}

export function decodePacket(payload: Uint8Array) {
  return decodePayload(payload, PacketSchema);
}
