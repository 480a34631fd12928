import { describe, it, expect } from "vitest";
import {
  FrameDecoder,
  decodeClientPacket,
  decodePacket,
  decodeServerPacket,
  encodeFrame,
  encodePacket,
} from "./framing.js";
import { ProtocolError } from "./errors.js";

function header(length: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(length, 0);
  return buf;
}

describe("encodeFrame", () => {
  it("prefixes the payload with its big-endian length", () => {
    const frame = encodeFrame("abc");
    expect([...frame]).toEqual([0, 0, 0, 3, 0x61, 0x62, 0x63]);
  });

  it("counts bytes, not characters", () => {
    const frame = encodeFrame("é");
    expect(frame.readUInt32BE(0)).toBe(2);
  });
});

describe("FrameDecoder", () => {
  it("reassembles a frame split across chunks", () => {
    const decoder = new FrameDecoder();
    const frame = encodeFrame("hello");

    expect(decoder.push(frame.subarray(0, 2))).toEqual([]);
    expect(decoder.push(frame.subarray(2, 6))).toEqual([]);
    const frames = decoder.push(frame.subarray(6));
    expect(frames.map((f) => f.toString())).toEqual(["hello"]);
    expect(decoder.bufferedBytes).toBe(0);
  });

  it("yields several frames from one chunk and keeps the remainder", () => {
    const decoder = new FrameDecoder();
    const third = encodeFrame("three");
    const chunk = Buffer.concat([encodeFrame("one"), encodeFrame("two"), third.subarray(0, 5)]);

    expect(decoder.push(chunk).map((f) => f.toString())).toEqual(["one", "two"]);
    expect(decoder.bufferedBytes).toBe(5);
    expect(decoder.push(third.subarray(5)).map((f) => f.toString())).toEqual(["three"]);
  });

  it("rejects an oversized length prefix before the payload arrives", () => {
    const decoder = new FrameDecoder(16);
    expect(() => decoder.push(header(17))).toThrow(ProtocolError);
    expect(() => new FrameDecoder(16).push(header(17))).toThrow("Frame of 17 bytes exceeds limit of 16");
  });

  it("accepts a frame exactly at the limit", () => {
    const decoder = new FrameDecoder(4);
    expect(decoder.push(encodeFrame("abcd")).map((f) => f.toString())).toEqual(["abcd"]);
  });

  it("rejects an empty frame", () => {
    expect(() => new FrameDecoder().push(header(0))).toThrow("Empty frame");
  });

  it("reset discards partial input", () => {
    const decoder = new FrameDecoder();
    decoder.push(encodeFrame("partial").subarray(0, 6));
    decoder.reset();
    expect(decoder.bufferedBytes).toBe(0);
  });
});

describe("packet decoding", () => {
  const payload = (value: unknown) => Buffer.from(JSON.stringify(value));

  it("decodes an encoded packet back to the same fields", () => {
    const frame = encodePacket({ type: "ping", timestamp: 5, sequence: 2 });
    const [body] = new FrameDecoder().push(frame);
    expect(decodeClientPacket(body)).toEqual({ type: "ping", timestamp: 5, sequence: 2 });
  });

  it("rejects non-JSON payloads", () => {
    expect(() => decodePacket(Buffer.from("{nope"))).toThrow("Payload is not valid JSON");
  });

  it("rejects payloads without a type", () => {
    expect(() => decodePacket(payload({ name: "x" }))).toThrow("Payload is missing the type discriminator");
    expect(() => decodePacket(payload([1, 2]))).toThrow(ProtocolError);
  });

  it("names unknown packet types", () => {
    expect(() => decodeClientPacket(payload({ type: "teleport" }))).toThrow('Unknown packet type "teleport"');
  });

  it("rejects a server packet on the client-bound decoder", () => {
    expect(() => decodeClientPacket(payload({ type: "server_full", message: "x", max_players: 1 }))).toThrow(
      'Unknown packet type "server_full"',
    );
  });

  it("reports the offending field of a malformed packet", () => {
    expect(() => decodeServerPacket(payload({ type: "pong", timestamp: 1, sequence: 0 }))).toThrow(
      /^Invalid pong packet: server_time: /,
    );
  });
});
