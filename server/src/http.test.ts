import type http from "node:http";
import type { AddressInfo } from "node:net";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { parseGameConfig } from "shared";
import { GameManager } from "./game-manager.js";
import { NetworkManager } from "./network-manager.js";
import { createHTTPServer, healthReport } from "./http.js";

describe("HTTP endpoints", () => {
  let network: NetworkManager;
  let server: http.Server;
  let base: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const game = new GameManager({ config: parseGameConfig({ food: { minCount: 0, maxCount: 0 } }) });
    network = new NetworkManager({
      game,
      settings: {
        host: "127.0.0.1",
        tcpPort: 0,
        wsPort: 0,
        connectRateLimitPerMin: 0,
        maxMessageBytes: 1024,
        messageRateLimitPerSec: 0,
        keepaliveMs: 30_000,
        handshakeTimeoutMs: 5_000,
        sendBufferLimit: 1024,
      },
    });
    server = createHTTPServer(network, 0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === "string") throw new Error("not listening");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  it("reports unhealthy and not ready before the network runs", async () => {
    const health = await fetch(`${base}/healthz`);
    expect(health.status).toBe(503);
    expect(await health.json()).toMatchObject({ ok: false, players: 0, sessions: 0 });

    const ready = await fetch(`${base}/readyz`);
    expect(ready.status).toBe(503);
    expect(await ready.json()).toEqual({ ready: false });
  });

  it("reports ready after the first tick", async () => {
    network.running = true;
    network.runTick();

    expect((await fetch(`${base}/healthz`)).status).toBe(200);
    const ready = await fetch(`${base}/readyz`);
    expect(ready.status).toBe(200);
    expect(await ready.json()).toEqual({ ready: true });
    network.running = false;
  });

  it("serves metrics", async () => {
    network.runTick();
    network.runTick();

    const res = await fetch(`${base}/metrics`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ tick: 2, totalTicks: 2, players: 0, food: 0 });
  });

  it("rejects unknown paths and other methods", async () => {
    expect((await fetch(`${base}/nope`)).status).toBe(404);
    expect((await fetch(`${base}/metrics`, { method: "POST" })).status).toBe(405);
  });

  it("measures uptime from process start", () => {
    const early = healthReport(network, 0);
    const later = healthReport(network, 10_000);
    expect(later.uptimeSec - early.uptimeSec).toBe(10);
  });
});
