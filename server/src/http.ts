import http from "node:http";
import type { NetworkManager } from "./network-manager.js";
import { log } from "./logger.js";

const startTime = Date.now();

export interface HealthReport {
  ok: boolean;
  uptimeSec: number;
  players: number;
  sessions: number;
  tickRateTarget: number;
  tickRateObserved: number;
}

export function healthReport(network: NetworkManager, now: number = Date.now()): HealthReport {
  return {
    ok: network.running,
    uptimeSec: Math.floor((now - startTime) / 1000),
    players: network.game.playerCount,
    sessions: network.sessions.size,
    tickRateTarget: network.game.config.tickRate,
    tickRateObserved: Math.round(network.tickMetrics.observedTickRate * 10) / 10,
  };
}

/** Ready once listening and at least one tick has run */
export function isReady(network: NetworkManager): boolean {
  return network.running && network.tickMetrics.totalTicks > 0;
}

export function metricsReport(network: NetworkManager, now: number = Date.now()) {
  const metrics = network.tickMetrics;
  let skippedSnapshots = 0;
  let droppedMessages = 0;
  for (const session of network.sessions.values()) {
    skippedSnapshots += session.skippedSnapshots;
    droppedMessages += session.droppedMessages;
  }

  return {
    uptimeSec: Math.floor((now - startTime) / 1000),
    tick: network.game.tick,
    players: network.game.playerCount,
    activeSessions: network.activeCount,
    sessions: network.sessions.size,
    food: network.game.food.length,
    observedTickRate: Math.round(metrics.observedTickRate * 10) / 10,
    maxTickMs: Math.round(metrics.maxTickMs * 100) / 100,
    totalTicks: metrics.totalTicks,
    skippedSnapshots,
    droppedMessages,
  };
}

export function createHTTPServer(network: NetworkManager, port: number, host: string): http.Server {
  const server = http.createServer((req, res) => {
    res.setHeader("Content-Type", "application/json");

    if (req.method !== "GET") {
      res.writeHead(405);
      res.end(JSON.stringify({ error: "method_not_allowed" }));
      return;
    }

    if (req.url === "/healthz") {
      const report = healthReport(network);
      res.writeHead(report.ok ? 200 : 503);
      res.end(JSON.stringify(report));
      return;
    }

    if (req.url === "/readyz") {
      const ready = isReady(network);
      res.writeHead(ready ? 200 : 503);
      res.end(JSON.stringify({ ready }));
      return;
    }

    if (req.url === "/metrics") {
      res.writeHead(200);
      res.end(JSON.stringify(metricsReport(network)));
      return;
    }

    res.writeHead(404);
    res.end(JSON.stringify({ error: "not_found" }));
  });

  server.on("error", (err) => log.error("HTTP server error", { error: err.message }));
  server.listen(port, host, () => log.info("HTTP endpoints listening", { port, host }));
  return server;
}
