import type http from "node:http";
import { describeError } from "shared";
import { GameManager } from "./game-manager.js";
import { NetworkManager } from "./network-manager.js";
import { createHTTPServer } from "./http.js";
import { config, loadGameConfig } from "./config.js";
import { isLogLevel, log, setLogLevel } from "./logger.js";

if (config.logLevel && isLogLevel(config.logLevel)) {
  setLogLevel(config.logLevel);
} else if (config.isDev) {
  setLogLevel("debug");
}

async function main(): Promise<void> {
  const gameConfig = loadGameConfig();
  const game = new GameManager({ config: gameConfig });
  const network = new NetworkManager({ game, settings: config });
  await network.start();

  const httpServer: http.Server | null =
    config.httpPort > 0 ? createHTTPServer(network, config.httpPort, config.host) : null;

  log.info("Server started", {
    tcpPort: config.tcpPort,
    wsPort: config.wsPort,
    httpPort: config.httpPort,
    host: config.host,
    env: config.nodeEnv,
    world: `${gameConfig.world.width}x${gameConfig.world.height}`,
  });

  // Graceful shutdown
  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down gracefully...`);

    httpServer?.close(() => {
      log.info("HTTP server closed");
    });
    await network.stop();

    // Give pending I/O a moment to flush, then exit
    setTimeout(() => {
      log.info("Shutdown complete");
      process.exit(0);
    }, 500);
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      log.error("Shutdown failed", { error: describeError(err) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err) => {
  log.error("Fatal startup error", { error: describeError(err) });
  process.exit(1);
});
