import net, { type AddressInfo } from "node:net";
import { performance } from "node:perf_hooks";
import { v4 as uuid } from "uuid";
import { WebSocketServer } from "ws";
import { ConnectionError, ServerPacket, describeError, encodePacket } from "shared";
import type { GameManager, GameSnapshot } from "./game-manager.js";
import { ClientSession, SessionRegistry, SessionSettings } from "./client-session.js";
import { RateLimiter } from "./rate-limiter.js";
import { TcpTransport, Transport, WebSocketTransport } from "./transport.js";
import { log } from "./logger.js";

export interface NetworkSettings extends SessionSettings {
  host: string;
  tcpPort: number;
  /** 0 disables the WebSocket listener */
  wsPort: number;
  connectRateLimitPerMin: number;
}

export interface NetworkManagerOptions {
  game: GameManager;
  settings: NetworkSettings;
  now?: () => number;
}

/** Tick drift tracking for observability */
export interface TickMetrics {
  observedTickRate: number;
  maxTickMs: number;
  lastTickMs: number;
  totalTicks: number;
}

const METRICS_WINDOW_MS = 1000;
const DRIFT_WARN_RATIO = 0.8;

/**
 * Accepts connections on TCP (and optionally WebSocket), owns every
 * ClientSession, and drives the fixed-rate tick and broadcast loop.
 */
export class NetworkManager implements SessionRegistry {
  readonly game: GameManager;
  readonly sessions = new Map<string, ClientSession>();
  running = false;

  private readonly settings: NetworkSettings;
  private readonly now: () => number;
  private readonly connectLimiter: RateLimiter;
  private readonly periodMs: number;
  private tcpServer: net.Server | null = null;
  private wss: WebSocketServer | null = null;
  private tickTimer: NodeJS.Timeout | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private nextTickAt = 0;

  private metrics: TickMetrics = { observedTickRate: 0, maxTickMs: 0, lastTickMs: 0, totalTicks: 0 };
  private windowStart = 0;
  private ticksInWindow = 0;
  private windowMaxMs = 0;

  constructor(options: NetworkManagerOptions) {
    this.game = options.game;
    this.settings = options.settings;
    this.now = options.now ?? Date.now;
    this.periodMs = 1000 / options.game.config.tickRate;
    this.connectLimiter = new RateLimiter({
      maxEvents: options.settings.connectRateLimitPerMin,
      windowMs: 60_000,
      now: this.now,
    });
  }

  get tickMetrics(): TickMetrics {
    return { ...this.metrics };
  }

  /** Sessions that completed the handshake */
  get activeCount(): number {
    let n = 0;
    for (const session of this.sessions.values()) {
      if (session.isActive) n++;
    }
    return n;
  }

  /** Bind the listeners and start ticking. Rejects if a port cannot be bound. */
  async start(): Promise<void> {
    if (this.running) return;

    const tcpServer = net.createServer((socket) => {
      this.acceptConnection(new TcpTransport(socket));
    });
    await listen(tcpServer, this.settings.tcpPort, this.settings.host);
    tcpServer.on("error", (err) => log.error("TCP server error", { error: err.message }));
    this.tcpServer = tcpServer;

    if (this.settings.wsPort > 0) {
      try {
        this.wss = await this.startWebSocket();
      } catch (err) {
        await closeServer(tcpServer);
        this.tcpServer = null;
        throw err;
      }
    }

    this.running = true;
    this.startTickLoop();
    this.sweepTimer = setInterval(() => this.connectLimiter.sweep(), 60_000);
    this.sweepTimer.unref();

    log.info("Network started", {
      tcp: this.tcpAddress()?.port,
      ws: this.wsAddress()?.port,
      tickRate: this.game.config.tickRate,
      maxPlayers: this.game.config.maxPlayers,
    });
  }

  /** Stop ticking, close the listeners and every session */
  async stop(): Promise<void> {
    if (!this.running && !this.tcpServer && !this.wss) return;
    this.running = false;

    if (this.tickTimer) clearTimeout(this.tickTimer);
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.tickTimer = null;
    this.sweepTimer = null;

    for (const session of Array.from(this.sessions.values())) {
      session.close("server shutdown");
    }

    const closing: Promise<void>[] = [];
    if (this.tcpServer) closing.push(closeServer(this.tcpServer));
    if (this.wss) {
      const wss = this.wss;
      closing.push(new Promise((resolve) => wss.close(() => resolve())));
    }
    this.tcpServer = null;
    this.wss = null;
    await Promise.all(closing);
    log.info("Network stopped", { totalTicks: this.metrics.totalTicks });
  }

  tcpAddress(): AddressInfo | null {
    return addressOf(this.tcpServer?.address());
  }

  wsAddress(): AddressInfo | null {
    return addressOf(this.wss?.address());
  }

  /**
   * Register a new connection and start its session. Refused connections get
   * a server_full reply and are closed.
   */
  acceptConnection(transport: Transport): ClientSession | null {
    if (!this.running) {
      transport.close();
      return null;
    }

    if (!this.connectLimiter.tryAcquire(transport.remoteHost)) {
      log.warn("Connection rate limit hit", { remote: transport.remoteAddress });
      this.refuse(transport, "Too many connection attempts, try again later");
      return null;
    }

    if (this.sessions.size >= this.game.config.maxPlayers) {
      log.warn("Refusing connection, server full", { remote: transport.remoteAddress, sessions: this.sessions.size });
      this.refuse(transport, "Server is full");
      return null;
    }

    const session = new ClientSession({
      id: uuid(),
      transport,
      game: this.game,
      registry: this,
      settings: this.settings,
      now: this.now,
    });
    // Registered before it reads, so a failing handshake can always deregister
    this.sessions.set(session.id, session);
    session.start();
    return session;
  }

  /** Idempotent. Forgets the session and drops its player from the game. */
  removeClient(id: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    this.sessions.delete(id);
    this.game.removePlayer(id);
    session.close("removed");
  }

  /**
   * Serialize once and write to every active session. A failed write removes
   * only that client. Returns the number of sessions written to.
   */
  broadcast(packet: GameSnapshot | ServerPacket): number {
    const frame = encodePacket(packet);
    let delivered = 0;

    for (const session of Array.from(this.sessions.values())) {
      if (!session.isActive) continue;
      try {
        if (session.sendSnapshot(frame)) delivered++;
      } catch (err) {
        log.warn("Broadcast write failed", { sessionId: session.id, error: describeError(err) });
        this.removeClient(session.id);
      }
    }
    return delivered;
  }

  /** One simulation step followed by its broadcast */
  runTick(): void {
    const started = performance.now();
    try {
      const snapshot = this.game.update();
      this.broadcast(snapshot);
    } catch (err) {
      log.error("Tick failed", { tick: this.game.tick, error: describeError(err) });
    }
    this.recordTick(started, performance.now());
  }

  private startTickLoop(): void {
    const now = performance.now();
    this.windowStart = now;
    this.ticksInWindow = 0;
    this.nextTickAt = now + this.periodMs;
    this.scheduleTick();
  }

  private scheduleTick(): void {
    const delay = Math.max(0, this.nextTickAt - performance.now());
    this.tickTimer = setTimeout(() => this.onTickTimer(), delay);
  }

  private onTickTimer(): void {
    if (!this.running) return;
    this.runTick();

    // Deadlines advance by whole periods so sleep time absorbs the work time
    this.nextTickAt += this.periodMs;
    const now = performance.now();
    if (now - this.nextTickAt > this.periodMs) {
      log.debug("Tick loop fell behind, resynchronizing", { behindMs: Math.round(now - this.nextTickAt) });
      this.nextTickAt = now;
    }
    if (this.running) this.scheduleTick();
  }

  private recordTick(started: number, ended: number): void {
    const duration = ended - started;
    this.metrics.totalTicks++;
    this.metrics.lastTickMs = duration;
    this.ticksInWindow++;
    this.windowMaxMs = Math.max(this.windowMaxMs, duration);

    const elapsed = ended - this.windowStart;
    if (elapsed < METRICS_WINDOW_MS) return;

    this.metrics.observedTickRate = (this.ticksInWindow / elapsed) * 1000;
    this.metrics.maxTickMs = this.windowMaxMs;
    this.ticksInWindow = 0;
    this.windowMaxMs = 0;
    this.windowStart = ended;

    const target = this.game.config.tickRate;
    if (this.running && this.metrics.observedTickRate < target * DRIFT_WARN_RATIO) {
      log.warn("Tick rate drift", {
        target,
        observed: Math.round(this.metrics.observedTickRate * 10) / 10,
        maxTickMs: Math.round(this.metrics.maxTickMs * 100) / 100,
      });
    }
  }

  private refuse(transport: Transport, message: string): void {
    const reply: ServerPacket = {
      type: "server_full",
      message,
      max_players: this.game.config.maxPlayers,
    };
    try {
      transport.send(encodePacket(reply));
    } catch (err) {
      log.debug("Could not deliver refusal", { remote: transport.remoteAddress, error: describeError(err) });
    }
    transport.close();
  }

  private startWebSocket(): Promise<WebSocketServer> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.settings.wsPort,
        host: this.settings.host,
        maxPayload: this.settings.maxMessageBytes + 4,
      });
      const onError = (err: Error) => {
        wss.close();
        reject(new ConnectionError(`Cannot bind WebSocket port ${this.settings.wsPort}: ${err.message}`));
      };
      wss.once("error", onError);
      wss.once("listening", () => {
        wss.off("error", onError);
        wss.on("error", (err) => log.error("WebSocket server error", { error: err.message }));
        resolve(wss);
      });
      wss.on("connection", (ws, req) => {
        const host = req.socket.remoteAddress ?? "unknown";
        this.acceptConnection(new WebSocketTransport(ws, host, req.socket.remotePort));
      });
    });
  }
}

function listen(server: net.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new ConnectionError(`Cannot bind TCP ${host}:${port}: ${err.message}`));
    };
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
  });
}

function addressOf(address: AddressInfo | string | null | undefined): AddressInfo | null {
  return address && typeof address === "object" ? address : null;
}
