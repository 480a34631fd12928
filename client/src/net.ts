import net from "node:net";
import { setTimeout as sleep } from "node:timers/promises";
import {
  ClientPacket,
  ConnectionError,
  DEFAULT_TCP_PORT,
  FrameDecoder,
  GameStatePacket,
  MAX_SNAPSHOT_BYTES,
  PROTOCOL_VERSION,
  PlayerIdPacket,
  ProtocolError,
  ServerFullPacket,
  ServerPacket,
  SkillName,
  TimeoutError,
  UsernameTakenPacket,
  ValidationError,
  Vec2,
  decodeServerPacket,
  describeError,
  encodePacket,
} from "shared";

export interface GameClientOptions {
  host?: string;
  port?: number;
  /** Connect-and-handshake timeout, also used for ping replies */
  timeoutMs?: number;
  /** Extra attempts after the first failed connect */
  reconnectAttempts?: number;
  reconnectDelayMs?: number;
  /** Delay multiplier applied after each failed attempt */
  reconnectBackoff?: number;
  /** Reconnect on its own after an unexpected disconnect */
  autoReconnect?: boolean;
  maxMessageBytes?: number;
  clientId?: string;
}

type ResolvedOptions = Required<Omit<GameClientOptions, "clientId">> & { clientId?: string };

const DEFAULT_OPTIONS: ResolvedOptions = {
  host: "localhost",
  port: DEFAULT_TCP_PORT,
  timeoutMs: 5_000,
  reconnectAttempts: 3,
  reconnectDelayMs: 1_000,
  reconnectBackoff: 1.5,
  autoReconnect: true,
  maxMessageBytes: MAX_SNAPSHOT_BYTES,
};

interface PendingHandshake {
  resolve: (packet: PlayerIdPacket) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

interface PendingPing {
  sentAt: number;
  resolve: (rttMs: number) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/** Headless TCP client for bots, load tests and tooling */
export class GameClient {
  playerId: string | null = null;
  spawnPosition: Vec2 | null = null;
  serverTickRate: number | null = null;
  latestState: GameStatePacket | null = null;
  lastRttMs: number | null = null;

  private readonly options: ResolvedOptions;
  private socket: net.Socket | null = null;
  private decoder: FrameDecoder;
  private name: string | null = null;
  private moveSequence = 0;
  private pingSequence = 0;
  private handshake: PendingHandshake | null = null;
  private readonly pings = new Map<number, PendingPing>();
  private closedByUser = false;

  private onGameState: ((state: GameStatePacket) => void) | null = null;
  private onUsernameTaken: ((packet: UsernameTakenPacket) => void) | null = null;
  private onServerFull: ((packet: ServerFullPacket) => void) | null = null;
  private onReconnect: ((playerId: string) => void) | null = null;
  private onDisconnect: ((err: Error | null) => void) | null = null;

  constructor(options: GameClientOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.decoder = new FrameDecoder(this.options.maxMessageBytes);
  }

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed && this.playerId !== null;
  }

  /** Connect and complete the handshake, retrying with backoff on network failures */
  async connect(name: string): Promise<PlayerIdPacket> {
    if (!name) {
      throw new ValidationError("Player name must be a non-empty string", "invalid_name");
    }
    if (this.connected) {
      throw new ConnectionError("Already connected to server");
    }
    this.name = name;
    this.closedByUser = false;
    return this.connectWithRetry(name);
  }

  move(dx: number, dy: number): number {
    const sequence = this.moveSequence++;
    this.sendPacket({ type: "move", dx, dy, sequence, timestamp: Date.now() });
    return sequence;
  }

  useSkill(skill: SkillName, target: Vec2, direction?: Vec2): void {
    this.sendPacket({
      type: "skill",
      skill_name: skill,
      target_x: target.x,
      target_y: target.y,
      direction,
    });
  }

  requestGameState(fullUpdate = true): void {
    this.sendPacket({
      type: "get_game_state",
      full_update: fullUpdate,
      last_ack: this.latestState?.server_tick ?? 0,
    });
  }

  /** Round-trip time in milliseconds */
  ping(): Promise<number> {
    const sequence = this.pingSequence++;
    const sentAt = Date.now();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pings.delete(sequence);
        reject(new TimeoutError(`No pong within ${this.options.timeoutMs}ms`, this.options.timeoutMs));
      }, this.options.timeoutMs);
      this.pings.set(sequence, { sentAt, resolve, reject, timer });

      try {
        this.sendPacket({ type: "ping", timestamp: sentAt, sequence });
      } catch (err) {
        clearTimeout(timer);
        this.pings.delete(sequence);
        reject(err);
      }
    });
  }

  setGameStateHandler(handler: (state: GameStatePacket) => void): void {
    this.onGameState = handler;
  }

  setUsernameTakenHandler(handler: (packet: UsernameTakenPacket) => void): void {
    this.onUsernameTaken = handler;
  }

  setServerFullHandler(handler: (packet: ServerFullPacket) => void): void {
    this.onServerFull = handler;
  }

  setReconnectHandler(handler: (playerId: string) => void): void {
    this.onReconnect = handler;
  }

  /** Called once the connection is gone for good; `err` is null after a clean close */
  setDisconnectHandler(handler: (err: Error | null) => void): void {
    this.onDisconnect = handler;
  }

  disconnect(): void {
    this.closedByUser = true;
    const socket = this.socket;
    this.socket = null;
    this.playerId = null;
    this.failHandshake(new ConnectionError("Client disconnected"));
    this.rejectPings(new ConnectionError("Client disconnected"));
    socket?.destroy();
  }

  private async connectWithRetry(name: string): Promise<PlayerIdPacket> {
    const { reconnectAttempts, reconnectBackoff } = this.options;
    let delay = this.options.reconnectDelayMs;
    let lastError: Error = new ConnectionError("Connection never attempted");

    for (let attempt = 0; attempt <= reconnectAttempts; attempt++) {
      if (attempt > 0) {
        console.log(`[net] Retrying in ${Math.round(delay)}ms (attempt ${attempt}/${reconnectAttempts})`);
        await sleep(delay);
        delay *= reconnectBackoff;
        if (this.closedByUser) throw new ConnectionError("Client disconnected");
      }

      try {
        return await this.attempt(name);
      } catch (err) {
        // Refusals by the server are final; only transport failures are retried
        if (err instanceof ValidationError || err instanceof ProtocolError) throw err;
        lastError = err instanceof Error ? err : new ConnectionError(String(err));
        console.warn(`[net] Connection attempt failed: ${describeError(err)}`);
      }
    }
    throw lastError;
  }

  private attempt(name: string): Promise<PlayerIdPacket> {
    const { host, port, timeoutMs } = this.options;
    console.log(`[net] Connecting to ${host}:${port}...`);

    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port });
      socket.setNoDelay(true);
      this.socket = socket;
      this.decoder = new FrameDecoder(this.options.maxMessageBytes);

      const timer = setTimeout(() => {
        this.failHandshake(new TimeoutError(`Handshake not completed within ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
      this.handshake = { resolve, reject, timer };

      socket.on("connect", () => {
        this.sendPacket({
          type: "connect",
          name,
          version: PROTOCOL_VERSION,
          client_id: this.options.clientId,
        });
      });
      socket.on("data", (chunk: Buffer) => this.onData(socket, chunk));
      socket.on("error", (err) => {
        console.warn(`[net] Socket error: ${err.message}`);
        this.failHandshake(new ConnectionError(err.message));
      });
      socket.on("close", () => this.onClose(socket));
    });
  }

  private onData(socket: net.Socket, chunk: Buffer): void {
    if (socket !== this.socket) return;
    try {
      for (const frame of this.decoder.push(chunk)) {
        this.dispatch(decodeServerPacket(frame));
      }
    } catch (err) {
      console.error(`[net] Dropping connection: ${describeError(err)}`);
      if (this.handshake) {
        this.failHandshake(err instanceof Error ? err : new ProtocolError(String(err)));
      } else {
        socket.destroy();
      }
    }
  }

  private dispatch(packet: ServerPacket): void {
    switch (packet.type) {
      case "player_id": {
        this.playerId = packet.player_id;
        this.spawnPosition = packet.spawn_position;
        this.serverTickRate = packet.server_tick_rate;
        console.log(`[net] Connected with player ID: ${packet.player_id}`);
        const pending = this.handshake;
        if (pending) {
          clearTimeout(pending.timer);
          this.handshake = null;
          pending.resolve(packet);
        }
        break;
      }
      case "game_state":
        this.latestState = packet;
        this.onGameState?.(packet);
        break;
      case "username_taken":
        this.onUsernameTaken?.(packet);
        this.failHandshake(new ValidationError(packet.message, "username_taken"));
        break;
      case "server_full":
        this.onServerFull?.(packet);
        this.failHandshake(new ValidationError(packet.message, "server_full"));
        break;
      case "pong": {
        const pending = this.pings.get(packet.sequence);
        if (!pending) break;
        clearTimeout(pending.timer);
        this.pings.delete(packet.sequence);
        this.lastRttMs = Date.now() - pending.sentAt;
        pending.resolve(this.lastRttMs);
        break;
      }
    }
  }

  private onClose(socket: net.Socket): void {
    if (socket !== this.socket) return;
    this.socket = null;
    const wasConnected = this.playerId !== null;
    this.playerId = null;
    this.rejectPings(new ConnectionError("Connection closed"));

    if (this.handshake) {
      this.failHandshake(new ConnectionError("Connection closed during handshake"));
      return;
    }
    if (!wasConnected) return;

    console.log("[net] Disconnected from server");
    if (this.options.autoReconnect && !this.closedByUser && this.name) {
      this.reconnect(this.name);
    } else {
      this.onDisconnect?.(null);
    }
  }

  private reconnect(name: string): void {
    console.log("[net] Attempting reconnect...");
    this.connectWithRetry(name).then(
      (packet) => this.onReconnect?.(packet.player_id),
      (err: unknown) => {
        console.error(`[net] Reconnect failed: ${describeError(err)}`);
        this.onDisconnect?.(err instanceof Error ? err : new ConnectionError(String(err)));
      },
    );
  }

  private failHandshake(err: Error): void {
    const pending = this.handshake;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.handshake = null;
    const socket = this.socket;
    this.socket = null;
    socket?.destroy();
    pending.reject(err);
  }

  private rejectPings(err: Error): void {
    for (const pending of this.pings.values()) {
      clearTimeout(pending.timer);
      pending.reject(err);
    }
    this.pings.clear();
  }

  private sendPacket(packet: ClientPacket): void {
    if (!this.socket || this.socket.destroyed) {
      throw new ConnectionError("Not connected to server");
    }
    this.socket.write(encodePacket(packet));
  }
}
