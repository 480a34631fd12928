import {
  ClientPacket,
  ClientPacketType,
  FrameDecoder,
  PROTOCOL_VERSION,
  ProtocolError,
  ServerPacket,
  TimeoutError,
  USERNAME_RETRIES,
  ValidationError,
  decodeClientPacket,
  describeError,
  encodePacket,
  isGameServerError,
} from "shared";
import type { GameManager } from "./game-manager.js";
import type { Transport } from "./transport.js";
import { RateLimiter } from "./rate-limiter.js";
import { suggestNames, validateName } from "./names.js";
import { Logger, withContext } from "./logger.js";

export type SessionState = "connecting" | "authenticating" | "active" | "disconnecting" | "closed";

/** What a session may ask of the server that owns it */
export interface SessionRegistry {
  removeClient(id: string): void;
}

export interface SessionSettings {
  maxMessageBytes: number;
  messageRateLimitPerSec: number;
  keepaliveMs: number;
  handshakeTimeoutMs: number;
  sendBufferLimit: number;
}

export interface ClientSessionOptions {
  id: string;
  transport: Transport;
  game: GameManager;
  registry: SessionRegistry;
  settings: SessionSettings;
  now?: () => number;
}

type ClientPacketMap = { [P in ClientPacket as P["type"]]: P };
type HandlerTable = { [K in ClientPacketType]: (packet: ClientPacketMap[K]) => void };

/**
 * One connected client: reassembles frames from its transport, walks the
 * handshake, then feeds intents into the game. Errors end this session
 * only; the registry is told to forget it, and it never outlives that.
 */
export class ClientSession {
  readonly id: string;
  state: SessionState = "connecting";
  name: string | null = null;
  readonly connectedAt: number;
  skippedSnapshots = 0;
  droppedMessages = 0;

  private readonly transport: Transport;
  private readonly game: GameManager;
  private readonly registry: SessionRegistry;
  private readonly settings: SessionSettings;
  private readonly now: () => number;
  private readonly decoder: FrameDecoder;
  private readonly limiter: RateLimiter;
  private readonly log: Logger;
  private nameRetriesLeft = USERNAME_RETRIES;
  private keepaliveTimer: NodeJS.Timeout | null = null;
  private handshakeTimer: NodeJS.Timeout | null = null;

  private readonly handlers: HandlerTable = {
    connect: (p) => this.handleConnect(p),
    move: (p) => this.handleMove(p),
    skill: (p) => this.handleSkill(p),
    get_game_state: () => this.handleGetGameState(),
    ping: (p) => this.handlePing(p),
  };

  constructor(options: ClientSessionOptions) {
    this.id = options.id;
    this.transport = options.transport;
    this.game = options.game;
    this.registry = options.registry;
    this.settings = options.settings;
    this.now = options.now ?? Date.now;
    this.connectedAt = this.now();
    this.decoder = new FrameDecoder(options.settings.maxMessageBytes);
    this.limiter = new RateLimiter({
      maxEvents: options.settings.messageRateLimitPerSec,
      windowMs: 1000,
      now: this.now,
    });
    this.log = withContext({ sessionId: this.id, remote: this.transport.remoteAddress });
  }

  get isActive(): boolean {
    return this.state === "active";
  }

  get playerId(): string | null {
    return this.isActive ? this.id : null;
  }

  get bufferedAmount(): number {
    return this.transport.bufferedAmount;
  }

  /** Attach to the transport and begin the handshake */
  start(): void {
    if (this.state !== "connecting") return;
    this.transport.bind({
      data: (chunk) => this.onData(chunk),
      close: () => this.onTransportClose(),
      error: (err) => this.log.warn("Transport error", { error: err.message }),
    });
    this.state = "authenticating";

    this.keepaliveTimer = setTimeout(() => {
      this.fail(new TimeoutError(`No traffic for ${this.settings.keepaliveMs}ms`, this.settings.keepaliveMs));
    }, this.settings.keepaliveMs);
    this.handshakeTimer = setTimeout(() => {
      this.fail(
        new TimeoutError(
          `Handshake not completed within ${this.settings.handshakeTimeoutMs}ms`,
          this.settings.handshakeTimeoutMs,
        ),
      );
    }, this.settings.handshakeTimeoutMs);

    this.log.info("Client connected", { transport: this.transport.kind });
  }

  send(packet: ServerPacket): void {
    this.transport.send(encodePacket(packet));
  }

  /**
   * Write an already-encoded frame. Snapshots are skipped, not queued, while
   * the client is behind; returns whether the frame was written.
   */
  sendSnapshot(frame: Buffer): boolean {
    if (this.transport.bufferedAmount > this.settings.sendBufferLimit) {
      this.skippedSnapshots++;
      this.log.debug("Skipping snapshot for slow client", { buffered: this.transport.bufferedAmount });
      return false;
    }
    this.transport.send(frame);
    return true;
  }

  /** Idempotent. Closes the transport and deregisters from the server. */
  close(reason = "closed"): void {
    if (this.state === "disconnecting" || this.state === "closed") return;
    const wasActive = this.state === "active";
    this.state = "disconnecting";
    this.clearTimers();
    this.transport.close();
    this.registry.removeClient(this.id);
    this.log.info("Client disconnected", { reason, name: this.name ?? undefined, wasActive });
  }

  /** Log the error with this session's context and close */
  fail(err: unknown): void {
    if (this.state === "disconnecting" || this.state === "closed") return;
    if (isGameServerError(err)) {
      this.log.warn("Closing session", { code: err.code, error: err.message });
    } else {
      this.log.error("Unexpected session error", { error: describeError(err) });
    }
    this.close(isGameServerError(err) ? err.code : "error");
  }

  private onData(chunk: Buffer): void {
    if (this.state !== "authenticating" && this.state !== "active") return;
    this.keepaliveTimer?.refresh();

    try {
      for (const frame of this.decoder.push(chunk)) {
        if (this.state !== "authenticating" && this.state !== "active") return;
        if (!this.limiter.tryAcquire(this.id)) {
          this.droppedMessages++;
          this.log.warn("Message rate limit hit, dropping packet", { dropped: this.droppedMessages });
          continue;
        }
        const packet = decodeClientPacket(frame);
        this.dispatch(packet.type, packet);
      }
    } catch (err) {
      this.fail(err);
    }
  }

  private dispatch<K extends ClientPacketType>(type: K, packet: ClientPacketMap[K]): void {
    this.handlers[type](packet);
  }

  private onTransportClose(): void {
    this.close("transport closed");
    this.state = "closed";
    this.decoder.reset();
  }

  // --- Handlers ---

  private handleConnect(packet: ClientPacketMap["connect"]): void {
    if (this.state !== "authenticating") {
      this.log.debug("Ignoring connect on an authenticated session");
      return;
    }
    if (packet.version !== PROTOCOL_VERSION) {
      throw new ProtocolError(`Unsupported protocol version "${packet.version}", expected "${PROTOCOL_VERSION}"`);
    }

    const name = packet.name;
    const invalid = validateName(name);
    if (invalid) {
      throw new ValidationError(invalid, "invalid_name");
    }

    if (this.game.isFull) {
      this.send({
        type: "server_full",
        message: "Server is full",
        max_players: this.game.config.maxPlayers,
      });
      throw new ValidationError("Server is full", "server_full");
    }

    if (this.game.isNameTaken(name)) {
      this.send({
        type: "username_taken",
        message: `The name "${name}" is already in use`,
        suggestions: suggestNames(name, (candidate) => this.game.isNameTaken(candidate)),
      });
      if (this.nameRetriesLeft <= 0) {
        throw new ValidationError(`Name "${name}" is taken and no retries remain`, "username_taken");
      }
      this.nameRetriesLeft--;
      this.log.info("Name taken, awaiting retry", { name });
      return;
    }

    const player = this.game.addPlayer(this.id, name);
    this.name = name;
    this.state = "active";
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }

    this.send({
      type: "player_id",
      player_id: player.id,
      spawn_position: { x: player.pos.x, y: player.pos.y },
      server_tick_rate: this.game.config.tickRate,
    });
    this.log.info("Player joined", { playerId: player.id, name, clientId: packet.client_id });
  }

  private handleMove(packet: ClientPacketMap["move"]): void {
    if (!this.isActive) return;
    const applied = this.game.applyMove(this.id, packet.dx, packet.dy, packet.sequence);
    if (!applied) {
      this.log.debug("Stale move rejected", { sequence: packet.sequence });
    }
  }

  private handleSkill(packet: ClientPacketMap["skill"]): void {
    if (!this.isActive) return;
    const activated = this.game.activateSkill(this.id, packet.skill_name);
    this.log.debug("Skill requested", { skill: packet.skill_name, activated });
  }

  private handleGetGameState(): void {
    if (!this.isActive) return;
    this.send(this.game.latestSnapshot());
  }

  private handlePing(packet: ClientPacketMap["ping"]): void {
    this.send({
      type: "pong",
      timestamp: packet.timestamp,
      sequence: packet.sequence,
      server_time: this.now(),
    });
  }

  private clearTimers(): void {
    if (this.keepaliveTimer) clearTimeout(this.keepaliveTimer);
    if (this.handshakeTimer) clearTimeout(this.handshakeTimer);
    this.keepaliveTimer = null;
    this.handshakeTimer = null;
  }
}
