import {
  Color,
  FoodView,
  GameConfig,
  GameStatePacket,
  PlayerView,
  SKILL_NAMES,
  SkillName,
  ValidationError,
  Vec2,
  circlesOverlap,
  clampToWorld,
  distance,
  normalize,
} from "shared";
import {
  Food,
  Player,
  createFood,
  createPlayer,
  radiusForScore,
  speedFor,
} from "./entities.js";
import { computeSkillEffect } from "./skills.js";
import { SpatialGrid } from "./spatial-grid.js";
import { SurvivalSystem, createSurvivalStats } from "./survival.js";
import { nameKey } from "./names.js";
import { log } from "./logger.js";

export interface GameManagerOptions {
  config: GameConfig;
  /** Millisecond clock for skill and respawn timers and snapshot timestamps */
  clock?: () => number;
  /** Uniform [0, 1) source for placement and colors */
  random?: () => number;
}

/** Point-in-time copy of the world, never mutated after it is built */
export type GameSnapshot = Readonly<GameStatePacket>;

/**
 * Authoritative world state. Every mutation goes through this class, and
 * `update()` advances the world by exactly one tick of `1 / tickRate` seconds.
 */
export class GameManager {
  readonly config: GameConfig;
  readonly players: Map<string, Player> = new Map();
  food: Food[] = [];
  tick = 0;

  private readonly clock: () => number;
  private readonly random: () => number;
  private readonly dt: number;
  private readonly foodGrid: SpatialGrid;
  private readonly survival: SurvivalSystem | null;
  private readonly names = new Set<string>();
  private foodSpawnBudget = 0;
  private latest: GameSnapshot | null = null;

  constructor(options: GameManagerOptions) {
    const { config } = options;
    const { width, height } = config.world;
    if (!(width > 0 && height > 0 && Number.isFinite(width) && Number.isFinite(height))) {
      throw new ValidationError(`World must have a positive finite size, got ${width}x${height}`, "invalid_config");
    }

    this.config = config;
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? Math.random;
    this.dt = 1 / config.tickRate;
    this.foodGrid = new SpatialGrid(config.gridCellSize);
    this.survival = config.survival.enabled ? new SurvivalSystem(config.survival) : null;

    this.spawnFood(config.food.minCount);
  }

  get playerCount(): number {
    return this.players.size;
  }

  get isFull(): boolean {
    return this.players.size >= this.config.maxPlayers;
  }

  isNameTaken(name: string): boolean {
    return this.names.has(nameKey(name));
  }

  addPlayer(id: string, name: string): Player {
    if (this.players.has(id)) {
      throw new Error(`Player ${id} already exists`);
    }
    const player = createPlayer(id, name, this.findSpawnPoint(), this.pick(this.config.player.colors), this.config);
    this.players.set(id, player);
    this.names.add(nameKey(name));
    log.info("Player spawned", { playerId: id, name, x: Math.round(player.pos.x), y: Math.round(player.pos.y) });
    return player;
  }

  removePlayer(id: string): boolean {
    const player = this.players.get(id);
    if (!player) return false;
    this.players.delete(id);
    this.names.delete(nameKey(player.name));
    log.info("Player removed", { playerId: id, name: player.name });
    return true;
  }

  /**
   * Record a movement intent for the next tick. Returns false, leaving the
   * player untouched, when the sequence number is stale or the player is gone.
   */
  applyMove(id: string, dx: number, dy: number, sequence: number): boolean {
    const player = this.players.get(id);
    if (!player) return false;
    if (sequence <= player.lastMoveSequence) return false;
    player.lastMoveSequence = sequence;
    player.pendingIntent = normalize(dx, dy);
    return true;
  }

  activateSkill(id: string, skill: SkillName): boolean {
    const player = this.players.get(id);
    if (!player || !player.alive) return false;
    return player.skills[skill].activate(this.clock());
  }

  /** Latest published snapshot; builds one if no tick has run yet */
  latestSnapshot(): GameSnapshot {
    if (!this.latest) {
      this.latest = this.buildSnapshot(this.clock());
    }
    return this.latest;
  }

  update(): GameSnapshot {
    const now = this.clock();
    this.tick++;

    this.applyIntents();
    this.resolveSkills(now);
    this.resolveFoodCollisions();
    const eaten = this.resolvePlayerCollisions();
    this.processDeaths(eaten, now);
    this.replenishFood();
    this.updateSurvival();

    this.latest = this.buildSnapshot(now);
    return this.latest;
  }

  /**
   * Random point at least `minSpawnDistance` from the edge of every alive
   * player. Gives up after `spawnAttempts` tries and returns the candidate
   * with the most clearance.
   */
  findSpawnPoint(exclude?: Player): Vec2 {
    const { startRadius, minSpawnDistance, spawnAttempts } = this.config.player;
    const others = Array.from(this.players.values()).filter((p) => p.alive && p !== exclude);

    let best: Vec2 | null = null;
    let bestClearance = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < spawnAttempts; i++) {
      const candidate = this.randomPoint(startRadius);
      let clearance = Number.POSITIVE_INFINITY;
      for (const other of others) {
        clearance = Math.min(clearance, distance(candidate, other.pos) - other.radius);
      }
      if (clearance >= minSpawnDistance) return candidate;
      if (clearance > bestClearance) {
        best = candidate;
        bestClearance = clearance;
      }
    }

    log.debug("Spawn search exhausted, using least crowded candidate", { clearance: bestClearance });
    return best ?? { x: this.config.world.width / 2, y: this.config.world.height / 2 };
  }

  // --- Tick steps, in order ---

  private applyIntents(): void {
    const { width, height } = this.config.world;
    for (const player of this.players.values()) {
      if (!player.alive) continue;
      // Each intent moves the player for one tick only
      player.direction = player.pendingIntent ?? { x: 0, y: 0 };
      player.pendingIntent = null;
      const { x, y } = player.direction;
      if (x === 0 && y === 0) continue;

      const step = speedFor(player.radius, this.config.player) * this.dt;
      player.pos = clampToWorld(
        { x: player.pos.x + x * step, y: player.pos.y + y * step },
        player.radius,
        width,
        height,
      );
    }
  }

  private resolveSkills(now: number): void {
    for (const player of this.players.values()) {
      for (const name of SKILL_NAMES) {
        player.skills[name].update(now);
      }
    }

    for (const caster of this.players.values()) {
      if (!caster.alive) continue;
      for (const name of SKILL_NAMES) {
        const skill = caster.skills[name];
        if (!skill.active) continue;
        const reach = skill.effectiveRadius(caster.radius);

        for (const target of this.players.values()) {
          if (target === caster || !target.alive) continue;
          this.applySkill(name, caster, target, reach);
        }
        for (const food of this.food) {
          this.applySkill(name, caster, food, reach);
        }
      }
    }
  }

  private applySkill(name: SkillName, caster: Player, target: Player | Food, reach: number): void {
    const effect = computeSkillEffect(name, caster.skills[name].config, caster, target, reach, this.dt);
    if (!effect) return;
    const { width, height } = this.config.world;
    const body = effect.mover === "caster" ? caster : target;
    body.pos = clampToWorld(
      { x: body.pos.x + effect.dx, y: body.pos.y + effect.dy },
      body.radius,
      width,
      height,
    );
  }

  private resolveFoodCollisions(): void {
    if (this.food.length === 0) return;

    this.foodGrid.clear();
    this.food.forEach((food, index) => this.foodGrid.insert(index, food.pos.x, food.pos.y));

    const consumed = new Set<number>();
    for (const player of this.players.values()) {
      if (!player.alive) continue;
      const candidates = this.foodGrid.queryCircle(
        player.pos.x,
        player.pos.y,
        player.radius + this.config.food.radius,
      );
      for (const index of candidates) {
        if (consumed.has(index)) continue;
        const food = this.food[index];
        if (!circlesOverlap(player.pos, player.radius, food.pos, food.radius)) continue;
        consumed.add(index);
        this.grow(player, food.value);
      }
    }

    if (consumed.size > 0) {
      this.food = this.food.filter((_, index) => !consumed.has(index));
    }
  }

  /**
   * Smallest victims first; each victim goes to the single largest
   * overlapping player that clears the eat ratio (ties: lowest id).
   */
  private resolvePlayerCollisions(): Player[] {
    const { eatRatio, eatReward } = this.config;
    const alive = Array.from(this.players.values()).filter((p) => p.alive);
    const victims = [...alive].sort((a, b) => a.radius - b.radius || compareIds(a.id, b.id));
    const eaten: Player[] = [];

    for (const victim of victims) {
      if (!victim.alive) continue;

      let eater: Player | null = null;
      for (const candidate of alive) {
        if (candidate === victim || !candidate.alive) continue;
        if (candidate.radius < victim.radius * eatRatio) continue;
        if (!circlesOverlap(candidate.pos, candidate.radius, victim.pos, victim.radius)) continue;
        if (
          !eater ||
          candidate.radius > eater.radius ||
          (candidate.radius === eater.radius && compareIds(candidate.id, eater.id) < 0)
        ) {
          eater = candidate;
        }
      }
      if (!eater) continue;

      victim.alive = false;
      eaten.push(victim);
      this.grow(eater, eatReward.base + victim.score * eatReward.scoreFraction);
      log.info("Player eaten", { playerId: victim.id, eaterId: eater.id, tick: this.tick });
    }

    return eaten;
  }

  private processDeaths(eaten: Player[], now: number): void {
    for (const victim of eaten) {
      victim.respawnAt = now + this.config.player.respawnCooldownMs;
      victim.pendingIntent = null;
      victim.direction = { x: 0, y: 0 };
      for (const name of SKILL_NAMES) victim.skills[name].reset();
    }

    for (const player of this.players.values()) {
      if (player.alive || player.respawnAt === null || now < player.respawnAt) continue;
      this.respawn(player);
    }
  }

  private replenishFood(): void {
    const { minCount, maxCount, spawnRatePerSec } = this.config.food;

    // The floor is restored at once; growth above it is rate-limited
    if (this.food.length < minCount) {
      this.spawnFood(minCount - this.food.length);
    }

    if (this.food.length >= maxCount) {
      this.foodSpawnBudget = 0;
      return;
    }

    this.foodSpawnBudget += spawnRatePerSec * this.dt;
    const n = Math.min(Math.floor(this.foodSpawnBudget), maxCount - this.food.length);
    if (n > 0) {
      this.spawnFood(n);
      this.foodSpawnBudget -= n;
    }
  }

  private updateSurvival(): void {
    if (!this.survival) return;
    for (const player of this.players.values()) {
      if (!player.alive) continue;
      const moving = player.direction.x !== 0 || player.direction.y !== 0;
      this.survival.update(player.survival, this.dt, { moving });
    }
  }

  private buildSnapshot(now: number): GameSnapshot {
    const { width, height } = this.config.world;
    const players: Record<string, PlayerView> = {};

    for (const p of this.players.values()) {
      if (!p.alive) continue;
      // Growth can push a blob past the edge after it moved
      p.pos = clampToWorld(p.pos, p.radius, width, height);
      const view: PlayerView = {
        name: p.name,
        position: { x: p.pos.x, y: p.pos.y },
        radius: p.radius,
        score: p.score,
        color: copyColor(p.color),
        skills: {
          push: p.skills.push.toView(p.radius, now),
          pull: p.skills.pull.toView(p.radius, now),
        },
      };
      if (this.survival) view.health = p.survival.health;
      players[p.id] = view;
    }

    const food: FoodView[] = this.food.map((f) => {
      f.pos = clampToWorld(f.pos, f.radius, width, height);
      return {
        id: f.id,
        position: { x: f.pos.x, y: f.pos.y },
        type: "food",
        value: f.value,
        radius: f.radius,
        color: copyColor(f.color),
      };
    });

    const snapshot: GameStatePacket = {
      type: "game_state",
      players,
      food,
      server_tick: this.tick,
      timestamp: now,
    };
    return deepFreeze(snapshot);
  }

  // --- Helpers ---

  private grow(player: Player, amount: number): void {
    player.score += Math.max(0, amount);
    player.radius = radiusForScore(player.score, this.config.player);
  }

  private respawn(player: Player): void {
    player.pos = this.findSpawnPoint(player);
    player.score = 0;
    player.radius = radiusForScore(0, this.config.player);
    player.alive = true;
    player.respawnAt = null;
    player.pendingIntent = null;
    player.direction = { x: 0, y: 0 };
    for (const name of SKILL_NAMES) player.skills[name].reset();
    player.survival = createSurvivalStats(this.config.survival);
    log.info("Player respawned", { playerId: player.id, tick: this.tick });
  }

  private spawnFood(n: number): void {
    const cfg = this.config.food;
    for (let i = 0; i < n; i++) {
      this.food.push(createFood(this.findFoodPoint(), this.pick(cfg.colors), cfg));
    }
  }

  private findFoodPoint(): Vec2 {
    const { radius, minPlayerDistance, spawnAttempts } = this.config.food;
    let candidate = this.randomPoint(radius);
    if (minPlayerDistance <= 0) return candidate;

    for (let i = 1; i < spawnAttempts; i++) {
      const clear = Array.from(this.players.values()).every(
        (p) => !p.alive || distance(candidate, p.pos) - p.radius >= minPlayerDistance,
      );
      if (clear) break;
      candidate = this.randomPoint(radius);
    }
    return candidate;
  }

  private randomPoint(radius: number): Vec2 {
    const { width, height } = this.config.world;
    return {
      x: width > radius * 2 ? radius + this.random() * (width - radius * 2) : width / 2,
      y: height > radius * 2 ? radius + this.random() * (height - radius * 2) : height / 2,
    };
  }

  private pick(colors: Color[]): Color {
    const index = Math.min(colors.length - 1, Math.floor(this.random() * colors.length));
    return colors[index];
  }
}

/** Freeze a snapshot and every view inside it */
function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function copyColor(color: Color): Color {
  return [color[0], color[1], color[2]];
}
