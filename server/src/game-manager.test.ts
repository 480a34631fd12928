import { describe, it, expect, beforeEach } from "vitest";
import { DEFAULT_GAME_CONFIG, GameConfigInput, ValidationError, distance, parseGameConfig } from "shared";
import { GameManager } from "./game-manager.js";
import { createFood, radiusForScore } from "./entities.js";
import type { Player } from "./entities.js";

/** Deterministic LCG in [0, 1) */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

function setup(overrides: GameConfigInput = {}) {
  const config = parseGameConfig({
    world: { width: 1000, height: 1000 },
    food: { minCount: 0, maxCount: 0 },
    ...overrides,
  });
  const clock = { now: 1000 };
  const game = new GameManager({ config, clock: () => clock.now, random: seededRandom(42) });
  return { game, config, clock };
}

function place(player: Player, x: number, y: number, score = 0): void {
  player.pos = { x, y };
  player.score = score;
  player.radius = radiusForScore(score, DEFAULT_GAME_CONFIG.player);
}

describe("GameManager construction", () => {
  it("seeds food up to the minimum", () => {
    const { game } = setup({ food: { minCount: 12, maxCount: 20 } });
    expect(game.food).toHaveLength(12);
    for (const f of game.food) {
      expect(f.pos.x).toBeGreaterThanOrEqual(f.radius);
      expect(f.pos.x).toBeLessThanOrEqual(1000 - f.radius);
    }
  });

  it("refuses a zero-sized world", () => {
    const config = { ...DEFAULT_GAME_CONFIG, world: { width: 0, height: 100 } };
    expect(() => new GameManager({ config })).toThrow(ValidationError);
  });
});

describe("players", () => {
  it("tracks names case-insensitively", () => {
    const { game } = setup();
    game.addPlayer("a", "Alice");
    expect(game.isNameTaken("ALICE")).toBe(true);
    expect(game.playerCount).toBe(1);

    expect(game.removePlayer("a")).toBe(true);
    expect(game.removePlayer("a")).toBe(false);
    expect(game.isNameTaken("alice")).toBe(false);
  });

  it("reports when full", () => {
    const { game } = setup({ maxPlayers: 2 });
    game.addPlayer("a", "Alice");
    expect(game.isFull).toBe(false);
    game.addPlayer("b", "Bobby");
    expect(game.isFull).toBe(true);
  });

  it("rejects a duplicate id", () => {
    const { game } = setup();
    game.addPlayer("a", "Alice");
    expect(() => game.addPlayer("a", "Other")).toThrow("Player a already exists");
  });
});

describe("movement", () => {
  let game: GameManager;
  let alice: Player;

  beforeEach(() => {
    ({ game } = setup());
    alice = game.addPlayer("a", "Alice");
    place(alice, 500, 500);
  });

  it("integrates the normalized intent at the size-dependent speed", () => {
    game.applyMove("a", 10, 0, 0); // normalized to (1, 0)
    game.update();
    expect(alice.pos.x).toBeCloseTo(500 + 240 / 30);
    expect(alice.pos.y).toBe(500);
  });

  it("moves once per intent and stays put until the next move", () => {
    game.applyMove("a", 1, 0, 0);
    game.update();
    expect(alice.pos.x).toBeCloseTo(508);

    game.update();
    game.update();
    expect(alice.pos.x).toBeCloseTo(508);
    expect(alice.direction).toEqual({ x: 0, y: 0 });

    game.applyMove("a", 0, 1, 1);
    game.update();
    expect(alice.pos.x).toBeCloseTo(508);
    expect(alice.pos.y).toBeCloseTo(508);
  });

  it("applies only the latest intent between ticks", () => {
    game.applyMove("a", 1, 0, 0);
    game.applyMove("a", -1, 0, 1);
    game.update();
    expect(alice.pos.x).toBeCloseTo(492);
  });

  it("rejects stale sequence numbers without touching state", () => {
    expect(game.applyMove("a", 1, 0, 5)).toBe(true);
    expect(game.applyMove("a", 0, 1, 5)).toBe(false);
    expect(game.applyMove("a", 0, 1, 4)).toBe(false);
    expect(alice.pendingIntent).toEqual({ x: 1, y: 0 });
    expect(alice.lastMoveSequence).toBe(5);
  });

  it("zeroes a non-finite movement vector", () => {
    game.applyMove("a", Number.NaN, 1, 0);
    expect(alice.pendingIntent).toEqual({ x: 0, y: 0 });
    game.update();
    expect(alice.pos).toEqual({ x: 500, y: 500 });
  });

  it("clamps positions to the world edge", () => {
    place(alice, 995, 500);
    game.applyMove("a", 1, 0, 0);
    game.update();
    expect(alice.pos.x).toBe(980);
  });

  it("ignores moves for unknown players", () => {
    expect(game.applyMove("ghost", 1, 0, 0)).toBe(false);
  });
});

describe("food", () => {
  it("is eaten once on contact and grows the player", () => {
    const { game, config } = setup({ food: { minCount: 0, maxCount: 0, value: 10 } });
    const alice = game.addPlayer("a", "Alice");
    place(alice, 500, 500);
    game.food = [createFood({ x: 510, y: 500 }, [0, 0, 0], config.food)];

    game.update();

    expect(alice.score).toBe(10);
    expect(alice.radius).toBe(radiusForScore(10, config.player));
    expect(game.food).toHaveLength(0);
  });

  it("goes to only one of two overlapping players", () => {
    const { game, config } = setup({ food: { minCount: 0, maxCount: 0, value: 10 } });
    const alice = game.addPlayer("a", "Alice");
    const bob = game.addPlayer("b", "Bobby");
    place(alice, 490, 500);
    place(bob, 510, 500);
    game.food = [createFood({ x: 500, y: 500 }, [0, 0, 0], config.food)];

    game.update();

    expect(alice.score + bob.score).toBe(10);
    expect(game.food).toHaveLength(0);
  });

  it("stays within [minCount, maxCount] after every tick", () => {
    const { game } = setup({
      food: { minCount: 20, maxCount: 30, spawnRatePerSec: 60, radius: 10 },
      world: { width: 400, height: 400 },
    });
    const random = seededRandom(7);
    const ids = ["a", "b", "c"];
    ids.forEach((id, i) => game.addPlayer(id, `Player${i}`));

    for (let tick = 0; tick < 300; tick++) {
      ids.forEach((id) => game.applyMove(id, random() - 0.5, random() - 0.5, tick));
      game.update();
      expect(game.food.length).toBeGreaterThanOrEqual(20);
      expect(game.food.length).toBeLessThanOrEqual(30);
    }
  });

  it("tops up at the configured rate between the bounds", () => {
    const { game } = setup({ tickRate: 10, food: { minCount: 5, maxCount: 8, spawnRatePerSec: 10 } });
    expect(game.food).toHaveLength(5);
    game.update();
    expect(game.food).toHaveLength(6);
    game.update();
    game.update();
    game.update();
    expect(game.food).toHaveLength(8);
  });
});

describe("eating players", () => {
  it("lets a big enough player eat a smaller one and respawns the victim later", () => {
    const { game, config, clock } = setup({ player: { respawnCooldownMs: 3000, minSpawnDistance: 100 } });
    const a = game.addPlayer("a", "Alice");
    const b = game.addPlayer("b", "Bobby");
    place(a, 500, 500, 900); // radius 50
    place(b, 540, 500, 100); // radius 30; 50 >= 30 * 1.2

    const snapshot = game.update();

    expect(b.alive).toBe(false);
    expect(b.respawnAt).toBe(4000);
    expect(snapshot.players.b).toBeUndefined();
    expect(a.score).toBe(900 + 10 + 100);
    expect(a.radius).toBe(radiusForScore(1010, config.player));

    clock.now = 3999;
    game.update();
    expect(b.alive).toBe(false);

    clock.now = 4000;
    const after = game.update();
    expect(b.alive).toBe(true);
    expect(b.score).toBe(0);
    expect(b.radius).toBe(20);
    expect(distance(b.pos, a.pos)).toBeGreaterThanOrEqual(100);
    expect(after.players.b?.score).toBe(0);
  });

  it("does nothing below the eat ratio", () => {
    const { game } = setup();
    const a = game.addPlayer("a", "Alice");
    const b = game.addPlayer("b", "Bobby");
    place(a, 500, 500, 100); // radius 30
    place(b, 520, 500, 49); // radius 27; 30 < 27 * 1.2

    game.update();

    expect(a.alive && b.alive).toBe(true);
    expect(a.score).toBe(100);
  });

  it("awards a victim to the single largest eligible eater, lower id on ties", () => {
    const { game } = setup();
    const a = game.addPlayer("a", "Alice");
    const b = game.addPlayer("b", "Bobby");
    const c = game.addPlayer("c", "Carol");
    place(a, 470, 500, 100); // radius 30
    place(b, 530, 500, 100); // radius 30
    place(c, 500, 500, 0); // radius 20

    game.update();

    expect(c.alive).toBe(false);
    expect(a.score).toBe(110);
    expect(b.score).toBe(100);
  });

  it("lets a dead player's skills and intent lapse", () => {
    const { game } = setup();
    const a = game.addPlayer("a", "Alice");
    const b = game.addPlayer("b", "Bobby");
    place(a, 500, 500, 900);
    place(b, 540, 500, 0);
    game.applyMove("b", 1, 0, 0);
    game.activateSkill("b", "pull");

    game.update();

    expect(b.alive).toBe(false);
    expect(b.skills.pull.active).toBe(false);
    expect(b.direction).toEqual({ x: 0, y: 0 });
    expect(game.activateSkill("b", "push")).toBe(false);
  });
});

describe("skills in the world", () => {
  it("pushes a nearby player away and ends after its duration", () => {
    const { game, clock } = setup();
    const a = game.addPlayer("a", "Alice");
    const b = game.addPlayer("b", "Bobby");
    place(a, 500, 500);
    place(b, 550, 500);

    expect(game.activateSkill("a", "push")).toBe(true);
    expect(game.activateSkill("a", "push")).toBe(false);
    game.update();

    expect(b.pos.x).toBeCloseTo(550 + (600 * (1 - 50 / 110)) / 30);
    expect(a.pos.x).toBe(500);

    clock.now = 1400;
    game.update();
    expect(a.skills.push.active).toBe(false);
  });

  it("pushes the caster back from a target over the size threshold", () => {
    const { game } = setup();
    const a = game.addPlayer("a", "Alice");
    const b = game.addPlayer("b", "Bobby");
    place(a, 500, 500); // radius 20
    place(b, 560, 500, 121); // radius 31 > 20 * 1.5

    game.activateSkill("a", "push");
    game.update();

    expect(a.pos.x).toBeCloseTo(500 - (600 * (1 - 60 / 110)) / 30);
    expect(b.pos.x).toBe(560);
  });

  it("pulls food toward the caster", () => {
    const { game, config } = setup();
    const a = game.addPlayer("a", "Alice");
    place(a, 500, 500);
    const food = createFood({ x: 600, y: 500 }, [0, 0, 0], config.food);
    game.food = [food];

    game.activateSkill("a", "pull");
    game.update();

    expect(food.pos.x).toBeCloseTo(600 - (400 * (1 - 100 / 130)) / 30);
  });
});

describe("snapshots", () => {
  it("exposes public fields only and is frozen", () => {
    const { game } = setup();
    const a = game.addPlayer("a", "Alice");
    place(a, 500, 500);

    const snapshot = game.update();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.players)).toBe(true);
    expect(Object.isFrozen(snapshot.players.a)).toBe(true);
    expect(Object.isFrozen(snapshot.players.a.position)).toBe(true);
    expect(Object.isFrozen(snapshot.players.a.skills.push)).toBe(true);
    expect(snapshot.type).toBe("game_state");
    expect(snapshot.server_tick).toBe(1);
    expect(snapshot.timestamp).toBe(1000);
    expect(snapshot.players.a).toEqual({
      name: "Alice",
      position: { x: 500, y: 500 },
      radius: 20,
      score: 0,
      color: a.color,
      skills: {
        push: { active: false, ready: true, radius: 110 },
        pull: { active: false, ready: true, radius: 130 },
      },
    });
    expect(game.latestSnapshot()).toBe(snapshot);
  });

  it("freezes the food views", () => {
    const { game } = setup({ food: { minCount: 1, maxCount: 1 } });
    const snapshot = game.update();

    expect(snapshot.food).toHaveLength(1);
    expect(Object.isFrozen(snapshot.food)).toBe(true);
    expect(Object.isFrozen(snapshot.food[0])).toBe(true);
    expect(Object.isFrozen(snapshot.food[0].color)).toBe(true);
  });

  it("is not affected by later ticks", () => {
    const { game } = setup();
    const a = game.addPlayer("a", "Alice");
    place(a, 500, 500);
    const first = game.update();

    game.applyMove("a", 1, 0, 0);
    game.update();

    expect(first.players.a?.position).toEqual({ x: 500, y: 500 });
  });

  it("builds one on demand before the first tick", () => {
    const { game } = setup({ food: { minCount: 3, maxCount: 3 } });
    const snapshot = game.latestSnapshot();
    expect(snapshot.server_tick).toBe(0);
    expect(snapshot.food).toHaveLength(3);
  });

  it("reports health only when survival is enabled", () => {
    const { game } = setup({ survival: { enabled: true } });
    const a = game.addPlayer("a", "Alice");
    place(a, 500, 500);
    game.applyMove("a", 1, 0, 0);

    const snapshot = game.update();

    expect(snapshot.players.a?.health).toBe(100);
    expect(a.survival.calories).toBeCloseTo(3000 - 1.5 / 30);

    // No new intent: the next tick drains at the idle rate
    game.update();
    expect(a.survival.calories).toBeCloseTo(3000 - 1.5 / 30 - 1 / 30);
  });
});

describe("findSpawnPoint", () => {
  it("keeps the minimum distance from alive players", () => {
    const { game } = setup({ player: { minSpawnDistance: 200 } });
    const a = game.addPlayer("a", "Alice");
    place(a, 500, 500);

    for (let i = 0; i < 20; i++) {
      const point = game.findSpawnPoint();
      expect(distance(point, a.pos) - a.radius).toBeGreaterThanOrEqual(200);
    }
  });

  it("falls back to an in-bounds point when the world is saturated", () => {
    const { game } = setup({ world: { width: 100, height: 100 }, player: { minSpawnDistance: 5000 } });
    game.addPlayer("a", "Alice");

    const point = game.findSpawnPoint();
    expect(point.x).toBeGreaterThanOrEqual(20);
    expect(point.x).toBeLessThanOrEqual(80);
    expect(point.y).toBeGreaterThanOrEqual(20);
    expect(point.y).toBeLessThanOrEqual(80);
  });
});
