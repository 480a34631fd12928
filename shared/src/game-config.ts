import { z } from "zod";
import { DEFAULT_TICK_RATE } from "./constants.js";
import { ValidationError } from "./errors.js";
import { ColorSchema, Color } from "./protocol.js";

// Every leaf carries a default, so any partial document parses to a full config.

const positive = (fallback: number) => z.number().positive().default(fallback);
const nonNegative = (fallback: number) => z.number().nonnegative().default(fallback);
const count = (fallback: number) => z.number().int().nonnegative().default(fallback);

const PALETTE: Color[] = [
  [255, 99, 71],
  [65, 105, 225],
  [50, 205, 50],
  [255, 215, 0],
  [186, 85, 211],
  [0, 206, 209],
  [255, 140, 0],
  [199, 21, 133],
];

interface SkillDefaults {
  baseRadius: number;
  radiusPerLevel: number;
  force: number;
  durationMs: number;
  cooldownMs: number;
  sizeThresholdMultiplier: number;
}

function skillSchema(d: SkillDefaults) {
  return z
    .object({
      level: z.number().int().min(1).default(1),
      baseRadius: nonNegative(d.baseRadius),
      radiusPerLevel: nonNegative(d.radiusPerLevel),
      /** Displacement speed in px/s applied at point-blank range; falls off linearly to 0 at the edge */
      force: nonNegative(d.force),
      durationMs: positive(d.durationMs),
      /** Measured from activation, so it includes the active window */
      cooldownMs: nonNegative(d.cooldownMs),
      sizeThresholdMultiplier: positive(d.sizeThresholdMultiplier),
    })
    .refine((s) => s.cooldownMs >= s.durationMs, {
      message: "cooldownMs must be at least durationMs",
      path: ["cooldownMs"],
    });
}

export const WorldConfigSchema = z.object({
  width: positive(3000),
  height: positive(3000),
});

export const PlayerConfigSchema = z
  .object({
    startRadius: positive(20),
    maxRadius: positive(300),
    growthFactor: nonNegative(1),
    growthExponent: positive(0.5),
    /** px/s at the start radius */
    baseSpeed: positive(240),
    /** speed = baseSpeed * (startRadius / radius) ^ speedFalloff */
    speedFalloff: nonNegative(0.5),
    minSpawnDistance: nonNegative(150),
    spawnAttempts: z.number().int().positive().default(30),
    respawnCooldownMs: nonNegative(3000),
    colors: z.array(ColorSchema).min(1).default(PALETTE),
  })
  .refine((p) => p.maxRadius >= p.startRadius, {
    message: "maxRadius must be at least startRadius",
    path: ["maxRadius"],
  });

export const FoodConfigSchema = z
  .object({
    radius: positive(6),
    value: nonNegative(1),
    minCount: count(150),
    maxCount: count(300),
    /** Items per second added while between minCount and maxCount */
    spawnRatePerSec: nonNegative(10),
    minPlayerDistance: nonNegative(0),
    spawnAttempts: z.number().int().positive().default(10),
    colors: z.array(ColorSchema).min(1).default(PALETTE),
  })
  .refine((f) => f.maxCount >= f.minCount, {
    message: "maxCount must be at least minCount",
    path: ["maxCount"],
  });

export const SkillsConfigSchema = z.object({
  push: skillSchema({
    baseRadius: 80,
    radiusPerLevel: 10,
    force: 600,
    durationMs: 400,
    cooldownMs: 3000,
    sizeThresholdMultiplier: 1.5,
  }).default({}),
  pull: skillSchema({
    baseRadius: 100,
    radiusPerLevel: 10,
    force: 400,
    durationMs: 600,
    cooldownMs: 4000,
    sizeThresholdMultiplier: 1,
  }).default({}),
});

export const EatRewardConfigSchema = z.object({
  /** Flat score granted for every kill */
  base: nonNegative(10),
  /** Share of the victim's score added on top */
  scoreFraction: nonNegative(1),
});

export const SurvivalConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxHealth: positive(100),
  maxCalories: positive(3000),
  maxHydration: positive(5000),
  maxBlood: positive(5000),
  caloriesDrainIdle: nonNegative(1),
  hydrationDrainIdle: nonNegative(1.5),
  moveMult: nonNegative(1.5),
  sprintMult: nonNegative(2),
  craftingMult: nonNegative(1.2),
  starveHpLoss: nonNegative(0.5),
  dehydrateHpLoss: nonNegative(1),
  bleedLossPerSec: nonNegative(20),
  lowBloodThreshold: nonNegative(3000),
  lowBloodHpLoss: nonNegative(0.5),
  infectionHpLoss: nonNegative(0.2),
  hypothermiaC: z.number().default(35),
  hypothermiaHpLoss: nonNegative(0.5),
  heatstrokeC: z.number().default(40),
  heatstrokeHydrationDrain: nonNegative(2),
});

export const GameConfigSchema = z.object({
  world: WorldConfigSchema.default({}),
  player: PlayerConfigSchema.default({}),
  food: FoodConfigSchema.default({}),
  skills: SkillsConfigSchema.default({}),
  tickRate: z.number().positive().max(240).default(DEFAULT_TICK_RATE),
  maxPlayers: z.number().int().positive().default(50),
  /** Minimum radius ratio (eater / victim) for one player to eat another */
  eatRatio: z.number().min(1).default(1.2),
  eatReward: EatRewardConfigSchema.default({}),
  /** Uniform grid cell edge used for broad-phase collision queries */
  gridCellSize: positive(100),
  survival: SurvivalConfigSchema.default({}),
});

export type GameConfig = z.infer<typeof GameConfigSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;
export type PlayerConfig = GameConfig["player"];
export type FoodConfig = GameConfig["food"];
export type SkillConfig = GameConfig["skills"]["push"];
export type SurvivalConfig = GameConfig["survival"];

/** Validate a parsed config document, filling every missing key with its default */
export function parseGameConfig(raw: unknown = {}): GameConfig {
  const result = GameConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid game config: ${detail}`, "invalid_config");
  }
  return result.data;
}

export const DEFAULT_GAME_CONFIG: GameConfig = parseGameConfig();
