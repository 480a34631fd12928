import { v4 as uuid } from "uuid";
import {
  Color,
  EntityKind,
  FoodConfig,
  GameConfig,
  PlayerConfig,
  SkillName,
  Vec2,
} from "shared";
import { Skill, createSkills } from "./skills.js";
import { SurvivalStats, createSurvivalStats } from "./survival.js";

export interface Entity {
  id: string;
  kind: EntityKind;
  pos: Vec2;
  radius: number;
  color: Color;
}

export interface Player extends Entity {
  kind: "player";
  name: string;
  score: number;
  alive: boolean;
  skills: Record<SkillName, Skill>;
  /** Highest move sequence applied; -1 before the first move */
  lastMoveSequence: number;
  /** Latest unit direction received since the previous tick */
  pendingIntent: Vec2 | null;
  /** Direction applied on the last tick, zero when no intent arrived */
  direction: Vec2;
  /** Set while dead */
  respawnAt: number | null;
  survival: SurvivalStats;
}

export interface Food extends Entity {
  kind: "food";
  value: number;
}

/** radius = clamp(start + (score * factor) ^ exponent, start, max) */
export function radiusForScore(score: number, cfg: PlayerConfig): number {
  const grown = cfg.startRadius + Math.pow(Math.max(0, score) * cfg.growthFactor, cfg.growthExponent);
  if (!Number.isFinite(grown)) return cfg.maxRadius;
  return Math.max(cfg.startRadius, Math.min(cfg.maxRadius, grown));
}

/** Bigger blobs move slower */
export function speedFor(radius: number, cfg: PlayerConfig): number {
  return cfg.baseSpeed * Math.pow(cfg.startRadius / Math.max(radius, cfg.startRadius), cfg.speedFalloff);
}

export function createPlayer(id: string, name: string, pos: Vec2, color: Color, config: GameConfig): Player {
  return {
    id,
    kind: "player",
    name,
    pos: { x: pos.x, y: pos.y },
    radius: radiusForScore(0, config.player),
    color,
    score: 0,
    alive: true,
    skills: createSkills(config.skills),
    lastMoveSequence: -1,
    pendingIntent: null,
    direction: { x: 0, y: 0 },
    respawnAt: null,
    survival: createSurvivalStats(config.survival),
  };
}

export function createFood(pos: Vec2, color: Color, cfg: FoodConfig): Food {
  return {
    id: uuid(),
    kind: "food",
    pos: { x: pos.x, y: pos.y },
    radius: cfg.radius,
    color,
    value: cfg.value,
  };
}
