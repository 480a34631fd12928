import { SkillConfig, SkillName, SkillView, Vec2 } from "shared";

export type SkillPhase = "ready" | "active" | "cooldown";

/**
 * Timed area skill. `activate()` starts the active window and the cooldown at
 * the same instant; the cooldown therefore covers the active window too.
 */
export class Skill {
  active = false;
  lastUsed = Number.NEGATIVE_INFINITY;
  level: number;

  constructor(
    readonly name: SkillName,
    readonly config: SkillConfig,
  ) {
    this.level = config.level;
  }

  /** Area radius before the caster's own size is added */
  get reach(): number {
    return this.config.baseRadius + this.level * this.config.radiusPerLevel;
  }

  effectiveRadius(casterRadius: number): number {
    return this.reach + casterRadius;
  }

  canActivate(now: number): boolean {
    return now - this.lastUsed >= this.config.cooldownMs;
  }

  activate(now: number): boolean {
    if (!this.canActivate(now)) return false;
    this.active = true;
    this.lastUsed = now;
    return true;
  }

  /** Close the active window once its duration has elapsed */
  update(now: number): void {
    if (this.active && now - this.lastUsed >= this.config.durationMs) {
      this.active = false;
    }
  }

  phase(now: number): SkillPhase {
    if (this.active) return "active";
    return this.canActivate(now) ? "ready" : "cooldown";
  }

  reset(): void {
    this.active = false;
    this.lastUsed = Number.NEGATIVE_INFINITY;
  }

  toView(casterRadius: number, now: number): SkillView {
    return {
      active: this.active,
      ready: !this.active && this.canActivate(now),
      radius: this.effectiveRadius(casterRadius),
    };
  }
}

export function createSkills(configs: Record<SkillName, SkillConfig>): Record<SkillName, Skill> {
  return {
    push: new Skill("push", configs.push),
    pull: new Skill("pull", configs.pull),
  };
}

export interface Body {
  pos: Vec2;
  radius: number;
}

export interface SkillEffect {
  /** Which body the displacement applies to */
  mover: "caster" | "target";
  dx: number;
  dy: number;
}

/**
 * Displacement produced by one active skill on one target for a step of `dt`
 * seconds, or null when the target is out of range or unaffected.
 *
 * Strength falls off linearly from `force` at the caster's centre to zero at
 * the effective radius. A push against a target larger than the size
 * threshold moves the caster away instead; a pull on such a target does
 * nothing.
 */
export function computeSkillEffect(
  skill: SkillName,
  config: SkillConfig,
  caster: Body,
  target: Body,
  effectiveRadius: number,
  dt: number,
): SkillEffect | null {
  const dx = target.pos.x - caster.pos.x;
  const dy = target.pos.y - caster.pos.y;
  const dist = Math.hypot(dx, dy);
  if (dist === 0 || dist > effectiveRadius) return null;

  const ux = dx / dist;
  const uy = dy / dist;
  const magnitude = config.force * (1 - dist / effectiveRadius) * dt;
  if (magnitude <= 0) return null;

  const oversized = target.radius > caster.radius * config.sizeThresholdMultiplier;

  if (skill === "push") {
    if (oversized) {
      return { mover: "caster", dx: -ux * magnitude, dy: -uy * magnitude };
    }
    return { mover: "target", dx: ux * magnitude, dy: uy * magnitude };
  }

  if (oversized) return null;
  // Never drag the target past the caster's centre
  const pull = Math.min(magnitude, dist);
  return { mover: "target", dx: -ux * pull, dy: -uy * pull };
}
