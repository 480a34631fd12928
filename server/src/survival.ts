import { SurvivalConfig } from "shared";

export interface SurvivalStats {
  health: number;
  calories: number;
  hydration: number;
  blood: number;
  bleeding: boolean;
  infection: boolean;
  /** Body temperature, °C */
  temperature: number;
}

export interface SurvivalActions {
  moving?: boolean;
  sprinting?: boolean;
  crafting?: boolean;
}

export function createSurvivalStats(cfg: SurvivalConfig): SurvivalStats {
  return {
    health: cfg.maxHealth,
    calories: cfg.maxCalories,
    hydration: cfg.maxHydration,
    blood: cfg.maxBlood,
    bleeding: false,
    infection: false,
    temperature: 37,
  };
}

/**
 * Hunger, thirst, bleeding and temperature model. `update()` is a periodic
 * hook; it only changes the stats it is given and never touches the world.
 */
export class SurvivalSystem {
  constructor(private readonly cfg: SurvivalConfig) {}

  update(stats: SurvivalStats, dt: number, actions: SurvivalActions = {}): void {
    const c = this.cfg;

    let mult = 1;
    if (actions.moving) mult *= c.moveMult;
    if (actions.sprinting) mult *= c.sprintMult;
    if (actions.crafting) mult *= c.craftingMult;

    stats.calories -= c.caloriesDrainIdle * mult * dt;
    stats.hydration -= c.hydrationDrainIdle * mult * dt;

    if (stats.calories <= 0) stats.health -= c.starveHpLoss * dt;
    if (stats.hydration <= 0) stats.health -= c.dehydrateHpLoss * dt;

    if (stats.bleeding) stats.blood -= c.bleedLossPerSec * dt;
    if (stats.blood < c.lowBloodThreshold) stats.health -= c.lowBloodHpLoss * dt;

    if (stats.infection) stats.health -= c.infectionHpLoss * dt;

    if (stats.temperature < c.hypothermiaC) {
      stats.health -= c.hypothermiaHpLoss * dt;
    } else if (stats.temperature > c.heatstrokeC) {
      stats.hydration -= c.heatstrokeHydrationDrain * dt;
    }

    this.clamp(stats);
  }

  eat(stats: SurvivalStats, kcal: number): void {
    stats.calories += Math.max(0, kcal);
    this.clamp(stats);
  }

  drink(stats: SurvivalStats, amount: number): void {
    stats.hydration += Math.max(0, amount);
    this.clamp(stats);
  }

  takeDamage(stats: SurvivalStats, hp: number): void {
    stats.health -= Math.max(0, hp);
    this.clamp(stats);
  }

  setBleeding(stats: SurvivalStats, on = true): void {
    stats.bleeding = on;
  }

  bandage(stats: SurvivalStats): void {
    stats.bleeding = false;
  }

  transfuse(stats: SurvivalStats, amount: number): void {
    stats.blood += Math.max(0, amount);
    this.clamp(stats);
  }

  setInfection(stats: SurvivalStats, on = true): void {
    stats.infection = on;
  }

  setTemperature(stats: SurvivalStats, celsius: number): void {
    stats.temperature = celsius;
  }

  private clamp(stats: SurvivalStats): void {
    const c = this.cfg;
    stats.health = Math.max(0, Math.min(stats.health, c.maxHealth));
    stats.calories = Math.max(0, Math.min(stats.calories, c.maxCalories));
    stats.hydration = Math.max(0, Math.min(stats.hydration, c.maxHydration));
    stats.blood = Math.max(0, Math.min(stats.blood, c.maxBlood));
  }
}
