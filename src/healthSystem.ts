import type { GameState, HealthState } from './models';
import type { RandomSource } from './rng';
import { clamp } from './numbers';
import { markDamage } from './party';

/**
 * Health System
 *
 * Starvation and illness. Both run once per day before the weather and
 * can request a rest day. Running out of supplies is survivable for a
 * day; after that the party wastes away, with one last reprieve before
 * hunger ends the run.
 */

// ── Constants ────────────────────────────────────────────────────

export const STARVATION = {
  /** Days without supplies before any damage */
  GRACE_DAYS: 1,
  MAX_MALNUTRITION: 5,
  HP_LOSS: 1,
  SANITY_LOSS: 1,
  PANTS_GAIN: 1,
};

export const ILLNESS = {
  DAILY_CHANCE: 0.012,
  NO_SUPPLIES_BONUS: 0.02,
  STARVING_BONUS: 0.015,
  LOW_HP_BONUS: 0.01,
  /** hp at or below which illness is likelier */
  LOW_HP: 4,
  MAX_DAILY_CHANCE: 0.18,
  MIN_DAYS: 2,
  MAX_DAYS: 4,
  COOLDOWN_DAYS: 5,
};

export function createHealthState(): HealthState {
  return {
    starvationDays: 0,
    malnutritionLevel: 0,
    starvationBackstopUsed: false,
    illnessDaysRemaining: 0,
    illnessCooldown: 0,
    exposureHeatStreak: 0,
    exposureColdStreak: 0,
    exposureLockout: false,
    lastDamage: 'unknown',
  };
}

// ── Starvation ───────────────────────────────────────────────────

export type StarvationResult =
  | { type: 'fed' }
  | { type: 'relief' }
  | { type: 'grace'; days: number }
  | { type: 'tick'; days: number; level: number }
  | { type: 'backstop'; days: number }
  | { type: 'collapse'; days: number };

export function applyStarvation(state: GameState): StarvationResult {
  const health = state.health;
  if (state.stats.supplies > 0) {
    const wasStarving = health.starvationDays > 0;
    health.starvationDays = 0;
    health.malnutritionLevel = 0;
    health.starvationBackstopUsed = false;
    return wasStarving ? { type: 'relief' } : { type: 'fed' };
  }

  health.starvationDays += 1;
  const days = health.starvationDays;
  if (days <= STARVATION.GRACE_DAYS) {
    health.malnutritionLevel = 0;
    return { type: 'grace', days };
  }

  health.malnutritionLevel = Math.min(days, STARVATION.MAX_MALNUTRITION);
  state.stats.hp -= STARVATION.HP_LOSS;
  state.stats.sanity -= STARVATION.SANITY_LOSS;
  state.stats.pants = clamp(state.stats.pants + STARVATION.PANTS_GAIN, 0, 100);
  markDamage(state, 'starvation');

  if (state.stats.hp <= 0) {
    if (!health.starvationBackstopUsed) {
      health.starvationBackstopUsed = true;
      state.stats.hp = 1;
      state.restRequested = true;
      return { type: 'backstop', days };
    }
    if (state.ending === null) state.ending = { type: 'collapse', cause: 'hunger' };
    return { type: 'collapse', days };
  }
  return { type: 'tick', days, level: health.malnutritionLevel };
}

// ── Illness ──────────────────────────────────────────────────────

export type IllnessResult =
  | { type: 'healthy' }
  | { type: 'onset'; days: number }
  | { type: 'sick'; daysRemaining: number }
  | { type: 'recovered' };

export function illnessChance(state: GameState): number {
  let chance = ILLNESS.DAILY_CHANCE;
  if (state.stats.supplies <= 0) chance += ILLNESS.NO_SUPPLIES_BONUS;
  if (state.health.starvationDays > 0) chance += ILLNESS.STARVING_BONUS;
  if (state.stats.hp <= ILLNESS.LOW_HP) chance += ILLNESS.LOW_HP_BONUS;
  return clamp(chance, 0, ILLNESS.MAX_DAILY_CHANCE);
}

function applyIllnessHit(state: GameState): void {
  state.stats.hp -= 1;
  state.stats.sanity -= 1;
  state.stats.supplies = Math.max(0, state.stats.supplies - 1);
  state.restRequested = true;
  markDamage(state, 'disease');
}

/** Daily illness step. Draws from the health stream only when healthy and off cooldown. */
export function rollDailyIllness(state: GameState, rng: RandomSource): IllnessResult {
  const health = state.health;
  if (health.illnessCooldown > 0) health.illnessCooldown -= 1;

  if (health.illnessDaysRemaining > 0) {
    applyIllnessHit(state);
    health.illnessDaysRemaining -= 1;
    if (health.illnessDaysRemaining === 0) {
      health.illnessCooldown = ILLNESS.COOLDOWN_DAYS;
      return { type: 'recovered' };
    }
    return { type: 'sick', daysRemaining: health.illnessDaysRemaining };
  }

  if (health.illnessCooldown > 0) return { type: 'healthy' };
  if (rng.next() >= illnessChance(state)) return { type: 'healthy' };

  const days = rng.range(ILLNESS.MIN_DAYS, ILLNESS.MAX_DAYS);
  // onset counts as the first sick day
  health.illnessDaysRemaining = days - 1;
  health.illnessCooldown = ILLNESS.COOLDOWN_DAYS;
  applyIllnessHit(state);
  return { type: 'onset', days };
}

/** Travel speed factor while sick; `penalty` comes from the journey config. */
export function illnessTravelMultiplier(health: HealthState, penalty: number): number {
  return health.illnessDaysRemaining > 0 ? penalty : 1;
}
