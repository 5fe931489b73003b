import type { DamageCause, GameState, Stats } from './models';
import { clamp } from './numbers';

/** Inclusive [min, max] of every party stat. */
export const STAT_LIMITS: Record<keyof Stats, readonly [number, number]> = {
  supplies: [0, 20],
  hp: [0, 10],
  sanity: [0, 10],
  credibility: [0, 20],
  morale: [0, 10],
  allies: [0, 50],
  pants: [0, 100],
};

export const STAT_KEYS: readonly (keyof Stats)[] = [
  'supplies',
  'hp',
  'sanity',
  'credibility',
  'morale',
  'allies',
  'pants',
];

export function createDefaultStats(): Stats {
  return {
    supplies: 10,
    hp: 10,
    sanity: 10,
    credibility: 5,
    morale: 5,
    allies: 0,
    pants: 0,
  };
}

export function clampStats(stats: Stats): void {
  for (const key of STAT_KEYS) {
    const [min, max] = STAT_LIMITS[key];
    stats[key] = clamp(Math.round(stats[key]), min, max);
  }
}

/** Apply a batch of deltas, then clamp. */
export function applyStatDeltas(stats: Stats, deltas: Partial<Stats>): void {
  for (const key of STAT_KEYS) {
    const delta = deltas[key];
    if (delta !== undefined) stats[key] += delta;
  }
  clampStats(stats);
}

export function markDamage(state: GameState, cause: DamageCause): void {
  state.health.lastDamage = cause;
}

export function hasTag(state: GameState, tag: string): boolean {
  return state.inventory.tags.includes(tag);
}
