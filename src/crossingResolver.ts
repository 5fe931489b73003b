import type { CrossingKind, GameMode, GameState, PolicyKind } from './models';
import type { CrossingConfig, CrossingTypeConfig } from './models/config';
import { clamp } from './numbers';
import { CounterRng, seedToBytes, type RandomSource } from './rng';
import { fnv1a64 } from './shareCode';

/**
 * Crossing Resolver
 *
 * Checkpoints and washed-out bridges sit at fixed mileposts. A permit
 * always gets through; otherwise the party either bribes its way past or
 * is turned back, and a turned-back party usually finds a detour of a few
 * days but can be stopped for good.
 *
 * Outcome odds depend on the policy and game mode only, so resolution is
 * a pure function of its inputs and the random source.
 */

export type CrossingResult =
  | { type: 'pass' }
  | { type: 'detour'; days: number }
  | { type: 'terminal_fail' };

export interface CrossingOutcome {
  result: CrossingResult;
  usedPermit: boolean;
  bribeAttempted: boolean;
  bribeSucceeded: boolean;
}

export interface CrossingRequest {
  policy: PolicyKind;
  mode: GameMode;
  hasPermit: boolean;
  bribeIntent: boolean;
  crossingIndex: number;
  dayIndex: number;
}

export const CROSSING_CONSTANTS = {
  /** Detour odds lost after a failed bribe */
  BRIBE_FAIL_PENALTY: { deep: 0.03, classic: 0.02 } satisfies Record<GameMode, number>,
  DETOUR_WEIGHT_MIN: 0.6,
  DETOUR_WEIGHT_MAX: 0.98,
  /** Salts mixed into the run seed for each crossing event */
  CROSSING_SALT: 0x9e3779b97f4a7c15n,
  DAY_SALT: 0xc2b2ae3d27d4eb4fn,
};

// ── Probability tables ───────────────────────────────────────────

export function baselineDetourProbability(policy: PolicyKind, mode: GameMode): number {
  if (mode === 'deep') {
    switch (policy) {
      case 'aggressive':
        return 0.8;
      case 'resource_manager':
      case 'monte_carlo':
        return 0.86;
      case 'conservative':
        return 0.88;
      case 'balanced':
        return 0.84;
    }
  }
  switch (policy) {
    case 'conservative':
      return 0.92;
    case 'aggressive':
      return 0.86;
    case 'resource_manager':
    case 'monte_carlo':
      return 0.91;
    case 'balanced':
      return 0.9;
  }
}

export function bribeSuccessProbability(policy: PolicyKind, mode: GameMode): number {
  if (mode === 'deep') {
    switch (policy) {
      case 'aggressive':
        return 0.78;
      case 'resource_manager':
      case 'monte_carlo':
        return 0.82;
      case 'conservative':
      case 'balanced':
        return 0.8;
    }
  }
  switch (policy) {
    case 'conservative':
      return 0.86;
    case 'aggressive':
      return 0.76;
    case 'resource_manager':
    case 'monte_carlo':
      return 0.84;
    case 'balanced':
      return 0.82;
  }
}

export function detourProbabilityAfterBribeFailure(policy: PolicyKind, mode: GameMode): number {
  return clamp(
    baselineDetourProbability(policy, mode) - CROSSING_CONSTANTS.BRIBE_FAIL_PENALTY[mode],
    CROSSING_CONSTANTS.DETOUR_WEIGHT_MIN,
    CROSSING_CONSTANTS.DETOUR_WEIGHT_MAX
  );
}

export function sampleDetourDays(policy: PolicyKind, mode: GameMode, rng: RandomSource): number {
  let roll = rng.next();
  if (policy === 'resource_manager' && mode === 'classic') {
    roll *= 0.9;
  }
  if (roll < 0.35) return 2;
  if (roll < 0.75) return 3;
  if (mode === 'deep' && (policy === 'aggressive' || roll > 0.9)) return 4;
  return 3;
}

function detourOrTerminal(
  policy: PolicyKind,
  mode: GameMode,
  detourWeight: number,
  rng: RandomSource
): CrossingResult {
  if (rng.next() < detourWeight) {
    return { type: 'detour', days: sampleDetourDays(policy, mode, rng) };
  }
  return { type: 'terminal_fail' };
}

// ── Resolution ───────────────────────────────────────────────────

export function resolveCrossing(request: CrossingRequest, rng: RandomSource): CrossingOutcome {
  const { policy, mode } = request;
  const outcome: CrossingOutcome = {
    result: { type: 'terminal_fail' },
    usedPermit: false,
    bribeAttempted: false,
    bribeSucceeded: false,
  };

  if (request.hasPermit) {
    outcome.result = { type: 'pass' };
    outcome.usedPermit = true;
    return outcome;
  }

  if (!request.bribeIntent) {
    outcome.result = detourOrTerminal(policy, mode, baselineDetourProbability(policy, mode), rng);
    return outcome;
  }

  outcome.bribeAttempted = true;
  if (rng.next() < bribeSuccessProbability(policy, mode)) {
    outcome.bribeSucceeded = true;
    outcome.result = { type: 'pass' };
    return outcome;
  }

  outcome.result = detourOrTerminal(
    policy,
    mode,
    detourProbabilityAfterBribeFailure(policy, mode),
    rng
  );
  return outcome;
}

const MASK_64 = (1n << 64n) - 1n;

/**
 * A random source private to one crossing event, derived from the run
 * seed, the crossing index and the day. Replaying the same crossing on the
 * same day always rolls the same way.
 */
export function crossingEventRng(seed: bigint, crossingIndex: number, dayIndex: number): CounterRng {
  const mixed =
    (seed ^
      ((BigInt(crossingIndex + 1) * CROSSING_CONSTANTS.CROSSING_SALT) & MASK_64) ^
      ((BigInt(dayIndex + 1) * CROSSING_CONSTANTS.DAY_SALT) & MASK_64)) &
    MASK_64;
  const hash = fnv1a64(seedToBytes(mixed));
  const folded = Number((hash ^ (hash >> 32n)) & 0xffffffffn);
  return new CounterRng(folded);
}

// ── Config helpers ───────────────────────────────────────────────

export function calculateBribeCost(baseCostCents: number, discountPct: number): number {
  const pct = clamp(discountPct, 0, 100);
  return Math.round(baseCostCents * (1 - pct / 100));
}

export function hasPermit(state: GameState, cfg: CrossingConfig): boolean {
  return cfg.permitTags.some((tag) => state.inventory.tags.includes(tag));
}

/** Drop the first permit tag held. Returns the tag used. */
export function consumePermit(state: GameState, cfg: CrossingConfig): string | null {
  for (const tag of cfg.permitTags) {
    const at = state.inventory.tags.indexOf(tag);
    if (at >= 0) {
      state.inventory.tags.splice(at, 1);
      return tag;
    }
  }
  return null;
}

export function crossingKindAt(cfg: CrossingConfig, index: number): CrossingKind {
  return cfg.kinds[index] ?? 'checkpoint';
}

export function crossingTypeConfig(cfg: CrossingConfig, kind: CrossingKind): CrossingTypeConfig {
  return cfg.types[kind];
}

/** Milepost of the next unresolved crossing, or null when all are behind. */
export function nextCrossingMilestone(state: GameState, cfg: CrossingConfig): number | null {
  return cfg.milestones[state.crossings.resolved] ?? null;
}
