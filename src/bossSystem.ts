import type { BossOutcome, GameState } from './models';
import type { BossConfig, ResultConfig } from './models/config';
import type { RandomSource } from './rng';
import { clamp } from './numbers';
import { clampStats } from './party';
import { computeJourneyScore } from './scoring';

/**
 * Boss Minigame
 *
 * The final filibuster: a few attrition rounds that cost sanity and add
 * panic, then one roll against a chance built from the journey score and
 * the party's standing. Either stat giving out mid-way loses on the spot.
 */

export const BOSS_CONSTANTS = {
  /** Extra win chance for a deep run played aggressively */
  DEEP_AGGRESSIVE_BONUS: 0.03,
  PANTS_LIMIT: 100,
};

export interface BossResult {
  outcome: BossOutcome;
  chance: number | null;
  roll: number | null;
  roundsPlayed: number;
}

/** Win probability given the party's state after the attrition rounds. */
export function bossVictoryChance(
  state: GameState,
  cfg: BossConfig,
  resultCfg: ResultConfig
): number {
  const { stats } = state;
  const required = Math.max(1, cfg.distanceRequired);
  const score = Math.max(0, computeJourneyScore(state, resultCfg));

  let chance = cfg.baseVictoryChance;
  chance += (score / required) * cfg.scoreWeight;
  chance += stats.credibility * cfg.credibilityWeight;
  chance += stats.sanity * cfg.sanityWeight;
  chance += stats.supplies * cfg.suppliesWeight;
  chance += stats.allies * cfg.alliesWeight;
  chance -= stats.pants * cfg.pantsPenaltyWeight;

  chance *= Math.min(1, state.milesTraveled / required);
  if (state.mode === 'deep' && state.policy === 'aggressive') {
    chance += BOSS_CONSTANTS.DEEP_AGGRESSIVE_BONUS;
  }
  return clamp(chance, cfg.minChance, cfg.maxChance);
}

export function runBoss(
  state: GameState,
  cfg: BossConfig,
  resultCfg: ResultConfig,
  rng: RandomSource
): BossResult {
  state.bossAttempted = true;

  const finish = (result: BossResult): BossResult => {
    state.bossOutcome = result.outcome;
    return result;
  };

  for (let round = 1; round <= cfg.rounds; round++) {
    if (cfg.pantsGainPerRound > 0) state.stats.pants += cfg.pantsGainPerRound;
    if (cfg.sanityLossPerRound > 0) state.stats.sanity -= cfg.sanityLossPerRound;
    clampStats(state.stats);

    if (state.stats.pants >= BOSS_CONSTANTS.PANTS_LIMIT) {
      return finish({ outcome: 'pants_emergency', chance: null, roll: null, roundsPlayed: round });
    }
    if (state.stats.sanity <= 0) {
      return finish({ outcome: 'exhausted', chance: null, roll: null, roundsPlayed: round });
    }
  }

  const chance = bossVictoryChance(state, cfg, resultCfg);
  const roll = rng.next();
  if (roll < chance) {
    state.bossVictory = true;
    return finish({ outcome: 'passed_cloture', chance, roll, roundsPlayed: cfg.rounds });
  }
  return finish({ outcome: 'survived_flood', chance, roll, roundsPlayed: cfg.rounds });
}
