import type { Ending, GameMode, GameState } from './models';
import type { ResultConfig, ScoreRounding } from './models/config';
import { clamp, roundToI32 } from './numbers';
import { encodeFriendly } from './shareCode';

/**
 * Scoring and Ending Selection
 *
 * Endings are classified by a fixed precedence: panic, then sanity, then
 * hp (by the last thing that hurt the party), then hunger, then the boss.
 * An ending recorded while the run was in progress always stands.
 */

export const SCORE_LIMITS = {
  FINAL_MIN: 0,
  FINAL_MAX: 999_999,
  MIN_MULTIPLIER: 0.1,
};

// ── Ending ───────────────────────────────────────────────────────

function endingForHealthLoss(state: GameState): Ending {
  switch (state.health.lastDamage) {
    case 'exposure_cold':
      return { type: 'exposure', kind: 'cold' };
    case 'exposure_heat':
      return { type: 'exposure', kind: 'heat' };
    case 'starvation':
      return { type: 'collapse', cause: 'hunger' };
    case 'vehicle':
      return { type: 'vehicle_failure' };
    case 'disease':
      return { type: 'collapse', cause: 'disease' };
    case 'breakdown':
    case 'unknown':
      return { type: 'collapse', cause: 'breakdown' };
  }
}

/**
 * Panic, sanity or hp giving out. Checked every day while the run is in
 * progress; running out of supplies is left to the starvation clock.
 */
export function vitalFailure(state: GameState): Ending | null {
  const { stats } = state;
  if (stats.pants >= 100) return { type: 'collapse', cause: 'panic' };
  if (stats.sanity <= 0) return { type: 'sanity_loss' };
  if (stats.hp <= 0) return endingForHealthLoss(state);
  return null;
}

/** Terminal condition reached by stats alone, ignoring the boss. */
export function failureEnding(state: GameState): Ending | null {
  const vital = vitalFailure(state);
  if (vital !== null) return vital;
  if (state.stats.supplies <= 0) return { type: 'collapse', cause: 'hunger' };
  return null;
}

export function selectEnding(state: GameState): Ending {
  if (state.ending !== null) return state.ending;
  const failure = failureEnding(state);
  if (failure !== null) return failure;
  return state.bossVictory ? { type: 'boss_victory' } : { type: 'boss_vote_failed' };
}

/** Short token naming what ended the run, when it was not the boss. */
export function endingCauseToken(ending: Ending): string | null {
  switch (ending.type) {
    case 'collapse':
      return `collapse_${ending.cause}`;
    case 'exposure':
      return `exposure_${ending.kind}`;
    case 'vehicle_failure':
      return 'vehicle_failure';
    case 'sanity_loss':
    case 'boss_vote_failed':
    case 'boss_victory':
      return null;
  }
}

export function headlineKeyFor(ending: Ending): string {
  if (ending.type === 'collapse' && ending.cause === 'panic') return 'result.headline.pants';
  const token = endingCauseToken(ending);
  if (token !== null) return `result.headline.${token}`;
  switch (ending.type) {
    case 'sanity_loss':
      return 'result.headline.sanity';
    case 'boss_vote_failed':
      return 'result.headline.boss_loss';
    default:
      return 'result.headline.victory';
  }
}

export function epilogueKeyFor(headlineKey: string): string {
  const prefix = 'result.headline';
  return headlineKey.startsWith(prefix)
    ? `result.epilogue${headlineKey.slice(prefix.length)}`
    : 'result.epilogue.generic';
}

// ── Score ────────────────────────────────────────────────────────

/** Raw points for the run so far, before pants penalty and multiplier. */
export function computeJourneyScore(state: GameState, cfg: ResultConfig): number {
  const w = cfg.weights;
  const { stats } = state;
  const breakdownPenalty = Math.min(
    state.vehicleBreakdowns * w.breakdownPenalty,
    w.breakdownPenaltyCap
  );
  return (
    stats.supplies * w.supplies +
    stats.hp * w.hp +
    stats.morale * w.morale +
    stats.credibility * w.credibility +
    stats.allies * w.allies +
    Math.max(0, state.day - 1) * w.day +
    state.encounters.resolved * w.encounters +
    state.receipts * w.receipts -
    breakdownPenalty
  );
}

export function scoreMultiplier(mode: GameMode, cfg: ResultConfig): number {
  const bonus = mode === 'deep' ? cfg.deepBonus : 0;
  return Math.max(cfg.scoreMult + bonus, SCORE_LIMITS.MIN_MULTIPLIER);
}

function applyRounding(value: number, rounding: ScoreRounding): number {
  switch (rounding) {
    case 'nearest':
      return roundToI32(value);
    case 'down':
      return roundToI32(Math.floor(value));
    case 'up':
      return roundToI32(Math.ceil(value));
  }
}

export function computeFinalScore(state: GameState, cfg: ResultConfig): number {
  let base = computeJourneyScore(state, cfg);
  const pants = Math.max(0, state.stats.pants);
  if (pants > cfg.pantsPenaltyStart) {
    base -= (pants - cfg.pantsPenaltyStart) * cfg.pantsPenaltyPerPoint;
  }
  base = clamp(base, SCORE_LIMITS.FINAL_MIN, SCORE_LIMITS.FINAL_MAX);
  const scaled = applyRounding(base * scoreMultiplier(state.mode, cfg), cfg.rounding);
  return clamp(scaled, SCORE_LIMITS.FINAL_MIN, SCORE_LIMITS.FINAL_MAX);
}

// ── Summary ──────────────────────────────────────────────────────

export interface ResultSummary {
  ending: Ending;
  headlineKey: string;
  epilogueKey: string;
  endingCause: string | null;
  shareCode: string;
  mode: string;
  deepBadge: boolean;
  multiplier: string;
  score: number;
  scoreThreshold: number;
  passedThreshold: boolean;
  days: number;
  encounters: number;
  receipts: number;
  allies: number;
  supplies: number;
  credibility: number;
  pants: number;
  vehicleBreakdowns: number;
  milesTraveled: number;
  malnutritionDays: number;
}

export function modeLabel(mode: GameMode): string {
  return mode === 'deep' ? 'The Deep End' : 'Classic';
}

export function resultSummary(state: GameState, cfg: ResultConfig): ResultSummary {
  const score = computeFinalScore(state, cfg);
  const threshold = cfg.thresholds[state.mode];
  const ending = selectEnding(state);
  const headlineKey = headlineKeyFor(ending);

  return {
    ending,
    headlineKey,
    epilogueKey: epilogueKeyFor(headlineKey),
    endingCause: endingCauseToken(ending),
    shareCode: encodeFriendly(state.mode === 'deep', state.seed),
    mode: modeLabel(state.mode),
    deepBadge: state.mode === 'deep',
    multiplier: `${scoreMultiplier(state.mode, cfg).toFixed(2)}x`,
    score,
    scoreThreshold: threshold,
    passedThreshold: score >= threshold,
    days: Math.max(0, state.day - 1),
    encounters: state.encounters.resolved,
    receipts: state.receipts,
    allies: state.stats.allies,
    supplies: state.stats.supplies,
    credibility: state.stats.credibility,
    pants: state.stats.pants,
    vehicleBreakdowns: state.vehicleBreakdowns,
    milesTraveled: state.milesTraveled,
    malnutritionDays: state.health.starvationDays,
  };
}
