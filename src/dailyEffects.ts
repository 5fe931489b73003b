import type { GameState } from './models';
import type { DailyChannel, HealthChannel, JourneyConfig, PacingConfig, WeatherConfig } from './models/config';
import { clamp, roundToI32 } from './numbers';
import { clampStats } from './party';

/**
 * Daily Effects
 *
 * The once-a-day drain on the party: supplies and sanity channels scaled
 * by pace, diet and weather, the health drift, then the flat pace and
 * diet deltas.
 */

export interface DailyTickOutcome {
  suppliesDelta: number;
  sanityDelta: number;
  healthDelta: number;
}

export function channelValue(channel: DailyChannel, state: GameState): number {
  if (channel.base <= 0) return 0;
  return (
    channel.base *
    channel.pace[state.pace] *
    channel.diet[state.diet] *
    channel.weather[state.weather.today]
  );
}

export function healthChange(channel: HealthChannel, state: GameState): number {
  let delta = 0;
  if (channel.decay > 0) delta -= channel.decay * channel.weather[state.weather.today];
  if (channel.restHeal > 0 && state.restRequested) delta += channel.restHeal;
  return roundToI32(delta);
}

export function applyDailyChannels(state: GameState, cfg: JourneyConfig): DailyTickOutcome {
  const suppliesDelta = roundToI32(-channelValue(cfg.daily.supplies, state));
  const sanityDelta = roundToI32(-channelValue(cfg.daily.sanity, state));
  const healthDelta = healthChange(cfg.daily.health, state);

  state.stats.supplies += suppliesDelta;
  state.stats.sanity += sanityDelta;
  state.stats.hp += healthDelta;
  clampStats(state.stats);

  return { suppliesDelta, sanityDelta, healthDelta };
}

// ── Pace and diet ────────────────────────────────────────────────

export interface PaceDietOutcome {
  sanityDelta: number;
  pantsDelta: number;
}

export function applyPaceAndDiet(
  state: GameState,
  pacing: PacingConfig,
  weather: WeatherConfig
): PaceDietOutcome {
  const pace = pacing.pace[state.pace];
  const diet = pacing.diet[state.diet];
  const sanityDelta = pace.sanity + diet.sanity;
  const pantsDelta = pace.pants + diet.pants;

  state.stats.sanity += sanityDelta;
  state.stats.pants = clamp(
    state.stats.pants + pantsDelta,
    weather.limits.pantsFloor,
    weather.limits.pantsCeiling
  );
  clampStats(state.stats);
  return { sanityDelta, pantsDelta };
}
