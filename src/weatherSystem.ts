import type {
  ExposureKind,
  GameState,
  Region,
  Season,
  Weather,
  WeatherEffectsToday,
  WeatherState,
} from './models';
import type { WeatherConfig } from './models/config';
import type { RandomSource } from './rng';
import { hasTag, markDamage } from './party';

/**
 * Weather System
 *
 * Picks one weather per day from region weights, then applies streak
 * limits, a seasonal override and a neutral buffer after long heat or
 * cold runs. The selected weather drives daily stat deltas, the travel
 * multiplier, the encounter delta and exposure damage.
 */

export const WEATHER_ORDER: readonly Weather[] = [
  'clear',
  'storm',
  'heat_wave',
  'cold_snap',
  'smoke',
];

export const WEATHER_CONSTANTS = {
  /** Consecutive heat_wave days that force a neutral buffer */
  HEATWAVE_MAX_STREAK: 4,
  /** Consecutive cold_snap days that force a neutral buffer */
  COLDSNAP_MAX_STREAK: 4,
  NEUTRAL_BUFFER_MIN: 2,
  NEUTRAL_BUFFER_MAX: 3,
  /** Exposure days before hp damage starts */
  EXPOSURE_DAMAGE_STREAK: 3,
};

/** Per-season chance of replacing the drawn weather. */
const SEASONAL_OVERRIDE: Record<Season, readonly [Weather, number]> = {
  winter: ['cold_snap', 0.2],
  summer: ['heat_wave', 0.2],
  fall: ['storm', 0.15],
  spring: ['smoke', 0.12],
};

const HEAT_GEAR_TAGS = ['water_jugs', 'water'];
const COLD_GEAR_TAGS = ['warm_coat', 'cold_resist'];

export function isExtreme(weather: Weather): boolean {
  return weather === 'storm' || weather === 'heat_wave' || weather === 'smoke';
}

export function createWeatherState(): WeatherState {
  return {
    today: 'clear',
    yesterday: 'clear',
    extremeStreak: 0,
    heatwaveStreak: 0,
    coldsnapStreak: 0,
    neutralBuffer: 0,
  };
}

export function neutralWeatherEffects(weather: Weather = 'clear'): WeatherEffectsToday {
  return {
    weather,
    suppliesDelta: 0,
    sanityDelta: 0,
    pantsDelta: 0,
    encounterDelta: 0,
    travelMultiplier: 1,
    mitigated: false,
  };
}

// ── Selection ────────────────────────────────────────────────────

export type WeatherSelection =
  | { ok: true; weather: Weather }
  | { ok: false; error: string };

function drawFrom(
  weights: Record<Weather, number>,
  order: readonly Weather[],
  rng: RandomSource
): Weather | null {
  let total = 0;
  for (const weather of order) {
    total += Math.max(0, weights[weather]);
  }
  if (total <= 0) return null;

  let roll = rng.next() * total;
  for (const weather of order) {
    const weight = Math.max(0, weights[weather]);
    if (weight === 0) continue;
    if (roll < weight) return weather;
    roll -= weight;
  }
  return null;
}

function pickNeutral(weights: Record<Weather, number>, rng: RandomSource): Weather {
  return drawFrom(weights, ['clear', 'smoke'], rng) ?? 'clear';
}

function seasonalOverride(season: Season, current: Weather, rng: RandomSource): Weather {
  const [forced, chance] = SEASONAL_OVERRIDE[season];
  return rng.next() < chance ? forced : current;
}

/**
 * Choose today's weather. Mutates only the neutral buffer; streaks are
 * updated when the effects are applied.
 */
export function selectWeatherForToday(
  weather: WeatherState,
  region: Region,
  season: Season,
  cfg: WeatherConfig,
  rng: RandomSource
): WeatherSelection {
  const weights = cfg.weights[region];
  if (!weights) {
    return { ok: false, error: `Weather weights must exist for region ${region}` };
  }

  let candidate = drawFrom(weights, WEATHER_ORDER, rng);
  if (candidate === null) {
    return { ok: false, error: `Weather weights for region ${region} sum to zero` };
  }

  const atCap = weather.extremeStreak >= cfg.limits.maxExtremeStreak;
  if (isExtreme(candidate) && atCap) {
    const calmer = WEATHER_ORDER.filter((w) => !isExtreme(w));
    candidate = drawFrom(weights, calmer, rng) ?? candidate;
  }

  let final = seasonalOverride(season, candidate, rng);

  if (weather.neutralBuffer > 0) {
    final = pickNeutral(weights, rng);
    weather.neutralBuffer -= 1;
  } else {
    const needsBuffer =
      (final === 'heat_wave' &&
        weather.heatwaveStreak >= WEATHER_CONSTANTS.HEATWAVE_MAX_STREAK) ||
      (final === 'cold_snap' &&
        weather.coldsnapStreak >= WEATHER_CONSTANTS.COLDSNAP_MAX_STREAK);
    if (needsBuffer) {
      final = pickNeutral(weights, rng);
      const length = rng.range(
        WEATHER_CONSTANTS.NEUTRAL_BUFFER_MIN,
        WEATHER_CONSTANTS.NEUTRAL_BUFFER_MAX
      );
      weather.neutralBuffer = Math.max(0, length - 1);
    }
  }

  if (isExtreme(final) && atCap) {
    final = 'clear';
  }

  return { ok: true, weather: final };
}

export function updateWeatherStreaks(state: WeatherState, today: Weather): void {
  if (isExtreme(today)) {
    state.extremeStreak = isExtreme(state.yesterday) ? state.extremeStreak + 1 : 1;
  } else {
    state.extremeStreak = 0;
  }
  state.heatwaveStreak = today === 'heat_wave' ? state.heatwaveStreak + 1 : 0;
  state.coldsnapStreak = today === 'cold_snap' ? state.coldsnapStreak + 1 : 0;
}

// ── Effects ──────────────────────────────────────────────────────

export interface ExposureResult {
  kind: ExposureKind;
  hpDamage: number;
  sanityLoss: number;
}

/**
 * Heat without water costs sanity every day and hp from the third day;
 * cold without a coat costs hp from the third day. After a day of
 * exposure damage the next exposed day is skipped (lockout).
 */
export function applyExposure(state: GameState, today: Weather): ExposureResult | null {
  const health = state.health;
  const heat = today === 'heat_wave' && !HEAT_GEAR_TAGS.some((t) => hasTag(state, t));
  const cold = today === 'cold_snap' && !COLD_GEAR_TAGS.some((t) => hasTag(state, t));

  health.exposureHeatStreak = heat ? health.exposureHeatStreak + 1 : 0;
  health.exposureColdStreak = cold ? health.exposureColdStreak + 1 : 0;

  let hpDamage = 0;
  let sanityLoss = 0;
  let kind: ExposureKind | null = null;
  const threshold = WEATHER_CONSTANTS.EXPOSURE_DAMAGE_STREAK;

  const coldTrigger = cold && health.exposureColdStreak >= threshold && !health.exposureLockout;
  if (coldTrigger) {
    hpDamage = 1;
    kind = 'cold';
    markDamage(state, 'exposure_cold');
  }

  let heatTrigger = false;
  if (heat) {
    state.stats.sanity -= 1;
    sanityLoss = 1;
    kind = kind ?? 'heat';
    heatTrigger = health.exposureHeatStreak >= threshold && !health.exposureLockout;
  }
  if (heatTrigger) {
    hpDamage = 1;
    kind = 'heat';
    markDamage(state, 'exposure_heat');
  }

  if (health.exposureLockout && hpDamage === 0) {
    health.exposureLockout = false;
  } else {
    health.exposureLockout = coldTrigger || heatTrigger;
  }

  if (hpDamage > 0) {
    state.stats.hp -= hpDamage;
    if (state.stats.hp <= 0 && state.ending === null && kind !== null) {
      state.ending = { type: 'exposure', kind };
    }
  }

  return kind === null ? null : { kind, hpDamage, sanityLoss };
}

/** Stat deltas for today's weather, after any gear mitigation. */
export function computeWeatherEffects(
  state: GameState,
  cfg: WeatherConfig
): WeatherEffectsToday {
  const today = state.weather.today;
  const effect = cfg.effects[today];
  let sanity = effect.sanity;
  let pants = effect.pants;
  let mitigated = false;

  const mitigation = cfg.mitigation[today];
  if (mitigation && hasTag(state, mitigation.tag)) {
    mitigated = true;
    if (mitigation.sanity !== undefined) sanity = mitigation.sanity;
    if (mitigation.pants !== undefined) pants = mitigation.pants;
  }

  return {
    weather: today,
    suppliesDelta: effect.supplies,
    sanityDelta: sanity,
    pantsDelta: pants,
    encounterDelta: effect.encounterDelta,
    travelMultiplier: Math.max(0.1, effect.travelMultiplier),
    mitigated,
  };
}

export interface DailyWeatherResult {
  weather: Weather;
  changed: boolean;
  effects: WeatherEffectsToday;
  exposure: ExposureResult | null;
  error?: string;
}

/**
 * Daily weather step: roll yesterday forward, select, update streaks,
 * apply stat effects and exposure. A selection error keeps yesterday's
 * weather.
 */
export function processDailyWeather(
  state: GameState,
  cfg: WeatherConfig,
  rng: RandomSource
): DailyWeatherResult {
  const ws = state.weather;
  ws.yesterday = ws.today;

  const selection = selectWeatherForToday(ws, state.region, state.season, cfg, rng);
  if (selection.ok) {
    ws.today = selection.weather;
  }
  updateWeatherStreaks(ws, ws.today);
  if (!selection.ok) {
    // yesterday's weather repeats unchecked, so hold the streak at the cap
    ws.extremeStreak = Math.min(ws.extremeStreak, cfg.limits.maxExtremeStreak);
  }

  const effects = computeWeatherEffects(state, cfg);
  state.stats.supplies += effects.suppliesDelta;
  state.stats.sanity += effects.sanityDelta;
  state.stats.pants = Math.min(
    cfg.limits.pantsCeiling,
    Math.max(cfg.limits.pantsFloor, state.stats.pants + effects.pantsDelta)
  );
  state.weatherEffects = effects;

  const exposure = applyExposure(state, ws.today);

  return {
    weather: ws.today,
    changed: ws.today !== ws.yesterday,
    effects,
    exposure,
    error: selection.ok ? undefined : selection.error,
  };
}

/** Upper bound for the daily encounter chance. */
export function weatherEncounterCap(cfg: WeatherConfig): number {
  return cfg.limits.encounterCap > 0 ? cfg.limits.encounterCap : 1;
}
