import { describe, it, expect } from 'vitest';
import type { WeatherConfig } from '../models/config';
import {
  applyExposure,
  computeWeatherEffects,
  createWeatherState,
  processDailyWeather,
  selectWeatherForToday,
  updateWeatherStreaks,
  weatherEncounterCap,
} from '../weatherSystem';
import { ScriptedRandom, createTestConfig, createTestGameState } from './testHelpers';

// Heartland weights: clear 60, storm 15, heat_wave 10, cold_snap 10, smoke 5.
function weatherConfig(): WeatherConfig {
  return createTestConfig().weather;
}

describe('selectWeatherForToday', () => {
  it('draws from the region weights in declaration order', () => {
    const ws = createWeatherState();
    const cfg = weatherConfig();
    // 0.5 -> 50 (clear); 0.99 misses the spring override
    expect(selectWeatherForToday(ws, 'heartland', 'spring', cfg, new ScriptedRandom([0.5, 0.99]))).toEqual({
      ok: true,
      weather: 'clear',
    });
    // 0.7 -> 70, past clear's 60 into storm
    expect(selectWeatherForToday(ws, 'heartland', 'spring', cfg, new ScriptedRandom([0.7, 0.99]))).toEqual({
      ok: true,
      weather: 'storm',
    });
  });

  it('redraws from calm weather once the extreme streak is at the cap', () => {
    const ws = { ...createWeatherState(), extremeStreak: 2 };
    // storm, then 0.9 * 70 = 63 over clear+cold_snap lands on cold_snap
    const rng = new ScriptedRandom([0.7, 0.9, 0.99]);
    expect(selectWeatherForToday(ws, 'heartland', 'spring', weatherConfig(), rng)).toEqual({
      ok: true,
      weather: 'cold_snap',
    });
  });

  it('applies the seasonal override', () => {
    const rng = new ScriptedRandom([0, 0.05]);
    expect(selectWeatherForToday(createWeatherState(), 'heartland', 'spring', weatherConfig(), rng)).toEqual({
      ok: true,
      weather: 'smoke',
    });
  });

  it('starts a neutral buffer after a long heat wave', () => {
    const ws = { ...createWeatherState(), heatwaveStreak: 4 };
    // heat_wave drawn, neutral pick clear, buffer length 3
    const rng = new ScriptedRandom([0.8, 0.99, 0, 0.99]);
    expect(selectWeatherForToday(ws, 'heartland', 'spring', weatherConfig(), rng)).toEqual({
      ok: true,
      weather: 'clear',
    });
    expect(ws.neutralBuffer).toBe(2);
  });

  it('spends the neutral buffer on clear or smoke days', () => {
    const ws = { ...createWeatherState(), neutralBuffer: 1 };
    // storm drawn, then 0.95 * 65 = 61 picks smoke from the neutral pair
    const rng = new ScriptedRandom([0.7, 0.99, 0.95]);
    expect(selectWeatherForToday(ws, 'heartland', 'spring', weatherConfig(), rng)).toEqual({
      ok: true,
      weather: 'smoke',
    });
    expect(ws.neutralBuffer).toBe(0);
  });

  it('draws from fractional weights', () => {
    const cfg = weatherConfig();
    cfg.weights.heartland = { clear: 0.5, storm: 0.5, heat_wave: 0, cold_snap: 0, smoke: 0 };
    // 0.2 of a total of 1 lands in clear, 0.7 in storm
    expect(selectWeatherForToday(createWeatherState(), 'heartland', 'spring', cfg, new ScriptedRandom([0.2, 0.99]))).toEqual({
      ok: true,
      weather: 'clear',
    });
    expect(selectWeatherForToday(createWeatherState(), 'heartland', 'spring', cfg, new ScriptedRandom([0.7, 0.99]))).toEqual({
      ok: true,
      weather: 'storm',
    });
  });

  it('reports weights that sum to zero', () => {
    const cfg = weatherConfig();
    cfg.weights.heartland = { clear: 0, storm: 0, heat_wave: 0, cold_snap: 0, smoke: 0 };
    const result = selectWeatherForToday(createWeatherState(), 'heartland', 'spring', cfg, new ScriptedRandom([0.5]));
    expect(result.ok).toBe(false);
  });

  it('reports a region without weights', () => {
    const cfg = weatherConfig();
    delete cfg.weights.beltway;
    const result = selectWeatherForToday(createWeatherState(), 'beltway', 'spring', cfg, new ScriptedRandom([0.5]));
    expect(result).toEqual({ ok: false, error: 'Weather weights must exist for region beltway' });
  });
});

describe('updateWeatherStreaks', () => {
  it('extends the extreme streak across different extreme types', () => {
    const ws = { ...createWeatherState(), yesterday: 'storm' as const, extremeStreak: 1 };
    updateWeatherStreaks(ws, 'smoke');
    expect(ws.extremeStreak).toBe(2);
  });

  it('resets streaks on calm days', () => {
    const ws = { ...createWeatherState(), extremeStreak: 2, heatwaveStreak: 3 };
    updateWeatherStreaks(ws, 'clear');
    expect(ws.extremeStreak).toBe(0);
    expect(ws.heatwaveStreak).toBe(0);
  });
});

describe('applyExposure', () => {
  it('costs sanity on every unprotected heat day and hp from the third', () => {
    const state = createTestGameState();
    state.health.exposureHeatStreak = 2;

    expect(applyExposure(state, 'heat_wave')).toEqual({ kind: 'heat', hpDamage: 1, sanityLoss: 1 });
    expect(state.stats.hp).toBe(9);
    expect(state.stats.sanity).toBe(9);
    expect(state.health.lastDamage).toBe('exposure_heat');
    expect(state.health.exposureLockout).toBe(true);
  });

  it('skips one damage day after exposure damage', () => {
    const state = createTestGameState();
    state.health.exposureHeatStreak = 2;
    applyExposure(state, 'heat_wave');

    expect(applyExposure(state, 'heat_wave')).toEqual({ kind: 'heat', hpDamage: 0, sanityLoss: 1 });
    expect(state.health.exposureLockout).toBe(false);

    expect(applyExposure(state, 'heat_wave')?.hpDamage).toBe(1);
    expect(state.stats.hp).toBe(8);
  });

  it('does nothing with the right gear', () => {
    const state = createTestGameState({}, { tags: ['warm_coat'] });
    state.health.exposureColdStreak = 5;
    expect(applyExposure(state, 'cold_snap')).toBeNull();
    expect(state.health.exposureColdStreak).toBe(0);
  });

  it('ends the run when exposure takes the last hp', () => {
    const state = createTestGameState();
    state.stats.hp = 1;
    state.health.exposureColdStreak = 2;
    applyExposure(state, 'cold_snap');
    expect(state.ending).toEqual({ type: 'exposure', kind: 'cold' });
  });
});

describe('computeWeatherEffects', () => {
  it('uses the configured effect for the weather', () => {
    const state = createTestGameState();
    state.weather.today = 'storm';
    expect(computeWeatherEffects(state, weatherConfig())).toEqual({
      weather: 'storm',
      suppliesDelta: -1,
      sanityDelta: -1,
      pantsDelta: 2,
      encounterDelta: 0.05,
      travelMultiplier: 0.85,
      mitigated: false,
    });
  });

  it('replaces the sanity and pants hit when the party has the gear', () => {
    const state = createTestGameState({}, { tags: ['masks'] });
    state.weather.today = 'smoke';
    const effects = computeWeatherEffects(state, weatherConfig());
    expect(effects.sanityDelta).toBe(0);
    expect(effects.pantsDelta).toBe(0);
    expect(effects.mitigated).toBe(true);
  });
});

describe('processDailyWeather', () => {
  it('selects the weather and applies its effects', () => {
    const state = createTestGameState();
    const result = processDailyWeather(state, weatherConfig(), new ScriptedRandom([0.7, 0.99]));

    expect(result.weather).toBe('storm');
    expect(result.changed).toBe(true);
    expect(result.exposure).toBeNull();
    expect(result.error).toBeUndefined();
    expect(state.weather.yesterday).toBe('clear');
    expect(state.stats.supplies).toBe(9);
    expect(state.stats.sanity).toBe(9);
    expect(state.stats.pants).toBe(2);
    expect(state.weatherEffects.travelMultiplier).toBe(0.85);
  });

  it('keeps yesterday on a selection error', () => {
    const state = createTestGameState();
    state.weather.today = 'smoke';
    const cfg = weatherConfig();
    delete cfg.weights.heartland;
    const result = processDailyWeather(state, cfg, new ScriptedRandom([0.5]));
    expect(result.weather).toBe('smoke');
    expect(result.changed).toBe(false);
    expect(result.error).toBe('Weather weights must exist for region heartland');
  });

  it('holds the extreme streak at the cap while selection keeps failing', () => {
    const state = createTestGameState();
    state.weather.today = 'storm';
    state.weather.extremeStreak = 2;
    const cfg = weatherConfig();
    delete cfg.weights.heartland;
    for (let i = 0; i < 3; i++) {
      processDailyWeather(state, cfg, new ScriptedRandom([0.5]));
    }
    expect(state.weather.today).toBe('storm');
    expect(state.weather.extremeStreak).toBe(cfg.limits.maxExtremeStreak);
  });
});

describe('weatherEncounterCap', () => {
  it('reads the configured cap', () => {
    expect(weatherEncounterCap(weatherConfig())).toBe(0.35);
  });
});
