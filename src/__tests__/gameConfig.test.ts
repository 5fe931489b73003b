import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import bossData from '../data/boss.json';
import journeyData from '../data/journey.json';
import weatherData from '../data/weather.json';
import {
  ConfigError,
  createDefaultConfig,
  loadGameConfig,
  parseBossConfig,
  parseCrossingConfig,
  parseEncounterTable,
  parseJourneyConfig,
  parseWeatherConfig,
} from '../gameConfig';

function expectConfigError(fn: () => unknown, message: string): void {
  expect(fn).toThrow(ConfigError);
  expect(fn).toThrow(message);
}

describe('createDefaultConfig', () => {
  it('validates the bundled documents', () => {
    const config = createDefaultConfig();
    expect(config.journey.travel.mpdBase).toBe(13.5);
    expect(config.crossings.milestones).toEqual([650, 1250, 1900]);
    expect(config.encounters.length).toBeGreaterThan(0);
  });

  it('hands out a fresh copy every call', () => {
    const a = createDefaultConfig();
    a.boss.rounds = 99;
    expect(createDefaultConfig().boss.rounds).toBe(3);
  });
});

describe('document validation', () => {
  it('names the document and field of a bad number', () => {
    const bad = { ...weatherData, effects: { ...weatherData.effects, storm: { ...weatherData.effects.storm, travelMultiplier: -1 } } };
    expectConfigError(() => parseWeatherConfig(bad), 'weather: effects.storm.travelMultiplier: must be >= 0, got -1');
  });

  it('rejects an unknown region in the weights', () => {
    const bad = { ...weatherData, weights: { ...weatherData.weights, atlantis: weatherData.weights.heartland } };
    expectConfigError(() => parseWeatherConfig(bad), 'weather: weights.atlantis: unknown region');
  });

  it('requires weights for every region', () => {
    const { rust_belt, beltway } = weatherData.weights;
    const bad = { ...weatherData, weights: { rust_belt, beltway } };
    expectConfigError(() => parseWeatherConfig(bad), 'weather: weights.heartland: missing');
  });

  it('rejects a region whose weights are all zero', () => {
    const zero = { clear: 0, storm: 0, heat_wave: 0, cold_snap: 0, smoke: 0 };
    const bad = { ...weatherData, weights: { ...weatherData.weights, beltway: zero } };
    expectConfigError(() => parseWeatherConfig(bad), 'weather: weights.beltway: weights must not all be zero');
  });

  it('accepts fractional weights', () => {
    const half = { clear: 0.5, storm: 0.5, heat_wave: 0, cold_snap: 0, smoke: 0 };
    const cfg = parseWeatherConfig({ ...weatherData, weights: { heartland: half, rust_belt: half, beltway: half } });
    expect(cfg.weights.heartland).toEqual(half);
  });

  it('requires every key of an enum table', () => {
    const { mixed, quiet } = journeyData.daily.supplies.diet;
    const diet = { mixed, quiet };
    const bad = {
      ...journeyData,
      daily: { ...journeyData.daily, supplies: { ...journeyData.daily.supplies, diet } },
    };
    expectConfigError(() => parseJourneyConfig(bad), 'journey: daily.supplies.diet.doom: expected a finite number');
  });

  it('checks cross-field limits', () => {
    expectConfigError(
      () => parseBossConfig({ ...bossData, minChance: 0.9, maxChance: 0.2 }),
      'boss: minChance: must not exceed maxChance'
    );
    expectConfigError(
      () =>
        parseCrossingConfig({
          types: {
            checkpoint: { detour: { days: 2, supplies: -2, pants: 1 }, bribe: { baseCostCents: 1000, onFailPants: 1 } },
            bridge_out: { detour: { days: 3, supplies: -3, pants: 2 }, bribe: { baseCostCents: 1500, onFailPants: 2 } },
          },
          milestones: [650, 600],
          kinds: ['checkpoint'],
          permitCredibility: 1,
          permitTags: ['permit'],
        }),
      'crossings: milestones[1]: milestones must be increasing'
    );
  });

  it('rejects duplicate encounter ids', () => {
    const encounter = { id: 'diner', name: 'Diner', regions: [], weight: 1, choices: [{ label: 'Eat', effects: {} }] };
    expectConfigError(() => parseEncounterTable([encounter, encounter]), 'encounters: [1].id: duplicate encounter id diner');
  });
});

describe('loadGameConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'overland-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('reads overrides and falls back per document', async () => {
    await writeFile(join(dir, 'boss.json'), JSON.stringify({ ...bossData, rounds: 5 }), 'utf8');
    await writeFile(join(dir, 'camp.json'), '{not json', 'utf8');

    const config = await loadGameConfig(dir);
    const defaults = createDefaultConfig();
    expect(config.boss.rounds).toBe(5);
    expect(config.camp).toEqual(defaults.camp);
    expect(config.journey).toEqual(defaults.journey);
  });

  it('falls back when an override fails validation', async () => {
    await writeFile(join(dir, 'boss.json'), JSON.stringify({ ...bossData, rounds: -1 }), 'utf8');
    const config = await loadGameConfig(dir);
    expect(config.boss.rounds).toBe(3);
    expect(console.warn).toHaveBeenCalled();
  });
});
