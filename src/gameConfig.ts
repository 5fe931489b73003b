import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  CrossingKind,
  DietId,
  EndgamePolicyKey,
  GameMode,
  PaceId,
  Part,
  PolicyKind,
  Region,
  Weather,
} from './models';
import type {
  BossConfig,
  CampConfig,
  CrossingConfig,
  CrossingTypeConfig,
  DailyChannel,
  EncounterDefinition,
  EncounterEffects,
  EndgameConfig,
  EndgamePolicyConfig,
  GameConfig,
  JourneyConfig,
  PacingConfig,
  ResourcePriority,
  ResultConfig,
  ScoreRounding,
  WeatherConfig,
  WeatherMitigation,
} from './models/config';
import bossData from './data/boss.json';
import campData from './data/camp.json';
import crossingsData from './data/crossings.json';
import encountersData from './data/encounters.json';
import endgameData from './data/endgame.json';
import journeyData from './data/journey.json';
import pacingData from './data/pacing.json';
import resultData from './data/result.json';
import weatherData from './data/weather.json';
import { JsonReader, NON_NEGATIVE, isOneOf } from './jsonReader';

/**
 * Game Configuration
 *
 * Tuning lives in JSON documents, one per subsystem. Every document is
 * validated into its typed form: enum-keyed tables must list every key,
 * numbers must be finite and inside their range. A document that fails
 * validation raises a ConfigError naming the document and field.
 *
 * `loadGameConfig(dir)` reads overrides from a directory and falls back,
 * document by document, to the defaults bundled in src/data.
 */

export type ConfigDocument = keyof GameConfig;

export const CONFIG_DOCUMENTS: readonly ConfigDocument[] = [
  'weather',
  'crossings',
  'boss',
  'camp',
  'pacing',
  'endgame',
  'journey',
  'result',
  'encounters',
];

export class ConfigError extends Error {
  constructor(
    readonly document: ConfigDocument,
    readonly field: string,
    message: string
  ) {
    super(`${document}: ${field === '' ? '' : `${field}: `}${message}`);
    this.name = 'ConfigError';
  }
}

// ── Enum tables ──────────────────────────────────────────────────

export const GAME_MODES: readonly GameMode[] = ['classic', 'deep'];
export const POLICIES: readonly PolicyKind[] = [
  'balanced',
  'conservative',
  'aggressive',
  'resource_manager',
  'monte_carlo',
];
export const PACES: readonly PaceId[] = ['steady', 'heated', 'blitz'];
export const DIETS: readonly DietId[] = ['mixed', 'quiet', 'doom'];
export const ENDGAME_POLICY_KEYS: readonly EndgamePolicyKey[] = [
  'deep_balanced',
  'deep_aggressive',
  'deep_conservative',
  'deep_resource_manager',
];
export const WEATHERS: readonly Weather[] = ['clear', 'storm', 'heat_wave', 'cold_snap', 'smoke'];
export const REGIONS: readonly Region[] = ['heartland', 'rust_belt', 'beltway'];
export const RESOURCE_PRIORITIES: readonly ResourcePriority[] = [
  'matching_spare',
  'any_spare',
  'emergency',
];
const CROSSING_KINDS: readonly CrossingKind[] = ['checkpoint', 'bridge_out'];
const ROUNDINGS: readonly ScoreRounding[] = ['nearest', 'down', 'up'];

export function mapWeather<T>(f: (weather: Weather) => T): Record<Weather, T> {
  return {
    clear: f('clear'),
    storm: f('storm'),
    heat_wave: f('heat_wave'),
    cold_snap: f('cold_snap'),
    smoke: f('smoke'),
  };
}

export function mapPace<T>(f: (pace: PaceId) => T): Record<PaceId, T> {
  return { steady: f('steady'), heated: f('heated'), blitz: f('blitz') };
}

export function mapDiet<T>(f: (diet: DietId) => T): Record<DietId, T> {
  return { mixed: f('mixed'), quiet: f('quiet'), doom: f('doom') };
}

export function mapPart<T>(f: (part: Part) => T): Record<Part, T> {
  return {
    tire: f('tire'),
    battery: f('battery'),
    alternator: f('alternator'),
    fuel_pump: f('fuel_pump'),
  };
}

export function mapMode<T>(f: (mode: GameMode) => T): Record<GameMode, T> {
  return { classic: f('classic'), deep: f('deep') };
}

function mapCrossingKind<T>(f: (kind: CrossingKind) => T): Record<CrossingKind, T> {
  return { checkpoint: f('checkpoint'), bridge_out: f('bridge_out') };
}

function mapEndgameKey<T>(f: (key: EndgamePolicyKey) => T): Record<EndgamePolicyKey, T> {
  return {
    deep_balanced: f('deep_balanced'),
    deep_aggressive: f('deep_aggressive'),
    deep_conservative: f('deep_conservative'),
    deep_resource_manager: f('deep_resource_manager'),
  };
}

// ── Reader ───────────────────────────────────────────────────────

function reader(document: ConfigDocument, value: unknown, path: string = ''): JsonReader {
  return JsonReader.of(value, path, (field, message) => new ConfigError(document, field, message));
}

// ── Document parsers ─────────────────────────────────────────────

export function parseWeatherConfig(value: unknown): WeatherConfig {
  const r = reader('weather', value);
  const limits = r.child('limits');
  const effects = r.child('effects');
  const mitigation = r.child('mitigation');
  const weights = r.child('weights');

  const mitigationTable: Partial<Record<Weather, WeatherMitigation>> = {};
  for (const key of mitigation.keys()) {
    if (!isOneOf(WEATHERS, key)) mitigation.fail(key, 'unknown weather');
  }
  for (const weather of WEATHERS) {
    if (!mitigation.has(weather)) continue;
    const m = mitigation.child(weather);
    mitigationTable[weather] = {
      tag: m.string('tag'),
      sanity: m.optionalNumber('sanity'),
      pants: m.optionalNumber('pants'),
    };
  }

  const weightTable: Partial<Record<Region, Record<Weather, number>>> = {};
  for (const key of weights.keys()) {
    if (!isOneOf(REGIONS, key)) weights.fail(key, 'unknown region');
  }
  for (const region of REGIONS) {
    const w = weights.child(region);
    const table = mapWeather((weather) => w.number(weather, NON_NEGATIVE));
    if (WEATHERS.every((weather) => table[weather] === 0)) {
      weights.fail(region, 'weights must not all be zero');
    }
    weightTable[region] = table;
  }

  const cfg: WeatherConfig = {
    limits: {
      maxExtremeStreak: limits.number('maxExtremeStreak', NON_NEGATIVE),
      encounterCap: limits.probability('encounterCap'),
      pantsFloor: limits.number('pantsFloor', { min: 0, max: 100 }),
      pantsCeiling: limits.number('pantsCeiling', { min: 0, max: 100 }),
    },
    effects: mapWeather((weather) => {
      const e = effects.child(weather);
      return {
        supplies: e.number('supplies'),
        sanity: e.number('sanity'),
        pants: e.number('pants'),
        encounterDelta: e.number('encounterDelta'),
        travelMultiplier: e.number('travelMultiplier', NON_NEGATIVE),
      };
    }),
    mitigation: mitigationTable,
    weights: weightTable,
  };
  if (cfg.limits.pantsFloor > cfg.limits.pantsCeiling) {
    limits.fail('pantsFloor', 'must not exceed pantsCeiling');
  }
  return cfg;
}

export function parseCrossingConfig(value: unknown): CrossingConfig {
  const r = reader('crossings', value);
  const types = r.child('types');
  const cfg: CrossingConfig = {
    types: mapCrossingKind((kind): CrossingTypeConfig => {
      const t = types.child(kind);
      const detour = t.child('detour');
      const bribe = t.child('bribe');
      return {
        detour: {
          days: detour.number('days', { min: 1 }),
          supplies: detour.number('supplies'),
          pants: detour.number('pants'),
        },
        bribe: {
          baseCostCents: bribe.number('baseCostCents', NON_NEGATIVE),
          onFailPants: bribe.number('onFailPants'),
        },
      };
    }),
    milestones: r.numberList('milestones', NON_NEGATIVE),
    kinds: r.enumList('kinds', CROSSING_KINDS),
    permitCredibility: r.number('permitCredibility'),
    permitTags: r.stringList('permitTags'),
  };
  for (let i = 1; i < cfg.milestones.length; i++) {
    if (cfg.milestones[i] <= cfg.milestones[i - 1]) {
      r.fail(`milestones[${i}]`, 'milestones must be increasing');
    }
  }
  return cfg;
}

export function parseBossConfig(value: unknown): BossConfig {
  const r = reader('boss', value);
  const cfg: BossConfig = {
    distanceRequired: r.number('distanceRequired', { min: 1 }),
    rounds: r.number('rounds', NON_NEGATIVE),
    sanityLossPerRound: r.number('sanityLossPerRound'),
    pantsGainPerRound: r.number('pantsGainPerRound'),
    baseVictoryChance: r.probability('baseVictoryChance'),
    scoreWeight: r.number('scoreWeight'),
    credibilityWeight: r.number('credibilityWeight'),
    sanityWeight: r.number('sanityWeight'),
    suppliesWeight: r.number('suppliesWeight'),
    alliesWeight: r.number('alliesWeight'),
    pantsPenaltyWeight: r.number('pantsPenaltyWeight'),
    minChance: r.probability('minChance'),
    maxChance: r.probability('maxChance'),
  };
  if (cfg.minChance > cfg.maxChance) r.fail('minChance', 'must not exceed maxChance');
  return cfg;
}

export function parseCampConfig(value: unknown): CampConfig {
  const r = reader('camp', value);
  const rest = r.child('rest');
  const therapy = r.child('therapy');
  const forage = r.child('forage');
  const weights = forage.child('weights');
  const repair = r.child('repair');
  return {
    rest: {
      sanity: rest.number('sanity'),
      hp: rest.number('hp'),
      supplies: rest.number('supplies'),
      cooldownDays: rest.number('cooldownDays', NON_NEGATIVE),
    },
    therapy: {
      sanity: therapy.number('sanity'),
      receiptCost: therapy.number('receiptCost', NON_NEGATIVE),
      cooldownDays: therapy.number('cooldownDays', NON_NEGATIVE),
    },
    forage: {
      suppliesGain: forage.number('suppliesGain', NON_NEGATIVE),
      weights: {
        supplies: weights.number('supplies', NON_NEGATIVE),
        none: weights.number('none', NON_NEGATIVE),
        receipt: weights.number('receipt', NON_NEGATIVE),
      },
      receiptBonusCapPct: forage.number('receiptBonusCapPct', { min: 0, max: 100 }),
    },
    repair: {
      spareSupplies: repair.number('spareSupplies', NON_NEGATIVE),
      spareHeal: repair.number('spareHeal', NON_NEGATIVE),
      hackSupplies: repair.number('hackSupplies', NON_NEGATIVE),
      hackCredibility: repair.number('hackCredibility', NON_NEGATIVE),
      hackCooldownDays: repair.number('hackCooldownDays', NON_NEGATIVE),
    },
  };
}

export function parsePacingConfig(value: unknown): PacingConfig {
  const r = reader('pacing', value);
  const pace = r.child('pace');
  const diet = r.child('diet');
  return {
    pace: mapPace((id) => {
      const p = pace.child(id);
      return {
        sanity: p.number('sanity'),
        pants: p.number('pants'),
        distanceMult: p.number('distanceMult', NON_NEGATIVE),
        encounterChanceDelta: p.number('encounterChanceDelta', { min: -1, max: 1 }),
      };
    }),
    diet: mapDiet((id) => {
      const d = diet.child(id);
      return {
        sanity: d.number('sanity'),
        pants: d.number('pants'),
        receiptFindPctDelta: d.number('receiptFindPctDelta', { min: -100, max: 100 }),
      };
    }),
  };
}

export function parseEndgameConfig(value: unknown): EndgameConfig {
  const r = reader('endgame', value);
  const policies = r.child('policies');
  return {
    enabled: r.boolean('enabled'),
    policies: mapEndgameKey((key): EndgamePolicyConfig => {
      const p = policies.child(key);
      return {
        miStart: p.number('miStart', NON_NEGATIVE),
        failureGuardMiles: p.number('failureGuardMiles', NON_NEGATIVE),
        healthFloor: p.number('healthFloor', { min: 0, max: 100 }),
        wearReset: p.number('wearReset', { min: 0, max: 100 }),
        cooldownDays: p.number('cooldownDays', NON_NEGATIVE),
        partialRatio: p.probability('partialRatio'),
        wearMultiplier: p.number('wearMultiplier', NON_NEGATIVE),
        resourcePriority: p.enumList('resourcePriority', RESOURCE_PRIORITIES),
        travelBias: p.number('travelBias', NON_NEGATIVE),
        breakdownScale: p.number('breakdownScale', NON_NEGATIVE),
      };
    }),
  };
}

function parseDailyChannel(r: JsonReader): DailyChannel {
  const pace = r.child('pace');
  const diet = r.child('diet');
  const weather = r.child('weather');
  return {
    base: r.number('base', NON_NEGATIVE),
    pace: mapPace((id) => pace.number(id, NON_NEGATIVE)),
    diet: mapDiet((id) => diet.number(id, NON_NEGATIVE)),
    weather: mapWeather((id) => weather.number(id, NON_NEGATIVE)),
  };
}

export function parseJourneyConfig(value: unknown): JourneyConfig {
  const r = reader('journey', value);
  const travel = r.child('travel');
  const travelPace = travel.child('paceFactor');
  const travelWeather = travel.child('weatherFactor');
  const wear = r.child('wear');
  const breakdownWear = wear.child('breakdownWear');
  const breakdown = r.child('breakdown');
  const bdPace = breakdown.child('paceFactor');
  const bdWeather = breakdown.child('weatherFactor');
  const parts = breakdown.child('partWeights');
  const days = r.child('days');
  const stopCaps = days.child('stopCap');
  const encounters = r.child('encounters');
  const daily = r.child('daily');
  const health = daily.child('health');
  const healthWeather = health.child('weather');

  const stopCap: JourneyConfig['days']['stopCap'] = {};
  for (const key of stopCaps.keys()) {
    let known = false;
    for (const mode of GAME_MODES) {
      for (const policy of POLICIES) {
        const combo: `${GameMode}_${PolicyKind}` = `${mode}_${policy}`;
        if (combo === key) {
          stopCap[combo] = stopCaps.number(key, NON_NEGATIVE);
          known = true;
        }
      }
    }
    if (!known) stopCaps.fail(key, 'unknown mode_policy key');
  }

  const cfg: JourneyConfig = {
    travel: {
      trailDistance: travel.number('trailDistance', { min: 1 }),
      mpdBase: travel.number('mpdBase', { min: 0 }),
      mpdMin: travel.number('mpdMin', NON_NEGATIVE),
      mpdMax: travel.number('mpdMax', NON_NEGATIVE),
      penaltyFloor: travel.number('penaltyFloor', NON_NEGATIVE),
      partialRatio: travel.probability('partialRatio'),
      paceFactor: mapPace((id) => travelPace.number(id, NON_NEGATIVE)),
      weatherFactor: mapWeather((id) => travelWeather.number(id, NON_NEGATIVE)),
      restCreditMiles: travel.number('restCreditMiles', NON_NEGATIVE),
      delayCreditMiles: travel.number('delayCreditMiles', NON_NEGATIVE),
      criticalMultiplier: travel.number('criticalMultiplier', NON_NEGATIVE),
      illnessMultiplier: travel.number('illnessMultiplier', NON_NEGATIVE),
      malnutritionPenalty: travel.number('malnutritionPenalty', NON_NEGATIVE),
      malnutritionFloor: travel.probability('malnutritionFloor'),
    },
    wear: {
      base: wear.number('base', NON_NEGATIVE),
      fatigueK: wear.number('fatigueK', NON_NEGATIVE),
      comfortMiles: wear.number('comfortMiles', { min: 1 }),
      malnutritionK: wear.number('malnutritionK', NON_NEGATIVE),
      breakdownWear: mapMode((mode) => breakdownWear.number(mode, NON_NEGATIVE)),
      breakdownHealthCost: wear.number('breakdownHealthCost', NON_NEGATIVE),
      criticalHealth: wear.number('criticalHealth', { min: 0, max: 100 }),
    },
    breakdown: {
      base: breakdown.probability('base'),
      beta: breakdown.number('beta', NON_NEGATIVE),
      paceFactor: mapPace((id) => bdPace.number(id, NON_NEGATIVE)),
      weatherFactor: mapWeather((id) => bdWeather.number(id, NON_NEGATIVE)),
      extremeBonus: breakdown.probability('extremeBonus'),
      criticalBonus: breakdown.probability('criticalBonus'),
      partWeights: mapPart((part) => parts.number(part, NON_NEGATIVE)),
      spareHeal: breakdown.number('spareHeal', NON_NEGATIVE),
      emergencyCostCents: breakdown.number('emergencyCostCents', NON_NEGATIVE),
      emergencyHeal: breakdown.number('emergencyHeal', NON_NEGATIVE),
      juryRigDamage: breakdown.number('juryRigDamage', NON_NEGATIVE),
      juryRigDelayDays: breakdown.number('juryRigDelayDays', NON_NEGATIVE),
      cooldownDays: breakdown.number('cooldownDays', NON_NEGATIVE),
    },
    days: {
      historyWindow: days.number('historyWindow', { min: 1 }),
      partialMinMiles: days.number('partialMinMiles', NON_NEGATIVE),
      defaultStopCap: days.number('defaultStopCap', NON_NEGATIVE),
      stopCap,
    },
    encounters: {
      baseChance: encounters.probability('baseChance'),
      recentWindowDays: encounters.number('recentWindowDays', NON_NEGATIVE),
      rerollChance: encounters.probability('rerollChance'),
    },
    daily: {
      supplies: parseDailyChannel(daily.child('supplies')),
      sanity: parseDailyChannel(daily.child('sanity')),
      health: {
        decay: health.number('decay', NON_NEGATIVE),
        weather: mapWeather((id) => healthWeather.number(id, NON_NEGATIVE)),
        restHeal: health.number('restHeal', NON_NEGATIVE),
      },
    },
  };
  if (cfg.travel.mpdMin > cfg.travel.mpdMax) travel.fail('mpdMin', 'must not exceed mpdMax');
  return cfg;
}

export function parseResultConfig(value: unknown): ResultConfig {
  const r = reader('result', value);
  const thresholds = r.child('thresholds');
  const w = r.child('weights');
  return {
    thresholds: mapMode((mode) => thresholds.number(mode, NON_NEGATIVE)),
    scoreMult: r.number('scoreMult', NON_NEGATIVE),
    deepBonus: r.number('deepBonus'),
    rounding: r.oneOf('rounding', ROUNDINGS),
    pantsPenaltyStart: r.number('pantsPenaltyStart', { min: 0, max: 100 }),
    pantsPenaltyPerPoint: r.number('pantsPenaltyPerPoint', NON_NEGATIVE),
    weights: {
      supplies: w.number('supplies'),
      hp: w.number('hp'),
      morale: w.number('morale'),
      credibility: w.number('credibility'),
      allies: w.number('allies'),
      day: w.number('day'),
      encounters: w.number('encounters'),
      receipts: w.number('receipts'),
      breakdownPenalty: w.number('breakdownPenalty', NON_NEGATIVE),
      breakdownPenaltyCap: w.number('breakdownPenaltyCap', NON_NEGATIVE),
    },
  };
}

function parseEncounterEffects(r: JsonReader): EncounterEffects {
  const effects: EncounterEffects = {
    hp: r.optionalNumber('hp'),
    sanity: r.optionalNumber('sanity'),
    credibility: r.optionalNumber('credibility'),
    supplies: r.optionalNumber('supplies'),
    morale: r.optionalNumber('morale'),
    allies: r.optionalNumber('allies'),
    pants: r.optionalNumber('pants'),
    receiptsGained: r.optionalNumber('receiptsGained', NON_NEGATIVE),
    receiptsUsed: r.optionalNumber('receiptsUsed', NON_NEGATIVE),
    travelBonusRatio: r.optionalNumber('travelBonusRatio', { min: 0, max: 1 }),
  };
  if (r.has('rest')) effects.rest = r.boolean('rest');
  return effects;
}

export function parseEncounterTable(value: unknown): EncounterDefinition[] {
  if (!Array.isArray(value)) {
    throw new ConfigError('encounters', '', 'expected an array of encounters');
  }
  const seen = new Set<string>();
  return value.map((item, i): EncounterDefinition => {
    const r = reader('encounters', item, `[${i}]`);
    const id = r.string('id');
    if (seen.has(id)) r.fail('id', `duplicate encounter id ${id}`);
    seen.add(id);
    const choices = r.list('choices');
    if (choices.length === 0) r.fail('choices', 'needs at least one choice');
    return {
      id,
      name: r.string('name'),
      regions: r.enumList('regions', REGIONS),
      weight: r.number('weight', NON_NEGATIVE),
      choices: choices.map((choice, c) => {
        const cr = reader('encounters', choice, r.fieldPath(`choices[${c}]`));
        return { label: cr.string('label'), effects: parseEncounterEffects(cr.child('effects')) };
      }),
    };
  });
}

// ── Defaults and loading ─────────────────────────────────────────

type Parsers = { [K in ConfigDocument]: (value: unknown) => GameConfig[K] };

const PARSERS: Parsers = {
  weather: parseWeatherConfig,
  crossings: parseCrossingConfig,
  boss: parseBossConfig,
  camp: parseCampConfig,
  pacing: parsePacingConfig,
  endgame: parseEndgameConfig,
  journey: parseJourneyConfig,
  result: parseResultConfig,
  encounters: parseEncounterTable,
};

/** Bundled defaults, validated on every call so callers never share a mutable copy. */
export function createDefaultConfig(): GameConfig {
  return {
    weather: parseWeatherConfig(weatherData),
    crossings: parseCrossingConfig(crossingsData),
    boss: parseBossConfig(bossData),
    camp: parseCampConfig(campData),
    pacing: parsePacingConfig(pacingData),
    endgame: parseEndgameConfig(endgameData),
    journey: parseJourneyConfig(journeyData),
    result: parseResultConfig(resultData),
    encounters: parseEncounterTable(encountersData),
  };
}

async function loadDocument<K extends ConfigDocument>(
  dir: string,
  name: K,
  fallback: GameConfig[K]
): Promise<GameConfig[K]> {
  const file = join(dir, `${name}.json`);
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (e) {
    console.warn(`Config ${file} could not be read, using defaults:`, e);
    return fallback;
  }
  try {
    const raw: unknown = JSON.parse(text);
    return PARSERS[name](raw);
  } catch (e) {
    console.warn(`Config ${file} is invalid, using defaults:`, e);
    return fallback;
  }
}

/**
 * Read `<dir>/<document>.json` for every config document. A missing,
 * unreadable or invalid document is replaced by its bundled default.
 */
export async function loadGameConfig(dir: string): Promise<GameConfig> {
  const defaults = createDefaultConfig();
  return {
    weather: await loadDocument(dir, 'weather', defaults.weather),
    crossings: await loadDocument(dir, 'crossings', defaults.crossings),
    boss: await loadDocument(dir, 'boss', defaults.boss),
    camp: await loadDocument(dir, 'camp', defaults.camp),
    pacing: await loadDocument(dir, 'pacing', defaults.pacing),
    endgame: await loadDocument(dir, 'endgame', defaults.endgame),
    journey: await loadDocument(dir, 'journey', defaults.journey),
    result: await loadDocument(dir, 'result', defaults.result),
    encounters: await loadDocument(dir, 'encounters', defaults.encounters),
  };
}
