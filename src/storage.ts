import { readFile, rm, writeFile } from 'node:fs/promises';
import type {
  BossOutcome,
  CollapseCause,
  DamageCause,
  Ending,
  ExposureKind,
  GameState,
  LogEntry,
  LogEntryMeta,
  LogEntryType,
  RngCounters,
  TravelDayKind,
} from './models';
import {
  DIETS,
  ENDGAME_POLICY_KEYS,
  GAME_MODES,
  PACES,
  POLICIES,
  REGIONS,
  WEATHERS,
  mapPart,
} from './gameConfig';
import { JsonReader, NON_NEGATIVE, isRecord } from './jsonReader';
import { RNG_STREAMS, createRngCounters } from './rng';
import { SEASON_ORDER } from './timeSystem';
import { PART_ORDER } from './vehicleSystem';
import { TRAVEL_ORDER_IDS, createTravelOrderState } from './travelOrders';
import { createHealthState } from './healthSystem';
import { createEncounterState } from './encounterSystem';

/**
 * Current save format version. Bump this whenever a change to the persisted
 * GameState shape requires a migration (not needed for purely additive
 * optional fields that can be backfilled with safe defaults).
 */
export const CURRENT_SAVE_VERSION = 2;

export class SaveFormatError extends Error {
  constructor(
    readonly field: string,
    message: string
  ) {
    super(`${field === '' ? 'save' : field}: ${message}`);
    this.name = 'SaveFormatError';
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

/**
 * Encode the whole run as JSON text. The u64 seed does not fit a JSON
 * number and is written as a decimal string.
 */
export function serializeGame(state: GameState): string {
  return JSON.stringify({ ...state, saveVersion: CURRENT_SAVE_VERSION, seed: state.seed.toString() });
}

// ---------------------------------------------------------------------------
// Migration pipeline
// ---------------------------------------------------------------------------

/**
 * Each migration transforms the raw save object from version N to N+1.
 * Migrations are keyed by their *source* version. The functions reshape a
 * loosely-typed record; type safety is restored by validation afterwards.
 */
type RawSave = Record<string, unknown>;
type MigrationFn = (data: RawSave) => RawSave;

function rawChild(data: RawSave, key: string): RawSave | null {
  const value = data[key];
  return isRecord(value) ? value : null;
}

const migrations: Record<number, MigrationFn> = {
  /**
   * v0 → v1: Starvation, illness and travel orders.
   * v0 saves predate the saveVersion field and carry neither block.
   */
  0: (data: RawSave): RawSave => {
    if (!isRecord(data.health)) {
      data.health = createHealthState();
    }
    if (!isRecord(data.travelOrder)) {
      data.travelOrder = createTravelOrderState();
    }
    data.saveVersion = 1;
    return data;
  },

  /**
   * v1 → v2: Encounter history and the journal.
   * - encounters.recent added for the repeat reroll
   * - log added (empty for old runs)
   * - camp/repair day counters split out of the travel counters
   * - crossings.bribeDiscountPct (no discount for old runs)
   */
  1: (data: RawSave): RawSave => {
    const encounters = rawChild(data, 'encounters');
    if (encounters === null) {
      data.encounters = createEncounterState();
    } else if (!Array.isArray(encounters.recent)) {
      encounters.recent = [];
    }
    if (!Array.isArray(data.log)) {
      data.log = [];
    }
    const counters = rawChild(data, 'counters');
    if (counters !== null) {
      if (counters.campDays === undefined) counters.campDays = 0;
      if (counters.repairDays === undefined) counters.repairDays = 0;
    }
    const crossings = rawChild(data, 'crossings');
    if (crossings !== null && crossings.bribeDiscountPct === undefined) {
      crossings.bribeDiscountPct = 0;
    }
    data.saveVersion = 2;
    return data;
  },
};

/**
 * Detect the version of a raw save object. Saves written before versioning
 * have no `saveVersion`; they are migratable (v0) when they carry the core
 * run fields.
 *
 * Returns the version number, or -1 if the save is unrecoverable.
 */
export function detectVersion(raw: RawSave): number {
  if (typeof raw.saveVersion === 'number') {
    return raw.saveVersion;
  }
  const hasCore =
    typeof raw.seed === 'string' &&
    typeof raw.day === 'number' &&
    isRecord(raw.stats) &&
    Array.isArray(raw.dayRecords);
  return hasCore ? 0 : -1;
}

/**
 * Run the migration pipeline up to CURRENT_SAVE_VERSION.
 * Returns null if the save cannot be migrated.
 */
export function runMigrations(raw: RawSave): RawSave | null {
  let version = detectVersion(raw);
  if (version === -1) {
    return null;
  }
  if (version > CURRENT_SAVE_VERSION) {
    console.error(`Save version ${version} is newer than supported version ${CURRENT_SAVE_VERSION}`);
    return null;
  }

  while (version < CURRENT_SAVE_VERSION) {
    const migrate = migrations[version];
    if (!migrate) {
      console.error(`No migration defined for save version ${version} → ${version + 1}`);
      return null;
    }
    console.log(`Migrating save v${version} → v${version + 1}`);
    raw = migrate(raw);
    version = detectVersion(raw);
  }
  return raw;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const TRAVEL_DAY_KINDS: readonly TravelDayKind[] = ['travel', 'partial', 'non_travel'];
const EXPOSURE_KINDS: readonly ExposureKind[] = ['cold', 'heat'];
const DAMAGE_CAUSES: readonly DamageCause[] = [
  'starvation',
  'exposure_cold',
  'exposure_heat',
  'disease',
  'vehicle',
  'breakdown',
  'unknown',
];
const COLLAPSE_CAUSES: readonly CollapseCause[] = [
  'hunger',
  'vehicle',
  'weather',
  'breakdown',
  'disease',
  'crossing',
  'panic',
];
const LOG_TYPES: readonly LogEntryType[] = [
  'travel',
  'weather',
  'breakdown',
  'repair',
  'crossing',
  'encounter',
  'camp',
  'health',
  'travel_order',
  'endgame',
  'boss',
  'ending',
];
const BOSS_OUTCOMES: readonly BossOutcome[] = [
  'passed_cloture',
  'survived_flood',
  'pants_emergency',
  'exhausted',
];
const ENDING_TYPES = [
  'collapse',
  'sanity_loss',
  'vehicle_failure',
  'exposure',
  'boss_vote_failed',
  'boss_victory',
] as const;

function readSeed(r: JsonReader): bigint {
  const text = r.text('seed');
  if (!/^\d{1,20}$/.test(text)) return r.fail('seed', 'expected a decimal u64');
  const seed = BigInt(text);
  if (seed >= 1n << 64n) return r.fail('seed', 'out of u64 range');
  return seed;
}

function readEnding(r: JsonReader): Ending {
  const type = r.oneOf('type', ENDING_TYPES);
  switch (type) {
    case 'collapse':
      return { type, cause: r.oneOf('cause', COLLAPSE_CAUSES) };
    case 'exposure':
      return { type, kind: r.oneOf('kind', EXPOSURE_KINDS) };
    case 'sanity_loss':
    case 'vehicle_failure':
    case 'boss_vote_failed':
    case 'boss_victory':
      return { type };
  }
}

function readLogEntry(r: JsonReader): LogEntry {
  const entry: LogEntry = {
    day: r.integer('day', { min: 1 }),
    type: r.oneOf('type', LOG_TYPES),
    message: r.text('message'),
  };
  const m = r.has('meta') ? r.child('meta') : null;
  if (m !== null) {
    const meta: LogEntryMeta = {};
    if (m.has('miles')) meta.miles = m.number('miles', NON_NEGATIVE);
    if (m.has('count')) meta.count = m.integer('count', NON_NEGATIVE);
    if (m.has('weather')) meta.weather = m.oneOf('weather', WEATHERS);
    if (m.has('part')) meta.part = m.oneOf('part', PART_ORDER);
    entry.meta = meta;
  }
  return entry;
}

function readRngCounters(r: JsonReader): RngCounters {
  const counters = createRngCounters();
  for (const stream of RNG_STREAMS) {
    counters[stream] = r.integer(stream, NON_NEGATIVE);
  }
  return counters;
}

/**
 * Rebuild a typed GameState from a migrated raw save. Throws
 * SaveFormatError naming the first field that does not check out.
 */
export function validateSave(raw: RawSave): GameState {
  const r = JsonReader.of(raw, '', (field, message) => new SaveFormatError(field, message));

  const stats = r.child('stats');
  const inventory = r.child('inventory');
  const spares = inventory.child('spares');
  const vehicle = r.child('vehicle');
  const breakdown = r.nullableChild('breakdown');
  const weather = r.child('weather');
  const effects = r.child('weatherEffects');
  const health = r.child('health');
  const orders = r.child('travelOrder');
  const camp = r.child('camp');
  const endgame = r.child('endgame');
  const crossings = r.child('crossings');
  const encounters = r.child('encounters');
  const pending = encounters.nullableChild('pending');
  const counters = r.child('counters');
  const today = r.child('today');
  const ending = r.nullableChild('ending');

  return {
    saveVersion: r.integer('saveVersion'),
    seed: readSeed(r),
    mode: r.oneOf('mode', GAME_MODES),
    policy: r.oneOf('policy', POLICIES),
    pace: r.oneOf('pace', PACES),
    diet: r.oneOf('diet', DIETS),
    day: r.integer('day', { min: 1 }),
    region: r.oneOf('region', REGIONS),
    season: r.oneOf('season', SEASON_ORDER),
    stats: {
      supplies: stats.number('supplies'),
      hp: stats.number('hp'),
      sanity: stats.number('sanity'),
      credibility: stats.number('credibility'),
      morale: stats.number('morale'),
      allies: stats.number('allies'),
      pants: stats.number('pants'),
    },
    budgetCents: r.integer('budgetCents', NON_NEGATIVE),
    receipts: r.integer('receipts', NON_NEGATIVE),
    inventory: {
      spares: mapPart((part) => spares.integer(part, NON_NEGATIVE)),
      tags: inventory.stringList('tags'),
    },
    vehicle: {
      wear: vehicle.number('wear', { min: 0, max: 100 }),
      health: vehicle.number('health', { min: 0, max: 100 }),
      wearMultiplier: vehicle.number('wearMultiplier', NON_NEGATIVE),
      breakdownCooldown: vehicle.integer('breakdownCooldown', NON_NEGATIVE),
    },
    breakdown:
      breakdown === null
        ? null
        : { part: breakdown.oneOf('part', PART_ORDER), dayStarted: breakdown.integer('dayStarted', { min: 1 }) },
    vehicleBreakdowns: r.integer('vehicleBreakdowns', NON_NEGATIVE),
    weather: {
      today: weather.oneOf('today', WEATHERS),
      yesterday: weather.oneOf('yesterday', WEATHERS),
      extremeStreak: weather.integer('extremeStreak', NON_NEGATIVE),
      heatwaveStreak: weather.integer('heatwaveStreak', NON_NEGATIVE),
      coldsnapStreak: weather.integer('coldsnapStreak', NON_NEGATIVE),
      neutralBuffer: weather.integer('neutralBuffer', NON_NEGATIVE),
    },
    weatherEffects: {
      weather: effects.oneOf('weather', WEATHERS),
      suppliesDelta: effects.number('suppliesDelta'),
      sanityDelta: effects.number('sanityDelta'),
      pantsDelta: effects.number('pantsDelta'),
      encounterDelta: effects.number('encounterDelta'),
      travelMultiplier: effects.number('travelMultiplier', NON_NEGATIVE),
      mitigated: effects.boolean('mitigated'),
    },
    health: {
      starvationDays: health.integer('starvationDays', NON_NEGATIVE),
      malnutritionLevel: health.integer('malnutritionLevel', { min: 0, max: 5 }),
      starvationBackstopUsed: health.boolean('starvationBackstopUsed'),
      illnessDaysRemaining: health.integer('illnessDaysRemaining', NON_NEGATIVE),
      illnessCooldown: health.integer('illnessCooldown', NON_NEGATIVE),
      exposureHeatStreak: health.integer('exposureHeatStreak', NON_NEGATIVE),
      exposureColdStreak: health.integer('exposureColdStreak', NON_NEGATIVE),
      exposureLockout: health.boolean('exposureLockout'),
      lastDamage: health.oneOf('lastDamage', DAMAGE_CAUSES),
    },
    travelOrder: {
      active: orders.nullableOneOf('active', TRAVEL_ORDER_IDS),
      daysRemaining: orders.integer('daysRemaining', NON_NEGATIVE),
      cooldown: orders.integer('cooldown', NON_NEGATIVE),
      travelMultiplier: orders.number('travelMultiplier', NON_NEGATIVE),
      breakdownBonus: orders.number('breakdownBonus', NON_NEGATIVE),
      encounterDelta: orders.number('encounterDelta'),
    },
    camp: {
      restCooldown: camp.integer('restCooldown', NON_NEGATIVE),
      therapyCooldown: camp.integer('therapyCooldown', NON_NEGATIVE),
      repairCooldown: camp.integer('repairCooldown', NON_NEGATIVE),
    },
    endgame: {
      enabled: endgame.boolean('enabled'),
      active: endgame.boolean('active'),
      policyKey: endgame.nullableOneOf('policyKey', ENDGAME_POLICY_KEYS),
      fieldRepairUsed: endgame.boolean('fieldRepairUsed'),
      wearResetUsed: endgame.boolean('wearResetUsed'),
      guardTriggers: endgame.integer('guardTriggers', NON_NEGATIVE),
      travelBias: endgame.number('travelBias', NON_NEGATIVE),
      breakdownScale: endgame.number('breakdownScale', NON_NEGATIVE),
      partialRatio: endgame.number('partialRatio', NON_NEGATIVE),
    },
    crossings: {
      resolved: crossings.integer('resolved', NON_NEGATIVE),
      bribeIntent: crossings.boolean('bribeIntent'),
      permitsUsed: crossings.integer('permitsUsed', NON_NEGATIVE),
      bribesPaid: crossings.integer('bribesPaid', NON_NEGATIVE),
      detours: crossings.integer('detours', NON_NEGATIVE),
      detourDaysPending: crossings.integer('detourDaysPending', NON_NEGATIVE),
      bribeDiscountPct: crossings.number('bribeDiscountPct', { min: 0, max: 100 }),
    },
    encounters: {
      pending: pending === null ? null : { id: pending.string('id'), day: pending.integer('day', { min: 1 }) },
      recent: encounters.children('recent').map((e) => ({ id: e.string('id'), day: e.integer('day', { min: 1 }) })),
      resolved: encounters.integer('resolved', NON_NEGATIVE),
    },
    milesTraveled: r.number('milesTraveled', NON_NEGATIVE),
    trailDistance: r.number('trailDistance', { min: 1 }),
    recentTravelDays: r.enumList('recentTravelDays', TRAVEL_DAY_KINDS),
    dayRecords: r.children('dayRecords').map((d) => ({
      dayIndex: d.integer('dayIndex', NON_NEGATIVE),
      kind: d.oneOf('kind', TRAVEL_DAY_KINDS),
      miles: d.number('miles', NON_NEGATIVE),
      tags: d.stringList('tags'),
    })),
    counters: {
      travelDays: counters.integer('travelDays', NON_NEGATIVE),
      partialTravelDays: counters.integer('partialTravelDays', NON_NEGATIVE),
      nonTravelDays: counters.integer('nonTravelDays', NON_NEGATIVE),
      rotationTravelDays: counters.integer('rotationTravelDays', NON_NEGATIVE),
      campDays: counters.integer('campDays', NON_NEGATIVE),
      repairDays: counters.integer('repairDays', NON_NEGATIVE),
    },
    today: {
      dayInitialized: today.boolean('dayInitialized'),
      startMiles: today.number('startMiles', NON_NEGATIVE),
      kind: today.nullableOneOf('kind', TRAVEL_DAY_KINDS),
      miles: today.number('miles', NON_NEGATIVE),
      tags: today.stringList('tags'),
      distanceToday: today.number('distanceToday', NON_NEGATIVE),
      partialDistanceToday: today.number('partialDistanceToday', NON_NEGATIVE),
      suppressStopRatio: today.boolean('suppressStopRatio'),
      encounterRolled: today.boolean('encounterRolled'),
    },
    restRequested: r.boolean('restRequested'),
    rng: readRngCounters(r.child('rng')),
    log: r.children('log').map(readLogEntry),
    bossReady: r.boolean('bossReady'),
    bossAttempted: r.boolean('bossAttempted'),
    bossVictory: r.boolean('bossVictory'),
    bossOutcome: r.nullableOneOf('bossOutcome', BOSS_OUTCOMES),
    ending: ending === null ? null : readEnding(ending),
  };
}

/** Checks that span fields: ledger order and the day counter. */
function checkConsistency(state: GameState): string | null {
  let previous = -1;
  for (const record of state.dayRecords) {
    if (record.dayIndex < previous) return 'dayRecords out of order';
    previous = record.dayIndex;
  }
  if (previous >= state.day) return 'day is behind the ledger';
  return null;
}

/**
 * Parse, migrate and validate save text. Returns null (after logging) for
 * anything that is not a loadable save.
 */
export function deserializeGame(text: string): GameState | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    console.error('Failed to parse save data:', e);
    return null;
  }
  if (!isRecord(raw)) {
    console.error('Save data is not an object');
    return null;
  }

  const migrated = runMigrations(raw);
  if (!migrated) {
    console.error('Save migration failed');
    return null;
  }

  try {
    const state = validateSave(migrated);
    const problem = checkConsistency(state);
    if (problem !== null) {
      console.error(`Save data is inconsistent: ${problem}`);
      return null;
    }
    return state;
  } catch (e) {
    if (e instanceof SaveFormatError) {
      console.error('Save data failed validation:', e.message);
      return null;
    }
    throw e;
  }
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function backupPathFor(path: string): string {
  return `${path}.bak`;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Persist the run to a file.
 * Returns true on success, false if the write failed.
 */
export async function saveGameToFile(state: GameState, path: string): Promise<boolean> {
  try {
    await writeFile(path, serializeGame(state), 'utf8');
    return true;
  } catch (e) {
    console.error('Failed to save game:', e);
    return false;
  }
}

/**
 * Load a run from a file. A save from an older version is copied to
 * `<path>.bak` before it is migrated. Returns null when there is no save
 * or it cannot be loaded.
 */
export async function loadGameFromFile(path: string): Promise<GameState | null> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    if (!isMissingFile(e)) console.error('Failed to read save file:', e);
    return null;
  }

  let version = -1;
  try {
    const raw: unknown = JSON.parse(text);
    if (isRecord(raw)) version = detectVersion(raw);
  } catch (e) {
    console.error('Failed to parse save data:', e);
    return null;
  }

  // Keep the pre-migration text beside the save.
  if (version >= 0 && version < CURRENT_SAVE_VERSION) {
    try {
      await writeFile(backupPathFor(path), text, 'utf8');
    } catch (e) {
      console.warn('Could not write save backup, continuing without one:', e);
    }
  }

  return deserializeGame(text);
}

export async function clearSaveFile(path: string): Promise<void> {
  await rm(path, { force: true });
  await rm(backupPathFor(path), { force: true });
}
