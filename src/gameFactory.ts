import type { DietId, GameMode, GameState, PaceId, Part, PolicyKind } from './models';
import type { GameConfig } from './models/config';
import { CURRENT_SAVE_VERSION } from './storage';
import { createDefaultConfig, mapPart } from './gameConfig';
import { clamp } from './numbers';
import { createDefaultStats } from './party';
import { createRngCounters } from './rng';
import { decodeToSeed, encodeFriendly, generateCodeFromEntropy } from './shareCode';
import { regionForDay, seasonForDay } from './timeSystem';
import { createVehicleState } from './vehicleSystem';
import { createWeatherState, neutralWeatherEffects } from './weatherSystem';
import { createHealthState } from './healthSystem';
import { createTravelOrderState } from './travelOrders';
import { createCampState } from './campSystem';
import { createEndgameState } from './endgameSystem';
import { createEncounterState } from './encounterSystem';
import { createDayScratch, createTravelCounters } from './dayAccounting';

export const STARTING_BUDGET_CENTS = 20_000;

export interface NewGameOptions {
  /** Explicit run seed. Ignored when a share code is given. */
  seed?: bigint;
  /** `CL-WORDNN` / `DP-WORDNN`. Sets both the seed and the mode. */
  shareCode?: string;
  mode?: GameMode;
  policy?: PolicyKind;
  pace?: PaceId;
  diet?: DietId;
  budgetCents?: number;
  /** Percent off every bribe, 0-100 */
  bribeDiscountPct?: number;
  spares?: Partial<Record<Part, number>>;
  /** Gear and permit tags, e.g. 'permit', 'warm_coat' */
  tags?: string[];
  config?: GameConfig;
}

const DEFAULT_SPARES: Record<Part, number> = {
  tire: 1,
  battery: 0,
  alternator: 0,
  fuel_pump: 0,
};

function resolveSeed(options: NewGameOptions): { seed: bigint; mode: GameMode } {
  if (options.shareCode !== undefined) {
    const decoded = decodeToSeed(options.shareCode);
    if (!decoded) {
      throw new Error(`Invalid share code: ${options.shareCode}`);
    }
    return { seed: decoded.seed, mode: decoded.isDeep ? 'deep' : 'classic' };
  }

  const mode = options.mode ?? 'classic';
  if (options.seed !== undefined) {
    return { seed: BigInt.asUintN(64, options.seed), mode };
  }

  // No seed requested: draw a fresh share code so the run can be replayed.
  const code = generateCodeFromEntropy(mode === 'deep', Math.floor(Math.random() * 2 ** 32));
  const decoded = decodeToSeed(code);
  if (!decoded) {
    throw new Error(`Generated share code did not decode: ${code}`);
  }
  return { seed: decoded.seed, mode };
}

/**
 * Create a run on day 1: full stats, a new vehicle, clear weather and an
 * empty ledger.
 */
export function createNewGame(options: NewGameOptions = {}): GameState {
  const config = options.config ?? createDefaultConfig();
  const { seed, mode } = resolveSeed(options);
  const spares = options.spares ?? {};

  const endgame = createEndgameState();
  endgame.enabled = config.endgame.enabled && mode === 'deep';

  return {
    saveVersion: CURRENT_SAVE_VERSION,
    seed,
    mode,
    policy: options.policy ?? 'balanced',
    pace: options.pace ?? 'steady',
    diet: options.diet ?? 'mixed',
    day: 1,
    region: regionForDay(1),
    season: seasonForDay(1),
    stats: createDefaultStats(),
    budgetCents: Math.max(0, Math.round(options.budgetCents ?? STARTING_BUDGET_CENTS)),
    receipts: 0,
    inventory: {
      spares: mapPart((part) => Math.max(0, spares[part] ?? DEFAULT_SPARES[part])),
      tags: [...(options.tags ?? [])],
    },
    vehicle: createVehicleState(),
    breakdown: null,
    vehicleBreakdowns: 0,
    weather: createWeatherState(),
    weatherEffects: neutralWeatherEffects(),
    health: createHealthState(),
    travelOrder: createTravelOrderState(),
    camp: createCampState(),
    endgame,
    crossings: {
      resolved: 0,
      bribeIntent: false,
      permitsUsed: 0,
      bribesPaid: 0,
      detours: 0,
      detourDaysPending: 0,
      bribeDiscountPct: clamp(options.bribeDiscountPct ?? 0, 0, 100),
    },
    encounters: createEncounterState(),
    milesTraveled: 0,
    trailDistance: config.journey.travel.trailDistance,
    recentTravelDays: [],
    dayRecords: [],
    counters: createTravelCounters(),
    today: createDayScratch(),
    restRequested: false,
    rng: createRngCounters(),
    log: [],
    bossReady: false,
    bossAttempted: false,
    bossVictory: false,
    bossOutcome: null,
    ending: null,
  };
}

/** Share code for a run's seed. */
export function shareCodeFor(state: GameState): string {
  return encodeFriendly(state.mode === 'deep', state.seed);
}
