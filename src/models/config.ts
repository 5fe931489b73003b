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
} from './index';

// ── Weather ──────────────────────────────────────────────────────

export interface WeatherEffect {
  supplies: number;
  sanity: number;
  pants: number;
  encounterDelta: number;
  travelMultiplier: number;
}

/** Gear that replaces the sanity/pants hit of a weather type. */
export interface WeatherMitigation {
  tag: string;
  sanity?: number;
  pants?: number;
}

export interface WeatherLimits {
  maxExtremeStreak: number;
  encounterCap: number;
  pantsFloor: number;
  pantsCeiling: number;
}

export interface WeatherConfig {
  limits: WeatherLimits;
  effects: Record<Weather, WeatherEffect>;
  mitigation: Partial<Record<Weather, WeatherMitigation>>;
  weights: Partial<Record<Region, Record<Weather, number>>>;
}

// ── Crossings ────────────────────────────────────────────────────

export interface CrossingTypeConfig {
  detour: { days: number; supplies: number; pants: number };
  bribe: { baseCostCents: number; onFailPants: number };
}

export interface CrossingConfig {
  types: Record<CrossingKind, CrossingTypeConfig>;
  milestones: number[];
  kinds: CrossingKind[];
  permitCredibility: number;
  permitTags: string[];
}

// ── Boss ─────────────────────────────────────────────────────────

export interface BossConfig {
  distanceRequired: number;
  rounds: number;
  sanityLossPerRound: number;
  pantsGainPerRound: number;
  baseVictoryChance: number;
  scoreWeight: number;
  credibilityWeight: number;
  sanityWeight: number;
  suppliesWeight: number;
  alliesWeight: number;
  pantsPenaltyWeight: number;
  minChance: number;
  maxChance: number;
}

// ── Camp ─────────────────────────────────────────────────────────

export interface CampConfig {
  rest: { sanity: number; hp: number; supplies: number; cooldownDays: number };
  therapy: { sanity: number; receiptCost: number; cooldownDays: number };
  forage: {
    suppliesGain: number;
    weights: { supplies: number; none: number; receipt: number };
    receiptBonusCapPct: number;
  };
  repair: {
    spareSupplies: number;
    spareHeal: number;
    hackSupplies: number;
    hackCredibility: number;
    hackCooldownDays: number;
  };
}

// ── Pace / diet ──────────────────────────────────────────────────

export interface PaceConfig {
  sanity: number;
  pants: number;
  distanceMult: number;
  encounterChanceDelta: number;
}

export interface DietConfig {
  sanity: number;
  pants: number;
  receiptFindPctDelta: number;
}

export interface PacingConfig {
  pace: Record<PaceId, PaceConfig>;
  diet: Record<DietId, DietConfig>;
}

// ── Endgame ──────────────────────────────────────────────────────

export type ResourcePriority = 'matching_spare' | 'any_spare' | 'emergency';

export interface EndgamePolicyConfig {
  miStart: number;
  failureGuardMiles: number;
  healthFloor: number;
  wearReset: number;
  cooldownDays: number;
  partialRatio: number;
  wearMultiplier: number;
  resourcePriority: ResourcePriority[];
  travelBias: number;
  breakdownScale: number;
}

export interface EndgameConfig {
  enabled: boolean;
  policies: Record<EndgamePolicyKey, EndgamePolicyConfig>;
}

// ── Journey (travel, wear, breakdown, daily channels) ────────────

export interface DailyChannel {
  base: number;
  pace: Record<PaceId, number>;
  diet: Record<DietId, number>;
  weather: Record<Weather, number>;
}

/** Daily hp drift: decay scaled by weather, offset by healing on rest days. */
export interface HealthChannel {
  decay: number;
  weather: Record<Weather, number>;
  restHeal: number;
}

export interface JourneyConfig {
  travel: {
    trailDistance: number;
    mpdBase: number;
    mpdMin: number;
    mpdMax: number;
    penaltyFloor: number;
    partialRatio: number;
    paceFactor: Record<PaceId, number>;
    weatherFactor: Record<Weather, number>;
    restCreditMiles: number;
    delayCreditMiles: number;
    criticalMultiplier: number;
    illnessMultiplier: number;
    malnutritionPenalty: number;
    malnutritionFloor: number;
  };
  wear: {
    base: number;
    fatigueK: number;
    comfortMiles: number;
    malnutritionK: number;
    breakdownWear: Record<GameMode, number>;
    breakdownHealthCost: number;
    criticalHealth: number;
  };
  breakdown: {
    base: number;
    beta: number;
    paceFactor: Record<PaceId, number>;
    weatherFactor: Record<Weather, number>;
    extremeBonus: number;
    criticalBonus: number;
    partWeights: Record<Part, number>;
    spareHeal: number;
    emergencyCostCents: number;
    emergencyHeal: number;
    juryRigDamage: number;
    juryRigDelayDays: number;
    cooldownDays: number;
  };
  days: {
    historyWindow: number;
    partialMinMiles: number;
    defaultStopCap: number;
    stopCap: Partial<Record<`${GameMode}_${PolicyKind}`, number>>;
  };
  encounters: {
    baseChance: number;
    recentWindowDays: number;
    rerollChance: number;
  };
  daily: {
    supplies: DailyChannel;
    sanity: DailyChannel;
    health: HealthChannel;
  };
}

// ── Result ───────────────────────────────────────────────────────

export type ScoreRounding = 'nearest' | 'down' | 'up';

export interface ResultConfig {
  thresholds: Record<GameMode, number>;
  scoreMult: number;
  deepBonus: number;
  rounding: ScoreRounding;
  pantsPenaltyStart: number;
  pantsPenaltyPerPoint: number;
  weights: {
    supplies: number;
    hp: number;
    morale: number;
    credibility: number;
    allies: number;
    day: number;
    encounters: number;
    receipts: number;
    breakdownPenalty: number;
    breakdownPenaltyCap: number;
  };
}

// ── Encounters ───────────────────────────────────────────────────

export interface EncounterEffects {
  hp?: number;
  sanity?: number;
  credibility?: number;
  supplies?: number;
  morale?: number;
  allies?: number;
  pants?: number;
  receiptsGained?: number;
  receiptsUsed?: number;
  rest?: boolean;
  travelBonusRatio?: number;
}

export interface EncounterChoice {
  label: string;
  effects: EncounterEffects;
}

export interface EncounterDefinition {
  id: string;
  name: string;
  regions: Region[]; // empty = any region
  weight: number;
  choices: EncounterChoice[];
}

export interface GameConfig {
  weather: WeatherConfig;
  crossings: CrossingConfig;
  boss: BossConfig;
  camp: CampConfig;
  pacing: PacingConfig;
  endgame: EndgameConfig;
  journey: JourneyConfig;
  result: ResultConfig;
  encounters: EncounterDefinition[];
}
