export type GameMode = 'classic' | 'deep';

export type PolicyKind =
  | 'balanced'
  | 'conservative'
  | 'aggressive'
  | 'resource_manager'
  | 'monte_carlo';

export type PaceId = 'steady' | 'heated' | 'blitz';

export type DietId = 'mixed' | 'quiet' | 'doom';

export type Weather = 'clear' | 'storm' | 'heat_wave' | 'cold_snap' | 'smoke';

export type Region = 'heartland' | 'rust_belt' | 'beltway';

export type Season = 'spring' | 'summer' | 'fall' | 'winter';

export type Part = 'tire' | 'battery' | 'alternator' | 'fuel_pump';

export type TravelDayKind = 'travel' | 'partial' | 'non_travel';

export type CrossingKind = 'checkpoint' | 'bridge_out';

export type ExposureKind = 'cold' | 'heat';

export type DamageCause =
  | 'starvation'
  | 'exposure_cold'
  | 'exposure_heat'
  | 'disease'
  | 'vehicle'
  | 'breakdown'
  | 'unknown';

export type CollapseCause =
  | 'hunger'
  | 'vehicle'
  | 'weather'
  | 'breakdown'
  | 'disease'
  | 'crossing'
  | 'panic';

export type Ending =
  | { type: 'collapse'; cause: CollapseCause }
  | { type: 'sanity_loss' }
  | { type: 'vehicle_failure' }
  | { type: 'exposure'; kind: ExposureKind }
  | { type: 'boss_vote_failed' }
  | { type: 'boss_victory' };

export type RngStream =
  | 'weather'
  | 'health'
  | 'travel'
  | 'events'
  | 'breakdown'
  | 'encounter'
  | 'crossing'
  | 'boss'
  | 'hunt';

export type RngCounters = Record<RngStream, number>;

// ── Party ────────────────────────────────────────────────────────

export interface Stats {
  supplies: number; // 0-20
  hp: number; // 0-10
  sanity: number; // 0-10
  credibility: number; // 0-20
  morale: number; // 0-10
  allies: number; // 0-50
  pants: number; // 0-100, panic meter
}

export interface Inventory {
  spares: Record<Part, number>;
  tags: string[]; // gear flags such as 'permit', 'warm_coat', 'water_jugs'
}

// ── Vehicle ──────────────────────────────────────────────────────

export interface VehicleState {
  wear: number; // 0 = new, 100 = worn out
  health: number; // 0-100
  wearMultiplier: number;
  breakdownCooldown: number; // days during which no new breakdown can start
}

export interface Breakdown {
  part: Part;
  dayStarted: number;
}

// ── Weather ──────────────────────────────────────────────────────

export interface WeatherState {
  today: Weather;
  yesterday: Weather;
  extremeStreak: number;
  heatwaveStreak: number;
  coldsnapStreak: number;
  neutralBuffer: number;
}

export interface WeatherEffectsToday {
  weather: Weather;
  suppliesDelta: number;
  sanityDelta: number;
  pantsDelta: number;
  encounterDelta: number;
  travelMultiplier: number;
  mitigated: boolean;
}

// ── Health ───────────────────────────────────────────────────────

export interface HealthState {
  starvationDays: number;
  malnutritionLevel: number; // 0-5
  starvationBackstopUsed: boolean;
  illnessDaysRemaining: number;
  illnessCooldown: number;
  exposureHeatStreak: number;
  exposureColdStreak: number;
  exposureLockout: boolean;
  lastDamage: DamageCause;
}

// ── Travel orders ────────────────────────────────────────────────

export type TravelOrderId =
  | 'fuel_rationing'
  | 'road_closures'
  | 'curfew'
  | 'toll_hike'
  | 'supply_strike'
  | 'inspection_drive';

export interface TravelOrderState {
  active: TravelOrderId | null;
  daysRemaining: number;
  cooldown: number;
  /** Today's modifiers, rebuilt every day */
  travelMultiplier: number;
  breakdownBonus: number;
  encounterDelta: number;
}

// ── Camp / Endgame / Crossings / Encounters ──────────────────────

export interface CampState {
  restCooldown: number;
  therapyCooldown: number;
  repairCooldown: number;
}

export type EndgamePolicyKey =
  | 'deep_balanced'
  | 'deep_aggressive'
  | 'deep_conservative'
  | 'deep_resource_manager';

export interface EndgameState {
  enabled: boolean;
  active: boolean;
  policyKey: EndgamePolicyKey | null;
  fieldRepairUsed: boolean;
  wearResetUsed: boolean;
  guardTriggers: number;
  travelBias: number;
  breakdownScale: number;
  partialRatio: number;
}

export interface CrossingState {
  resolved: number; // index of the next crossing milestone
  bribeIntent: boolean;
  permitsUsed: number;
  bribesPaid: number;
  detours: number;
  detourDaysPending: number;
  bribeDiscountPct: number; // 0-100
}

export interface PendingEncounter {
  id: string;
  day: number;
}

export interface EncounterState {
  pending: PendingEncounter | null;
  recent: PendingEncounter[];
  resolved: number;
}

// ── Day accounting ───────────────────────────────────────────────

export interface DayRecord {
  dayIndex: number; // zero-based, = day - 1
  kind: TravelDayKind;
  miles: number;
  tags: string[];
}

export interface TravelCounters {
  travelDays: number;
  partialTravelDays: number;
  nonTravelDays: number;
  rotationTravelDays: number;
  campDays: number;
  repairDays: number;
}

/** Scratch values for the day in progress. Reset at the start of each day. */
export interface DayScratch {
  dayInitialized: boolean;
  startMiles: number;
  kind: TravelDayKind | null;
  miles: number;
  tags: string[];
  distanceToday: number;
  partialDistanceToday: number;
  suppressStopRatio: boolean;
  encounterRolled: boolean;
}

// ── Journal ──────────────────────────────────────────────────────

export type LogEntryType =
  | 'travel'
  | 'weather'
  | 'breakdown'
  | 'repair'
  | 'crossing'
  | 'encounter'
  | 'camp'
  | 'health'
  | 'travel_order'
  | 'endgame'
  | 'boss'
  | 'ending';

export interface LogEntryMeta {
  miles?: number;
  count?: number;
  weather?: Weather;
  part?: Part;
}

export interface LogEntry {
  day: number;
  type: LogEntryType;
  message: string;
  meta?: LogEntryMeta;
}

// ── Boss ─────────────────────────────────────────────────────────

export type BossOutcome =
  | 'passed_cloture'
  | 'survived_flood'
  | 'pants_emergency'
  | 'exhausted';

// ── Aggregate ────────────────────────────────────────────────────

export interface GameState {
  saveVersion: number;
  seed: bigint;
  mode: GameMode;
  policy: PolicyKind;
  pace: PaceId;
  diet: DietId;
  day: number; // 1-based, never decreases
  region: Region;
  season: Season;
  stats: Stats;
  budgetCents: number;
  receipts: number;
  inventory: Inventory;
  vehicle: VehicleState;
  breakdown: Breakdown | null;
  vehicleBreakdowns: number;
  weather: WeatherState;
  weatherEffects: WeatherEffectsToday;
  health: HealthState;
  travelOrder: TravelOrderState;
  camp: CampState;
  endgame: EndgameState;
  crossings: CrossingState;
  encounters: EncounterState;
  milesTraveled: number;
  trailDistance: number;
  recentTravelDays: TravelDayKind[];
  dayRecords: DayRecord[];
  counters: TravelCounters;
  today: DayScratch;
  restRequested: boolean;
  rng: RngCounters;
  log: LogEntry[];
  bossReady: boolean;
  bossAttempted: boolean;
  bossVictory: boolean;
  bossOutcome: BossOutcome | null;
  ending: Ending | null;
}
