import type {
  DayRecord,
  DayScratch,
  GameMode,
  GameState,
  PolicyKind,
  TravelCounters,
  TravelDayKind,
} from './models';
import type { JourneyConfig } from './models/config';
import { clamp, sanitizeMiles } from './numbers';
import { dayIndexFor, regionForDay, seasonForDay } from './timeSystem';

/**
 * Day Accounting
 *
 * Every simulated day is classified as travel, partial or non-travel and
 * ends up as exactly one DayRecord. A day may be reclassified while it is
 * in progress (a breakdown turning travel into a stop, a detour turning a
 * stop into partial progress); the running counters follow each change.
 *
 * Ratio floor: too many stops in the recent window demote a new stop to
 * a partial day so the party never stalls indefinitely.
 */

export function createDayScratch(): DayScratch {
  return {
    dayInitialized: false,
    startMiles: 0,
    kind: null,
    miles: 0,
    tags: [],
    distanceToday: 0,
    partialDistanceToday: 0,
    suppressStopRatio: false,
    encounterRolled: false,
  };
}

export function createTravelCounters(): TravelCounters {
  return {
    travelDays: 0,
    partialTravelDays: 0,
    nonTravelDays: 0,
    rotationTravelDays: 0,
    campDays: 0,
    repairDays: 0,
  };
}

/** Reset today's scratch values. Called once at the start of each day. */
export function beginDay(state: GameState): void {
  state.today = createDayScratch();
  state.today.dayInitialized = true;
  state.today.startMiles = state.milesTraveled;
}

// ── Reason tags ──────────────────────────────────────────────────

export function addDayReasonTag(state: GameState, tag: string): void {
  const trimmed = tag.trim();
  if (trimmed === '' || state.today.tags.includes(trimmed)) return;
  if (trimmed === 'camp') {
    state.counters.campDays += 1;
  } else if (trimmed === 'repair') {
    state.counters.repairDays += 1;
  }
  state.today.tags.push(trimmed);
}

// ── Ratio floor ──────────────────────────────────────────────────

export function stopCapFor(state: GameState, cfg: JourneyConfig): number {
  const key: `${GameMode}_${PolicyKind}` = `${state.mode}_${state.policy}`;
  return cfg.days.stopCap[key] ?? cfg.days.defaultStopCap;
}

/** True when today's stop would push the recent window past the stop cap. */
export function stopCapReached(state: GameState, cfg: JourneyConfig): boolean {
  const window = cfg.days.historyWindow - 1;
  if (window <= 0) return false;
  const recent = state.recentTravelDays.slice(-window);
  const stops = recent.filter((kind) => kind === 'non_travel').length;
  return stops >= stopCapFor(state, cfg);
}

/** Miles credited to a stop day that was demoted to partial travel. */
export function partialDayMiles(state: GameState, cfg: JourneyConfig, miles: number): number {
  if (miles > 0) return miles;
  const floor = cfg.days.partialMinMiles;
  const ratio = clamp(cfg.travel.partialRatio, 0.2, 0.95);
  if (state.today.partialDistanceToday > 0) {
    return Math.max(state.today.partialDistanceToday, floor);
  }
  if (state.today.distanceToday > 0) {
    return Math.max(state.today.distanceToday * ratio, floor);
  }
  return Math.max(cfg.travel.mpdBase * ratio, floor);
}

// ── Counters ─────────────────────────────────────────────────────

function isRotation(kind: TravelDayKind): boolean {
  return kind !== 'non_travel';
}

function countKind(counters: TravelCounters, kind: TravelDayKind, delta: 1 | -1): void {
  switch (kind) {
    case 'travel':
      counters.travelDays = Math.max(0, counters.travelDays + delta);
      break;
    case 'partial':
      counters.partialTravelDays = Math.max(0, counters.partialTravelDays + delta);
      break;
    case 'non_travel':
      counters.nonTravelDays = Math.max(0, counters.nonTravelDays + delta);
      break;
  }
}

function applyInitialCounters(counters: TravelCounters, kind: TravelDayKind): void {
  countKind(counters, kind, 1);
  if (isRotation(kind)) counters.rotationTravelDays += 1;
}

function applyTransition(
  counters: TravelCounters,
  from: TravelDayKind,
  to: TravelDayKind
): void {
  countKind(counters, from, -1);
  countKind(counters, to, 1);
  if (isRotation(from) && !isRotation(to)) {
    counters.rotationTravelDays = Math.max(0, counters.rotationTravelDays - 1);
  } else if (!isRotation(from) && isRotation(to)) {
    counters.rotationTravelDays += 1;
  }
}

/** Rebuild the travel/partial/stop totals from the ledger. */
export function recomputeDayCounters(state: GameState): void {
  let travel = 0;
  let partial = 0;
  let stops = 0;
  for (const record of state.dayRecords) {
    if (record.kind === 'travel') travel += 1;
    else if (record.kind === 'partial') partial += 1;
    else stops += 1;
  }
  state.counters.travelDays = travel;
  state.counters.partialTravelDays = partial;
  state.counters.nonTravelDays = stops;
}

// ── Recording ────────────────────────────────────────────────────

/** Advance the odometer. Reaching the trail distance readies the boss. */
export function applyTravelProgress(state: GameState, miles: number): void {
  if (miles <= 0) return;
  state.milesTraveled += miles;
  if (state.ending === null && state.milesTraveled >= state.trailDistance) {
    state.bossReady = true;
  }
}

export interface RecordedDay {
  kind: TravelDayKind;
  miles: number;
}

/**
 * Classify today (or reclassify it) and credit any miles earned.
 * A stop beyond the stop cap is demoted to partial travel.
 */
export function recordTravelDay(
  state: GameState,
  cfg: JourneyConfig,
  kind: TravelDayKind,
  milesEarned: number,
  reasonTag: string = ''
): RecordedDay {
  let effective = kind;
  let miles = sanitizeMiles(milesEarned);

  if (effective === 'non_travel' && !state.today.suppressStopRatio && stopCapReached(state, cfg)) {
    effective = 'partial';
    miles = partialDayMiles(state, cfg, miles);
    addDayReasonTag(state, 'stop_cap');
  }

  const existing = state.today.kind;
  if (existing === null) {
    applyInitialCounters(state.counters, effective);
  } else if (existing !== effective) {
    applyTransition(state.counters, existing, effective);
  }
  state.today.kind = effective;

  if (miles > 0) {
    applyTravelProgress(state, miles);
    state.today.miles += miles;
  }
  if (reasonTag !== '') addDayReasonTag(state, reasonTag);

  return { kind: effective, miles };
}

/**
 * Undo today's progress: the odometer returns to where the day began and
 * the day's classification is withdrawn.
 */
export function resetTodayProgress(state: GameState): void {
  const progress = Math.max(0, state.milesTraveled - state.today.startMiles);
  if (progress > 0) {
    state.milesTraveled -= progress;
    if (state.milesTraveled < state.trailDistance) state.bossReady = false;
  }
  const kind = state.today.kind;
  if (kind !== null) {
    countKind(state.counters, kind, -1);
    if (isRotation(kind)) {
      state.counters.rotationTravelDays = Math.max(0, state.counters.rotationTravelDays - 1);
    }
  }
  state.today.kind = null;
  state.today.miles = 0;
  state.today.distanceToday = 0;
  state.today.partialDistanceToday = 0;
}

/**
 * Close the day: settle an unclassified day, append the ledger record,
 * slide the recent-days window and advance the calendar.
 */
export function endOfDay(state: GameState, cfg: JourneyConfig): DayRecord {
  if (state.today.kind === null) {
    const moved = state.milesTraveled - state.today.startMiles > 0;
    recordTravelDay(state, cfg, moved ? 'partial' : 'non_travel', 0);
  }
  const kind = state.today.kind ?? 'non_travel';

  const record: DayRecord = {
    dayIndex: dayIndexFor(state.day),
    kind,
    miles: state.today.miles,
    tags: [...state.today.tags],
  };
  state.dayRecords.push(record);

  state.recentTravelDays.push(kind);
  while (state.recentTravelDays.length > cfg.days.historyWindow) {
    state.recentTravelDays.shift();
  }
  recomputeDayCounters(state);

  state.day += 1;
  state.region = regionForDay(state.day);
  state.season = seasonForDay(state.day);
  state.today.dayInitialized = false;
  return record;
}
