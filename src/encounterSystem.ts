import type { EncounterState, GameState, PendingEncounter, Region, Stats } from './models';
import type {
  EncounterChoice,
  EncounterDefinition,
  JourneyConfig,
  PacingConfig,
  WeatherConfig,
} from './models/config';
import { clamp } from './numbers';
import { applyStatDeltas } from './party';
import { weightedPick, type RandomSource } from './rng';
import { recordTravelDay } from './dayAccounting';
import { weatherEncounterCap } from './weatherSystem';

/**
 * Encounter System
 *
 * Once per travel day the party may run into something on the road.
 * The chance starts from a base rate and shifts with weather, pace and
 * any travel order in force, capped by the weather limits.
 *
 * Picks are weighted by region. An encounter seen in the recent window is
 * usually rerolled once so the same scene does not repeat back to back.
 */

export function createEncounterState(): EncounterState {
  return { pending: null, recent: [], resolved: 0 };
}

// ── Trigger ──────────────────────────────────────────────────────

export function encounterChanceToday(
  state: GameState,
  journey: JourneyConfig,
  pacing: PacingConfig,
  weather: WeatherConfig
): number {
  const chance =
    journey.encounters.baseChance +
    state.weatherEffects.encounterDelta +
    pacing.pace[state.pace].encounterChanceDelta +
    state.travelOrder.encounterDelta;
  return clamp(chance, 0, weatherEncounterCap(weather));
}

// ── Selection ────────────────────────────────────────────────────

export function encountersForRegion(
  table: readonly EncounterDefinition[],
  region: Region
): EncounterDefinition[] {
  return table.filter((def) => def.regions.length === 0 || def.regions.includes(region));
}

export function seenRecently(
  recent: readonly PendingEncounter[],
  id: string,
  day: number,
  windowDays: number
): boolean {
  return recent.some((entry) => entry.id === id && day - entry.day < windowDays);
}

function drawOne(
  candidates: readonly EncounterDefinition[],
  rng: RandomSource
): EncounterDefinition | null {
  return weightedPick(
    candidates.map((def) => [def, def.weight] as const),
    rng
  );
}

export function pickEncounter(
  state: GameState,
  table: readonly EncounterDefinition[],
  journey: JourneyConfig,
  rng: RandomSource
): EncounterDefinition | null {
  const candidates = encountersForRegion(table, state.region);
  const pick = drawOne(candidates, rng);
  if (pick === null) return null;

  const { recentWindowDays, rerollChance } = journey.encounters;
  if (seenRecently(state.encounters.recent, pick.id, state.day, recentWindowDays)) {
    if (rng.chance(rerollChance)) return drawOne(candidates, rng);
  }
  return pick;
}

/** Mark an encounter as waiting for the player's choice. */
export function startEncounter(state: GameState, def: EncounterDefinition, journey: JourneyConfig): void {
  const entry: PendingEncounter = { id: def.id, day: state.day };
  state.encounters.pending = entry;
  state.encounters.recent = state.encounters.recent.filter(
    (seen) => state.day - seen.day < journey.encounters.recentWindowDays
  );
  state.encounters.recent.push(entry);
}

// ── Resolution ───────────────────────────────────────────────────

export interface EncounterResolution {
  encounter: EncounterDefinition;
  choice: EncounterChoice;
  deltas: Partial<Stats>;
  receiptsDelta: number;
  bonusMiles: number;
}

export function findEncounter(
  table: readonly EncounterDefinition[],
  id: string
): EncounterDefinition | null {
  return table.find((def) => def.id === id) ?? null;
}

/**
 * Apply the chosen option of the pending encounter. Returns null (and
 * changes nothing) when no encounter is pending or the choice is invalid.
 */
export function resolveEncounter(
  state: GameState,
  table: readonly EncounterDefinition[],
  journey: JourneyConfig,
  choiceIndex: number
): EncounterResolution | null {
  const pending = state.encounters.pending;
  if (pending === null) return null;
  const encounter = findEncounter(table, pending.id);
  if (encounter === null) return null;
  const choice = encounter.choices[choiceIndex];
  if (choice === undefined) return null;

  const fx = choice.effects;
  const deltas: Partial<Stats> = {
    hp: fx.hp,
    sanity: fx.sanity,
    credibility: fx.credibility,
    supplies: fx.supplies,
    morale: fx.morale,
    allies: fx.allies,
    pants: fx.pants,
  };
  applyStatDeltas(state.stats, deltas);

  const before = state.receipts;
  state.receipts = Math.max(0, state.receipts + (fx.receiptsGained ?? 0) - (fx.receiptsUsed ?? 0));
  if (fx.rest === true) state.restRequested = true;

  let bonusMiles = 0;
  const ratio = fx.travelBonusRatio ?? 0;
  if (ratio > 0 && state.today.distanceToday > 0) {
    const recorded = recordTravelDay(
      state,
      journey,
      state.today.kind ?? 'partial',
      state.today.distanceToday * ratio
    );
    bonusMiles = recorded.miles;
  }

  state.encounters.pending = null;
  state.encounters.resolved += 1;
  return { encounter, choice, deltas, receiptsDelta: state.receipts - before, bonusMiles };
}
