import type { Breakdown, GameState, Part, VehicleState } from './models';
import type { JourneyConfig } from './models/config';
import { clamp } from './numbers';
import { weightedPick, type RandomSource } from './rng';
import { isExtreme } from './weatherSystem';

/**
 * Vehicle System
 *
 * Wear accumulates every travel day; breakdown odds rise with wear, pace
 * and bad weather. Only one breakdown can be live at a time, and it
 * blocks travel until a spare, an emergency repair or a jury-rig clears it.
 */

export const PART_ORDER: readonly Part[] = ['tire', 'battery', 'alternator', 'fuel_pump'];

export const VEHICLE_LIMITS = {
  MAX_WEAR: 100,
  MAX_HEALTH: 100,
  /** Health at or below which the vehicle is critical */
  CRITICAL_HEALTH: 20,
};

export function createVehicleState(): VehicleState {
  return {
    wear: 0,
    health: VEHICLE_LIMITS.MAX_HEALTH,
    wearMultiplier: 1,
    breakdownCooldown: 0,
  };
}

// ── Vehicle operations ───────────────────────────────────────────

export function applyDamage(vehicle: VehicleState, amount: number): void {
  vehicle.health = clamp(vehicle.health - Math.max(0, amount), 0, VEHICLE_LIMITS.MAX_HEALTH);
}

export function repairVehicle(vehicle: VehicleState, amount: number): void {
  vehicle.health = clamp(vehicle.health + Math.max(0, amount), 0, VEHICLE_LIMITS.MAX_HEALTH);
}

export function isCritical(
  vehicle: VehicleState,
  threshold: number = VEHICLE_LIMITS.CRITICAL_HEALTH
): boolean {
  return vehicle.health <= threshold;
}

export function ensureHealthFloor(vehicle: VehicleState, floor: number): void {
  if (vehicle.health < floor) {
    vehicle.health = clamp(floor, 0, VEHICLE_LIMITS.MAX_HEALTH);
  }
}

export function resetWear(vehicle: VehicleState): void {
  vehicle.wear = 0;
}

export function setWear(vehicle: VehicleState, wear: number): void {
  vehicle.wear = clamp(wear, 0, VEHICLE_LIMITS.MAX_WEAR);
}

export function applyScaledWear(vehicle: VehicleState, delta: number): void {
  setWear(vehicle, vehicle.wear + delta * vehicle.wearMultiplier);
}

export function setBreakdownCooldown(vehicle: VehicleState, days: number): void {
  vehicle.breakdownCooldown = Math.max(0, Math.floor(days));
}

export function tickBreakdownCooldown(vehicle: VehicleState): void {
  if (vehicle.breakdownCooldown > 0) vehicle.breakdownCooldown -= 1;
}

export function breakdownSuppressed(vehicle: VehicleState): boolean {
  return vehicle.breakdownCooldown > 0;
}

export function setWearMultiplier(vehicle: VehicleState, multiplier: number): void {
  vehicle.wearMultiplier = Number.isFinite(multiplier) ? Math.max(0, multiplier) : 1;
}

export function clearWearMultiplier(vehicle: VehicleState): void {
  vehicle.wearMultiplier = 1;
}

// ── Wear and breakdown odds ──────────────────────────────────────

/**
 * Wear added by one day on the road, before the vehicle's own wear
 * multiplier. Long journeys past the comfort distance wear faster.
 */
export function computeDailyWear(state: GameState, cfg: JourneyConfig): number {
  const wear = cfg.wear;
  const paceFactor = cfg.breakdown.paceFactor[state.pace];
  const weatherFactor = cfg.breakdown.weatherFactor[state.weather.today];
  const comfort = Math.max(1, wear.comfortMiles);
  const fatigue = 1 + wear.fatigueK * Math.max(0, (state.milesTraveled - comfort) / comfort);
  const malnutrition = 1 + wear.malnutritionK * state.health.malnutritionLevel;
  return wear.base * paceFactor * weatherFactor * fatigue * malnutrition;
}

export function applyTravelWear(state: GameState, cfg: JourneyConfig): number {
  const delta = computeDailyWear(state, cfg);
  applyScaledWear(state.vehicle, delta);
  return delta * state.vehicle.wearMultiplier;
}

/** Probability that a breakdown starts today. */
export function breakdownChance(
  state: GameState,
  cfg: JourneyConfig,
  extraBonus: number = 0
): number {
  const b = cfg.breakdown;
  const today = state.weather.today;
  let chance =
    b.base *
    (1 + b.beta * state.vehicle.wear) *
    b.paceFactor[state.pace] *
    b.weatherFactor[today];
  if (isExtreme(today)) chance += b.extremeBonus;
  if (isCritical(state.vehicle, cfg.wear.criticalHealth)) chance += b.criticalBonus;
  chance += extraBonus;
  if (state.endgame.active) chance *= state.endgame.breakdownScale;
  return clamp(chance, 0, 1);
}

export function pickBreakdownPart(
  weights: Record<Part, number>,
  rng: RandomSource
): Part | null {
  return weightedPick(
    PART_ORDER.map((part) => [part, weights[part]] as const),
    rng
  );
}

/**
 * Roll for a new breakdown. Returns the breakdown when one starts; the
 * vehicle takes its health and wear hit immediately.
 */
export function rollBreakdown(
  state: GameState,
  cfg: JourneyConfig,
  rng: RandomSource,
  extraBonus: number = 0
): Breakdown | null {
  if (state.breakdown !== null || breakdownSuppressed(state.vehicle)) {
    return null;
  }
  const chance = breakdownChance(state, cfg, extraBonus);
  if (!rng.chance(chance)) return null;

  const part = pickBreakdownPart(cfg.breakdown.partWeights, rng) ?? 'tire';
  const breakdown: Breakdown = { part, dayStarted: state.day };
  state.breakdown = breakdown;
  state.vehicleBreakdowns += 1;
  applyDamage(state.vehicle, cfg.wear.breakdownHealthCost);
  setWear(state.vehicle, state.vehicle.wear + cfg.wear.breakdownWear[state.mode]);
  state.health.lastDamage = 'vehicle';
  return breakdown;
}

// ── Resolution ───────────────────────────────────────────────────

export type BreakdownResolution =
  | { type: 'spare'; part: Part }
  | { type: 'any_spare'; part: Part }
  | { type: 'emergency'; costCents: number }
  | { type: 'jury_rig' }
  | { type: 'blocked' }
  | { type: 'none' };

export function totalSpares(state: GameState): number {
  let total = 0;
  for (const part of PART_ORDER) total += state.inventory.spares[part];
  return total;
}

export function consumeSpare(state: GameState, part: Part): boolean {
  if (state.inventory.spares[part] <= 0) return false;
  state.inventory.spares[part] -= 1;
  return true;
}

/** Use the first spare on hand of any kind. Returns the part used. */
export function consumeAnySpare(state: GameState): Part | null {
  for (const part of PART_ORDER) {
    if (consumeSpare(state, part)) return part;
  }
  return null;
}

/** Emergency roadside repair paid from the budget. */
export function emergencyRepair(state: GameState, cfg: JourneyConfig): boolean {
  const cost = cfg.breakdown.emergencyCostCents;
  if (state.budgetCents < cost) return false;
  state.budgetCents -= cost;
  repairVehicle(state.vehicle, cfg.breakdown.emergencyHeal);
  state.breakdown = null;
  return true;
}

function clearBreakdown(state: GameState, cfg: JourneyConfig): void {
  state.breakdown = null;
  setBreakdownCooldown(state.vehicle, cfg.breakdown.cooldownDays);
}

/**
 * Try to clear the live breakdown: a matching spare, then any spare,
 * then an emergency repair from the budget, then a jury-rig once the
 * breakdown has stalled the party for a full day.
 */
export function resolveBreakdown(state: GameState, cfg: JourneyConfig): BreakdownResolution {
  const breakdown = state.breakdown;
  if (breakdown === null) return { type: 'none' };

  if (consumeSpare(state, breakdown.part)) {
    repairVehicle(state.vehicle, cfg.breakdown.spareHeal);
    clearBreakdown(state, cfg);
    return { type: 'spare', part: breakdown.part };
  }

  const substitute = consumeAnySpare(state);
  if (substitute !== null) {
    repairVehicle(state.vehicle, cfg.breakdown.spareHeal);
    clearBreakdown(state, cfg);
    return { type: 'any_spare', part: substitute };
  }

  if (emergencyRepair(state, cfg)) {
    clearBreakdown(state, cfg);
    return { type: 'emergency', costCents: cfg.breakdown.emergencyCostCents };
  }

  if (state.day - breakdown.dayStarted >= cfg.breakdown.juryRigDelayDays) {
    applyDamage(state.vehicle, cfg.breakdown.juryRigDamage);
    clearBreakdown(state, cfg);
    return { type: 'jury_rig' };
  }

  return { type: 'blocked' };
}
