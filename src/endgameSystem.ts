import type { EndgamePolicyKey, EndgameState, GameState, Part, PolicyKind } from './models';
import type {
  EndgameConfig,
  EndgamePolicyConfig,
  JourneyConfig,
  ResourcePriority,
} from './models/config';
import { clamp } from './numbers';
import { addDayReasonTag, recordTravelDay, resetTodayProgress } from './dayAccounting';
import {
  breakdownSuppressed,
  consumeAnySpare,
  consumeSpare,
  emergencyRepair,
  ensureHealthFloor,
  resetWear,
  setBreakdownCooldown,
  setWear,
  setWearMultiplier,
} from './vehicleSystem';

/**
 * Endgame Controller
 *
 * Deep runs that make it close to the destination get a safety net: the
 * first breakdown past the activation milepost is fixed in the field, and
 * a failure guard keeps a wrecked vehicle limping on until the guard
 * milepost instead of ending the run.
 */

export function createEndgameState(): EndgameState {
  return {
    enabled: false,
    active: false,
    policyKey: null,
    fieldRepairUsed: false,
    wearResetUsed: false,
    guardTriggers: 0,
    travelBias: 1,
    breakdownScale: 1,
    partialRatio: 0,
  };
}

/** Policy table key for a deep run. monte_carlo plays like resource_manager. */
export function policyKeyFor(policy: PolicyKind): EndgamePolicyKey {
  switch (policy) {
    case 'balanced':
      return 'deep_balanced';
    case 'aggressive':
      return 'deep_aggressive';
    case 'conservative':
      return 'deep_conservative';
    case 'resource_manager':
    case 'monte_carlo':
      return 'deep_resource_manager';
  }
}

function policyFor(state: GameState, cfg: EndgameConfig): EndgamePolicyConfig | null {
  if (!cfg.enabled || state.mode !== 'deep') return null;
  return cfg.policies[policyKeyFor(state.policy)];
}

function configure(endgame: EndgameState, key: EndgamePolicyKey, policy: EndgamePolicyConfig): void {
  endgame.enabled = true;
  endgame.active = true;
  endgame.policyKey = key;
  endgame.fieldRepairUsed = false;
  endgame.wearResetUsed = false;
  endgame.travelBias = Math.max(policy.travelBias, 1);
  endgame.breakdownScale = clamp(policy.breakdownScale, 0, 1);
  endgame.partialRatio = policy.partialRatio;
}

/** Health floor first, then wear reset to zero or pinned to a fixed value. */
export function applyVehicleStabilizers(state: GameState, healthFloor: number, wearReset: number): void {
  if (healthFloor > 0) ensureHealthFloor(state.vehicle, healthFloor);
  if (wearReset <= 0) {
    resetWear(state.vehicle);
  } else {
    setWear(state.vehicle, wearReset);
  }
}

function applyPolicyAftercare(state: GameState, policy: EndgamePolicyConfig): void {
  if (policy.cooldownDays > 0) setBreakdownCooldown(state.vehicle, policy.cooldownDays);
  if (policy.wearMultiplier >= 0) setWearMultiplier(state.vehicle, policy.wearMultiplier);
}

// ── Controller ───────────────────────────────────────────────────

export interface EndgameTickResult {
  activated: boolean;
  active: boolean;
}

/**
 * Run after the day's travel is recorded. Activates the endgame at the
 * policy milepost and tags active days.
 */
export function runEndgameController(state: GameState, cfg: EndgameConfig): EndgameTickResult {
  const policy = policyFor(state, cfg);
  if (policy === null) return { activated: false, active: false };

  let activated = false;
  if (!state.endgame.active && state.milesTraveled >= policy.miStart) {
    configure(state.endgame, policyKeyFor(state.policy), policy);
    addDayReasonTag(state, 'endgame_activate');
    activated = true;
  }
  if (!state.endgame.active) return { activated, active: false };

  addDayReasonTag(state, 'endgame_active');
  if (breakdownSuppressed(state.vehicle)) addDayReasonTag(state, 'endgame_cooldown');
  return { activated, active: true };
}

// ── Field repair ─────────────────────────────────────────────────

export type FieldRepairSource = ResourcePriority | 'improvised';

export type EndgameBreakdownOutcome =
  | { type: 'field_repair'; source: FieldRepairSource; part: Part | null; miles: number }
  | { type: 'wear_reset' }
  | { type: 'none' };

function tryResource(
  state: GameState,
  journey: JourneyConfig,
  resource: ResourcePriority,
  broken: Part
): Part | null | false {
  switch (resource) {
    case 'matching_spare':
      return consumeSpare(state, broken) ? broken : false;
    case 'any_spare':
      return consumeAnySpare(state) ?? false;
    case 'emergency':
      return emergencyRepair(state, journey) ? null : false;
  }
}

/** Miles credited to a field-repair day. */
export function fieldRepairMiles(computedMiles: number, ratio: number): number {
  if (computedMiles <= 0) return 0;
  const partial = clamp(computedMiles * ratio, 0, computedMiles);
  return Math.max(partial, Math.min(1, computedMiles));
}

/**
 * Handle a breakdown that started while the endgame is active. The first
 * one is repaired on the spot and the day becomes partial travel; a later
 * one gets the policy's one-time wear reset and is left to the regular
 * repair chain.
 */
export function handleEndgameBreakdown(
  state: GameState,
  cfg: EndgameConfig,
  journey: JourneyConfig,
  computedMiles: number
): EndgameBreakdownOutcome {
  const policy = policyFor(state, cfg);
  const breakdown = state.breakdown;
  if (policy === null || !state.endgame.active || breakdown === null) return { type: 'none' };

  if (!state.endgame.fieldRepairUsed) {
    let source: FieldRepairSource = 'improvised';
    let part: Part | null = null;
    for (const resource of [...policy.resourcePriority, 'emergency' as const]) {
      const used = tryResource(state, journey, resource, breakdown.part);
      if (used !== false) {
        source = resource;
        part = used;
        break;
      }
    }

    applyVehicleStabilizers(state, policy.healthFloor, policy.wearReset);
    applyPolicyAftercare(state, policy);
    state.breakdown = null;
    state.endgame.fieldRepairUsed = true;

    const miles = fieldRepairMiles(computedMiles, policy.partialRatio);
    resetTodayProgress(state);
    const recorded = recordTravelDay(state, journey, 'partial', miles, 'field_repair');
    state.today.distanceToday = computedMiles;
    state.today.partialDistanceToday = miles;
    return { type: 'field_repair', source, part, miles: recorded.miles };
  }

  if (!state.endgame.wearResetUsed && policy.wearReset > 0) {
    applyVehicleStabilizers(state, 0, policy.wearReset);
    state.endgame.wearResetUsed = true;
    return { type: 'wear_reset' };
  }

  return { type: 'none' };
}

// ── Failure guard ────────────────────────────────────────────────

/**
 * Keep a dead vehicle running until the guard milepost. Returns true when
 * the guard fired; the party is then forced to rest.
 */
export function enforceFailureGuard(state: GameState, cfg: EndgameConfig): boolean {
  const policy = policyFor(state, cfg);
  if (policy === null || !state.endgame.active) return false;
  if (state.milesTraveled >= policy.failureGuardMiles) return false;
  if (state.vehicle.health > 0) return false;

  applyVehicleStabilizers(state, policy.healthFloor, policy.wearReset);
  applyPolicyAftercare(state, policy);
  state.endgame.guardTriggers += 1;
  addDayReasonTag(state, 'endgame_guard');
  state.restRequested = true;
  return true;
}
