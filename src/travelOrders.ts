import type { GameState, Stats, TravelOrderId, TravelOrderState } from './models';
import type { RandomSource } from './rng';
import { clamp } from './numbers';
import { applyStatDeltas, hasTag } from './party';

/**
 * Travel Orders
 *
 * Short-lived restrictions announced along the route: fuel rationing,
 * road closures, curfews and the like. At most one is in force at a time;
 * each applies its effects every day it lasts, and a quiet spell follows
 * before the next can be announced.
 */

export const TRAVEL_ORDER_IDS: readonly TravelOrderId[] = [
  'fuel_rationing',
  'road_closures',
  'curfew',
  'toll_hike',
  'supply_strike',
  'inspection_drive',
];

export const TRAVEL_ORDER_CONSTANTS = {
  DAILY_CHANCE: 0.06,
  MIN_DURATION: 2,
  MAX_DURATION: 4,
  MIN_COOLDOWN: 6,
  MAX_COOLDOWN: 9,
  /** Speed multiplier while roads are closed */
  CLOSURE_SPEED: 0.88,
  INSPECTION_BREAKDOWN_BONUS: 0.1,
  TRAVEL_MULTIPLIER_MIN: 0.72,
  BREAKDOWN_BONUS_MAX: 0.2,
  /** Morale below which a curfew costs sanity */
  CURFEW_MORALE: 7,
  CURFEW_ENCOUNTER_DELTA: -0.03,
  INSPECTION_ENCOUNTER_DELTA: 0.03,
};

export function createTravelOrderState(): TravelOrderState {
  return {
    active: null,
    daysRemaining: 0,
    cooldown: 0,
    travelMultiplier: 1,
    breakdownBonus: 0,
    encounterDelta: 0,
  };
}

export type TravelOrderResult =
  | { type: 'none' }
  | { type: 'started'; order: TravelOrderId; days: number }
  | { type: 'continued'; order: TravelOrderId; daysRemaining: number }
  | { type: 'ended'; order: TravelOrderId; cooldown: number };

function applyOrderEffects(state: GameState, order: TravelOrderId): void {
  const orders = state.travelOrder;
  const deltas: Partial<Stats> = {};
  switch (order) {
    case 'fuel_rationing':
      deltas.morale = -1;
      deltas.supplies = -1;
      break;
    case 'road_closures':
      deltas.sanity = -1;
      orders.travelMultiplier *= TRAVEL_ORDER_CONSTANTS.CLOSURE_SPEED;
      break;
    case 'curfew':
      if (state.stats.morale < TRAVEL_ORDER_CONSTANTS.CURFEW_MORALE) deltas.sanity = -1;
      orders.encounterDelta += TRAVEL_ORDER_CONSTANTS.CURFEW_ENCOUNTER_DELTA;
      break;
    case 'toll_hike':
      if (!hasTag(state, 'legal_fund')) deltas.supplies = -1;
      break;
    case 'supply_strike':
      deltas.morale = -1;
      break;
    case 'inspection_drive':
      orders.breakdownBonus += TRAVEL_ORDER_CONSTANTS.INSPECTION_BREAKDOWN_BONUS;
      orders.encounterDelta += TRAVEL_ORDER_CONSTANTS.INSPECTION_ENCOUNTER_DELTA;
      break;
  }
  orders.travelMultiplier = clamp(
    orders.travelMultiplier,
    TRAVEL_ORDER_CONSTANTS.TRAVEL_MULTIPLIER_MIN,
    1
  );
  orders.breakdownBonus = clamp(orders.breakdownBonus, 0, TRAVEL_ORDER_CONSTANTS.BREAKDOWN_BONUS_MAX);
  applyStatDeltas(state.stats, deltas);
}

/**
 * Daily travel order step, drawing from the events stream. Today's
 * modifiers are rebuilt from scratch.
 */
export function tickTravelOrders(state: GameState, rng: RandomSource): TravelOrderResult {
  const orders = state.travelOrder;
  orders.travelMultiplier = 1;
  orders.breakdownBonus = 0;
  orders.encounterDelta = 0;

  const current = orders.active;
  if (current !== null) {
    applyOrderEffects(state, current);
    if (orders.daysRemaining > 0) orders.daysRemaining -= 1;
    if (orders.daysRemaining === 0) {
      orders.active = null;
      orders.cooldown = rng.range(
        TRAVEL_ORDER_CONSTANTS.MIN_COOLDOWN,
        TRAVEL_ORDER_CONSTANTS.MAX_COOLDOWN
      );
      return { type: 'ended', order: current, cooldown: orders.cooldown };
    }
    return { type: 'continued', order: current, daysRemaining: orders.daysRemaining };
  }

  if (orders.cooldown > 0) {
    orders.cooldown -= 1;
    return { type: 'none' };
  }

  if (rng.next() >= TRAVEL_ORDER_CONSTANTS.DAILY_CHANCE) return { type: 'none' };

  const order = TRAVEL_ORDER_IDS[rng.int(TRAVEL_ORDER_IDS.length)] ?? 'fuel_rationing';
  const days = rng.range(TRAVEL_ORDER_CONSTANTS.MIN_DURATION, TRAVEL_ORDER_CONSTANTS.MAX_DURATION);
  orders.active = order;
  orders.daysRemaining = days;
  applyOrderEffects(state, order);
  orders.daysRemaining -= 1;
  return { type: 'started', order, days };
}
