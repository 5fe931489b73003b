import type { CampState, DietId, GameState, Part, Stats } from './models';
import type { CampConfig, JourneyConfig, PacingConfig } from './models/config';
import { clamp } from './numbers';
import { applyStatDeltas } from './party';
import { weightedPick, type RandomSource } from './rng';
import { recordTravelDay } from './dayAccounting';
import { consumeSpare, repairVehicle, setBreakdownCooldown } from './vehicleSystem';

/**
 * Camp System
 *
 * Camping trades a day of travel for recovery. Every action here consumes
 * the day as a stop (which the day ledger may still demote to partial
 * travel). Actions that cannot be taken leave the state untouched.
 */

export type CampAction = 'rest' | 'forage' | 'therapy' | 'repair_spare' | 'repair_hack';

export type ForageFind = 'supplies' | 'none' | 'receipt';

export type CampResult =
  | {
      ok: true;
      action: CampAction;
      logKey: string;
      deltas: Partial<Stats>;
      find?: ForageFind;
      part?: Part;
    }
  | { ok: false; action: CampAction; reason: string };

export function createCampState(): CampState {
  return { restCooldown: 0, therapyCooldown: 0, repairCooldown: 0 };
}

export function tickCampCooldowns(camp: CampState): void {
  if (camp.restCooldown > 0) camp.restCooldown -= 1;
  if (camp.therapyCooldown > 0) camp.therapyCooldown -= 1;
  if (camp.repairCooldown > 0) camp.repairCooldown -= 1;
}

function fail(action: CampAction, reason: string): CampResult {
  return { ok: false, action, reason };
}

function spendDay(state: GameState, journey: JourneyConfig, tag: 'camp' | 'repair'): void {
  recordTravelDay(state, journey, 'non_travel', 0, tag);
}

// ── Predicates ───────────────────────────────────────────────────

export function canRest(state: GameState): boolean {
  return state.camp.restCooldown === 0;
}

export function canTherapy(state: GameState, cfg: CampConfig): boolean {
  return state.camp.therapyCooldown === 0 && state.receipts >= cfg.therapy.receiptCost;
}

export function canRepairWithSpare(state: GameState): boolean {
  const breakdown = state.breakdown;
  return breakdown !== null && state.inventory.spares[breakdown.part] > 0;
}

export function canHackRepair(state: GameState): boolean {
  return state.breakdown !== null && state.camp.repairCooldown === 0;
}

export function canRepair(state: GameState): boolean {
  return canRepairWithSpare(state) || canHackRepair(state);
}

/** Why an action cannot be taken today, or null when it can. */
export function campBlocker(state: GameState, cfg: CampConfig, action: CampAction): string | null {
  switch (action) {
    case 'rest':
      return canRest(state) ? null : 'rest_cooldown';
    case 'forage':
      return null;
    case 'therapy':
      if (state.camp.therapyCooldown > 0) return 'therapy_cooldown';
      return canTherapy(state, cfg) ? null : 'no_receipts';
    case 'repair_spare':
      if (state.breakdown === null) return 'nothing_broken';
      return canRepairWithSpare(state) ? null : 'no_spare';
    case 'repair_hack':
      if (state.breakdown === null) return 'nothing_broken';
      return canHackRepair(state) ? null : 'repair_cooldown';
  }
}

// ── Actions ──────────────────────────────────────────────────────

export function campRest(state: GameState, cfg: CampConfig, journey: JourneyConfig): CampResult {
  if (!canRest(state)) return fail('rest', 'rest_cooldown');

  const deltas: Partial<Stats> = {
    sanity: cfg.rest.sanity,
    hp: cfg.rest.hp,
    supplies: cfg.rest.supplies,
  };
  applyStatDeltas(state.stats, deltas);
  state.camp.restCooldown = cfg.rest.cooldownDays;
  spendDay(state, journey, 'camp');
  return { ok: true, action: 'rest', logKey: 'log.camp.rest', deltas };
}

/** Receipt weight after the diet's find bonus, capped either way. */
export function receiptWeight(cfg: CampConfig, pacing: PacingConfig, diet: DietId): number {
  const cap = cfg.forage.receiptBonusCapPct;
  const pct = clamp(pacing.diet[diet].receiptFindPctDelta, -cap, cap);
  return Math.max(0, cfg.forage.weights.receipt * (1 + pct / 100));
}

export function campForage(
  state: GameState,
  cfg: CampConfig,
  pacing: PacingConfig,
  journey: JourneyConfig,
  rng: RandomSource
): CampResult {
  const weights = cfg.forage.weights;
  const find =
    weightedPick<ForageFind>(
      [
        ['supplies', weights.supplies],
        ['none', weights.none],
        ['receipt', receiptWeight(cfg, pacing, state.diet)],
      ],
      rng
    ) ?? 'none';

  const deltas: Partial<Stats> = {};
  if (find === 'supplies') {
    deltas.supplies = cfg.forage.suppliesGain;
    applyStatDeltas(state.stats, deltas);
  } else if (find === 'receipt') {
    state.receipts += 1;
  }
  spendDay(state, journey, 'camp');
  return { ok: true, action: 'forage', logKey: `log.camp.forage.${find}`, deltas, find };
}

export function campTherapy(state: GameState, cfg: CampConfig, journey: JourneyConfig): CampResult {
  if (state.camp.therapyCooldown > 0) return fail('therapy', 'therapy_cooldown');
  if (state.receipts < cfg.therapy.receiptCost) return fail('therapy', 'no_receipts');

  const deltas: Partial<Stats> = { sanity: cfg.therapy.sanity };
  state.receipts -= cfg.therapy.receiptCost;
  applyStatDeltas(state.stats, deltas);
  state.camp.therapyCooldown = cfg.therapy.cooldownDays;
  spendDay(state, journey, 'camp');
  return { ok: true, action: 'therapy', logKey: 'log.camp.therapy', deltas };
}

export function campRepairSpare(
  state: GameState,
  cfg: CampConfig,
  journey: JourneyConfig
): CampResult {
  const breakdown = state.breakdown;
  if (breakdown === null) return fail('repair_spare', 'nothing_broken');
  if (!consumeSpare(state, breakdown.part)) return fail('repair_spare', 'no_spare');

  const deltas: Partial<Stats> = { supplies: -cfg.repair.spareSupplies };
  applyStatDeltas(state.stats, deltas);
  repairVehicle(state.vehicle, cfg.repair.spareHeal);
  state.breakdown = null;
  setBreakdownCooldown(state.vehicle, journey.breakdown.cooldownDays);
  spendDay(state, journey, 'repair');
  return { ok: true, action: 'repair_spare', logKey: 'log.camp.repair.spare', deltas, part: breakdown.part };
}

export function campRepairHack(
  state: GameState,
  cfg: CampConfig,
  journey: JourneyConfig
): CampResult {
  const breakdown = state.breakdown;
  if (breakdown === null) return fail('repair_hack', 'nothing_broken');
  if (state.camp.repairCooldown > 0) return fail('repair_hack', 'repair_cooldown');

  const deltas: Partial<Stats> = {
    supplies: -cfg.repair.hackSupplies,
    credibility: -cfg.repair.hackCredibility,
  };
  applyStatDeltas(state.stats, deltas);
  state.breakdown = null;
  state.camp.repairCooldown = cfg.repair.hackCooldownDays;
  setBreakdownCooldown(state.vehicle, journey.breakdown.cooldownDays);
  spendDay(state, journey, 'repair');
  return { ok: true, action: 'repair_hack', logKey: 'log.camp.repair.hack', deltas, part: breakdown.part };
}
