import type { DayRecord, DietId, Ending, GameState, PaceId } from './models';
import type { GameConfig } from './models/config';
import { clamp } from './numbers';
import { clampStats } from './party';
import { RngBundle } from './rng';
import { dayIndexFor } from './timeSystem';
import {
  beginDay,
  endOfDay,
  recordTravelDay,
  resetTodayProgress,
} from './dayAccounting';
import { processDailyWeather } from './weatherSystem';
import {
  applyTravelWear,
  isCritical,
  resolveBreakdown,
  rollBreakdown,
  tickBreakdownCooldown,
} from './vehicleSystem';
import {
  calculateBribeCost,
  consumePermit,
  crossingEventRng,
  crossingKindAt,
  crossingTypeConfig,
  hasPermit,
  nextCrossingMilestone,
  resolveCrossing,
  type CrossingResult,
} from './crossingResolver';
import {
  enforceFailureGuard,
  handleEndgameBreakdown,
  runEndgameController,
} from './endgameSystem';
import { runBoss, type BossResult } from './bossSystem';
import {
  campBlocker,
  campForage,
  campRepairHack,
  campRepairSpare,
  campRest,
  campTherapy,
  tickCampCooldowns,
  type CampAction,
  type CampResult,
} from './campSystem';
import { applyStarvation, illnessTravelMultiplier, rollDailyIllness } from './healthSystem';
import { tickTravelOrders } from './travelOrders';
import { applyDailyChannels, applyPaceAndDiet } from './dailyEffects';
import {
  encounterChanceToday,
  pickEncounter,
  resolveEncounter,
  startEncounter,
} from './encounterSystem';
import { resultSummary, selectEnding, vitalFailure, type ResultSummary } from './scoring';
import { addLog, journalLineFor } from './logSystem';
import {
  createEventBus,
  severityOf,
  type EventBus,
  type JourneyEvent,
  type RecordedEvent,
} from './gameEvents';

/**
 * Journey Controller
 *
 * Drives a run one day at a time. Each tick runs the daily physics
 * (travel orders, hunger, illness, weather, the daily drain), then either
 * a detour day, a rest day or a travel leg, and finally closes the day
 * into the ledger.
 *
 * The controller holds no run state of its own: everything lives in the
 * GameState, and random draws go through a bundle rebuilt from the
 * state's seed and stream counters on every call. Two controllers given
 * equal states and equal decisions produce equal runs.
 */

export const TRAVEL_CONSTANTS = {
  /** Lowest pace or weather factor before the penalty floor applies */
  MIN_FACTOR: 0.1,
  /** Weather never slows the party below this share of its base factor */
  WEATHER_MULT_FLOOR: 0.9,
  DEEP_BALANCED_BONUS: 1.003,
  MIN_DAILY_MILES: 1,
};

export const LOG_KEYS = {
  ENDED: 'log.journey.ended',
  BOSS_AWAIT: 'log.boss.await',
  ENCOUNTER: 'log.encounter',
  ENCOUNTER_PENDING: 'log.encounter.pending',
  ENCOUNTER_RESOLVED: 'log.encounter.resolved',
  TRAVELED: 'log.traveled',
  TRAVEL_BLOCKED: 'log.travel.blocked',
  REST_CREDIT: 'log.travel.rest_credit',
  DETOUR_DAY: 'log.crossing.detour_day',
  FIELD_REPAIR: 'log.endgame.field_repair',
  CAMP_FAILED: 'log.camp.failed',
} as const;

// ── Results ──────────────────────────────────────────────────────

export interface LegResult {
  ended: boolean;
  logKey: string;
  breakdownStarted: boolean;
}

export interface DayOutcome extends LegResult {
  /** The day the call worked on (the state has moved on when it was consumed). */
  day: number;
  dayConsumed: boolean;
  record: DayRecord | null;
  events: RecordedEvent[];
}

export interface CampOutcome {
  result: CampResult;
  /** Null when the action was refused before the day started. */
  outcome: DayOutcome | null;
}

export interface BossRun {
  result: BossResult;
  ending: Ending;
  events: RecordedEvent[];
}

export function endingLogKey(ending: Ending): string {
  switch (ending.type) {
    case 'collapse':
      return ending.cause === 'panic' ? 'log.pants_emergency' : `log.collapse.${ending.cause}`;
    case 'sanity_loss':
      return 'log.sanity_collapse';
    case 'vehicle_failure':
      return 'log.vehicle_failure';
    case 'exposure':
      return `log.exposure.${ending.kind}`;
    case 'boss_vote_failed':
    case 'boss_victory':
      return `log.${ending.type}`;
  }
}

// ── Distance ─────────────────────────────────────────────────────

/** Miles a full travel day covers given pace, weather and the party's condition. */
export function computeDailyDistance(state: GameState, cfg: GameConfig): number {
  const travel = cfg.journey.travel;
  const pace = Math.max(
    travel.paceFactor[state.pace] * cfg.pacing.pace[state.pace].distanceMult,
    TRAVEL_CONSTANTS.MIN_FACTOR
  );
  const weather = Math.max(
    travel.weatherFactor[state.weather.today] *
      Math.max(state.weatherEffects.travelMultiplier, TRAVEL_CONSTANTS.WEATHER_MULT_FLOOR),
    TRAVEL_CONSTANTS.MIN_FACTOR
  );

  let miles = travel.mpdBase * Math.max(pace * weather, travel.penaltyFloor);
  if (state.mode === 'deep' && state.policy === 'balanced') {
    miles *= TRAVEL_CONSTANTS.DEEP_BALANCED_BONUS;
  }
  if (isCritical(state.vehicle, cfg.journey.wear.criticalHealth)) {
    miles *= travel.criticalMultiplier;
  }
  miles *= Math.max(
    1 - travel.malnutritionPenalty * state.health.malnutritionLevel,
    travel.malnutritionFloor
  );
  miles *= state.travelOrder.travelMultiplier;
  miles *= illnessTravelMultiplier(state.health, travel.illnessMultiplier);
  if (state.endgame.active) miles *= state.endgame.travelBias;

  return Math.max(clamp(miles, travel.mpdMin, travel.mpdMax), TRAVEL_CONSTANTS.MIN_DAILY_MILES);
}

/** Miles for a day cut short. The endgame's own ratio wins while it is active. */
export function partialDistance(state: GameState, cfg: GameConfig, distance: number): number {
  const ratio =
    state.endgame.active && state.endgame.partialRatio > 0
      ? state.endgame.partialRatio
      : cfg.journey.travel.partialRatio;
  return Math.max(distance * ratio, TRAVEL_CONSTANTS.MIN_DAILY_MILES);
}

// ── Controller ───────────────────────────────────────────────────

export class JourneyController {
  private buffer: RecordedEvent[] = [];
  private seqDay = 0;
  private seq = 0;

  constructor(
    readonly config: GameConfig,
    readonly bus: EventBus = createEventBus()
  ) {}

  /** Events recorded since the last drain, in emission order. */
  drainEvents(): RecordedEvent[] {
    const events = this.buffer;
    this.buffer = [];
    return events;
  }

  // ── Decisions ──

  setPace(state: GameState, pace: PaceId): void {
    state.pace = pace;
  }

  setDiet(state: GameState, diet: DietId): void {
    state.diet = diet;
  }

  /** Offer a bribe at the next crossing (paid only when it is attempted). */
  setBribeIntent(state: GameState, intent: boolean): void {
    state.crossings.bribeIntent = intent;
  }

  result(state: GameState): ResultSummary {
    return resultSummary(state, this.config.result);
  }

  // ── Day tick ──

  /**
   * Simulate one day. Refuses to start a day (dayConsumed false) while the
   * run is over, an encounter waits for a choice or the boss waits.
   */
  tickDay(state: GameState): DayOutcome {
    const day = state.day;
    const before = state.dayRecords.length;
    const gate = this.gate(state);
    if (gate !== null) return this.outcome(state, day, gate, before);

    this.applyDailyPhysics(state);
    if (this.checkFailure(state) !== null) {
      return this.outcome(state, day, this.endRun(state, false), before);
    }
    if (state.crossings.detourDaysPending > 0) {
      return this.outcome(state, day, this.detourDay(state), before);
    }
    if (state.restRequested) {
      return this.outcome(state, day, this.restDay(state), before);
    }
    return this.outcome(state, day, this.travelNextLeg(state), before);
  }

  /**
   * Start-of-day effects. Runs at most once per day; returns false when the
   * day was already initialized.
   */
  applyDailyPhysics(state: GameState): boolean {
    if (state.today.dayInitialized) return false;
    const { journey, weather, pacing } = this.config;
    const rng = this.rngFor(state);

    beginDay(state);
    tickBreakdownCooldown(state.vehicle);
    tickCampCooldowns(state.camp);

    const order = tickTravelOrders(state, rng.stream('events'));
    if (order.type === 'started') {
      this.record(state, { type: 'travel_order', stage: 'started', order: order.order, days: order.days });
    } else if (order.type === 'ended') {
      this.record(state, { type: 'travel_order', stage: 'ended', order: order.order, days: 0 });
    }

    const starvation = applyStarvation(state);
    if (starvation.type === 'relief') {
      this.record(state, { type: 'starvation', stage: 'relief', days: 0 });
    } else if (starvation.type !== 'fed') {
      this.record(state, { type: 'starvation', stage: starvation.type, days: starvation.days });
    }

    const illness = rollDailyIllness(state, rng.stream('health'));
    switch (illness.type) {
      case 'onset':
        this.record(state, { type: 'illness', stage: 'onset', daysRemaining: illness.days });
        break;
      case 'sick':
        this.record(state, { type: 'illness', stage: 'sick', daysRemaining: illness.daysRemaining });
        break;
      case 'recovered':
        this.record(state, { type: 'illness', stage: 'recovered', daysRemaining: 0 });
        break;
      case 'healthy':
        break;
    }

    const daily = processDailyWeather(state, weather, rng.stream('weather'));
    if (daily.error !== undefined) {
      this.record(state, { type: 'weather_fallback', kept: daily.weather, reason: daily.error });
    } else if (daily.changed) {
      this.record(state, {
        type: 'weather_changed',
        weather: daily.weather,
        previous: state.weather.yesterday,
        mitigated: daily.effects.mitigated,
      });
    }
    if (daily.exposure !== null) {
      this.record(state, {
        type: 'exposure',
        kind: daily.exposure.kind,
        hpDamage: daily.exposure.hpDamage,
        sanityLoss: daily.exposure.sanityLoss,
      });
    }

    applyDailyChannels(state, journey);
    applyPaceAndDiet(state, pacing, weather);
    clampStats(state.stats);
    return true;
  }

  /**
   * One travel leg: breakdown roll and repair, then an encounter, a
   * crossing or a plain day on the road.
   */
  travelNextLeg(state: GameState): LegResult {
    const gate = this.gate(state);
    if (gate !== null) return gate;

    this.applyDailyPhysics(state);
    if (this.checkFailure(state) !== null) return this.endRun(state, false);

    const { journey, endgame } = this.config;
    const rng = this.rngFor(state);
    const distance = computeDailyDistance(state, this.config);

    const started = rollBreakdown(
      state,
      journey,
      rng.stream('breakdown'),
      state.travelOrder.breakdownBonus
    );
    const breakdownStarted = started !== null;
    if (started !== null) {
      this.record(
        state,
        { type: 'breakdown_started', part: started.part, vehicleHealth: state.vehicle.health },
        'log.breakdown'
      );
      if (state.endgame.active) {
        const handled = handleEndgameBreakdown(state, endgame, journey, distance);
        if (handled.type === 'field_repair') {
          this.record(
            state,
            { type: 'field_repair', source: handled.source, part: handled.part, miles: handled.miles },
            LOG_KEYS.FIELD_REPAIR
          );
          return this.finishLeg(state, LOG_KEYS.FIELD_REPAIR, breakdownStarted);
        }
      }
    }

    if (state.breakdown !== null) {
      const part = state.breakdown.part;
      const resolution = resolveBreakdown(state, journey);
      switch (resolution.type) {
        case 'spare':
        case 'any_spare':
          this.record(state, { type: 'breakdown_resolved', part, method: resolution.type, usedPart: resolution.part });
          break;
        case 'emergency':
        case 'jury_rig':
          this.record(state, { type: 'breakdown_resolved', part, method: resolution.type, usedPart: null });
          break;
        case 'blocked':
        case 'none':
          break;
      }
    }

    if (this.checkFailure(state) !== null) return this.endRun(state, breakdownStarted);

    if (state.breakdown !== null) {
      const credit =
        state.today.kind === 'partial'
          ? 0
          : this.applyPartialCredit(state, journey.travel.delayCreditMiles, 'repair');
      this.record(
        state,
        { type: 'travel_blocked', part: state.breakdown.part, creditMiles: credit },
        LOG_KEYS.TRAVEL_BLOCKED
      );
      return this.finishLeg(state, LOG_KEYS.TRAVEL_BLOCKED, breakdownStarted);
    }

    if (this.startEncounterLeg(state, distance)) {
      return { ended: false, logKey: LOG_KEYS.ENCOUNTER, breakdownStarted };
    }

    const milestone = nextCrossingMilestone(state, this.config.crossings);
    if (milestone !== null && state.milesTraveled + distance >= milestone) {
      return this.crossingLeg(state, distance, breakdownStarted);
    }

    state.today.distanceToday = distance;
    recordTravelDay(state, journey, 'travel', distance);
    applyTravelWear(state, journey);
    return this.finishLeg(state, LOG_KEYS.TRAVELED, breakdownStarted);
  }

  // ── Player choices that close a day ──

  /**
   * Answer the pending encounter and close its day. Returns null (and
   * changes nothing) when nothing is pending or the choice is invalid.
   */
  resolveEncounter(state: GameState, choiceIndex: number): DayOutcome | null {
    const day = state.day;
    const before = state.dayRecords.length;
    const resolution = resolveEncounter(state, this.config.encounters, this.config.journey, choiceIndex);
    if (resolution === null) return null;

    this.record(
      state,
      {
        type: 'encounter_resolved',
        encounterId: resolution.encounter.id,
        choice: resolution.choice.label,
        bonusMiles: resolution.bonusMiles,
      },
      LOG_KEYS.ENCOUNTER_RESOLVED
    );
    return this.outcome(state, day, this.finishLeg(state, LOG_KEYS.ENCOUNTER_RESOLVED, false), before);
  }

  /** Spend today in camp. A refused action leaves the state untouched. */
  camp(state: GameState, action: CampAction): CampOutcome {
    const refuse = (reason: string): CampOutcome => ({ result: { ok: false, action, reason }, outcome: null });
    if (state.ending !== null) return refuse('journey_ended');
    if (state.encounters.pending !== null) return refuse('encounter_pending');
    if (state.bossReady && !state.bossAttempted) return refuse('boss_ready');
    const blocker = campBlocker(state, this.config.camp, action);
    if (blocker !== null) return refuse(blocker);

    const day = state.day;
    const before = state.dayRecords.length;
    this.applyDailyPhysics(state);
    if (this.checkFailure(state) !== null) {
      return {
        result: { ok: false, action, reason: 'journey_ended' },
        outcome: this.outcome(state, day, this.endRun(state, false), before),
      };
    }

    const result = this.runCampAction(state, action);
    if (result.ok) {
      this.record(state, { type: 'camp_action', action, find: result.find }, result.logKey);
      if ((action === 'repair_spare' || action === 'repair_hack') && result.part !== undefined) {
        this.record(state, {
          type: 'breakdown_resolved',
          part: result.part,
          method: action === 'repair_spare' ? 'camp_spare' : 'camp_hack',
          usedPart: action === 'repair_spare' ? result.part : null,
        });
      }
      if (action === 'rest') state.restRequested = false;
    }
    const leg = this.finishLeg(state, result.ok ? result.logKey : LOG_KEYS.CAMP_FAILED, false);
    return { result, outcome: this.outcome(state, day, leg, before) };
  }

  /** Play the final confrontation once the trail's end is reached. */
  runBoss(state: GameState): BossRun | null {
    if (!state.bossReady || state.bossAttempted || state.ending !== null) return null;

    const result = runBoss(state, this.config.boss, this.config.result, this.rngFor(state).stream('boss'));
    const ending = selectEnding(state);
    state.ending = ending;
    this.record(state, { type: 'boss_resolved', outcome: result.outcome, chance: result.chance }, `log.boss.${result.outcome}`);
    this.record(state, { type: 'journey_ended', ending }, endingLogKey(ending));
    return { result, ending, events: this.drainEvents() };
  }

  // ── Phases ──

  private gate(state: GameState): LegResult | null {
    if (state.ending !== null) {
      return { ended: true, logKey: LOG_KEYS.ENDED, breakdownStarted: false };
    }
    if (state.encounters.pending !== null) {
      return { ended: false, logKey: LOG_KEYS.ENCOUNTER_PENDING, breakdownStarted: false };
    }
    if (state.bossReady && !state.bossAttempted) {
      return { ended: false, logKey: LOG_KEYS.BOSS_AWAIT, breakdownStarted: false };
    }
    return null;
  }

  private detourDay(state: GameState): LegResult {
    const { journey } = this.config;
    state.crossings.detourDaysPending -= 1;
    const distance = computeDailyDistance(state, this.config);
    state.today.distanceToday = distance;
    const recorded = recordTravelDay(state, journey, 'partial', partialDistance(state, this.config, distance), 'detour');
    state.today.partialDistanceToday = recorded.miles;
    applyTravelWear(state, journey);
    this.record(
      state,
      { type: 'detour_day', miles: recorded.miles, daysRemaining: state.crossings.detourDaysPending },
      LOG_KEYS.DETOUR_DAY
    );
    return this.finishLeg(state, LOG_KEYS.DETOUR_DAY, false);
  }

  private restDay(state: GameState): LegResult {
    state.restRequested = false;
    const credit = this.applyPartialCredit(state, this.config.journey.travel.restCreditMiles, 'camp');
    this.record(state, { type: 'rest_day', creditMiles: credit }, LOG_KEYS.REST_CREDIT);
    return this.finishLeg(state, LOG_KEYS.REST_CREDIT, false);
  }

  /** Roll today's encounter. On a hit the party covers the partial distance and waits. */
  private startEncounterLeg(state: GameState, distance: number): boolean {
    if (state.today.encounterRolled) return false;
    state.today.encounterRolled = true;

    const { journey, pacing, weather, encounters } = this.config;
    const rng = this.rngFor(state).stream('encounter');
    if (!rng.chance(encounterChanceToday(state, journey, pacing, weather))) return false;
    const encounter = pickEncounter(state, encounters, journey, rng);
    if (encounter === null) return false;

    startEncounter(state, encounter, journey);
    state.today.distanceToday = distance;
    const recorded = recordTravelDay(state, journey, 'partial', partialDistance(state, this.config, distance));
    state.today.partialDistanceToday = recorded.miles;
    applyTravelWear(state, journey);
    this.record(
      state,
      { type: 'encounter_started', encounterId: encounter.id, name: encounter.name },
      LOG_KEYS.ENCOUNTER
    );
    return true;
  }

  private crossingLeg(state: GameState, distance: number, breakdownStarted: boolean): LegResult {
    const { crossings: cfg, journey } = this.config;
    const crossings = state.crossings;
    const index = crossings.resolved;
    const type = crossingTypeConfig(cfg, crossingKindAt(cfg, index));
    const dayIndex = dayIndexFor(state.day);

    const permit = hasPermit(state, cfg);
    const bribeCost = calculateBribeCost(type.bribe.baseCostCents, crossings.bribeDiscountPct);
    const offerBribe = crossings.bribeIntent && !permit && state.budgetCents >= bribeCost;
    const outcome = resolveCrossing(
      {
        policy: state.policy,
        mode: state.mode,
        hasPermit: permit,
        bribeIntent: offerBribe,
        crossingIndex: index,
        dayIndex,
      },
      crossingEventRng(state.seed, index, dayIndex)
    );
    crossings.resolved += 1;

    if (outcome.usedPermit) {
      consumePermit(state, cfg);
      crossings.permitsUsed += 1;
      state.stats.credibility += cfg.permitCredibility;
    }
    if (outcome.bribeAttempted) {
      state.budgetCents -= bribeCost;
      crossings.bribesPaid += 1;
      if (!outcome.bribeSucceeded) state.stats.pants += type.bribe.onFailPants;
    }

    state.today.distanceToday = distance;
    const partial = partialDistance(state, this.config, distance);
    let result: CrossingResult = outcome.result;
    switch (outcome.result.type) {
      case 'pass':
        recordTravelDay(state, journey, 'partial', partial, 'crossing_pass');
        applyTravelWear(state, journey);
        break;
      case 'detour': {
        const days = Math.max(outcome.result.days, type.detour.days);
        result = { type: 'detour', days };
        state.stats.supplies += type.detour.supplies;
        state.stats.pants += type.detour.pants;
        crossings.detours += 1;
        crossings.detourDaysPending = days - 1;
        recordTravelDay(state, journey, 'partial', partial, 'detour');
        applyTravelWear(state, journey);
        break;
      }
      case 'terminal_fail':
        state.today.suppressStopRatio = true;
        recordTravelDay(state, journey, 'non_travel', 0, 'crossing_fail');
        state.ending = { type: 'collapse', cause: 'crossing' };
        break;
    }
    clampStats(state.stats);

    const logKey = `log.crossing.${result.type}`;
    this.record(
      state,
      {
        type: 'crossing_resolved',
        index,
        result,
        usedPermit: outcome.usedPermit,
        bribeAttempted: outcome.bribeAttempted,
        bribeSucceeded: outcome.bribeSucceeded,
        bribeCostCents: outcome.bribeAttempted ? bribeCost : 0,
      },
      logKey
    );
    return this.finishLeg(state, logKey, breakdownStarted);
  }

  private runCampAction(state: GameState, action: CampAction): CampResult {
    const { camp, journey, pacing } = this.config;
    switch (action) {
      case 'rest':
        return campRest(state, camp, journey);
      case 'forage':
        return campForage(state, camp, pacing, journey, this.rngFor(state).stream('hunt'));
      case 'therapy':
        return campTherapy(state, camp, journey);
      case 'repair_spare':
        return campRepairSpare(state, camp, journey);
      case 'repair_hack':
        return campRepairHack(state, camp, journey);
    }
  }

  // ── Day bookkeeping ──

  /**
   * Credit a short partial distance (rest or delay). A day already
   * counted as full travel is reset first.
   */
  private applyPartialCredit(state: GameState, miles: number, tag: string): number {
    if (miles <= 0) return 0;
    if (state.today.kind === 'travel') resetTodayProgress(state);
    state.today.distanceToday += miles;
    state.today.partialDistanceToday = Math.max(state.today.partialDistanceToday, miles);
    return recordTravelDay(state, this.config.journey, 'partial', miles, tag).miles;
  }

  /**
   * Vehicle first (the endgame guard may still save it), then panic,
   * sanity and hp. Records the ending on the state.
   */
  private checkFailure(state: GameState): Ending | null {
    if (state.ending !== null) return state.ending;
    if (state.vehicle.health <= 0) {
      if (enforceFailureGuard(state, this.config.endgame)) {
        this.record(
          state,
          { type: 'failure_guard', miles: state.milesTraveled, vehicleHealth: state.vehicle.health },
          'log.endgame.guard'
        );
      } else {
        state.ending = { type: 'vehicle_failure' };
        return state.ending;
      }
    }
    state.ending = vitalFailure(state);
    return state.ending;
  }

  private endRun(state: GameState, breakdownStarted: boolean): LegResult {
    const ending = state.ending ?? selectEnding(state);
    state.ending = ending;
    const logKey = endingLogKey(ending);
    this.record(state, { type: 'journey_ended', ending }, logKey);
    this.closeDay(state);
    return { ended: true, logKey, breakdownStarted };
  }

  private finishLeg(state: GameState, logKey: string, breakdownStarted: boolean): LegResult {
    const endgame = runEndgameController(state, this.config.endgame);
    if (endgame.activated) {
      this.record(state, { type: 'endgame_activated', miles: state.milesTraveled }, 'log.endgame.activated');
    }
    if (this.checkFailure(state) !== null) return this.endRun(state, breakdownStarted);
    this.closeDay(state);
    return { ended: false, logKey, breakdownStarted };
  }

  private closeDay(state: GameState): DayRecord {
    const day = state.day;
    const reachedEnd = state.bossReady && state.today.startMiles < state.trailDistance;
    const record = endOfDay(state, this.config.journey);
    this.record(
      state,
      { type: 'day_ended', kind: record.kind, miles: record.miles, totalMiles: state.milesTraveled, tags: record.tags },
      undefined,
      day
    );
    if (reachedEnd && state.ending === null) {
      this.record(state, { type: 'boss_ready', miles: state.milesTraveled }, 'log.boss.ready', day);
    }
    return record;
  }

  private outcome(state: GameState, day: number, leg: LegResult, recordsBefore: number): DayOutcome {
    const record = state.dayRecords.length > recordsBefore ? (state.dayRecords.at(-1) ?? null) : null;
    return {
      day,
      ended: leg.ended || state.ending !== null,
      logKey: leg.logKey,
      breakdownStarted: leg.breakdownStarted,
      dayConsumed: record !== null,
      record,
      events: this.drainEvents(),
    };
  }

  // ── Events ──

  private record(state: GameState, event: JourneyEvent, logKey?: string, day: number = state.day): void {
    if (day !== this.seqDay) {
      this.seqDay = day;
      this.seq = 0;
    }
    const recorded: RecordedEvent = { id: { day, seq: this.seq }, day, severity: severityOf(event), event };
    this.seq += 1;
    if (logKey !== undefined) recorded.logKey = logKey;
    this.buffer.push(recorded);

    const line = journalLineFor(event);
    if (line !== null) addLog(state.log, day, line.type, line.message, line.meta);
    this.bus.emit(recorded);
  }

  private rngFor(state: GameState): RngBundle {
    return new RngBundle(state.seed, state.rng);
  }
}
