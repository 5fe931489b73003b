import { describe, it, expect, vi } from 'vitest';
import {
  computeDailyDistance,
  endingLogKey,
  JourneyController,
  LOG_KEYS,
  partialDistance,
} from '../gameTick';
import { createEventBus } from '../gameEvents';
import { maxStopsInWindow } from '../dailyLedger';
import { createTestConfig, createTestGameState, playDays } from './testHelpers';

const config = createTestConfig();

describe('computeDailyDistance', () => {
  it('covers the base miles at a steady pace in clear weather', () => {
    expect(computeDailyDistance(createTestGameState(), config)).toBe(13.5);
  });

  it('scales with pace', () => {
    expect(computeDailyDistance(createTestGameState({ pace: 'heated' }), config)).toBeCloseTo(16.2, 10);
  });

  it('combines pace, weather and the deep balanced bonus', () => {
    const state = createTestGameState({ pace: 'blitz' }, { mode: 'deep' });
    state.weather.today = 'storm';
    state.weatherEffects.travelMultiplier = 0.85;
    expect(computeDailyDistance(state, config)).toBeCloseTo(14.683148943750002, 10);
  });

  it('slows a critical vehicle and a sick party', () => {
    const critical = createTestGameState();
    critical.vehicle.health = 10;
    expect(computeDailyDistance(critical, config)).toBe(6.75);

    const sick = createTestGameState();
    sick.health.illnessDaysRemaining = 2;
    expect(computeDailyDistance(sick, config)).toBeCloseTo(11.475, 10);
  });

  it('never drops below the daily minimum', () => {
    const state = createTestGameState();
    state.vehicle.health = 10;
    state.health.malnutritionLevel = 5;
    expect(computeDailyDistance(state, config)).toBe(6);
  });
});

describe('partialDistance', () => {
  it('uses the travel ratio, or the endgame ratio while it is active', () => {
    const state = createTestGameState();
    expect(partialDistance(state, config, 13.5)).toBeCloseTo(6.075, 10);
    state.endgame.active = true;
    state.endgame.partialRatio = 0.5;
    expect(partialDistance(state, config, 13.5)).toBe(6.75);
  });
});

describe('JourneyController', () => {
  it('replays a seed day for day', () => {
    const a = createTestGameState();
    const b = createTestGameState();
    playDays(new JourneyController(config), a, 30);
    playDays(new JourneyController(config), b, 30);
    expect(a.dayRecords.length).toBeGreaterThan(5);
    expect(b.dayRecords).toEqual(a.dayRecords);
    expect(b.rng).toEqual(a.rng);
    expect(b.log).toEqual(a.log);
  });

  it('keeps stops within the cap over every window', () => {
    const controller = new JourneyController(config);
    const state = createTestGameState();
    for (let i = 0; i < 40 && state.ending === null; i++) {
      if (state.encounters.pending !== null) {
        controller.resolveEncounter(state, 0);
      } else if (i % 2 === 0) {
        controller.camp(state, 'rest');
      } else {
        controller.tickDay(state);
      }
    }
    expect(state.dayRecords.length).toBeGreaterThan(5);
    expect(maxStopsInWindow(state.dayRecords, config.journey.days.historyWindow)).toBeLessThanOrEqual(1);
  });

  it('closes exactly one day per consumed tick', () => {
    const controller = new JourneyController(config);
    const state = createTestGameState();
    const outcome = controller.tickDay(state);
    if (outcome.logKey === LOG_KEYS.ENCOUNTER) {
      expect(outcome.dayConsumed).toBe(false);
      expect(state.day).toBe(1);
      const resolved = controller.resolveEncounter(state, 0);
      expect(resolved?.dayConsumed).toBe(true);
    } else {
      expect(outcome.dayConsumed).toBe(true);
      expect(outcome.record?.dayIndex).toBe(0);
    }
    expect(state.day).toBe(2);
    expect(state.dayRecords.length).toBe(1);
  });

  it('numbers events per day and publishes them on the bus', () => {
    const bus = createEventBus();
    const seen = vi.fn();
    bus.onAny(seen);
    const controller = new JourneyController(config, bus);
    const state = createTestGameState({ restRequested: true });

    const outcome = controller.tickDay(state);
    expect(outcome.events.map((e) => e.id.seq)).toEqual(outcome.events.map((_e, i) => i));
    expect(outcome.events.every((e) => e.day === 1)).toBe(true);
    expect(seen).toHaveBeenCalledTimes(outcome.events.length);
    expect(outcome.events.at(-1)?.event.type).toBe('day_ended');
  });

  describe('gates', () => {
    it('refuses to start a day once the run has ended', () => {
      const state = createTestGameState({ ending: { type: 'vehicle_failure' } });
      const outcome = new JourneyController(config).tickDay(state);
      expect(outcome.ended).toBe(true);
      expect(outcome.logKey).toBe(LOG_KEYS.ENDED);
      expect(outcome.dayConsumed).toBe(false);
      expect(state.day).toBe(1);
    });

    it('waits for a pending encounter without drawing', () => {
      const state = createTestGameState();
      state.encounters.pending = { id: 'roadside_diner', day: 1 };
      const rng = { ...state.rng };
      expect(new JourneyController(config).travelNextLeg(state)).toEqual({
        ended: false,
        logKey: LOG_KEYS.ENCOUNTER_PENDING,
        breakdownStarted: false,
      });
      expect(state.rng).toEqual(rng);
      expect(state.today.dayInitialized).toBe(false);
    });

    it('waits for the boss', () => {
      const state = createTestGameState({ bossReady: true, milesTraveled: 2100 });
      expect(new JourneyController(config).tickDay(state).logKey).toBe(LOG_KEYS.BOSS_AWAIT);
    });
  });

  describe('day kinds', () => {
    it('credits a rest day as partial travel', () => {
      const state = createTestGameState({ restRequested: true });
      const outcome = new JourneyController(config).tickDay(state);
      expect(outcome.logKey).toBe(LOG_KEYS.REST_CREDIT);
      expect(outcome.record).toEqual({ dayIndex: 0, kind: 'partial', miles: 12, tags: ['camp'] });
      expect(state.restRequested).toBe(false);
      expect(state.milesTraveled).toBe(12);
      expect(state.counters.campDays).toBe(1);
    });

    it('holds the party while a breakdown cannot be fixed', () => {
      const state = createTestGameState({ budgetCents: 0 }, { spares: { tire: 0 } });
      state.breakdown = { part: 'battery', dayStarted: 1 };
      const controller = new JourneyController(config);

      const blocked = controller.tickDay(state);
      expect(blocked.logKey).toBe(LOG_KEYS.TRAVEL_BLOCKED);
      expect(blocked.breakdownStarted).toBe(false);
      expect(blocked.record).toEqual({ dayIndex: 0, kind: 'partial', miles: 9, tags: ['repair'] });

      controller.tickDay(state);
      expect(state.breakdown).toBeNull();
      expect(state.vehicle.health).toBeLessThan(100);
    });

    it('spends a detour day at partial distance', () => {
      const state = createTestGameState();
      state.crossings.detourDaysPending = 2;
      const outcome = new JourneyController(config).tickDay(state);
      expect(outcome.logKey).toBe(LOG_KEYS.DETOUR_DAY);
      expect(outcome.record?.kind).toBe('partial');
      expect(outcome.record?.tags).toEqual(['detour']);
      expect(state.crossings.detourDaysPending).toBe(1);
    });
  });

  describe('camp', () => {
    it('refuses an action that cannot run and leaves the day alone', () => {
      const state = createTestGameState();
      const result = new JourneyController(config).camp(state, 'repair_spare');
      expect(result).toEqual({
        result: { ok: false, action: 'repair_spare', reason: 'nothing_broken' },
        outcome: null,
      });
      expect(state.day).toBe(1);
      expect(state.today.dayInitialized).toBe(false);
    });

    it('spends a day resting', () => {
      const state = createTestGameState();
      const { result, outcome } = new JourneyController(config).camp(state, 'rest');
      expect(result.ok).toBe(true);
      expect(outcome?.record).toEqual({ dayIndex: 0, kind: 'non_travel', miles: 0, tags: ['camp'] });
      expect(state.day).toBe(2);
    });
  });

  describe('runBoss', () => {
    it('does nothing before the trail is finished', () => {
      expect(new JourneyController(config).runBoss(createTestGameState())).toBeNull();
    });

    it('runs once and ends the journey', () => {
      const controller = new JourneyController(config);
      const state = createTestGameState({ bossReady: true, milesTraveled: 2100 });
      const run = controller.runBoss(state);
      expect(run).not.toBeNull();
      if (run === null) return;
      expect(state.bossAttempted).toBe(true);
      expect(state.bossOutcome).toBe(run.result.outcome);
      expect(state.ending).toEqual(run.ending);
      expect(run.events.at(-1)?.logKey).toBe(endingLogKey(run.ending));

      expect(controller.runBoss(state)).toBeNull();
      expect(controller.tickDay(state).ended).toBe(true);
    });
  });
});

describe('endingLogKey', () => {
  it('names each ending', () => {
    expect(endingLogKey({ type: 'collapse', cause: 'panic' })).toBe('log.pants_emergency');
    expect(endingLogKey({ type: 'collapse', cause: 'hunger' })).toBe('log.collapse.hunger');
    expect(endingLogKey({ type: 'exposure', kind: 'cold' })).toBe('log.exposure.cold');
    expect(endingLogKey({ type: 'boss_victory' })).toBe('log.boss_victory');
  });
});
