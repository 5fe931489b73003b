import { describe, it, expect } from 'vitest';
import { applyDailyChannels, applyPaceAndDiet, channelValue } from '../dailyEffects';
import { createTestConfig, createTestGameState } from './testHelpers';

const config = createTestConfig();

describe('applyDailyChannels', () => {
  it('rounds a small steady-pace drain away', () => {
    const state = createTestGameState();
    // supplies 0.3 * 0.8, sanity 0.2 * 0.6, hp 0.3 decay
    expect(applyDailyChannels(state, config.journey)).toEqual({
      suppliesDelta: 0,
      sanityDelta: 0,
      healthDelta: 0,
    });
    expect(state.stats.supplies).toBe(10);
  });

  it('costs a supply at blitz pace on a doom diet in the heat', () => {
    const state = createTestGameState({ pace: 'blitz', diet: 'doom' });
    state.weather.today = 'heat_wave';
    // 0.3 * 1.5 * 1.2 * 1.2 = 0.648
    expect(channelValue(config.journey.daily.supplies, state)).toBeCloseTo(0.648, 10);
    expect(applyDailyChannels(state, config.journey).suppliesDelta).toBe(-1);
    expect(state.stats.supplies).toBe(9);
  });

  it('heals on a requested rest day', () => {
    const state = createTestGameState({ restRequested: true });
    state.stats.hp = 5;
    expect(applyDailyChannels(state, config.journey).healthDelta).toBe(2);
    expect(state.stats.hp).toBe(7);
  });
});

describe('applyPaceAndDiet', () => {
  it('adds the flat pace and diet deltas', () => {
    const state = createTestGameState({ pace: 'blitz', diet: 'doom' });
    expect(applyPaceAndDiet(state, config.pacing, config.weather)).toEqual({ sanityDelta: -2, pantsDelta: 2 });
    expect(state.stats.sanity).toBe(8);
    expect(state.stats.pants).toBe(2);
  });

  it('keeps panic at its floor', () => {
    const state = createTestGameState({ pace: 'steady', diet: 'quiet' });
    applyPaceAndDiet(state, config.pacing, config.weather);
    expect(state.stats.pants).toBe(0);
    expect(state.stats.sanity).toBe(10);
  });
});
