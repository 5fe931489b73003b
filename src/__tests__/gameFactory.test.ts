import { describe, it, expect } from 'vitest';
import { createNewGame, shareCodeFor, STARTING_BUDGET_CENTS } from '../gameFactory';
import { CURRENT_SAVE_VERSION } from '../storage';
import { decodeToSeed } from '../shareCode';

describe('createNewGame', () => {
  it('starts a classic run on day 1', () => {
    const state = createNewGame({ seed: 42n });
    expect(state.saveVersion).toBe(CURRENT_SAVE_VERSION);
    expect(state.seed).toBe(42n);
    expect(state.mode).toBe('classic');
    expect(state.day).toBe(1);
    expect(state.region).toBe('heartland');
    expect(state.season).toBe('spring');
    expect(state.budgetCents).toBe(STARTING_BUDGET_CENTS);
    expect(state.inventory.spares).toEqual({ tire: 1, battery: 0, alternator: 0, fuel_pump: 0 });
    expect(state.endgame.enabled).toBe(false);
    expect(state.trailDistance).toBe(2100);
    expect(state.dayRecords).toEqual([]);
    expect(state.ending).toBeNull();
  });

  it('enables the endgame only for deep runs', () => {
    expect(createNewGame({ seed: 1n, mode: 'deep' }).endgame.enabled).toBe(true);
  });

  it('wraps seeds into u64', () => {
    expect(createNewGame({ seed: -1n }).seed).toBe((1n << 64n) - 1n);
  });

  it('takes seed and mode from a share code', () => {
    const decoded = decodeToSeed('DP-ORANGE42');
    const state = createNewGame({ shareCode: 'dp-orange42', mode: 'classic', seed: 7n });
    expect(state.mode).toBe('deep');
    expect(state.seed).toBe(decoded?.seed);
    expect(shareCodeFor(state)).toBe('DP-ORANGE42');
  });

  it('rejects a malformed share code', () => {
    expect(() => createNewGame({ shareCode: 'nope' })).toThrow('Invalid share code: nope');
  });

  it('draws a replayable code when no seed is given', () => {
    const state = createNewGame({ mode: 'deep' });
    const code = shareCodeFor(state);
    expect(code).toMatch(/^DP-[A-Z]+\d{2}$/);
    expect(createNewGame({ shareCode: code }).seed).toBe(state.seed);
  });

  it('clamps the bribe discount and the budget', () => {
    expect(createNewGame({ seed: 1n, bribeDiscountPct: 150 }).crossings.bribeDiscountPct).toBe(100);
    expect(createNewGame({ seed: 1n, bribeDiscountPct: -5 }).crossings.bribeDiscountPct).toBe(0);
    expect(createNewGame({ seed: 1n, budgetCents: -300 }).budgetCents).toBe(0);
  });

  it('copies spares and tags', () => {
    const tags = ['permit'];
    const state = createNewGame({ seed: 1n, spares: { battery: 2 }, tags });
    tags.push('warm_coat');
    expect(state.inventory.spares.battery).toBe(2);
    expect(state.inventory.spares.tire).toBe(1);
    expect(state.inventory.tags).toEqual(['permit']);
  });
});
