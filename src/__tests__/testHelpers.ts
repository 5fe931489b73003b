import type { GameState } from '../models';
import type { GameConfig } from '../models/config';
import { createDefaultConfig } from '../gameConfig';
import { createNewGame, type NewGameOptions } from '../gameFactory';
import { BaseRandom } from '../rng';
import type { JourneyController } from '../gameTick';

/**
 * Test helper factory functions.
 * Create valid game objects with sensible defaults that can be overridden.
 */

export const TEST_SEED = 42n;

export function createTestConfig(): GameConfig {
  return createDefaultConfig();
}

export function createTestGameState(
  overrides: Partial<GameState> = {},
  options: NewGameOptions = {}
): GameState {
  return {
    ...createNewGame({ seed: TEST_SEED, ...options }),
    ...overrides,
  };
}

/**
 * Random source that replays a fixed list of draws. Once the list is
 * used up the last value repeats.
 */
export class ScriptedRandom extends BaseRandom {
  private index = 0;

  constructor(private readonly values: readonly number[]) {
    super();
  }

  next(): number {
    const value = this.values[Math.min(this.index, this.values.length - 1)] ?? 0;
    this.index++;
    return value;
  }

  get draws(): number {
    return this.index;
  }
}

/** Random source that always draws the same value. */
export function fixedRandom(value: number): ScriptedRandom {
  return new ScriptedRandom([value]);
}

/**
 * Play until `days` days are in the ledger, taking the first choice of
 * every encounter. Stops early when the run ends or the boss waits.
 */
export function playDays(controller: JourneyController, state: GameState, days: number): void {
  for (let guard = 0; guard < days * 4 && state.dayRecords.length < days; guard++) {
    if (state.ending !== null || state.bossReady) return;
    if (state.encounters.pending !== null) {
      controller.resolveEncounter(state, 0);
    } else {
      controller.tickDay(state);
    }
  }
}
