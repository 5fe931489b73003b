/**
 * Public surface of the journey kernel.
 */

export type * from './models';
export type * from './models/config';

export {
  JourneyController,
  LOG_KEYS,
  TRAVEL_CONSTANTS,
  computeDailyDistance,
  endingLogKey,
  partialDistance,
} from './gameTick';
export type { BossRun, CampOutcome, DayOutcome, LegResult } from './gameTick';

export { STARTING_BUDGET_CENTS, createNewGame, shareCodeFor } from './gameFactory';
export type { NewGameOptions } from './gameFactory';

export { ConfigError, createDefaultConfig, loadGameConfig } from './gameConfig';
export type { ConfigDocument } from './gameConfig';

export {
  CURRENT_SAVE_VERSION,
  SaveFormatError,
  clearSaveFile,
  deserializeGame,
  loadGameFromFile,
  saveGameToFile,
  serializeGame,
} from './storage';

export { decodeToSeed, encodeFriendly, generateCodeFromEntropy } from './shareCode';
export { RngBundle, type RandomSource } from './rng';
export { createEventBus, severityOf } from './gameEvents';
export type { EventBus, EventHandler, JourneyEvent, RecordedEvent } from './gameEvents';

export { resultSummary, selectEnding, computeFinalScore } from './scoring';
export type { ResultSummary } from './scoring';
export type { CampAction, CampResult } from './campSystem';
export type { BossResult } from './bossSystem';
export { summarizeLedger, maxStopsInWindow, windowStopCounts } from './dailyLedger';
export type { LedgerSummary } from './dailyLedger';
