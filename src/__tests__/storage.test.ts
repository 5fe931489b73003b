import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  backupPathFor,
  clearSaveFile,
  CURRENT_SAVE_VERSION,
  deserializeGame,
  detectVersion,
  loadGameFromFile,
  saveGameToFile,
  SaveFormatError,
  serializeGame,
  validateSave,
} from '../storage';
import { JourneyController } from '../gameTick';
import { createHealthState } from '../healthSystem';
import { createTravelOrderState } from '../travelOrders';
import { isRecord } from '../jsonReader';
import { createTestConfig, createTestGameState, playDays } from './testHelpers';

function rawSave(text: string): Record<string, unknown> {
  const raw: unknown = JSON.parse(text);
  if (!isRecord(raw)) throw new Error('save is not an object');
  return raw;
}

function child(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (!isRecord(value)) throw new Error(`${key} is not an object`);
  return value;
}

/** A v1 save: no journal, encounter history, camp counters or bribe discount. */
function v1Save(): Record<string, unknown> {
  const raw = rawSave(serializeGame(createTestGameState()));
  raw.saveVersion = 1;
  delete raw.log;
  delete child(raw, 'encounters').recent;
  delete child(raw, 'counters').campDays;
  delete child(raw, 'counters').repairDays;
  delete child(raw, 'crossings').bribeDiscountPct;
  return raw;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('serializeGame / deserializeGame', () => {
  it('writes the seed as a decimal string', () => {
    const state = createTestGameState({}, { shareCode: 'DP-ORANGE42' });
    const raw = rawSave(serializeGame(state));
    expect(raw.seed).toBe(state.seed.toString());
    expect(raw.saveVersion).toBe(CURRENT_SAVE_VERSION);
  });

  it('restores a new run exactly', () => {
    const state = createTestGameState({}, { shareCode: 'DP-ORANGE42' });
    const loaded = deserializeGame(serializeGame(state));
    expect(loaded).toEqual(state);
    expect(loaded?.seed).toBe(state.seed);
  });

  it('restores a run in progress', () => {
    const controller = new JourneyController(createTestConfig());
    const state = createTestGameState();
    playDays(controller, state, 20);
    expect(state.dayRecords.length).toBeGreaterThan(0);

    const text = serializeGame(state);
    const loaded = deserializeGame(text);
    expect(loaded).not.toBeNull();
    if (loaded === null) return;
    expect(serializeGame(loaded)).toBe(text);
  });

  it('continues a loaded run the same way as the original', () => {
    const controller = new JourneyController(createTestConfig());
    const original = createTestGameState();
    playDays(controller, original, 8);

    const copy = deserializeGame(serializeGame(original));
    expect(copy).not.toBeNull();
    if (copy === null) return;
    playDays(controller, original, 16);
    playDays(new JourneyController(createTestConfig()), copy, 16);
    expect(copy.dayRecords).toEqual(original.dayRecords);
    expect(copy.rng).toEqual(original.rng);
  });

  it('returns null for text that is not a save', () => {
    expect(deserializeGame('{oops')).toBeNull();
    expect(deserializeGame('[1, 2]')).toBeNull();
    expect(deserializeGame('{"hello": "world"}')).toBeNull();
  });

  it('refuses a save from a newer version', () => {
    const raw = rawSave(serializeGame(createTestGameState()));
    raw.saveVersion = CURRENT_SAVE_VERSION + 1;
    expect(deserializeGame(JSON.stringify(raw))).toBeNull();
  });

  it('refuses a field of the wrong type', () => {
    const raw = rawSave(serializeGame(createTestGameState()));
    child(raw, 'stats').hp = 'full';
    expect(deserializeGame(JSON.stringify(raw))).toBeNull();
    expect(() => validateSave(raw)).toThrow(SaveFormatError);
    expect(() => validateSave(raw)).toThrow('stats.hp: expected a finite number');
  });

  it('refuses a seed outside u64', () => {
    const raw = rawSave(serializeGame(createTestGameState()));
    raw.seed = (1n << 64n).toString();
    expect(() => validateSave(raw)).toThrow('seed: out of u64 range');
  });

  it('refuses a ledger that is out of order or ahead of the day', () => {
    const controller = new JourneyController(createTestConfig());
    const state = createTestGameState();
    playDays(controller, state, 3);
    expect(state.dayRecords.length).toBe(3);

    const reversed = rawSave(serializeGame(state));
    reversed.dayRecords = [...state.dayRecords].reverse();
    expect(deserializeGame(JSON.stringify(reversed))).toBeNull();

    const behind = rawSave(serializeGame(state));
    behind.day = 1;
    expect(deserializeGame(JSON.stringify(behind))).toBeNull();
    expect(console.error).toHaveBeenCalledWith('Save data is inconsistent: day is behind the ledger');
  });
});

describe('migrations', () => {
  it('detects versions', () => {
    expect(detectVersion({ saveVersion: 1 })).toBe(1);
    expect(detectVersion({ seed: '42', day: 3, stats: {}, dayRecords: [] })).toBe(0);
    expect(detectVersion({ seed: 42, day: 3, stats: {}, dayRecords: [] })).toBe(-1);
    expect(detectVersion({})).toBe(-1);
  });

  it('backfills the v2 fields of a v1 save', () => {
    const loaded = deserializeGame(JSON.stringify(v1Save()));
    expect(loaded).not.toBeNull();
    if (loaded === null) return;
    expect(loaded.saveVersion).toBe(2);
    expect(loaded.log).toEqual([]);
    expect(loaded.encounters.recent).toEqual([]);
    expect(loaded.counters.campDays).toBe(0);
    expect(loaded.counters.repairDays).toBe(0);
    expect(loaded.crossings.bribeDiscountPct).toBe(0);
  });

  it('brings an unversioned save all the way forward', () => {
    const raw = v1Save();
    delete raw.saveVersion;
    delete raw.health;
    delete raw.travelOrder;

    const loaded = deserializeGame(JSON.stringify(raw));
    expect(loaded).not.toBeNull();
    if (loaded === null) return;
    expect(loaded.saveVersion).toBe(2);
    expect(loaded.health).toEqual(createHealthState());
    expect(loaded.travelOrder).toEqual(createTravelOrderState());
    expect(console.log).toHaveBeenCalledWith('Migrating save v0 → v1');
    expect(console.log).toHaveBeenCalledWith('Migrating save v1 → v2');
  });
});

describe('save files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'overland-save-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('saves and loads a run', async () => {
    const path = join(dir, 'run.json');
    const state = createTestGameState({}, { shareCode: 'CL-ORANGE07' });
    expect(await saveGameToFile(state, path)).toBe(true);
    expect(await loadGameFromFile(path)).toEqual(state);
  });

  it('returns null for a missing file without reporting an error', async () => {
    expect(await loadGameFromFile(join(dir, 'none.json'))).toBeNull();
    expect(console.error).not.toHaveBeenCalled();
  });

  it('backs up an older save before migrating it', async () => {
    const path = join(dir, 'old.json');
    const text = JSON.stringify(v1Save());
    await writeFile(path, text, 'utf8');

    const loaded = await loadGameFromFile(path);
    expect(loaded?.saveVersion).toBe(2);
    expect(await readFile(backupPathFor(path), 'utf8')).toBe(text);
  });

  it('does not back up a current save', async () => {
    const path = join(dir, 'run.json');
    await saveGameToFile(createTestGameState(), path);
    await loadGameFromFile(path);
    await expect(access(backupPathFor(path))).rejects.toThrow();
  });

  it('clears the save and its backup', async () => {
    const path = join(dir, 'old.json');
    await writeFile(path, JSON.stringify(v1Save()), 'utf8');
    await loadGameFromFile(path);

    await clearSaveFile(path);
    await expect(access(path)).rejects.toThrow();
    await expect(access(backupPathFor(path))).rejects.toThrow();
  });
});
