/**
 * Daily Ledger: read-only views over the day records.
 *
 * The ledger itself is append-only (see dayAccounting.endOfDay). These
 * helpers summarize it for the result screen and for checking that the
 * stop cap held over every rolling window.
 */

import type { DayRecord, GameState, TravelDayKind } from './models';

/** Default rolling window for stop-cap checks (matches the recent-days window). */
const DEFAULT_WINDOW = 10;

// ─── Summary ────────────────────────────────────────────────────────

export interface LedgerSummary {
  /** Number of recorded days. */
  days: number;
  travelDays: number;
  partialDays: number;
  stopDays: number;
  /** Total miles credited across the ledger. */
  miles: number;
  /** Average miles per recorded day (0 for an empty ledger). */
  milesPerDay: number;
  /** How many days carried each reason tag. */
  tagCounts: Record<string, number>;
}

export function summarizeLedger(records: readonly DayRecord[]): LedgerSummary {
  let travelDays = 0;
  let partialDays = 0;
  let stopDays = 0;
  let miles = 0;
  const tagCounts: Record<string, number> = {};

  for (const record of records) {
    if (record.kind === 'travel') travelDays++;
    else if (record.kind === 'partial') partialDays++;
    else stopDays++;
    miles += record.miles;
    for (const tag of record.tags) {
      tagCounts[tag] = (tagCounts[tag] ?? 0) + 1;
    }
  }

  return {
    days: records.length,
    travelDays,
    partialDays,
    stopDays,
    miles,
    milesPerDay: records.length > 0 ? miles / records.length : 0,
    tagCounts,
  };
}

// ─── Windows ────────────────────────────────────────────────────────

/** Kinds of the last `window` recorded days, oldest first. */
export function recentKinds(records: readonly DayRecord[], window: number = DEFAULT_WINDOW): TravelDayKind[] {
  return records.slice(-Math.max(0, window)).map((record) => record.kind);
}

/**
 * Stop days in each rolling window of `window` consecutive records.
 * A ledger shorter than the window yields a single partial window.
 */
export function windowStopCounts(records: readonly DayRecord[], window: number = DEFAULT_WINDOW): number[] {
  if (window <= 0 || records.length === 0) return [];
  const counts: number[] = [];
  let stops = 0;
  for (let i = 0; i < records.length; i++) {
    if (records[i].kind === 'non_travel') stops++;
    if (i >= window && records[i - window].kind === 'non_travel') stops--;
    if (i >= window - 1) counts.push(stops);
  }
  if (counts.length === 0) counts.push(stops);
  return counts;
}

export function maxStopsInWindow(records: readonly DayRecord[], window: number = DEFAULT_WINDOW): number {
  return windowStopCounts(records, window).reduce((max, n) => Math.max(max, n), 0);
}

/** Records carrying a reason tag, in ledger order. */
export function recordsTagged(records: readonly DayRecord[], tag: string): DayRecord[] {
  return records.filter((record) => record.tags.includes(tag));
}

/** The record for a 1-based journey day, if it has been closed. */
export function recordForDay(state: GameState, day: number): DayRecord | null {
  return state.dayRecords.find((record) => record.dayIndex === day - 1) ?? null;
}
