import type { Region, Season } from './models';

/**
 * Time System
 *
 * 1 tick = 1 journey day. Day 1 is the first day on the road.
 * Seasons run 45 days each starting in spring; regions change
 * on fixed days as the route leaves the heartland.
 */

export const DAYS_PER_SEASON = 45;

export const SEASON_ORDER: readonly Season[] = ['spring', 'summer', 'fall', 'winter'];

/** First day (1-based) of each region along the route. */
const REGION_STARTS: ReadonlyArray<readonly [number, Region]> = [
  [10, 'beltway'],
  [5, 'rust_belt'],
  [1, 'heartland'],
];

export function seasonForDay(day: number): Season {
  const index = Math.floor(Math.max(0, day - 1) / DAYS_PER_SEASON) % SEASON_ORDER.length;
  return SEASON_ORDER[index];
}

export function regionForDay(day: number): Region {
  for (const [start, region] of REGION_STARTS) {
    if (day >= start) return region;
  }
  return 'heartland';
}

/** Zero-based ledger index for a 1-based journey day. */
export function dayIndexFor(day: number): number {
  return Math.max(0, day - 1);
}
