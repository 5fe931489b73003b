import { describe, it, expect } from 'vitest';
import type { LogEntry } from '../models';
import { MAX_LOG_ENTRIES, addLog, journalLineFor } from '../logSystem';

function fill(type: LogEntry['type'], count: number): LogEntry[] {
  const log: LogEntry[] = [];
  for (let i = 0; i < count; i++) {
    addLog(log, i + 1, type, `entry ${i + 1}`, type === 'travel' ? { miles: 10 } : undefined);
  }
  return log;
}

describe('addLog', () => {
  it('keeps entries until the trim buffer is exceeded', () => {
    const log = fill('breakdown', 250);
    expect(log).toHaveLength(250);
    expect(log[0]).toEqual({ day: 1, type: 'breakdown', message: 'entry 1' });
  });

  it('merges the oldest travel entries into one summary', () => {
    const log = fill('travel', 251);
    expect(log).toHaveLength(MAX_LOG_ENTRIES);
    expect(log[0]).toEqual({
      day: 52,
      type: 'travel',
      message: 'Traveled 520 mi over 52 days',
      meta: { count: 52, miles: 520 },
    });
    expect(log[1].message).toBe('entry 53');
  });

  it('drops the oldest weather entries next', () => {
    const log = fill('weather', 251);
    expect(log).toHaveLength(MAX_LOG_ENTRIES);
    expect(log[0].day).toBe(52);
  });

  it('drops important entries only as a last resort', () => {
    const log: LogEntry[] = [];
    addLog(log, 1, 'crossing', 'first crossing');
    for (let i = 0; i < 250; i++) {
      addLog(log, 2, 'weather', 'weather');
    }
    expect(log).toHaveLength(MAX_LOG_ENTRIES);
    expect(log[0].message).toBe('first crossing');
  });
});

describe('journalLineFor', () => {
  it('describes weather changes', () => {
    expect(journalLineFor({ type: 'weather_changed', weather: 'heat_wave', previous: 'clear', mitigated: true })).toEqual({
      type: 'weather',
      message: 'Weather turned to heat wave (geared up)',
      meta: { weather: 'heat_wave' },
    });
  });

  it('describes the end of a day', () => {
    expect(
      journalLineFor({ type: 'day_ended', kind: 'travel', miles: 13.5, totalMiles: 100.2, tags: [] })
    ).toEqual({ type: 'travel', message: 'Covered 14 mi, 100 mi total', meta: { miles: 13.5 } });
    expect(
      journalLineFor({ type: 'day_ended', kind: 'non_travel', miles: 0, totalMiles: 40, tags: ['camp'] })?.message
    ).toBe('Stayed put, 40 mi total');
  });

  it('describes breakdowns and crossings', () => {
    expect(journalLineFor({ type: 'breakdown_started', part: 'fuel_pump', vehicleHealth: 94 })?.message).toBe(
      'Breakdown: fuel pump'
    );
    expect(
      journalLineFor({
        type: 'crossing_resolved',
        index: 0,
        result: { type: 'detour', days: 3 },
        usedPermit: false,
        bribeAttempted: false,
        bribeSucceeded: false,
        bribeCostCents: 0,
      })?.message
    ).toBe('Turned back, detour of 3 days');
  });

  it('names the ending', () => {
    expect(journalLineFor({ type: 'journey_ended', ending: { type: 'collapse', cause: 'hunger' } })).toEqual({
      type: 'ending',
      message: 'Journey over: collapse',
    });
  });

  it('skips days of an illness already under way', () => {
    expect(journalLineFor({ type: 'illness', stage: 'sick', daysRemaining: 2 })).toBeNull();
  });
});
