import { describe, it, expect } from 'vitest';
import type { JourneyEvent, RecordedEvent } from '../gameEvents';
import { createEventBus, severityOf } from '../gameEvents';

function recorded(event: JourneyEvent, seq = 0): RecordedEvent {
  return { id: { day: 1, seq }, day: 1, severity: severityOf(event), event };
}

const BLOCKED: JourneyEvent = { type: 'travel_blocked', part: 'tire', creditMiles: 9 };
const READY: JourneyEvent = { type: 'boss_ready', miles: 2100 };

describe('createEventBus', () => {
  it('delivers only the subscribed event type', () => {
    const bus = createEventBus();
    const parts: string[] = [];
    bus.on('travel_blocked', (event) => parts.push(event.part));

    bus.emit(recorded(READY));
    bus.emit(recorded(BLOCKED));
    expect(parts).toEqual(['tire']);
  });

  it('delivers everything to onAny handlers with the recorded metadata', () => {
    const bus = createEventBus();
    const seqs: number[] = [];
    bus.onAny((_event, meta) => seqs.push(meta.id.seq));

    bus.emit(recorded(READY, 0));
    bus.emit(recorded(BLOCKED, 1));
    expect(seqs).toEqual([0, 1]);
  });

  it('stops delivering after unsubscribe or clear', () => {
    const bus = createEventBus();
    let calls = 0;
    const off = bus.onAny(() => calls++);
    bus.on('boss_ready', () => calls++);

    off();
    bus.emit(recorded(READY));
    expect(calls).toBe(1);

    bus.clear();
    bus.emit(recorded(READY));
    expect(calls).toBe(1);
  });

  it('lets a handler unsubscribe while an event is being delivered', () => {
    const bus = createEventBus();
    const seen: string[] = [];
    const off = bus.onAny(() => {
      seen.push('first');
      off();
    });
    bus.onAny(() => seen.push('second'));

    bus.emit(recorded(READY));
    bus.emit(recorded(READY));
    expect(seen).toEqual(['first', 'second', 'second']);
  });
});

describe('severityOf', () => {
  it('grades events', () => {
    expect(severityOf(BLOCKED)).toBe('warning');
    expect(severityOf(READY)).toBe('info');
    expect(severityOf({ type: 'journey_ended', ending: { type: 'boss_victory' } })).toBe('critical');
  });

  it('treats a failed crossing as critical', () => {
    const base = { type: 'crossing_resolved' as const, index: 0, usedPermit: false, bribeAttempted: false, bribeSucceeded: false, bribeCostCents: 0 };
    expect(severityOf({ ...base, result: { type: 'terminal_fail' } })).toBe('critical');
    expect(severityOf({ ...base, result: { type: 'pass' } })).toBe('info');
  });
});
