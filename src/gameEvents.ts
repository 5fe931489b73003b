import type {
  BossOutcome,
  Ending,
  ExposureKind,
  Part,
  TravelDayKind,
  TravelOrderId,
  Weather,
} from './models';
import type { CampAction, ForageFind } from './campSystem';
import type { CrossingResult } from './crossingResolver';
import type { FieldRepairSource } from './endgameSystem';

// ── Event Definitions ────────────────────────────────────────────

/** Today's weather was selected. */
export interface WeatherChangedEvent {
  type: 'weather_changed';
  weather: Weather;
  previous: Weather;
  mitigated: boolean;
}

/** Weather selection failed and yesterday's weather was kept. */
export interface WeatherFallbackEvent {
  type: 'weather_fallback';
  kept: Weather;
  reason: string;
}

export interface ExposureEvent {
  type: 'exposure';
  kind: ExposureKind;
  hpDamage: number;
  sanityLoss: number;
}

export interface StarvationEvent {
  type: 'starvation';
  stage: 'relief' | 'grace' | 'tick' | 'backstop' | 'collapse';
  days: number;
}

export interface IllnessEvent {
  type: 'illness';
  stage: 'onset' | 'sick' | 'recovered';
  daysRemaining: number;
}

export interface TravelOrderEvent {
  type: 'travel_order';
  stage: 'started' | 'ended';
  order: TravelOrderId;
  days: number;
}

export interface BreakdownStartedEvent {
  type: 'breakdown_started';
  part: Part;
  vehicleHealth: number;
}

export interface BreakdownResolvedEvent {
  type: 'breakdown_resolved';
  part: Part;
  method: 'spare' | 'any_spare' | 'emergency' | 'jury_rig' | 'camp_spare' | 'camp_hack';
  usedPart: Part | null;
}

/** Travel was blocked by an unresolved breakdown. */
export interface TravelBlockedEvent {
  type: 'travel_blocked';
  part: Part;
  creditMiles: number;
}

/** A requested rest day, credited a short distance. */
export interface RestDayEvent {
  type: 'rest_day';
  creditMiles: number;
}

/** A day spent on a detour after being turned back at a crossing. */
export interface DetourDayEvent {
  type: 'detour_day';
  miles: number;
  daysRemaining: number;
}

export interface EndgameActivatedEvent {
  type: 'endgame_activated';
  miles: number;
}

export interface FieldRepairEvent {
  type: 'field_repair';
  source: FieldRepairSource;
  part: Part | null;
  miles: number;
}

export interface FailureGuardEvent {
  type: 'failure_guard';
  miles: number;
  vehicleHealth: number;
}

export interface CrossingResolvedEvent {
  type: 'crossing_resolved';
  index: number;
  result: CrossingResult;
  usedPermit: boolean;
  bribeAttempted: boolean;
  bribeSucceeded: boolean;
  bribeCostCents: number;
}

export interface EncounterStartedEvent {
  type: 'encounter_started';
  encounterId: string;
  name: string;
}

export interface EncounterResolvedEvent {
  type: 'encounter_resolved';
  encounterId: string;
  choice: string;
  bonusMiles: number;
}

export interface CampActionEvent {
  type: 'camp_action';
  action: CampAction;
  find?: ForageFind;
}

/** The day's classification and mileage were finalized. */
export interface DayEndedEvent {
  type: 'day_ended';
  kind: TravelDayKind;
  miles: number;
  totalMiles: number;
  tags: string[];
}

export interface BossReadyEvent {
  type: 'boss_ready';
  miles: number;
}

export interface BossResolvedEvent {
  type: 'boss_resolved';
  outcome: BossOutcome;
  chance: number | null;
}

export interface JourneyEndedEvent {
  type: 'journey_ended';
  ending: Ending;
}

/**
 * Discriminated union of all journey events.
 *
 * Add new event interfaces above, then include them in this union.
 * The bus emits synchronously within the current day tick.
 */
export type JourneyEvent =
  | WeatherChangedEvent
  | WeatherFallbackEvent
  | ExposureEvent
  | StarvationEvent
  | IllnessEvent
  | TravelOrderEvent
  | BreakdownStartedEvent
  | BreakdownResolvedEvent
  | TravelBlockedEvent
  | RestDayEvent
  | DetourDayEvent
  | EndgameActivatedEvent
  | FieldRepairEvent
  | FailureGuardEvent
  | CrossingResolvedEvent
  | EncounterStartedEvent
  | EncounterResolvedEvent
  | CampActionEvent
  | DayEndedEvent
  | BossReadyEvent
  | BossResolvedEvent
  | JourneyEndedEvent;

export type JourneyEventType = JourneyEvent['type'];

export type EventSeverity = 'info' | 'warning' | 'critical';

export interface EventId {
  day: number;
  seq: number;
}

/** An event as recorded for one day, in emission order. */
export interface RecordedEvent {
  id: EventId;
  day: number;
  severity: EventSeverity;
  event: JourneyEvent;
  /** Presentation hint for clients that render translated text */
  logKey?: string;
}

export function severityOf(event: JourneyEvent): EventSeverity {
  switch (event.type) {
    case 'journey_ended':
    case 'failure_guard':
      return 'critical';
    case 'breakdown_started':
    case 'travel_blocked':
    case 'exposure':
    case 'starvation':
    case 'illness':
    case 'weather_fallback':
      return 'warning';
    case 'crossing_resolved':
      return event.result.type === 'terminal_fail' ? 'critical' : 'info';
    default:
      return 'info';
  }
}

// ── Event Bus ────────────────────────────────────────────────────

/**
 * Map from event type string to the concrete event interface.
 * Enables type-safe handlers: `bus.on('crossing_resolved', (e) => e.index)`.
 */
export type EventMap = {
  [E in JourneyEvent as E['type']]: E;
};

export type EventHandler<T extends JourneyEvent = JourneyEvent> = (event: T, meta: RecordedEvent) => void;

function isEventOf<K extends JourneyEventType>(event: JourneyEvent, type: K): event is EventMap[K] {
  return event.type === type;
}

export interface EventBus {
  /**
   * Subscribe to a specific event type. The handler receives the narrowed
   * event. Returns an unsubscribe function.
   */
  on<K extends JourneyEventType>(type: K, handler: EventHandler<EventMap[K]>): () => void;
  /** Subscribe to every event. */
  onAny(handler: EventHandler): () => void;
  emit(recorded: RecordedEvent): void;
  clear(): void;
}

/**
 * One bus per controller. Handlers run in registration order within the
 * current call stack.
 */
export function createEventBus(): EventBus {
  let handlers: EventHandler[] = [];

  const subscribe = (handler: EventHandler): (() => void) => {
    handlers.push(handler);
    return () => {
      const idx = handlers.indexOf(handler);
      if (idx !== -1) handlers.splice(idx, 1);
    };
  };

  return {
    on<K extends JourneyEventType>(type: K, handler: EventHandler<EventMap[K]>) {
      return subscribe((event, meta) => {
        if (isEventOf(event, type)) handler(event, meta);
      });
    },
    onAny(handler: EventHandler) {
      return subscribe(handler);
    },
    emit(recorded: RecordedEvent) {
      for (const handler of [...handlers]) {
        handler(recorded.event, recorded);
      }
    },
    clear() {
      handlers = [];
    },
  };
}
