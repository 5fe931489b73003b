import type { LogEntry, LogEntryMeta } from './models';
import type { CrossingResolvedEvent, JourneyEvent, StarvationEvent } from './gameEvents';

/**
 * Log System
 *
 * The journey journal: one line per notable thing that happened on the
 * road. The journal is capped at MAX_LOG_ENTRIES so long runs keep a
 * bounded save.
 *
 * Trimming uses a priority system:
 *  1. Combinable entries (travel) are merged into a summary entry with
 *     the miles summed.
 *  2. Droppable entries (weather, travel orders) are removed oldest-first.
 *  3. Everything else (breakdowns, crossings, endings, ...) is preserved
 *     and only removed as a last resort.
 */

/**
 * Maximum number of journal entries kept in the save.
 * Oldest entries beyond this limit are discarded.
 */
export const MAX_LOG_ENTRIES = 200;

/** Entries allowed above the cap before a trim pass runs. */
const TRIM_BUFFER = 50;

function isCombinable(type: LogEntry['type']): boolean {
  return type === 'travel';
}

/**
 * High-frequency, low-importance entries. During trimming these are
 * dropped oldest-first (after travel entries have been compacted).
 */
function isDroppable(type: LogEntry['type']): boolean {
  return type === 'weather' || type === 'travel_order';
}

export function createLogEntry(
  day: number,
  type: LogEntry['type'],
  message: string,
  meta?: LogEntryMeta
): LogEntry {
  const entry: LogEntry = { day, type, message };
  if (meta) {
    entry.meta = meta;
  }
  return entry;
}

export function addLog(
  log: LogEntry[],
  day: number,
  type: LogEntry['type'],
  message: string,
  meta?: LogEntryMeta
): void {
  log.push(createLogEntry(day, type, message, meta));
  if (log.length > MAX_LOG_ENTRIES + TRIM_BUFFER) {
    compactAndTrimLog(log);
  }
}

// ── Trim Implementation ──────────────────────────────────────────

function formatMiles(miles: number): string {
  return `${Math.round(miles)} mi`;
}

function buildSummaryMessage(type: LogEntry['type'], meta: LogEntryMeta, count: number): string {
  if (type === 'travel') {
    return `Traveled ${formatMiles(meta.miles ?? 0)} over ${count} days`;
  }
  return `${type} (x${count})`;
}

function mergeMeta(entries: LogEntry[]): LogEntryMeta {
  const result: LogEntryMeta = { count: 0 };
  let miles = 0;
  let hasMiles = false;
  for (const e of entries) {
    result.count = (result.count ?? 0) + (e.meta?.count ?? 1);
    if (e.meta?.miles !== undefined) {
      miles += e.meta.miles;
      hasMiles = true;
    }
  }
  if (hasMiles) result.miles = miles;
  return result;
}

/**
 * Priority-aware compaction. Operates in-place on the log array so
 * references held by callers stay valid.
 */
export function compactAndTrimLog(log: LogEntry[]): void {
  const target = MAX_LOG_ENTRIES;

  // ── Phase 1: Compact combinable entries ──
  // Only the part of the log that would otherwise be cut is compacted, so
  // recent travel lines stay individual.
  const excessBefore = log.length - target;
  const groups = new Map<LogEntry['type'], LogEntry[]>();
  const merged = new Set<LogEntry>();
  for (let i = 0; i < log.length && merged.size < excessBefore + 1; i++) {
    const entry = log[i];
    if (!isCombinable(entry.type)) continue;
    let group = groups.get(entry.type);
    if (!group) {
      group = [];
      groups.set(entry.type, group);
    }
    group.push(entry);
    merged.add(entry);
  }

  let compacted: LogEntry[] = log;
  const summaries = new Map<LogEntry, LogEntry>();
  for (const [type, group] of groups) {
    if (group.length <= 1) {
      for (const entry of group) merged.delete(entry);
      continue;
    }
    const meta = mergeMeta(group);
    const latest = group[group.length - 1];
    summaries.set(
      latest,
      createLogEntry(latest.day, type, buildSummaryMessage(type, meta, meta.count ?? group.length), meta)
    );
  }
  if (summaries.size > 0) {
    compacted = [];
    for (const entry of log) {
      const summary = summaries.get(entry);
      if (summary) {
        compacted.push(summary);
      } else if (!merged.has(entry)) {
        compacted.push(entry);
      }
    }
  } else {
    compacted = [...log];
  }

  // ── Phase 2: Drop oldest droppable entries ──
  if (compacted.length > target) {
    let excess = compacted.length - target;
    compacted = compacted.filter((entry) => {
      if (excess > 0 && isDroppable(entry.type)) {
        excess--;
        return false;
      }
      return true;
    });
  }

  // ── Phase 3: Fallback, drop oldest entries of any type ──
  if (compacted.length > target) {
    compacted.splice(0, compacted.length - target);
  }

  log.length = 0;
  for (const entry of compacted) {
    log.push(entry);
  }
}

// ── Journal lines ────────────────────────────────────────────────

export interface JournalLine {
  type: LogEntry['type'];
  message: string;
  meta?: LogEntryMeta;
}

function words(id: string): string {
  const text = id.replace(/_/g, ' ');
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function starvationLine(event: StarvationEvent): JournalLine {
  switch (event.stage) {
    case 'relief':
      return { type: 'health', message: 'Supplies restored, the hunger eases' };
    case 'grace':
      return { type: 'health', message: 'Out of supplies' };
    case 'tick':
      return { type: 'health', message: `Starving for ${event.days} days`, meta: { count: event.days } };
    case 'backstop':
      return { type: 'health', message: 'The party barely holds on' };
    case 'collapse':
      return { type: 'health', message: 'The party collapses from hunger' };
  }
}

function crossingLine(event: CrossingResolvedEvent): JournalLine {
  switch (event.result.type) {
    case 'pass':
      return { type: 'crossing', message: event.usedPermit ? 'Waved through on a permit' : 'Crossing cleared' };
    case 'detour':
      return { type: 'crossing', message: `Turned back, detour of ${event.result.days} days` };
    case 'terminal_fail':
      return { type: 'crossing', message: 'Turned back for good' };
  }
}

/**
 * The journal line for a journey event, or null for events that only
 * matter to listeners (a day of an illness already under way).
 */
export function journalLineFor(event: JourneyEvent): JournalLine | null {
  switch (event.type) {
    case 'weather_changed':
      return {
        type: 'weather',
        message: `Weather turned to ${words(event.weather).toLowerCase()}${event.mitigated ? ' (geared up)' : ''}`,
        meta: { weather: event.weather },
      };
    case 'weather_fallback':
      return { type: 'weather', message: `No forecast today, still ${words(event.kept).toLowerCase()}` };
    case 'exposure':
      return {
        type: 'health',
        message: `${event.kind === 'cold' ? 'Cold' : 'Heat'} exposure: -${event.hpDamage} hp, -${event.sanityLoss} sanity`,
      };
    case 'starvation':
      return starvationLine(event);
    case 'illness':
      if (event.stage === 'sick') return null;
      return event.stage === 'onset'
        ? { type: 'health', message: `Illness strikes for ${event.daysRemaining} days` }
        : { type: 'health', message: 'The party recovers from illness' };
    case 'travel_order':
      return event.stage === 'started'
        ? { type: 'travel_order', message: `${words(event.order)} in force for ${event.days} days` }
        : { type: 'travel_order', message: `${words(event.order)} lifted` };
    case 'breakdown_started':
      return { type: 'breakdown', message: `Breakdown: ${words(event.part).toLowerCase()}`, meta: { part: event.part } };
    case 'breakdown_resolved':
      return {
        type: 'repair',
        message: `${words(event.part)} repaired (${event.method.replace(/_/g, ' ')})`,
        meta: { part: event.usedPart ?? event.part },
      };
    case 'travel_blocked':
      return {
        type: 'breakdown',
        message: `Stuck with a broken ${event.part.replace(/_/g, ' ')}, crept ${formatMiles(event.creditMiles)}`,
        meta: { miles: event.creditMiles, part: event.part },
      };
    case 'rest_day':
      return { type: 'camp', message: `Rested, crept ${formatMiles(event.creditMiles)}`, meta: { miles: event.creditMiles } };
    case 'detour_day':
      return {
        type: 'crossing',
        message: `On the detour, ${event.daysRemaining} days to go`,
        meta: { miles: event.miles },
      };
    case 'endgame_activated':
      return { type: 'endgame', message: 'Final stretch, support crews on standby' };
    case 'field_repair':
      return {
        type: 'endgame',
        message: `Field repair (${event.source.replace(/_/g, ' ')})`,
        meta: { miles: event.miles },
      };
    case 'failure_guard':
      return { type: 'endgame', message: 'The van is coaxed back to life' };
    case 'crossing_resolved':
      return crossingLine(event);
    case 'encounter_started':
      return { type: 'encounter', message: `Encounter: ${event.name}` };
    case 'encounter_resolved':
      return { type: 'encounter', message: `Chose "${event.choice}"` };
    case 'camp_action':
      return { type: 'camp', message: `Camp: ${words(event.action).toLowerCase()}` };
    case 'day_ended':
      return {
        type: 'travel',
        message: `${event.kind === 'non_travel' ? 'Stayed put' : `Covered ${formatMiles(event.miles)}`}, ${formatMiles(event.totalMiles)} total`,
        meta: { miles: event.miles },
      };
    case 'boss_ready':
      return { type: 'boss', message: 'The capital is in sight' };
    case 'boss_resolved':
      return { type: 'boss', message: `Final vote: ${words(event.outcome).toLowerCase()}` };
    case 'journey_ended':
      return { type: 'ending', message: `Journey over: ${words(event.ending.type).toLowerCase()}` };
  }
}
