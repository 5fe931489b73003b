import { createHmac } from 'node:crypto';
import type { RngCounters, RngStream } from './models';

/**
 * Domain-separated Random Streams
 *
 * One root seed fans out into independent substreams, one per subsystem.
 * Each stream seed is HMAC-SHA256(key = root seed as 8 little-endian bytes,
 * message = stream tag), truncated to its first 4 bytes.
 *
 * Streams are counter based (mulberry32 of seed + counter), so the only
 * state that needs saving is the draw count of each stream.
 */

export const RNG_STREAMS: readonly RngStream[] = [
  'weather',
  'health',
  'travel',
  'events',
  'breakdown',
  'encounter',
  'crossing',
  'boss',
  'hunt',
];

export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
  /** Integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
  /** Integer in [min, max], inclusive. */
  range(min: number, max: number): number;
  chance(probability: number): boolean;
}

const MASK_64 = (1n << 64n) - 1n;

/** Encode a u64 seed as 8 little-endian bytes. */
export function seedToBytes(seed: bigint): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64LE(seed & MASK_64);
  return buf;
}

export function deriveStreamSeed(rootSeed: bigint, tag: string): number {
  const digest = createHmac('sha256', seedToBytes(rootSeed)).update(tag).digest();
  return digest.readUInt32LE(0);
}

/** Stateless mulberry32 step: the output for a given internal state. */
export function mulberry32(state: number): number {
  let t = (state + 0x6d2b79f5) | 0;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
}

/** Output number `counter` of the mulberry32 sequence seeded with `seed`. */
export function drawAt(seed: number, counter: number): number {
  return mulberry32((seed + Math.imul(counter, 0x6d2b79f5)) | 0);
}

/** Derived helpers over a uniform `next()`. */
export abstract class BaseRandom implements RandomSource {
  abstract next(): number;

  int(maxExclusive: number): number {
    if (maxExclusive <= 1) return 0;
    return Math.floor(this.next() * maxExclusive);
  }

  range(min: number, max: number): number {
    if (max <= min) return min;
    return min + this.int(max - min + 1);
  }

  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.next() < probability;
  }
}

/** Seekable generator over a fixed seed. */
export class CounterRng extends BaseRandom {
  private readonly seed: number;
  private counter: number;

  constructor(seed: number, counter: number = 0) {
    super();
    this.seed = seed >>> 0;
    this.counter = counter;
  }

  next(): number {
    const value = drawAt(this.seed, this.counter);
    this.counter++;
    return value;
  }

  getCounter(): number {
    return this.counter;
  }
}

/** Stream that writes its draw count back into a persisted counter record. */
class PersistedStream extends BaseRandom {
  constructor(
    private readonly seed: number,
    private readonly counters: RngCounters,
    private readonly name: RngStream
  ) {
    super();
  }

  next(): number {
    const value = drawAt(this.seed, this.counters[this.name]);
    this.counters[this.name] += 1;
    return value;
  }
}

export function createRngCounters(): RngCounters {
  return {
    weather: 0,
    health: 0,
    travel: 0,
    events: 0,
    breakdown: 0,
    encounter: 0,
    crossing: 0,
    boss: 0,
    hunt: 0,
  };
}

/**
 * All substreams for one run. Stream seeds are derived once; the counters
 * object is owned by the game state so draws survive a save/load.
 */
export class RngBundle {
  private readonly streams = new Map<RngStream, RandomSource>();

  constructor(
    readonly rootSeed: bigint,
    private readonly counters: RngCounters
  ) {}

  stream(name: RngStream): RandomSource {
    let source = this.streams.get(name);
    if (!source) {
      source = new PersistedStream(
        deriveStreamSeed(this.rootSeed, name),
        this.counters,
        name
      );
      this.streams.set(name, source);
    }
    return source;
  }
}

/** Weighted pick over entries in declaration order. Zero weights are skipped. */
export function weightedPick<K>(
  entries: ReadonlyArray<readonly [K, number]>,
  rng: RandomSource
): K | null {
  let total = 0;
  for (const [, weight] of entries) {
    if (weight > 0) total += weight;
  }
  if (total <= 0) return null;
  let roll = rng.next() * total;
  let last: K | null = null;
  for (const [key, weight] of entries) {
    if (weight <= 0) continue;
    if (roll < weight) return key;
    roll -= weight;
    last = key;
  }
  return last;
}
