/**
 * Typed walk over parsed JSON.
 *
 * Config documents and save files arrive as `unknown`. A JsonReader wraps
 * one object and hands out checked fields; any mismatch throws the error
 * built by the reader's `raise` factory, with the dotted field path.
 */

export type ErrorFactory = (field: string, message: string) => Error;

export interface NumberRange {
  min?: number;
  max?: number;
}

export const NON_NEGATIVE: NumberRange = { min: 0 };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some((candidate) => candidate === value);
}

export class JsonReader {
  private constructor(
    readonly path: string,
    private readonly data: Record<string, unknown>,
    private readonly raise: ErrorFactory
  ) {}

  static of(value: unknown, path: string, raise: ErrorFactory): JsonReader {
    if (!isRecord(value)) {
      throw raise(path, 'expected an object');
    }
    return new JsonReader(path, value, raise);
  }

  fieldPath(key: string): string {
    return this.path === '' ? key : `${this.path}.${key}`;
  }

  fail(key: string, message: string): never {
    throw this.raise(this.fieldPath(key), message);
  }

  has(key: string): boolean {
    return this.data[key] !== undefined;
  }

  isNull(key: string): boolean {
    return this.data[key] === null;
  }

  keys(): string[] {
    return Object.keys(this.data);
  }

  raw(key: string): unknown {
    return this.data[key];
  }

  number(key: string, range: NumberRange = {}): number {
    return this.checkNumber(key, this.data[key], range);
  }

  /** A whole number, for counters and day indices. */
  integer(key: string, range: NumberRange = {}): number {
    const value = this.number(key, range);
    if (!Number.isInteger(value)) return this.fail(key, 'expected an integer');
    return value;
  }

  optionalNumber(key: string, range: NumberRange = {}): number | undefined {
    return this.has(key) ? this.number(key, range) : undefined;
  }

  probability(key: string): number {
    return this.number(key, { min: 0, max: 1 });
  }

  boolean(key: string): boolean {
    const value = this.data[key];
    if (typeof value !== 'boolean') return this.fail(key, 'expected a boolean');
    return value;
  }

  /** A non-empty string. */
  string(key: string): string {
    const value = this.text(key);
    if (value === '') return this.fail(key, 'expected a non-empty string');
    return value;
  }

  text(key: string): string {
    const value = this.data[key];
    if (typeof value !== 'string') return this.fail(key, 'expected a string');
    return value;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T {
    const value = this.data[key];
    if (!isOneOf(allowed, value)) {
      return this.fail(key, `expected one of ${allowed.join(', ')}`);
    }
    return value;
  }

  nullableOneOf<T extends string>(key: string, allowed: readonly T[]): T | null {
    return this.isNull(key) ? null : this.oneOf(key, allowed);
  }

  child(key: string): JsonReader {
    if (!this.has(key)) return this.fail(key, 'missing');
    return JsonReader.of(this.data[key], this.fieldPath(key), this.raise);
  }

  nullableChild(key: string): JsonReader | null {
    return this.isNull(key) ? null : this.child(key);
  }

  list(key: string): unknown[] {
    const value = this.data[key];
    if (!Array.isArray(value)) return this.fail(key, 'expected an array');
    return value;
  }

  /** Every element of an array of objects, each wrapped in its own reader. */
  children(key: string): JsonReader[] {
    return this.list(key).map((item, i) => JsonReader.of(item, this.fieldPath(`${key}[${i}]`), this.raise));
  }

  numberList(key: string, range: NumberRange = {}): number[] {
    return this.list(key).map((item, i) => this.checkNumber(`${key}[${i}]`, item, range));
  }

  enumList<T extends string>(key: string, allowed: readonly T[]): T[] {
    return this.list(key).map((item, i) => {
      if (!isOneOf(allowed, item)) {
        return this.fail(`${key}[${i}]`, `expected one of ${allowed.join(', ')}`);
      }
      return item;
    });
  }

  stringList(key: string): string[] {
    return this.list(key).map((item, i) => {
      if (typeof item !== 'string') return this.fail(`${key}[${i}]`, 'expected a string');
      return item;
    });
  }

  private checkNumber(key: string, value: unknown, range: NumberRange): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return this.fail(key, 'expected a finite number');
    }
    if (range.min !== undefined && value < range.min) {
      return this.fail(key, `must be >= ${range.min}, got ${value}`);
    }
    if (range.max !== undefined && value > range.max) {
      return this.fail(key, `must be <= ${range.max}, got ${value}`);
    }
    return value;
  }
}
