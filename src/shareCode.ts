import wordListData from './data/wordList.json';

/**
 * Share codes
 *
 * A run seed can be shared as `MODE-WORDNN`: `CL` or `DP`, a word from a
 * fixed 512-word list, and two digits. The word index and the number are
 * packed into the low 16 bits of the seed; the high 48 bits come from an
 * FNV-1a hash so that nearby codes still produce unrelated runs.
 */

export const WORD_LIST: readonly string[] = wordListData;

const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = (1n << 64n) - 1n;
const HIGH_48 = 0xffffffffffff0000n;

const SALT_PREFIX = 'OVRLD-';
const SALT_SUFFIX = 0xa5;
const FALLBACK_WORD = 'ORANGE';

export interface DecodedShareCode {
  isDeep: boolean;
  seed: bigint;
}

export function fnv1a64(bytes: Uint8Array): bigint {
  let hash = FNV_OFFSET;
  for (const byte of bytes) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
}

export function pack(wordIndex: number, suffix: number): number {
  return (wordIndex & 0x1ff) | ((suffix & 0x7f) << 9);
}

export function composeSeed(isDeep: boolean, packed: number): bigint {
  const low = packed & 0xffff;
  const bytes = new Uint8Array(SALT_PREFIX.length + 4);
  for (let i = 0; i < SALT_PREFIX.length; i++) {
    bytes[i] = SALT_PREFIX.charCodeAt(i);
  }
  const at = SALT_PREFIX.length;
  bytes[at] = (isDeep ? 'D' : 'C').charCodeAt(0);
  bytes[at + 1] = low & 0xff;
  bytes[at + 2] = (low >>> 8) & 0xff;
  bytes[at + 3] = SALT_SUFFIX;
  return (fnv1a64(bytes) & HIGH_48) | BigInt(low);
}

export function encodeFriendly(isDeep: boolean, seed: bigint): string {
  const packed = Number(seed & 0xffffn);
  const wordIndex = packed & 0x1ff;
  const word = WORD_LIST[wordIndex] ?? FALLBACK_WORD;
  const suffix = (packed >>> 9) % 100;
  return `${isDeep ? 'DP' : 'CL'}-${word}${suffix.toString().padStart(2, '0')}`;
}

/**
 * Parse a share code. Any mode other than `DP` reads as classic; a
 * malformed suffix or unknown word yields null.
 */
export function decodeToSeed(code: string): DecodedShareCode | null {
  const trimmed = code.trim();
  const dash = trimmed.indexOf('-');
  if (dash < 0) return null;

  const mode = trimmed.slice(0, dash).toUpperCase();
  const rest = trimmed.slice(dash + 1);
  if (rest.length < 3) return null;

  const digits = rest.slice(-2);
  if (!/^[0-9]{2}$/.test(digits)) return null;
  const suffix = Number.parseInt(digits, 10);

  const word = rest
    .slice(0, -2)
    .replace(/[^A-Za-z]/g, '')
    .toUpperCase();
  const wordIndex = WORD_LIST.indexOf(word);
  if (wordIndex < 0) return null;

  const isDeep = mode === 'DP';
  return { isDeep, seed: composeSeed(isDeep, pack(wordIndex, suffix)) };
}

export function generateCodeFromEntropy(isDeep: boolean, entropy: number): string {
  const e = Math.floor(Math.abs(entropy));
  const wordIndex = e % WORD_LIST.length;
  const suffix = Math.floor(e / 2 ** 17) % 100;
  const seed = composeSeed(isDeep, pack(wordIndex, suffix));
  return encodeFriendly(isDeep, seed);
}
