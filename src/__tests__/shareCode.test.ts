import { describe, it, expect } from 'vitest';
import {
  WORD_LIST,
  composeSeed,
  decodeToSeed,
  encodeFriendly,
  fnv1a64,
  generateCodeFromEntropy,
  pack,
} from '../shareCode';

describe('word list', () => {
  it('has 512 distinct upper-case words', () => {
    expect(WORD_LIST).toHaveLength(512);
    expect(new Set(WORD_LIST).size).toBe(512);
    for (const word of WORD_LIST) {
      expect(word).toMatch(/^[A-Z]+$/);
    }
  });
});

describe('fnv1a64', () => {
  it('returns the offset basis for empty input', () => {
    expect(fnv1a64(new Uint8Array())).toBe(0xcbf29ce484222325n);
  });

  it('matches the reference hash of "a"', () => {
    expect(fnv1a64(new TextEncoder().encode('a'))).toBe(0xaf63dc4c8601ec8cn);
  });
});

describe('pack / composeSeed', () => {
  it('packs the word index into 9 bits and the number above it', () => {
    expect(pack(5, 42)).toBe(5 + (42 << 9));
    expect(pack(513, 0)).toBe(1);
  });

  it('keeps the packed value in the low 16 bits of the seed', () => {
    const packed = pack(5, 42);
    expect(composeSeed(true, packed) & 0xffffn).toBe(BigInt(packed));
  });

  it('salts the high bits with the mode', () => {
    const packed = pack(5, 42);
    expect(composeSeed(true, packed)).not.toBe(composeSeed(false, packed));
  });
});

describe('decodeToSeed / encodeFriendly', () => {
  it('round-trips DP-ORANGE42', () => {
    const decoded = decodeToSeed('DP-ORANGE42');
    expect(decoded).not.toBeNull();
    if (!decoded) return;
    expect(decoded.isDeep).toBe(true);
    expect(encodeFriendly(true, decoded.seed)).toBe('DP-ORANGE42');
  });

  it('ignores case, whitespace and stray characters', () => {
    const decoded = decodeToSeed('  cl-or.ange07 ');
    expect(decoded).not.toBeNull();
    if (!decoded) return;
    expect(decoded.isDeep).toBe(false);
    expect(encodeFriendly(false, decoded.seed)).toBe('CL-ORANGE07');
  });

  it('reads any mode other than DP as classic', () => {
    expect(decodeToSeed('XX-ORANGE42')?.isDeep).toBe(false);
  });

  it('rejects malformed codes', () => {
    expect(decodeToSeed('ORANGE42')).toBeNull();
    expect(decodeToSeed('DP-42')).toBeNull();
    expect(decodeToSeed('DP-ORANGEAB')).toBeNull();
    expect(decodeToSeed('DP-ZZZZQQ42')).toBeNull();
  });

  it('encodes the zero seed as the first word', () => {
    expect(encodeFriendly(false, 0n)).toBe('CL-ORANGE00');
  });
});

describe('generateCodeFromEntropy', () => {
  it('takes the word from the low bits and the number from bit 17 up', () => {
    expect(generateCodeFromEntropy(false, 1)).toBe(`CL-${WORD_LIST[1]}00`);
    expect(generateCodeFromEntropy(true, 2 * 2 ** 17 + 3)).toBe(`DP-${WORD_LIST[3]}02`);
  });

  it('produces codes that decode again', () => {
    const code = generateCodeFromEntropy(true, 123456789);
    const decoded = decodeToSeed(code);
    expect(decoded).not.toBeNull();
    if (!decoded) return;
    expect(encodeFriendly(true, decoded.seed)).toBe(code);
  });
});
