import { describe, expect, it } from 'vitest';
import { SeededRng, tickSeed } from '../world/index.ts';

describe('SeededRng', () => {
  it('produces the same sequence for the same seed', () => {
    const a = new SeededRng(1234);
    const b = new SeededRng(1234);
    const first = [a.nextUint(), a.nextUint(), a.nextUint()];
    expect([b.nextUint(), b.nextUint(), b.nextUint()]).toEqual(first);
  });

  it('follows xorshift32 from the seed', () => {
    // 1 ^ (1 << 13) = 8193; 8193 ^ (8193 >>> 17) = 8193; 8193 ^ (8193 << 5) = 270369
    expect(new SeededRng(1).nextUint()).toBe(270369);
  });

  it('never starts from a zero state', () => {
    expect(new SeededRng(0).getState()).toBe(0x9e3779b9);
  });

  it('keeps floats within [0, 1]', () => {
    const rng = new SeededRng(99);
    for (let i = 0; i < 1000; i++) {
      const value = rng.nextFloat();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });

  it('treats probabilities 0 and 1 as certain without drawing', () => {
    const rng = new SeededRng(7);
    const before = rng.getState();
    expect(rng.chance(0)).toBe(false);
    expect(rng.chance(1)).toBe(true);
    expect(rng.getState()).toBe(before);
  });
});

describe('tickSeed', () => {
  it('depends only on the world seed and the tick', () => {
    expect(tickSeed(42, 7)).toBe(tickSeed(42, 7));
    expect(tickSeed(42, 7)).not.toBe(tickSeed(42, 8));
    expect(tickSeed(42, 7)).not.toBe(tickSeed(43, 7));
  });

  it('returns an unsigned 32-bit integer', () => {
    const seed = tickSeed(1, 123456);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(2 ** 32);
  });
});
