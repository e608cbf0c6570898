/**
 * Deterministic xorshift32 PRNG for simulation-safe randomness.
 * Physics never touches Math.random() or the clock.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = normalizeSeed(seed);
  }

  getState(): number {
    return this.state >>> 0;
  }

  nextUint(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    return this.nextUint() / 4294967295;
  }

  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.nextFloat() < probability;
  }
}

function normalizeSeed(seed: number): number {
  const normalized = (seed | 0) >>> 0;
  return normalized === 0 ? 0x9e3779b9 : normalized;
}

/** murmur3 finalizer */
function mix32(value: number): number {
  let h = value >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/** Seed for one tick's physics, derived only from the world seed and tick number */
export function tickSeed(worldSeed: number, tick: number): number {
  return mix32((worldSeed >>> 0) ^ Math.imul(tick >>> 0, 0x9e3779b1));
}
