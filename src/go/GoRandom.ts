/**
 * Deterministic seeded PRNG using xorshift32.
 * A string seed is hashed into a 32-bit integer; numbers are used directly.
 */
export class SeededRng {
  private state: number;

  constructor(seed: string | number) {
    this.state = typeof seed === 'number' ? seed >>> 0 : SeededRng.hashString(seed);
    if (this.state === 0) this.state = 1; // xorshift cannot have state 0
  }

  private static hashString(s: string): number {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
    }
    return hash === 0 ? 1 : Math.abs(hash);
  }

  /** Return next pseudo-random 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Return a float in [0, 1) */
  nextFloat(): number {
    return this.next() / 4294967296;
  }

  /** A `() => number` source for SearchConfig.random */
  asSource(): () => number {
    return () => this.nextFloat();
  }
}

/** Integer in [0, max) drawn from a [0, 1) source */
export function randomInt(random: () => number, max: number): number {
  return Math.min(max - 1, Math.floor(random() * max));
}

/** Uniform pick; undefined for an empty list */
export function randomElement<T>(random: () => number, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(random, items.length)];
}
