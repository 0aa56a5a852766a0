/**
 * Turn an integer or string seed into an unsigned 32-bit integer.
 * Safe integers pass through (mod 2^32); anything else is hashed with FNV-1a.
 */
export function hashSeed(seed: number | string): number {
  if (typeof seed === "number" && Number.isSafeInteger(seed) && seed >= 0) {
    return seed % 0x100000000;
  }

  const text = String(seed);
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * mulberry32. One instance per planning call; never shared between runs.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [0, bound). */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new Error(`nextInt bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.next() * bound);
  }

  /** Fisher-Yates, returns a shuffled copy. */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = out[i];
      out[i] = out[j];
      out[j] = tmp;
    }
    return out;
  }

  pick<T>(items: readonly T[]): T {
    return items[this.nextInt(items.length)];
  }
}
