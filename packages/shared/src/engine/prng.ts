// ─── Seeded PRNG ───────────────────────────────────────────────────
// Deterministic pseudo-random number generation for reproducible
// games. All randomness flows through a seed — no Math.random().

/**
 * mulberry32 — a fast, high-quality 32-bit seeded PRNG.
 * Returns a function that produces the next pseudo-random float in [0, 1).
 */
function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * FNV-1a over the string's UTF-16 code units, as an unsigned 32-bit
 * integer. Turns a player-typed seed into a numeric PRNG seed.
 */
export function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * A seeded random number generator wrapping mulberry32.
 */
export class SeededRng {
  private readonly rng: () => number;

  constructor(seed: number) {
    this.rng = mulberry32(seed);
  }

  /** Returns the next pseudo-random float in [0, 1). */
  next(): number {
    return this.rng();
  }

  /**
   * Fisher-Yates shuffle (modern, from end to start).
   * Returns a **new** array — the input is never mutated.
   */
  shuffle<T>(array: readonly T[]): T[] {
    const result = array.slice();
    for (let i = result.length - 1; i > 0; i--) {
      const j = Math.floor(this.rng() * (i + 1));
      const tmp = result[i]!;
      result[i] = result[j]!;
      result[j] = tmp;
    }
    return result;
  }
}

/** Creates a new SeededRng from a numeric seed or a seed string. */
export function createRng(seed: number | string): SeededRng {
  return new SeededRng(typeof seed === "string" ? hashSeed(seed) : seed);
}
