// ============================================
// Seedable Random Source
// Deterministic PRNG and weighted choice for hit selection
// ============================================

/**
 * A random source returning floats in [0, 1).
 * Math.random satisfies this; tests inject a seeded one.
 */
export type Rng = () => number;

// Simple string -> uint32 hash (FNV-1a)
export function hashSeed(seed: string): number {
  let h = 0x811c9dc5 >>> 0;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h >>> 0;
}

/**
 * Mulberry32 PRNG (small, fast, deterministic).
 * A zero seed is bumped to 1 so the sequence never degenerates.
 */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0 || 1;
  return function next() {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Create a seeded RNG from a number or string (match id, creature id, etc.).
 */
export function createRng(seed: string | number): Rng {
  const seedNum = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  return mulberry32(seedNum);
}

export interface WeightedEntry<T> {
  item: T;
  weight: number;
}

/**
 * Weighted choice over a cumulative-weight array.
 *
 * Draws a uniform value over the total weight and returns the first entry
 * whose cumulative weight exceeds it. Non-positive weights never win.
 * Returns undefined when there is nothing to pick.
 */
export function pickWeighted<T>(rng: Rng, entries: readonly WeightedEntry<T>[]): T | undefined {
  const cumulative: number[] = [];
  let total = 0;
  for (const entry of entries) {
    total += Math.max(0, entry.weight);
    cumulative.push(total);
  }
  if (total <= 0) return undefined;

  const roll = rng() * total;
  for (let i = 0; i < entries.length; i++) {
    if (roll < cumulative[i]) return entries[i].item;
  }

  // Float edge: roll landed exactly on the total
  for (let i = entries.length - 1; i >= 0; i--) {
    if (entries[i].weight > 0) return entries[i].item;
  }
  return undefined;
}
