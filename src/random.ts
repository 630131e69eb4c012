/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

// mulberry32
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform sample of `count` items without replacement (partial Fisher-Yates).
 * The input array is not modified.
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  const n = Math.min(Math.max(count, 0), pool.length);

  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) break;
    pool[j] = current;
    pool[i] = picked;
  }

  return pool.slice(0, n);
}
