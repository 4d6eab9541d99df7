/**
 * Random number helpers.
 *
 * Everything that draws randomly takes an `rng` returning floats in
 * [0, 1), so tests and clustering can pin the sequence with a seed.
 */

/** A source of uniform floats in [0, 1). */
export type Rng = () => number;

/**
 * Create a deterministic PRNG (mulberry32) from a 32-bit seed.
 * The same seed always yields the same sequence.
 */
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Pick an index in [0, length) using `rng`. */
export function randomIndex(length: number, rng: Rng): number {
  return Math.min(length - 1, Math.floor(rng() * length));
}

/** Fisher-Yates shuffle into a new array; the input is left untouched. */
export function shuffle<T>(items: readonly T[], rng: Rng): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, rng);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
