/** Largest seed that maps to a distinct 32-bit PRNG state. */
export const MAX_SEED = 0xffff_ffff

/** mulberry32: small, fast and fully reproducible for a given 32-bit seed. */
export function createSeededRandom(seed: number): () => number {
  let state = normalizeSeed(seed)
  return () => {
    state = (state + 0x6d2b79f5) | 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296
  }
}

function normalizeSeed(seed: number) {
  if (!Number.isFinite(seed)) return 0
  return Math.trunc(seed) | 0
}
