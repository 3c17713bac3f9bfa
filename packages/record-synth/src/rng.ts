/**
 * Uniform source in [0, 1).
 */
export type Rng = () => number

/**
 * Creates a random source. A seed gives a reproducible mulberry32 sequence;
 * without one, `Math.random` is used.
 */
export const createRng = (seed?: number): Rng => {
  if (seed == null) {
    return () => Math.random()
  }
  let value = seed >>> 0
  return () => {
    value |= 0
    value = (value + 0x6d2b79f5) | 0
    let t = Math.imul(value ^ (value >>> 15), 1 | value)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export const randomInt = (rng: Rng, min: number, max: number): number =>
  Math.min(max, min + Math.floor(rng() * (max - min + 1)))
