/**
 * Random sources for the price process
 *
 * A NormalSource returns one standard normal variate per call. Production
 * code draws from Math.random; tests and replays use a seeded generator or
 * the zero source.
 */

/**
 * Draws a standard normal variate (mean 0, variance 1)
 */
export type NormalSource = () => number;

/**
 * Draws a uniform variate in [0, 1)
 */
export type UniformSource = () => number;

/**
 * Box-Muller transform over a uniform source
 */
export function createStandardNormal(uniform: UniformSource = Math.random): NormalSource {
  return () => {
    let u = 0;
    let v = 0;
    // log(0) is -Infinity
    while (u === 0) u = uniform();
    while (v === 0) v = uniform();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  };
}

/**
 * mulberry32 uniform generator
 */
export function createSeededUniform(seed: number): UniformSource {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Reproducible standard normal stream
 */
export function createSeededNormal(seed: number): NormalSource {
  return createStandardNormal(createSeededUniform(seed));
}

/**
 * Zero-variance source: every draw is 0
 */
export const zeroNormal: NormalSource = () => 0;
