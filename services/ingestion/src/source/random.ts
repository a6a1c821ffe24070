const MODULUS = 2147483647;
const MULTIPLIER = 16807;

export type RandomSource = () => number;

/**
 * Park–Miller minimal standard generator. Returns values in [0, 1); a given
 * seed always yields the same sequence.
 */
export function createRandom(seed: number): RandomSource {
  // State must stay in [1, MODULUS - 1]; zero is a fixed point.
  let state = ((Math.trunc(seed) % MODULUS) + MODULUS) % MODULUS;
  if (state === 0) {
    state = MODULUS - 1;
  }
  return () => {
    state = (state * MULTIPLIER) % MODULUS;
    return (state - 1) / (MODULUS - 1);
  };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random();
}

/** Inclusive on both ends. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
