import { clamp, createRandom, roundTo, uniform } from './random';

export type PerturbationVariant = 'rotate' | 'jitter';

export const JITTER_AMPLITUDE_BPM = 5;
export const PHYSIOLOGICAL_MIN_BPM = 50;
export const PHYSIOLOGICAL_MAX_BPM = 200;

type ValueCarrier = { value?: unknown };

/**
 * Rotates only the `value` field: `value'[i] = value[(i + k) mod n]` with
 * `k = seed mod n`. Every other field, including time, keeps its position.
 */
export function rotateValues<R extends ValueCarrier>(records: readonly R[], seed: number): R[] {
  const count = records.length;
  if (seed === 0 || count === 0) {
    return records.slice();
  }
  const offset = ((seed % count) + count) % count;
  return records.map((record, index) => ({
    ...record,
    value: records[(index + offset) % count].value
  }));
}

/**
 * Adds uniform noise in [-5, +5] to every numeric value, clamps the result to
 * the physiological range and rounds to two decimals. Non-numeric values are
 * left for the transformer to deal with but still consume a draw, so the
 * noise applied to a sample depends only on its position.
 */
export function jitterValues<R extends ValueCarrier>(records: readonly R[], seed: number): R[] {
  if (seed === 0) {
    return records.slice();
  }
  const random = createRandom(seed);
  return records.map((record) => {
    const variation = uniform(random, -JITTER_AMPLITUDE_BPM, JITTER_AMPLITUDE_BPM);
    if (typeof record.value !== 'number') {
      return { ...record };
    }
    const jittered = clamp(record.value + variation, PHYSIOLOGICAL_MIN_BPM, PHYSIOLOGICAL_MAX_BPM);
    return { ...record, value: roundTo(jittered, 2) };
  });
}

export function perturbValues<R extends ValueCarrier>(
  variant: PerturbationVariant,
  records: readonly R[],
  seed: number
): R[] {
  switch (variant) {
    case 'rotate':
      return rotateValues(records, seed);
    case 'jitter':
      return jitterValues(records, seed);
  }
}
