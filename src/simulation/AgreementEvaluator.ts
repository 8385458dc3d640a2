/**
 * Agreement between two strata
 *
 * A measure "points up" when its stratum-2 value is strictly greater than its
 * stratum-1 value. Ties and NaN point neither way and count as not up.
 * A subset of measures agrees when its members do not mix up and not-up.
 */

import {
  EFFECT_MEASURES,
  EFFECT_MEASURE_COUNT,
  evaluate,
} from '../core/measures/EffectMeasures';
import type { Stratum } from '../core/measures/Stratum';

/** Number of subsets of the six measures */
export const SUBSET_COUNT = 1 << EFFECT_MEASURE_COUNT;

/** Bitmask selecting every measure */
export const FULL_SUBSET = SUBSET_COUNT - 1;

/** One flag per measure, canonical order */
export type DirectionVector = readonly boolean[];

/**
 * Is each measure larger in the second stratum?
 */
export function directionVector(first: Stratum, second: Stratum): DirectionVector {
  const before = evaluate(first.controlRisk, first.treatmentRisk);
  const after = evaluate(second.controlRisk, second.treatmentRisk);
  return before.map((value, i) => after[i] > value);
}

/**
 * Bit weights of the measures pointing up, ORed together
 */
export function directionMask(directions: DirectionVector): number {
  let mask = 0;
  for (let i = 0; i < EFFECT_MEASURE_COUNT; i++) {
    if (directions[i]) {
      mask |= EFFECT_MEASURES[i].bitWeight;
    }
  }
  return mask;
}

/**
 * Do the measures selected by `bitmask` all point the same way?
 */
export function agrees(directions: DirectionVector, bitmask: number): boolean {
  const up = directionMask(directions);
  const notUp = FULL_SUBSET ^ up;
  return (bitmask & up) === 0 || (bitmask & notUp) === 0;
}

/**
 * Agreement flag for every subset, indexed by bitmask
 */
export function agreementVector(first: Stratum, second: Stratum): boolean[] {
  const up = directionMask(directionVector(first, second));
  const notUp = FULL_SUBSET ^ up;

  const agreement: boolean[] = new Array(SUBSET_COUNT);
  for (let bitmask = 0; bitmask < SUBSET_COUNT; bitmask++) {
    agreement[bitmask] = (bitmask & up) === 0 || (bitmask & notUp) === 0;
  }
  return agreement;
}
