/**
 * Effect measures for a single stratum
 *
 * Six pure functions of (controlRisk, treatmentRisk). Nothing is validated:
 * risks on or outside the (0, 1) boundary give Infinity or NaN, and those
 * values flow into the direction comparisons unchanged.
 *
 * Canonical order: RR, RR*, OR, RD, HR, HR*
 */

/** Letters used by the Venn diagram to name each measure */
export type SubsetLetter = 'a' | 'b' | 'c' | 'd' | 'e' | 'f';

export type EffectMeasureName =
  | 'relativeRisk'
  | 'complementRelativeRisk'
  | 'oddsRatio'
  | 'riskDifference'
  | 'hazardRatio'
  | 'complementHazardRatio';

export type EffectMeasureFn = (controlRisk: number, treatmentRisk: number) => number;

export interface EffectMeasureDefinition {
  name: EffectMeasureName;
  /** Short label as written in the paper */
  label: string;
  letter: SubsetLetter;
  /** Weight of this measure's bit in a subset bitmask */
  bitWeight: number;
  compute: EffectMeasureFn;
}

/** Six measures, in canonical order */
export type EffectMeasureVector = readonly [number, number, number, number, number, number];

export const EFFECT_MEASURE_COUNT = 6;

/**
 * Bit weight of each letter in a subset bitmask. Fixed by the Venn diagram
 * asset: not sequential in canonical order.
 */
export const LETTER_WEIGHTS = Object.freeze({
  a: 32,
  b: 16,
  c: 1,
  d: 4,
  e: 8,
  f: 2,
} satisfies Record<SubsetLetter, number>);

/** RR = p_t / p_c */
export function relativeRisk(controlRisk: number, treatmentRisk: number): number {
  return treatmentRisk / controlRisk;
}

/** RR* = (1 - p_c) / (1 - p_t) */
export function complementRelativeRisk(controlRisk: number, treatmentRisk: number): number {
  return (1 - controlRisk) / (1 - treatmentRisk);
}

/** OR = RR × RR* */
export function oddsRatio(controlRisk: number, treatmentRisk: number): number {
  return (
    relativeRisk(controlRisk, treatmentRisk) * complementRelativeRisk(controlRisk, treatmentRisk)
  );
}

/** RD = p_t - p_c */
export function riskDifference(controlRisk: number, treatmentRisk: number): number {
  return treatmentRisk - controlRisk;
}

/** HR = ln(1 - p_t) / ln(1 - p_c) */
export function hazardRatio(controlRisk: number, treatmentRisk: number): number {
  return Math.log(1 - treatmentRisk) / Math.log(1 - controlRisk);
}

/** HR* = ln(p_c) / ln(p_t) */
export function complementHazardRatio(controlRisk: number, treatmentRisk: number): number {
  return Math.log(controlRisk) / Math.log(treatmentRisk);
}

/** Measure table, canonical order */
export const EFFECT_MEASURES: readonly EffectMeasureDefinition[] = [
  { name: 'relativeRisk', label: 'RR', letter: 'a', bitWeight: LETTER_WEIGHTS.a, compute: relativeRisk },
  { name: 'complementRelativeRisk', label: 'RR*', letter: 'd', bitWeight: LETTER_WEIGHTS.d, compute: complementRelativeRisk },
  { name: 'oddsRatio', label: 'OR', letter: 'b', bitWeight: LETTER_WEIGHTS.b, compute: oddsRatio },
  { name: 'riskDifference', label: 'RD', letter: 'e', bitWeight: LETTER_WEIGHTS.e, compute: riskDifference },
  { name: 'hazardRatio', label: 'HR', letter: 'f', bitWeight: LETTER_WEIGHTS.f, compute: hazardRatio },
  { name: 'complementHazardRatio', label: 'HR*', letter: 'c', bitWeight: LETTER_WEIGHTS.c, compute: complementHazardRatio },
];

/**
 * All six measures for one stratum, in canonical order
 */
export function evaluate(controlRisk: number, treatmentRisk: number): EffectMeasureVector {
  return [
    relativeRisk(controlRisk, treatmentRisk),
    complementRelativeRisk(controlRisk, treatmentRisk),
    oddsRatio(controlRisk, treatmentRisk),
    riskDifference(controlRisk, treatmentRisk),
    hazardRatio(controlRisk, treatmentRisk),
    complementHazardRatio(controlRisk, treatmentRisk),
  ];
}
