import { evaluate, type EffectMeasureVector } from './EffectMeasures';

/**
 * A population subgroup: risk of the outcome without and with treatment.
 * Bounds are the caller's responsibility.
 */
export interface Stratum {
  readonly controlRisk: number;
  readonly treatmentRisk: number;
}

export function createStratum(controlRisk: number, treatmentRisk: number): Stratum {
  return Object.freeze({ controlRisk, treatmentRisk });
}

export function effectMeasuresOf(stratum: Stratum): EffectMeasureVector {
  return evaluate(stratum.controlRisk, stratum.treatmentRisk);
}
