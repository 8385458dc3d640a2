export {
  EFFECT_MEASURES,
  EFFECT_MEASURE_COUNT,
  LETTER_WEIGHTS,
  evaluate,
  relativeRisk,
  complementRelativeRisk,
  oddsRatio,
  riskDifference,
  hazardRatio,
  complementHazardRatio,
} from './EffectMeasures';
export type {
  EffectMeasureDefinition,
  EffectMeasureFn,
  EffectMeasureName,
  EffectMeasureVector,
  SubsetLetter,
} from './EffectMeasures';
export { createStratum, effectMeasuresOf } from './Stratum';
export type { Stratum } from './Stratum';
