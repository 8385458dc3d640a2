export { MonteCarloSimulator, runSimulation } from './MonteCarloSimulator';
export type { ProgressCallback } from './MonteCarloSimulator';
export {
  agreementVector,
  agrees,
  directionMask,
  directionVector,
  FULL_SUBSET,
  SUBSET_COUNT,
} from './AgreementEvaluator';
export type { DirectionVector } from './AgreementEvaluator';
export { createRiskSampler, IndependentRiskSampler, TentRiskSampler } from './RiskSampler';
export type { RiskBounds, RiskSampler, SamplingMode } from './RiskSampler';
export { bitmaskOf, codeOf, probability } from './SubsetCode';
export {
  DEFAULT_SIMULATION_CONFIG,
  FIGURE_PRESETS,
  isFigurePreset,
  presetConfig,
  resolveConfig,
} from './config';
export type { FigurePreset, SimulationConfig, SimulationConfigInput } from './config';
