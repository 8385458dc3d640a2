/**
 * Simulation configuration
 */

import { DEFAULT_BISECTION_PRECISION } from '../core/distributions/TentDistribution';
import { EmmError, ErrorCode } from '../core/errors';
import { ConfigValidator } from '../domain/validation/ConfigValidator';

export interface SimulationConfig {
  /** Lowest risk the samplers draw */
  lowerBound: number;
  /** Highest risk the samplers draw */
  upperBound: number;
  trialCount: number;
  /** Draw each treatment risk from a tent centred on its control risk */
  tentMode: boolean;
  /**
   * Bisection resolution for tent sampling is 1 / bisectionPrecision.
   * Defaults to trialCount, so a single setting drives both unless this is
   * given explicitly.
   */
  bisectionPrecision: number;
  /** Seed for the Mersenne Twister; omitted means auto-seeded */
  seed?: number;
  /** Log the first trial through console.debug */
  debug: boolean;
}

export type SimulationConfigInput = Partial<SimulationConfig>;

export const DEFAULT_SIMULATION_CONFIG: Readonly<Omit<SimulationConfig, 'seed'>> = Object.freeze({
  lowerBound: 0,
  upperBound: 1,
  trialCount: DEFAULT_BISECTION_PRECISION,
  tentMode: true,
  bisectionPrecision: DEFAULT_BISECTION_PRECISION,
  debug: false,
});

export type FigurePreset = 'figure1' | 'figure2' | 'appendixD';

/**
 * Settings behind each published figure. Figure 1 and Figure 2 draw all four
 * risks independently; Appendix D models treatment risk with the tent.
 */
export const FIGURE_PRESETS: Readonly<Record<FigurePreset, SimulationConfigInput>> = Object.freeze({
  figure1: { lowerBound: 0, upperBound: 1, tentMode: false },
  figure2: { lowerBound: 0, upperBound: 0.1, tentMode: false },
  appendixD: { lowerBound: 0, upperBound: 1, tentMode: true },
});

export function isFigurePreset(name: string): name is FigurePreset {
  return Object.prototype.hasOwnProperty.call(FIGURE_PRESETS, name);
}

export function presetConfig(name: string): SimulationConfigInput {
  if (!isFigurePreset(name)) {
    throw new EmmError(ErrorCode.INVALID_CONFIG, `Unknown figure preset: '${name}'`, {
      preset: name,
      available: Object.keys(FIGURE_PRESETS),
    });
  }
  return { ...FIGURE_PRESETS[name] };
}

/**
 * Fill in defaults and validate.
 * bisectionPrecision follows trialCount unless given explicitly.
 */
export function resolveConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const trialCount = input.trialCount ?? DEFAULT_SIMULATION_CONFIG.trialCount;
  const config: SimulationConfig = {
    lowerBound: input.lowerBound ?? DEFAULT_SIMULATION_CONFIG.lowerBound,
    upperBound: input.upperBound ?? DEFAULT_SIMULATION_CONFIG.upperBound,
    trialCount,
    tentMode: input.tentMode ?? DEFAULT_SIMULATION_CONFIG.tentMode,
    bisectionPrecision: input.bisectionPrecision ?? trialCount,
    debug: input.debug ?? DEFAULT_SIMULATION_CONFIG.debug,
  };
  if (input.seed !== undefined) {
    config.seed = input.seed;
  }

  ConfigValidator.validate(config);
  return config;
}
