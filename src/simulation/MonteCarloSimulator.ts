// src/simulation/MonteCarloSimulator.ts
import { RNG } from '../core/math/random';
import { AgreementResult } from '../domain/results/AgreementResult';
import { agreementVector, directionVector, SUBSET_COUNT } from './AgreementEvaluator';
import { createRiskSampler, type RiskSampler } from './RiskSampler';
import { resolveConfig, type SimulationConfig, type SimulationConfigInput } from './config';

export type ProgressCallback = (progress: number) => void;

/**
 * Monte Carlo estimate of how often each subset of effect measures agrees
 * in direction between two randomly drawn strata.
 */
export class MonteCarloSimulator {
  private readonly config: SimulationConfig;
  private readonly rng: RNG;
  private readonly sampler: RiskSampler;

  constructor(config: SimulationConfigInput = {}) {
    this.config = resolveConfig(config);
    this.rng = new RNG(this.config.seed);
    this.sampler = createRiskSampler(this.config, this.rng);

    if (this.config.debug) {
      console.debug(
        `MonteCarloSimulator: ${this.sampler.mode} sampling, ${this.config.trialCount} trials, ` +
          `bounds [${this.config.lowerBound}, ${this.config.upperBound}], seed ${this.config.seed ?? 'auto'}`
      );
    }
  }

  getConfig(): Readonly<SimulationConfig> {
    return this.config;
  }

  /**
   * Run every trial and freeze the tallies into a result
   */
  run(onProgress?: ProgressCallback): AgreementResult {
    const { trialCount } = this.config;
    const tallies = new Array<number>(SUBSET_COUNT).fill(0);
    const progressInterval = Math.max(1, Math.floor(trialCount / 100));
    const started = performance.now();

    for (let i = 0; i < trialCount; i++) {
      const [first, second] = this.sampler.sampleStrata();

      if (this.config.debug && i === 0) {
        console.debug('First trial strata:', first, second);
        console.debug('First trial directions:', directionVector(first, second));
      }

      const agreement = agreementVector(first, second);
      for (let bitmask = 0; bitmask < SUBSET_COUNT; bitmask++) {
        if (agreement[bitmask]) {
          tallies[bitmask]++;
        }
      }

      if (onProgress && (i + 1) % progressInterval === 0 && i + 1 < trialCount) {
        onProgress((i + 1) / trialCount);
      }
    }
    onProgress?.(1);

    const metadata = {
      timestamp: new Date(),
      computeTime: performance.now() - started,
      samplingMode: this.sampler.mode,
      ...(this.config.seed !== undefined ? { seed: this.config.seed } : {}),
    };

    return new AgreementResult(tallies, this.config, metadata);
  }
}

/**
 * Tally of agreeing trials per subset bitmask
 */
export function runSimulation(
  trialCount: number,
  tentMode: boolean,
  options: Omit<SimulationConfigInput, 'trialCount' | 'tentMode'> = {}
): number[] {
  const simulator = new MonteCarloSimulator({ ...options, trialCount, tentMode });
  return [...simulator.run().getTallies()];
}
