/**
 * Risk samplers
 *
 * Each trial needs two strata. Independent mode draws all four risks
 * uniformly; tent mode draws each control risk uniformly and its treatment
 * risk from a tent peaked at that control risk.
 */

import { RNG } from '../core/math/random';
import { TentDistribution } from '../core/distributions/TentDistribution';
import { createStratum, type Stratum } from '../core/measures/Stratum';
import type { SimulationConfig } from './config';

export type SamplingMode = 'independent' | 'tent';

export interface RiskSampler {
  readonly mode: SamplingMode;
  /** Two fresh strata for one trial */
  sampleStrata(): [Stratum, Stratum];
}

export interface RiskBounds {
  lowerBound: number;
  upperBound: number;
}

export class IndependentRiskSampler implements RiskSampler {
  readonly mode = 'independent';

  constructor(
    private readonly bounds: RiskBounds,
    private readonly rng: RNG
  ) {}

  randRisk(): number {
    return this.rng.between(this.bounds.lowerBound, this.bounds.upperBound);
  }

  sampleStrata(): [Stratum, Stratum] {
    const first = createStratum(this.randRisk(), this.randRisk());
    const second = createStratum(this.randRisk(), this.randRisk());
    return [first, second];
  }
}

export class TentRiskSampler implements RiskSampler {
  readonly mode = 'tent';

  constructor(
    private readonly bounds: RiskBounds,
    private readonly rng: RNG,
    private readonly precision: number
  ) {}

  randRisk(): number {
    return this.rng.between(this.bounds.lowerBound, this.bounds.upperBound);
  }

  /**
   * Treatment risk drawn from a tent peaked at the control risk
   */
  tentRisk(controlRisk: number): number {
    return this.tentFor(controlRisk).sample(this.rng);
  }

  /**
   * The conditional distribution tentRisk draws from
   */
  tentFor(controlRisk: number): TentDistribution {
    return new TentDistribution(this.bounds.lowerBound, this.bounds.upperBound, controlRisk, {
      rng: this.rng,
      precision: this.precision,
    });
  }

  sampleStrata(): [Stratum, Stratum] {
    const p1 = this.randRisk();
    const p2 = this.tentRisk(p1);
    const p3 = this.randRisk();
    const p4 = this.tentRisk(p3);
    return [createStratum(p1, p2), createStratum(p3, p4)];
  }
}

export function createRiskSampler(config: SimulationConfig, rng: RNG): RiskSampler {
  const bounds = { lowerBound: config.lowerBound, upperBound: config.upperBound };
  return config.tentMode
    ? new TentRiskSampler(bounds, rng, config.bisectionPrecision)
    : new IndependentRiskSampler(bounds, rng);
}
