/**
 * Metadata that accompanies every simulation result
 */

import type { SamplingMode } from '../../simulation/RiskSampler';

export interface ResultMetadata {
  /** When the run finished */
  timestamp: Date;

  /** Wall-clock time of the trial loop in milliseconds */
  computeTime: number;

  /** Which sampler produced the strata */
  samplingMode: SamplingMode;

  /** Seed of the run, absent for auto-seeded runs */
  seed?: number;
}
