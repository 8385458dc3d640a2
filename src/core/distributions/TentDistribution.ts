/**
 * Tent (triangular) distribution
 *
 * Density rises linearly from `lower` to a peak and falls linearly to `upper`.
 * Used to draw a treatment risk conditioned on a control risk: the peak is the
 * control risk, so treatment risks near it are the most likely.
 *
 * CDF:
 *   F(r) = (r - L)² / ((c - L)(U - L))        for r ≤ c
 *   F(r) = 1 - (U - r)² / ((U - L)(U - c))    for r > c
 *
 * Sampling inverts F by bisection (see bisectQuantile). The closed-form
 * quantile is kept for checking it.
 */

import { RNG } from '../math/random';
import { EmmError, ErrorCode } from '../errors';

export const DEFAULT_BISECTION_PRECISION = 1_000_000;

export interface TentDistributionOptions {
  rng?: RNG;
  /** Bisection stops once its step is no larger than 1 / precision */
  precision?: number;
}

export class TentDistribution {
  private rng: RNG;
  readonly resolution: number;

  constructor(
    private readonly lower: number,
    private readonly upper: number,
    private readonly peak: number,
    options: TentDistributionOptions = {}
  ) {
    if (!Number.isFinite(lower) || !Number.isFinite(upper) || upper <= lower) {
      throw new EmmError(
        ErrorCode.INVALID_INPUT,
        `Invalid Tent bounds: [${lower}, ${upper}]. Upper bound must exceed lower bound.`,
        { lower, upper }
      );
    }

    const precision = options.precision ?? DEFAULT_BISECTION_PRECISION;
    if (!Number.isFinite(precision) || precision <= 0) {
      throw new EmmError(ErrorCode.INVALID_INPUT, `Invalid bisection precision: ${precision}`, {
        precision,
      });
    }

    this.rng = options.rng ?? new RNG();
    this.resolution = 1 / precision;
  }

  /**
   * Probability density function
   */
  pdf(x: number): number {
    const { lower, upper, peak } = this;
    if (x < lower || x > upper) return 0;

    const span = upper - lower;
    if (x <= peak) {
      return (2 * (x - lower)) / (span * (peak - lower));
    }
    return (2 * (upper - x)) / (span * (upper - peak));
  }

  logPdf(x: number): number {
    return Math.log(this.pdf(x));
  }

  /**
   * Cumulative distribution function, 0 below the support and 1 above it
   */
  cdf(x: number): number {
    const { lower, upper, peak } = this;
    if (x <= lower) return 0;
    if (x >= upper) return 1;

    const span = upper - lower;
    if (x <= peak) {
      return ((x - lower) * (x - lower)) / ((peak - lower) * span);
    }
    return 1 - ((upper - x) * (upper - x)) / (span * (upper - peak));
  }

  /**
   * Exact inverse CDF
   */
  quantile(p: number): number {
    const { lower, upper, peak } = this;
    if (p <= 0) return lower;
    if (p >= 1) return upper;

    const span = upper - lower;
    if (p <= (peak - lower) / span) {
      return lower + Math.sqrt(p * span * (peak - lower));
    }
    return upper - Math.sqrt((1 - p) * span * (upper - peak));
  }

  /**
   * Inverse CDF by bisection.
   *
   * Starts at the midpoint with a step of a quarter of the support, moves
   * against the sign of F(r) - u and halves the step until it is no larger
   * than `resolution`. An exact hit returns early. The result lies within
   * 2 × resolution of quantile(u).
   */
  bisectQuantile(u: number): number {
    const span = this.upper - this.lower;
    let risk = this.lower + span / 2;

    for (let step = span / 4; step > this.resolution; step /= 2) {
      const current = this.cdf(risk);
      if (current === u) {
        return risk;
      }
      if (current > u) {
        risk -= step;
      } else {
        risk += step;
      }
    }

    return risk;
  }

  /**
   * Draw one value: a uniform u pushed through bisectQuantile
   */
  sample(rng?: RNG): number {
    return this.bisectQuantile((rng ?? this.rng).uniform());
  }

  sampleMultiple(n: number, rng?: RNG): number[] {
    const samples: number[] = new Array(n);
    for (let i = 0; i < n; i++) {
      samples[i] = this.sample(rng);
    }
    return samples;
  }

  /**
   * Mean: (L + U + c) / 3
   */
  mean(): number {
    return (this.lower + this.upper + this.peak) / 3;
  }

  /**
   * Variance: (L² + U² + c² - LU - Lc - Uc) / 18
   */
  variance(): number {
    const { lower: a, upper: b, peak: c } = this;
    return (a * a + b * b + c * c - a * b - a * c - b * c) / 18;
  }

  mode(): number {
    return this.peak;
  }

  support(): { min: number; max: number } {
    return { min: this.lower, max: this.upper };
  }
}
