/**
 * Config Validator
 *
 * Rejects simulation settings no run can be built from. Bounds outside
 * [0, 1] are allowed: the measures just turn non-finite.
 */

import type { SimulationConfig } from '../../simulation/config';
import { EmmError, ErrorCode } from '../../core/errors';

export class ConfigValidator {
  /**
   * Validate a fully resolved configuration
   */
  static validate(config: SimulationConfig): void {
    this.validateTrialCount(config);
    this.validateBounds(config);
    this.validatePrecision(config);
    this.validateSeed(config);
  }

  private static validateTrialCount(config: SimulationConfig): void {
    const { trialCount } = config;
    if (!Number.isInteger(trialCount) || trialCount <= 0) {
      throw new EmmError(ErrorCode.INVALID_CONFIG, 'trialCount must be a positive integer', {
        trialCount,
      });
    }
  }

  private static validateBounds(config: SimulationConfig): void {
    const { lowerBound, upperBound } = config;

    if (!Number.isFinite(lowerBound) || !Number.isFinite(upperBound)) {
      throw new EmmError(ErrorCode.INVALID_CONFIG, 'Risk bounds must be finite numbers', {
        lowerBound,
        upperBound,
      });
    }

    if (upperBound <= lowerBound) {
      throw new EmmError(ErrorCode.INVALID_CONFIG, 'upperBound must be greater than lowerBound', {
        lowerBound,
        upperBound,
      });
    }
  }

  private static validatePrecision(config: SimulationConfig): void {
    const { bisectionPrecision } = config;
    if (!Number.isFinite(bisectionPrecision) || bisectionPrecision <= 0) {
      throw new EmmError(ErrorCode.INVALID_CONFIG, 'bisectionPrecision must be positive', {
        bisectionPrecision,
      });
    }
  }

  private static validateSeed(config: SimulationConfig): void {
    if (config.seed !== undefined && !Number.isInteger(config.seed)) {
      throw new EmmError(ErrorCode.INVALID_CONFIG, 'seed must be an integer', {
        seed: config.seed,
      });
    }
  }
}
