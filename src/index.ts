/**
 * emm-venn - Monte Carlo estimates of effect-measure agreement
 *
 * Draws pairs of population strata, compares six effect measures (RR, RR*,
 * OR, RD, HR, HR*) between them and counts how often each subset of measures
 * agrees on the direction of change. The estimates fill a six-way Venn
 * diagram.
 */

// Error handling
export { EmmError, ErrorCode, isEmmError, wrapError } from './core/errors';

// Random number generation
export { RNG } from './core/math/random';

// Distributions
export { TentDistribution, DEFAULT_BISECTION_PRECISION } from './core/distributions';
export type { TentDistributionOptions } from './core/distributions';

// Effect measures
export * from './core/measures';

// Simulation
export * from './simulation';

// Results
export * from './domain/results';

// Venn diagram templating
export * from './venn';

export const VERSION = '0.1.0';
