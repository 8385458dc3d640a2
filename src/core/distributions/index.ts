export { TentDistribution, DEFAULT_BISECTION_PRECISION } from './TentDistribution';
export type { TentDistributionOptions } from './TentDistribution';
