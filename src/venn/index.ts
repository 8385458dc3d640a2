export {
  DEFAULT_DIGITS,
  VENN_CODE_PATTERN,
  formatProbability,
  loadVennTemplate,
  renderVennDiagram,
  renderVennLine,
} from './VennTemplate';
export type { ProbabilityLookup } from './VennTemplate';
