/**
 * Agreement estimates for each published figure
 *
 * Runs a short simulation per preset and prints how often a few subsets of
 * effect measures agree. Run with: npx tsx examples/figure-estimates.ts
 */

import { MonteCarloSimulator } from '../src/simulation/MonteCarloSimulator';
import { FIGURE_PRESETS, type FigurePreset } from '../src/simulation/config';
import { formatProbability } from '../src/venn/VennTemplate';

// a = RR, b = OR, c = HR*, d = RR*, e = RD, f = HR
const CODES = ['ab', 'ae', 'ad', 'ef', 'abde', 'abcdef'];

export function figureEstimates(preset: FigurePreset, trialCount: number = 20_000): void {
  console.log(`=== ${preset} ===`);

  const simulator = new MonteCarloSimulator({ ...FIGURE_PRESETS[preset], trialCount, seed: 2021 });
  const result = simulator.run();

  for (const code of CODES) {
    console.log(`  ${code.padEnd(6)} ${formatProbability(result.probability(code), 4)}`);
  }
  console.log(`  (${trialCount} trials in ${result.getMetadata().computeTime.toFixed(0)} ms)\n`);
}

figureEstimates('figure1');
figureEstimates('figure2');
figureEstimates('appendixD');
