/**
 * Agreement tallies of a finished simulation
 */

import { AnalysisResult } from './AnalysisResult';
import type { ResultMetadata } from './ResultMetadata';
import type { SimulationConfig } from '../../simulation/config';
import { SUBSET_COUNT } from '../../simulation/AgreementEvaluator';
import { bitmaskOf, codeOf, probability } from '../../simulation/SubsetCode';
import { EmmError, ErrorCode } from '../../core/errors';

export interface SubsetAgreement {
  bitmask: number;
  code: string;
  count: number;
  probability: number;
}

export class AgreementResult extends AnalysisResult {
  private readonly tallies: readonly number[];

  constructor(
    tallies: readonly number[],
    private readonly config: SimulationConfig,
    metadata: ResultMetadata
  ) {
    super(metadata);

    if (tallies.length !== SUBSET_COUNT) {
      throw new EmmError(ErrorCode.INTERNAL_ERROR, `Expected ${SUBSET_COUNT} tallies`, {
        length: tallies.length,
      });
    }
    this.tallies = Object.freeze([...tallies]);
  }

  get trialCount(): number {
    return this.config.trialCount;
  }

  getConfig(): Readonly<SimulationConfig> {
    return this.config;
  }

  /**
   * Raw counts indexed by bitmask
   */
  getTallies(): readonly number[] {
    return this.tallies;
  }

  /**
   * Estimated probability that the measures named by `code` agree
   */
  probability(code: string): number {
    return probability(code, this.tallies, this.config.trialCount);
  }

  probabilityOf(bitmask: number): number {
    return this.probability(codeOf(bitmask));
  }

  countOf(code: string): number {
    return this.tallies[bitmaskOf(code)];
  }

  /**
   * Every subset in bitmask order
   */
  entries(): SubsetAgreement[] {
    return this.tallies.map((count, bitmask) => ({
      bitmask,
      code: codeOf(bitmask),
      count,
      probability: count / this.config.trialCount,
    }));
  }

  override toJSON(): object {
    return {
      config: this.config,
      metadata: {
        ...this.metadata,
        timestamp: this.metadata.timestamp.toISOString(),
      },
      subsets: this.entries(),
    };
  }

  override toCSV(): string {
    const rows = ['bitmask,code,count,probability'];
    for (const entry of this.entries()) {
      rows.push(`${entry.bitmask},${entry.code},${entry.count},${entry.probability}`);
    }
    return rows.join('\n');
  }
}
