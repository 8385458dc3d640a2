/**
 * Base class for simulation results
 */

import type { ResultMetadata } from './ResultMetadata';

export type ExportFormat = 'json' | 'csv';

/**
 * Common metadata access and text export
 */
export abstract class AnalysisResult {
  constructor(protected metadata: ResultMetadata) {}

  getMetadata(): ResultMetadata {
    return this.metadata;
  }

  /**
   * JSON-serializable form of the result
   */
  abstract toJSON(): object;

  /**
   * One header row and one row per record
   */
  abstract toCSV(): string;

  /**
   * Export the result as text in the given format
   */
  export(format: ExportFormat): string {
    if (format === 'json') {
      return JSON.stringify(this.toJSON(), null, 2);
    }
    return this.toCSV();
  }
}
