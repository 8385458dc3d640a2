/**
 * Result objects for simulation runs
 */

export { AnalysisResult } from './AnalysisResult';
export type { ExportFormat } from './AnalysisResult';
export type { ResultMetadata } from './ResultMetadata';
export { AgreementResult } from './AgreementResult';
export type { SubsetAgreement } from './AgreementResult';
