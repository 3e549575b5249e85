export { Reconciliator, benchmarkId } from './reconciliator';
export type { ReconciliationReport, WeightChange } from './types';
