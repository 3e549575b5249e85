/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — LIBRARY SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Nothing runs at import time. The command line entry is src/start.ts; the
 * invocation itself lives in src/runtime/pipeline.ts.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './types';
export * from './types/errors';

export { calculateFund, calculateSubPortfolio, requiredSymbols, allocateProportional } from './calculation';
export { validateFund, validateSubPortfolio, settingsForFund } from './validation';
export { Reconciliator, benchmarkId, type ReconciliationReport } from './reconciliation';
export { VersionedOutputStore, decodeRows, encodeRows, type StoredArtifact } from './storage';

export { loadEnvConfig, type DefaultConfig } from './config/default';
export { loadPipelineConfig, parseFundsConfig, parseValidationConfig, selectFunds } from './config/loader';

export { MarketDataClient, type MarketDataSource } from './services/marketData';
export { buildRunSummary, LogNotifier, WebhookNotifier, type Notifier } from './services/notifier';

export { runFund } from './runtime/fundRunner';
export { determineExitCode, runPipeline, type PipelineOutcome } from './runtime/pipeline';
