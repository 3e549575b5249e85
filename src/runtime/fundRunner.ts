/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * FUND RUNNER — calculate → validate → reconcile → persist, for one fund
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Never throws: every failure inside a fund becomes a FAILED record so the
 * caller can move on to the next fund.
 *
 * RULES:
 * - A fund whose validation fails is not persisted and is not reconciled
 * - Reconciliation alerts are informational; they never fail a fund
 * - Calculator notes and validator warnings both end up in `warnings`
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { calculateFund, fundSymbols } from '../calculation';
import { Reconciliator } from '../reconciliation';
import { VersionedOutputStore } from '../storage';
import { FundConfig, FundRunResult, MarketObservation, PipelineConfig, SubPortfolioOutcome } from '../types';
import { settingsForFund, SubPortfolioInput, validateFund } from '../validation';
import { Logger } from '../utils/logger';

export interface FundRunContext {
    config: PipelineConfig;
    observation: MarketObservation;
    store: VersionedOutputStore;
    runId: string;
    /** Pipeline logger, or the fund's own run logger */
    logger: Logger;
    /** Milliseconds, monotonic enough for runtimes */
    now?: () => number;
}

function capExemptSymbols(fund: FundConfig): string[] {
    return fund.categories
        .flatMap(c => c.tiers.flatMap(t => t.components))
        .filter(c => c.mode === 'market_cap' && c.capExempt)
        .map(c => c.symbol);
}

export function runFund(fund: FundConfig, context: FundRunContext): FundRunResult {
    const { config, observation, store, runId } = context;
    const now = context.now ?? Date.now;
    const logger = context.logger.child({ fund: fund.id });
    const started = now();
    const elapsed = (): number => (now() - started) / 1000;

    const warnings: string[] = [];
    let subPortfolios: SubPortfolioOutcome[] = [];

    logger.info(`[FUND] ${fund.id}: starting for ${observation.date}`);

    try {
        const settings = settingsForFund(config, fund.id);
        const weights = calculateFund(fund, observation, logger);
        for (const sp of weights.subPortfolios) {
            warnings.push(...sp.notes);
        }

        const expectedSymbols = fundSymbols(fund);
        const capExempt = capExemptSymbols(fund);
        const inputs: SubPortfolioInput[] = weights.subPortfolios.map(sp => ({
            name: sp.subPortfolio,
            rows: sp.rows,
            expectedSymbols,
            capExempt,
        }));
        const report = validateFund(inputs, settings);
        warnings.push(...report.warnings);
        subPortfolios = report.subPortfolios.map(({ name, result }) => ({
            name,
            valid: result.isValid,
            errors: result.errors,
            warnings: result.warnings,
        }));

        if (!report.isValid) {
            for (const error of report.errors) {
                logger.error(`[FUND] ${fund.id}: ${error}`);
            }
            return {
                fund: fund.id,
                status: 'FAILED',
                runtimeSeconds: elapsed(),
                warnings,
                alerts: [],
                error: `Validation failed: ${report.errors.join('; ')}`,
                subPortfolios,
            };
        }

        const rows = weights.subPortfolios.flatMap(sp => sp.rows);

        let alerts: string[] = [];
        if (settings.reconciliation.enabled) {
            const previous = store.findPrevious(fund.id, observation.date);
            if (previous) {
                const reconciliation = new Reconciliator(settings.reconciliation.changeThreshold)
                    .compare(rows, previous.rows);
                alerts = reconciliation.alerts;
                logger.info(
                    `[RECONCILE] ${fund.id}: compared with ${previous.date} ${previous.versionId}, ` +
                    `${reconciliation.flagged.length} changes above ${settings.reconciliation.changeThreshold}pp`
                );
                for (const alert of alerts) {
                    logger.warn(`[RECONCILE] ${fund.id}: ${alert}`);
                }
            } else {
                logger.info(`[RECONCILE] ${fund.id}: no previous result before ${observation.date}, skipping`);
            }
        }

        const artifact = store.save({
            fundId: fund.id,
            date: observation.date,
            runId,
            rows,
            runtimeSeconds: elapsed(),
            validationPassed: true,
            subPortfolioCount: weights.subPortfolios.length,
        });

        const runtimeSeconds = elapsed();
        logger.info(`[FUND] ${fund.id}: SUCCESS in ${runtimeSeconds.toFixed(1)}s → ${artifact.csvPath}`);

        return {
            fund: fund.id,
            status: 'SUCCESS',
            runtimeSeconds,
            warnings,
            alerts,
            outputPath: artifact.csvPath,
            versionId: artifact.versionId,
            subPortfolios,
        };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`[FUND] ${fund.id}: FAILED - ${message}`);
        return {
            fund: fund.id,
            status: 'FAILED',
            runtimeSeconds: elapsed(),
            warnings,
            alerts: [],
            error: message,
            subPortfolios,
        };
    }
}
