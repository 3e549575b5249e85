/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * PIPELINE — ONE INVOCATION FOR ONE BUSINESS DATE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. Load and check configuration                       (fatal on error)
 * 2. Fetch market caps for every symbol of every fund   (fatal on error)
 *    and returns, when configured                       (warning on error)
 * 3. Run each fund in turn                               (failures stay per fund)
 * 4. Send exactly one summary notification
 *
 * A fatal error sends one critical notification instead and exits 2.
 *
 * EXIT CODES:
 *   0  every fund succeeded
 *   1  some funds failed
 *   2  no fund succeeded, or the run was aborted
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import { fundSymbols, requiredSymbols } from '../calculation';
import { DefaultConfig } from '../config/default';
import { loadPipelineConfig, selectFunds } from '../config/loader';
import { MarketDataClient, MarketDataSource } from '../services/marketData';
import { buildRunSummary, createNotifier, Notifier } from '../services/notifier';
import { VersionedOutputStore } from '../storage';
import { ExitCode, FundConfig, FundRunResult, MarketObservation, PipelineConfig } from '../types';
import { MarketDataError } from '../types/errors';
import { generateRunId } from '../utils/id';
import { createRunLogger, LogCollector, Logger } from '../utils/logger';
import { runFund } from './fundRunner';

export interface PipelineOptions {
    /** Business date, YYYYMMDD */
    date: string;
    /** Run only this fund (active or not) */
    fund?: string;
    env: DefaultConfig;
}

export interface PipelineDependencies {
    marketData?: MarketDataSource;
    notifier?: Notifier;
    store?: VersionedOutputStore;
    /** One logger for the pipeline and every fund */
    logger?: Logger;
    /** Builds the `pipeline` logger and one logger per fund id; ignored when `logger` is set */
    loggerFactory?: (name: string) => Logger;
    collector?: LogCollector;
}

export interface PipelineOutcome {
    runId: string;
    exitCode: ExitCode;
    results: FundRunResult[];
    /** Set when the run was aborted before any fund was processed */
    fatalError?: Error;
}

export function determineExitCode(results: readonly FundRunResult[]): ExitCode {
    if (results.length > 0 && results.every(r => r.status === 'SUCCESS')) {
        return 0;
    }
    if (results.every(r => r.status === 'FAILED')) {
        return 2;
    }
    return 1;
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

interface PreparedRun {
    config: PipelineConfig;
    funds: FundConfig[];
    observation: MarketObservation;
}

async function prepare(options: PipelineOptions, deps: PipelineDependencies, logger: Logger): Promise<PreparedRun> {
    const config = loadPipelineConfig(options.env.CONFIG_DIR);
    const funds = selectFunds(config, options.fund);

    const symbols = [...new Set(funds.flatMap(requiredSymbols))].sort();
    logger.info(`[MARKET-DATA] ${funds.length} funds need ${symbols.length} unique symbols`);

    const marketData = deps.marketData ?? new MarketDataClient(options.env.MARKET_DATA, { logger });
    const observation = await marketData.getMarketCaps(symbols, options.date);

    const returnSymbols = [...new Set(funds.flatMap(fundSymbols))].sort();
    let returns: Readonly<Record<string, number>> = {};
    try {
        returns = await marketData.getReturns(returnSymbols, options.date);
    } catch (err) {
        if (!(err instanceof MarketDataError)) {
            throw err;
        }
        logger.warn(`[MARKET-DATA] returns unavailable, Return column left empty: ${err.message}`);
    }

    return { config, funds, observation: Object.freeze({ ...observation, returns }) };
}

export async function runPipeline(
    options: PipelineOptions,
    deps: PipelineDependencies = {}
): Promise<PipelineOutcome> {
    const { date, env } = options;
    const runId = generateRunId();

    const collector = deps.collector ?? new LogCollector();
    let logger: Logger;
    let fundLogger: (fundId: string) => Logger;
    if (deps.logger) {
        logger = deps.logger.child({ runId });
        fundLogger = () => logger;
    } else {
        let makeLogger = deps.loggerFactory;
        if (!makeLogger) {
            fs.mkdirSync(env.LOG_DIR, { recursive: true });
            makeLogger = name => createRunLogger(name, date, env.LOG_DIR, [collector], env.LOG_LEVEL);
        }
        const factory = makeLogger;
        logger = factory('pipeline').child({ runId });
        fundLogger = fundId => factory(fundId).child({ runId });
    }

    const notifier = deps.notifier ?? createNotifier(env.NOTIFY_WEBHOOK_URL, logger);

    logger.info(`[PIPELINE] run ${runId} for ${date}${options.fund ? ` (fund ${options.fund})` : ''}`);

    // Fatal stage: config + market data
    let prepared: PreparedRun;
    try {
        prepared = await prepare(options, deps, logger);
    } catch (err) {
        const error = toError(err);
        logger.error(`[PIPELINE] aborted: ${error.name}: ${error.message}`);
        try {
            await notifier.sendCriticalFailure(date, error, collector.toLines());
        } catch (notifyErr) {
            logger.error(`[NOTIFY] critical notification failed: ${toError(notifyErr).message}`);
        }
        return { runId, exitCode: 2, results: [], fatalError: error };
    }
    const { config, funds, observation } = prepared;

    // Per-fund stage
    const store = deps.store ?? new VersionedOutputStore(env.OUTPUT_DIR, logger);
    const results: FundRunResult[] = [];
    for (const fund of funds) {
        results.push(runFund(fund, { config, observation, store, runId, logger: fundLogger(fund.id) }));
    }

    const exitCode = determineExitCode(results);
    const succeeded = results.filter(r => r.status === 'SUCCESS').length;
    logger.info(`[PIPELINE] ${succeeded}/${results.length} funds succeeded, exit code ${exitCode}`);

    try {
        await notifier.sendSummary(buildRunSummary(date, results));
    } catch (err) {
        logger.error(`[NOTIFY] summary notification failed: ${toError(err).message}`);
    }

    return { runId, exitCode, results };
}
