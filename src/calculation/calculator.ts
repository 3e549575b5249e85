/**
 * Weight Calculator — Tiered Waterfall Per Category
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ORDER OF EVALUATION (per category, tiers ascending)
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. fixed members          → explicit weight, or the anchor weight for the anchor
 * 2. market_cap members     → proportional split of what is left (tierAllocation)
 * 3. conditional_overflow   → category residual if the trigger is at the ceiling,
 *                             exactly 0 otherwise
 *
 * After the last tier, a residual is absorbed by the category's cap-exempt
 * component if there is one; otherwise it is reported as shortfall and left
 * for the validator's sum check to reject.
 *
 * Pure: (fund, sub-portfolio, observation) → rows. No shared mutable state.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { CALCULATION_CONSTANTS } from '../config/constants';
import {
    Category,
    CategoryConfig,
    FundConfig,
    MarketObservation,
    SubPortfolioConfig,
    SubPortfolioWeights,
    WeightResult,
    WeightRow,
} from '../types';
import { CalculationError } from '../types/errors';
import { createSilentLogger, Logger } from '../utils/logger';
import { allocateProportional, ProportionalMember } from './tierAllocation';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function categoryAllocation(subPortfolio: SubPortfolioConfig, category: Category): number {
    return category === 'equity' ? subPortfolio.equityAllocation : subPortfolio.fixedIncomeAllocation;
}

function requireMarketCap(observation: MarketObservation, symbol: string): number {
    const value = observation.marketCaps[symbol];
    if (value === undefined || !Number.isFinite(value) || value <= 0) {
        throw new CalculationError(`No usable market cap for ${symbol}`, {
            symbol,
            date: observation.date,
        });
    }
    return value;
}

function sumValues(weights: Map<string, number>): number {
    let total = 0;
    for (const w of weights.values()) {
        total += w;
    }
    return total;
}

/**
 * Symbols whose market cap the fund's waterfall reads (anchors and explicitly
 * weighted components need none)
 */
/**
 * Every component symbol of a fund, fixed ones included
 */
export function fundSymbols(fund: FundConfig): string[] {
    return fund.categories.flatMap(c => c.tiers.flatMap(t => t.components.map(component => component.symbol)));
}

export function requiredSymbols(fund: FundConfig): string[] {
    const symbols: string[] = [];
    for (const category of fund.categories) {
        for (const tier of category.tiers) {
            for (const component of tier.components) {
                if (component.mode !== 'fixed') {
                    symbols.push(component.symbol);
                }
            }
        }
    }
    return symbols;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORY WATERFALL
// ═══════════════════════════════════════════════════════════════════════════════

interface CategoryOutcome {
    weights: Map<string, number>;
    shortfall: number;
    notes: string[];
}

function calculateCategory(
    category: CategoryConfig,
    subPortfolio: SubPortfolioConfig,
    observation: MarketObservation,
    logger: Logger
): CategoryOutcome {
    const allocation = categoryAllocation(subPortfolio, category.category);
    const ceiling = subPortfolio.anchorWeight;
    const weights = new Map<string, number>();
    const notes: string[] = [];
    const tag = `${subPortfolio.name}/${category.category}`;

    if (subPortfolio.anchorWeight > allocation + CALCULATION_CONSTANTS.EPSILON) {
        throw new CalculationError(
            `Anchor weight ${subPortfolio.anchorWeight} exceeds ${category.category} allocation ${allocation} in ${subPortfolio.name}`,
            { subPortfolio: subPortfolio.name, category: category.category, allocation, anchorWeight: subPortfolio.anchorWeight }
        );
    }

    for (const tier of category.tiers) {
        const label = `${tag} tier ${tier.tier}`;

        for (const component of tier.components) {
            if (component.mode === 'fixed') {
                const weight = component.weight ?? subPortfolio.anchorWeight;
                weights.set(component.symbol, weight);
                logger.debug(`[CALC] ${label} ${component.symbol}: fixed weight=${weight}`);
            }
        }

        const members: ProportionalMember[] = [];
        for (const component of tier.components) {
            if (component.mode === 'market_cap') {
                members.push({
                    symbol: component.symbol,
                    marketCap: requireMarketCap(observation, component.symbol),
                    capExempt: component.capExempt,
                });
            }
        }

        if (members.length > 0) {
            const remaining = allocation - sumValues(weights);
            if (remaining <= CALCULATION_CONSTANTS.EPSILON) {
                notes.push(`${label}: no remaining allocation, ${members.length} components set to 0`);
            }

            const result = allocateProportional(members, remaining, ceiling, tier.overflow, label);
            for (const m of members) {
                weights.set(m.symbol, result.weights[m.symbol]);
                logger.debug(
                    `[CALC] ${label} ${m.symbol}: mcap=${m.marketCap}, weight=${result.weights[m.symbol].toFixed(9)}`
                );
            }

            if (result.capped.length > 0) {
                logger.debug(`[CALC] ${label}: capped at ${ceiling}: ${result.capped.join(', ')}`);
            }
            if (tier.overflow === 'redistribute' && result.unplaced > 0) {
                notes.push(
                    `${label}: ${result.unplaced.toFixed(9)} could not be redistributed within the tier ` +
                    `(capped: ${result.capped.join(', ') || 'none'})`
                );
            }
        }

        for (const component of tier.components) {
            if (component.mode !== 'conditional_overflow') {
                continue;
            }
            const triggerWeight = weights.get(component.trigger) ?? 0;
            let weight = 0;
            if (triggerWeight >= ceiling) {
                weight = Math.max(0, allocation - sumValues(weights));
                logger.debug(`[CALC] ${label} ${component.symbol}: ${component.trigger} at ceiling, overflow=${weight.toFixed(9)}`);
            } else {
                logger.debug(`[CALC] ${label} ${component.symbol}: ${component.trigger} below ceiling, weight=0`);
            }
            weights.set(component.symbol, weight);
        }
    }

    let residual = allocation - sumValues(weights);
    if (residual > CALCULATION_CONSTANTS.EPSILON) {
        const exempt = category.tiers
            .flatMap(t => t.components)
            .find(c => c.mode === 'market_cap' && c.capExempt);

        if (exempt) {
            weights.set(exempt.symbol, (weights.get(exempt.symbol) ?? 0) + residual);
            notes.push(`${tag}: cap-exempt ${exempt.symbol} absorbed ${residual.toFixed(9)}`);
            residual = 0;
        } else {
            notes.push(`${tag}: ${residual.toFixed(9)} of ${allocation} left unallocated`);
        }
    }

    return {
        weights,
        shortfall: residual > CALCULATION_CONSTANTS.EPSILON ? residual : 0,
        notes,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compute every component weight of one sub-portfolio.
 *
 * @throws CalculationError on a missing or non-positive market cap, or an
 *   anchor weight larger than a category's allocation
 */
export function calculateSubPortfolio(
    fund: FundConfig,
    subPortfolio: SubPortfolioConfig,
    observation: MarketObservation,
    logger: Logger = createSilentLogger()
): SubPortfolioWeights {
    const rows: WeightRow[] = [];
    const shortfall: SubPortfolioWeights['shortfall'] = {};
    const notes: string[] = [];

    for (const category of fund.categories) {
        const outcome = calculateCategory(category, subPortfolio, observation, logger);

        for (const tier of category.tiers) {
            for (const component of tier.components) {
                const row: WeightRow = {
                    date: observation.date,
                    fundId: fund.id,
                    subPortfolio: subPortfolio.name,
                    symbol: component.symbol,
                    name: component.name,
                    category: category.category,
                    tier: tier.tier,
                    weight: outcome.weights.get(component.symbol) ?? 0,
                };
                const ret = observation.returns?.[component.symbol];
                if (ret !== undefined) {
                    row.ret = ret;
                }
                rows.push(row);
            }
        }

        if (outcome.shortfall > 0) {
            shortfall[category.category] = outcome.shortfall;
        }
        notes.push(...outcome.notes);
    }

    return { subPortfolio: subPortfolio.name, rows, shortfall, notes };
}

/**
 * Run the waterfall for every sub-portfolio of a fund.
 */
export function calculateFund(
    fund: FundConfig,
    observation: MarketObservation,
    logger: Logger = createSilentLogger()
): WeightResult {
    logger.info(`[CALC] ${fund.id}: calculating ${fund.subPortfolios.length} sub-portfolios for ${observation.date}`);

    const subPortfolios = fund.subPortfolios.map(sp =>
        calculateSubPortfolio(fund, sp, observation, logger)
    );

    return { fundId: fund.id, date: observation.date, subPortfolios };
}
