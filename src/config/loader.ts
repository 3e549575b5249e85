/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CONFIGURATION LOADER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * <configDir>/funds.yaml             activeFunds + fund definitions (required)
 * <configDir>/validation_rules.yaml  global rules + per-fund overrides (optional)
 *
 * Loading is eager: shape errors (zod) and semantic errors are all collected
 * and reported in one ConfigError before any fund is calculated.
 *
 * SEMANTIC RULES (per fund):
 * - equity + fixed income allocation = 100 in every sub-portfolio
 * - a category that is not configured has allocation 0 everywhere
 * - each configured category has exactly one anchor, in its first tier
 * - tier numbers are unique within a category
 * - symbols are unique within the fund
 * - at most one cap-exempt component per category
 * - conditional triggers name a market_cap component of the same category in
 *   the same or an earlier tier
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
    CATEGORIES,
    Category,
    CategoryConfig,
    FundConfig,
    PipelineConfig,
    ValidationSettings,
} from '../types';
import { ConfigError } from '../types/errors';
import { mergeValidationSettings } from '../validation/config';
import { VALIDATION_DEFAULTS } from './constants';
import { CategoryDocument, FundDocument, FundsDocumentSchema, ValidationDocumentSchema } from './schema';

export const FUNDS_FILE = 'funds.yaml';
export const VALIDATION_FILE = 'validation_rules.yaml';

const ALLOCATION_TOLERANCE = 1e-9;

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function parseDocument<T extends z.ZodTypeAny>(text: string, schema: T, source: string): z.output<T> {
    let raw: unknown;
    try {
        raw = parseYaml(text);
    } catch (err) {
        throw new ConfigError(`invalid YAML (${err instanceof Error ? err.message : String(err)})`, source);
    }

    const result = schema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError(issues.join('; '), source);
    }
    return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SEMANTIC CHECKS
// ═══════════════════════════════════════════════════════════════════════════════

function toCategoryConfig(category: Category, doc: CategoryDocument): CategoryConfig {
    return {
        category,
        tiers: [...doc.tiers]
            .sort((a, b) => a.tier - b.tier)
            .map(t => ({ tier: t.tier, overflow: t.overflow, components: t.components })),
    };
}

function checkCategory(fundId: string, config: CategoryConfig): string[] {
    const problems: string[] = [];
    const where = `${fundId}.${config.category}`;

    const tierNumbers = config.tiers.map(t => t.tier);
    const duplicateTiers = tierNumbers.filter((n, i) => tierNumbers.indexOf(n) !== i);
    if (duplicateTiers.length > 0) {
        problems.push(`${where}: duplicate tier numbers ${[...new Set(duplicateTiers)].join(', ')}`);
    }

    const anchors = config.tiers.flatMap(t =>
        t.components.filter(c => c.mode === 'fixed' && c.weight === undefined).map(c => ({ tier: t.tier, symbol: c.symbol }))
    );
    if (anchors.length !== 1) {
        problems.push(`${where}: expected exactly one anchor (fixed component without weight), found ${anchors.length}`);
    } else if (anchors[0].tier !== config.tiers[0].tier) {
        problems.push(`${where}: anchor ${anchors[0].symbol} must be in the first tier (${config.tiers[0].tier})`);
    }

    const exempt = config.tiers.flatMap(t => t.components).filter(c => c.mode === 'market_cap' && c.capExempt);
    if (exempt.length > 1) {
        problems.push(`${where}: at most one cap-exempt component allowed, found ${exempt.map(c => c.symbol).join(', ')}`);
    }

    const marketCapTierOf = new Map<string, number>();
    for (const tier of config.tiers) {
        for (const component of tier.components) {
            if (component.mode === 'market_cap') {
                marketCapTierOf.set(component.symbol, tier.tier);
            }
        }
    }
    for (const tier of config.tiers) {
        for (const component of tier.components) {
            if (component.mode !== 'conditional_overflow') {
                continue;
            }
            const triggerTier = marketCapTierOf.get(component.trigger);
            if (triggerTier === undefined) {
                problems.push(`${where}: ${component.symbol} trigger ${component.trigger} is not a market_cap component of this category`);
            } else if (triggerTier > tier.tier) {
                problems.push(`${where}: ${component.symbol} trigger ${component.trigger} sits in a later tier (${triggerTier})`);
            }
        }
    }

    return problems;
}

export function buildFundConfig(id: string, doc: FundDocument): FundConfig {
    const problems: string[] = [];
    const categories: CategoryConfig[] = [];

    for (const category of CATEGORIES) {
        const categoryDoc = doc.categories[category];
        if (categoryDoc) {
            const config = toCategoryConfig(category, categoryDoc);
            problems.push(...checkCategory(id, config));
            categories.push(config);
        }
    }
    if (categories.length === 0) {
        problems.push(`${id}: no categories configured`);
    }

    const seen = new Set<string>();
    for (const category of categories) {
        for (const component of category.tiers.flatMap(t => t.components)) {
            if (seen.has(component.symbol)) {
                problems.push(`${id}: symbol ${component.symbol} appears more than once`);
            }
            seen.add(component.symbol);
        }
    }

    const names = new Set<string>();
    for (const sp of doc.subPortfolios) {
        if (names.has(sp.name)) {
            problems.push(`${id}: duplicate sub-portfolio ${sp.name}`);
        }
        names.add(sp.name);

        const total = sp.equityAllocation + sp.fixedIncomeAllocation;
        if (Math.abs(total - 100) > ALLOCATION_TOLERANCE) {
            problems.push(`${id}.${sp.name}: allocations sum to ${total}, expected 100`);
        }
        if (!doc.categories.equity && sp.equityAllocation > 0) {
            problems.push(`${id}.${sp.name}: equity allocation ${sp.equityAllocation} but no equity category configured`);
        }
        if (!doc.categories.fixed_income && sp.fixedIncomeAllocation > 0) {
            problems.push(`${id}.${sp.name}: fixed income allocation ${sp.fixedIncomeAllocation} but no fixed_income category configured`);
        }
    }

    if (problems.length > 0) {
        throw new ConfigError(problems.join('; '), FUNDS_FILE);
    }

    return {
        id,
        name: doc.name,
        subPortfolios: doc.subPortfolios.map(sp => ({
            name: sp.name,
            equityAllocation: sp.equityAllocation,
            fixedIncomeAllocation: sp.fixedIncomeAllocation,
            anchorWeight: sp.anchorWeight ?? doc.anchorWeight,
        })),
        categories,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

export function parseFundsConfig(text: string): Pick<PipelineConfig, 'activeFunds' | 'funds'> {
    const doc = parseDocument(text, FundsDocumentSchema, FUNDS_FILE);

    const unknown = doc.activeFunds.filter(id => !(id in doc.funds));
    if (unknown.length > 0) {
        throw new ConfigError(`activeFunds names undefined funds: ${unknown.join(', ')}`, FUNDS_FILE);
    }

    const funds: Record<string, FundConfig> = {};
    for (const [id, fundDoc] of Object.entries(doc.funds)) {
        funds[id] = buildFundConfig(id, fundDoc);
    }
    return { activeFunds: [...new Set(doc.activeFunds)], funds };
}

export function parseValidationConfig(text: string | null): PipelineConfig['validation'] {
    const doc = text === null
        ? ValidationDocumentSchema.parse({})
        : parseDocument(text, ValidationDocumentSchema, VALIDATION_FILE);

    const defaults: ValidationSettings = {
        ...VALIDATION_DEFAULTS,
        reconciliation: { ...VALIDATION_DEFAULTS.reconciliation },
    };
    return {
        global: mergeValidationSettings(defaults, doc.global),
        fundOverrides: doc.fundOverrides,
    };
}

function readOptional(file: string): string | null {
    return fs.existsSync(file) ? fs.readFileSync(file, 'utf8') : null;
}

/**
 * Load and check everything under `configDir`.
 *
 * @throws ConfigError listing every problem found
 */
export function loadPipelineConfig(configDir: string): PipelineConfig {
    const fundsPath = path.join(configDir, FUNDS_FILE);
    const fundsText = readOptional(fundsPath);
    if (fundsText === null) {
        throw new ConfigError('file not found', fundsPath);
    }

    const { activeFunds, funds } = parseFundsConfig(fundsText);
    const validation = parseValidationConfig(readOptional(path.join(configDir, VALIDATION_FILE)));

    const strayOverrides = Object.keys(validation.fundOverrides).filter(id => !(id in funds));
    if (strayOverrides.length > 0) {
        throw new ConfigError(`fundOverrides for undefined funds: ${strayOverrides.join(', ')}`, VALIDATION_FILE);
    }

    return { activeFunds, funds, validation };
}

/**
 * Funds to run: all active ones, or just `fundFilter`.
 *
 * @throws ConfigError when the filter names a fund that is not configured
 */
export function selectFunds(config: PipelineConfig, fundFilter?: string): FundConfig[] {
    if (fundFilter !== undefined) {
        const fund = config.funds[fundFilter];
        if (!fund) {
            throw new ConfigError(`unknown fund "${fundFilter}" (configured: ${Object.keys(config.funds).join(', ')})`);
        }
        return [fund];
    }
    return config.activeFunds.map(id => config.funds[id]);
}
