/**
 * Weight Validator - Sum, Concentration Cap, Sign And Completeness Checks
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * CHECKS (all evaluated, never short-circuited)
 * 1. |Σ weights − 100| ≤ sumTolerance
 * 2. weight ≤ cap + sumTolerance          (cap-exempt symbols skipped)
 * 3. weight ≥ 0
 * 4. every expected symbol carries a finite weight
 * W. cap − nearCapBand < weight ≤ cap     → warning only
 *
 * The input is never modified. Same input → same errors and warnings.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { OUTPUT_CONSTANTS } from '../config/constants';
import { ValidationSettings } from '../types';
import { FundValidationReport, SubPortfolioInput, ValidationResult } from './types';

function list(symbols: string[]): string {
    return symbols.join(', ');
}

/**
 * Validate one sub-portfolio.
 */
export function validateSubPortfolio(
    input: SubPortfolioInput,
    settings: ValidationSettings
): ValidationResult {
    const { concentrationCap: cap, sumTolerance, nearCapBand } = settings;
    const exempt = new Set(input.capExempt ?? []);
    const errors: string[] = [];
    const warnings: string[] = [];

    const finiteRows = input.rows.filter(r => Number.isFinite(r.weight));
    const present = new Set(finiteRows.map(r => r.symbol));

    const totalWeight = finiteRows.reduce((acc, r) => acc + r.weight, 0);
    const maxWeight = finiteRows.length > 0 ? Math.max(...finiteRows.map(r => r.weight)) : 0;

    // CHECK 1: sum
    if (Math.abs(totalWeight - OUTPUT_CONSTANTS.TOTAL_WEIGHT) > sumTolerance) {
        errors.push(
            `${input.name}: Weight sum ${totalWeight.toFixed(OUTPUT_CONSTANTS.WEIGHT_DECIMALS)}% != 100% ` +
            `(tolerance: ±${sumTolerance}%)`
        );
    }

    // CHECK 2: concentration cap
    const overCap = finiteRows
        .filter(r => !exempt.has(r.symbol) && r.weight > cap + sumTolerance)
        .map(r => r.symbol);
    if (overCap.length > 0) {
        errors.push(
            `${input.name}: Concentration cap violation - ${overCap.length} positions exceed ${cap}%: ${list(overCap)}`
        );
    }

    // CHECK 3: negative weights
    const negative = finiteRows.filter(r => r.weight < 0).map(r => r.symbol);
    if (negative.length > 0) {
        errors.push(`${input.name}: Negative weights found: ${list(negative)}`);
    }

    // CHECK 4: completeness
    const missing = input.expectedSymbols.filter(s => !present.has(s));
    if (missing.length > 0) {
        errors.push(`${input.name}: Missing weights for: ${list(missing)}`);
    }

    // WARNING: near the cap
    const nearCap = finiteRows
        .filter(r => !exempt.has(r.symbol) && r.weight > cap - nearCapBand && r.weight <= cap)
        .map(r => r.symbol);
    if (nearCap.length > 0) {
        warnings.push(`${input.name}: Positions within ${nearCapBand}% of cap ${cap}%: ${list(nearCap)}`);
    }

    return {
        isValid: errors.length === 0,
        errors,
        warnings,
        metrics: {
            totalWeight,
            maxWeight,
            componentCount: input.rows.length,
            negativeCount: negative.length,
            missingCount: missing.length,
        },
    };
}

/**
 * Validate every sub-portfolio of a fund independently. The fund is valid
 * only if each of them is.
 */
export function validateFund(
    inputs: readonly SubPortfolioInput[],
    settings: ValidationSettings
): FundValidationReport {
    const subPortfolios = inputs.map(input => ({
        name: input.name,
        result: validateSubPortfolio(input, settings),
    }));

    return {
        isValid: subPortfolios.every(sp => sp.result.isValid),
        subPortfolios,
        errors: subPortfolios.flatMap(sp => sp.result.errors),
        warnings: subPortfolios.flatMap(sp => sp.result.warnings),
    };
}
