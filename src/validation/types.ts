/**
 * Weight Validation Module - Type Definitions
 */

import { WeightRow } from '../types';

export interface ValidationMetrics {
    /** Sum of all finite weights */
    totalWeight: number;
    /** Largest finite weight (0 when there is none) */
    maxWeight: number;
    componentCount: number;
    negativeCount: number;
    missingCount: number;
}

export interface ValidationResult {
    isValid: boolean;
    errors: string[];
    warnings: string[];
    metrics: ValidationMetrics;
}

/**
 * Rows of one sub-portfolio plus what the validator needs to judge them
 */
export interface SubPortfolioInput {
    name: string;
    rows: readonly WeightRow[];
    /** Symbols that must carry a weight */
    expectedSymbols: readonly string[];
    /** Symbols allowed above the concentration cap */
    capExempt?: readonly string[];
}

export interface FundValidationReport {
    isValid: boolean;
    subPortfolios: Array<{ name: string; result: ValidationResult }>;
    /** Every sub-portfolio's errors, in sub-portfolio order */
    errors: string[];
    warnings: string[];
}
