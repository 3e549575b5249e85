// Type Definitions for the Fund Weights Pipeline

// ═══════════════════════════════════════════════════════════════════════════════
// FUND CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Asset category a component is allocated from
 */
export type Category = 'fixed_income' | 'equity';

export const CATEGORIES: readonly Category[] = ['fixed_income', 'equity'];

/**
 * Fixed-weight component. Without an explicit weight it is the category anchor
 * and receives the sub-portfolio's anchor weight.
 */
export interface FixedComponent {
    mode: 'fixed';
    symbol: string;
    name: string;
    weight?: number;
}

/**
 * Market-cap weighted component of a proportional tier
 */
export interface MarketCapComponent {
    mode: 'market_cap';
    symbol: string;
    name: string;
    capExempt: boolean;
}

/**
 * Receives the category's unabsorbed allocation, but only while its trigger
 * sits at the per-tier ceiling
 */
export interface ConditionalOverflowComponent {
    mode: 'conditional_overflow';
    symbol: string;
    name: string;
    trigger: string;
}

export type ComponentConfig = FixedComponent | MarketCapComponent | ConditionalOverflowComponent;

export type OverflowPolicy = 'redistribute' | 'cascade';

export interface TierConfig {
    tier: number;
    overflow: OverflowPolicy;
    components: ComponentConfig[];
}

export interface CategoryConfig {
    category: Category;
    /** Sorted by ascending tier number */
    tiers: TierConfig[];
}

export interface SubPortfolioConfig {
    name: string;
    equityAllocation: number;
    fixedIncomeAllocation: number;
    anchorWeight: number;
}

export interface FundConfig {
    id: string;
    name: string;
    subPortfolios: SubPortfolioConfig[];
    categories: CategoryConfig[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ReconciliationSettings {
    enabled: boolean;
    /** Absolute change (percentage points) above which an alert is raised */
    changeThreshold: number;
}

export interface ValidationSettings {
    concentrationCap: number;
    sumTolerance: number;
    /** Width of the early-warning band below the cap */
    nearCapBand: number;
    reconciliation: ReconciliationSettings;
}

export interface PipelineConfig {
    activeFunds: string[];
    funds: Record<string, FundConfig>;
    validation: {
        global: ValidationSettings;
        fundOverrides: Record<string, Partial<Omit<ValidationSettings, 'reconciliation'>> & {
            reconciliation?: Partial<ReconciliationSettings>;
        }>;
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET DATA
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Market capitalization per symbol for one calculation date. Frozen once built.
 * `returns` is only present when a returns formula is configured; symbols the
 * provider had no return for are absent from it.
 */
export interface MarketObservation {
    readonly date: string;
    readonly marketCaps: Readonly<Record<string, number>>;
    readonly returns?: Readonly<Record<string, number>>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface WeightRow {
    date: string;
    fundId: string;
    subPortfolio: string;
    symbol: string;
    name: string;
    category: Category;
    tier: number;
    /** Percentage */
    weight: number;
    /** Component return for the date, when fetched */
    ret?: number;
}

/**
 * Calculator output for one sub-portfolio
 */
export interface SubPortfolioWeights {
    subPortfolio: string;
    rows: WeightRow[];
    /** Allocation the waterfall could not place, keyed by category */
    shortfall: Partial<Record<Category, number>>;
    notes: string[];
}

export interface WeightResult {
    fundId: string;
    date: string;
    subPortfolios: SubPortfolioWeights[];
}

export type FundStatus = 'SUCCESS' | 'FAILED';

export interface SubPortfolioOutcome {
    name: string;
    valid: boolean;
    errors: string[];
    warnings: string[];
}

/**
 * Per-fund record handed to the notifier
 */
export interface FundRunResult {
    fund: string;
    status: FundStatus;
    runtimeSeconds: number;
    warnings: string[];
    alerts: string[];
    error?: string;
    outputPath?: string;
    versionId?: string;
    subPortfolios: SubPortfolioOutcome[];
}

export type ExitCode = 0 | 1 | 2;
