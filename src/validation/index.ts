/**
 * Weight Validation Module
 *
 * Runs after calculation and before anything is persisted. A fund whose
 * report is not valid is a failed fund; warnings travel with a successful one.
 *
 * ```typescript
 * import { validateFund, settingsForFund } from './validation';
 *
 * const report = validateFund(inputs, settingsForFund(config, fund.id));
 * if (!report.isValid) {
 *     return failed(report.errors.join('; '));
 * }
 * ```
 */

export { validateFund, validateSubPortfolio } from './weightValidator';
export { mergeValidationSettings, settingsForFund } from './config';
export type {
    FundValidationReport,
    SubPortfolioInput,
    ValidationMetrics,
    ValidationResult,
} from './types';
