/**
 * Weight Calculation Module
 *
 * ```typescript
 * import { calculateFund } from './calculation';
 *
 * const result = calculateFund(fund, observation, logger);
 * for (const sp of result.subPortfolios) {
 *     sp.notes.forEach(note => logger.warn(note));
 * }
 * ```
 */

export {
    calculateFund,
    calculateSubPortfolio,
    categoryAllocation,
    fundSymbols,
    requiredSymbols,
} from './calculator';

export {
    allocateProportional,
    type ProportionalAllocation,
    type ProportionalMember,
} from './tierAllocation';
