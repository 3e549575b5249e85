/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * CONSTANTS — DEFAULT RULES FOR WEIGHT CALCULATION AND VALIDATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Everything here can be overridden through config/validation_rules.yaml
 * (globally or per fund). These are the values used when a key is absent.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ValidationSettings } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const VALIDATION_DEFAULTS: ValidationSettings = {
    /** Regulatory concentration limit per component (%) */
    concentrationCap: 19.25,

    /** Absolute tolerance on the 100% sum and on the cap (percentage points) */
    sumTolerance: 0.0001,

    /** Components within this many points below the cap raise a warning */
    nearCapBand: 0.5,

    reconciliation: {
        enabled: true,
        changeThreshold: 5.0,
    },
};

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

export const OUTPUT_CONSTANTS = {
    /** Decimal places written for every weight */
    WEIGHT_DECIMALS: 9,

    /** Decimal places written for component returns */
    RETURN_DECIMALS: 9,

    /** Target sum of each sub-portfolio (%) */
    TOTAL_WEIGHT: 100,

    /** Digits of the zero-padded version counter */
    VERSION_PAD: 3,

    /** Attempts at claiming a version number before giving up */
    MAX_VERSION_CLAIMS: 1000,
};

// ═══════════════════════════════════════════════════════════════════════════════
// CALCULATION
// ═══════════════════════════════════════════════════════════════════════════════

export const CALCULATION_CONSTANTS = {
    /**
     * Residuals smaller than this are float noise, not allocation
     * (well below the 9 reported decimals)
     */
    EPSILON: 1e-12,
};
