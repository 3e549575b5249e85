/**
 * Weight Validation Module - Configuration
 *
 * Global rules from validation_rules.yaml with the fund's overrides laid on
 * top; `reconciliation` merges key by key.
 */

import { PipelineConfig, ValidationSettings } from '../types';

type FundOverride = PipelineConfig['validation']['fundOverrides'][string];

export function mergeValidationSettings(
    global: ValidationSettings,
    override: FundOverride | undefined
): ValidationSettings {
    if (!override) {
        return { ...global, reconciliation: { ...global.reconciliation } };
    }

    const { reconciliation, ...rest } = override;
    return {
        ...global,
        ...rest,
        reconciliation: { ...global.reconciliation, ...reconciliation },
    };
}

export function settingsForFund(config: PipelineConfig, fundId: string): ValidationSettings {
    return mergeValidationSettings(config.validation.global, config.validation.fundOverrides[fundId]);
}
