/**
 * Weight Validator Tests
 */

import { VALIDATION_DEFAULTS } from '../src/config/constants';
import { WeightRow } from '../src/types';
import { SubPortfolioInput, validateFund, validateSubPortfolio } from '../src/validation';

function rows(weights: Record<string, number>, subPortfolio = 'SP'): WeightRow[] {
    return Object.entries(weights).map(([symbol, weight]) => ({
        date: '20250821',
        fundId: 'fund',
        subPortfolio,
        symbol,
        name: symbol,
        category: 'equity',
        tier: 2,
        weight,
    }));
}

function input(weights: Record<string, number>, extra: Partial<SubPortfolioInput> = {}): SubPortfolioInput {
    return {
        name: 'SP',
        rows: rows(weights),
        expectedSymbols: Object.keys(weights),
        ...extra,
    };
}

const BALANCED = { A: 19.25, B: 19.25, C: 19.25, D: 19.25, E: 15, F: 8 };

describe('validateSubPortfolio', () => {
    test('accepts a complete portfolio that sums to 100 within the cap', () => {
        const result = validateSubPortfolio(input(BALANCED), VALIDATION_DEFAULTS);

        expect(result.isValid).toBe(true);
        expect(result.errors).toEqual([]);
        expect(result.metrics).toEqual({
            totalWeight: 100,
            maxWeight: 19.25,
            componentCount: 6,
            negativeCount: 0,
            missingCount: 0,
        });
    });

    test('warns about positions within the band below the cap', () => {
        const result = validateSubPortfolio(input({ ...BALANCED, E: 14.9, F: 8.1 }), VALIDATION_DEFAULTS);

        expect(result.warnings).toEqual(['SP: Positions within 0.5% of cap 19.25%: A, B, C, D']);
    });

    test('rejects a sum outside the tolerance', () => {
        const result = validateSubPortfolio(input({ ...BALANCED, F: 7 }), VALIDATION_DEFAULTS);

        expect(result.isValid).toBe(false);
        expect(result.errors).toEqual(['SP: Weight sum 99.000000000% != 100% (tolerance: ±0.0001%)']);
    });

    test('accepts a sum within the tolerance', () => {
        const result = validateSubPortfolio(input({ ...BALANCED, F: 8.00005 }), VALIDATION_DEFAULTS);

        expect(result.isValid).toBe(true);
    });

    test('rejects positions above the concentration cap', () => {
        const result = validateSubPortfolio(input({ A: 20, B: 19.25, C: 19.25, D: 19.25, E: 14.25, F: 8 }), VALIDATION_DEFAULTS);

        expect(result.errors).toEqual(['SP: Concentration cap violation - 1 positions exceed 19.25%: A']);
    });

    test('cap-exempt symbols may exceed the cap and raise no near-cap warning', () => {
        const result = validateSubPortfolio(
            input({ A: 40, B: 19.25, C: 19.25, D: 13.5, E: 8 }, { capExempt: ['A'] }),
            VALIDATION_DEFAULTS
        );

        expect(result.isValid).toBe(true);
        expect(result.warnings).toEqual(['SP: Positions within 0.5% of cap 19.25%: B, C']);
    });

    test('rejects negative weights', () => {
        const result = validateSubPortfolio(input({ ...BALANCED, E: 24, F: -1 }), VALIDATION_DEFAULTS);

        expect(result.errors).toEqual(expect.arrayContaining(['SP: Negative weights found: F']));
        expect(result.metrics.negativeCount).toBe(1);
    });

    test('reports expected symbols without a weight', () => {
        const result = validateSubPortfolio(
            input(BALANCED, { expectedSymbols: [...Object.keys(BALANCED), 'G'] }),
            VALIDATION_DEFAULTS
        );

        expect(result.errors).toEqual(['SP: Missing weights for: G']);
        expect(result.metrics.missingCount).toBe(1);
    });

    test('a non-finite weight counts as missing', () => {
        const result = validateSubPortfolio(input({ ...BALANCED, F: NaN }), VALIDATION_DEFAULTS);

        expect(result.errors).toEqual([
            'SP: Weight sum 92.000000000% != 100% (tolerance: ±0.0001%)',
            'SP: Missing weights for: F',
        ]);
    });

    test('collects every failing check at once', () => {
        const result = validateSubPortfolio(input({ A: 30, B: -5 }), VALIDATION_DEFAULTS);

        expect(result.errors).toEqual([
            'SP: Weight sum 25.000000000% != 100% (tolerance: ±0.0001%)',
            'SP: Concentration cap violation - 1 positions exceed 19.25%: A',
            'SP: Negative weights found: B',
        ]);
    });

    test('is idempotent and leaves its input untouched', () => {
        const data = input({ A: 30, B: 19.1, C: 50.9 });
        const before = structuredClone(data);

        const first = validateSubPortfolio(data, VALIDATION_DEFAULTS);
        const second = validateSubPortfolio(data, VALIDATION_DEFAULTS);

        expect(second).toEqual(first);
        expect(data).toEqual(before);
    });
});

describe('validateFund', () => {
    test('is valid only when every sub-portfolio is', () => {
        const report = validateFund(
            [input(BALANCED), { ...input({ ...BALANCED, F: 7 }), name: 'SP2' }],
            VALIDATION_DEFAULTS
        );

        expect(report.isValid).toBe(false);
        expect(report.subPortfolios.map(sp => [sp.name, sp.result.isValid])).toEqual([
            ['SP', true],
            ['SP2', false],
        ]);
        expect(report.errors).toEqual(['SP2: Weight sum 99.000000000% != 100% (tolerance: ±0.0001%)']);
        expect(report.warnings).toEqual([
            'SP: Positions within 0.5% of cap 19.25%: A, B, C, D',
            'SP2: Positions within 0.5% of cap 19.25%: A, B, C, D',
        ]);
    });

    test('honours stricter settings', () => {
        const report = validateFund([input(BALANCED)], { ...VALIDATION_DEFAULTS, concentrationCap: 19 });

        expect(report.errors).toEqual(['SP: Concentration cap violation - 4 positions exceed 19%: A, B, C, D']);
    });
});
