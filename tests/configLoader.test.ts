/**
 * Configuration Loader Tests
 */

import * as path from 'path';
import { loadPipelineConfig, parseFundsConfig, parseValidationConfig, selectFunds } from '../src/config/loader';
import { ConfigError } from '../src/types/errors';
import { settingsForFund } from '../src/validation';

const CONFIG_DIR = path.join(__dirname, '..', 'config');

const MINIMAL = `
activeFunds: [demo]
funds:
  demo:
    name: Demo Fund
    anchorWeight: 19.25
    subPortfolios:
      - { name: D50, equityAllocation: 50, fixedIncomeAllocation: 50 }
      - { name: D70, equityAllocation: 70, fixedIncomeAllocation: 30, anchorWeight: 15 }
    categories:
      fixed_income:
        tiers:
          - tier: 3
            components:
              - { mode: market_cap, symbol: BOND2, name: Bond Two }
          - tier: 1
            components:
              - { mode: fixed, symbol: BOND1, name: Bond One }
      equity:
        tiers:
          - tier: 1
            components:
              - { mode: fixed, symbol: EQ1, name: Equity One }
          - tier: 2
            overflow: cascade
            components:
              - { mode: market_cap, symbol: EQ2, name: Equity Two, capExempt: true }
              - { mode: conditional_overflow, symbol: EQ3, name: Equity Three, trigger: EQ2 }
`;

function expectConfigError(text: string, fragment: string): void {
    let caught: unknown;
    try {
        parseFundsConfig(text);
    } catch (err) {
        caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toHaveProperty('message', expect.stringContaining(fragment));
}

describe('parseFundsConfig', () => {
    test('builds typed fund definitions with sorted tiers and inherited anchor weights', () => {
        const { activeFunds, funds } = parseFundsConfig(MINIMAL);

        expect(activeFunds).toEqual(['demo']);
        expect(funds.demo.subPortfolios).toEqual([
            { name: 'D50', equityAllocation: 50, fixedIncomeAllocation: 50, anchorWeight: 19.25 },
            { name: 'D70', equityAllocation: 70, fixedIncomeAllocation: 30, anchorWeight: 15 },
        ]);
        expect(funds.demo.categories.map(c => c.category)).toEqual(['fixed_income', 'equity']);
        expect(funds.demo.categories[0].tiers.map(t => [t.tier, t.overflow])).toEqual([
            [1, 'redistribute'],
            [3, 'redistribute'],
        ]);
        expect(funds.demo.categories[1].tiers[1].components).toEqual([
            { mode: 'market_cap', symbol: 'EQ2', name: 'Equity Two', capExempt: true },
            { mode: 'conditional_overflow', symbol: 'EQ3', name: 'Equity Three', trigger: 'EQ2' },
        ]);
    });

    test('rejects allocations that do not sum to 100', () => {
        expectConfigError(
            MINIMAL.replace('equityAllocation: 50, fixedIncomeAllocation: 50', 'equityAllocation: 50, fixedIncomeAllocation: 40'),
            'demo.D50: allocations sum to 90, expected 100'
        );
    });

    test('rejects a second anchor in a category', () => {
        expectConfigError(
            MINIMAL.replace(
                '- { mode: market_cap, symbol: BOND2, name: Bond Two }',
                '- { mode: fixed, symbol: BOND2, name: Bond Two }'
            ),
            'demo.fixed_income: expected exactly one anchor (fixed component without weight), found 2'
        );
    });

    test('rejects an anchor outside the first tier', () => {
        expectConfigError(
            MINIMAL
                .replace('- { mode: fixed, symbol: EQ1, name: Equity One }', '- { mode: fixed, symbol: EQ1, name: Equity One, weight: 10 }')
                .replace('- { mode: conditional_overflow, symbol: EQ3, name: Equity Three, trigger: EQ2 }', '- { mode: fixed, symbol: EQ3, name: Equity Three }'),
            'demo.equity: anchor EQ3 must be in the first tier (1)'
        );
    });

    test('rejects a trigger that is not a market_cap sibling', () => {
        expectConfigError(
            MINIMAL.replace('trigger: EQ2', 'trigger: EQ1'),
            'demo.equity: EQ3 trigger EQ1 is not a market_cap component of this category'
        );
    });

    test('rejects a duplicate symbol', () => {
        expectConfigError(
            MINIMAL.replace('symbol: EQ3', 'symbol: EQ2'),
            'demo: symbol EQ2 appears more than once'
        );
    });

    test('rejects an active fund that is not defined', () => {
        expectConfigError(MINIMAL.replace('activeFunds: [demo]', 'activeFunds: [demo, other]'), 'other');
    });

    test('rejects misspelled keys', () => {
        expectConfigError(MINIMAL.replace('capExempt: true', 'capexempt: true'), 'capexempt');
    });

    test('rejects an unknown component mode', () => {
        expectConfigError(MINIMAL.replace('mode: market_cap', 'mode: market_weight'), 'funds.demo.categories.fixed_income.tiers.0.components.0.mode');
    });

    test('rejects allocation to a category that is not configured', () => {
        const equityOnly = MINIMAL.slice(0, MINIMAL.indexOf('      fixed_income:')) +
            MINIMAL.slice(MINIMAL.indexOf('      equity:'));
        expectConfigError(equityOnly, 'demo.D50: fixed income allocation 50 but no fixed_income category configured');
    });

    test('reports invalid YAML as a configuration error', () => {
        expectConfigError('activeFunds: [demo\nfunds: {', 'invalid YAML');
    });
});

describe('parseValidationConfig', () => {
    test('falls back to the built-in defaults', () => {
        expect(parseValidationConfig(null)).toEqual({
            global: {
                concentrationCap: 19.25,
                sumTolerance: 0.0001,
                nearCapBand: 0.5,
                reconciliation: { enabled: true, changeThreshold: 5.0 },
            },
            fundOverrides: {},
        });
    });

    test('merges fund overrides over global rules, reconciliation key by key', () => {
        const validation = parseValidationConfig(`
global:
  sumTolerance: 0.001
fundOverrides:
  demo:
    concentrationCap: 20
    reconciliation:
      changeThreshold: 2.5
`);
        const { funds, activeFunds } = parseFundsConfig(MINIMAL);

        expect(settingsForFund({ activeFunds, funds, validation }, 'demo')).toEqual({
            concentrationCap: 20,
            sumTolerance: 0.001,
            nearCapBand: 0.5,
            reconciliation: { enabled: true, changeThreshold: 2.5 },
        });
    });
});

describe('loadPipelineConfig', () => {
    test('loads the shipped configuration', () => {
        const config = loadPipelineConfig(CONFIG_DIR);

        expect(config.activeFunds).toEqual(['multi_asset']);
        expect(config.funds.multi_asset.subPortfolios.map(sp => sp.name)).toEqual(['MA20', 'MA40', 'MA60', 'MA80']);
        expect(config.validation.global.concentrationCap).toBe(19.25);
    });

    test('a missing configuration directory is a configuration error', () => {
        expect(() => loadPipelineConfig(path.join(CONFIG_DIR, 'does-not-exist'))).toThrow(ConfigError);
    });
});

describe('selectFunds', () => {
    const config = loadPipelineConfig(CONFIG_DIR);

    test('returns the active funds by default', () => {
        expect(selectFunds(config).map(f => f.id)).toEqual(['multi_asset']);
    });

    test('rejects an unknown fund filter', () => {
        expect(() => selectFunds(config, 'nope')).toThrow('[CONFIG] unknown fund "nope" (configured: multi_asset)');
    });
});
