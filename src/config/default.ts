/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENVIRONMENT CONFIGURATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Everything that varies per host comes from the environment (populated from
 * .env by dotenv at startup). Fund definitions and validation rules live in
 * YAML under CONFIG_DIR, see ./loader.
 *
 * Credentials have no default. A missing MARKET_DATA_* credential is reported
 * when the client is built, not here, so tests and dry tooling can load this
 * module without them.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigError } from '../types/errors';

export interface MarketDataSettings {
    baseUrl: string;
    username: string;
    apiKey: string;
    /** Market cap formula template, `{date}` is replaced by the YYYYMMDD business date */
    formula: string;
    /** Returns formula template with the same `{date}` placeholder; null skips returns */
    returnsFormula: string | null;
    timeoutMs: number;
    retryAttempts: number;
    retryDelayMs: number;
}

export type DefaultConfig = {
    CONFIG_DIR: string;
    OUTPUT_DIR: string;
    LOG_DIR: string;
    LOG_LEVEL: string;
    NOTIFY_WEBHOOK_URL: string | null;
    MARKET_DATA: MarketDataSettings;
};

export const MARKET_DATA_DEFAULTS = {
    BASE_URL: 'https://api.marketdata.example.com/formula-api/v1',
    FORMULA: 'FG_MCAP_IDX({date},{date},,USD)',
    TIMEOUT_MS: 30_000,
    RETRY_ATTEMPTS: 3,
    RETRY_DELAY_MS: 2_000,
} as const;

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
    }
    return value;
}

function text(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
    const raw = env[key];
    return raw && raw.trim() !== '' ? raw.trim() : fallback;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): DefaultConfig {
    const webhook = text(env, 'NOTIFY_WEBHOOK_URL', '');
    const returnsFormula = text(env, 'MARKET_DATA_RETURNS_FORMULA', '');
    return {
        CONFIG_DIR: text(env, 'CONFIG_DIR', 'config'),
        OUTPUT_DIR: text(env, 'OUTPUT_DIR', 'output'),
        LOG_DIR: text(env, 'LOG_DIR', 'logs'),
        LOG_LEVEL: text(env, 'LOG_LEVEL', 'info'),
        NOTIFY_WEBHOOK_URL: webhook === '' ? null : webhook,
        MARKET_DATA: {
            baseUrl: text(env, 'MARKET_DATA_BASE_URL', MARKET_DATA_DEFAULTS.BASE_URL).replace(/\/+$/, ''),
            username: text(env, 'MARKET_DATA_USERNAME', ''),
            apiKey: text(env, 'MARKET_DATA_API_KEY', ''),
            formula: text(env, 'MARKET_DATA_FORMULA', MARKET_DATA_DEFAULTS.FORMULA),
            returnsFormula: returnsFormula === '' ? null : returnsFormula,
            timeoutMs: positiveInt(env, 'MARKET_DATA_TIMEOUT_MS', MARKET_DATA_DEFAULTS.TIMEOUT_MS),
            retryAttempts: positiveInt(env, 'MARKET_DATA_RETRY_ATTEMPTS', MARKET_DATA_DEFAULTS.RETRY_ATTEMPTS),
            retryDelayMs: positiveInt(env, 'MARKET_DATA_RETRY_DELAY_MS', MARKET_DATA_DEFAULTS.RETRY_DELAY_MS),
        },
    };
}
