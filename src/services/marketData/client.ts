/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * MARKET DATA CLIENT — Formula API market caps
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * One GET per attempt:
 *   <baseUrl>/time-series?ids=A,B,C&formulas=FG_MCAP_IDX(d,d,,USD)&flatten=Y
 * answered with
 *   { data: [{ requestId: 'A', 'FG_MCAP_IDX(d,d,,USD)': 123.4 }, ...] }
 *
 * RETRY POLICY:
 * - Connection failures, timeouts and unparseable bodies are retried with
 *   backoff retryDelayMs × 2^(attempt−1)
 * - Auth failures, unavailable data and missing symbols are final
 * - Exhausting the attempts rethrows the last connection error
 *
 * Returns go through the same request with the returns formula; they are
 * optional, so a symbol without one is left out instead of failing.
 *
 * The returned observation is frozen.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import axios from 'axios';
import { MarketDataSettings } from '../../config/default';
import { MarketObservation } from '../../types';
import {
    ApiAuthError,
    ApiConnectionError,
    DataNotAvailableError,
    MarketDataError,
    MissingDataError,
} from '../../types/errors';
import { createSilentLogger, Logger } from '../../utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSPORT
// ═══════════════════════════════════════════════════════════════════════════════

export interface HttpResponse {
    status: number;
    data: unknown;
}

export interface HttpRequestConfig {
    params: Record<string, string>;
    headers: Record<string, string>;
    timeout: number;
    validateStatus: (status: number) => boolean;
}

export type HttpGet = (url: string, config: HttpRequestConfig) => Promise<HttpResponse>;

const axiosGet: HttpGet = (url, config) => axios.get<unknown>(url, config);

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

function toNumber(raw: unknown): number | null {
    const value = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
    return Number.isFinite(value) ? value : null;
}

/**
 * Anything that can produce a market observation for a date
 */
export interface MarketDataSource {
    getMarketCaps(symbols: readonly string[], date: string): Promise<MarketObservation>;
    getReturns(symbols: readonly string[], date: string): Promise<Readonly<Record<string, number>>>;
}

export interface MarketDataClientOptions {
    http?: HttpGet;
    logger?: Logger;
    /** Backoff wait, replaced in tests */
    wait?: (ms: number) => Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class MarketDataClient implements MarketDataSource {
    private readonly http: HttpGet;
    private readonly logger: Logger;
    private readonly wait: (ms: number) => Promise<void>;

    constructor(
        private readonly settings: MarketDataSettings,
        options: MarketDataClientOptions = {}
    ) {
        this.http = options.http ?? axiosGet;
        this.logger = options.logger ?? createSilentLogger();
        this.wait = options.wait ?? sleep;
    }

    formulaFor(date: string): string {
        return this.settings.formula.split('{date}').join(date);
    }

    /**
     * Market caps for every symbol on `date` (YYYYMMDD).
     *
     * @throws ApiConnectionError after the last failed attempt
     * @throws ApiAuthError on rejected or unconfigured credentials
     * @throws DataNotAvailableError when the provider has nothing for the date
     * @throws MissingDataError naming every symbol without a positive value
     */
    async getMarketCaps(symbols: readonly string[], date: string): Promise<MarketObservation> {
        const ids = [...new Set(symbols)];
        if (ids.length === 0) {
            return Object.freeze({ date, marketCaps: Object.freeze({}) });
        }

        const formula = this.formulaFor(date);
        const marketCaps = await this.withRetry(async () => {
            const values = await this.fetchValues(ids, formula, date);
            const caps: Record<string, number> = {};
            const missing: string[] = [];
            for (const id of ids) {
                const value = toNumber(values.get(id));
                if (value !== null && value > 0) {
                    caps[id] = value;
                } else {
                    missing.push(id);
                }
            }
            if (missing.length > 0) {
                throw new MissingDataError(missing);
            }
            return caps;
        });

        this.logger.info(`[MARKET-DATA] fetched market caps for ${ids.length} symbols on ${date}`);
        return Object.freeze({ date, marketCaps: Object.freeze(marketCaps) });
    }

    /**
     * Returns for `date` through the configured returns formula. Without one,
     * resolves to an empty record and sends nothing. Symbols the provider has
     * no numeric return for are left out rather than reported.
     */
    async getReturns(symbols: readonly string[], date: string): Promise<Readonly<Record<string, number>>> {
        const ids = [...new Set(symbols)];
        const template = this.settings.returnsFormula;
        if (template === null || ids.length === 0) {
            return Object.freeze({});
        }

        const formula = template.split('{date}').join(date);
        const returns = await this.withRetry(async () => {
            const values = await this.fetchValues(ids, formula, date);
            const found: Record<string, number> = {};
            for (const id of ids) {
                const value = toNumber(values.get(id));
                if (value !== null) {
                    found[id] = value;
                }
            }
            return found;
        });

        const without = ids.filter(id => !(id in returns));
        if (without.length > 0) {
            this.logger.warn(`[MARKET-DATA] no return on ${date} for: ${without.join(', ')}`);
        }
        this.logger.info(`[MARKET-DATA] fetched returns for ${ids.length - without.length}/${ids.length} symbols on ${date}`);
        return Object.freeze(returns);
    }

    private async withRetry<T>(fetch: () => Promise<T>): Promise<T> {
        const attempts = this.settings.retryAttempts;
        for (let attempt = 1; ; attempt++) {
            try {
                return await fetch();
            } catch (err) {
                if (!(err instanceof MarketDataError) || !err.retryable || attempt >= attempts) {
                    throw err;
                }
                const delay = this.settings.retryDelayMs * 2 ** (attempt - 1);
                this.logger.warn(
                    `[MARKET-DATA] attempt ${attempt}/${attempts} failed, retrying in ${delay}ms: ${err.message}`
                );
                await this.wait(delay);
            }
        }
    }

    private authHeader(): string {
        const credentials = `${this.settings.username.toUpperCase()}:${this.settings.apiKey}`;
        return `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
    }

    /**
     * One request for one formula, keyed by requestId
     */
    private async fetchValues(ids: string[], formula: string, date: string): Promise<Map<string, unknown>> {
        if (!this.settings.username || !this.settings.apiKey) {
            throw new ApiAuthError('Market data credentials are not configured (MARKET_DATA_USERNAME / MARKET_DATA_API_KEY)');
        }

        let response: HttpResponse;
        try {
            response = await this.http(`${this.settings.baseUrl}/time-series`, {
                params: { ids: ids.join(','), formulas: formula, flatten: 'Y' },
                headers: {
                    Authorization: this.authHeader(),
                    Accept: 'application/json',
                },
                timeout: this.settings.timeoutMs,
                validateStatus: () => true,
            });
        } catch (err) {
            if (axios.isAxiosError(err) && !err.response) {
                const reason = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' ? 'timeout' : 'unreachable';
                throw new ApiConnectionError(`Market data API ${reason}: ${err.message}`);
            }
            throw err;
        }

        if (response.status === 401 || response.status === 403) {
            throw new ApiAuthError('Invalid or expired market data API credentials');
        }
        if (response.status < 200 || response.status >= 300) {
            throw new MarketDataError(`Market data API returned HTTP ${response.status}`);
        }

        return this.parseBody(response.data, formula, date);
    }

    private parseBody(body: unknown, formula: string, date: string): Map<string, unknown> {
        if (typeof body === 'string') {
            throw new ApiConnectionError('Invalid JSON response from market data API');
        }
        if (typeof body !== 'object' || body === null || !('data' in body) || !Array.isArray(body.data)) {
            throw new DataNotAvailableError('No data returned from market data API', date);
        }
        const entries: readonly unknown[] = body.data;
        if (entries.length === 0) {
            throw new DataNotAvailableError(`Empty data returned for date ${date}`, date);
        }

        const values = new Map<string, unknown>();
        for (const entry of entries) {
            if (typeof entry === 'object' && entry !== null && 'requestId' in entry && typeof entry.requestId === 'string') {
                const record: Record<string, unknown> = { ...entry };
                values.set(entry.requestId, record[formula]);
            }
        }
        return values;
    }
}
