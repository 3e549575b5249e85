/**
 * Market Data Client Tests
 *
 * HTTP is a jest.fn standing in for axios.get; backoff waits are recorded,
 * not slept.
 */

import { AxiosError } from 'axios';
import { MarketDataSettings } from '../src/config/default';
import { HttpGet, HttpRequestConfig, HttpResponse, MarketDataClient } from '../src/services/marketData';
import {
    ApiAuthError,
    ApiConnectionError,
    DataNotAvailableError,
    MarketDataError,
    MissingDataError,
} from '../src/types/errors';

const SETTINGS: MarketDataSettings = {
    baseUrl: 'https://marketdata.test/formula-api/v1',
    username: 'tester',
    apiKey: 'test-secret',
    formula: 'FG_MCAP_IDX({date},{date},,USD)',
    returnsFormula: null,
    timeoutMs: 1000,
    retryAttempts: 3,
    retryDelayMs: 100,
};

const DATE = '20250821';
const FORMULA = 'FG_MCAP_IDX(20250821,20250821,,USD)';

function ok(entries: Array<Record<string, unknown>>): HttpResponse {
    return { status: 200, data: { data: entries } };
}

function timeout(): AxiosError {
    return new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED');
}

function setup(settings: MarketDataSettings = SETTINGS) {
    const http = jest.fn<Promise<HttpResponse>, [string, HttpRequestConfig]>();
    const waits: number[] = [];
    const get: HttpGet = (url, config) => http(url, config);
    const client = new MarketDataClient(settings, {
        http: get,
        wait: async ms => {
            waits.push(ms);
        },
    });
    return { http, waits, client };
}

describe('MarketDataClient', () => {
    test('requests the formula for the date with basic auth and returns a frozen observation', async () => {
        const { http, client } = setup();
        http.mockResolvedValueOnce(ok([
            { requestId: 'I01018', [FORMULA]: 82031193.018944 },
            { requestId: 'I01270', [FORMULA]: '9412058.672003' },
        ]));

        const observation = await client.getMarketCaps(['I01018', 'I01270', 'I01018'], DATE);

        expect(observation).toEqual({
            date: DATE,
            marketCaps: { I01018: 82031193.018944, I01270: 9412058.672003 },
        });
        expect(Object.isFrozen(observation)).toBe(true);
        expect(Object.isFrozen(observation.marketCaps)).toBe(true);

        expect(http).toHaveBeenCalledTimes(1);
        const [url, config] = http.mock.calls[0];
        expect(url).toBe('https://marketdata.test/formula-api/v1/time-series');
        expect(config.params).toEqual({ ids: 'I01018,I01270', formulas: FORMULA, flatten: 'Y' });
        expect(config.headers.Authorization).toBe(`Basic ${Buffer.from('TESTER:test-secret').toString('base64')}`);
        expect(config.timeout).toBe(1000);
    });

    test('retries connection failures with exponential backoff', async () => {
        const { http, waits, client } = setup();
        http
            .mockRejectedValueOnce(timeout())
            .mockRejectedValueOnce(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'))
            .mockResolvedValueOnce(ok([{ requestId: 'A', [FORMULA]: 5 }]));

        const observation = await client.getMarketCaps(['A'], DATE);

        expect(observation.marketCaps).toEqual({ A: 5 });
        expect(http).toHaveBeenCalledTimes(3);
        expect(waits).toEqual([100, 200]);
    });

    test('gives up after the configured attempts', async () => {
        const { http, waits, client } = setup();
        http.mockRejectedValue(timeout());

        await expect(client.getMarketCaps(['A'], DATE)).rejects.toThrow(ApiConnectionError);
        expect(http).toHaveBeenCalledTimes(3);
        expect(waits).toEqual([100, 200]);
    });

    test('an unparseable body is retried like a connection failure', async () => {
        const { http, client } = setup();
        http
            .mockResolvedValueOnce({ status: 200, data: '<html>gateway</html>' })
            .mockResolvedValueOnce(ok([{ requestId: 'A', [FORMULA]: 5 }]));

        await expect(client.getMarketCaps(['A'], DATE)).resolves.toEqual({ date: DATE, marketCaps: { A: 5 } });
    });

    test.each([401, 403])('HTTP %i is an auth failure and is not retried', async status => {
        const { http, waits, client } = setup();
        http.mockResolvedValue({ status, data: {} });

        await expect(client.getMarketCaps(['A'], DATE)).rejects.toThrow(ApiAuthError);
        expect(http).toHaveBeenCalledTimes(1);
        expect(waits).toEqual([]);
    });

    test('other HTTP errors fail without retry', async () => {
        const { http, client } = setup();
        http.mockResolvedValue({ status: 500, data: {} });

        const error = await client.getMarketCaps(['A'], DATE).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(MarketDataError);
        expect(error).toHaveProperty('message', 'Market data API returned HTTP 500');
        expect(http).toHaveBeenCalledTimes(1);
    });

    test('a body without data means the date is not available', async () => {
        const { http, client } = setup();
        http.mockResolvedValue({ status: 200, data: { error: 'nothing' } });

        await expect(client.getMarketCaps(['A'], DATE)).rejects.toThrow(DataNotAvailableError);
    });

    test('an empty data list means the date is not available', async () => {
        const { http, client } = setup();
        http.mockResolvedValue(ok([]));

        await expect(client.getMarketCaps(['A'], DATE)).rejects.toThrow('Empty data returned for date 20250821');
    });

    test('null, non-numeric, non-positive and absent values name their symbols', async () => {
        const { http, client } = setup();
        http.mockResolvedValue(ok([
            { requestId: 'A', [FORMULA]: 10 },
            { requestId: 'B', [FORMULA]: null },
            { requestId: 'C', [FORMULA]: 'n/a' },
            { requestId: 'D', [FORMULA]: 0 },
        ]));

        const error = await client.getMarketCaps(['A', 'B', 'C', 'D', 'E'], DATE).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(MissingDataError);
        expect(error).toHaveProperty('symbols', ['B', 'C', 'D', 'E']);
        expect(error).toHaveProperty('message', 'Missing market cap data for: B, C, D, E');
        expect(http).toHaveBeenCalledTimes(1);
    });

    test('refuses to call out without credentials', async () => {
        const { http, client } = setup({ ...SETTINGS, apiKey: '' });

        await expect(client.getMarketCaps(['A'], DATE)).rejects.toThrow(ApiAuthError);
        expect(http).not.toHaveBeenCalled();
    });

    test('an empty symbol list needs no request', async () => {
        const { http, client } = setup();

        await expect(client.getMarketCaps([], DATE)).resolves.toEqual({ date: DATE, marketCaps: {} });
        expect(http).not.toHaveBeenCalled();
    });
});

describe('MarketDataClient.getReturns', () => {
    const RETURNS = { ...SETTINGS, returnsFormula: 'FG_RETURN({date},{date})' };
    const RETURN_FORMULA = 'FG_RETURN(20250821,20250821)';

    test('sends nothing when no returns formula is configured', async () => {
        const { http, client } = setup();

        await expect(client.getReturns(['A'], DATE)).resolves.toEqual({});
        expect(http).not.toHaveBeenCalled();
    });

    test('requests the returns formula and keeps only numeric values', async () => {
        const { http, client } = setup(RETURNS);
        http.mockResolvedValueOnce(ok([
            { requestId: 'A', [RETURN_FORMULA]: -1.25 },
            { requestId: 'B', [RETURN_FORMULA]: '0.5' },
            { requestId: 'C', [RETURN_FORMULA]: null },
            { requestId: 'D', [RETURN_FORMULA]: 0 },
        ]));

        const returns = await client.getReturns(['A', 'B', 'C', 'D', 'E'], DATE);

        expect(returns).toEqual({ A: -1.25, B: 0.5, D: 0 });
        expect(Object.isFrozen(returns)).toBe(true);
        expect(http.mock.calls[0][1].params).toEqual({ ids: 'A,B,C,D,E', formulas: RETURN_FORMULA, flatten: 'Y' });
    });

    test('retries connection failures like market caps', async () => {
        const { http, waits, client } = setup(RETURNS);
        http.mockRejectedValueOnce(timeout()).mockResolvedValueOnce(ok([{ requestId: 'A', [RETURN_FORMULA]: 2 }]));

        await expect(client.getReturns(['A'], DATE)).resolves.toEqual({ A: 2 });
        expect(waits).toEqual([100]);
    });
});
