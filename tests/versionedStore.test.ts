/**
 * Versioned Output Store Tests
 *
 * Runs against a fresh temporary directory per test.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DateTime } from 'luxon';
import { SaveRequest, VersionedOutputStore } from '../src/storage';
import { WeightRow } from '../src/types';

const CLOCK = () => DateTime.fromISO('2025-08-21T14:25:01.123');

function weightRows(date: string, weights: Record<string, number>): WeightRow[] {
    return Object.entries(weights).map(([symbol, weight]) => ({
        date,
        fundId: 'multi_asset',
        subPortfolio: 'MA60',
        symbol,
        name: `${symbol} Index, Total Return`,
        category: 'equity',
        tier: 3,
        weight,
    }));
}

function request(date: string, weights: Record<string, number> = { A: 60, B: 40 }): SaveRequest {
    return {
        fundId: 'multi_asset',
        date,
        runId: 'run-1',
        rows: weightRows(date, weights),
        runtimeSeconds: 1.5,
        validationPassed: true,
        subPortfolioCount: 1,
    };
}

describe('VersionedOutputStore', () => {
    let baseDir: string;
    let store: VersionedOutputStore;

    beforeEach(() => {
        baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fund-weights-store-'));
        store = new VersionedOutputStore(baseDir, undefined, CLOCK);
    });

    afterEach(() => {
        fs.rmSync(baseDir, { recursive: true, force: true });
    });

    test('writes rows, metadata and the latest alias under <fund>/<date>', () => {
        const saved = store.save(request('20250821'));
        const dir = path.join(baseDir, 'multi_asset', '20250821');

        expect(saved.versionId).toBe('v001-142501123');
        expect(saved.csvPath).toBe(path.join(dir, 'multi_asset_20250821_v001-142501123.csv'));
        expect(saved.metadataPath).toBe(path.join(dir, 'multi_asset_20250821_v001-142501123.json'));
        expect(fs.existsSync(path.join(dir, 'multi_asset_20250821_latest.json'))).toBe(true);

        expect(saved.metadata).toMatchObject({
            fundId: 'multi_asset',
            calculationDate: '20250821',
            runId: 'run-1',
            versionNumber: 1,
            versionId: 'v001-142501123',
            runtimeSeconds: 1.5,
            validationStatus: 'PASSED',
            subPortfolioCount: 1,
            rowCount: 2,
            nodeVersion: process.version,
        });
    });

    test('every save gets a new version and moves the alias', () => {
        const first = store.save(request('20250821', { A: 60, B: 40 }));
        const second = store.save(request('20250821', { A: 55, B: 45 }));

        expect(first.versionId).toBe('v001-142501123');
        expect(second.versionId).toBe('v002-142501123');
        expect(fs.existsSync(first.csvPath)).toBe(true);

        const latest = store.readLatest('multi_asset', '20250821');
        expect(latest?.versionId).toBe('v002-142501123');
        expect(latest?.rows.map(r => r.weight)).toEqual([55, 45]);
    });

    test('stores from separate instances never share a version number', () => {
        const other = new VersionedOutputStore(baseDir, undefined, CLOCK);
        const ids = new Set<string>();

        for (let i = 0; i < 5; i++) {
            ids.add(store.save(request('20250821')).versionId);
            ids.add(other.save(request('20250821')).versionId);
        }

        expect(ids.size).toBe(10);
        expect(store.listVersionNumbers('multi_asset', '20250821')).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    test('rows survive the round trip at 9 decimals, including quoted names', () => {
        const weights = { A: 19.25, B: 12.123456789, C: 0, D: 68.626543211 };
        store.save(request('20250821', weights));

        const latest = store.readLatest('multi_asset', '20250821');

        expect(latest?.rows).toEqual(weightRows('20250821', weights));
    });

    test('readLatest is null for a date without a successful run', () => {
        expect(store.readLatest('multi_asset', '20250821')).toBeNull();
    });

    test('findPrevious returns the newest earlier date with an alias', () => {
        store.save(request('20250818', { A: 50, B: 50 }));
        store.save(request('20250819', { A: 60, B: 40 }));
        store.save(request('20250822', { A: 70, B: 30 }));

        const previous = store.findPrevious('multi_asset', '20250821');

        expect(previous?.date).toBe('20250819');
        expect(previous?.rows.map(r => r.weight)).toEqual([60, 40]);
    });

    test('findPrevious skips dates whose runs all failed', () => {
        store.save(request('20250819'));
        fs.mkdirSync(path.join(baseDir, 'multi_asset', '20250820'), { recursive: true });

        expect(store.findPrevious('multi_asset', '20250821')?.date).toBe('20250819');
    });

    test('findPrevious skips a date whose aliased file was deleted', () => {
        store.save(request('20250819'));
        const broken = store.save(request('20250820'));
        fs.unlinkSync(broken.csvPath);

        expect(store.findPrevious('multi_asset', '20250821')?.date).toBe('20250819');
    });

    test('findPrevious is null when the fund has no history', () => {
        expect(store.findPrevious('multi_asset', '20250821')).toBeNull();
    });
});
