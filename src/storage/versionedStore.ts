/**
 * Versioned Output Store — Immutable Versions + Atomic Latest Alias
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * LAYOUT
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 *   <baseDir>/<fund>/<date>/
 *       .versions/<NNN>                       claim marker (exclusive create)
 *       <fund>_<date>_<versionId>.csv         weight rows
 *       <fund>_<date>_<versionId>.json        metadata
 *       <fund>_<date>_latest.json             alias → newest completed version
 *
 * INVARIANTS:
 * 1. A version number is owned by whoever created its claim marker ('wx');
 *    concurrent writers for the same (fund, date) never share one
 * 2. Version files are created once and never rewritten
 * 3. The alias is replaced by rename, so readers see the old or the new
 *    alias, never a partial one
 * 4. Dates that only saw failed runs have no alias and are skipped when
 *    looking for the previous result
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { OUTPUT_CONSTANTS } from '../config/constants';
import { WeightRow } from '../types';
import { StorageError } from '../types/errors';
import { formatVersionId } from '../utils/id';
import { createSilentLogger, Logger } from '../utils/logger';
import { CsvFormatError, decodeRows, encodeRows } from './csv';

// ═══════════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

const ArtifactMetadataSchema = z.object({
    fundId: z.string(),
    calculationDate: z.string(),
    runId: z.string(),
    runTimestamp: z.string(),
    versionNumber: z.number().int().positive(),
    versionId: z.string(),
    runtimeSeconds: z.number(),
    validationStatus: z.enum(['PASSED', 'FAILED']),
    subPortfolioCount: z.number().int(),
    rowCount: z.number().int(),
    user: z.string(),
    nodeVersion: z.string(),
});

const LatestAliasSchema = z.object({
    versionId: z.string(),
    csvFile: z.string(),
    metadataFile: z.string(),
    writtenAt: z.string(),
});

export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;
export type LatestAlias = z.infer<typeof LatestAliasSchema>;

export interface SaveRequest {
    fundId: string;
    date: string;
    runId: string;
    rows: readonly WeightRow[];
    runtimeSeconds: number;
    validationPassed: boolean;
    subPortfolioCount: number;
}

export interface StoredArtifact {
    fundId: string;
    date: string;
    versionId: string;
    csvPath: string;
    metadataPath: string;
    metadata: ArtifactMetadata;
    rows: WeightRow[];
}

const DATE_DIR_PATTERN = /^\d{8}$/;
const CLAIM_DIR = '.versions';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class VersionedOutputStore {
    constructor(
        private readonly baseDir: string,
        private readonly logger: Logger = createSilentLogger(),
        private readonly clock: () => DateTime = () => DateTime.now()
    ) {}

    dateDir(fundId: string, date: string): string {
        return path.join(this.baseDir, fundId, date);
    }

    private aliasPath(fundId: string, date: string): string {
        return path.join(this.dateDir(fundId, date), `${fundId}_${date}_latest.json`);
    }

    /**
     * Version numbers claimed so far for (fund, date), ascending
     */
    listVersionNumbers(fundId: string, date: string): number[] {
        const claimDir = path.join(this.dateDir(fundId, date), CLAIM_DIR);
        if (!fs.existsSync(claimDir)) {
            return [];
        }
        return fs.readdirSync(claimDir)
            .filter(name => /^\d+$/.test(name))
            .map(name => parseInt(name, 10))
            .sort((a, b) => a - b);
    }

    private claimVersion(fundId: string, date: string, versionIdFor: (n: number) => string): number {
        const claimDir = path.join(this.dateDir(fundId, date), CLAIM_DIR);
        fs.mkdirSync(claimDir, { recursive: true });

        const claimed = this.listVersionNumbers(fundId, date);
        let candidate = claimed.length > 0 ? claimed[claimed.length - 1] + 1 : 1;

        for (let attempt = 0; attempt < OUTPUT_CONSTANTS.MAX_VERSION_CLAIMS; attempt++, candidate++) {
            const marker = path.join(claimDir, String(candidate).padStart(OUTPUT_CONSTANTS.VERSION_PAD, '0'));
            try {
                fs.writeFileSync(marker, versionIdFor(candidate), { flag: 'wx' });
                return candidate;
            } catch (err) {
                if (isErrnoException(err) && err.code === 'EEXIST') {
                    this.logger.debug(`[STORE] version ${candidate} of ${fundId}/${date} already claimed`);
                    continue;
                }
                throw err;
            }
        }

        throw new StorageError('Could not claim a version number', claimDir);
    }

    /**
     * Persist a new version and point the latest alias at it.
     */
    save(request: SaveRequest): StoredArtifact {
        const { fundId, date } = request;
        const dir = this.dateDir(fundId, date);
        const now = this.clock();

        const versionNumber = this.claimVersion(fundId, date, n => formatVersionId(n, now));
        const versionId = formatVersionId(versionNumber, now);
        const csvFile = `${fundId}_${date}_${versionId}.csv`;
        const metadataFile = `${fundId}_${date}_${versionId}.json`;

        const metadata: ArtifactMetadata = {
            fundId,
            calculationDate: date,
            runId: request.runId,
            runTimestamp: now.toISO() ?? new Date().toISOString(),
            versionNumber,
            versionId,
            runtimeSeconds: request.runtimeSeconds,
            validationStatus: request.validationPassed ? 'PASSED' : 'FAILED',
            subPortfolioCount: request.subPortfolioCount,
            rowCount: request.rows.length,
            user: process.env.USER || process.env.USERNAME || os.userInfo().username,
            nodeVersion: process.version,
        };

        const csvPath = path.join(dir, csvFile);
        const metadataPath = path.join(dir, metadataFile);
        fs.writeFileSync(csvPath, encodeRows(request.rows), { flag: 'wx' });
        fs.writeFileSync(metadataPath, JSON.stringify(metadata, null, 2), { flag: 'wx' });

        const alias: LatestAlias = {
            versionId,
            csvFile,
            metadataFile,
            writtenAt: new Date().toISOString(),
        };
        const aliasPath = this.aliasPath(fundId, date);
        const tmpPath = `${aliasPath}.${process.pid}.${versionNumber}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(alias, null, 2));
        fs.renameSync(tmpPath, aliasPath);

        this.logger.info(`[STORE] saved ${fundId}/${date} version ${versionId}: ${csvPath}`);

        return {
            fundId,
            date,
            versionId,
            csvPath,
            metadataPath,
            metadata,
            rows: [...request.rows],
        };
    }

    /**
     * The artifact the latest alias of (fund, date) points at, or null when
     * no successful run was ever written for that date.
     *
     * @throws StorageError if the alias exists but what it points at is
     *   missing or unreadable
     */
    readLatest(fundId: string, date: string): StoredArtifact | null {
        const aliasPath = this.aliasPath(fundId, date);
        if (!fs.existsSync(aliasPath)) {
            return null;
        }

        const alias = this.readJson(aliasPath, LatestAliasSchema);
        const dir = this.dateDir(fundId, date);
        const csvPath = path.join(dir, alias.csvFile);
        const metadataPath = path.join(dir, alias.metadataFile);

        if (!fs.existsSync(csvPath)) {
            throw new StorageError('Latest alias points at a missing file', csvPath);
        }

        let rows: WeightRow[];
        try {
            rows = decodeRows(fs.readFileSync(csvPath, 'utf8'));
        } catch (err) {
            if (err instanceof CsvFormatError) {
                throw new StorageError(err.message, csvPath);
            }
            throw err;
        }

        return {
            fundId,
            date,
            versionId: alias.versionId,
            csvPath,
            metadataPath,
            metadata: this.readJson(metadataPath, ArtifactMetadataSchema),
            rows,
        };
    }

    /**
     * Latest result of the newest date strictly before `date` that has one.
     */
    findPrevious(fundId: string, date: string): StoredArtifact | null {
        const fundDir = path.join(this.baseDir, fundId);
        if (!fs.existsSync(fundDir)) {
            return null;
        }

        const earlierDates = fs.readdirSync(fundDir)
            .filter(name => DATE_DIR_PATTERN.test(name) && name < date)
            .sort()
            .reverse();

        for (const candidate of earlierDates) {
            try {
                const artifact = this.readLatest(fundId, candidate);
                if (artifact) {
                    return artifact;
                }
            } catch (err) {
                if (!(err instanceof StorageError)) {
                    throw err;
                }
                this.logger.warn(`[STORE] skipping ${fundId}/${candidate}: ${err.message}`);
            }
        }
        return null;
    }

    private readJson<T>(file: string, schema: z.ZodType<T>): T {
        if (!fs.existsSync(file)) {
            throw new StorageError('File not found', file);
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
        } catch (err) {
            throw new StorageError(`Invalid JSON (${err instanceof Error ? err.message : String(err)})`, file);
        }
        const result = schema.safeParse(parsed);
        if (!result.success) {
            throw new StorageError(`Unexpected content (${result.error.issues[0]?.message ?? 'invalid'})`, file);
        }
        return result.data;
    }
}
