/**
 * Weight row CSV codec.
 *
 * The Return column is left empty for rows without a fetched return.
 * Weights are rendered with bignumber.js at a fixed number of decimals so the
 * file never carries binary-float artefacts; parsing restores the same
 * numbers the reconciliator compared against on the day they were written.
 */

import BigNumber from 'bignumber.js';
import { OUTPUT_CONSTANTS } from '../config/constants';
import { Category, CATEGORIES, WeightRow } from '../types';

export const CSV_HEADER = [
    'Date',
    'Fund ID',
    'Sub-Portfolio',
    'Benchmark ID',
    'Symbol',
    'Name',
    'Category',
    'Tier',
    'Weight',
    'Return',
] as const;

export class CsvFormatError extends Error {
    constructor(message: string, public readonly line: number) {
        super(`CSV line ${line}: ${message}`);
        this.name = 'CsvFormatError';
    }
}

function quote(field: string): string {
    return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function formatWeight(weight: number): string {
    return new BigNumber(weight).toFixed(OUTPUT_CONSTANTS.WEIGHT_DECIMALS);
}

function formatReturn(ret: number | undefined): string {
    return ret === undefined ? '' : new BigNumber(ret).toFixed(OUTPUT_CONSTANTS.RETURN_DECIMALS);
}

export function encodeRows(rows: readonly WeightRow[]): string {
    const lines = [CSV_HEADER.join(',')];
    for (const row of rows) {
        lines.push([
            row.date,
            row.fundId,
            row.subPortfolio,
            `${row.subPortfolio}_${row.symbol}`,
            row.symbol,
            row.name,
            row.category,
            String(row.tier),
            formatWeight(row.weight),
            formatReturn(row.ret),
        ].map(quote).join(','));
    }
    return lines.join('\n') + '\n';
}

/**
 * Split CSV text into records, honouring quoted fields with embedded
 * separators, quotes and newlines
 */
function splitRecords(text: string): string[][] {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let inQuotes = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (inQuotes) {
            if (ch === '"' && text[i + 1] === '"') {
                field += '"';
                i++;
            } else if (ch === '"') {
                inQuotes = false;
            } else {
                field += ch;
            }
        } else if (ch === '"') {
            inQuotes = true;
        } else if (ch === ',') {
            record.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') {
                i++;
            }
            record.push(field);
            records.push(record);
            record = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (field !== '' || record.length > 0) {
        record.push(field);
        records.push(record);
    }
    return records.filter(r => !(r.length === 1 && r[0] === ''));
}

function isCategory(value: string): value is Category {
    return (CATEGORIES as readonly string[]).includes(value);
}

export function decodeRows(text: string): WeightRow[] {
    const [header, ...records] = splitRecords(text);
    if (!header || header.join(',') !== CSV_HEADER.join(',')) {
        throw new CsvFormatError('unexpected header', 1);
    }

    return records.map((fields, i) => {
        const line = i + 2;
        if (fields.length !== CSV_HEADER.length) {
            throw new CsvFormatError(`expected ${CSV_HEADER.length} fields, got ${fields.length}`, line);
        }
        const [date, fundId, subPortfolio, , symbol, name, category, tier, weight, ret] = fields;
        if (!isCategory(category)) {
            throw new CsvFormatError(`unknown category "${category}"`, line);
        }
        const parsedWeight = Number(weight);
        if (weight === '' || !Number.isFinite(parsedWeight)) {
            throw new CsvFormatError(`invalid weight "${weight}"`, line);
        }
        const row: WeightRow = {
            date,
            fundId,
            subPortfolio,
            symbol,
            name,
            category,
            tier: parseInt(tier, 10),
            weight: parsedWeight,
        };
        if (ret !== '') {
            const parsedReturn = Number(ret);
            if (!Number.isFinite(parsedReturn)) {
                throw new CsvFormatError(`invalid return "${ret}"`, line);
            }
            row.ret = parsedReturn;
        }
        return row;
    });
}
