/**
 * Business dates are `YYYYMMDD` strings everywhere: CLI, market data
 * formula, output directories and CSV rows. Lexical order is date order.
 */

import { DateTime } from 'luxon';

const BUSINESS_DATE_PATTERN = /^\d{8}$/;
export const BUSINESS_DATE_FORMAT = 'yyyyMMdd';

export function isBusinessDate(value: string): boolean {
    return BUSINESS_DATE_PATTERN.test(value) && DateTime.fromFormat(value, BUSINESS_DATE_FORMAT).isValid;
}

/**
 * Resolve `today` (in the local zone) or check an explicit date.
 *
 * @returns the date as YYYYMMDD, or null when `value` is neither
 */
export function resolveBusinessDate(value: string, now: DateTime = DateTime.now()): string | null {
    if (value.trim().toLowerCase() === 'today') {
        return now.toFormat(BUSINESS_DATE_FORMAT);
    }
    return isBusinessDate(value) ? value : null;
}
