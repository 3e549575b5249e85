/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Run ids identify one pipeline invocation across logs, metadata and
 * notifications. Version ids identify one persisted artifact of a
 * (fund, date); their numeric part is claimed by the store, never guessed here.
 *
 * FORMATS:
 * - run id:     {uuid v4}
 * - version id: v{NNN}-{HHmmssSSS}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { OUTPUT_CONSTANTS } from '../config/constants';

/**
 * Fresh id for every invocation. Never cached.
 */
export function generateRunId(): string {
    return uuidv4();
}

/**
 * @example
 * ```typescript
 * formatVersionId(3, DateTime.fromISO('2025-08-21T14:25:01.123'));
 * // "v003-142501123"
 * ```
 */
export function formatVersionId(versionNumber: number, at: DateTime): string {
    const counter = String(versionNumber).padStart(OUTPUT_CONSTANTS.VERSION_PAD, '0');
    return `v${counter}-${at.toFormat('HHmmssSSS')}`;
}
