/**
 * Reconciliation Module - Type Definitions
 */

export interface WeightChange {
    /** `<sub-portfolio>_<symbol>` */
    id: string;
    previous: number;
    current: number;
    /** current − previous */
    change: number;
    absChange: number;
}

export interface ReconciliationReport {
    /** Human-readable lines for the notification; never a failure */
    alerts: string[];
    /** Ordered by absChange descending, then id */
    changes: WeightChange[];
    /** Ids whose |change| exceeded the threshold */
    flagged: string[];
    newComponents: string[];
    removedComponents: string[];
}
