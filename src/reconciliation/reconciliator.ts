/**
 * Reconciliator - Day-Over-Day Weight Change Detection
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Full outer join on `<sub-portfolio>_<symbol>`; a side without the id counts
 * as weight 0. Output is informational only: alerts never block persistence
 * or change a fund's status.
 *
 * SYMMETRY: compare(A, B).changes are the exact negation of compare(B, A),
 * with the same flagged ids and new/removed swapped.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { WeightRow } from '../types';
import { ReconciliationReport, WeightChange } from './types';

type WeightedRow = Pick<WeightRow, 'subPortfolio' | 'symbol' | 'weight'>;

export function benchmarkId(row: Pick<WeightRow, 'subPortfolio' | 'symbol'>): string {
    return `${row.subPortfolio}_${row.symbol}`;
}

function index(rows: readonly WeightedRow[]): Map<string, number> {
    const byId = new Map<string, number>();
    for (const row of rows) {
        byId.set(benchmarkId(row), Number.isFinite(row.weight) ? row.weight : 0);
    }
    return byId;
}

function signed(value: number): string {
    return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

export class Reconciliator {
    constructor(private readonly changeThreshold: number = 5.0) {}

    compare(current: readonly WeightedRow[], previous: readonly WeightedRow[]): ReconciliationReport {
        const currentById = index(current);
        const previousById = index(previous);
        const ids = new Set<string>([...currentById.keys(), ...previousById.keys()]);

        const changes: WeightChange[] = [];
        for (const id of ids) {
            const cur = currentById.get(id) ?? 0;
            const prev = previousById.get(id) ?? 0;
            const change = cur - prev;
            changes.push({ id, previous: prev, current: cur, change, absChange: Math.abs(change) });
        }

        changes.sort((a, b) => b.absChange - a.absChange || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

        const significant = changes.filter(c => c.absChange > this.changeThreshold);
        const byId = [...changes].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
        const newComponents = byId.filter(c => c.previous === 0 && c.current > 0).map(c => c.id);
        const removedComponents = byId.filter(c => c.previous > 0 && c.current === 0).map(c => c.id);

        const alerts = significant.map(c =>
            `${c.id}: ${c.previous.toFixed(2)}% → ${c.current.toFixed(2)}% (Δ${signed(c.change)}pp)`
        );
        if (newComponents.length > 0) {
            alerts.push(`New components added: ${newComponents.join(', ')}`);
        }
        if (removedComponents.length > 0) {
            alerts.push(`Components removed: ${removedComponents.join(', ')}`);
        }

        return {
            alerts,
            changes,
            flagged: significant.map(c => c.id),
            newComponents,
            removedComponents,
        };
    }
}
