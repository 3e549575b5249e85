/**
 * Tier Allocation — Proportional Split With Ceiling And Single-Pass Overflow
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALGORITHM
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 *   raw_i     = remaining × mcap_i / Σ mcap
 *   capped_i  = min(raw_i, ceiling)             (cap-exempt members keep raw_i)
 *
 *   redistribute policy, when Σ capped < remaining:
 *     excess   = remaining − Σ capped
 *     final_i  = min(capped_i + excess × raw_i / Σ raw_nonCapped, ceiling)
 *                for every non-capped member (raw_i < ceiling or cap-exempt)
 *
 * ONE pass only. A member pushed over the ceiling by the redistribution is
 * clamped again and the clipped amount is reported as unplaced; there is no
 * iteration to a fixed point. Downstream numbers depend on this.
 *
 * cascade policy: no within-tier pass, the unplaced amount is left for the
 * deeper tiers of the category.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { CALCULATION_CONSTANTS } from '../config/constants';
import { OverflowPolicy } from '../types';
import { CalculationError } from '../types/errors';

export interface ProportionalMember {
    symbol: string;
    marketCap: number;
    capExempt: boolean;
}

export interface ProportionalAllocation {
    weights: Record<string, number>;
    /** Members whose raw weight exceeded the ceiling */
    capped: string[];
    /** Excess handed to non-capped members (0 when no pass ran) */
    redistributed: number;
    /** Part of `remaining` this tier did not place */
    unplaced: number;
}

function sum(values: number[]): number {
    return values.reduce((acc, v) => acc + v, 0);
}

/**
 * Split `remaining` across the members of one proportional tier.
 *
 * @throws CalculationError when the tier's market caps add up to zero
 */
export function allocateProportional(
    members: ProportionalMember[],
    remaining: number,
    ceiling: number,
    policy: OverflowPolicy,
    label: string = 'tier'
): ProportionalAllocation {
    const weights: Record<string, number> = {};

    if (members.length === 0) {
        return { weights, capped: [], redistributed: 0, unplaced: Math.max(0, remaining) };
    }

    if (remaining <= CALCULATION_CONSTANTS.EPSILON) {
        for (const m of members) {
            weights[m.symbol] = 0;
        }
        return { weights, capped: [], redistributed: 0, unplaced: 0 };
    }

    const totalMarketCap = sum(members.map(m => m.marketCap));
    if (!(totalMarketCap > 0)) {
        throw new CalculationError(`Total market cap of ${label} is zero`, {
            tier: label,
            members: members.length,
        });
    }

    const raw: Record<string, number> = {};
    const capped: string[] = [];

    for (const m of members) {
        raw[m.symbol] = remaining * (m.marketCap / totalMarketCap);
        if (!m.capExempt && raw[m.symbol] > ceiling) {
            weights[m.symbol] = ceiling;
            capped.push(m.symbol);
        } else {
            weights[m.symbol] = raw[m.symbol];
        }
    }

    let redistributed = 0;
    const placed = sum(Object.values(weights));

    if (policy === 'redistribute' && remaining - placed > CALCULATION_CONSTANTS.EPSILON) {
        const excess = remaining - placed;
        // Members sitting exactly on the ceiling take no share
        const recipients = members.filter(m => m.capExempt || raw[m.symbol] < ceiling);

        if (recipients.length > 0) {
            redistributed = excess;
            const totalRecipientWeight = sum(recipients.map(m => raw[m.symbol]));

            for (const m of recipients) {
                const share = totalRecipientWeight > 0
                    ? excess * (raw[m.symbol] / totalRecipientWeight)
                    : excess / recipients.length;
                const next = weights[m.symbol] + share;
                weights[m.symbol] = m.capExempt ? next : Math.min(next, ceiling);
            }
        }
    }

    const unplaced = remaining - sum(Object.values(weights));

    return {
        weights,
        capped,
        redistributed,
        unplaced: unplaced > CALCULATION_CONSTANTS.EPSILON ? unplaced : 0,
    };
}
