/**
 * Resource ledger contract and all-or-nothing cost transactions.
 *
 * The concrete inventory lives outside the simulation; it only has to
 * answer `query` and `tryDeduct`. `credit` is optional and lets a
 * transaction roll back if the ledger rejects a deduction it had just
 * reported as affordable.
 */

import type { ResourceCost } from '../catalog/types';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('ResourceLedger');

export interface ResourceLedger {
    /** Current count of a resource (0 for unknown ids) */
    query(resourceId: string): number;
    /** Remove `amount`; false (and no change) if not enough */
    tryDeduct(resourceId: string, amount: number): boolean;
    /** Give `amount` back; used to undo a partial transaction */
    credit?(resourceId: string, amount: number): void;
}

/** Entries with a positive amount, in a stable order */
function costEntries(cost: ResourceCost): Array<[string, number]> {
    return Object.entries(cost)
        .filter(([, amount]) => amount > 0)
        .sort(([a], [b]) => a.localeCompare(b));
}

/**
 * Whether the ledger covers every entry of `cost`.
 * A missing ledger affords nothing.
 */
export function canAfford(ledger: ResourceLedger | null, cost: ResourceCost): boolean {
    if (!ledger) return false;
    return costEntries(cost).every(([resourceId, amount]) => ledger.query(resourceId) >= amount);
}

/** Resources that are short, with how many more are needed */
export function missingResources(ledger: ResourceLedger | null, cost: ResourceCost): Record<string, number> {
    const missing: Record<string, number> = {};
    for (const [resourceId, amount] of costEntries(cost)) {
        const available = ledger ? ledger.query(resourceId) : 0;
        if (available < amount) {
            missing[resourceId] = amount - available;
        }
    }
    return missing;
}

/**
 * Deduct the whole cost or nothing.
 *
 * Every entry is checked before any deduction. If the ledger still
 * rejects a deduction, entries already taken are credited back.
 */
export function deductAll(ledger: ResourceLedger | null, cost: ResourceCost): boolean {
    if (!ledger || !canAfford(ledger, cost)) return false;

    const deducted: Array<[string, number]> = [];
    for (const [resourceId, amount] of costEntries(cost)) {
        if (ledger.tryDeduct(resourceId, amount)) {
            deducted.push([resourceId, amount]);
            continue;
        }

        log.warn(`Ledger rejected ${amount} ${resourceId} after reporting it affordable; rolling back`);
        if (deducted.length > 0 && !ledger.credit) {
            log.error(`Ledger cannot credit; ${deducted.length} deduction(s) could not be undone`);
        }
        for (const [undoId, undoAmount] of deducted) {
            ledger.credit?.(undoId, undoAmount);
        }
        return false;
    }

    return true;
}

/** Format a cost map for logs: "plank x4, rope x2" */
export function formatCost(cost: ResourceCost): string {
    const entries = costEntries(cost);
    if (entries.length === 0) return 'free';
    return entries.map(([resourceId, amount]) => `${resourceId} x${amount}`).join(', ');
}
