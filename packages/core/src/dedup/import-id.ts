/**
 * Import ID generation.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import { IMPORT_ID } from '../types/index.js';
import type { TransactionRecord } from '../types/index.js';

/**
 * Deterministic dedup key for a transaction.
 *
 * Payload format: "{date}|{amount}|{payee}|{account_ref}"
 *   - date: ISO 8601 YYYY-MM-DD
 *   - amount: signed integer minor units
 *   - payee: as parsed (NO normalization before hash)
 *   - account_ref: as parsed
 *
 * Backslash and "|" inside payee and account_ref are backslash-escaped so
 * the four fields always split back the same way.
 *
 * Memo and category are not part of the key: they may be edited between
 * runs while the transaction stays the same. No salt, no clock.
 *
 * KNOWN LIMITATION: two genuinely distinct transactions sharing all four
 * fields (two identical coffees on one day) get the same key. The service
 * keeps at most one of them; see findImportIdCollisions().
 */
export function computeImportId(txn: Pick<TransactionRecord, 'date' | 'amount' | 'payee' | 'account_ref'>): string {
    const payload = `${txn.date}|${txn.amount}|${escapeField(txn.payee)}|${escapeField(txn.account_ref)}`;
    return `${IMPORT_ID.PREFIX}${sha256(payload).slice(0, IMPORT_ID.HASH_LENGTH)}`;
}

function escapeField(value: string): string {
    return value.replace(/[\\|]/g, ch => `\\${ch}`);
}

/**
 * Keys shared by more than one transaction in a batch, with their counts.
 */
export function findImportIdCollisions(transactions: readonly Pick<TransactionRecord, 'date' | 'amount' | 'payee' | 'account_ref'>[]): Record<string, number> {
    const counts: Record<string, number> = {};

    for (const txn of transactions) {
        const id = computeImportId(txn);
        counts[id] = (counts[id] || 0) + 1;
    }

    const collisions: Record<string, number> = {};
    for (const [id, count] of Object.entries(counts)) {
        if (count > 1) {
            collisions[id] = count;
        }
    }

    return collisions;
}
