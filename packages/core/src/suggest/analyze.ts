/**
 * Rule suggestions from categorization history.
 *
 * Looks for payees whose past transactions (as categorized in the budgeting
 * service) almost always landed in one category. Incoming and outgoing
 * money are analyzed separately: a refund from a shop rarely belongs in the
 * category of its purchases.
 */

import { SUGGESTION_DEFAULTS } from '../types/index.js';
import type { HistoricalTransaction, Rule, RuleSuggestion } from '../types/index.js';

export interface AnalyzeOptions {
    /** Minimum share (0-100) of a payee's transactions in one category. */
    threshold?: number;
    /** Minimum transactions for a payee to be considered. */
    minTransactions?: number;
}

type Direction = RuleSuggestion['direction'];

const TRANSFER_PREFIX = 'Transfer :';

export function directionOf(amount: number): Direction {
    return amount >= 0 ? 'incoming' : 'outgoing';
}

/**
 * Suggest payee rules from history.
 *
 * @returns suggestions sorted by confidence desc, then transaction count desc
 */
export function analyzeHistory(
    transactions: readonly HistoricalTransaction[],
    options: AnalyzeOptions = {}
): RuleSuggestion[] {
    const threshold = options.threshold ?? SUGGESTION_DEFAULTS.THRESHOLD_PERCENT;
    const minTransactions = options.minTransactions ?? SUGGESTION_DEFAULTS.MIN_TRANSACTIONS;

    const groups = new Map<string, { payee: string; direction: Direction; txns: HistoricalTransaction[] }>();
    for (const txn of transactions) {
        const payee = txn.payee.trim();
        if (!payee || payee.startsWith(TRANSFER_PREFIX)) continue;

        const direction = directionOf(txn.amount);
        const key = `${direction}\u0000${payee}`;
        const group = groups.get(key);
        if (group) {
            group.txns.push(txn);
        } else {
            groups.set(key, { payee, direction, txns: [txn] });
        }
    }

    const suggestions: RuleSuggestion[] = [];

    for (const { payee, direction, txns } of groups.values()) {
        if (txns.length < minTransactions) continue;

        const byCategory = new Map<string, { name: string; txns: HistoricalTransaction[] }>();
        for (const txn of txns) {
            // Uncategorized transactions count toward the total but are never suggested
            if (!txn.category) continue;
            const entry = byCategory.get(txn.category);
            if (entry) {
                entry.txns.push(txn);
            } else {
                byCategory.set(txn.category, { name: txn.category_name ?? txn.category, txns: [txn] });
            }
        }

        for (const [category, entry] of byCategory) {
            const confidence = (entry.txns.length / txns.length) * 100;
            if (confidence < threshold) continue;

            suggestions.push({
                payee,
                category,
                category_name: entry.name,
                direction,
                confidence: Math.round(confidence * 10) / 10,
                transaction_count: entry.txns.length,
                total_for_payee: txns.length,
                samples: entry.txns.slice(0, SUGGESTION_DEFAULTS.MAX_SAMPLES),
            });
        }
    }

    return suggestions.sort(
        (a, b) => b.confidence - a.confidence || b.transaction_count - a.transaction_count
    );
}

/**
 * Drop suggestions whose payee an existing payee rule already covers
 * (case-insensitive exact or contains).
 */
export function excludeExistingSuggestions(
    suggestions: readonly RuleSuggestion[],
    rules: readonly Rule[]
): RuleSuggestion[] {
    const exact = new Set<string>();
    const contains: string[] = [];
    for (const rule of rules) {
        for (const condition of rule.conditions) {
            if (condition.kind === 'payee_exact') exact.add(condition.value.trim().toLowerCase());
            if (condition.kind === 'payee_contains') contains.push(condition.value.toLowerCase());
        }
    }

    return suggestions.filter(s => {
        const payee = s.payee.toLowerCase();
        return !exact.has(payee) && !contains.some(needle => payee.includes(needle));
    });
}
