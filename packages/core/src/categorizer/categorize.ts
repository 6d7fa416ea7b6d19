/**
 * Transaction categorization: first matching rule wins.
 *
 * Rules are evaluated in snapshot order (priority desc, id asc). A rule
 * matches when ALL of its conditions match. No match is not an error:
 * the caller marks the transaction for manual review.
 *
 * ARCHITECTURAL NOTE: No console.* calls, no rule mutation. Same snapshot
 * and same transaction always give the same result.
 */

import { matchesAll } from './match.js';
import type { CategorizationStats } from './types.js';
import type { RuleSnapshot } from '../rules/snapshot.js';
import type { CategorizationResult, TransactionRecord } from '../types/index.js';

const NO_MATCH: CategorizationResult = Object.freeze({
    category: null,
    matched_rule_id: null,
});

/**
 * Categorize a single transaction against a rule snapshot.
 *
 * @returns category and winning rule id, or both null when nothing matched
 */
export function categorize(transaction: TransactionRecord, snapshot: RuleSnapshot): CategorizationResult {
    for (const { rule, conditions } of snapshot.rules) {
        if (matchesAll(transaction, conditions)) {
            const result: CategorizationResult = {
                category: rule.category,
                matched_rule_id: rule.id,
            };
            if (rule.category_name !== undefined) {
                result.category_name = rule.category_name;
            }
            return result;
        }
    }
    return { ...NO_MATCH };
}

/**
 * Categorize all transactions in a batch.
 *
 * @returns one result per input transaction (same order) and stats
 */
export function categorizeAll(
    transactions: readonly TransactionRecord[],
    snapshot: RuleSnapshot
): {
    results: CategorizationResult[];
    stats: CategorizationStats;
} {
    const stats: CategorizationStats = {
        total: transactions.length,
        auto: 0,
        manual: 0,
        byRule: {},
    };

    const results = transactions.map(txn => {
        const result = categorize(txn, snapshot);
        if (result.matched_rule_id !== null) {
            stats.auto++;
            stats.byRule[result.matched_rule_id] = (stats.byRule[result.matched_rule_id] || 0) + 1;
        } else {
            stats.manual++;
        }
        return result;
    });

    return { results, stats };
}
