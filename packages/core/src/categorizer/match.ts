/**
 * Condition matchers.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Invalid regex returns warning in result.
 */

import type { Condition, TransactionRecord } from '../types/index.js';
import type { CompiledCondition, MatchResult } from './types.js';

/**
 * Case folding used by every text condition.
 * Trimming is applied only where the condition asks for it (payee_exact).
 */
export function foldCase(value: string): string {
    return value.toLowerCase();
}

/**
 * Compile a condition for repeated evaluation.
 *
 * An invalid payee_regex compiles to a predicate that never matches
 * (fails closed) and comes back with a warning instead of throwing.
 */
export function compileCondition(condition: Condition): { compiled: CompiledCondition; warning?: string } {
    switch (condition.kind) {
        case 'payee_exact': {
            const expected = foldCase(condition.value.trim());
            return {
                compiled: {
                    kind: condition.kind,
                    test: (txn) => foldCase(txn.payee.trim()) === expected,
                },
            };
        }
        case 'payee_contains': {
            const needle = foldCase(condition.value);
            return {
                compiled: {
                    kind: condition.kind,
                    test: (txn) => foldCase(txn.payee).includes(needle),
                },
            };
        }
        case 'payee_regex': {
            let regex: RegExp;
            try {
                regex = new RegExp(condition.pattern, 'i');
            } catch (e) {
                const errorMsg = e instanceof Error ? e.message : String(e);
                return {
                    compiled: { kind: condition.kind, test: () => false },
                    warning: `Invalid regex pattern "${condition.pattern}": ${errorMsg}`,
                };
            }
            return {
                compiled: {
                    kind: condition.kind,
                    test: (txn) => regex.test(txn.payee),
                },
            };
        }
        case 'memo_contains': {
            const needle = foldCase(condition.value);
            return {
                compiled: {
                    kind: condition.kind,
                    // A rule asking for memo text never matches a transaction without a memo
                    test: (txn) => txn.memo !== null && foldCase(txn.memo).includes(needle),
                },
            };
        }
        case 'amount_exact': {
            const expected = condition.amount;
            return {
                compiled: {
                    kind: condition.kind,
                    test: (txn) => txn.amount === expected,
                },
            };
        }
        case 'amount_range': {
            const { min, max } = condition;
            return {
                compiled: {
                    kind: condition.kind,
                    test: (txn) => txn.amount >= min && txn.amount <= max,
                },
            };
        }
    }
}

/**
 * Evaluate one condition against a transaction.
 * Convenience for one-off checks; the engine uses pre-compiled conditions.
 */
export function matchesCondition(txn: TransactionRecord, condition: Condition): MatchResult {
    const { compiled, warning } = compileCondition(condition);
    const matched = compiled.test(txn);
    return warning ? { matched, warning } : { matched };
}

/**
 * Short-circuit AND over compiled conditions: the first failing
 * condition stops evaluation. An empty list never matches.
 */
export function matchesAll(txn: TransactionRecord, conditions: readonly CompiledCondition[]): boolean {
    if (conditions.length === 0) return false;
    for (const condition of conditions) {
        if (!condition.test(txn)) {
            return false;
        }
    }
    return true;
}

/**
 * Test if a regex pattern compiles.
 */
export function isValidPattern(pattern: string): boolean {
    try {
        new RegExp(pattern, 'i');
        return true;
    } catch {
        return false;
    }
}
