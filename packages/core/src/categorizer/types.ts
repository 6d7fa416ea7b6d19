/**
 * Internal types for categorizer module.
 */

import type { ConditionKind, Rule, TransactionRecord } from '../types/index.js';

/**
 * Result of evaluating a single condition.
 */
export interface MatchResult {
    matched: boolean;
    warning?: string;
}

/**
 * Condition with its parameter prepared for repeated evaluation
 * (case folded, regex compiled).
 */
export interface CompiledCondition {
    readonly kind: ConditionKind;
    readonly test: (txn: TransactionRecord) => boolean;
}

/**
 * Rule whose conditions were compiled once when the snapshot was loaded.
 */
export interface CompiledRule {
    readonly rule: Readonly<Rule>;
    readonly conditions: readonly CompiledCondition[];
}

/**
 * Statistics from batch categorization.
 */
export interface CategorizationStats {
    total: number;
    auto: number;
    manual: number;
    byRule: Record<string, number>;
}
