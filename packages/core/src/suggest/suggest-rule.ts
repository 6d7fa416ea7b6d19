/**
 * Draft a rule from a single transaction the user just categorized.
 */

import { MONEY, SUGGESTION_DEFAULTS } from '../types/index.js';
import type { Condition, RuleInput, RuleSuggestion, TransactionRecord } from '../types/index.js';

const MAX_EXACT_PAYEE_LENGTH = 30;
const MIN_WORD_LENGTH = 4;

// Company-form suffixes that say nothing about the merchant
const NOISE_WORDS = new Set(['OY', 'AB', 'OYJ', 'LTD', 'INC', 'GMBH']);

/**
 * Build a draft rule for a payee/category pair.
 *
 * - short single-word payee: payee_exact
 * - otherwise: payee_contains on the first significant word
 * - whole-major-unit amounts look recurring: add amount_exact
 */
export function suggestRuleForTransaction(
    txn: Pick<TransactionRecord, 'payee' | 'amount'>,
    category: string,
    categoryName?: string
): RuleInput {
    const payee = txn.payee.trim();
    const conditions: Condition[] = [];

    if (payee.length <= MAX_EXACT_PAYEE_LENGTH && !payee.includes(' ')) {
        conditions.push({ kind: 'payee_exact', value: payee });
    } else {
        const words = payee.split(/\s+/).filter(Boolean);
        const significant = words.find(w => w.length >= MIN_WORD_LENGTH && !NOISE_WORDS.has(w.toUpperCase()));
        conditions.push({ kind: 'payee_contains', value: significant ?? words[0] ?? payee });
    }

    if (txn.amount !== 0 && txn.amount % MONEY.MINOR_UNITS_PER_MAJOR === 0) {
        conditions.push({ kind: 'amount_exact', amount: txn.amount });
    }

    const rule: RuleInput = {
        name: `Rule for ${payee.slice(0, MAX_EXACT_PAYEE_LENGTH)}`,
        conditions,
        category,
        priority: SUGGESTION_DEFAULTS.SUGGESTED_PRIORITY,
        enabled: true,
    };
    if (categoryName !== undefined) {
        rule.category_name = categoryName;
    }
    return rule;
}

/**
 * Turn a history suggestion into a rule draft (payee_exact).
 */
export function ruleFromSuggestion(suggestion: RuleSuggestion): RuleInput {
    return {
        name: `${suggestion.payee} (${suggestion.direction})`,
        conditions: [
            { kind: 'payee_exact', value: suggestion.payee },
            suggestion.direction === 'incoming'
                ? { kind: 'amount_range', min: 0, max: Number.MAX_SAFE_INTEGER }
                : { kind: 'amount_range', min: Number.MIN_SAFE_INTEGER, max: -1 },
        ],
        category: suggestion.category,
        category_name: suggestion.category_name,
        priority: SUGGESTION_DEFAULTS.SUGGESTED_PRIORITY,
        enabled: true,
    };
}
