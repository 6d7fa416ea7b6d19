/**
 * Rule validation.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data;
 * stores turn an invalid result into a ValidationError.
 */

import { isValidPattern } from '../categorizer/match.js';
import { ValidationError } from '../errors.js';
import { RuleInputSchema } from '../types/index.js';
import type { Condition, RuleInput, RuleValidationResult } from '../types/index.js';

/**
 * Validate a rule before it is persisted.
 *
 * Errors (rule rejected):
 *   - shape errors (unknown condition kind, non-integer amount, empty category)
 *   - zero conditions, which would match every transaction
 *   - amount_range with min > max
 *   - payee_regex that does not compile
 *
 * Warnings (rule accepted):
 *   - the same condition listed twice
 *   - amount_exact outside an amount_range of the same rule (can never match)
 */
export function validateRule(input: unknown): RuleValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const parsed = RuleInputSchema.safeParse(input);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            const path = issue.path.length > 0 ? issue.path.join('.') : 'rule';
            errors.push(`${path}: ${issue.message}`);
        }
        return { valid: false, errors, warnings };
    }

    const rule = parsed.data;

    if (rule.conditions.length === 0) {
        errors.push('Rule must have at least one condition');
        return { valid: false, errors, warnings };
    }

    const seen = new Set<string>();
    rule.conditions.forEach((condition, index) => {
        const label = `conditions.${index} (${condition.kind})`;

        if (condition.kind === 'amount_range' && condition.min > condition.max) {
            errors.push(`${label}: lower bound ${condition.min} is greater than upper bound ${condition.max}`);
        }
        if (condition.kind === 'payee_regex' && !isValidPattern(condition.pattern)) {
            errors.push(`${label}: invalid regex syntax "${condition.pattern}"`);
        }

        const key = conditionKey(condition);
        if (seen.has(key)) {
            warnings.push(`${label}: duplicate condition`);
        }
        seen.add(key);
    });

    const exact = rule.conditions.filter(
        (c): c is Extract<Condition, { kind: 'amount_exact' }> => c.kind === 'amount_exact'
    );
    const ranges = rule.conditions.filter(
        (c): c is Extract<Condition, { kind: 'amount_range' }> => c.kind === 'amount_range'
    );
    for (const e of exact) {
        for (const r of ranges) {
            if (e.amount < r.min || e.amount > r.max) {
                warnings.push(
                    `amount_exact ${e.amount} lies outside amount_range ${r.min}..${r.max}; rule can never match`
                );
            }
        }
    }

    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Throw ValidationError unless the input is a valid rule.
 */
export function assertValidRule(input: RuleInput): RuleValidationResult {
    const result = validateRule(input);
    if (!result.valid) {
        throw new ValidationError(result.errors);
    }
    return result;
}

function conditionKey(condition: Condition): string {
    switch (condition.kind) {
        case 'payee_exact':
        case 'payee_contains':
        case 'memo_contains':
            return `${condition.kind}:${condition.value.toLowerCase()}`;
        case 'payee_regex':
            return `${condition.kind}:${condition.pattern}`;
        case 'amount_exact':
            return `${condition.kind}:${condition.amount}`;
        case 'amount_range':
            return `${condition.kind}:${condition.min}:${condition.max}`;
    }
}
