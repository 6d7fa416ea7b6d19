/**
 * Rule evaluation order.
 *
 * Only the first matching rule wins, so the order must be total and
 * reproducible: priority descending, then id ascending.
 */

import type { Rule } from '../types/index.js';

type Orderable = Pick<Rule, 'id' | 'priority'>;

/**
 * Comparator for Array.prototype.sort.
 * Ids compare by UTF-16 code units, never by locale.
 */
export function compareRules(a: Orderable, b: Orderable): number {
    if (a.priority !== b.priority) {
        return b.priority - a.priority;
    }
    if (a.id < b.id) return -1;
    if (a.id > b.id) return 1;
    return 0;
}

/**
 * PURE FUNCTION: Returns a new sorted array. Does not mutate input.
 */
export function sortRulesByPriority<T extends Orderable>(rules: readonly T[]): T[] {
    return [...rules].sort(compareRules);
}

/**
 * Enabled rules in evaluation order.
 */
export function listEnabledRulesByPriorityDesc<T extends Orderable & Pick<Rule, 'enabled'>>(
    rules: readonly T[]
): T[] {
    return sortRulesByPriority(rules.filter(r => r.enabled));
}
