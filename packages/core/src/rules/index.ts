/**
 * Rule model: ordering, validation, storage, snapshots.
 */

export { compareRules, sortRulesByPriority, listEnabledRulesByPriorityDesc } from './order.js';
export { validateRule, assertValidRule } from './validate.js';
export { InMemoryRuleStore, nextRuleId, buildRule, applyRulePatch } from './store.js';
export type { RuleStore, Clock } from './store.js';
export { loadRuleSnapshot, createRuleSnapshot, emptyRuleSnapshot } from './snapshot.js';
export type { RuleSnapshot, RuleSnapshotLoadResult } from './snapshot.js';
