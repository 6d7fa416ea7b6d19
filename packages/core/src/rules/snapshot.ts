/**
 * Immutable rule snapshot for one batch run.
 *
 * The engine never reads a live store: a snapshot is taken when a batch
 * starts, so rule edits made meanwhile cannot change its results.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Bad rules come back as
 * ConfigurationErrors next to the snapshot, not as exceptions.
 */

import { sha256 } from 'js-sha256';
import { compileCondition } from '../categorizer/match.js';
import type { CompiledCondition, CompiledRule } from '../categorizer/types.js';
import { ConfigurationError } from '../errors.js';
import { RuleSchema } from '../types/index.js';
import type { Rule } from '../types/index.js';
import { listEnabledRulesByPriorityDesc } from './order.js';

export interface RuleSnapshot {
    /** Short hash of the evaluated rules; identical rule sets share a version. */
    readonly version: string;
    /** Enabled rules, compiled, in evaluation order. */
    readonly rules: readonly CompiledRule[];
    /** Same compiled rules keyed by rule id. */
    readonly byId: ReadonlyMap<string, CompiledRule>;
}

export interface RuleSnapshotLoadResult {
    snapshot: RuleSnapshot;
    errors: ConfigurationError[];
    warnings: string[];
}

const VERSION_LENGTH = 12;

/**
 * Build a snapshot from raw stored rule data (parsed YAML, JSON...).
 *
 * Each entry is checked on its own; an entry that fails is skipped and
 * reported, the others still load.
 */
export function loadRuleSnapshot(raw: readonly unknown[]): RuleSnapshotLoadResult {
    const errors: ConfigurationError[] = [];
    const accepted: Rule[] = [];
    const ids = new Set<string>();

    raw.forEach((entry, index) => {
        const parsed = RuleSchema.safeParse(entry);
        if (!parsed.success) {
            const detail = parsed.error.issues
                .map(issue => `${issue.path.join('.') || 'rule'}: ${issue.message}`)
                .join('; ');
            errors.push(new ConfigurationError(`entry ${index} is malformed (${detail})`, rawId(entry)));
            return;
        }

        const rule = parsed.data;
        const problem = structuralProblem(rule);
        if (problem) {
            errors.push(new ConfigurationError(problem, rule.id));
            return;
        }
        if (ids.has(rule.id)) {
            errors.push(new ConfigurationError('duplicate rule id, later entry ignored', rule.id));
            return;
        }

        ids.add(rule.id);
        accepted.push(rule);
    });

    const { snapshot, warnings } = compileSnapshot(accepted);
    return { snapshot, errors, warnings };
}

/**
 * Build a snapshot from rules that already passed validation (e.g. from a RuleStore).
 */
export function createRuleSnapshot(rules: readonly Rule[]): RuleSnapshotLoadResult {
    return loadRuleSnapshot(rules);
}

/**
 * A snapshot with no rules; every transaction goes to review.
 */
export function emptyRuleSnapshot(): RuleSnapshot {
    return compileSnapshot([]).snapshot;
}

function compileSnapshot(rules: readonly Rule[]): { snapshot: RuleSnapshot; warnings: string[] } {
    const warnings: string[] = [];
    const ordered = listEnabledRulesByPriorityDesc(rules);
    const compiledRules: CompiledRule[] = [];
    const byId = new Map<string, CompiledRule>();

    for (const rule of ordered) {
        const conditions: CompiledCondition[] = [];
        for (const condition of rule.conditions) {
            const { compiled, warning } = compileCondition(condition);
            if (warning) {
                warnings.push(`Rule ${rule.id}: ${warning}`);
            }
            conditions.push(compiled);
        }

        const compiledRule: CompiledRule = Object.freeze({
            rule: Object.freeze({ ...rule, conditions: [...rule.conditions] }),
            conditions: Object.freeze(conditions),
        });
        compiledRules.push(compiledRule);
        byId.set(rule.id, compiledRule);
    }

    const version = sha256(JSON.stringify(ordered)).slice(0, VERSION_LENGTH);

    return {
        snapshot: Object.freeze({
            version,
            rules: Object.freeze(compiledRules),
            byId,
        }),
        warnings,
    };
}

function structuralProblem(rule: Rule): string | null {
    if (rule.conditions.length === 0) {
        return 'has no conditions and would match every transaction';
    }
    for (const condition of rule.conditions) {
        if (condition.kind === 'amount_range' && condition.min > condition.max) {
            return `amount_range lower bound ${condition.min} is greater than upper bound ${condition.max}`;
        }
    }
    return null;
}

function rawId(entry: unknown): string | undefined {
    if (typeof entry === 'object' && entry !== null && 'id' in entry && typeof entry.id === 'string') {
        return entry.id;
    }
    return undefined;
}
