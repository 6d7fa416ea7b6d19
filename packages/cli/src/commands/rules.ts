import {
    ValidationError,
    formatMinorUnits,
    parseAmount,
    validateRule,
    type Condition,
    type Rule,
    type RuleInput,
    type RulePatch,
    type RuleStore,
} from '@budget-import/core';
import { YamlRuleStore } from '../yaml/rules.js';
import { log, success, arrow, info, warn, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { openWorkspace } from './common.js';
import type { RulesCliOptions } from '../types.js';

/**
 * Rule fields as given on the command line. Amounts are major units.
 */
export interface RuleFlags {
    name?: string;
    category?: string;
    categoryName?: string;
    priority?: string;
    payee?: string[];
    payeeContains?: string[];
    payeeRegex?: string[];
    memo?: string[];
    amount?: string;
    min?: string;
    max?: string;
}

export interface RulesCommandDeps {
    store?: RuleStore;
}

/**
 * Conditions in flag order: payee, payee-contains, payee-regex, memo,
 * amount, then one amount_range for --min/--max (an open end is unbounded).
 * @throws Error for an amount that is not a valid decimal
 */
export function conditionsFromFlags(flags: RuleFlags): Condition[] {
    const conditions: Condition[] = [];

    for (const value of flags.payee ?? []) conditions.push({ kind: 'payee_exact', value });
    for (const value of flags.payeeContains ?? []) conditions.push({ kind: 'payee_contains', value });
    for (const pattern of flags.payeeRegex ?? []) conditions.push({ kind: 'payee_regex', pattern });
    for (const value of flags.memo ?? []) conditions.push({ kind: 'memo_contains', value });

    if (flags.amount !== undefined) {
        conditions.push({ kind: 'amount_exact', amount: amountFlag('--amount', flags.amount) });
    }
    if (flags.min !== undefined || flags.max !== undefined) {
        conditions.push({
            kind: 'amount_range',
            min: flags.min !== undefined ? amountFlag('--min', flags.min) : Number.MIN_SAFE_INTEGER,
            max: flags.max !== undefined ? amountFlag('--max', flags.max) : Number.MAX_SAFE_INTEGER,
        });
    }

    return conditions;
}

export function ruleInputFromFlags(flags: RuleFlags): RuleInput {
    if (!flags.category) {
        throw new Error('--category is required');
    }
    const conditions = conditionsFromFlags(flags);
    const input: RuleInput = {
        name: flags.name ?? (conditions.length > 0 ? describeConditions(conditions) : 'Unnamed rule'),
        conditions,
        category: flags.category,
    };
    if (flags.categoryName !== undefined) input.category_name = flags.categoryName;
    if (flags.priority !== undefined) input.priority = priorityFlag(flags.priority);
    return input;
}

/**
 * Only the fields given; any condition flag replaces all conditions.
 */
export function rulePatchFromFlags(flags: RuleFlags): RulePatch {
    const patch: RulePatch = {};
    if (flags.name !== undefined) patch.name = flags.name;
    if (flags.category !== undefined) patch.category = flags.category;
    if (flags.categoryName !== undefined) patch.category_name = flags.categoryName;
    if (flags.priority !== undefined) patch.priority = priorityFlag(flags.priority);

    const conditions = conditionsFromFlags(flags);
    if (conditions.length > 0) patch.conditions = conditions;
    return patch;
}

export function describeCondition(condition: Condition): string {
    switch (condition.kind) {
        case 'payee_exact':
            return `payee = "${condition.value}"`;
        case 'payee_contains':
            return `payee contains "${condition.value}"`;
        case 'payee_regex':
            return `payee ~ /${condition.pattern}/i`;
        case 'memo_contains':
            return `memo contains "${condition.value}"`;
        case 'amount_exact':
            return `amount = ${formatMinorUnits(condition.amount)}`;
        case 'amount_range':
            if (condition.min === Number.MIN_SAFE_INTEGER) return `amount <= ${formatMinorUnits(condition.max)}`;
            if (condition.max === Number.MAX_SAFE_INTEGER) return `amount >= ${formatMinorUnits(condition.min)}`;
            return `amount ${formatMinorUnits(condition.min)}..${formatMinorUnits(condition.max)}`;
    }
}

export function describeConditions(conditions: readonly Condition[]): string {
    return conditions.map(describeCondition).join(' AND ');
}

export function formatRule(rule: Rule): string {
    const status = rule.enabled ? '' : ' (disabled)';
    return `${rule.id} [priority ${rule.priority}]${status} ${rule.name}: ` +
        `${describeConditions(rule.conditions)} → ${rule.category_name ?? rule.category}`;
}

export async function listRules(options: RulesCliOptions, deps: RulesCommandDeps = {}): Promise<void> {
    await withStore(options, deps, async store => {
        const rules = await store.list();
        if (rules.length === 0) {
            info('No rules yet. Add one with "bimport rules add".');
            return;
        }
        log(`${rules.length} rule(s), in evaluation order:`);
        rules.forEach(rule => arrow(formatRule(rule)));
    });
}

export async function addRule(flags: RuleFlags, options: RulesCliOptions, deps: RulesCommandDeps = {}): Promise<void> {
    await withStore(options, deps, async store => {
        const input = ruleInputFromFlags(flags);
        for (const warning of validateRule(input).warnings) {
            warn(warning);
        }
        const rule = await store.create(input);
        success(`Rule ${rule.id} added.`);
        arrow(formatRule(rule));
    });
}

export async function updateRule(id: string, flags: RuleFlags, options: RulesCliOptions, deps: RulesCommandDeps = {}): Promise<void> {
    await withStore(options, deps, async store => {
        const patch = rulePatchFromFlags(flags);
        if (Object.keys(patch).length === 0) {
            throw new Error('Nothing to update. Pass at least one rule flag.');
        }
        const rule = await store.update(id, patch);
        success(`Rule ${rule.id} updated.`);
        arrow(formatRule(rule));
    });
}

export async function deleteRule(id: string, options: RulesCliOptions, deps: RulesCommandDeps = {}): Promise<void> {
    await withStore(options, deps, async store => {
        await store.delete(id);
        success(`Rule ${id} deleted.`);
    });
}

export async function setRuleEnabled(id: string, enabled: boolean, options: RulesCliOptions, deps: RulesCommandDeps = {}): Promise<void> {
    await withStore(options, deps, async store => {
        await store.update(id, { enabled });
        success(`Rule ${id} ${enabled ? 'enabled' : 'disabled'}.`);
    });
}

async function withStore(
    options: RulesCliOptions,
    deps: RulesCommandDeps,
    action: (store: RuleStore) => Promise<void>
): Promise<void> {
    const store = deps.store ?? new YamlRuleStore(openWorkspace(options.workspace).config.rulesPath);
    try {
        await action(store);
    } catch (err) {
        if (err instanceof ValidationError) {
            error('Rule rejected:');
            err.errors.forEach(e => arrow(e));
        } else {
            error(errorMessage(err));
        }
        process.exit(1);
    }
}

function amountFlag(flag: string, value: string): number {
    const amount = parseAmount(value, 'point');
    if (amount === null) {
        throw new Error(`${flag}: "${value}" is not an amount (use major units, e.g. -45.90)`);
    }
    return amount;
}

function priorityFlag(value: string): number {
    if (!/^-?\d+$/.test(value.trim())) {
        throw new Error(`--priority: "${value}" is not an integer`);
    }
    return parseInt(value, 10);
}
