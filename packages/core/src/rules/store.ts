/**
 * Rule storage contract and an in-memory implementation.
 *
 * Every write goes through validateRule(); a rule that would be invalid
 * (no conditions, inverted amount range, bad regex) is never persisted.
 */

import { RuleNotFoundError } from '../errors.js';
import { RULE_ID, RuleInputSchema, RulePatchSchema } from '../types/index.js';
import type { Rule, RuleInput, RulePatch } from '../types/index.js';
import { listEnabledRulesByPriorityDesc, sortRulesByPriority } from './order.js';
import { assertValidRule } from './validate.js';

/**
 * Logical rule storage. Implementations: InMemoryRuleStore, YamlRuleStore (cli).
 */
export interface RuleStore {
    list(): Promise<Rule[]>;
    get(id: string): Promise<Rule | null>;
    create(input: RuleInput): Promise<Rule>;
    update(id: string, patch: RulePatch): Promise<Rule>;
    delete(id: string): Promise<void>;
    listEnabledRulesByPriorityDesc(): Promise<Rule[]>;
}

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

/**
 * Next free id: "R" + (highest existing sequence + 1), zero padded.
 */
export function nextRuleId(existing: readonly Pick<Rule, 'id'>[]): string {
    const pattern = new RegExp(`^${RULE_ID.PREFIX}(\\d+)$`);
    let max = 0;
    for (const { id } of existing) {
        const match = id.match(pattern);
        if (match) {
            max = Math.max(max, parseInt(match[1], 10));
        }
    }
    return `${RULE_ID.PREFIX}${String(max + 1).padStart(RULE_ID.PAD, '0')}`;
}

/**
 * Validate input and produce the stored rule.
 * @throws ValidationError
 */
export function buildRule(input: RuleInput, id: string, now: Date): Rule {
    assertValidRule(input);
    const data = RuleInputSchema.parse(input);
    const timestamp = now.toISOString();
    return { id, ...data, created_at: timestamp, updated_at: timestamp };
}

/**
 * Apply a partial edit; the merged rule is validated as a whole.
 * @throws ValidationError
 */
export function applyRulePatch(rule: Rule, patch: RulePatch, now: Date): Rule {
    const changes = RulePatchSchema.parse(patch);
    const { id, created_at, updated_at: _previous, ...current } = rule;
    const merged: RuleInput = { ...current };
    for (const [key, value] of Object.entries(changes)) {
        if (value !== undefined) {
            Object.assign(merged, { [key]: value });
        }
    }
    assertValidRule(merged);
    const data = RuleInputSchema.parse(merged);
    return { id, ...data, created_at, updated_at: now.toISOString() };
}

/**
 * Rule store held in process memory. Used by tests and as the base for
 * file-backed stores that load everything up front.
 */
export class InMemoryRuleStore implements RuleStore {
    private rules = new Map<string, Rule>();
    private readonly clock: Clock;

    constructor(initial: readonly Rule[] = [], clock: Clock = systemClock) {
        this.clock = clock;
        for (const rule of initial) {
            this.rules.set(rule.id, { ...rule });
        }
    }

    async list(): Promise<Rule[]> {
        return sortRulesByPriority([...this.rules.values()]).map(r => ({ ...r }));
    }

    async get(id: string): Promise<Rule | null> {
        const rule = this.rules.get(id);
        return rule ? { ...rule } : null;
    }

    async create(input: RuleInput): Promise<Rule> {
        const rule = buildRule(input, nextRuleId([...this.rules.values()]), this.clock());
        this.rules.set(rule.id, rule);
        return { ...rule };
    }

    async update(id: string, patch: RulePatch): Promise<Rule> {
        const existing = this.rules.get(id);
        if (!existing) {
            throw new RuleNotFoundError(id);
        }
        const updated = applyRulePatch(existing, patch, this.clock());
        this.rules.set(id, updated);
        return { ...updated };
    }

    async delete(id: string): Promise<void> {
        if (!this.rules.delete(id)) {
            throw new RuleNotFoundError(id);
        }
    }

    async listEnabledRulesByPriorityDesc(): Promise<Rule[]> {
        return listEnabledRulesByPriorityDesc([...this.rules.values()]).map(r => ({ ...r }));
    }
}
