import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryRuleStore, nextRuleId, applyRulePatch } from '../../src/rules/store.js';
import { RuleNotFoundError, ValidationError } from '../../src/errors.js';
import type { Rule, RuleInput } from '../../src/types/index.js';

const groceries: RuleInput = {
    name: 'Groceries',
    conditions: [{ kind: 'payee_contains', value: 'PRISMA' }],
    category: 'cat-groceries',
    priority: 10,
};

describe('nextRuleId', () => {
    it('starts at R0001', () => {
        expect(nextRuleId([])).toBe('R0001');
    });

    it('continues after the highest sequence, ignoring foreign ids', () => {
        expect(nextRuleId([{ id: 'R0002' }, { id: 'custom' }, { id: 'R0010' }])).toBe('R0011');
    });
});

describe('InMemoryRuleStore', () => {
    let now: Date;
    let store: InMemoryRuleStore;

    beforeEach(() => {
        now = new Date('2026-01-15T10:00:00.000Z');
        store = new InMemoryRuleStore([], () => now);
    });

    it('creates a rule with id, defaults and timestamps', async () => {
        const rule = await store.create(groceries);
        expect(rule).toEqual({
            id: 'R0001',
            name: 'Groceries',
            conditions: [{ kind: 'payee_contains', value: 'PRISMA' }],
            category: 'cat-groceries',
            priority: 10,
            enabled: true,
            created_at: '2026-01-15T10:00:00.000Z',
            updated_at: '2026-01-15T10:00:00.000Z',
        });
        expect(await store.get('R0001')).toEqual(rule);
    });

    it('continues numbering from initial rules', async () => {
        const seeded = new InMemoryRuleStore([{ ...groceries, id: 'R0007', priority: 10, enabled: true }], () => now);
        const rule = await seeded.create({ ...groceries, name: 'Second' });
        expect(rule.id).toBe('R0008');
    });

    it('refuses a rule with no conditions', async () => {
        await expect(store.create({ ...groceries, conditions: [] })).rejects.toBeInstanceOf(ValidationError);
        expect(await store.list()).toEqual([]);
    });

    it('refuses a rule with an inverted amount range', async () => {
        await expect(
            store.create({ ...groceries, conditions: [{ kind: 'amount_range', min: 0, max: -1 }] })
        ).rejects.toThrow('lower bound 0 is greater than upper bound -1');
    });

    it('refuses a rule with an invalid regex', async () => {
        await expect(
            store.create({ ...groceries, conditions: [{ kind: 'payee_regex', pattern: '(' }] })
        ).rejects.toBeInstanceOf(ValidationError);
    });

    it('updates fields and keeps id and created_at', async () => {
        await store.create(groceries);
        now = new Date('2026-02-01T08:30:00.000Z');

        const updated = await store.update('R0001', { priority: 50, category: 'cat-food' });

        expect(updated.id).toBe('R0001');
        expect(updated.priority).toBe(50);
        expect(updated.category).toBe('cat-food');
        expect(updated.name).toBe('Groceries');
        expect(updated.created_at).toBe('2026-01-15T10:00:00.000Z');
        expect(updated.updated_at).toBe('2026-02-01T08:30:00.000Z');
    });

    it('leaves the rule untouched when an update is invalid', async () => {
        const original = await store.create(groceries);
        await expect(store.update('R0001', { conditions: [] })).rejects.toBeInstanceOf(ValidationError);
        expect(await store.get('R0001')).toEqual(original);
    });

    it('throws RuleNotFoundError for unknown ids', async () => {
        await expect(store.update('R9999', { priority: 1 })).rejects.toBeInstanceOf(RuleNotFoundError);
        await expect(store.delete('R9999')).rejects.toThrow('Rule not found: R9999');
    });

    it('deletes a rule', async () => {
        await store.create(groceries);
        await store.delete('R0001');
        expect(await store.get('R0001')).toBeNull();
    });

    it('lists in evaluation order', async () => {
        await store.create({ ...groceries, name: 'low', priority: 1 });
        await store.create({ ...groceries, name: 'high', priority: 30 });
        await store.create({ ...groceries, name: 'off', priority: 99, enabled: false });

        expect((await store.list()).map(r => r.id)).toEqual(['R0003', 'R0002', 'R0001']);
        expect((await store.listEnabledRulesByPriorityDesc()).map(r => r.id)).toEqual(['R0002', 'R0001']);
    });

    it('returns copies', async () => {
        const rule = await store.create(groceries);
        rule.name = 'changed';
        expect((await store.get('R0001'))?.name).toBe('Groceries');
    });
});

describe('applyRulePatch', () => {
    const rule: Rule = {
        id: 'R0003',
        name: 'Rent',
        conditions: [{ kind: 'payee_exact', value: 'Landlord Oy' }],
        category: 'cat-rent',
        priority: 5,
        enabled: true,
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-01T00:00:00.000Z',
    };

    it('ignores undefined patch values', () => {
        const patched = applyRulePatch(rule, { enabled: false, name: undefined }, new Date('2026-03-01T00:00:00.000Z'));
        expect(patched.name).toBe('Rent');
        expect(patched.enabled).toBe(false);
        expect(patched.updated_at).toBe('2026-03-01T00:00:00.000Z');
    });
});
