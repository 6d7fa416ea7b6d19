import { describe, it, expect } from 'vitest';
import {
    TransactionRecordSchema,
    ImportTransactionSchema,
    ConditionSchema,
    RuleSchema,
    RuleInputSchema,
    ReviewResolutionSchema,
    ImportHistorySchema,
    BudgetConfigSchema,
} from '../src/schemas.js';

describe('TransactionRecordSchema', () => {
    const valid = {
        date: '2026-01-15',
        payee: 'PRISMA HERTTONIEMI',
        memo: null,
        amount: -4590,
        account_ref: 'checking',
    };

    it('validates a complete record', () => {
        expect(TransactionRecordSchema.safeParse(valid).success).toBe(true);
    });

    it('rejects a fractional amount', () => {
        const result = TransactionRecordSchema.safeParse({ ...valid, amount: -45.9 });
        expect(result.success).toBe(false);
    });

    it('rejects a non-ISO date', () => {
        expect(TransactionRecordSchema.safeParse({ ...valid, date: '15.01.2026' }).success).toBe(false);
    });

    it('rejects an empty account_ref', () => {
        expect(TransactionRecordSchema.safeParse({ ...valid, account_ref: '' }).success).toBe(false);
    });

    it('allows an empty payee', () => {
        expect(TransactionRecordSchema.safeParse({ ...valid, payee: '' }).success).toBe(true);
    });
});

describe('ImportTransactionSchema', () => {
    const txn = {
        date: '2026-01-15',
        payee: 'PRISMA',
        memo: 'card',
        amount: -4590,
        account_ref: 'checking',
        import_id: 'BI:0123456789abcdef0123456789abcdef',
        category: null,
        confidence: 'manual',
        matched_rule_id: null,
        state: 'review_pending',
    };

    it('accepts an uncategorized transaction', () => {
        expect(ImportTransactionSchema.safeParse(txn).success).toBe(true);
    });

    it('rejects an import_id of the wrong shape', () => {
        expect(ImportTransactionSchema.safeParse({ ...txn, import_id: 'BI:XYZ' }).success).toBe(false);
        expect(ImportTransactionSchema.safeParse({ ...txn, import_id: 'YNAB:0123456789abcdef0123456789abcdef' }).success).toBe(false);
    });

    it('rejects an unknown state', () => {
        expect(ImportTransactionSchema.safeParse({ ...txn, state: 'done' }).success).toBe(false);
    });
});

describe('ConditionSchema', () => {
    it('accepts each condition kind', () => {
        const conditions = [
            { kind: 'payee_exact', value: 'K-Market' },
            { kind: 'payee_contains', value: 'PRISMA' },
            { kind: 'payee_regex', pattern: '^ALEPA' },
            { kind: 'memo_contains', value: 'rent' },
            { kind: 'amount_exact', amount: -1000 },
            { kind: 'amount_range', min: -5000, max: 0 },
        ];
        for (const condition of conditions) {
            expect(ConditionSchema.safeParse(condition).success).toBe(true);
        }
    });

    it('rejects an unknown kind', () => {
        expect(ConditionSchema.safeParse({ kind: 'payee_fuzzy', value: 'x' }).success).toBe(false);
    });

    it('rejects an empty match value', () => {
        const result = ConditionSchema.safeParse({ kind: 'payee_contains', value: '' });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0].message).toBe('Condition value cannot be empty');
        }
    });

    it('rejects a fractional amount', () => {
        expect(ConditionSchema.safeParse({ kind: 'amount_exact', amount: 10.5 }).success).toBe(false);
    });
});

describe('RuleSchema', () => {
    it('fills priority and enabled defaults', () => {
        const rule = RuleSchema.parse({
            id: 'R0001',
            name: 'Groceries',
            conditions: [{ kind: 'payee_contains', value: 'PRISMA' }],
            category: 'cat-groceries',
        });
        expect(rule.priority).toBe(0);
        expect(rule.enabled).toBe(true);
    });

    it('rejects a fractional priority', () => {
        expect(
            RuleSchema.safeParse({ id: 'R0001', name: 'x', conditions: [], category: 'c', priority: 1.5 }).success
        ).toBe(false);
    });

    it('has no id on the input shape', () => {
        const input = RuleInputSchema.parse({
            id: 'R0099',
            name: 'x',
            conditions: [{ kind: 'payee_exact', value: 'x' }],
            category: 'c',
        });
        expect('id' in input).toBe(false);
    });
});

describe('ReviewResolutionSchema', () => {
    it('requires a category', () => {
        expect(
            ReviewResolutionSchema.safeParse({ import_id: 'BI:0123456789abcdef0123456789abcdef', category: '' }).success
        ).toBe(false);
    });
});

describe('ImportHistorySchema', () => {
    it('validates a history file', () => {
        const history = {
            version: 1,
            imported: {
                'BI:0123456789abcdef0123456789abcdef': {
                    date: '2026-01-15',
                    amount: -4590,
                    payee: 'PRISMA',
                    account_ref: 'checking',
                    status: 'created',
                    recorded_at: '2026-01-16T09:00:00.000Z',
                },
            },
        };
        expect(ImportHistorySchema.safeParse(history).success).toBe(true);
        expect(ImportHistorySchema.safeParse({ ...history, version: 2 }).success).toBe(false);
    });
});

describe('BudgetConfigSchema', () => {
    it('applies submission defaults', () => {
        const config = BudgetConfigSchema.parse({ budget_id: 'budget-1' });
        expect(config).toEqual({
            api_base_url: 'https://api.ynab.com/v1',
            budget_id: 'budget-1',
            accounts: {},
            chunk_size: 50,
            max_retries: 3,
            retry_base_ms: 500,
            timeout_ms: 30000,
            memo_max_length: 200,
        });
    });

    it('requires a budget id', () => {
        expect(BudgetConfigSchema.safeParse({}).success).toBe(false);
    });

    it('rejects a zero chunk size', () => {
        expect(BudgetConfigSchema.safeParse({ budget_id: 'b', chunk_size: 0 }).success).toBe(false);
    });
});
