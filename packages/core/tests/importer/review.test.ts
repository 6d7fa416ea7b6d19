import { describe, it, expect } from 'vitest';
import { buildReviewQueue, applyReviewResolutions } from '../../src/importer/review.js';
import { prepareBatch } from '../../src/importer/prepare.js';
import { loadRuleSnapshot } from '../../src/rules/snapshot.js';
import { computeImportId } from '../../src/dedup/import-id.js';
import type { CategoryOption, TransactionRecord } from '../../src/types/index.js';

const snapshot = loadRuleSnapshot([
    {
        id: 'R0001',
        name: 'Groceries',
        conditions: [{ kind: 'payee_contains', value: 'PRISMA' }],
        category: 'cat-groceries',
    },
]).snapshot;

const prisma: TransactionRecord = { date: '2026-03-02', payee: 'PRISMA', memo: null, amount: -4590, account_ref: 'checking' };
const bakery: TransactionRecord = { date: '2026-03-03', payee: 'LOCAL BAKERY', memo: null, amount: -650, account_ref: 'checking' };
const gym: TransactionRecord = { date: '2026-03-04', payee: 'CITY GYM', memo: null, amount: -3900, account_ref: 'checking' };

const categories: CategoryOption[] = [
    { id: 'cat-sport', name: 'Sport', group_name: 'Leisure' },
    { id: 'cat-food', name: 'Restaurants', group_name: 'Food' },
    { id: 'cat-bakery', name: 'Bakery', group_name: 'Food' },
];

const bakeryId = computeImportId(bakery);
const gymId = computeImportId(gym);

describe('buildReviewQueue', () => {
    it('lists needs-review transactions with sorted candidates', () => {
        const batch = prepareBatch([prisma, bakery, gym], snapshot);
        const queue = buildReviewQueue(batch, categories);

        expect(queue.map(item => item.transaction.import_id)).toEqual([bakeryId, gymId]);
        expect(queue[0].candidates.map(c => c.id)).toEqual(['cat-bakery', 'cat-food', 'cat-sport']);
    });
});

describe('applyReviewResolutions', () => {
    it('moves a resolved transaction to the end of ready', () => {
        const batch = prepareBatch([prisma, bakery, gym], snapshot);
        const { batch: next, resolved, errors } = applyReviewResolutions(
            batch,
            [{ import_id: bakeryId, category: 'cat-bakery' }],
            categories
        );

        expect(errors).toEqual([]);
        expect(resolved).toBe(1);
        expect(next.ready.map(t => t.payee)).toEqual(['PRISMA', 'LOCAL BAKERY']);
        expect(next.ready[1]).toMatchObject({
            category: 'cat-bakery',
            category_name: 'Bakery',
            confidence: 'manual',
            matched_rule_id: null,
            state: 'resolved',
        });
        expect(next.needs_review.map(t => t.payee)).toEqual(['CITY GYM']);
    });

    it('does not mutate the input batch', () => {
        const batch = prepareBatch([bakery], snapshot);
        applyReviewResolutions(batch, [{ import_id: bakeryId, category: 'cat-bakery' }]);
        expect(batch.needs_review).toHaveLength(1);
        expect(batch.ready).toEqual([]);
    });

    it('prefers the category name given in the resolution', () => {
        const batch = prepareBatch([bakery], snapshot);
        const { batch: next } = applyReviewResolutions(
            batch,
            [{ import_id: bakeryId, category: 'cat-bakery', category_name: 'Pastries' }],
            categories
        );
        expect(next.ready[0].category_name).toBe('Pastries');
    });

    it('accepts any category when no candidates are given', () => {
        const batch = prepareBatch([bakery], snapshot);
        const { batch: next, errors } = applyReviewResolutions(batch, [{ import_id: bakeryId, category: 'anything' }]);
        expect(errors).toEqual([]);
        expect(next.ready[0].category).toBe('anything');
        expect(next.ready[0].category_name).toBeUndefined();
    });

    it('refuses resolutions it cannot apply', () => {
        const batch = prepareBatch([prisma, bakery], snapshot);
        const prismaId = computeImportId(prisma);
        const { batch: next, resolved, errors } = applyReviewResolutions(
            batch,
            [
                { import_id: 'nope', category: 'cat-food' },
                { import_id: prismaId, category: 'cat-food' },
                { import_id: gymId, category: 'cat-sport' },
                { import_id: bakeryId, category: 'cat-unknown' },
            ],
            categories
        );

        expect(resolved).toBe(0);
        expect(errors).toHaveLength(4);
        expect(errors[0]).toMatch(/^Resolution 0 is malformed: /);
        expect(errors.slice(1)).toEqual([
            `Transaction ${prismaId} is already categorized`,
            `Transaction ${gymId} is not awaiting review`,
            `Category cat-unknown is not a valid choice for ${bakeryId}`,
        ]);
        expect(next.needs_review.map(t => t.import_id)).toEqual([bakeryId]);
    });

    it('applies a resolution only once', () => {
        const batch = prepareBatch([bakery], snapshot);
        const { resolved, errors } = applyReviewResolutions(batch, [
            { import_id: bakeryId, category: 'cat-bakery' },
            { import_id: bakeryId, category: 'cat-food' },
        ]);
        expect(resolved).toBe(1);
        expect(errors).toEqual([`Transaction ${bakeryId} is not awaiting review`]);
    });
});
