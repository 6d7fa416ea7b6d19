import { describe, it, expect } from 'vitest';
import { sha256 } from 'js-sha256';
import { computeImportId, findImportIdCollisions } from '../../src/dedup/import-id.js';

const txn = {
    date: '2026-03-02',
    payee: 'PRISMA HERTTONIEMI',
    amount: -4590,
    account_ref: 'checking',
};

describe('computeImportId', () => {
    it('has the BI: prefix and 32 hex chars', () => {
        expect(computeImportId(txn)).toMatch(/^BI:[0-9a-f]{32}$/);
    });

    it('is stable across calls', () => {
        expect(computeImportId({ ...txn })).toBe(computeImportId(txn));
    });

    it('ignores memo and category', () => {
        const withExtras = { ...txn, memo: 'weekly shop', category: 'cat-groceries' };
        expect(computeImportId(withExtras)).toBe(computeImportId(txn));
    });

    it('changes when the amount differs by one minor unit', () => {
        expect(computeImportId({ ...txn, amount: -4591 })).not.toBe(computeImportId(txn));
    });

    it('changes with date, payee or account', () => {
        const base = computeImportId(txn);
        expect(computeImportId({ ...txn, date: '2026-03-03' })).not.toBe(base);
        expect(computeImportId({ ...txn, payee: 'Prisma Herttoniemi' })).not.toBe(base);
        expect(computeImportId({ ...txn, account_ref: 'savings' })).not.toBe(base);
    });

    it('hashes date, amount, payee and account joined by "|"', () => {
        const expected = sha256('2026-03-02|-4590|PRISMA HERTTONIEMI|checking').slice(0, 32);
        expect(computeImportId(txn)).toBe(`BI:${expected}`);
    });

    it('keeps "|" inside payee and account apart from the separator', () => {
        const a = computeImportId({ ...txn, payee: 'A|x', account_ref: 'y' });
        const b = computeImportId({ ...txn, payee: 'A', account_ref: 'x|y' });
        expect(a).not.toBe(b);
        expect(a).toBe(`BI:${sha256('2026-03-02|-4590|A\\|x|y').slice(0, 32)}`);
    });

    it('keeps a trailing backslash from swallowing the separator', () => {
        const a = computeImportId({ ...txn, payee: 'A\\', account_ref: '|y' });
        const b = computeImportId({ ...txn, payee: 'A\\|', account_ref: 'y' });
        expect(a).not.toBe(b);
    });
});

describe('findImportIdCollisions', () => {
    it('returns nothing for distinct transactions', () => {
        expect(findImportIdCollisions([txn, { ...txn, amount: -100 }])).toEqual({});
    });

    it('counts transactions sharing a key', () => {
        const coffee = { date: '2026-03-02', payee: 'CAFE', amount: -350, account_ref: 'checking' };
        const collisions = findImportIdCollisions([coffee, txn, { ...coffee }, { ...coffee }]);
        expect(collisions).toEqual({ [computeImportId(coffee)]: 3 });
    });
});
