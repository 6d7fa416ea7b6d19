import { describe, it, expect, vi, afterEach } from 'vitest';
import { SubmissionError, submitBatch } from '@budget-import/core';
import type { BatchResult, SubmissionPayload } from '@budget-import/core';
import { BudgetConfigSchema } from '@budget-import/shared';
import { HttpBudgetClient, milliunitsToMinor } from '../src/client/http-budget-client.js';

const ID_A = `BI:${'a'.repeat(32)}`;
const ID_B = `BI:${'b'.repeat(32)}`;
const TRANSACTIONS_URL = 'https://budget.test/v1/budgets/budget-1/transactions';

const config = BudgetConfigSchema.parse({
    api_base_url: 'https://budget.test/v1',
    budget_id: 'budget-1',
    accounts: { checking: 'acc-1' },
    memo_max_length: 10,
});

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function errorResponse(status: number, detail: string): Response {
    return jsonResponse({ error: { id: String(status), name: 'error', detail } }, status);
}

function mockFetch() {
    return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => jsonResponse({}));
}

const payloads: SubmissionPayload[] = [
    {
        account_ref: 'checking',
        date: '2026-03-02',
        amount: -4590,
        payee: 'PRISMA',
        memo: 'weekly shopping trip',
        category: 'cat-groceries',
        import_id: ID_A,
    },
    {
        account_ref: 'checking',
        date: '2026-03-03',
        amount: -320,
        payee: 'KIOSKI',
        memo: null,
        category: 'cat-snacks',
        import_id: ID_B,
    },
];

describe('HttpBudgetClient', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('createTransactions', () => {
        it('sends mapped transactions and folds created and duplicate ids', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(jsonResponse({
                data: {
                    transaction_ids: ['t1'],
                    duplicate_import_ids: [ID_B],
                    transactions: [{ id: 't1', import_id: ID_A }],
                },
            }, 201));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            const items = await client.createTransactions(payloads);

            expect(items).toEqual([
                { import_id: ID_A, status: 'created' },
                { import_id: ID_B, status: 'duplicate', reason: 'import_id already exists in service' },
            ]);

            const [url, init] = fetchMock.mock.calls[0];
            expect(url).toBe(TRANSACTIONS_URL);
            expect(init?.method).toBe('POST');
            expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });

            const body: { transactions: unknown[] } = JSON.parse(String(init?.body));
            expect(body.transactions).toEqual([
                {
                    account_id: 'acc-1',
                    date: '2026-03-02',
                    amount: -45900,
                    payee_name: 'PRISMA',
                    category_id: 'cat-groceries',
                    memo: 'weekly sho',
                    cleared: 'cleared',
                    approved: true,
                    import_id: ID_A,
                },
                {
                    account_id: 'acc-1',
                    date: '2026-03-03',
                    amount: -3200,
                    payee_name: 'KIOSKI',
                    category_id: 'cat-snacks',
                    memo: null,
                    cleared: 'cleared',
                    approved: true,
                    import_id: ID_B,
                },
            ]);
        });

        it('leaves out items the service did not acknowledge', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(jsonResponse({ data: { transactions: [{ id: 't1', import_id: ID_A }] } }, 201));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            expect(await client.createTransactions(payloads)).toEqual([{ import_id: ID_A, status: 'created' }]);
        });

        it('answers an unmapped account with an error item and sends only the mapped ones', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(jsonResponse({ data: { transactions: [{ id: 't2', import_id: ID_B }] } }, 201));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            const items = await client.createTransactions([{ ...payloads[0], account_ref: 'savings' }, payloads[1]]);

            expect(items).toEqual([
                {
                    import_id: ID_A,
                    status: 'error',
                    reason: 'no service account for account_ref "savings" (add it under "accounts" in config/budget.json)',
                },
                { import_id: ID_B, status: 'created' },
            ]);
            const body: { transactions: { import_id: string }[] } = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
            expect(body.transactions.map(t => t.import_id)).toEqual([ID_B]);
        });

        it('skips the request when no account in the chunk is mapped', async () => {
            const fetchMock = mockFetch();
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            const items = await client.createTransactions([{ ...payloads[0], account_ref: 'savings' }]);

            expect(items).toEqual([{
                import_id: ID_A,
                status: 'error',
                reason: 'no service account for account_ref "savings" (add it under "accounts" in config/budget.json)',
            }]);
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });

    describe('error mapping', () => {
        it.each([
            [401, 'auth', false],
            [403, 'auth', false],
            [404, 'config', false],
            [422, 'validation', false],
            [429, 'rate_limit', true],
            [503, 'server', true],
        ] as const)('maps HTTP %i to %s', async (status, kind, transient) => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(errorResponse(status, 'Bad thing'));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            const err = await client.createTransactions(payloads).catch((e: unknown) => e);

            expect(err).toBeInstanceOf(SubmissionError);
            if (err instanceof SubmissionError) {
                expect(err.kind).toBe(kind);
                expect(err.status).toBe(status);
                expect(err.transient).toBe(transient);
                expect(err.message).toBe('POST /budgets/budget-1/transactions: Bad thing');
            }
        });

        it('falls back to the response text for non-JSON errors', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(new Response('upstream down', { status: 502 }));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            await expect(client.getCategories()).rejects.toMatchObject({
                kind: 'server',
                message: 'GET /budgets/budget-1/categories: upstream down',
            });
        });

        it('reports network failures', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            await expect(client.createTransactions(payloads)).rejects.toMatchObject({
                kind: 'network',
                message: 'POST /budgets/budget-1/transactions failed: fetch failed',
            });
        });

        it('reports timeouts', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockRejectedValueOnce(Object.assign(new Error('The operation timed out'), { name: 'TimeoutError' }));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            await expect(client.createTransactions(payloads)).rejects.toMatchObject({
                kind: 'timeout',
                message: 'POST /budgets/budget-1/transactions timed out after 30000 ms',
            });
        });

        it('rejects responses of an unexpected shape', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(jsonResponse({ unexpected: true }, 201));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            await expect(client.createTransactions(payloads)).rejects.toMatchObject({ kind: 'server', status: 201 });
        });
    });

    describe('getCategories', () => {
        it('returns visible categories with their group', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(jsonResponse({
                data: {
                    category_groups: [
                        { id: 'g0', name: 'Internal Master Category', categories: [{ id: 'c0', name: 'Inflow' }] },
                        {
                            id: 'g1',
                            name: 'Everyday',
                            categories: [
                                { id: 'c1', name: 'Groceries' },
                                { id: 'c2', name: 'Old', hidden: true },
                            ],
                        },
                        { id: 'g2', name: 'Archive', deleted: true, categories: [{ id: 'c3', name: 'Gone' }] },
                        { id: 'g3', name: 'Credit Card Payments', categories: [{ id: 'c4', name: 'Visa' }] },
                    ],
                },
            }));
            vi.stubGlobal('fetch', fetchMock);
            const client = new HttpBudgetClient(config, 'test-secret');

            expect(await client.getCategories()).toEqual([{ id: 'c1', name: 'Groceries', group_name: 'Everyday' }]);
            expect(fetchMock.mock.calls[0][0]).toBe('https://budget.test/v1/budgets/budget-1/categories');
            expect(fetchMock.mock.calls[0][1]?.method).toBe('GET');
        });
    });

    describe('getTransactions', () => {
        it('converts milliunits and drops deleted transactions', async () => {
            const fetchMock = mockFetch();
            fetchMock.mockResolvedValueOnce(jsonResponse({
                data: {
                    transactions: [
                        { id: 't1', date: '2026-01-05', amount: -45900, payee_name: 'PRISMA', category_id: 'c1', category_name: 'Groceries' },
                        { id: 't2', date: '2026-01-06', amount: -1000, payee_name: null, category_id: null, deleted: true },
                        { id: 't3', date: '2026-01-07', amount: -12340, payee_name: 'Kiosk' },
                    ],
                },
            }));
            const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

            const transactions = await client.getTransactions('2026-01-01');

            expect(fetchMock.mock.calls[0][0]).toBe(`${TRANSACTIONS_URL}?since_date=2026-01-01`);
            expect(transactions).toEqual([
                { date: '2026-01-05', payee: 'PRISMA', amount: -4590, category: 'c1', category_name: 'Groceries' },
                { date: '2026-01-07', payee: 'Kiosk', amount: -1234, category: null, category_name: null },
            ]);
        });
    });

    it('converts milliunits to minor units', () => {
        expect(milliunitsToMinor(-45900)).toBe(-4590);
        expect(milliunitsToMinor(2500000)).toBe(250000);
        expect(milliunitsToMinor(0)).toBe(0);
    });

    it('lets submitBatch retry a rate-limited chunk', async () => {
        const fetchMock = mockFetch();
        fetchMock
            .mockResolvedValueOnce(errorResponse(429, 'Too many requests'))
            .mockImplementationOnce(async (_input, init) => {
                const body: { transactions: { import_id: string }[] } = JSON.parse(String(init?.body));
                return jsonResponse({
                    data: { transactions: body.transactions.map((t, i) => ({ id: `t${i}`, import_id: t.import_id })) },
                }, 201);
            });
        const client = new HttpBudgetClient(config, 'test-secret', fetchMock);
        const batch: BatchResult = {
            rule_set_version: 'abc123def456',
            ready: [{
                date: '2026-03-02',
                payee: 'PRISMA',
                memo: null,
                amount: -4590,
                account_ref: 'checking',
                import_id: ID_A,
                category: 'cat-groceries',
                confidence: 'auto',
                matched_rule_id: 'R0001',
                state: 'deduplicated',
            }],
            needs_review: [],
            skipped: [],
            warnings: [],
            stats: { total: 1, invalid: 0, auto: 1, manual: 0, skipped_duplicates: 0 },
        };
        const sleep = vi.fn(async (_ms: number) => {});

        const result = await submitBatch(batch, client, { retryBaseMs: 100, sleep });

        expect(fetchMock).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenCalledWith(100);
        expect(result.accepted).toEqual([{
            import_id: ID_A,
            payee: 'PRISMA',
            date: '2026-03-02',
            amount: -4590,
            state: 'submitted',
            status: 'created',
            attempts: 2,
        }]);
        expect(result.rejected).toEqual([]);
    });

    it('keeps submitting other accounts when one account_ref is unmapped', async () => {
        const fetchMock = mockFetch();
        fetchMock.mockImplementation(async (_input, init) => {
            const body: { transactions: { import_id: string }[] } = JSON.parse(String(init?.body));
            return jsonResponse({
                data: { transactions: body.transactions.map((t, i) => ({ id: `t${i}`, import_id: t.import_id })) },
            }, 201);
        });
        const client = new HttpBudgetClient(config, 'test-secret', fetchMock);

        const ready: BatchResult['ready'] = [];
        for (let i = 0; i < 61; i++) {
            ready.push({
                date: '2026-03-02',
                payee: `SHOP ${i}`,
                memo: null,
                amount: -100 - i,
                account_ref: i === 0 ? 'savings' : 'checking',
                import_id: `BI:${String(i).padStart(32, '0')}`,
                category: 'cat-groceries',
                confidence: 'auto',
                matched_rule_id: 'R0001',
                state: 'deduplicated',
            });
        }
        const batch: BatchResult = {
            rule_set_version: 'abc123def456',
            ready,
            needs_review: [],
            skipped: [],
            warnings: [],
            stats: { total: 61, invalid: 0, auto: 61, manual: 0, skipped_duplicates: 0 },
        };

        const result = await submitBatch(batch, client, { chunkSize: 50 });

        expect(fetchMock).toHaveBeenCalledTimes(2);
        expect(result.accepted).toHaveLength(60);
        expect(result.rejected).toEqual([{
            import_id: `BI:${'0'.repeat(32)}`,
            payee: 'SHOP 0',
            date: '2026-03-02',
            amount: -100,
            state: 'rejected',
            status: 'error',
            attempts: 1,
            reason: 'no service account for account_ref "savings" (add it under "accounts" in config/budget.json)',
        }]);
        expect(result.warnings).toEqual([]);
    });
});
