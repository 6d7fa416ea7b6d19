/**
 * HTTP implementation of the core BudgetClient contract.
 *
 * Talks to a YNAB-compatible REST API. Every failure surfaces as a
 * SubmissionError whose kind tells submitBatch() whether to retry.
 */

import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { SubmissionError } from '@budget-import/core';
import type {
    BudgetClient,
    CategoryOption,
    HistoricalTransaction,
    SubmissionPayload,
    SubmissionResponseItem,
} from '@budget-import/core';
import { MONEY, type BudgetConfig } from '@budget-import/shared';

// Category groups the service manages itself
const INTERNAL_GROUPS = new Set(['Internal Master Category', 'Credit Card Payments']);

const ErrorBodySchema = z.object({
    error: z.object({
        id: z.string().optional(),
        name: z.string().optional(),
        detail: z.string().optional(),
    }),
});

const CreateTransactionsResponseSchema = z.object({
    data: z.object({
        transaction_ids: z.array(z.string()).default([]),
        duplicate_import_ids: z.array(z.string()).default([]),
        transactions: z.array(z.object({
            id: z.string(),
            import_id: z.string().nullable().optional(),
        })).default([]),
    }),
});

const CategoriesResponseSchema = z.object({
    data: z.object({
        category_groups: z.array(z.object({
            id: z.string(),
            name: z.string(),
            hidden: z.boolean().default(false),
            deleted: z.boolean().default(false),
            categories: z.array(z.object({
                id: z.string(),
                name: z.string(),
                hidden: z.boolean().default(false),
                deleted: z.boolean().default(false),
            })).default([]),
        })),
    }),
});

const TransactionsResponseSchema = z.object({
    data: z.object({
        transactions: z.array(z.object({
            id: z.string(),
            date: z.string(),
            amount: z.number().int(),
            payee_name: z.string().nullable().optional(),
            category_id: z.string().nullable().optional(),
            category_name: z.string().nullable().optional(),
            deleted: z.boolean().default(false),
        })),
    }),
});

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type FetchFn = typeof fetch;

export class HttpBudgetClient implements BudgetClient {
    private readonly config: BudgetConfig;
    private readonly token: string;
    private readonly fetchImpl: FetchFn;

    constructor(config: BudgetConfig, token: string, fetchImpl: FetchFn = fetch) {
        this.config = config;
        this.token = token;
        this.fetchImpl = fetchImpl;
    }

    /**
     * POST the chunk in one request. Items whose account_ref has no service
     * account are answered with an error item and never sent. Items the
     * service neither created nor reported as duplicates are left out of
     * the result.
     */
    async createTransactions(payloads: SubmissionPayload[]): Promise<SubmissionResponseItem[]> {
        const unmapped = new Map<string, string>();
        const transactions = [];
        for (const payload of payloads) {
            const accountId = this.config.accounts[payload.account_ref];
            if (!accountId) {
                unmapped.set(
                    payload.import_id,
                    `no service account for account_ref "${payload.account_ref}" (add it under "accounts" in config/budget.json)`
                );
                continue;
            }
            transactions.push({
                account_id: accountId,
                date: payload.date,
                amount: payload.amount * MONEY.MILLIUNITS_PER_MINOR,
                payee_name: payload.payee,
                category_id: payload.category,
                memo: payload.memo ? payload.memo.slice(0, this.config.memo_max_length) : null,
                cleared: 'cleared',
                approved: true,
                import_id: payload.import_id,
            });
        }

        const created = new Set<string>();
        const duplicates = new Set<string>();
        if (transactions.length > 0) {
            const { data } = await this.request(
                'POST',
                `/budgets/${encodeURIComponent(this.config.budget_id)}/transactions`,
                CreateTransactionsResponseSchema,
                { transactions }
            );
            for (const txn of data.transactions) {
                if (txn.import_id) created.add(txn.import_id);
            }
            for (const importId of data.duplicate_import_ids) {
                duplicates.add(importId);
            }
        }

        const items: SubmissionResponseItem[] = [];
        for (const payload of payloads) {
            const unmappedReason = unmapped.get(payload.import_id);
            if (unmappedReason !== undefined) {
                items.push({ import_id: payload.import_id, status: 'error', reason: unmappedReason });
            } else if (created.has(payload.import_id)) {
                items.push({ import_id: payload.import_id, status: 'created' });
            } else if (duplicates.has(payload.import_id)) {
                items.push({ import_id: payload.import_id, status: 'duplicate', reason: 'import_id already exists in service' });
            }
        }
        return items;
    }

    /**
     * Visible categories with their group names. Hidden, deleted and
     * internal groups are left out.
     */
    async getCategories(): Promise<CategoryOption[]> {
        const { data } = await this.request(
            'GET',
            `/budgets/${encodeURIComponent(this.config.budget_id)}/categories`,
            CategoriesResponseSchema
        );

        const options: CategoryOption[] = [];
        for (const group of data.category_groups) {
            if (group.hidden || group.deleted || INTERNAL_GROUPS.has(group.name)) continue;
            for (const category of group.categories) {
                if (category.hidden || category.deleted) continue;
                options.push({ id: category.id, name: category.name, group_name: group.name });
            }
        }
        return options;
    }

    /**
     * Non-deleted transactions on or after `since`, amounts in minor units.
     */
    async getTransactions(since?: string): Promise<HistoricalTransaction[]> {
        let path = `/budgets/${encodeURIComponent(this.config.budget_id)}/transactions`;
        if (since) {
            path += `?since_date=${encodeURIComponent(since)}`;
        }
        const { data } = await this.request('GET', path, TransactionsResponseSchema);

        return data.transactions
            .filter(txn => !txn.deleted)
            .map(txn => ({
                date: txn.date,
                payee: txn.payee_name ?? '',
                amount: milliunitsToMinor(txn.amount),
                category: txn.category_id ?? null,
                category_name: txn.category_name ?? null,
            }));
    }

    private async request<T>(
        method: 'GET' | 'POST',
        path: string,
        schema: ResponseSchema<T>,
        body?: unknown
    ): Promise<T> {
        let response: Response;
        try {
            response = await this.fetchImpl(`${this.config.api_base_url}${path}`, {
                method,
                headers: {
                    Authorization: `Bearer ${this.token}`,
                    'Content-Type': 'application/json',
                },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: AbortSignal.timeout(this.config.timeout_ms),
            });
        } catch (err) {
            if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
                throw new SubmissionError('timeout', `${method} ${path} timed out after ${this.config.timeout_ms} ms`);
            }
            throw new SubmissionError('network', `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`);
        }

        if (!response.ok) {
            throw await toSubmissionError(response, `${method} ${path}`);
        }

        let json: unknown;
        try {
            json = await response.json();
        } catch (err) {
            throw new SubmissionError(
                'server',
                `${method} ${path} returned invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
                response.status
            );
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new SubmissionError(
                'server',
                `${method} ${path} returned an unexpected response (${issue.path.join('.')}: ${issue.message})`,
                response.status
            );
        }
        return parsed.data;
    }
}

/**
 * Map an HTTP error response to a SubmissionError kind.
 * 401/403 auth, 404 config, 429 rate_limit, 5xx server, other 4xx validation.
 */
async function toSubmissionError(response: Response, request: string): Promise<SubmissionError> {
    const detail = await errorDetail(response);
    const message = `${request}: ${detail}`;
    const status = response.status;

    if (status === 401 || status === 403) return new SubmissionError('auth', message, status);
    if (status === 404) return new SubmissionError('config', message, status);
    if (status === 429) return new SubmissionError('rate_limit', message, status);
    if (status >= 500) return new SubmissionError('server', message, status);
    return new SubmissionError('validation', message, status);
}

async function errorDetail(response: Response): Promise<string> {
    const text = await response.text().catch(() => '');
    let body: unknown = null;
    try {
        body = JSON.parse(text);
    } catch {
        return text.trim() || response.statusText || `HTTP ${response.status}`;
    }
    const parsed = ErrorBodySchema.safeParse(body);
    if (parsed.success) {
        return parsed.data.error.detail ?? parsed.data.error.name ?? response.statusText;
    }
    return text.trim() || response.statusText;
}

export function milliunitsToMinor(milliunits: number): number {
    return new Decimal(milliunits).dividedBy(MONEY.MILLIUNITS_PER_MINOR).round().toNumber();
}
