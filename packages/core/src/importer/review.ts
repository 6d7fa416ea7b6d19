/**
 * Manual review: expose needs-review transactions and fold human
 * resolutions back into the batch.
 *
 * The rule engine is not re-run for a resolved transaction. Its
 * confidence stays "manual" so rule-driven and human-driven
 * categorizations remain distinguishable afterwards.
 */

import { ReviewResolutionSchema } from '../types/index.js';
import type { BatchResult, CategoryOption, ImportTransaction } from '../types/index.js';
import { transitionState } from './state.js';

export interface ReviewItem {
    transaction: ImportTransaction;
    candidates: CategoryOption[];
}

/**
 * Needs-review transactions, each with the categories the reviewer may pick.
 * Candidates are sorted by group then name.
 */
export function buildReviewQueue(batch: BatchResult, categories: readonly CategoryOption[]): ReviewItem[] {
    const candidates = [...categories].sort((a, b) => {
        const group = (a.group_name ?? '').localeCompare(b.group_name ?? '');
        return group !== 0 ? group : a.name.localeCompare(b.name);
    });
    return batch.needs_review.map(transaction => ({ transaction, candidates }));
}

export interface ReviewApplyResult {
    batch: BatchResult;
    resolved: number;
    errors: string[];
}

/**
 * Apply {import_id, category} resolutions to a batch.
 *
 * PURE FUNCTION: Returns a new batch. Does not mutate input.
 *
 * Each resolved transaction moves from needs_review to the end of ready in
 * state "resolved". A resolution is refused (reported in errors, transaction
 * left pending) when it is malformed, names no pending transaction, or,
 * when candidates are given, names a category outside them.
 *
 * @param candidates - Allowed categories; empty or omitted means no check
 */
export function applyReviewResolutions(
    batch: BatchResult,
    resolutions: readonly unknown[],
    candidates: readonly CategoryOption[] = []
): ReviewApplyResult {
    const errors: string[] = [];
    const pending = new Map(batch.needs_review.map(t => [t.import_id, t]));
    const readyIds = new Set(batch.ready.map(t => t.import_id));
    const allowed = new Map(candidates.map(c => [c.id, c]));
    const resolvedTxns: ImportTransaction[] = [];

    resolutions.forEach((entry, index) => {
        const parsed = ReviewResolutionSchema.safeParse(entry);
        if (!parsed.success) {
            errors.push(`Resolution ${index} is malformed: ${parsed.error.issues.map(i => i.message).join('; ')}`);
            return;
        }
        const resolution = parsed.data;

        const txn = pending.get(resolution.import_id);
        if (!txn) {
            errors.push(
                readyIds.has(resolution.import_id)
                    ? `Transaction ${resolution.import_id} is already categorized`
                    : `Transaction ${resolution.import_id} is not awaiting review`
            );
            return;
        }

        const option = allowed.get(resolution.category);
        if (allowed.size > 0 && !option) {
            errors.push(`Category ${resolution.category} is not a valid choice for ${resolution.import_id}`);
            return;
        }

        const updated: ImportTransaction = {
            ...txn,
            category: resolution.category,
            confidence: 'manual',
            matched_rule_id: null,
        };
        const categoryName = resolution.category_name ?? option?.name;
        if (categoryName !== undefined) {
            updated.category_name = categoryName;
        }

        resolvedTxns.push(transitionState(updated, 'resolved'));
        pending.delete(resolution.import_id);
    });

    return {
        batch: {
            ...batch,
            ready: [...batch.ready, ...resolvedTxns],
            needs_review: batch.needs_review.filter(t => pending.has(t.import_id)),
        },
        resolved: resolvedTxns.length,
        errors,
    };
}
