/**
 * Batch preparation: parsed records in, categorized and deduplicated batch out.
 *
 * ARCHITECTURAL NOTE: No console.* calls, no I/O. Known import ids are
 * passed in; warnings are returned in the result.
 */

import { categorize } from '../categorizer/categorize.js';
import { computeImportId } from '../dedup/import-id.js';
import type { RuleSnapshot } from '../rules/snapshot.js';
import { SKIP_REASONS, TransactionRecordSchema } from '../types/index.js';
import type { BatchResult, ImportTransaction, TransactionRecord } from '../types/index.js';
import { transitionState } from './state.js';

/**
 * Build an ImportTransaction in its initial "parsed" state.
 */
export function toImportTransaction(record: TransactionRecord): ImportTransaction {
    return {
        date: record.date,
        payee: record.payee,
        memo: record.memo,
        amount: record.amount,
        account_ref: record.account_ref,
        import_id: computeImportId(record),
        category: null,
        confidence: 'manual',
        matched_rule_id: null,
        state: 'parsed',
    };
}

/**
 * Prepare one upload session's transactions for submission.
 *
 * 1. Validate each record (invalid ones are reported and left out)
 * 2. Assign import_id
 * 3. Categorize against the snapshot (auto on match, manual otherwise)
 * 4. Drop keys already imported or already seen earlier in this batch,
 *    recording them as skipped_duplicate
 * 5. Partition the rest into ready / needs_review
 *
 * Step 4 applies to manual transactions too, so a re-import never asks
 * the user to review something that was already submitted.
 *
 * @param parsed - Parser output; entries are validated, not trusted
 * @param snapshot - Rule snapshot taken at batch start
 * @param knownImportIds - Keys recorded as imported by previous runs
 */
export function prepareBatch(
    parsed: readonly unknown[],
    snapshot: RuleSnapshot,
    knownImportIds: ReadonlySet<string> = new Set()
): BatchResult {
    const warnings: string[] = [];
    const ready: ImportTransaction[] = [];
    const needsReview: ImportTransaction[] = [];
    const skipped: ImportTransaction[] = [];
    const seen = new Map<string, number>();
    let invalid = 0;
    let auto = 0;
    let manual = 0;

    parsed.forEach((entry, index) => {
        const record = TransactionRecordSchema.safeParse(entry);
        if (!record.success) {
            invalid++;
            const detail = record.error.issues
                .map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`)
                .join('; ');
            warnings.push(`Record ${index} skipped: ${detail}`);
            return;
        }

        const result = categorize(record.data, snapshot);
        const categorized: ImportTransaction = {
            ...toImportTransaction(record.data),
            category: result.category,
            matched_rule_id: result.matched_rule_id,
            confidence: result.matched_rule_id !== null ? 'auto' : 'manual',
        };
        if (result.category_name !== undefined) {
            categorized.category_name = result.category_name;
        }
        const txn = transitionState(categorized, 'categorized');

        if (txn.confidence === 'auto') auto++;
        else manual++;

        if (knownImportIds.has(txn.import_id)) {
            skipped.push(transitionState(txn, 'skipped_duplicate', SKIP_REASONS.ALREADY_IMPORTED));
            return;
        }

        const firstIndex = seen.get(txn.import_id);
        if (firstIndex !== undefined) {
            warnings.push(
                `Records ${firstIndex} and ${index} share import_id ${txn.import_id} ` +
                `(${txn.date} ${txn.payee} ${txn.amount}); only the first is submitted`
            );
            skipped.push(transitionState(txn, 'skipped_duplicate', SKIP_REASONS.DUPLICATE_IN_BATCH));
            return;
        }
        seen.set(txn.import_id, index);

        if (txn.confidence === 'auto') {
            ready.push(transitionState(txn, 'deduplicated'));
        } else {
            needsReview.push(transitionState(txn, 'review_pending'));
        }
    });

    if (skipped.length > 0) {
        warnings.push(`${skipped.length} duplicate transaction(s) skipped.`);
    }

    return {
        rule_set_version: snapshot.version,
        ready,
        needs_review: needsReview,
        skipped,
        warnings,
        stats: {
            total: parsed.length,
            invalid,
            auto,
            manual,
            skipped_duplicates: skipped.length,
        },
    };
}
