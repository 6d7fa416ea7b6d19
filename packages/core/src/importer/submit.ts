/**
 * Submission of a prepared batch to the budgeting service.
 *
 * Items go out sequentially in chunks. Every ready transaction ends with
 * its own outcome; one failing chunk never hides the rest of the batch.
 *
 * ARCHITECTURAL NOTE: No console.* calls. The client is injected; the
 * retry delay is injectable so tests do not wait.
 */

import { BatchInFlightError, SubmissionError } from '../errors.js';
import { SKIP_REASONS, SUBMISSION_DEFAULTS, SubmissionResponseItemSchema } from '../types/index.js';
import type {
    BatchResult,
    CategoryOption,
    HistoricalTransaction,
    ImportTransaction,
    SubmissionOutcome,
    SubmissionPayload,
    SubmissionResponseItem,
    SubmissionResult,
} from '../types/index.js';
import { transitionState } from './state.js';

/**
 * What the importer needs from the budgeting-service API client.
 */
export interface BudgetClient {
    /**
     * Create transactions. Resolves with one item per payload it could
     * acknowledge; rejects with SubmissionError when the call itself fails.
     */
    createTransactions(payloads: SubmissionPayload[]): Promise<SubmissionResponseItem[]>;
    /** Categories a reviewer may choose from. */
    getCategories(): Promise<CategoryOption[]>;
    /** Already-categorized service transactions, on or after `since` (YYYY-MM-DD). */
    getTransactions(since?: string): Promise<HistoricalTransaction[]>;
}

export interface SubmitOptions {
    /** Keys recorded as imported; matching items are skipped, not sent. */
    knownImportIds?: ReadonlySet<string>;
    chunkSize?: number;
    /** Retries per chunk for transient failures (network, timeout, 429, 5xx). */
    maxRetries?: number;
    /** First retry delay; doubles on each further attempt. */
    retryBaseMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

const inFlight = new WeakSet<BatchResult>();

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Request payload for a categorized transaction.
 * @throws Error if the transaction has no category yet
 */
export function buildPayload(txn: ImportTransaction): SubmissionPayload {
    if (txn.category === null) {
        throw new Error(`Transaction ${txn.import_id} has no category and cannot be submitted`);
    }
    return {
        account_ref: txn.account_ref,
        date: txn.date,
        amount: txn.amount,
        payee: txn.payee,
        memo: txn.memo,
        category: txn.category,
        import_id: txn.import_id,
    };
}

/**
 * Submit the ready part of a batch.
 *
 * - needs_review transactions are left out (reported in warnings)
 * - known or repeated import ids are skipped before any network call
 * - transient SubmissionErrors are retried up to maxRetries with backoff
 * - auth/config SubmissionErrors stop the run: the failing chunk and every
 *   unsent item are rejected with that reason
 * - any other failure rejects only its chunk; an `error` response item
 *   rejects only that transaction
 * - a service-reported duplicate is a rejection, not a failure
 *
 * @throws BatchInFlightError if the same batch is already being submitted
 */
export async function submitBatch(
    batch: BatchResult,
    client: BudgetClient,
    options: SubmitOptions = {}
): Promise<SubmissionResult> {
    if (inFlight.has(batch)) {
        throw new BatchInFlightError();
    }
    inFlight.add(batch);

    try {
        return await runSubmission(batch, client, options);
    } finally {
        inFlight.delete(batch);
    }
}

async function runSubmission(
    batch: BatchResult,
    client: BudgetClient,
    options: SubmitOptions
): Promise<SubmissionResult> {
    const known = options.knownImportIds ?? new Set<string>();
    const chunkSize = Math.max(1, options.chunkSize ?? SUBMISSION_DEFAULTS.CHUNK_SIZE);
    const maxRetries = options.maxRetries ?? SUBMISSION_DEFAULTS.MAX_RETRIES;
    const retryBaseMs = options.retryBaseMs ?? SUBMISSION_DEFAULTS.RETRY_BASE_MS;
    const sleep = options.sleep ?? defaultSleep;

    const result: SubmissionResult = { accepted: [], rejected: [], skipped: [], warnings: [] };

    if (batch.needs_review.length > 0) {
        result.warnings.push(
            `${batch.needs_review.length} transaction(s) still need review and were not submitted.`
        );
    }

    // Dedup gate: last check against local history before the network
    const sendable: ImportTransaction[] = [];
    const seen = new Set<string>();
    for (const txn of batch.ready) {
        if (known.has(txn.import_id) || seen.has(txn.import_id)) {
            const reason = known.has(txn.import_id) ? SKIP_REASONS.ALREADY_IMPORTED : SKIP_REASONS.DUPLICATE_IN_BATCH;
            result.skipped.push(outcome(txn, 'skipped_duplicate', 'skipped', 0, reason));
            continue;
        }
        seen.add(txn.import_id);

        if (txn.category === null) {
            result.rejected.push(outcome(txn, 'rejected', 'error', 0, 'missing category'));
            continue;
        }
        sendable.push(txn.state === 'deduplicated' ? txn : transitionState(txn, 'deduplicated'));
    }

    let abortReason: string | null = null;

    for (let start = 0; start < sendable.length; start += chunkSize) {
        const chunk = sendable.slice(start, start + chunkSize);

        if (abortReason !== null) {
            for (const txn of chunk) {
                result.rejected.push(outcome(txn, 'rejected', 'error', 0, abortReason));
            }
            continue;
        }

        let attempt = 0;
        while (true) {
            attempt++;
            try {
                const responses = await client.createTransactions(chunk.map(buildPayload));
                foldResponses(chunk, responses, attempt, result);
                break;
            } catch (err) {
                const reason = describeError(err);

                if (err instanceof SubmissionError && err.transient && attempt <= maxRetries) {
                    await sleep(retryBaseMs * 2 ** (attempt - 1));
                    continue;
                }

                for (const txn of chunk) {
                    result.rejected.push(outcome(txn, 'rejected', 'error', attempt, reason));
                }

                if (err instanceof SubmissionError && (err.kind === 'auth' || err.kind === 'config')) {
                    abortReason = `not sent after ${reason}`;
                    result.warnings.push(`Submission stopped: ${reason}`);
                } else if (err instanceof SubmissionError && err.transient) {
                    result.warnings.push(`Gave up on ${chunk.length} transaction(s) after ${attempt} attempt(s): ${reason}`);
                }
                break;
            }
        }
    }

    return result;
}

function foldResponses(
    chunk: readonly ImportTransaction[],
    responses: readonly unknown[],
    attempts: number,
    result: SubmissionResult
): void {
    const byId = new Map<string, SubmissionResponseItem>();
    for (const raw of responses) {
        const parsed = SubmissionResponseItemSchema.safeParse(raw);
        if (parsed.success) {
            byId.set(parsed.data.import_id, parsed.data);
        }
    }

    for (const txn of chunk) {
        const response = byId.get(txn.import_id);
        if (!response) {
            result.rejected.push(outcome(txn, 'rejected', 'error', attempts, 'no response from service for this transaction'));
        } else if (response.status === 'created') {
            result.accepted.push(outcome(txn, 'submitted', 'created', attempts, response.reason));
        } else if (response.status === 'duplicate') {
            result.rejected.push(outcome(txn, 'rejected', 'duplicate', attempts, response.reason ?? 'already exists in service'));
        } else {
            result.rejected.push(outcome(txn, 'rejected', 'error', attempts, response.reason ?? 'rejected by service'));
        }
    }
}

function outcome(
    txn: ImportTransaction,
    state: SubmissionOutcome['state'],
    status: SubmissionOutcome['status'],
    attempts: number,
    reason?: string
): SubmissionOutcome {
    const item: SubmissionOutcome = {
        import_id: txn.import_id,
        payee: txn.payee,
        date: txn.date,
        amount: txn.amount,
        state,
        status,
        attempts,
    };
    if (reason !== undefined) {
        item.reason = reason;
    }
    return item;
}

function describeError(err: unknown): string {
    if (err instanceof SubmissionError) {
        return err.status !== undefined ? `${err.kind} error (HTTP ${err.status}): ${err.message}` : `${err.kind} error: ${err.message}`;
    }
    return err instanceof Error ? err.message : String(err);
}

/**
 * Import ids the service now knows: created plus service-reported duplicates.
 * These are what the caller records in its import history.
 */
export function collectImportedIds(result: SubmissionResult): { created: string[]; duplicate: string[] } {
    return {
        created: result.accepted.map(o => o.import_id),
        duplicate: result.rejected.filter(o => o.status === 'duplicate').map(o => o.import_id),
    };
}
