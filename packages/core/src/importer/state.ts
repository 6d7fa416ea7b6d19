/**
 * Per-transaction state machine.
 *
 *   parsed → categorized → (review_pending → resolved)? → deduplicated
 *          → submitted | rejected | skipped_duplicate
 *
 * A transaction found to be a duplicate may be skipped from any
 * non-terminal state after categorization.
 */

import type { ImportTransaction, TransactionState } from '../types/index.js';

export const TRANSITIONS: Readonly<Record<TransactionState, readonly TransactionState[]>> = {
    parsed: ['categorized'],
    categorized: ['review_pending', 'deduplicated', 'skipped_duplicate'],
    review_pending: ['resolved', 'skipped_duplicate'],
    resolved: ['deduplicated', 'skipped_duplicate'],
    deduplicated: ['submitted', 'rejected', 'skipped_duplicate'],
    submitted: [],
    rejected: [],
    skipped_duplicate: [],
};

export const TERMINAL_STATES: readonly TransactionState[] = ['submitted', 'rejected', 'skipped_duplicate'];

export function canTransition(from: TransactionState, to: TransactionState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: TransactionState): boolean {
    return TERMINAL_STATES.includes(state);
}

/**
 * PURE FUNCTION: Returns a copy in the new state.
 * @throws Error on a transition the state machine does not allow
 */
export function transitionState<T extends Pick<ImportTransaction, 'state' | 'import_id'>>(
    txn: T,
    to: TransactionState,
    reason?: string
): T {
    if (!canTransition(txn.state, to)) {
        throw new Error(`Illegal state transition for ${txn.import_id}: ${txn.state} → ${to}`);
    }
    return reason === undefined ? { ...txn, state: to } : { ...txn, state: to, reason };
}
