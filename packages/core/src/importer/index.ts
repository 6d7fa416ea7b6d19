/**
 * Import orchestration: prepare, review, submit.
 */

export { prepareBatch, toImportTransaction } from './prepare.js';
export { buildReviewQueue, applyReviewResolutions } from './review.js';
export type { ReviewItem, ReviewApplyResult } from './review.js';
export { submitBatch, buildPayload, collectImportedIds } from './submit.js';
export type { BudgetClient, SubmitOptions } from './submit.js';
export { TRANSITIONS, TERMINAL_STATES, canTransition, isTerminal, transitionState } from './state.js';
