import { submitBatch } from '@budget-import/core';
import type { PipelineStep, SubmitState } from '../types.js';
import { promptContinue } from '../../utils/prompt.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 4: Submission
 * Sends the ready transactions after confirmation.
 */
export const submitTransactions: PipelineStep<SubmitState> = async (state) => {
    const batch = state.batch;
    if (!batch) {
        return state;
    }
    if (batch.ready.length === 0) {
        state.warnings.push('Nothing ready to submit.');
        return state;
    }

    const shouldContinue = await promptContinue(
        `\nSubmit ${batch.ready.length} transaction(s) to budget ${state.config.budget_id}?`,
        state.options
    );
    if (!shouldContinue) {
        state.errors.push({
            step: 'submit',
            message: 'Submission cancelled.',
            fatal: true
        });
        return state;
    }

    try {
        const result = await submitBatch(batch, state.client, {
            knownImportIds: state.knownImportIds,
            chunkSize: state.config.chunk_size,
            maxRetries: state.config.max_retries,
            retryBaseMs: state.config.retry_base_ms,
        });
        state.result = result;
        state.warnings.push(...result.warnings);
    } catch (err) {
        state.errors.push({
            step: 'submit',
            message: `Submission failed: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
