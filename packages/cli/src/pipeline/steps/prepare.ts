import { prepareBatch } from '@budget-import/core';
import type { ImportState, PipelineStep } from '../types.js';

/**
 * Step 4: Categorization & Deduplication
 * Tags every record with its import id, applies the first matching rule
 * and drops what earlier runs already imported.
 */
export const prepareTransactions: PipelineStep<ImportState> = async (state) => {
    if (!state.parseResult || !state.snapshot) {
        state.errors.push({
            step: 'prepare',
            message: 'Nothing to categorize: rules or transactions were not loaded.',
            fatal: true
        });
        return state;
    }

    const batch = prepareBatch(state.parseResult.records, state.snapshot, state.knownImportIds);
    state.batch = batch;
    state.warnings.push(...batch.warnings);

    return state;
};
