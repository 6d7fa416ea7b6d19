import type { PipelineStep, SubmitState } from '../types.js';
import {
    emptyImportHistory,
    knownImportIds,
    recordSubmission,
    saveImportHistory,
} from '../../history/import-history.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 5: Record History
 * Adds every import id the service now knows to state/import-history.json.
 */
export const recordHistory: PipelineStep<SubmitState> = async (state) => {
    if (!state.result || !state.batch) {
        return state;
    }

    const history = recordSubmission(state.history ?? emptyImportHistory(), state.batch, state.result, state.now);
    const path = state.workspace.config.historyPath;
    try {
        await saveImportHistory(path, history);
        state.history = history;
        state.knownImportIds = knownImportIds(history);
    } catch (err) {
        state.errors.push({
            step: 'history',
            message: `Failed to save import history to ${path}: ${errorMessage(err)}. ` +
                `${state.result.accepted.length} accepted transaction(s) are not recorded locally.`,
            fatal: true,
            error: err
        });
    }

    return state;
};
