import type { PipelineStateBase } from '../types.js';
import { loadImportHistory, knownImportIds } from '../../history/import-history.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Import ids acknowledged by the service in earlier runs.
 * Shared by the import and submit pipelines.
 */
export async function loadHistory<S extends PipelineStateBase>(state: S): Promise<S> {
    const path = state.workspace.config.historyPath;
    try {
        const history = await loadImportHistory(path);
        state.history = history;
        state.knownImportIds = knownImportIds(history);
    } catch (err) {
        state.errors.push({
            step: 'history',
            message: `Failed to load import history from ${path}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }
    return state;
}
