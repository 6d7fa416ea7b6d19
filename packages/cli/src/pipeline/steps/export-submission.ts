import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { SessionFile } from '@budget-import/shared';
import type { PipelineStep, SubmitState } from '../types.js';
import { SESSION_FILES } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 6: Export Results
 * Writes submission.json and saves the reviewed batch back to batch.json.
 */
export const exportSubmission: PipelineStep<SubmitState> = async (state) => {
    if (!state.result || !state.batch || !state.sessionFile) {
        return state;
    }

    const report = {
        session: state.session,
        submitted_at: state.now.toISOString(),
        rule_set_version: state.batch.rule_set_version,
        result: state.result,
    };
    const sessionFile: SessionFile = { ...state.sessionFile, batch: state.batch };

    try {
        await writeFile(join(state.sessionPath, SESSION_FILES.SUBMISSION), JSON.stringify(report, null, 2) + '\n');
        await writeFile(join(state.sessionPath, SESSION_FILES.BATCH), JSON.stringify(sessionFile, null, 2) + '\n');
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to write results to ${state.sessionPath}: ${errorMessage(err)}`,
            fatal: false,
            error: err
        });
    }

    return state;
};
