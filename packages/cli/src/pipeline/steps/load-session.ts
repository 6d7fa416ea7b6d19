import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SessionFileSchema } from '@budget-import/shared';
import type { PipelineStep, SubmitState } from '../types.js';
import { SESSION_FILES } from '../../workspace/paths.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 1: Load Session
 * Reads the batch an earlier "import" prepared.
 */
export const loadSession: PipelineStep<SubmitState> = async (state) => {
    const path = join(state.sessionPath, SESSION_FILES.BATCH);
    if (!existsSync(path)) {
        state.errors.push({
            step: 'session',
            message: `Session not found: ${path}. Run "bimport import" first.`,
            fatal: true
        });
        return state;
    }

    try {
        const data: unknown = JSON.parse(await readFile(path, 'utf-8'));
        const sessionFile = SessionFileSchema.parse(data);
        state.sessionFile = sessionFile;
        state.batch = sessionFile.batch;
    } catch (err) {
        state.errors.push({
            step: 'session',
            message: `Invalid session file ${path}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
