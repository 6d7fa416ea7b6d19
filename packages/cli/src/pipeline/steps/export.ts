import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { buildReviewQueue } from '@budget-import/core';
import type { SessionFile } from '@budget-import/shared';
import type { ImportState, PipelineStep } from '../types.js';
import { SESSION_FILES } from '../../workspace/paths.js';
import { generateReviewExcel } from '../../excel/review.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 6: Export Session
 * Writes batch.json and, when something needs review, review.xlsx.
 */
export const exportSession: PipelineStep<ImportState> = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping file export.');
        return state;
    }
    if (!state.batch) {
        return state;
    }

    const batchPath = join(state.sessionPath, SESSION_FILES.BATCH);
    if (existsSync(batchPath)) {
        state.errors.push({
            step: 'export',
            message: `Session "${state.session}" already exists at ${state.sessionPath}`,
            fatal: true
        });
        return state;
    }

    try {
        await mkdir(state.sessionPath, { recursive: true });

        const sessionFile: SessionFile = {
            session: state.session,
            source_file: state.filename,
            source_hash: state.sourceHash ?? '',
            parser: state.parserName ?? '',
            created_at: state.now.toISOString(),
            batch: state.batch,
        };
        await writeFile(batchPath, JSON.stringify(sessionFile, null, 2) + '\n');

        if (state.batch.needs_review.length > 0) {
            const reviewWb = generateReviewExcel(buildReviewQueue(state.batch, state.categories), state.now);
            await reviewWb.xlsx.writeFile(join(state.sessionPath, SESSION_FILES.REVIEW));
        }
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export session to ${state.sessionPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
    }

    return state;
};
