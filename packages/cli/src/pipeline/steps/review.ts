import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { applyReviewResolutions, type CategoryOption } from '@budget-import/core';
import type { Workbook } from 'exceljs';
import type { PipelineStep, SubmitState } from '../types.js';
import { SESSION_FILES } from '../../workspace/paths.js';
import { readReviewResolutions } from '../../excel/review.js';
import { readWorkbook } from '../../excel/utils.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 2: Apply Review
 * Folds the categories filled into review.xlsx back into the batch.
 * Choices are checked against the service's current categories.
 */
export const applyReview: PipelineStep<SubmitState> = async (state) => {
    const batch = state.batch;
    if (!batch || batch.needs_review.length === 0) {
        return state;
    }

    const path = join(state.sessionPath, SESSION_FILES.REVIEW);
    if (!existsSync(path)) {
        state.warnings.push(`${batch.needs_review.length} transaction(s) need review but ${path} is missing.`);
        return state;
    }

    let categories: CategoryOption[];
    let workbook: Workbook;
    try {
        categories = await state.client.getCategories();
        workbook = await readWorkbook(path);
    } catch (err) {
        state.errors.push({
            step: 'review',
            message: `Failed to read review: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    const read = readReviewResolutions(workbook, categories);
    state.warnings.push(...read.warnings.map(w => `[${SESSION_FILES.REVIEW}] ${w}`));

    const applied = applyReviewResolutions(batch, read.resolutions, categories);
    state.warnings.push(...applied.errors.map(e => `[${SESSION_FILES.REVIEW}] ${e}`));
    state.batch = applied.batch;
    state.resolvedCount = applied.resolved;

    return state;
};
