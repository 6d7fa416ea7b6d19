import type { ImportState, PipelineStep } from '../types.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 5: Review Categories
 * Lists the service's categories for the review sheet. Optional: without
 * them the reviewer types category ids by hand.
 */
export const fetchCategories: PipelineStep<ImportState> = async (state) => {
    if (!state.batch || state.batch.needs_review.length === 0) {
        return state;
    }

    if (!state.client) {
        state.warnings.push('Budget service not configured: review.xlsx has no category list.');
        return state;
    }

    try {
        state.categories = await state.client.getCategories();
    } catch (err) {
        state.warnings.push(`Could not fetch categories (${errorMessage(err)}): review.xlsx has no category list.`);
    }

    return state;
};
