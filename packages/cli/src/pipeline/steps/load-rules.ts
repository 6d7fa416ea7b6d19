import { loadRuleSnapshot } from '@budget-import/core';
import type { ImportState, PipelineStep } from '../types.js';
import { loadRuleEntries } from '../../workspace/config.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 1: Load Rules
 * Freezes the rule snapshot this batch is categorized against. Broken
 * entries are skipped and reported; the remaining rules still apply.
 */
export const loadRules: PipelineStep<ImportState> = async (state) => {
    let entries: unknown[];
    try {
        entries = loadRuleEntries(state.workspace);
    } catch (err) {
        state.errors.push({
            step: 'rules',
            message: `Failed to read ${state.workspace.config.rulesPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }

    const { snapshot, errors, warnings } = loadRuleSnapshot(entries);
    for (const err of errors) {
        state.errors.push({
            step: 'rules',
            message: `${err.message} (rule skipped)`,
            fatal: false,
            error: err
        });
    }
    state.warnings.push(...warnings);
    state.snapshot = snapshot;

    return state;
};
