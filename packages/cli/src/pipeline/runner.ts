import type { BudgetClient } from '@budget-import/core';
import type { BudgetConfig } from '@budget-import/shared';
import { basename } from 'node:path';
import type { ImportState, NamedStep, PipelineStateBase, SubmitState } from './types.js';
import { loadRules } from './steps/load-rules.js';
import { loadHistory } from './steps/load-history.js';
import { parseFile } from './steps/parse.js';
import { prepareTransactions } from './steps/prepare.js';
import { fetchCategories } from './steps/categories.js';
import { exportSession } from './steps/export.js';
import { loadSession } from './steps/load-session.js';
import { applyReview } from './steps/review.js';
import { submitTransactions } from './steps/submit.js';
import { recordHistory } from './steps/record-history.js';
import { exportSubmission } from './steps/export-submission.js';
import { defaultSessionName, getSessionPath } from '../workspace/paths.js';
import { arrow, error } from '../utils/console.js';
import type { ImportOptions, SubmitCliOptions, Workspace } from '../types.js';

/**
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runSteps<S extends PipelineStateBase>(initial: S, steps: NamedStep<S>[]): Promise<S> {
    let state = initial;

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            error(`Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}

export interface ImportDeps {
    client?: BudgetClient;
    now?: Date;
}

/**
 * Import one bank export into a new session under outputs/.
 */
export async function runImportPipeline(
    inputPath: string,
    workspace: Workspace,
    options: ImportOptions,
    deps: ImportDeps = {}
): Promise<ImportState> {
    const now = deps.now ?? new Date();
    const filename = basename(inputPath);
    const session = options.session ?? defaultSessionName(filename, now);

    const state: ImportState = {
        workspace,
        now,
        options,
        inputPath,
        filename,
        session,
        sessionPath: getSessionPath(workspace, session),
        client: deps.client,
        categories: [],
        warnings: [],
        errors: [],
    };

    return runSteps(state, [
        { name: 'Load Rules', fn: loadRules },
        { name: 'Import History', fn: loadHistory },
        { name: 'Parsing', fn: parseFile },
        { name: 'Categorization & Deduplication', fn: prepareTransactions },
        { name: 'Review Categories', fn: fetchCategories },
        { name: 'Export Session', fn: exportSession },
    ]);
}

export interface SubmitDeps {
    client: BudgetClient;
    config: BudgetConfig;
    now?: Date;
}

/**
 * Submit a prepared session to the budgeting service.
 */
export async function runSubmitPipeline(
    session: string,
    workspace: Workspace,
    options: SubmitCliOptions,
    deps: SubmitDeps
): Promise<SubmitState> {
    const state: SubmitState = {
        workspace,
        now: deps.now ?? new Date(),
        options,
        session,
        sessionPath: getSessionPath(workspace, session),
        client: deps.client,
        config: deps.config,
        resolvedCount: 0,
        warnings: [],
        errors: [],
    };

    return runSteps(state, [
        { name: 'Load Session', fn: loadSession },
        { name: 'Apply Review', fn: applyReview },
        { name: 'Import History', fn: loadHistory },
        { name: 'Submission', fn: submitTransactions },
        { name: 'Record History', fn: recordHistory },
        { name: 'Export Results', fn: exportSubmission },
    ]);
}
