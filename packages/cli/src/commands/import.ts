import { basename } from 'node:path';
import type { BudgetClient } from '@budget-import/core';
import { runImportPipeline } from '../pipeline/runner.js';
import { createBudgetClient } from '../client/create.js';
import { log, success, arrow, info, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { openWorkspace, reportProblems } from './common.js';
import type { ImportOptions, Workspace } from '../types.js';
import type { ImportState } from '../pipeline/types.js';

export interface ImportCommandDeps {
    client?: BudgetClient;
    now?: Date;
}

export async function importFile(file: string, options: ImportOptions, deps: ImportCommandDeps = {}): Promise<void> {
    log(`\nBudget Import - Importing ${basename(file)}`);

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const workspace = openWorkspace(options.workspace);
    success(`Workspace: ${workspace.root}`);

    // 2. Run Pipeline
    let state: ImportState;
    try {
        state = await runImportPipeline(file, workspace, options, {
            client: deps.client ?? optionalClient(workspace),
            now: deps.now,
        });
    } catch (err) {
        error(errorMessage(err));
        process.exit(1);
    }

    // 3. Report Final Status
    log('\n--- Import Summary ---');

    if (reportProblems(state)) {
        log('\n✖ Import failed with fatal errors.');
        process.exit(1);
    }

    const batch = state.batch;
    if (!batch) {
        return;
    }

    success(`Import complete for ${state.filename}.`);
    arrow(`Transactions: ${batch.stats.total}`);
    arrow(`Auto-categorized: ${batch.ready.length}`);
    arrow(`Needs review: ${batch.needs_review.length}`);
    arrow(`Skipped duplicates: ${batch.skipped.length}`);
    if (batch.stats.invalid > 0) {
        arrow(`Invalid records: ${batch.stats.invalid}`);
    }
    arrow(`Rule set version: ${batch.rule_set_version}`);

    if (state.options.dryRun) {
        log('\n[DRY RUN] No files were written.');
        return;
    }

    arrow(`Session saved to: ${state.sessionPath}`);
    if (batch.needs_review.length > 0) {
        info(`Fill in category_id or category_name in review.xlsx, then run: bimport submit ${state.session}`);
    } else {
        info(`Next: bimport submit ${state.session}`);
    }
}

/**
 * The import itself works offline; the client only lists categories.
 */
function optionalClient(workspace: Workspace): BudgetClient | undefined {
    try {
        return createBudgetClient(workspace).client;
    } catch (err) {
        info(`Budget service not available (${errorMessage(err)}).`);
        return undefined;
    }
}
