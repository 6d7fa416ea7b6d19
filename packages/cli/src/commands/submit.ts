import { formatMinorUnits, suggestRuleForTransaction } from '@budget-import/core';
import type { BudgetClient, ImportTransaction, SubmissionOutcome } from '@budget-import/core';
import type { BudgetConfig } from '@budget-import/shared';
import { runSubmitPipeline } from '../pipeline/runner.js';
import { createBudgetClient } from '../client/create.js';
import { log, success, arrow, info, warn, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { openWorkspace, reportProblems } from './common.js';
import { describeConditions } from './rules.js';
import type { SubmitCliOptions } from '../types.js';
import type { SubmitState } from '../pipeline/types.js';

export interface SubmitCommandDeps {
    client?: BudgetClient;
    config?: BudgetConfig;
    now?: Date;
}

const MAX_RULE_IDEAS = 5;

export async function submitSession(session: string, options: SubmitCliOptions, deps: SubmitCommandDeps = {}): Promise<void> {
    log(`\nBudget Import - Submitting ${session}`);

    arrow('Detecting workspace...');
    const workspace = openWorkspace(options.workspace);
    success(`Workspace: ${workspace.root}`);

    let state: SubmitState;
    try {
        const { client, config } = deps.client && deps.config
            ? { client: deps.client, config: deps.config }
            : createBudgetClient(workspace);
        state = await runSubmitPipeline(session, workspace, options, { client, config, now: deps.now });
    } catch (err) {
        error(errorMessage(err));
        process.exit(1);
    }

    log('\n--- Submission Summary ---');

    if (reportProblems(state)) {
        log('\n✖ Submission failed with fatal errors.');
        process.exit(1);
    }

    if (state.resolvedCount > 0) {
        arrow(`Resolved in review: ${state.resolvedCount}`);
    }

    const result = state.result;
    if (!result) {
        return;
    }

    success(`Submission complete for ${session}.`);
    arrow(`Created: ${result.accepted.length}`);
    arrow(`Rejected: ${result.rejected.length}`);
    arrow(`Skipped (already imported): ${result.skipped.length}`);

    for (const outcome of result.rejected) {
        warn(`${describeOutcome(outcome)}: ${outcome.reason ?? outcome.status}`);
    }

    const pending = state.batch?.needs_review.length ?? 0;
    if (pending > 0) {
        info(`${pending} transaction(s) still need review in this session.`);
    }

    printRuleIdeas(state.batch?.ready ?? []);
}

function describeOutcome(outcome: SubmissionOutcome): string {
    return `${outcome.date} ${outcome.payee} ${formatMinorUnits(outcome.amount)}`;
}

/**
 * Reviewed transactions hint at rules that would have caught them.
 */
function printRuleIdeas(ready: readonly ImportTransaction[]): void {
    const seen = new Set<string>();
    const ideas: string[] = [];

    for (const txn of ready) {
        if (txn.state !== 'resolved' || txn.category === null || seen.has(txn.payee)) continue;
        seen.add(txn.payee);

        const draft = suggestRuleForTransaction(txn, txn.category, txn.category_name);
        ideas.push(`${describeConditions(draft.conditions)} → ${txn.category_name ?? txn.category}`);
        if (ideas.length === MAX_RULE_IDEAS) break;
    }

    if (ideas.length > 0) {
        log('\nRule ideas from this review (add with "bimport rules add"):');
        ideas.forEach(idea => arrow(idea));
    }
}
