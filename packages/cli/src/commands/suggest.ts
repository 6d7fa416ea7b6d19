import {
    analyzeHistory,
    excludeExistingSuggestions,
    formatIsoDate,
    ruleFromSuggestion,
    type BudgetClient,
    type RuleStore,
} from '@budget-import/core';
import { SUGGESTION_DEFAULTS } from '@budget-import/shared';
import { YamlRuleStore } from '../yaml/rules.js';
import { createBudgetClient } from '../client/create.js';
import { log, success, arrow, info, error } from '../utils/console.js';
import { errorMessage } from '../utils/errors.js';
import { openWorkspace } from './common.js';
import type { SuggestOptions } from '../types.js';

export interface SuggestCommandDeps {
    client?: BudgetClient;
    store?: RuleStore;
    now?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Suggest payee rules from how transactions were categorized in the
 * service, and optionally create them.
 */
export async function suggestRules(options: SuggestOptions, deps: SuggestCommandDeps = {}): Promise<void> {
    const now = deps.now ?? new Date();
    const since = options.since ?? formatIsoDate(new Date(now.getTime() - SUGGESTION_DEFAULTS.LOOKBACK_DAYS * DAY_MS));
    if (!/^\d{4}-\d{2}-\d{2}$/.test(since)) {
        error(`--since must be YYYY-MM-DD, got "${since}".`);
        process.exit(1);
    }

    try {
        const { client, store } = resolveDeps(options, deps);

        log(`\nAnalyzing transactions since ${since}...`);
        const history = await client.getTransactions(since);
        const suggestions = excludeExistingSuggestions(
            analyzeHistory(history, { threshold: options.threshold, minTransactions: options.min }),
            await store.list()
        );

        if (suggestions.length === 0) {
            info(`No new rule suggestions from ${history.length} transaction(s).`);
            return;
        }

        log(`${suggestions.length} suggestion(s) from ${history.length} transaction(s):`);
        for (const s of suggestions) {
            arrow(`${s.payee} (${s.direction}) → ${s.category_name}: ` +
                `${s.transaction_count}/${s.total_for_payee} transactions, ${s.confidence}%`);
        }

        if (!options.create) {
            info('Run again with --create to add these rules.');
            return;
        }

        for (const s of suggestions) {
            const rule = await store.create(ruleFromSuggestion(s));
            success(`Rule ${rule.id} added: ${rule.name}`);
        }
    } catch (err) {
        error(errorMessage(err));
        process.exit(1);
    }
}

function resolveDeps(options: SuggestOptions, deps: SuggestCommandDeps): { client: BudgetClient; store: RuleStore } {
    if (deps.client && deps.store) {
        return { client: deps.client, store: deps.store };
    }
    const workspace = openWorkspace(options.workspace);
    return {
        client: deps.client ?? createBudgetClient(workspace).client,
        store: deps.store ?? new YamlRuleStore(workspace.config.rulesPath),
    };
}
