import type { BudgetConfig } from '@budget-import/shared';
import type { Workspace } from '../types.js';
import { loadApiToken, loadBudgetConfig } from '../workspace/config.js';
import { HttpBudgetClient } from './http-budget-client.js';

export interface ConfiguredClient {
    client: HttpBudgetClient;
    config: BudgetConfig;
}

/**
 * Client for the workspace's budget (config/budget.json + BUDGET_API_TOKEN).
 * @throws Error if either is missing or invalid
 */
export function createBudgetClient(workspace: Workspace, env: NodeJS.ProcessEnv = process.env): ConfiguredClient {
    const config = loadBudgetConfig(workspace);
    const token = loadApiToken(env);
    return { client: new HttpBudgetClient(config, token), config };
}
