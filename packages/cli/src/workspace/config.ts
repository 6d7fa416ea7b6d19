import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { API_TOKEN_ENV, BudgetConfigSchema, type BudgetConfig } from '@budget-import/shared';
import type { Workspace } from '../types.js';

/**
 * Loads the service configuration (config/budget.json).
 */
export function loadBudgetConfig(workspace: Workspace): BudgetConfig {
    const path = workspace.config.budgetPath;
    if (!existsSync(path)) {
        throw new Error(`Budget config not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = JSON.parse(content);
    return BudgetConfigSchema.parse(data);
}

/**
 * API token from the environment. Never read from the workspace files.
 * @throws Error if the variable is unset or empty
 */
export function loadApiToken(env: NodeJS.ProcessEnv = process.env): string {
    const token = env[API_TOKEN_ENV]?.trim();
    if (!token) {
        throw new Error(`${API_TOKEN_ENV} is not set. Export your budgeting service token first.`);
    }
    return token;
}

/**
 * Raw rule entries from config/rules.yaml, unvalidated.
 * Validation happens when a snapshot is built, so one bad entry does not
 * hide the others.
 */
export function loadRuleEntries(workspace: Workspace): unknown[] {
    const path = workspace.config.rulesPath;
    if (!existsSync(path)) {
        return [];
    }
    return extractRuleEntries(parse(readFileSync(path, 'utf-8')), path);
}

/**
 * Supports either a direct array or a wrapped object { rules: [...] }.
 */
export function extractRuleEntries(data: unknown, path: string): unknown[] {
    if (data === null || data === undefined) return [];
    if (Array.isArray(data)) return data;
    if (typeof data === 'object' && 'rules' in data) {
        const rules = data.rules;
        if (rules === null || rules === undefined) return [];
        if (Array.isArray(rules)) return rules;
    }
    throw new Error(`Invalid rules file ${path}: expected a list or a "rules" list.`);
}
