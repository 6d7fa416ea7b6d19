/**
 * Budget Import CLI - Core Types
 */

export interface ImportOptions {
    dryRun: boolean;
    yes: boolean;
    workspace?: string;
    /** Session name; defaults to the input file name plus a timestamp. */
    session?: string;
}

export interface SubmitCliOptions {
    yes: boolean;
    workspace?: string;
}

export interface RulesCliOptions {
    workspace?: string;
}

export interface SuggestOptions {
    /** YYYY-MM-DD; defaults to SUGGESTION_DEFAULTS.LOOKBACK_DAYS ago. */
    since?: string;
    threshold?: number;
    min?: number;
    /** Create the suggested rules instead of only listing them. */
    create: boolean;
    workspace?: string;
}

export interface WorkspaceConfig {
    rulesPath: string;
    budgetPath: string;
    historyPath: string;
}

export interface Workspace {
    root: string;
    outputs: string;
    state: string;
    config: WorkspaceConfig;
}
