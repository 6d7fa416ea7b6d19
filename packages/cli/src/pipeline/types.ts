import type {
    BatchResult,
    BudgetClient,
    CategoryOption,
    ParseResult,
    RuleSnapshot,
    SubmissionResult,
} from '@budget-import/core';
import type { BudgetConfig, ImportHistory, SessionFile } from '@budget-import/shared';
import type { ImportOptions, SubmitCliOptions, Workspace } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Fields every pipeline state carries.
 */
export interface PipelineStateBase {
    workspace: Workspace;
    /** Fixed at the start of the run; every timestamp written uses it. */
    now: Date;
    history?: ImportHistory;
    knownImportIds?: Set<string>;
    warnings: string[];
    errors: PipelineError[];
}

/**
 * State passed through the import pipeline: file in, session out.
 */
export interface ImportState extends PipelineStateBase {
    options: ImportOptions;
    inputPath: string;
    filename: string;
    session: string;
    sessionPath: string;
    /** Only used to list categories in the review sheet. */
    client?: BudgetClient;

    // Accumulated during pipeline execution
    sourceHash?: string;
    parserName?: string;
    parseResult?: ParseResult;
    snapshot?: RuleSnapshot;
    batch?: BatchResult;
    categories: CategoryOption[];
}

/**
 * State passed through the submit pipeline: session in, service and history updated.
 */
export interface SubmitState extends PipelineStateBase {
    options: SubmitCliOptions;
    session: string;
    sessionPath: string;
    client: BudgetClient;
    config: BudgetConfig;

    sessionFile?: SessionFile;
    batch?: BatchResult;
    resolvedCount: number;
    result?: SubmissionResult;
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep<S extends PipelineStateBase> = (state: S) => Promise<S>;

export interface NamedStep<S extends PipelineStateBase> {
    name: string;
    fn: PipelineStep<S>;
}
