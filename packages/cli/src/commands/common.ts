import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import type { Workspace } from '../types.js';
import type { PipelineStateBase } from '../pipeline/types.js';
import { error, warn } from '../utils/console.js';

/**
 * Workspace from --workspace or the current directory's ancestors.
 * Exits when there is none.
 */
export function openWorkspace(explicit?: string): Workspace {
    const root = explicit || detectWorkspaceRoot();
    if (!root) {
        error('Workspace not found. Are you in a Budget Import workspace?');
        error('Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }
    return resolveWorkspace(root);
}

/**
 * Prints warnings and errors collected by a pipeline.
 * @returns true when a fatal error stopped it
 */
export function reportProblems(state: PipelineStateBase): boolean {
    for (const w of state.warnings) {
        warn(w);
    }
    for (const e of state.errors) {
        error(`${e.fatal ? 'ERROR' : 'SKIPPED'} [${e.step}]: ${e.message}`);
    }
    return state.errors.some(e => e.fatal);
}
