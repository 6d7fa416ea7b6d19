import { join } from 'node:path';
import type { Workspace } from '../types.js';

/**
 * Files inside a session directory.
 */
export const SESSION_FILES = {
    BATCH: 'batch.json',
    REVIEW: 'review.xlsx',
    SUBMISSION: 'submission.json',
} as const;

const SESSION_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        outputs: join(root, 'outputs'),
        state: join(root, 'state'),
        config: {
            rulesPath: join(root, 'config', 'rules.yaml'),
            budgetPath: join(root, 'config', 'budget.json'),
            historyPath: join(root, 'state', 'import-history.json'),
        },
    };
}

/**
 * Directory holding one import session's batch, review and submission files.
 * @throws Error if the name could escape the outputs directory
 */
export function getSessionPath(workspace: Workspace, session: string): string {
    if (!SESSION_NAME.test(session)) {
        throw new Error(`Invalid session name "${session}". Use letters, digits, ".", "_" or "-".`);
    }
    return join(workspace.outputs, session);
}

/**
 * Default session name: input file stem plus a compact UTC timestamp.
 * e.g. op_checking_202603-20260315T101500
 */
export function defaultSessionName(filename: string, now: Date = new Date()): string {
    const stem = filename.replace(/\.[^.]+$/, '').replace(/[^A-Za-z0-9._-]/g, '-');
    const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, '');
    return `${stem}-${stamp}`;
}
