/**
 * Import history: every import_id the budgeting service has acknowledged,
 * kept in state/import-history.json across runs.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { collectImportedIds } from '@budget-import/core';
import type { BatchResult, SubmissionResult } from '@budget-import/core';
import { ImportHistorySchema, type ImportHistory, type ImportRecord } from '@budget-import/shared';

export function emptyImportHistory(): ImportHistory {
    return { version: 1, imported: {} };
}

/**
 * Loads the history file. A missing file is an empty history; a corrupt
 * one throws.
 */
export async function loadImportHistory(path: string): Promise<ImportHistory> {
    if (!existsSync(path)) {
        return emptyImportHistory();
    }
    const content = await readFile(path, 'utf-8');
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (err) {
        throw new Error(`Import history ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return ImportHistorySchema.parse(data);
}

export function knownImportIds(history: ImportHistory): Set<string> {
    return new Set(Object.keys(history.imported));
}

/**
 * Record what the service now knows: created items and items it reported
 * as duplicates. Returns a new history; the input is not mutated.
 */
export function recordSubmission(
    history: ImportHistory,
    batch: BatchResult,
    result: SubmissionResult,
    now: Date = new Date()
): ImportHistory {
    const byId = new Map(batch.ready.map(t => [t.import_id, t]));
    const { created, duplicate } = collectImportedIds(result);
    const imported: Record<string, ImportRecord> = { ...history.imported };
    const recordedAt = now.toISOString();

    const add = (importId: string, status: ImportRecord['status']): void => {
        const txn = byId.get(importId);
        if (!txn) return;
        imported[importId] = {
            date: txn.date,
            amount: txn.amount,
            payee: txn.payee,
            account_ref: txn.account_ref,
            status,
            recorded_at: recordedAt,
        };
    };

    created.forEach(id => add(id, 'created'));
    duplicate.forEach(id => add(id, 'duplicate'));

    return { version: 1, imported };
}

/**
 * Written to a temp file first, then renamed into place.
 */
export async function saveImportHistory(path: string, history: ImportHistory): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    await writeFile(tmp, JSON.stringify(history, null, 2) + '\n');
    await rename(tmp, path);
}
