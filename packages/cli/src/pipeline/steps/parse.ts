import { readFile } from 'node:fs/promises';
import { detectParser, getSupportedParsers, type ParseResult } from '@budget-import/core';
import type { ImportState, PipelineStep } from '../types.js';
import { promptContinue } from '../../utils/prompt.js';
import { hashContent } from '../../utils/hash.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Step 3: Parsing
 * Reads the export into memory and runs the parser its filename selects.
 */
export const parseFile: PipelineStep<ImportState> = async (state) => {
    const detection = detectParser(state.filename);
    if (!detection) {
        state.errors.push({
            step: 'parse',
            message: `No parser found for file: ${state.filename}. ` +
                `Expected {source}_{account}_{YYYYMM}.{ext} with source one of: ${getSupportedParsers().join(', ')}`,
            fatal: true
        });
        return state;
    }
    state.parserName = detection.parserName;

    let content: Uint8Array;
    try {
        content = await readFile(state.inputPath);
    } catch (err) {
        state.errors.push({
            step: 'parse',
            message: `Failed to read ${state.inputPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }
    state.sourceHash = hashContent(content);

    let result: ParseResult;
    try {
        result = detection.parser(content, detection.accountRef, state.filename);
    } catch (err) {
        state.errors.push({
            step: 'parse',
            message: `Failed to parse ${state.filename}: ${errorMessage(err)}`,
            fatal: true,
            error: err
        });
        return state;
    }
    state.parseResult = result;

    // Forward parser warnings to pipeline state
    for (const warning of result.warnings) {
        state.warnings.push(`[${state.filename}] ${warning}`);
    }

    if (result.skippedRows > 0) {
        const shouldContinue = await promptContinue(
            `\n⚠️  ${result.skippedRows} row(s) of ${state.filename} could not be read and will be missing.`,
            state.options
        );
        if (!shouldContinue) {
            state.errors.push({
                step: 'parse',
                message: 'Aborted by user after parse warnings.',
                fatal: true
            });
            return state;
        }
    }

    if (result.records.length === 0) {
        state.warnings.push(`No transactions found in ${state.filename}.`);
    }

    return state;
};
