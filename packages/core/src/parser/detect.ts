/**
 * Parser detection from filename.
 *
 * Filename convention: {source}_{accountRef}_{YYYYMM}.{ext}
 * Example: op_checking_202603.csv
 */

import type { ParseResult } from '../types/index.js';
import type { ParserInput } from '../utils/csv.js';
import { parseOpBank } from './op-bank.js';
import { parseRecords } from './records.js';

/**
 * Parser function signature.
 * Takes file bytes (not a file path) to keep core headless.
 */
export type ParserFn = (data: ParserInput, accountRef: string, sourceFile: string) => ParseResult;

interface ParserEntry {
    pattern: RegExp;
    parser: ParserFn;
}

const PARSERS: Record<string, ParserEntry> = {
    op: {
        pattern: /^op_[a-z0-9-]+_\d{6}\.csv$/i,
        parser: parseOpBank,
    },
    records: {
        pattern: /^records_[a-z0-9-]+_\d{6}\.(csv|xlsx)$/i,
        parser: parseRecords,
    },
};

export interface ParserDetectionResult {
    parser: ParserFn;
    accountRef: string;
    parserName: string;
}

/**
 * Detect parser for a given filename.
 * Hidden (.) and temp (~) files never match.
 *
 * @param filename - Base filename (not full path)
 * @returns Detection result or null if no parser matches
 */
export function detectParser(filename: string): ParserDetectionResult | null {
    if (filename.startsWith('.') || filename.startsWith('~')) {
        return null;
    }

    for (const [name, { pattern, parser }] of Object.entries(PARSERS)) {
        if (pattern.test(filename)) {
            return { parser, accountRef: extractAccountRef(filename), parserName: name };
        }
    }

    return null;
}

/**
 * Account reference: the second underscore-separated part of the filename.
 */
export function extractAccountRef(filename: string): string {
    return filename.split('_')[1] ?? '';
}

export function getSupportedParsers(): string[] {
    return Object.keys(PARSERS);
}
