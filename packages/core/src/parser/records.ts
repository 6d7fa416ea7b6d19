/**
 * Normalized record export parser.
 *
 * Format:
 * - CSV (comma separated, UTF-8) or XLSX, first sheet
 * - Columns: date, payee, memo, amount, account_ref (memo and account_ref optional)
 * - Dates YYYY-MM-DD (DD.MM.YYYY and Excel date cells accepted)
 * - Amounts as decimal major units with a decimal point ("-45.90")
 */

import * as XLSX from 'xlsx';
import type { ParseResult, TransactionRecord } from '../types/index.js';
import { TransactionRecordSchema } from '../types/index.js';
import { cellString, decodeText, isZipArchive, normalizeHeader, toBytes } from '../utils/csv.js';
import type { ParserInput } from '../utils/csv.js';
import { formatIsoDate, parseDateValue } from '../utils/date-parse.js';
import { parseAmount } from '../utils/amount.js';

const REQUIRED_COLUMNS = ['date', 'payee', 'amount'];

/**
 * Parse a normalized record export.
 *
 * @param accountRef - Used for rows whose account_ref cell is empty
 */
export function parseRecords(data: ParserInput, accountRef: string, sourceFile: string): ParseResult {
    const workbook = isZipArchive(data)
        ? XLSX.read(toBytes(data), { type: 'array' })
        : XLSX.read(decodeText(data), { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }).map(row => {
        const clean: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(row)) {
            clean[normalizeHeader(k)] = v;
        }
        return clean;
    });

    const warnings: string[] = [];
    const records: TransactionRecord[] = [];
    let skippedDates = 0;
    let skippedAmounts = 0;
    let skippedSchema = 0;

    if (rows.length === 0) {
        return { records, warnings, skippedRows: 0 };
    }

    const missingColumns = REQUIRED_COLUMNS.filter(col => !(col in rows[0]));
    if (missingColumns.length > 0) {
        throw new Error(
            `Records parser (${sourceFile}): Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${Object.keys(rows[0]).join(', ')}`
        );
    }

    rows.forEach((row, index) => {
        // Spreadsheet row number: header is row 1
        const line = index + 2;

        const date = parseDateValue(row['date'], 'ISO') ?? parseDateValue(row['date'], 'DMY');
        if (!date) {
            skippedDates++;
            return;
        }

        const amount = parseAmount(row['amount'], 'point');
        if (amount === null) {
            warnings.push(`Row ${line}: invalid amount "${cellString(row['amount'])}", skipping`);
            skippedAmounts++;
            return;
        }

        const memo = cellString(row['memo']);
        const record = TransactionRecordSchema.safeParse({
            date: formatIsoDate(date),
            payee: cellString(row['payee']),
            memo: memo || null,
            amount,
            account_ref: cellString(row['account_ref']) || accountRef,
        });
        if (record.success) {
            records.push(record.data);
        } else {
            const issue = record.error.issues[0];
            warnings.push(`Row ${line}: ${issue.path.join('.')}: ${issue.message}`);
            skippedSchema++;
        }
    });

    if (skippedDates) {
        warnings.push(`Skipped ${skippedDates} rows with invalid or missing dates`);
    }
    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} rows with invalid amounts`);
    }
    if (skippedSchema) {
        warnings.push(`Skipped ${skippedSchema} rows that failed schema validation`);
    }

    return { records, warnings, skippedRows: skippedDates + skippedAmounts + skippedSchema };
}
