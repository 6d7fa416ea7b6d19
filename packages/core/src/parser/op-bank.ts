/**
 * OP (Osuuspankki) account statement parser.
 *
 * Format:
 * - CSV, semicolon separated, UTF-8 (optionally with BOM)
 * - Finnish headers (Kirjauspäivä, Määrä, Saaja/Maksaja, ...)
 * - Dates DD.MM.YYYY, decimal comma ("-45,90")
 * - Amount convention: negative = money out, which matches ours
 */

import * as XLSX from 'xlsx';
import type { ParseResult, TransactionRecord } from '../types/index.js';
import { TransactionRecordSchema } from '../types/index.js';
import { cellString, decodeText, normalizeHeader } from '../utils/csv.js';
import type { ParserInput } from '../utils/csv.js';
import { formatIsoDate, parseDateValue } from '../utils/date-parse.js';
import { parseAmount } from '../utils/amount.js';

const OP_COLUMNS: Record<string, string> = {
    'kirjauspäivä': 'booking_date',
    'arvopäivä': 'value_date',
    'määrä': 'amount',
    'määrä eur': 'amount',
    'laji': 'type',
    'selitys': 'explanation',
    'saaja/maksaja': 'payee',
    'saajan tilinumero': 'payee_account',
    'viite': 'reference',
    'viesti': 'message',
    'arkistointitunnus': 'archive_id',
};

const MEMO_SEPARATOR = ' | ';

/**
 * Parse an OP statement export.
 *
 * @param data - File contents
 * @param accountRef - Account the statement belongs to (from the filename)
 * @param sourceFile - Original filename for traceability
 */
export function parseOpBank(data: ParserInput, accountRef: string, sourceFile: string): ParseResult {
    const workbook = XLSX.read(decodeText(data), { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }).map(row => {
        const clean: Record<string, string> = {};
        for (const [k, v] of Object.entries(row)) {
            const header = normalizeHeader(k);
            clean[OP_COLUMNS[header] ?? header] = cellString(v);
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

    const firstRow = rows[0];
    const hasDate = 'booking_date' in firstRow || 'value_date' in firstRow;
    if (!hasDate || !('amount' in firstRow)) {
        const missing = [!hasDate ? 'Kirjauspäivä' : null, !('amount' in firstRow) ? 'Määrä' : null].filter(Boolean);
        throw new Error(
            `OP parser (${sourceFile}): Missing required columns: ${missing.join(', ')}. ` +
            `Found: ${Object.keys(firstRow).join(', ')}`
        );
    }

    for (const row of rows) {
        const rawDate = row['booking_date'] || row['value_date'] || '';
        const date = parseDateValue(rawDate, 'DMY') ?? parseDateValue(rawDate, 'ISO');
        if (!date) {
            skippedDates++;
            continue;
        }

        const amount = parseAmount(row['amount'] ?? '', 'comma');
        if (amount === null) {
            warnings.push(`Invalid amount "${row['amount'] ?? ''}" on ${rawDate}, skipping`);
            skippedAmounts++;
            continue;
        }

        const explanation = row['explanation'] ?? '';
        const message = row['message'] ?? '';
        const memo = [explanation, message].filter(Boolean).join(MEMO_SEPARATOR);

        const record = TransactionRecordSchema.safeParse({
            date: formatIsoDate(date),
            payee: row['payee'] || explanation || 'Unknown',
            memo: memo || null,
            amount,
            account_ref: accountRef,
        });
        if (record.success) {
            records.push(record.data);
        } else {
            warnings.push(`Schema validation failed for row on ${rawDate}: ${record.error.issues[0].message}`);
            skippedSchema++;
        }
    }

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
