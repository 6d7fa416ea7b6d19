import type { Workbook } from 'exceljs';
import { formatMinorUnits } from '@budget-import/core';
import type { CategoryOption, ReviewItem, ReviewResolution } from '@budget-import/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatCurrencyCell, cellText, headerColumns } from './utils.js';

export const REVIEW_SHEET = 'Review';
export const CATEGORIES_SHEET = 'Categories';

/**
 * Review workbook for transactions no rule matched.
 *
 * Sheet "Review": one row per transaction, oldest first. The reviewer fills
 * category_id, or category_name as listed on the "Categories" sheet.
 */
export function generateReviewExcel(queue: readonly ReviewItem[], now: Date = new Date()): Workbook {
    const workbook = createWorkbook(now);
    const sheet = workbook.addWorksheet(REVIEW_SHEET);

    sheet.columns = [
        { header: 'import_id', key: 'import_id' },
        { header: 'date', key: 'date' },
        { header: 'payee', key: 'payee' },
        { header: 'memo', key: 'memo' },
        { header: 'amount', key: 'amount' },
        { header: 'account_ref', key: 'account_ref' },
        { header: 'category_id', key: 'category_id' },
        { header: 'category_name', key: 'category_name' },
    ];

    const rows = [...queue].sort((a, b) => a.transaction.date.localeCompare(b.transaction.date));
    for (const { transaction: txn } of rows) {
        sheet.addRow({
            import_id: txn.import_id,
            date: txn.date,
            payee: txn.payee,
            memo: txn.memo ?? '',
            amount: Number(formatMinorUnits(txn.amount)),
            account_ref: txn.account_ref,
            category_id: '',
            category_name: '',
        });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'amount');
    autoFitColumns(sheet);

    // Freeze ID and Date columns
    sheet.views = [
        { state: 'frozen', xSplit: 2, ySplit: 1 }
    ];

    const categories = workbook.addWorksheet(CATEGORIES_SHEET);
    categories.columns = [
        { header: 'category_id', key: 'id' },
        { header: 'category_name', key: 'name' },
        { header: 'group', key: 'group_name' },
    ];
    for (const option of queue[0]?.candidates ?? []) {
        categories.addRow({ id: option.id, name: option.name, group_name: option.group_name ?? '' });
    }
    formatHeaderRow(categories);
    autoFitColumns(categories);

    return workbook;
}

export interface ReviewReadResult {
    resolutions: ReviewResolution[];
    warnings: string[];
}

/**
 * Read filled-in categories back from a review workbook.
 *
 * Rows with neither category_id nor category_name stay pending and are not
 * reported. A name is matched case-insensitively against the candidates,
 * as "Name" or "Group: Name"; an unknown or ambiguous name is a warning.
 */
export function readReviewResolutions(workbook: Workbook, candidates: readonly CategoryOption[]): ReviewReadResult {
    const resolutions: ReviewResolution[] = [];
    const warnings: string[] = [];

    const sheet = workbook.getWorksheet(REVIEW_SHEET);
    if (!sheet) {
        return { resolutions, warnings: [`Review workbook has no "${REVIEW_SHEET}" sheet`] };
    }

    const columns = headerColumns(sheet);
    const idCol = columns.get('import_id');
    const categoryCol = columns.get('category_id');
    const nameCol = columns.get('category_name');
    if (idCol === undefined || (categoryCol === undefined && nameCol === undefined)) {
        return { resolutions, warnings: ['Review sheet is missing the import_id or category columns'] };
    }

    const byId = new Map(candidates.map(c => [c.id, c]));

    sheet.eachRow((row, rowNumber) => {
        if (rowNumber === 1) return;

        const importId = cellText(row.getCell(idCol).value);
        const categoryId = categoryCol === undefined ? '' : cellText(row.getCell(categoryCol).value);
        const categoryName = nameCol === undefined ? '' : cellText(row.getCell(nameCol).value);
        if (!importId || (!categoryId && !categoryName)) return;

        if (categoryId) {
            const resolution: ReviewResolution = { import_id: importId, category: categoryId };
            const name = byId.get(categoryId)?.name ?? categoryName;
            if (name) resolution.category_name = name;
            resolutions.push(resolution);
            return;
        }

        const matches = findCategoriesByName(candidates, categoryName);
        if (matches.length === 1) {
            resolutions.push({ import_id: importId, category: matches[0].id, category_name: matches[0].name });
        } else if (matches.length === 0) {
            warnings.push(`Row ${rowNumber}: unknown category "${categoryName}"`);
        } else {
            warnings.push(`Row ${rowNumber}: category "${categoryName}" is ambiguous, use "Group: Name" or category_id`);
        }
    });

    return { resolutions, warnings };
}

function findCategoriesByName(candidates: readonly CategoryOption[], text: string): CategoryOption[] {
    const wanted = text.toLowerCase();
    return candidates.filter(c => {
        const name = c.name.toLowerCase();
        const qualified = c.group_name ? `${c.group_name.toLowerCase()}: ${name}` : name;
        return name === wanted || qualified === wanted;
    });
}
