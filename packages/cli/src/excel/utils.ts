import exceljs from 'exceljs';
import type { CellValue, Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(now: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Budget Import';
    workbook.created = now;
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Sets column widths from the longest cell text, between 10 and 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            const len = cellText(cell.value).length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

export function formatCurrencyCell(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * Plain text of a cell, whatever the reviewer typed or pasted into it.
 * Dates come back as YYYY-MM-DD; error cells as ''.
 */
export function cellText(value: CellValue): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (value instanceof Date) return value.toISOString().slice(0, 10);
    if ('richText' in value) return value.richText.map(part => part.text).join('').trim();
    if ('text' in value) return String(value.text).trim();
    if ('result' in value) return value.result === undefined ? '' : cellText(value.result);
    return '';
}

/**
 * Header text to 1-based column number, from row 1.
 */
export function headerColumns(worksheet: Worksheet): Map<string, number> {
    const columns = new Map<string, number>();
    worksheet.getRow(1).eachCell((cell, colNumber) => {
        const header = cellText(cell.value).toLowerCase();
        if (header) columns.set(header, colNumber);
    });
    return columns;
}

export async function readWorkbook(path: string): Promise<Workbook> {
    const workbook = new exceljs.Workbook();
    await workbook.xlsx.readFile(path);
    return workbook;
}
