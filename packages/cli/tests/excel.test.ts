import { describe, it, expect } from 'vitest';
import exceljs from 'exceljs';
import type { Workbook } from 'exceljs';
import type { CategoryOption, ImportTransaction, ReviewItem } from '@budget-import/core';
import { generateReviewExcel, readReviewResolutions, REVIEW_SHEET, CATEGORIES_SHEET } from '../src/excel/review.js';
import { cellText, headerColumns } from '../src/excel/utils.js';

const ID_A = `BI:${'a'.repeat(32)}`;
const ID_B = `BI:${'b'.repeat(32)}`;
const ID_C = `BI:${'c'.repeat(32)}`;
const NOW = new Date('2026-03-20T08:00:00.000Z');

const candidates: CategoryOption[] = [
    { id: 'c2', name: 'Rent', group_name: 'Bills' },
    { id: 'c1', name: 'Groceries', group_name: 'Everyday' },
];

function pending(importId: string, date: string, payee: string, amount: number): ImportTransaction {
    return {
        date,
        payee,
        memo: 'card purchase',
        amount,
        account_ref: 'checking',
        import_id: importId,
        category: null,
        confidence: 'manual',
        matched_rule_id: null,
        state: 'review_pending',
    };
}

const queue: ReviewItem[] = [
    { transaction: pending(ID_B, '2026-03-05', 'LANDLORD OY', -95000), candidates },
    { transaction: pending(ID_A, '2026-03-02', 'PRISMA', -4590), candidates },
    { transaction: pending(ID_C, '2026-03-07', 'MYSTERY', -100), candidates },
];

async function roundTrip(workbook: Workbook): Promise<Workbook> {
    const buffer = await workbook.xlsx.writeBuffer();
    const loaded = new exceljs.Workbook();
    await loaded.xlsx.load(buffer);
    return loaded;
}

describe('Review workbook', () => {
    it('lists pending transactions oldest first', async () => {
        const workbook = await roundTrip(generateReviewExcel(queue, NOW));
        const sheet = workbook.getWorksheet(REVIEW_SHEET);
        expect(sheet).toBeDefined();
        if (!sheet) return;

        const columns = headerColumns(sheet);
        expect([...columns.keys()]).toEqual([
            'import_id', 'date', 'payee', 'memo', 'amount', 'account_ref', 'category_id', 'category_name',
        ]);
        expect(sheet.actualRowCount).toBe(4);

        const first = sheet.getRow(2);
        expect(first.getCell(1).value).toBe(ID_A);
        expect(first.getCell(2).value).toBe('2026-03-02');
        expect(first.getCell(3).value).toBe('PRISMA');
        expect(first.getCell(5).value).toBe(-45.9);
        expect(sheet.getRow(3).getCell(1).value).toBe(ID_B);
        expect(sheet.getRow(4).getCell(1).value).toBe(ID_C);
    });

    it('lists the category choices', async () => {
        const workbook = await roundTrip(generateReviewExcel(queue, NOW));
        const sheet = workbook.getWorksheet(CATEGORIES_SHEET);
        expect(sheet).toBeDefined();
        if (!sheet) return;

        expect(sheet.getRow(2).getCell(1).value).toBe('c2');
        expect(sheet.getRow(2).getCell(2).value).toBe('Rent');
        expect(sheet.getRow(2).getCell(3).value).toBe('Bills');
        expect(sheet.getRow(3).getCell(1).value).toBe('c1');
    });

    it('reads categories by id, by name and by group-qualified name', async () => {
        const workbook = generateReviewExcel(queue, NOW);
        const sheet = workbook.getWorksheet(REVIEW_SHEET);
        if (!sheet) throw new Error('missing review sheet');
        const columns = headerColumns(sheet);
        const idCol = columns.get('category_id') ?? 0;
        const nameCol = columns.get('category_name') ?? 0;

        sheet.getRow(2).getCell(idCol).value = 'c1';
        sheet.getRow(3).getCell(nameCol).value = 'bills: rent';
        sheet.getRow(4).getCell(nameCol).value = 'Unknown';

        const { resolutions, warnings } = readReviewResolutions(await roundTrip(workbook), candidates);

        expect(resolutions).toEqual([
            { import_id: ID_A, category: 'c1', category_name: 'Groceries' },
            { import_id: ID_B, category: 'c2', category_name: 'Rent' },
        ]);
        expect(warnings).toEqual(['Row 4: unknown category "Unknown"']);
    });

    it('skips rows left empty and flags ambiguous names', () => {
        const misc: CategoryOption[] = [
            { id: 'm1', name: 'Misc', group_name: 'Everyday' },
            { id: 'm2', name: 'Misc', group_name: 'Bills' },
        ];
        const workbook = generateReviewExcel(queue.map(item => ({ ...item, candidates: misc })), NOW);
        const sheet = workbook.getWorksheet(REVIEW_SHEET);
        if (!sheet) throw new Error('missing review sheet');
        const nameCol = headerColumns(sheet).get('category_name') ?? 0;

        sheet.getRow(2).getCell(nameCol).value = 'Misc';
        sheet.getRow(3).getCell(nameCol).value = 'Bills: Misc';

        const { resolutions, warnings } = readReviewResolutions(workbook, misc);

        expect(resolutions).toEqual([{ import_id: ID_B, category: 'm2', category_name: 'Misc' }]);
        expect(warnings).toEqual(['Row 2: category "Misc" is ambiguous, use "Group: Name" or category_id']);
    });

    it('warns when the review sheet is missing', () => {
        const workbook = new exceljs.Workbook();
        workbook.addWorksheet('Other');

        expect(readReviewResolutions(workbook, candidates)).toEqual({
            resolutions: [],
            warnings: ['Review workbook has no "Review" sheet'],
        });
    });
});

describe('cellText', () => {
    it('flattens the cell value shapes a reviewer can produce', () => {
        expect(cellText(null)).toBe('');
        expect(cellText('  Groceries ')).toBe('Groceries');
        expect(cellText(42)).toBe('42');
        expect(cellText(new Date('2026-03-02T00:00:00.000Z'))).toBe('2026-03-02');
        expect(cellText({ richText: [{ text: 'Gro' }, { text: 'ceries' }] })).toBe('Groceries');
        expect(cellText({ text: 'Rent', hyperlink: 'https://budget.test/c2' })).toBe('Rent');
        expect(cellText({ formula: 'A1', result: 'c1', date1904: false })).toBe('c1');
    });
});
