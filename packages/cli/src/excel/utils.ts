import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';
import type { Registry } from '@habit-categorizer/core';

const HEADER_FILL = 'FF374151';
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Habit Categorizer';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white header on a dark fill, frozen above the data rows.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    headerRow.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Sizes each column to its longest value, within fixed bounds.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let widest = MIN_COLUMN_WIDTH;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            widest = Math.max(widest, String(cell.value ?? '').length);
        });
        column.width = Math.min(widest + 2, MAX_COLUMN_WIDTH);
    });
}

export function formatPercentColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '0.0%';
    column.alignment = { horizontal: 'right' };
}

/**
 * `#10B981` → `FF10B981`, the ARGB form exceljs expects.
 */
export function toArgb(color: string): string {
    return `FF${color.replace('#', '').toUpperCase()}`;
}

/**
 * Fills every data cell of a category id column with that category's
 * registry color. Categories without a color are left plain.
 */
export function colorCategoryCells(worksheet: Worksheet, col: string, registry: Registry): void {
    const colors = new Map<string, string>();
    for (const definition of registry.definitions) {
        if (definition.color) colors.set(definition.id, toArgb(definition.color));
    }

    worksheet.getColumn(col).eachCell({ includeEmpty: false }, (cell, rowNumber) => {
        if (rowNumber === 1) return;
        const argb = colors.get(String(cell.value));
        if (argb) {
            cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb } };
        }
    });
}
