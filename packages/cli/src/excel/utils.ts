import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Chat Ledger';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen in place.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' },
    };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Sizes each column to its longest value, between 10 and 60 characters.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            const len = cell.value === null || cell.value === undefined ? 0 : String(cell.value).length;
            if (len > maxLen) maxLen = len;
        });
        column.width = Math.min(maxLen + 2, 60);
    });
}

/**
 * Number format for a money column. Whole units for currencies
 * written without minor units (UZS), two decimals otherwise.
 */
export function formatAmountColumn(worksheet: Worksheet, key: string, currency: string): void {
    const column = worksheet.getColumn(key);
    column.numFmt = currency === 'UZS' ? '#,##0' : '#,##0.00';
    column.alignment = { horizontal: 'right' };
}
