// src/utils/excel-parser.ts

import * as XLSX from 'xlsx';

export interface ExcelResult {
    text: string;
    sheets: Record<string, unknown[][]>;
    sheetCount: number;
}

export class ExcelParser {
    public async parse(buffer: Buffer): Promise<ExcelResult> {
        const workbook = XLSX.read(buffer, { type: 'buffer' });
        const sheets: Record<string, unknown[][]> = {};
        const sections: string[] = [];

        workbook.SheetNames.forEach((sheetName) => {
            const worksheet = workbook.Sheets[sheetName];
            if (!worksheet) return;
            const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, blankrows: false });
            sheets[sheetName] = rows;
            const lines = rows.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))).join(', '));
            sections.push(`Sheet: ${sheetName}\n${lines.join('\n')}`);
        });

        return {
            text: sections.join('\n\n'),
            sheets,
            sheetCount: workbook.SheetNames.length,
        };
    }
}
