// src/utils/csv-reader.ts

import { Readable } from 'stream';
import csvParser from 'csv-parser';

export interface CsvResult {
    rows: Record<string, string>[];
    /** `Row n: column: value | column: value`, empty cells skipped. */
    text: string;
    rowCount: number;
}

export class CsvReader {
    public parse(buffer: Buffer): Promise<CsvResult> {
        return new Promise((resolve, reject) => {
            const rows: Record<string, string>[] = [];
            Readable.from(buffer)
                .pipe(csvParser())
                .on('data', (row: Record<string, string>) => rows.push(row))
                .on('end', () => resolve({ rows, text: this.format(rows), rowCount: rows.length }))
                .on('error', reject);
        });
    }

    private format(rows: Record<string, string>[]): string {
        return rows
            .map((row, index) => {
                const cells = Object.entries(row)
                    .filter(([, value]) => value && value.trim())
                    .map(([column, value]) => `${column}: ${value}`);
                return `Row ${index + 1}: ${cells.join(' | ')}`;
            })
            .join('\n');
    }
}
