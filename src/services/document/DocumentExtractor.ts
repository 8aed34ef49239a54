// src/services/document/DocumentExtractor.ts

import path from 'path';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import { CsvReader } from '../../utils/csv-reader';
import { DocxParser } from '../../utils/docx-parser';
import { ExcelParser } from '../../utils/excel-parser';
import { PDFParser } from '../../utils/pdf-parser';
import { errorMessage } from '../../utils/errors';

export type DocumentKind = 'text' | 'csv' | 'pdf' | 'docx' | 'excel';

const KIND_BY_EXTENSION: Record<string, DocumentKind> = {
    '': 'text',
    '.txt': 'text',
    '.md': 'text',
    '.csv': 'csv',
    '.pdf': 'pdf',
    '.docx': 'docx',
    '.xlsx': 'excel',
    '.xls': 'excel',
};

const KIND_NAMES: Record<DocumentKind, string> = {
    text: 'Text',
    csv: 'CSV',
    pdf: 'PDF',
    docx: 'Word',
    excel: 'Excel',
};

export function documentKind(filename: string): DocumentKind {
    return KIND_BY_EXTENSION[path.extname(filename).toLowerCase()] ?? 'text';
}

/**
 * Turns uploaded bytes into plain text. Parser failures come back as a
 * bracketed note in place of the text; nothing is thrown.
 */
export class DocumentExtractor extends BaseService {
    private pdf = new PDFParser();
    private docx = new DocxParser();
    private excel = new ExcelParser();
    private csv = new CsvReader();

    constructor(config: ServiceConfig) {
        super(config);
    }

    async extractText(bytes: Buffer, filename: string): Promise<string> {
        const kind = documentKind(filename);
        try {
            const text = await this.extractByKind(kind, bytes);
            this.logger.info('Document extracted', { filename, kind, chars: text.length });
            return text;
        } catch (error) {
            this.logger.warn('Document extraction failed', { filename, kind, error: errorMessage(error) });
            return `[${KIND_NAMES[kind]} extraction error: ${errorMessage(error)}]`;
        }
    }

    private async extractByKind(kind: DocumentKind, bytes: Buffer): Promise<string> {
        switch (kind) {
            case 'text':
                return bytes.toString('utf-8');
            case 'csv':
                return (await this.csv.parse(bytes)).text;
            case 'pdf':
                return (await this.pdf.parse(bytes)).text;
            case 'docx':
                return (await this.docx.parse(bytes)).text;
            case 'excel':
                return (await this.excel.parse(bytes)).text;
        }
    }
}
