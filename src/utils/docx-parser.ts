// src/utils/docx-parser.ts

import * as mammoth from 'mammoth';

export interface DocxResult {
    text: string;
    paragraphs: string[];
    wordCount: number;
}

export class DocxParser {
    public async parse(buffer: Buffer): Promise<DocxResult> {
        const result = await mammoth.extractRawText({ buffer });
        const paragraphs = (result.value ?? '')
            .split('\n')
            .map((p) => p.trim())
            .filter(Boolean);
        const text = paragraphs.join('\n\n');
        return {
            text,
            paragraphs,
            wordCount: text ? text.split(/\s+/).length : 0,
        };
    }
}
