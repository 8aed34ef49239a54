// src/utils/pdf-parser.ts

export interface PDFResult {
    text: string;
    pageCount: number;
}

export class PDFParser {
    public async parse(buffer: Buffer): Promise<PDFResult> {
        // Loaded on first use: pdf-parse runs a self-test on import when it thinks it is the entry module.
        const { default: pdfParse } = await import('pdf-parse');
        const data = await pdfParse(buffer);
        return {
            text: this.normalise(data.text ?? ''),
            pageCount: data.numpages ?? 0,
        };
    }

    /** Collapses runs of blank lines left by page breaks. */
    private normalise(text: string): string {
        return text
            .split('\n')
            .map((line) => line.trimEnd())
            .join('\n')
            .replace(/\n{3,}/g, '\n\n')
            .trim();
    }
}
