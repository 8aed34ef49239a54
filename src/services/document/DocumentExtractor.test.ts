import { describe, expect, it } from 'vitest';
import { DocumentExtractor, documentKind } from './DocumentExtractor';
import { silentLogger } from '../../testing/ScriptedCompletionService';

const extractor = new DocumentExtractor({ logger: silentLogger });

describe('documentKind', () => {
    it.each([
        ['notes.md', 'text'],
        ['README', 'text'],
        ['data.CSV', 'csv'],
        ['deck.pdf', 'pdf'],
        ['brief.docx', 'docx'],
        ['budget.xls', 'excel'],
        ['budget.xlsx', 'excel'],
        ['archive.zip', 'text'],
    ])('%s is read as %s', (filename, kind) => {
        expect(documentKind(filename)).toBe(kind);
    });
});

describe('DocumentExtractor', () => {
    it('decodes text files as UTF-8', async () => {
        expect(await extractor.extractText(Buffer.from('Café plan ✓'), 'notes.txt')).toBe('Café plan ✓');
    });

    it('decodes unknown extensions as UTF-8', async () => {
        expect(await extractor.extractText(Buffer.from('raw bytes'), 'dump.log')).toBe('raw bytes');
    });

    it('formats CSV rows and skips empty cells', async () => {
        const csv = 'name,owner,due\nLanding page,Ana,Friday\nPricing,,Monday\n';

        const text = await extractor.extractText(Buffer.from(csv), 'tasks.csv');

        expect(text).toBe('Row 1: name: Landing page | owner: Ana | due: Friday\nRow 2: name: Pricing | due: Monday');
    });

    it('reports a PDF parser failure instead of throwing', async () => {
        const text = await extractor.extractText(Buffer.from('definitely not a pdf'), 'broken.pdf');

        expect(text.startsWith('[PDF extraction error: ')).toBe(true);
        expect(text.endsWith(']')).toBe(true);
    });

    it('reports a Word parser failure instead of throwing', async () => {
        const text = await extractor.extractText(Buffer.from('not a zip archive'), 'broken.docx');

        expect(text.startsWith('[Word extraction error: ')).toBe(true);
    });
});
