import { describe, expect, it } from 'vitest';
import { DEGRADED_SUMMARY_PREFIX, DocumentContextCache } from './DocumentContextCache';
import { ScriptedCompletionService, silentLogger } from '../../testing/ScriptedCompletionService';

const doc = { filename: 'brief.md', text: 'The launch is on 12 May. Budget is 40k.' };

describe('DocumentContextCache', () => {
    it('summarises a document once per filename and text', async () => {
        const completion = new ScriptedCompletionService(() => '- Launch 12 May\n- Budget 40k');
        const cache = new DocumentContextCache({ logger: silentLogger, completion });

        await cache.summarize(doc);
        await cache.summarize({ ...doc });
        expect(completion.callCount).toBe(1);

        await cache.summarize({ ...doc, filename: 'other.md' });
        expect(completion.callCount).toBe(2);
    });

    it('replaces the summary when a file is re-uploaded with new content', async () => {
        const completion = new ScriptedCompletionService((request, index) => `summary ${index}`);
        const cache = new DocumentContextCache({ logger: silentLogger, completion });

        await expect(cache.summarize(doc)).resolves.toBe('summary 0');
        await expect(cache.summarize({ ...doc, text: 'The launch moved to 19 May.' })).resolves.toBe('summary 1');
        expect(cache.size).toBe(1);

        // The first version was evicted, so it is summarised again.
        await expect(cache.summarize(doc)).resolves.toBe('summary 2');
        expect(completion.callCount).toBe(3);
        expect(cache.size).toBe(1);
    });

    it('sends at most 12,000 characters for summarising', async () => {
        const completion = new ScriptedCompletionService(['summary']);
        const cache = new DocumentContextCache({ logger: silentLogger, completion });

        await cache.summarize({ filename: 'big.txt', text: 'a'.repeat(12_000) + 'TAIL' });

        const prompt = completion.requests[0]?.messages[1]?.content ?? '';
        expect(prompt).not.toContain('TAIL');
        expect(completion.requests[0]?.temperature).toBe(0);
        expect(completion.requests[0]?.maxTokens).toBe(1200);
    });

    it('returns an empty summary for an empty document without calling the model', async () => {
        const completion = new ScriptedCompletionService([]);
        const cache = new DocumentContextCache({ logger: silentLogger, completion });

        await expect(cache.summarize({ filename: 'empty.txt', text: '' })).resolves.toBe('');
        await expect(cache.contextBlock({ filename: 'empty.txt', text: '' })).resolves.toBe('');
        expect(completion.callCount).toBe(0);
    });

    it('falls back to a raw excerpt and caches it', async () => {
        const completion = new ScriptedCompletionService([new Error('503')]);
        const cache = new DocumentContextCache({ logger: silentLogger, completion });
        const text = 'b'.repeat(2500);

        const summary = await cache.summarize({ filename: 'f.txt', text });

        expect(summary).toBe(`${DEGRADED_SUMMARY_PREFIX}\n\n${'b'.repeat(2000)}`);
        expect(cache.isDegraded(summary)).toBe(true);
        await cache.summarize({ filename: 'f.txt', text });
        expect(completion.callCount).toBe(1);
    });

    it('wraps the summary with the filename and grounding rule', async () => {
        const cache = new DocumentContextCache({
            logger: silentLogger,
            completion: new ScriptedCompletionService(['s'.repeat(3500)]),
        });

        const block = await cache.contextBlock(doc);

        expect(block.startsWith(`📄 Reference document: **brief.md**\nSummary:\n${'s'.repeat(3000)}\n\nGROUNDING RULE:`)).toBe(true);
    });

    it('answers document questions with history and a truncation marker', async () => {
        const completion = new ScriptedCompletionService(['  It launches on 12 May.  ']);
        const cache = new DocumentContextCache({ logger: silentLogger, completion });

        const response = await cache.answerQuestion(
            'When is the launch?',
            { filename: 'long.txt', text: 'c'.repeat(12_001) },
            [
                { role: 'user', content: 'earlier question' },
                { role: 'assistant', content: '' },
            ],
        );

        expect(response).toEqual({ agent: '[Document Q&A]', text: '_long.txt_\n\nIt launches on 12 May.' });
        const messages = completion.requests[0]?.messages ?? [];
        expect(messages).toHaveLength(3);
        expect(messages[1]).toEqual({ role: 'user', content: 'earlier question' });
        expect(messages[2]?.content.endsWith('[...document truncated for length...]\n---\n\nQuestion: When is the launch?')).toBe(true);
    });

    it('answers with a placeholder when the model is unreachable', async () => {
        const cache = new DocumentContextCache({
            logger: silentLogger,
            completion: new ScriptedCompletionService([new Error('down')]),
        });

        const response = await cache.answerQuestion('Anything?', doc, []);

        expect(response.text).toBe(
            '_brief.md_\n\n_(Unable to process document query due to a connection issue. Please try again.)_',
        );
    });
});
