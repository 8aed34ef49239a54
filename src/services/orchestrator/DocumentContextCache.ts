// src/services/orchestrator/DocumentContextCache.ts

import { createHash } from 'crypto';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { ConversationTurn, DocumentContext } from '../../models/session.model';
import type { ChatMessage, CompletionService } from '../llm/types';
import { errorMessage } from '../../utils/errors';
import { DOCUMENT_QA_LABEL, type OrchestratorResponse } from './types';

export const SUMMARY_SOURCE_CHARS = 12_000;
export const SUMMARY_FALLBACK_CHARS = 2_000;
export const CONTEXT_BLOCK_SUMMARY_CHARS = 3_000;
export const QA_SOURCE_CHARS = 12_000;
export const QA_HISTORY_TURNS = 12;
export const DEGRADED_SUMMARY_PREFIX = '[Summary unavailable — using raw excerpt]';

const SUMMARIZER_SYSTEM =
    'You summarise reference documents for a working session. ' +
    'Capture every key fact, requirement, number, name and technical detail, because this summary ' +
    'is the only view of the document the other agents get. ' +
    'Use bullet points and stay under 2000 characters.';

const DOCUMENT_QA_SYSTEM = `You answer questions about an uploaded document, using the document and any relevant context from earlier in the conversation.

If the document does not answer the question but the conversation does (meeting notes, quotes, stakeholder input), answer from that and say so.

When asked to draft or create something, do it with the information available instead of refusing because the document is thin.

Never state facts that appear in neither the document nor the conversation.`;

const QA_UNAVAILABLE = '_(Unable to process document query due to a connection issue. Please try again.)_';

export interface DocumentContextCacheConfig extends ServiceConfig {
    completion: CompletionService;
}

interface CachedSummary {
    digest: string;
    summary: string;
}

/**
 * One summary per filename per orchestrator, valid while the text hashes the
 * same; new content under a filename replaces the old entry. Agents get the summary; the
 * full text only goes back to the model for direct document questions.
 */
export class DocumentContextCache extends BaseService {
    private completion: CompletionService;
    private summaries = new Map<string, CachedSummary>();

    constructor(config: DocumentContextCacheConfig) {
        super(config);
        this.completion = config.completion;
    }

    /** Number of filenames with a cached summary. */
    get size(): number {
        return this.summaries.size;
    }

    async summarize(doc: DocumentContext): Promise<string> {
        if (!doc.text) return '';

        const digest = createHash('sha256').update(doc.text).digest('hex');
        const cached = this.summaries.get(doc.filename);
        if (cached && cached.digest === digest) return cached.summary;

        const source = doc.text.slice(0, SUMMARY_SOURCE_CHARS);
        let summary: string;
        try {
            const result = await this.completion.complete({
                messages: [
                    { role: 'system', content: SUMMARIZER_SYSTEM },
                    {
                        role: 'user',
                        content:
                            `Summarise this document: **${doc.filename}**\n\n---\n${source}\n---\n\n` +
                            'Include stakeholders, the problem statement, requirements, data and technical details, open questions and any specific asks.',
                    },
                ],
                maxTokens: 1200,
                temperature: 0,
            });
            summary = result.content.trim();
            this.logger.info('Document summarised', { filename: doc.filename, chars: summary.length });
        } catch (error) {
            this.logger.error('Document summarisation failed, using raw excerpt', {
                filename: doc.filename,
                error: errorMessage(error),
            });
            summary = `${DEGRADED_SUMMARY_PREFIX}\n\n${source.slice(0, SUMMARY_FALLBACK_CHARS)}`;
        }

        this.summaries.set(doc.filename, { digest, summary });
        return summary;
    }

    isDegraded(summary: string): boolean {
        return summary.startsWith(DEGRADED_SUMMARY_PREFIX);
    }

    /** Summary wrapped for a system prompt, or '' when there is nothing to say. */
    async contextBlock(doc: DocumentContext | null | undefined): Promise<string> {
        if (!doc) return '';
        const summary = await this.summarize(doc);
        if (!summary) return '';
        return (
            `📄 Reference document: **${doc.filename}**\n` +
            `Summary:\n${summary.slice(0, CONTEXT_BLOCK_SUMMARY_CHARS)}\n\n` +
            'GROUNDING RULE: start by citing one or two facts from this document that matter most for your specialty ' +
            'and the current question, then build your analysis on them. Never ask a question the document already answers.'
        );
    }

    async answerQuestion(question: string, doc: DocumentContext, history: ConversationTurn[]): Promise<OrchestratorResponse> {
        let source = doc.text.slice(0, QA_SOURCE_CHARS);
        if (doc.text.length > QA_SOURCE_CHARS) {
            source += '\n\n[...document truncated for length...]';
        }

        const messages: ChatMessage[] = [{ role: 'system', content: DOCUMENT_QA_SYSTEM }];
        for (const turn of history.slice(-QA_HISTORY_TURNS)) {
            if (!turn.content) continue;
            messages.push(turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content });
        }
        messages.push({
            role: 'user',
            content: `Document: **${doc.filename}**\n\n---\n${source}\n---\n\nQuestion: ${question}`,
        });

        let answer: string;
        try {
            const result = await this.completion.complete({ messages, maxTokens: 1500 });
            answer = result.content.trim();
        } catch (error) {
            this.logger.error('Document Q&A failed', { filename: doc.filename, error: errorMessage(error) });
            answer = QA_UNAVAILABLE;
        }
        return { agent: DOCUMENT_QA_LABEL, text: `_${doc.filename}_\n\n${answer}` };
    }
}
