// src/services/agents/prompts.ts

import type { ConversationTurn } from '../../models/session.model';
import type { ChatMessage } from '../llm/types';

export const HISTORY_WINDOW_CONCISE = 12;
export const HISTORY_WINDOW_DEFAULT = 8;
export const MAX_TOKENS_CONCISE = 500;
export const MAX_TOKENS_DEFAULT = 2000;
export const MAX_TOOL_ROUNDS = 5;
export const RAW_DOCUMENT_CHARS = 8000;

export const CONCISE_CONSTRAINT =
    'WORKROOM MODE: you are one voice in a live discussion. ' +
    'Reply in 3-5 sentences, never more than 6. ' +
    'Write plain prose: no headers, no bullet or numbered lists. ' +
    'Open with your key insight or recommendation and add reasoning only where it is not obvious. ' +
    'There will be more turns, so do not try to cover everything now. ' +
    'If something essential is missing, ask at most one focused follow-up question. ' +
    "Finish with a single line starting with '→' that states your most important takeaway, risk or question for the group.";

// Earlier turns where a model claimed it could not read the upload.
const STALE_REFUSAL_MARKERS = ['cannot access', 'i need to extract'];

export interface SystemPromptParts {
    persona: string;
    concise: boolean;
    documentBlock?: string;
    teamNote?: string;
}

export function buildSystemPrompt(parts: SystemPromptParts): string {
    const sections = [parts.persona.trim()];
    if (parts.concise) sections.push(CONCISE_CONSTRAINT);
    if (parts.documentBlock) sections.push(parts.documentBlock.trim());
    if (parts.teamNote) sections.push(parts.teamNote);
    return sections.join('\n\n');
}

/** Empty unless someone else is in the room. */
export function buildTeamNote(selfKey: string, activeAgents: string[]): string {
    const others = activeAgents.filter((key) => key !== selfKey);
    if (activeAgents.length <= 1 || others.length === 0) return '';
    const names = others.join(', ');
    return (
        `TEAM: the other agents in this room are ${names}. ` +
        `Stay on your own specialty and leave what ${names} would cover to them. ` +
        'If a point overlaps with another agent, mention it briefly and move on.'
    );
}

export function trimHistory(history: ConversationTurn[], window: number): ChatMessage[] {
    const trimmed: ChatMessage[] = [];
    for (const turn of history.slice(-window)) {
        if (!turn.content) continue;
        const lower = turn.content.toLowerCase();
        if (STALE_REFUSAL_MARKERS.some((marker) => lower.includes(marker))) continue;
        trimmed.push(turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content });
    }
    return trimmed;
}

export function embedRawDocument(message: string, filename: string, text: string): string {
    return `Document context (${filename}):\n---\n${text.slice(0, RAW_DOCUMENT_CHARS)}\n---\n\n${message}`;
}

export function rawDocumentNotice(filename: string): string {
    return (
        `A reference document is attached to this conversation: **${filename}**. ` +
        "Its text is included in the user message under 'Document context'. " +
        'You have its full content; answer from it and do not claim you cannot open the file.'
    );
}

/** Stands in for a reply that came back empty. */
export function noAnswerPlaceholder(label: string): string {
    return `_(${label} had no answer this time. Try rephrasing the question.)_`;
}

export function unavailablePlaceholder(label: string): string {
    return `_(${label} is temporarily unavailable due to a connection issue. Please try again.)_`;
}
