// src/services/skills/builtin.ts

import type { Skill, SkillArgs } from './types';

const MAX_RESULTS = 5;
const SNIPPET_CHARS = 300;

function stringArg(args: SkillArgs, key: string): string {
    const value = args[key];
    return typeof value === 'string' ? value : '';
}

function limitArg(args: SkillArgs): number {
    const value = args.limit;
    return typeof value === 'number' && value > 0 ? Math.min(Math.floor(value), 20) : MAX_RESULTS;
}

function keywords(query: string): string[] {
    return query
        .toLowerCase()
        .split(/\W+/)
        .filter((word) => word.length > 2);
}

/** Counts how many query keywords appear in the text. */
export function keywordScore(text: string, terms: string[]): number {
    const haystack = text.toLowerCase();
    return terms.filter((term) => haystack.includes(term)).length;
}

export const currentDateSkill: Skill = {
    name: 'get_current_date',
    description: 'Returns the current date and time in ISO 8601 format, plus the weekday.',
    parameters: { type: 'object', properties: {}, additionalProperties: false },
    execute(_args, context) {
        const now = (context.now ?? (() => new Date()))();
        const weekday = now.toLocaleDateString('en-US', { weekday: 'long', timeZone: 'UTC' });
        return `${now.toISOString()} (${weekday})`;
    },
};

export const searchDecisionsSkill: Skill = {
    name: 'search_decisions',
    description: "Searches the decisions logged in this workroom for a keyword query.",
    parameters: {
        type: 'object',
        properties: {
            query: { type: 'string', description: 'Keywords to look for' },
            limit: { type: 'integer', description: 'Maximum number of results', minimum: 1, maximum: 20 },
        },
        required: ['query'],
        additionalProperties: false,
    },
    execute(args, context) {
        const decisions = context.session?.decisions ?? [];
        if (decisions.length === 0) {
            return 'No decisions have been logged in this workroom yet.';
        }
        const terms = keywords(stringArg(args, 'query'));
        const hits = decisions
            .map((decision) => ({ decision, score: keywordScore(`${decision.content} ${decision.context}`, terms) }))
            .filter((hit) => hit.score > 0)
            .sort((a, b) => b.score - a.score)
            .slice(0, limitArg(args));
        if (hits.length === 0) {
            return `No logged decisions match "${stringArg(args, 'query')}".`;
        }
        return hits.map(({ decision }) => `- (${decision.madeAt.slice(0, 10)}) ${decision.content}`).join('\n');
    },
};

export const searchTranscriptSkill: Skill = {
    name: 'search_transcript',
    description: 'Searches earlier messages in this conversation for a keyword query.',
    parameters: {
        type: 'object',
        properties: {
            query: { type: 'string', description: 'Keywords to look for' },
            limit: { type: 'integer', description: 'Maximum number of results', minimum: 1, maximum: 20 },
        },
        required: ['query'],
        additionalProperties: false,
    },
    execute(args, context) {
        const terms = keywords(stringArg(args, 'query'));
        const hits = context.history
            .map((turn, index) => ({ turn, index, score: keywordScore(turn.content, terms) }))
            .filter((hit) => hit.score > 0)
            .sort((a, b) => b.score - a.score || a.index - b.index)
            .slice(0, limitArg(args));
        if (hits.length === 0) {
            return `No earlier messages match "${stringArg(args, 'query')}".`;
        }
        return hits
            .map(({ turn, index }) => {
                const speaker = turn.role === 'user' ? 'User' : (turn.agent ?? 'Assistant');
                return `#${index + 1} ${speaker}: ${turn.content.slice(0, SNIPPET_CHARS)}`;
            })
            .join('\n');
    },
};

export const BUILTIN_SKILLS: Skill[] = [currentDateSkill, searchDecisionsSkill, searchTranscriptSkill];
