// src/services/orchestrator/intent.ts

export const OPEN_ENDED_MAX_WORDS = 6;

export const OPEN_ENDED_PHRASES: readonly string[] = [
    'what does everyone think',
    'what do you all think',
    'share your thoughts',
    'discuss this',
    'your perspectives',
    'weigh in',
    'round table',
    'thoughts on this',
    'team thoughts',
    'all of you',
    'open discussion',
    'what do you think',
    'each of you',
    'go around',
];

/**
 * Broad messages go to the whole team: short remarks without a question
 * or mention, or anything using an explicit "everyone weigh in" phrasing.
 */
export function isOpenEnded(message: string, maxWords: number = OPEN_ENDED_MAX_WORDS): boolean {
    const text = message.toLowerCase().trim();
    const words = text.split(/\s+/).filter(Boolean);
    if (words.length <= maxWords && !text.includes('@') && !text.includes('?')) {
        return true;
    }
    return OPEN_ENDED_PHRASES.some((phrase) => text.includes(phrase));
}

export type Intent = 'challenge' | 'write' | 'research';

export const INTENT_PATTERNS: Readonly<Record<Intent, readonly RegExp[]>> = {
    challenge: [
        /\bchallenge\s+this\b/,
        /\bargue\s+against\b/,
        /\bred.?team\b/,
        /\bsteel.?man\b/,
        /\bopposing\s+view\b/,
        /\bwhat.{0,20}wrong\s+with\b/,
        /\bcounter.?argument\b/,
        /\bdevil.{0,5}s?\s+advocate\b/,
        /\bflip\s+side\b/,
        /\bchallenge\s+my\b/,
        /\bpoke\s+holes\b/,
        /\bwhat\s+(am|are)\s+i\s+missing\b/,
        /\bwhere\s+(am|are)\s+i\s+wrong\b/,
    ],
    write: [
        /\bdraft\s+(an?\s+)?(email|message|brief|summary|note|update)\b/,
        /\bwrite\s+(an?\s+)?(email|message|brief|summary|update)\b/,
        /\bcompose\s+(an?\s+)?(email|message)\b/,
        /\bexec\s+brief\b/,
        /\bstakeholder\s+(summary|update|brief|note)\b/,
        /\bmeeting\s+prep\b/,
        /\bteams\s+message\b/,
        /\bdraft\s+this\b/,
    ],
    research: [
        /\bresearch\b/,
        /\bdeep.?dive\b/,
        /\btell\s+me\s+more\s+about\b/,
        /\bwhat\s+do\s+you\s+know\s+about\b/,
        /\bindustry\s+context\b/,
        /\bcompetiti(ve|or)\b/,
        /\bbackground\s+on\b/,
        /\bexplain\s+\w+\s+to\s+me\b/,
        /\bhow\s+does\s+\w+\s+work\b/,
    ],
};

/** Agent each intent family is routed to. */
export const INTENT_AGENTS: Readonly<Record<Intent, string>> = {
    challenge: 'challenger',
    write: 'writer',
    research: 'researcher',
};

const INTENT_ORDER: readonly Intent[] = ['challenge', 'write', 'research'];

export function detectIntent(message: string): Intent | null {
    const text = message.toLowerCase();
    return INTENT_ORDER.find((intent) => INTENT_PATTERNS[intent].some((pattern) => pattern.test(text))) ?? null;
}
