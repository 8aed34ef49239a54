// src/services/orchestrator/mentions.ts

export const MENTION_ALIASES: Readonly<Record<string, string>> = Object.freeze({
    challenger: 'challenger',
    challenge: 'challenger',
    devil: 'challenger',
    redteam: 'challenger',
    writer: 'writer',
    write: 'writer',
    draft: 'writer',
    researcher: 'researcher',
    research: 'researcher',
    facilitator: 'facilitator',
    fac: 'facilitator',
});

const MENTION_PATTERN = /@(\w+)/g;

/**
 * Agent keys addressed with `@token`, in order of first appearance.
 * Aliases map to their canonical key; other tokens count only when they
 * are a known key.
 */
export function resolveMentions(text: string, knownKeys: Iterable<string>): string[] {
    const known = new Set(knownKeys);
    const found: string[] = [];
    for (const match of text.matchAll(MENTION_PATTERN)) {
        const token = (match[1] ?? '').toLowerCase();
        const key = Object.prototype.hasOwnProperty.call(MENTION_ALIASES, token)
            ? MENTION_ALIASES[token]
            : known.has(token)
              ? token
              : undefined;
        if (key && !found.includes(key)) {
            found.push(key);
        }
    }
    return found;
}

/** Mentioned keys that are not part of the active team. */
export function findInactiveMentions(mentions: string[], activeAgents: string[]): string[] {
    if (activeAgents.length === 0) return [];
    return mentions.filter((key) => !activeAgents.includes(key));
}
