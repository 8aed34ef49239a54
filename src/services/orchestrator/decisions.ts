// src/services/orchestrator/decisions.ts

import { v4 as uuidv4 } from 'uuid';
import type { Decision } from '../../models/session.model';

export const DECISION_MIN_LENGTH = 120;
export const DECISION_CONTENT_CHARS = 300;
export const DECISION_CONTEXT_CHARS = 200;
export const WEAK_PATTERNS_REQUIRED = 3;

/** One match is enough. */
export const STRONG_DECISION_PATTERNS: readonly RegExp[] = [
    /\bdecided\s+(to|that|on)\b/,
    /\bwe('ll| will)\s+(go\s+with|ship|build|use|adopt|implement|proceed)\b/,
    /\blet'?s\s+(go\s+with|use|build|ship|adopt|commit)\b/,
    /\bagreed\s+(to|that|on)\b/,
    /\baction\s+item\s*:/,
    /\bdecision\s*:/,
    /\bcommitted\s+to\b/,
];

/** Counted once each; several distinct ones are needed. */
export const WEAK_DECISION_PATTERNS: readonly RegExp[] = [
    /\bwe\s+should\b/,
    /\bwe\s+(need|must|have)\s+to\b/,
    /\bnext\s+step\b/,
    /\btake\s+away\b/,
    /\bcommitment\b/,
];

export function isDecision(text: string): boolean {
    if (text.length < DECISION_MIN_LENGTH) return false;
    const lower = text.toLowerCase();
    if (STRONG_DECISION_PATTERNS.some((pattern) => pattern.test(lower))) return true;
    const weakHits = WEAK_DECISION_PATTERNS.filter((pattern) => pattern.test(lower)).length;
    return weakHits >= WEAK_PATTERNS_REQUIRED;
}

export function buildDecision(content: string, context: string, now: Date = new Date()): Decision {
    return {
        id: uuidv4(),
        content: content.slice(0, DECISION_CONTENT_CHARS),
        context: context.slice(0, DECISION_CONTEXT_CHARS),
        madeAt: now.toISOString(),
    };
}
