import { describe, expect, it } from 'vitest';
import { detectIntent, isOpenEnded } from './intent';

describe('isOpenEnded', () => {
    it('treats short remarks without a question or mention as open-ended', () => {
        expect(isOpenEnded('Good question. Please continue.')).toBe(true);
        expect(isOpenEnded('one two three four five six')).toBe(true);
    });

    it('does not treat short questions or mentions as open-ended', () => {
        expect(isOpenEnded('Is this too risky?')).toBe(false);
        expect(isOpenEnded('@writer go on')).toBe(false);
    });

    it('counts words, not characters', () => {
        expect(isOpenEnded('one two three four five six seven')).toBe(false);
    });

    it('matches the explicit phrases even with a question mark', () => {
        expect(isOpenEnded('Given the budget cuts, what does everyone think about delaying?')).toBe(true);
        expect(isOpenEnded('@writer and the rest, please weigh in on the rollout plan')).toBe(true);
    });

    it('respects a custom word threshold', () => {
        expect(isOpenEnded('one two three', 2)).toBe(false);
    });
});

describe('detectIntent', () => {
    it.each([
        ['Can you red-team this launch plan', 'challenge'],
        ['Play devil\'s advocate on pricing', 'challenge'],
        ['What am I missing here', 'challenge'],
        ['Draft an email to finance about the budget', 'write'],
        ['Write a summary for the exec team', 'write'],
        ['I need a stakeholder update', 'write'],
        ['Deep dive on vector databases', 'research'],
        ['How does OAuth work', 'research'],
    ])('classifies "%s" as %s', (message, intent) => {
        expect(detectIntent(message)).toBe(intent);
    });

    it('prefers challenge over write when both match', () => {
        expect(detectIntent('Challenge this and draft an email')).toBe('challenge');
    });

    it('returns null when nothing matches', () => {
        expect(detectIntent('hello there')).toBeNull();
    });
});
