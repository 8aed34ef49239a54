import { describe, expect, it } from 'vitest';
import { TeamAdvisorService, normaliseAgentKey } from './team-advisor.service';
import { ScriptedCompletionService, silentLogger } from '../testing/ScriptedCompletionService';
import { makeAgent } from '../testing/fixtures';

const library = [makeAgent('planner'), makeAgent('writer'), makeAgent('challenger')];

function advisor(replies: Array<string | Error>) {
    const completion = new ScriptedCompletionService(replies);
    return { completion, service: new TeamAdvisorService({ logger: silentLogger, completion }) };
}

describe('normaliseAgentKey', () => {
    it('produces lowercase snake_case', () => {
        expect(normaliseAgentKey('Cost Analyst')).toBe('cost_analyst');
        expect(normaliseAgentKey(' Data-Lead! ')).toBe('data_lead');
    });
});

describe('TeamAdvisorService.recommendAgents', () => {
    it('keeps only known agents and their rationale', async () => {
        const { service, completion } = advisor([
            JSON.stringify({
                recommended: ['writer', 'ghost', 'planner'],
                rationale: { writer: 'Drafts the brief.', ghost: 'Unknown.' },
            }),
        ]);

        const result = await service.recommendAgents('Beta launch', 'Pick a date', 'A plan', library);

        expect(result).toEqual({ recommended: ['writer', 'planner'], rationale: { writer: 'Drafts the brief.' } });
        expect(completion.requests[0]?.responseFormat).toBe('json_object');
        expect(completion.requests[0]?.messages[1]?.content).toContain('- key: writer | label: Writer | description: Writer agent');
    });

    it('accepts fenced JSON', async () => {
        const { service } = advisor(['```json\n{"recommended": ["challenger"], "rationale": {}}\n```']);
        const result = await service.recommendAgents('t', 'o', 'x', library);
        expect(result.recommended).toEqual(['challenger']);
    });

    it.each([['not json'], ['{"recommended": ["writer"]}']])('returns an empty recommendation for %s', async (raw) => {
        const { service } = advisor([raw]);
        expect(await service.recommendAgents('t', 'o', 'x', library)).toEqual({ recommended: [], rationale: {} });
    });

    it('returns an empty recommendation when the model call fails', async () => {
        const { service } = advisor([new Error('timeout')]);
        expect(await service.recommendAgents('t', 'o', 'x', library)).toEqual({ recommended: [], rationale: {} });
    });
});

describe('TeamAdvisorService.designTeam', () => {
    it('normalises keys, de-duplicates and drops incomplete entries', async () => {
        const { service } = advisor([
            JSON.stringify({
                reasoning: 'Pricing needs cost and legal input.',
                agents: [
                    { key: 'Cost Analyst', label: 'Cost Analyst', emoji: '💰', system_prompt: 'You model costs.', category: ' finance ' },
                    { key: 'cost-analyst', label: 'Second Analyst', system_prompt: 'You also model costs.' },
                    { key: 'lawyer', label: 'Lawyer' },
                    'not an object',
                ],
            }),
        ]);

        const design = await service.designTeam('How should we price the API?');

        expect(design.reasoning).toBe('Pricing needs cost and legal input.');
        expect(design.agents).toEqual([
            {
                key: 'cost_analyst',
                label: 'Cost Analyst',
                emoji: '💰',
                description: '',
                systemPrompt: 'You model costs.',
                category: 'finance',
            },
            {
                key: 'cost_analyst_2',
                label: 'Second Analyst',
                emoji: '🤖',
                description: '',
                systemPrompt: 'You also model costs.',
                category: '',
            },
        ]);
    });

    it('returns an empty design on malformed output', async () => {
        const { service } = advisor(['{"agents": []}']);
        expect(await service.designTeam('anything')).toEqual({ reasoning: '', agents: [] });
    });
});
