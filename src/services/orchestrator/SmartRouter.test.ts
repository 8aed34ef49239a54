import { describe, expect, it } from 'vitest';
import { SmartRouter, parseRoutingResponse, planRoute } from './SmartRouter';
import { ScriptedCompletionService, silentLogger } from '../../testing/ScriptedCompletionService';

const team = ['planner', 'challenger', 'writer'];

describe('parseRoutingResponse', () => {
    it('keeps active keys in the returned order', () => {
        expect(parseRoutingResponse('["writer", "planner"]', team)).toEqual(['writer', 'planner']);
    });

    it('tolerates markdown fences', () => {
        expect(parseRoutingResponse('```json\n["challenger"]\n```', team)).toEqual(['challenger']);
    });

    it('drops unknown keys and duplicates', () => {
        expect(parseRoutingResponse('["writer", "ghost", "writer", 3]', team)).toEqual(['writer']);
    });

    it.each([['not json'], ['{"agents": ["writer"]}'], ['["ghost"]'], ['[]']])('falls back to the whole team for %s', (raw) => {
        expect(parseRoutingResponse(raw, team)).toEqual(team);
    });
});

describe('planRoute', () => {
    it('routes a single pick directly', () => {
        expect(planRoute(['writer'], team)).toEqual({ kind: 'single', agent: 'writer' });
    });

    it('runs a mini round table for two picks', () => {
        expect(planRoute(['writer', 'planner'], team)).toEqual({ kind: 'mini_round_table', agents: ['writer', 'planner'] });
    });

    it('uses the whole team for an empty pick, the full team or more than the maximum', () => {
        expect(planRoute([], team)).toEqual({ kind: 'round_table', agents: team });
        expect(planRoute(['writer', 'planner'], ['writer', 'planner'])).toEqual({
            kind: 'round_table',
            agents: ['writer', 'planner'],
        });
        expect(planRoute(['a', 'b', 'c'], ['a', 'b', 'c', 'd'])).toEqual({ kind: 'round_table', agents: ['a', 'b', 'c', 'd'] });
    });

    it('honours a custom maximum', () => {
        expect(planRoute(['a', 'b', 'c'], ['a', 'b', 'c', 'd'], 3)).toEqual({ kind: 'mini_round_table', agents: ['a', 'b', 'c'] });
    });
});

describe('SmartRouter', () => {
    const describer = {
        describe: (keys: string[]) => keys.map((key) => ({ key, description: `${key} things` })),
    };

    it('sends descriptions and recent history to the model', async () => {
        const completion = new ScriptedCompletionService(['["writer"]']);
        const router = new SmartRouter({ logger: silentLogger, completion, agents: describer });

        const history = [
            { role: 'user' as const, content: 'first' },
            { role: 'user' as const, content: 'second' },
            { role: 'assistant' as const, content: 'x'.repeat(300) },
            { role: 'user' as const, content: 'third' },
            { role: 'user' as const, content: 'fourth' },
        ];
        const selected = await router.select('Who writes the launch note for customers?', team, history);

        expect(selected).toEqual(['writer']);
        const request = completion.requests[0];
        expect(request?.temperature).toBe(0);
        expect(request?.maxTokens).toBe(100);
        const prompt = request?.messages[1]?.content ?? '';
        expect(prompt).toContain('- planner: planner things\n- challenger: challenger things\n- writer: writer things');
        expect(prompt).toContain(`Recent conversation:\nuser: second\nassistant: ${'x'.repeat(200)}\nuser: third\nuser: fourth\n`);
        expect(prompt).not.toContain('user: first');
    });

    it('falls back to the whole team when the call fails', async () => {
        const router = new SmartRouter({
            logger: silentLogger,
            completion: new ScriptedCompletionService([new Error('timeout')]),
            agents: describer,
        });
        await expect(router.select('Which database should we use here?', team, [])).resolves.toEqual(team);
    });
});
