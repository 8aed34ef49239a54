import { beforeEach, describe, expect, it } from 'vitest';
import { Orchestrator } from './Orchestrator';
import { AgentRegistry } from '../agents/AgentRegistry';
import type { CompletionRequest } from '../llm/types';
import { ScriptedCompletionService, silentLogger } from '../../testing/ScriptedCompletionService';
import { InMemoryStorage } from '../../testing/InMemoryStorage';
import { makeAgent, makeSession } from '../../testing/fixtures';
import type { Session } from '../../models/session.model';

const ROUTER_MARKER = 'You route messages inside a multi-agent workroom.';

function speaker(request: CompletionRequest): string {
    const first = request.messages[0];
    return first && first.role === 'system' ? first.content : '';
}

describe('Orchestrator', () => {
    let storage: InMemoryStorage;
    let session: Session;
    let routerReply: string;
    let failing: Set<string>;
    let completion: ScriptedCompletionService;
    let orchestrator: Orchestrator;

    beforeEach(async () => {
        storage = new InMemoryStorage();
        session = makeSession({ id: 'room', activeAgents: ['challenger', 'writer'] });
        await storage.saveSession(session);
        routerReply = '["writer"]';
        failing = new Set();

        completion = new ScriptedCompletionService((request) => {
            const system = speaker(request);
            if (system.startsWith(ROUTER_MARKER)) return routerReply;
            for (const name of ['Challenger', 'Writer', 'Researcher', 'Planner']) {
                if (system.startsWith(`You are the ${name}.`)) {
                    if (failing.has(name)) throw new Error('ECONNRESET');
                    return `${name} reply`;
                }
            }
            return 'other reply';
        });

        const registry = new AgentRegistry({ logger: silentLogger, completion });
        registry.load([
            makeAgent('challenger', { emoji: '⚔️' }),
            makeAgent('writer', { emoji: '✍️' }),
            makeAgent('researcher'),
            makeAgent('planner'),
        ]);
        orchestrator = new Orchestrator({
            logger: silentLogger,
            completion,
            agents: registry,
            storage,
            options: { sleep: async () => undefined },
        });
    });

    const workroomInput = (text: string) => ({ text, history: [], activeAgents: session.activeAgents, session });

    describe('workroom scenarios', () => {
        it('routes a single mention exclusively to that agent', async () => {
            const response = await orchestrator.handleMessage(workroomInput('@challenger is this plan too risky?'));

            expect(response).toEqual({ agent: '[⚔️ Challenger]', text: 'Challenger reply' });
            expect(completion.callCount).toBe(1);
            expect(completion.systemPrompt(0)).toMatch(/^You are the Challenger\./);
        });

        it('runs a full round table for an open-ended message', async () => {
            const response = await orchestrator.handleMessage(workroomInput('Share your thoughts on this'));

            expect(response.agent).toBe('[Round Table]');
            expect(response.multiResponse).toEqual([
                { agent: '[⚔️ Challenger]', text: 'Challenger reply' },
                { agent: '[✍️ Writer]', text: 'Writer reply' },
            ]);
            // No routing call for open-ended messages.
            expect(completion.requests.some((r) => speaker(r).startsWith(ROUTER_MARKER))).toBe(false);
        });

        it('keeps the round table going when one agent cannot connect', async () => {
            failing.add('Challenger');

            const response = await orchestrator.handleMessage(workroomInput('Share your thoughts on this'));

            expect(response.multiResponse).toEqual([
                {
                    agent: '[⚔️ Challenger]',
                    text: '_(Challenger is temporarily unavailable due to a connection issue. Please try again.)_',
                },
                { agent: '[✍️ Writer]', text: 'Writer reply' },
            ]);
        });

        it('blocks mentions of agents outside the team without calling anyone', async () => {
            const response = await orchestrator.handleMessage(workroomInput('@planner @researcher @writer thoughts?'));

            expect(response.agent).toBe('[System]');
            expect(response.text).toBe(
                '**planner**, **researcher** are not in this session.\n\nActive agents: challenger, writer.\n\n' +
                    'Add them to the team, or @mention one of the active agents.',
            );
            expect(completion.callCount).toBe(0);
        });

        it('runs a mini round table over several mentions in mention order', async () => {
            session = makeSession({ id: 'room', activeAgents: ['challenger', 'writer', 'planner'] });

            const response = await orchestrator.handleMessage(workroomInput('@planner and @challenger, timeline?'));

            expect(response.multiResponse?.map((r) => r.agent)).toEqual(['[Planner]', '[⚔️ Challenger]']);
        });

        it('sends a specific question to the agent the router picks', async () => {
            const response = await orchestrator.handleMessage(
                workroomInput('Could someone turn this into a customer-facing announcement for Friday?'),
            );

            expect(response).toEqual({ agent: '[✍️ Writer]', text: 'Writer reply' });
            expect(completion.callCount).toBe(2);
        });

        it('falls back to the whole team when the router reply is unusable', async () => {
            routerReply = 'I think the writer should answer';

            const response = await orchestrator.handleMessage(
                workroomInput('Could someone turn this into a customer-facing announcement for Friday?'),
            );

            expect(response.multiResponse).toHaveLength(2);
        });

        it('answers with a system message when the team is empty', async () => {
            session = makeSession({ id: 'room', activeAgents: [] });

            const response = await orchestrator.handleMessage(workroomInput('Hello team'));

            expect(response.agent).toBe('[System]');
            expect(completion.callCount).toBe(0);
        });

        it('summarises an attached document once, before the agents run', async () => {
            const doc = { filename: 'brief.md', text: 'Launch on 12 May.' };
            const input = { ...workroomInput('Share your thoughts on this'), documentContext: doc };

            await orchestrator.handleMessage(input);
            await orchestrator.handleMessage(input);

            const isSummary = (r: CompletionRequest) => speaker(r).startsWith('You summarise reference documents');
            expect(completion.requests.filter(isSummary)).toHaveLength(1);
            expect(completion.requests.findIndex(isSummary)).toBe(0);
            const agentPrompt = completion.systemPrompt(1);
            expect(agentPrompt).toContain('📄 Reference document: **brief.md**\nSummary:\nother reply');
        });

        it('logs a decision from a single-agent reply', async () => {
            const decisive =
                'Having compared both vendors on cost and support, we decided to go with the hosted option and revisit self-hosting next quarter.';
            const registry = new AgentRegistry({
                logger: silentLogger,
                completion: new ScriptedCompletionService(() => decisive),
            });
            registry.load([makeAgent('challenger'), makeAgent('writer')]);
            const local = new Orchestrator({ logger: silentLogger, completion, agents: registry, storage });

            const response = await local.handleMessage(workroomInput('@writer where did we land?'));

            expect(response.decisions).toHaveLength(1);
            expect((await storage.getSession('room'))?.decisions[0]?.context).toBe('@writer where did we land?');
        });
    });

    describe('free chat', () => {
        const chat = (text: string, activeAgents: string[] = []) => ({ text, history: [], activeAgents });

        it('routes keyword intents to the matching agent', async () => {
            const response = await orchestrator.handleMessage(chat('Draft an email to finance about the budget'));

            expect(response).toEqual({ agent: '[✍️ Writer]', text: 'Writer reply' });
        });

        it('blocks an intent whose agent is not active', async () => {
            const response = await orchestrator.handleMessage(chat('Red team this plan', ['writer', 'ux_designer']));

            expect(response.text).toBe(
                "**Challenger** isn't in this session.\n\nActive agents: Writer, Ux Designer.\n\nAdd **Challenger** to the team to use it.",
            );
            expect(completion.callCount).toBe(0);
        });

        it('answers document questions when no intent matches', async () => {
            const response = await orchestrator.handleMessage({
                ...chat('When is the launch?'),
                documentContext: { filename: 'brief.md', text: 'Launch on 12 May.' },
            });

            expect(response).toEqual({ agent: '[Document Q&A]', text: '_brief.md_\n\nother reply' });
        });

        it('offers a clarification menu otherwise', async () => {
            const response = await orchestrator.handleMessage(chat('hello', ['writer', 'planner']));

            expect(response).toEqual({
                agent: '[System]',
                text:
                    "I'm not sure what you'd like to do. Here are your options with the active agents:\n\n" +
                    "- **Draft a message**: 'Draft an email to [recipient] about [topic]'\n" +
                    '- **Ask a specialist directly**: @planner followed by your question',
                pendingAction: 'choose_agent',
            });
        });

        it('uses the full-length prompt outside workrooms', async () => {
            await orchestrator.handleMessage(chat('Deep dive on vector databases'));

            expect(completion.requests[0]?.maxTokens).toBe(2000);
        });
    });
});
